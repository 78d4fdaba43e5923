/**
 * Chrome Runner
 *
 * Prints a page to PDF with a headless Chrome/Chromium subprocess.
 *
 * Chrome writes to a partial file beside the destination which is renamed
 * into place only after a clean exit, so an interrupted or failed render
 * never leaves a file at the destination path.
 */

import { spawn } from 'child_process';
import { constants } from 'fs';
import { access, rename, rm, stat } from 'fs/promises';
import path from 'path';
import { config } from '../config.js';
import type { RenderError, RenderResult } from '../types.js';
import { toErrorMessage } from '../utils/errors.js';

const MAX_STDERR_CHARS = 4_000;

export interface ChromeCommand {
  command: string;
  /** Arguments placed before the Chrome flags */
  args: string[];
}

export interface RenderOptions {
  chromePath?: string;
  timeoutMs?: number;
  killGraceMs?: number;
  /** Aborting kills the running Chrome process */
  signal?: AbortSignal;
  /** Explicit launcher, bypassing executable lookup */
  command?: ChromeCommand;
}

interface ProcessOutcome {
  exitCode: number | null;
  stderr: string;
  error?: RenderError;
}

export function buildChromeArgs(url: string, pdfPath: string): string[] {
  return ['--headless', '--disable-gpu', `--print-to-pdf=${pdfPath}`, url];
}

export function partialPathFor(outputPath: string): string {
  return `${outputPath}.${process.pid}.partial.pdf`;
}

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    await access(candidate, constants.X_OK);
    const info = await stat(candidate);
    return info.isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a bare executable name against PATH.
 * Names containing a path separator, and names not found, are returned as given.
 */
export async function resolveExecutable(name: string, envPath: string = process.env.PATH ?? ''): Promise<string> {
  if (name.includes('/') || name.includes(path.sep)) {
    return name;
  }

  const extensions =
    process.platform === 'win32' ? ['', ...(process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];

  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }

  return name;
}

type ChildProcess = ReturnType<typeof spawn>;

function sendSignal(proc: ChildProcess, useProcessGroup: boolean, signal: NodeJS.Signals): void {
  if (useProcessGroup && proc.pid) {
    // Chrome forks renderer and GPU helpers into the same group
    process.kill(-proc.pid, signal);
  } else {
    proc.kill(signal);
  }
}

/**
 * Kill a process and its children, escalating to SIGKILL after a grace period.
 * Returns the escalation timer so the caller can cancel it once the process exits.
 */
function killProcess(proc: ChildProcess, useProcessGroup: boolean, graceMs: number): NodeJS.Timeout | null {
  try {
    sendSignal(proc, useProcessGroup, 'SIGTERM');
  } catch {
    // Process might already be dead
    return null;
  }

  return setTimeout(() => {
    try {
      sendSignal(proc, useProcessGroup, 'SIGKILL');
    } catch {
      // Process already dead
    }
  }, graceMs);
}

/** Immediate SIGKILL for every render still running */
const activeRenders = new Set<() => void>();

/**
 * SIGKILL every running Chrome process group, skipping the grace period.
 * Returns how many renders were killed.
 */
export function killActiveRenders(): number {
  const kills = [...activeRenders];
  for (const kill of kills) {
    kill();
  }
  return kills.length;
}

/**
 * Run a command to completion, enforcing the timeout and abort signal.
 * Resolves only after the process has exited.
 */
function runProcess(
  command: string,
  args: string[],
  options: { timeoutMs: number; killGraceMs: number; signal?: AbortSignal }
): Promise<ProcessOutcome> {
  const { timeoutMs, killGraceMs, signal } = options;

  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve({ exitCode: null, stderr: '', error: { type: 'aborted', message: 'Render aborted before start' } });
      return;
    }

    let stderr = '';
    let stopReason: 'timeout' | 'aborted' | null = null;
    let escalation: NodeJS.Timeout | null = null;
    let settled = false;

    const useProcessGroup = process.platform !== 'win32';
    const proc = spawn(command, args, {
      detached: useProcessGroup,
      stdio: ['ignore', 'ignore', 'pipe'],
    });

    const stop = (reason: 'timeout' | 'aborted'): void => {
      if (stopReason || settled) return;
      stopReason = reason;
      escalation = killProcess(proc, useProcessGroup, killGraceMs);
    };

    const forceKill = (): void => {
      if (!stopReason) stopReason = 'aborted';
      try {
        sendSignal(proc, useProcessGroup, 'SIGKILL');
      } catch {
        // Process already dead
      }
    };
    activeRenders.add(forceKill);

    const timer = setTimeout(() => stop('timeout'), timeoutMs);
    const onAbort = (): void => stop('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (outcome: ProcessOutcome): void => {
      if (settled) return;
      settled = true;
      activeRenders.delete(forceKill);
      clearTimeout(timer);
      if (escalation) clearTimeout(escalation);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    };

    proc.stderr?.on('data', (data: Buffer) => {
      if (stderr.length < MAX_STDERR_CHARS) {
        stderr += data.toString();
      }
    });

    proc.on('error', (e) => {
      finish({
        exitCode: null,
        stderr,
        error: { type: 'spawn_error', message: `Cannot start ${command}: ${toErrorMessage(e)}` },
      });
    });

    proc.on('close', (code) => {
      if (stopReason === 'timeout') {
        finish({
          exitCode: code,
          stderr,
          error: { type: 'timeout', message: `Timeout after ${timeoutMs / 1000}s` },
        });
        return;
      }
      if (stopReason === 'aborted') {
        finish({ exitCode: code, stderr, error: { type: 'aborted', message: 'Render aborted' } });
        return;
      }
      finish({ exitCode: code, stderr });
    });
  });
}

async function hasOutput(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}

/**
 * Render `url` to a PDF at `outputPath`. Never throws; no internal retry.
 */
export async function renderPdf(url: string, outputPath: string, options: RenderOptions = {}): Promise<RenderResult> {
  const {
    chromePath = config.chromePath,
    timeoutMs = config.renderer.timeoutSeconds * 1000,
    killGraceMs = config.renderer.killGraceMs,
    signal,
  } = options;

  const absolutePath = path.resolve(outputPath);
  const partialPath = partialPathFor(absolutePath);
  const launcher = options.command ?? { command: await resolveExecutable(chromePath), args: [] };

  const outcome = await runProcess(launcher.command, [...launcher.args, ...buildChromeArgs(url, partialPath)], {
    timeoutMs,
    killGraceMs,
    signal,
  });

  const error = await checkOutcome(outcome, partialPath);
  if (error) {
    await rm(partialPath, { force: true });
    return { ok: false, error };
  }

  try {
    await rename(partialPath, absolutePath);
  } catch (e) {
    await rm(partialPath, { force: true });
    return { ok: false, error: { type: 'no_output', message: `Cannot move PDF into place: ${toErrorMessage(e)}` } };
  }

  return { ok: true, value: absolutePath };
}

async function checkOutcome(outcome: ProcessOutcome, partialPath: string): Promise<RenderError | null> {
  if (outcome.error) {
    return outcome.error;
  }

  if (outcome.exitCode !== 0) {
    const detail = outcome.stderr.trim().split('\n').pop() ?? '';
    return {
      type: 'exit_error',
      message: `Chrome exited with code ${outcome.exitCode ?? 'null'}${detail ? `: ${detail}` : ''}`,
      exitCode: outcome.exitCode ?? undefined,
    };
  }

  if (!(await hasOutput(partialPath))) {
    return { type: 'no_output', message: 'Chrome exited cleanly but wrote no PDF', exitCode: 0 };
  }

  return null;
}
