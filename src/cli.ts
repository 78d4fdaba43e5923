#!/usr/bin/env node
/**
 * Bookmark PDF Capture CLI
 *
 * One-shot capture of every link in a bookmark export, with graceful
 * shutdown: the first Ctrl+C kills the running Chrome process and lets the
 * run print its summary, a second one exits immediately.
 */

import './env.js';

import { killActiveRenders } from './integrations/chrome-runner.js';
import { parseCaptureArgs, runCaptureCommand, USAGE } from './pipeline-runner.js';
import { toErrorMessage } from './utils/errors.js';

const SIGNAL_EXIT_CODES: Record<'SIGINT' | 'SIGTERM', number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Graceful Shutdown Manager
 */
class ShutdownManager {
  readonly controller = new AbortController();
  exitCode: number | null = null;

  handle(signal: 'SIGINT' | 'SIGTERM'): void {
    if (this.controller.signal.aborted) {
      console.log('\n[Shutdown] Forced exit.');
      killActiveRenders();
      process.exit(SIGNAL_EXIT_CODES[signal]);
    }

    this.exitCode = SIGNAL_EXIT_CODES[signal];
    console.log('\n[Shutdown] Interrupt received, stopping the running render...');
    this.controller.abort();
  }
}

async function main(): Promise<number> {
  const parsed = parseCaptureArgs(process.argv);
  if (!parsed.ok) {
    console.error(`Error: ${parsed.error}`);
    console.error(USAGE);
    return 2;
  }

  if (parsed.value.help) {
    console.log(USAGE);
    return 0;
  }

  const shutdown = new ShutdownManager();
  process.on('SIGINT', () => shutdown.handle('SIGINT'));
  process.on('SIGTERM', () => shutdown.handle('SIGTERM'));

  const run = await runCaptureCommand(parsed.value, { signal: shutdown.controller.signal });
  return shutdown.exitCode ?? run.exitCode;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error(`Capture failed: ${toErrorMessage(error)}`);
    process.exit(1);
  }
);
