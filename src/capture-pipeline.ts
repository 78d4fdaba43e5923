/**
 * Capture Pipeline
 *
 * Per-link decision sequence, run strictly in input order:
 *
 *   existing file? -> skipped
 *   [probe] + render live URL -> rendered (live)
 *   snapshot found -> render snapshot -> rendered (archive) | failed
 *   no snapshot -> [direct retry] -> rendered (live, flagged) | failed
 *
 * A snapshot is always tried before a second live attempt: a page that
 * failed live is likely to fail the same way again.
 *
 * External calls come in through CaptureDeps and report failure as values,
 * so the branching here is over results only. The single exception is an
 * OutputDirectoryError, which ends the run.
 */

import { access, mkdir } from 'fs/promises';
import { isAccessibleStatus, probeUrl } from './accessibility-probe.js';
import type { CaptureLog, CaptureReporter } from './capture-log.js';
import { renderPdf, type ChromeCommand } from './integrations/chrome-runner.js';
import { findSnapshot } from './integrations/wayback.js';
import { buildCaptureTasks } from './output-path.js';
import type {
  CaptureOptions,
  CaptureOutcome,
  CapturePolicy,
  CaptureTask,
  LinkRecord,
  ProbeResult,
  RenderResult,
  RunSummary,
  SnapshotResult,
  TaskResult,
} from './types.js';
import { OutputDirectoryError } from './utils/errors.js';

export interface CaptureDeps {
  render(url: string, outputPath: string): Promise<RenderResult>;
  probe(url: string): Promise<ProbeResult>;
  findSnapshot(url: string): Promise<SnapshotResult>;
  fileExists(filePath: string): Promise<boolean>;
  ensureDir(dir: string): Promise<void>;
  log: CaptureLog;
  reporter: CaptureReporter;
  signal?: AbortSignal;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a directory (and parents). An existing directory is fine.
 *
 * @throws OutputDirectoryError
 */
export async function ensureDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (e) {
    throw new OutputDirectoryError(dir, e);
  }
}

/**
 * Wire the real prober, renderer and snapshot lookup to the run's options.
 */
export function createCaptureDeps(
  options: CaptureOptions,
  sinks: { log: CaptureLog; reporter: CaptureReporter; signal?: AbortSignal; chromeCommand?: ChromeCommand }
): CaptureDeps {
  return {
    render: (url, outputPath) =>
      renderPdf(url, outputPath, {
        chromePath: options.chromePath,
        timeoutMs: options.rendererTimeoutSeconds * 1000,
        signal: sinks.signal,
        command: sinks.chromeCommand,
      }),
    probe: (url) => probeUrl(url, { timeoutMs: options.probeTimeoutSeconds * 1000, signal: sinks.signal }),
    findSnapshot: (url) =>
      findSnapshot(url, {
        endpoint: options.archiveEndpoint,
        timeoutMs: options.archiveTimeoutSeconds * 1000,
        signal: sinks.signal,
      }),
    fileExists,
    ensureDir,
    log: sinks.log,
    reporter: sinks.reporter,
    signal: sinks.signal,
  };
}

function isInterrupted(deps: CaptureDeps): boolean {
  return deps.signal?.aborted === true;
}

async function attemptRender(deps: CaptureDeps, url: string, outputPath: string): Promise<RenderResult> {
  const result = await deps.render(url, outputPath);
  if (result.ok) {
    deps.reporter.success(`Saved PDF: ${result.value}`);
  } else if (result.error.type === 'timeout') {
    deps.reporter.failure(`${result.error.message} generating PDF for ${url}`);
  } else if (result.error.type !== 'aborted') {
    deps.reporter.failure(`Error generating PDF for ${url}: ${result.error.message}`);
  }
  return result;
}

async function primaryAttempt(task: CaptureTask, deps: CaptureDeps, policy: CapturePolicy): Promise<RenderResult | null> {
  const { url } = task.record;

  if (policy.enableAccessibilityProbe) {
    const probe = await deps.probe(url);
    if (probe.ok) {
      deps.reporter.note(`Got response status code: ${probe.value}`);
    }
    if (!probe.ok || !isAccessibleStatus(probe.value)) {
      if (isInterrupted(deps)) return null;
      deps.reporter.failure(`URL not accessible: ${url}${probe.ok ? '' : ` (${probe.error})`}`);
      return null;
    }
  }

  return attemptRender(deps, url, task.outputPath);
}

/**
 * Run one task through the decision sequence.
 */
export async function captureTask(task: CaptureTask, deps: CaptureDeps, policy: CapturePolicy): Promise<TaskResult> {
  const { url } = task.record;
  const { outputPath } = task;

  if (await deps.fileExists(outputPath)) {
    deps.reporter.skipped(task);
    return { status: 'skipped', outputPath };
  }

  await deps.ensureDir(task.directory);

  const primary = await primaryAttempt(task, deps, policy);
  if (primary?.ok) {
    deps.log.info('Captured live page', { url, outputPath });
    return { status: 'rendered', source: 'live', outputPath };
  }
  // Covers an abort during the probe as well as during the render
  if (isInterrupted(deps)) {
    return { status: 'interrupted', outputPath };
  }

  deps.reporter.note(`Trying Wayback Machine fallback for ${url}`);
  const snapshot = await deps.findSnapshot(url);

  if (snapshot.ok) {
    const snapshotUrl = snapshot.value;
    deps.reporter.success(`Found archive.org snapshot: ${snapshotUrl}`);

    const archived = await attemptRender(deps, snapshotUrl, outputPath);
    if (archived.ok) {
      deps.log.info('Captured archived snapshot', { url, snapshotUrl, outputPath });
      return { status: 'rendered', source: 'archive', outputPath, snapshotUrl };
    }
    if (isInterrupted(deps)) {
      return { status: 'interrupted', outputPath };
    }

    deps.log.warn('Failed downloading archive.org snapshot', { url, snapshotUrl, error: archived.error.message });
    return { status: 'failed', reason: 'archive-render-failed', outputPath };
  }

  if (isInterrupted(deps)) {
    return { status: 'interrupted', outputPath };
  }

  deps.reporter.failure(snapshot.error.message);

  if (!policy.enableFinalRetry) {
    deps.log.warn('No archive.org snapshot and direct retry disabled', { url });
    return { status: 'failed', reason: 'no-snapshot', outputPath };
  }

  deps.reporter.note('Trying directly one more time.');
  const retry = await attemptRender(deps, url, outputPath);
  if (retry.ok) {
    // Earlier failure was spurious; worth a manual look
    deps.log.warn('Double check downloading snapshot directly', { url, outputPath });
    return { status: 'rendered', source: 'live', outputPath, flagged: true };
  }
  if (isInterrupted(deps)) {
    return { status: 'interrupted', outputPath };
  }

  deps.log.warn('Failed downloading snapshot directly', { url, error: retry.error.message });
  return { status: 'failed', reason: 'no-snapshot-and-retry-failed', outputPath };
}

export function emptySummary(total: number): RunSummary {
  return {
    total,
    skipped: 0,
    renderedLive: 0,
    renderedArchive: 0,
    flagged: 0,
    failed: 0,
    interrupted: false,
    reports: [],
  };
}

function tally(summary: RunSummary, outcome: CaptureOutcome): void {
  switch (outcome.status) {
    case 'skipped':
      summary.skipped += 1;
      break;
    case 'rendered':
      if (outcome.source === 'archive') {
        summary.renderedArchive += 1;
      } else {
        summary.renderedLive += 1;
      }
      if (outcome.flagged) summary.flagged += 1;
      break;
    case 'failed':
      summary.failed += 1;
      break;
  }
}

/**
 * Capture every record in order. A failed task never stops the run;
 * an abort signal does, after the in-flight render has been killed.
 *
 * @throws OutputDirectoryError if the output tree cannot be created
 */
export async function runCapturePipeline(
  records: readonly LinkRecord[],
  outputDir: string,
  deps: CaptureDeps,
  policy: CapturePolicy
): Promise<RunSummary> {
  await deps.ensureDir(outputDir);

  const tasks = buildCaptureTasks(records, outputDir);
  const summary = emptySummary(tasks.length);

  for (const task of tasks) {
    if (isInterrupted(deps)) {
      summary.interrupted = true;
      break;
    }

    deps.reporter.start(task, tasks.length);
    const result = await captureTask(task, deps, policy);
    if (result.status === 'interrupted') {
      summary.interrupted = true;
      break;
    }

    summary.reports.push({ index: task.index, url: task.record.url, outcome: result });
    tally(summary, result);
  }

  deps.reporter.summary(summary);
  return summary;
}
