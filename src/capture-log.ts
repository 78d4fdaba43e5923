/**
 * Capture Logging
 *
 * Two sinks, both created once at startup and handed to the pipeline:
 * - CaptureLog: durable log file for outcomes worth a second look
 *   (failed snapshot renders, direct-retry results).
 * - CaptureReporter: transient, colored console progress.
 */

import chalk from 'chalk';
import pino from 'pino';
import type { LogLevel } from './env.js';
import type { CaptureTask, RunSummary } from './types.js';

export type LogContext = Record<string, string | number | boolean | undefined>;

export interface CaptureLog {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /** Flush pending records and release the file handle */
  close(): void;
}

export interface CaptureReporter {
  start(task: CaptureTask, total: number): void;
  skipped(task: CaptureTask): void;
  note(message: string): void;
  success(message: string): void;
  failure(message: string): void;
  summary(summary: RunSummary): void;
}

// ============================================
// Durable log (pino)
// ============================================

export function createFileCaptureLog(filePath: string, level: LogLevel = 'warn'): CaptureLog {
  const destination = pino.destination({ dest: filePath, sync: true, mkdir: true, append: true });
  const logger = pino(
    {
      level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination
  );

  return {
    info: (message, context = {}) => logger.info(context, message),
    warn: (message, context = {}) => logger.warn(context, message),
    close: () => destination.end(),
  };
}

// ============================================
// Console reporter (chalk)
// ============================================

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    '',
    'Capture Summary',
    '===============',
    `Rendered (live):    ${summary.renderedLive}`,
    `Rendered (archive): ${summary.renderedArchive}`,
    `Skipped (existing): ${summary.skipped}`,
    `Failed:             ${summary.failed}`,
    '-------------------',
    `Total:              ${summary.total}`,
  ];
  if (summary.flagged > 0) {
    lines.push(`Flagged for review: ${summary.flagged} (see log file)`);
  }
  if (summary.interrupted) {
    lines.push(`Interrupted after ${summary.reports.length} of ${summary.total} links`);
  }
  return lines;
}

export function createConsoleReporter(write: (line: string) => void = console.log): CaptureReporter {
  return {
    start: (task, total) => write(chalk.blue(`Processing (${task.index}/${total}): ${task.record.url}`)),
    skipped: (task) => write(`Skipping existing PDF: ${task.outputPath}`),
    note: (message) => write(message),
    success: (message) => write(chalk.green(message)),
    failure: (message) => write(chalk.red(message)),
    summary: (summary) => {
      for (const line of formatSummary(summary)) {
        write(summary.failed > 0 && line.startsWith('Failed') ? chalk.red(line) : line);
      }
    },
  };
}
