import path from 'path';
import { createConsoleReporter, createFileCaptureLog, type CaptureLog, type CaptureReporter } from './capture-log.js';
import { createCaptureDeps, runCapturePipeline } from './capture-pipeline.js';
import { config } from './config.js';
import { env } from './env.js';
import { detectExportFormat, readExport } from './export-reader.js';
import type { ChromeCommand } from './integrations/chrome-runner.js';
import type { CaptureOptions, ExportFormat, LinkRecord, Result, RunSummary } from './types.js';
import { InputError, OutputDirectoryError } from './utils/errors.js';

export const USAGE = `
Bookmark PDF Capture

Usage:
  bookmark-pdf --input <export-file> --output <dir> [options]

Options:
  --input <path>             Bookmark export (CSV, HTML or one URL per line)
  --output <path>            Base directory for the tag folders
  --chrome <path-or-name>    Chrome/Chromium executable (default: "chrome")
  --format <fmt>             auto | csv | html | text (default: auto, by extension)
  --timeout <seconds>        Render timeout per attempt (default: ${config.renderer.timeoutSeconds})
  --probe-timeout <seconds>  Accessibility check timeout (default: ${config.probe.timeoutSeconds})
  --no-probe                 Render without checking the URL first
  --no-retry                 No direct retry when no snapshot exists
  --log-file <path>          Warning log (default: ${config.paths.logFile})
  --strict                   Exit with status 1 if any link failed
  --help                     Show this message

Examples:
  bookmark-pdf --input part_000000.csv --output out
  bookmark-pdf --input ril_export.html --output out --chrome chromium --no-probe
`;

export type FormatOption = ExportFormat | 'auto';

export interface CliOptions {
  input: string;
  output: string;
  chromePath?: string;
  format: FormatOption;
  timeoutSeconds?: number;
  probeTimeoutSeconds?: number;
  probe: boolean;
  retry: boolean;
  logFile?: string;
  strict: boolean;
  help: boolean;
}

const FORMATS: readonly FormatOption[] = ['auto', 'csv', 'html', 'text'];

const VALUE_FLAGS = new Set([
  '--input',
  '--output',
  '--chrome',
  '--format',
  '--timeout',
  '--probe-timeout',
  '--log-file',
]);

function parseSeconds(flag: string, value: string): Result<number, string> {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return { ok: false, error: `${flag} expects a positive number of seconds, got "${value}"` };
  }
  return { ok: true, value: seconds };
}

function parseFormat(value: string): Result<FormatOption, string> {
  const format = FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    return { ok: false, error: `--format must be one of ${FORMATS.join(', ')}, got "${value}"` };
  }
  return { ok: true, value: format };
}

/**
 * Parse `process.argv`-style arguments. Accepts `--flag value` and `--flag=value`.
 */
export function parseCaptureArgs(argv: string[]): Result<CliOptions, string> {
  const values = new Map<string, string>();
  const options: Omit<CliOptions, 'input' | 'output'> = {
    format: 'auto',
    probe: true,
    retry: true,
    strict: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;

    if (flag === '--help' || flag === '-h') {
      options.help = true;
      continue;
    }
    if (flag === '--no-probe') {
      options.probe = false;
      continue;
    }
    if (flag === '--no-retry') {
      options.retry = false;
      continue;
    }
    if (flag === '--strict') {
      options.strict = true;
      continue;
    }
    if (VALUE_FLAGS.has(flag)) {
      const inline = flag !== arg;
      const value = inline ? arg.slice(eq + 1) : argv[i + 1];
      if (value === undefined || value === '' || (!inline && value.startsWith('--'))) {
        return { ok: false, error: `Missing value for ${flag}` };
      }
      if (!inline) i += 1;
      values.set(flag, value);
      continue;
    }
    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  if (options.help) {
    return { ok: true, value: { ...options, input: '', output: '' } };
  }

  const input = values.get('--input');
  const output = values.get('--output');
  if (!input || !output) {
    return { ok: false, error: 'Both --input and --output are required' };
  }

  const result: CliOptions = { ...options, input, output };

  const chrome = values.get('--chrome');
  if (chrome) result.chromePath = chrome;

  const logFile = values.get('--log-file');
  if (logFile) result.logFile = logFile;

  const format = values.get('--format');
  if (format) {
    const parsed = parseFormat(format);
    if (!parsed.ok) return parsed;
    result.format = parsed.value;
  }

  const timeout = values.get('--timeout');
  if (timeout) {
    const parsed = parseSeconds('--timeout', timeout);
    if (!parsed.ok) return parsed;
    result.timeoutSeconds = parsed.value;
  }

  const probeTimeout = values.get('--probe-timeout');
  if (probeTimeout) {
    const parsed = parseSeconds('--probe-timeout', probeTimeout);
    if (!parsed.ok) return parsed;
    result.probeTimeoutSeconds = parsed.value;
  }

  return { ok: true, value: result };
}

/**
 * Flags win over environment variables, which win over config defaults.
 */
export function resolveCaptureOptions(cli: CliOptions): CaptureOptions {
  return {
    enableAccessibilityProbe: cli.probe && config.probe.enabled,
    enableFinalRetry: cli.retry && config.pipeline.enableFinalRetry,
    rendererTimeoutSeconds: cli.timeoutSeconds ?? config.renderer.timeoutSeconds,
    probeTimeoutSeconds: cli.probeTimeoutSeconds ?? config.probe.timeoutSeconds,
    archiveTimeoutSeconds: config.archive.timeoutSeconds,
    archiveEndpoint: env.WAYBACK_ENDPOINT ?? config.archive.endpoint,
    chromePath: cli.chromePath ?? env.CHROME_PATH ?? config.chromePath,
  };
}

export function resolveLogFile(cli: CliOptions): string {
  return path.resolve(cli.logFile ?? env.CAPTURE_LOG_FILE ?? config.paths.logFile);
}

/**
 * 0 unless the run was interrupted, or `--strict` was given and a link failed.
 */
export function exitCodeFor(summary: RunSummary, strict: boolean): number {
  if (summary.interrupted) return 130;
  if (strict && summary.failed > 0) return 1;
  return 0;
}

export interface RunContext {
  signal?: AbortSignal;
  reporter?: CaptureReporter;
  log?: CaptureLog;
  /** Launch a stand-in instead of the resolved browser executable */
  chromeCommand?: ChromeCommand;
}

export interface CaptureRun {
  exitCode: number;
  summary: RunSummary | null;
}

/**
 * Read the export and capture every link. Input and output-directory errors
 * are reported and end the run with status 1 before any further work.
 */
export async function runCaptureCommand(cli: CliOptions, context: RunContext = {}): Promise<CaptureRun> {
  const reporter = context.reporter ?? createConsoleReporter();
  const options = resolveCaptureOptions(cli);
  const format = cli.format === 'auto' ? detectExportFormat(cli.input) : cli.format;

  reporter.note(`Parsing export file: ${cli.input} (${format})`);

  let records: LinkRecord[];
  try {
    records = await readExport(cli.input, format);
  } catch (e) {
    if (e instanceof InputError) {
      reporter.failure(e.message);
      return { exitCode: 1, summary: null };
    }
    throw e;
  }
  reporter.note(`Found ${records.length} links.`);

  const log = context.log ?? createFileCaptureLog(resolveLogFile(cli), env.LOG_LEVEL);
  try {
    const deps = createCaptureDeps(options, {
      log,
      reporter,
      signal: context.signal,
      chromeCommand: context.chromeCommand,
    });
    const summary = await runCapturePipeline(records, cli.output, deps, options);
    return { exitCode: exitCodeFor(summary, cli.strict), summary };
  } catch (e) {
    if (e instanceof OutputDirectoryError) {
      reporter.failure(e.message);
      return { exitCode: 1, summary: null };
    }
    throw e;
  } finally {
    log.close();
  }
}
