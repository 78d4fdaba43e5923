/**
 * Type Definitions for Bookmark PDF Capture
 *
 * Data shapes shared by the export reader, the external-call wrappers
 * and the capture pipeline.
 */

// ============================================
// Generic Result Type
// ============================================

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

export interface AppError {
  type: string;
  message: string;
  cause?: unknown;
}

// ============================================
// Export Records
// ============================================

export type ExportFormat = 'csv' | 'html' | 'text';

export interface LinkRecord {
  readonly url: string;
  readonly title: string;
  readonly tags: readonly string[];
}

export interface CaptureTask {
  /** 1-based position in the export */
  index: number;
  record: LinkRecord;
  /** Tag folder the PDF lands in */
  directory: string;
  outputPath: string;
}

// ============================================
// External Calls
// ============================================

export type ProbeResult = Result<number, string>;

export type SnapshotErrorType = 'not_found' | 'http_error' | 'network_error' | 'parse_error' | 'aborted';

export type SnapshotResult = Result<string, AppError & { type: SnapshotErrorType }>;

export type RenderErrorType = 'spawn_error' | 'exit_error' | 'timeout' | 'aborted' | 'no_output';

export interface RenderError {
  type: RenderErrorType;
  message: string;
  exitCode?: number;
}

export type RenderResult = Result<string, RenderError>;

// ============================================
// Capture Outcomes
// ============================================

export type CaptureSource = 'live' | 'archive';

export type FailureReason = 'archive-render-failed' | 'no-snapshot-and-retry-failed' | 'no-snapshot';

export type CaptureOutcome =
  | { status: 'skipped'; outputPath: string }
  | {
      status: 'rendered';
      source: CaptureSource;
      outputPath: string;
      snapshotUrl?: string;
      /** Set when only the final direct retry succeeded */
      flagged?: boolean;
    }
  | { status: 'failed'; reason: FailureReason; outputPath: string };

/** A task cut short by an abort signal; not a terminal outcome */
export interface Interrupted {
  status: 'interrupted';
  outputPath: string;
}

export type TaskResult = CaptureOutcome | Interrupted;

export interface TaskReport {
  index: number;
  url: string;
  outcome: CaptureOutcome;
}

export interface RunSummary {
  total: number;
  skipped: number;
  renderedLive: number;
  renderedArchive: number;
  flagged: number;
  failed: number;
  /** True when the run stopped early on an abort signal */
  interrupted: boolean;
  reports: TaskReport[];
}

// ============================================
// Pipeline Configuration
// ============================================

export type CapturePolicy = Pick<CaptureOptions, 'enableAccessibilityProbe' | 'enableFinalRetry'>;

export interface CaptureOptions {
  enableAccessibilityProbe: boolean;
  enableFinalRetry: boolean;
  rendererTimeoutSeconds: number;
  probeTimeoutSeconds: number;
  archiveTimeoutSeconds: number;
  archiveEndpoint: string;
  chromePath: string;
}
