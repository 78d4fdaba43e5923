/**
 * Error Handling Utilities
 *
 * Type-safe helpers for `catch (e: unknown)`, plus the two errors that are
 * allowed to end a run: unreadable input and an unusable output tree.
 * Everything else is folded into a task outcome.
 */

/**
 * Check if a value is a Node.js ErrnoException
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * Extract a human-readable error message from an unknown error.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === 'string') {
    return e;
  }
  if (e && typeof e === 'object' && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

/**
 * Check if an error has a specific code (common for Node.js errors)
 */
export function hasErrorCode(e: unknown, code: string): boolean {
  return isNodeError(e) && e.code === code;
}

export function isNotFoundError(e: unknown): boolean {
  return hasErrorCode(e, 'ENOENT');
}

export function isPermissionError(e: unknown): boolean {
  return hasErrorCode(e, 'EACCES') || hasErrorCode(e, 'EPERM');
}

/**
 * The export file is missing, unreadable or not decodable.
 */
export class InputError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
    this.filePath = filePath;
  }
}

/**
 * An output directory could not be created.
 */
export class OutputDirectoryError extends Error {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    const reason = isPermissionError(cause) ? 'permission denied' : toErrorMessage(cause);
    super(`Cannot create output directory ${directory}: ${reason}`, { cause });
    this.name = 'OutputDirectoryError';
    this.directory = directory;
  }
}
