/**
 * HTTP Fetching
 *
 * Thin wrapper over the global fetch that enforces a timeout and converts
 * every failure into a tagged result instead of a thrown error.
 */

import type { Result } from '../types.js';
import { toErrorMessage } from './errors.js';
import { isHttpUrl } from './url.js';

export const USER_AGENT = 'Mozilla/5.0 (compatible; BookmarkPdfCapture/1.0)';

export type HttpErrorType = 'invalid_url' | 'timeout' | 'aborted' | 'network_error';

export interface HttpError {
  type: HttpErrorType;
  message: string;
}

export interface FetchOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  /** Cancels the request along with the timeout */
  signal?: AbortSignal;
}

/**
 * GET a URL with a hard timeout covering both headers and body.
 * Redirects are followed.
 *
 * The caller owns the returned response and must consume or cancel its body.
 */
export async function fetchWithTimeout(url: string, options: FetchOptions): Promise<Result<Response, HttpError>> {
  if (!isHttpUrl(url)) {
    return { ok: false, error: { type: 'invalid_url', message: `Not an http(s) URL: ${url}` } };
  }

  // Stays armed while the caller reads the body
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  try {
    const response = await fetch(url, {
      method: 'GET',
      signal,
      redirect: 'follow',
      headers: {
        'User-Agent': USER_AGENT,
        ...options.headers,
      },
    });
    return { ok: true, value: response };
  } catch (e) {
    if (options.signal?.aborted) {
      return { ok: false, error: { type: 'aborted', message: 'Request aborted' } };
    }
    if (timeout.aborted) {
      return { ok: false, error: { type: 'timeout', message: `Request timeout after ${options.timeoutMs}ms` } };
    }
    return { ok: false, error: { type: 'network_error', message: toErrorMessage(e) } };
  }
}

/**
 * Release a response body we have no use for.
 */
export async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch {
    // Stream already closed
  }
}
