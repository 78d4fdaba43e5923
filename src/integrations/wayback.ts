/**
 * Wayback Machine Lookup
 *
 * Asks the archive.org availability API for the closest snapshot of a URL.
 * Every failure is reported as "no snapshot" so the caller can carry on.
 */

import { config } from '../config.js';
import type { SnapshotErrorType, SnapshotResult } from '../types.js';
import { toErrorMessage } from '../utils/errors.js';
import { discardBody, fetchWithTimeout } from '../utils/http.js';

export interface SnapshotLookupOptions {
  endpoint?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function noSnapshot(type: SnapshotErrorType, message: string): SnapshotResult {
  return { ok: false, error: { type, message } };
}

export function buildLookupUrl(endpoint: string, url: string): string {
  return `${endpoint}?url=${encodeURIComponent(url)}`;
}

/**
 * Pull `archived_snapshots.closest.url` out of an availability API response body.
 */
export function extractSnapshotUrl(body: unknown): string | null {
  const snapshots = isRecord(body) ? body.archived_snapshots : undefined;
  const closest = isRecord(snapshots) ? snapshots.closest : undefined;
  if (!isRecord(closest) || closest.available === false) return null;

  const { url } = closest;
  return typeof url === 'string' && url.trim() ? url : null;
}

export async function findSnapshot(url: string, options: SnapshotLookupOptions = {}): Promise<SnapshotResult> {
  const { endpoint = config.archive.endpoint, timeoutMs = config.archive.timeoutSeconds * 1000, signal } = options;

  const result = await fetchWithTimeout(buildLookupUrl(endpoint, url), {
    timeoutMs,
    signal,
    headers: { Accept: 'application/json' },
  });
  if (!result.ok && result.error.type === 'aborted') {
    return noSnapshot('aborted', `Wayback lookup aborted for ${url}`);
  }
  if (!result.ok) {
    return noSnapshot('network_error', `Wayback API error for ${url}: ${result.error.message}`);
  }

  const response = result.value;
  if (!response.ok) {
    await discardBody(response);
    return noSnapshot('http_error', `Wayback API error for ${url}: HTTP ${response.status} ${response.statusText}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (e) {
    return noSnapshot('parse_error', `Wayback API returned invalid JSON for ${url}: ${toErrorMessage(e)}`);
  }

  const snapshotUrl = extractSnapshotUrl(body);
  if (!snapshotUrl) {
    return noSnapshot('not_found', `No archive.org snapshot found for ${url}`);
  }

  return { ok: true, value: snapshotUrl };
}
