/**
 * Accessibility Probe
 *
 * Best-effort check that a URL answers before spending a render on it.
 * Uses a real GET: some servers answer HEAD requests incorrectly.
 */

import { config } from './config.js';
import type { ProbeResult } from './types.js';
import { discardBody, fetchWithTimeout } from './utils/http.js';

export interface ProbeOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export function isAccessibleStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

/**
 * Fetch the URL and report its final status, or why no status was obtained.
 */
export async function probeUrl(url: string, options: ProbeOptions = {}): Promise<ProbeResult> {
  const { timeoutMs = config.probe.timeoutSeconds * 1000, signal } = options;

  const result = await fetchWithTimeout(url, { timeoutMs, signal });
  if (!result.ok) {
    return { ok: false, error: result.error.message };
  }

  const response = result.value;
  await discardBody(response);
  return { ok: true, value: response.status };
}
