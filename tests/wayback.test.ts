import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { buildLookupUrl, extractSnapshotUrl, findSnapshot } from '../src/integrations/wayback.js';

const ORIGINAL = 'https://example.com/a?b=1';
const SNAPSHOT = 'http://web.archive.org/web/20200101000000/https://example.com/a?b=1';

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
  return new Response(JSON.stringify(body), { ...init, headers: { 'Content-Type': 'application/json' } });
}

describe('wayback', () => {
  const mockFetch = vi.fn<typeof fetch>();
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    globalThis.fetch = mockFetch;
    mockFetch.mockReset();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('encodes the URL into the lookup query', () => {
    expect(buildLookupUrl('http://archive.org/wayback/available', ORIGINAL)).toBe(
      'http://archive.org/wayback/available?url=https%3A%2F%2Fexample.com%2Fa%3Fb%3D1'
    );
  });

  it('returns the closest snapshot URL', async () => {
    mockFetch.mockResolvedValue(
      jsonResponse({
        url: ORIGINAL,
        archived_snapshots: {
          closest: { status: '200', available: true, url: SNAPSHOT, timestamp: '20200101000000' },
        },
      })
    );

    const result = await findSnapshot(ORIGINAL);

    expect(result).toEqual({ ok: true, value: SNAPSHOT });
    expect(mockFetch.mock.calls[0]?.[0]).toBe(
      'http://archive.org/wayback/available?url=https%3A%2F%2Fexample.com%2Fa%3Fb%3D1'
    );
  });

  it('queries a custom endpoint', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ archived_snapshots: {} }));

    await findSnapshot(ORIGINAL, { endpoint: 'https://archive.test/available' });

    expect(mockFetch.mock.calls[0]?.[0]).toBe('https://archive.test/available?url=https%3A%2F%2Fexample.com%2Fa%3Fb%3D1');
  });

  it('reports not_found when there is no snapshot', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ url: ORIGINAL, archived_snapshots: {} }));

    const result = await findSnapshot(ORIGINAL);

    expect(result).toEqual({
      ok: false,
      error: { type: 'not_found', message: `No archive.org snapshot found for ${ORIGINAL}` },
    });
  });

  it('reports http_error for a non-2xx response', async () => {
    mockFetch.mockResolvedValue(new Response('busy', { status: 503, statusText: 'Service Unavailable' }));

    const result = await findSnapshot(ORIGINAL);

    expect(result).toEqual({
      ok: false,
      error: { type: 'http_error', message: `Wayback API error for ${ORIGINAL}: HTTP 503 Service Unavailable` },
    });
  });

  it('reports parse_error for a body that is not JSON', async () => {
    mockFetch.mockResolvedValue(new Response('<html>maintenance</html>', { status: 200 }));

    const result = await findSnapshot(ORIGINAL);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('parse_error');
    }
  });

  it('reports network_error without throwing', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    const result = await findSnapshot(ORIGINAL);

    expect(result).toEqual({
      ok: false,
      error: { type: 'network_error', message: `Wayback API error for ${ORIGINAL}: fetch failed` },
    });
  });

  it('stops the lookup when the run is aborted', async () => {
    mockFetch.mockImplementation(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const result = await findSnapshot(ORIGINAL, { timeoutMs: 60_000, signal: controller.signal });

    expect(result).toEqual({
      ok: false,
      error: { type: 'aborted', message: `Wayback lookup aborted for ${ORIGINAL}` },
    });
  });

  describe('extractSnapshotUrl', () => {
    it('ignores snapshots marked unavailable', () => {
      expect(extractSnapshotUrl({ archived_snapshots: { closest: { available: false, url: SNAPSHOT } } })).toBeNull();
    });

    it('ignores missing or blank URLs', () => {
      expect(extractSnapshotUrl({ archived_snapshots: { closest: { available: true } } })).toBeNull();
      expect(extractSnapshotUrl({ archived_snapshots: { closest: { url: '  ' } } })).toBeNull();
    });

    it('ignores bodies that are not objects', () => {
      expect(extractSnapshotUrl(null)).toBeNull();
      expect(extractSnapshotUrl('closest')).toBeNull();
    });
  });
});
