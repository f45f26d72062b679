/**
 * Reachability probe
 *
 * One request per call, abandoned after the timeout. Redirects are not
 * followed. Only a 2xx response counts as available; a 3xx is unavailable
 * like any other status, and no outcome is ever thrown.
 */

import { errorMessage } from '../errors';
import type { Probe, ProbeResult } from '../types';
import { createLogger } from '../utils/logger';

const logger = createLogger('probe');

export interface ProbeOptions {
  /** Milliseconds before the request is aborted. Default: 10000 */
  timeoutMs?: number;
  method?: 'HEAD' | 'GET';
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  userAgent?: string;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; sitewatch/0.1)';

export async function probeUrl(url: string, options: ProbeOptions = {}): Promise<ProbeResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const doFetch = options.fetch ?? fetch;
  const started = Date.now();

  try {
    const response = await doFetch(url, {
      method: options.method ?? 'HEAD',
      headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      redirect: 'manual',
      signal: AbortSignal.timeout(timeoutMs),
    });

    const durationMs = Date.now() - started;
    // The body is never read; release the connection
    response.body?.cancel().catch((err: unknown) => {
      logger.debug({ err, url }, 'Failed to discard response body');
    });

    if (response.ok) {
      return { url, available: true, status: response.status, durationMs };
    }
    return {
      url,
      available: false,
      status: response.status,
      error: `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
      durationMs,
    };
  } catch (err) {
    const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
    return {
      url,
      available: false,
      error: timedOut ? `Timed out after ${timeoutMs}ms` : errorMessage(err),
      durationMs: Date.now() - started,
    };
  }
}

/** Bind options into a Probe for the monitor loop. */
export function createHttpProbe(options: ProbeOptions = {}): Probe {
  return (url) => probeUrl(url, options);
}
