import { toErrorMessage } from '../middleware/errors';
import { normalizeTargetUrl } from './targets';
import type { ProbeResult } from './types';

export const USER_AGENT = 'URL-Pinger/0.1';
export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

export type ProbeOptions = {
  timeoutMs?: number;
};

export type Probe = (url: string) => Promise<ProbeResult>;

function isAbortError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'name' in err) {
    const name = (err as { name?: unknown }).name;
    return name === 'AbortError' || name === 'TimeoutError';
  }
  return false;
}

// undici reports transport failures as "fetch failed" and keeps the reason in `cause`.
function describeFetchError(err: unknown): string {
  const message = toErrorMessage(err);
  if (err instanceof Error && err.cause !== undefined) {
    const cause = toErrorMessage(err.cause);
    if (cause && cause !== message) return `${message}: ${cause}`;
  }
  return message;
}

export async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  init: RequestInit,
): Promise<Response> {
  const controller = new AbortController();

  // If the caller also passes a signal, forward abort.
  if (init.signal) {
    init.signal.addEventListener('abort', () => controller.abort());
  }

  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(t);
  }
}

function httpErrorDescription(res: Response): string {
  return res.statusText
    ? `HTTP Error ${res.status}: ${res.statusText}`
    : `HTTP Error ${res.status}`;
}

/**
 * Single GET against `url`. Redirects are followed and the final response is
 * classified: 2xx is reachable, everything else is not.
 *
 * Never throws; transport failures come back with `statusCode: null`.
 */
export async function probeUrl(url: string, opts: ProbeOptions = {}): Promise<ProbeResult> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const target = normalizeTargetUrl(url);

  try {
    const res = await fetchWithTimeout(target, timeoutMs, {
      method: 'GET',
      headers: { 'User-Agent': USER_AGENT },
      redirect: 'follow',
    });

    // Only the status line matters; release the connection.
    await res.body?.cancel().catch(() => undefined);

    if (res.status >= 200 && res.status < 300) {
      return { reachable: true, statusCode: res.status, error: null };
    }

    return { reachable: false, statusCode: res.status, error: httpErrorDescription(res) };
  } catch (err) {
    if (isAbortError(err)) {
      return { reachable: false, statusCode: null, error: `Timeout after ${timeoutMs}ms` };
    }

    return { reachable: false, statusCode: null, error: describeFetchError(err) };
  }
}

export function createProbe(opts: ProbeOptions = {}): Probe {
  return (url) => probeUrl(url, opts);
}
