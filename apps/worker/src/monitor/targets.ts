import type { MonitoredTarget } from './types';

const SCHEME_RE = /^https?:\/\//i;

export function hasHttpScheme(url: string): boolean {
  return SCHEME_RE.test(url);
}

// Bare hosts such as "example.com/health" are probed over https.
export function normalizeTargetUrl(url: string): string {
  const trimmed = url.trim();
  return hasHttpScheme(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Flag name for a target: the host part of the URL with `:` replaced by `_`,
 * e.g. `https://example.com:8443/health` -> `example.com_8443`.
 *
 * Two URLs on the same host share a key, so they share one down flag.
 */
export function targetKeyFromUrl(url: string): string {
  const withoutScheme = url.trim().replace(SCHEME_RE, '');
  const host = withoutScheme.split('/')[0] ?? '';
  return host.split(':').join('_');
}

export function toMonitoredTarget(url: string): MonitoredTarget {
  return { url, key: targetKeyFromUrl(url) };
}
