import type { ProbeResult } from '../monitor/types';
import type { Notification } from './types';

const FORBIDDEN_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

type PathSegment = string | number;

// `target.url`, `.state.error`, `items[1].name`. Returns null for anything else.
function parsePath(expr: string): PathSegment[] | null {
  const trimmed = expr.trim().replace(/^\.+/, '');
  if (!trimmed) return null;

  const segments: PathSegment[] = [];
  for (const part of trimmed.split('.')) {
    const m = /^([^[\]]+)((?:\[\d+\])*)$/.exec(part);
    if (!m) return null;

    const [, name = '', indexes = ''] = m;
    if (FORBIDDEN_KEYS.has(name)) return null;
    segments.push(name);

    for (const idx of indexes.matchAll(/\[(\d+)\]/g)) {
      segments.push(Number(idx[1]));
    }
  }
  return segments;
}

function lookupPath(vars: Record<string, unknown>, expr: string): unknown {
  const segments = parsePath(expr);
  if (!segments) return undefined;

  let cur: unknown = vars;
  for (const seg of segments) {
    if (typeof seg === 'number') {
      if (!Array.isArray(cur)) return undefined;
      cur = cur[seg];
      continue;
    }
    if (cur === null || typeof cur !== 'object' || !Object.prototype.hasOwnProperty.call(cur, seg)) {
      return undefined;
    }
    cur = (cur as Record<string, unknown>)[seg];
  }
  return cur;
}

function stringify(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/** `$MSG` expands to `vars.message`; `{{path}}` to the value at that path. */
export function renderStringTemplate(template: string, vars: Record<string, unknown>): string {
  const msg = typeof vars.message === 'string' ? vars.message : '';
  const withMsg = msg ? template.split('$MSG').join(msg) : template;

  return withMsg.replace(/\{\{\s*([^{}]+?)\s*\}\}/g, (_m, expr: string) =>
    stringify(lookupPath(vars, expr)),
  );
}

export function renderJsonTemplate(
  value: unknown,
  vars: Record<string, unknown>,
  maxDepth = 32,
): unknown {
  const walk = (v: unknown, depth: number): unknown => {
    if (depth > maxDepth) return null;
    if (typeof v === 'string') return renderStringTemplate(v, vars);
    if (Array.isArray(v)) return v.map((item) => walk(item, depth + 1));
    if (v && typeof v === 'object') {
      return Object.fromEntries(
        Object.entries(v).map(([k, item]: [string, unknown]) => [k, walk(item, depth + 1)]),
      );
    }
    return v;
  };

  return walk(value, 0);
}

const FOOTER = 'This is an automated message from the URL Ping Service.';

export function formatDuration(durationSeconds: number): string {
  if (durationSeconds < 60) {
    return `${durationSeconds}s`;
  }

  const minutes = Math.floor(durationSeconds / 60);
  const seconds = durationSeconds % 60;

  if (minutes < 60) {
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  if (hours < 24) {
    return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
  }

  const days = Math.floor(hours / 24);
  const remainingHours = hours % 24;

  return remainingHours > 0 ? `${days}d ${remainingHours}h` : `${days}d`;
}

export function buildDownNotification(input: {
  url: string;
  key: string;
  probe: ProbeResult;
  timestamp: number;
}): Notification {
  const { url, key, probe, timestamp } = input;
  const body = [
    `The URL ${url} is currently DOWN.`,
    '',
    `Status Code: ${probe.statusCode ?? 'N/A'}`,
    `Error: ${probe.error ?? 'N/A'}`,
    '',
    FOOTER,
  ].join('\n');

  return {
    event: 'target.down',
    subject: `ALERT: ${url} is DOWN`,
    body,
    url,
    key,
    timestamp,
    statusCode: probe.statusCode,
    error: probe.error,
    downtimeSeconds: null,
  };
}

export function buildRecoveryNotification(input: {
  url: string;
  key: string;
  probe: ProbeResult;
  timestamp: number;
  downSince: number | null;
}): Notification {
  const { url, key, probe, timestamp, downSince } = input;
  const downtimeSeconds = downSince !== null ? Math.max(0, timestamp - downSince) : null;

  const lines = [`The URL ${url} is now back UP.`];
  if (downtimeSeconds !== null) {
    lines.push(`Downtime: ${formatDuration(downtimeSeconds)}`);
  }
  lines.push('', FOOTER);

  return {
    event: 'target.up',
    subject: `RESOLVED: ${url} is back UP`,
    body: lines.join('\n'),
    url,
    key,
    timestamp,
    statusCode: probe.statusCode,
    error: null,
    downtimeSeconds,
  };
}

export function notificationTemplateVars(n: Notification): Record<string, unknown> {
  return {
    event: n.event,
    subject: n.subject,
    message: n.body,
    timestamp: n.timestamp,
    target: { url: n.url, key: n.key },
    state: {
      status: n.event === 'target.down' ? 'down' : 'up',
      status_code: n.statusCode,
      error: n.error,
    },
    downtime_seconds: n.downtimeSeconds,
  };
}
