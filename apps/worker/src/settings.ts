// Environment-backed run settings.
//
// - All values arrive as optional strings; blank strings count as unset.
// - NOTIFY_URL is the only required value. Malformed enums, URLs and JSON fail
//   with a ConfigurationError; out-of-range numbers fall back to defaults.

import type { Env } from './env';
import { parseJsonDocument, parseWithSchema } from './config/json';
import { ConfigurationError } from './middleware/errors';
import { DEFAULT_PROBE_TIMEOUT_MS } from './monitor/http';
import {
  flagsNamespaceSchema,
  httpUrlSchema,
  notifyChannelSchema,
  notifyHeadersJsonSchema,
  notifyPayloadTemplateSchema,
  type NotifyChannel,
} from './schemas/settings';

export type RunSettings = {
  configSource: string;
  flags: {
    dbPath: string;
    namespace: string;
  };
  notify: {
    channel: NotifyChannel;
    url: string;
    headers: Record<string, string>;
    payloadTemplate: unknown;
    timezone: string;
  };
  probeTimeoutMs: number;
};

const DEFAULTS = {
  configSource: 'config/urls.json',
  flagsDbPath: 'data/flags.sqlite',
  flagsNamespace: 'default',
  notifyChannel: 'webhook',
  timezone: 'UTC',
  probeTimeoutMs: DEFAULT_PROBE_TIMEOUT_MS,
  port: 8787,
} as const;

function present(raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  const s = raw.trim();
  return s.length > 0 ? s : undefined;
}

function parseIntSetting(
  raw: string | undefined,
  opts: { min: number; max: number },
): number | null {
  if (raw === undefined) return null;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n)) return null;
  if (n < opts.min || n > opts.max) return null;
  return n;
}

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export function readSettings(env: Env): RunSettings {
  const notifyUrlRaw = present(env.NOTIFY_URL);
  if (!notifyUrlRaw) {
    throw new ConfigurationError('NOTIFY_URL environment variable is not set');
  }
  const url = parseWithSchema(httpUrlSchema, notifyUrlRaw, { field: 'NOTIFY_URL' });

  const channel = parseWithSchema(
    notifyChannelSchema,
    present(env.NOTIFY_CHANNEL) ?? DEFAULTS.notifyChannel,
    { field: 'NOTIFY_CHANNEL' },
  );

  const headersRaw = present(env.NOTIFY_HEADERS_JSON);
  const headers = headersRaw
    ? parseJsonDocument(notifyHeadersJsonSchema, headersRaw, { field: 'NOTIFY_HEADERS_JSON' })
    : {};

  const templateRaw = present(env.NOTIFY_PAYLOAD_TEMPLATE);
  const payloadTemplate: unknown = templateRaw
    ? parseJsonDocument(notifyPayloadTemplateSchema, templateRaw, {
        field: 'NOTIFY_PAYLOAD_TEMPLATE',
      })
    : null;

  const namespace = parseWithSchema(
    flagsNamespaceSchema,
    present(env.FLAGS_NAMESPACE) ?? DEFAULTS.flagsNamespace,
    { field: 'FLAGS_NAMESPACE' },
  );

  const timezone = present(env.SITE_TIMEZONE) ?? DEFAULTS.timezone;
  if (!isValidTimezone(timezone)) {
    throw new ConfigurationError(`Invalid value in SITE_TIMEZONE: unknown timezone ${timezone}`);
  }

  const probeTimeoutMs =
    parseIntSetting(present(env.PROBE_TIMEOUT_MS), { min: 100, max: 60_000 }) ??
    DEFAULTS.probeTimeoutMs;

  return {
    configSource: present(env.CONFIG_SOURCE) ?? DEFAULTS.configSource,
    flags: {
      dbPath: present(env.FLAGS_DB_PATH) ?? DEFAULTS.flagsDbPath,
      namespace,
    },
    notify: { channel, url, headers, payloadTemplate, timezone },
    probeTimeoutMs,
  };
}

export function readPort(env: Env): number {
  return parseIntSetting(present(env.PORT), { min: 1, max: 65_535 }) ?? DEFAULTS.port;
}
