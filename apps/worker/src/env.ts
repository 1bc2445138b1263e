// Values come straight from process.env or a Hono binding.
export type Env = {
  [key: string]: string | undefined;

  CONFIG_SOURCE?: string;
  FLAGS_DB_PATH?: string;
  FLAGS_NAMESPACE?: string;

  NOTIFY_CHANNEL?: string;
  NOTIFY_URL?: string;
  NOTIFY_HEADERS_JSON?: string;
  NOTIFY_PAYLOAD_TEMPLATE?: string;

  PROBE_TIMEOUT_MS?: string;
  SITE_TIMEZONE?: string;

  RUN_TOKEN?: string;
  PORT?: string;
};
