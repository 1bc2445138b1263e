import { fetchWithTimeout } from '../monitor/http';
import { toErrorMessage } from '../middleware/errors';
import { notificationTemplateVars, renderJsonTemplate } from './template';
import { NotifierError, type Notification, type Notifier } from './types';

export type WebhookNotifierConfig = {
  url: string;
  headers: Record<string, string>;
  payloadTemplate: unknown;
  timeoutMs: number;
};

const MAX_ERROR_BODY_CHARS = 500;

export function buildWebhookPayload(
  notification: Notification,
  payloadTemplate: unknown,
): unknown {
  const vars = notificationTemplateVars(notification);
  if (payloadTemplate !== null && payloadTemplate !== undefined) {
    return renderJsonTemplate(payloadTemplate, vars);
  }

  return {
    event: notification.event,
    subject: notification.subject,
    message: notification.body,
    url: notification.url,
    key: notification.key,
    status_code: notification.statusCode,
    error: notification.error,
    downtime_seconds: notification.downtimeSeconds,
    timestamp: notification.timestamp,
  };
}

export class WebhookNotifier implements Notifier {
  constructor(private readonly config: WebhookNotifierConfig) {}

  async publish(notification: Notification): Promise<void> {
    const headers = new Headers(this.config.headers);
    headers.set('Content-Type', 'application/json');

    let res: Response;
    try {
      res = await fetchWithTimeout(this.config.url, this.config.timeoutMs, {
        method: 'POST',
        headers,
        body: JSON.stringify(buildWebhookPayload(notification, this.config.payloadTemplate)),
      });
    } catch (err) {
      throw new NotifierError(`webhook request failed: ${toErrorMessage(err)}`);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new NotifierError(
        `HTTP ${res.status}: ${text.slice(0, MAX_ERROR_BODY_CHARS)}`.trimEnd(),
        res.status,
      );
    }
  }
}
