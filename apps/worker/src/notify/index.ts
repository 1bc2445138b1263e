import type { RunSettings } from '../settings';
import { GoogleChatNotifier } from './google-chat';
import type { Notifier } from './types';
import { WebhookNotifier } from './webhook';

export const NOTIFY_TIMEOUT_MS = 10_000;

export function createNotifier(settings: RunSettings['notify']): Notifier {
  switch (settings.channel) {
    case 'google-chat':
      return new GoogleChatNotifier({
        webhookUrl: settings.url,
        timezone: settings.timezone,
        timeoutMs: NOTIFY_TIMEOUT_MS,
      });
    case 'webhook':
      return new WebhookNotifier({
        url: settings.url,
        headers: settings.headers,
        payloadTemplate: settings.payloadTemplate,
        timeoutMs: NOTIFY_TIMEOUT_MS,
      });
  }
}
