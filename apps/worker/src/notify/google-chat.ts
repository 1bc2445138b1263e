/**
 * Google Chat notifier.
 *
 * Posts Card v2 messages to an incoming-webhook URL: one card when a target
 * goes down, one when it recovers (with the downtime when the flag carried it).
 */

import { fetchWithTimeout } from '../monitor/http';
import { toErrorMessage } from '../middleware/errors';
import { formatDuration } from './template';
import { NotifierError, type Notification, type Notifier } from './types';

const SIGNATURE = '— URL Ping Service';

type DecoratedTextWidget = {
  decoratedText: {
    topLabel: string;
    text: string;
    startIcon: { knownIcon: string };
  };
};

type TextParagraphWidget = {
  textParagraph: { text: string };
};

type CardWidget = DecoratedTextWidget | TextParagraphWidget;

export type GoogleChatMessage = {
  text: string;
  cardsV2: Array<{
    cardId: string;
    card: {
      header: { title: string; subtitle: string };
      sections: Array<{ widgets: CardWidget[] }>;
    };
  }>;
};

/**
 * Format Unix timestamp (seconds) for display, e.g. "Feb 23, 2026, 11:59 PM UTC".
 */
export function formatTimestamp(timestamp: number, timezone = 'UTC'): string {
  return new Date(timestamp * 1000).toLocaleString('en-US', {
    timeZone: timezone,
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
    timeZoneName: 'short',
  });
}

function field(topLabel: string, text: string, knownIcon: string): DecoratedTextWidget {
  return { decoratedText: { topLabel, text, startIcon: { knownIcon } } };
}

export function buildGoogleChatMessage(n: Notification, timezone = 'UTC'): GoogleChatMessage {
  const down = n.event === 'target.down';
  const time = formatTimestamp(n.timestamp, timezone);

  const widgets: CardWidget[] = [
    field('Website', `<b>${n.url}</b>`, 'DESCRIPTION'),
    field('Status', `<b>${down ? 'Down' : 'Up'}</b>`, 'BOOKMARK'),
    field(down ? 'Time Detected' : 'Recovered At', time, 'CLOCK'),
  ];

  if (down) {
    widgets.push(field('Status Code', n.statusCode !== null ? String(n.statusCode) : 'N/A', 'STAR'));
    if (n.error) widgets.push(field('Error', n.error, 'STAR'));
  } else if (n.downtimeSeconds !== null) {
    widgets.push(field('Downtime Duration', `<b>${formatDuration(n.downtimeSeconds)}</b>`, 'STAR'));
  }

  widgets.push({ textParagraph: { text: `<font color="#888888"><i>${SIGNATURE}</i></font>` } });

  return {
    // Shown in notifications and clients that cannot render cards.
    text: n.subject,
    cardsV2: [
      {
        cardId: `url-pinger-${down ? 'down' : 'up'}-${n.key}-${n.timestamp}`,
        card: {
          header: {
            title: down ? '🔴 Website Down Alert' : '✅ Website Recovered',
            subtitle: n.url,
          },
          sections: [{ widgets }],
        },
      },
    ],
  };
}

export type GoogleChatNotifierConfig = {
  webhookUrl: string;
  timezone: string;
  timeoutMs: number;
};

export class GoogleChatNotifier implements Notifier {
  constructor(private readonly config: GoogleChatNotifierConfig) {}

  async publish(notification: Notification): Promise<void> {
    const message = buildGoogleChatMessage(notification, this.config.timezone);

    let res: Response;
    try {
      res = await fetchWithTimeout(this.config.webhookUrl, this.config.timeoutMs, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json; charset=UTF-8' },
        body: JSON.stringify(message),
      });
    } catch (err) {
      throw new NotifierError(`google chat request failed: ${toErrorMessage(err)}`);
    }

    if (!res.ok) {
      const errorText = await res.text().catch(() => '');
      throw new NotifierError(`HTTP ${res.status}: ${errorText}`.trimEnd(), res.status);
    }
  }
}
