import { afterEach, describe, expect, it, vi } from 'vitest';

import { buildDownNotification } from '../src/notify/template';
import { NotifierError } from '../src/notify/types';
import { WebhookNotifier, buildWebhookPayload } from '../src/notify/webhook';

const notification = buildDownNotification({
  url: 'bad.example.com',
  key: 'bad.example.com',
  probe: { reachable: false, statusCode: 500, error: 'HTTP Error 500: Internal Server Error' },
  timestamp: 1_700_000_000,
});

function notifier(overrides: Partial<ConstructorParameters<typeof WebhookNotifier>[0]> = {}) {
  return new WebhookNotifier({
    url: 'https://hooks.example.com/url-pinger',
    headers: {},
    payloadTemplate: null,
    timeoutMs: 1_000,
    ...overrides,
  });
}

describe('notify/webhook', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.clearAllMocks();
  });

  it('posts the default JSON payload with configured headers', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 204 }));
    globalThis.fetch = fetchMock as unknown as typeof fetch;

    await notifier({ headers: { Authorization: 'Bearer test-secret' } }).publish(notification);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('https://hooks.example.com/url-pinger');
    expect(init?.method).toBe('POST');

    const headers = new Headers(init?.headers);
    expect(headers.get('content-type')).toBe('application/json');
    expect(headers.get('authorization')).toBe('Bearer test-secret');

    expect(JSON.parse(String(init?.body))).toEqual({
      event: 'target.down',
      subject: 'ALERT: bad.example.com is DOWN',
      message: notification.body,
      url: 'bad.example.com',
      key: 'bad.example.com',
      status_code: 500,
      error: 'HTTP Error 500: Internal Server Error',
      downtime_seconds: null,
      timestamp: 1_700_000_000,
    });
  });

  it('renders the payload template when one is configured', () => {
    const payload = buildWebhookPayload(notification, {
      text: '{{subject}}',
      fields: { key: '{{target.key}}', code: '{{state.status_code}}' },
    });

    expect(payload).toEqual({
      text: 'ALERT: bad.example.com is DOWN',
      fields: { key: 'bad.example.com', code: '500' },
    });
  });

  it('rejects with NotifierError on non-2xx responses', async () => {
    globalThis.fetch = vi.fn(async () => new Response('bad gateway', { status: 502 })) as unknown as typeof fetch;

    const err = await notifier()
      .publish(notification)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotifierError);
    expect(err).toMatchObject({ message: 'HTTP 502: bad gateway', httpStatus: 502 });
  });

  it('rejects with NotifierError when the request cannot be sent', async () => {
    globalThis.fetch = vi.fn(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:443');
    }) as unknown as typeof fetch;

    await expect(notifier().publish(notification)).rejects.toMatchObject({
      name: 'NotifierError',
      message: 'webhook request failed: connect ECONNREFUSED 127.0.0.1:443',
      httpStatus: null,
    });
  });
});
