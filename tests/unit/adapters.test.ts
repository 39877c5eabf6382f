/**
 * Unit tests for the Delivery Adapters Module
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  GmailDraftAdapter,
  NullEmailDraftAdapter,
  NullSocialMessageAdapter,
  QueuedSocialMessageAdapter,
  buildRawMessage,
  createDeliveryAdapters,
  toDeliveryOutcome,
  calculateDeliveryMetrics,
} from '../../src/adapters/index.js';
import { createMockLogger } from '../helpers/fakes.js';

const decode = (raw: string): string => Buffer.from(raw, 'base64url').toString('utf-8');

// =============================================================================
// GMAIL DRAFT ADAPTER
// =============================================================================

describe('buildRawMessage', () => {
  it('encodes an RFC 2822 message as base64url', () => {
    expect(decode(buildRawMessage('jane@acme.com', 'Quick idea for Acme', 'Hi Jane'))).toBe(
      'To: jane@acme.com\r\nSubject: Quick idea for Acme\r\nMIME-Version: 1.0\r\n' +
        'Content-Type: text/plain; charset="UTF-8"\r\n\r\nHi Jane'
    );
  });

  it('encodes non-ASCII subjects as encoded words', () => {
    const text = decode(buildRawMessage('jane@acme.com', 'Olá Acme', 'Hi'));

    expect(text).toContain(`Subject: =?UTF-8?B?${Buffer.from('Olá Acme', 'utf-8').toString('base64')}?=`);
  });
});

describe('GmailDraftAdapter', () => {
  it('requires an access token', () => {
    expect(() => new GmailDraftAdapter({ accessToken: '' })).toThrow('Gmail access token is required');
  });

  it('posts the raw message to the drafts endpoint', async () => {
    const fetchImpl = jest
      .fn<typeof fetch>()
      .mockResolvedValue(new Response(JSON.stringify({ id: 'r-123' }), { status: 200 }));
    const adapter = new GmailDraftAdapter(
      { accessToken: 'test-token', apiUrl: 'https://mail.test/v1', fetchImpl },
      createMockLogger()
    );

    const result = await adapter.createDraft('jane@acme.com', 'Quick idea', 'Hi Jane');

    expect(result.success).toBe(true);
    expect(result.id).toBe('r-123');
    expect(result.metadata?.['provider']).toBe('gmail');

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('https://mail.test/v1/users/me/drafts');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-token', 'Content-Type': 'application/json' });
    expect(JSON.parse(String(init?.body))).toEqual({
      message: { raw: buildRawMessage('jane@acme.com', 'Quick idea', 'Hi Jane') },
    });
  });

  it('reports an API error without throwing', async () => {
    const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(new Response('invalid_grant', { status: 401 }));
    const adapter = new GmailDraftAdapter({ accessToken: 'test-token', fetchImpl }, createMockLogger());

    const result = await adapter.createDraft('jane@acme.com', 'Subject', 'Body');

    expect(result.success).toBe(false);
    expect(result.error).toBe('Gmail API error: 401 - invalid_grant');
  });

  it('reports a network failure without throwing', async () => {
    const fetchImpl = jest.fn<typeof fetch>().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));
    const logger = createMockLogger();
    const adapter = new GmailDraftAdapter({ accessToken: 'test-token', fetchImpl }, logger);

    const result = await adapter.createDraft('jane@acme.com', 'Subject', 'Body');

    expect(result.error).toBe('getaddrinfo ENOTFOUND');
    expect(logger.error).toHaveBeenCalledWith('Failed to create Gmail draft', {
      to: 'jane@acme.com',
      error: 'getaddrinfo ENOTFOUND',
    });
  });
});

// =============================================================================
// NULL ADAPTERS AND QUEUE
// =============================================================================

describe('Null adapters', () => {
  it('report a skipped success', async () => {
    const email = await new NullEmailDraftAdapter(createMockLogger()).createDraft('a@b.co', 's', 'b');
    const social = await new NullSocialMessageAdapter(createMockLogger()).queueMessage('a@b.co', 'm');

    expect(toDeliveryOutcome(email)).toEqual({ status: 'skipped', reference: null, error: null });
    expect(toDeliveryOutcome(social)).toEqual({ status: 'skipped', reference: null, error: null });
  });
});

describe('QueuedSocialMessageAdapter', () => {
  it('queues messages with sequential ids and drains them', async () => {
    const queue = new QueuedSocialMessageAdapter(300, createMockLogger());

    const first = await queue.queueMessage('jane@acme.com', 'Hi Jane');
    const second = await queue.queueMessage('sam@globex.io', 'Hi Sam');

    expect([first.id, second.id]).toEqual(['social_1', 'social_2']);
    expect(queue.pending().map((m) => m.recipient)).toEqual(['jane@acme.com', 'sam@globex.io']);
    expect(queue.drain()).toHaveLength(2);
    expect(queue.pending()).toEqual([]);
  });

  it('rejects messages over the length limit', async () => {
    const queue = new QueuedSocialMessageAdapter(10, createMockLogger());

    const result = await queue.queueMessage('jane@acme.com', 'x'.repeat(11));

    expect(result).toEqual({ success: false, error: 'Message exceeds 10 characters (11)' });
    expect(queue.pending()).toEqual([]);
  });
});

// =============================================================================
// FACTORY AND HELPERS
// =============================================================================

describe('createDeliveryAdapters', () => {
  it('falls back to null adapters without configuration', () => {
    const adapters = createDeliveryAdapters({}, createMockLogger());

    expect(adapters.email).toBeInstanceOf(NullEmailDraftAdapter);
    expect(adapters.social).toBeInstanceOf(NullSocialMessageAdapter);
  });

  it('builds configured adapters', () => {
    const adapters = createDeliveryAdapters(
      { gmailAccessToken: 'test-token', queueSocialMessages: true },
      createMockLogger()
    );

    expect(adapters.email).toBeInstanceOf(GmailDraftAdapter);
    expect(adapters.social).toBeInstanceOf(QueuedSocialMessageAdapter);
  });
});

describe('toDeliveryOutcome', () => {
  it('maps success and failure', () => {
    expect(toDeliveryOutcome({ success: true, id: 'r-1' })).toEqual({ status: 'success', reference: 'r-1', error: null });
    expect(toDeliveryOutcome({ success: false })).toEqual({ status: 'failed', reference: null, error: 'Delivery failed' });
  });
});

describe('calculateDeliveryMetrics', () => {
  it('counts attempted deliveries by status', () => {
    expect(
      calculateDeliveryMetrics({
        EMAIL: { status: 'success', reference: 'r-1', error: null },
        SOCIAL_MESSAGE: { status: 'failed', reference: null, error: 'too long' },
        CALL_SCRIPT: null,
      })
    ).toEqual({ total: 2, success: 1, failed: 1, skipped: 0 });
  });
});
