import { describe, it, expect, vi, afterEach } from 'vitest';
import { WebhookClient, toForwardPayload } from './client';
import { WebhookError } from '../../shared/errors';
import { InboundMessage } from '../../shared/types';

describe('toForwardPayload', () => {
  const base: InboundMessage = {
    rowId: 1,
    text: 'Hi',
    isFromMe: false,
    handle: '+15551112222',
    uncanonicalizedId: null,
    chatIdentifier: 'chat-1',
  };

  it('maps sender, chat and text', () => {
    expect(toForwardPayload(base)).toEqual({ From: '+15551112222', To: 'chat-1', Body: 'Hi' });
  });

  it('skips messages sent from this account', () => {
    expect(toForwardPayload({ ...base, isFromMe: true })).toBeNull();
  });

  it('prefers the uncanonicalized id over the chat identifier when the handle is missing', () => {
    expect(toForwardPayload({ ...base, handle: null, uncanonicalizedId: '5551112222' })).toEqual({
      From: '5551112222',
      To: 'chat-1',
      Body: 'Hi',
    });
  });

  it('falls back to the chat identifier as sender', () => {
    expect(toForwardPayload({ ...base, handle: null })).toEqual({ From: 'chat-1', To: 'chat-1', Body: 'Hi' });
  });

  it('skips rows with no sender at all', () => {
    expect(toForwardPayload({ ...base, handle: null, chatIdentifier: null })).toBeNull();
  });

  it('defaults missing chat and text', () => {
    expect(toForwardPayload({ ...base, chatIdentifier: null, text: null })).toEqual({
      From: '+15551112222',
      To: 'unknown',
      Body: '',
    });
  });
});

describe('WebhookClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the payload as JSON', async () => {
    const fetchMock = vi.fn(async () => new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);
    const client = new WebhookClient({ url: 'http://webhook.test/sms/reply', timeoutMs: 1000 });

    await client.forward({ From: '+15551112222', To: 'chat-1', Body: 'Hi' });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith('http://webhook.test/sms/reply', expect.objectContaining({
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"From":"+15551112222","To":"chat-1","Body":"Hi"}',
    }));
  });

  it('raises WebhookError on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 500 })));
    const client = new WebhookClient({ url: 'http://webhook.test/sms/reply', timeoutMs: 1000 });

    await expect(client.forward({ From: 'a', To: 'b', Body: 'c' })).rejects.toThrow(
      'Webhook error: Failed to forward message: 500 nope'
    );
  });

  it('raises WebhookError on a network failure', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));
    const client = new WebhookClient({ url: 'http://webhook.test/sms/reply', timeoutMs: 1000 });

    const error = await client.forward({ From: 'a', To: 'b', Body: 'c' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WebhookError);
    if (error instanceof WebhookError) {
      expect(error.message).toBe('Webhook error: Network error: fetch failed');
    }
  });
});
