import { Logger } from 'pino';
import { createChildLogger } from '../../infra/logging/logger';
import { WebhookError, toError } from '../../shared/errors';
import { ForwardPayload, InboundMessage } from '../../shared/types';

/**
 * Shape an inbound row for the webhook. Returns null for our own messages
 * and for rows with no identifiable sender.
 */
export function toForwardPayload(message: InboundMessage): ForwardPayload | null {
  if (message.isFromMe) {
    return null;
  }

  const sender = message.handle || message.uncanonicalizedId || message.chatIdentifier;
  if (!sender) {
    return null;
  }

  return {
    From: sender,
    To: message.chatIdentifier || 'unknown',
    Body: message.text || '',
  };
}

export interface WebhookClientOptions {
  url: string;
  timeoutMs: number;
  logger?: Logger;
}

export class WebhookClient {
  private readonly log: Logger;

  constructor(private readonly options: WebhookClientOptions) {
    this.log = options.logger ?? createChildLogger({ component: 'webhook' });
  }

  /**
   * POST the payload as JSON
   */
  async forward(payload: ForwardPayload): Promise<void> {
    let response: Response;

    try {
      response = await fetch(this.options.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const err = toError(error);
      throw new WebhookError(`Network error: ${err.message}`, err);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new WebhookError(`Failed to forward message: ${response.status} ${text}`);
    }

    this.log.info({ from: payload.From }, 'Forwarded inbound message');
  }
}
