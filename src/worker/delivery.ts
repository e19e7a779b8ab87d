import { Logger } from 'pino';
import { OutboundQueue } from '../infra/queue/outbound';
import { createChildLogger } from '../infra/logging/logger';
import { toError } from '../shared/errors';
import { DeliveryStats, MessageSender, OutboundMessage } from '../shared/types';

/**
 * Sole consumer of the outbound queue. Sends one message at a time, in
 * enqueue order. Failures are logged and the message is dropped; there is
 * no retry and the loop keeps going.
 *
 * No timeout is applied here. The sender owns its own deadline, so a sender
 * without one can stall delivery indefinitely.
 */
export class DeliveryWorker {
  private loop: Promise<void> | undefined;
  private delivered = 0;
  private failed = 0;
  private readonly log: Logger;

  constructor(
    private readonly queue: OutboundQueue,
    private readonly sender: MessageSender,
    log?: Logger
  ) {
    this.log = log ?? createChildLogger({ component: 'delivery-worker' });
  }

  start(): void {
    if (this.loop) return;

    this.log.info('Delivery worker running');
    this.loop = this.run();
  }

  /**
   * Close the queue and wait for everything already queued to be attempted.
   */
  async stop(): Promise<void> {
    this.queue.close();
    if (this.loop) {
      await this.loop;
    }
  }

  stats(): DeliveryStats {
    return {
      running: this.loop !== undefined && !this.queue.closed,
      delivered: this.delivered,
      failed: this.failed,
      pending: this.queue.size,
    };
  }

  private async run(): Promise<void> {
    for (;;) {
      const message = await this.queue.take();
      if (!message) break;

      await this.deliver(message);
    }

    this.log.info({ delivered: this.delivered, failed: this.failed }, 'Delivery worker stopped');
  }

  private async deliver(message: OutboundMessage): Promise<void> {
    const startTime = Date.now();

    try {
      await this.sender.send(message.recipient, message.body);
      this.delivered++;

      this.log.info({
        to: message.recipient,
        durationMs: Date.now() - startTime,
        queuedMs: startTime - message.enqueuedAt,
      }, 'Message sent');
    } catch (error) {
      this.failed++;
      const err = toError(error);

      this.log.error({
        to: message.recipient,
        durationMs: Date.now() - startTime,
        error: err.message,
        errorName: err.name,
      }, 'Message delivery failed, dropping');
    }
  }
}
