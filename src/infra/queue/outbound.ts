import { outboundMessageSchema, toFieldErrors } from '../../shared/validation';
import { InvalidMessageError, QueueClosedError } from '../../shared/errors';
import { OutboundMessage } from '../../shared/types';

type Waiter = (message: OutboundMessage | null) => void;

/**
 * Unbounded FIFO of outbound texts with many producers and a single consumer.
 *
 * `enqueue` is synchronous, so producers on the event loop cannot interleave
 * inside it. At most one `take` may be pending at a time.
 */
export class OutboundQueue {
  private items: OutboundMessage[] = [];
  private head = 0;
  private waiter: Waiter | undefined;
  private isClosed = false;

  constructor(private readonly clock: () => number = Date.now) {}

  enqueue(recipient: string, body: string): OutboundMessage {
    if (this.isClosed) {
      throw new QueueClosedError();
    }

    const parsed = outboundMessageSchema.safeParse({ recipient, body });
    if (!parsed.success) {
      throw new InvalidMessageError(toFieldErrors(parsed.error));
    }

    const message: OutboundMessage = Object.freeze({
      recipient: parsed.data.recipient,
      body: parsed.data.body,
      enqueuedAt: this.clock(),
    });

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(message);
    } else {
      this.items.push(message);
    }

    return message;
  }

  /**
   * Resolve with the head of the queue, waiting for one if it is empty.
   * Resolves `null` once the queue is closed and drained.
   */
  take(): Promise<OutboundMessage | null> {
    if (this.waiter) {
      throw new Error('OutboundQueue supports a single consumer');
    }

    const next = this.shift();
    if (next) {
      return Promise.resolve(next);
    }

    if (this.isClosed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Stop accepting messages. Items already queued are still handed out.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(null);
    }
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  private shift(): OutboundMessage | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const message = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return message;
  }
}
