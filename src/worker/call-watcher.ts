/**
 * Call watcher: the pipeline task that turns log lines into call actions.
 *
 *   line → keyword filter → identity → cooldown → orchestrator
 *
 * Lines are handled strictly one after another. When the log stream ends or
 * fails, the watcher re-acquires it with exponential backoff instead of
 * quietly stopping; the cooldown table outlives each stream.
 */

import { Logger } from 'pino';
import { createChildLogger } from '../infra/logging/logger';
import { CallIdentityExtractor, isQualifyingLine } from '../domain/call/identity';
import { CooldownTable } from '../domain/call/cooldown';
import { ActionOrchestrator } from '../domain/call/orchestrator';
import { StreamEndedError, toError } from '../shared/errors';
import { LineOutcome, LineSourceFactory, WatcherStats } from '../shared/types';

export interface CallWatcherOptions {
  source: LineSourceFactory;
  keyword: string;
  extractor: CallIdentityExtractor;
  cooldown: CooldownTable;
  orchestrator: ActionOrchestrator;
  restartBaseMs: number;
  restartMaxMs: number;
  clock?: () => number;
  logger?: Logger;
}

export class CallWatcher {
  private readonly controller = new AbortController();
  private readonly clock: () => number;
  private readonly log: Logger;
  private loop: Promise<void> | undefined;
  private running = false;
  private restarts = 0;
  private linesRead = 0;
  private triggered = 0;
  private suppressed = 0;

  constructor(private readonly options: CallWatcherOptions) {
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? createChildLogger({ component: 'call-watcher' });
  }

  /**
   * Handle a single line. Exposed for tests and replay; the running watcher
   * calls it for every line it reads.
   */
  async processLine(line: string, now: number = this.clock()): Promise<LineOutcome> {
    if (!isQualifyingLine(line, this.options.keyword)) {
      return 'ignored';
    }

    const { callId, rule } = this.options.extractor.extract(line);

    if (!this.options.cooldown.shouldTrigger(callId, now)) {
      this.suppressed++;
      this.log.debug({ callId, rule }, 'Call notification suppressed by cooldown');
      return 'suppressed';
    }

    this.triggered++;
    this.log.info({ callId, rule }, 'Incoming call detected, running call actions');

    await this.options.orchestrator.run({ line, callId, rule, observedAt: now });
    return 'triggered';
  }

  start(): void {
    if (this.loop) return;

    this.running = true;
    this.loop = this.supervise().finally(() => {
      this.running = false;
    });
    this.log.info({ keyword: this.options.keyword }, 'Call watcher started');
  }

  async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop) {
      await this.loop;
    }
  }

  stats(): WatcherStats {
    return {
      running: this.running,
      restarts: this.restarts,
      linesRead: this.linesRead,
      triggered: this.triggered,
      suppressed: this.suppressed,
      trackedCalls: this.options.cooldown.size,
    };
  }

  private async supervise(): Promise<void> {
    const signal = this.controller.signal;
    let delay = this.options.restartBaseMs;

    while (!signal.aborted) {
      const linesBefore = this.linesRead;

      try {
        await this.consume(signal);
        if (!signal.aborted) {
          throw new StreamEndedError(`Log stream ended after ${this.linesRead - linesBefore} lines`);
        }
      } catch (error) {
        const err = toError(error);
        if (signal.aborted) break;

        const level = err instanceof StreamEndedError ? 'warn' : 'error';
        this.log[level]({ error: err.message, errorName: err.name }, 'Log stream stopped');
      }

      if (signal.aborted) break;

      if (this.linesRead > linesBefore) {
        delay = this.options.restartBaseMs;
      }

      this.restarts++;
      this.log.info({ delayMs: delay, restarts: this.restarts }, 'Re-acquiring log stream');
      await sleep(delay, signal);
      delay = Math.min(delay * 2, this.options.restartMaxMs);
    }

    this.log.info('Call watcher stopped');
  }

  private async consume(signal: AbortSignal): Promise<void> {
    for await (const line of this.options.source(signal)) {
      this.linesRead++;
      await this.processLine(line);
    }
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
