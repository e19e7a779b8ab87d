/**
 * Runs the configured call actions, in order, for each call that clears the
 * cooldown. Every action is best-effort: a failure or timeout is logged as an
 * AutomationFailure and the next action still runs.
 */

import { Logger } from 'pino';
import { logExecution, createChildLogger } from '../../infra/logging/logger';
import { OutboundQueue } from '../../infra/queue/outbound';
import { AutomationFailure, toError, withTimeout } from '../../shared/errors';
import { ActionOutcome, CallEvent } from '../../shared/types';

export interface CallAction {
  name: string;
  run(event: CallEvent, signal: AbortSignal): Promise<void>;
}

/**
 * The UI automation the decline and restart actions drive.
 */
export interface CallAutomation {
  declineCall(signal?: AbortSignal): Promise<void>;
  restartApp(signal?: AbortSignal): Promise<void>;
}

export interface OrchestratorOptions {
  timeoutMs: number;
  logger?: Logger;
}

export class ActionOrchestrator {
  private readonly log: Logger;

  constructor(
    private readonly actions: readonly CallAction[],
    private readonly options: OrchestratorOptions
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'action-orchestrator' });
  }

  get actionNames(): string[] {
    return this.actions.map((a) => a.name);
  }

  async run(event: CallEvent): Promise<ActionOutcome[]> {
    const outcomes: ActionOutcome[] = [];

    for (const action of this.actions) {
      const startTime = Date.now();

      try {
        await logExecution(
          event.callId,
          action.name,
          () => withTimeout(
            (signal) => action.run(event, signal),
            this.options.timeoutMs,
            () => new AutomationFailure(action.name, `timed out after ${this.options.timeoutMs}ms`, { timedOut: true })
          ),
          this.log
        );

        outcomes.push({ action: action.name, status: 'completed', durationMs: Date.now() - startTime });
      } catch (error) {
        const err = toError(error);
        const failure = err instanceof AutomationFailure
          ? err
          : new AutomationFailure(action.name, err.message, { cause: err });

        outcomes.push({
          action: action.name,
          status: 'failed',
          durationMs: Date.now() - startTime,
          error: failure.message,
        });
      }
    }

    const failed = outcomes.filter((o) => o.status === 'failed').length;
    this.log.info({
      callId: event.callId,
      rule: event.rule,
      actions: outcomes.length,
      failed,
    }, failed === 0 ? 'Call actions completed' : 'Call actions completed with failures');

    return outcomes;
  }
}

// ============================================================================
// Actions
// ============================================================================

export function declineCallAction(automation: CallAutomation): CallAction {
  return {
    name: 'decline-call',
    run: (_event, signal) => automation.declineCall(signal),
  };
}

export function restartAppAction(automation: CallAutomation): CallAction {
  return {
    name: 'restart-app',
    run: (_event, signal) => automation.restartApp(signal),
  };
}

export function autoReplyAction(queue: OutboundQueue, recipient: string, template: string): CallAction {
  return {
    name: 'auto-reply',
    run: async () => {
      queue.enqueue(recipient, template);
    },
  };
}

export interface CallActionSettings {
  declineCalls: boolean;
  restartApp: boolean;
  autoReply: boolean;
  autoReplyRecipient: string;
  autoReplyMessage: string;
}

/**
 * Build the action list in its fixed order, skipping disabled steps.
 */
export function buildCallActions(
  settings: CallActionSettings,
  automation: CallAutomation,
  queue: OutboundQueue
): CallAction[] {
  const actions: CallAction[] = [];

  if (settings.declineCalls) {
    actions.push(declineCallAction(automation));
  }
  if (settings.restartApp) {
    actions.push(restartAppAction(automation));
  }
  if (settings.autoReply) {
    actions.push(autoReplyAction(queue, settings.autoReplyRecipient, settings.autoReplyMessage));
  }

  return actions;
}
