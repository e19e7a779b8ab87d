import { config } from './config';
import { buildServer } from './api/server';
import { logger } from './infra/logging/logger';
import { OutboundQueue } from './infra/queue/outbound';
import { streamLogLines } from './infra/log-stream/reader';
import { CallIdentityExtractor } from './domain/call/identity';
import { CooldownTable } from './domain/call/cooldown';
import { ActionOrchestrator, buildCallActions } from './domain/call/orchestrator';
import { MacAutomation } from './adapters/macos/automation';
import { IMessageSender } from './adapters/imessage/sender';
import { InboundMonitor, openMessagesDatabase } from './adapters/imessage/monitor';
import { WebhookClient, toForwardPayload } from './adapters/webhook/client';
import { DeliveryWorker } from './worker/delivery';
import { CallWatcher } from './worker/call-watcher';

// ============================================================================
// Outbound delivery
// ============================================================================

const queue = new OutboundQueue();
const sender = new IMessageSender({ timeoutMs: config.sendTimeoutMs });
const deliveryWorker = new DeliveryWorker(queue, sender);

// ============================================================================
// Call watcher
// ============================================================================

const automation = new MacAutomation({
  declineButtonLabel: config.declineButtonLabel,
  appName: config.restartAppName,
  killProcesses: config.restartKillProcesses,
});

const orchestrator = new ActionOrchestrator(
  buildCallActions(config, automation, queue),
  { timeoutMs: config.automationTimeoutMs }
);

const callWatcher = new CallWatcher({
  source: (signal) => streamLogLines({ predicate: config.logStreamPredicate }, signal),
  keyword: config.triggerKeyword,
  extractor: new CallIdentityExtractor(),
  cooldown: new CooldownTable({
    windowMs: config.cooldownMs,
    pruneIntervalMs: config.cooldownPruneIntervalMs,
  }),
  orchestrator,
  restartBaseMs: config.watcherRestartBaseMs,
  restartMaxMs: config.watcherRestartMaxMs,
});

// ============================================================================
// Inbound forwarding (optional)
// ============================================================================

function createInboundMonitor(): InboundMonitor | undefined {
  const webhookUrl = config.forwardWebhookUrl;
  if (!webhookUrl) {
    logger.info('FORWARD_WEBHOOK_URL not set - inbound forwarding disabled');
    return undefined;
  }

  const webhook = new WebhookClient({ url: webhookUrl, timeoutMs: config.forwardTimeoutMs });

  try {
    const db = openMessagesDatabase(config.messagesDbPath);
    return new InboundMonitor(
      db,
      async (message) => {
        const payload = toForwardPayload(message);
        if (payload) {
          await webhook.forward(payload);
        }
      },
      { pollIntervalMs: config.inboundPollMs }
    );
  } catch (err) {
    logger.warn({ err, path: config.messagesDbPath }, 'Messages database unavailable - inbound forwarding disabled');
    return undefined;
  }
}

const inboundMonitor = createInboundMonitor();

// ============================================================================
// Startup / Shutdown
// ============================================================================

let isShuttingDown = false;

async function bootstrap() {
  logger.info('Starting call relay...');

  const app = await buildServer({
    queue,
    delivery: () => deliveryWorker.stats(),
    watcher: () => callWatcher.stats(),
  });

  deliveryWorker.start();
  callWatcher.start();
  inboundMonitor?.start();

  logger.info({
    actions: orchestrator.actionNames,
    cooldownMs: config.cooldownMs,
    inboundForwarding: inboundMonitor !== undefined,
  }, 'Background tasks running');

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing...');

    const timeout = setTimeout(() => {
      logger.warn('Shutdown timeout, forcing exit');
      process.exit(1);
    }, 30000);

    try {
      await app.close();
      await callWatcher.stop();
      await inboundMonitor?.stop();
      await deliveryWorker.stop();
      clearTimeout(timeout);

      logger.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info({ host: config.host, port: config.port, env: config.nodeEnv }, 'Server started');
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'Bootstrap failed');
  process.exit(1);
});
