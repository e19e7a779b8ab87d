import os from 'os';
import path from 'path';
import { z } from 'zod';
import { MAX_MESSAGE_LENGTH, withinMessageLength } from './shared/validation';

const DEFAULT_AUTO_REPLY =
  'Sorry we missed your call. Please text your order here, including a name, ' +
  'and we will confirm a pick up time. Thank you.';

// Largest delay setTimeout honours; anything above fires after 1ms
export const MAX_TIMER_MS = 2_147_483_647;

const positiveMs = z.coerce.number().int().positive().max(MAX_TIMER_MS);
const nonNegativeMs = z.coerce.number().int().nonnegative().max(MAX_TIMER_MS);

const flag = z.enum(['true', 'false']).default('true').transform((v) => v === 'true');

const csv = z.string().transform((s) =>
  s.split(',').map((part) => part.trim()).filter((part) => part.length > 0)
);

export const configSchema = z.object({
  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  // Server
  host: z.string().default('127.0.0.1'),
  port: z.coerce.number().int().positive().default(8000),
  apiSecretKey: z.string().min(16),

  // Logging
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Call watcher
  triggerKeyword: z.string().min(1).default('incoming'),
  logStreamPredicate: z.string().min(1).default('eventMessage contains "FaceTime"'),
  cooldownMs: positiveMs.default(10000),
  cooldownPruneIntervalMs: nonNegativeMs.default(0),
  watcherRestartBaseMs: positiveMs.default(1000),
  watcherRestartMaxMs: positiveMs.default(60000),

  // Call actions
  automationTimeoutMs: positiveMs.default(15000),
  declineCalls: flag,
  restartApp: flag,
  autoReply: flag,
  declineButtonLabel: z.string().min(1).default('Decline'),
  restartAppName: z.string().min(1).default('FaceTime'),
  restartKillProcesses: csv.default('FaceTime,avconferenced,CallHistoryPluginHelper'),
  autoReplyRecipient: z.string().trim().min(1),
  autoReplyMessage: z.string()
    .trim()
    .min(1)
    .refine(withinMessageLength, `Must be at most ${MAX_MESSAGE_LENGTH} characters`)
    .default(DEFAULT_AUTO_REPLY),

  // Delivery
  sendTimeoutMs: nonNegativeMs.default(30000),

  // Inbound forwarding
  messagesDbPath: z.string().default(path.join(os.homedir(), 'Library', 'Messages', 'chat.db')),
  inboundPollMs: positiveMs.default(2000),
  forwardWebhookUrl: z.string().url().optional(),
  forwardTimeoutMs: positiveMs.default(10000),
});

function loadConfig() {
  const result = configSchema.safeParse({
    nodeEnv: process.env.NODE_ENV,
    host: process.env.HOST,
    port: process.env.PORT,
    apiSecretKey: process.env.API_SECRET_KEY,
    logLevel: process.env.LOG_LEVEL,
    triggerKeyword: process.env.TRIGGER_KEYWORD,
    logStreamPredicate: process.env.LOG_STREAM_PREDICATE,
    cooldownMs: process.env.COOLDOWN_MS,
    cooldownPruneIntervalMs: process.env.COOLDOWN_PRUNE_INTERVAL_MS,
    watcherRestartBaseMs: process.env.WATCHER_RESTART_BASE_MS,
    watcherRestartMaxMs: process.env.WATCHER_RESTART_MAX_MS,
    automationTimeoutMs: process.env.AUTOMATION_TIMEOUT_MS,
    declineCalls: process.env.DECLINE_CALLS,
    restartApp: process.env.RESTART_APP,
    autoReply: process.env.AUTO_REPLY,
    declineButtonLabel: process.env.DECLINE_BUTTON_LABEL,
    restartAppName: process.env.RESTART_APP_NAME,
    restartKillProcesses: process.env.RESTART_KILL_PROCESSES,
    autoReplyRecipient: process.env.AUTO_REPLY_RECIPIENT,
    autoReplyMessage: process.env.AUTO_REPLY_MESSAGE,
    sendTimeoutMs: process.env.SEND_TIMEOUT_MS,
    messagesDbPath: process.env.MESSAGES_DB_PATH,
    inboundPollMs: process.env.INBOUND_POLL_MS,
    forwardWebhookUrl: process.env.FORWARD_WEBHOOK_URL || undefined,
    forwardTimeoutMs: process.env.FORWARD_TIMEOUT_MS,
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type Config = z.infer<typeof configSchema>;
