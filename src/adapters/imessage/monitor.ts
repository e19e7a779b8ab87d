import Database from 'better-sqlite3';
import { Logger } from 'pino';
import { createChildLogger } from '../../infra/logging/logger';
import { toError } from '../../shared/errors';
import { InboundMessage } from '../../shared/types';
import { decodeAttributedBody } from './attributed-body';

interface MessageRow {
  rowId: number;
  text: string | null;
  attributedBody: Buffer | null;
  isFromMe: number;
  handle: string | null;
  uncanonicalizedId: string | null;
  chatIdentifier: string | null;
}

const NEW_MESSAGES_SQL = `
  SELECT m.ROWID AS rowId,
         m.text AS text,
         m.attributedBody AS attributedBody,
         m.is_from_me AS isFromMe,
         h.id AS handle,
         h.uncanonicalized_id AS uncanonicalizedId,
         c.chat_identifier AS chatIdentifier
  FROM message m
  LEFT JOIN handle h ON h.ROWID = m.handle_id
  LEFT JOIN chat_message_join cmj ON cmj.message_id = m.ROWID
  LEFT JOIN chat c ON c.ROWID = cmj.chat_id
  WHERE m.ROWID > ?
  GROUP BY m.ROWID
  ORDER BY m.ROWID ASC
  LIMIT ?
`;

export type InboundHandler = (message: InboundMessage) => Promise<void>;

export interface InboundMonitorOptions {
  pollIntervalMs: number;
  batchSize?: number;
  logger?: Logger;
}

export function openMessagesDatabase(path: string): Database.Database {
  return new Database(path, { readonly: true, fileMustExist: true });
}

/**
 * Polls the Messages database for rows newer than the last one seen and
 * hands each to `onMessage`. Starts at the current tail, so history is never
 * replayed. A failing handler is logged and the cursor still advances.
 * Takes ownership of `db` and closes it on stop.
 */
export class InboundMonitor {
  private readonly log: Logger;
  private readonly batchSize: number;
  private readonly newMessages: Database.Statement<[number, number], MessageRow>;
  private cursor: number;
  private timer: NodeJS.Timeout | undefined;
  private polling: Promise<void> | undefined;
  private stopped = false;

  constructor(
    private readonly db: Database.Database,
    private readonly onMessage: InboundHandler,
    private readonly options: InboundMonitorOptions
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'inbound-monitor' });
    this.batchSize = options.batchSize ?? 100;
    this.newMessages = db.prepare<[number, number], MessageRow>(NEW_MESSAGES_SQL);

    const tail = db.prepare<[], { maxRowId: number | null }>('SELECT MAX(ROWID) AS maxRowId FROM message').get();
    this.cursor = tail?.maxRowId ?? 0;
  }

  get lastRowId(): number {
    return this.cursor;
  }

  start(): void {
    if (this.timer || this.stopped) return;

    this.log.info({ cursor: this.cursor, pollIntervalMs: this.options.pollIntervalMs }, 'Inbound monitor started');
    this.schedule();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    clearTimeout(this.timer);
    this.timer = undefined;
    if (this.polling) {
      await this.polling;
    }
    if (this.db.open) {
      this.db.close();
    }
  }

  /**
   * Process one batch of new rows. Returns how many rows were read.
   */
  async poll(): Promise<number> {
    const rows = this.newMessages.all(this.cursor, this.batchSize);

    for (const row of rows) {
      this.cursor = row.rowId;

      const message: InboundMessage = {
        rowId: row.rowId,
        text: row.text || decodeAttributedBody(row.attributedBody),
        isFromMe: row.isFromMe === 1,
        handle: row.handle,
        uncanonicalizedId: row.uncanonicalizedId,
        chatIdentifier: row.chatIdentifier,
      };

      try {
        await this.onMessage(message);
      } catch (error) {
        const err = toError(error);
        this.log.warn({ rowId: row.rowId, error: err.message }, 'Inbound message handler failed');
      }
    }

    return rows.length;
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.polling = this.poll()
        .then(() => undefined)
        .catch((error: unknown) => {
          this.log.error({ error: toError(error).message }, 'Inbound poll failed');
        })
        .finally(() => {
          this.polling = undefined;
          if (!this.stopped) this.schedule();
        });
    }, this.options.pollIntervalMs);
  }
}
