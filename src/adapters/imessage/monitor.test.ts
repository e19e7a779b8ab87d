import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InboundMonitor } from './monitor';
import { InboundMessage } from '../../shared/types';
import { archivedText } from './attributed-body.fixtures';

function createMessagesDb(): Database.Database {
  const db = new Database(':memory:');
  db.exec(`
    CREATE TABLE handle (ROWID INTEGER PRIMARY KEY AUTOINCREMENT, id TEXT NOT NULL, uncanonicalized_id TEXT);
    CREATE TABLE chat (ROWID INTEGER PRIMARY KEY AUTOINCREMENT, chat_identifier TEXT);
    CREATE TABLE message (
      ROWID INTEGER PRIMARY KEY AUTOINCREMENT,
      text TEXT,
      attributedBody BLOB,
      is_from_me INTEGER DEFAULT 0,
      handle_id INTEGER DEFAULT 0
    );
    CREATE TABLE chat_message_join (chat_id INTEGER, message_id INTEGER);
  `);
  db.prepare('INSERT INTO handle (id, uncanonicalized_id) VALUES (?, ?)').run('+15551112222', '5551112222');
  db.prepare('INSERT INTO chat (chat_identifier) VALUES (?)').run('+15551112222');
  return db;
}

function insertMessage(
  db: Database.Database,
  text: string | null,
  isFromMe: boolean,
  handleId = 1,
  attributedBody: Buffer | null = null
): number {
  const result = db
    .prepare('INSERT INTO message (text, attributedBody, is_from_me, handle_id) VALUES (?, ?, ?, ?)')
    .run(text, attributedBody, isFromMe ? 1 : 0, handleId);
  const rowId = Number(result.lastInsertRowid);
  db.prepare('INSERT INTO chat_message_join (chat_id, message_id) VALUES (1, ?)').run(rowId);
  return rowId;
}

describe('InboundMonitor', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createMessagesDb();
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('starts from the current tail and does not replay history', async () => {
    insertMessage(db, 'old message', false);
    const seen: InboundMessage[] = [];
    const monitor = new InboundMonitor(db, async (m) => { seen.push(m); }, { pollIntervalMs: 1000 });

    expect(monitor.lastRowId).toBe(1);
    await expect(monitor.poll()).resolves.toBe(0);
    expect(seen).toEqual([]);
  });

  it('delivers new rows in order with joined handle and chat', async () => {
    const seen: InboundMessage[] = [];
    const monitor = new InboundMonitor(db, async (m) => { seen.push(m); }, { pollIntervalMs: 1000 });

    const first = insertMessage(db, 'Hi there', false);
    const second = insertMessage(db, 'Reply from me', true);

    await expect(monitor.poll()).resolves.toBe(2);

    expect(seen).toEqual([
      {
        rowId: first,
        text: 'Hi there',
        isFromMe: false,
        handle: '+15551112222',
        uncanonicalizedId: '5551112222',
        chatIdentifier: '+15551112222',
      },
      {
        rowId: second,
        text: 'Reply from me',
        isFromMe: true,
        handle: '+15551112222',
        uncanonicalizedId: '5551112222',
        chatIdentifier: '+15551112222',
      },
    ]);
    expect(monitor.lastRowId).toBe(second);
    await expect(monitor.poll()).resolves.toBe(0);
  });

  it('reports a missing handle as null', async () => {
    const seen: InboundMessage[] = [];
    const monitor = new InboundMonitor(db, async (m) => { seen.push(m); }, { pollIntervalMs: 1000 });

    insertMessage(db, null, false, 0);
    await monitor.poll();

    expect(seen[0]?.handle).toBeNull();
    expect(seen[0]?.uncanonicalizedId).toBeNull();
    expect(seen[0]?.text).toBeNull();
    expect(seen[0]?.chatIdentifier).toBe('+15551112222');
  });

  it('reads the text from attributedBody when the text column is empty', async () => {
    const seen: InboundMessage[] = [];
    const monitor = new InboundMonitor(db, async (m) => { seen.push(m); }, { pollIntervalMs: 1000 });

    insertMessage(db, null, false, 1, archivedText('Order for Sam at 6'));
    insertMessage(db, 'plain text', false, 1, archivedText('archived copy'));

    await monitor.poll();

    expect(seen.map((m) => m.text)).toEqual(['Order for Sam at 6', 'plain text']);
  });

  it('advances past rows whose handler fails', async () => {
    const seen: string[] = [];
    const monitor = new InboundMonitor(
      db,
      async (m) => {
        if (m.text === 'boom') throw new Error('webhook down');
        seen.push(m.text ?? '');
      },
      { pollIntervalMs: 1000 }
    );

    insertMessage(db, 'boom', false);
    const last = insertMessage(db, 'after', false);

    await expect(monitor.poll()).resolves.toBe(2);
    expect(seen).toEqual(['after']);
    expect(monitor.lastRowId).toBe(last);
  });

  it('reads at most one batch per poll', async () => {
    const seen: string[] = [];
    const monitor = new InboundMonitor(db, async (m) => { seen.push(m.text ?? ''); }, { pollIntervalMs: 1000, batchSize: 2 });

    insertMessage(db, 'a', false);
    insertMessage(db, 'b', false);
    insertMessage(db, 'c', false);

    await expect(monitor.poll()).resolves.toBe(2);
    await expect(monitor.poll()).resolves.toBe(1);
    expect(seen).toEqual(['a', 'b', 'c']);
  });

  it('closes the database on stop', async () => {
    const monitor = new InboundMonitor(db, async () => undefined, { pollIntervalMs: 1000 });

    monitor.start();
    await monitor.stop();

    expect(db.open).toBe(false);
  });
});
