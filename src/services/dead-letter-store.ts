import type { RelayDatabase } from './db.js';
import { parseSerializedIntent } from './message-intent.js';
import { isChannel, type Channel, type DeadLetterEntry, type DeadLetterStore } from '../types/messaging.js';

interface DeadLetterRecord {
  id: string;
  message_id: string;
  channel: string;
  payload: string;
  attempts: number;
  error_code: string;
  error_message: string;
  exception_trace: string | null;
  created_at: string;
}

function toEntry(record: DeadLetterRecord): DeadLetterEntry {
  if (!isChannel(record.channel)) {
    throw new Error(`[DeadLetterStore] Entry '${record.id}' has unknown channel '${record.channel}'.`);
  }
  return {
    id: record.id,
    messageId: record.message_id,
    channel: record.channel,
    payload: parseSerializedIntent(record.payload),
    attempts: record.attempts,
    errorCode: record.error_code,
    errorMessage: record.error_message,
    exceptionTrace: record.exception_trace,
    createdAt: record.created_at,
  };
}

export class SqliteDeadLetterStore implements DeadLetterStore {
  readonly #db: RelayDatabase;

  constructor(db: RelayDatabase) {
    this.#db = db;
  }

  async insert(entry: DeadLetterEntry): Promise<void> {
    this.#db.prepare(`
      INSERT INTO dead_letters (
        id, message_id, channel, payload, attempts, error_code, error_message, exception_trace, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.id,
      entry.messageId,
      entry.channel,
      JSON.stringify(entry.payload),
      entry.attempts,
      entry.errorCode,
      entry.errorMessage,
      entry.exceptionTrace,
      entry.createdAt,
    );
  }

  async findById(id: string): Promise<DeadLetterEntry | null> {
    const record = this.#db
      .prepare<[string], DeadLetterRecord>('SELECT * FROM dead_letters WHERE id = ?')
      .get(id);
    return record ? toEntry(record) : null;
  }

  /** Newest first. */
  async list(limit: number, channel?: Channel): Promise<DeadLetterEntry[]> {
    const records = channel
      ? this.#db
        .prepare<[string, number], DeadLetterRecord>(
          'SELECT * FROM dead_letters WHERE channel = ? ORDER BY created_at DESC, rowid DESC LIMIT ?',
        )
        .all(channel, limit)
      : this.#db
        .prepare<[number], DeadLetterRecord>('SELECT * FROM dead_letters ORDER BY created_at DESC, rowid DESC LIMIT ?')
        .all(limit);
    return records.map(toEntry);
  }

  async delete(id: string): Promise<boolean> {
    return this.#db.prepare('DELETE FROM dead_letters WHERE id = ?').run(id).changes > 0;
  }

  async purge(): Promise<number> {
    return this.#db.prepare('DELETE FROM dead_letters').run().changes;
  }

  async countByChannel(): Promise<Partial<Record<Channel, number>>> {
    const rows = this.#db
      .prepare<[], { channel: string; count: number }>(
        'SELECT channel, COUNT(*) AS count FROM dead_letters GROUP BY channel',
      )
      .all();

    const counts: Partial<Record<Channel, number>> = {};
    for (const row of rows) {
      if (isChannel(row.channel)) {
        counts[row.channel] = row.count;
      }
    }
    return counts;
  }
}
