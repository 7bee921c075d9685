import type { RelayDatabase } from './db.js';
import { isUniqueViolation } from './db.js';
import { parseSerializedIntent } from './message-intent.js';
import {
  isChannel,
  isMessageStatus,
  type CreateResult,
  type MessageStatus,
  type NewOutboundMessage,
  type OutboundMessageRepository,
  type OutboundMessageRow,
  type ResetForRetryData,
  type ResettableStatus,
  type StatusMeta,
} from '../types/messaging.js';

interface OutboundMessageRecord {
  id: string;
  channel: string;
  recipient: string;
  subject: string | null;
  template_key: string | null;
  payload: string;
  status: string;
  idempotency_key: string | null;
  attempts: number;
  provider_message_id: string | null;
  error_code: string | null;
  error_message: string | null;
  queued_at: string;
  sent_at: string | null;
  delivered_at: string | null;
  failed_at: string | null;
  dead_lettered_at: string | null;
  created_at: string;
  updated_at: string;
}

type SqlValue = string | number | null;

const STATUS_TIMESTAMP_COLUMNS: Partial<Record<MessageStatus, string>> = {
  sent: 'sent_at',
  delivered: 'delivered_at',
  failed: 'failed_at',
  dead_lettered: 'dead_lettered_at',
};

function toRow(record: OutboundMessageRecord): OutboundMessageRow {
  if (!isChannel(record.channel)) {
    throw new Error(`[OutboundMessageRepository] Row '${record.id}' has unknown channel '${record.channel}'.`);
  }
  if (!isMessageStatus(record.status)) {
    throw new Error(`[OutboundMessageRepository] Row '${record.id}' has unknown status '${record.status}'.`);
  }

  return {
    id: record.id,
    channel: record.channel,
    to: record.recipient,
    subject: record.subject,
    templateKey: record.template_key,
    payload: parseSerializedIntent(record.payload),
    status: record.status,
    idempotencyKey: record.idempotency_key,
    attempts: record.attempts,
    providerMessageId: record.provider_message_id,
    errorCode: record.error_code,
    errorMessage: record.error_message,
    queuedAt: record.queued_at,
    sentAt: record.sent_at,
    deliveredAt: record.delivered_at,
    failedAt: record.failed_at,
    deadLetteredAt: record.dead_lettered_at,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };
}

/**
 * Outbound message rows in SQLite. Idempotency keys are unique at the storage level;
 * `create` reports that one violation as a `conflict` result and rethrows everything else.
 */
export class SqliteOutboundMessageRepository implements OutboundMessageRepository {
  readonly #db: RelayDatabase;
  readonly #now: () => Date;

  constructor(db: RelayDatabase, now: () => Date = () => new Date()) {
    this.#db = db;
    this.#now = now;
  }

  async create(row: NewOutboundMessage): Promise<CreateResult> {
    const timestamp = this.#now().toISOString();
    const stmt = this.#db.prepare(`
      INSERT INTO outbound_messages (
        id, channel, recipient, subject, template_key, payload, status,
        idempotency_key, attempts, queued_at, created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, 'queued', ?, 0, ?, ?, ?)
    `);

    try {
      stmt.run(
        row.id,
        row.channel,
        row.to,
        row.subject,
        row.templateKey,
        JSON.stringify(row.payload),
        row.idempotencyKey,
        row.queuedAt,
        timestamp,
        timestamp,
      );
    } catch (err) {
      if (row.idempotencyKey !== null && isUniqueViolation(err, 'outbound_messages', 'idempotency_key')) {
        return { kind: 'conflict', idempotencyKey: row.idempotencyKey };
      }
      throw err;
    }

    return { kind: 'created', id: row.id };
  }

  async findById(id: string): Promise<OutboundMessageRow | null> {
    const record = this.#db
      .prepare<[string], OutboundMessageRecord>('SELECT * FROM outbound_messages WHERE id = ?')
      .get(id);
    return record ? toRow(record) : null;
  }

  async findByIdempotencyKey(key: string): Promise<OutboundMessageRow | null> {
    const record = this.#db
      .prepare<[string], OutboundMessageRecord>('SELECT * FROM outbound_messages WHERE idempotency_key = ?')
      .get(key);
    return record ? toRow(record) : null;
  }

  async updateStatus(id: string, status: MessageStatus, meta: StatusMeta = {}): Promise<void> {
    const params: Record<string, SqlValue> = { id, status, now: this.#now().toISOString() };
    const assignments = ['status = @status', 'updated_at = @now'];

    const timestampColumn = STATUS_TIMESTAMP_COLUMNS[status];
    if (timestampColumn) {
      assignments.push(`${timestampColumn} = @now`);
    }
    if (meta.providerMessageId !== undefined) {
      assignments.push('provider_message_id = @providerMessageId');
      params.providerMessageId = meta.providerMessageId;
    }
    if (meta.errorCode !== undefined) {
      assignments.push('error_code = @errorCode');
      params.errorCode = meta.errorCode;
    }
    if (meta.errorMessage !== undefined) {
      assignments.push('error_message = @errorMessage');
      params.errorMessage = meta.errorMessage;
    }

    this.#db
      .prepare<Record<string, SqlValue>>(`UPDATE outbound_messages SET ${assignments.join(', ')} WHERE id = @id`)
      .run(params);
  }

  async resetForRetry(id: string, expected: ResettableStatus, data: ResetForRetryData): Promise<boolean> {
    const timestamp = this.#now().toISOString();
    const result = this.#db.prepare(`
      UPDATE outbound_messages
      SET status = 'queued',
          attempts = 0,
          recipient = ?,
          subject = ?,
          template_key = ?,
          payload = ?,
          provider_message_id = NULL,
          error_code = NULL,
          error_message = NULL,
          sent_at = NULL,
          failed_at = NULL,
          dead_lettered_at = NULL,
          queued_at = ?,
          updated_at = ?
      WHERE id = ? AND status = ?
    `).run(data.to, data.subject, data.templateKey, JSON.stringify(data.payload), timestamp, timestamp, id, expected);

    return result.changes > 0;
  }

  async incrementAttempts(id: string): Promise<number> {
    const result = this.#db
      .prepare<[string, string], { attempts: number }>(`
        UPDATE outbound_messages
        SET attempts = attempts + 1, updated_at = ?
        WHERE id = ?
        RETURNING attempts
      `)
      .get(this.#now().toISOString(), id);

    if (!result) {
      throw new Error(`[OutboundMessageRepository] Message '${id}' not found.`);
    }
    return result.attempts;
  }

  async claimAttempt(id: string): Promise<number | null> {
    const result = this.#db
      .prepare<[string, string], { attempts: number }>(`
        UPDATE outbound_messages
        SET status = 'sending', attempts = attempts + 1, updated_at = ?
        WHERE id = ? AND status = 'queued'
        RETURNING attempts
      `)
      .get(this.#now().toISOString(), id);

    return result ? result.attempts : null;
  }

  async countByStatus(): Promise<Partial<Record<MessageStatus, number>>> {
    const rows = this.#db
      .prepare<[], { status: string; count: number }>(
        'SELECT status, COUNT(*) AS count FROM outbound_messages GROUP BY status',
      )
      .all();

    const counts: Partial<Record<MessageStatus, number>> = {};
    for (const row of rows) {
      if (isMessageStatus(row.status)) {
        counts[row.status] = row.count;
      }
    }
    return counts;
  }
}
