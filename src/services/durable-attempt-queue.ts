import { randomUUID } from 'node:crypto';
import type { RelayDatabase } from './db.js';
import type { JobScheduler } from './job-scheduler.js';
import { parseSerializedIntent } from './message-intent.js';
import type { AttemptHandler, AttemptScheduler, ScheduledAttempt } from '../types/messaging.js';
import { errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

export interface SqliteAttemptQueueOptions {
    /** @default '* * * * * *' (every second) */
    pollCronExpression?: string;
    /** @default 10 */
    batchSize?: number;
    /** Claimed rows older than this are considered abandoned and picked up again. @default 300000 */
    claimTimeoutMs?: number;
    /** Poll shortly after an immediate schedule instead of waiting for the next tick. @default true */
    lowLatencyTrigger?: boolean;
    now?: () => number;
}

interface ScheduledAttemptRecord {
    id: string;
    message_id: string;
    payload: string;
    previous_delay_ms: number;
}

export interface AttemptQueueCounts {
    pending: number;
    claimed: number;
    failed: number;
}

const JOB_ID = 'relay-attempt-queue';

const DEFAULTS = {
    pollCronExpression: '* * * * * *',
    batchSize: 10,
    claimTimeoutMs: 300_000,
    lowLatencyTrigger: true,
};

/**
 * {@link AttemptScheduler} backed by the `scheduled_attempts` table.
 *
 * Attempts survive restarts. A `JobScheduler` job polls for due rows, claims a batch inside
 * one transaction, and runs them concurrently. Completed rows are deleted; rows whose handler
 * throws are kept as `failed` with the error for inspection.
 */
export class SqliteAttemptQueue implements AttemptScheduler {
    readonly #db: RelayDatabase;
    readonly #scheduler: JobScheduler;
    readonly #pollCronExpression: string;
    readonly #batchSize: number;
    readonly #claimTimeoutMs: number;
    readonly #lowLatencyTrigger: boolean;
    readonly #now: () => number;
    #handler: AttemptHandler | null = null;

    constructor(db: RelayDatabase, scheduler: JobScheduler, options: SqliteAttemptQueueOptions = {}) {
        this.#db = db;
        this.#scheduler = scheduler;
        this.#pollCronExpression = options.pollCronExpression ?? DEFAULTS.pollCronExpression;
        this.#batchSize = options.batchSize ?? DEFAULTS.batchSize;
        this.#claimTimeoutMs = options.claimTimeoutMs ?? DEFAULTS.claimTimeoutMs;
        this.#lowLatencyTrigger = options.lowLatencyTrigger ?? DEFAULTS.lowLatencyTrigger;
        this.#now = options.now ?? (() => Date.now());
    }

    async schedule(attempt: ScheduledAttempt, delayMs: number): Promise<void> {
        const nowMs = this.#now();
        this.#db.prepare(`
            INSERT INTO scheduled_attempts (id, message_id, payload, previous_delay_ms, run_at, state, created_at)
            VALUES (?, ?, ?, ?, ?, 'pending', ?)
        `).run(
            randomUUID(),
            attempt.messageId,
            JSON.stringify(attempt.payload),
            attempt.previousDelayMs,
            nowMs + Math.max(0, delayMs),
            new Date(nowMs).toISOString(),
        );

        if (delayMs <= 0 && this.#lowLatencyTrigger && this.#handler && this.#scheduler.has(JOB_ID)) {
            // Soft trigger for low latency
            setTimeout(() => {
                this.#scheduler.runNow(JOB_ID).catch((err: unknown) => {
                    console.error('[SqliteAttemptQueue] Soft trigger failed:', err);
                });
            }, 50).unref();
        }
    }

    start(handler: AttemptHandler): void {
        this.#handler = handler;
        if (this.#scheduler.has(JOB_ID)) return;

        this.#scheduler.register({
            id: JOB_ID,
            cronExpression: this.#pollCronExpression,
            description: 'Run due outbound send attempts',
            handler: async () => {
                await this.processDue();
            },
            autoStart: true,
        });
    }

    stop(): void {
        this.#scheduler.unregister(JOB_ID);
        this.#handler = null;
    }

    /** Claim and run one batch of due attempts. Returns how many were run. */
    async processDue(): Promise<number> {
        const handler = this.#handler;
        if (!handler) return 0;

        const batch = this.#claimDue();
        if (batch.length === 0) return 0;

        await Promise.allSettled(batch.map((record) => this.#run(record, handler)));
        return batch.length;
    }

    counts(): AttemptQueueCounts {
        const rows = this.#db
            .prepare<[], { state: string; count: number }>(
                'SELECT state, COUNT(*) AS count FROM scheduled_attempts GROUP BY state',
            )
            .all();

        const counts: AttemptQueueCounts = { pending: 0, claimed: 0, failed: 0 };
        for (const row of rows) {
            if (row.state === 'pending' || row.state === 'claimed' || row.state === 'failed') {
                counts[row.state] = row.count;
            }
        }
        return counts;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #claimDue(): ScheduledAttemptRecord[] {
        const nowMs = this.#now();
        const staleBefore = nowMs - this.#claimTimeoutMs;

        const tx = this.#db.transaction((limit: number) => {
            const rows = this.#db
                .prepare<[number, number, number], ScheduledAttemptRecord>(`
                    SELECT id, message_id, payload, previous_delay_ms FROM scheduled_attempts
                    WHERE (state = 'pending' AND run_at <= ?)
                       OR (state = 'claimed' AND claimed_at <= ?)
                    ORDER BY run_at ASC, created_at ASC
                    LIMIT ?
                `)
                .all(nowMs, staleBefore, limit);

            const claim = this.#db.prepare(`
                UPDATE scheduled_attempts SET state = 'claimed', claimed_at = ? WHERE id = ?
            `);
            for (const row of rows) {
                claim.run(nowMs, row.id);
            }
            return rows;
        });

        return tx(this.#batchSize);
    }

    async #run(record: ScheduledAttemptRecord, handler: AttemptHandler): Promise<void> {
        try {
            await handler({
                messageId: record.message_id,
                payload: parseSerializedIntent(record.payload),
                previousDelayMs: record.previous_delay_ms,
            });
            this.#db.prepare('DELETE FROM scheduled_attempts WHERE id = ?').run(record.id);
        } catch (err) {
            const message = errorMessage(err);
            this.#db
                .prepare("UPDATE scheduled_attempts SET state = 'failed', last_error = ? WHERE id = ?")
                .run(message, record.id);
            await logThought(
                `[SqliteAttemptQueue] Attempt '${record.id}' for message '${record.message_id}' failed: ${message}`,
            );
        }
    }
}
