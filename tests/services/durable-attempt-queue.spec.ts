import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openRelayDatabase, type RelayDatabase } from '../../src/services/db.js';
import { SqliteAttemptQueue, type SqliteAttemptQueueOptions } from '../../src/services/durable-attempt-queue.js';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import { createMessageIntent, serializeIntent } from '../../src/services/message-intent.js';
import type { ScheduledAttempt } from '../../src/types/messaging.js';
import { BASE_TIME_MS, createClock, type TestClock } from '../harness/relay-fixtures.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

// Never fires during a test run; polls are driven through processDue().
const DORMANT_CRON = '0 0 1 1 *';

const attemptFor = (messageId: string, previousDelayMs = 0): ScheduledAttempt => ({
    messageId,
    payload: serializeIntent(createMessageIntent({ channel: 'email', to: 'ops@example.com', subject: 'Digest' })),
    previousDelayMs,
});

describe('SqliteAttemptQueue', () => {
    let db: RelayDatabase;
    let clock: TestClock;
    let jobs: JobScheduler;
    let handled: ScheduledAttempt[];

    const handler = async (attempt: ScheduledAttempt) => {
        handled.push(attempt);
    };

    function createQueue(options: SqliteAttemptQueueOptions = {}): SqliteAttemptQueue {
        return new SqliteAttemptQueue(db, jobs, {
            pollCronExpression: DORMANT_CRON,
            lowLatencyTrigger: false,
            now: clock.nowMs,
            ...options,
        });
    }

    beforeEach(() => {
        db = openRelayDatabase();
        clock = createClock();
        jobs = new JobScheduler();
        handled = [];
    });

    afterEach(() => {
        jobs.stopAll();
        db.close();
    });

    it('registers its poll job on start and removes it on stop', () => {
        const queue = createQueue();

        queue.start(handler);
        expect(jobs.getJob('relay-attempt-queue')).toMatchObject({
            cronExpression: DORMANT_CRON,
            description: 'Run due outbound send attempts',
            status: 'idle',
        });

        queue.stop();
        expect(jobs.has('relay-attempt-queue')).toBe(false);
    });

    it('runs nothing until an attempt is due', async () => {
        const queue = createQueue();
        queue.start(handler);
        const attempt = attemptFor('msg-1', 1_000);
        await queue.schedule(attempt, 2_000);

        clock.advance(1_999);
        expect(await queue.processDue()).toBe(0);

        clock.advance(1);
        expect(await queue.processDue()).toBe(1);
        expect(handled).toEqual([attempt]);
        expect(queue.counts()).toEqual({ pending: 0, claimed: 0, failed: 0 });
    });

    it('runs due attempts oldest run_at first, in batches', async () => {
        const queue = createQueue({ batchSize: 2 });
        queue.start(handler);
        await queue.schedule(attemptFor('c'), 3_000);
        await queue.schedule(attemptFor('a'), 1_000);
        await queue.schedule(attemptFor('b'), 2_000);
        clock.advance(3_000);

        expect(await queue.processDue()).toBe(2);
        expect(await queue.processDue()).toBe(1);
        expect(handled.map((attempt) => attempt.messageId)).toEqual(['a', 'b', 'c']);
    });

    it('does nothing without a handler', async () => {
        const queue = createQueue();
        await queue.schedule(attemptFor('msg-1'), 0);

        expect(await queue.processDue()).toBe(0);
        expect(queue.counts()).toEqual({ pending: 1, claimed: 0, failed: 0 });
    });

    it('keeps an attempt whose handler throws as failed', async () => {
        const queue = createQueue();
        queue.start(async () => {
            throw new Error('coordinator crashed');
        });
        await queue.schedule(attemptFor('msg-1'), 0);

        expect(await queue.processDue()).toBe(1);
        expect(queue.counts()).toEqual({ pending: 0, claimed: 0, failed: 1 });
        expect(
            db.prepare<[], { last_error: string }>('SELECT last_error FROM scheduled_attempts').get(),
        ).toEqual({ last_error: 'coordinator crashed' });
        expect(await queue.processDue()).toBe(0);
    });

    it('picks up abandoned claims after the claim timeout', async () => {
        const queue = createQueue({ claimTimeoutMs: 60_000 });
        await queue.schedule(attemptFor('msg-1'), 0);
        db.prepare("UPDATE scheduled_attempts SET state = 'claimed', claimed_at = ?").run(BASE_TIME_MS);
        queue.start(handler);

        clock.advance(59_999);
        expect(await queue.processDue()).toBe(0);
        expect(queue.counts().claimed).toBe(1);

        clock.advance(1);
        expect(await queue.processDue()).toBe(1);
        expect(handled.map((attempt) => attempt.messageId)).toEqual(['msg-1']);
    });

    it('survives a restart on the same database', async () => {
        const before = createQueue();
        await before.schedule(attemptFor('msg-1'), 500);
        before.stop();

        const after = createQueue();
        after.start(handler);
        clock.advance(500);

        expect(await after.processDue()).toBe(1);
        expect(handled.map((attempt) => attempt.messageId)).toEqual(['msg-1']);
    });

    it('polls soon after an immediate schedule when the low-latency trigger is on', async () => {
        const queue = createQueue({ lowLatencyTrigger: true });
        queue.start(handler);

        await queue.schedule(attemptFor('msg-1'), 0);

        await vi.waitFor(() => {
            expect(handled.map((attempt) => attempt.messageId)).toEqual(['msg-1']);
        });
    });
});
