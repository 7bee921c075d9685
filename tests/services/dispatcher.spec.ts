import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openRelayDatabase, type RelayDatabase } from '../../src/services/db.js';
import { Dispatcher } from '../../src/services/dispatcher.js';
import { createMessageIntent } from '../../src/services/message-intent.js';
import { MetricsRegistry } from '../../src/services/metrics.js';
import { SqliteOutboundMessageRepository } from '../../src/services/outbound-message-repository.js';
import type { DispatchEvent } from '../../src/types/events.js';
import type { CreateResult, NewOutboundMessage, OutboundMessageRow } from '../../src/types/messaging.js';
import { IdempotencyConflictError, PayloadTooLargeError } from '../../src/utils/errors.js';
import { createClock, ManualAttemptScheduler, type TestClock } from '../harness/relay-fixtures.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Holds every insert back so concurrent dispatchers all miss the pre-create lookup. */
class SlowCreateRepository extends SqliteOutboundMessageRepository {
    override async create(row: NewOutboundMessage): Promise<CreateResult> {
        await sleep(5);
        return super.create(row);
    }
}

class BrokenStorageRepository extends SqliteOutboundMessageRepository {
    override async create(): Promise<CreateResult> {
        throw new Error('SQLITE_IOERR: disk I/O error');
    }
}

/** A store whose uniqueness constraint and reads disagree. */
class PhantomConflictRepository extends SqliteOutboundMessageRepository {
    override async create(row: NewOutboundMessage): Promise<CreateResult> {
        return { kind: 'conflict', idempotencyKey: row.idempotencyKey ?? '' };
    }

    override async findByIdempotencyKey(): Promise<OutboundMessageRow | null> {
        return null;
    }
}

/** Reads the keyed row, then waits for `release()` before handing it back. */
class HeldLookupRepository extends SqliteOutboundMessageRepository {
    readonly looked: Promise<void>;
    #markLooked: () => void = () => undefined;
    #release: () => void = () => undefined;
    readonly #gate: Promise<void>;

    constructor(db: RelayDatabase, now: () => Date) {
        super(db, now);
        this.looked = new Promise<void>((resolve) => {
            this.#markLooked = resolve;
        });
        this.#gate = new Promise<void>((resolve) => {
            this.#release = resolve;
        });
    }

    override async findByIdempotencyKey(key: string): Promise<OutboundMessageRow | null> {
        const row = await super.findByIdempotencyKey(key);
        this.#markLooked();
        await this.#gate;
        return row;
    }

    release(): void {
        this.#release();
    }
}

describe('Dispatcher', () => {
    let db: RelayDatabase;
    let clock: TestClock;
    let repository: SqliteOutboundMessageRepository;
    let scheduler: ManualAttemptScheduler;
    let metrics: MetricsRegistry;
    let events: DispatchEvent[];
    let nextId: number;

    function createDispatcher(overrides: { repository?: SqliteOutboundMessageRepository; maxPayloadBytes?: number } = {}) {
        return new Dispatcher({
            repository: overrides.repository ?? repository,
            scheduler,
            metrics,
            events: { emit: (event) => events.push(event) },
            maxPayloadBytes: overrides.maxPayloadBytes,
            now: clock.now,
            generateId: () => `msg-${++nextId}`,
        });
    }

    const smsIntent = (idempotencyKey: string | null = 'order:1:sms', text = 'Your order shipped') =>
        createMessageIntent({ channel: 'sms', to: '+15551234567', text, idempotencyKey });

    beforeEach(() => {
        db = openRelayDatabase();
        clock = createClock();
        repository = new SqliteOutboundMessageRepository(db, clock.now);
        scheduler = new ManualAttemptScheduler();
        metrics = new MetricsRegistry();
        events = [];
        nextId = 0;
    });

    afterEach(() => {
        db.close();
    });

    it('creates a queued message and schedules its first attempt immediately', async () => {
        const dispatcher = createDispatcher();

        const id = await dispatcher.dispatch(smsIntent());

        expect(id).toBe('msg-1');
        expect(await repository.findById(id)).toMatchObject({ status: 'queued', attempts: 0, idempotencyKey: 'order:1:sms' });
        expect(scheduler.history).toHaveLength(1);
        expect(scheduler.history[0]).toMatchObject({ delayMs: 0, attempt: { messageId: 'msg-1', previousDelayMs: 0 } });
        expect(events).toEqual([
            {
                type: 'message.queued',
                messageId: 'msg-1',
                channel: 'sms',
                scheduledFor: null,
                timestamp: '2026-03-01T09:00:00.000Z',
            },
        ]);
        expect(metrics.get('messaging.dispatch.created', { channel: 'sms' })).toBe(1);
        expect(metrics.get('messaging.dispatch.queued', { channel: 'sms' })).toBe(1);
    });

    it('skips a duplicate while the first message is in flight', async () => {
        const dispatcher = createDispatcher();
        const first = await dispatcher.dispatch(smsIntent());

        const second = await dispatcher.dispatch(smsIntent());

        expect(second).toBe(first);
        expect(scheduler.history).toHaveLength(1);
        expect(events[1]).toEqual({
            type: 'message.duplicate_skipped',
            existingMessageId: first,
            idempotencyKey: 'order:1:sms',
            channel: 'sms',
            status: 'queued',
            timestamp: '2026-03-01T09:00:00.000Z',
        });
        expect(metrics.get('messaging.dispatch.duplicate_skipped')).toBe(1);
        expect(metrics.get('messaging.dispatch.duplicate_skipped', { channel: 'sms', status: 'queued' })).toBe(1);
    });

    it('converges concurrent dispatches of one key on a single message', async () => {
        const dispatcher = createDispatcher();

        const ids = await Promise.all(Array.from({ length: 5 }, () => dispatcher.dispatch(smsIntent())));

        expect(new Set(ids)).toEqual(new Set(['msg-1']));
        expect(await repository.countByStatus()).toEqual({ queued: 1 });
        expect(scheduler.history).toHaveLength(1);
        expect(metrics.get('messaging.dispatch.created')).toBe(1);
    });

    it('resolves a create conflict to the winning row without scheduling it twice', async () => {
        const slow = new SlowCreateRepository(db, clock.now);
        const dispatcher = createDispatcher({ repository: slow });

        const first = dispatcher.dispatch(smsIntent());
        await sleep(5);
        const second = dispatcher.dispatch(smsIntent());

        const [firstId, secondId] = await Promise.all([first, second]);

        expect(firstId).toBe('msg-1');
        expect(secondId).toBe('msg-1');
        expect(scheduler.history).toHaveLength(1);
        expect(events.filter((event) => event.type === 'message.create_conflict')).toEqual([
            {
                type: 'message.create_conflict',
                existingMessageId: 'msg-1',
                idempotencyKey: 'order:1:sms',
                channel: 'sms',
                timestamp: '2026-03-01T09:00:00.000Z',
            },
        ]);
        expect(metrics.get('messaging.dispatch.create_conflict')).toBe(1);
    });

    it('reuses a failed message, resetting attempts and rescheduling', async () => {
        const dispatcher = createDispatcher();
        const id = await dispatcher.dispatch(smsIntent());
        await repository.claimAttempt(id);
        await repository.updateStatus(id, 'failed', { errorCode: 'PROVIDER_DOWN', errorMessage: 'down' });

        const again = await dispatcher.dispatch(smsIntent('order:1:sms', 'Your order shipped (resent)'));

        expect(again).toBe(id);
        const row = await repository.findById(id);
        expect(row).toMatchObject({ status: 'queued', attempts: 0, errorCode: null });
        expect(row?.payload.text).toBe('Your order shipped (resent)');
        expect(scheduler.history).toHaveLength(2);
        expect(events.map((event) => event.type)).toEqual([
            'message.queued',
            'message.retry_scheduled',
            'message.queued',
        ]);
        expect(metrics.get('messaging.dispatch.retry_reset')).toBe(1);
    });

    it('lets only one of two racing dispatchers reuse a failed message', async () => {
        const id = await createDispatcher().dispatch(smsIntent());
        await repository.claimAttempt(id);
        await repository.updateStatus(id, 'failed', { errorCode: 'PROVIDER_DOWN', errorMessage: 'down' });

        const held = new HeldLookupRepository(db, clock.now);
        const late = createDispatcher({ repository: held }).dispatch(smsIntent());
        await held.looked;

        // The other dispatcher resets the row and its attempt goes out before the held one resumes.
        expect(await createDispatcher().dispatch(smsIntent())).toBe(id);
        expect(await repository.claimAttempt(id)).toBe(1);
        await repository.updateStatus(id, 'sent', { providerMessageId: 'SM1', errorCode: null, errorMessage: null });

        held.release();

        expect(await late).toBe(id);
        expect(await repository.findById(id)).toMatchObject({ status: 'sent', attempts: 1, providerMessageId: 'SM1' });
        expect(scheduler.history).toHaveLength(2);
        expect(metrics.get('messaging.dispatch.retry_reset')).toBe(1);
        expect(metrics.get('messaging.dispatch.duplicate_skipped', { channel: 'sms', status: 'sent' })).toBe(1);
        expect(events.map((event) => event.type)).toEqual([
            'message.queued',
            'message.retry_scheduled',
            'message.queued',
            'message.duplicate_skipped',
        ]);
    });

    it('leaves a dead-lettered message alone on re-dispatch', async () => {
        const dispatcher = createDispatcher();
        const id = await dispatcher.dispatch(smsIntent());
        await repository.updateStatus(id, 'dead_lettered');

        expect(await dispatcher.dispatch(smsIntent())).toBe(id);
        expect(scheduler.history).toHaveLength(1);
        expect((await repository.findById(id))?.status).toBe('dead_lettered');
        expect(metrics.get('messaging.dispatch.duplicate_skipped', { channel: 'sms', status: 'dead_lettered' })).toBe(1);
    });

    it('creates a new message for every dispatch without a key', async () => {
        const dispatcher = createDispatcher();

        expect(await dispatcher.dispatch(smsIntent(null))).toBe('msg-1');
        expect(await dispatcher.dispatch(smsIntent(null))).toBe('msg-2');
    });

    it('delays the first attempt until a future sendAt', async () => {
        const dispatcher = createDispatcher();
        const intent = createMessageIntent({
            channel: 'email',
            to: 'ops@example.com',
            subject: 'Digest',
            sendAt: '2026-03-01T09:10:00.000Z',
        });

        await dispatcher.dispatch(intent);

        expect(scheduler.history[0]?.delayMs).toBe(600_000);
        expect(events[0]).toMatchObject({ type: 'message.queued', scheduledFor: '2026-03-01T09:10:00.000Z' });
    });

    it('sends immediately when sendAt is already in the past', async () => {
        const dispatcher = createDispatcher();
        const intent = createMessageIntent({ channel: 'sms', to: '+15551234567', sendAt: '2026-03-01T08:00:00.000Z' });

        await dispatcher.dispatch(intent);

        expect(scheduler.history[0]?.delayMs).toBe(0);
        expect(events[0]).toMatchObject({ scheduledFor: null });
    });

    it('rejects an oversized payload before touching storage', async () => {
        const dispatcher = createDispatcher({ maxPayloadBytes: 100 });

        await expect(dispatcher.dispatch(smsIntent('big', 'x'.repeat(200)))).rejects.toBeInstanceOf(PayloadTooLargeError);

        expect(await repository.countByStatus()).toEqual({});
        expect(metrics.get('messaging.dispatch.payload_too_large', { channel: 'sms' })).toBe(1);
    });

    it('propagates storage errors other than the idempotency conflict', async () => {
        const dispatcher = createDispatcher({ repository: new BrokenStorageRepository(db, clock.now) });

        await expect(dispatcher.dispatch(smsIntent())).rejects.toThrow('SQLITE_IOERR: disk I/O error');
        expect(scheduler.history).toHaveLength(0);
    });

    it('fails loudly when a conflict has no winning row', async () => {
        const dispatcher = createDispatcher({ repository: new PhantomConflictRepository(db, clock.now) });

        await expect(dispatcher.dispatch(smsIntent())).rejects.toBeInstanceOf(IdempotencyConflictError);
    });

    it('dispatches a batch in order and checks every size first', async () => {
        const dispatcher = createDispatcher({ maxPayloadBytes: 400 });

        const ids = await dispatcher.dispatchBatch([smsIntent('a'), smsIntent('b'), smsIntent('a')]);
        expect(ids).toEqual(['msg-1', 'msg-2', 'msg-1']);

        await expect(
            dispatcher.dispatchBatch([smsIntent('c'), smsIntent('d', 'x'.repeat(500))]),
        ).rejects.toBeInstanceOf(PayloadTooLargeError);
        expect(await repository.findByIdempotencyKey('c')).toBeNull();
    });
});
