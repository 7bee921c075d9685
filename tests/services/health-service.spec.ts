import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import { MemoryCircuitCache } from '../../src/services/circuit-cache.js';
import { openRelayDatabase, type RelayDatabase } from '../../src/services/db.js';
import { DeadLetterRecorder } from '../../src/services/dead-letter-recorder.js';
import { SqliteDeadLetterStore } from '../../src/services/dead-letter-store.js';
import { HealthService } from '../../src/services/health-service.js';
import { createMessageIntent, serializeIntent } from '../../src/services/message-intent.js';
import { MetricsRegistry } from '../../src/services/metrics.js';
import { SqliteOutboundMessageRepository } from '../../src/services/outbound-message-repository.js';
import { SenderRegistry } from '../../src/services/sender-registry.js';
import { createClock, ScriptedSender, type TestClock } from '../harness/relay-fixtures.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn().mockResolvedValue(undefined),
}));

describe('HealthService', () => {
    let db: RelayDatabase;
    let clock: TestClock;
    let breakers: CircuitBreakerRegistry;
    let repository: SqliteOutboundMessageRepository;
    let deadLetters: DeadLetterRecorder;
    let metrics: MetricsRegistry;
    let health: HealthService;

    beforeEach(() => {
        db = openRelayDatabase();
        clock = createClock();
        breakers = new CircuitBreakerRegistry({
            cache: new MemoryCircuitCache(clock.nowMs),
            settings: { failureThreshold: 1, timeoutSeconds: 60 },
            now: clock.nowMs,
        });
        repository = new SqliteOutboundMessageRepository(db, clock.now);
        deadLetters = new DeadLetterRecorder({
            store: new SqliteDeadLetterStore(db),
            repository,
            reentry: { scheduleAttempt: async () => undefined },
            now: clock.now,
            generateId: () => 'dl-1',
        });
        metrics = new MetricsRegistry();
        health = new HealthService({
            breakers,
            senders: new SenderRegistry({
                sms: { provider: 'twilio_sms', sender: new ScriptedSender() },
                email: { provider: 'sendgrid_email', sender: new ScriptedSender() },
            }),
            repository,
            deadLetters,
            metrics,
            now: clock.now,
        });
    });

    afterEach(() => {
        db.close();
    });

    it('lists bound providers and any breaker created elsewhere, sorted', () => {
        breakers.get('legacy_push');

        expect(health.providers()).toEqual(['legacy_push', 'sendgrid_email', 'twilio_sms']);
    });

    it('reports healthy when every circuit is closed', async () => {
        const report = await health.report();

        expect(report).toMatchObject({
            status: 'healthy',
            timestamp: '2026-03-01T09:00:00.000Z',
            openCircuits: [],
            deadLetters: { total: 0, byChannel: {} },
            messages: {},
            metrics: [],
        });
        expect(report.circuits.map((circuit) => `${circuit.service}:${circuit.state}`)).toEqual([
            'sendgrid_email:closed',
            'twilio_sms:closed',
        ]);
    });

    it('reports degraded with the open circuits, dead letters and message counts', async () => {
        await breakers.get('twilio_sms').recordFailure();
        const intent = createMessageIntent({ channel: 'sms', to: '+15551234567', text: 'hi' });
        await repository.create({
            id: 'msg-1',
            channel: 'sms',
            to: intent.to,
            subject: null,
            templateKey: null,
            payload: serializeIntent(intent),
            idempotencyKey: null,
            queuedAt: '2026-03-01T09:00:00.000Z',
        });
        await deadLetters.record({
            messageId: 'msg-1',
            channel: 'sms',
            payload: serializeIntent(intent),
            attempts: 3,
            errorCode: 'PROVIDER_DOWN',
            errorMessage: 'down',
        });
        metrics.increment('messaging.send.attempt', 3, { channel: 'sms' });

        const report = await health.report();

        expect(report.status).toBe('degraded');
        expect(report.openCircuits).toEqual(['twilio_sms']);
        expect(report.deadLetters).toEqual({ total: 1, byChannel: { sms: 1 } });
        expect(report.messages).toEqual({ dead_lettered: 1 });
        expect(report.metrics).toEqual([{ metric: 'messaging.send.attempt', tags: { channel: 'sms' }, value: 3 }]);
    });

    it('resets a circuit and returns its fresh snapshot', async () => {
        await breakers.get('twilio_sms').recordFailure();
        expect((await health.circuit('twilio_sms')).state).toBe('open');

        const snapshot = await health.resetCircuit('twilio_sms');

        expect(snapshot).toMatchObject({ service: 'twilio_sms', state: 'closed', healthy: true, failureCount: 0 });
    });
});
