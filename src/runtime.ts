import type { Server } from 'node:http';
import type { Express } from 'express';
import { getChannelRetryPolicy, getCircuitBreakerSettings, type RelayConfig } from './config/relay-config.js';
import { createApiApp, startApiServer } from './api/router.js';
import { TimerAttemptScheduler } from './services/attempt-scheduler.js';
import { CircuitBreakerRegistry } from './services/circuit-breaker.js';
import { MemoryCircuitCache } from './services/circuit-cache.js';
import { openRelayDatabase, type RelayDatabase } from './services/db.js';
import { DeadLetterRecorder } from './services/dead-letter-recorder.js';
import { SqliteDeadLetterStore } from './services/dead-letter-store.js';
import { Dispatcher } from './services/dispatcher.js';
import { SqliteAttemptQueue } from './services/durable-attempt-queue.js';
import { DispatchEventBus } from './services/event-bus.js';
import { HealthService } from './services/health-service.js';
import { JobScheduler } from './services/job-scheduler.js';
import { MetricsRegistry } from './services/metrics.js';
import { SqliteOutboundMessageRepository } from './services/outbound-message-repository.js';
import { RedisCircuitCache } from './services/redis-circuit-cache.js';
import { RetryCoordinator } from './services/retry-coordinator.js';
import type { SenderRegistry } from './services/sender-registry.js';
import type { CircuitCache } from './types/circuit.js';
import { CHANNELS, type AttemptScheduler, type Channel } from './types/messaging.js';
import type { RandomSource, RetryPolicy } from './utils/backoff.js';
import { logThought } from './utils/logger.js';

export interface RelayRuntimeOptions {
    /** Use this database instead of opening `storage.databasePath`. */
    database?: RelayDatabase;
    /** Use this cache instead of the one `cache.driver` selects. */
    cache?: CircuitCache;
    random?: RandomSource;
}

export interface RelayRuntime {
    readonly config: RelayConfig;
    readonly db: RelayDatabase;
    readonly events: DispatchEventBus;
    readonly metrics: MetricsRegistry;
    readonly breakers: CircuitBreakerRegistry;
    readonly scheduler: AttemptScheduler;
    readonly repository: SqliteOutboundMessageRepository;
    readonly dispatcher: Dispatcher;
    readonly coordinator: RetryCoordinator;
    readonly deadLetters: DeadLetterRecorder;
    readonly health: HealthService;
    readonly app: Express;
    /** Attach the retry coordinator to the scheduler so attempts start running. */
    start(): void;
    /** Bind the control-plane API on `runtime.apiPort`. */
    listen(): Promise<Server>;
    /** Stop the scheduler and the API server. The database stays open. */
    stop(): Promise<void>;
    /** {@link stop}, then release the cache connection and the database. */
    close(): Promise<void>;
}

function buildCache(config: RelayConfig): { cache: CircuitCache; close: () => Promise<void> } {
    if (config.cache.driver === 'redis') {
        const redisCache = RedisCircuitCache.fromUrl(config.cache.redisUrl);
        return { cache: redisCache, close: () => redisCache.close() };
    }
    return { cache: new MemoryCircuitCache(), close: async () => undefined };
}

function retryPolicies(config: RelayConfig): Partial<Record<Channel, RetryPolicy>> {
    const policies: Partial<Record<Channel, RetryPolicy>> = {};
    for (const channel of CHANNELS) {
        policies[channel] = getChannelRetryPolicy(config, channel);
    }
    return policies;
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

/**
 * Composition root: one database, one circuit cache, and one instance of every service,
 * wired together the way the relay runs in production.
 *
 * Nothing runs until {@link RelayRuntime.start}; nothing listens until {@link RelayRuntime.listen}.
 */
export function createRelayRuntime(
    config: RelayConfig,
    senders: SenderRegistry,
    options: RelayRuntimeOptions = {},
): RelayRuntime {
    const db = options.database ?? openRelayDatabase(config.storage.databasePath);
    const { cache, close: closeCache } = options.cache
        ? { cache: options.cache, close: async (): Promise<void> => undefined }
        : buildCache(config);

    const events = new DispatchEventBus();
    const metrics = new MetricsRegistry();
    const repository = new SqliteOutboundMessageRepository(db);
    const store = new SqliteDeadLetterStore(db);

    const breakers = new CircuitBreakerRegistry({
        cache,
        settings: getCircuitBreakerSettings(config),
        keyPrefix: config.cache.keyPrefix,
        events,
    });

    const jobs = new JobScheduler();
    const scheduler: AttemptScheduler = config.dispatch.scheduler === 'durable'
        ? new SqliteAttemptQueue(db, jobs, {
            pollCronExpression: config.dispatch.pollCronExpression,
            batchSize: config.dispatch.batchSize,
        })
        : new TimerAttemptScheduler();

    const dispatcher = new Dispatcher({
        repository,
        scheduler,
        events,
        metrics,
        maxPayloadBytes: config.dispatch.maxPayloadBytes,
    });

    const deadLetters = new DeadLetterRecorder({
        store,
        repository,
        reentry: dispatcher,
        enabled: config.deadLetter.enabled,
        events,
        metrics,
    });

    const coordinator = new RetryCoordinator({
        repository,
        scheduler,
        senders,
        breakers,
        deadLetters,
        retryPolicies: retryPolicies(config),
        events,
        metrics,
        random: options.random,
    });

    const health = new HealthService({ breakers, senders, repository, deadLetters, metrics });
    const app = createApiApp({ config, dispatcher, deadLetters, health });

    let server: Server | null = null;
    let started = false;

    const stop = async (): Promise<void> => {
        scheduler.stop();
        jobs.stopAll();
        started = false;
        if (server) {
            const current = server;
            server = null;
            await closeServer(current);
        }
    };

    return {
        config,
        db,
        events,
        metrics,
        breakers,
        scheduler,
        repository,
        dispatcher,
        coordinator,
        deadLetters,
        health,
        app,

        start(): void {
            if (started) return;
            started = true;
            scheduler.start(async (job) => {
                await coordinator.attempt(job);
            });
            void logThought(
                `[Relay] Runtime started (scheduler: ${config.dispatch.scheduler}, cache: ${config.cache.driver}, channels: ${senders.channels().join(', ') || 'none'}).`,
            );
        },

        async listen(): Promise<Server> {
            if (!server) {
                server = await startApiServer(app, config.runtime.apiPort);
            }
            return server;
        },

        stop,

        async close(): Promise<void> {
            await stop();
            await closeCache();
            if (!options.database) {
                db.close();
            }
            await logThought('[Relay] Runtime closed.');
        },
    };
}
