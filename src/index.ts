// ── Composition ──────────────────────────────────────────────────────────────
export { createRelayRuntime, type RelayRuntime, type RelayRuntimeOptions } from './runtime.js';
export { startRelay, type StartRelayOptions } from './server.js';
export { createApiApp, startApiServer, type ApiServerDeps } from './api/router.js';
export { signPayload } from './api/shared.js';

// ── Configuration ────────────────────────────────────────────────────────────
export {
    DEFAULT_CONFIG,
    applyEnvOverrides,
    getChannelRetryPolicy,
    getCircuitBreakerSettings,
    loadConfigSync,
    readConfig,
    resolveConfig,
    type RelayConfig,
} from './config/relay-config.js';
export { validateRelayConfig, type RelayConfigValidationResult } from './config/relay-config-schema.js';

// ── Dispatch engine ──────────────────────────────────────────────────────────
export { Dispatcher, DEFAULT_MAX_PAYLOAD_BYTES, type DispatcherOptions } from './services/dispatcher.js';
export {
    RetryCoordinator,
    classifySendResult,
    PERMANENT_ERROR_CODES,
    type AttemptOutcome,
    type RetryCoordinatorOptions,
} from './services/retry-coordinator.js';
export {
    DeadLetterRecorder,
    type AttemptReentry,
    type DeadLetterRecordInput,
    type DeadLetterRecorderOptions,
    type DeadLetterStats,
} from './services/dead-letter-recorder.js';
export {
    CircuitBreaker,
    CircuitBreakerRegistry,
    DEFAULT_CIRCUIT_SETTINGS,
    type CircuitBreakerOptions,
} from './services/circuit-breaker.js';
export { SenderRegistry, type SenderBinding } from './services/sender-registry.js';
export { HealthService, type RelayHealthReport } from './services/health-service.js';
export {
    createMessageIntent,
    parseMessageIntent,
    serializeIntent,
    type MessageIntentInput,
} from './services/message-intent.js';

// ── Collaborators ────────────────────────────────────────────────────────────
export { openRelayDatabase, type RelayDatabase } from './services/db.js';
export { SqliteOutboundMessageRepository } from './services/outbound-message-repository.js';
export { SqliteDeadLetterStore } from './services/dead-letter-store.js';
export { TimerAttemptScheduler } from './services/attempt-scheduler.js';
export { SqliteAttemptQueue, type SqliteAttemptQueueOptions } from './services/durable-attempt-queue.js';
export { JobScheduler } from './services/job-scheduler.js';
export { MemoryCircuitCache } from './services/circuit-cache.js';
export { RedisCircuitCache } from './services/redis-circuit-cache.js';
export { DispatchEventBus } from './services/event-bus.js';
export { MetricsRegistry, type CounterSnapshot } from './services/metrics.js';

// ── Utilities and errors ─────────────────────────────────────────────────────
export {
    computeBackoffDelay,
    decorrelatedJitter,
    exponentialWithJitter,
    DEFAULT_RETRY_POLICY,
    type RetryPolicy,
} from './utils/backoff.js';
export * from './utils/errors.js';
export { maskEmail, maskPhone, maskRecipient } from './utils/masking.js';

// ── Types ────────────────────────────────────────────────────────────────────
export * from './types/messaging.js';
export * from './types/circuit.js';
export * from './types/events.js';
