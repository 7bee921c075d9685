import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import type { DeadLetterRecorder } from './dead-letter-recorder.js';
import { intentFromSerialized } from './message-intent.js';
import type { SenderRegistry } from './sender-registry.js';
import { SignalEmitter } from './signals.js';
import type {
    AttemptScheduler,
    Channel,
    MessageIntent,
    OutboundMessageRepository,
    ScheduledAttempt,
    SendClassification,
    SendResult,
} from '../types/messaging.js';
import type { EventSink, MetricsSink } from '../types/events.js';
import { computeBackoffDelay, DEFAULT_RETRY_POLICY, type RandomSource, type RetryPolicy } from '../utils/backoff.js';
import { errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/** Provider error codes that no retry will fix. */
export const PERMANENT_ERROR_CODES: ReadonlySet<string> = new Set([
    'VALIDATION_ERROR',
    'INVALID_RECIPIENT',
    'INVALID_PAYLOAD',
    'UNSUBSCRIBED',
    'BLOCKED',
    'SENDER_NOT_CONFIGURED',
    'PAYLOAD_INVALID',
]);

export type AttemptOutcome =
    | { kind: 'sent'; attempts: number; providerMessageId: string | null }
    | { kind: 'retry_scheduled'; attempts: number; delayMs: number }
    | { kind: 'dead_lettered'; attempts: number; errorCode: string }
    | { kind: 'stale' };

export interface RetryCoordinatorOptions {
    repository: OutboundMessageRepository;
    scheduler: AttemptScheduler;
    senders: SenderRegistry;
    breakers: CircuitBreakerRegistry;
    deadLetters: DeadLetterRecorder;
    /** Per-channel policy; channels without one use the default. */
    retryPolicies?: Partial<Record<Channel, RetryPolicy>>;
    events?: EventSink;
    metrics?: MetricsSink;
    random?: RandomSource;
    now?: () => Date;
}

/**
 * Classify a sender result.
 *
 * HTTP status wins when present: 408 and 429 are transient, other 4xx permanent, 5xx transient.
 * Otherwise a known permanent error code is permanent and any other failure is transient.
 */
export function classifySendResult(result: SendResult): SendClassification {
    if (result.status === 'sent') return 'success';
    if (result.status === 'undeliverable') return 'permanent';

    const http = result.httpStatus;
    if (http !== undefined) {
        if (http === 408 || http === 429) return 'transient';
        if (http >= 400 && http < 500) return 'permanent';
        if (http >= 500) return 'transient';
    }

    if (result.errorCode !== null && PERMANENT_ERROR_CODES.has(result.errorCode)) {
        return 'permanent';
    }
    return 'transient';
}

function failure(errorCode: string, message: string): SendResult {
    return { status: 'failed', providerMessageId: null, errorCode, errorMessage: message };
}

/**
 * Drives one scheduled attempt to completion: circuit check, send, classification, then
 * success, a backed-off re-schedule, or dead-lettering.
 *
 * Every attempt first claims the message (`queued` to `sending`) in storage. An attempt whose
 * claim fails is stale (already sent, replayed, or run by another worker) and is dropped.
 */
export class RetryCoordinator {
    readonly #repository: OutboundMessageRepository;
    readonly #scheduler: AttemptScheduler;
    readonly #senders: SenderRegistry;
    readonly #breakers: CircuitBreakerRegistry;
    readonly #deadLetters: DeadLetterRecorder;
    readonly #retryPolicies: Partial<Record<Channel, RetryPolicy>>;
    readonly #signals: SignalEmitter;
    readonly #random: RandomSource;
    readonly #now: () => Date;

    constructor(options: RetryCoordinatorOptions) {
        this.#repository = options.repository;
        this.#scheduler = options.scheduler;
        this.#senders = options.senders;
        this.#breakers = options.breakers;
        this.#deadLetters = options.deadLetters;
        this.#retryPolicies = options.retryPolicies ?? {};
        this.#signals = new SignalEmitter('RetryCoordinator', options.events, options.metrics);
        this.#random = options.random ?? Math.random;
        this.#now = options.now ?? (() => new Date());
    }

    policyFor(channel: Channel): RetryPolicy {
        return this.#retryPolicies[channel] ?? DEFAULT_RETRY_POLICY;
    }

    async attempt(job: ScheduledAttempt): Promise<AttemptOutcome> {
        const attempts = await this.#repository.claimAttempt(job.messageId);
        if (attempts === null) {
            this.#signals.count('messaging.attempt.stale', { channel: job.payload.channel });
            await logThought(`[RetryCoordinator] Dropped stale attempt for message '${job.messageId}'.`);
            return { kind: 'stale' };
        }

        try {
            return await this.#runClaimed(job, attempts);
        } catch (err) {
            return this.#recoverClaimed(job, attempts, err);
        }
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #runClaimed(job: ScheduledAttempt, attempts: number): Promise<AttemptOutcome> {
        const channel = job.payload.channel;
        this.#signals.emit({
            type: 'message.sending',
            messageId: job.messageId,
            channel,
            attempt: attempts,
            timestamp: this.#now().toISOString(),
        });

        let intent: MessageIntent;
        try {
            intent = intentFromSerialized(job.payload);
        } catch (err) {
            return this.#deadLetter(job, attempts, failure('PAYLOAD_INVALID', errorMessage(err)), null);
        }

        const binding = this.#senders.resolve(channel);
        if (!binding) {
            return this.#deadLetter(
                job,
                attempts,
                failure('SENDER_NOT_CONFIGURED', `No sender configured for channel '${channel}'.`),
                null,
            );
        }

        const breaker = this.#breakers.get(binding.provider);
        let result: SendResult;
        let exceptionTrace: string | null = null;
        let circuitRejected = false;

        let available = false;
        let circuitError: string | null = null;
        try {
            available = await breaker.isAvailable();
        } catch (err) {
            circuitError = errorMessage(err);
        }

        if (circuitError !== null) {
            // Without circuit state the provider is neither called nor charged; the attempt retries.
            circuitRejected = true;
            result = failure(
                'CIRCUIT_UNAVAILABLE',
                `Circuit state for provider '${binding.provider}' unavailable: ${circuitError}`,
            );
            this.#signals.count('messaging.circuit.unavailable', { channel, provider: binding.provider });
        } else if (available) {
            try {
                result = await binding.sender.send(intent);
            } catch (err) {
                result = failure('SENDER_EXCEPTION', errorMessage(err));
                exceptionTrace = err instanceof Error ? err.stack ?? null : null;
            }
        } else {
            circuitRejected = true;
            result = failure('CIRCUIT_OPEN', `Circuit open for provider '${binding.provider}'.`);
            this.#signals.count('messaging.circuit.rejected', { channel, provider: binding.provider });
        }

        // A circuit rejection counts toward retries but never toward the circuit itself.
        const classification = circuitRejected ? 'transient' : classifySendResult(result);
        this.#signals.count('messaging.send.attempt', { channel, provider: binding.provider, result: classification });

        if (classification === 'success') {
            await this.#recordOnCircuit(binding.provider, 'success', () => breaker.recordSuccess());
            await this.#repository.updateStatus(job.messageId, 'sent', {
                providerMessageId: result.providerMessageId,
                errorCode: null,
                errorMessage: null,
            });
            this.#signals.emit({
                type: 'message.finalized',
                messageId: job.messageId,
                channel,
                status: result.status,
                providerMessageId: result.providerMessageId,
                errorCode: null,
                timestamp: this.#now().toISOString(),
            });
            return { kind: 'sent', attempts, providerMessageId: result.providerMessageId };
        }

        if (classification === 'permanent') {
            return this.#deadLetter(job, attempts, result, exceptionTrace);
        }

        if (!circuitRejected) {
            await this.#recordOnCircuit(binding.provider, 'failure', () => breaker.recordFailure());
        }

        return this.#retryOrDeadLetter(job, attempts, result, exceptionTrace);
    }

    /**
     * A collaborator threw after the claim. The row is `sending` with nothing scheduled, so it is
     * re-queued with backoff or dead-lettered here; if that also fails the error propagates.
     */
    async #recoverClaimed(job: ScheduledAttempt, attempts: number, err: unknown): Promise<AttemptOutcome> {
        const message = errorMessage(err);
        this.#signals.count('messaging.attempt.error', { channel: job.payload.channel });
        await logThought(`[RetryCoordinator] Attempt ${attempts} for message '${job.messageId}' failed internally: ${message}`);

        const trace = err instanceof Error ? err.stack ?? null : null;
        return this.#retryOrDeadLetter(job, attempts, failure('ATTEMPT_ERROR', message), trace);
    }

    async #retryOrDeadLetter(
        job: ScheduledAttempt,
        attempts: number,
        result: SendResult,
        exceptionTrace: string | null,
    ): Promise<AttemptOutcome> {
        const channel = job.payload.channel;
        const policy = this.policyFor(channel);
        if (attempts >= policy.maxAttempts) {
            return this.#deadLetter(job, attempts, result, exceptionTrace);
        }

        const delayMs = computeBackoffDelay(policy, attempts, job.previousDelayMs, this.#random);
        // Straight back to queued: a `failed` row would be reset by a concurrent re-dispatch.
        await this.#repository.updateStatus(job.messageId, 'queued', {
            errorCode: result.errorCode,
            errorMessage: result.errorMessage,
        });
        await this.#scheduler.schedule(
            { messageId: job.messageId, payload: job.payload, previousDelayMs: delayMs },
            delayMs,
        );

        this.#signals.emit({
            type: 'message.retry_scheduled',
            messageId: job.messageId,
            channel,
            attempt: attempts,
            delayMs,
            timestamp: this.#now().toISOString(),
        });
        this.#signals.count('messaging.retry.scheduled', { channel });
        await logThought(
            `[RetryCoordinator] Message '${job.messageId}' attempt ${attempts}/${policy.maxAttempts} failed (${result.errorCode ?? 'FAILED'}); retrying in ${delayMs}ms.`,
        );

        return { kind: 'retry_scheduled', attempts, delayMs };
    }

    /** Circuit bookkeeping after a send must not decide the message's fate. */
    async #recordOnCircuit(provider: string, outcome: 'success' | 'failure', record: () => Promise<void>): Promise<void> {
        try {
            await record();
        } catch (err) {
            this.#signals.count('messaging.circuit.record_error', { provider, outcome });
            await logThought(`[RetryCoordinator] Could not record ${outcome} on circuit '${provider}': ${errorMessage(err)}`);
        }
    }

    async #deadLetter(
        job: ScheduledAttempt,
        attempts: number,
        result: SendResult,
        exceptionTrace: string | null,
    ): Promise<AttemptOutcome> {
        const errorCode = result.errorCode ?? 'FAILED';
        const errorMessageText = result.errorMessage ?? 'Provider failure';

        this.#signals.emit({
            type: 'message.finalized',
            messageId: job.messageId,
            channel: job.payload.channel,
            status: result.status,
            providerMessageId: result.providerMessageId,
            errorCode,
            timestamp: this.#now().toISOString(),
        });

        await this.#deadLetters.record({
            messageId: job.messageId,
            channel: job.payload.channel,
            payload: job.payload,
            attempts,
            errorCode,
            errorMessage: errorMessageText,
            exceptionTrace,
        });
        return { kind: 'dead_lettered', attempts, errorCode };
    }
}
