import { randomUUID } from 'node:crypto';
import { serializeIntent, serializedIntentSize } from './message-intent.js';
import { SignalEmitter } from './signals.js';
import {
    IN_FLIGHT_OR_DONE_STATUSES,
    type AttemptScheduler,
    type Channel,
    type MessageIntent,
    type OutboundMessageRepository,
    type OutboundMessageRow,
} from '../types/messaging.js';
import type { EventSink, MetricsSink } from '../types/events.js';
import { IdempotencyConflictError, PayloadTooLargeError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

export const DEFAULT_MAX_PAYLOAD_BYTES = 262_144;

export interface DispatcherOptions {
    repository: OutboundMessageRepository;
    scheduler: AttemptScheduler;
    events?: EventSink;
    metrics?: MetricsSink;
    /** @default 262144 */
    maxPayloadBytes?: number;
    now?: () => Date;
    generateId?: () => string;
}

/**
 * Entry point for outbound sends: idempotent create, skip, or reset-for-retry, then hand-off
 * of the first attempt to the {@link AttemptScheduler}.
 *
 * Deduplication rests on the repository's uniqueness constraint. The lookup before create
 * only short-circuits the common case; concurrent creators are reconciled on the conflict path.
 * Reuse of a `failed` row is a compare-and-set on its status, so only one dispatcher reschedules it.
 */
export class Dispatcher {
    readonly #repository: OutboundMessageRepository;
    readonly #scheduler: AttemptScheduler;
    readonly #signals: SignalEmitter;
    readonly #maxPayloadBytes: number;
    readonly #now: () => Date;
    readonly #generateId: () => string;

    constructor(options: DispatcherOptions) {
        this.#repository = options.repository;
        this.#scheduler = options.scheduler;
        this.#signals = new SignalEmitter('Dispatcher', options.events, options.metrics);
        this.#maxPayloadBytes = options.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
        this.#now = options.now ?? (() => new Date());
        this.#generateId = options.generateId ?? randomUUID;
    }

    /**
     * Returns the canonical message id for the intent. Repeated calls sharing an idempotency key
     * converge on one id. Storage errors other than the idempotency conflict propagate as-is.
     */
    async dispatch(intent: MessageIntent): Promise<string> {
        this.#assertPayloadSize(intent);
        return this.#dispatchChecked(intent);
    }

    /** Every payload is size-checked before anything is persisted. Ids come back in input order. */
    async dispatchBatch(intents: readonly MessageIntent[]): Promise<string[]> {
        for (const intent of intents) {
            this.#assertPayloadSize(intent);
        }

        const ids: string[] = [];
        for (const intent of intents) {
            ids.push(await this.#dispatchChecked(intent));
        }
        return ids;
    }

    /**
     * Hand the next attempt for `messageId` to the scheduler, honouring a future `sendAt`.
     * Also the re-entry point for dead-letter replay.
     */
    async scheduleAttempt(messageId: string, intent: MessageIntent, previousDelayMs = 0): Promise<void> {
        const nowMs = this.#now().getTime();
        const sendAtMs = intent.sendAt ? intent.sendAt.getTime() : null;
        const delayMs = sendAtMs !== null && sendAtMs > nowMs ? sendAtMs - nowMs : 0;

        await this.#scheduler.schedule(
            { messageId, payload: serializeIntent(intent), previousDelayMs },
            delayMs,
        );

        this.#signals.emit({
            type: 'message.queued',
            messageId,
            channel: intent.channel,
            scheduledFor: delayMs > 0 && intent.sendAt ? intent.sendAt.toISOString() : null,
            timestamp: this.#now().toISOString(),
        });
        this.#signals.count('messaging.dispatch.queued', { channel: intent.channel });
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #assertPayloadSize(intent: MessageIntent): void {
        const size = serializedIntentSize(intent);
        if (size > this.#maxPayloadBytes) {
            this.#signals.count('messaging.dispatch.payload_too_large', { channel: intent.channel });
            throw new PayloadTooLargeError(size, this.#maxPayloadBytes);
        }
    }

    async #dispatchChecked(intent: MessageIntent): Promise<string> {
        const key = intent.idempotencyKey;

        if (key !== null) {
            const existing = await this.#repository.findByIdempotencyKey(key);
            if (existing) {
                if (existing.status === 'failed') {
                    return this.#retryFailed(existing, key, intent);
                }
                return this.#skipDuplicate(existing, key, intent.channel);
            }
        }

        const id = this.#generateId();
        const result = await this.#repository.create({
            id,
            channel: intent.channel,
            to: intent.to,
            subject: intent.subject,
            templateKey: intent.templateKey,
            payload: serializeIntent(intent),
            idempotencyKey: key,
            queuedAt: this.#now().toISOString(),
        });

        if (result.kind === 'conflict') {
            return this.#resolveConflict(result.idempotencyKey, intent.channel);
        }

        this.#signals.count('messaging.dispatch.created', { channel: intent.channel });
        await this.scheduleAttempt(result.id, intent);
        return result.id;
    }

    #skipDuplicate(existing: OutboundMessageRow, key: string, channel: Channel): string {
        this.#signals.emit({
            type: 'message.duplicate_skipped',
            existingMessageId: existing.id,
            idempotencyKey: key,
            channel,
            status: existing.status,
            timestamp: this.#now().toISOString(),
        });
        this.#signals.count('messaging.dispatch.duplicate_skipped', { channel, status: existing.status });

        // dead_lettered is terminal for dispatch; only an explicit replay re-enters it.
        if (!IN_FLIGHT_OR_DONE_STATUSES.includes(existing.status)) {
            void logThought(
                `[Dispatcher] Key '${key}' maps to message '${existing.id}' in status '${existing.status}'; replay it instead.`,
            );
        }
        return existing.id;
    }

    async #retryFailed(existing: OutboundMessageRow, key: string, intent: MessageIntent): Promise<string> {
        const reset = await this.#repository.resetForRetry(existing.id, 'failed', {
            to: intent.to,
            subject: intent.subject,
            templateKey: intent.templateKey,
            payload: serializeIntent(intent),
        });

        if (!reset) {
            // Another dispatcher reset it first; whatever state it reached now owns the attempt.
            const current = await this.#repository.findById(existing.id);
            return this.#skipDuplicate(current ?? existing, key, intent.channel);
        }

        this.#signals.emit({
            type: 'message.retry_scheduled',
            messageId: existing.id,
            channel: intent.channel,
            attempt: 0,
            delayMs: 0,
            timestamp: this.#now().toISOString(),
        });
        this.#signals.count('messaging.dispatch.retry_reset', { channel: intent.channel });

        await this.scheduleAttempt(existing.id, intent);
        return existing.id;
    }

    async #resolveConflict(key: string, channel: Channel): Promise<string> {
        const winner = await this.#repository.findByIdempotencyKey(key);
        if (!winner) {
            throw new IdempotencyConflictError(key);
        }

        this.#signals.emit({
            type: 'message.create_conflict',
            existingMessageId: winner.id,
            idempotencyKey: key,
            channel,
            timestamp: this.#now().toISOString(),
        });
        this.#signals.count('messaging.dispatch.create_conflict', { channel });
        return winner.id;
    }
}
