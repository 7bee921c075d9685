import { randomUUID } from 'node:crypto';
import { intentFromSerialized, serializeIntent } from './message-intent.js';
import { SignalEmitter } from './signals.js';
import type {
    Channel,
    DeadLetterEntry,
    DeadLetterStore,
    MessageIntent,
    OutboundMessageRepository,
    SerializedIntent,
} from '../types/messaging.js';
import type { EventSink, MetricsSink } from '../types/events.js';
import { DeadLetterNotFoundError, MessageNotFoundError, ReplayConflictError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

export interface DeadLetterRecordInput {
    messageId: string;
    channel: Channel;
    payload: SerializedIntent;
    attempts: number;
    errorCode: string;
    errorMessage: string;
    exceptionTrace?: string | null;
}

export interface DeadLetterStats {
    total: number;
    byChannel: Partial<Record<Channel, number>>;
}

/** Where replay hands the reset message back to. Implemented by the Dispatcher. */
export interface AttemptReentry {
    scheduleAttempt(messageId: string, intent: MessageIntent, previousDelayMs?: number): Promise<void>;
}

export interface DeadLetterRecorderOptions {
    store: DeadLetterStore;
    repository: OutboundMessageRepository;
    reentry: AttemptReentry;
    /** When false, terminal failures leave the message `failed` and write no entry. @default true */
    enabled?: boolean;
    events?: EventSink;
    metrics?: MetricsSink;
    now?: () => Date;
    generateId?: () => string;
}

/**
 * Terminal-failure capture and operator replay.
 *
 * `record` is not idempotent; the retry coordinator reaches it at most once per terminal
 * failure. `replay` does not deduplicate downstream side effects.
 */
export class DeadLetterRecorder {
    readonly #store: DeadLetterStore;
    readonly #repository: OutboundMessageRepository;
    readonly #reentry: AttemptReentry;
    readonly #enabled: boolean;
    readonly #signals: SignalEmitter;
    readonly #now: () => Date;
    readonly #generateId: () => string;

    constructor(options: DeadLetterRecorderOptions) {
        this.#store = options.store;
        this.#repository = options.repository;
        this.#reentry = options.reentry;
        this.#enabled = options.enabled ?? true;
        this.#signals = new SignalEmitter('DeadLetterRecorder', options.events, options.metrics);
        this.#now = options.now ?? (() => new Date());
        this.#generateId = options.generateId ?? randomUUID;
    }

    get enabled(): boolean {
        return this.#enabled;
    }

    /** Returns the stored entry, or null when dead-lettering is disabled. */
    async record(input: DeadLetterRecordInput): Promise<DeadLetterEntry | null> {
        const meta = { errorCode: input.errorCode, errorMessage: input.errorMessage };

        if (!this.#enabled) {
            await this.#repository.updateStatus(input.messageId, 'failed', meta);
            await logThought(
                `[DeadLetterRecorder] Dead-lettering disabled; message '${input.messageId}' left failed (${input.errorCode}).`,
            );
            return null;
        }

        const entry: DeadLetterEntry = {
            id: this.#generateId(),
            messageId: input.messageId,
            channel: input.channel,
            payload: input.payload,
            attempts: input.attempts,
            errorCode: input.errorCode,
            errorMessage: input.errorMessage,
            exceptionTrace: input.exceptionTrace ?? null,
            createdAt: this.#now().toISOString(),
        };

        await this.#store.insert(entry);
        await this.#repository.updateStatus(input.messageId, 'dead_lettered', meta);

        this.#signals.emit({
            type: 'message.dead_lettered',
            messageId: input.messageId,
            entryId: entry.id,
            channel: input.channel,
            attempts: input.attempts,
            errorCode: input.errorCode,
            errorMessage: input.errorMessage,
            timestamp: entry.createdAt,
        });
        this.#signals.count('messaging.dead_lettered', { channel: input.channel, error_code: input.errorCode });

        await logThought(
            `[DeadLetterRecorder] Message '${input.messageId}' dead-lettered after ${input.attempts} attempt(s): ${input.errorCode} ${input.errorMessage}`,
        );
        return entry;
    }

    /**
     * Reset the originating message to `queued` with attempts at zero, schedule it again with
     * the stored intent, and delete the entry. Returns the message id.
     */
    async replay(entryId: string): Promise<string> {
        const entry = await this.#store.findById(entryId);
        if (!entry) {
            throw new DeadLetterNotFoundError(entryId);
        }

        const message = await this.#repository.findById(entry.messageId);
        if (!message) {
            throw new MessageNotFoundError(entry.messageId);
        }

        const intent = intentFromSerialized(entry.payload);
        const reset = await this.#repository.resetForRetry(entry.messageId, 'dead_lettered', {
            to: intent.to,
            subject: intent.subject,
            templateKey: intent.templateKey,
            payload: serializeIntent(intent),
        });
        if (!reset) {
            const current = await this.#repository.findById(entry.messageId);
            throw new ReplayConflictError(entry.id, entry.messageId, current?.status ?? message.status);
        }
        await this.#reentry.scheduleAttempt(entry.messageId, intent);
        await this.#store.delete(entry.id);

        this.#signals.emit({
            type: 'message.replayed',
            messageId: entry.messageId,
            entryId: entry.id,
            channel: entry.channel,
            timestamp: this.#now().toISOString(),
        });
        this.#signals.count('messaging.dead_letter.replayed', { channel: entry.channel });

        await logThought(`[DeadLetterRecorder] Replayed entry '${entry.id}' for message '${entry.messageId}'.`);
        return entry.messageId;
    }

    /** Newest first. */
    async list(limit = 50, channel?: Channel): Promise<DeadLetterEntry[]> {
        return this.#store.list(Math.max(1, Math.floor(limit)), channel);
    }

    async get(entryId: string): Promise<DeadLetterEntry> {
        const entry = await this.#store.findById(entryId);
        if (!entry) {
            throw new DeadLetterNotFoundError(entryId);
        }
        return entry;
    }

    /** Delete one entry, or every entry when `entryId` is omitted. Returns the number removed. */
    async purge(entryId?: string): Promise<number> {
        if (entryId !== undefined) {
            if (!(await this.#store.delete(entryId))) {
                throw new DeadLetterNotFoundError(entryId);
            }
            await logThought(`[DeadLetterRecorder] Purged entry '${entryId}'.`);
            return 1;
        }

        const removed = await this.#store.purge();
        await logThought(`[DeadLetterRecorder] Purged ${removed} entr${removed === 1 ? 'y' : 'ies'}.`);
        return removed;
    }

    async stats(): Promise<DeadLetterStats> {
        const byChannel = await this.#store.countByChannel();
        const total = Object.values(byChannel).reduce((sum, count) => sum + (count ?? 0), 0);
        return { total, byChannel };
    }
}
