/** Outbound channels the relay can dispatch on. */
export const CHANNELS = ['sms', 'whatsapp', 'email'] as const;

export type Channel = (typeof CHANNELS)[number];

/**
 * Lifecycle of an outbound message.
 *
 * queued → sending → sent → delivered, or queued/sending → failed → dead_lettered.
 * `delivered` and late `failed` transitions come from webhook collaborators.
 */
export const MESSAGE_STATUSES = ['queued', 'sending', 'sent', 'delivered', 'failed', 'dead_lettered'] as const;

export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

export function isChannel(value: string): value is Channel {
    return CHANNELS.some((channel) => channel === value);
}

export function isMessageStatus(value: string): value is MessageStatus {
    return MESSAGE_STATUSES.some((status) => status === value);
}

/** Statuses for which a repeated dispatch with the same idempotency key is a no-op. */
export const IN_FLIGHT_OR_DONE_STATUSES: readonly MessageStatus[] = ['queued', 'sending', 'sent', 'delivered'];

/** Immutable, validated description of one send. Build with `createMessageIntent`. */
export interface MessageIntent {
    readonly channel: Channel;
    readonly to: string;
    readonly subject: string | null;
    readonly text: string | null;
    readonly html: string | null;
    readonly templateKey: string | null;
    readonly templateData: Readonly<Record<string, unknown>>;
    readonly mediaUrls: readonly string[];
    readonly metadata: Readonly<Record<string, unknown>>;
    readonly idempotencyKey: string | null;
    readonly sendAt: Date | null;
}

/** JSON-safe form of a {@link MessageIntent}, as persisted and carried by scheduled attempts. */
export interface SerializedIntent {
    channel: Channel;
    to: string;
    subject: string | null;
    text: string | null;
    html: string | null;
    templateKey: string | null;
    templateData: Record<string, unknown>;
    mediaUrls: string[];
    metadata: Record<string, unknown>;
    idempotencyKey: string | null;
    sendAt: string | null;
}

/** Persisted outbound message row. Timestamps are ISO-8601 strings. */
export interface OutboundMessageRow {
    id: string;
    channel: Channel;
    to: string;
    subject: string | null;
    templateKey: string | null;
    payload: SerializedIntent;
    status: MessageStatus;
    idempotencyKey: string | null;
    attempts: number;
    providerMessageId: string | null;
    errorCode: string | null;
    errorMessage: string | null;
    queuedAt: string;
    sentAt: string | null;
    deliveredAt: string | null;
    failedAt: string | null;
    deadLetteredAt: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface NewOutboundMessage {
    id: string;
    channel: Channel;
    to: string;
    subject: string | null;
    templateKey: string | null;
    payload: SerializedIntent;
    idempotencyKey: string | null;
    queuedAt: string;
}

/**
 * Outcome of a create. `conflict` is reported only for the idempotency-key uniqueness
 * violation; every other storage failure is thrown.
 */
export type CreateResult =
    | { kind: 'created'; id: string }
    | { kind: 'conflict'; idempotencyKey: string };

export interface StatusMeta {
    providerMessageId?: string | null;
    errorCode?: string | null;
    errorMessage?: string | null;
}

/** Statuses a row may be reset from: `failed` by re-dispatch, `dead_lettered` by replay. */
export type ResettableStatus = Extract<MessageStatus, 'failed' | 'dead_lettered'>;

export interface ResetForRetryData {
    to: string;
    subject: string | null;
    templateKey: string | null;
    payload: SerializedIntent;
}

/** Row store contract. The idempotency-key uniqueness constraint must be enforced by storage. */
export interface OutboundMessageRepository {
    create(row: NewOutboundMessage): Promise<CreateResult>;
    findById(id: string): Promise<OutboundMessageRow | null>;
    findByIdempotencyKey(key: string): Promise<OutboundMessageRow | null>;
    updateStatus(id: string, status: MessageStatus, meta?: StatusMeta): Promise<void>;
    /**
     * Compare-and-set: reset the row to `queued` with attempts at zero only while it is still in
     * `expected`. Returns false when the row is missing or has moved on.
     */
    resetForRetry(id: string, expected: ResettableStatus, data: ResetForRetryData): Promise<boolean>;
    incrementAttempts(id: string): Promise<number>;
    /**
     * Atomically move a `queued` row to `sending` and bump its attempt count.
     * Returns the new count, or null when the row is missing or not `queued`.
     */
    claimAttempt(id: string): Promise<number | null>;
    countByStatus(): Promise<Partial<Record<MessageStatus, number>>>;
}

// ── Senders ─────────────────────────────────────────────────────────────────

export type SendStatus = 'sent' | 'failed' | 'undeliverable';

export interface SendResult {
    status: SendStatus;
    providerMessageId: string | null;
    errorCode: string | null;
    errorMessage: string | null;
    /** Provider HTTP status, when the sender has one. Drives transient/permanent classification. */
    httpStatus?: number;
    raw?: Record<string, unknown>;
}

/** One channel/provider pair. Implementations call the provider SDK or API. */
export interface MessageSender {
    send(intent: MessageIntent): Promise<SendResult>;
}

export type SendClassification = 'success' | 'transient' | 'permanent';

// ── Dead letters ────────────────────────────────────────────────────────────

export interface DeadLetterEntry {
    id: string;
    messageId: string;
    channel: Channel;
    payload: SerializedIntent;
    attempts: number;
    errorCode: string;
    errorMessage: string;
    exceptionTrace: string | null;
    createdAt: string;
}

export interface DeadLetterStore {
    insert(entry: DeadLetterEntry): Promise<void>;
    findById(id: string): Promise<DeadLetterEntry | null>;
    list(limit: number, channel?: Channel): Promise<DeadLetterEntry[]>;
    delete(id: string): Promise<boolean>;
    purge(): Promise<number>;
    countByChannel(): Promise<Partial<Record<Channel, number>>>;
}

// ── Scheduling ──────────────────────────────────────────────────────────────

/** A pending send attempt handed to an {@link AttemptScheduler}. */
export interface ScheduledAttempt {
    messageId: string;
    payload: SerializedIntent;
    /** Delay used before this attempt, fed back into decorrelated jitter. 0 for first attempts. */
    previousDelayMs: number;
}

export type AttemptHandler = (attempt: ScheduledAttempt) => Promise<void>;

/**
 * Hands an attempt off to run no earlier than `delayMs` from now. Firing time is best-effort;
 * cancellation is not supported.
 */
export interface AttemptScheduler {
    schedule(attempt: ScheduledAttempt, delayMs: number): Promise<void>;
    start(handler: AttemptHandler): void;
    stop(): void;
}
