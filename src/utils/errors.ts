/** Base class for every error the relay raises on purpose. `code` is stable and safe to match on. */
export class RelayError extends Error {
    readonly code: string;

    constructor(code: string, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** A message intent failed validation. Raised at construction, before any side effect. */
export class IntentValidationError extends RelayError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('INTENT_INVALID', `Invalid message intent: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export class PayloadTooLargeError extends RelayError {
    readonly size: number;
    readonly maxBytes: number;

    constructor(size: number, maxBytes: number) {
        super('PAYLOAD_TOO_LARGE', `Payload exceeds maximum size of ${maxBytes} bytes (got ${size}).`);
        this.size = size;
        this.maxBytes = maxBytes;
    }
}

/**
 * The store rejected an insert on the idempotency key but the follow-up lookup found no row.
 * Only reachable with a store whose uniqueness constraint and reads disagree.
 */
export class IdempotencyConflictError extends RelayError {
    readonly idempotencyKey: string;

    constructor(idempotencyKey: string) {
        super(
            'IDEMPOTENCY_CONFLICT_UNRESOLVED',
            `Create conflicted on idempotency key '${idempotencyKey}' but no existing message was found.`,
        );
        this.idempotencyKey = idempotencyKey;
    }
}

export class DeadLetterNotFoundError extends RelayError {
    readonly entryId: string;

    constructor(entryId: string) {
        super('DEAD_LETTER_NOT_FOUND', `Dead-letter entry '${entryId}' not found.`);
        this.entryId = entryId;
    }
}

export class MessageNotFoundError extends RelayError {
    readonly messageId: string;

    constructor(messageId: string) {
        super('MESSAGE_NOT_FOUND', `Outbound message '${messageId}' not found.`);
        this.messageId = messageId;
    }
}

/** The message behind a dead-letter entry left `dead_lettered` before replay could reset it. */
export class ReplayConflictError extends RelayError {
    readonly entryId: string;
    readonly messageId: string;

    constructor(entryId: string, messageId: string, status: string) {
        super(
            'REPLAY_CONFLICT',
            `Dead-letter entry '${entryId}' cannot be replayed: message '${messageId}' is '${status}', not 'dead_lettered'.`,
        );
        this.entryId = entryId;
        this.messageId = messageId;
    }
}

export class ConfigValidationError extends RelayError {
    readonly issues: string[];

    constructor(source: string, issues: string[]) {
        super('CONFIG_INVALID', `Invalid relay configuration (${source}): ${issues.join('; ')}`);
        this.issues = issues;
    }
}

/** Normalize anything thrown into a message string. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
