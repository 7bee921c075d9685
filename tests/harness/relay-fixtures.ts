import type {
    AttemptHandler,
    AttemptScheduler,
    MessageIntent,
    MessageSender,
    ScheduledAttempt,
    SendResult,
} from '../../src/types/messaging.js';

export const BASE_TIME_MS = Date.parse('2026-03-01T09:00:00.000Z');

export interface TestClock {
    nowMs: () => number;
    now: () => Date;
    advance: (ms: number) => void;
}

/** Manually advanced clock shared by every component under test. */
export function createClock(startMs = BASE_TIME_MS): TestClock {
    let current = startMs;
    return {
        nowMs: () => current,
        now: () => new Date(current),
        advance: (ms: number) => {
            current += ms;
        },
    };
}

export function sentResult(providerMessageId = 'prov-1'): SendResult {
    return { status: 'sent', providerMessageId, errorCode: null, errorMessage: null };
}

export function failedResult(errorCode = 'PROVIDER_DOWN', errorMessage = 'Provider unavailable', httpStatus?: number): SendResult {
    return httpStatus === undefined
        ? { status: 'failed', providerMessageId: null, errorCode, errorMessage }
        : { status: 'failed', providerMessageId: null, errorCode, errorMessage, httpStatus };
}

/** Returns queued outcomes in order, then repeats `fallback`. Thrown outcomes are rejected. */
export class ScriptedSender implements MessageSender {
    readonly calls: MessageIntent[] = [];
    readonly #outcomes: Array<SendResult | Error>;
    readonly #fallback: SendResult | Error;

    constructor(outcomes: Array<SendResult | Error> = [], fallback: SendResult | Error = sentResult()) {
        this.#outcomes = [...outcomes];
        this.#fallback = fallback;
    }

    async send(intent: MessageIntent): Promise<SendResult> {
        this.calls.push(intent);
        const next = this.#outcomes.shift() ?? this.#fallback;
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }
}

/** Records schedules and runs them only when the test says so. */
export class ManualAttemptScheduler implements AttemptScheduler {
    readonly scheduled: Array<{ attempt: ScheduledAttempt; delayMs: number }> = [];
    readonly history: Array<{ attempt: ScheduledAttempt; delayMs: number }> = [];
    #handler: AttemptHandler | null = null;

    async schedule(attempt: ScheduledAttempt, delayMs: number): Promise<void> {
        this.scheduled.push({ attempt, delayMs });
        this.history.push({ attempt, delayMs });
    }

    start(handler: AttemptHandler): void {
        this.#handler = handler;
    }

    stop(): void {
        this.#handler = null;
    }

    /** Run the oldest pending attempt. Returns false when nothing is pending. */
    async runNext(): Promise<boolean> {
        const next = this.scheduled.shift();
        if (!next) return false;
        if (!this.#handler) {
            throw new Error('ManualAttemptScheduler has no handler; call start() first.');
        }
        await this.#handler(next.attempt);
        return true;
    }

    /** Run attempts, including ones scheduled along the way, until none remain. */
    async drain(limit = 50): Promise<number> {
        let runs = 0;
        while (runs < limit && await this.runNext()) {
            runs += 1;
        }
        return runs;
    }
}
