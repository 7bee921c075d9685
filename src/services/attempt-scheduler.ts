import type { AttemptHandler, AttemptScheduler, ScheduledAttempt } from '../types/messaging.js';
import { errorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/**
 * In-process {@link AttemptScheduler} on `setTimeout`.
 *
 * An attempt never fires before its delay; it may fire later under load. Attempts that come due
 * before {@link start} wait in a backlog and run once a handler is attached. Pending timers do
 * not survive a restart: use the durable queue when that matters.
 */
export class TimerAttemptScheduler implements AttemptScheduler {
    readonly #timers: Set<NodeJS.Timeout> = new Set();
    readonly #backlog: ScheduledAttempt[] = [];
    #handler: AttemptHandler | null = null;

    async schedule(attempt: ScheduledAttempt, delayMs: number): Promise<void> {
        const timer = setTimeout(() => {
            this.#timers.delete(timer);
            this.#fire(attempt);
        }, Math.max(0, delayMs));
        timer.unref();
        this.#timers.add(timer);
    }

    start(handler: AttemptHandler): void {
        this.#handler = handler;
        const ready = this.#backlog.splice(0);
        for (const attempt of ready) {
            this.#fire(attempt);
        }
    }

    /** Cancel every pending timer and detach the handler. */
    stop(): void {
        for (const timer of this.#timers) {
            clearTimeout(timer);
        }
        this.#timers.clear();
        this.#handler = null;
    }

    /** Timers not yet fired plus attempts waiting for a handler. */
    get pendingCount(): number {
        return this.#timers.size + this.#backlog.length;
    }

    #fire(attempt: ScheduledAttempt): void {
        const handler = this.#handler;
        if (!handler) {
            this.#backlog.push(attempt);
            return;
        }

        handler(attempt).catch((err: unknown) => {
            console.error(`[TimerAttemptScheduler] Attempt for message '${attempt.messageId}' failed:`, err);
            void logThought(
                `[TimerAttemptScheduler] Attempt for message '${attempt.messageId}' failed: ${errorMessage(err)}`,
            );
        });
    }
}
