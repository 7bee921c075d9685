import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type {
    JobConfig,
    JobSnapshot,
    JobStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    skippedCount: number;
    inFlight: Promise<void> | null;
}

/**
 * Named repeating background jobs on `node-cron`.
 *
 * Used by the durable attempt queue to poll for due attempts. A tick that lands while the
 * previous run of the same job is still in progress is skipped, so a slow poll never overlaps
 * itself.
 *
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'relay-attempt-queue',
 *   cronExpression: '* * * * * *',
 *   description: 'Run due send attempts',
 *   handler: () => queue.processDue(),
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Throws if the ID is taken or the cron expression is invalid. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            lastRunAt: null,
            lastError: null,
            runCount: 0,
            skippedCount: 0,
            inFlight: null,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    has(jobId: string): boolean {
        return this.#jobs.has(jobId);
    }

    start(jobId: string): void {
        this.#startJob(this.#require(jobId));
    }

    stop(jobId: string): void {
        this.#stopJob(this.#require(jobId));
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#stopJob(entry);
        }
    }

    /**
     * Run a job immediately, outside its cron cadence. Resolves once the run finishes;
     * if a run is already in flight, resolves with that one instead of starting another.
     */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#require(jobId);
        await (entry.inFlight ?? this.#executeJob(entry));
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    /** Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #require(jobId: string): RegisteredJob {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        return entry;
    }

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            runCount: entry.runCount,
            skippedCount: entry.skippedCount,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, () => {
            if (entry.inFlight) {
                entry.skippedCount += 1;
                this.#emit({ type: 'job:skipped', jobId: entry.config.id, timestamp: new Date() });
                return;
            }
            void this.#executeJob(entry);
        });

        entry.status = 'idle';
    }

    #stopJob(entry: RegisteredJob): void {
        if (entry.task) {
            entry.task.stop();
            entry.task = null;
            entry.status = 'stopped';
        }
    }

    #executeJob(entry: RegisteredJob): Promise<void> {
        const run = this.#runHandler(entry).finally(() => {
            entry.inFlight = null;
        });
        entry.inFlight = run;
        return run;
    }

    async #runHandler(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        entry.status = 'running';
        entry.lastRunAt = new Date();
        entry.runCount += 1;

        this.#emit({ type: 'job:start', jobId: config.id, timestamp: new Date() });

        try {
            await config.handler();
            entry.status = entry.task ? 'idle' : 'stopped';
            entry.lastError = null;

            this.#emit({ type: 'job:done', jobId: config.id, timestamp: new Date() });
        } catch (err: unknown) {
            const message = errorMessage(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Job '${config.id}' failed:`, message);
            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`);

            this.#emit({ type: 'job:error', jobId: config.id, timestamp: new Date(), error: message });
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
