export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** A named repeating job registered on the {@link JobScheduler}. */
export interface JobConfig {
    /** Unique identifier, e.g. 'relay-attempt-queue'. */
    id: string;
    /** node-cron expression; six fields enable second resolution. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /** @default true */
    autoStart?: boolean;
}

export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    skippedCount: number;
}

/**
 * - 'job:start'    before a handler runs.
 * - 'job:done'     after it resolves.
 * - 'job:error'    when it throws.
 * - 'job:skipped'  when a tick arrives while the previous run is still in progress.
 */
export type SchedulerEventType = 'job:start' | 'job:done' | 'job:error' | 'job:skipped';

export interface SchedulerEvent {
    type: SchedulerEventType;
    jobId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
