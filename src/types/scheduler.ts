/** Status of a registered scheduled job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a new repeating job. */
export interface JobConfig {
    /** Unique identifier for this job (e.g. 'retry-queue-sweep'). */
    id: string;
    /** A cron expression defining the schedule (node-cron format, seconds field allowed). */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /**
     * If true, the job will start immediately upon registration.
     * @default true
     */
    autoStart?: boolean;
}

/** Read-only snapshot of a registered job's state. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    /** Ticks dropped because the previous run had not finished. */
    skippedTicks: number;
}
