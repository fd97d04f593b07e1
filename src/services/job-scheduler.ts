import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type { JobConfig, JobSnapshot, JobStatus } from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    inFlight: boolean;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    skippedTicks: number;
}

/**
 * Named repeating background jobs on top of `node-cron`.
 *
 * A tick that fires while the previous run of the same job is still awaiting
 * is skipped, so a slow handler never runs concurrently with itself.
 *
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'retry-queue-sweep',
 *   cronExpression: '* * * * * *',
 *   description: 'Redeliver due webhooks',
 *   handler: () => queue.processQueue(),
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();

    /** Register a new repeating job. Throws if the id is taken or the expression is invalid. */
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
            inFlight: false,
            lastRunAt: null,
            lastError: null,
            runCount: 0,
            skippedTicks: 0,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    /** Unregister and stop a job by ID. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /** Run a job's handler now, outside its schedule. Resolves once the run completes. */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#executeJob(entry);
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            if (entry.task) {
                entry.task.stop();
                entry.task = null;
                entry.status = 'stopped';
            }
        }
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            runCount: entry.runCount,
            skippedTicks: entry.skippedTicks,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, async () => {
            await this.#executeJob(entry);
        });

        entry.status = 'idle';
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        if (entry.inFlight) {
            entry.skippedTicks += 1;
            return;
        }

        entry.inFlight = true;
        entry.status = 'running';
        entry.lastRunAt = new Date();
        entry.runCount += 1;

        try {
            await config.handler();
            entry.status = 'idle';
            entry.lastError = null;
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;
            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`, 'error');
        } finally {
            entry.inFlight = false;
        }
    }
}
