import { logThought } from '../utils/logger.js';
import { computeBackoffDelay } from '../utils/retry.js';
import type { JobScheduler } from './job-scheduler.js';
import type { DeliveryGateway, QueuedDelivery, QueueStats, WebhookPayload } from '../types/delivery.js';

export interface QueueServiceOptions {
    maxSize?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    maxAttempts?: number;
    backoffFactor?: number;
    jitterRatio?: number;
    sweepCron?: string; // Ex: '* * * * * *' (every second)
    now?: () => Date;
    random?: () => number;
}

export const QUEUE_SWEEP_JOB_ID = 'retry-queue-sweep';

const DEFAULTS = {
    maxSize: 1000,
    baseDelayMs: 5_000,
    maxDelayMs: 300_000,
    maxAttempts: 10,
    backoffFactor: 2,
    jitterRatio: 0.2,
    sweepCron: '* * * * * *', // Every second
};

/**
 * In-memory retry queue for webhooks the remote service did not accept.
 *
 * A scheduler job sweeps the queue every second and redelivers each entry
 * whose `nextRetryAt` has passed. Entries leave the queue on success or
 * once `maxAttempts` failed retries have been made. Nothing survives a restart.
 */
export class QueueService {
    readonly #gateway: DeliveryGateway;
    readonly #scheduler: JobScheduler;
    readonly #maxSize: number;
    readonly #maxAttempts: number;
    readonly #backoff: { baseDelayMs: number; maxDelayMs: number; backoffFactor: number; jitterRatio: number };
    readonly #sweepCron: string;
    readonly #now: () => Date;
    readonly #random: () => number;
    readonly #entries: Map<string, QueuedDelivery> = new Map();
    #running = false;
    #sweeping: Promise<void> | null = null;

    constructor(gateway: DeliveryGateway, scheduler: JobScheduler, options: QueueServiceOptions = {}) {
        this.#gateway = gateway;
        this.#scheduler = scheduler;
        this.#maxSize = options.maxSize ?? DEFAULTS.maxSize;
        this.#maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
        this.#backoff = {
            baseDelayMs: options.baseDelayMs ?? DEFAULTS.baseDelayMs,
            maxDelayMs: options.maxDelayMs ?? DEFAULTS.maxDelayMs,
            backoffFactor: options.backoffFactor ?? DEFAULTS.backoffFactor,
            jitterRatio: options.jitterRatio ?? DEFAULTS.jitterRatio,
        };
        this.#sweepCron = options.sweepCron ?? DEFAULTS.sweepCron;
        this.#now = options.now ?? (() => new Date());
        this.#random = options.random ?? Math.random;
    }

    get size(): number {
        return this.#entries.size;
    }

    get isRunning(): boolean {
        return this.#running;
    }

    start(): void {
        if (this.#running) return;

        this.#scheduler.register({
            id: QUEUE_SWEEP_JOB_ID,
            cronExpression: this.#sweepCron,
            description: 'Redeliver queued webhooks whose retry time has passed',
            handler: async () => {
                await this.processQueue();
            },
            autoStart: true,
        });
        this.#running = true;
        void logThought(`[RetryQueue] Started (capacity ${this.#maxSize}, max attempts ${this.#maxAttempts}).`);
    }

    /** Stop sweeping. Resolves once an in-progress sweep has finished. */
    async stop(): Promise<void> {
        if (!this.#running) return;

        this.#scheduler.unregister(QUEUE_SWEEP_JOB_ID);
        this.#running = false;
        if (this.#sweeping) {
            await this.#sweeping;
        }
        void logThought(`[RetryQueue] Stopped with ${this.#entries.size} entr${this.#entries.size === 1 ? 'y' : 'ies'} queued.`);
    }

    /**
     * Queue a payload for retry. Returns `false` only when the queue is full.
     * An id that is already queued keeps its original payload.
     */
    enqueue(id: string, payload: WebhookPayload): boolean {
        if (this.#entries.has(id)) {
            void logThought(`[RetryQueue] ${id} is already queued.`, 'debug');
            return true;
        }

        if (this.#entries.size >= this.#maxSize) {
            void logThought(`[RetryQueue] Queue full (${this.#maxSize}); dropping ${id}.`, 'error');
            return false;
        }

        const now = this.#now();
        this.#entries.set(id, {
            id,
            payload,
            createdAt: now,
            attempts: 0,
            nextRetryAt: new Date(now.getTime() + computeBackoffDelay(0, this.#backoff, this.#random)),
        });
        void logThought(`[RetryQueue] Queued ${id} (${this.#entries.size}/${this.#maxSize}).`);
        return true;
    }

    get(id: string): QueuedDelivery | undefined {
        return this.#entries.get(id);
    }

    /** Deliver every due entry once. Overlapping calls share the running sweep. */
    processQueue(): Promise<void> {
        if (!this.#sweeping) {
            this.#sweeping = this.#sweep().finally(() => {
                this.#sweeping = null;
            });
        }
        return this.#sweeping;
    }

    getStats(): QueueStats {
        const now = this.#now().getTime();
        const attemptHistogram: Record<number, number> = {};
        let oldest: number | null = null;

        for (const entry of this.#entries.values()) {
            attemptHistogram[entry.attempts] = (attemptHistogram[entry.attempts] ?? 0) + 1;
            const created = entry.createdAt.getTime();
            if (oldest === null || created < oldest) {
                oldest = created;
            }
        }

        return {
            size: this.#entries.size,
            maxSize: this.#maxSize,
            running: this.#running,
            oldestAgeSeconds: oldest === null ? null : Math.max(0, (now - oldest) / 1000),
            attemptHistogram,
        };
    }

    async #sweep(): Promise<void> {
        const now = this.#now().getTime();
        const due = [...this.#entries.values()].filter((entry) => entry.nextRetryAt.getTime() <= now);

        for (const entry of due) {
            await this.#attempt(entry);
        }
    }

    async #attempt(entry: QueuedDelivery): Promise<void> {
        let delivered = false;
        let lastError = 'remote did not accept the payload';

        try {
            delivered = await this.#gateway.deliver(entry.payload);
        } catch (err) {
            lastError = err instanceof Error ? err.message : String(err);
        }

        if (delivered) {
            this.#entries.delete(entry.id);
            void logThought(`[RetryQueue] Delivered ${entry.id} after ${entry.attempts + 1} retr${entry.attempts === 0 ? 'y' : 'ies'}.`);
            return;
        }

        entry.attempts += 1;
        if (entry.attempts >= this.#maxAttempts) {
            this.#entries.delete(entry.id);
            void logThought(
                `[RetryQueue] Dropping ${entry.id} after ${entry.attempts} failed attempts. Last error: ${lastError}`,
                'error',
            );
            return;
        }

        const delayMs = computeBackoffDelay(entry.attempts, this.#backoff, this.#random);
        entry.nextRetryAt = new Date(this.#now().getTime() + delayMs);
        void logThought(
            `[RetryQueue] ${entry.id} failed attempt ${entry.attempts}/${this.#maxAttempts}: ${lastError}. ` +
                `Retrying at ${entry.nextRetryAt.toISOString()}.`,
            'warn',
        );
    }
}
