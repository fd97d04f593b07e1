import { randomBytes } from 'node:crypto';
import { logThought } from '../utils/logger.js';
import { BRIDGE_VERSION } from '../version.js';
import type { AppContext } from './context.js';
import type { HealthData, StatusData } from '../types/api.js';
import type { SendResponse } from '../types/messaging.js';

/** Id handed back for a successful send; Messages itself assigns none. */
export function createOutboundMessageId(): string {
    return `bridge-${randomBytes(6).toString('hex')}`;
}

/**
 * Lifecycle of one bridge process: the watcher loop, the retry sweep and the
 * outbound send path, all sharing one {@link AppContext}.
 */
export class BridgeRuntime {
    readonly #ctx: AppContext;

    constructor(ctx: AppContext) {
        this.#ctx = ctx;
    }

    get context(): AppContext {
        return this.#ctx;
    }

    async start(): Promise<void> {
        const { config, configReport, queue, watcher, gateway } = this.#ctx;

        for (const issue of configReport.issues) {
            const level = issue.class === 'insecure_default' ? 'warn' : 'error';
            void logThought(`[Bridge] Config ${issue.class} (${issue.key}): ${issue.message} ${issue.remediation}`, level);
        }

        queue.start();
        watcher.start(!config.watcher.processHistorical);

        if (await gateway.healthCheck()) {
            void logThought(`[Bridge] Connected to remote service at ${config.remote.baseUrl}.`);
        } else {
            void logThought(
                `[Bridge] Could not reach remote service at ${config.remote.baseUrl}. ` +
                    'Failed deliveries will be queued until it is reachable.',
                'warn',
            );
        }
    }

    async stop(): Promise<void> {
        await this.#ctx.watcher.stop();
        await this.#ctx.queue.stop();
        this.#ctx.scheduler.stopAll();
        void logThought('[Bridge] Stopped.');
    }

    /** Send through Messages and follow the message for receipts on success. */
    async sendMessage(phone: string, text: string): Promise<SendResponse> {
        void logThought(`[Bridge] Send request to ${phone}: ${text.slice(0, 50)}`);
        const result = await this.#ctx.sender.send(phone, text);

        if (result.status !== 'success') {
            return { success: false, error: result.reason };
        }

        this.#ctx.statusTracker.track(phone, text, 'imessage');
        return { success: true, messageId: createOutboundMessageId() };
    }

    getHealth(): HealthData {
        const watcherRunning = this.#ctx.watcher.isRunning;
        return {
            status: watcherRunning ? 'ok' : 'degraded',
            watcherRunning,
            uptimeSec: this.#uptimeSec(),
            version: BRIDGE_VERSION,
            queueSize: this.#ctx.queue.size,
        };
    }

    async getStatus(): Promise<StatusData> {
        const { config, configReport, watcher, gateway, queue, statusTracker, metrics, scheduler } = this.#ctx;

        return {
            bridge: {
                uptimeSec: this.#uptimeSec(),
                version: BRIDGE_VERSION,
                mockMode: config.mockMode,
            },
            watcher: {
                running: watcher.isRunning,
                lastCursor: watcher.lastCursor,
                pollIntervalSec: config.watcher.pollIntervalSec,
            },
            remote: {
                baseUrl: config.remote.baseUrl,
                clientIdConfigured: config.remote.clientId.trim().length > 0,
                connected: await gateway.healthCheck(),
            },
            queue: queue.getStats(),
            tracker: statusTracker.getStats(),
            forwarding: metrics.getMetrics(20),
            jobs: scheduler.listJobs(),
            config: configReport,
        };
    }

    #uptimeSec(): number {
        return Math.floor((Date.now() - this.#ctx.startedAt.getTime()) / 1000);
    }
}
