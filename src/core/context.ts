import { validateRuntimeConfig, type ConfigValidationResult } from '../config/env-validator.js';
import type { BridgeConfig } from '../config/json-config.js';
import { AppleScriptSender } from '../interfaces/applescript-sender.js';
import { MockSender } from '../interfaces/mock-sender.js';
import { DeliveryTracker } from '../services/delivery-tracker.js';
import { JobScheduler } from '../services/job-scheduler.js';
import { ChatDbWatcher } from '../services/message-watcher.js';
import { MockMessageWatcher } from '../services/mock-watcher.js';
import { QueueService } from '../services/queue-service.js';
import { StatusTracker } from '../services/status-tracker.js';
import { WebhookClient, type FetchLike } from '../services/webhook-client.js';
import { WebhookForwarder } from '../services/webhook-forwarder.js';
import type { DeliveryGateway } from '../types/delivery.js';
import type { InboundMessage, MessageWatcher, SendCapability } from '../types/messaging.js';

/**
 * Every long-lived component of one bridge process, built once at startup
 * and passed by reference to whatever needs it.
 */
export interface AppContext {
    config: BridgeConfig;
    configReport: ConfigValidationResult;
    scheduler: JobScheduler;
    gateway: DeliveryGateway;
    queue: QueueService;
    metrics: DeliveryTracker;
    forwarder: WebhookForwarder;
    statusTracker: StatusTracker;
    watcher: MessageWatcher;
    /** Set in mock mode, where messages are injected instead of read from chat.db. */
    mockWatcher: MockMessageWatcher | null;
    sender: SendCapability;
    startedAt: Date;
}

export interface AppContextOverrides {
    gateway?: DeliveryGateway;
    sender?: SendCapability;
    fetchImpl?: FetchLike;
    scheduler?: JobScheduler;
    env?: NodeJS.ProcessEnv;
    now?: () => Date;
}

export function createAppContext(config: BridgeConfig, overrides: AppContextOverrides = {}): AppContext {
    const now = overrides.now ?? (() => new Date());
    const scheduler = overrides.scheduler ?? new JobScheduler();
    const gateway = overrides.gateway ?? new WebhookClient(config.remote, { fetchImpl: overrides.fetchImpl });
    const queue = new QueueService(gateway, scheduler, { ...config.queue, now });
    const metrics = new DeliveryTracker(now);
    const forwarder = new WebhookForwarder(gateway, queue, metrics);

    const statusTracker = new StatusTracker({
        now,
        onStatusChange: async (update) => {
            await forwarder.forwardStatus(update);
        },
    });

    const onMessage = async (message: InboundMessage): Promise<void> => {
        await forwarder.forwardMessage(message);
    };

    let watcher: MessageWatcher;
    let mockWatcher: MockMessageWatcher | null = null;
    if (config.mockMode) {
        mockWatcher = new MockMessageWatcher(onMessage);
        watcher = mockWatcher;
    } else {
        watcher = new ChatDbWatcher({
            onMessage,
            dbPath: config.watcher.chatDbPath,
            pollIntervalSec: config.watcher.pollIntervalSec,
            missingStoreBackoffMs: config.watcher.missingStoreBackoffMs,
            statusTracker,
        });
    }

    const sender = overrides.sender ?? (config.mockMode ? new MockSender() : new AppleScriptSender());

    return {
        config,
        configReport: validateRuntimeConfig(config, overrides.env ?? process.env, now),
        scheduler,
        gateway,
        queue,
        metrics,
        forwarder,
        statusTracker,
        watcher,
        mockWatcher,
        sender,
        startedAt: now(),
    };
}
