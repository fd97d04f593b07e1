import { logThought } from '../utils/logger.js';
import { buildMessageReceivedPayload, buildStatusPayload } from './webhook-payloads.js';
import type { DeliveryTracker } from './delivery-tracker.js';
import type { QueueService } from './queue-service.js';
import type { InboundMessage, StatusUpdate } from '../types/messaging.js';
import type { DeliveryGateway, ForwardOutcome, WebhookPayload } from '../types/delivery.js';

export type RetrySink = Pick<QueueService, 'enqueue'>;

/** Queue key of a status event: one entry per message and transition. */
export function statusDeliveryId(update: StatusUpdate): string {
    return `${update.externalId}:${update.kind}`;
}

/**
 * Watcher and tracker callbacks: try the gateway once, hand failures to the
 * retry queue.
 */
export class WebhookForwarder {
    readonly #gateway: DeliveryGateway;
    readonly #queue: RetrySink;
    readonly #metrics: DeliveryTracker;

    constructor(gateway: DeliveryGateway, queue: RetrySink, metrics: DeliveryTracker) {
        this.#gateway = gateway;
        this.#queue = queue;
        this.#metrics = metrics;
    }

    async forwardMessage(message: InboundMessage): Promise<ForwardOutcome> {
        const payload = await buildMessageReceivedPayload(message);
        const suffix = payload.attachments.length > 0 ? ` with ${payload.attachments.length} attachment(s)` : '';
        void logThought(`[Forwarder] New message from ${message.sender}${suffix}.`);
        return this.#forward(message.externalId, payload);
    }

    async forwardStatus(update: StatusUpdate): Promise<ForwardOutcome> {
        return this.#forward(statusDeliveryId(update), buildStatusPayload(update));
    }

    async #forward(id: string, payload: WebhookPayload): Promise<ForwardOutcome> {
        const startedAt = Date.now();
        const delivered = await this.#gateway.deliver(payload);

        let outcome: ForwardOutcome;
        if (delivered) {
            outcome = 'delivered';
        } else if (this.#queue.enqueue(id, payload)) {
            outcome = 'queued';
            void logThought(`[Forwarder] ${payload.event} for ${payload.message_id} queued for retry.`, 'warn');
        } else {
            outcome = 'dropped';
        }

        this.#metrics.record(payload, outcome, Date.now() - startedAt);
        return outcome;
    }
}
