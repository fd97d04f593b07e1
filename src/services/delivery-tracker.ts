import { randomUUID } from 'node:crypto';
import type { ForwardOutcome, ForwardRecord, ForwardingMetrics, WebhookPayload } from '../types/delivery.js';
import { logThought } from '../utils/logger.js';

const MAX_HISTORY = 200;

/**
 * Forwarding telemetry for `/status`.
 *
 * Keeps an in-memory ring buffer of the last forwards with their outcome and
 * running totals that outlive the buffer.
 */
export class DeliveryTracker {
    readonly #records: ForwardRecord[] = [];
    readonly #now: () => Date;
    #totals: Record<ForwardOutcome, number> = { delivered: 0, queued: 0, dropped: 0 };

    constructor(now: () => Date = () => new Date()) {
        this.#now = now;
    }

    record(payload: WebhookPayload, outcome: ForwardOutcome, durationMs: number): ForwardRecord {
        const entry: ForwardRecord = {
            id: randomUUID(),
            event: payload.event,
            messageId: payload.message_id,
            outcome,
            durationMs: Math.max(0, Math.round(durationMs)),
            recordedAt: this.#now().toISOString(),
        };

        this.#records.push(entry);
        this.#totals[outcome] += 1;

        // Trim ring buffer
        if (this.#records.length > MAX_HISTORY) {
            this.#records.splice(0, this.#records.length - MAX_HISTORY);
        }

        if (outcome === 'dropped') {
            void logThought(`[DeliveryTracker] ${payload.event} for ${payload.message_id} was dropped.`, 'error');
        }

        return entry;
    }

    getMetrics(limit = 50): ForwardingMetrics {
        const total = this.#totals.delivered + this.#totals.queued + this.#totals.dropped;
        const last = this.#records[this.#records.length - 1];

        return {
            totalDelivered: this.#totals.delivered,
            totalQueued: this.#totals.queued,
            totalDropped: this.#totals.dropped,
            firstTryRate: total > 0 ? Math.round((this.#totals.delivered / total) * 100) / 100 : 0,
            lastForwardedAt: last?.recordedAt ?? null,
            recentRecords: this.#records.slice(-limit),
        };
    }
}
