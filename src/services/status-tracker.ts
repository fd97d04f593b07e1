import { fromOptionalStoreTimestamp, toStoreTimestamp } from '../utils/apple-time.js';
import { logThought } from '../utils/logger.js';
import { normalizePhone, phonesMatch } from '../utils/phone.js';
import type { ReceiptSource } from './chat-db.js';
import type { StatusCheck } from './message-watcher.js';
import type {
    ChannelKind,
    StatusCallback,
    StatusKind,
    StatusUpdate,
    TrackedOutbound,
} from '../types/messaging.js';

export interface StatusTrackerOptions {
    onStatusChange?: StatusCallback | null;
    now?: () => Date;
    trackingWindowMs?: number;
    /** How far before `sentAt` a store row may be dated and still match. */
    matchBeforeMs?: number;
    /** How far after `sentAt` a store row may be dated and still match. */
    matchAfterMs?: number;
    candidateLimit?: number;
}

export interface StatusTrackerStats {
    tracking: number;
    pendingResolution: number;
    totalTracked: number;
    totalResolved: number;
    totalDelivered: number;
    totalRead: number;
    totalExpired: number;
    lastResolvedAt: string | null;
    lastStatusAt: string | null;
}

const DEFAULTS = {
    trackingWindowMs: 24 * 60 * 60 * 1000,
    matchBeforeMs: 30_000,
    matchAfterMs: 60_000,
    candidateLimit: 10,
};

/**
 * Follows sent messages until Messages reports them delivered and read.
 *
 * A send through Messages yields no identifier, so each tracked send is bound
 * to the newest own-message row addressed to the same recipient within
 * `[sentAt - matchBefore, sentAt + matchAfter]`. Two sends to one recipient
 * inside that window can bind to the same row; the first match wins.
 */
export class StatusTracker implements StatusCheck {
    readonly #onStatusChange: StatusCallback | null;
    readonly #now: () => Date;
    readonly #trackingWindowMs: number;
    readonly #matchBeforeMs: number;
    readonly #matchAfterMs: number;
    readonly #candidateLimit: number;

    #tracked: TrackedOutbound[] = [];
    #totals = { tracked: 0, resolved: 0, delivered: 0, read: 0, expired: 0 };
    #lastResolvedAt: Date | null = null;
    #lastStatusAt: Date | null = null;

    constructor(options: StatusTrackerOptions = {}) {
        this.#onStatusChange = options.onStatusChange ?? null;
        this.#now = options.now ?? (() => new Date());
        this.#trackingWindowMs = options.trackingWindowMs ?? DEFAULTS.trackingWindowMs;
        this.#matchBeforeMs = options.matchBeforeMs ?? DEFAULTS.matchBeforeMs;
        this.#matchAfterMs = options.matchAfterMs ?? DEFAULTS.matchAfterMs;
        this.#candidateLimit = options.candidateLimit ?? DEFAULTS.candidateLimit;
    }

    get trackingCount(): number {
        return this.#tracked.length;
    }

    /** Start following a sent message. SMS carries no receipts and is ignored. */
    track(recipient: string, bodyText: string, channelKind: ChannelKind = 'imessage'): void {
        if (channelKind === 'sms') {
            void logThought(`[StatusTracker] Not tracking SMS to ${recipient}: no delivery receipts on this channel.`, 'debug');
            return;
        }

        this.#tracked.push({
            recipient: normalizePhone(recipient),
            bodyText,
            sentAt: this.#now(),
            channelKind,
            resolvedExternalId: null,
            deliveredAt: null,
            readAt: null,
        });
        this.#totals.tracked += 1;
        void logThought(`[StatusTracker] Tracking message to ${recipient} for delivery status.`, 'debug');
    }

    /**
     * Run one reconciliation pass on the watcher's open connection.
     *
     * Returns the transitions first observed in this pass, delivered before
     * read for the same message.
     */
    async checkStatusUpdates(source: ReceiptSource): Promise<StatusUpdate[]> {
        this.#collectGarbage();
        if (this.#tracked.length === 0) return [];

        this.#resolvePending(source);

        const guids = [
            ...new Set(this.#tracked.flatMap((entry) => (entry.resolvedExternalId ? [entry.resolvedExternalId] : []))),
        ];
        if (guids.length === 0) return [];

        const updates: StatusUpdate[] = [];
        for (const row of source.fetchReceipts(guids)) {
            const entry = this.#tracked.find((candidate) => candidate.resolvedExternalId === row.guid);
            if (!entry) continue;

            const deliveredAt = fromOptionalStoreTimestamp(row.date_delivered);
            if (deliveredAt && !entry.deliveredAt) {
                entry.deliveredAt = deliveredAt;
                await this.#emit(updates, entry, row.guid, 'delivered', deliveredAt);
            }

            const readAt = fromOptionalStoreTimestamp(row.date_read);
            if (readAt && !entry.readAt) {
                entry.readAt = readAt;
                await this.#emit(updates, entry, row.guid, 'read', readAt);
                this.#tracked = this.#tracked.filter((candidate) => candidate.resolvedExternalId !== row.guid);
            }
        }

        return updates;
    }

    getStats(): StatusTrackerStats {
        return {
            tracking: this.#tracked.length,
            pendingResolution: this.#tracked.filter((entry) => entry.resolvedExternalId === null).length,
            totalTracked: this.#totals.tracked,
            totalResolved: this.#totals.resolved,
            totalDelivered: this.#totals.delivered,
            totalRead: this.#totals.read,
            totalExpired: this.#totals.expired,
            lastResolvedAt: this.#lastResolvedAt?.toISOString() ?? null,
            lastStatusAt: this.#lastStatusAt?.toISOString() ?? null,
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #collectGarbage(): void {
        const cutoff = this.#now().getTime() - this.#trackingWindowMs;
        const before = this.#tracked.length;
        this.#tracked = this.#tracked.filter((entry) => entry.sentAt.getTime() > cutoff);

        const removed = before - this.#tracked.length;
        if (removed > 0) {
            this.#totals.expired += removed;
            void logThought(`[StatusTracker] Dropped ${removed} tracked message(s) older than the tracking window.`, 'debug');
        }
    }

    #resolvePending(source: ReceiptSource): void {
        for (const entry of this.#tracked) {
            if (entry.resolvedExternalId !== null) continue;

            const sentAtMs = entry.sentAt.getTime();
            const candidates = source.findOutboundCandidates(
                toStoreTimestamp(new Date(sentAtMs - this.#matchBeforeMs)),
                toStoreTimestamp(new Date(sentAtMs + this.#matchAfterMs)),
                this.#candidateLimit,
            );
            const match = candidates.find((candidate) => phonesMatch(entry.recipient, candidate.handle_id ?? ''));
            if (!match) continue;

            // Receipts already present at bind time are known state, not transitions.
            entry.resolvedExternalId = match.guid;
            entry.deliveredAt = fromOptionalStoreTimestamp(match.date_delivered);
            entry.readAt = fromOptionalStoreTimestamp(match.date_read);
            this.#totals.resolved += 1;
            this.#lastResolvedAt = this.#now();
            void logThought(`[StatusTracker] Resolved message to ${entry.recipient} as ${match.guid}.`, 'debug');
        }

        this.#tracked = this.#tracked.filter((entry) => entry.readAt === null);
    }

    async #emit(
        updates: StatusUpdate[],
        entry: TrackedOutbound,
        externalId: string,
        kind: StatusKind,
        timestamp: Date,
    ): Promise<void> {
        const update: StatusUpdate = {
            externalId,
            recipient: entry.recipient,
            kind,
            timestamp,
            channelKind: entry.channelKind,
        };
        updates.push(update);
        this.#totals[kind] += 1;
        this.#lastStatusAt = this.#now();
        void logThought(`[StatusTracker] Message ${externalId.slice(0, 8)}... ${kind} (${entry.recipient}).`);

        if (!this.#onStatusChange) return;
        try {
            await this.#onStatusChange(update);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            void logThought(`[StatusTracker] Status callback failed for ${externalId}: ${reason}`, 'error');
        }
    }
}
