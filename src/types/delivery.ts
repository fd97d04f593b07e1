// ── Webhook payloads ────────────────────────────────────────────────────────

export interface AttachmentPayload {
    filename: string;
    mime_type: string;
    size_bytes: number;
    /** Base64 file content; `null` for files over the inline limit. */
    data_base64: string | null;
    url: string | null;
}

export interface MessageReceivedPayload {
    event: 'message.received';
    phone: string;
    text: string;
    received_at: string;
    message_id: string;
    is_imessage: boolean;
    attachments: AttachmentPayload[];
}

export type StatusEventName = 'message.delivered' | 'message.read';

export interface StatusPayload {
    event: StatusEventName;
    phone: string;
    message_id: string;
    timestamp: string;
    is_imessage: boolean;
}

export type WebhookPayload = MessageReceivedPayload | StatusPayload;

export function isStatusPayload(payload: WebhookPayload): payload is StatusPayload {
    return payload.event !== 'message.received';
}

// ── Delivery ────────────────────────────────────────────────────────────────

/** Transport to the remote service. Never throws: failures come back as `false`. */
export interface DeliveryGateway {
    deliver(payload: WebhookPayload): Promise<boolean>;
    healthCheck(): Promise<boolean>;
}

/** A failed webhook waiting for its next attempt. */
export interface QueuedDelivery {
    readonly id: string;
    readonly payload: WebhookPayload;
    readonly createdAt: Date;
    attempts: number;
    nextRetryAt: Date;
}

/** Snapshot returned by the retry queue for health reporting. */
export interface QueueStats {
    size: number;
    maxSize: number;
    running: boolean;
    /** Age of the oldest queued entry in seconds, `null` when empty. */
    oldestAgeSeconds: number | null;
    /** Number of entries per attempt count. */
    attemptHistogram: Record<number, number>;
}

export type ForwardOutcome = 'delivered' | 'queued' | 'dropped';

/** One forwarding attempt made directly from the watcher path. */
export interface ForwardRecord {
    id: string;
    event: WebhookPayload['event'];
    messageId: string;
    outcome: ForwardOutcome;
    durationMs: number;
    recordedAt: string;
}

export interface ForwardingMetrics {
    totalDelivered: number;
    totalQueued: number;
    totalDropped: number;
    /** Share of forwards accepted on the first try, 0..1. */
    firstTryRate: number;
    lastForwardedAt: string | null;
    recentRecords: ForwardRecord[];
}
