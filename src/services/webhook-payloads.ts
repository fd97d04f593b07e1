import { readFile, stat } from 'node:fs/promises';
import { logThought } from '../utils/logger.js';
import type { Attachment, InboundMessage, StatusUpdate } from '../types/messaging.js';
import type { AttachmentPayload, MessageReceivedPayload, StatusPayload } from '../types/delivery.js';

/** Files up to this size travel inline as base64. */
export const MAX_INLINE_ATTACHMENT_BYTES = 5 * 1024 * 1024;

/**
 * Read an attachment for the webhook body. Oversized files are described
 * without content; unreadable files yield `null`.
 */
export async function encodeAttachment(
    attachment: Attachment,
    maxInlineBytes: number = MAX_INLINE_ATTACHMENT_BYTES,
): Promise<AttachmentPayload | null> {
    try {
        const info = await stat(attachment.absolutePath);
        const sizeBytes = attachment.sizeBytes || info.size;
        const base = {
            filename: attachment.filename,
            mime_type: attachment.mimeType,
            size_bytes: sizeBytes,
            url: null,
        };

        if (info.size > maxInlineBytes) {
            void logThought(`[Payloads] Attachment ${attachment.filename} (${info.size} bytes) too large to inline.`);
            return { ...base, data_base64: null };
        }

        const content = await readFile(attachment.absolutePath);
        return { ...base, data_base64: content.toString('base64') };
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        void logThought(`[Payloads] Skipping attachment ${attachment.absolutePath}: ${reason}`, 'warn');
        return null;
    }
}

export async function buildMessageReceivedPayload(message: InboundMessage): Promise<MessageReceivedPayload> {
    const encoded = await Promise.all(message.attachments.map((attachment) => encodeAttachment(attachment)));

    return {
        event: 'message.received',
        phone: message.sender,
        text: message.body,
        received_at: message.receivedAt.toISOString(),
        message_id: message.externalId,
        is_imessage: message.channelKind === 'imessage',
        attachments: encoded.filter((payload): payload is AttachmentPayload => payload !== null),
    };
}

export function buildStatusPayload(update: StatusUpdate): StatusPayload {
    return {
        event: update.kind === 'delivered' ? 'message.delivered' : 'message.read',
        phone: update.recipient,
        message_id: update.externalId,
        timestamp: update.timestamp.toISOString(),
        is_imessage: update.channelKind === 'imessage',
    };
}
