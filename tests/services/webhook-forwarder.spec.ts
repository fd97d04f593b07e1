import { describe, expect, it, vi } from 'vitest';
import { DeliveryTracker } from '../../src/services/delivery-tracker.js';
import { statusDeliveryId, WebhookForwarder, type RetrySink } from '../../src/services/webhook-forwarder.js';
import type { DeliveryGateway, WebhookPayload } from '../../src/types/delivery.js';
import type { InboundMessage, StatusUpdate } from '../../src/types/messaging.js';

const message: InboundMessage = {
    id: 1,
    externalId: 'guid-1',
    sender: '+15551234567',
    body: 'hello',
    receivedAt: new Date('2025-01-01T00:00:00.000Z'),
    isOwnMessage: false,
    channelKind: 'imessage',
    attachments: [],
};

const update: StatusUpdate = {
    externalId: 'guid-2',
    recipient: '+15551234567',
    kind: 'read',
    timestamp: new Date('2025-01-01T00:01:00.000Z'),
    channelKind: 'imessage',
};

function setup(delivered: boolean, accepted = true) {
    const deliver = vi.fn<(payload: WebhookPayload) => Promise<boolean>>().mockResolvedValue(delivered);
    const gateway: DeliveryGateway = { deliver, healthCheck: vi.fn(async () => true) };
    const enqueue = vi.fn<RetrySink['enqueue']>().mockReturnValue(accepted);
    const metrics = new DeliveryTracker();
    const forwarder = new WebhookForwarder(gateway, { enqueue }, metrics);
    return { deliver, enqueue, metrics, forwarder };
}

describe('WebhookForwarder', () => {
    it('delivers directly when the remote accepts', async () => {
        const { deliver, enqueue, metrics, forwarder } = setup(true);

        await expect(forwarder.forwardMessage(message)).resolves.toBe('delivered');

        expect(deliver).toHaveBeenCalledWith(expect.objectContaining({ event: 'message.received', message_id: 'guid-1' }));
        expect(enqueue).not.toHaveBeenCalled();
        expect(metrics.getMetrics().totalDelivered).toBe(1);
    });

    it('queues inbound messages under their guid when delivery fails', async () => {
        const { enqueue, forwarder } = setup(false);

        await expect(forwarder.forwardMessage(message)).resolves.toBe('queued');

        expect(enqueue).toHaveBeenCalledWith('guid-1', expect.objectContaining({ text: 'hello' }));
    });

    it('queues status events under guid and kind', async () => {
        const { enqueue, forwarder } = setup(false);

        await expect(forwarder.forwardStatus(update)).resolves.toBe('queued');

        expect(statusDeliveryId(update)).toBe('guid-2:read');
        expect(enqueue).toHaveBeenCalledWith('guid-2:read', expect.objectContaining({ event: 'message.read' }));
    });

    it('reports a drop when the queue is full', async () => {
        const { metrics, forwarder } = setup(false, false);

        await expect(forwarder.forwardStatus(update)).resolves.toBe('dropped');
        expect(metrics.getMetrics().totalDropped).toBe(1);
    });
});
