import { describe, expect, it, vi, type Mock } from 'vitest';
import type { RemoteConfig } from '../../src/config/json-config.js';
import { WebhookClient, type FetchLike } from '../../src/services/webhook-client.js';
import type { MessageReceivedPayload, StatusPayload } from '../../src/types/delivery.js';

const settings: RemoteConfig = {
    baseUrl: 'https://hooks.example.test/',
    clientId: 'client 1',
    webhookSecret: 'test-secret',
    timeoutMs: 1_000,
    webhookPath: '/webhooks/iphone-bridge/',
};

const messagePayload: MessageReceivedPayload = {
    event: 'message.received',
    phone: '+15551234567',
    text: 'hello',
    received_at: '2025-01-01T00:00:00.000Z',
    message_id: 'guid-1',
    is_imessage: true,
    attachments: [],
};

const statusPayload: StatusPayload = {
    event: 'message.read',
    phone: '+15551234567',
    message_id: 'guid-1',
    timestamp: '2025-01-01T00:01:00.000Z',
    is_imessage: true,
};

function respondWith(status: number, body = ''): Mock<FetchLike> {
    return vi.fn<FetchLike>(async () => new Response(body, { status }));
}

describe('WebhookClient', () => {
    it('builds route urls from the base url, webhook path and encoded client id', () => {
        const client = new WebhookClient(settings, { fetchImpl: respondWith(200) });

        expect(client.buildUrl('message')).toBe('https://hooks.example.test/webhooks/iphone-bridge/client%201/message');
        expect(client.buildUrl('health')).toBe('https://hooks.example.test/webhooks/iphone-bridge/client%201/health');
    });

    it('posts inbound messages with the secret header and a JSON body', async () => {
        const fetchImpl = respondWith(200);
        const client = new WebhookClient(settings, { fetchImpl });

        await expect(client.deliver(messagePayload)).resolves.toBe(true);

        const call = fetchImpl.mock.calls[0];
        const url = call?.[0];
        const init = call?.[1];
        expect(url).toBe('https://hooks.example.test/webhooks/iphone-bridge/client%201/message');
        expect(init).toMatchObject({
            method: 'POST',
            headers: {
                'X-Bridge-Secret': 'test-secret',
                'User-Agent': 'imessage-bridge/0.1.0',
                'Content-Type': 'application/json',
            },
        });
        expect(JSON.parse(String(init?.body))).toEqual(messagePayload);
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('routes status events to the status endpoint', async () => {
        const fetchImpl = respondWith(200);
        const client = new WebhookClient(settings, { fetchImpl });

        await client.deliver(statusPayload);

        expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://hooks.example.test/webhooks/iphone-bridge/client%201/status');
    });

    it('treats any status other than 200 as a failure', async () => {
        await expect(new WebhookClient(settings, { fetchImpl: respondWith(202) }).deliver(messagePayload)).resolves.toBe(false);
        await expect(new WebhookClient(settings, { fetchImpl: respondWith(500, 'boom') }).deliver(messagePayload)).resolves.toBe(false);
    });

    it('reports transport errors and timeouts as failures', async () => {
        const refused = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));
        const timedOut = vi.fn<FetchLike>().mockRejectedValue(Object.assign(new Error('The operation timed out.'), { name: 'TimeoutError' }));

        await expect(new WebhookClient(settings, { fetchImpl: refused }).deliver(messagePayload)).resolves.toBe(false);
        await expect(new WebhookClient(settings, { fetchImpl: timedOut }).deliver(messagePayload)).resolves.toBe(false);
    });

    it('does not call the remote without a client id', async () => {
        const fetchImpl = respondWith(200);
        const client = new WebhookClient({ ...settings, clientId: '  ' }, { fetchImpl });

        expect(client.buildUrl('message')).toBeNull();
        await expect(client.deliver(messagePayload)).resolves.toBe(false);
        await expect(client.healthCheck()).resolves.toBe(false);
        expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('probes the health route with GET', async () => {
        const fetchImpl = respondWith(200);

        await expect(new WebhookClient(settings, { fetchImpl }).healthCheck()).resolves.toBe(true);
        expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://hooks.example.test/webhooks/iphone-bridge/client%201/health');
        expect(fetchImpl.mock.calls[0]?.[1]).toMatchObject({ method: 'GET' });
    });

    it('reports an unhealthy remote', async () => {
        await expect(new WebhookClient(settings, { fetchImpl: respondWith(503) }).healthCheck()).resolves.toBe(false);
    });
});
