import { afterEach, describe, expect, it, vi } from 'vitest';
import { mergeWithDefaults } from '../../src/config/json-config.js';
import { BridgeRuntime, createOutboundMessageId } from '../../src/core/bridge.js';
import { createAppContext, type AppContext } from '../../src/core/context.js';
import { ChatDbWatcher } from '../../src/services/message-watcher.js';
import { MockMessageWatcher } from '../../src/services/mock-watcher.js';
import { QUEUE_SWEEP_JOB_ID } from '../../src/services/queue-service.js';
import { AppleScriptSender } from '../../src/interfaces/applescript-sender.js';
import { MockSender } from '../../src/interfaces/mock-sender.js';

describe('BridgeRuntime', () => {
    let context: AppContext | null = null;

    afterEach(() => {
        context?.scheduler.stopAll();
        context = null;
    });

    const gateway = () => ({
        deliver: vi.fn(async () => true),
        healthCheck: vi.fn(async () => false),
    });

    it('wires mock components in mock mode', () => {
        context = createAppContext(mergeWithDefaults({ mockMode: true }), { env: {} });

        expect(context.watcher).toBeInstanceOf(MockMessageWatcher);
        expect(context.mockWatcher).toBe(context.watcher);
        expect(context.sender).toBeInstanceOf(MockSender);
    });

    it('wires the chat.db watcher and AppleScript sender otherwise', () => {
        context = createAppContext(mergeWithDefaults({}), { env: {} });

        expect(context.watcher).toBeInstanceOf(ChatDbWatcher);
        expect(context.mockWatcher).toBeNull();
        expect(context.sender).toBeInstanceOf(AppleScriptSender);
        expect(context.configReport.fatalIssues.map((i) => i.key)).toEqual(['BRIDGE_CLIENT_ID']);
    });

    it('starts the watcher and retry sweep, and stops them again', async () => {
        const remote = gateway();
        context = createAppContext(
            mergeWithDefaults({ mockMode: true, remote: { clientId: 'client-1', webhookSecret: 'test-secret' } }),
            { gateway: remote, env: {} },
        );
        const runtime = new BridgeRuntime(context);

        await runtime.start();

        expect(context.watcher.isRunning).toBe(true);
        expect(context.queue.isRunning).toBe(true);
        expect(context.scheduler.getJob(QUEUE_SWEEP_JOB_ID)).toBeDefined();
        expect(remote.healthCheck).toHaveBeenCalledTimes(1);

        await runtime.stop();

        expect(context.watcher.isRunning).toBe(false);
        expect(context.queue.isRunning).toBe(false);
        expect(context.scheduler.listJobs()).toEqual([]);
    });

    it('routes status changes from the tracker to the remote', async () => {
        const remote = gateway();
        const sentAt = new Date('2025-01-01T10:00:00.000Z');
        context = createAppContext(mergeWithDefaults({ mockMode: true }), { gateway: remote, env: {}, now: () => sentAt });
        const runtime = new BridgeRuntime(context);

        await expect(runtime.sendMessage('+15551234567', 'hello')).resolves.toMatchObject({ success: true });
        await context.statusTracker.checkStatusUpdates({
            findOutboundCandidates: () => [
                { guid: 'out-1', date: 0n, date_delivered: 0n, date_read: 0n, handle_id: '+15551234567' },
            ],
            fetchReceipts: () => [
                { guid: 'out-1', date_delivered: 1_000_000_000n, date_read: 0n, service: 'iMessage' },
            ],
        });

        expect(remote.deliver).toHaveBeenCalledWith({
            event: 'message.delivered',
            phone: '+15551234567',
            message_id: 'out-1',
            timestamp: '2001-01-01T00:00:01.000Z',
            is_imessage: true,
        });
    });

    it('creates opaque outbound ids', () => {
        expect(createOutboundMessageId()).toMatch(/^bridge-[0-9a-f]{12}$/);
        expect(createOutboundMessageId()).not.toBe(createOutboundMessageId());
    });
});
