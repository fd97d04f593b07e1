import { randomUUID } from 'node:crypto';
import { logThought } from '../utils/logger.js';
import { normalizePhone } from '../utils/phone.js';
import type { ChannelKind, InboundMessage, MessageCallback, MessageWatcher } from '../types/messaging.js';

/** In-memory stand-in for the chat.db watcher, fed through {@link injectMessage}. */
export class MockMessageWatcher implements MessageWatcher {
    readonly #onMessage: MessageCallback;
    readonly #history: InboundMessage[] = [];
    #nextId = 1;
    #cursor = 0;
    #running = false;

    constructor(onMessage: MessageCallback) {
        this.#onMessage = onMessage;
    }

    get isRunning(): boolean {
        return this.#running;
    }

    get lastCursor(): number {
        return this.#cursor;
    }

    start(_skipHistorical = false): void {
        this.#running = true;
        void logThought('[MockWatcher] Started; messages arrive through injectMessage().');
    }

    async stop(): Promise<void> {
        this.#running = false;
        void logThought('[MockWatcher] Stopped.');
    }

    /**
     * Build an inbound message and, while running, hand it to the callback.
     * Callback failures are logged, as the real watcher does.
     */
    async injectMessage(phone: string, text: string, channelKind: ChannelKind = 'imessage'): Promise<InboundMessage> {
        const message: InboundMessage = {
            id: this.#nextId++,
            externalId: `mock-${randomUUID()}`,
            sender: normalizePhone(phone),
            body: text,
            receivedAt: new Date(),
            isOwnMessage: false,
            channelKind,
            attachments: [],
        };
        this.#history.push(message);
        this.#cursor = message.id;

        if (!this.#running) {
            void logThought(`[MockWatcher] Not running; message ${message.externalId} recorded only.`, 'warn');
            return message;
        }

        try {
            await this.#onMessage(message);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            void logThought(`[MockWatcher] Message callback failed for ${message.externalId}: ${reason}`, 'error');
        }
        return message;
    }

    getMessageHistory(): readonly InboundMessage[] {
        return [...this.#history];
    }
}
