import { logThought } from '../utils/logger.js';
import type { SendCapability, SendResult } from '../types/messaging.js';

export interface SentRecord {
    phone: string;
    text: string;
    sentAt: Date;
}

/** Records sends instead of driving Messages. Used in mock mode. */
export class MockSender implements SendCapability {
    readonly #sent: SentRecord[] = [];
    #nextResult: SendResult | null = null;

    async send(phone: string, text: string): Promise<SendResult> {
        if (!phone.trim()) {
            return { status: 'invalid_recipient', reason: 'Phone number is required' };
        }
        if (!text) {
            return { status: 'failed', reason: 'Message text is required' };
        }

        const forced = this.#nextResult;
        this.#nextResult = null;
        if (forced && forced.status !== 'success') {
            return forced;
        }

        this.#sent.push({ phone, text, sentAt: new Date() });
        void logThought(`[MockSender] Would send to ${phone}: ${text.slice(0, 50)}`);
        return { status: 'success' };
    }

    /** Make the next valid send return `result`. */
    failNextWith(result: SendResult): void {
        this.#nextResult = result;
    }

    get sentMessages(): readonly SentRecord[] {
        return [...this.#sent];
    }
}
