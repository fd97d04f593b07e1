import { logThought } from '../utils/logger.js';
import { BRIDGE_VERSION } from '../version.js';
import type { RemoteConfig } from '../config/json-config.js';
import { isStatusPayload, type DeliveryGateway, type WebhookPayload } from '../types/delivery.js';

export type FetchLike = typeof fetch;

export type WebhookRoute = 'message' | 'status' | 'health';

export interface WebhookClientOptions {
    fetchImpl?: FetchLike;
}

export const SECRET_HEADER = 'X-Bridge-Secret';

function isTimeoutError(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

/**
 * HTTP transport to the remote webhook service.
 *
 * `settings` is read on every call rather than captured at construction.
 * Every failure is logged and reported as `false`.
 */
export class WebhookClient implements DeliveryGateway {
    readonly #settings: RemoteConfig;
    readonly #fetch: FetchLike;

    constructor(settings: RemoteConfig, options: WebhookClientOptions = {}) {
        this.#settings = settings;
        this.#fetch = options.fetchImpl ?? fetch;
    }

    /** URL of a remote route, or `null` while no client id is configured. */
    buildUrl(route: WebhookRoute): string | null {
        const clientId = this.#settings.clientId.trim();
        if (!clientId) return null;

        const base = this.#settings.baseUrl.replace(/\/+$/, '');
        const prefix = `/${this.#settings.webhookPath.replace(/^\/+|\/+$/g, '')}`;
        return `${base}${prefix}/${encodeURIComponent(clientId)}/${route}`;
    }

    async deliver(payload: WebhookPayload): Promise<boolean> {
        const url = this.buildUrl(isStatusPayload(payload) ? 'status' : 'message');
        if (!url) {
            void logThought(
                `[WebhookClient] No client id configured; cannot deliver ${payload.event} for ${payload.message_id}.`,
                'error',
            );
            return false;
        }

        try {
            const response = await this.#fetch(url, {
                method: 'POST',
                headers: {
                    ...this.#headers(),
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(payload),
                signal: AbortSignal.timeout(this.#settings.timeoutMs),
            });

            if (response.status === 200) {
                void logThought(`[WebhookClient] Delivered ${payload.event} for ${payload.message_id}.`, 'debug');
                return true;
            }

            const detail = (await response.text()).slice(0, 200);
            void logThought(
                `[WebhookClient] ${payload.event} for ${payload.message_id} rejected with HTTP ${response.status}: ${detail}`,
                'warn',
            );
            return false;
        } catch (err) {
            if (isTimeoutError(err)) {
                void logThought(
                    `[WebhookClient] ${payload.event} for ${payload.message_id} timed out after ${this.#settings.timeoutMs}ms.`,
                    'warn',
                );
            } else {
                const reason = err instanceof Error ? err.message : String(err);
                void logThought(`[WebhookClient] Failed to deliver ${payload.event} for ${payload.message_id}: ${reason}`, 'error');
            }
            return false;
        }
    }

    /** Probe the remote health route. `true` only for HTTP 200. */
    async healthCheck(): Promise<boolean> {
        const url = this.buildUrl('health');
        if (!url) return false;

        try {
            const response = await this.#fetch(url, {
                method: 'GET',
                headers: this.#headers(),
                signal: AbortSignal.timeout(this.#settings.timeoutMs),
            });
            return response.status === 200;
        } catch (err) {
            const reason = isTimeoutError(err) ? 'timed out' : err instanceof Error ? err.message : String(err);
            void logThought(`[WebhookClient] Health check failed: ${reason}`, 'warn');
            return false;
        }
    }

    #headers(): Record<string, string> {
        return {
            [SECRET_HEADER]: this.#settings.webhookSecret,
            'User-Agent': `imessage-bridge/${BRIDGE_VERSION}`,
        };
    }
}
