import os from 'node:os';
import path from 'node:path';
import { fromStoreTimestamp } from '../utils/apple-time.js';
import { logThought } from '../utils/logger.js';
import { normalizePhone } from '../utils/phone.js';
import { sleep } from '../utils/retry.js';
import {
    ChatStore,
    ChatStoreNotFoundError,
    DEFAULT_CHAT_DB_PATH,
    isSqliteError,
    type MessageRow,
    type ReceiptSource,
} from './chat-db.js';
import type {
    Attachment,
    ChannelKind,
    InboundMessage,
    MessageCallback,
    MessageWatcher,
    StatusUpdate,
} from '../types/messaging.js';

/** Anything that reconciles receipts against the connection of a poll cycle. */
export interface StatusCheck {
    checkStatusUpdates(source: ReceiptSource): Promise<StatusUpdate[]>;
}

export interface ChatDbWatcherOptions {
    onMessage: MessageCallback;
    dbPath?: string;
    /** Seconds between cycles, fractional values allowed. */
    pollIntervalSec?: number;
    statusTracker?: StatusCheck | null;
    /** Directory substituted for a leading `~` in attachment paths. */
    homeDir?: string;
    missingStoreBackoffMs?: number;
    batchSize?: number;
}

export type PollOutcome = 'ok' | 'store_missing' | 'store_error';

const DEFAULTS = {
    pollIntervalSec: 2,
    missingStoreBackoffMs: 30_000,
    batchSize: 100,
};

const FALLBACK_MIME_TYPE = 'application/octet-stream';

export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
    if (filePath === '~') return homeDir;
    if (filePath.startsWith('~/')) return path.join(homeDir, filePath.slice(2));
    return filePath;
}

export function channelKindFromService(service: string | null): ChannelKind {
    return service?.includes('iMessage') ? 'imessage' : 'sms';
}

/**
 * Tails the `message` table of chat.db with a ROWID cursor.
 *
 * Every cycle opens a fresh read-only connection, emits new inbound rows in
 * ROWID order, lets the status tracker reuse the same connection, and closes
 * it before sleeping.
 *
 * The cursor moves past a row before its callback runs: a callback that throws
 * is logged and the row is never emitted again.
 */
export class ChatDbWatcher implements MessageWatcher {
    readonly #onMessage: MessageCallback;
    readonly #dbPath: string;
    readonly #pollIntervalMs: number;
    readonly #statusTracker: StatusCheck | null;
    readonly #homeDir: string;
    readonly #missingStoreBackoffMs: number;
    readonly #batchSize: number;

    #cursor = 0;
    #running = false;
    #skipHistoricalPending = false;
    #loop: Promise<void> | null = null;
    #abort: AbortController | null = null;

    constructor(options: ChatDbWatcherOptions) {
        this.#onMessage = options.onMessage;
        this.#dbPath = options.dbPath ?? DEFAULT_CHAT_DB_PATH;
        this.#pollIntervalMs = Math.max(0, options.pollIntervalSec ?? DEFAULTS.pollIntervalSec) * 1000;
        this.#statusTracker = options.statusTracker ?? null;
        this.#homeDir = options.homeDir ?? os.homedir();
        this.#missingStoreBackoffMs = options.missingStoreBackoffMs ?? DEFAULTS.missingStoreBackoffMs;
        this.#batchSize = options.batchSize ?? DEFAULTS.batchSize;
    }

    get isRunning(): boolean {
        return this.#running;
    }

    /** Highest ROWID handled so far. Never decreases. */
    get lastCursor(): number {
        return this.#cursor;
    }

    start(skipHistorical = false): void {
        if (this.#running) {
            void logThought('[Watcher] start() ignored: already running.', 'warn');
            return;
        }

        this.#running = true;
        this.#skipHistoricalPending = skipHistorical;
        this.#abort = new AbortController();
        this.#loop = this.#run(this.#abort.signal);

        void logThought(
            `[Watcher] Watching ${this.#dbPath} every ${this.#pollIntervalMs / 1000}s ` +
                `(historical backlog ${skipHistorical ? 'skipped' : 'included'}).`,
        );
    }

    /** Cancel the pending sleep and wait for the running cycle to finish. */
    async stop(): Promise<void> {
        const loop = this.#loop;
        if (!this.#running && !loop) return;

        this.#running = false;
        this.#abort?.abort();
        this.#abort = null;
        this.#loop = null;

        if (loop) {
            await loop;
        }
        void logThought(`[Watcher] Stopped at cursor ${this.#cursor}.`);
    }

    /** Run a single poll cycle against the store. */
    async pollOnce(): Promise<PollOutcome> {
        let store: ChatStore;
        try {
            store = ChatStore.open(this.#dbPath);
        } catch (err) {
            if (err instanceof ChatStoreNotFoundError) {
                void logThought(`[Watcher] ${err.message} Retrying in ${this.#missingStoreBackoffMs / 1000}s.`, 'warn');
                return 'store_missing';
            }
            void logThought(`[Watcher] Failed to open ${this.#dbPath}: ${describeError(err)}`, 'error');
            return 'store_error';
        }

        try {
            if (this.#skipHistoricalPending) {
                this.#cursor = Math.max(this.#cursor, store.getMaxRowId());
                this.#skipHistoricalPending = false;
                void logThought(`[Watcher] Skipping historical messages up to ROWID ${this.#cursor}.`);
            }

            const rows = store.fetchMessagesAfter(this.#cursor, this.#batchSize);
            for (const row of rows) {
                await this.#processRow(store, row);
            }

            if (this.#statusTracker) {
                await this.#statusTracker.checkStatusUpdates(store);
            }
            return 'ok';
        } catch (err) {
            void logThought(`[Watcher] Poll cycle failed: ${describeError(err)}`, 'error');
            return 'store_error';
        } finally {
            store.close();
        }
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    async #run(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            const outcome = await this.pollOnce();
            if (signal.aborted) break;

            const delayMs = outcome === 'store_missing' ? this.#missingStoreBackoffMs : this.#pollIntervalMs;
            await sleep(delayMs, signal);
        }
    }

    async #processRow(store: ChatStore, row: MessageRow): Promise<void> {
        const rowId = Number(row.rowid);
        if (rowId > this.#cursor) {
            this.#cursor = rowId;
        }

        if (Number(row.is_from_me ?? 0) === 1) {
            return;
        }

        let message: InboundMessage | null;
        try {
            message = this.#parseRow(store, row, rowId);
        } catch (err) {
            void logThought(`[Watcher] Skipping message ${rowId}: ${describeError(err)}`, 'warn');
            return;
        }
        if (!message) return;

        try {
            await this.#onMessage(message);
        } catch (err) {
            void logThought(`[Watcher] Message callback failed for ${message.externalId}: ${describeError(err)}`, 'error');
        }
    }

    #parseRow(store: ChatStore, row: MessageRow, rowId: number): InboundMessage | null {
        if (!row.guid) {
            throw new Error('row has no guid');
        }
        if (row.date === null) {
            throw new Error('row has no date');
        }

        const attachments = Number(row.cache_has_attachments ?? 0) === 1 ? this.#loadAttachments(store, rowId) : [];
        const body = row.text ?? '';
        if (!body && attachments.length === 0) {
            void logThought(`[Watcher] Message ${rowId} has neither text nor readable attachments.`, 'debug');
            return null;
        }

        return {
            id: rowId,
            externalId: row.guid,
            sender: normalizePhone(row.handle_id ?? 'unknown'),
            body,
            receivedAt: fromStoreTimestamp(row.date),
            isOwnMessage: false,
            channelKind: channelKindFromService(row.service),
            attachments,
        };
    }

    #loadAttachments(store: ChatStore, rowId: number): Attachment[] {
        const attachments: Attachment[] = [];
        for (const row of store.fetchAttachments(rowId)) {
            if (!row.filename) continue;

            const absolutePath = expandHome(row.filename, this.#homeDir);
            attachments.push({
                filename: path.basename(absolutePath),
                absolutePath,
                mimeType: row.mime_type || FALLBACK_MIME_TYPE,
                sizeBytes: Number(row.total_bytes ?? 0),
                transferName: row.transfer_name,
            });
        }
        return attachments;
    }
}

function describeError(err: unknown): string {
    if (isSqliteError(err)) return `${err.code}: ${err.message}`;
    return err instanceof Error ? err.message : String(err);
}
