import Database from 'better-sqlite3';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { toStoreTimestamp } from '../../src/utils/apple-time.js';

const SCHEMA_SQL = readFileSync(fileURLToPath(new URL('../fixtures/chat-db-schema.sql', import.meta.url)), 'utf8');

export interface AttachmentSeed {
    filename: string | null;
    mimeType?: string | null;
    transferName?: string | null;
    totalBytes?: number;
}

export interface MessageSeed {
    rowid?: number;
    guid: string;
    text?: string | null;
    handle?: string | null;
    service?: string;
    /** `null` writes a row without a date. */
    sentAt: Date | null;
    deliveredAt?: Date | null;
    readAt?: Date | null;
    isFromMe?: boolean;
    attachments?: AttachmentSeed[];
}

function storeTime(date: Date | null | undefined): bigint {
    return date ? toStoreTimestamp(date) : 0n;
}

/** A throwaway chat.db on disk with the tables the bridge reads. */
export class ChatDbFixture {
    readonly dir: string;
    readonly dbPath: string;
    readonly #db: Database.Database;
    readonly #handles = new Map<string, number>();

    private constructor(dir: string) {
        this.dir = dir;
        this.dbPath = path.join(dir, 'chat.db');
        this.#db = new Database(this.dbPath);
        this.#db.exec(SCHEMA_SQL);
    }

    static create(): ChatDbFixture {
        return new ChatDbFixture(mkdtempSync(path.join(os.tmpdir(), 'bridge-chat-db-')));
    }

    insertMessage(seed: MessageSeed): number {
        const handleRowId = seed.handle ? this.#handleRowId(seed.handle) : 0;
        const attachments = seed.attachments ?? [];

        const info = this.#db
            .prepare(
                `INSERT INTO message
                    (ROWID, guid, text, handle_id, service, date, date_delivered, date_read, is_from_me, cache_has_attachments)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                seed.rowid ?? null,
                seed.guid,
                seed.text === undefined ? null : seed.text,
                handleRowId,
                seed.service ?? 'iMessage',
                seed.sentAt ? toStoreTimestamp(seed.sentAt) : null,
                storeTime(seed.deliveredAt),
                storeTime(seed.readAt),
                seed.isFromMe ? 1 : 0,
                attachments.length > 0 ? 1 : 0,
            );
        const messageRowId = Number(info.lastInsertRowid);

        attachments.forEach((attachment, index) => {
            const attachmentInfo = this.#db
                .prepare(
                    'INSERT INTO attachment (guid, filename, mime_type, transfer_name, total_bytes) VALUES (?, ?, ?, ?, ?)',
                )
                .run(
                    `${seed.guid}-att-${index}`,
                    attachment.filename,
                    attachment.mimeType ?? null,
                    attachment.transferName ?? null,
                    attachment.totalBytes ?? 0,
                );
            this.#db
                .prepare('INSERT INTO message_attachment_join (message_id, attachment_id) VALUES (?, ?)')
                .run(messageRowId, Number(attachmentInfo.lastInsertRowid));
        });

        return messageRowId;
    }

    setReceipts(guid: string, receipts: { deliveredAt?: Date; readAt?: Date }): void {
        if (receipts.deliveredAt) {
            this.#db.prepare('UPDATE message SET date_delivered = ? WHERE guid = ?').run(storeTime(receipts.deliveredAt), guid);
        }
        if (receipts.readAt) {
            this.#db.prepare('UPDATE message SET date_read = ? WHERE guid = ?').run(storeTime(receipts.readAt), guid);
        }
    }

    destroy(): void {
        this.#db.close();
        rmSync(this.dir, { recursive: true, force: true });
    }

    #handleRowId(handle: string): number {
        const existing = this.#handles.get(handle);
        if (existing !== undefined) return existing;

        const info = this.#db.prepare('INSERT INTO handle (id) VALUES (?)').run(handle);
        const rowId = Number(info.lastInsertRowid);
        this.#handles.set(handle, rowId);
        return rowId;
    }
}
