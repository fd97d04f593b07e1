import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export const DEFAULT_CHAT_DB_PATH = path.join(os.homedir(), 'Library', 'Messages', 'chat.db');

// Integer columns are read with safe integers: `date` values exceed 2^53.

export interface MessageRow {
    rowid: bigint;
    guid: string | null;
    text: string | null;
    date: bigint | null;
    is_from_me: bigint | null;
    service: string | null;
    cache_has_attachments: bigint | null;
    handle_id: string | null;
}

export interface AttachmentRow {
    filename: string | null;
    mime_type: string | null;
    total_bytes: bigint | null;
    transfer_name: string | null;
}

export interface OutboundCandidateRow {
    guid: string;
    date: bigint;
    date_delivered: bigint | null;
    date_read: bigint | null;
    handle_id: string | null;
}

export interface ReceiptRow {
    guid: string;
    date_delivered: bigint | null;
    date_read: bigint | null;
    service: string | null;
}

/** The read-only queries the status tracker needs from the store. */
export interface ReceiptSource {
    /** Own messages dated within `[fromTimestamp, toTimestamp]`, newest first. */
    findOutboundCandidates(fromTimestamp: bigint, toTimestamp: bigint, limit: number): OutboundCandidateRow[];
    fetchReceipts(guids: readonly string[]): ReceiptRow[];
}

export class ChatStoreNotFoundError extends Error {
    readonly dbPath: string;

    constructor(dbPath: string) {
        super(
            `Messages database not found at ${dbPath}. ` +
                'Ensure Messages has been used and Full Disk Access is enabled.',
        );
        this.name = 'ChatStoreNotFoundError';
        this.dbPath = dbPath;
    }
}

export function isSqliteError(err: unknown): err is Error & { code: string } {
    return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('SQLITE_');
}

const SELECT_MAX_ROWID = 'SELECT MAX(ROWID) AS max_rowid FROM message';

const SELECT_MESSAGES_AFTER = `
    SELECT
        m.ROWID AS rowid,
        m.guid,
        m.text,
        m.date,
        m.is_from_me,
        m.service,
        m.cache_has_attachments,
        h.id AS handle_id
    FROM message m
    LEFT JOIN handle h ON m.handle_id = h.ROWID
    WHERE m.ROWID > ?
        AND (
            (m.text IS NOT NULL AND m.text != '')
            OR m.cache_has_attachments = 1
        )
    ORDER BY m.ROWID ASC
    LIMIT ?
`;

const SELECT_ATTACHMENTS = `
    SELECT
        a.filename,
        a.mime_type,
        a.total_bytes,
        a.transfer_name
    FROM attachment a
    INNER JOIN message_attachment_join maj ON a.ROWID = maj.attachment_id
    WHERE maj.message_id = ?
`;

const SELECT_OUTBOUND_CANDIDATES = `
    SELECT
        m.guid,
        m.date,
        m.date_delivered,
        m.date_read,
        h.id AS handle_id
    FROM message m
    LEFT JOIN handle h ON m.handle_id = h.ROWID
    WHERE m.is_from_me = 1
        AND m.guid IS NOT NULL
        AND m.date BETWEEN ? AND ?
    ORDER BY m.date DESC
    LIMIT ?
`;

/**
 * One read-only connection to the Messages database.
 *
 * Opened per poll cycle and closed at its end so the Messages app, the only
 * writer, never contends with a long-lived handle.
 */
export class ChatStore implements ReceiptSource {
    readonly #db: Database.Database;

    private constructor(db: Database.Database) {
        this.#db = db;
    }

    /** Open `dbPath` read-only. Throws {@link ChatStoreNotFoundError} when the file is absent. */
    static open(dbPath: string = DEFAULT_CHAT_DB_PATH): ChatStore {
        if (!fs.existsSync(dbPath)) {
            throw new ChatStoreNotFoundError(dbPath);
        }
        return new ChatStore(new Database(dbPath, { readonly: true, fileMustExist: true }));
    }

    get isOpen(): boolean {
        return this.#db.open;
    }

    getMaxRowId(): number {
        const row = this.#db
            .prepare<[], { max_rowid: bigint | null }>(SELECT_MAX_ROWID)
            .safeIntegers(true)
            .get();
        return row?.max_rowid ? Number(row.max_rowid) : 0;
    }

    fetchMessagesAfter(cursor: number, limit: number): MessageRow[] {
        return this.#db
            .prepare<[number, number], MessageRow>(SELECT_MESSAGES_AFTER)
            .safeIntegers(true)
            .all(cursor, limit);
    }

    fetchAttachments(messageId: number): AttachmentRow[] {
        return this.#db
            .prepare<[number], AttachmentRow>(SELECT_ATTACHMENTS)
            .safeIntegers(true)
            .all(messageId);
    }

    findOutboundCandidates(fromTimestamp: bigint, toTimestamp: bigint, limit: number): OutboundCandidateRow[] {
        return this.#db
            .prepare<[bigint, bigint, number], OutboundCandidateRow>(SELECT_OUTBOUND_CANDIDATES)
            .safeIntegers(true)
            .all(fromTimestamp, toTimestamp, limit);
    }

    fetchReceipts(guids: readonly string[]): ReceiptRow[] {
        if (guids.length === 0) return [];

        const placeholders = guids.map(() => '?').join(', ');
        return this.#db
            .prepare<string[], ReceiptRow>(
                `SELECT guid, date_delivered, date_read, service
                  FROM message
                  WHERE guid IN (${placeholders})
                      AND is_from_me = 1`,
            )
            .safeIntegers(true)
            .all(...guids);
    }

    close(): void {
        if (this.#db.open) {
            this.#db.close();
        }
    }
}
