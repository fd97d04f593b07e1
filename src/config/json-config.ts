import * as fs from 'fs/promises';
import * as path from 'path';
import { CONFIG_SCHEMA, type ConfigValueKind } from './env-schema.js';
import { DEFAULT_CHAT_DB_PATH } from '../services/chat-db.js';
import { parseLogThreshold, type LogThreshold } from '../utils/logger.js';

export interface RemoteConfig {
    baseUrl: string;
    clientId: string;
    webhookSecret: string;
    timeoutMs: number;
    /** Path segment between the base URL and the client id. */
    webhookPath: string;
}

export interface WatcherConfig {
    chatDbPath: string;
    pollIntervalSec: number;
    processHistorical: boolean;
    missingStoreBackoffMs: number;
}

export interface QueueConfig {
    maxSize: number;
    baseDelayMs: number;
    maxDelayMs: number;
    maxAttempts: number;
}

export interface BridgeConfig {
    remote: RemoteConfig;
    watcher: WatcherConfig;
    queue: QueueConfig;
    server: {
        host: string;
        port: number;
    };
    logging: {
        level: LogThreshold;
        directory: string | null;
    };
    mockMode: boolean;
}

export const PLACEHOLDER_SECRET = 'change-me';

export const DEFAULT_CONFIG: BridgeConfig = {
    remote: {
        baseUrl: 'http://localhost:8000',
        clientId: '',
        webhookSecret: PLACEHOLDER_SECRET,
        timeoutMs: 30_000,
        webhookPath: '/webhooks/iphone-bridge',
    },
    watcher: {
        chatDbPath: DEFAULT_CHAT_DB_PATH,
        pollIntervalSec: 2,
        processHistorical: false,
        missingStoreBackoffMs: 30_000,
    },
    queue: {
        maxSize: 1000,
        baseDelayMs: 5_000,
        maxDelayMs: 300_000,
        maxAttempts: 10,
    },
    server: {
        host: '0.0.0.0',
        port: 8080,
    },
    logging: {
        level: 'info',
        directory: 'logs',
    },
    mockMode: false,
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.BRIDGE_CONFIG_PATH) {
        return path.resolve(process.env.BRIDGE_CONFIG_PATH);
    }
    return path.resolve('bridge.json');
}

/** Read `bridge.json` merged over the defaults. A missing file yields the defaults. */
export async function readConfig(overridePath?: string): Promise<BridgeConfig> {
    const targetPath = getConfigPath(overridePath);
    let rawData: string;
    try {
        rawData = await fs.readFile(targetPath, 'utf-8');
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to read config file at ${targetPath}: ${describe(error)}`);
    }

    try {
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        throw new Error(`Failed to parse config file at ${targetPath}: ${describe(error)}`);
    }
}

/** Defaults, then the JSON file, then environment overrides. */
export async function loadConfig(
    overridePath?: string,
    env: NodeJS.ProcessEnv = process.env,
): Promise<BridgeConfig> {
    return applyEnvOverrides(await readConfig(overridePath), env);
}

export function mergeWithDefaults(loaded: unknown): BridgeConfig {
    return mergeInto(DEFAULT_CONFIG, loaded);
}

/**
 * Apply every non-empty environment key listed in `CONFIG_SCHEMA`.
 * Values that fail coercion are left out here and reported by the validator.
 */
export function applyEnvOverrides(config: BridgeConfig, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
    const overlay: Record<string, unknown> = {};

    for (const spec of CONFIG_SCHEMA) {
        const raw = env[spec.key]?.trim();
        if (!raw) continue;

        const value = coerceValue(raw, spec.kind);
        if (value !== undefined) {
            setPath(overlay, spec.path, value);
        }
    }

    return mergeInto(config, overlay);
}

export function coerceValue(raw: string, kind: ConfigValueKind): string | number | boolean | undefined {
    switch (kind) {
        case 'string':
            return raw;
        case 'integer':
            return /^-?\d+$/.test(raw) ? Number.parseInt(raw, 10) : undefined;
        case 'number': {
            const parsed = Number(raw);
            return raw !== '' && Number.isFinite(parsed) ? parsed : undefined;
        }
        case 'boolean': {
            const normalized = raw.toLowerCase();
            if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
            if (['false', '0', 'no', 'off'].includes(normalized)) return false;
            return undefined;
        }
    }
}

// ── Merging ─────────────────────────────────────────────────────────────────

function mergeInto(base: BridgeConfig, loaded: unknown): BridgeConfig {
    const source = isRecord(loaded) ? loaded : {};
    const remote = section(source, 'remote');
    const watcher = section(source, 'watcher');
    const queue = section(source, 'queue');
    const server = section(source, 'server');
    const logging = section(source, 'logging');

    return {
        remote: {
            baseUrl: pickString(remote, 'baseUrl', base.remote.baseUrl),
            clientId: pickString(remote, 'clientId', base.remote.clientId),
            webhookSecret: pickString(remote, 'webhookSecret', base.remote.webhookSecret),
            timeoutMs: pickNumber(remote, 'timeoutMs', base.remote.timeoutMs),
            webhookPath: pickString(remote, 'webhookPath', base.remote.webhookPath),
        },
        watcher: {
            chatDbPath: pickString(watcher, 'chatDbPath', base.watcher.chatDbPath),
            pollIntervalSec: pickNumber(watcher, 'pollIntervalSec', base.watcher.pollIntervalSec),
            processHistorical: pickBoolean(watcher, 'processHistorical', base.watcher.processHistorical),
            missingStoreBackoffMs: pickNumber(watcher, 'missingStoreBackoffMs', base.watcher.missingStoreBackoffMs),
        },
        queue: {
            maxSize: pickNumber(queue, 'maxSize', base.queue.maxSize),
            baseDelayMs: pickNumber(queue, 'baseDelayMs', base.queue.baseDelayMs),
            maxDelayMs: pickNumber(queue, 'maxDelayMs', base.queue.maxDelayMs),
            maxAttempts: pickNumber(queue, 'maxAttempts', base.queue.maxAttempts),
        },
        server: {
            host: pickString(server, 'host', base.server.host),
            port: pickNumber(server, 'port', base.server.port),
        },
        logging: {
            level: parseLogThreshold(pickString(logging, 'level', base.logging.level)) ?? base.logging.level,
            directory: pickDirectory(logging, base.logging.directory),
        },
        mockMode: pickBoolean(source, 'mockMode', base.mockMode),
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = source[key];
    return isRecord(value) ? value : {};
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function pickNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickBoolean(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

function pickDirectory(source: Record<string, unknown>, fallback: string | null): string | null {
    const value = source.directory;
    if (value === null) return null;
    return typeof value === 'string' ? value : fallback;
}

function setPath(target: Record<string, unknown>, dottedPath: string, value: unknown): void {
    const parts = dottedPath.split('.');
    const leaf = parts.pop();
    if (!leaf) return;

    let cursor = target;
    for (const part of parts) {
        const next = cursor[part];
        if (isRecord(next)) {
            cursor = next;
        } else {
            const created: Record<string, unknown> = {};
            cursor[part] = created;
            cursor = created;
        }
    }
    cursor[leaf] = value;
}
