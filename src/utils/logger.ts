import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import { CONFIG_SCHEMA } from '../config/env-schema.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export interface LoggerOptions {
    level?: LogThreshold;
    /** Directory for the daily markdown log. `null` keeps logging on the console only. */
    directory?: string | null;
}

const LEVEL_WEIGHT: Record<LogThreshold, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const REDACTED = '[REDACTED]';
const MIN_SECRET_LENGTH = 6;

const state: { threshold: LogThreshold; directory: string | null } = {
    threshold: parseLogThreshold(process.env.LOG_LEVEL) ?? 'info',
    directory: null,
};

const registeredSecrets = new Set<string>();

export function parseLogThreshold(raw: string | undefined): LogThreshold | null {
    const value = (raw ?? '').trim().toLowerCase();
    return THRESHOLDS.find((threshold) => threshold === value) ?? null;
}

export function configureLogger(options: LoggerOptions): void {
    if (options.level) {
        state.threshold = options.level;
    }
    if (options.directory !== undefined) {
        state.directory = options.directory ? path.resolve(options.directory) : null;
    }
}

/** Register a runtime secret (e.g. the webhook secret from bridge.json) for redaction. */
export function registerSensitiveValue(value: string): void {
    const trimmed = value.trim();
    if (trimmed.length >= MIN_SECRET_LENGTH) {
        registeredSecrets.add(trimmed);
    }
}

function collectSensitiveValues(): Set<string> {
    const values = new Set(registeredSecrets);
    for (const spec of CONFIG_SCHEMA) {
        if (spec.type !== 'secret') continue;
        const raw = process.env[spec.key]?.trim();
        if (raw && raw.length >= MIN_SECRET_LENGTH) {
            values.add(raw);
        }
    }
    return values;
}

/** Redact secrets from free text before it reaches a log sink or an API response. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;

    for (const value of collectSensitiveValues()) {
        scrubbed = scrubbed.split(value).join(REDACTED);
    }

    return scrubbed
        .replace(/(x-bridge-secret\s*[:=]\s*)([^\s,;"']+)/gi, `$1${REDACTED}`)
        .replace(/((?:secret|token|password)\s*=\s*)([^\s&,;"']+)/gi, `$1${REDACTED}`);
}

function writeConsole(level: LogLevel, line: string): void {
    switch (level) {
        case 'error':
            console.error(line);
            break;
        case 'warn':
            console.warn(line);
            break;
        default:
            console.log(line);
    }
}

/**
 * Record a runtime event.
 *
 * Every line is scrubbed, echoed to the console and, when a log directory is
 * configured, appended to `<directory>/YYYY-MM-DD.md`.
 */
export async function logThought(message: string, level: LogLevel = 'info'): Promise<void> {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[state.threshold]) {
        return;
    }

    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] [${level.toUpperCase()}] ${scrubSensitiveText(message)}`;
    writeConsole(level, line);

    const directory = state.directory;
    if (!directory) {
        return;
    }

    const logPath = path.join(directory, `${timestamp.slice(0, 10)}.md`);
    try {
        await mkdir(directory, { recursive: true });
        await appendFile(logPath, `- ${line}\n`, 'utf8');
    } catch (err) {
        console.error(`[Logger] Failed to append to ${logPath}:`, err instanceof Error ? err.message : String(err));
    }
}
