import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logThought } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import type { SendCapability, SendResult } from '../types/messaging.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 30_000;
const MAX_OUTPUT_LENGTH = 4_000;

export interface ScriptRunResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

/** Runs one AppleScript source. Never rejects. */
export type ScriptRunner = (script: string, timeoutMs: number) => Promise<ScriptRunResult>;

export interface AppleScriptSenderOptions {
    timeoutMs?: number;
    runner?: ScriptRunner;
}

export interface BulkMessage {
    phone: string;
    text: string;
}

interface ExecError extends Error {
    code?: number | string;
    killed?: boolean;
    stdout?: string;
    stderr?: string;
}

function isExecError(error: unknown): error is ExecError {
    return error instanceof Error;
}

function truncate(output: string): string {
    return output.length <= MAX_OUTPUT_LENGTH ? output : `${output.slice(0, MAX_OUTPUT_LENGTH)}...[truncated]`;
}

export async function runOsascript(script: string, timeoutMs: number): Promise<ScriptRunResult> {
    try {
        const { stdout, stderr } = await execFileAsync('osascript', ['-e', script], {
            timeout: timeoutMs,
            maxBuffer: 1024 * 1024,
        });
        return { exitCode: 0, stdout: truncate(stdout.trim()), stderr: truncate(stderr.trim()) };
    } catch (error: unknown) {
        if (!isExecError(error)) {
            return { exitCode: 1, stdout: '', stderr: String(error) };
        }
        if (error.killed) {
            void logThought(`[AppleScriptSender] osascript timed out after ${timeoutMs / 1000}s.`, 'error');
            return { exitCode: 1, stdout: '', stderr: 'Timeout' };
        }
        return {
            exitCode: typeof error.code === 'number' ? error.code : 1,
            stdout: truncate((error.stdout ?? '').trim()),
            stderr: truncate((error.stderr ?? error.message).trim()),
        };
    }
}

/** Escape a value for a double-quoted AppleScript string literal. */
export function escapeForAppleScript(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function buildSendScript(phone: string, text: string): string {
    return [
        'tell application "Messages"',
        '    set targetService to 1st account whose service type = iMessage',
        `    set targetBuddy to participant "${escapeForAppleScript(phone)}" of targetService`,
        `    send "${escapeForAppleScript(text)}" to targetBuddy`,
        'end tell',
    ].join('\n');
}

/** Older Messages releases address recipients as buddies of a service. */
export function buildFallbackSendScript(phone: string, text: string): string {
    return [
        'tell application "Messages"',
        '    set targetService to 1st service whose service type = iMessage',
        `    set targetBuddy to buddy "${escapeForAppleScript(phone)}" of targetService`,
        `    send "${escapeForAppleScript(text)}" to targetBuddy`,
        'end tell',
    ].join('\n');
}

/**
 * Sends through the Messages app with `osascript`.
 *
 * The participant-based script is tried first, then the buddy-based one.
 * Messages hands back no identifier for the sent row.
 */
export class AppleScriptSender implements SendCapability {
    readonly #timeoutMs: number;
    readonly #runner: ScriptRunner;

    constructor(options: AppleScriptSenderOptions = {}) {
        this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.#runner = options.runner ?? runOsascript;
    }

    async send(phone: string, text: string): Promise<SendResult> {
        if (!phone.trim()) {
            return { status: 'invalid_recipient', reason: 'Phone number is required' };
        }
        if (!text) {
            return { status: 'failed', reason: 'Message text is required' };
        }

        void logThought(`[AppleScriptSender] Sending message to ${phone}: ${text.slice(0, 50)}...`);

        const primary = await this.#runner(buildSendScript(phone, text), this.#timeoutMs);
        if (primary.exitCode === 0) {
            void logThought(`[AppleScriptSender] Sent message to ${phone}.`);
            return { status: 'success' };
        }

        void logThought(`[AppleScriptSender] Primary send failed: ${primary.stderr}; trying fallback.`, 'warn');

        const fallback = await this.#runner(buildFallbackSendScript(phone, text), this.#timeoutMs);
        if (fallback.exitCode === 0) {
            void logThought(`[AppleScriptSender] Sent message to ${phone} (fallback).`);
            return { status: 'success' };
        }

        const errorMessage = fallback.stderr || 'Unknown AppleScript error';
        void logThought(`[AppleScriptSender] Failed to send message to ${phone}: ${errorMessage}`, 'error');

        const lowered = errorMessage.toLowerCase();
        if (lowered.includes('buddy') || lowered.includes('participant')) {
            return {
                status: 'invalid_recipient',
                reason: `Could not find recipient ${phone}. Ensure they have iMessage enabled.`,
            };
        }
        return { status: 'failed', reason: errorMessage };
    }

    /** Send one after another, pausing `delayMs` between messages. */
    async sendBulk(messages: readonly BulkMessage[], delayMs = 1_000): Promise<SendResult[]> {
        const results: SendResult[] = [];
        for (const [index, message] of messages.entries()) {
            if (index > 0) {
                await sleep(delayMs);
            }
            results.push(await this.send(message.phone, message.text));
        }
        return results;
    }
}
