import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

function secretsMatch(provided: string, expected: string): boolean {
    const left = Buffer.from(provided, 'utf8');
    const right = Buffer.from(expected, 'utf8');
    return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Require the `X-Bridge-Secret` header to equal the configured webhook secret.
 * The secret is read per request; with none configured every request is refused.
 */
export function requireBridgeSecret(getSecret: () => string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const expected = getSecret();
        if (!expected) {
            void logThought('[API] Authenticated request rejected: webhook secret not configured.', 'warn');
            sendError(res, 'Authenticated endpoints are unavailable (missing webhook secret).', 503);
            return;
        }

        const provided = req.header('x-bridge-secret');
        if (!provided || !secretsMatch(provided, expected)) {
            void logThought(`[API] Rejected ${req.method} ${req.path}: invalid or missing X-Bridge-Secret.`, 'warn');
            sendError(res, 'Invalid or missing X-Bridge-Secret header.', 401);
            return;
        }

        next();
    };
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof SyntaxError) {
        return { status: 400, message: 'Malformed JSON body.' };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`, 'debug');
    next();
}
