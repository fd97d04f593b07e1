import type { Request, Response } from 'express';
import type { BridgeRuntime } from '../../core/bridge.js';
import type { MockMessageWatcher } from '../../services/mock-watcher.js';
import type { InjectRequestBody, SendRequestBody } from '../../types/api.js';
import type { SendResponse } from '../../types/messaging.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface SendDeps {
    runtime: BridgeRuntime;
}

export interface InjectDeps {
    mockWatcher: MockMessageWatcher | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseSendBody(body: unknown): SendRequestBody | null {
    if (!isRecord(body)) return null;
    const { phone, text } = body;
    if (typeof phone !== 'string' || typeof text !== 'string') return null;
    return { phone, text };
}

function parseInjectBody(body: unknown): InjectRequestBody | null {
    const base = parseSendBody(body);
    if (!base || !isRecord(body)) return null;

    const { channelKind } = body;
    if (channelKind === undefined) return base;
    if (channelKind === 'imessage' || channelKind === 'sms') return { ...base, channelKind };
    return null;
}

/**
 * POST /send: send through Messages.
 *
 * Answers with the bare send contract `{ success, messageId?, error? }`
 * rather than the API envelope.
 */
export function handleSend(deps: SendDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const body = parseSendBody(req.body);
        if (!body) {
            const response: SendResponse = { success: false, error: 'Body must contain string fields "phone" and "text".' };
            res.status(422).json(response);
            return;
        }

        try {
            const response = await deps.runtime.sendMessage(body.phone, body.text);
            res.status(200).json(response);
        } catch (err) {
            const { message } = mapError(err);
            void logThought(`[API] Send to ${body.phone} failed unexpectedly: ${message}`, 'error');
            const response: SendResponse = { success: false, error: message };
            res.status(200).json(response);
        }
    };
}

/** POST /test/inject: feed a fake inbound message through the pipeline (mock mode only). */
export function handleInject(deps: InjectDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        if (!deps.mockWatcher) {
            sendError(res, 'Message injection is only available in mock mode.', 404);
            return;
        }

        const body = parseInjectBody(req.body);
        if (!body) {
            sendError(res, 'Body must contain string fields "phone" and "text", and an optional channelKind of imessage or sms.', 422);
            return;
        }

        const message = await deps.mockWatcher.injectMessage(body.phone, body.text, body.channelKind ?? 'imessage');
        sendOk(res, {
            id: message.id,
            externalId: message.externalId,
            sender: message.sender,
            receivedAt: message.receivedAt.toISOString(),
        }, 201);
    };
}
