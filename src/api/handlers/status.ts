import type { Request, Response } from 'express';
import type { BridgeRuntime } from '../../core/bridge.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface StatusDeps {
    runtime: BridgeRuntime;
}

/** GET /status: watcher, remote, queue, tracker and config diagnostics. */
export function handleStatus(deps: StatusDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            sendOk(res, await deps.runtime.getStatus());
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}
