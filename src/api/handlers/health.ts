import type { Request, Response } from 'express';
import type { BridgeRuntime } from '../../core/bridge.js';
import { sendOk } from '../shared.js';

export interface HealthDeps {
    runtime: BridgeRuntime;
}

/** GET /health: liveness summary; `degraded` while the watcher is not running. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.runtime.getHealth());
    };
}
