import { createServer, type Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { handleHealth } from './handlers/health.js';
import { handleInject, handleSend } from './handlers/send.js';
import { handleStatus } from './handlers/status.js';
import { mapError, requestLogger, requireBridgeSecret, sendError } from './shared.js';
import type { BridgeRuntime } from '../core/bridge.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    runtime: BridgeRuntime;
}

/**
 * Build the control-plane HTTP API.
 *
 * Endpoints:
 *   GET  /health       Watcher liveness, uptime, version and queue size
 *   GET  /status       Watcher, remote, queue, tracker and config diagnostics
 *   POST /send         Send through Messages (X-Bridge-Secret)
 *   POST /test/inject  Inject a fake inbound message, mock mode only (X-Bridge-Secret)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const { context } = deps.runtime;
    const requireSecret = requireBridgeSecret(() => context.config.remote.webhookSecret);

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(deps));
    app.get('/status', handleStatus(deps));
    app.post('/send', requireSecret, handleSend(deps));
    app.post('/test/inject', requireSecret, handleInject({ mockWatcher: context.mockWatcher }));

    app.use((_req: Request, res: Response) => {
        sendError(res, 'Not found.', 404);
    });

    // Express recognises error handlers by their four parameters.
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const { status, message } = mapError(err);
        void logThought(`[API] Request failed: ${message}`, status >= 500 ? 'error' : 'warn');
        sendError(res, message, status);
    });

    return app;
}

/** Listen on `host:port`. Resolves with the bound server. */
export function startApiServer(app: Express, host: string, port: number): Promise<Server> {
    const server = createServer(app);

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            void logThought(`[API] Control plane listening on http://${host}:${port}`);
            resolve(server);
        });
    });
}
