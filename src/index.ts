#!/usr/bin/env node
import type { Server } from 'node:http';
import { createApiApp, startApiServer } from './api/router.js';
import { loadConfig } from './config/json-config.js';
import { BridgeRuntime } from './core/bridge.js';
import { createAppContext } from './core/context.js';
import { configureLogger, logThought, registerSensitiveValue } from './utils/logger.js';
import { BRIDGE_VERSION } from './version.js';

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve) => {
        server.close((err) => {
            if (err) {
                void logThought(`[Bridge] HTTP server close failed: ${err.message}`, 'warn');
            }
            resolve();
        });
    });
}

async function main(): Promise<void> {
    const config = await loadConfig();
    configureLogger({ level: config.logging.level, directory: config.logging.directory });
    registerSensitiveValue(config.remote.webhookSecret);

    void logThought(
        `[Bridge] Starting imessage-bridge ${BRIDGE_VERSION}${config.mockMode ? ' in mock mode' : ''}.`,
    );

    const runtime = new BridgeRuntime(createAppContext(config));
    await runtime.start();
    const server = await startApiServer(createApiApp({ runtime }), config.server.host, config.server.port);

    // ── Signal Handlers ──────────────────────────────────────────────────────────

    let shuttingDown = false;
    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;

        await logThought(`[Bridge] Received ${signal}; shutting down.`);
        await closeServer(server);
        await runtime.stop();
        process.exit(0);
    };

    process.on('SIGINT', (signal) => void shutdown(signal));
    process.on('SIGTERM', (signal) => void shutdown(signal));
}

// ── Entry Point ──────────────────────────────────────────────────────────────

main().catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Bridge] Startup failed: ${message}`);
    process.exit(1);
});
