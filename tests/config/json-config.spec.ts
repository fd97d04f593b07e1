import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
    applyEnvOverrides,
    coerceValue,
    DEFAULT_CONFIG,
    getConfigPath,
    loadConfig,
    mergeWithDefaults,
    readConfig,
} from '../../src/config/json-config.js';

describe('Config JSON Foundation', () => {
    const tempDir = path.join(os.tmpdir(), 'bridge-test-config', Date.now().toString());
    const tempConfigPath = path.join(tempDir, 'bridge.json');

    beforeEach(async () => {
        vi.stubEnv('BRIDGE_CONFIG_PATH', tempConfigPath);
        if (!existsSync(tempDir)) {
            await fs.mkdir(tempDir, { recursive: true });
        }
    });

    afterEach(async () => {
        vi.unstubAllEnvs();
        if (existsSync(tempDir)) {
            await fs.rm(tempDir, { recursive: true, force: true });
        }
    });

    it('resolves the config path from the environment', () => {
        expect(getConfigPath()).toBe(tempConfigPath);
        expect(getConfigPath('custom.json')).toBe(path.resolve('custom.json'));
    });

    it('loads default config when file is missing', async () => {
        const config = await readConfig();
        expect(config).toEqual(DEFAULT_CONFIG);
        expect(config.server.port).toBe(8080);
        expect(config.queue.maxAttempts).toBe(10);
    });

    it('merges a partial file over the defaults', async () => {
        await fs.writeFile(
            tempConfigPath,
            JSON.stringify({
                remote: { clientId: 'client-1', webhookSecret: 'test-secret' },
                watcher: { pollIntervalSec: 0.5 },
                logging: { directory: null },
                mockMode: true,
            }),
            'utf8',
        );

        const config = await readConfig();
        expect(config.remote).toEqual({ ...DEFAULT_CONFIG.remote, clientId: 'client-1', webhookSecret: 'test-secret' });
        expect(config.watcher.pollIntervalSec).toBe(0.5);
        expect(config.watcher.processHistorical).toBe(false);
        expect(config.logging.directory).toBeNull();
        expect(config.mockMode).toBe(true);
    });

    it('ignores values of the wrong type', () => {
        const config = mergeWithDefaults({ server: { port: '9000' }, queue: 'none', logging: { level: 'loud' } });

        expect(config.server.port).toBe(8080);
        expect(config.queue).toEqual(DEFAULT_CONFIG.queue);
        expect(config.logging.level).toBe('info');
    });

    it('handles malformed JSON gracefully by throwing an error', async () => {
        await fs.writeFile(tempConfigPath, '{ malformed: true ', 'utf8');
        await expect(readConfig()).rejects.toThrow(/Failed to parse config file/);
    });

    it('lets environment values win over the file', async () => {
        await fs.writeFile(tempConfigPath, JSON.stringify({ server: { port: 9000 }, remote: { clientId: 'from-file' } }), 'utf8');

        const config = await loadConfig(undefined, {
            BRIDGE_CLIENT_ID: 'from-env',
            API_PORT: '9100',
            POLL_INTERVAL: '1.5',
            PROCESS_HISTORICAL: 'yes',
            MOCK_MODE: 'on',
        });

        expect(config.remote.clientId).toBe('from-env');
        expect(config.server.port).toBe(9100);
        expect(config.watcher.pollIntervalSec).toBe(1.5);
        expect(config.watcher.processHistorical).toBe(true);
        expect(config.mockMode).toBe(true);
    });

    it('skips environment values that cannot be coerced', () => {
        const config = applyEnvOverrides(DEFAULT_CONFIG, { API_PORT: 'eighty', QUEUE_MAX_SIZE: '', MOCK_MODE: 'maybe' });

        expect(config.server.port).toBe(8080);
        expect(config.queue.maxSize).toBe(1000);
        expect(config.mockMode).toBe(false);
    });
});

describe('coerceValue', () => {
    it('parses each kind', () => {
        expect(coerceValue('42', 'integer')).toBe(42);
        expect(coerceValue('4.2', 'integer')).toBeUndefined();
        expect(coerceValue('0.25', 'number')).toBe(0.25);
        expect(coerceValue('Infinity', 'number')).toBeUndefined();
        expect(coerceValue('OFF', 'boolean')).toBe(false);
        expect(coerceValue('1', 'boolean')).toBe(true);
        expect(coerceValue('sure', 'boolean')).toBeUndefined();
        expect(coerceValue('as-is', 'string')).toBe('as-is');
    });
});
