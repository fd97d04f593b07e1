/**
 * Centralized registry of the environment keys consumed by the bridge.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `path`        Dotted location of the value inside `BridgeConfig`.
 *   - `kind`        How the raw string is coerced before it is applied.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'remote' | 'watcher' | 'queue' | 'server' | 'runtime';

export type ConfigValueKind = 'string' | 'integer' | 'number' | 'boolean';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  path: string;
  kind: ConfigValueKind;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Remote service ─────────────────────────────────────────────────────────
  {
    key: 'REMOTE_BASE_URL',
    type: 'env',
    class: 'optional',
    scope: 'remote',
    path: 'remote.baseUrl',
    kind: 'string',
    description: 'Base URL of the remote webhook service (default: http://localhost:8000).',
    remediation: 'Set REMOTE_BASE_URL to the public URL of the webhook service, e.g. https://hooks.example.com.',
  },
  {
    key: 'BRIDGE_CLIENT_ID',
    type: 'env',
    class: 'required',
    scope: 'remote',
    path: 'remote.clientId',
    kind: 'string',
    description: 'Client identifier templated into every webhook URL.',
    remediation: 'Set BRIDGE_CLIENT_ID (or remote.clientId in bridge.json). Webhooks are not delivered without it.',
  },
  {
    key: 'WEBHOOK_SECRET',
    type: 'secret',
    class: 'required',
    scope: 'remote',
    path: 'remote.webhookSecret',
    kind: 'string',
    description: 'Shared secret sent as X-Bridge-Secret and required on inbound /send calls.',
    remediation: 'Set WEBHOOK_SECRET to the value configured on the webhook service.',
  },
  {
    key: 'REMOTE_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'remote',
    path: 'remote.timeoutMs',
    kind: 'integer',
    description: 'HTTP timeout for webhook calls in milliseconds (default: 30000).',
    remediation: 'Set REMOTE_TIMEOUT_MS to a positive integer.',
  },

  // ── Watcher ────────────────────────────────────────────────────────────────
  {
    key: 'CHAT_DB_PATH',
    type: 'env',
    class: 'optional',
    scope: 'watcher',
    path: 'watcher.chatDbPath',
    kind: 'string',
    description: 'Location of the Messages database (default: ~/Library/Messages/chat.db).',
    remediation: 'Point CHAT_DB_PATH at an existing chat.db and grant Full Disk Access to the process.',
  },
  {
    key: 'POLL_INTERVAL',
    type: 'env',
    class: 'optional',
    scope: 'watcher',
    path: 'watcher.pollIntervalSec',
    kind: 'number',
    description: 'Seconds between chat.db polls (default: 2).',
    remediation: 'Set POLL_INTERVAL to a non-negative number of seconds, e.g. POLL_INTERVAL=2.',
  },
  {
    key: 'PROCESS_HISTORICAL',
    type: 'env',
    class: 'optional',
    scope: 'watcher',
    path: 'watcher.processHistorical',
    kind: 'boolean',
    description: 'Forward messages already in chat.db at startup (default: false).',
    remediation: 'Set PROCESS_HISTORICAL=true to replay the backlog on startup.',
  },

  // ── Retry queue ────────────────────────────────────────────────────────────
  {
    key: 'QUEUE_MAX_SIZE',
    type: 'env',
    class: 'optional',
    scope: 'queue',
    path: 'queue.maxSize',
    kind: 'integer',
    description: 'Maximum number of failed deliveries held for retry (default: 1000).',
    remediation: 'Set QUEUE_MAX_SIZE to a positive integer.',
  },
  {
    key: 'QUEUE_BASE_DELAY_MS',
    type: 'env',
    class: 'optional',
    scope: 'queue',
    path: 'queue.baseDelayMs',
    kind: 'integer',
    description: 'Initial retry delay in milliseconds (default: 5000).',
    remediation: 'Set QUEUE_BASE_DELAY_MS to a positive integer.',
  },
  {
    key: 'QUEUE_MAX_DELAY_MS',
    type: 'env',
    class: 'optional',
    scope: 'queue',
    path: 'queue.maxDelayMs',
    kind: 'integer',
    description: 'Upper bound of the retry delay in milliseconds (default: 300000).',
    remediation: 'Set QUEUE_MAX_DELAY_MS to a positive integer no smaller than QUEUE_BASE_DELAY_MS.',
  },
  {
    key: 'QUEUE_MAX_ATTEMPTS',
    type: 'env',
    class: 'optional',
    scope: 'queue',
    path: 'queue.maxAttempts',
    kind: 'integer',
    description: 'Retry attempts before a delivery is dropped (default: 10).',
    remediation: 'Set QUEUE_MAX_ATTEMPTS to a positive integer.',
  },

  // ── HTTP server ────────────────────────────────────────────────────────────
  {
    key: 'API_HOST',
    type: 'env',
    class: 'optional',
    scope: 'server',
    path: 'server.host',
    kind: 'string',
    description: 'Interface the control-plane API binds to (default: 0.0.0.0).',
    remediation: 'Set API_HOST to 127.0.0.1 to keep the API local.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'server',
    path: 'server.port',
    kind: 'integer',
    description: 'Listening port for the control-plane API (default: 8080).',
    remediation: 'Set API_PORT to an integer in range 1-65535.',
  },

  // ── Runtime ────────────────────────────────────────────────────────────────
  {
    key: 'LOG_LEVEL',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    path: 'logging.level',
    kind: 'string',
    description: "Log threshold: 'debug', 'info', 'warn', 'error' or 'silent' (default: info).",
    remediation: 'Set LOG_LEVEL to one of debug, info, warn, error, silent.',
  },
  {
    key: 'LOG_DIR',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    path: 'logging.directory',
    kind: 'string',
    description: 'Directory receiving the daily markdown log files (default: logs).',
    remediation: 'Set LOG_DIR to a writable directory.',
  },
  {
    key: 'MOCK_MODE',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    path: 'mockMode',
    kind: 'boolean',
    description: 'Replace the chat.db watcher and AppleScript sender with in-memory doubles.',
    remediation: 'Set MOCK_MODE=true for local development without Messages access.',
  },
];
