/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Missing required values (client id, webhook secret).
 *   - A webhook secret still set to the shipped placeholder.
 *   - Format/range violations, both in the merged config and in raw env values
 *     that could not be coerced.
 *
 * No secret values are ever included in the output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import { coerceValue, PLACEHOLDER_SECRET, type BridgeConfig } from './json-config.js';
import { parseLogThreshold } from '../utils/logger.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'insecure_default' | 'format_error';

export interface ConfigIssue {
  /** Affected config key. */
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when nothing required is missing and every value is well-formed. */
  ok: boolean;
  issues: ConfigIssue[];
  /** Subset of issues with class `missing_required`. */
  fatalIssues: ConfigIssue[];
  /** ISO-8601 timestamp of validation run. */
  validatedAt: string;
}

// ── Internal helpers ─────────────────────────────────────────────────────────

function remediationFor(key: string): string {
  return CONFIG_SCHEMA.find((spec) => spec.key === key)?.remediation ?? '';
}

function issue(key: string, issueClass: ConfigIssueClass, message: string): ConfigIssue {
  return { key, class: issueClass, message, remediation: remediationFor(key) };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** Raw env values that `applyEnvOverrides` had to ignore. */
function rawEnvIssues(env: NodeJS.ProcessEnv): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const raw = env[spec.key]?.trim();
    if (!raw) continue;

    if (coerceValue(raw, spec.kind) === undefined) {
      issues.push(issue(spec.key, 'format_error', `${spec.key} must be a valid ${spec.kind}, got '${raw}'.`));
      continue;
    }
    if (spec.key === 'LOG_LEVEL' && parseLogThreshold(raw) === null) {
      issues.push(issue(spec.key, 'format_error', `LOG_LEVEL is not a known level, got '${raw}'.`));
    }
  }

  return issues;
}

function remoteIssues(config: BridgeConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const { remote } = config;

  if (!remote.clientId.trim()) {
    issues.push(
      issue('BRIDGE_CLIENT_ID', 'missing_required', 'Client id is not configured; webhooks will not be delivered.'),
    );
  }

  if (!remote.webhookSecret.trim()) {
    issues.push(issue('WEBHOOK_SECRET', 'missing_required', 'Webhook secret is not configured.'));
  } else if (remote.webhookSecret === PLACEHOLDER_SECRET) {
    issues.push(issue('WEBHOOK_SECRET', 'insecure_default', 'Webhook secret is still the placeholder value.'));
  }

  try {
    const url = new URL(remote.baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      issues.push(issue('REMOTE_BASE_URL', 'format_error', `Remote base URL must use http or https, got '${url.protocol}'.`));
    }
  } catch {
    issues.push(issue('REMOTE_BASE_URL', 'format_error', `Remote base URL '${remote.baseUrl}' is not a valid URL.`));
  }

  if (!isPositiveInteger(remote.timeoutMs)) {
    issues.push(issue('REMOTE_TIMEOUT_MS', 'format_error', `Remote timeout must be a positive integer, got ${remote.timeoutMs}.`));
  }

  return issues;
}

function runtimeIssues(config: BridgeConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const { watcher, queue, server } = config;

  if (!(watcher.pollIntervalSec >= 0)) {
    issues.push(issue('POLL_INTERVAL', 'format_error', `Poll interval must be >= 0 seconds, got ${watcher.pollIntervalSec}.`));
  }

  if (!Number.isInteger(server.port) || server.port < 1 || server.port > 65535) {
    issues.push(issue('API_PORT', 'format_error', `API port must be an integer in range 1-65535, got ${server.port}.`));
  }

  const queueBounds: Array<[string, string, number]> = [
    ['QUEUE_MAX_SIZE', 'Queue capacity', queue.maxSize],
    ['QUEUE_BASE_DELAY_MS', 'Queue base delay', queue.baseDelayMs],
    ['QUEUE_MAX_DELAY_MS', 'Queue max delay', queue.maxDelayMs],
    ['QUEUE_MAX_ATTEMPTS', 'Queue max attempts', queue.maxAttempts],
  ];
  for (const [key, label, value] of queueBounds) {
    if (!isPositiveInteger(value)) {
      issues.push(issue(key, 'format_error', `${label} must be a positive integer, got ${value}.`));
    }
  }

  if (queue.maxDelayMs < queue.baseDelayMs) {
    issues.push(
      issue(
        'QUEUE_MAX_DELAY_MS',
        'format_error',
        `Queue max delay (${queue.maxDelayMs}) is smaller than the base delay (${queue.baseDelayMs}).`,
      ),
    );
  }

  return issues;
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate the merged configuration and the raw environment it came from.
 *
 * Never throws: a missing client id keeps the loops running, and delivery
 * resumes once the value is corrected.
 */
export function validateRuntimeConfig(
  config: BridgeConfig,
  env: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues = [...rawEnvIssues(env), ...remoteIssues(config), ...runtimeIssues(config)];
  const fatalIssues = issues.filter((i) => i.class === 'missing_required');

  return {
    ok: fatalIssues.length === 0 && !issues.some((i) => i.class === 'format_error'),
    issues,
    fatalIssues,
    validatedAt: now().toISOString(),
  };
}
