import type { ConfigValidationResult } from '../config/env-validator.js';
import type { StatusTrackerStats } from '../services/status-tracker.js';
import type { ForwardingMetrics, QueueStats } from './delivery.js';
import type { JobSnapshot } from './scheduler.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    watcherRunning: boolean;
    uptimeSec: number;
    version: string;
    queueSize: number;
}

// ── Status ──────────────────────────────────────────────────────────────────

export interface StatusData {
    bridge: {
        uptimeSec: number;
        version: string;
        mockMode: boolean;
    };
    watcher: {
        running: boolean;
        lastCursor: number;
        pollIntervalSec: number;
    };
    remote: {
        baseUrl: string;
        clientIdConfigured: boolean;
        connected: boolean;
    };
    queue: QueueStats;
    tracker: StatusTrackerStats;
    forwarding: ForwardingMetrics;
    jobs: JobSnapshot[];
    config: ConfigValidationResult;
}

// ── Requests ────────────────────────────────────────────────────────────────

export interface SendRequestBody {
    phone: string;
    text: string;
}

export interface InjectRequestBody extends SendRequestBody {
    channelKind?: 'imessage' | 'sms';
}
