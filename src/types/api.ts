import type { AdapterHealth, ClientType } from './messaging.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    /** Machine-readable error category, e.g. `validation` or `adapter_not_ready`. */
    errorKind?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'healthy' | 'degraded';
    timestamp: string;
    adapters: Record<ClientType, AdapterHealth>;
}

export interface ServiceBanner {
    service: string;
    status: 'running';
}
