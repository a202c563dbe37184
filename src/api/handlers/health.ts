import type { Request, Response } from 'express';
import type { HealthData, ServiceBanner } from '../../types/api.js';
import type { DispatchRouter } from '../../core/dispatch-router.js';
import type { MessageProcessor } from '../../core/message-processor.js';
import { sendOk } from '../shared.js';

export interface HealthDeps {
    router: Pick<DispatchRouter, 'healthSnapshot'>;
}

export interface StatsDeps {
    processor: Pick<MessageProcessor, 'getStats'>;
}

/** GET /health — per-adapter health; degraded when any adapter is not ready. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const adapters = deps.router.healthSnapshot();
        const data: HealthData = {
            status: Object.values(adapters).every((adapter) => adapter.healthy) ? 'healthy' : 'degraded',
            timestamp: new Date().toISOString(),
            adapters,
        };
        sendOk(res, data);
    };
}

/** GET /stats — aggregate processor statistics. */
export function handleStats(deps: StatsDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.processor.getStats());
    };
}

/** GET / */
export function handleRoot() {
    return (_req: Request, res: Response): void => {
        const banner: ServiceBanner = { service: 'Multi-Protocol Gateway', status: 'running' };
        sendOk(res, banner);
    };
}
