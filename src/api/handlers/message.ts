import type { Request, Response } from 'express';
import type { DispatchRouter } from '../../core/dispatch-router.js';
import { createLogger } from '../../utils/logger.js';
import { mapError, sendError, sendOk, statusForErrorKind } from '../shared.js';

const log = createLogger('api:message');

export interface MessageDeps {
    router: Pick<DispatchRouter, 'routeRaw'>;
}

/**
 * POST /message
 *
 * Unified endpoint for every client type. The body is a canonical message;
 * the router picks the adapter from its `clientType`.
 *
 * Responses:
 *   200 `{ status: 'ok', messageId, response }`
 *   400 malformed body or unsupported client type
 *   422 / 503 adapter rejected the message (validation / not ready)
 */
export function handleUnifiedMessage(deps: MessageDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const reply = await deps.router.routeRaw(req.body);
            if (reply.status === 'ok') {
                sendOk(res, reply);
                return;
            }
            sendError(res, reply.response, statusForErrorKind(reply.errorKind), reply.errorKind);
        } catch (err) {
            const mapped = mapError(err);
            if (mapped.status >= 500) {
                log.error({ err, correlationId: res.locals.correlationId }, 'Unified message handling failed');
            }
            sendError(res, mapped.message, mapped.status, mapped.kind);
        }
    };
}
