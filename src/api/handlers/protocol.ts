import type { Request, Response } from 'express';
import type { WebAdapter } from '../../adapters/web-adapter.js';
import type { CliAdapter } from '../../adapters/cli-adapter.js';
import type { CliReply, WebReply } from '../../types/messaging.js';
import { sendError, sendOk, statusForErrorKind } from '../shared.js';

export interface WebDeps {
    web: Pick<WebAdapter, 'dispatch' | 'getStatus'>;
}

export interface CliDeps {
    cli: Pick<CliAdapter, 'dispatch' | 'getHelp'>;
}

function sendProtocolReply(res: Response, reply: WebReply | CliReply): void {
    if (reply.success) {
        sendOk(res, reply);
        return;
    }
    sendError(res, reply.error, statusForErrorKind(reply.errorKind), reply.errorKind);
}

/** POST /web/message — body `{ content, userId, sessionId?, messageType? }`. */
export function handleWebMessage(deps: WebDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        sendProtocolReply(res, await deps.web.dispatch(req.body));
    };
}

/** GET /web/status — adapter counters and the live session table. */
export function handleWebStatus(deps: WebDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.web.getStatus());
    };
}

/** POST /cli/execute — body `{ command, args?, userId, options? }`. */
export function handleCliExecute(deps: CliDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        sendProtocolReply(res, await deps.cli.dispatch(req.body));
    };
}

/** GET /cli/help */
export function handleCliHelp(deps: CliDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.cli.getHelp());
    };
}
