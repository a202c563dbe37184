import { createServer, type Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express } from 'express';
import cors from 'cors';
import { handleHealth, handleRoot, handleStats } from './handlers/health.js';
import { handleUnifiedMessage } from './handlers/message.js';
import { handleCliExecute, handleCliHelp, handleWebMessage, handleWebStatus } from './handlers/protocol.js';
import { requestLogger, requireApiKey, sendError } from './shared.js';
import type { DispatchRouter } from '../core/dispatch-router.js';
import type { MessageProcessor } from '../core/message-processor.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('api');

export interface ApiServerDeps {
    router: DispatchRouter;
    processor: MessageProcessor;
    apiKeys: readonly string[];
    corsOrigins: readonly string[];
}

// Body-parser failures (malformed JSON) and anything a handler let escape.
const handleUncaught: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (err instanceof SyntaxError) {
        sendError(res, 'Malformed JSON body.', 400);
        return;
    }
    log.error({ err, correlationId: res.locals.correlationId }, 'Unhandled request error');
    sendError(res, 'Internal server error', 500);
};

/**
 * Build the gateway HTTP app.
 *
 * Endpoints:
 *   POST /message      — Unified message endpoint, routed by clientType (API key)
 *   POST /web/message  — Web protocol message (API key)
 *   GET  /web/status   — Web adapter status and sessions (API key)
 *   POST /cli/execute  — CLI protocol command (API key)
 *   GET  /cli/help     — CLI command catalogue
 *   GET  /health       — Per-adapter health
 *   GET  /stats        — Aggregate processor statistics
 *   GET  /             — Service banner
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const { web, cli } = deps.router.adapters;
    const apiKey = requireApiKey(deps.apiKeys);

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(
        cors({
            origin: deps.corsOrigins.includes('*') ? '*' : [...deps.corsOrigins],
            methods: ['GET', 'POST'],
        }),
    );
    app.use(express.json());
    app.use(requestLogger);

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/', handleRoot());
    app.get('/health', handleHealth({ router: deps.router }));
    app.get('/stats', handleStats({ processor: deps.processor }));
    app.get('/cli/help', handleCliHelp({ cli }));

    app.post('/message', apiKey, handleUnifiedMessage({ router: deps.router }));
    app.post('/web/message', apiKey, handleWebMessage({ web }));
    app.get('/web/status', apiKey, handleWebStatus({ web }));
    app.post('/cli/execute', apiKey, handleCliExecute({ cli }));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });
    app.use(handleUncaught);

    return app;
}

/** Create the app and start listening. Resolves once the port is bound. */
export function startApiServer(deps: ApiServerDeps, port: number): Promise<Server> {
    const server = createServer(createApiApp(deps));

    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            log.info({ port }, `Gateway listening on http://localhost:${port}`);
            resolve(server);
        });
    });
}
