import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, randomUUID, timingSafeEqual } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { isGatewayError, type GatewayErrorKind } from '../core/errors.js';
import { createLogger, scrubSensitiveText } from '../utils/logger.js';

const log = createLogger('api');

// ── Response Helpers ────────────────────────────────────────────────────────

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const correlationId = correlationIdOf(res);
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400, errorKind?: string): void {
    const correlationId = correlationIdOf(res);
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        errorKind,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

function digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * Require a known key in the `X-API-Key` header.
 *
 * Missing header → 401, unknown key → 403. Keys are compared in constant time.
 */
export function requireApiKey(validKeys: readonly string[]): RequestHandler {
    const expected = validKeys.map(digest);

    return (req: Request, res: Response, next: NextFunction): void => {
        const header = req.headers['x-api-key'];
        const provided = typeof header === 'string' ? header.trim() : '';

        if (!provided) {
            log.warn({ correlationId: res.locals.correlationId }, 'Request rejected: missing API key');
            sendError(res, 'Missing API key.', 401);
            return;
        }

        const providedDigest = digest(provided);
        if (!expected.some((candidate) => timingSafeEqual(candidate, providedDigest))) {
            log.warn({ correlationId: res.locals.correlationId }, 'Request rejected: invalid API key');
            sendError(res, 'Invalid API key.', 403);
            return;
        }

        next();
    };
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_KIND: Record<GatewayErrorKind, number> = {
    validation: 422,
    unsupported_client_type: 400,
    adapter_not_ready: 503,
    processing_failure: 500,
    config: 500,
};

function isErrorKind(kind: string): kind is GatewayErrorKind {
    return Object.prototype.hasOwnProperty.call(STATUS_BY_KIND, kind);
}

/** HTTP status for an adapter-level failure result. */
export function statusForErrorKind(kind: string | undefined): number {
    return kind !== undefined && isErrorKind(kind) ? STATUS_BY_KIND[kind] : 500;
}

/** Map an error thrown out of the router to a status code and message. */
export function mapError(err: unknown): { status: number; message: string; kind?: string } {
    if (isGatewayError(err)) {
        const status = err.kind === 'validation' ? 400 : statusForErrorKind(err.kind);
        return { status, message: scrubSensitiveText(err.message), kind: err.kind };
    }
    return { status: 500, message: 'Internal server error' };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    log.info({ correlationId, method: req.method, path: req.path }, 'HTTP request');
    next();
}
