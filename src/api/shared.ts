import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { RelayError } from '../utils/errors.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
}

/** Raw body (or the empty string), then the parsed body re-serialized as-is and with sorted keys. */
function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    // No raw body means nothing was parsed; such requests sign the empty string.
    if ('rawBody' in req && typeof req.rawBody === 'string') {
        payloads.add(req.rawBody);
    } else {
        payloads.add('');
    }

    if (req.body === undefined) {
        return [...payloads];
    }

    const stringified = JSON.stringify(req.body);
    if (typeof stringified === 'string') {
        payloads.add(stringified);
    }
    payloads.add(stableStringify(req.body));

    return [...payloads];
}

/** `express.json({ verify })` hook keeping the exact bytes the signature was computed over. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    Object.assign(req, { rawBody: buffer.toString('utf8') });
}

export function signPayload(payload: string, secret: string): string {
    return `sha256=${createHmac('sha256', secret).update(payload).digest('hex')}`;
}

// ── Response Helpers ────────────────────────────────────────────────────────

function correlationIdOf(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const body: ApiEnvelope = {
        ok: false,
        error: scrubSensitiveText(message),
        correlationId: correlationIdOf(res),
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on signed API requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, apiSecret)>`. Requests without a
 * JSON body sign the empty string. With no secret configured every signed request is rejected.
 */
export function requireSignature(apiSecret: string): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        if (!apiSecret) {
            void logThought('[API] Signed request rejected: apiSecret not configured.');
            sendError(res, 'Signed API endpoints are unavailable (missing apiSecret).', 503);
            return;
        }

        const signatureHeader = req.headers['x-signature'];
        if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
            void logThought('[API] Signed request rejected: missing or malformed X-Signature header.');
            sendError(res, 'Missing or malformed X-Signature header.', 401);
            return;
        }

        const providedHex = signatureHeader.slice('sha256='.length);
        if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
            void logThought('[API] Signed request rejected: malformed signature digest.');
            sendError(res, 'Malformed signature digest.', 401);
            return;
        }
        const provided = Buffer.from(providedHex, 'hex');
        const signatureMatches = getSignaturePayloadCandidates(req).some((payload) => {
            const expected = createHmac('sha256', apiSecret).update(payload).digest();
            return provided.length === expected.length && timingSafeEqual(provided, expected);
        });

        if (!signatureMatches) {
            void logThought('[API] Signed request rejected: signature mismatch.');
            sendError(res, 'Invalid signature.', 403);
            return;
        }

        next();
    };
}

// ── Error Mapping ───────────────────────────────────────────────────────────

const STATUS_BY_CODE: Record<string, number> = {
    INTENT_INVALID: 400,
    CONFIG_INVALID: 400,
    PAYLOAD_TOO_LARGE: 413,
    DEAD_LETTER_NOT_FOUND: 404,
    MESSAGE_NOT_FOUND: 404,
    IDEMPOTENCY_CONFLICT_UNRESOLVED: 409,
    REPLAY_CONFLICT: 409,
};

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof RelayError) {
        return { status: STATUS_BY_CODE[err.code] ?? 500, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

/** Wrap an async handler so a rejection becomes an enveloped error response. */
export function withErrors(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response): void => {
        handler(req, res).catch((err: unknown) => {
            const { status, message } = mapError(err);
            if (status >= 500) {
                void logThought(`[API] [${correlationIdOf(res) ?? '-'}] ${req.method} ${req.path} failed: ${message}`);
            }
            sendError(res, message, status);
        });
    };
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    void logThought(`[API] [${correlationId}] ${req.method} ${req.path}`);
    next();
}
