import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleCircuitList, handleCircuitReset, handleHealth } from './handlers/health.js';
import { handleConfigValidate } from './handlers/config-validate.js';
import { handleDispatch } from './handlers/messages.js';
import {
    handleDeadLetterDelete,
    handleDeadLetterList,
    handleDeadLetterPurge,
    handleDeadLetterReplay,
    handleDeadLetterStats,
} from './handlers/dead-letters.js';
import { requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';
import type { RelayConfig } from '../config/relay-config.js';
import type { DeadLetterRecorder } from '../services/dead-letter-recorder.js';
import type { Dispatcher } from '../services/dispatcher.js';
import type { HealthService } from '../services/health-service.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    config: RelayConfig;
    dispatcher: Dispatcher;
    deadLetters: DeadLetterRecorder;
    health: HealthService;
}

/**
 * Build the control-plane HTTP API.
 *
 * Endpoints:
 *   GET    /health                    Overall status, circuits, dead-letter and message counts
 *   GET    /circuits                  Circuit snapshot per provider (signed)
 *   POST   /circuits/:service/reset   Force a circuit closed (signed)
 *   POST   /messages                  Dispatch one message or a batch (signed)
 *   GET    /dead-letters              List dead-letter entries (signed)
 *   GET    /dead-letters/stats        Totals per channel (signed)
 *   POST   /dead-letters/:id/replay   Replay one entry (signed)
 *   DELETE /dead-letters/:id          Delete one entry (signed)
 *   DELETE /dead-letters              Purge every entry (signed)
 *   GET    /config/validate           Running configuration report (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();
    const signed = requireSignature(deps.config.runtime.apiSecret);

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ limit: deps.config.dispatch.maxPayloadBytes * 4, verify: setRawRequestBody }));
    app.use(requestLogger);

    const healthDeps = { health: deps.health };
    const deadLetterDeps = { deadLetters: deps.deadLetters };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(healthDeps));

    app.get('/circuits', signed, handleCircuitList(healthDeps));
    app.post('/circuits/:service/reset', signed, handleCircuitReset(healthDeps));
    app.post('/messages', signed, handleDispatch({ dispatcher: deps.dispatcher }));
    app.get('/dead-letters', signed, handleDeadLetterList(deadLetterDeps));
    app.get('/dead-letters/stats', signed, handleDeadLetterStats(deadLetterDeps));
    app.post('/dead-letters/:id/replay', signed, handleDeadLetterReplay(deadLetterDeps));
    app.delete('/dead-letters/:id', signed, handleDeadLetterDelete(deadLetterDeps));
    app.delete('/dead-letters', signed, handleDeadLetterPurge(deadLetterDeps));
    app.get('/config/validate', signed, handleConfigValidate({ config: deps.config }));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    return app;
}

/** Listen on `runtime.apiPort`. Resolves once the port is bound. */
export function startApiServer(app: Express, port: number): Promise<Server> {
    const server = createServer(app);
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            console.log(`[Relay API] Control plane listening on http://localhost:${port}`);
            void logThought(`[API] HTTP server started on port ${port}.`);
            resolve(server);
        });
    });
}
