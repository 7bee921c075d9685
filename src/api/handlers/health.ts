import type { Request, Response } from 'express';
import type { CircuitListData, HealthData } from '../../types/api.js';
import type { HealthService } from '../../services/health-service.js';
import { sendError, sendOk, withErrors } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    health: HealthService;
}

/** GET /health: overall status, circuits, dead-letter and message counts. */
export function handleHealth(deps: HealthDeps) {
    return withErrors(async (_req: Request, res: Response): Promise<void> => {
        const report = await deps.health.report();

        const data: HealthData = {
            status: report.status,
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            openCircuits: report.openCircuits,
            circuits: report.circuits,
            deadLetters: report.deadLetters,
            messages: report.messages,
            metrics: report.metrics,
        };

        sendOk(res, data);
    });
}

/** GET /circuits */
export function handleCircuitList(deps: HealthDeps) {
    return withErrors(async (_req: Request, res: Response): Promise<void> => {
        const data: CircuitListData = { circuits: await deps.health.circuits() };
        sendOk(res, data);
    });
}

/** POST /circuits/:service/reset */
export function handleCircuitReset(deps: HealthDeps) {
    return withErrors(async (req: Request, res: Response): Promise<void> => {
        const service = req.params.service;
        if (!service || !deps.health.providers().includes(service)) {
            sendError(res, `Unknown circuit '${service ?? ''}'.`, 404);
            return;
        }
        sendOk(res, await deps.health.resetCircuit(service));
    });
}
