import type { Request, Response } from 'express';
import type { DeadLetterListData, DeadLetterPurgeData, DeadLetterReplayData } from '../../types/api.js';
import type { DeadLetterRecorder } from '../../services/dead-letter-recorder.js';
import { isChannel } from '../../types/messaging.js';
import { maskRecipient } from '../../utils/masking.js';
import { sendError, sendOk, withErrors } from '../shared.js';

export interface DeadLetterDeps {
    deadLetters: DeadLetterRecorder;
}

/** GET /dead-letters?limit=&channel=: newest first, recipients masked, payload omitted. */
export function handleDeadLetterList(deps: DeadLetterDeps) {
    return withErrors(async (req: Request, res: Response): Promise<void> => {
        const requestedLimit = Number(req.query.limit ?? 50);
        const limit = Number.isFinite(requestedLimit) && requestedLimit > 0
            ? Math.min(500, Math.floor(requestedLimit))
            : 50;

        const rawChannel = req.query.channel;
        if (rawChannel !== undefined && (typeof rawChannel !== 'string' || !isChannel(rawChannel))) {
            sendError(res, 'Invalid channel. Expected one of: sms, whatsapp, email.', 400);
            return;
        }
        const channel = typeof rawChannel === 'string' && isChannel(rawChannel) ? rawChannel : undefined;

        const entries = await deps.deadLetters.list(limit, channel);
        const data: DeadLetterListData = {
            entries: entries.map(({ payload, ...entry }) => ({
                ...entry,
                recipient: maskRecipient(entry.channel, payload.to),
            })),
        };
        sendOk(res, data);
    });
}

/** GET /dead-letters/stats */
export function handleDeadLetterStats(deps: DeadLetterDeps) {
    return withErrors(async (_req: Request, res: Response): Promise<void> => {
        sendOk(res, await deps.deadLetters.stats());
    });
}

/** POST /dead-letters/:id/replay */
export function handleDeadLetterReplay(deps: DeadLetterDeps) {
    return withErrors(async (req: Request, res: Response): Promise<void> => {
        const entryId = req.params.id ?? '';
        const messageId = await deps.deadLetters.replay(entryId);
        const data: DeadLetterReplayData = { entryId, messageId };
        sendOk(res, data);
    });
}

/** DELETE /dead-letters/:id */
export function handleDeadLetterDelete(deps: DeadLetterDeps) {
    return withErrors(async (req: Request, res: Response): Promise<void> => {
        const data: DeadLetterPurgeData = { removed: await deps.deadLetters.purge(req.params.id ?? '') };
        sendOk(res, data);
    });
}

/** DELETE /dead-letters: purge everything. */
export function handleDeadLetterPurge(deps: DeadLetterDeps) {
    return withErrors(async (_req: Request, res: Response): Promise<void> => {
        const data: DeadLetterPurgeData = { removed: await deps.deadLetters.purge() };
        sendOk(res, data);
    });
}
