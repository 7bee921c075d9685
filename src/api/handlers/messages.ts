import type { Request, Response } from 'express';
import type { DispatchBatchData, DispatchData } from '../../types/api.js';
import type { Dispatcher } from '../../services/dispatcher.js';
import { parseMessageIntent } from '../../services/message-intent.js';
import type { MessageIntent } from '../../types/messaging.js';
import { IntentValidationError } from '../../utils/errors.js';
import { sendError, sendOk, withErrors } from '../shared.js';

const MAX_BATCH_SIZE = 100;

export interface MessageDeps {
    dispatcher: Dispatcher;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toIntent(value: unknown, index?: number): MessageIntent {
    if (!isRecord(value)) {
        throw new IntentValidationError([index === undefined ? 'Body must be a JSON object' : `messages.${index}: must be an object`]);
    }
    return parseMessageIntent(value);
}

/**
 * POST /messages: `{ channel, to, ... }` dispatches one message (201);
 * `{ messages: [...] }` dispatches a batch in order.
 */
export function handleDispatch(deps: MessageDeps) {
    return withErrors(async (req: Request, res: Response): Promise<void> => {
        const body: unknown = req.body;

        if (isRecord(body) && Array.isArray(body.messages)) {
            if (body.messages.length === 0 || body.messages.length > MAX_BATCH_SIZE) {
                sendError(res, `messages must contain between 1 and ${MAX_BATCH_SIZE} entries.`, 400);
                return;
            }
            const intents = body.messages.map((entry: unknown, index: number) => toIntent(entry, index));
            const data: DispatchBatchData = { messageIds: await deps.dispatcher.dispatchBatch(intents) };
            sendOk(res, data, 201);
            return;
        }

        const data: DispatchData = { messageId: await deps.dispatcher.dispatch(toIntent(body)) };
        sendOk(res, data, 201);
    });
}
