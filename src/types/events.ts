import type { CircuitState } from './circuit.js';
import type { Channel, MessageStatus, SendStatus } from './messaging.js';

/** Domain notifications emitted by the dispatch engine. */
export type DispatchEvent =
    | {
        type: 'message.queued';
        messageId: string;
        channel: Channel;
        scheduledFor: string | null;
        timestamp: string;
    }
    | {
        type: 'message.duplicate_skipped';
        existingMessageId: string;
        idempotencyKey: string;
        channel: Channel;
        status: MessageStatus;
        timestamp: string;
    }
    | {
        type: 'message.create_conflict';
        existingMessageId: string;
        idempotencyKey: string;
        channel: Channel;
        timestamp: string;
    }
    | {
        type: 'message.retry_scheduled';
        messageId: string;
        channel: Channel;
        attempt: number;
        delayMs: number;
        timestamp: string;
    }
    | {
        type: 'message.sending';
        messageId: string;
        channel: Channel;
        attempt: number;
        timestamp: string;
    }
    | {
        type: 'message.finalized';
        messageId: string;
        channel: Channel;
        status: SendStatus;
        providerMessageId: string | null;
        errorCode: string | null;
        timestamp: string;
    }
    | {
        type: 'message.dead_lettered';
        messageId: string;
        entryId: string | null;
        channel: Channel;
        attempts: number;
        errorCode: string;
        errorMessage: string;
        timestamp: string;
    }
    | {
        type: 'message.replayed';
        messageId: string;
        entryId: string;
        channel: Channel;
        timestamp: string;
    }
    | {
        type: 'circuit.state_changed';
        service: string;
        from: CircuitState;
        to: CircuitState;
        timestamp: string;
    };

export type DispatchEventType = DispatchEvent['type'];

export type DispatchEventListener = (event: DispatchEvent) => void;

/** Fire-and-forget notification target. */
export interface EventSink {
    emit(event: DispatchEvent): void;
}

export type MetricTags = Record<string, string>;

export interface MetricsSink {
    increment(metric: string, by?: number, tags?: MetricTags): void;
}
