import type { CircuitSnapshot } from './circuit.js';
import type { Channel, DeadLetterEntry, MessageStatus } from './messaging.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'healthy' | 'degraded';
    uptimeSec: number;
    openCircuits: string[];
    circuits: CircuitSnapshot[];
    deadLetters: { total: number; byChannel: Partial<Record<Channel, number>> };
    messages: Partial<Record<MessageStatus, number>>;
    metrics: Array<{ metric: string; tags: Record<string, string>; value: number }>;
}

// ── Circuits ────────────────────────────────────────────────────────────────

export interface CircuitListData {
    circuits: CircuitSnapshot[];
}

// ── Messages ────────────────────────────────────────────────────────────────

export interface DispatchData {
    messageId: string;
}

export interface DispatchBatchData {
    messageIds: string[];
}

// ── Dead letters ────────────────────────────────────────────────────────────

export interface DeadLetterListData {
    entries: Array<Omit<DeadLetterEntry, 'payload'> & { recipient: string }>;
}

export interface DeadLetterReplayData {
    entryId: string;
    messageId: string;
}

export interface DeadLetterPurgeData {
    removed: number;
}

// ── Config ──────────────────────────────────────────────────────────────────

export interface ConfigValidationData {
    valid: boolean;
    errors: string[];
    warnings: string[];
    validatedAt: string;
}
