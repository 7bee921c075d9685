import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { validateRelayConfig, type RelayConfig } from './relay-config-schema.js';
import type { Channel } from '../types/messaging.js';
import type { CircuitBreakerSettings } from '../types/circuit.js';
import type { RetryPolicy } from '../utils/backoff.js';
import { ConfigValidationError } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

export type { RelayConfig } from './relay-config-schema.js';

export const DEFAULT_CONFIG_FILE = 'relay.config.json';

export const DEFAULT_CONFIG: RelayConfig = {
    runtime: {
        apiPort: 3100,
        apiSecret: '',
    },
    storage: {
        databasePath: 'data/relay.db',
    },
    dispatch: {
        maxPayloadBytes: 262_144,
        scheduler: 'timer',
        pollCronExpression: '* * * * * *',
        batchSize: 10,
    },
    retry: {
        channels: {
            sms: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60_000, strategy: 'exponential' },
            whatsapp: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60_000, strategy: 'exponential' },
            email: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 60_000, strategy: 'exponential' },
        },
    },
    circuitBreaker: {
        failureThreshold: 5,
        timeoutSeconds: 60,
        successThreshold: 2,
        maxTrials: 3,
        stateTtlSeconds: 86_400,
        failureWindowSeconds: 3_600,
        trialTtlSeconds: 300,
    },
    deadLetter: {
        enabled: true,
    },
    cache: {
        driver: 'memory',
        redisUrl: '',
        keyPrefix: 'circuit_breaker',
    },
};

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively overlay `override` onto `base`. Arrays and scalars replace; records merge. */
export function deepMerge(base: unknown, override: unknown): unknown {
    if (!isRecord(base) || !isRecord(override)) {
        return override === undefined ? base : override;
    }
    const merged: JsonRecord = { ...base };
    for (const [key, value] of Object.entries(override)) {
        merged[key] = deepMerge(base[key], value);
    }
    return merged;
}

/** `RELAY_*` variable → dotted config path. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
    ['RELAY_API_PORT', ['runtime', 'apiPort']],
    ['RELAY_API_SECRET', ['runtime', 'apiSecret']],
    ['RELAY_DATABASE_PATH', ['storage', 'databasePath']],
    ['RELAY_MAX_PAYLOAD_BYTES', ['dispatch', 'maxPayloadBytes']],
    ['RELAY_SCHEDULER', ['dispatch', 'scheduler']],
    ['RELAY_POLL_CRON', ['dispatch', 'pollCronExpression']],
    ['RELAY_DEAD_LETTER_ENABLED', ['deadLetter', 'enabled']],
    ['RELAY_CACHE_DRIVER', ['cache', 'driver']],
    ['RELAY_REDIS_URL', ['cache', 'redisUrl']],
    ['RELAY_CB_FAILURE_THRESHOLD', ['circuitBreaker', 'failureThreshold']],
    ['RELAY_CB_TIMEOUT_SECONDS', ['circuitBreaker', 'timeoutSeconds']],
];

function coerceEnvValue(raw: string, current: unknown): unknown {
    if (typeof current === 'number') {
        const value = Number(raw);
        return Number.isFinite(value) ? value : raw;
    }
    if (typeof current === 'boolean') {
        const normalized = raw.trim().toLowerCase();
        if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
        if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
        return raw;
    }
    return raw;
}

function readPath(record: unknown, segments: readonly string[]): unknown {
    let cursor = record;
    for (const segment of segments) {
        if (!isRecord(cursor)) return undefined;
        cursor = cursor[segment];
    }
    return cursor;
}

function nestedRecord(segments: readonly string[], value: unknown): unknown {
    return segments.reduceRight<unknown>((inner, segment) => ({ [segment]: inner }), value);
}

/** Overlay non-empty `RELAY_*` variables, typed after the value they replace. */
export function applyEnvOverrides(config: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    let result = config;
    for (const [variable, segments] of ENV_OVERRIDES) {
        const raw = env[variable];
        if (raw === undefined || raw.trim() === '') continue;
        const value = coerceEnvValue(raw, readPath(DEFAULT_CONFIG, segments));
        result = deepMerge(result, nestedRecord(segments, value));
    }
    return result;
}

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.RELAY_CONFIG_PATH) {
        return path.resolve(process.env.RELAY_CONFIG_PATH);
    }
    return path.resolve(DEFAULT_CONFIG_FILE);
}

/**
 * Defaults, overlaid with the parsed file contents, overlaid with the environment, validated.
 * Throws {@link ConfigValidationError} when the result is invalid.
 */
export function resolveConfig(fileContents: unknown, env: NodeJS.ProcessEnv = process.env, source = 'inline'): RelayConfig {
    const merged = applyEnvOverrides(deepMerge(DEFAULT_CONFIG, fileContents ?? {}), env);
    const result = validateRelayConfig(merged);
    if (!result.config) {
        throw new ConfigValidationError(source, result.errors);
    }
    for (const warning of result.warnings) {
        void logThought(`[RelayConfig] Warning (${source}): ${warning}`);
    }
    return result.config;
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** A missing file yields defaults; an unreadable or malformed one is an error. */
export async function readConfig(overridePath?: string, env: NodeJS.ProcessEnv = process.env): Promise<RelayConfig> {
    const targetPath = getConfigPath(overridePath);
    let parsed: unknown = {};
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        parsed = JSON.parse(rawData);
    } catch (error) {
        if (!isMissingFile(error)) {
            throw new Error(
                `Failed to parse config file at ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
            );
        }
    }
    return resolveConfig(parsed, env, targetPath);
}

export function loadConfigSync(overridePath?: string, env: NodeJS.ProcessEnv = process.env): RelayConfig {
    const targetPath = getConfigPath(overridePath);
    let parsed: unknown = {};
    if (existsSync(targetPath)) {
        try {
            parsed = JSON.parse(readFileSync(targetPath, 'utf8'));
        } catch (error) {
            throw new Error(
                `Failed to parse config file at ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
            );
        }
    }
    return resolveConfig(parsed, env, targetPath);
}

export function getChannelRetryPolicy(config: RelayConfig, channel: Channel): RetryPolicy {
    return { ...config.retry.channels[channel] };
}

export function getCircuitBreakerSettings(config: RelayConfig): CircuitBreakerSettings {
    return { ...config.circuitBreaker };
}
