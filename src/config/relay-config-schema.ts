import cron from 'node-cron';
import { z } from 'zod';
import { CHANNELS } from '../types/messaging.js';

const retryPolicySchema = z.object({
    maxAttempts: z.number().int().min(1).max(100),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    strategy: z.enum(['exponential', 'decorrelated']),
});

export const relayConfigSchema = z.object({
    runtime: z.object({
        apiPort: z.number().int().min(1).max(65_535),
        apiSecret: z.string(),
    }),
    storage: z.object({
        databasePath: z.string().min(1),
    }),
    dispatch: z.object({
        maxPayloadBytes: z.number().int().positive(),
        scheduler: z.enum(['timer', 'durable']),
        pollCronExpression: z.string().min(1),
        batchSize: z.number().int().min(1).max(1_000),
    }),
    retry: z.object({
        channels: z.object({
            sms: retryPolicySchema,
            whatsapp: retryPolicySchema,
            email: retryPolicySchema,
        }),
    }),
    circuitBreaker: z.object({
        failureThreshold: z.number().int().min(1),
        timeoutSeconds: z.number().int().min(0),
        successThreshold: z.number().int().min(1),
        maxTrials: z.number().int().min(1),
        stateTtlSeconds: z.number().int().min(1),
        failureWindowSeconds: z.number().int().min(1),
        trialTtlSeconds: z.number().int().min(1),
    }),
    deadLetter: z.object({
        enabled: z.boolean(),
    }),
    cache: z.object({
        driver: z.enum(['memory', 'redis']),
        redisUrl: z.string(),
        keyPrefix: z.string().min(1),
    }),
});

export type RelayConfig = z.infer<typeof relayConfigSchema>;

export interface RelayConfigValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
    config: RelayConfig | null;
}

function formatIssue(issue: z.ZodIssue): string {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
}

function isRedisUrl(value: string): boolean {
    try {
        return ['redis:', 'rediss:'].includes(new URL(value).protocol);
    } catch {
        return false;
    }
}

/**
 * Schema issues and cross-field contradictions are errors; settings that work but are probably
 * unintended are warnings.
 */
export function validateRelayConfig(input: unknown): RelayConfigValidationResult {
    const parsed = relayConfigSchema.safeParse(input);
    if (!parsed.success) {
        return { valid: false, errors: parsed.error.issues.map(formatIssue), warnings: [], config: null };
    }

    const config = parsed.data;
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const channel of CHANNELS) {
        const policy = config.retry.channels[channel];
        if (policy.baseDelayMs > policy.maxDelayMs) {
            errors.push(`retry.channels.${channel}: baseDelayMs (${policy.baseDelayMs}) exceeds maxDelayMs (${policy.maxDelayMs}).`);
        }
    }

    const breaker = config.circuitBreaker;
    if (breaker.stateTtlSeconds <= breaker.timeoutSeconds) {
        errors.push(
            `circuitBreaker: stateTtlSeconds (${breaker.stateTtlSeconds}) must exceed timeoutSeconds (${breaker.timeoutSeconds}) or an open circuit expires mid-recovery.`,
        );
    }
    if (breaker.maxTrials > breaker.failureThreshold) {
        warnings.push(
            `circuitBreaker: maxTrials (${breaker.maxTrials}) exceeds failureThreshold (${breaker.failureThreshold}).`,
        );
    }

    if (config.cache.driver === 'redis') {
        if (!config.cache.redisUrl.trim()) {
            errors.push('cache.redisUrl: required when cache.driver is "redis".');
        } else if (!isRedisUrl(config.cache.redisUrl)) {
            errors.push(`cache.redisUrl: must use redis:// or rediss:// (got "${config.cache.redisUrl}").`);
        }
    }

    if (config.dispatch.scheduler === 'durable' && !cron.validate(config.dispatch.pollCronExpression)) {
        errors.push(`dispatch.pollCronExpression: invalid cron expression "${config.dispatch.pollCronExpression}".`);
    }

    if (!config.runtime.apiSecret.trim()) {
        warnings.push('runtime.apiSecret: empty; the control-plane API will reject every signed route.');
    }

    return { valid: errors.length === 0, errors, warnings, config: errors.length === 0 ? config : null };
}
