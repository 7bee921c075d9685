/** Uniform source in [0, 1). Inject a seeded one in tests. */
export type RandomSource = () => number;

export type BackoffStrategy = 'exponential' | 'decorrelated';

/** Per-channel retry policy. */
export interface RetryPolicy {
    /** Attempts including the first. @default 3 */
    maxAttempts: number;
    /** @default 1000 */
    baseDelayMs: number;
    /** @default 60000 */
    maxDelayMs: number;
    /** @default 'exponential' */
    strategy: BackoffStrategy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60_000,
    strategy: 'exponential',
};

/** Inclusive integer in [min, max]. */
function randomIntInclusive(min: number, max: number, random: RandomSource): number {
    if (max <= min) return min;
    return min + Math.floor(random() * (max - min + 1));
}

/**
 * Exponential backoff with additive jitter:
 * `capped = min(max, base * 2^attempt)`, result `min(max, capped + rand[0, capped/2])`.
 *
 * Never exceeds `maxMs`; never drops below `baseMs` while `baseMs <= maxMs`.
 */
export function exponentialWithJitter(
    attempt: number,
    baseMs: number,
    maxMs: number,
    random: RandomSource = Math.random,
): number {
    const exponent = Math.max(0, Math.floor(attempt));
    const capped = Math.min(maxMs, baseMs * 2 ** exponent);
    const jitter = randomIntInclusive(0, Math.floor(capped / 2), random);
    return Math.min(maxMs, capped + jitter);
}

/**
 * Decorrelated jitter: attempt 0 returns `baseMs`; later attempts draw uniformly from
 * `[baseMs, max(baseMs, previousMs * 3)]` and cap at `maxMs`.
 */
export function decorrelatedJitter(
    attempt: number,
    baseMs: number,
    maxMs: number,
    previousMs: number,
    random: RandomSource = Math.random,
): number {
    if (attempt <= 0) {
        return Math.min(maxMs, baseMs);
    }

    const upper = Math.max(baseMs, previousMs * 3);
    return Math.min(maxMs, randomIntInclusive(baseMs, upper, random));
}

/** Delay before the retry that follows `attempt` under `policy`. */
export function computeBackoffDelay(
    policy: RetryPolicy,
    attempt: number,
    previousDelayMs: number,
    random: RandomSource = Math.random,
): number {
    if (policy.strategy === 'decorrelated') {
        return decorrelatedJitter(attempt, policy.baseDelayMs, policy.maxDelayMs, previousDelayMs, random);
    }
    return exponentialWithJitter(attempt, policy.baseDelayMs, policy.maxDelayMs, random);
}
