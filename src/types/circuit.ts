export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerSettings {
    /** Consecutive failures in `closed` that trip the circuit. */
    failureThreshold: number;
    /** Seconds an open circuit waits before letting probes through. */
    timeoutSeconds: number;
    /** Consecutive half-open successes needed to close. */
    successThreshold: number;
    /** Concurrent probe cap while half-open. */
    maxTrials: number;
    /** TTL for the state and last-failure keys. Must exceed `timeoutSeconds`. */
    stateTtlSeconds: number;
    /** TTL for the closed-state failure streak. */
    failureWindowSeconds: number;
    /** TTL for half-open trial and success counters. */
    trialTtlSeconds: number;
}

/**
 * Shared key-value capability backing circuit state. Every operation must be atomic against
 * other workers using the same backing store.
 */
export interface CircuitCache {
    get(key: string): Promise<string | null>;
    put(key: string, value: string, ttlSeconds: number): Promise<void>;
    /** Add `by` and (re)arm the TTL in one step. Missing keys start from 0. */
    increment(key: string, by: number, ttlSeconds: number): Promise<number>;
    forget(key: string): Promise<void>;
    /**
     * Set `key` to `next` only if it currently holds `expected`. A missing key matches
     * `expected === null`. Returns whether the swap happened.
     */
    compareAndSet(key: string, expected: string | null, next: string, ttlSeconds: number): Promise<boolean>;
}

/** Read-only view of one provider's circuit. */
export interface CircuitSnapshot {
    service: string;
    state: CircuitState;
    healthy: boolean;
    failureCount: number;
    successCount: number;
    trialCount: number;
    lastFailureAt: string | null;
    secondsSinceFailure: number | null;
    /** Set only while open: `lastFailureAt + timeout`. */
    estimatedRecoveryAt: string | null;
    recoveryInSeconds: number | null;
    trialsRemaining: number | null;
    statusMessage: string;
    configuration: {
        failureThreshold: number;
        timeoutSeconds: number;
        successThreshold: number;
        maxTrials: number;
    };
}
