import type { CircuitBreakerSettings, CircuitCache, CircuitSnapshot, CircuitState } from '../types/circuit.js';
import type { EventSink } from '../types/events.js';
import { logThought } from '../utils/logger.js';

export const DEFAULT_CIRCUIT_SETTINGS: CircuitBreakerSettings = {
    failureThreshold: 5,
    timeoutSeconds: 60,
    successThreshold: 2,
    maxTrials: 3,
    stateTtlSeconds: 86_400,
    failureWindowSeconds: 3_600,
    trialTtlSeconds: 300,
};

export const DEFAULT_CIRCUIT_KEY_PREFIX = 'circuit_breaker';

export interface CircuitBreakerOptions {
    cache: CircuitCache;
    settings?: Partial<CircuitBreakerSettings>;
    keyPrefix?: string;
    now?: () => number;
    events?: EventSink;
}

function parseState(raw: string | null): CircuitState {
    return raw === 'open' || raw === 'half_open' ? raw : 'closed';
}

function parseCount(raw: string | null): number {
    const value = Number(raw ?? '0');
    return Number.isFinite(value) ? value : 0;
}

function resolveSettings(overrides: Partial<CircuitBreakerSettings> = {}): CircuitBreakerSettings {
    const settings = { ...DEFAULT_CIRCUIT_SETTINGS, ...overrides };
    for (const key of ['failureThreshold', 'successThreshold', 'maxTrials'] as const) {
        if (!Number.isInteger(settings[key]) || settings[key] < 1) {
            throw new Error(`[CircuitBreaker] ${key} must be a positive integer (got ${settings[key]}).`);
        }
    }
    if (settings.timeoutSeconds < 0) {
        throw new Error(`[CircuitBreaker] timeoutSeconds must be >= 0 (got ${settings.timeoutSeconds}).`);
    }
    return settings;
}

/**
 * Per-provider circuit breaker whose entire state lives in a shared {@link CircuitCache}.
 *
 * Nothing is held in process memory between calls, so any number of workers pointed at the
 * same cache see one circuit. Counters move through atomic increments and state moves through
 * compare-and-set, never read-modify-write.
 *
 * - closed: everything passes; `failureThreshold` consecutive failures trip it open.
 * - open: everything is refused until `timeoutSeconds` after the last failure.
 * - half_open: at most `maxTrials` probes pass; `successThreshold` successes close it,
 *   one failure reopens it.
 *
 * The open timeout is evaluated lazily on the next {@link isAvailable} call.
 */
export class CircuitBreaker {
    readonly service: string;
    readonly settings: CircuitBreakerSettings;
    readonly #cache: CircuitCache;
    readonly #now: () => number;
    readonly #events?: EventSink;
    readonly #keys: {
        state: string;
        failures: string;
        lastFailure: string;
        trials: string;
        successes: string;
    };

    constructor(service: string, options: CircuitBreakerOptions) {
        this.service = service;
        this.settings = resolveSettings(options.settings);
        this.#cache = options.cache;
        this.#now = options.now ?? (() => Date.now());
        this.#events = options.events;

        const prefix = `${options.keyPrefix ?? DEFAULT_CIRCUIT_KEY_PREFIX}:${service}`;
        this.#keys = {
            state: `${prefix}:state`,
            failures: `${prefix}:failures`,
            lastFailure: `${prefix}:last_failure`,
            trials: `${prefix}:trials`,
            successes: `${prefix}:successes`,
        };
    }

    async getState(): Promise<CircuitState> {
        return parseState(await this.#cache.get(this.#keys.state));
    }

    /** Whether a call to the provider may proceed right now. */
    async isAvailable(): Promise<boolean> {
        const state = await this.getState();

        if (state === 'closed') {
            return true;
        }

        if (state === 'open') {
            const lastFailureMs = parseCount(await this.#cache.get(this.#keys.lastFailure));
            if (this.#now() - lastFailureMs < this.settings.timeoutSeconds * 1000) {
                return false;
            }
            // Losing the race means another worker already opened the door; either way this
            // caller is now a half-open probe and must take a trial slot.
            if (await this.#transition('open', 'half_open')) {
                // An increment that landed after the last reopen must not eat this window's slots.
                await this.#cache.forget(this.#keys.trials);
            }
        }

        const trials = await this.#cache.increment(this.#keys.trials, 1, this.settings.trialTtlSeconds);
        return trials <= this.settings.maxTrials;
    }

    async recordSuccess(): Promise<void> {
        const state = await this.getState();

        if (state === 'half_open') {
            const successes = await this.#cache.increment(this.#keys.successes, 1, this.settings.trialTtlSeconds);
            if (successes >= this.settings.successThreshold && await this.#transition('half_open', 'closed')) {
                await this.#clearCounters();
            }
            return;
        }

        if (state === 'closed') {
            await this.#cache.forget(this.#keys.failures);
        }
    }

    async recordFailure(): Promise<void> {
        const state = await this.getState();

        await this.#cache.put(this.#keys.lastFailure, String(this.#now()), this.settings.stateTtlSeconds);

        if (state === 'half_open') {
            if (await this.#transition('half_open', 'open')) {
                await this.#cache.forget(this.#keys.successes);
                await this.#cache.forget(this.#keys.trials);
            }
            return;
        }

        if (state === 'closed') {
            const failures = await this.#cache.increment(
                this.#keys.failures,
                1,
                this.settings.failureWindowSeconds,
            );
            if (failures >= this.settings.failureThreshold && await this.#transition('closed', 'open')) {
                await this.#cache.forget(this.#keys.successes);
                await this.#cache.forget(this.#keys.trials);
                void logThought(
                    `[CircuitBreaker] ${this.service} opened after ${failures} consecutive failures (threshold ${this.settings.failureThreshold}).`,
                );
            }
        }
    }

    /** Administrative override: force closed and clear every counter. */
    async reset(): Promise<void> {
        const previous = await this.getState();
        await this.#cache.put(this.#keys.state, 'closed', this.settings.stateTtlSeconds);
        await this.#clearCounters();
        await this.#cache.forget(this.#keys.lastFailure);

        if (previous !== 'closed') {
            this.#emitTransition(previous, 'closed');
        }
        void logThought(`[CircuitBreaker] ${this.service} reset to closed.`);
    }

    async snapshot(): Promise<CircuitSnapshot> {
        const [rawState, failures, successes, trials, lastFailure] = await Promise.all([
            this.#cache.get(this.#keys.state),
            this.#cache.get(this.#keys.failures),
            this.#cache.get(this.#keys.successes),
            this.#cache.get(this.#keys.trials),
            this.#cache.get(this.#keys.lastFailure),
        ]);

        const state = parseState(rawState);
        const trialCount = parseCount(trials);
        const lastFailureMs = lastFailure === null ? null : parseCount(lastFailure);
        const nowMs = this.#now();
        const timeoutMs = this.settings.timeoutSeconds * 1000;

        let estimatedRecoveryAt: string | null = null;
        let recoveryInSeconds: number | null = null;
        if (state === 'open' && lastFailureMs !== null) {
            estimatedRecoveryAt = new Date(lastFailureMs + timeoutMs).toISOString();
            recoveryInSeconds = Math.max(0, Math.ceil((lastFailureMs + timeoutMs - nowMs) / 1000));
        }

        return {
            service: this.service,
            state,
            healthy: state === 'closed',
            failureCount: parseCount(failures),
            successCount: parseCount(successes),
            trialCount,
            lastFailureAt: lastFailureMs === null ? null : new Date(lastFailureMs).toISOString(),
            secondsSinceFailure: lastFailureMs === null ? null : Math.max(0, Math.floor((nowMs - lastFailureMs) / 1000)),
            estimatedRecoveryAt,
            recoveryInSeconds,
            trialsRemaining: state === 'half_open' ? Math.max(0, this.settings.maxTrials - trialCount) : null,
            statusMessage:
                state === 'half_open'
                    ? 'Testing recovery - allowing trial requests'
                    : state === 'open'
                        ? 'Circuit open - blocking requests to protect service'
                        : 'Circuit closed - normal operation',
            configuration: {
                failureThreshold: this.settings.failureThreshold,
                timeoutSeconds: this.settings.timeoutSeconds,
                successThreshold: this.settings.successThreshold,
                maxTrials: this.settings.maxTrials,
            },
        };
    }

    // ── Private ───────────────────────────────────────────────────────────────

    async #transition(from: CircuitState, to: CircuitState): Promise<boolean> {
        const ttl = this.settings.stateTtlSeconds;
        let swapped = await this.#cache.compareAndSet(this.#keys.state, from, to, ttl);
        // An absent state key reads as closed.
        if (!swapped && from === 'closed') {
            swapped = await this.#cache.compareAndSet(this.#keys.state, null, to, ttl);
        }
        if (swapped) {
            this.#emitTransition(from, to);
        }
        return swapped;
    }

    async #clearCounters(): Promise<void> {
        await Promise.all([
            this.#cache.forget(this.#keys.failures),
            this.#cache.forget(this.#keys.successes),
            this.#cache.forget(this.#keys.trials),
        ]);
    }

    #emitTransition(from: CircuitState, to: CircuitState): void {
        void logThought(`[CircuitBreaker] ${this.service} transitioned ${from} -> ${to}.`);
        this.#events?.emit({
            type: 'circuit.state_changed',
            service: this.service,
            from,
            to,
            timestamp: new Date(this.#now()).toISOString(),
        });
    }
}

export interface CircuitBreakerRegistryOptions extends Omit<CircuitBreakerOptions, 'settings'> {
    settings?: Partial<CircuitBreakerSettings>;
}

/** One breaker per provider service name, all sharing a cache and settings. */
export class CircuitBreakerRegistry {
    readonly #options: CircuitBreakerRegistryOptions;
    readonly #breakers: Map<string, CircuitBreaker> = new Map();

    constructor(options: CircuitBreakerRegistryOptions) {
        this.#options = options;
    }

    get(service: string): CircuitBreaker {
        let breaker = this.#breakers.get(service);
        if (!breaker) {
            breaker = new CircuitBreaker(service, this.#options);
            this.#breakers.set(service, breaker);
        }
        return breaker;
    }

    services(): string[] {
        return [...this.#breakers.keys()].sort((left, right) => left.localeCompare(right));
    }

    async snapshots(): Promise<CircuitSnapshot[]> {
        return Promise.all(this.services().map((service) => this.get(service).snapshot()));
    }
}
