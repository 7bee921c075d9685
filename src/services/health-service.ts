import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import type { DeadLetterRecorder, DeadLetterStats } from './dead-letter-recorder.js';
import type { CounterSnapshot, MetricsRegistry } from './metrics.js';
import type { SenderRegistry } from './sender-registry.js';
import type { CircuitSnapshot } from '../types/circuit.js';
import type { MessageStatus, OutboundMessageRepository } from '../types/messaging.js';

export type RelayHealthStatus = 'healthy' | 'degraded';

export interface RelayHealthReport {
    status: RelayHealthStatus;
    timestamp: string;
    circuits: CircuitSnapshot[];
    openCircuits: string[];
    deadLetters: DeadLetterStats;
    messages: Partial<Record<MessageStatus, number>>;
    metrics: CounterSnapshot[];
}

export interface HealthServiceOptions {
    breakers: CircuitBreakerRegistry;
    senders: SenderRegistry;
    repository: OutboundMessageRepository;
    deadLetters: DeadLetterRecorder;
    metrics?: MetricsRegistry;
    now?: () => Date;
}

/** Read-side view over circuits, dead letters, and message counts. */
export class HealthService {
    readonly #options: HealthServiceOptions;
    readonly #now: () => Date;

    constructor(options: HealthServiceOptions) {
        this.#options = options;
        this.#now = options.now ?? (() => new Date());
    }

    /** Every provider with a bound sender, plus any breaker created outside the registry. */
    providers(): string[] {
        const names = new Set([...this.#options.senders.providers(), ...this.#options.breakers.services()]);
        return [...names].sort((left, right) => left.localeCompare(right));
    }

    async circuits(): Promise<CircuitSnapshot[]> {
        return Promise.all(this.providers().map((service) => this.#options.breakers.get(service).snapshot()));
    }

    async circuit(service: string): Promise<CircuitSnapshot> {
        return this.#options.breakers.get(service).snapshot();
    }

    async resetCircuit(service: string): Promise<CircuitSnapshot> {
        const breaker = this.#options.breakers.get(service);
        await breaker.reset();
        return breaker.snapshot();
    }

    async report(): Promise<RelayHealthReport> {
        const [circuits, deadLetters, messages] = await Promise.all([
            this.circuits(),
            this.#options.deadLetters.stats(),
            this.#options.repository.countByStatus(),
        ]);

        const openCircuits = circuits.filter((circuit) => !circuit.healthy).map((circuit) => circuit.service);

        return {
            status: openCircuits.length === 0 ? 'healthy' : 'degraded',
            timestamp: this.#now().toISOString(),
            circuits,
            openCircuits,
            deadLetters,
            messages,
            metrics: this.#options.metrics?.snapshot() ?? [],
        };
    }
}
