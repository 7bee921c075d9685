import type { CircuitCache } from '../types/circuit.js';

interface CacheEntry {
    value: string;
    expiresAtMs: number;
}

/**
 * Single-process {@link CircuitCache}. Node runs each method to completion without
 * interleaving, so every operation here is atomic for callers sharing the instance.
 */
export class MemoryCircuitCache implements CircuitCache {
    readonly #entries: Map<string, CacheEntry> = new Map();
    readonly #now: () => number;

    constructor(now: () => number = () => Date.now()) {
        this.#now = now;
    }

    async get(key: string): Promise<string | null> {
        return this.#read(key);
    }

    async put(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.#write(key, value, ttlSeconds);
    }

    async increment(key: string, by: number, ttlSeconds: number): Promise<number> {
        const current = Number(this.#read(key) ?? '0');
        const next = (Number.isFinite(current) ? current : 0) + by;
        this.#write(key, String(next), ttlSeconds);
        return next;
    }

    async forget(key: string): Promise<void> {
        this.#entries.delete(key);
    }

    async compareAndSet(key: string, expected: string | null, next: string, ttlSeconds: number): Promise<boolean> {
        if (this.#read(key) !== expected) {
            return false;
        }
        this.#write(key, next, ttlSeconds);
        return true;
    }

    /** Live (unexpired) key count. */
    get size(): number {
        let count = 0;
        for (const key of [...this.#entries.keys()]) {
            if (this.#read(key) !== null) count++;
        }
        return count;
    }

    #read(key: string): string | null {
        const entry = this.#entries.get(key);
        if (!entry) return null;
        if (entry.expiresAtMs <= this.#now()) {
            this.#entries.delete(key);
            return null;
        }
        return entry.value;
    }

    #write(key: string, value: string, ttlSeconds: number): void {
        this.#entries.set(key, { value, expiresAtMs: this.#now() + ttlSeconds * 1000 });
    }
}
