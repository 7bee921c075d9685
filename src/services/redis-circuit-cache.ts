import { Redis } from 'ioredis';
import type { CircuitCache } from '../types/circuit.js';
import { logThought } from '../utils/logger.js';

export const INCREMENT_WITH_TTL_SCRIPT = `
local value = redis.call('INCRBY', KEYS[1], ARGV[1])
redis.call('EXPIRE', KEYS[1], ARGV[2])
return value
`;

/** ARGV: hasExpected ('0' | '1'), expected, next, ttlSeconds. */
export const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[1] == '0' then
  if current then return 0 end
elseif current ~= ARGV[2] then
  return 0
end
redis.call('SET', KEYS[1], ARGV[3], 'EX', ARGV[4])
return 1
`;

function validateRedisUrl(url: string): boolean {
    try {
        const parsed = new URL(url);
        return ['redis:', 'rediss:'].includes(parsed.protocol);
    } catch {
        return false;
    }
}

function toInteger(reply: unknown, label: string): number {
    const value = typeof reply === 'number' ? reply : Number(reply);
    if (!Number.isFinite(value)) {
        throw new Error(`[RedisCircuitCache] Unexpected ${label} reply: ${String(reply)}`);
    }
    return value;
}

/**
 * {@link CircuitCache} on Redis, shared by every worker pointed at the same instance.
 * Increment and compare-and-set run as Lua scripts so each is a single atomic step server-side.
 */
export class RedisCircuitCache implements CircuitCache {
    readonly #redis: Redis;

    constructor(redis: Redis) {
        this.#redis = redis;
    }

    static fromUrl(url: string): RedisCircuitCache {
        if (!validateRedisUrl(url)) {
            throw new Error(`[RedisCircuitCache] Invalid Redis URL: ${url}`);
        }
        const redis = new Redis(url, {
            lazyConnect: true,
            maxRetriesPerRequest: 3,
            enableOfflineQueue: true,
            retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 1000, 3000)),
        });
        return new RedisCircuitCache(redis);
    }

    async get(key: string): Promise<string | null> {
        return this.#redis.get(key);
    }

    async put(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.#redis.set(key, value, 'EX', Math.max(1, Math.ceil(ttlSeconds)));
    }

    async increment(key: string, by: number, ttlSeconds: number): Promise<number> {
        const reply = await this.#redis.eval(
            INCREMENT_WITH_TTL_SCRIPT,
            1,
            key,
            by,
            Math.max(1, Math.ceil(ttlSeconds)),
        );
        return toInteger(reply, 'INCRBY');
    }

    async forget(key: string): Promise<void> {
        await this.#redis.del(key);
    }

    async compareAndSet(key: string, expected: string | null, next: string, ttlSeconds: number): Promise<boolean> {
        const reply = await this.#redis.eval(
            COMPARE_AND_SET_SCRIPT,
            1,
            key,
            expected === null ? '0' : '1',
            expected ?? '',
            next,
            Math.max(1, Math.ceil(ttlSeconds)),
        );
        return toInteger(reply, 'compare-and-set') === 1;
    }

    async close(): Promise<void> {
        try {
            await this.#redis.quit();
        } catch (err) {
            void logThought(
                `[RedisCircuitCache] Error while closing connection: ${err instanceof Error ? err.message : String(err)}`,
            );
        }
    }
}
