import type { RateLimitPolicy } from '../bootstrap/config/guard-config.js';
import type { CounterStore } from '../counters/CounterStore.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('RateLimiter');

export interface RateLimitState {
    key: string;
    count: number;
    limit: number;
    remaining: number;
}

export function rateLimitKey(actorId: string, action: string): string {
    return `rl:${action}:${actorId}`;
}

/**
 * Fixed-window rate limiter over an atomic CounterStore.
 *
 * The window opens on the first acquire for a key and closes when the
 * counter's TTL lapses. Being fixed rather than sliding, a burst straddling
 * two windows can reach up to twice the nominal rate.
 */
export class RateLimiter {
    constructor(
        private readonly counters: CounterStore,
        private readonly policies: {
            default: RateLimitPolicy;
            actions: Record<string, RateLimitPolicy>;
        } = { default: { max: 60, windowSeconds: 60 }, actions: {} }
    ) { }

    /**
     * Consume one slot for the key.
     * @returns true if allowed, false if the window's capacity is exhausted
     */
    async tryAcquire(key: string, limit: number, windowMs: number): Promise<boolean> {
        if (!Number.isInteger(limit) || limit < 0) {
            throw new RangeError(`Rate limit must be a non-negative integer, got ${limit}`);
        }
        if (!(windowMs > 0)) {
            throw new RangeError(`Rate limit window must be positive, got ${windowMs}`);
        }

        // Already at capacity: reject without consuming.
        const current = await this.counters.get(key);
        if (current !== null && current >= limit) {
            logger.warn({ key, count: current, limit }, 'RateLimit: Limit exceeded');
            return false;
        }

        // Two callers can both pass the read above; the atomic increment
        // decides which of them fits.
        const count = await this.counters.increment(key, windowMs);
        if (count > limit) {
            logger.warn({ key, count, limit }, 'RateLimit: Limit exceeded');
            return false;
        }

        return true;
    }

    async inspect(key: string, limit: number): Promise<RateLimitState> {
        const count = (await this.counters.get(key)) ?? 0;
        return { key, count, limit, remaining: Math.max(0, limit - count) };
    }

    resolvePolicy(action: string): RateLimitPolicy {
        return this.policies.actions[action] ?? this.policies.default;
    }
}
