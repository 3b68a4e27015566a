/**
 * Atomic counter primitive backing rate limits, lockouts and alert cooldowns.
 *
 * increment() must be atomic per key: concurrent callers each observe a
 * distinct post-increment value. The TTL is applied when the key is created
 * (or recreated after expiry), never extended by later increments.
 */
export interface CounterStore {
    increment(key: string, ttlMs: number): Promise<number>;
    get(key: string): Promise<number | null>;
    setWithExpiry(key: string, value: number, ttlMs: number): Promise<void>;
    delete(key: string): Promise<void>;
}
