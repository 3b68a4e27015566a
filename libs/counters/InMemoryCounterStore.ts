import type { Clock } from '../time/clock.js';
import { systemClock } from '../time/clock.js';
import type { CounterStore } from './CounterStore.js';

interface CounterEntry {
    value: number;
    expiresAt: number;
}

/**
 * Single-process counter store. Expiry follows the injected clock, so tests
 * can step across windows without sleeping.
 */
export class InMemoryCounterStore implements CounterStore {
    private readonly entries = new Map<string, CounterEntry>();

    constructor(private readonly clock: Clock = systemClock) { }

    async increment(key: string, ttlMs: number): Promise<number> {
        const entry = this.live(key);
        if (!entry) {
            this.entries.set(key, { value: 1, expiresAt: this.clock.now().getTime() + ttlMs });
            return 1;
        }
        entry.value += 1;
        return entry.value;
    }

    async get(key: string): Promise<number | null> {
        return this.live(key)?.value ?? null;
    }

    async setWithExpiry(key: string, value: number, ttlMs: number): Promise<void> {
        this.entries.set(key, { value, expiresAt: this.clock.now().getTime() + ttlMs });
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    /**
     * Drops expired entries; returns how many were removed.
     */
    purgeExpired(): number {
        const now = this.clock.now().getTime();
        let removed = 0;
        for (const [key, entry] of this.entries) {
            if (entry.expiresAt <= now) {
                this.entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    private live(key: string): CounterEntry | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (entry.expiresAt <= this.clock.now().getTime()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }
}
