import type { CounterStore } from '../counters/CounterStore.js';
import { getComponentLogger } from '../logging/logger.js';
import type { Clock } from '../time/clock.js';
import { systemClock } from '../time/clock.js';

const logger = getComponentLogger('LockoutTracker');

export interface LockoutState {
    identity: string;
    failureCount: number;
    lockedUntil: Date | null;
}

export interface LockoutEvent {
    identity: string;
    failureCount: number;
    lockedUntil: Date;
}

export interface LockoutTrackerOptions {
    maxAttempts: number;
    lockoutDurationMs: number;
    clock?: Clock;
    onLockout?: (event: LockoutEvent) => void | Promise<void>;
}

/**
 * Per-identity failure counter with temporary lockout.
 *
 * Normal --(failures < max)--> Normal --(failures == max)--> Locked
 * Locked --(TTL expiry | recordSuccess)--> Normal
 *
 * There is no permanent lock: a failure after expiry starts counting at 1.
 */
export class LockoutTracker {
    private readonly clock: Clock;

    constructor(
        private readonly counters: CounterStore,
        private readonly options: LockoutTrackerOptions
    ) {
        if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
        }
        if (!(options.lockoutDurationMs > 0)) {
            throw new RangeError(`lockoutDurationMs must be positive, got ${options.lockoutDurationMs}`);
        }
        this.clock = options.clock ?? systemClock;
    }

    async recordFailure(identity: string): Promise<LockoutState> {
        const existing = await this.lockedUntil(identity);
        if (existing) {
            // Failures during a lock are not counted and do not extend it.
            const failureCount = (await this.counters.get(failuresKey(identity))) ?? 0;
            return { identity, failureCount, lockedUntil: existing };
        }

        const failureCount = await this.counters.increment(failuresKey(identity), this.options.lockoutDurationMs);
        if (failureCount < this.options.maxAttempts) {
            return { identity, failureCount, lockedUntil: null };
        }

        const lockedUntil = new Date(this.clock.now().getTime() + this.options.lockoutDurationMs);
        await this.counters.setWithExpiry(lockedKey(identity), lockedUntil.getTime(), this.options.lockoutDurationMs);
        await this.counters.delete(failuresKey(identity));

        logger.warn({ identity, failureCount, lockedUntil: lockedUntil.toISOString() }, 'Identity locked out');
        await this.emitLockout({ identity, failureCount, lockedUntil });

        return { identity, failureCount, lockedUntil };
    }

    async recordSuccess(identity: string): Promise<void> {
        await this.counters.delete(failuresKey(identity));
        await this.counters.delete(lockedKey(identity));
    }

    async isLocked(identity: string): Promise<boolean> {
        return (await this.lockedUntil(identity)) !== null;
    }

    async getState(identity: string): Promise<LockoutState> {
        return {
            identity,
            failureCount: (await this.counters.get(failuresKey(identity))) ?? 0,
            lockedUntil: await this.lockedUntil(identity)
        };
    }

    private async lockedUntil(identity: string): Promise<Date | null> {
        const until = await this.counters.get(lockedKey(identity));
        if (until === null || until <= this.clock.now().getTime()) {
            return null;
        }
        return new Date(until);
    }

    private async emitLockout(event: LockoutEvent): Promise<void> {
        if (!this.options.onLockout) return;
        try {
            await this.options.onLockout(event);
        } catch (error) {
            logger.error({ error, identity: event.identity }, 'Lockout listener failed');
        }
    }
}

function failuresKey(identity: string): string {
    return `lockout:failures:${identity}`;
}

function lockedKey(identity: string): string {
    return `lockout:until:${identity}`;
}
