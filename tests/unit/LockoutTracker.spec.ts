import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { InMemoryCounterStore } from '../../libs/counters/InMemoryCounterStore.js';
import { LockoutTracker } from '../../libs/guards/LockoutTracker.js';
import type { LockoutEvent } from '../../libs/guards/LockoutTracker.js';
import { ManualClock } from '../../libs/time/clock.js';

const IDENTITY = 'alice:10.0.0.1';

describe('LockoutTracker', () => {
    let clock: ManualClock;
    let counters: InMemoryCounterStore;
    let events: LockoutEvent[];
    let tracker: LockoutTracker;

    beforeEach(() => {
        clock = new ManualClock();
        counters = new InMemoryCounterStore(clock);
        events = [];
        tracker = new LockoutTracker(counters, {
            maxAttempts: 3,
            lockoutDurationMs: 60_000,
            clock,
            onLockout: event => { events.push(event); }
        });
    });

    it('should count failures below the threshold without locking', async () => {
        assert.deepStrictEqual(await tracker.recordFailure(IDENTITY), { identity: IDENTITY, failureCount: 1, lockedUntil: null });
        assert.deepStrictEqual(await tracker.recordFailure(IDENTITY), { identity: IDENTITY, failureCount: 2, lockedUntil: null });
        assert.strictEqual(await tracker.isLocked(IDENTITY), false);
    });

    it('should lock on the threshold failure and notify once', async () => {
        await tracker.recordFailure(IDENTITY);
        await tracker.recordFailure(IDENTITY);
        const state = await tracker.recordFailure(IDENTITY);

        const expectedUntil = new Date('2026-01-01T00:01:00.000Z');
        assert.deepStrictEqual(state, { identity: IDENTITY, failureCount: 3, lockedUntil: expectedUntil });
        assert.strictEqual(await tracker.isLocked(IDENTITY), true);
        assert.deepStrictEqual(events, [{ identity: IDENTITY, failureCount: 3, lockedUntil: expectedUntil }]);
    });

    it('should not extend a running lock', async () => {
        for (let i = 0; i < 3; i++) await tracker.recordFailure(IDENTITY);
        clock.advance(10_000);
        for (let i = 0; i < 3; i++) await tracker.recordFailure(IDENTITY);

        const state = await tracker.getState(IDENTITY);
        assert.deepStrictEqual(state.lockedUntil, new Date('2026-01-01T00:01:00.000Z'));
        assert.strictEqual(events.length, 1);
    });

    it('should unlock when the lock expires', async () => {
        for (let i = 0; i < 3; i++) await tracker.recordFailure(IDENTITY);
        clock.advance(60_000);

        assert.strictEqual(await tracker.isLocked(IDENTITY), false);
        assert.deepStrictEqual(await tracker.recordFailure(IDENTITY), { identity: IDENTITY, failureCount: 1, lockedUntil: null });
    });

    it('should ignore failures during a lock so expiry restarts the count', async () => {
        for (let i = 0; i < 3; i++) await tracker.recordFailure(IDENTITY);
        clock.advance(10_000);
        const during = await tracker.recordFailure(IDENTITY);
        await tracker.recordFailure(IDENTITY);
        await tracker.recordFailure(IDENTITY);

        assert.deepStrictEqual(during, {
            identity: IDENTITY,
            failureCount: 0,
            lockedUntil: new Date('2026-01-01T00:01:00.000Z')
        });

        clock.advance(51_000);
        assert.strictEqual(await tracker.isLocked(IDENTITY), false);
        assert.deepStrictEqual(await tracker.recordFailure(IDENTITY), { identity: IDENTITY, failureCount: 1, lockedUntil: null });
        assert.strictEqual(events.length, 1);
    });

    it('should reset on success', async () => {
        await tracker.recordFailure(IDENTITY);
        await tracker.recordFailure(IDENTITY);
        await tracker.recordSuccess(IDENTITY);

        assert.deepStrictEqual(await tracker.getState(IDENTITY), { identity: IDENTITY, failureCount: 0, lockedUntil: null });
    });

    it('should keep identities independent', async () => {
        for (let i = 0; i < 3; i++) await tracker.recordFailure(IDENTITY);
        assert.strictEqual(await tracker.isLocked('alice:10.0.0.2'), false);
    });

    it('should survive a failing lockout listener', async () => {
        const failing = new LockoutTracker(counters, {
            maxAttempts: 1,
            lockoutDurationMs: 1000,
            clock,
            onLockout: () => { throw new Error('pager offline'); }
        });

        const state = await failing.recordFailure('bob:10.0.0.9');
        assert.ok(state.lockedUntil);
    });

    it('should reject invalid options', () => {
        assert.throws(() => new LockoutTracker(counters, { maxAttempts: 0, lockoutDurationMs: 1000 }), RangeError);
        assert.throws(() => new LockoutTracker(counters, { maxAttempts: 3, lockoutDurationMs: 0 }), RangeError);
    });
});
