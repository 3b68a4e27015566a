/**
 * Time source. Injected everywhere a TTL, window or deadline is computed so
 * tests can drive time explicitly.
 */
export interface Clock {
    now(): Date;
}

export class SystemClock implements Clock {
    now(): Date {
        return new Date();
    }
}

/**
 * Deterministic clock for tests and replay tooling.
 */
export class ManualClock implements Clock {
    private current: number;

    constructor(start: Date | number = Date.UTC(2026, 0, 1)) {
        this.current = typeof start === 'number' ? start : start.getTime();
    }

    now(): Date {
        return new Date(this.current);
    }

    advance(ms: number): void {
        if (ms < 0) {
            throw new Error(`ManualClock cannot move backwards (advance by ${ms}ms)`);
        }
        this.current += ms;
    }

    set(date: Date): void {
        this.current = date.getTime();
    }
}

export const systemClock: Clock = new SystemClock();
