import type { Queryable } from '../db/types.js';
import type { CounterStore } from './CounterStore.js';

const INCREMENT_SQL = `
INSERT INTO guard_counters (key, value, expires_at)
VALUES ($1, 1, now() + ($2::bigint * interval '1 millisecond'))
ON CONFLICT (key) DO UPDATE SET
    value = CASE WHEN guard_counters.expires_at <= now() THEN 1 ELSE guard_counters.value + 1 END,
    expires_at = CASE WHEN guard_counters.expires_at <= now() THEN EXCLUDED.expires_at ELSE guard_counters.expires_at END
RETURNING value`;

const GET_SQL = `SELECT value FROM guard_counters WHERE key = $1 AND expires_at > now()`;

const SET_SQL = `
INSERT INTO guard_counters (key, value, expires_at)
VALUES ($1, $2, now() + ($3::bigint * interval '1 millisecond'))
ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, expires_at = EXCLUDED.expires_at`;

const DELETE_SQL = `DELETE FROM guard_counters WHERE key = $1`;

/**
 * PostgreSQL-backed counters. Every operation is a single statement, so
 * atomicity comes from the row lock taken by the upsert; there is no
 * application-level locking. Runs outside executor transactions: a rollback
 * must not undo a rate-limit or lockout increment.
 */
export class PgCounterStore implements CounterStore {
    constructor(private readonly db: Queryable) { }

    async increment(key: string, ttlMs: number): Promise<number> {
        const result = await this.db.query(INCREMENT_SQL, [key, Math.ceil(ttlMs)]);
        const row = result.rows[0];
        if (!row) {
            throw new Error(`Counter increment returned no row for ${key}`);
        }
        return toCount(row.value);
    }

    async get(key: string): Promise<number | null> {
        const result = await this.db.query(GET_SQL, [key]);
        const row = result.rows[0];
        return row ? toCount(row.value) : null;
    }

    async setWithExpiry(key: string, value: number, ttlMs: number): Promise<void> {
        await this.db.query(SET_SQL, [key, value, Math.ceil(ttlMs)]);
    }

    async delete(key: string): Promise<void> {
        await this.db.query(DELETE_SQL, [key]);
    }

    /**
     * Housekeeping for expired rows; returns the number removed.
     */
    async purgeExpired(): Promise<number> {
        const result = await this.db.query(`DELETE FROM guard_counters WHERE expires_at <= now()`);
        return result.rowCount ?? 0;
    }
}

// bigint columns arrive as strings from node-postgres
function toCount(value: unknown): number {
    const count = Number(value);
    if (!Number.isFinite(count)) {
        throw new Error(`Counter value is not numeric: ${String(value)}`);
    }
    return count;
}
