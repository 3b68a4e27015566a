import { getComponentLogger } from '../logging/logger.js';
import { TransactionClosedError } from './errors.js';
import { TransactionScope } from './transactionScope.js';
import type { PersistentStore, PoolClientLike, PoolLike, Queryable, QueryOutcome, Transaction } from './types.js';

const logger = getComponentLogger('PgPersistentStore');

/**
 * One checked-out client, one BEGIN. The client goes back to the pool on
 * COMMIT or ROLLBACK; it is destroyed when ROLLBACK itself fails.
 */
export class PgTransaction implements Transaction, Queryable {
    private state: 'open' | 'committed' | 'rolled back' = 'open';

    constructor(private readonly client: PoolClientLike) { }

    query(text: string, params?: unknown[]): Promise<QueryOutcome> {
        if (this.state !== 'open') {
            return Promise.reject(new TransactionClosedError(this.state));
        }
        return this.client.query(text, params);
    }

    async commit(): Promise<void> {
        this.assertOpen();
        this.state = 'committed';
        try {
            await this.client.query('COMMIT');
        } catch (error) {
            this.client.release(error instanceof Error ? error : new Error('[DB] COMMIT failed'));
            throw error;
        }
        this.client.release();
    }

    async rollback(): Promise<void> {
        this.assertOpen();
        this.state = 'rolled back';
        try {
            await this.client.query('ROLLBACK');
        } catch (error) {
            logger.error({ error }, '[DB] Failed to rollback transaction');
            this.client.release(new Error('[DB] Forcing client destroy after failed rollback'));
            throw error;
        }
        this.client.release();
    }

    private assertOpen(): void {
        if (this.state !== 'open') {
            throw new TransactionClosedError(this.state);
        }
    }
}

export class PgPersistentStore implements PersistentStore<PgTransaction> {
    constructor(private readonly pool: PoolLike) { }

    async begin(): Promise<PgTransaction> {
        TransactionScope.assertInactive();

        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
        } catch (error) {
            client.release(error instanceof Error ? error : new Error('[DB] BEGIN failed'));
            throw error;
        }
        return new PgTransaction(client);
    }
}
