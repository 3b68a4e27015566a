import type pg from 'pg';

export interface Transaction {
    commit(): Promise<void>;
    rollback(): Promise<void>;
}

/**
 * Transactional storage consumed by the executor. Each begin() hands out a
 * transaction owned by exactly one execute() call.
 */
export interface PersistentStore<TTx extends Transaction = Transaction> {
    begin(): Promise<TTx>;
}

/**
 * Rows are untyped until the caller checks them.
 */
export interface QueryOutcome {
    rows: pg.QueryResultRow[];
    rowCount: number | null;
}

export type Queryable = {
    query(text: string, params?: unknown[]): Promise<QueryOutcome>;
};

/**
 * Minimal slice of pg.Pool the stores depend on.
 */
export interface PoolLike extends Queryable {
    connect(): Promise<PoolClientLike>;
}

export interface PoolClientLike extends Queryable {
    release(err?: Error | boolean): void;
}
