import { TransactionClosedError } from './errors.js';
import { TransactionScope } from './transactionScope.js';
import type { PersistentStore, Transaction } from './types.js';

const DELETED = Symbol('deleted');

/**
 * Staged key-value transaction. Reads see the transaction's own writes;
 * nothing reaches the store until commit().
 */
export class InMemoryTransaction implements Transaction {
    private readonly staged = new Map<string, unknown>();
    private state: 'open' | 'committed' | 'rolled back' = 'open';

    constructor(
        private readonly committed: Map<string, unknown>,
        private readonly onClose: () => void
    ) { }

    get(key: string): unknown {
        this.assertOpen();
        if (this.staged.has(key)) {
            const value = this.staged.get(key);
            return value === DELETED ? undefined : value;
        }
        return this.committed.get(key);
    }

    set(key: string, value: unknown): void {
        this.assertOpen();
        this.staged.set(key, structuredClone(value));
    }

    delete(key: string): void {
        this.assertOpen();
        this.staged.set(key, DELETED);
    }

    async commit(): Promise<void> {
        this.assertOpen();
        for (const [key, value] of this.staged) {
            if (value === DELETED) {
                this.committed.delete(key);
            } else {
                this.committed.set(key, value);
            }
        }
        this.close('committed');
    }

    async rollback(): Promise<void> {
        this.assertOpen();
        this.close('rolled back');
    }

    private close(state: 'committed' | 'rolled back'): void {
        this.state = state;
        this.staged.clear();
        this.onClose();
    }

    private assertOpen(): void {
        if (this.state !== 'open') {
            throw new TransactionClosedError(this.state);
        }
    }
}

export class InMemoryPersistentStore implements PersistentStore<InMemoryTransaction> {
    private readonly data = new Map<string, unknown>();
    private openTransactions = 0;

    constructor(seed?: Record<string, unknown>) {
        for (const [key, value] of Object.entries(seed ?? {})) {
            this.data.set(key, structuredClone(value));
        }
    }

    async begin(): Promise<InMemoryTransaction> {
        TransactionScope.assertInactive();
        this.openTransactions++;
        return new InMemoryTransaction(this.data, () => {
            this.openTransactions--;
        });
    }

    /**
     * Committed state only.
     */
    snapshot(): Record<string, unknown> {
        return structuredClone(Object.fromEntries(this.data));
    }

    get activeTransactions(): number {
        return this.openTransactions;
    }
}
