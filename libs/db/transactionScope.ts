import { AsyncLocalStorage } from 'node:async_hooks';
import { NestedTransactionError } from '../errors/operationErrors.js';

const transactionContext = new AsyncLocalStorage<{ inTx: boolean }>();

/**
 * Tracks whether the current async context runs inside an executor-managed
 * transaction. Stores call assertInactive() from begin().
 */
export const TransactionScope = {
    run<T>(callback: () => Promise<T>): Promise<T> {
        return transactionContext.run({ inTx: true }, callback);
    },

    isActive(): boolean {
        return transactionContext.getStore()?.inTx === true;
    },

    assertInactive(): void {
        if (TransactionScope.isActive()) {
            throw new NestedTransactionError();
        }
    }
};
