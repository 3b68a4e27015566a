export class TransactionClosedError extends Error {
    constructor(state: string) {
        super(`Transaction already ${state}`);
        this.name = 'TransactionClosedError';
    }
}
