import crypto from 'crypto';

export interface IdGenerator {
    next(): string;
}

/**
 * Operation IDs correlate every audit record, metric and log line of one
 * execute() call.
 */
export class UuidOperationIdGenerator implements IdGenerator {
    constructor(private readonly prefix: string = 'op') { }

    next(): string {
        return `${this.prefix}_${crypto.randomUUID()}`;
    }
}

export function createIdGenerator(prefix?: string): IdGenerator {
    return new UuidOperationIdGenerator(prefix);
}
