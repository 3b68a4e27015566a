import { computeRecordHash } from './integrity.js';
import type { AuditQuery, AuditRecord, AuditSink, ChainedAuditRecord } from './schema.js';
import { GENESIS_HASH } from './schema.js';

/**
 * Decorates a sink with hash chaining. Appends are serialized so each record
 * links to the one written before it; the chain head only advances after
 * the inner sink accepted the record.
 */
export class HashChainedAuditSink implements AuditSink {
    private lastHash: string;
    private tail: Promise<void> = Promise.resolve();

    constructor(
        private readonly inner: { append(record: ChainedAuditRecord): Promise<void>; query?(filter: AuditQuery): Promise<AuditRecord[]> },
        genesis: string = GENESIS_HASH
    ) {
        this.lastHash = genesis;
    }

    append(record: AuditRecord): Promise<void> {
        const write = this.tail.then(async () => {
            const prevHash = this.lastHash;
            const hash = computeRecordHash(record, prevHash);
            await this.inner.append({ ...record, integrity: { prevHash, hash } });
            this.lastHash = hash;
        });
        // A failed write must not poison the queue for later records.
        this.tail = write.catch(() => undefined);
        return write;
    }

    async query(filter: AuditQuery = {}): Promise<AuditRecord[]> {
        if (!this.inner.query) {
            throw new Error('Wrapped audit sink does not support queries');
        }
        return this.inner.query(filter);
    }

    get head(): string {
        return this.lastHash;
    }
}
