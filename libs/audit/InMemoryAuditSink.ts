import type { AuditQuery, AuditRecord, AuditSink } from './schema.js';

/**
 * Reference sink. Records are kept in append order and handed out as copies.
 */
export class InMemoryAuditSink implements AuditSink {
    private readonly records: AuditRecord[] = [];

    async append(record: AuditRecord): Promise<void> {
        this.records.push(structuredClone(record));
    }

    async query(filter: AuditQuery = {}): Promise<AuditRecord[]> {
        const matches = this.records.filter(record =>
            (filter.operationId === undefined || record.operationId === filter.operationId) &&
            (filter.actorId === undefined || record.actorId === filter.actorId) &&
            (filter.outcome === undefined || record.outcome === filter.outcome) &&
            (filter.severity === undefined || record.severity === filter.severity)
        );
        const limited = filter.limit === undefined ? matches : matches.slice(0, filter.limit);
        return structuredClone(limited);
    }

    all(): AuditRecord[] {
        return structuredClone(this.records);
    }

    get size(): number {
        return this.records.length;
    }
}
