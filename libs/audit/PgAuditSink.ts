import { z } from 'zod';
import type { Queryable } from '../db/types.js';
import { getComponentLogger } from '../logging/logger.js';
import { HashChainedAuditSink } from './HashChainedAuditSink.js';
import { stripIntegrity } from './integrity.js';
import type { AuditQuery, AuditRecord, AuditSink, ChainedAuditRecord } from './schema.js';
import { GENESIS_HASH } from './schema.js';

const logger = getComponentLogger('PgAuditSink');

const ChainedAuditRecordSchema = z.object({
    id: z.string(),
    operationId: z.string(),
    actorId: z.string(),
    action: z.string(),
    timestamp: z.string(),
    outcome: z.enum(['success', 'failure']),
    severity: z.enum(['normal', 'warning', 'critical']),
    detail: z.record(z.unknown()),
    integrity: z.object({
        prevHash: z.string(),
        hash: z.string()
    })
});

function parseStoredRecord(metadata: unknown, index: number): ChainedAuditRecord {
    const parsed = ChainedAuditRecordSchema.safeParse(metadata);
    if (!parsed.success) {
        throw new Error(`Malformed audit_log row at position ${index}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return parsed.data;
}

/**
 * Hardened Audit Sink (PostgreSQL Substrate)
 * Hash-chained, append-only. The chain head is bootstrapped from the most
 * recent row on first use. Writes go through their own connection, not the
 * operation's transaction, so a rollback cannot erase the audit of it.
 */
export class PgAuditSink implements AuditSink {
    private chain: Promise<HashChainedAuditSink> | null = null;

    constructor(private readonly db: Queryable) { }

    async append(record: AuditRecord): Promise<void> {
        const chain = await this.ensureChainInitialized();
        await chain.append(record);
    }

    async query(filter: AuditQuery = {}): Promise<AuditRecord[]> {
        const clauses: string[] = [];
        const params: unknown[] = [];
        const add = (column: string, value: string | undefined) => {
            if (value === undefined) return;
            params.push(value);
            clauses.push(`${column} = $${params.length}`);
        };
        add('operation_id', filter.operationId);
        add('actor', filter.actorId);
        add('outcome', filter.outcome);
        add('severity', filter.severity);

        let sql = `SELECT metadata FROM audit_log`;
        if (clauses.length > 0) sql += ` WHERE ${clauses.join(' AND ')}`;
        sql += ` ORDER BY seq ASC`;
        if (filter.limit !== undefined) {
            params.push(filter.limit);
            sql += ` LIMIT $${params.length}`;
        }

        const result = await this.db.query(sql, params);
        return result.rows.map((row, index) => stripIntegrity(parseStoredRecord(row.metadata, index)));
    }

    /**
     * Full chain in insertion order, for integrity verification.
     */
    async loadChain(): Promise<ChainedAuditRecord[]> {
        const result = await this.db.query(`SELECT metadata FROM audit_log ORDER BY seq ASC`);
        return result.rows.map((row, index) => parseStoredRecord(row.metadata, index));
    }

    private ensureChainInitialized(): Promise<HashChainedAuditSink> {
        if (!this.chain) {
            this.chain = this.bootstrapChain().catch((error: unknown) => {
                this.chain = null;
                logger.error({ error }, 'Failed to initialize audit chain from database');
                throw new Error('Audit substrate unavailable - Chain initialization failed.');
            });
        }
        return this.chain;
    }

    private async bootstrapChain(): Promise<HashChainedAuditSink> {
        const result = await this.db.query(
            `SELECT metadata->'integrity'->>'hash' AS last_hash
             FROM audit_log
             ORDER BY seq DESC
             LIMIT 1`
        );
        const stored: unknown = result.rows[0]?.last_hash;
        const lastHash = typeof stored === 'string' ? stored : GENESIS_HASH;

        return new HashChainedAuditSink({
            append: record => this.insert(record)
        }, lastHash);
    }

    private async insert(record: ChainedAuditRecord): Promise<void> {
        await this.db.query(
            `INSERT INTO audit_log (id, operation_id, actor, action, outcome, severity, metadata, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
            [
                record.id,
                record.operationId,
                record.actorId,
                record.action,
                record.outcome,
                record.severity,
                record,
                record.timestamp
            ]
        );

        logger.debug({
            auditAction: record.action,
            operationId: record.operationId,
            integrityHash: record.integrity.hash.substring(0, 16) + '...'
        }, 'Audit record committed');
    }
}
