/**
 * Canonical Audit Schema
 *
 * Objectives:
 * - Immutability (append-only, never updated)
 * - Correlation (one operationId across every record of an execute() call)
 * - Redaction before persistence
 */

export type AuditOutcome = 'success' | 'failure';

export type AuditSeverity = 'normal' | 'warning' | 'critical';

export interface AuditRecord {
    readonly id: string;            // UUID
    readonly operationId: string;
    readonly actorId: string;
    readonly action: string;
    readonly timestamp: string;     // ISO-8601
    readonly outcome: AuditOutcome;
    readonly severity: AuditSeverity;
    readonly detail: Readonly<Record<string, unknown>>;
}

export interface AuditIntegrity {
    prevHash: string;     // Hash of the immediately preceding record
    hash: string;         // SHA-256(this_record_serialized || prevHash)
}

export type ChainedAuditRecord = AuditRecord & { integrity: AuditIntegrity };

export interface AuditQuery {
    operationId?: string;
    actorId?: string;
    outcome?: AuditOutcome;
    severity?: AuditSeverity;
    limit?: number;
}

/**
 * Persistence target for audit records. Implementations may throw; the
 * AuditTrail absorbs failures.
 */
export interface AuditSink {
    append(record: AuditRecord): Promise<void>;
    query?(filter: AuditQuery): Promise<AuditRecord[]>;
}

export const GENESIS_HASH = '0'.repeat(64);
