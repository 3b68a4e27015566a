import crypto from 'crypto';
import type { AuditRecord, ChainedAuditRecord } from './schema.js';
import { GENESIS_HASH } from './schema.js';

/**
 * JSON with object keys sorted at every level. Stores such as jsonb do not
 * preserve key order, so hashes are computed over this form.
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(value, (_key, current: unknown) => {
        if (current === null || typeof current !== 'object' || Array.isArray(current)) {
            return current;
        }
        return Object.fromEntries(
            Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        );
    });
}

export function computeRecordHash(record: AuditRecord, prevHash: string): string {
    return crypto.createHash('sha256')
        .update(canonicalJson(record) + prevHash)
        .digest('hex');
}

/**
 * Strips the integrity envelope to recover the hashed contents.
 */
export function stripIntegrity(record: ChainedAuditRecord): AuditRecord {
    const { integrity: _integrity, ...contentsOnly } = record;
    return contentsOnly;
}

export interface ChainVerification {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
}

/**
 * Audit Integrity Verifier
 * Validates the hash chain of audit records in insertion order.
 */
export function verifyAuditChain(records: readonly ChainedAuditRecord[], genesis: string = GENESIS_HASH): ChainVerification {
    let lastHash = genesis;

    for (const [i, record] of records.entries()) {
        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        const computedHash = computeRecordHash(stripIntegrity(record), record.integrity.prevHash);
        if (computedHash !== record.integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${record.integrity.hash}`
            };
        }

        lastHash = record.integrity.hash;
    }

    return { valid: true };
}
