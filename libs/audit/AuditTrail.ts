import crypto from 'crypto';
import type { Logger } from 'pino';
import { getComponentLogger } from '../logging/logger.js';
import type { Clock } from '../time/clock.js';
import { systemClock } from '../time/clock.js';
import { redactSensitive, REDACTION_MARKER, sensitiveFieldList } from './redaction.js';
import type { AuditOutcome, AuditQuery, AuditRecord, AuditSeverity, AuditSink } from './schema.js';

export interface AuditEventInput {
    operationId: string;
    actorId: string;
    action: string;
    outcome: AuditOutcome;
    severity: AuditSeverity;
    detail?: Record<string, unknown>;
    timestamp?: Date;
}

export interface AuditTrailOptions {
    /** Added to password/token/secret; cannot remove them. */
    sensitiveFieldNames?: readonly string[];
    clock?: Clock;
    fallbackLogger?: Logger;
}

/**
 * Append-only audit trail.
 *
 * record() never throws: a sink failure is written to the fallback logger
 * and swallowed, so an audit outage cannot replace the outcome of the
 * operation being audited. Redaction is applied before the record leaves
 * this class, on every path.
 */
export class AuditTrail {
    private readonly fieldNames: string[];
    private readonly clock: Clock;
    private readonly fallback: Logger;

    constructor(private readonly sink: AuditSink, options: AuditTrailOptions = {}) {
        this.fieldNames = sensitiveFieldList(options.sensitiveFieldNames);
        this.clock = options.clock ?? systemClock;
        this.fallback = options.fallbackLogger ?? getComponentLogger('AuditTrail');
    }

    async record(event: AuditEventInput): Promise<AuditRecord | null> {
        let record: AuditRecord;
        try {
            record = this.build(event);
        } catch (error) {
            this.fallback.error({
                error,
                operationId: event.operationId,
                action: event.action
            }, 'Audit record could not be built');
            return null;
        }

        try {
            await this.sink.append(record);
            return record;
        } catch (error) {
            this.fallback.error({
                error: error instanceof Error ? error.message : String(error),
                auditRecord: record
            }, 'Audit sink write failed; record preserved in process log');
            return null;
        }
    }

    async query(filter: AuditQuery = {}): Promise<AuditRecord[]> {
        if (!this.sink.query) {
            throw new Error('Configured audit sink does not support queries');
        }
        return this.sink.query(filter);
    }

    get sensitiveFields(): readonly string[] {
        return this.fieldNames;
    }

    private build(event: AuditEventInput): AuditRecord {
        const redacted = redactSensitive(event.detail ?? {}, this.fieldNames, REDACTION_MARKER);
        const detail: Record<string, unknown> =
            redacted !== null && typeof redacted === 'object' && !Array.isArray(redacted)
                ? Object.fromEntries(Object.entries(redacted))
                : { value: redacted };

        return Object.freeze({
            id: crypto.randomUUID(),
            operationId: event.operationId,
            actorId: event.actorId,
            action: event.action,
            timestamp: (event.timestamp ?? this.clock.now()).toISOString(),
            outcome: event.outcome,
            severity: event.severity,
            detail: Object.freeze(detail)
        });
    }
}
