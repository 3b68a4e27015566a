import { AuditTrail } from '../audit/AuditTrail.js';
import { InMemoryAuditSink } from '../audit/InMemoryAuditSink.js';
import type { AuditSink } from '../audit/schema.js';
import type { GuardConfig } from '../bootstrap/config/guard-config.js';
import type { CounterStore } from '../counters/CounterStore.js';
import type { PersistentStore, Transaction } from '../db/types.js';
import { LockoutTracker } from '../guards/LockoutTracker.js';
import type { LockoutEvent } from '../guards/LockoutTracker.js';
import type { PermissionChecker } from '../guards/permissionChecker.js';
import { RateLimiter } from '../guards/RateLimiter.js';
import type { IdGenerator } from '../id/operationId.js';
import { LoggingAlertSink } from '../monitoring/alertSink.js';
import type { AlertSink } from '../monitoring/alertSink.js';
import type { MetricsRecorder } from '../monitoring/metrics.js';
import { ThresholdMonitor } from '../monitoring/ThresholdMonitor.js';
import type { ThresholdRuleInput } from '../monitoring/thresholdRules.js';
import type { Clock } from '../time/clock.js';
import { systemClock } from '../time/clock.js';
import { CriticalOperationExecutor } from './CriticalOperationExecutor.js';

export const DEFAULT_THRESHOLD_RULES: readonly ThresholdRuleInput[] = [
    { metricKey: 'operation.failures.*', comparison: 'max', limit: 10, severity: 'critical' },
    { metricKey: 'operation.duration_ms.*', comparison: 'max', limit: 5000, severity: 'warning' }
];

export interface GuardKernelOptions<TTx extends Transaction> {
    config: GuardConfig;
    store: PersistentStore<TTx>;
    counters: CounterStore;
    permissions: PermissionChecker;
    /** Defaults to log-only alerts. */
    alertSink?: AlertSink;
    /** Defaults to an in-memory sink; production wiring passes PgAuditSink. */
    auditSink?: AuditSink;
    thresholdRules?: readonly ThresholdRuleInput[];
    onLockout?: (event: LockoutEvent) => void | Promise<void>;
    clock?: Clock;
    ids?: IdGenerator;
    metrics?: MetricsRecorder;
}

export interface GuardKernel<TTx extends Transaction> {
    executor: CriticalOperationExecutor<TTx>;
    rateLimiter: RateLimiter;
    lockout: LockoutTracker;
    monitor: ThresholdMonitor;
    audit: AuditTrail;
    config: GuardConfig;
}

export function createGuardKernel<TTx extends Transaction>(options: GuardKernelOptions<TTx>): GuardKernel<TTx> {
    const { config, counters } = options;
    const clock = options.clock ?? systemClock;

    const rateLimiter = new RateLimiter(counters, config.rateLimit);
    const lockout = new LockoutTracker(counters, {
        maxAttempts: config.maxLoginAttempts,
        lockoutDurationMs: config.lockoutDurationSeconds * 1000,
        clock,
        onLockout: options.onLockout
    });

    const monitor = new ThresholdMonitor(counters, options.alertSink ?? new LoggingAlertSink(), {
        cooldownMs: config.alertCooldownSeconds * 1000
    });
    for (const rule of options.thresholdRules ?? DEFAULT_THRESHOLD_RULES) {
        monitor.registerRule(rule);
    }

    const audit = new AuditTrail(options.auditSink ?? new InMemoryAuditSink(), {
        sensitiveFieldNames: config.sensitiveFieldNames,
        clock
    });

    const executor = new CriticalOperationExecutor<TTx>({
        store: options.store,
        permissions: options.permissions,
        rateLimiter,
        lockout,
        monitor,
        audit,
        counters,
        metrics: options.metrics,
        clock,
        ids: options.ids
    }, {
        operationTimeoutMs: config.operationTimeoutMs,
        failureWindowMs: config.failureWindowSeconds * 1000
    });

    return { executor, rateLimiter, lockout, monitor, audit, config };
}
