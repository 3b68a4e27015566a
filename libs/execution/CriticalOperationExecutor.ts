import type { Logger } from 'pino';
import type { AuditTrail } from '../audit/AuditTrail.js';
import type { AuditSeverity } from '../audit/schema.js';
import type { CounterStore } from '../counters/CounterStore.js';
import { TransactionScope } from '../db/transactionScope.js';
import type { PersistentStore, Transaction } from '../db/types.js';
import {
    AuthenticationError,
    CriticalOperationError,
    describeCause,
    OperationFailedError,
    OperationTimeoutError,
    RateLimitError,
    ResultValidationError,
    UnauthorizedError,
    ValidationError
} from '../errors/operationErrors.js';
import { executeContextGuard } from '../guards/contextGuard.js';
import type { ValidatedOperationContext } from '../guards/contextGuard.js';
import type { LockoutTracker } from '../guards/LockoutTracker.js';
import type { PermissionChecker } from '../guards/permissionChecker.js';
import { rateLimitKey } from '../guards/RateLimiter.js';
import type { RateLimiter } from '../guards/RateLimiter.js';
import type { IdGenerator } from '../id/operationId.js';
import { UuidOperationIdGenerator } from '../id/operationId.js';
import { getComponentLogger } from '../logging/logger.js';
import type { MetricsRecorder } from '../monitoring/metrics.js';
import { LoggingMetricsRecorder } from '../monitoring/metrics.js';
import type { ThresholdMonitor } from '../monitoring/ThresholdMonitor.js';
import type { Clock } from '../time/clock.js';
import { systemClock } from '../time/clock.js';
import type {
    ExecuteOptions,
    OperationContext,
    OperationResult,
    OperationScope,
    UnitOfWork
} from './types.js';

export interface ExecutorDependencies<TTx extends Transaction> {
    store: PersistentStore<TTx>;
    permissions: PermissionChecker;
    rateLimiter: RateLimiter;
    lockout: LockoutTracker;
    monitor: ThresholdMonitor;
    audit: AuditTrail;
    /** Backs the failure-count metric. */
    counters: CounterStore;
    metrics?: MetricsRecorder;
    clock?: Clock;
    ids?: IdGenerator;
}

export interface ExecutorSettings {
    operationTimeoutMs: number;
    failureWindowMs: number;
}

/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_OPERATION_TIMEOUT_MS = 2_147_483_647;

const SEVERITY_BY_KIND: Record<CriticalOperationError['kind'], AuditSeverity> = {
    VALIDATION: 'normal',
    UNAUTHORIZED: 'critical',
    RATE_LIMITED: 'warning',
    RESULT_INVALID: 'critical',
    OPERATION_FAILED: 'normal'
};

/**
 * Critical Operation Executor
 *
 * Guard pipeline, per call:
 * 1. Assign operationId
 * 2. Begin transaction
 * 3. Context Guard → ValidationError
 * 4. Permission check → UnauthorizedError (audited critical)
 * 5. Rate limit → RateLimitError (audited warning)
 * 6. Unit of work under a deadline → OperationFailedError
 * 7. Result validation → ResultValidationError
 * 8/9. Commit or roll back; exactly one audit record either way
 * 10. Metrics, best-effort
 *
 * No retries: every rejection goes straight back to the caller.
 */
export class CriticalOperationExecutor<TTx extends Transaction = Transaction> {
    private readonly metrics: MetricsRecorder;
    private readonly clock: Clock;
    private readonly ids: IdGenerator;
    private readonly log: Logger;

    constructor(
        private readonly deps: ExecutorDependencies<TTx>,
        private readonly settings: ExecutorSettings
    ) {
        this.metrics = deps.metrics ?? new LoggingMetricsRecorder();
        this.clock = deps.clock ?? systemClock;
        this.ids = deps.ids ?? new UuidOperationIdGenerator();
        this.log = getComponentLogger('CriticalOperationExecutor');
    }

    async execute<T>(
        operation: UnitOfWork<T, TTx>,
        context: OperationContext,
        options: ExecuteOptions<T> = {}
    ): Promise<OperationResult<T>> {
        const operationId = this.ids.next();
        const startedAt = performance.now();
        const actionLabel = rawString(context?.action) ?? '<invalid>';
        const log = this.log.child({ operationId, action: actionLabel });

        let transaction: TTx | null = null;
        let validated: ValidatedOperationContext | null = null;

        try {
            try {
                transaction = await this.deps.store.begin();
            } catch (error) {
                throw new OperationFailedError(operationId, error);
            }

            const guard = executeContextGuard(context);
            if (guard.valid === false) {
                throw new ValidationError(operationId, guard.issues);
            }
            validated = guard.context;
            const { actorId, action, requiredPermissions } = validated;

            const timeoutMs = options.timeoutMs ?? this.settings.operationTimeoutMs;
            if (!isValidTimeout(timeoutMs)) {
                throw new ValidationError(operationId, [
                    `timeoutMs: must be a positive integer no greater than ${MAX_OPERATION_TIMEOUT_MS}`
                ]);
            }

            const allowed = await this.guarded(operationId, () =>
                this.deps.permissions.check(actorId, action, requiredPermissions)
            );
            if (!allowed) {
                throw new UnauthorizedError(operationId, actorId, action, [...requiredPermissions]);
            }

            const policy = this.deps.rateLimiter.resolvePolicy(action);
            const limitKey = rateLimitKey(actorId, action);
            const windowMs = policy.windowSeconds * 1000;
            const acquired = await this.guarded(operationId, () =>
                this.deps.rateLimiter.tryAcquire(limitKey, policy.max, windowMs)
            );
            if (!acquired) {
                throw new RateLimitError(operationId, limitKey, policy.max, windowMs);
            }

            const data = await this.runWithDeadline(operation, transaction, operationId, timeoutMs);

            if (options.validateResult) {
                const verdict = await this.guarded(operationId, async () => {
                    const validator = options.validateResult;
                    return validator ? validator(data) : true;
                });
                if (verdict !== true) {
                    throw new ResultValidationError(
                        operationId,
                        typeof verdict === 'string' && verdict.length > 0 ? verdict : 'result rejected by validator'
                    );
                }
            }

            const committing = transaction;
            transaction = null;
            try {
                await committing.commit();
            } catch (error) {
                throw new OperationFailedError(operationId, error);
            }

            await this.deps.audit.record({
                operationId,
                actorId,
                action,
                outcome: 'success',
                severity: 'normal',
                detail: {
                    resourceId: validated.resourceId,
                    requiredPermissions: [...requiredPermissions],
                    payload: validated.payload,
                    durationMs: elapsedSince(startedAt)
                }
            });

            const authIdentity = validated.authIdentity;
            if (authIdentity) {
                await this.bestEffort(log, 'Lockout reset failed', () =>
                    this.deps.lockout.recordSuccess(authIdentity)
                );
            }

            log.info({ actorId, durationMs: elapsedSince(startedAt) }, 'Critical operation committed');
            return { success: true, data, operationId };
        } catch (error) {
            const failure = error instanceof CriticalOperationError
                ? error
                : new OperationFailedError(operationId, error);

            if (transaction) {
                await this.rollback(transaction, log);
            }

            const authenticationFailure = isAuthenticationFailure(failure);
            const severity: AuditSeverity = authenticationFailure ? 'warning' : SEVERITY_BY_KIND[failure.kind];

            await this.deps.audit.record({
                operationId,
                actorId: validated?.actorId ?? rawString(context?.actorId) ?? '<unknown>',
                action: validated?.action ?? actionLabel,
                outcome: 'failure',
                severity,
                detail: {
                    resourceId: validated?.resourceId ?? rawString(context?.resourceId),
                    requiredPermissions: validated ? [...validated.requiredPermissions] : undefined,
                    payload: validated ? validated.payload : context?.payload,
                    error: {
                        kind: failure.kind,
                        code: failure.code,
                        message: failure.message,
                        cause: failure.cause === undefined ? undefined : describeCause(failure.cause)
                    },
                    durationMs: elapsedSince(startedAt)
                }
            });

            await this.recordFailureSideEffects(validated, failure, authenticationFailure, log);

            const logPayload = { kind: failure.kind, code: failure.code, actorId: validated?.actorId };
            if (severity === 'critical') {
                log.error(logPayload, 'Critical operation rejected');
            } else {
                log.warn(logPayload, 'Critical operation failed');
            }

            return { success: false, error: failure, operationId };
        } finally {
            await this.recordMetrics(validated?.action ?? 'invalid', elapsedSince(startedAt), log);
        }
    }

    /**
     * Same pipeline; unwraps the result and throws the typed error.
     */
    async executeOrThrow<T>(
        operation: UnitOfWork<T, TTx>,
        context: OperationContext,
        options: ExecuteOptions<T> = {}
    ): Promise<T> {
        const result = await this.execute(operation, context, options);
        if (result.success === false) {
            throw result.error;
        }
        return result.data;
    }

    private async runWithDeadline<T>(
        operation: UnitOfWork<T, TTx>,
        transaction: TTx,
        operationId: string,
        timeoutMs: number
    ): Promise<T> {
        const controller = new AbortController();
        const scope: OperationScope<TTx> = {
            operationId,
            transaction,
            deadline: new Date(this.clock.now().getTime() + timeoutMs),
            signal: controller.signal
        };

        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => {
                const timeoutError = new OperationTimeoutError(timeoutMs);
                controller.abort(timeoutError);
                reject(timeoutError);
            }, timeoutMs);
        });

        try {
            return await TransactionScope.run(() =>
                Promise.race([Promise.resolve().then(() => operation(scope)), deadline])
            );
        } catch (error) {
            throw new OperationFailedError(operationId, error);
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * Collaborator failures inside the pipeline become OperationFailedError.
     */
    private async guarded<R>(operationId: string, step: () => Promise<R>): Promise<R> {
        try {
            return await step();
        } catch (error) {
            throw new OperationFailedError(operationId, error);
        }
    }

    private async rollback(transaction: TTx, log: Logger): Promise<void> {
        try {
            await transaction.rollback();
        } catch (error) {
            log.error({ error }, 'Transaction rollback failed');
        }
    }

    private async recordFailureSideEffects(
        context: ValidatedOperationContext | null,
        failure: CriticalOperationError,
        authenticationFailure: boolean,
        log: Logger
    ): Promise<void> {
        if (context?.authIdentity && authenticationFailure) {
            const identity = context.authIdentity;
            await this.bestEffort(log, 'Lockout update failed', () => this.deps.lockout.recordFailure(identity));
        }

        const action = context?.action ?? 'invalid';
        await this.bestEffort(log, 'Failure threshold update failed', async () => {
            const failures = await this.deps.counters.increment(
                `metrics:failures:${action}`,
                this.settings.failureWindowMs
            );
            const violation = await this.deps.monitor.evaluate(`operation.failures.${action}`, failures);
            if (violation) {
                log.warn({ failures, limit: violation.limit, kind: failure.kind }, 'Failure threshold exceeded');
            }
        });
    }

    private async recordMetrics(action: string, durationMs: number, log: Logger): Promise<void> {
        try {
            const tags = { action };
            await this.metrics.record('operation.duration_ms', durationMs, tags);
            await this.metrics.record('operation.heap_used_bytes', process.memoryUsage().heapUsed, tags);
            await this.deps.monitor.evaluate(`operation.duration_ms.${action}`, durationMs);
        } catch (error) {
            log.debug({ error }, 'Metrics recording failed');
        }
    }

    private async bestEffort(log: Logger, message: string, step: () => Promise<unknown>): Promise<void> {
        try {
            await step();
        } catch (error) {
            log.error({ error }, message);
        }
    }
}

function isAuthenticationFailure(failure: CriticalOperationError): boolean {
    return failure instanceof OperationFailedError && failure.cause instanceof AuthenticationError;
}

function isValidTimeout(timeoutMs: number): boolean {
    return Number.isInteger(timeoutMs) && timeoutMs > 0 && timeoutMs <= MAX_OPERATION_TIMEOUT_MS;
}

function rawString(value: unknown): string | undefined {
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function elapsedSince(startedAt: number): number {
    return Math.round((performance.now() - startedAt) * 1000) / 1000;
}
