export * from './errors/operationErrors.js';
export * from './errors/sanitizer.js';
export * from './bootstrap/config/guard-config.js';
export { ConfigGuard } from './bootstrap/config-guard.js';
export type { GuardRule } from './bootstrap/config-guard.js';
export { DB_CONFIG_GUARDS } from './bootstrap/config/db-config.js';
export { logger, getComponentLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

export * from './time/clock.js';
export * from './id/operationId.js';

export * from './db/types.js';
export { TransactionClosedError } from './db/errors.js';
export { TransactionScope } from './db/transactionScope.js';
export { createPool, asPoolLike } from './db/pool.js';
export { PgPersistentStore, PgTransaction } from './db/PgPersistentStore.js';
export { InMemoryPersistentStore, InMemoryTransaction } from './db/InMemoryPersistentStore.js';

export type { CounterStore } from './counters/CounterStore.js';
export { InMemoryCounterStore } from './counters/InMemoryCounterStore.js';
export { PgCounterStore } from './counters/PgCounterStore.js';

export * from './guards/RateLimiter.js';
export * from './guards/LockoutTracker.js';
export * from './guards/permissionChecker.js';
export * from './guards/contextGuard.js';

export * from './audit/schema.js';
export * from './audit/redaction.js';
export * from './audit/integrity.js';
export { AuditTrail } from './audit/AuditTrail.js';
export type { AuditEventInput, AuditTrailOptions } from './audit/AuditTrail.js';
export { InMemoryAuditSink } from './audit/InMemoryAuditSink.js';
export { HashChainedAuditSink } from './audit/HashChainedAuditSink.js';
export { PgAuditSink } from './audit/PgAuditSink.js';

export * from './monitoring/thresholdRules.js';
export * from './monitoring/alertSink.js';
export * from './monitoring/metrics.js';
export { ThresholdMonitor } from './monitoring/ThresholdMonitor.js';
export type { ThresholdMonitorOptions, MetricSample } from './monitoring/ThresholdMonitor.js';

export * from './execution/types.js';
export { CriticalOperationExecutor, MAX_OPERATION_TIMEOUT_MS } from './execution/CriticalOperationExecutor.js';
export type { ExecutorDependencies, ExecutorSettings } from './execution/CriticalOperationExecutor.js';
export { createGuardKernel, DEFAULT_THRESHOLD_RULES } from './execution/kernel.js';
export type { GuardKernel, GuardKernelOptions } from './execution/kernel.js';

export { Authenticator, LOGIN_ACTION, loginIdentity } from './auth/Authenticator.js';
export type { LoginRequest } from './auth/Authenticator.js';
