import type { CriticalOperationError } from '../errors/operationErrors.js';
import type { Transaction } from '../db/types.js';

/**
 * Who is doing what to what. Built by the caller right before execute()
 * and not retained afterwards.
 */
export interface OperationContext {
    readonly actorId: string;
    /** Dotted operation name ("content.create"); keys rate limits and metrics. */
    readonly action: string;
    readonly resourceId?: string;
    readonly requiredPermissions?: ReadonlySet<string> | readonly string[];
    /** Marks an authentication operation and names its lockout identity. */
    readonly authIdentity?: string;
    readonly payload?: unknown;
}

/**
 * Handed to the unit of work. Zero-argument closures ignore it.
 */
export interface OperationScope<TTx extends Transaction = Transaction> {
    readonly operationId: string;
    readonly transaction: TTx;
    readonly deadline: Date;
    /** Aborted when the deadline passes. Advisory: nothing is preempted. */
    readonly signal: AbortSignal;
}

export type UnitOfWork<T, TTx extends Transaction = Transaction> =
    (scope: OperationScope<TTx>) => T | Promise<T>;

/**
 * `true` accepts the result; `false` or a reason string rejects it.
 */
export type ResultValidator<T> = (result: T) => boolean | string | Promise<boolean | string>;

export interface ExecuteOptions<T> {
    validateResult?: ResultValidator<T>;
    timeoutMs?: number;
}

export type OperationResult<T> =
    | { success: true; data: T; operationId: string }
    | { success: false; error: CriticalOperationError; operationId: string };
