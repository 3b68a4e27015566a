import { z } from 'zod';

/**
 * Operation context shape. Action names are dotted lowercase identifiers
 * ("content.create") because they double as rate-limit and metric keys.
 */
export const ACTION_PATTERN = /^[a-z][a-z0-9_-]*(\.[a-z0-9_-]+)*$/;

export const OperationContextSchema = z.object({
    actorId: z.string().trim().min(1, 'actorId is required').max(256),
    action: z.string().min(1, 'action is required').max(128).regex(ACTION_PATTERN, 'action must be a dotted lowercase name'),
    resourceId: z.string().min(1).max(256).optional(),
    requiredPermissions: z.union([
        z.set(z.string().min(1)),
        z.array(z.string().min(1))
    ]).default([]),
    authIdentity: z.string().min(1).max(512).optional(),
    payload: z.unknown().optional()
});

export type ValidatedOperationContext = {
    actorId: string;
    action: string;
    resourceId?: string;
    requiredPermissions: ReadonlySet<string>;
    authIdentity?: string;
    payload?: unknown;
};

export type ContextGuardResult =
    | { valid: true; context: ValidatedOperationContext }
    | { valid: false; issues: string[] };

/**
 * Pre-flight structural validation of an operation context.
 */
export function executeContextGuard(input: unknown): ContextGuardResult {
    const parsed = OperationContextSchema.safeParse(input);
    if (!parsed.success) {
        return {
            valid: false,
            issues: parsed.error.issues.map(issue => `${issue.path.join('.') || 'context'}: ${issue.message}`)
        };
    }

    const { requiredPermissions, ...rest } = parsed.data;
    return {
        valid: true,
        context: {
            ...rest,
            requiredPermissions: new Set(requiredPermissions)
        }
    };
}
