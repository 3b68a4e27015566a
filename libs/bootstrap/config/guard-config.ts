import { z } from 'zod';

/**
 * Guard kernel configuration.
 * Limits are configuration, not semantics: every constant below can be
 * overridden through GUARD_* environment variables.
 */

export const RateLimitPolicySchema = z.object({
    max: z.number().int().positive(),
    windowSeconds: z.number().int().positive()
});

export type RateLimitPolicy = z.infer<typeof RateLimitPolicySchema>;

export const DEFAULT_ACTION_RATE_LIMITS: Record<string, RateLimitPolicy> = {
    'auth.login': { max: 5, windowSeconds: 900 },
    'content.create': { max: 30, windowSeconds: 60 },
    'content.delete': { max: 10, windowSeconds: 3600 }
};

export const GuardConfigSchema = z.object({
    maxLoginAttempts: z.number().int().positive().default(5),
    lockoutDurationSeconds: z.number().int().positive().default(900),
    rateLimit: z.object({
        default: RateLimitPolicySchema.default({ max: 60, windowSeconds: 60 }),
        actions: z.record(z.string().min(1), RateLimitPolicySchema).default(DEFAULT_ACTION_RATE_LIMITS)
    }).default({}),
    sensitiveFieldNames: z.array(z.string().min(1)).default([]),
    alertCooldownSeconds: z.number().int().nonnegative().default(300),
    // setTimeout clamps anything larger to 1ms.
    operationTimeoutMs: z.number().int().positive().max(2_147_483_647).default(30_000),
    failureWindowSeconds: z.number().int().positive().default(300)
});

export type GuardConfig = z.infer<typeof GuardConfigSchema>;
export type GuardConfigInput = z.input<typeof GuardConfigSchema>;

export class GuardConfigError extends Error {
    constructor(public readonly issues: readonly string[]) {
        super(`Invalid guard configuration: ${issues.join('; ')}`);
        this.name = 'GuardConfigError';
    }
}

/**
 * Parses an already-structured configuration object, applying defaults.
 */
export function parseGuardConfig(input: GuardConfigInput = {}): GuardConfig {
    const result = GuardConfigSchema.safeParse(input);
    if (!result.success) {
        throw new GuardConfigError(
            result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }
    return result.data;
}

const integerFromEnv = z.coerce.number().int();

/**
 * Builds the guard configuration from GUARD_* environment variables.
 */
export function loadGuardConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
    const issues: string[] = [];
    const input: GuardConfigInput = {};

    const readInt = (name: string): number | undefined => {
        const raw = env[name];
        if (raw === undefined || raw.trim() === '') return undefined;
        const parsed = integerFromEnv.safeParse(raw);
        if (!parsed.success) {
            issues.push(`${name}: expected an integer, received "${raw}"`);
            return undefined;
        }
        return parsed.data;
    };

    input.maxLoginAttempts = readInt('GUARD_MAX_LOGIN_ATTEMPTS');
    input.lockoutDurationSeconds = readInt('GUARD_LOCKOUT_DURATION_SECONDS');
    input.alertCooldownSeconds = readInt('GUARD_ALERT_COOLDOWN_SECONDS');
    input.operationTimeoutMs = readInt('GUARD_OPERATION_TIMEOUT_MS');
    input.failureWindowSeconds = readInt('GUARD_FAILURE_WINDOW_SECONDS');

    const defaultMax = readInt('GUARD_RATE_LIMIT_MAX');
    const defaultWindow = readInt('GUARD_RATE_LIMIT_WINDOW_SECONDS');
    const rateLimit: NonNullable<GuardConfigInput['rateLimit']> = {};
    if (defaultMax !== undefined || defaultWindow !== undefined) {
        rateLimit.default = { max: defaultMax ?? 60, windowSeconds: defaultWindow ?? 60 };
    }

    const actionsRaw = env.GUARD_RATE_LIMIT_ACTIONS;
    if (actionsRaw && actionsRaw.trim() !== '') {
        try {
            const parsed: unknown = JSON.parse(actionsRaw);
            const actions = z.record(z.string(), RateLimitPolicySchema).safeParse(parsed);
            if (actions.success) {
                rateLimit.actions = actions.data;
            } else {
                issues.push('GUARD_RATE_LIMIT_ACTIONS: expected {"<action>": {"max": n, "windowSeconds": n}}');
            }
        } catch {
            issues.push('GUARD_RATE_LIMIT_ACTIONS: not valid JSON');
        }
    }
    input.rateLimit = rateLimit;

    const sensitive = env.GUARD_SENSITIVE_FIELDS;
    if (sensitive) {
        input.sensitiveFieldNames = sensitive.split(',').map(name => name.trim()).filter(name => name.length > 0);
    }

    if (issues.length > 0) {
        throw new GuardConfigError(issues);
    }

    return parseGuardConfig(input);
}
