export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: NodeJS.ProcessEnv) => boolean; message: string }
    | { type: 'assert'; check: (env: NodeJS.ProcessEnv) => boolean; message: string };

/**
 * Environment configuration checks. Callers decide how to fail on violations;
 * createPool() refuses to build a pool while any remain.
 */
export class ConfigGuard {
    /**
     * Evaluates every rule and returns the violations found.
     */
    static check(rules: readonly GuardRule[], env: NodeJS.ProcessEnv = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                errors.push(`Check failed for rule: ${message}`);
            }
        }

        return errors;
    }
}
