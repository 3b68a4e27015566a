import { BASE_SENSITIVE_FIELDS, REDACT_CENSOR } from '../logging/redactionConfig.js';

export const REDACTION_MARKER = REDACT_CENSOR;

/**
 * Builds the effective list of sensitive field names. The base names are
 * always included; configured names can only add to them.
 */
export function sensitiveFieldList(extra: readonly string[] = []): string[] {
    const names = new Set<string>();
    for (const name of [...BASE_SENSITIVE_FIELDS, ...extra]) {
        const normalized = name.trim().toLowerCase();
        if (normalized) names.add(normalized);
    }
    return [...names];
}

export function isSensitiveKey(key: string, fieldNames: readonly string[]): boolean {
    const lowered = key.toLowerCase();
    return fieldNames.some(name => lowered.includes(name));
}

/**
 * Recursively replaces the values of sensitive keys. Arrays, plain objects,
 * Maps and Dates are walked; cycles become "[Circular]". The input is never
 * mutated.
 */
export function redactSensitive(
    value: unknown,
    fieldNames: readonly string[],
    marker: string = REDACTION_MARKER
): unknown {
    const seen = new WeakSet<object>();

    const walk = (current: unknown): unknown => {
        if (current === null || typeof current !== 'object') {
            return current;
        }
        if (current instanceof Date) {
            return current.toISOString();
        }
        if (seen.has(current)) {
            return '[Circular]';
        }
        seen.add(current);

        let result: unknown;
        if (Array.isArray(current)) {
            result = current.map(item => walk(item));
        } else if (current instanceof Map) {
            const out: Record<string, unknown> = {};
            for (const [key, item] of current) {
                const name = String(key);
                out[name] = isSensitiveKey(name, fieldNames) ? marker : walk(item);
            }
            result = out;
        } else if (current instanceof Set) {
            result = [...current].map(item => walk(item));
        } else if (current instanceof Error) {
            result = { name: current.name, message: current.message };
        } else {
            const out: Record<string, unknown> = {};
            for (const [key, item] of Object.entries(current)) {
                out[key] = isSensitiveKey(key, fieldNames) ? marker : walk(item);
            }
            result = out;
        }

        seen.delete(current);
        return result;
    };

    return walk(value);
}
