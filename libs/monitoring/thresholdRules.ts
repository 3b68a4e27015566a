import { z } from 'zod';
import { ThresholdConfigurationError } from '../errors/operationErrors.js';

export type ThresholdSeverity = 'info' | 'warning' | 'critical';

export type ThresholdComparison = 'max' | 'min' | 'range' | 'equals' | 'not_equals';

const metricKey = z.string().min(1).regex(/^[A-Za-z0-9_.:-]+(\.\*)?$/, 'metricKey must be a dotted name, optionally ending in .*');
const severity = z.enum(['info', 'warning', 'critical']);
const finite = z.number().finite();

export const ThresholdRuleSchema = z.discriminatedUnion('comparison', [
    z.object({ metricKey, severity, comparison: z.literal('max'), limit: finite }),
    z.object({ metricKey, severity, comparison: z.literal('min'), limit: finite }),
    z.object({ metricKey, severity, comparison: z.literal('equals'), limit: finite }),
    z.object({ metricKey, severity, comparison: z.literal('not_equals'), limit: finite }),
    z.object({ metricKey, severity, comparison: z.literal('range'), min: finite, max: finite })
]).superRefine((rule, ctx) => {
    if (rule.comparison === 'range' && rule.min > rule.max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['min'], message: 'range min must not exceed max' });
    }
});

export type ThresholdRule = z.infer<typeof ThresholdRuleSchema>;
export type ThresholdRuleInput = z.input<typeof ThresholdRuleSchema>;

export interface Violation {
    metricKey: string;
    value: number;
    comparison: ThresholdComparison;
    /** Breached bound; for range rules the side that was crossed. */
    limit: number;
    severity: ThresholdSeverity;
    ruleKey: string;
}

/**
 * Validates a rule definition. Misconfiguration fails here, at registration,
 * never during evaluation.
 */
export function parseThresholdRule(input: unknown): ThresholdRule {
    const parsed = ThresholdRuleSchema.safeParse(input);
    if (!parsed.success) {
        const key = typeof input === 'object' && input !== null && 'metricKey' in input
            ? String(input.metricKey)
            : '<unknown>';
        throw new ThresholdConfigurationError(
            key,
            parsed.error.issues.map(issue => `${issue.path.join('.') || 'rule'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

/**
 * Pure evaluation of one rule against one value.
 */
export function evaluateRule(rule: ThresholdRule, metricKey: string, value: number): Violation | null {
    const violation = (limit: number): Violation => ({
        metricKey,
        value,
        comparison: rule.comparison,
        limit,
        severity: rule.severity,
        ruleKey: rule.metricKey
    });

    switch (rule.comparison) {
        case 'max':
            return value > rule.limit ? violation(rule.limit) : null;
        case 'min':
            return value < rule.limit ? violation(rule.limit) : null;
        case 'equals':
            return value !== rule.limit ? violation(rule.limit) : null;
        case 'not_equals':
            return value === rule.limit ? violation(rule.limit) : null;
        case 'range':
            if (value < rule.min) return violation(rule.min);
            if (value > rule.max) return violation(rule.max);
            return null;
    }
}
