import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ThresholdConfigurationError } from '../../libs/errors/operationErrors.js';
import { evaluateRule, parseThresholdRule } from '../../libs/monitoring/thresholdRules.js';

describe('parseThresholdRule', () => {
    it('should accept each comparison kind', () => {
        for (const comparison of ['max', 'min', 'equals', 'not_equals'] as const) {
            const rule = parseThresholdRule({ metricKey: 'queue.depth', comparison, limit: 5, severity: 'warning' });
            assert.strictEqual(rule.comparison, comparison);
        }
        const range = parseThresholdRule({ metricKey: 'cpu.load', comparison: 'range', min: 0, max: 1, severity: 'info' });
        assert.deepStrictEqual(range, { metricKey: 'cpu.load', comparison: 'range', min: 0, max: 1, severity: 'info' });
    });

    it('should accept wildcard metric keys', () => {
        const rule = parseThresholdRule({ metricKey: 'operation.failures.*', comparison: 'max', limit: 10, severity: 'critical' });
        assert.strictEqual(rule.metricKey, 'operation.failures.*');
    });

    it('should reject an inverted range', () => {
        assert.throws(
            () => parseThresholdRule({ metricKey: 'cpu.load', comparison: 'range', min: 2, max: 1, severity: 'info' }),
            (err: unknown) => {
                assert.ok(err instanceof ThresholdConfigurationError);
                assert.strictEqual(err.metricKey, 'cpu.load');
                assert.deepStrictEqual(err.issues, ['min: range min must not exceed max']);
                return true;
            }
        );
    });

    it('should reject unknown comparisons and missing limits', () => {
        assert.throws(
            () => parseThresholdRule({ metricKey: 'queue.depth', comparison: 'between', limit: 1, severity: 'info' }),
            ThresholdConfigurationError
        );
        assert.throws(
            () => parseThresholdRule({ metricKey: 'queue.depth', comparison: 'max', severity: 'info' }),
            ThresholdConfigurationError
        );
    });

    it('should reject malformed keys and severities', () => {
        assert.throws(
            () => parseThresholdRule({ metricKey: 'bad key', comparison: 'max', limit: 1, severity: 'info' }),
            /metricKey must be a dotted name/
        );
        assert.throws(
            () => parseThresholdRule({ metricKey: 'queue.depth', comparison: 'max', limit: 1, severity: 'fatal' }),
            ThresholdConfigurationError
        );
    });

    it('should name an unknown key when the input is not an object', () => {
        assert.throws(
            () => parseThresholdRule('max 10'),
            (err: unknown) => err instanceof ThresholdConfigurationError && err.metricKey === '<unknown>'
        );
    });
});

describe('evaluateRule', () => {
    it('max should trip strictly above the limit', () => {
        const rule = parseThresholdRule({ metricKey: 'q', comparison: 'max', limit: 10, severity: 'critical' });
        assert.strictEqual(evaluateRule(rule, 'q', 10), null);
        assert.deepStrictEqual(evaluateRule(rule, 'q', 11), {
            metricKey: 'q', value: 11, comparison: 'max', limit: 10, severity: 'critical', ruleKey: 'q'
        });
    });

    it('min should trip strictly below the limit', () => {
        const rule = parseThresholdRule({ metricKey: 'q', comparison: 'min', limit: 2, severity: 'warning' });
        assert.strictEqual(evaluateRule(rule, 'q', 2), null);
        assert.strictEqual(evaluateRule(rule, 'q', 1)?.limit, 2);
    });

    it('equals should trip on any other value; not_equals on the value itself', () => {
        const equals = parseThresholdRule({ metricKey: 'q', comparison: 'equals', limit: 0, severity: 'info' });
        const notEquals = parseThresholdRule({ metricKey: 'q', comparison: 'not_equals', limit: 0, severity: 'info' });

        assert.strictEqual(evaluateRule(equals, 'q', 0), null);
        assert.strictEqual(evaluateRule(equals, 'q', 3)?.value, 3);
        assert.strictEqual(evaluateRule(notEquals, 'q', 3), null);
        assert.strictEqual(evaluateRule(notEquals, 'q', 0)?.value, 0);
    });

    it('range should report the crossed bound', () => {
        const rule = parseThresholdRule({ metricKey: 'cpu.*', comparison: 'range', min: 0.1, max: 0.9, severity: 'warning' });
        assert.strictEqual(evaluateRule(rule, 'cpu.node1', 0.5), null);
        assert.strictEqual(evaluateRule(rule, 'cpu.node1', 0.05)?.limit, 0.1);
        assert.deepStrictEqual(evaluateRule(rule, 'cpu.node1', 0.95), {
            metricKey: 'cpu.node1', value: 0.95, comparison: 'range', limit: 0.9, severity: 'warning', ruleKey: 'cpu.*'
        });
    });
});
