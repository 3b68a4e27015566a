import type { CounterStore } from '../counters/CounterStore.js';
import { getComponentLogger } from '../logging/logger.js';
import type { AlertSink } from './alertSink.js';
import { evaluateRule, parseThresholdRule } from './thresholdRules.js';
import type { ThresholdRule, Violation } from './thresholdRules.js';

const logger = getComponentLogger('ThresholdMonitor');

const DEFAULT_HISTORY_SIZE = 100;
const DEFAULT_MAX_TRACKED_KEYS = 256;

export interface ThresholdMonitorOptions {
    cooldownMs: number;
    /** Samples kept per metric key. */
    historySize?: number;
    /** Metric keys with history; the least recently evaluated key is dropped first. */
    maxTrackedKeys?: number;
}

export interface MetricSample {
    value: number;
    violated: boolean;
}

/**
 * Evaluates metrics against registered rules and raises alerts.
 *
 * Alerts are suppressed per metric key for the cooldown window: the first
 * violation in a window sends, later ones only return their Violation.
 * Suppression state lives in the CounterStore, so it holds across processes
 * sharing that store.
 */
export class ThresholdMonitor {
    private readonly exactRules = new Map<string, ThresholdRule>();
    private readonly prefixRules = new Map<string, ThresholdRule>();
    private readonly history = new Map<string, MetricSample[]>();
    private readonly historySize: number;
    private readonly maxTrackedKeys: number;

    constructor(
        private readonly counters: CounterStore,
        private readonly alertSink: AlertSink,
        private readonly options: ThresholdMonitorOptions
    ) {
        this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
        this.maxTrackedKeys = options.maxTrackedKeys ?? DEFAULT_MAX_TRACKED_KEYS;
    }

    /**
     * @throws ThresholdConfigurationError when the rule is malformed
     */
    registerRule(input: unknown): ThresholdRule {
        const rule = parseThresholdRule(input);
        if (rule.metricKey.endsWith('.*')) {
            this.prefixRules.set(rule.metricKey.slice(0, -1), rule);
        } else {
            this.exactRules.set(rule.metricKey, rule);
        }
        logger.debug({ metricKey: rule.metricKey, comparison: rule.comparison }, 'Threshold rule registered');
        return rule;
    }

    removeRule(metricKey: string): boolean {
        return metricKey.endsWith('.*')
            ? this.prefixRules.delete(metricKey.slice(0, -1))
            : this.exactRules.delete(metricKey);
    }

    /**
     * Exact key first, then the longest matching prefix rule.
     */
    ruleFor(metricKey: string): ThresholdRule | undefined {
        const exact = this.exactRules.get(metricKey);
        if (exact) return exact;

        let best: { prefix: string; rule: ThresholdRule } | undefined;
        for (const [prefix, rule] of this.prefixRules) {
            if (metricKey.startsWith(prefix) && (!best || prefix.length > best.prefix.length)) {
                best = { prefix, rule };
            }
        }
        return best?.rule;
    }

    /**
     * Returns the violation even when its alert was suppressed.
     */
    async evaluate(metricKey: string, value: number): Promise<Violation | null> {
        const rule = this.ruleFor(metricKey);
        if (!rule) return null;

        const violation = evaluateRule(rule, metricKey, value);
        this.remember(metricKey, { value, violated: violation !== null });
        if (!violation) return null;

        if (await this.claimAlertSlot(metricKey)) {
            try {
                await this.alertSink.send(violation);
            } catch (error) {
                logger.error({ error, metricKey, severity: violation.severity }, 'Alert delivery failed');
            }
        } else {
            logger.debug({ metricKey, value }, 'Alert suppressed during cooldown');
        }

        return violation;
    }

    recentSamples(metricKey: string): MetricSample[] {
        return [...(this.history.get(metricKey) ?? [])];
    }

    get trackedKeyCount(): number {
        return this.history.size;
    }

    private async claimAlertSlot(metricKey: string): Promise<boolean> {
        if (this.options.cooldownMs <= 0) return true;
        try {
            const claims = await this.counters.increment(`alert:cooldown:${metricKey}`, this.options.cooldownMs);
            return claims === 1;
        } catch (error) {
            // Without suppression state, alert rather than stay silent.
            logger.warn({ error, metricKey }, 'Alert cooldown store unavailable');
            return true;
        }
    }

    private remember(metricKey: string, sample: MetricSample): void {
        const samples = this.history.get(metricKey) ?? [];
        samples.push(sample);
        if (samples.length > this.historySize) {
            samples.shift();
        }
        // Re-insert so Map order tracks recency.
        this.history.delete(metricKey);
        this.history.set(metricKey, samples);

        for (const stale of this.history.keys()) {
            if (this.history.size <= this.maxTrackedKeys) break;
            this.history.delete(stale);
        }
    }
}
