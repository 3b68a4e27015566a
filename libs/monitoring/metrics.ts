import type { Logger } from 'pino';
import { getComponentLogger } from '../logging/logger.js';

export type MetricTags = Record<string, string>;

export interface MetricsRecorder {
    record(name: string, value: number, tags?: MetricTags): void | Promise<void>;
}

export class LoggingMetricsRecorder implements MetricsRecorder {
    constructor(private readonly log: Logger = getComponentLogger('Metrics')) { }

    record(name: string, value: number, tags: MetricTags = {}): void {
        this.log.debug({ metric: name, value, ...tags }, 'metric');
    }
}

export interface RecordedMetric {
    name: string;
    value: number;
    tags: MetricTags;
}

export class InMemoryMetricsRecorder implements MetricsRecorder {
    readonly samples: RecordedMetric[] = [];

    record(name: string, value: number, tags: MetricTags = {}): void {
        this.samples.push({ name, value, tags });
    }

    valuesOf(name: string): number[] {
        return this.samples.filter(sample => sample.name === name).map(sample => sample.value);
    }
}
