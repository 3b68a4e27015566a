import type { Logger } from 'pino';
import { getComponentLogger } from '../logging/logger.js';
import type { Violation } from './thresholdRules.js';

/**
 * Outbound alert channel (mail, chat, pager). Best-effort from the
 * monitor's point of view.
 */
export interface AlertSink {
    send(violation: Violation): Promise<void>;
}

/**
 * Writes alerts to the operational log at a level matching their severity.
 */
export class LoggingAlertSink implements AlertSink {
    constructor(private readonly log: Logger = getComponentLogger('AlertSink')) { }

    async send(violation: Violation): Promise<void> {
        const message = `THRESHOLD VIOLATION: ${violation.metricKey} [${violation.severity}]`;
        switch (violation.severity) {
            case 'critical':
                this.log.error({ violation }, message);
                break;
            case 'warning':
                this.log.warn({ violation }, message);
                break;
            default:
                this.log.info({ violation }, message);
        }
    }
}
