// Writes alerts to the driftwatch logger

import { Logger } from '../../../core/logger.js';
import type { Alert, AlertChannel, DeliveryResult } from '../../../models/alert.js';
import { formatAlert } from '../alert-formatter.js';

export class LogChannel implements AlertChannel {
  readonly name = 'log';

  constructor(private readonly log: Logger = Logger.getInstance().child('alert')) {}

  async send(alert: Readonly<Alert>): Promise<DeliveryResult> {
    const message = formatAlert(alert, 'text');
    const context = { id: alert.id, occurrences: alert.occurrenceCount };

    switch (alert.severity) {
      case 'CRITICAL':
      case 'ERROR':
        this.log.error(message, context);
        break;
      case 'WARNING':
        this.log.warn(message, context);
        break;
      default:
        this.log.info(message, context);
    }
    return { success: true };
  }
}
