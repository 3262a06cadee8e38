// Posts alerts as JSON to an HTTP endpoint

import { describeError } from '../../../core/errors.js';
import type { Alert, AlertChannel, DeliveryResult } from '../../../models/alert.js';

export interface WebhookChannelConfig {
  url: string;
  headers?: Record<string, string>;
}

export class WebhookChannel implements AlertChannel {
  readonly name = 'webhook';

  constructor(private readonly config: WebhookChannelConfig) {}

  async send(alert: Readonly<Alert>): Promise<DeliveryResult> {
    try {
      const response = await fetch(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.config.headers },
        body: JSON.stringify(alert)
      });

      if (!response.ok) {
        return { success: false, error: `HTTP ${response.status}` };
      }
      return { success: true };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }
}
