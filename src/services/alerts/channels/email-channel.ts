// Sends alerts through an injected mail transport

import { describeError } from '../../../core/errors.js';
import type { Alert, AlertChannel, DeliveryResult } from '../../../models/alert.js';
import { formatAlert } from '../alert-formatter.js';

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  html: string;
}

/**
 * Anything that can deliver a mail message (an SMTP client, a provider SDK)
 */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<void>;
}

export interface EmailChannelConfig {
  from: string;
  to: string[];
}

export class EmailChannel implements AlertChannel {
  readonly name = 'email';

  constructor(
    private readonly config: EmailChannelConfig,
    private readonly transport: MailTransport
  ) {}

  async send(alert: Readonly<Alert>): Promise<DeliveryResult> {
    try {
      await this.transport.sendMail({
        from: this.config.from,
        to: [...this.config.to],
        subject: `[${alert.severity}] ${alert.title}`,
        text: formatAlert(alert, 'text'),
        html: formatAlert(alert, 'html')
      });
      return { success: true };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }
}
