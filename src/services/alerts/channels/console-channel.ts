// Prints a framed alert for interactive sessions

import type { Alert, AlertChannel, DeliveryResult } from '../../../models/alert.js';
import { alertSource } from '../alert-formatter.js';

export class ConsoleChannel implements AlertChannel {
  readonly name = 'console';

  constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

  async send(alert: Readonly<Alert>): Promise<DeliveryResult> {
    const header = `${alert.severity}: ${alert.title}`;
    const footer = `Source: ${alertSource(alert)} | ${alert.lastSeenAt}`;
    const body = alert.message.split('\n');
    const width = Math.max(header.length, footer.length, ...body.map(line => line.length));
    const rule = '─'.repeat(width + 2);

    this.write(`┌${rule}┐`);
    this.write(`│ ${header.padEnd(width)} │`);
    this.write(`├${rule}┤`);
    for (const line of body) {
      this.write(`│ ${line.padEnd(width)} │`);
    }
    this.write(`├${rule}┤`);
    this.write(`│ ${footer.padEnd(width)} │`);
    this.write(`└${rule}┘`);
    return { success: true };
  }
}
