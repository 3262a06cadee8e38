// Appends alerts to a JSON-lines file

import * as fs from 'fs/promises';
import * as path from 'path';
import { describeError } from '../../../core/errors.js';
import type { Alert, AlertChannel, DeliveryResult } from '../../../models/alert.js';

export class FileChannel implements AlertChannel {
  readonly name = 'file';

  constructor(private readonly filePath: string) {}

  async send(alert: Readonly<Alert>): Promise<DeliveryResult> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, `${JSON.stringify(alert)}\n`, 'utf-8');
      return { success: true };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }
}
