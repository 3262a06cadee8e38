/**
 * Built-in alert channels
 *
 * @module services/alerts/channels
 */

import * as path from 'path';
import { ConfigError } from '../../../core/errors.js';
import type { ChannelsConfig } from '../../../core/schemas.js';
import type { AlertChannel } from '../../../models/alert.js';
import { ConsoleChannel } from './console-channel.js';
import { EmailChannel, type MailTransport } from './email-channel.js';
import { FileChannel } from './file-channel.js';
import { LogChannel } from './log-channel.js';
import { WebhookChannel } from './webhook-channel.js';

export { ConsoleChannel } from './console-channel.js';
export { EmailChannel } from './email-channel.js';
export type { EmailChannelConfig, MailMessage, MailTransport } from './email-channel.js';
export { FileChannel } from './file-channel.js';
export { LogChannel } from './log-channel.js';
export { WebhookChannel } from './webhook-channel.js';
export type { WebhookChannelConfig } from './webhook-channel.js';

export interface BuiltinChannelDeps {
  /** Base for relative file channel paths */
  projectRoot?: string;
  mailTransport?: MailTransport;
}

/**
 * Instantiates every channel present in the configuration
 *
 * @throws ConfigError when the email channel is configured without a mail transport
 */
export function createBuiltinChannels(config: ChannelsConfig, deps: BuiltinChannelDeps = {}): AlertChannel[] {
  const channels: AlertChannel[] = [];

  if (config.log) {
    channels.push(new LogChannel());
  }
  if (config.console) {
    channels.push(new ConsoleChannel());
  }
  if (config.file) {
    channels.push(new FileChannel(path.resolve(deps.projectRoot ?? '.', config.file.path)));
  }
  if (config.webhook) {
    channels.push(new WebhookChannel(config.webhook));
  }
  if (config.email) {
    if (!deps.mailTransport) {
      throw new ConfigError('The email channel requires a mail transport', [
        'channels.email: no mail transport is available; remove the channel or supply a transport'
      ]);
    }
    channels.push(new EmailChannel(config.email, deps.mailTransport));
  }

  return channels;
}
