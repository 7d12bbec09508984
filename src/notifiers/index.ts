/**
 * Notifier registry
 *
 * Builds the notifier for each channel of the profile.
 */

import type { ChannelConfig } from '../config/index.js';
import { FeishuNotifier, type FeishuNotifierOptions } from './feishu.js';
import { NotionNotifier, type NotionNotifierOptions } from './notion.js';
import type { Notifier } from './types.js';

export interface NotifierFactoryOptions {
  feishu?: FeishuNotifierOptions;
  notion?: NotionNotifierOptions;
}

export function createNotifier(channel: ChannelConfig, options: NotifierFactoryOptions = {}): Notifier {
  switch (channel.type) {
    case 'feishu':
      return new FeishuNotifier(channel, options.feishu);
    case 'notion':
      return new NotionNotifier(channel, options.notion);
  }
}

export function createNotifiers(channels: ChannelConfig[], options: NotifierFactoryOptions = {}): Notifier[] {
  return channels.map((channel) => createNotifier(channel, options));
}

export { FeishuNotifier, buildPostMessages } from './feishu.js';
export { NotionNotifier, buildDigestBlocks } from './notion.js';
export type { DeliveryOptions, DeliveryReceipt, Notifier } from './types.js';
