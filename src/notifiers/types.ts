import type { Digest } from '../digest/index.js';

export interface DeliveryOptions {
  signal?: AbortSignal;
}

export interface DeliveryReceipt {
  channel: string;
  attempted: number;
  delivered: number;
  failed: number;
  errors: string[];
}

/**
 * A notification channel. sendDigest throws NotifierError only when nothing
 * could be delivered; partial delivery is reported on the receipt.
 */
export interface Notifier {
  readonly channel: string;
  /** Tags whose documents this channel never receives */
  readonly excludeTags: string[];
  sendDigest(digest: Digest, options?: DeliveryOptions): Promise<DeliveryReceipt>;
  sendText(text: string, options?: DeliveryOptions): Promise<void>;
}
