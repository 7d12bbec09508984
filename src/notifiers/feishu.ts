/**
 * Feishu Notifier
 *
 * Posts a digest to a Feishu group bot webhook as a sequence of rich-text
 * posts: an overview, the interest-tag highlights, then one post per label
 * group. Optional separator texts announce the next post.
 */

import { z } from 'zod';
import { config, type FeishuChannelConfig } from '../config/index.js';
import { groupLabel, type Digest, type DigestEntry, type DigestGroup } from '../digest/index.js';
import { AbortedError, NotifierError, toErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { withRetry } from '../utils/retry.js';
import type { DeliveryOptions, DeliveryReceipt, Notifier } from './types.js';

const log = createChildLogger({ channel: 'feishu' });

interface HttpResponseLike {
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<HttpResponseLike>;

export type PostElement = { tag: 'text'; text: string } | { tag: 'a'; text: string; href: string };

export interface PostMessage {
  title: string;
  content: PostElement[][];
  /** Announced by the separator preceding this post */
  label: string;
}

const webhookReplySchema = z
  .object({
    StatusCode: z.number().optional(),
    code: z.number().optional(),
    msg: z.string().optional(),
    StatusMessage: z.string().optional(),
  })
  .passthrough();

const EMOJI_BY_PRIMARY: Record<string, string> = {
  text_models: '📝',
  multimodal_models: '🖼️',
  audio_models: '🎧',
  video_models: '🎬',
  vla_models: '🤖',
  diffusion_models: '🌫️',
};

export interface FeishuNotifierOptions {
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  requestTimeoutMs?: number;
}

export class FeishuNotifier implements Notifier {
  readonly channel = 'feishu';
  readonly excludeTags: string[];
  private readonly webhookUrl: string;
  private readonly delayMs: number;
  private readonly separatorText: string;
  private readonly maxAttempts: number;
  private readonly fetchFn: FetchLike;
  private readonly sleepFn: ((ms: number) => Promise<void>) | undefined;
  private readonly requestTimeoutMs: number;

  constructor(channelConfig: FeishuChannelConfig, options: FeishuNotifierOptions = {}) {
    const webhookUrl = channelConfig.webhookUrl || config.feishu.webhookUrl;
    if (!webhookUrl) {
      throw new NotifierError('feishu', 'Feishu channel has no webhookUrl and FEISHU_WEBHOOK_URL is not set');
    }
    this.webhookUrl = webhookUrl;
    this.delayMs = Math.round(channelConfig.delaySeconds * 1000);
    this.separatorText = channelConfig.separatorText;
    this.excludeTags = channelConfig.excludeTags;
    this.maxAttempts = channelConfig.maxAttempts;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.sleepFn = options.sleepFn;
    this.requestTimeoutMs = options.requestTimeoutMs ?? config.feishu.requestTimeoutMs;
  }

  async sendDigest(digest: Digest, options: DeliveryOptions = {}): Promise<DeliveryReceipt> {
    const messages = buildPostMessages(digest);
    const limiter = new RateLimiter(this.delayMs, { sleepFn: this.sleepFn });
    const receipt: DeliveryReceipt = {
      channel: this.channel,
      attempted: messages.length,
      delivered: 0,
      failed: 0,
      errors: [],
    };

    for (const [index, message] of messages.entries()) {
      if (options.signal?.aborted) {
        throw new AbortedError('Feishu delivery aborted');
      }

      await limiter.waitForSlot();
      try {
        await this.deliver(postPayload(message), options.signal, message.title);
        receipt.delivered += 1;
      } catch (error) {
        if (error instanceof AbortedError) {
          throw error;
        }
        receipt.failed += 1;
        receipt.errors.push(`${message.title}: ${toErrorMessage(error)}`);
        log.error({ title: message.title, error: toErrorMessage(error) }, 'Feishu post failed');
      }

      const next = messages[index + 1];
      if (next && this.separatorText) {
        await this.sendSeparator(next.label, index + 1, messages.length, options.signal);
      }
    }

    log.info(
      { date: digest.date, attempted: receipt.attempted, delivered: receipt.delivered, failed: receipt.failed },
      'Feishu digest sent'
    );

    if (receipt.delivered === 0) {
      throw new NotifierError(this.channel, `No Feishu messages delivered: ${receipt.errors[0] ?? 'unknown error'}`);
    }
    return receipt;
  }

  async sendText(text: string, options: DeliveryOptions = {}): Promise<void> {
    await this.deliver(textPayload(text), options.signal, 'text');
  }

  private async sendSeparator(
    label: string,
    current: number,
    total: number,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const text = this.separatorText
      .replaceAll('{label}', label)
      .replaceAll('{current}', String(current))
      .replaceAll('{total}', String(total));
    try {
      await this.deliver(textPayload(text), signal, 'separator');
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      log.warn({ error: toErrorMessage(error) }, 'Feishu separator failed');
    }
  }

  /**
   * POST one payload, retrying with the configured message delay between attempts
   */
  private async deliver(payload: unknown, signal: AbortSignal | undefined, operation: string): Promise<void> {
    await withRetry(() => this.post(payload, signal), {
      operation: `feishu ${operation}`,
      maxAttempts: this.maxAttempts,
      initialDelayMs: Math.max(this.delayMs, 500),
      maxDelayMs: Math.max(this.delayMs, 500),
      factor: 1,
      shouldRetry: (error) => !(error instanceof AbortedError),
      signal,
      sleepFn: this.sleepFn,
    });
  }

  private async post(payload: unknown, signal: AbortSignal | undefined): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: HttpResponseLike;
    try {
      response = await this.fetchFn(this.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortedError('Feishu delivery aborted');
      }
      throw new NotifierError(this.channel, `Failed to call Feishu webhook: ${toErrorMessage(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }

    const body = await response.text();
    if (response.status >= 300) {
      throw new NotifierError(this.channel, `Feishu webhook error: ${response.status} ${body}`);
    }

    const reply = parseReply(body);
    if (reply && ((reply.StatusCode ?? 0) !== 0 || (reply.code ?? 0) !== 0)) {
      throw new NotifierError(this.channel, `Feishu webhook rejected message: ${body}`);
    }
  }
}

function parseReply(body: string): z.infer<typeof webhookReplySchema> | null {
  if (!body.trim()) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    log.debug({ error: toErrorMessage(error) }, 'Feishu reply is not JSON');
    return null;
  }
  const result = webhookReplySchema.safeParse(data);
  return result.success ? result.data : null;
}

function postPayload(message: PostMessage) {
  return {
    msg_type: 'post',
    content: {
      post: {
        zh_cn: { title: message.title, content: message.content },
      },
    },
  };
}

function textPayload(text: string) {
  return { msg_type: 'text', content: { text } };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Message builders
// ═══════════════════════════════════════════════════════════════════════════════

export function buildPostMessages(digest: Digest): PostMessage[] {
  const messages: PostMessage[] = [buildOverviewPost(digest)];
  if (digest.highlighted.length > 0) {
    messages.push(buildHighlightPost(digest.highlighted));
  }
  for (const group of digest.groups) {
    messages.push(buildGroupPost(group));
  }
  return messages;
}

function emojiFor(primaryLabel: string): string {
  return EMOJI_BY_PRIMARY[primaryLabel] ?? '📌';
}

function formatGroupLabel(group: DigestGroup): string {
  return `📂 ${emojiFor(group.primaryLabel)} ${groupLabel(group)}`;
}

function buildOverviewPost(digest: Digest): PostMessage {
  const content: PostElement[][] = [
    [
      {
        tag: 'text',
        text: `📚 ${digest.total} papers | ${digest.highlighted.length} interest matches | ${digest.groups.length} groups`,
      },
    ],
  ];
  if (digest.highlighted.length > 0) {
    content.push([{ tag: 'text', text: `⭐ Interest matches: ${digest.highlighted.length}` }]);
  }
  for (const group of digest.groups) {
    content.push([{ tag: 'text', text: `${formatGroupLabel(group)}: ${group.entries.length}` }]);
  }
  if (digest.total === 0) {
    content.push([{ tag: 'text', text: '📭 No papers today' }]);
  }
  return { title: `📌 Paper digest ${digest.date}`, content, label: 'overview' };
}

function buildHighlightPost(entries: DigestEntry[]): PostMessage {
  const title = `⭐ Interest matches (${entries.length})`;
  return {
    title,
    content: [[{ tag: 'text', text: title }], ...entries.flatMap((entry, i) => entryRows(entry, i + 1, true))],
    label: 'interest matches',
  };
}

function buildGroupPost(group: DigestGroup): PostMessage {
  const label = formatGroupLabel(group);
  const title = `${label} (${group.entries.length})`;
  return {
    title,
    content: [[{ tag: 'text', text: title }], ...group.entries.flatMap((entry, i) => entryRows(entry, i + 1, false))],
    label,
  };
}

function entryRows(entry: DigestEntry, index: number, withPrimary: boolean): PostElement[][] {
  const rows: PostElement[][] = [];
  const heading = `${index}. ✨ ${entry.title}`;
  rows.push([entry.url ? { tag: 'a', text: heading, href: entry.url } : { tag: 'text', text: heading }]);

  if (entry.authors.length > 0) {
    rows.push([{ tag: 'text', text: `👥 Authors: ${entry.authors.join(', ')}` }]);
  }

  const labels = withPrimary
    ? [entry.category, entry.primaryLabel, entry.secondaryLabel, entry.subLabel]
    : [entry.category, entry.secondaryLabel, entry.subLabel];
  rows.push([{ tag: 'text', text: `🏷️ Labels: ${labels.join(' | ')}` }]);
  rows.push([{ tag: 'text', text: `🧠 TL;DR: ${entry.summary}` }]);

  if (entry.interestTags.length > 0) {
    rows.push([{ tag: 'text', text: `⭐ Interest tags: ${entry.interestTags.join(', ')}` }]);
  }

  rows.push([{ tag: 'text', text: ' ' }]);
  return rows;
}
