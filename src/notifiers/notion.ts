/**
 * Notion Notifier
 *
 * Writes each digest as one page in a Notion database. Page content is
 * appended in chunks because the API accepts at most 100 blocks per request.
 */

import { Client } from '@notionhq/client';
import type { CreatePageParameters } from '@notionhq/client/build/src/api-endpoints.js';
import { config, type NotionChannelConfig } from '../config/index.js';
import { groupLabel, type Digest, type DigestEntry } from '../digest/index.js';
import { AbortedError, NotifierError, toErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { withRetry } from '../utils/retry.js';
import type { DeliveryOptions, DeliveryReceipt, Notifier } from './types.js';

const log = createChildLogger({ channel: 'notion' });

export const BLOCKS_PER_REQUEST = 100;
const TEXT_LIMIT = 2000; // Notion rich text limit

export type PageBlock = NonNullable<CreatePageParameters['children']>[number];

/**
 * The subset of the Notion client this notifier calls
 */
export interface NotionPagesApi {
  pages: {
    create(args: CreatePageParameters): Promise<{ id: string }>;
  };
  blocks: {
    children: {
      append(args: { block_id: string; children: PageBlock[] }): Promise<unknown>;
    };
  };
}

export interface NotionNotifierOptions {
  client?: NotionPagesApi;
  sleepFn?: (ms: number) => Promise<void>;
}

export class NotionNotifier implements Notifier {
  readonly channel = 'notion';
  readonly excludeTags: string[];
  private readonly client: NotionPagesApi;
  private readonly databaseId: string;
  private readonly titleProperty: string;
  private readonly maxAttempts: number;
  private readonly limiter: RateLimiter;
  private readonly sleepFn: ((ms: number) => Promise<void>) | undefined;

  constructor(channelConfig: NotionChannelConfig, options: NotionNotifierOptions = {}) {
    this.client = options.client ?? createClient();
    this.databaseId = channelConfig.databaseId;
    this.titleProperty = channelConfig.titleProperty;
    this.excludeTags = channelConfig.excludeTags;
    this.maxAttempts = channelConfig.maxAttempts;
    this.sleepFn = options.sleepFn;
    // Notion rate limit: 3 req/s
    this.limiter = new RateLimiter(Math.round(channelConfig.delaySeconds * 1000), { sleepFn: options.sleepFn });
  }

  async sendDigest(digest: Digest, options: DeliveryOptions = {}): Promise<DeliveryReceipt> {
    const blocks = buildDigestBlocks(digest);
    const chunks = chunk(blocks, BLOCKS_PER_REQUEST);
    const [first = [], ...rest] = chunks;
    const receipt: DeliveryReceipt = {
      channel: this.channel,
      attempted: chunks.length,
      delivered: 0,
      failed: 0,
      errors: [],
    };

    let pageId: string;
    try {
      pageId = await this.createPage(`Paper digest ${digest.date}`, digest.date, first, options.signal);
      receipt.delivered += 1;
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      throw new NotifierError(this.channel, `Failed to create Notion page: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    for (const children of rest) {
      try {
        await this.call('append blocks', () => this.client.blocks.children.append({ block_id: pageId, children }), options.signal);
        receipt.delivered += 1;
      } catch (error) {
        if (error instanceof AbortedError) {
          throw error;
        }
        receipt.failed += 1;
        receipt.errors.push(toErrorMessage(error));
        log.error({ pageId, error: toErrorMessage(error) }, 'Failed to append Notion blocks');
      }
    }

    log.info({ date: digest.date, pageId, blocks: blocks.length, failed: receipt.failed }, 'Notion digest page written');
    return receipt;
  }

  async sendText(text: string, options: DeliveryOptions = {}): Promise<void> {
    await this.createPage(text.slice(0, TEXT_LIMIT), null, [paragraph(text)], options.signal);
  }

  private async createPage(
    title: string,
    date: string | null,
    children: PageBlock[],
    signal: AbortSignal | undefined
  ): Promise<string> {
    const properties: CreatePageParameters['properties'] = {
      [this.titleProperty]: {
        title: [{ text: { content: title.slice(0, TEXT_LIMIT) } }],
      },
    };

    const page = await this.call(
      'create page',
      () =>
        this.client.pages.create({
          parent: { database_id: this.databaseId },
          properties,
          children,
        }),
      signal
    );
    log.debug({ pageId: page.id, date }, 'Notion page created');
    return page.id;
  }

  private async call<T>(operation: string, fn: () => Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    return withRetry(
      async () => {
        await this.limiter.waitForSlot();
        return fn();
      },
      {
        operation: `notion ${operation}`,
        maxAttempts: this.maxAttempts,
        initialDelayMs: 1000,
        maxDelayMs: 10000,
        factor: 2,
        signal,
        sleepFn: this.sleepFn,
      }
    );
  }
}

function createClient(): Client {
  if (!config.notion.apiKey) {
    throw new NotifierError('notion', 'NOTION_API_KEY is not configured');
  }
  return new Client({ auth: config.notion.apiKey });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Block builders
// ═══════════════════════════════════════════════════════════════════════════════

export function buildDigestBlocks(digest: Digest): PageBlock[] {
  const blocks: PageBlock[] = [
    {
      object: 'block',
      type: 'callout',
      callout: {
        icon: { type: 'emoji', emoji: '📚' },
        rich_text: [
          {
            type: 'text',
            text: {
              content: `${digest.total} papers, ${digest.highlighted.length} interest matches, ${digest.groups.length} groups`,
            },
          },
        ],
      },
    },
  ];

  if (digest.highlighted.length > 0) {
    blocks.push(heading(`⭐ Interest matches (${digest.highlighted.length})`));
    blocks.push(...digest.highlighted.map(entryBlock));
  }

  for (const group of digest.groups) {
    blocks.push(heading(`${groupLabel(group)} (${group.entries.length})`));
    blocks.push(...group.entries.map(entryBlock));
  }

  return blocks;
}

function heading(text: string): PageBlock {
  return {
    object: 'block',
    type: 'heading_2',
    heading_2: { rich_text: [{ type: 'text', text: { content: text.slice(0, TEXT_LIMIT) } }] },
  };
}

function paragraph(text: string): PageBlock {
  return {
    object: 'block',
    type: 'paragraph',
    paragraph: { rich_text: [{ type: 'text', text: { content: text.slice(0, TEXT_LIMIT) } }] },
  };
}

function entryBlock(entry: DigestEntry): PageBlock {
  const tags = entry.interestTags.length > 0 ? ` ⭐ ${entry.interestTags.join(', ')}` : '';
  return {
    object: 'block',
    type: 'bulleted_list_item',
    bulleted_list_item: {
      rich_text: [
        {
          type: 'text',
          text: { content: entry.title.slice(0, TEXT_LIMIT), link: entry.url ? { url: entry.url } : null },
          annotations: { bold: true },
        },
        {
          type: 'text',
          text: { content: ` — ${entry.summary}${tags}`.slice(0, TEXT_LIMIT) },
        },
      ],
    },
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
