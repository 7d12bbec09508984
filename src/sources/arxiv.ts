/**
 * arXiv Source
 *
 * Reads the arXiv Atom query API newest-first and keeps the entries published
 * on the run date whose primary category is the queried category.
 */

import Parser from 'rss-parser';
import { z } from 'zod';
import { config } from '../config/index.js';
import type { SourceDocument } from '../types/index.js';
import { formatDate } from '../utils/date.js';
import { AbortedError, SourceUnavailableError, toErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { Source, SourceFetchOptions } from './types.js';

const log = createChildLogger({ module: 'arxiv' });

interface ArxivItemFields {
  id?: unknown;
  authors?: unknown;
  primaryCategory?: unknown;
}

type FeedParser = Parser<Record<string, unknown>, ArxivItemFields>;
type FeedItem = Parser.Item & ArxivItemFields;

const authorsSchema = z
  .array(z.object({ name: z.array(z.string()).optional() }))
  .catch([]);
const primaryCategorySchema = z
  .object({ $: z.object({ term: z.string() }) })
  .transform((value) => value.$.term)
  .catch('');

export interface ArxivSourceOptions {
  baseUrls?: readonly string[];
  pageSize?: number;
  timeoutMs?: number;
  maxAttemptsPerUrl?: number;
  /** Returns the raw Atom XML for a query URL; defaults to the parser's own HTTP client */
  fetchFeed?: (url: string, signal?: AbortSignal) => Promise<string>;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class ArxivSource implements Source {
  readonly name = 'arxiv';
  private readonly parser: FeedParser;
  private readonly baseUrls: readonly string[];
  private readonly pageSize: number;
  private readonly maxAttemptsPerUrl: number;
  private readonly fetchFeed: ArxivSourceOptions['fetchFeed'];
  private readonly sleepFn: ArxivSourceOptions['sleepFn'];
  private readonly now: () => Date;

  constructor(options: ArxivSourceOptions = {}) {
    this.baseUrls = options.baseUrls ?? config.source.baseUrls;
    this.pageSize = options.pageSize ?? config.source.pageSize;
    this.maxAttemptsPerUrl = options.maxAttemptsPerUrl ?? config.retry.maxAttempts;
    this.fetchFeed = options.fetchFeed;
    this.sleepFn = options.sleepFn;
    this.now = options.now ?? (() => new Date());
    this.parser = new Parser<Record<string, unknown>, ArxivItemFields>({
      headers: {
        'User-Agent': config.source.userAgent,
        Accept: 'application/atom+xml, application/xml, text/xml, */*',
      },
      timeout: options.timeoutMs ?? config.source.timeoutMs,
      customFields: {
        item: ['id', ['author', 'authors', { keepArray: true }], ['arxiv:primary_category', 'primaryCategory']],
      },
    });
  }

  async fetch(
    runDate: string,
    categories: string[],
    options: SourceFetchOptions = {}
  ): Promise<SourceDocument[]> {
    const cats = categories.map((cat) => cat.trim()).filter((cat) => cat !== '');
    if (cats.length === 0) {
      throw new SourceUnavailableError('At least one arXiv category must be provided');
    }

    const documents: SourceDocument[] = [];
    for (const category of cats) {
      const found = await this.fetchCategory(runDate, category, options.signal);
      log.info({ runDate, category, count: found.length }, 'Fetched arXiv category');
      documents.push(...found);
    }
    return documents;
  }

  private async fetchCategory(
    runDate: string,
    category: string,
    signal: AbortSignal | undefined
  ): Promise<SourceDocument[]> {
    const collected: SourceDocument[] = [];
    let start = 0;

    for (;;) {
      const items = await this.fetchPage(category, start, signal);
      if (items.length === 0) {
        break;
      }

      let olderReached = false;
      for (const item of items) {
        const published = item.pubDate ? new Date(item.pubDate) : null;
        if (!published || Number.isNaN(published.getTime())) {
          continue;
        }

        const publishedDay = formatDate(published);
        if (publishedDay < runDate) {
          olderReached = true;
          break;
        }
        if (publishedDay > runDate) {
          continue;
        }

        const primaryCategory = primaryCategorySchema.parse(item.primaryCategory);
        if (primaryCategory !== category) {
          continue;
        }

        const doc = this.toDocument(item, category, primaryCategory, published);
        if (doc) {
          collected.push(doc);
        }
      }

      start += items.length;
      if (olderReached || items.length < this.pageSize) {
        break;
      }
    }

    return collected;
  }

  /**
   * One page of results, trying each base URL in turn with backoff between attempts
   */
  private async fetchPage(
    category: string,
    start: number,
    signal: AbortSignal | undefined
  ): Promise<FeedItem[]> {
    const params = new URLSearchParams({
      search_query: `cat:${category}`,
      start: String(start),
      max_results: String(this.pageSize),
      sortBy: 'submittedDate',
      sortOrder: 'descending',
    });

    let lastError: unknown;
    for (const baseUrl of this.baseUrls) {
      const url = `${baseUrl}?${params.toString()}`;
      try {
        const feed = await withRetry(() => this.loadFeed(url, signal), {
          operation: `arxiv query ${category}@${start}`,
          maxAttempts: this.maxAttemptsPerUrl,
          initialDelayMs: config.retry.initialDelayMs,
          maxDelayMs: config.retry.maxDelayMs,
          factor: config.retry.factor,
          shouldRetry: (error) => !(error instanceof AbortedError),
          signal,
          sleepFn: this.sleepFn,
        });
        return feed.items;
      } catch (error) {
        if (error instanceof AbortedError) {
          throw error;
        }
        lastError = error;
        log.warn({ baseUrl, category, start, error: toErrorMessage(error) }, 'arXiv endpoint failed');
      }
    }

    throw new SourceUnavailableError(`Failed to query arXiv: ${toErrorMessage(lastError)}`, {
      cause: lastError,
    });
  }

  private async loadFeed(url: string, signal: AbortSignal | undefined) {
    if (signal?.aborted) {
      throw new AbortedError('arXiv fetch aborted');
    }
    if (this.fetchFeed) {
      return this.parser.parseString(await this.fetchFeed(url, signal));
    }
    return this.parser.parseURL(url);
  }

  private toDocument(
    item: FeedItem,
    category: string,
    primaryCategory: string,
    publishedAt: Date
  ): SourceDocument | null {
    const rawId = typeof item.id === 'string' ? item.id : '';
    const id = rawId.split('/').pop() ?? '';
    if (!id) {
      return null;
    }

    return {
      id,
      category,
      primaryCategory,
      title: collapseWhitespace(item.title ?? ''),
      content: collapseWhitespace(item.summary ?? ''),
      authors: authorsSchema
        .parse(item.authors)
        .map((author) => collapseWhitespace(author.name?.[0] ?? ''))
        .filter((name) => name !== ''),
      url: `https://arxiv.org/abs/${id}`,
      publishedAt,
      fetchedAt: this.now(),
    };
  }
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
