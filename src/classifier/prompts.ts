/**
 * Classification prompts
 *
 * The reference taxonomy lives in data/taxonomy.json; labels outside it are
 * accepted when the model proposes them.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { InterestTag, Profile } from '../config/index.js';
import type { Document } from '../types/index.js';

export type Language = Profile['language'];

const taxonomyEntrySchema = z.tuple([z.string(), z.string()]);
const taxonomySchema = z.object({
  primary_area: z.array(taxonomyEntrySchema),
  secondary_focus: z.array(taxonomyEntrySchema),
  application_domain: z.array(taxonomyEntrySchema),
});
const taxonomyFileSchema = z.object({ en: taxonomySchema, zh: taxonomySchema });

export type Taxonomy = z.infer<typeof taxonomySchema>;

let taxonomyCache: z.infer<typeof taxonomyFileSchema> | null = null;

export function loadTaxonomy(language: Language): Taxonomy {
  if (!taxonomyCache) {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../data/taxonomy.json', import.meta.url), 'utf-8')
    );
    taxonomyCache = taxonomyFileSchema.parse(raw);
  }
  return taxonomyCache[language];
}

const LANGUAGE_NAMES: Record<Language, string> = { en: 'English', zh: 'Chinese' };

const INTEREST_TAGS_HEADER: Record<Language, string> = {
  en: 'Interest tags (only include a tag ID in the `interest_tags` JSON array when the paper strongly matches its description/keywords; otherwise leave empty):',
  zh: '兴趣标签（仅在论文与描述/关键词高度匹配时，才在 JSON 的 `interest_tags` 中返回对应标签 ID；否则请留空）：',
};

const KEYWORDS_LABEL: Record<Language, string> = { en: 'Keywords:', zh: '关键词:' };

const RETRY_HINT: Record<Language, string> = {
  en: '\n\nWARNING: The previous response failed to parse. Please return ONLY a strict JSON object without Markdown code blocks or extra text.',
  zh: '\n\nWARNING: 上一次响应解析失败，请仅返回严格的 JSON 对象，不要包含 Markdown 代码块或额外说明。',
};

export function buildSystemPrompt(language: Language): string {
  return (
    'You are an expert research analyst. ' +
    'Classify each arXiv paper using the reference taxonomy ' +
    `(you may also suggest new labels when needed) and summarise it in ${LANGUAGE_NAMES[language]}.`
  );
}

export function formatTaxonomy(language: Language): string {
  const taxonomy = loadTaxonomy(language);
  const lines: string[] = [];
  for (const [dimension, options] of Object.entries(taxonomy)) {
    lines.push(`${dimension}:`);
    for (const [value, description] of options) {
      lines.push(`  - ${value}: ${description}`);
    }
  }
  return lines.join('\n');
}

export function formatInterestTags(tags: InterestTag[], language: Language): string {
  const usable = tags.filter((tag) => tag.label.trim() !== '');
  if (usable.length === 0) {
    return '';
  }

  const lines = [INTEREST_TAGS_HEADER[language]];
  for (const tag of usable) {
    const description = tag.description ? ` — ${tag.description}` : '';
    const keywords =
      tag.keywords.length > 0 ? ` | ${KEYWORDS_LABEL[language]} ${tag.keywords.join(', ')}` : '';
    lines.push(`  - ${tag.label}${description}${keywords}`);
  }
  return lines.join('\n');
}

function responseInstructions(withInterestTags: boolean, language: Language): string {
  let instructions =
    'Return a compact JSON object with keys: primary_area, secondary_focus, ' +
    'application_domain, and tldr. Prefer labels from the reference list, ' +
    'but you may propose new labels if they better describe the paper. ' +
    `Always provide a ${LANGUAGE_NAMES[language]} TL;DR.`;

  if (withInterestTags) {
    instructions +=
      ' Interest tags are optional hints for downstream delivery. Only include a label ID in the ' +
      '`interest_tags` array when the paper strongly matches its description or keywords; otherwise ' +
      'return an empty array and rely on your own judgement.';
  }
  return instructions;
}

export function buildUserPrompt(doc: Document, tags: InterestTag[], language: Language): string {
  const interestBlock = formatInterestTags(tags, language);
  const extra = interestBlock ? `\n\n${interestBlock}` : '';

  return (
    'Paper metadata:\n' +
    `- Title: ${doc.title.trim()}\n` +
    `- arXiv category: ${doc.primaryCategory}\n` +
    `- Published at: ${doc.publishedAt.toISOString()}\n\n` +
    `Abstract:\n${doc.content.trim()}\n\n` +
    `Reference taxonomy (IDs with brief descriptions):\n${formatTaxonomy(language)}` +
    `${extra}\n\n` +
    responseInstructions(interestBlock !== '', language)
  );
}

export function retryHint(language: Language): string {
  return RETRY_HINT[language];
}
