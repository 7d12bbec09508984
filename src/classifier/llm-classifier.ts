/**
 * LLM Classifier
 *
 * Labels a paper with a primary area, secondary focus, application domain,
 * a short summary and matching interest tags, via a chat completion model.
 */

import { z } from 'zod';
import type { InterestTag } from '../config/index.js';
import type { ChatCompletionClient } from '../llm/client.js';
import type { ClassificationResult, Document } from '../types/index.js';
import { AbortedError, ClassificationError, toErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { buildSystemPrompt, buildUserPrompt, retryHint, type Language } from './prompts.js';
import type { Classifier, ClassifyOptions } from './types.js';

const log = createChildLogger({ module: 'classifier' });

const label = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

const responseSchema = z.object({
  primary_area: label,
  secondary_focus: label,
  application_domain: label,
  tldr: label,
  interest_tags: z
    .union([z.string(), z.array(z.unknown()), z.null()])
    .optional()
    .transform((value) => normalizeTags(value)),
});

export interface LlmClassifierOptions {
  interestTags?: InterestTag[];
  language?: Language;
  maxAttempts?: number;
}

export class LlmClassifier implements Classifier {
  readonly model: string;
  private readonly interestTags: InterestTag[];
  private readonly language: Language;
  private readonly maxAttempts: number;

  constructor(
    private readonly client: ChatCompletionClient,
    options: LlmClassifierOptions = {}
  ) {
    this.model = client.model;
    this.interestTags = options.interestTags ?? [];
    this.language = options.language ?? 'en';
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
  }

  /**
   * Up to maxAttempts prompts; after the first failure the prompt asks for strict JSON.
   */
  async classify(doc: Document, options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const system = buildSystemPrompt(this.language);
    const basePrompt = buildUserPrompt(doc, this.interestTags, this.language);
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        throw new AbortedError(`Classification of ${doc.id} aborted`);
      }

      const user = attempt === 1 ? basePrompt : basePrompt + retryHint(this.language);
      try {
        const raw = await this.client.complete({ system, user, signal: options.signal });
        return parseClassification(raw);
      } catch (error) {
        if (options.signal?.aborted) {
          throw new AbortedError(`Classification of ${doc.id} aborted`);
        }
        lastError = error;
        log.warn(
          { documentId: doc.id, attempt, maxAttempts: this.maxAttempts, error: toErrorMessage(error) },
          'Classification attempt failed'
        );
      }
    }

    throw new ClassificationError(
      `Failed to classify ${doc.id} after ${this.maxAttempts} attempts: ${toErrorMessage(lastError)}`,
      { cause: lastError }
    );
  }
}

/**
 * Extract the JSON object from a model reply, tolerating code fences and surrounding prose
 */
export function parseClassification(raw: string): ClassificationResult {
  const cleaned = stripCodeFences(raw);
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  const candidate = start !== -1 && end > start ? cleaned.slice(start, end + 1) : cleaned;

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch (error) {
    throw new ClassificationError(`LLM response is not valid JSON: ${raw.slice(0, 200)}`, {
      cause: error,
    });
  }

  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ClassificationError(`Missing or invalid keys in LLM response: ${missing}`);
  }

  return {
    primaryLabel: parsed.data.primary_area,
    secondaryLabel: parsed.data.secondary_focus,
    subLabel: parsed.data.application_domain,
    summary: parsed.data.tldr,
    interestTags: parsed.data.interest_tags,
  };
}

export function stripCodeFences(raw: string): string {
  let text = raw.trim();
  if (!text.startsWith('```')) {
    return text;
  }

  const lines = text.split(/\r?\n/);
  text = lines.slice(1).join('\n').trim();
  if (text.endsWith('```')) {
    text = text.slice(0, -3).trimEnd();
  }
  return text;
}

function normalizeTags(value: string | unknown[] | null | undefined): string[] {
  if (typeof value === 'string') {
    const token = value.trim();
    return token ? [token] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item) => item !== null && item !== undefined)
    .map((item) => String(item).trim())
    .filter((token) => token !== '');
}
