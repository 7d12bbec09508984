/**
 * Digest Builder
 *
 * Turns the classified documents of a run into the structure notifiers
 * render: an overview, the documents matching interest tags, and the rest
 * grouped by (category, primary, secondary, sub) label.
 */

import type { ClassifiedDocument } from '../types/index.js';

export interface DigestEntry {
  id: string;
  title: string;
  authors: string[];
  url: string;
  category: string;
  primaryLabel: string;
  secondaryLabel: string;
  subLabel: string;
  summary: string;
  interestTags: string[];
}

export interface DigestGroup {
  category: string;
  primaryLabel: string;
  secondaryLabel: string;
  subLabel: string;
  entries: DigestEntry[];
}

export interface Digest {
  date: string;
  /** Documents kept after exclusion */
  total: number;
  excluded: number;
  highlighted: DigestEntry[];
  groups: DigestGroup[];
}

export interface BuildDigestOptions {
  date: string;
  excludeTags?: string[];
}

const FALLBACK = {
  category: 'unknown_category',
  primaryLabel: 'uncategorised',
  secondaryLabel: 'general',
  subLabel: 'general',
} as const;

export function buildDigest(documents: ClassifiedDocument[], options: BuildDigestOptions): Digest {
  const kept = filterExcluded(documents, options.excludeTags ?? []);
  const entries = [...kept].sort((a, b) => a.position - b.position).map(toEntry);

  const highlighted = entries.filter((entry) => entry.interestTags.length > 0);
  const groups = new Map<string, DigestGroup>();

  for (const entry of entries) {
    if (entry.interestTags.length > 0) {
      continue;
    }
    const key = groupKey(entry);
    let group = groups.get(key);
    if (!group) {
      group = {
        category: entry.category,
        primaryLabel: entry.primaryLabel,
        secondaryLabel: entry.secondaryLabel,
        subLabel: entry.subLabel,
        entries: [],
      };
      groups.set(key, group);
    }
    group.entries.push(entry);
  }

  return {
    date: options.date,
    total: entries.length,
    excluded: documents.length - kept.length,
    highlighted,
    groups: [...groups.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, group]) => group),
  };
}

/**
 * Drop documents whose category or any label matches an excluded tag, case-insensitively
 */
export function filterExcluded(
  documents: ClassifiedDocument[],
  excludeTags: string[]
): ClassifiedDocument[] {
  const excluded = new Set(excludeTags.map(normalizeTag).filter((tag) => tag !== ''));
  if (excluded.size === 0) {
    return documents;
  }

  return documents.filter((doc) => {
    const tags = [
      doc.primaryCategory,
      doc.classification.primaryLabel,
      doc.classification.secondaryLabel,
      doc.classification.subLabel,
    ].map(normalizeTag);
    return !tags.some((tag) => tag !== '' && excluded.has(tag));
  });
}

export function groupLabel(group: DigestGroup): string {
  return `${group.category} | ${group.primaryLabel} · ${group.secondaryLabel} · ${group.subLabel}`;
}

function normalizeTag(value: string): string {
  return value.trim().toLowerCase();
}

function normalizeText(value: string, fallback: string): string {
  const text = value.replace(/\s+/g, ' ').trim();
  return text === '' ? fallback : text;
}

function groupKey(entry: DigestEntry): string {
  return [entry.category, entry.primaryLabel, entry.secondaryLabel, entry.subLabel].join('\u0000');
}

function toEntry(doc: ClassifiedDocument): DigestEntry {
  return {
    id: doc.id,
    title: normalizeText(doc.title, '(untitled)'),
    authors: doc.authors.filter((author) => author.trim() !== ''),
    url: doc.url,
    category: normalizeText(doc.primaryCategory, FALLBACK.category),
    primaryLabel: normalizeText(doc.classification.primaryLabel, FALLBACK.primaryLabel),
    secondaryLabel: normalizeText(doc.classification.secondaryLabel, FALLBACK.secondaryLabel),
    subLabel: normalizeText(doc.classification.subLabel, FALLBACK.subLabel),
    summary: normalizeText(doc.classification.summary, 'No TL;DR available'),
    interestTags: [...new Set(doc.classification.interestTags.map((tag) => tag.trim()))].filter(
      (tag) => tag !== ''
    ),
  };
}
