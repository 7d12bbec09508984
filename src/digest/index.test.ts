import { describe, expect, it } from 'vitest';
import { makeClassified } from '../testing/fixtures.js';
import { buildDigest, filterExcluded, groupLabel } from './index.js';

describe('buildDigest', () => {
  const documents = [
    makeClassified(3),
    makeClassified(1, { interestTags: ['agents', ' agents ', ''] }),
    makeClassified(0),
    makeClassified(2, { primaryLabel: 'diffusion_models' }),
    makeClassified(4, { secondaryLabel: '', summary: '  ' }, { primaryCategory: '' }),
  ];

  it('separates interest matches and groups the rest by label tuple', () => {
    const digest = buildDigest(documents, { date: '2024-06-03' });

    expect(digest.date).toBe('2024-06-03');
    expect(digest.total).toBe(5);
    expect(digest.excluded).toBe(0);
    expect(digest.highlighted.map((entry) => entry.id)).toEqual(['2406.00001']);
    expect(digest.highlighted[0]?.interestTags).toEqual(['agents']);
    expect(digest.groups.map((group) => [groupLabel(group), group.entries.map((entry) => entry.id)])).toEqual([
      ['cs.CL | diffusion_models · reasoning · general_purpose', ['2406.00002']],
      ['cs.CL | text_models · reasoning · general_purpose', ['2406.00000', '2406.00003']],
      ['unknown_category | text_models · general · general_purpose', ['2406.00004']],
    ]);
  });

  it('fills in missing labels and summaries', () => {
    const digest = buildDigest(documents, { date: '2024-06-03' });
    const entry = digest.groups[2]?.entries[0];

    expect(entry?.category).toBe('unknown_category');
    expect(entry?.secondaryLabel).toBe('general');
    expect(entry?.summary).toBe('No TL;DR available');
  });

  it('drops excluded documents and counts them', () => {
    const digest = buildDigest(documents, { date: '2024-06-03', excludeTags: ['Diffusion_Models'] });

    expect(digest.total).toBe(4);
    expect(digest.excluded).toBe(1);
    expect(digest.groups.some((group) => group.primaryLabel === 'diffusion_models')).toBe(false);
  });

  it('produces an empty digest for no documents', () => {
    expect(buildDigest([], { date: '2024-06-03' })).toEqual({
      date: '2024-06-03',
      total: 0,
      excluded: 0,
      highlighted: [],
      groups: [],
    });
  });
});

describe('filterExcluded', () => {
  it('matches the primary category and every label case-insensitively', () => {
    const docs = [
      makeClassified(0, {}, { primaryCategory: 'cs.CV' }),
      makeClassified(1, { secondaryLabel: 'Alignment' }),
      makeClassified(2, { subLabel: 'legal_ai' }),
      makeClassified(3),
    ];

    const kept = filterExcluded(docs, ['CS.cv', ' alignment ', 'LEGAL_AI', '']);

    expect(kept.map((doc) => doc.id)).toEqual(['2406.00003']);
  });

  it('returns the input untouched when nothing is excluded', () => {
    const docs = [makeClassified(0)];
    expect(filterExcluded(docs, ['  '])).toBe(docs);
  });
});
