import { describe, it, expect } from 'vitest';
import { SimilarityUnavailableError } from '../core/errors.js';
import { findSimilarTitles, scoreTitles, tokenizeTitle } from './similarity.js';

const CATALOGUE = [
  'Product Manager',
  'Senior Product Manager',
  'Associate Product Manager',
  'Marketing Manager',
  'Software Engineer',
  'Project Manager',
  'Data Analyst',
];

function similar(queryTitle: string, titles: string[], threshold = 0.2, maxCandidates = 10): string[] {
  const result = findSimilarTitles({ queryTitle, threshold, maxCandidates }, titles);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('tokenizeTitle', () => {
  it('lower-cases and keeps runs of two or more word characters', () => {
    expect(tokenizeTitle('Senior Software Engineer (C++)')).toEqual(['senior', 'software', 'engineer']);
  });

  it('splits on punctuation', () => {
    expect(tokenizeTitle('Front-end Dev II')).toEqual(['front', 'end', 'dev', 'ii']);
  });

  it('returns an empty list when nothing qualifies', () => {
    expect(tokenizeTitle('a / b')).toEqual([]);
  });
});

describe('scoreTitles', () => {
  it('scores a title that adds one rare term below an exact match', () => {
    const result = scoreTitles('Software Engineer', ['Software Engineer', 'Senior Software Engineer']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value[0]).toEqual({ title: 'Software Engineer', score: 1 });
    expect(result.value[1].title).toBe('Senior Software Engineer');
    expect(result.value[1].score).toBeCloseTo(0.641, 3);
  });

  it('ignores case when comparing terms', () => {
    const result = scoreTitles('software engineer', ['Software Engineer']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0].score).toBeCloseTo(1, 10);
  });

  it('reports an empty catalogue as unavailable', () => {
    const result = scoreTitles('Software Engineer', []);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SimilarityUnavailableError);
    expect(result.error.code).toBe('SIMILARITY_UNAVAILABLE');
  });

  it('reports an empty vocabulary as unavailable', () => {
    const result = scoreTitles('a', ['b', 'c']);
    expect(result.ok).toBe(false);
  });
});

describe('findSimilarTitles', () => {
  it('matches both titles of the software engineer scenario at the default threshold', () => {
    expect(similar('Software Engineer', ['Software Engineer', 'Senior Software Engineer'])).toEqual([
      'Software Engineer',
      'Senior Software Engineer',
    ]);
  });

  it('ranks by descending similarity', () => {
    expect(similar('Product Manager', CATALOGUE)).toEqual([
      'Product Manager',
      'Senior Product Manager',
      'Associate Product Manager',
      'Marketing Manager',
      'Project Manager',
    ]);
  });

  it('keeps catalogue order among equal scores', () => {
    expect(similar('Engineer', ['Backend Engineer', 'Frontend Engineer'])).toEqual([
      'Backend Engineer',
      'Frontend Engineer',
    ]);
    expect(similar('Engineer', ['Frontend Engineer', 'Backend Engineer'])).toEqual([
      'Frontend Engineer',
      'Backend Engineer',
    ]);
  });

  it('returns an empty list when no vocabulary is shared', () => {
    expect(similar('Pastry Chef', ['Software Engineer', 'Data Scientist'])).toEqual([]);
  });

  it('always includes an identical title, even at threshold 1', () => {
    for (const threshold of [0, 0.5, 0.99, 1]) {
      expect(similar('Software Engineer', CATALOGUE, threshold)).toContain('Software Engineer');
    }
  });

  it('compares scores against the threshold without slack', () => {
    const scored = scoreTitles('Software Engineer', ['Senior Software Engineer']);
    if (!scored.ok) throw scored.error;
    const { score } = scored.value[0];

    expect(similar('Software Engineer', ['Senior Software Engineer'], score)).toEqual(['Senior Software Engineer']);
    expect(similar('Software Engineer', ['Senior Software Engineer'], score + 1e-10)).toEqual([]);
  });

  it('includes an identical title that has no usable terms', () => {
    expect(similar('C', ['C', 'R'], 1)).toEqual(['C']);
  });

  it('never grows as the threshold rises', () => {
    const thresholds = [0, 0.1, 0.2, 0.35, 0.5, 0.75, 0.9, 1];
    const results = thresholds.map((threshold) => similar('Senior Product Manager', CATALOGUE, threshold));

    for (let i = 1; i < results.length; i++) {
      expect(results[i].length).toBeLessThanOrEqual(results[i - 1].length);
      for (const title of results[i]) {
        expect(results[i - 1]).toContain(title);
      }
    }
  });

  it('truncates to maxCandidates and keeps duplicates', () => {
    const titles = Array.from({ length: 12 }, () => 'Data Scientist');
    expect(similar('Data Scientist', titles)).toHaveLength(10);
    expect(similar('Data Scientist', titles, 0.2, 3)).toEqual(['Data Scientist', 'Data Scientist', 'Data Scientist']);
  });

  it('passes the unavailable result through', () => {
    const result = findSimilarTitles({ queryTitle: 'Software Engineer', threshold: 0.2, maxCandidates: 10 }, []);
    expect(result.ok).toBe(false);
  });
});
