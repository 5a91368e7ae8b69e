import natural from 'natural';
import { SimilarityUnavailableError } from '../core/errors.js';
import { err, ok, type Result, type ScoredTitle, type SimilarityQuery } from '../core/types.js';

// Lower-cased runs of two or more word characters, single letters dropped
const TOKEN_PATTERN = /[\p{L}\p{M}\p{N}_]{2,}/gu;

const tokenizer = new natural.RegexpTokenizer({ pattern: TOKEN_PATTERN, gaps: false });

type SparseVector = Map<string, number>;

export function tokenizeTitle(title: string): string[] {
  return tokenizer.tokenize(title.toLowerCase()) ?? [];
}

/**
 * Build TF-IDF vectors for a corpus sharing one vocabulary.
 * idf(t) = ln((1 + n) / (1 + df(t))) + 1, vectors L2-normalised.
 */
function vectorize(documents: string[][]): SparseVector[] {
  const documentFrequency = new Map<string, number>();
  for (const tokens of documents) {
    for (const term of new Set(tokens)) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const n = documents.length;
  return documents.map((tokens) => {
    const vector: SparseVector = new Map();
    for (const term of tokens) {
      vector.set(term, (vector.get(term) ?? 0) + 1);
    }

    let norm = 0;
    for (const [term, count] of vector) {
      const df = documentFrequency.get(term) ?? 0;
      const weight = count * (Math.log((1 + n) / (1 + df)) + 1);
      vector.set(term, weight);
      norm += weight * weight;
    }

    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (const [term, weight] of vector) {
        vector.set(term, weight / norm);
      }
    }
    return vector;
  });
}

function cosine(a: SparseVector, b: SparseVector): number {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [term, weight] of small) {
    const other = large.get(term);
    if (other !== undefined) {
      dot += weight * other;
    }
  }
  return dot;
}

/**
 * Score every catalogue title against the query, in catalogue order.
 * The query is document 0 of the corpus; a title identical to the query
 * always scores 1.
 */
export function scoreTitles(
  queryTitle: string,
  titles: readonly string[]
): Result<ScoredTitle[], SimilarityUnavailableError> {
  if (titles.length === 0) {
    return err(new SimilarityUnavailableError('Catalogue has no titles to compare against'));
  }

  const documents = [queryTitle, ...titles].map(tokenizeTitle);
  const hasVocabulary = documents.some((tokens) => tokens.length > 0);
  const hasExactMatch = titles.includes(queryTitle);

  if (!hasVocabulary && !hasExactMatch) {
    return err(new SimilarityUnavailableError('Empty vocabulary: no title contains a usable term'));
  }

  const [queryVector, ...titleVectors] = vectorize(documents);

  return ok(
    titles.map((title, i) => ({
      title,
      score: title === queryTitle ? 1 : cosine(queryVector, titleVectors[i]),
    }))
  );
}

/**
 * Catalogue titles scoring at or above the threshold, best first, at most
 * maxCandidates. Ties keep catalogue order. Duplicated catalogue titles are
 * returned once per occurrence.
 */
export function findSimilarTitles(
  query: SimilarityQuery,
  titles: readonly string[]
): Result<string[], SimilarityUnavailableError> {
  const scored = scoreTitles(query.queryTitle, titles);
  if (!scored.ok) {
    return scored;
  }

  const ranked = scored.value
    .filter((entry) => entry.score >= query.threshold)
    .sort((a, b) => b.score - a.score)
    .slice(0, query.maxCandidates)
    .map((entry) => entry.title);

  return ok(ranked);
}
