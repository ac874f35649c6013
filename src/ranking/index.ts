import { cosineSimilarity, TfidfVectorizer } from "./tfidf";

export { EmptyVocabularyError, TfidfVectorizer, cosineSimilarity, tokenize } from "./tfidf";

export interface RankingOptions {
  maxFeatures: number;
  stopWords: ReadonlySet<string>;
}

export interface RankedItem<T> {
  item: T;
  index: number; // position in the input
  similarity: number | null; // null when no similarity was computed
}

export interface RankingOutcome<T> {
  ranked: RankedItem<T>[];
  degraded: boolean;
  reason?: string;
}

function limitOf(topN: number): number {
  return Number.isNaN(topN) ? 0 : Math.max(0, Math.floor(topN));
}

function inOrder<T>(items: readonly T[], limit: number): RankedItem<T>[] {
  return items
    .slice(0, limit)
    .map((item, index) => ({ item, index, similarity: null }));
}

/**
 * Orders items by TF-IDF cosine similarity to the reference text, keeping
 * input order among equal scores, and returns at most topN of them.
 * Falls back to input order when there is nothing to compare against.
 */
export function rankByRelevance<T>(
  referenceText: string,
  items: readonly T[],
  topN: number,
  options: RankingOptions & { getText: (item: T) => string },
): RankingOutcome<T> {
  const limit = limitOf(topN);

  if (items.length === 0 || limit === 0) {
    return { ranked: [], degraded: false };
  }
  if (!referenceText) {
    return { ranked: inOrder(items, limit), degraded: false };
  }

  try {
    const vectorizer = new TfidfVectorizer(options);
    const [reference, ...rows] = vectorizer.fitTransform([
      referenceText,
      ...items.map(options.getText),
    ]);

    const scored = items.map((item, index) => ({
      item,
      index,
      similarity: cosineSimilarity(reference, rows[index]),
    }));
    scored.sort((a, b) => b.similarity - a.similarity || a.index - b.index);

    return { ranked: scored.slice(0, limit), degraded: false };
  } catch (error) {
    return {
      ranked: inOrder(items, limit),
      degraded: true,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

export function rankQuestions(
  referenceText: string,
  candidates: readonly string[],
  topN: number,
  options: RankingOptions,
): string[] {
  return rankByRelevance(referenceText, candidates, topN, {
    ...options,
    getText: (text) => text,
  }).ranked.map((entry) => entry.item);
}
