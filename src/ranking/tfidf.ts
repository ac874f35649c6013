/**
 * TF-IDF vectorizer over a small in-memory corpus.
 *
 * Tokens are lower-cased runs of two or more letters/digits/underscores.
 * Weights are raw term counts times smoothed idf, ln((1 + n) / (1 + df)) + 1,
 * and every row is L2-normalized.
 */

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export class EmptyVocabularyError extends Error {
  constructor() {
    super("Empty vocabulary; documents may contain only stop words");
    this.name = "EmptyVocabularyError";
  }
}

export interface TfidfOptions {
  maxFeatures: number;
  stopWords: ReadonlySet<string>;
}

export function tokenize(text: string, stopWords: ReadonlySet<string>): string[] {
  return (text.toLowerCase().match(TOKEN_PATTERN) ?? []).filter(
    (token) => !stopWords.has(token),
  );
}

export class TfidfVectorizer {
  private featureIndex = new Map<string, number>();
  private idf: number[] = [];

  constructor(private readonly options: TfidfOptions) {}

  get features(): string[] {
    return [...this.featureIndex.keys()];
  }

  fitTransform(documents: readonly string[]): number[][] {
    const tokenized = documents.map((doc) =>
      tokenize(doc, this.options.stopWords),
    );

    const totals = new Map<string, number>();
    const docFrequency = new Map<string, number>();
    for (const tokens of tokenized) {
      for (const token of tokens) {
        totals.set(token, (totals.get(token) ?? 0) + 1);
      }
      for (const token of new Set(tokens)) {
        docFrequency.set(token, (docFrequency.get(token) ?? 0) + 1);
      }
    }

    if (totals.size === 0) {
      throw new EmptyVocabularyError();
    }

    // Most frequent terms win the feature budget; ties go alphabetically.
    const kept = [...totals.entries()]
      .sort(([a, countA], [b, countB]) => countB - countA || compare(a, b))
      .slice(0, Math.max(1, this.options.maxFeatures))
      .map(([term]) => term)
      .sort(compare);

    this.featureIndex = new Map(kept.map((term, index) => [term, index]));

    const n = documents.length;
    this.idf = kept.map(
      (term) => Math.log((1 + n) / (1 + (docFrequency.get(term) ?? 0))) + 1,
    );

    return tokenized.map((tokens) => this.weigh(tokens));
  }

  private weigh(tokens: string[]): number[] {
    const row = new Array<number>(this.idf.length).fill(0);
    for (const token of tokens) {
      const index = this.featureIndex.get(token);
      if (index !== undefined) row[index] += 1;
    }

    for (let i = 0; i < row.length; i++) {
      row[i] *= this.idf[i];
    }

    const norm = Math.sqrt(row.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? row : row.map((value) => value / norm);
  }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * (b[i] ?? 0);
    na += a[i] * a[i];
  }
  for (const value of b) nb += value * value;
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
