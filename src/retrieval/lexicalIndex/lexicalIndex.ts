/**
 * Lexical index: TF-IDF vector space over catalog texts
 *
 * Fitting:
 * 1. Each document becomes a term list (tokens minus stop words, 1- and 2-grams)
 * 2. Terms are ranked by total frequency across the corpus (ties alphabetical)
 *    and the top maxFeatures are kept
 * 3. Kept terms get columns in alphabetical order
 * 4. idf(t) = ln((1 + n) / (1 + df(t))) + 1
 * 5. Row weight = raw count × idf, then L2-normalized
 *
 * The model is fixed after fit(); queries are projected into it, never refit.
 */

import type {
  LexicalIndexOptions,
  SparseVector,
  VectorSpace,
} from "@/types";
import { MAX_FEATURES, NGRAM_RANGE } from "@/constants/lexicalIndex";
import { buildTerms } from "@/utils/text/textNormalization";
import { getEnglishStopWords } from "@/utils/text/stopWords";

/**
 * Misuse of the index (vectorize before fit, fit twice, bad options)
 */
export class LexicalIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LexicalIndexError";
  }
}

type FittedModel = {
  /** term → column */
  vocabulary: ReadonlyMap<string, number>;
  /** column → idf */
  idf: readonly number[];
  vectors: readonly SparseVector[];
};

function countTerms(terms: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

function compareTerms(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Keep the maxFeatures most frequent terms, then assign columns alphabetically
 */
function selectVocabulary(
  termFrequencies: ReadonlyMap<string, number>,
  maxFeatures: number,
): Map<string, number> {
  const kept = [...termFrequencies.entries()]
    .sort((a, b) => b[1] - a[1] || compareTerms(a[0], b[0]))
    .slice(0, maxFeatures)
    .map(([term]) => term)
    .sort(compareTerms);

  return new Map(kept.map((term, column) => [term, column]));
}

function l2Normalize(weights: Map<number, number>): SparseVector {
  let sumOfSquares = 0;
  for (const weight of weights.values()) {
    sumOfSquares += weight * weight;
  }
  if (sumOfSquares === 0) {
    return weights;
  }

  const norm = Math.sqrt(sumOfSquares);
  const normalized = new Map<number, number>();
  for (const [column, weight] of weights) {
    normalized.set(column, weight / norm);
  }
  return normalized;
}

/**
 * TF-IDF weights of a term list, L2-normalized; out-of-vocabulary terms dropped
 */
function weighTerms(
  terms: readonly string[],
  vocabulary: ReadonlyMap<string, number>,
  idf: readonly number[],
): SparseVector {
  const weights = new Map<number, number>();

  for (const [term, count] of countTerms(terms)) {
    const column = vocabulary.get(term);
    if (column !== undefined) {
      weights.set(column, count * idf[column]);
    }
  }

  return l2Normalize(weights);
}

export class LexicalIndex implements VectorSpace {
  private readonly maxFeatures: number;
  private readonly ngramRange: readonly [number, number];
  private readonly stopWords: ReadonlySet<string>;
  private model: FittedModel | null = null;

  constructor(options: LexicalIndexOptions = {}) {
    this.maxFeatures = options.maxFeatures ?? MAX_FEATURES;
    this.ngramRange = options.ngramRange ?? NGRAM_RANGE;
    this.stopWords = options.stopWords ?? getEnglishStopWords();

    const [minN, maxN] = this.ngramRange;
    if (!Number.isInteger(this.maxFeatures) || this.maxFeatures < 1) {
      throw new LexicalIndexError(
        `maxFeatures must be a positive integer, got ${this.maxFeatures}`,
      );
    }
    if (!Number.isInteger(minN) || minN < 1 || maxN < minN) {
      throw new LexicalIndexError(
        `ngramRange must satisfy 1 <= min <= max, got [${minN}, ${maxN}]`,
      );
    }
  }

  /**
   * Fit the vocabulary and weights over the given documents.
   *
   * An empty corpus, or one made only of stop words, leaves the index fitted
   * but unusable (no vectors).
   *
   * @throws {LexicalIndexError} If called more than once
   */
  fit(documents: readonly string[]): this {
    if (this.model) {
      throw new LexicalIndexError("Lexical index is already fitted");
    }

    const documentTerms = documents.map((doc) =>
      buildTerms(doc, this.stopWords, this.ngramRange),
    );

    const termFrequencies = new Map<string, number>();
    for (const terms of documentTerms) {
      for (const term of terms) {
        termFrequencies.set(term, (termFrequencies.get(term) ?? 0) + 1);
      }
    }

    if (termFrequencies.size === 0) {
      this.model = { vocabulary: new Map(), idf: [], vectors: [] };
      return this;
    }

    const vocabulary = selectVocabulary(termFrequencies, this.maxFeatures);

    const documentFrequency = new Array<number>(vocabulary.size).fill(0);
    for (const terms of documentTerms) {
      for (const term of new Set(terms)) {
        const column = vocabulary.get(term);
        if (column !== undefined) {
          documentFrequency[column] += 1;
        }
      }
    }

    const n = documents.length;
    const idf = documentFrequency.map(
      (df) => Math.log((1 + n) / (1 + df)) + 1,
    );

    this.model = {
      vocabulary,
      idf,
      vectors: documentTerms.map((terms) => weighTerms(terms, vocabulary, idf)),
    };
    return this;
  }

  get isFitted(): boolean {
    return this.model !== null;
  }

  get isUsable(): boolean {
    return this.model !== null && this.model.vectors.length > 0;
  }

  get vocabularySize(): number {
    return this.requireModel().vocabulary.size;
  }

  /**
   * Fitted terms in column order
   */
  get terms(): string[] {
    return [...this.requireModel().vocabulary.keys()];
  }

  get vectors(): readonly SparseVector[] {
    return this.requireModel().vectors;
  }

  /**
   * Project text into the fitted space. Unknown terms are ignored, so text
   * sharing nothing with the catalog yields an empty vector.
   *
   * @throws {LexicalIndexError} If called before fit()
   */
  vectorize(text: string): SparseVector {
    const { vocabulary, idf } = this.requireModel();
    return weighTerms(
      buildTerms(text, this.stopWords, this.ngramRange),
      vocabulary,
      idf,
    );
  }

  private requireModel(): FittedModel {
    if (!this.model) {
      throw new LexicalIndexError(
        "Lexical index is not fitted. Call fit() first.",
      );
    }
    return this.model;
  }
}
