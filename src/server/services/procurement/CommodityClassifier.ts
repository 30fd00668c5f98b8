/**
 * CommodityClassifier - suggests a commodity group for a purchase title
 *
 * TF-IDF vectorizer followed by a multinomial logistic regression, both read
 * from trained artifacts. Pure and deterministic: no I/O, no randomness.
 */

import type { CommodityGroupSuggestion } from './types.js';

export interface TfidfVectorizerArtifact {
  version: string;
  /** [min, max] n-gram lengths, in tokens */
  ngramRange: [number, number];
  sublinearTf: boolean;
  norm: 'l2' | 'none';
  vocabulary: Record<string, number>;
  idf: number[];
}

export interface LogisticRegressionArtifact {
  version: string;
  vectorizerVersion: string;
  classes: string[];
  intercept: number[];
  /** One sparse row per class: feature index → weight */
  coef: Array<Record<string, number>>;
}

export interface CommodityModel {
  vectorizer: TfidfVectorizerArtifact;
  classifier: LogisticRegressionArtifact;
}

/**
 * What the pipeline needs from a classifier; tests substitute a stub
 */
export interface TitleClassifier {
  classify(title: string): CommodityGroupSuggestion;
  labels(): readonly string[];
}

type SparseVector = Map<number, number>;

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Lower-case and collapse whitespace; classification only ever sees this form
 */
export function normalizeTitle(title: string): string {
  return title.normalize('NFKC').toLowerCase().replace(/\s+/g, ' ').trim();
}

export function tokenize(normalized: string): string[] {
  return normalized.match(TOKEN_PATTERN) ?? [];
}

function ngrams(tokens: string[], [minN, maxN]: [number, number]): string[] {
  const terms: string[] = [];
  for (let n = minN; n <= maxN; n++) {
    for (let start = 0; start + n <= tokens.length; start++) {
      terms.push(tokens.slice(start, start + n).join(' '));
    }
  }
  return terms;
}

function softmax(scores: number[]): number[] {
  const max = Math.max(...scores);
  const exps = scores.map((score) => Math.exp(score - max));
  const sum = exps.reduce((acc, value) => acc + value, 0);
  return exps.map((value) => value / sum);
}

export class CommodityClassifier implements TitleClassifier {
  private readonly vectorizer: TfidfVectorizerArtifact;
  private readonly classifier: LogisticRegressionArtifact;
  private readonly vocabulary: ReadonlyMap<string, number>;
  /** coef rows keyed by numeric feature index */
  private readonly weights: ReadonlyArray<ReadonlyMap<number, number>>;
  private readonly sortedLabels: readonly string[];

  constructor(model: CommodityModel) {
    this.vectorizer = model.vectorizer;
    this.classifier = model.classifier;
    this.vocabulary = new Map(Object.entries(model.vectorizer.vocabulary));
    this.weights = model.classifier.coef.map(
      (row) => new Map(Object.entries(row).map(([feature, weight]): [number, number] => [Number(feature), weight]))
    );
    this.sortedLabels = Object.freeze([...model.classifier.classes].sort((a, b) => a.localeCompare(b)));
  }

  get modelVersion(): string {
    return this.classifier.version;
  }

  labels(): readonly string[] {
    return this.sortedLabels;
  }

  classify(title: string): CommodityGroupSuggestion {
    const features = this.vectorize(normalizeTitle(title));
    const probabilities = softmax(
      this.classifier.intercept.map((bias, classIndex) => bias + this.dot(classIndex, features))
    );

    let best = 0;
    for (let i = 1; i < probabilities.length; i++) {
      if (probabilities[i] > probabilities[best]) {
        best = i;
      }
    }

    return {
      label: this.classifier.classes[best],
      confidence: probabilities[best],
      modelVersion: this.classifier.version,
    };
  }

  private vectorize(normalized: string): SparseVector {
    const counts: SparseVector = new Map();
    for (const term of ngrams(tokenize(normalized), this.vectorizer.ngramRange)) {
      const index = this.vocabulary.get(term);
      if (index !== undefined) {
        counts.set(index, (counts.get(index) ?? 0) + 1);
      }
    }

    const weighted: SparseVector = new Map();
    for (const [index, count] of counts) {
      const tf = this.vectorizer.sublinearTf ? 1 + Math.log(count) : count;
      weighted.set(index, tf * this.vectorizer.idf[index]);
    }

    if (this.vectorizer.norm === 'l2') {
      let sumSquares = 0;
      for (const value of weighted.values()) {
        sumSquares += value * value;
      }
      const norm = Math.sqrt(sumSquares);
      if (norm > 0) {
        for (const [index, value] of weighted) {
          weighted.set(index, value / norm);
        }
      }
    }

    return weighted;
  }

  private dot(classIndex: number, features: SparseVector): number {
    const row = this.weights[classIndex];
    let total = 0;
    for (const [index, value] of features) {
      total += (row.get(index) ?? 0) * value;
    }
    return total;
  }
}
