import { describe, it, expect } from 'vitest';
import {
  CommodityClassifier,
  normalizeTitle,
  tokenize,
  type CommodityModel,
} from '../src/server/services/procurement/CommodityClassifier.js';

function model(): CommodityModel {
  return {
    vectorizer: {
      version: 'vec-test',
      ngramRange: [1, 1],
      sublinearTf: true,
      norm: 'l2',
      vocabulary: { laptop: 0, license: 1 },
      idf: [1, 1],
    },
    classifier: {
      version: 'clf-test',
      vectorizerVersion: 'vec-test',
      classes: ['Software', 'Hardware'],
      intercept: [0, 0.1],
      coef: [{ '1': 2 }, { '0': 2 }],
    },
  };
}

const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

describe('normalizeTitle / tokenize', () => {
  it('lower-cases and collapses whitespace', () => {
    expect(normalizeTitle('  Adobe\tCreative   CLOUD ')).toBe('adobe creative cloud');
  });

  it('keeps word tokens of two or more characters', () => {
    expect(tokenize('a 4k monitor, 27" (büro)')).toEqual(['4k', 'monitor', '27', 'büro']);
  });
});

describe('CommodityClassifier', () => {
  const classifier = new CommodityClassifier(model());

  it('picks the class with the highest probability', () => {
    const suggestion = classifier.classify('Laptop');

    expect(suggestion.label).toBe('Hardware');
    expect(suggestion.confidence).toBeCloseTo(sigmoid(2.1), 10);
    expect(suggestion.modelVersion).toBe('clf-test');
  });

  it('is case-insensitive', () => {
    expect(classifier.classify('SOFTWARE LICENSE')).toEqual(classifier.classify('software license'));
    expect(classifier.classify('Software License').confidence).toBeCloseTo(sigmoid(1.9), 10);
  });

  it('falls back to the class prior for an empty or unknown title', () => {
    const empty = classifier.classify('');
    const unknown = classifier.classify('Büroklammern');

    expect(empty.label).toBe('Hardware');
    expect(empty.confidence).toBeCloseTo(sigmoid(0.1), 10);
    expect(unknown).toEqual(empty);
  });

  it('normalizes the feature vector', () => {
    // both features at 1/sqrt(2): the class weights cancel and only the prior remains
    expect(classifier.classify('laptop license').confidence).toBeCloseTo(sigmoid(0.1), 10);
  });

  it('damps repeated terms', () => {
    expect(classifier.classify('laptop laptop laptop')).toEqual(classifier.classify('laptop'));
  });

  it('lists labels alphabetically', () => {
    expect(classifier.labels()).toEqual(['Hardware', 'Software']);
    expect(classifier.modelVersion).toBe('clf-test');
  });

  it('matches bigrams when the vectorizer is trained on them', () => {
    const withBigrams = model();
    withBigrams.vectorizer.ngramRange = [1, 2];
    withBigrams.vectorizer.vocabulary = { laptop: 0, 'software license': 1 };

    const bigram = new CommodityClassifier(withBigrams);

    expect(bigram.classify('Software license renewal').label).toBe('Software');
    expect(bigram.classify('license software').label).toBe('Hardware');
  });
});
