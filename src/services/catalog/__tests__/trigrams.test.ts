import { describe, expect, test } from 'vitest';
import { extractTrigrams, scoreProfiles, toTrigramProfile, trigramSimilarity } from '../trigrams';

describe('extractTrigrams', () => {
  test('pads each word with two leading spaces and one trailing space', () => {
    expect([...extractTrigrams('cat')].sort()).toEqual(['  c', ' ca', 'at ', 'cat']);
  });

  test('short words still produce trigrams', () => {
    expect(extractTrigrams('a').size).toBe(2);
    expect(extractTrigrams('ab').size).toBe(3);
  });

  test('splits words on punctuation and whitespace', () => {
    const combined = new Set([...extractTrigrams('pull'), ...extractTrigrams('down')]);
    expect(extractTrigrams('pull-down')).toEqual(combined);
    expect(extractTrigrams('pull   down')).toEqual(combined);
  });

  test('punctuation-only text has no trigrams', () => {
    expect(extractTrigrams('---').size).toBe(0);
    expect(extractTrigrams('').size).toBe(0);
  });
});

describe('trigramSimilarity', () => {
  test('identical text scores 1', () => {
    expect(trigramSimilarity('lat pulldown', 'lat pulldown')).toBe(1);
  });

  test('identical text without trigrams scores 1', () => {
    expect(trigramSimilarity('---', '---')).toBe(1);
    expect(trigramSimilarity('', '')).toBe(1);
  });

  test('different text without trigrams scores 0', () => {
    expect(trigramSimilarity('---', 'cat')).toBe(0);
    expect(trigramSimilarity('!!', '---')).toBe(0);
  });

  test('shared over union', () => {
    expect(trigramSimilarity('cat', 'cats')).toBe(0.5);
    expect(trigramSimilarity('egg', 'whole egg')).toBe(0.4);
    expect(trigramSimilarity('row', 'row a')).toBeCloseTo(2 / 3, 10);
  });

  test('is symmetric', () => {
    expect(trigramSimilarity('cats', 'cat')).toBe(trigramSimilarity('cat', 'cats'));
    expect(trigramSimilarity('whole egg', 'egg')).toBe(0.4);
  });

  test('disjoint text scores 0', () => {
    expect(trigramSimilarity('squat', 'bench')).toBe(0);
  });

  test('word order does not matter', () => {
    expect(trigramSimilarity('chest press', 'press chest')).toBe(1);
  });
});

describe('scoreProfiles', () => {
  test('reuses precomputed profiles', () => {
    const query = toTrigramProfile('egg');
    expect(scoreProfiles(query, toTrigramProfile('whole egg'))).toBe(0.4);
    expect(scoreProfiles(query, toTrigramProfile('egg'))).toBe(1);
  });
});
