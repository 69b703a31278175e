import { describe, it, expect } from 'vitest';
import { similarity } from '../../../src/services/similarity.js';

describe('similarity', () => {
  it('scores a prefix by its share of the combined length', () => {
    expect(similarity('garlic cloves', 'garlic')).toBeCloseTo(12 / 19, 10);
  });

  it('scores near-identical words', () => {
    expect(similarity('tomato', 'tomatoes')).toBeCloseTo(12 / 14, 10);
    expect(similarity('abcd', 'bcde')).toBe(0.75);
  });

  it('counts matches on both sides of the longest block', () => {
    // "abc" first, then "de" in the right-hand remainders
    expect(similarity('xabcyde', 'abczde')).toBeCloseTo(10 / 13, 10);
  });

  it('ignores case', () => {
    expect(similarity('Garlic', 'gARLIC')).toBe(1);
  });

  it('handles empty strings', () => {
    expect(similarity('', '')).toBe(1);
    expect(similarity('', 'rice')).toBe(0);
  });

  it('returns 0 when nothing is shared', () => {
    expect(similarity('abc', 'xyz')).toBe(0);
  });
});
