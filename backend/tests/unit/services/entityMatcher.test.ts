import { describe, it, expect } from 'vitest';
import { DEFAULT_INGREDIENT_MATCH_THRESHOLD } from '../../../src/config.js';
import { matchEntity, type NamedEntry } from '../../../src/services/entityMatcher.js';

const threshold = DEFAULT_INGREDIENT_MATCH_THRESHOLD;

const catalog: NamedEntry[] = [
  { id: 1, name: 'garlic', category: 'produce' },
  { id: 2, name: 'Tomato', category: 'produce' },
  { id: 3, name: 'tomato paste', category: 'pantry' },
];

describe('matchEntity', () => {
  it('returns an exact case-insensitive match with full confidence', () => {
    expect(matchEntity('TOMATO', catalog, { threshold })).toEqual({ matchedId: 2, confidence: 1 });
  });

  it('finds exact matches outside the requested category', () => {
    expect(matchEntity('tomato', catalog, { category: 'pantry', threshold })).toEqual({
      matchedId: 2,
      confidence: 1,
    });
  });

  it('accepts a close spelling at or above the threshold', () => {
    const result = matchEntity('tomatoes', catalog, { threshold });
    expect(result.matchedId).toBe(2);
    expect(result.confidence).toBeCloseTo(12 / 14, 10);
  });

  it('treats a score below the threshold as a new entity', () => {
    expect(matchEntity('garlic cloves', catalog, { threshold })).toEqual({ confidence: 0 });
  });

  it('only scores entries from the requested category', () => {
    expect(matchEntity('tomatoes', catalog, { category: 'pantry', threshold })).toEqual({ confidence: 0 });
  });

  it('uses the threshold it is given', () => {
    expect(matchEntity('tomatoes', catalog, { threshold: 0.9 })).toEqual({ confidence: 0 });
  });

  it('breaks ties in favour of the alphabetically first name', () => {
    // "chili" scores 10/11 against both; "chilis" sorts before "chilli"
    const chilies: NamedEntry[] = [
      { id: 11, name: 'chilli' },
      { id: 10, name: 'chilis' },
    ];
    const result = matchEntity('chili', chilies, { threshold });
    expect(result.matchedId).toBe(10);
    expect(result.confidence).toBeCloseTo(10 / 11, 10);
  });

  it('never matches a blank name', () => {
    expect(matchEntity('   ', catalog, { threshold })).toEqual({ confidence: 0 });
  });
});
