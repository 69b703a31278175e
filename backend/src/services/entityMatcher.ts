import type { IngredientCategory } from '../types.js';
import { similarity } from './similarity.js';

export interface NamedEntry {
  id: number;
  name: string;
  category?: IngredientCategory;
}

export interface MatchResult {
  matchedId?: number;
  confidence: number;
}

export interface MatchOptions {
  threshold: number;
  category?: IngredientCategory;
}

const NO_MATCH: MatchResult = { confidence: 0 };

/**
 * Resolve a free-text name against a catalog.
 *
 * An exact, case-insensitive hit anywhere in the catalog wins with
 * confidence 1.0. Otherwise the best similarity among entries of the given
 * category is accepted when it reaches the threshold. Ties go to the entry
 * whose name sorts first.
 */
export function matchEntity(
  candidate: string,
  catalog: readonly NamedEntry[],
  options: MatchOptions
): MatchResult {
  const needle = candidate.trim().toLowerCase();
  if (needle === '') return NO_MATCH;

  const exact = catalog.find(entry => entry.name.toLowerCase() === needle);
  if (exact) {
    return { matchedId: exact.id, confidence: 1 };
  }

  let best: NamedEntry | null = null;
  let bestRatio = 0;

  for (const entry of sortByName(catalog)) {
    if (options.category && entry.category !== options.category) continue;

    const ratio = similarity(needle, entry.name);
    if (ratio > bestRatio) {
      best = entry;
      bestRatio = ratio;
    }
  }

  if (best && bestRatio >= options.threshold) {
    return { matchedId: best.id, confidence: bestRatio };
  }
  return NO_MATCH;
}

function sortByName(catalog: readonly NamedEntry[]): NamedEntry[] {
  return [...catalog].sort((left, right) => {
    const a = left.name.toLowerCase();
    const b = right.name.toLowerCase();
    if (a < b) return -1;
    if (a > b) return 1;
    return left.id - right.id;
  });
}
