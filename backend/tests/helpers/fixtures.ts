import { vi } from 'vitest';
import { loadConfig } from '../../src/config.js';
import type { GenerationOptions } from '../../src/services/geminiService.js';
import { EMPTY_SEED, type SeedData } from '../../src/services/householdStore.js';
import type { InventoryEntity, MealRecord, RecipeLine, RecipeRecord } from '../../src/types.js';

export const testConfig = loadConfig({ GEMINI_API_KEY: 'test-secret' });

export function makeEntity(overrides: Partial<InventoryEntity> & Pick<InventoryEntity, 'id' | 'name'>): InventoryEntity {
  return {
    householdId: 1,
    category: 'other',
    unitOfMeasure: null,
    averagePrice: null,
    ...overrides,
  };
}

export function makeLine(overrides: Partial<RecipeLine> & Pick<RecipeLine, 'ingredientId'>): RecipeLine {
  return {
    quantity: 1,
    unit: 'piece',
    notes: null,
    isOptional: false,
    ...overrides,
  };
}

export function makeRecipe(overrides: Partial<RecipeRecord> & Pick<RecipeRecord, 'id' | 'name'>): RecipeRecord {
  return {
    householdId: 1,
    description: null,
    instructions: 'Cook everything.',
    servings: 2,
    prepTimeMinutes: null,
    cookTimeMinutes: null,
    difficulty: null,
    cuisineType: null,
    tags: null,
    caloriesPerServing: null,
    ingredients: [],
    ...overrides,
  };
}

export function makeMeal(overrides: Partial<MealRecord> & Pick<MealRecord, 'id'>): MealRecord {
  return {
    householdId: 1,
    name: `Meal ${overrides.id}`,
    mealType: 'dinner',
    date: '2026-10-20',
    servings: 2,
    recipeId: null,
    notes: null,
    assignedToId: null,
    ...overrides,
  };
}

export function makeSeed(overrides: Partial<SeedData> = {}): SeedData {
  return {
    ...EMPTY_SEED,
    households: [
      { id: 1, name: 'Test household', memberIds: [1] },
      { id: 2, name: 'Other household', memberIds: [3] },
    ],
    ...overrides,
  };
}

/** A stub model that answers every prompt with the given reply. */
export function stubModel(reply: string) {
  return vi.fn(async (_prompt: string, _options: GenerationOptions) => reply);
}

export function failingModel(message: string) {
  return vi.fn(async (_prompt: string, _options: GenerationOptions): Promise<string> => {
    throw new Error(message);
  });
}
