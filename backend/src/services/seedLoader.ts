import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { InventoryEntity, MealRecord, RecipeLine, RecipeRecord } from '../types.js';
import { createLogger } from '../utils/logger.js';
import {
  parseBoolean,
  parseCategory,
  parseId,
  parseIdArray,
  parseInteger,
  parseIsoDate,
  parseMealType,
  parseOptionalCuisine,
  parseOptionalDifficulty,
  parseOptionalId,
  parseOptionalWholeNumber,
  parseOptionalString,
  parseQuantity,
  parseString,
  parseUnit,
} from './fieldParsers.js';
import { EMPTY_SEED, type HouseholdSeed, type PantrySeed, type SeedData } from './householdStore.js';
import { isJsonObject, type JsonObject } from './responseExtractor.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = createLogger('Seed');

/**
 * Load household seed data for the in-memory store.
 * An explicit path must exist; otherwise the bundled file is used when present.
 */
export function loadSeedData(explicitPath: string | null): SeedData {
  if (explicitPath && !existsSync(explicitPath)) {
    throw new Error(`SEED_DATA_PATH points to a missing file: ${explicitPath}`);
  }

  const possiblePaths = explicitPath
    ? [explicitPath]
    : [
        join(__dirname, '../../data/seed.json'),
        join(__dirname, '../../../data/seed.json'),
      ];

  for (const filePath of possiblePaths) {
    if (existsSync(filePath)) {
      log.info(`Loading seed data from ${filePath}`);
      const seed = parseSeedData(JSON.parse(readFileSync(filePath, 'utf-8')), filePath);
      log.info(
        `Loaded ${seed.households.length} households, ${seed.ingredients.length} ingredients, ` +
        `${seed.recipes.length} recipes, ${seed.meals.length} meals`
      );
      return seed;
    }
  }

  log.warn('No seed data file found. Starting with an empty store.');
  return EMPTY_SEED;
}

export function parseSeedData(raw: unknown, source = 'seed data'): SeedData {
  try {
    const root = asObject(raw, 'seed');
    return {
      households: asList(root.households, 'households').map(parseHousehold),
      ingredients: asList(root.ingredients, 'ingredients').map(parseIngredient),
      pantry: asList(root.pantry, 'pantry').map(parsePantryItem),
      recipes: asList(root.recipes, 'recipes').map(parseRecipe),
      meals: asList(root.meals, 'meals').map(parseMeal),
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid ${source}: ${reason}`);
  }
}

function asObject(value: unknown, field: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new Error(`'${field}' must be an object`);
  }
  return value;
}

function asList(value: unknown, field: string): JsonObject[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`'${field}' must be a list`);
  }
  return value.map((item, index) => asObject(item, `${field}[${index}]`));
}

function parseHousehold(item: JsonObject): HouseholdSeed {
  return {
    id: parseId(item.id, 'households.id'),
    name: parseString(item.name, 'households.name'),
    memberIds: parseIdArray(item.memberIds, 'households.memberIds'),
  };
}

function parseIngredient(item: JsonObject): InventoryEntity {
  return {
    id: parseId(item.id, 'ingredients.id'),
    householdId: parseId(item.householdId, 'ingredients.householdId'),
    name: parseString(item.name, 'ingredients.name'),
    category: parseCategory(item.category, 'ingredients.category'),
    unitOfMeasure: item.unitOfMeasure == null ? null : parseUnit(item.unitOfMeasure, 'ingredients.unitOfMeasure'),
    averagePrice: item.averagePrice == null ? null : parseQuantity(item.averagePrice, 'ingredients.averagePrice'),
  };
}

function parsePantryItem(item: JsonObject): PantrySeed {
  return {
    householdId: parseId(item.householdId, 'pantry.householdId'),
    ingredientId: parseId(item.ingredientId, 'pantry.ingredientId'),
    quantity: parseQuantity(item.quantity, 'pantry.quantity'),
    unit: parseUnit(item.unit, 'pantry.unit'),
  };
}

function parseRecipeLine(item: JsonObject): RecipeLine {
  return {
    ingredientId: parseId(item.ingredientId, 'recipes.ingredients.ingredientId'),
    quantity: parseQuantity(item.quantity, 'recipes.ingredients.quantity'),
    unit: parseUnit(item.unit, 'recipes.ingredients.unit'),
    notes: parseOptionalString(item.notes, 'recipes.ingredients.notes'),
    isOptional: parseBoolean(item.isOptional, 'recipes.ingredients.isOptional', false),
  };
}

function parseRecipe(item: JsonObject): RecipeRecord {
  return {
    id: parseId(item.id, 'recipes.id'),
    householdId: parseId(item.householdId, 'recipes.householdId'),
    name: parseString(item.name, 'recipes.name'),
    description: parseOptionalString(item.description, 'recipes.description'),
    instructions: parseString(item.instructions, 'recipes.instructions'),
    // Zero or missing servings is stored as-is; aggregation rejects it.
    servings: item.servings == null ? null : parseInteger(item.servings, 'recipes.servings', { min: 0, max: 1000 }),
    prepTimeMinutes: parseOptionalWholeNumber(item.prepTimeMinutes, 'recipes.prepTimeMinutes'),
    cookTimeMinutes: parseOptionalWholeNumber(item.cookTimeMinutes, 'recipes.cookTimeMinutes'),
    difficulty: parseOptionalDifficulty(item.difficulty, 'recipes.difficulty'),
    cuisineType: parseOptionalCuisine(item.cuisineType, 'recipes.cuisineType'),
    tags: parseOptionalString(item.tags, 'recipes.tags'),
    caloriesPerServing: parseOptionalWholeNumber(item.caloriesPerServing, 'recipes.caloriesPerServing'),
    ingredients: asList(item.ingredients, 'recipes.ingredients').map(parseRecipeLine),
  };
}

function parseMeal(item: JsonObject): MealRecord {
  return {
    id: parseId(item.id, 'meals.id'),
    householdId: parseId(item.householdId, 'meals.householdId'),
    name: parseString(item.name, 'meals.name'),
    mealType: parseMealType(item.mealType, 'meals.mealType'),
    date: parseIsoDate(item.date, 'meals.date'),
    servings: parseInteger(item.servings, 'meals.servings', { min: 1, max: 1000 }),
    recipeId: parseOptionalId(item.recipeId, 'meals.recipeId'),
    notes: parseOptionalString(item.notes, 'meals.notes'),
    assignedToId: parseOptionalId(item.assignedToId, 'meals.assignedToId'),
  };
}
