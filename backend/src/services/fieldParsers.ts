import { FieldValidationError } from '../errors.js';
import { isIsoDate } from '../utils/dates.js';
import {
  CUISINE_TYPES,
  DIFFICULTY_LEVELS,
  INGREDIENT_CATEGORIES,
  MEAL_TYPES,
  UNITS_OF_MEASURE,
  type CuisineType,
  type DifficultyLevel,
  type IngredientCategory,
  type MealType,
  type UnitOfMeasure,
} from '../types.js';

// ============================================================================
// Parse-or-fail helpers, one per field family.
// Shared by model-reply parsing and HTTP request validation.
// ============================================================================

const UNIT_ALIASES: Record<string, UnitOfMeasure> = {
  g: 'gram', gr: 'gram', grams: 'gram',
  kg: 'kilogram', kilograms: 'kilogram',
  oz: 'ounce', ounces: 'ounce',
  lb: 'pound', lbs: 'pound', pounds: 'pound',
  ml: 'milliliter', milliliters: 'milliliter', millilitre: 'milliliter', millilitres: 'milliliter',
  l: 'liter', liters: 'liter', litre: 'liter', litres: 'liter',
  tsp: 'teaspoon', teaspoons: 'teaspoon',
  tbsp: 'tablespoon', tablespoons: 'tablespoon',
  cups: 'cup',
  pints: 'pint',
  quarts: 'quart',
  gallons: 'gallon',
  pieces: 'piece', pcs: 'piece', pc: 'piece', whole: 'piece',
  slices: 'slice',
  cloves: 'clove',
  packages: 'package', pack: 'package', packet: 'package',
  cans: 'can',
  bunches: 'bunch',
  pinch: 'to_taste',
};

const CATEGORY_ALIASES: Record<string, IngredientCategory> = {
  vegetable: 'produce', vegetables: 'produce', fruit: 'produce', fruits: 'produce',
  poultry: 'meat',
  fish: 'seafood',
  bread: 'bakery',
  grain: 'pantry', grains: 'pantry', canned: 'pantry', condiment: 'pantry',
  condiments: 'pantry', oil: 'pantry', oils: 'pantry', baking: 'pantry',
  spice: 'spices', herbs: 'spices', seasoning: 'spices', seasonings: 'spices',
  beverage: 'beverages', drinks: 'beverages',
  snack: 'snacks',
};

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some(item => item === value);
}

function normalizeToken(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function parseEnum<T extends string>(
  value: unknown,
  field: string,
  allowed: readonly T[],
  aliases: Record<string, T> = {}
): T {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new FieldValidationError(field, `expected one of ${allowed.join(', ')}`);
  }

  const token = normalizeToken(value);
  if (isOneOf(token, allowed)) return token;

  const alias = aliases[token];
  if (alias) return alias;

  throw new FieldValidationError(field, `"${value}" is not one of ${allowed.join(', ')}`);
}

export function parseUnit(value: unknown, field = 'unit'): UnitOfMeasure {
  return parseEnum(value, field, UNITS_OF_MEASURE, UNIT_ALIASES);
}

/** A missing category means "other"; a present but unknown one is an error. */
export function parseCategory(value: unknown, field = 'category'): IngredientCategory {
  if (value === undefined || value === null) return 'other';
  return parseEnum(value, field, INGREDIENT_CATEGORIES, CATEGORY_ALIASES);
}

export function parseMealType(value: unknown, field = 'meal_type'): MealType {
  return parseEnum(value, field, MEAL_TYPES);
}

export function parseOptionalDifficulty(value: unknown, field = 'difficulty'): DifficultyLevel | null {
  if (value === undefined || value === null || value === '') return null;
  return parseEnum(value, field, DIFFICULTY_LEVELS);
}

export function parseOptionalCuisine(value: unknown, field = 'cuisine_type'): CuisineType | null {
  if (value === undefined || value === null || value === '') return null;
  return parseEnum(value, field, CUISINE_TYPES);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

/** Quantities may arrive as numbers or numeric strings ("0.25"). */
export function parseQuantity(value: unknown, field = 'quantity'): number {
  const quantity = toNumber(value);
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new FieldValidationError(field, 'expected a positive number');
  }
  return quantity;
}

export function parseOptionalWholeNumber(value: unknown, field: string): number | null {
  if (value === undefined || value === null || value === '') return null;

  const parsed = toNumber(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new FieldValidationError(field, 'expected a non-negative number');
  }
  return Math.round(parsed);
}

export function parseInteger(
  value: unknown,
  field: string,
  range: { min: number; max: number }
): number {
  const parsed = toNumber(value);
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    throw new FieldValidationError(field, `expected an integer between ${range.min} and ${range.max}`);
  }
  return parsed;
}

export function parseString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new FieldValidationError(field, 'expected a non-empty string');
  }
  return value.trim();
}

export function parseOptionalString(value: unknown, field: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') {
    throw new FieldValidationError(field, 'expected a string');
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function parseBoolean(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new FieldValidationError(field, 'expected true or false');
}

export function parseStringArray(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new FieldValidationError(field, 'expected a list of strings');
  }

  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new FieldValidationError(`${field}[${index}]`, 'expected a string');
    }
    return item.trim();
  }).filter(item => item !== '');
}

export function parseIdArray(value: unknown, field: string): number[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new FieldValidationError(field, 'expected a list of ids');
  }
  return value.map((item, index) => parseId(item, `${field}[${index}]`));
}

export function parseId(value: unknown, field: string): number {
  return parseInteger(value, field, { min: 1, max: Number.MAX_SAFE_INTEGER });
}

export function parseOptionalId(value: unknown, field: string): number | null {
  if (value === undefined || value === null) return null;
  return parseId(value, field);
}

export function parseIsoDate(value: unknown, field: string): string {
  if (typeof value !== 'string' || !isIsoDate(value)) {
    throw new FieldValidationError(field, 'expected a date formatted YYYY-MM-DD');
  }
  return value;
}
