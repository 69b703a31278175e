import { BadRequestError, FieldValidationError } from '../errors.js';
import { MAX_MEALS_PER_DAY, MAX_PLAN_DAYS } from '../services/mealAssistantService.js';
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
  parseOptionalString,
  parseOptionalWholeNumber,
  parseQuantity,
  parseString,
  parseStringArray,
  parseUnit,
} from '../services/fieldParsers.js';
import { isJsonObject, type JsonObject } from '../services/responseExtractor.js';
import type {
  AggregateGroceryListRequest,
  GenerateIngredientsRequest,
  GenerateMealPlanRequest,
  GenerateRecipeRequest,
  MealDraft,
  RecipeDraft,
  RecipeDraftIngredient,
  SaveMealPlanRequest,
} from '../types.js';

// Request bodies are camelCase JSON; every field goes through a parse-or-fail helper.

const SERVINGS_RANGE = { min: 1, max: 100 };
const MAX_MEAL_NAME_LENGTH = 200;

function body(raw: unknown): JsonObject {
  if (!isJsonObject(raw)) {
    throw new BadRequestError('Request body must be a JSON object');
  }
  return raw;
}

function list(value: unknown, field: string): JsonObject[] {
  if (!Array.isArray(value)) {
    throw new FieldValidationError(field, 'expected a list');
  }
  return value.map((item, index) => {
    if (!isJsonObject(item)) {
      throw new FieldValidationError(`${field}[${index}]`, 'expected an object');
    }
    return item;
  });
}

function mealName(value: unknown): string {
  const name = parseString(value, 'mealName');
  if (name.length > MAX_MEAL_NAME_LENGTH) {
    throw new FieldValidationError('mealName', `must be at most ${MAX_MEAL_NAME_LENGTH} characters`);
  }
  return name;
}

function servings(value: unknown, field = 'servings'): number {
  return value === undefined ? 4 : parseInteger(value, field, SERVINGS_RANGE);
}

export function parseGenerateIngredientsRequest(raw: unknown): GenerateIngredientsRequest {
  const data = body(raw);
  return {
    householdId: parseId(data.householdId, 'householdId'),
    mealName: mealName(data.mealName),
    servings: servings(data.servings),
    dietaryRestrictions: parseStringArray(data.dietaryRestrictions, 'dietaryRestrictions'),
  };
}

export function parseGenerateRecipeRequest(raw: unknown): GenerateRecipeRequest {
  const data = body(raw);
  const maxPrep = parseOptionalWholeNumber(data.maxPrepTimeMinutes, 'maxPrepTimeMinutes');
  if (maxPrep !== null && maxPrep > 999) {
    throw new FieldValidationError('maxPrepTimeMinutes', 'must be at most 999');
  }

  return {
    householdId: parseId(data.householdId, 'householdId'),
    mealName: mealName(data.mealName),
    servings: servings(data.servings),
    ingredientIds: parseIdArray(data.ingredientIds, 'ingredientIds'),
    ingredientNames: parseStringArray(data.ingredientNames, 'ingredientNames'),
    difficulty: parseOptionalDifficulty(data.difficulty, 'difficulty'),
    cuisineType: parseOptionalCuisine(data.cuisineType, 'cuisineType'),
    maxPrepTimeMinutes: maxPrep,
    dietaryRestrictions: parseStringArray(data.dietaryRestrictions, 'dietaryRestrictions'),
    language: parseOptionalString(data.language, 'language') ?? 'English',
  };
}

export function parseGenerateMealPlanRequest(raw: unknown): GenerateMealPlanRequest {
  const data = body(raw);
  return {
    householdId: parseId(data.householdId, 'householdId'),
    days: data.days === undefined ? 7 : parseInteger(data.days, 'days', { min: 1, max: MAX_PLAN_DAYS }),
    mealsPerDay: data.mealsPerDay === undefined
      ? 3
      : parseInteger(data.mealsPerDay, 'mealsPerDay', { min: 1, max: MAX_MEALS_PER_DAY }),
    startDate: data.startDate == null ? null : parseIsoDate(data.startDate, 'startDate'),
    dietaryPreferences: parseStringArray(data.dietaryPreferences, 'dietaryPreferences'),
    useAvailableOnly: parseBoolean(data.useAvailableOnly, 'useAvailableOnly', false),
    preferredMealTypes: parseStringArray(data.preferredMealTypes, 'preferredMealTypes')
      .map((type, index) => parseMealType(type, `preferredMealTypes[${index}]`)),
  };
}

function parseDraftIngredient(item: JsonObject, field: string): RecipeDraftIngredient {
  return {
    ingredientId: parseOptionalId(item.ingredientId, `${field}.ingredientId`),
    ingredientName: parseOptionalString(item.ingredientName, `${field}.ingredientName`),
    ingredientCategory: item.ingredientCategory == null
      ? null
      : parseCategory(item.ingredientCategory, `${field}.ingredientCategory`),
    quantity: parseQuantity(item.quantity, `${field}.quantity`),
    unit: parseUnit(item.unit, `${field}.unit`),
    notes: parseOptionalString(item.notes, `${field}.notes`),
    isOptional: parseBoolean(item.isOptional, `${field}.isOptional`, false),
  };
}

export function parseRecipeDraft(raw: unknown): RecipeDraft {
  const data = body(raw);
  return {
    householdId: parseId(data.householdId, 'householdId'),
    name: parseString(data.name, 'name'),
    description: parseOptionalString(data.description, 'description'),
    instructions: parseString(data.instructions, 'instructions'),
    servings: parseInteger(data.servings, 'servings', SERVINGS_RANGE),
    prepTimeMinutes: parseOptionalWholeNumber(data.prepTimeMinutes, 'prepTimeMinutes'),
    cookTimeMinutes: parseOptionalWholeNumber(data.cookTimeMinutes, 'cookTimeMinutes'),
    difficulty: parseOptionalDifficulty(data.difficulty, 'difficulty'),
    cuisineType: parseOptionalCuisine(data.cuisineType, 'cuisineType'),
    tags: parseOptionalString(data.tags, 'tags'),
    caloriesPerServing: parseOptionalWholeNumber(data.caloriesPerServing, 'caloriesPerServing'),
    ingredients: list(data.ingredients, 'ingredients')
      .map((item, index) => parseDraftIngredient(item, `ingredients[${index}]`)),
  };
}

function parseMealDraft(item: JsonObject, field: string): MealDraft {
  return {
    name: parseString(item.name, `${field}.name`),
    mealType: parseMealType(item.mealType, `${field}.mealType`),
    date: parseIsoDate(item.date, `${field}.date`),
    description: parseOptionalString(item.description, `${field}.description`),
    servings: servings(item.servings, `${field}.servings`),
    recipeId: parseOptionalId(item.recipeId, `${field}.recipeId`),
    assignedToId: parseOptionalId(item.assignedToId, `${field}.assignedToId`),
    additionalIngredientsNeeded: parseStringArray(
      item.additionalIngredientsNeeded,
      `${field}.additionalIngredientsNeeded`
    ),
  };
}

export function parseSaveMealPlanRequest(raw: unknown): SaveMealPlanRequest {
  const data = body(raw);
  const meals = list(data.meals, 'meals').map((item, index) => parseMealDraft(item, `meals[${index}]`));
  if (meals.length === 0) {
    throw new FieldValidationError('meals', 'at least one meal is required');
  }

  return {
    householdId: parseId(data.householdId, 'householdId'),
    meals,
    autoCreateIngredients: parseBoolean(data.autoCreateIngredients, 'autoCreateIngredients', true),
    autoMatchRecipes: parseBoolean(data.autoMatchRecipes, 'autoMatchRecipes', true),
  };
}

export function parseAggregateRequest(raw: unknown): AggregateGroceryListRequest {
  const data = body(raw);
  const mealIds = parseIdArray(data.mealIds, 'mealIds');
  if (mealIds.length === 0) {
    throw new FieldValidationError('mealIds', 'at least one meal id is required');
  }
  return { householdId: parseId(data.householdId, 'householdId'), mealIds };
}
