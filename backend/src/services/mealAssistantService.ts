import type { AppConfig } from '../config.js';
import { BadRequestError, FieldValidationError } from '../errors.js';
import type {
  GenerateIngredientsRequest,
  GenerateIngredientsResult,
  GenerateMealPlanRequest,
  GenerateMealPlanResult,
  GenerateRecipeRequest,
  GeneratedIngredient,
  GeneratedMealPlanEntry,
  GeneratedRecipe,
  InventoryEntity,
  RecipeIngredientCandidate,
} from '../types.js';
import { addDays, today } from '../utils/dates.js';
import { createLogger } from '../utils/logger.js';
import { matchEntity } from './entityMatcher.js';
import {
  parseBoolean,
  parseCategory,
  parseInteger,
  parseMealType,
  parseOptionalCuisine,
  parseOptionalDifficulty,
  parseOptionalString,
  parseOptionalWholeNumber,
  parseQuantity,
  parseString,
  parseStringArray,
  parseUnit,
} from './fieldParsers.js';
import type { GenerationOptions, TextGenerator } from './geminiService.js';
import type { HouseholdStore } from './householdStore.js';
import { classifyGenerationError } from './modelErrors.js';
import { buildIngredientsPrompt, buildMealPlanPrompt, buildRecipePrompt } from './prompts.js';
import { extractJsonObject, isJsonObject, type JsonObject } from './responseExtractor.js';

const log = createLogger('MealAssistant');

export const MAX_PLAN_DAYS = 30;
export const MAX_MEALS_PER_DAY = 6;
const HISTORY_WINDOW_DAYS = 30;
const HISTORY_LIMIT = 20;

const INGREDIENT_TEMPERATURE = 0.7;
const RECIPE_TEMPERATURE = 0.8;
const MEAL_PLAN_TEMPERATURE = 0.6;

export const INGREDIENTS_MISSING_MESSAGE =
  "The AI couldn't generate a valid ingredient list. This might be due to:\n" +
  '• The meal name being too vague or uncommon\n' +
  '• Conflicting dietary restrictions\n' +
  '• Service temporary unavailability\n\n' +
  'Please try again with a more specific meal name or simpler requirements.';

export const MEAL_PLAN_MISSING_MESSAGE =
  "The AI couldn't generate a valid meal plan. This might be due to:\n" +
  '• Too many conflicting dietary preferences\n' +
  '• Not enough available ingredients for the constraints\n' +
  '• Service temporary unavailability\n\n' +
  'Please try again with fewer dietary restrictions, fewer days, ' +
  "or with 'use available only' disabled.";

export const NO_AVAILABLE_INGREDIENTS_MESSAGE =
  'No available ingredients found in your household inventory.\n\n' +
  'To generate a meal plan with available ingredients only, you need to:\n' +
  '• Add ingredients to your household\n' +
  '• Mark items as purchased in your grocery lists\n\n' +
  "Alternatively, disable the 'use available only' constraint to get suggestions for any meals.";

export interface MealAssistantDeps {
  config: Pick<AppConfig, 'gemini' | 'matching'>;
  generate: TextGenerator;
  store: HouseholdStore;
  now?: () => Date;
}

/**
 * Turns structured generation requests into prompts, calls the model once,
 * and converts the reply into matched, validated suggestions.
 * Nothing is written to the store here.
 */
export class MealAssistantService {
  private readonly config: MealAssistantDeps['config'];
  private readonly generate: TextGenerator;
  private readonly store: HouseholdStore;
  private readonly now: () => Date;

  constructor(deps: MealAssistantDeps) {
    this.config = deps.config;
    this.generate = deps.generate;
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Ingredient list
  // ==========================================================================

  async generateIngredients(request: GenerateIngredientsRequest): Promise<GenerateIngredientsResult> {
    log.info(`Generating ingredients for "${request.mealName}"`, { householdId: request.householdId });

    const prompt = buildIngredientsPrompt(request);
    const reply = await this.callModel(prompt, this.options(INGREDIENT_TEMPERATURE), 'ingredients');
    const data = extractJsonObject(reply);

    if (!Array.isArray(data.ingredients)) {
      throw new BadRequestError(INGREDIENTS_MISSING_MESSAGE);
    }

    const catalog = await this.store.lookupHouseholdCatalog(request.householdId);
    const ingredients = data.ingredients.map((item, index) =>
      this.parseIngredient(asItem(item, `ingredients[${index}]`), `ingredients[${index}]`, 'name', catalog)
    );
    const matched = ingredients.filter(ingredient => !ingredient.isNew).length;

    log.info(`Generated ${ingredients.length} ingredients (${matched} matched)`);
    return {
      mealName: request.mealName,
      householdId: request.householdId,
      ingredients,
      totalIngredients: ingredients.length,
      newIngredientsCount: ingredients.length - matched,
      matchedIngredientsCount: matched,
    };
  }

  // ==========================================================================
  // Recipe
  // ==========================================================================

  async generateRecipe(request: GenerateRecipeRequest): Promise<GeneratedRecipe> {
    log.info(`Generating recipe for "${request.mealName}"`, { householdId: request.householdId });

    const suppliedNames = await this.resolveSuppliedNames(request);
    const supplied = new Set(suppliedNames.map(name => name.toLowerCase()));

    const prompt = buildRecipePrompt({ ...request, ingredientNames: suppliedNames });
    const reply = await this.callModel(prompt, this.options(RECIPE_TEMPERATURE), 'recipe');
    const data = extractJsonObject(reply);

    const rawIngredients = data.ingredients ?? [];
    if (!Array.isArray(rawIngredients)) {
      throw new FieldValidationError('ingredients', 'expected a list');
    }

    const catalog = await this.store.lookupHouseholdCatalog(request.householdId);
    const ingredients: RecipeIngredientCandidate[] = rawIngredients.map((item, index) => {
      const field = `ingredients[${index}]`;
      const raw = asItem(item, field);
      const nameKey = raw.ingredient_name !== undefined ? 'ingredient_name' : 'name';
      const ingredient = this.parseIngredient(raw, field, nameKey, catalog);
      return {
        ...ingredient,
        isOptional: parseBoolean(raw.is_optional, `${field}.is_optional`, false),
        // The model's own is_user_provided flag is not trusted.
        isUserSupplied: supplied.has(ingredient.name.toLowerCase()),
      };
    });

    return {
      householdId: request.householdId,
      name: parseOptionalString(data.name, 'name') ?? request.mealName,
      description: parseOptionalString(data.description, 'description'),
      instructions: parseString(data.instructions, 'instructions'),
      prepTimeMinutes: parseOptionalWholeNumber(data.prep_time_minutes, 'prep_time_minutes'),
      cookTimeMinutes: parseOptionalWholeNumber(data.cook_time_minutes, 'cook_time_minutes'),
      servings: request.servings,
      difficulty: parseOptionalDifficulty(data.difficulty),
      cuisineType: parseOptionalCuisine(data.cuisine_type),
      tags: parseOptionalString(data.tags, 'tags'),
      caloriesPerServing: parseOptionalWholeNumber(data.calories_per_serving, 'calories_per_serving'),
      ingredients,
      aiGenerated: true,
      requiresUserApproval: true,
    };
  }

  private async resolveSuppliedNames(request: GenerateRecipeRequest): Promise<string[]> {
    const names: string[] = [];

    for (const id of request.ingredientIds) {
      const entity = await this.store.getEntity(id);
      if (!entity) {
        throw new BadRequestError(`Ingredient with ID ${id} not found`);
      }
      if (entity.householdId !== request.householdId) {
        throw new BadRequestError(`Ingredient ${id} doesn't belong to this household`);
      }
      names.push(entity.name);
    }
    names.push(...request.ingredientNames);

    const seen = new Set<string>();
    return names.filter(name => {
      const key = name.toLowerCase();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  // ==========================================================================
  // Meal plan
  // ==========================================================================

  async generateMealPlan(request: GenerateMealPlanRequest): Promise<GenerateMealPlanResult> {
    const days = parseInteger(request.days, 'days', { min: 1, max: MAX_PLAN_DAYS });
    const mealsPerDay = parseInteger(request.mealsPerDay, 'meals_per_day', { min: 1, max: MAX_MEALS_PER_DAY });

    const available = await this.store.lookupAvailableIngredients(request.householdId);
    if (available.length === 0 && request.useAvailableOnly) {
      throw new BadRequestError(NO_AVAILABLE_INGREDIENTS_MESSAGE);
    }

    const startDate = request.startDate ?? today(this.now());
    const endDate = addDays(startDate, days - 1);

    const history = await this.store.lookupRecentMeals(
      request.householdId,
      addDays(startDate, -HISTORY_WINDOW_DAYS),
      addDays(startDate, -1)
    );
    const recentMeals = history.slice(-HISTORY_LIMIT);

    log.info(`Generating ${days}-day meal plan from ${startDate}`, {
      householdId: request.householdId,
      availableIngredients: available.length,
      recentMeals: recentMeals.length,
    });

    const prompt = buildMealPlanPrompt({
      days,
      mealsPerDay,
      availableIngredients: available,
      recentMeals,
      dietaryPreferences: request.dietaryPreferences,
      useAvailableOnly: request.useAvailableOnly,
      preferredMealTypes: request.preferredMealTypes,
    });
    const reply = await this.callModel(
      prompt,
      this.options(MEAL_PLAN_TEMPERATURE, this.config.gemini.mealPlanModel),
      'meal plan'
    );
    const data = extractJsonObject(reply);

    if (!Array.isArray(data.meal_plan)) {
      throw new BadRequestError(MEAL_PLAN_MISSING_MESSAGE);
    }

    const catalog = await this.store.lookupHouseholdCatalog(request.householdId);
    const entries = data.meal_plan
      .map((item, index) => this.parsePlanEntry(asItem(item, `meal_plan[${index}]`), `meal_plan[${index}]`, days, startDate, catalog))
      .sort((a, b) => a.day - b.day);

    const coveredDays = new Set(entries.map(entry => entry.day));
    for (let day = 1; day <= days; day++) {
      if (!coveredDays.has(day)) {
        throw new BadRequestError(
          `The AI meal plan has no meals for day ${day} of ${days}. Please try again.`
        );
      }
    }

    const requiringShopping = entries.filter(entry => entry.requiresShopping).length;
    log.info(`Meal plan complete: ${entries.length} meals, ${requiringShopping} need shopping`);

    return {
      householdId: request.householdId,
      startDate,
      endDate,
      totalDays: days,
      entries,
      totalMeals: entries.length,
      availableIngredientsCount: available.length,
      mealsWithAllIngredients: entries.length - requiringShopping,
      mealsRequiringShopping: requiringShopping,
      aiGenerated: true,
      requiresUserApproval: true,
    };
  }

  private parsePlanEntry(
    raw: JsonObject,
    field: string,
    days: number,
    startDate: string,
    catalog: readonly InventoryEntity[]
  ): GeneratedMealPlanEntry {
    const day = parseInteger(raw.day, `${field}.day`, { min: 1, max: days });
    const ingredientsUsed = parseStringArray(raw.ingredients_used, `${field}.ingredients_used`);
    const additional = parseStringArray(raw.additional_ingredients_needed, `${field}.additional_ingredients_needed`);

    const matchedEntityIds: number[] = [];
    for (const name of ingredientsUsed) {
      const { matchedId } = matchEntity(name, catalog, { threshold: this.config.matching.ingredientThreshold });
      if (matchedId !== undefined && !matchedEntityIds.includes(matchedId)) {
        matchedEntityIds.push(matchedId);
      }
    }

    return {
      day,
      date: addDays(startDate, day - 1),
      mealType: parseMealType(raw.meal_type, `${field}.meal_type`),
      name: parseString(raw.meal_name ?? raw.name, `${field}.meal_name`),
      description: parseOptionalString(raw.description, `${field}.description`),
      ingredientsUsed,
      additionalIngredientsNeeded: additional,
      matchedEntityIds,
      requiresShopping: additional.length > 0,
      estimatedPrepTimeMinutes: parseOptionalWholeNumber(
        raw.estimated_prep_time_minutes ?? raw.estimated_prep_time,
        `${field}.estimated_prep_time_minutes`
      ),
      estimatedCalories: parseOptionalWholeNumber(raw.estimated_calories, `${field}.estimated_calories`),
    };
  }

  // ==========================================================================
  // Shared
  // ==========================================================================

  private parseIngredient(
    raw: JsonObject,
    field: string,
    nameKey: string,
    catalog: readonly InventoryEntity[]
  ): GeneratedIngredient {
    const name = parseString(raw[nameKey], `${field}.${nameKey}`);
    const category = parseCategory(raw.category, `${field}.category`);
    const match = matchEntity(name, catalog, {
      category,
      threshold: this.config.matching.ingredientThreshold,
    });

    const ingredient: GeneratedIngredient = {
      name,
      quantity: parseQuantity(raw.quantity, `${field}.quantity`),
      unit: parseUnit(raw.unit, `${field}.unit`),
      category,
      notes: parseOptionalString(raw.notes, `${field}.notes`),
      isNew: match.matchedId === undefined,
      confidence: match.confidence,
    };
    if (match.matchedId !== undefined) {
      ingredient.matchedEntityId = match.matchedId;
    }
    return ingredient;
  }

  private options(temperature: number, model = this.config.gemini.model): GenerationOptions {
    return { temperature, maxOutputTokens: this.config.gemini.maxOutputTokens, model };
  }

  private async callModel(prompt: string, options: GenerationOptions, operation: string): Promise<string> {
    try {
      return await this.generate(prompt, options);
    } catch (error) {
      const classified = classifyGenerationError(error, operation);
      log.error(`Model call failed while generating ${operation}`, {
        category: classified.category,
        cause: error instanceof Error ? error.message : String(error),
      });
      throw classified;
    }
  }
}

function asItem(value: unknown, field: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new FieldValidationError(field, 'expected an object');
  }
  return value;
}
