import { BadRequestError, InternalError } from '../errors.js';
import type {
  AggregateGroceryListRequest,
  AggregatedGroceryList,
  AggregatedLine,
  InventoryEntity,
  MealRecord,
  RecipeRecord,
  UnitOfMeasure,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { HouseholdStore } from './householdStore.js';

const log = createLogger('GroceryList');

/** Round to 2 decimals, halves away from zero (0.125 -> 0.13, -0.125 -> -0.13). */
export function roundQuantity(value: number): number {
  return (Math.sign(value) * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

interface PendingLine {
  ingredientId: number;
  unit: UnitOfMeasure;
  quantity: number;
  notes: string | null;
}

/**
 * Consolidate the ingredient needs of already-resolved meals.
 *
 * Quantities are scaled by meal servings over recipe servings and summed per
 * (ingredient, unit). Optional lines never count. Meals are visited in id
 * order so the first-seen notes do not depend on the caller's ordering.
 */
export function consolidateMeals(
  meals: readonly MealRecord[],
  recipes: ReadonlyMap<number, RecipeRecord>,
  entities: ReadonlyMap<number, InventoryEntity>
): AggregatedLine[] {
  const groups = new Map<string, PendingLine>();
  const ordered = [...meals].sort((a, b) => a.id - b.id);

  for (const meal of ordered) {
    if (meal.recipeId === null) continue;

    const recipe = recipes.get(meal.recipeId);
    if (!recipe) {
      throw new InternalError(`Meal ${meal.id} references recipe ${meal.recipeId}, which could not be loaded.`);
    }
    if (recipe.servings === null || recipe.servings <= 0) {
      throw new InternalError(`Recipe "${recipe.name}" has no valid serving count, so it cannot be scaled.`);
    }

    const ratio = meal.servings / recipe.servings;

    for (const line of recipe.ingredients) {
      if (line.isOptional) continue;

      const key = `${line.ingredientId}:${line.unit}`;
      const scaled = line.quantity * ratio;
      const existing = groups.get(key);
      if (existing) {
        existing.quantity += scaled;
      } else {
        groups.set(key, {
          ingredientId: line.ingredientId,
          unit: line.unit,
          quantity: scaled,
          notes: line.notes,
        });
      }
    }
  }

  return [...groups.values()].map(group => {
    const entity = entities.get(group.ingredientId);
    if (!entity) {
      throw new InternalError(`Ingredient ${group.ingredientId} is referenced by a recipe but does not exist.`);
    }
    return {
      ingredientId: group.ingredientId,
      displayName: entity.name,
      unit: group.unit,
      quantity: roundQuantity(group.quantity),
      category: entity.category,
      notes: group.notes,
      estimatedPrice: entity.averagePrice,
    };
  });
}

/**
 * Build a consolidated grocery list for a set of household meals.
 * Any unknown or foreign meal id rejects the whole request.
 */
export async function aggregateGroceryList(
  store: HouseholdStore,
  request: AggregateGroceryListRequest
): Promise<AggregatedGroceryList> {
  const mealIds = [...new Set(request.mealIds)];

  const meals: MealRecord[] = [];
  for (const mealId of mealIds) {
    const meal = await store.getMeal(mealId);
    if (!meal || meal.householdId !== request.householdId) {
      throw new BadRequestError(`Meal ${mealId} was not found in this household`);
    }
    meals.push(meal);
  }

  const recipes = new Map<number, RecipeRecord>();
  for (const meal of meals) {
    if (meal.recipeId === null || recipes.has(meal.recipeId)) continue;

    const recipe = await store.getRecipe(meal.recipeId);
    if (recipe) recipes.set(recipe.id, recipe);
  }

  const entities = new Map<number, InventoryEntity>();
  for (const entity of await store.lookupHouseholdCatalog(request.householdId)) {
    entities.set(entity.id, entity);
  }
  for (const recipe of recipes.values()) {
    for (const line of recipe.ingredients) {
      if (entities.has(line.ingredientId)) continue;
      const entity = await store.getEntity(line.ingredientId);
      if (entity) entities.set(entity.id, entity);
    }
  }

  const lines = consolidateMeals(meals, recipes, entities);
  const dates = meals.map(meal => meal.date).sort();

  log.info(`Aggregated ${meals.length} meals into ${lines.length} lines`, {
    householdId: request.householdId,
  });

  return {
    householdId: request.householdId,
    startDate: dates[0] ?? null,
    endDate: dates[dates.length - 1] ?? null,
    lines,
  };
}
