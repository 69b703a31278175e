import type { MatchingConfig } from '../config.js';
import { BadRequestError, DuplicateEntityError, InternalError, UnauthorizedError } from '../errors.js';
import type {
  IngredientCategory,
  RecipeDraft,
  RecipeLine,
  RecipeMatchDetail,
  SaveMealPlanRequest,
  SaveMealPlanResult,
  SaveRecipeResult,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import { matchEntity } from './entityMatcher.js';
import type { HouseholdStore } from './householdStore.js';

const log = createLogger('Approval');

// A generated ingredient name this close to an existing one is not created again.
export const EXISTING_INGREDIENT_CONFIDENCE = 0.9;

export interface ApprovalDeps {
  matching: MatchingConfig;
  store: HouseholdStore;
}

interface EnsuredEntity {
  id: number;
  created: boolean;
}

/**
 * Persists reviewed suggestions. This is the only place that writes to the
 * household store, and it only runs when the caller explicitly saves.
 */
export class ApprovalService {
  private readonly matching: MatchingConfig;
  private readonly store: HouseholdStore;

  constructor(deps: ApprovalDeps) {
    this.matching = deps.matching;
    this.store = deps.store;
  }

  async saveGeneratedRecipe(userId: number, draft: RecipeDraft): Promise<SaveRecipeResult> {
    await this.requireMember(draft.householdId, userId);

    // Validate every line before creating anything.
    for (const ingredient of draft.ingredients) {
      if (ingredient.ingredientId === null) {
        if (!ingredient.ingredientName) {
          throw new BadRequestError('Ingredients without IDs must provide ingredient_name for auto-creation');
        }
        continue;
      }
      const entity = await this.store.getEntity(ingredient.ingredientId);
      if (!entity || entity.householdId !== draft.householdId) {
        throw new BadRequestError(`Ingredient ${ingredient.ingredientId} was not found in this household`);
      }
    }

    const createdIngredients: string[] = [];
    const lines: RecipeLine[] = [];

    for (const ingredient of draft.ingredients) {
      let ingredientId = ingredient.ingredientId;

      if (ingredientId === null) {
        const name = ingredient.ingredientName ?? '';
        const ensured = await this.ensureEntity(
          draft.householdId,
          name,
          ingredient.ingredientCategory ?? 'other'
        );
        if (ensured.created) createdIngredients.push(name);
        ingredientId = ensured.id;
      }

      lines.push({
        ingredientId,
        quantity: ingredient.quantity,
        unit: ingredient.unit,
        notes: ingredient.notes,
        isOptional: ingredient.isOptional,
      });
    }

    const recipeId = await this.store.createRecipe({
      householdId: draft.householdId,
      name: draft.name,
      description: draft.description,
      instructions: draft.instructions,
      servings: draft.servings,
      prepTimeMinutes: draft.prepTimeMinutes,
      cookTimeMinutes: draft.cookTimeMinutes,
      difficulty: draft.difficulty,
      cuisineType: draft.cuisineType,
      tags: draft.tags,
      caloriesPerServing: draft.caloriesPerServing,
      ingredients: lines,
    });

    if (createdIngredients.length > 0) {
      log.info(`Auto-created ${createdIngredients.length} ingredients: ${createdIngredients.join(', ')}`);
    }
    log.info(`Saved recipe "${draft.name}"`, { recipeId, householdId: draft.householdId });

    return { recipeId, createdIngredients };
  }

  async saveMealPlan(userId: number, request: SaveMealPlanRequest): Promise<SaveMealPlanResult> {
    await this.requireMember(request.householdId, userId);

    for (const recipeId of new Set(request.meals.map(meal => meal.recipeId))) {
      if (recipeId === null) continue;
      const recipe = await this.store.getRecipe(recipeId);
      if (!recipe || recipe.householdId !== request.householdId) {
        throw new BadRequestError(`Recipe ${recipeId} was not found in this household`);
      }
    }

    const ingredientsCreated = request.autoCreateIngredients
      ? await this.createMissingIngredients(request)
      : [];

    const recipeIds = request.meals.map(meal => meal.recipeId);
    const recipesMatched: RecipeMatchDetail[] = [];

    if (request.autoMatchRecipes && recipeIds.some(id => id === null)) {
      const recipes = await this.store.lookupHouseholdRecipes(request.householdId);

      request.meals.forEach((meal, index) => {
        if (meal.recipeId !== null) return;

        const { matchedId } = matchEntity(meal.name, recipes, { threshold: this.matching.recipeThreshold });
        const recipe = recipes.find(r => r.id === matchedId);
        if (recipe) {
          recipeIds[index] = recipe.id;
          recipesMatched.push({ mealName: meal.name, recipeId: recipe.id, recipeName: recipe.name });
        }
      });
    }

    const mealIds: number[] = [];
    for (const [index, meal] of request.meals.entries()) {
      mealIds.push(await this.store.createMeal({
        householdId: request.householdId,
        name: meal.name,
        mealType: meal.mealType,
        date: meal.date,
        servings: meal.servings,
        recipeId: recipeIds[index] ?? null,
        notes: meal.description,
        assignedToId: meal.assignedToId,
      }));
    }

    log.info(`Saved ${mealIds.length} planned meals`, {
      householdId: request.householdId,
      ingredientsCreated: ingredientsCreated.length,
      recipesMatched: recipesMatched.length,
    });

    return { mealIds, ingredientsCreated, recipesMatched };
  }

  private async createMissingIngredients(request: SaveMealPlanRequest): Promise<string[]> {
    const names = new Map<string, string>();
    for (const meal of request.meals) {
      for (const name of meal.additionalIngredientsNeeded) {
        const key = name.trim().toLowerCase();
        if (key !== '' && !names.has(key)) names.set(key, name.trim());
      }
    }

    const catalog = await this.store.lookupHouseholdCatalog(request.householdId);
    const created: string[] = [];

    for (const name of names.values()) {
      const match = matchEntity(name, catalog, { threshold: this.matching.ingredientThreshold });
      if (match.matchedId !== undefined && match.confidence > EXISTING_INGREDIENT_CONFIDENCE) continue;

      const ensured = await this.ensureEntity(request.householdId, name, 'other');
      if (ensured.created) created.push(name);
    }

    return created;
  }

  /**
   * Create an ingredient, or return the existing one when another request
   * created the same name first.
   */
  private async ensureEntity(householdId: number, name: string, category: IngredientCategory): Promise<EnsuredEntity> {
    try {
      const id = await this.store.createEntity({ householdId, name, category });
      return { id, created: true };
    } catch (error) {
      if (!(error instanceof DuplicateEntityError)) throw error;

      const key = name.trim().toLowerCase();
      const catalog = await this.store.lookupHouseholdCatalog(householdId);
      const existing = catalog.find(entity => entity.name.toLowerCase() === key);
      if (!existing) {
        throw new InternalError(`Ingredient "${name}" conflicts with an existing entry that could not be found.`);
      }
      log.debug(`Ingredient "${name}" already exists, reusing id ${existing.id}`);
      return { id: existing.id, created: false };
    }
  }

  private async requireMember(householdId: number, userId: number): Promise<void> {
    if (!(await this.store.isMember(householdId, userId))) {
      throw new UnauthorizedError();
    }
  }
}
