import { describe, it, expect } from 'vitest';
import {
  BadRequestError,
  DuplicateEntityError,
  UnauthorizedError,
} from '../../../src/errors.js';
import { ApprovalService } from '../../../src/services/approvalService.js';
import { InMemoryHouseholdStore, type NewEntity } from '../../../src/services/householdStore.js';
import type { MealDraft, RecipeDraft, SaveMealPlanRequest } from '../../../src/types.js';
import { makeEntity, makeRecipe, makeSeed, testConfig } from '../../helpers/fixtures.js';

function createStore() {
  return new InMemoryHouseholdStore(makeSeed({
    ingredients: [
      makeEntity({ id: 1, name: 'garlic', category: 'produce' }),
      makeEntity({ id: 2, name: 'soy sauce', category: 'pantry' }),
      makeEntity({ id: 9, householdId: 2, name: 'eggs', category: 'dairy' }),
    ],
    recipes: [
      makeRecipe({ id: 50, name: 'Chicken Stir Fry' }),
      makeRecipe({ id: 60, householdId: 2, name: 'Egg Fried Rice' }),
    ],
  }));
}

// Simulates another request creating the same ingredient first.
class RacingStore extends InMemoryHouseholdStore {
  override async createEntity(entity: NewEntity): Promise<number> {
    await super.createEntity(entity);
    throw new DuplicateEntityError(entity.householdId, entity.name);
  }
}

const draft: RecipeDraft = {
  householdId: 1,
  name: 'Lemongrass chicken',
  description: null,
  instructions: 'Cook it.',
  servings: 2,
  prepTimeMinutes: 10,
  cookTimeMinutes: 15,
  difficulty: 'easy',
  cuisineType: 'thai',
  tags: null,
  caloriesPerServing: null,
  ingredients: [
    { ingredientId: 1, ingredientName: null, ingredientCategory: null, quantity: 2, unit: 'clove', notes: null, isOptional: false },
    { ingredientId: null, ingredientName: 'lemongrass', ingredientCategory: 'produce', quantity: 2, unit: 'piece', notes: null, isOptional: false },
    { ingredientId: null, ingredientName: 'Garlic', ingredientCategory: null, quantity: 1, unit: 'clove', notes: 'extra', isOptional: true },
  ],
};

function meal(overrides: Partial<MealDraft> & Pick<MealDraft, 'name'>): MealDraft {
  return {
    mealType: 'dinner',
    date: '2026-11-02',
    description: null,
    servings: 2,
    recipeId: null,
    assignedToId: null,
    additionalIngredientsNeeded: [],
    ...overrides,
  };
}

describe('ApprovalService.saveGeneratedRecipe', () => {
  it('creates missing ingredients and reuses existing names', async () => {
    const store = createStore();
    const service = new ApprovalService({ matching: testConfig.matching, store });

    const result = await service.saveGeneratedRecipe(1, draft);

    // ids continue after the highest seeded id (60)
    expect(result).toEqual({ recipeId: 62, createdIngredients: ['lemongrass'] });

    const recipe = await store.getRecipe(62);
    expect(recipe?.ingredients.map(line => line.ingredientId)).toEqual([1, 61, 1]);
    expect(recipe?.cuisineType).toBe('thai');

    const created = await store.getEntity(61);
    expect(created).toMatchObject({ name: 'lemongrass', category: 'produce', householdId: 1 });
  });

  it('requires membership', async () => {
    const service = new ApprovalService({ matching: testConfig.matching, store: createStore() });
    await expect(service.saveGeneratedRecipe(3, draft)).rejects.toThrow(UnauthorizedError);
  });

  it('requires a name for ingredients without an id', async () => {
    const service = new ApprovalService({ matching: testConfig.matching, store: createStore() });
    const nameless: RecipeDraft = {
      ...draft,
      ingredients: [{ ...draft.ingredients[1], ingredientName: null }],
    };

    await expect(service.saveGeneratedRecipe(1, nameless))
      .rejects.toThrow('Ingredients without IDs must provide ingredient_name for auto-creation');
  });

  it('rejects ingredient ids from another household', async () => {
    const service = new ApprovalService({ matching: testConfig.matching, store: createStore() });
    const foreign: RecipeDraft = { ...draft, ingredients: [{ ...draft.ingredients[0], ingredientId: 9 }] };

    await expect(service.saveGeneratedRecipe(1, foreign)).rejects.toThrow(BadRequestError);
  });

  it('creates nothing when a later line has a foreign ingredient id', async () => {
    const store = createStore();
    const service = new ApprovalService({ matching: testConfig.matching, store });
    const mixed: RecipeDraft = {
      ...draft,
      ingredients: [draft.ingredients[1], { ...draft.ingredients[0], ingredientId: 9 }],
    };

    await expect(service.saveGeneratedRecipe(1, mixed))
      .rejects.toThrow('Ingredient 9 was not found in this household');

    const catalog = await store.lookupHouseholdCatalog(1);
    expect(catalog.map(entity => entity.name)).toEqual(['garlic', 'soy sauce']);
    expect(await store.getRecipe(61)).toBeNull();
  });
});

describe('ApprovalService.saveMealPlan', () => {
  const request: SaveMealPlanRequest = {
    householdId: 1,
    autoCreateIngredients: true,
    autoMatchRecipes: true,
    meals: [
      meal({ name: 'Chicken stir fry', description: 'Quick', additionalIngredientsNeeded: ['Soy Sauce', 'ginger'] }),
      meal({
        name: 'Pancakes',
        mealType: 'breakfast',
        date: '2026-11-03',
        servings: 3,
        assignedToId: 1,
        additionalIngredientsNeeded: ['ginger', 'maple syrup'],
      }),
    ],
  };

  it('creates new ingredients, links recipes by name and stores the meals', async () => {
    const store = createStore();
    const service = new ApprovalService({ matching: testConfig.matching, store });

    const result = await service.saveMealPlan(1, request);

    expect(result).toEqual({
      mealIds: [63, 64],
      ingredientsCreated: ['ginger', 'maple syrup'],
      recipesMatched: [{ mealName: 'Chicken stir fry', recipeId: 50, recipeName: 'Chicken Stir Fry' }],
    });
    expect(await store.getMeal(63)).toMatchObject({ name: 'Chicken stir fry', recipeId: 50, notes: 'Quick' });
    expect(await store.getMeal(64)).toMatchObject({
      name: 'Pancakes',
      mealType: 'breakfast',
      recipeId: null,
      servings: 3,
      assignedToId: 1,
    });
  });

  it('leaves ingredients and recipes alone when both options are off', async () => {
    const store = createStore();
    const service = new ApprovalService({ matching: testConfig.matching, store });

    const result = await service.saveMealPlan(1, {
      ...request,
      autoCreateIngredients: false,
      autoMatchRecipes: false,
    });

    expect(result).toEqual({ mealIds: [61, 62], ingredientsCreated: [], recipesMatched: [] });
    expect(await store.getMeal(61)).toMatchObject({ recipeId: null });
  });

  it('rejects a recipe from another household before writing anything', async () => {
    const store = createStore();
    const service = new ApprovalService({ matching: testConfig.matching, store });

    await expect(service.saveMealPlan(1, {
      ...request,
      meals: [meal({ name: 'Fried rice', recipeId: 60, additionalIngredientsNeeded: ['ginger'] })],
    })).rejects.toThrow('Recipe 60 was not found in this household');

    const catalog = await store.lookupHouseholdCatalog(1);
    expect(catalog.map(entity => entity.name)).toEqual(['garlic', 'soy sauce']);
  });

  it('treats a name created concurrently as already existing', async () => {
    const store = new RacingStore(makeSeed({ ingredients: [makeEntity({ id: 1, name: 'garlic' })] }));
    const service = new ApprovalService({ matching: testConfig.matching, store });

    const result = await service.saveMealPlan(1, {
      ...request,
      autoMatchRecipes: false,
      meals: [meal({ name: 'Ginger tea', additionalIngredientsNeeded: ['ginger'] })],
    });

    expect(result.ingredientsCreated).toEqual([]);
    const catalog = await store.lookupHouseholdCatalog(1);
    expect(catalog.map(entity => entity.name)).toEqual(['garlic', 'ginger']);
  });

  it('requires membership', async () => {
    const service = new ApprovalService({ matching: testConfig.matching, store: createStore() });
    await expect(service.saveMealPlan(2, request)).rejects.toThrow(UnauthorizedError);
  });
});
