import { DuplicateEntityError } from '../errors.js';
import type {
  AvailableIngredient,
  IngredientCategory,
  InventoryEntity,
  MealRecord,
  RecentMeal,
  RecipeRecord,
  UnitOfMeasure,
} from '../types.js';

// ============================================================================
// Collaborator contract
// ============================================================================

export interface NewEntity {
  householdId: number;
  name: string;
  category: IngredientCategory;
}

export type NewRecipe = Omit<RecipeRecord, 'id'>;
export type NewMeal = Omit<MealRecord, 'id'>;

/**
 * Everything the core reads from or writes to household storage.
 * Generation only reads; writes happen in the approval step.
 */
export interface HouseholdStore {
  isMember(householdId: number, userId: number): Promise<boolean>;
  /** Sorted alphabetically by name. */
  lookupHouseholdCatalog(householdId: number): Promise<InventoryEntity[]>;
  lookupAvailableIngredients(householdId: number): Promise<AvailableIngredient[]>;
  /** Meals dated within [since, until], oldest first. */
  lookupRecentMeals(householdId: number, since: string, until: string): Promise<RecentMeal[]>;
  lookupHouseholdRecipes(householdId: number): Promise<RecipeRecord[]>;
  getEntity(entityId: number): Promise<InventoryEntity | null>;
  getMeal(mealId: number): Promise<MealRecord | null>;
  getRecipe(recipeId: number): Promise<RecipeRecord | null>;
  /** Throws DuplicateEntityError when the household already has that name. */
  createEntity(entity: NewEntity): Promise<number>;
  createRecipe(recipe: NewRecipe): Promise<number>;
  createMeal(meal: NewMeal): Promise<number>;
}

// ============================================================================
// In-memory implementation
// ============================================================================

export interface HouseholdSeed {
  id: number;
  name: string;
  memberIds: number[];
}

export interface PantrySeed {
  householdId: number;
  ingredientId: number;
  quantity: number;
  unit: UnitOfMeasure;
}

export interface SeedData {
  households: HouseholdSeed[];
  ingredients: InventoryEntity[];
  pantry: PantrySeed[];
  recipes: RecipeRecord[];
  meals: MealRecord[];
}

export const EMPTY_SEED: SeedData = {
  households: [],
  ingredients: [],
  pantry: [],
  recipes: [],
  meals: [],
};

function byName(a: { name: string }, b: { name: string }): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export class InMemoryHouseholdStore implements HouseholdStore {
  private readonly households: HouseholdSeed[];
  private readonly entities = new Map<number, InventoryEntity>();
  private readonly pantry: PantrySeed[];
  private readonly recipes = new Map<number, RecipeRecord>();
  private readonly meals = new Map<number, MealRecord>();
  private nextId: number;

  constructor(seed: SeedData = EMPTY_SEED) {
    this.households = seed.households.map(household => ({ ...household, memberIds: [...household.memberIds] }));
    this.pantry = seed.pantry.map(item => ({ ...item }));
    seed.ingredients.forEach(entity => this.entities.set(entity.id, { ...entity }));
    seed.recipes.forEach(recipe => this.recipes.set(recipe.id, cloneRecipe(recipe)));
    seed.meals.forEach(meal => this.meals.set(meal.id, { ...meal }));

    const ids = [
      ...this.entities.keys(),
      ...this.recipes.keys(),
      ...this.meals.keys(),
    ];
    this.nextId = Math.max(0, ...ids) + 1;
  }

  async isMember(householdId: number, userId: number): Promise<boolean> {
    const household = this.households.find(h => h.id === householdId);
    return household ? household.memberIds.includes(userId) : false;
  }

  async lookupHouseholdCatalog(householdId: number): Promise<InventoryEntity[]> {
    return [...this.entities.values()]
      .filter(entity => entity.householdId === householdId)
      .sort(byName)
      .map(entity => ({ ...entity }));
  }

  async lookupAvailableIngredients(householdId: number): Promise<AvailableIngredient[]> {
    const seen = new Set<number>();
    const available: AvailableIngredient[] = [];

    for (const item of this.pantry) {
      if (item.householdId !== householdId || seen.has(item.ingredientId)) continue;

      const entity = this.entities.get(item.ingredientId);
      if (!entity) continue;

      seen.add(item.ingredientId);
      available.push({
        ingredientId: entity.id,
        name: entity.name,
        quantity: item.quantity,
        unit: item.unit,
        category: entity.category,
      });
    }

    return available;
  }

  async lookupRecentMeals(householdId: number, since: string, until: string): Promise<RecentMeal[]> {
    return [...this.meals.values()]
      .filter(meal => meal.householdId === householdId && meal.date >= since && meal.date <= until)
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.id - b.id))
      .map(meal => ({ name: meal.name, mealType: meal.mealType, date: meal.date }));
  }

  async lookupHouseholdRecipes(householdId: number): Promise<RecipeRecord[]> {
    return [...this.recipes.values()]
      .filter(recipe => recipe.householdId === householdId)
      .sort(byName)
      .map(cloneRecipe);
  }

  async getEntity(entityId: number): Promise<InventoryEntity | null> {
    const entity = this.entities.get(entityId);
    return entity ? { ...entity } : null;
  }

  async getMeal(mealId: number): Promise<MealRecord | null> {
    const meal = this.meals.get(mealId);
    return meal ? { ...meal } : null;
  }

  async getRecipe(recipeId: number): Promise<RecipeRecord | null> {
    const recipe = this.recipes.get(recipeId);
    return recipe ? cloneRecipe(recipe) : null;
  }

  async createEntity(entity: NewEntity): Promise<number> {
    const name = entity.name.trim();
    const key = name.toLowerCase();
    const exists = [...this.entities.values()].some(
      existing => existing.householdId === entity.householdId && existing.name.toLowerCase() === key
    );
    if (exists) {
      throw new DuplicateEntityError(entity.householdId, name);
    }

    const id = this.nextId++;
    this.entities.set(id, {
      id,
      householdId: entity.householdId,
      name,
      category: entity.category,
      unitOfMeasure: null,
      averagePrice: null,
    });
    return id;
  }

  async createRecipe(recipe: NewRecipe): Promise<number> {
    const id = this.nextId++;
    this.recipes.set(id, cloneRecipe({ ...recipe, id }));
    return id;
  }

  async createMeal(meal: NewMeal): Promise<number> {
    const id = this.nextId++;
    this.meals.set(id, { ...meal, id });
    return id;
  }
}

function cloneRecipe(recipe: RecipeRecord): RecipeRecord {
  return { ...recipe, ingredients: recipe.ingredients.map(line => ({ ...line })) };
}
