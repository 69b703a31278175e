// Shared types for the backend API

// ============================================================================
// Enumerations
// ============================================================================

export const INGREDIENT_CATEGORIES = [
  'produce', 'meat', 'seafood', 'dairy', 'bakery', 'pantry',
  'spices', 'beverages', 'frozen', 'snacks', 'other',
] as const;
export type IngredientCategory = typeof INGREDIENT_CATEGORIES[number];

export const UNITS_OF_MEASURE = [
  'gram', 'kilogram', 'ounce', 'pound',
  'milliliter', 'liter', 'teaspoon', 'tablespoon', 'cup', 'pint', 'quart', 'gallon',
  'piece', 'slice', 'clove', 'package', 'can', 'bunch',
  'to_taste', 'as_needed',
] as const;
export type UnitOfMeasure = typeof UNITS_OF_MEASURE[number];

export const MEAL_TYPES = ['breakfast', 'lunch', 'dinner', 'snack'] as const;
export type MealType = typeof MEAL_TYPES[number];

export const DIFFICULTY_LEVELS = ['easy', 'medium', 'hard'] as const;
export type DifficultyLevel = typeof DIFFICULTY_LEVELS[number];

export const CUISINE_TYPES = [
  'italian', 'chinese', 'mexican', 'indian', 'japanese', 'american', 'french',
  'thai', 'mediterranean', 'middle_eastern', 'korean', 'vietnamese', 'other',
] as const;
export type CuisineType = typeof CUISINE_TYPES[number];

// ============================================================================
// Household records (owned by external collaborators)
// ============================================================================

export interface InventoryEntity {
  id: number;
  householdId: number;
  name: string;
  category: IngredientCategory;
  unitOfMeasure: UnitOfMeasure | null;
  averagePrice: number | null;
}

export interface AvailableIngredient {
  ingredientId: number | null;
  name: string;
  quantity: number;
  unit: UnitOfMeasure;
  category: IngredientCategory;
}

export interface RecentMeal {
  name: string;
  mealType: MealType;
  date: string; // YYYY-MM-DD
}

export interface RecipeLine {
  ingredientId: number;
  quantity: number;
  unit: UnitOfMeasure;
  notes: string | null;
  isOptional: boolean;
}

export interface RecipeRecord {
  id: number;
  householdId: number;
  name: string;
  description: string | null;
  instructions: string;
  servings: number | null;
  prepTimeMinutes: number | null;
  cookTimeMinutes: number | null;
  difficulty: DifficultyLevel | null;
  cuisineType: CuisineType | null;
  tags: string | null;
  caloriesPerServing: number | null;
  ingredients: RecipeLine[];
}

export interface MealRecord {
  id: number;
  householdId: number;
  name: string;
  mealType: MealType;
  date: string; // YYYY-MM-DD
  servings: number;
  recipeId: number | null;
  notes: string | null;
  assignedToId: number | null;
}

// ============================================================================
// Generated content (transient, returned for user review)
// ============================================================================

export interface GeneratedIngredient {
  name: string;
  quantity: number;
  unit: UnitOfMeasure;
  category: IngredientCategory;
  notes: string | null;
  matchedEntityId?: number;
  isNew: boolean;
  confidence: number;
}

export interface RecipeIngredientCandidate extends GeneratedIngredient {
  isOptional: boolean;
  isUserSupplied: boolean;
}

export interface GeneratedRecipe {
  householdId: number;
  name: string;
  description: string | null;
  instructions: string;
  prepTimeMinutes: number | null;
  cookTimeMinutes: number | null;
  servings: number;
  difficulty: DifficultyLevel | null;
  cuisineType: CuisineType | null;
  tags: string | null;
  caloriesPerServing: number | null;
  ingredients: RecipeIngredientCandidate[];
  aiGenerated: true;
  requiresUserApproval: true;
}

export interface GeneratedMealPlanEntry {
  day: number;
  date: string; // YYYY-MM-DD
  mealType: MealType;
  name: string;
  description: string | null;
  ingredientsUsed: string[];
  additionalIngredientsNeeded: string[];
  matchedEntityIds: number[];
  requiresShopping: boolean;
  estimatedPrepTimeMinutes: number | null;
  estimatedCalories: number | null;
}

export interface GenerateIngredientsResult {
  mealName: string;
  householdId: number;
  ingredients: GeneratedIngredient[];
  totalIngredients: number;
  newIngredientsCount: number;
  matchedIngredientsCount: number;
}

export interface GenerateMealPlanResult {
  householdId: number;
  startDate: string;
  endDate: string;
  totalDays: number;
  entries: GeneratedMealPlanEntry[];
  totalMeals: number;
  availableIngredientsCount: number;
  mealsWithAllIngredients: number;
  mealsRequiringShopping: number;
  aiGenerated: true;
  requiresUserApproval: true;
}

// ============================================================================
// Generation requests
// ============================================================================

export interface GenerateIngredientsRequest {
  householdId: number;
  mealName: string;
  servings: number;
  dietaryRestrictions: string[];
}

export interface GenerateRecipeRequest {
  householdId: number;
  mealName: string;
  servings: number;
  ingredientIds: number[];
  ingredientNames: string[];
  difficulty: DifficultyLevel | null;
  cuisineType: CuisineType | null;
  maxPrepTimeMinutes: number | null;
  dietaryRestrictions: string[];
  language: string;
}

export interface GenerateMealPlanRequest {
  householdId: number;
  days: number;
  mealsPerDay: number;
  startDate: string | null;
  dietaryPreferences: string[];
  useAvailableOnly: boolean;
  preferredMealTypes: MealType[];
}

// ============================================================================
// Grocery aggregation
// ============================================================================

export interface AggregatedLine {
  ingredientId: number;
  displayName: string;
  unit: UnitOfMeasure;
  quantity: number;
  category: IngredientCategory;
  notes: string | null;
  estimatedPrice: number | null;
}

export interface AggregateGroceryListRequest {
  householdId: number;
  mealIds: number[];
}

export interface AggregatedGroceryList {
  householdId: number;
  startDate: string | null;
  endDate: string | null;
  lines: AggregatedLine[];
}

// ============================================================================
// Approval (save) step
// ============================================================================

export interface RecipeDraftIngredient {
  ingredientId: number | null;
  ingredientName: string | null;
  ingredientCategory: IngredientCategory | null;
  quantity: number;
  unit: UnitOfMeasure;
  notes: string | null;
  isOptional: boolean;
}

export interface RecipeDraft {
  householdId: number;
  name: string;
  description: string | null;
  instructions: string;
  servings: number;
  prepTimeMinutes: number | null;
  cookTimeMinutes: number | null;
  difficulty: DifficultyLevel | null;
  cuisineType: CuisineType | null;
  tags: string | null;
  caloriesPerServing: number | null;
  ingredients: RecipeDraftIngredient[];
}

export interface MealDraft {
  name: string;
  mealType: MealType;
  date: string;
  description: string | null;
  servings: number;
  recipeId: number | null;
  assignedToId: number | null;
  additionalIngredientsNeeded: string[];
}

export interface SaveMealPlanRequest {
  householdId: number;
  meals: MealDraft[];
  autoCreateIngredients: boolean;
  autoMatchRecipes: boolean;
}

export interface SaveRecipeResult {
  recipeId: number;
  createdIngredients: string[];
}

export interface RecipeMatchDetail {
  mealName: string;
  recipeId: number;
  recipeName: string;
}

export interface SaveMealPlanResult {
  mealIds: number[];
  ingredientsCreated: string[];
  recipesMatched: RecipeMatchDetail[];
}
