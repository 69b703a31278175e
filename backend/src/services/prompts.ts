import {
  CUISINE_TYPES,
  DIFFICULTY_LEVELS,
  INGREDIENT_CATEGORIES,
  MEAL_TYPES,
  UNITS_OF_MEASURE,
  type AvailableIngredient,
  type CuisineType,
  type DifficultyLevel,
  type MealType,
  type RecentMeal,
} from '../types.js';

const JSON_ONLY = 'note: Return ONLY valid JSON with no additional text or markdown';

const UNIT_CHOICES = UNITS_OF_MEASURE.join('|');
const CATEGORY_CHOICES = INGREDIENT_CATEGORIES.join('|');

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'None';
}

// ============================================================================
// Ingredient list
// ============================================================================

export function buildIngredientsPrompt(params: {
  mealName: string;
  servings: number;
  dietaryRestrictions: readonly string[];
}): string {
  return `You are a culinary expert. Generate a comprehensive ingredient list for "${params.mealName}".

Requirements:
- Servings: ${params.servings}
- Dietary restrictions: ${listOrNone(params.dietaryRestrictions)}
- Format: Return ONLY valid JSON with no additional text or markdown

JSON Schema:
{
  "ingredients": [
    {
      "name": "ingredient name (lowercase)",
      "quantity": number,
      "unit": "${UNIT_CHOICES}",
      "category": "${CATEGORY_CHOICES}",
      "notes": "preparation notes (optional)"
    }
  ]
}

Example:
{"ingredients": [{"name": "chicken breast", "quantity": 500, "unit": "gram", "category": "meat", "notes": "boneless, skinless"}]}

Generate ingredients for ${params.mealName}:

${JSON_ONLY}
`;
}

// ============================================================================
// Recipe
// ============================================================================

export function buildRecipePrompt(params: {
  mealName: string;
  servings: number;
  ingredientNames: readonly string[];
  difficulty: DifficultyLevel | null;
  cuisineType: CuisineType | null;
  maxPrepTimeMinutes: number | null;
  dietaryRestrictions: readonly string[];
  language: string;
}): string {
  const ingredientSection = params.ingredientNames.length > 0
    ? `Using these main ingredients:
${params.ingredientNames.join(', ')}

IMPORTANT: You may suggest additional ingredients needed to complete the recipe (like spices, oils, seasonings, etc.).
Mark user-provided ingredients with is_user_provided=true, and additional ingredients with is_user_provided=false.`
    : `The user has not provided any specific ingredients.

IMPORTANT: You must suggest ALL ingredients needed for this recipe.
Mark all ingredients with is_user_provided=false since they are all AI-suggested.`;

  return `You are a culinary expert. Create a detailed recipe for "${params.mealName}".

${ingredientSection}

Requirements:
- Servings: ${params.servings}
- Difficulty: ${params.difficulty ?? 'any'}
- Max prep time: ${params.maxPrepTimeMinutes ?? 'no limit'} minutes
- Cuisine type: ${params.cuisineType ?? 'any'}
- Dietary restrictions: ${listOrNone(params.dietaryRestrictions)}
- Language: ${params.language}
- Format: Return ONLY valid JSON with no additional text

JSON Schema:
{
  "name": "recipe name",
  "description": "brief description",
  "instructions": "detailed step-by-step instructions (use \\n for line breaks)",
  "prep_time_minutes": number,
  "cook_time_minutes": number,
  "difficulty": "${DIFFICULTY_LEVELS.join('|')}",
  "cuisine_type": "${CUISINE_TYPES.join('|')}",
  "tags": "comma,separated,tags",
  "calories_per_serving": number (estimate),
  "ingredients": [
    {
      "ingredient_name": "ingredient name",
      "quantity": "decimal number (e.g., 0.25, 1.5, 2)",
      "unit": "${UNIT_CHOICES}",
      "category": "${CATEGORY_CHOICES}",
      "notes": "preparation notes",
      "is_optional": false,
      "is_user_provided": true if from main ingredients list, false if additional
    }
  ]
}

Generate recipe:

${JSON_ONLY}
`;
}

// ============================================================================
// Meal plan
// ============================================================================

function formatMealHistory(recentMeals: readonly RecentMeal[]): string {
  if (recentMeals.length === 0) {
    return 'No past meal history available. Focus on creating a diverse, balanced meal plan.';
  }

  const lines = recentMeals.map(meal => `- ${meal.name} (${meal.mealType}, ${meal.date})`);
  return `Past Meals (last 30 days):
${lines.join('\n')}

IMPORTANT: Use this meal history to:
- Avoid repeating the same meals too frequently
- Maintain variety in meal types and cuisines
- Balance the meal plan with different protein sources and cooking styles`;
}

export function buildMealPlanPrompt(params: {
  days: number;
  mealsPerDay: number;
  availableIngredients: readonly AvailableIngredient[];
  recentMeals: readonly RecentMeal[];
  dietaryPreferences: readonly string[];
  useAvailableOnly: boolean;
  preferredMealTypes: readonly MealType[];
}): string {
  const mealTypes = params.preferredMealTypes.length > 0
    ? params.preferredMealTypes.join(', ')
    : 'breakfast, lunch, dinner';

  return `You are a meal planning expert. Create a ${params.days}-day meal plan with ${params.mealsPerDay} meals per day.

Available Ingredients:
${listOrNone(params.availableIngredients.map(item => item.name))}

${formatMealHistory(params.recentMeals)}

Requirements:
- Use available ingredients prioritized
- Dietary preferences: ${listOrNone(params.dietaryPreferences)}
- Strict constraint: ${params.useAvailableOnly ? 'Only use available ingredients' : 'Can suggest additional ingredients'}
- Preferred meal types: ${mealTypes}
- Number every day from 1 to ${params.days}; every day must have at least one meal
- Ensure variety and avoid repeating meals from the past 30 days when possible
- Format: Return ONLY valid JSON

JSON Schema:
{
  "meal_plan": [
    {
      "day": 1,
      "meal_type": "${MEAL_TYPES.join('|')}",
      "meal_name": "name",
      "description": "brief description",
      "ingredients_used": ["ingredient names from available list"],
      "additional_ingredients_needed": ["ingredient names not in available list"],
      "estimated_prep_time_minutes": minutes,
      "estimated_calories": number
    }
  ]
}

Generate meal plan:

${JSON_ONLY}
`;
}
