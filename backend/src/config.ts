export const DEFAULT_INGREDIENT_MATCH_THRESHOLD = 0.85;
export const DEFAULT_RECIPE_MATCH_THRESHOLD = 0.85;

export interface GeminiConfig {
  apiKey: string;
  model: string;
  mealPlanModel: string;
  maxOutputTokens: number;
  timeoutMs: number;
}

export interface MatchingConfig {
  ingredientThreshold: number;
  recipeThreshold: number;
}

export interface AppConfig {
  gemini: GeminiConfig;
  matching: MatchingConfig;
  aiRateLimitPerMinute: number;
  port: number;
  nodeEnv: string;
  seedDataPath: string | null;
}

type Env = Record<string, string | undefined>;

/**
 * Build the application config from environment variables.
 * Reading happens once here; everything downstream receives the returned value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    gemini: {
      apiKey: env.GEMINI_API_KEY?.trim() ?? '',
      model: env.GEMINI_MODEL || 'gemini-2.0-flash-lite',
      mealPlanModel: env.GEMINI_MEAL_PLAN_MODEL || 'gemini-2.0-flash',
      maxOutputTokens: readInteger(env, 'GEMINI_MAX_TOKENS', 2048),
      timeoutMs: readInteger(env, 'GEMINI_TIMEOUT_MS', 30_000),
    },
    matching: {
      ingredientThreshold: readRatio(env, 'INGREDIENT_MATCH_THRESHOLD', DEFAULT_INGREDIENT_MATCH_THRESHOLD),
      recipeThreshold: readRatio(env, 'RECIPE_MATCH_THRESHOLD', DEFAULT_RECIPE_MATCH_THRESHOLD),
    },
    aiRateLimitPerMinute: readInteger(env, 'AI_RATE_LIMIT_PER_MINUTE', 10),
    port: readInteger(env, 'PORT', 3001),
    nodeEnv: env.NODE_ENV || 'development',
    seedDataPath: env.SEED_DATA_PATH || null,
  };
}

function readInteger(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readRatio(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new Error(`${key} must be a number in (0, 1], got "${raw}"`);
  }
  return value;
}
