import { Router } from 'express';
import { requireHouseholdMember, readUserId } from '../middleware/householdAccess.js';
import type { ApprovalService } from '../services/approvalService.js';
import type { HouseholdStore } from '../services/householdStore.js';
import type { MealAssistantService } from '../services/mealAssistantService.js';
import {
  parseGenerateIngredientsRequest,
  parseGenerateMealPlanRequest,
  parseGenerateRecipeRequest,
  parseRecipeDraft,
  parseSaveMealPlanRequest,
} from './requestParsers.js';

export interface AiRouterDeps {
  assistant: MealAssistantService;
  approval: ApprovalService;
  store: HouseholdStore;
}

export function createAiRouter({ assistant, approval, store }: AiRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/ai/generate-ingredients
   * Suggest an ingredient list for a meal, matched against the household catalog.
   *
   * Body: { householdId, mealName, servings?, dietaryRestrictions? }
   */
  router.post('/generate-ingredients', async (req, res, next) => {
    try {
      const request = parseGenerateIngredientsRequest(req.body);
      await requireHouseholdMember(store, req, request.householdId);

      const data = await assistant.generateIngredients(request);
      res.json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/ai/generate-recipe
   * Body: { householdId, mealName, servings?, ingredientIds?, ingredientNames?,
   *         difficulty?, cuisineType?, maxPrepTimeMinutes?, dietaryRestrictions?, language? }
   */
  router.post('/generate-recipe', async (req, res, next) => {
    try {
      const request = parseGenerateRecipeRequest(req.body);
      await requireHouseholdMember(store, req, request.householdId);

      const data = await assistant.generateRecipe(request);
      res.json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/ai/generate-meal-plan
   * Body: { householdId, days?, mealsPerDay?, startDate?, dietaryPreferences?,
   *         useAvailableOnly?, preferredMealTypes? }
   */
  router.post('/generate-meal-plan', async (req, res, next) => {
    try {
      const request = parseGenerateMealPlanRequest(req.body);
      await requireHouseholdMember(store, req, request.householdId);

      const data = await assistant.generateMealPlan(request);
      res.json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  // Save endpoints check membership inside ApprovalService.

  router.post('/save-recipe', async (req, res, next) => {
    try {
      const draft = parseRecipeDraft(req.body);
      const data = await approval.saveGeneratedRecipe(readUserId(req), draft);
      res.status(201).json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  router.post('/save-meal-plan', async (req, res, next) => {
    try {
      const request = parseSaveMealPlanRequest(req.body);
      const data = await approval.saveMealPlan(readUserId(req), request);
      res.status(201).json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
