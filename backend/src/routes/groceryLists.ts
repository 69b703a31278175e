import { Router } from 'express';
import { requireHouseholdMember } from '../middleware/householdAccess.js';
import { aggregateGroceryList } from '../services/groceryAggregation.js';
import type { HouseholdStore } from '../services/householdStore.js';
import { parseAggregateRequest } from './requestParsers.js';

export function createGroceryListRouter(store: HouseholdStore): Router {
  const router = Router();

  /**
   * POST /api/grocery-lists/aggregate
   * Consolidate the ingredients of planned meals into one shopping list.
   *
   * Body: { householdId, mealIds: number[] }
   */
  router.post('/aggregate', async (req, res, next) => {
    try {
      const request = parseAggregateRequest(req.body);
      await requireHouseholdMember(store, req, request.householdId);

      const data = await aggregateGroceryList(store, request);
      res.json({ success: true, data });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
