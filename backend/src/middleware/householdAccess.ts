import type { Request } from 'express';
import { UnauthorizedError } from '../errors.js';
import type { HouseholdStore } from '../services/householdStore.js';

/**
 * Caller identity comes from the X-User-Id header set by the auth layer
 * in front of this service.
 */
export function readUserId(req: Request): number {
  const raw = req.get('x-user-id');
  const userId = raw ? Number(raw) : Number.NaN;
  if (!Number.isInteger(userId) || userId <= 0) {
    throw new UnauthorizedError('Missing or invalid X-User-Id header');
  }
  return userId;
}

export async function requireHouseholdMember(
  store: HouseholdStore,
  req: Request,
  householdId: number
): Promise<number> {
  const userId = readUserId(req);
  if (!(await store.isMember(householdId, userId))) {
    throw new UnauthorizedError();
  }
  return userId;
}
