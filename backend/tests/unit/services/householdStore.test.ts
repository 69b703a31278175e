import { describe, it, expect } from 'vitest';
import { DuplicateEntityError } from '../../../src/errors.js';
import { InMemoryHouseholdStore } from '../../../src/services/householdStore.js';
import { makeEntity, makeMeal, makeSeed } from '../../helpers/fixtures.js';

function createStore() {
  return new InMemoryHouseholdStore(makeSeed({
    ingredients: [
      makeEntity({ id: 1, name: 'tomato', category: 'produce' }),
      makeEntity({ id: 2, name: 'Basil', category: 'spices' }),
      makeEntity({ id: 3, name: 'anchovies', category: 'seafood' }),
      makeEntity({ id: 4, householdId: 2, name: 'eggs', category: 'dairy' }),
    ],
    pantry: [
      { householdId: 1, ingredientId: 1, quantity: 4, unit: 'piece' },
      { householdId: 1, ingredientId: 1, quantity: 200, unit: 'gram' },
      { householdId: 1, ingredientId: 3, quantity: 1, unit: 'can' },
      { householdId: 2, ingredientId: 4, quantity: 6, unit: 'piece' },
    ],
    meals: [
      makeMeal({ id: 10, name: 'Soup', date: '2026-10-01' }),
      makeMeal({ id: 11, name: 'Tacos', date: '2026-10-05', mealType: 'lunch' }),
      makeMeal({ id: 12, name: 'Curry', date: '2026-10-03' }),
      makeMeal({ id: 13, name: 'Stew', date: '2026-10-06' }),
      makeMeal({ id: 14, householdId: 2, name: 'Omelette', date: '2026-10-03' }),
    ],
  }));
}

describe('InMemoryHouseholdStore', () => {
  it('checks membership per household', async () => {
    const store = createStore();
    expect(await store.isMember(1, 1)).toBe(true);
    expect(await store.isMember(1, 3)).toBe(false);
    expect(await store.isMember(99, 1)).toBe(false);
  });

  it('lists the household catalog alphabetically, ignoring case', async () => {
    const catalog = await createStore().lookupHouseholdCatalog(1);
    expect(catalog.map(entity => entity.name)).toEqual(['anchovies', 'Basil', 'tomato']);
  });

  it('lists pantry items once per ingredient', async () => {
    const available = await createStore().lookupAvailableIngredients(1);
    expect(available).toEqual([
      { ingredientId: 1, name: 'tomato', quantity: 4, unit: 'piece', category: 'produce' },
      { ingredientId: 3, name: 'anchovies', quantity: 1, unit: 'can', category: 'seafood' },
    ]);
  });

  it('returns recent meals within an inclusive window, oldest first', async () => {
    const recent = await createStore().lookupRecentMeals(1, '2026-10-01', '2026-10-05');
    expect(recent).toEqual([
      { name: 'Soup', mealType: 'dinner', date: '2026-10-01' },
      { name: 'Curry', mealType: 'dinner', date: '2026-10-03' },
      { name: 'Tacos', mealType: 'lunch', date: '2026-10-05' },
    ]);
  });

  it('rejects a duplicate ingredient name regardless of case', async () => {
    const store = createStore();
    await expect(store.createEntity({ householdId: 1, name: ' TOMATO ', category: 'produce' }))
      .rejects.toThrow(DuplicateEntityError);
  });

  it('allows the same name in another household', async () => {
    const store = createStore();
    const id = await store.createEntity({ householdId: 2, name: 'Tomato', category: 'produce' });

    expect(id).toBe(15);
    expect(await store.getEntity(id)).toEqual({
      id: 15,
      householdId: 2,
      name: 'Tomato',
      category: 'produce',
      unitOfMeasure: null,
      averagePrice: null,
    });
  });

  it('returns copies that callers cannot use to mutate stored records', async () => {
    const store = createStore();
    const meal = await store.getMeal(10);
    if (meal) meal.name = 'Changed';

    expect((await store.getMeal(10))?.name).toBe('Soup');
  });
});
