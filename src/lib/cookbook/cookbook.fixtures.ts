/**
 * Shared test helpers for the cookbook modules.
 */

import assert from 'node:assert';
import { AppError, type AppErrorCode } from '@/src/lib/errors/app-error';
import { CookbookRegistry } from './cookbookRegistry';
import { ResolutionCache } from './resolutionCache';

export function createRegistry(): {
  registry: CookbookRegistry;
  cache: ResolutionCache;
} {
  const cache = new ResolutionCache();
  return { registry: new CookbookRegistry(cache), cache };
}

export function addIngredient(
  registry: CookbookRegistry,
  name: string,
  cookTime: number,
): void {
  registry.createEntry({ type: 'ingredient', name, cookTime });
}

export function addRecipe(
  registry: CookbookRegistry,
  name: string,
  requiredItems: Array<[string, number]>,
): void {
  registry.createEntry({
    type: 'recipe',
    name,
    requiredItems: requiredItems.map(([itemName, quantity]) => ({
      name: itemName,
      quantity,
    })),
  });
}

/** egg(5), flour(2), batter = 2 egg + 1 flour, pancake = 3 batter */
export function addPancakeRecipes(registry: CookbookRegistry): void {
  addIngredient(registry, 'egg', 5);
  addIngredient(registry, 'flour', 2);
  addRecipe(registry, 'batter', [
    ['egg', 2],
    ['flour', 1],
  ]);
  addRecipe(registry, 'pancake', [['batter', 3]]);
}

/** Assert that fn throws an AppError with the given code; returns it. */
export function expectAppError(fn: () => unknown, code: AppErrorCode): AppError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  assert.ok(caught instanceof AppError, 'expected an AppError to be thrown');
  assert.strictEqual(caught.code, code);
  return caught;
}
