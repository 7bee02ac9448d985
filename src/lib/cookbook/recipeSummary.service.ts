/**
 * Recipe Summary Service
 *
 * Projects a resolved recipe into its public summary: total cook time and
 * the flattened ingredient list.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type { IngredientOrder } from './cookbook.config';
import type { CookbookRegistry } from './cookbookRegistry';
import type {
  IngredientFrequency,
  IngredientQuantity,
  RecipeSummary,
} from './cookbook.types';
import type { DependencyResolver } from './dependencyResolver';
import { checkedAdd, checkedMultiply } from './quantityMath';

/**
 * Build the summary for a recipe.
 *
 * Resolver failures (UNKNOWN_ITEM, CIRCULAR_DEPENDENCY) are rethrown as-is.
 *
 * @throws AppError NOT_FOUND | WRONG_TYPE | UNKNOWN_ITEM | CIRCULAR_DEPENDENCY | QUANTITY_OVERFLOW
 */
export function getRecipeSummary(args: {
  registry: CookbookRegistry;
  resolver: DependencyResolver;
  name: string;
  ingredientOrder?: IngredientOrder;
}): RecipeSummary {
  const { registry, resolver, name, ingredientOrder = 'insertion' } = args;

  const entry = registry.lookup(name);
  if (!entry) {
    throw new AppError(
      'NOT_FOUND',
      'a recipe with the corresponding name cannot be found',
      { name },
    );
  }
  if (entry.type !== 'recipe') {
    throw new AppError(
      'WRONG_TYPE',
      'the searched name is NOT a recipe name',
      { name },
    );
  }

  const frequency = resolver.resolve(entry.name, new Set());

  return {
    name: entry.name,
    cookTime: totalCookTime(registry, entry.name, frequency),
    ingredients: toIngredientList(frequency, ingredientOrder),
  };
}

/** Σ quantity × cook time, with cook times read from the registry */
function totalCookTime(
  registry: CookbookRegistry,
  recipeName: string,
  frequency: IngredientFrequency,
): number {
  const details = { recipe: recipeName };
  let total = 0;
  for (const [name, quantity] of frequency) {
    const entry = registry.lookup(name);
    if (entry?.type === 'ingredient') {
      const time = checkedMultiply(quantity, entry.cookTime, 'cook time', details);
      total = checkedAdd(total, time, 'cook time', details);
    }
  }
  return total;
}

function toIngredientList(
  frequency: IngredientFrequency,
  order: IngredientOrder,
): IngredientQuantity[] {
  const ingredients = Array.from(frequency, ([name, quantity]) => ({
    name,
    quantity,
  }));
  if (order === 'name') {
    ingredients.sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
  }
  return ingredients;
}
