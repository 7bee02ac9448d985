/**
 * Dependency Resolver
 *
 * Expands a recipe into the base ingredients needed for one unit of it.
 * Depth-first over the registry with an explicit frame stack, multiplying
 * quantities along each edge, so nesting depth is not bounded by the call
 * stack. Completed recipes are memoized in the shared ResolutionCache; cycles
 * are detected against the names on the current path only, so a recipe
 * reached twice through different branches is not mistaken for a cycle.
 */

import { AppError } from '@/src/lib/errors/app-error';
import type { CookbookRegistry } from './cookbookRegistry';
import type {
  IngredientFrequency,
  Recipe,
  ResolverStats,
} from './cookbook.types';
import { checkedAdd, checkedMultiply } from './quantityMath';
import type { ResolutionCache } from './resolutionCache';

export type DependencyResolverOptions = {
  debugLog?: boolean;
};

/** A recipe being expanded; `next` is the index of its next required item. */
type Frame = {
  recipe: Recipe;
  next: number;
  frequency: Map<string, number>;
};

export class DependencyResolver {
  private readonly debugLog: boolean;
  private cacheHits = 0;
  private cacheMisses = 0;

  constructor(
    private readonly registry: CookbookRegistry,
    private readonly cache: ResolutionCache,
    options: DependencyResolverOptions = {},
  ) {
    this.debugLog = options.debugLog ?? false;
  }

  /**
   * Resolve a recipe to ingredient name → total quantity.
   *
   * `inProgress` holds the recipes currently being expanded above this call.
   * Nothing is cached for a recipe whose resolution fails.
   *
   * @throws AppError UNKNOWN_ITEM | CIRCULAR_DEPENDENCY | QUANTITY_OVERFLOW | NOT_FOUND | WRONG_TYPE
   */
  resolve(
    recipeName: string,
    inProgress: Set<string> = new Set(),
  ): IngredientFrequency {
    const cached = this.cache.get(recipeName);
    if (cached) {
      this.cacheHits++;
      return cached;
    }

    if (inProgress.has(recipeName)) {
      throw circularDependency(recipeName, inProgress);
    }

    const entry = this.registry.lookup(recipeName);
    if (!entry) {
      throw new AppError('NOT_FOUND', `no entry named "${recipeName}"`, {
        name: recipeName,
      });
    }
    if (entry.type !== 'recipe') {
      throw new AppError('WRONG_TYPE', `"${recipeName}" is not a recipe`, {
        name: recipeName,
      });
    }

    const stack: Frame[] = [this.enter(entry, inProgress)];
    try {
      for (;;) {
        const frame = stack[stack.length - 1];

        if (frame.next >= frame.recipe.requiredItems.length) {
          stack.pop();
          this.complete(frame, inProgress);
          if (stack.length === 0) return frame.frequency;
          const parent = stack[stack.length - 1];
          mergeChild(parent, frame.frequency);
          parent.next++;
          continue;
        }

        const item = frame.recipe.requiredItems[frame.next];
        const dependency = this.registry.lookup(item.name);
        if (!dependency) {
          throw new AppError(
            'UNKNOWN_ITEM',
            `required item "${item.name}" does not exist`,
            { recipe: frame.recipe.name, item: item.name },
          );
        }

        if (dependency.type === 'ingredient') {
          addQuantity(frame, dependency.name, item.quantity);
          frame.next++;
          continue;
        }

        const cachedChild = this.cache.get(dependency.name);
        if (cachedChild) {
          this.cacheHits++;
          mergeChild(frame, cachedChild);
          frame.next++;
          continue;
        }

        if (inProgress.has(dependency.name)) {
          throw circularDependency(dependency.name, inProgress);
        }
        stack.push(this.enter(dependency, inProgress));
      }
    } finally {
      // only left non-empty when resolution failed
      for (const frame of stack) {
        inProgress.delete(frame.recipe.name);
      }
    }
  }

  get stats(): ResolverStats {
    return { cacheHits: this.cacheHits, cacheMisses: this.cacheMisses };
  }

  private enter(recipe: Recipe, inProgress: Set<string>): Frame {
    this.cacheMisses++;
    inProgress.add(recipe.name);
    return { recipe, next: 0, frequency: new Map() };
  }

  private complete(frame: Frame, inProgress: Set<string>): void {
    this.cache.set(frame.recipe.name, frame.frequency);
    inProgress.delete(frame.recipe.name);
    if (this.debugLog) {
      console.log(
        `[cookbook] resolved "${frame.recipe.name}" into ${frame.frequency.size} ingredient(s)`,
      );
    }
  }
}

function circularDependency(
  recipeName: string,
  inProgress: Set<string>,
): AppError {
  return new AppError(
    'CIRCULAR_DEPENDENCY',
    `recipe "${recipeName}" depends on itself`,
    { recipe: recipeName, path: [...inProgress, recipeName] },
  );
}

/** Add `quantity × subQuantity` for every ingredient of a resolved child. */
function mergeChild(parent: Frame, child: IngredientFrequency): void {
  const item = parent.recipe.requiredItems[parent.next];
  for (const [ingredient, subQuantity] of child) {
    const quantity = checkedMultiply(
      item.quantity,
      subQuantity,
      `quantity of "${ingredient}"`,
      { recipe: parent.recipe.name, item: item.name, ingredient },
    );
    addQuantity(parent, ingredient, quantity);
  }
}

function addQuantity(frame: Frame, ingredient: string, quantity: number): void {
  const total = checkedAdd(
    frame.frequency.get(ingredient) ?? 0,
    quantity,
    `quantity of "${ingredient}"`,
    { recipe: frame.recipe.name, ingredient },
  );
  frame.frequency.set(ingredient, total);
}
