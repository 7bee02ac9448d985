/**
 * Memo of fully resolved recipes: recipe name → ingredient frequency.
 *
 * Only successful resolutions are stored. Entries are never updated in place;
 * the whole cache is dropped whenever the registry changes.
 */

import type { IngredientFrequency } from './cookbook.types';

export class ResolutionCache {
  private readonly resolved = new Map<string, IngredientFrequency>();

  get(recipeName: string): IngredientFrequency | undefined {
    return this.resolved.get(recipeName);
  }

  has(recipeName: string): boolean {
    return this.resolved.has(recipeName);
  }

  set(recipeName: string, frequency: IngredientFrequency): void {
    this.resolved.set(recipeName, frequency);
  }

  clear(): void {
    this.resolved.clear();
  }

  get size(): number {
    return this.resolved.size;
  }
}
