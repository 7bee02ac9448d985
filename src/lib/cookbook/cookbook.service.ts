/**
 * Cookbook Service
 *
 * Owns the registry and its resolution cache for the lifetime of the
 * process. Every operation is synchronous, so a request runs to completion
 * before the next one touches the shared state: reads never overlap with
 * createEntry or clear.
 */

import { AppError } from '@/src/lib/errors/app-error';
import { getCookbookConfig, type CookbookConfig } from './cookbook.config';
import { CookbookRegistry, type CreateEntryResult } from './cookbookRegistry';
import type {
  CookbookEntry,
  RecipeSummary,
  ResolverStats,
} from './cookbook.types';
import { DependencyResolver } from './dependencyResolver';
import { normalizeRecipeName } from './nameNormalizer';
import { getRecipeSummary } from './recipeSummary.service';
import { ResolutionCache } from './resolutionCache';

export class CookbookService {
  private readonly cache = new ResolutionCache();
  private readonly registry: CookbookRegistry;
  private readonly resolver: DependencyResolver;

  constructor(private readonly config: CookbookConfig = getCookbookConfig()) {
    this.registry = new CookbookRegistry(this.cache);
    this.resolver = new DependencyResolver(this.registry, this.cache, {
      debugLog: config.debugLog,
    });
  }

  /**
   * @throws AppError INVALID_INPUT when nothing readable is left
   */
  parse(input: string): string {
    const displayName = normalizeRecipeName(input);
    if (displayName === null) {
      throw new AppError('INVALID_INPUT', 'Invalid recipe name', { input });
    }
    return displayName;
  }

  createEntry(input: unknown): CreateEntryResult {
    const result = this.registry.createEntry(input);
    if (this.config.debugLog) {
      console.log(`[cookbook] ${result.message} (${this.registry.size} entries)`);
    }
    return result;
  }

  lookup(name: string): CookbookEntry | null {
    return this.registry.lookup(name);
  }

  listEntries(): CookbookEntry[] {
    return this.registry.listEntries();
  }

  getSummary(name: string): RecipeSummary {
    return getRecipeSummary({
      registry: this.registry,
      resolver: this.resolver,
      name,
      ingredientOrder: this.config.ingredientOrder,
    });
  }

  clear(): { message: string } {
    this.registry.clear();
    if (this.config.debugLog) {
      console.log('[cookbook] cleared');
    }
    return { message: 'cookbook cleared' };
  }

  /** Number of memoized recipes */
  get cachedRecipeCount(): number {
    return this.cache.size;
  }

  get resolverStats(): ResolverStats {
    return this.resolver.stats;
  }
}

let instance: CookbookService | null = null;

/** Process-wide cookbook used by the API routes. */
export function getCookbookService(): CookbookService {
  if (!instance) {
    instance = new CookbookService();
  }
  return instance;
}

/** Only for tests – drop the shared instance so the next call starts empty. */
export function resetCookbookService(): void {
  instance = null;
}
