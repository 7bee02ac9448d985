/**
 * Cookbook Registry
 *
 * In-memory store of ingredients and recipes keyed by name. Owns the
 * resolution cache's lifetime: any change to the registry drops it.
 */

import { AppError } from '@/src/lib/errors/app-error';
import {
  entryEnvelopeSchema,
  entryTypeSchema,
  firstIssueMessage,
  ingredientPayloadSchema,
  recipePayloadSchema,
} from './cookbook.schemas';
import type {
  CookbookEntry,
  Ingredient,
  Recipe,
  RequiredItem,
} from './cookbook.types';
import type { ResolutionCache } from './resolutionCache';

export type CreateEntryResult = {
  message: string;
};

export class CookbookRegistry {
  private readonly entries = new Map<string, CookbookEntry>();

  constructor(private readonly cache: ResolutionCache) {}

  /**
   * Validate and store a new entry.
   *
   * Required item names are not checked against the registry here; a missing
   * reference only fails when a summary is requested.
   *
   * @throws AppError INVALID_FIELD | DUPLICATE_NAME | INVALID_TYPE | DUPLICATE_ITEM
   */
  createEntry(input: unknown): CreateEntryResult {
    const envelope = entryEnvelopeSchema.safeParse(input);
    if (!envelope.success) {
      throw new AppError('INVALID_FIELD', firstIssueMessage(envelope.error));
    }

    const { name, type } = envelope.data;
    if (this.entries.has(name)) {
      throw new AppError('DUPLICATE_NAME', 'name of the entry must be unique', {
        name,
      });
    }

    const entryType = entryTypeSchema.safeParse(type);
    if (!entryType.success) {
      throw new AppError('INVALID_TYPE', 'invalid type', { name });
    }

    const entry =
      entryType.data === 'ingredient'
        ? buildIngredient(name, input)
        : buildRecipe(name, input);

    this.entries.set(name, entry);
    this.cache.clear();

    return {
      message:
        entry.type === 'ingredient' ? 'ingredient added' : 'recipe added',
    };
  }

  lookup(name: string): CookbookEntry | null {
    return this.entries.get(name) ?? null;
  }

  /** All entries in insertion order */
  listEntries(): CookbookEntry[] {
    return Array.from(this.entries.values());
  }

  /** Empties the registry and every cached resolution in one step. */
  clear(): void {
    this.entries.clear();
    this.cache.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

function buildIngredient(name: string, input: unknown): Ingredient {
  const payload = ingredientPayloadSchema.safeParse(input);
  if (!payload.success) {
    throw new AppError('INVALID_FIELD', firstIssueMessage(payload.error), {
      name,
    });
  }
  return { type: 'ingredient', name, cookTime: payload.data.cookTime };
}

function buildRecipe(name: string, input: unknown): Recipe {
  const payload = recipePayloadSchema.safeParse(input);
  if (!payload.success) {
    throw new AppError('INVALID_FIELD', firstIssueMessage(payload.error), {
      name,
    });
  }

  const seen = new Set<string>();
  const requiredItems: RequiredItem[] = [];
  for (const item of payload.data.requiredItems) {
    if (seen.has(item.name)) {
      throw new AppError(
        'DUPLICATE_ITEM',
        'can only have one element per name',
        { name, item: item.name },
      );
    }
    seen.add(item.name);

    if (item.quantity < 0) {
      throw new AppError('INVALID_FIELD', 'invalid quantity', {
        name,
        item: item.name,
      });
    }
    requiredItems.push({ name: item.name, quantity: item.quantity });
  }

  return { type: 'recipe', name, requiredItems };
}
