/**
 * Cookbook - Public API
 *
 * Registry of ingredients and recipes with memoized recipe expansion.
 */

export type {
  EntryType,
  Ingredient,
  RequiredItem,
  Recipe,
  CookbookEntry,
  IngredientFrequency,
  IngredientQuantity,
  RecipeSummary,
  ResolverStats,
} from './cookbook.types';

export type { CookbookConfig, IngredientOrder } from './cookbook.config';
export { getCookbookConfig, resetCookbookConfigCache } from './cookbook.config';

export {
  entryTypeSchema,
  entryEnvelopeSchema,
  ingredientPayloadSchema,
  recipePayloadSchema,
  parseRequestSchema,
  firstIssueMessage,
} from './cookbook.schemas';

export { normalizeRecipeName } from './nameNormalizer';
export { CookbookRegistry, type CreateEntryResult } from './cookbookRegistry';
export { DependencyResolver } from './dependencyResolver';
export { ResolutionCache } from './resolutionCache';
export { getRecipeSummary } from './recipeSummary.service';
export {
  CookbookService,
  getCookbookService,
  resetCookbookService,
} from './cookbook.service';
export {
  readJsonBody,
  toErrorResponse,
  toSuccessResponse,
} from './cookbook.http';
