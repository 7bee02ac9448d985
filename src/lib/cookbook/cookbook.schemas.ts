/**
 * Cookbook Schemas
 *
 * Zod validation schemas for cookbook requests.
 */

import { z } from 'zod';
import type { EntryType } from './cookbook.types';

const ENTRY_TYPES = [
  'ingredient',
  'recipe',
] as const satisfies readonly EntryType[];

export const entryTypeSchema = z.enum(ENTRY_TYPES);

/**
 * Fields shared by every entry. `type` stays unknown here so that the name
 * can be checked for uniqueness before the type is looked at.
 */
export const entryEnvelopeSchema = z.object({
  name: z
    .string({
      required_error: 'name is required',
      invalid_type_error: 'name must be a string',
    })
    .min(1, 'name must not be empty'),
  type: z.unknown(),
});

export const ingredientPayloadSchema = z.object({
  cookTime: z
    .number({
      required_error: 'cookTime is required',
      invalid_type_error: 'cookTime must be a number',
    })
    .int('cookTime must be an integer')
    .min(0, 'invalid cook time')
    .safe('cookTime is too large'),
});

/**
 * Quantities are only type-checked here; the sign is checked while walking
 * the items so that a repeated name earlier in the list is reported first.
 */
export const requiredItemSchema = z.object({
  name: z
    .string({
      required_error: 'required item name is required',
      invalid_type_error: 'required item name must be a string',
    })
    .min(1, 'required item name must not be empty'),
  quantity: z
    .number({
      required_error: 'quantity is required',
      invalid_type_error: 'quantity must be a number',
    })
    .int('quantity must be an integer')
    .max(Number.MAX_SAFE_INTEGER, 'quantity is too large'),
});

export const recipePayloadSchema = z.object({
  requiredItems: z.array(requiredItemSchema, {
    required_error: 'requiredItems is required',
    invalid_type_error: 'requiredItems must be a list',
  }),
});

export const parseRequestSchema = z.object({
  input: z.string({
    required_error: 'input is required',
    invalid_type_error: 'input must be a string',
  }),
});

/** First issue message, falling back to zod's aggregated message */
export function firstIssueMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? error.message;
}
