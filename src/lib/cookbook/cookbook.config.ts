/**
 * Cookbook config – loaded from config file and env.
 * Edit config/cookbook.json or set COOKBOOK_* env vars.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

export type IngredientOrder = 'insertion' | 'name';

export type CookbookConfig = {
  /** 'insertion': order in which the resolution first met each ingredient */
  ingredientOrder: IngredientOrder;
  debugLog: boolean;
};

const DEFAULTS: CookbookConfig = {
  ingredientOrder: 'insertion',
  debugLog: false,
};

const configFileSchema = z.object({
  ingredientOrder: z.enum(['insertion', 'name']).optional().catch(undefined),
  debugLog: z.boolean().optional().catch(undefined),
});

let cached: CookbookConfig | null = null;

function fromFile(configPath: string): CookbookConfig {
  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(
        `[cookbook] ignoring ${configPath}: ${parsed.error.issues[0]?.message ?? 'invalid config'}`,
      );
      return { ...DEFAULTS };
    }
    return {
      ingredientOrder:
        parsed.data.ingredientOrder ?? DEFAULTS.ingredientOrder,
      debugLog: parsed.data.debugLog ?? DEFAULTS.debugLog,
    };
  } catch (error) {
    console.warn(
      `[cookbook] could not read ${configPath}:`,
      error instanceof Error ? error.message : String(error),
    );
    return { ...DEFAULTS };
  }
}

function fromEnv(): CookbookConfig {
  const order = z
    .enum(['insertion', 'name'])
    .safeParse(process.env.COOKBOOK_INGREDIENT_ORDER);
  return {
    ingredientOrder: order.success ? order.data : DEFAULTS.ingredientOrder,
    debugLog: process.env.COOKBOOK_DEBUG_LOG === 'true',
  };
}

function loadConfig(): CookbookConfig {
  if (cached) return cached;
  const configPath =
    process.env.COOKBOOK_CONFIG_PATH ??
    join(process.cwd(), 'config', 'cookbook.json');
  cached = existsSync(configPath) ? fromFile(configPath) : fromEnv();
  return cached;
}

/** Get cookbook config (file + env). Reset cache for tests with resetCookbookConfigCache(). */
export function getCookbookConfig(): CookbookConfig {
  return loadConfig();
}

/** Only for tests – reset in-memory cache so config is re-read. */
export function resetCookbookConfigCache(): void {
  cached = null;
}
