/**
 * Unit tests for cookbook config loading (file, env, defaults).
 */

import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getCookbookConfig, resetCookbookConfigCache } from './cookbook.config';

const ENV_KEYS = [
  'COOKBOOK_CONFIG_PATH',
  'COOKBOOK_INGREDIENT_ORDER',
  'COOKBOOK_DEBUG_LOG',
] as const;

describe('getCookbookConfig', () => {
  let dir: string;
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cookbook-config-'));
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    // point at a file that does not exist unless a test writes it
    process.env.COOKBOOK_CONFIG_PATH = join(dir, 'cookbook.json');
    resetCookbookConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    rmSync(dir, { recursive: true, force: true });
    resetCookbookConfigCache();
  });

  it('uses defaults without file or env', () => {
    assert.deepStrictEqual(getCookbookConfig(), {
      ingredientOrder: 'insertion',
      debugLog: false,
    });
  });

  it('reads env vars when there is no config file', () => {
    process.env.COOKBOOK_INGREDIENT_ORDER = 'name';
    process.env.COOKBOOK_DEBUG_LOG = 'true';
    assert.deepStrictEqual(getCookbookConfig(), {
      ingredientOrder: 'name',
      debugLog: true,
    });
  });

  it('ignores an unknown ingredient order from env', () => {
    process.env.COOKBOOK_INGREDIENT_ORDER = 'random';
    assert.strictEqual(getCookbookConfig().ingredientOrder, 'insertion');
  });

  it('prefers the config file over env', () => {
    writeFileSync(
      join(dir, 'cookbook.json'),
      JSON.stringify({ ingredientOrder: 'name' }),
    );
    process.env.COOKBOOK_DEBUG_LOG = 'true';
    assert.deepStrictEqual(getCookbookConfig(), {
      ingredientOrder: 'name',
      debugLog: false,
    });
  });

  it('falls back per field on invalid file values', () => {
    writeFileSync(
      join(dir, 'cookbook.json'),
      JSON.stringify({ ingredientOrder: 'random', debugLog: true }),
    );
    assert.deepStrictEqual(getCookbookConfig(), {
      ingredientOrder: 'insertion',
      debugLog: true,
    });
  });

  it('falls back to defaults on unreadable JSON', () => {
    writeFileSync(join(dir, 'cookbook.json'), '{ not json');
    assert.deepStrictEqual(getCookbookConfig(), {
      ingredientOrder: 'insertion',
      debugLog: false,
    });
  });

  it('caches until reset', () => {
    const first = getCookbookConfig();
    process.env.COOKBOOK_INGREDIENT_ORDER = 'name';
    assert.strictEqual(getCookbookConfig(), first);
    resetCookbookConfigCache();
    assert.strictEqual(getCookbookConfig().ingredientOrder, 'name');
  });
});
