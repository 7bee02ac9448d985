/**
 * Unit tests for the process-wide cookbook service.
 */

import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert';
import {
  CookbookService,
  getCookbookService,
  resetCookbookService,
} from './cookbook.service';
import { expectAppError } from './cookbook.fixtures';

function createService(): CookbookService {
  return new CookbookService({ ingredientOrder: 'insertion', debugLog: false });
}

function addPancakes(service: CookbookService): void {
  service.createEntry({ type: 'ingredient', name: 'egg', cookTime: 5 });
  service.createEntry({ type: 'ingredient', name: 'flour', cookTime: 2 });
  service.createEntry({
    type: 'recipe',
    name: 'batter',
    requiredItems: [
      { name: 'egg', quantity: 2 },
      { name: 'flour', quantity: 1 },
    ],
  });
  service.createEntry({
    type: 'recipe',
    name: 'pancake',
    requiredItems: [{ name: 'batter', quantity: 3 }],
  });
}

describe('CookbookService', () => {
  afterEach(() => {
    resetCookbookService();
  });

  it('parses handwritten names', () => {
    const service = createService();
    assert.strictEqual(service.parse('Riz@z RISO00tto!'), 'Rizz Risotto');
    const error = expectAppError(() => service.parse('!!!'), 'INVALID_INPUT');
    assert.strictEqual(error.safeMessage, 'Invalid recipe name');
  });

  it('summarizes the pancake example', () => {
    const service = createService();
    addPancakes(service);
    assert.deepStrictEqual(service.getSummary('pancake'), {
      name: 'pancake',
      cookTime: 36,
      ingredients: [
        { name: 'egg', quantity: 6 },
        { name: 'flour', quantity: 3 },
      ],
    });
    assert.strictEqual(service.cachedRecipeCount, 2);
  });

  it('memoizes repeated summaries', () => {
    const service = createService();
    addPancakes(service);
    service.getSummary('pancake');
    service.getSummary('pancake');
    assert.deepStrictEqual(service.resolverStats, {
      cacheHits: 1,
      cacheMisses: 2,
    });
  });

  it('drops cached resolutions when an entry is added', () => {
    const service = createService();
    addPancakes(service);
    service.getSummary('pancake');

    service.createEntry({ type: 'ingredient', name: 'milk', cookTime: 1 });
    assert.strictEqual(service.cachedRecipeCount, 0);
  });

  it('clears entries and cached resolutions', () => {
    const service = createService();
    addPancakes(service);
    service.getSummary('pancake');

    assert.deepStrictEqual(service.clear(), { message: 'cookbook cleared' });
    assert.strictEqual(service.lookup('egg'), null);
    assert.deepStrictEqual(service.listEntries(), []);
    assert.strictEqual(service.cachedRecipeCount, 0);
    expectAppError(() => service.getSummary('pancake'), 'NOT_FOUND');
  });

  it('allows names to be reused after a clear', () => {
    const service = createService();
    service.createEntry({ type: 'ingredient', name: 'egg', cookTime: 5 });
    service.clear();
    assert.deepStrictEqual(
      service.createEntry({ type: 'recipe', name: 'egg', requiredItems: [] }),
      { message: 'recipe added' },
    );
  });

  it('hands out one shared instance until reset', () => {
    const first = getCookbookService();
    assert.strictEqual(getCookbookService(), first);
    resetCookbookService();
    assert.notStrictEqual(getCookbookService(), first);
  });
});
