/**
 * Unit tests for the recipe name normalizer.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { normalizeRecipeName } from './nameNormalizer';

describe('normalizeRecipeName', () => {
  it('title-cases a single word', () => {
    assert.strictEqual(normalizeRecipeName('meatball'), 'Meatball');
  });

  it('strips digits and punctuation inside words', () => {
    assert.strictEqual(
      normalizeRecipeName('Riz@z RISO00tto!'),
      'Rizz Risotto',
    );
  });

  it('treats hyphens and underscores as word separators', () => {
    assert.strictEqual(normalizeRecipeName('alpHa-alFRedo'), 'Alpha Alfredo');
    assert.strictEqual(
      normalizeRecipeName('skibidi__spaghetti'),
      'Skibidi Spaghetti',
    );
  });

  it('collapses runs of mixed separators into one space', () => {
    assert.strictEqual(normalizeRecipeName('tofu - _ curry'), 'Tofu Curry');
  });

  it('drops empty tokens at the edges', () => {
    assert.strictEqual(normalizeRecipeName('  leading space'), 'Leading Space');
    assert.strictEqual(normalizeRecipeName('trailing-'), 'Trailing');
  });

  it('drops tokens that only contained disallowed characters', () => {
    assert.strictEqual(normalizeRecipeName('pad 123 thai'), 'Pad Thai');
  });

  it('returns null for empty input', () => {
    assert.strictEqual(normalizeRecipeName(''), null);
  });

  it('returns null when nothing readable is left', () => {
    assert.strictEqual(normalizeRecipeName('123 456!'), null);
    assert.strictEqual(normalizeRecipeName('--__  '), null);
  });

  it('is idempotent', () => {
    const inputs = [
      'Riz@z RISO00tto!',
      'alpHa-alFRedo',
      '  leading space',
      'pad 123 thai',
      'MEATBALL',
    ];
    for (const input of inputs) {
      const once = normalizeRecipeName(input);
      assert.ok(once !== null, `expected "${input}" to normalize`);
      assert.strictEqual(normalizeRecipeName(once), once);
    }
  });
});
