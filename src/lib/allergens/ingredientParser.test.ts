import { describe, it } from 'node:test';
import assert from 'node:assert';
import { normalizeIngredient, parseIngredients, toIngredientList } from './ingredientParser';

describe('parseIngredients', () => {
  it('splits and lowercases a simple list', () => {
    assert.deepStrictEqual(parseIngredients('Water, Glycerin, Niacinamide'), [
      'water',
      'glycerin',
      'niacinamide',
    ]);
  });

  it('returns an empty list for empty text', () => {
    assert.deepStrictEqual(parseIngredients(''), []);
  });

  it('drops concentration markers', () => {
    assert.deepStrictEqual(parseIngredients('water, glycerin [1-5%], parfum'), [
      'water',
      'glycerin',
      'parfum',
    ]);
  });

  it('drops list numbering and trailing dots', () => {
    assert.deepStrictEqual(parseIngredients('1. Aqua, 2) Glycerin, Alcohol Denat.'), [
      'aqua',
      'glycerin',
      'alcohol denat',
    ]);
  });

  it('splits lists numbered with closing parentheses', () => {
    assert.deepStrictEqual(parseIngredients('1. Aqua, 2) Methylparaben, 3) Glycerin'), [
      'aqua',
      'methylparaben',
      'glycerin',
    ]);
  });

  it('keeps parenthesised commas after a numbered entry', () => {
    assert.deepStrictEqual(parseIngredients('1) Camellia Extract (Leaf, Root), 2) Water'), [
      'camellia extract (leaf, root)',
      'water',
    ]);
  });

  it('keeps commas inside parentheses', () => {
    assert.deepStrictEqual(parseIngredients('Camellia Extract (Leaf, Root), Water'), [
      'camellia extract (leaf, root)',
      'water',
    ]);
  });

  it('discards single-character leftovers', () => {
    assert.deepStrictEqual(parseIngredients('a, water, ,'), ['water']);
  });
});

describe('normalizeIngredient', () => {
  it('trims and lowercases', () => {
    assert.strictEqual(normalizeIngredient('  MethylParaben '), 'methylparaben');
  });
});

describe('toIngredientList', () => {
  it('parses raw strings and passes lists through', () => {
    assert.deepStrictEqual(toIngredientList('Aqua, Parfum'), ['aqua', 'parfum']);
    assert.deepStrictEqual(toIngredientList(['Aqua']), ['Aqua']);
    assert.deepStrictEqual(toIngredientList(undefined), []);
  });
});
