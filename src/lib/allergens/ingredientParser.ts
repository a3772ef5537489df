/**
 * Ingredient parsing – free-text INCI lists to normalized tokens.
 */

/**
 * Normalize an ingredient or allergen name for comparison (trim + lowercase)
 */
export function normalizeIngredient(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Split on commas at parenthesis depth 0. Commas inside parentheses belong to
 * the ingredient ("extract (leaf, root)"); an unmatched ")" such as the one in
 * "2) Glycerin" never raises the depth.
 */
function splitTopLevel(text: string): string[] {
  const items: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth = Math.max(0, depth - 1);
    } else if (char === ',' && depth === 0) {
      items.push(text.slice(start, i));
      start = i + 1;
    }
  }
  items.push(text.slice(start));
  return items;
}

/**
 * Parse a raw ingredient list ("Aqua, Glycerin [2-5%], 3. Parfum") into
 * normalized tokens. Concentration markers and list numbering are dropped;
 * single-character leftovers are discarded.
 */
export function parseIngredients(ingredientsText: string): string[] {
  if (!ingredientsText) return [];

  const ingredients: string[] = [];
  for (const item of splitTopLevel(ingredientsText)) {
    const cleaned = item
      .trim()
      .toLowerCase()
      .replace(/\[.*?\]/g, '')
      .replace(/^\d+[.)]\s*/, '')
      .replace(/^[ .]+|[ .]+$/g, '');
    if (cleaned.length > 1) {
      ingredients.push(cleaned);
    }
  }
  return ingredients;
}

/**
 * Candidates carry either a parsed list or the raw label text.
 */
export function toIngredientList(ingredients: string[] | string | undefined): string[] {
  if (ingredients === undefined) return [];
  return typeof ingredients === 'string' ? parseIngredients(ingredients) : ingredients;
}
