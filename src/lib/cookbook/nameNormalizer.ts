/**
 * Recipe name normalizer.
 *
 * Turns handwritten names such as "Riz@z RISO00tto!" into "Rizz Risotto".
 */

const SEPARATORS = /[-_ ]+/;
const DISALLOWED = /[^a-zA-Z_-]/g;

function titleCase(token: string): string {
  return token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();
}

/**
 * Normalize a free-form recipe name into its display form.
 * Returns null when nothing readable is left.
 */
export function normalizeRecipeName(input: string): string | null {
  if (input.length === 0) return null;

  const words = input
    .split(SEPARATORS)
    .map((token) => token.replace(DISALLOWED, ''))
    .filter((token) => token.length > 0)
    .map(titleCase);

  return words.length > 0 ? words.join(' ') : null;
}
