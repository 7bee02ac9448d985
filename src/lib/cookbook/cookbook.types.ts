/**
 * Cookbook Types
 *
 * Entries are either leaf ingredients or recipes built from required items.
 * Both share one namespace in the registry.
 */

export type EntryType = 'ingredient' | 'recipe';

/** Leaf entry with a fixed cook time */
export type Ingredient = {
  type: 'ingredient';
  name: string;
  cookTime: number;
};

/**
 * One unit of the owning recipe needs `quantity` units of the entry `name`.
 * The referenced entry does not have to exist yet; it is checked when the
 * recipe is resolved.
 */
export type RequiredItem = {
  name: string;
  quantity: number;
};

export type Recipe = {
  type: 'recipe';
  name: string;
  requiredItems: RequiredItem[];
};

export type CookbookEntry = Ingredient | Recipe;

/** Ingredient name → total quantity for one unit of a recipe */
export type IngredientFrequency = ReadonlyMap<string, number>;

export type IngredientQuantity = {
  name: string;
  quantity: number;
};

export type RecipeSummary = {
  name: string;
  cookTime: number;
  ingredients: IngredientQuantity[];
};

export type ResolverStats = {
  cacheHits: number;
  cacheMisses: number;
};
