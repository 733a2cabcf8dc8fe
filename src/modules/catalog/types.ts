/**
 * Catalog entity types.
 *
 * Purpose: Shapes returned and accepted by the catalog gateway (resources, crafting
 * recipes and their owned ingredients).
 */

import type { RecipeId, ResourceId } from "@/db/types";

/** A gatherable resource. `name` is unique across the catalog. */
export interface Resource {
  readonly id: ResourceId;
  readonly name: string;
  readonly category: string | null;
  readonly rarity: string | null;
  readonly description: string | null;
  /** Free text describing where the resource is found. */
  readonly sourceLocations: string | null;
  readonly iconPath: string | null;
  readonly discovered: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** One ingredient row owned by a recipe. */
export interface Ingredient {
  readonly resourceId: ResourceId;
  readonly quantity: number;
  /**
   * Name of the referenced resource, recomputed on every read.
   * `null` only if the resource vanished between reads.
   */
  readonly resourceName: string | null;
}

/** A crafting recipe with its ordered ingredient list. */
export interface CraftingRecipe {
  readonly id: RecipeId;
  readonly name: string;
  readonly description: string | null;
  readonly outputItemName: string;
  readonly outputQuantity: number;
  readonly craftingTimeSeconds: number | null;
  readonly requiredStation: string | null;
  readonly skillRequirement: string | null;
  readonly iconPath: string | null;
  readonly discovered: boolean;
  readonly ingredients: Ingredient[];
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Ingredient as written to the store (no display name). */
export interface IngredientInput {
  readonly resourceId: ResourceId;
  readonly quantity: number;
}

export type ResourceFields = Omit<Resource, "id" | "name" | "createdAt" | "updatedAt">;
export type RecipeFields = Omit<
  CraftingRecipe,
  "id" | "name" | "ingredients" | "createdAt" | "updatedAt"
>;

/** Input for creating a resource; omitted fields take their defaults. */
export type NewResource = { readonly name: string } & Partial<ResourceFields>;

/** Input for creating a recipe; `outputItemName` is required. */
export type NewRecipe = {
  readonly name: string;
  readonly outputItemName: string;
  readonly ingredients?: readonly IngredientInput[];
} & Partial<Omit<RecipeFields, "outputItemName">>;

/**
 * Partial update. Only keys present (value !== undefined) are written;
 * `null` clears a nullable field.
 */
export type ResourcePatch = Partial<ResourceFields> & { readonly name?: string };
export type RecipePatch = Partial<RecipeFields> & { readonly name?: string };

/** Error codes for catalog gateway operations. */
export type CatalogErrorCode =
  | "DUPLICATE_NAME"
  | "MISSING_REFERENCE"
  | "INVALID_RECORD"
  | "NOT_FOUND";

export class CatalogError extends Error {
  constructor(
    public readonly code: CatalogErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export const RESOURCE_DEFAULTS: ResourceFields = {
  category: null,
  rarity: null,
  description: null,
  sourceLocations: null,
  iconPath: null,
  discovered: false,
};

export const RECIPE_DEFAULTS: Omit<RecipeFields, "outputItemName"> = {
  description: null,
  outputQuantity: 1,
  craftingTimeSeconds: null,
  requiredStation: null,
  skillRequirement: null,
  iconPath: null,
  discovered: false,
};

export const RESOURCE_FIELD_KEYS = [
  "category",
  "rarity",
  "description",
  "sourceLocations",
  "iconPath",
  "discovered",
] as const satisfies readonly (keyof ResourceFields)[];

export const RECIPE_FIELD_KEYS = [
  "description",
  "outputItemName",
  "outputQuantity",
  "craftingTimeSeconds",
  "requiredStation",
  "skillRequirement",
  "iconPath",
  "discovered",
] as const satisfies readonly (keyof RecipeFields)[];
