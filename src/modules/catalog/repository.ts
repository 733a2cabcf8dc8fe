/**
 * Catalog gateway.
 *
 * Purpose: The persistence seam the import/export engine talks to. Backends live in
 * `@/db/repositories/catalog` (MongoDB) and `./memory` (in-process).
 *
 * Invariants every backend enforces:
 * - resource and recipe names are unique (`DUPLICATE_NAME`);
 * - ingredient quantities are positive and a recipe never lists a resource twice
 *   (`INVALID_RECORD`);
 * - ingredient references point to existing resources at commit (`MISSING_REFERENCE`);
 * - deleting a resource removes every ingredient row that references it.
 */

import type { RecipeId, ResourceId } from "@/db/types";
import type { Result } from "@/utils/result";
import type {
  CraftingRecipe,
  IngredientInput,
  NewRecipe,
  NewResource,
  RecipePatch,
  Resource,
  ResourcePatch,
} from "./types";

export interface CatalogReader {
  findResourceByName(name: string): Promise<Result<Resource | null, Error>>;
  findResourceById(id: ResourceId): Promise<Result<Resource | null, Error>>;
  /** All resources, sorted by name. */
  listResources(): Promise<Result<Resource[], Error>>;

  findRecipeByName(name: string): Promise<Result<CraftingRecipe | null, Error>>;
  /** All recipes sorted by name, with ingredient names freshly resolved. */
  listRecipes(): Promise<Result<CraftingRecipe[], Error>>;
}

export interface CatalogWriter extends CatalogReader {
  createResource(input: NewResource): Promise<Result<Resource, Error>>;
  /** Returns `Ok(null)` when the resource does not exist. */
  updateResource(
    id: ResourceId,
    patch: ResourcePatch,
  ): Promise<Result<Resource | null, Error>>;
  /** Cascades to every ingredient row referencing the resource. */
  deleteResource(id: ResourceId): Promise<Result<boolean, Error>>;

  createRecipe(input: NewRecipe): Promise<Result<CraftingRecipe, Error>>;
  /**
   * Applies the scalar patch; when `ingredients` is given the stored set is
   * replaced as a whole. Returns `Ok(null)` when the recipe does not exist.
   */
  updateRecipe(
    id: RecipeId,
    patch: RecipePatch,
    ingredients?: readonly IngredientInput[],
  ): Promise<Result<CraftingRecipe | null, Error>>;
  /**
   * Swaps the stored recipe for `input` in one write: omitted fields take their
   * defaults and the ingredient set becomes `input.ingredients` (or empty). The
   * id is kept. Returns `Ok(null)` when the recipe does not exist.
   */
  replaceRecipe(id: RecipeId, input: NewRecipe): Promise<Result<CraftingRecipe | null, Error>>;
  deleteRecipe(id: RecipeId): Promise<Result<boolean, Error>>;
}

export interface CatalogRepo extends CatalogWriter {
  /**
   * Runs `work` atomically. An `Err` returned by `work` (or a thrown error)
   * rolls every write back and is returned as-is.
   */
  transaction<T>(
    work: (tx: CatalogWriter) => Promise<Result<T, Error>>,
  ): Promise<Result<T, Error>>;
}
