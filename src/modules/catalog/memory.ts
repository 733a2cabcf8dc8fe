/**
 * In-process catalog backend.
 *
 * Purpose: Offline mode (`CATALOG_BACKEND=memory`) and the stand-in the test suite
 * runs the import/export pipelines against.
 * Invariants: same rules as the Mongo backend (see `./repository`). Transactions
 * snapshot the whole state with `deepClone` and restore it on `Err` or throw.
 * Gotchas: nested `transaction` calls share the outer snapshot only for their own
 * rollback; an inner commit is undone if the outer work fails.
 */

import { randomUUID } from "node:crypto";
import { deepClone } from "@/db/helpers";
import type { RecipeId, ResourceId } from "@/db/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { CatalogRepo, CatalogWriter } from "./repository";
import {
  CatalogError,
  RECIPE_DEFAULTS,
  RECIPE_FIELD_KEYS,
  RESOURCE_DEFAULTS,
  RESOURCE_FIELD_KEYS,
  type CraftingRecipe,
  type IngredientInput,
  type NewRecipe,
  type NewResource,
  type RecipeFields,
  type RecipePatch,
  type Resource,
  type ResourcePatch,
} from "./types";
import {
  checkIngredients,
  checkRecipeFields,
  checkResourceFields,
  duplicateName,
  missingReference,
  normalizeName,
  pickDefined,
} from "./validation";

type StoredResource = Resource;

interface StoredRecipe extends RecipeFields {
  id: RecipeId;
  name: string;
  ingredients: IngredientInput[];
  createdAt: Date;
  updatedAt: Date;
}

interface MemoryState {
  resources: Map<ResourceId, StoredResource>;
  recipes: Map<RecipeId, StoredRecipe>;
}

export interface MemoryCatalogOptions {
  /** Clock used for timestamps. */
  now?: () => Date;
  /** Identifier factory. */
  nextId?: () => string;
}

const byName = <T extends { name: string }>(a: T, b: T): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

export class MemoryCatalogRepo implements CatalogRepo {
  private state: MemoryState = { resources: new Map(), recipes: new Map() };
  private readonly now: () => Date;
  private readonly nextId: () => string;

  constructor(options: MemoryCatalogOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.nextId = options.nextId ?? (() => randomUUID());
  }

  async transaction<T>(
    work: (tx: CatalogWriter) => Promise<Result<T, Error>>,
  ): Promise<Result<T, Error>> {
    const snapshot = deepClone(this.state);
    try {
      const result = await work(this);
      if (result.isErr()) this.state = snapshot;
      return result;
    } catch (error) {
      this.state = snapshot;
      return ErrResult(toError(error));
    }
  }

  /* ------------------------------ resources ------------------------------ */

  async findResourceByName(name: string): Promise<Result<Resource | null, Error>> {
    return OkResult(this.resourceByName(name.trim()));
  }

  async findResourceById(id: ResourceId): Promise<Result<Resource | null, Error>> {
    const found = this.state.resources.get(id);
    return OkResult(found ? deepClone(found) : null);
  }

  async listResources(): Promise<Result<Resource[], Error>> {
    const all = [...this.state.resources.values()].sort(byName);
    return OkResult(all.map((resource) => deepClone(resource)));
  }

  async createResource(input: NewResource): Promise<Result<Resource, Error>> {
    const nameRes = normalizeName(input.name, "resource");
    if (nameRes.isErr()) return ErrResult(nameRes.error);
    const name = nameRes.unwrap();

    const fields = { ...RESOURCE_DEFAULTS, ...pickDefined(input, RESOURCE_FIELD_KEYS) };
    const invalid = checkResourceFields(fields);
    if (invalid) return ErrResult(invalid);
    if (this.resourceByName(name)) return ErrResult(duplicateName("resource", name));

    const now = this.now();
    const resource: StoredResource = {
      id: this.nextId(),
      name,
      ...fields,
      createdAt: now,
      updatedAt: now,
    };
    this.state.resources.set(resource.id, resource);
    return OkResult(deepClone(resource));
  }

  async updateResource(
    id: ResourceId,
    patch: ResourcePatch,
  ): Promise<Result<Resource | null, Error>> {
    const current = this.state.resources.get(id);
    if (!current) return OkResult(null);

    let name = current.name;
    if (patch.name !== undefined) {
      const nameRes = normalizeName(patch.name, "resource");
      if (nameRes.isErr()) return ErrResult(nameRes.error);
      name = nameRes.unwrap();
      const clash = this.resourceByName(name);
      if (clash && clash.id !== id) return ErrResult(duplicateName("resource", name));
    }

    const changes = pickDefined(patch, RESOURCE_FIELD_KEYS);
    const invalid = checkResourceFields(changes);
    if (invalid) return ErrResult(invalid);

    const next: StoredResource = { ...current, ...changes, name, updatedAt: this.now() };
    this.state.resources.set(id, next);
    return OkResult(deepClone(next));
  }

  async deleteResource(id: ResourceId): Promise<Result<boolean, Error>> {
    if (!this.state.resources.delete(id)) return OkResult(false);

    for (const recipe of this.state.recipes.values()) {
      recipe.ingredients = recipe.ingredients.filter(
        (ingredient) => ingredient.resourceId !== id,
      );
    }
    return OkResult(true);
  }

  /* ------------------------------- recipes ------------------------------- */

  async findRecipeByName(name: string): Promise<Result<CraftingRecipe | null, Error>> {
    const trimmed = name.trim();
    for (const recipe of this.state.recipes.values()) {
      if (recipe.name === trimmed) return OkResult(this.toRecipe(recipe));
    }
    return OkResult(null);
  }

  async listRecipes(): Promise<Result<CraftingRecipe[], Error>> {
    const all = [...this.state.recipes.values()].sort(byName);
    return OkResult(all.map((recipe) => this.toRecipe(recipe)));
  }

  async createRecipe(input: NewRecipe): Promise<Result<CraftingRecipe, Error>> {
    const prepared = this.prepareRecipe(input);
    if (prepared.isErr()) return ErrResult(prepared.error);

    const now = this.now();
    const recipe: StoredRecipe = {
      id: this.nextId(),
      ...prepared.unwrap(),
      createdAt: now,
      updatedAt: now,
    };
    this.state.recipes.set(recipe.id, recipe);
    return OkResult(this.toRecipe(recipe));
  }

  async replaceRecipe(
    id: RecipeId,
    input: NewRecipe,
  ): Promise<Result<CraftingRecipe | null, Error>> {
    if (!this.state.recipes.has(id)) return OkResult(null);
    const prepared = this.prepareRecipe(input, id);
    if (prepared.isErr()) return ErrResult(prepared.error);

    const now = this.now();
    const recipe: StoredRecipe = { id, ...prepared.unwrap(), createdAt: now, updatedAt: now };
    this.state.recipes.set(id, recipe);
    return OkResult(this.toRecipe(recipe));
  }

  async updateRecipe(
    id: RecipeId,
    patch: RecipePatch,
    ingredients?: readonly IngredientInput[],
  ): Promise<Result<CraftingRecipe | null, Error>> {
    const current = this.state.recipes.get(id);
    if (!current) return OkResult(null);

    let name = current.name;
    if (patch.name !== undefined) {
      const nameRes = normalizeName(patch.name, "recipe");
      if (nameRes.isErr()) return ErrResult(nameRes.error);
      name = nameRes.unwrap();
      const clash = this.recipeByName(name);
      if (clash && clash.id !== id) return ErrResult(duplicateName("recipe", name));
    }

    const changes = pickDefined(patch, RECIPE_FIELD_KEYS);
    const invalid =
      checkRecipeFields(changes) ??
      (ingredients ? checkIngredients(ingredients) ?? this.checkReferences(ingredients) : null);
    if (invalid) return ErrResult(invalid);

    const next: StoredRecipe = {
      ...current,
      ...changes,
      name,
      outputItemName: (changes.outputItemName ?? current.outputItemName).trim(),
      ingredients: ingredients
        ? ingredients.map(({ resourceId, quantity }) => ({ resourceId, quantity }))
        : current.ingredients,
      updatedAt: this.now(),
    };
    this.state.recipes.set(id, next);
    return OkResult(this.toRecipe(next));
  }

  async deleteRecipe(id: RecipeId): Promise<Result<boolean, Error>> {
    return OkResult(this.state.recipes.delete(id));
  }

  /* ------------------------------- helpers ------------------------------- */

  private prepareRecipe(
    input: NewRecipe,
    selfId?: RecipeId,
  ): Result<Omit<StoredRecipe, "id" | "createdAt" | "updatedAt">, Error> {
    const nameRes = normalizeName(input.name, "recipe");
    if (nameRes.isErr()) return ErrResult(nameRes.error);
    const name = nameRes.unwrap();

    const fields: RecipeFields = {
      ...RECIPE_DEFAULTS,
      ...pickDefined(input, RECIPE_FIELD_KEYS),
      outputItemName: input.outputItemName.trim(),
    };
    const ingredients = [...(input.ingredients ?? [])];
    const invalid =
      checkRecipeFields(fields) ?? checkIngredients(ingredients) ?? this.checkReferences(ingredients);
    if (invalid) return ErrResult(invalid);
    const clash = this.recipeByName(name);
    if (clash && clash.id !== selfId) return ErrResult(duplicateName("recipe", name));

    return OkResult({
      name,
      ...fields,
      ingredients: ingredients.map(({ resourceId, quantity }) => ({ resourceId, quantity })),
    });
  }

  private resourceByName(name: string): StoredResource | null {
    for (const resource of this.state.resources.values()) {
      if (resource.name === name) return deepClone(resource);
    }
    return null;
  }

  private recipeByName(name: string): StoredRecipe | null {
    for (const recipe of this.state.recipes.values()) {
      if (recipe.name === name) return recipe;
    }
    return null;
  }

  private checkReferences(ingredients: readonly IngredientInput[]): CatalogError | null {
    const unknown = ingredients
      .map((ingredient) => ingredient.resourceId)
      .filter((resourceId) => !this.state.resources.has(resourceId));
    return unknown.length ? missingReference(unknown) : null;
  }

  private toRecipe(stored: StoredRecipe): CraftingRecipe {
    const copy = deepClone(stored);
    return {
      ...copy,
      ingredients: copy.ingredients.map((ingredient) => ({
        resourceId: ingredient.resourceId,
        quantity: ingredient.quantity,
        resourceName: this.state.resources.get(ingredient.resourceId)?.name ?? null,
      })),
    };
  }
}

export const createMemoryCatalogRepo = (
  options?: MemoryCatalogOptions,
): MemoryCatalogRepo => new MemoryCatalogRepo(options);
