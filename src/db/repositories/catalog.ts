/**
 * Repositorio del catálogo (recursos y recetas) sobre MongoDB.
 *
 * Responsabilidad:
 * - Implementar `CatalogRepo` con el driver nativo y validación Zod (`MongoStore`).
 * - Ingredientes embebidos en el documento de la receta: la receta es dueña de su
 *   lista y cualquier cambio de ingredientes es atómico a nivel documento.
 * - Borrar un recurso hace `$pull` de sus filas de ingrediente en todas las recetas.
 *
 * @remarks
 * Las transacciones usan sesiones del cliente (`withTransaction`), lo que requiere un
 * replica set. Con `MONGO_TRANSACTIONS=false` las operaciones corren sin sesión.
 */
import { randomUUID } from "node:crypto";
import type { ClientSession } from "mongodb";
import { isDuplicateKeyError } from "@/db/helpers";
import { getMongoClient } from "@/db/mongo";
import { MongoStore } from "@/db/mongo-store";
import {
  RECIPES_COLLECTION,
  RESOURCES_COLLECTION,
  RecipeDocSchema,
  ResourceDocSchema,
  type IngredientDoc,
  type RecipeDoc,
  type ResourceDoc,
} from "@/db/schemas/catalog";
import type { RecipeId, ResourceId } from "@/db/types";
import type { CatalogRepo, CatalogWriter } from "@/modules/catalog/repository";
import {
  RECIPE_DEFAULTS,
  RECIPE_FIELD_KEYS,
  RESOURCE_DEFAULTS,
  RESOURCE_FIELD_KEYS,
  type CatalogError,
  type CraftingRecipe,
  type IngredientInput,
  type NewRecipe,
  type NewResource,
  type RecipeFields,
  type RecipePatch,
  type Resource,
  type ResourcePatch,
} from "@/modules/catalog/types";
import {
  checkIngredients,
  checkRecipeFields,
  checkResourceFields,
  duplicateName,
  missingReference,
  normalizeName,
  pickDefined,
} from "@/modules/catalog/validation";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";

export interface MongoCatalogOptions {
  /** Run `transaction` inside a client session. Requires a replica set. */
  useTransactions?: boolean;
}

interface PreparedRecipe {
  name: string;
  fields: RecipeFields;
  ingredients: IngredientDoc[];
}

const resourceStore = new MongoStore<ResourceDoc>(RESOURCES_COLLECTION, ResourceDocSchema);
const recipeStore = new MongoStore<RecipeDoc>(RECIPES_COLLECTION, RecipeDocSchema);

let indexesEnsured: Promise<void> | null = null;

/**
 * Índices únicos por nombre. Se crean una vez por proceso; si fallan se loguea y se
 * reintenta en la próxima llamada (el pre-chequeo de nombres sigue activo).
 */
async function ensureCatalogIndexes(): Promise<void> {
  if (!indexesEnsured) {
    indexesEnsured = (async () => {
      const results = await Promise.all([
        resourceStore.ensureUniqueIndex("name", "uniq_resource_name"),
        recipeStore.ensureUniqueIndex("name", "uniq_recipe_name"),
      ]);
      for (const res of results) {
        if (res.isErr()) {
          console.error("[catalog] Failed to ensure indexes:", res.error);
          indexesEnsured = null;
        }
      }
    })();
  }
  return indexesEnsured;
}

function toResource(doc: ResourceDoc): Resource {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest };
}

function translateWriteError(
  error: Error,
  entity: "resource" | "recipe",
  name: string,
): Error {
  return isDuplicateKeyError(error) ? duplicateName(entity, name) : error;
}

export class MongoCatalogRepo implements CatalogRepo {
  constructor(
    private readonly options: MongoCatalogOptions = {},
    private readonly session?: ClientSession,
  ) {}

  async transaction<T>(
    work: (tx: CatalogWriter) => Promise<Result<T, Error>>,
  ): Promise<Result<T, Error>> {
    if (this.session || this.options.useTransactions === false) {
      return work(this);
    }

    const client = await getMongoClient();
    const session = client.startSession();
    const box: { outcome?: Result<T, Error> } = {};

    try {
      await session.withTransaction(async () => {
        const outcome = await work(new MongoCatalogRepo(this.options, session));
        box.outcome = outcome;
        // Abort: withTransaction only rolls back when the callback throws.
        if (outcome.isErr()) throw outcome.error;
      });
      return box.outcome ?? ErrResult(new Error("Transaction finished without a result"));
    } catch (error) {
      if (box.outcome?.isErr()) return box.outcome;
      return ErrResult(toError(error));
    } finally {
      await session.endSession();
    }
  }

  /* ------------------------------ resources ------------------------------ */

  async findResourceByName(name: string): Promise<Result<Resource | null, Error>> {
    const res = await resourceStore.findOne({ name: name.trim() }, this.session);
    return res.map((doc) => (doc ? toResource(doc) : null));
  }

  async findResourceById(id: ResourceId): Promise<Result<Resource | null, Error>> {
    const res = await resourceStore.get(id, this.session);
    return res.map((doc) => (doc ? toResource(doc) : null));
  }

  async listResources(): Promise<Result<Resource[], Error>> {
    const res = await resourceStore.find({}, { sort: { name: 1 }, session: this.session });
    return res.map((docs) => docs.map(toResource));
  }

  async createResource(input: NewResource): Promise<Result<Resource, Error>> {
    await ensureCatalogIndexes();
    const nameRes = normalizeName(input.name, "resource");
    if (nameRes.isErr()) return ErrResult(nameRes.error);
    const name = nameRes.unwrap();

    const fields = { ...RESOURCE_DEFAULTS, ...pickDefined(input, RESOURCE_FIELD_KEYS) };
    const invalid = checkResourceFields(fields);
    if (invalid) return ErrResult(invalid);

    const clash = await this.findResourceByName(name);
    if (clash.isErr()) return ErrResult(clash.error);
    if (clash.unwrap()) return ErrResult(duplicateName("resource", name));

    const now = new Date();
    const doc: ResourceDoc = {
      _id: randomUUID(),
      name,
      ...fields,
      createdAt: now,
      updatedAt: now,
    };
    const inserted = await resourceStore.insert(doc, this.session);
    if (inserted.isErr()) {
      return ErrResult(translateWriteError(inserted.error, "resource", name));
    }
    return OkResult(toResource(inserted.unwrap()));
  }

  async updateResource(
    id: ResourceId,
    patch: ResourcePatch,
  ): Promise<Result<Resource | null, Error>> {
    const changes: Partial<ResourceDoc> = pickDefined(patch, RESOURCE_FIELD_KEYS);
    const invalid = checkResourceFields(changes);
    if (invalid) return ErrResult(invalid);

    if (patch.name !== undefined) {
      const nameRes = await this.checkRenamedResource(id, patch.name);
      if (nameRes.isErr()) return ErrResult(nameRes.error);
      changes.name = nameRes.unwrap();
    }

    const res = await resourceStore.patch(
      id,
      { ...changes, updatedAt: new Date() },
      this.session,
    );
    if (res.isErr()) {
      return ErrResult(translateWriteError(res.error, "resource", changes.name ?? id));
    }
    const doc = res.unwrap();
    return OkResult(doc ? toResource(doc) : null);
  }

  async deleteResource(id: ResourceId): Promise<Result<boolean, Error>> {
    const deleted = await resourceStore.delete(id, this.session);
    if (deleted.isErr() || !deleted.unwrap()) return deleted;

    const pulled = await recipeStore.updateMany(
      { "ingredients.resourceId": id },
      { $pull: { ingredients: { resourceId: id } } },
      this.session,
    );
    if (pulled.isErr()) return ErrResult(pulled.error);
    return OkResult(true);
  }

  /* ------------------------------- recipes ------------------------------- */

  async findRecipeByName(name: string): Promise<Result<CraftingRecipe | null, Error>> {
    const res = await recipeStore.findOne({ name: name.trim() }, this.session);
    if (res.isErr()) return ErrResult(res.error);
    const doc = res.unwrap();
    if (!doc) return OkResult(null);

    const recipes = await this.withIngredientNames([doc]);
    return recipes.map((list) => list[0] ?? null);
  }

  async listRecipes(): Promise<Result<CraftingRecipe[], Error>> {
    const res = await recipeStore.find({}, { sort: { name: 1 }, session: this.session });
    if (res.isErr()) return ErrResult(res.error);
    return this.withIngredientNames(res.unwrap());
  }

  async createRecipe(input: NewRecipe): Promise<Result<CraftingRecipe, Error>> {
    await ensureCatalogIndexes();
    const prepared = await this.prepareRecipe(input);
    if (prepared.isErr()) return ErrResult(prepared.error);
    const { name, fields, ingredients } = prepared.unwrap();

    const now = new Date();
    const doc: RecipeDoc = {
      _id: randomUUID(),
      name,
      ...fields,
      ingredients,
      createdAt: now,
      updatedAt: now,
    };
    const inserted = await recipeStore.insert(doc, this.session);
    if (inserted.isErr()) {
      return ErrResult(translateWriteError(inserted.error, "recipe", name));
    }

    const named = await this.withIngredientNames([inserted.unwrap()]);
    if (named.isErr()) return ErrResult(named.error);
    const [recipe] = named.unwrap();
    return recipe ? OkResult(recipe) : ErrResult(new Error(`Recipe '${name}' vanished after insert`));
  }

  async replaceRecipe(
    id: RecipeId,
    input: NewRecipe,
  ): Promise<Result<CraftingRecipe | null, Error>> {
    const prepared = await this.prepareRecipe(input, id);
    if (prepared.isErr()) return ErrResult(prepared.error);
    const { name, fields, ingredients } = prepared.unwrap();

    const now = new Date();
    const res = await recipeStore.replace(
      id,
      { name, ...fields, ingredients, createdAt: now, updatedAt: now },
      this.session,
    );
    if (res.isErr()) {
      return ErrResult(translateWriteError(res.error, "recipe", name));
    }
    const doc = res.unwrap();
    if (!doc) return OkResult(null);

    const named = await this.withIngredientNames([doc]);
    return named.map((list) => list[0] ?? null);
  }

  async updateRecipe(
    id: RecipeId,
    patch: RecipePatch,
    ingredients?: readonly IngredientInput[],
  ): Promise<Result<CraftingRecipe | null, Error>> {
    const changes: Partial<RecipeDoc> = pickDefined(patch, RECIPE_FIELD_KEYS);
    const invalid =
      checkRecipeFields(changes) ?? (ingredients ? checkIngredients(ingredients) : null);
    if (invalid) return ErrResult(invalid);
    if (changes.outputItemName !== undefined) {
      changes.outputItemName = changes.outputItemName.trim();
    }

    if (ingredients) {
      const refs = await this.checkReferences(ingredients);
      if (refs.isErr()) return ErrResult(refs.error);
      changes.ingredients = ingredients.map(({ resourceId, quantity }) => ({
        resourceId,
        quantity,
      }));
    }

    if (patch.name !== undefined) {
      const nameRes = normalizeName(patch.name, "recipe");
      if (nameRes.isErr()) return ErrResult(nameRes.error);
      const name = nameRes.unwrap();
      const clash = await recipeStore.findOne({ name }, this.session);
      if (clash.isErr()) return ErrResult(clash.error);
      const other = clash.unwrap();
      if (other && other._id !== id) return ErrResult(duplicateName("recipe", name));
      changes.name = name;
    }

    const res = await recipeStore.patch(
      id,
      { ...changes, updatedAt: new Date() },
      this.session,
    );
    if (res.isErr()) {
      return ErrResult(translateWriteError(res.error, "recipe", changes.name ?? id));
    }
    const doc = res.unwrap();
    if (!doc) return OkResult(null);

    const named = await this.withIngredientNames([doc]);
    return named.map((list) => list[0] ?? null);
  }

  async deleteRecipe(id: RecipeId): Promise<Result<boolean, Error>> {
    return recipeStore.delete(id, this.session);
  }

  /* ------------------------------- helpers ------------------------------- */

  /**
   * Validación común de create/replace: nombre, campos con defaults, ingredientes,
   * referencias y unicidad del nombre (ignorando `selfId`).
   */
  private async prepareRecipe(
    input: NewRecipe,
    selfId?: RecipeId,
  ): Promise<Result<PreparedRecipe, Error>> {
    const nameRes = normalizeName(input.name, "recipe");
    if (nameRes.isErr()) return ErrResult(nameRes.error);
    const name = nameRes.unwrap();

    const fields: RecipeFields = {
      ...RECIPE_DEFAULTS,
      ...pickDefined(input, RECIPE_FIELD_KEYS),
      outputItemName: input.outputItemName.trim(),
    };
    const ingredients = [...(input.ingredients ?? [])];
    const invalid = checkRecipeFields(fields) ?? checkIngredients(ingredients);
    if (invalid) return ErrResult(invalid);

    const refs = await this.checkReferences(ingredients);
    if (refs.isErr()) return ErrResult(refs.error);

    const clash = await recipeStore.findOne({ name }, this.session);
    if (clash.isErr()) return ErrResult(clash.error);
    const other = clash.unwrap();
    if (other && other._id !== selfId) return ErrResult(duplicateName("recipe", name));

    return OkResult({
      name,
      fields,
      ingredients: ingredients.map(({ resourceId, quantity }) => ({ resourceId, quantity })),
    });
  }

  private async checkRenamedResource(
    id: ResourceId,
    rawName: string,
  ): Promise<Result<string, Error>> {
    const nameRes = normalizeName(rawName, "resource");
    if (nameRes.isErr()) return ErrResult(nameRes.error);
    const name = nameRes.unwrap();

    const clash = await this.findResourceByName(name);
    if (clash.isErr()) return ErrResult(clash.error);
    const other = clash.unwrap();
    if (other && other.id !== id) return ErrResult(duplicateName("resource", name));
    return OkResult(name);
  }

  private async checkReferences(
    ingredients: readonly IngredientInput[],
  ): Promise<Result<void, Error | CatalogError>> {
    if (!ingredients.length) return OkResult(undefined);

    const ids = ingredients.map((ingredient) => ingredient.resourceId);
    const found = await resourceStore.find({ _id: { $in: ids } }, { session: this.session });
    if (found.isErr()) return ErrResult(found.error);

    const known = new Set(found.unwrap().map((doc) => doc._id));
    const unknown = ids.filter((resourceId) => !known.has(resourceId));
    return unknown.length ? ErrResult(missingReference(unknown)) : OkResult(undefined);
  }

  /**
   * Resuelve `resourceName` contra los recursos actuales; nunca se persiste.
   */
  private async withIngredientNames(
    docs: readonly RecipeDoc[],
  ): Promise<Result<CraftingRecipe[], Error>> {
    const ids = [
      ...new Set(docs.flatMap((doc) => doc.ingredients.map((ing) => ing.resourceId))),
    ];
    const names = new Map<string, string>();

    if (ids.length) {
      const found = await resourceStore.find({ _id: { $in: ids } }, { session: this.session });
      if (found.isErr()) return ErrResult(found.error);
      for (const resource of found.unwrap()) names.set(resource._id, resource.name);
    }

    return OkResult(
      docs.map(({ _id, ingredients, ...rest }) => ({
        id: _id,
        ...rest,
        ingredients: ingredients.map((ingredient) => ({
          resourceId: ingredient.resourceId,
          quantity: ingredient.quantity,
          resourceName: names.get(ingredient.resourceId) ?? null,
        })),
      })),
    );
  }
}

export const createMongoCatalogRepo = (options?: MongoCatalogOptions): MongoCatalogRepo =>
  new MongoCatalogRepo(options);
