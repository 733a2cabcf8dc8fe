/**
 * Reconciliation engine.
 *
 * Propósito: Aplicar un lote de registros decodificados al catálogo según la estrategia
 * de merge y devolver un resultado por registro.
 *
 * Invariantes:
 * - Registros con el mismo nombre dentro de un lote: gana el último; los anteriores
 *   quedan `skipped`.
 * - Cada create/update/replace corre en una transacción del gateway; un error la
 *   revierte y el registro queda `failed`. El lote sigue.
 * - `update` solo escribe los campos presentes. Si llegan `ingredients`, reemplazan el
 *   set completo (nunca se mezclan).
 * - `replace` de un recurso es borrar y crear en una transacción: el id cambia y las
 *   filas de ingrediente que lo referenciaban se van con el borrado (cascade). Los
 *   campos se validan antes de borrar.
 * - `replace` de una receta es una sola escritura (`replaceRecipe`): si falla, la
 *   receta existente queda intacta aun sin transacciones.
 */

import type { CatalogRepo } from "@/modules/catalog/repository";
import {
  CatalogError,
  RECIPE_DEFAULTS,
  RECIPE_FIELD_KEYS,
  RESOURCE_DEFAULTS,
  RESOURCE_FIELD_KEYS,
  type IngredientInput,
} from "@/modules/catalog/types";
import {
  checkRecipeFields,
  checkResourceFields,
  pickDefined,
} from "@/modules/catalog/validation";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { RecordError } from "./errors";
import { resolveIngredients } from "./resolver";
import type {
  EntityKind,
  MergeStrategy,
  OutcomeStatus,
  RecipeRecord,
  RecordOutcome,
  ResourceRecord,
} from "./types";

export const SUPERSEDED_REASON = "superseded by a later record with the same name";

type Applied = {
  readonly status: Exclude<OutcomeStatus, "failed">;
  readonly reason?: string;
  readonly warnings?: readonly string[];
};

function reasonOf(error: Error): string {
  if (error instanceof RecordError && error.origin) {
    return `${error.message}: ${error.origin.message}`;
  }
  return error.message;
}

function logOutcome(outcome: RecordOutcome): void {
  const subject = `${outcome.kind} "${outcome.name}"`;
  if (outcome.status === "failed") {
    console.error(`[transfer:reconcile] ${subject} failed: ${outcome.reason ?? "unknown error"}`);
  } else if (outcome.status === "skipped") {
    console.info(`[transfer:reconcile] ${subject} skipped: ${outcome.reason ?? ""}`);
  } else {
    console.info(`[transfer:reconcile] ${subject} ${outcome.status}`);
  }
}

/** A failure that still carries the resolver warnings gathered before it. */
class RecordWarnings extends RecordError {
  constructor(
    recordName: string,
    message: string,
    public readonly warnings: readonly string[],
    origin?: Error,
  ) {
    super(recordName, message, origin);
  }
}

async function reconcileBatch<R extends { readonly name: string }>(
  kind: EntityKind,
  records: readonly R[],
  apply: (record: R, name: string) => Promise<Result<Applied, Error>>,
): Promise<RecordOutcome[]> {
  const lastIndex = new Map<string, number>();
  records.forEach((record, index) => lastIndex.set(record.name.trim(), index));

  const outcomes: RecordOutcome[] = [];
  for (const [index, record] of records.entries()) {
    const name = record.name.trim();
    let outcome: RecordOutcome;

    if (!name) {
      outcome = { kind, name, status: "failed", reason: "name must not be empty", warnings: [] };
    } else if (lastIndex.get(name) !== index) {
      outcome = { kind, name, status: "skipped", reason: SUPERSEDED_REASON, warnings: [] };
    } else {
      const applied = await apply(record, name);
      outcome = applied.isOk()
        ? {
            kind,
            name,
            status: applied.value.status,
            reason: applied.value.reason,
            warnings: applied.value.warnings ?? [],
          }
        : {
            kind,
            name,
            status: "failed",
            reason: reasonOf(applied.error),
            warnings: applied.error instanceof RecordWarnings ? applied.error.warnings : [],
          };
    }

    logOutcome(outcome);
    outcomes.push(outcome);
  }
  return outcomes;
}

function notFound(kind: EntityKind, name: string): CatalogError {
  return new CatalogError("NOT_FOUND", `${kind} '${name}' disappeared before the write`);
}

/** Turns `Ok(null)` from an update into an `Err`, so the transaction rolls back. */
function requireFound<T>(
  result: Result<T | null, Error>,
  kind: EntityKind,
  name: string,
): Result<T, Error> {
  if (result.isErr()) return ErrResult(result.error);
  const value = result.unwrap();
  return value === null ? ErrResult(notFound(kind, name)) : OkResult(value);
}

/* -------------------------------- resources -------------------------------- */

export async function reconcileResources(
  repo: CatalogRepo,
  records: readonly ResourceRecord[],
  strategy: MergeStrategy,
): Promise<RecordOutcome[]> {
  return reconcileBatch("resource", records, async (record, name) => {
    const found = await repo.findResourceByName(name);
    if (found.isErr()) {
      return ErrResult(new RecordError(name, "Could not look up resource", found.error));
    }
    const existing = found.unwrap();
    const supplied = pickDefined(record, RESOURCE_FIELD_KEYS);

    if (!existing) {
      const created = await repo.transaction((tx) => tx.createResource({ name, ...supplied }));
      return created.map((): Applied => ({ status: "created" }));
    }

    if (strategy === "skip") {
      return OkResult<Applied>({ status: "skipped", reason: "already exists" });
    }

    if (strategy === "replace") {
      const invalid = checkResourceFields({ ...RESOURCE_DEFAULTS, ...supplied });
      if (invalid) return ErrResult(invalid);
      const replaced = await repo.transaction(async (tx) => {
        const deleted = await tx.deleteResource(existing.id);
        if (deleted.isErr()) return ErrResult(deleted.error);
        if (!deleted.unwrap()) return ErrResult(notFound("resource", name));
        return tx.createResource({ name, ...supplied });
      });
      return replaced.map((): Applied => ({ status: "replaced" }));
    }

    const updated = await repo.transaction(async (tx) =>
      requireFound(await tx.updateResource(existing.id, supplied), "resource", name),
    );
    return updated.map((): Applied => ({ status: "updated" }));
  });
}

/* --------------------------------- recipes --------------------------------- */

function missingOutput(name: string): RecordError {
  return new RecordError(name, "outputItemName is required");
}

export async function reconcileRecipes(
  repo: CatalogRepo,
  records: readonly RecipeRecord[],
  strategy: MergeStrategy,
): Promise<RecordOutcome[]> {
  return reconcileBatch("recipe", records, async (record, name) => {
    const found = await repo.findRecipeByName(name);
    if (found.isErr()) {
      return ErrResult(new RecordError(name, "Could not look up recipe", found.error));
    }
    const existing = found.unwrap();

    if (existing && strategy === "skip") {
      return OkResult<Applied>({ status: "skipped", reason: "already exists" });
    }

    const supplied = pickDefined(record, RECIPE_FIELD_KEYS);
    const outputItemName = record.outputItemName?.trim() ?? "";
    const creating = !existing || strategy === "replace";

    if (creating) {
      if (!outputItemName) return ErrResult(missingOutput(name));
      const invalid = checkRecipeFields({ ...RECIPE_DEFAULTS, ...supplied, outputItemName });
      if (invalid) return ErrResult(invalid);
    }

    let ingredients: IngredientInput[] | undefined;
    let warnings: readonly string[] = [];
    if (record.ingredients !== undefined) {
      const resolved = await resolveIngredients(repo, name, record.ingredients);
      if (resolved.isErr()) return ErrResult(resolved.error);
      ingredients = resolved.unwrap().ingredients;
      warnings = resolved.unwrap().warnings;
    }

    const withWarnings = (error: Error): Error =>
      warnings.length ? new RecordWarnings(name, reasonOf(error), warnings) : error;

    const definition = { ...supplied, name, outputItemName, ingredients };

    if (!existing) {
      const created = await repo.transaction((tx) => tx.createRecipe(definition));
      return created
        .map((): Applied => ({ status: "created", warnings }))
        .mapErr(withWarnings);
    }

    if (strategy === "replace") {
      const replaced = await repo.transaction(async (tx) =>
        requireFound(await tx.replaceRecipe(existing.id, definition), "recipe", name),
      );
      return replaced
        .map((): Applied => ({ status: "replaced", warnings }))
        .mapErr(withWarnings);
    }

    const updated = await repo.transaction(async (tx) =>
      requireFound(await tx.updateRecipe(existing.id, supplied, ingredients), "recipe", name),
    );
    return updated
      .map((): Applied => ({ status: "updated", warnings }))
      .mapErr(withWarnings);
  });
}
