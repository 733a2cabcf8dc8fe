/**
 * Reference resolver: ingredient references (id and/or name) → store identifiers.
 *
 * Identifiers are local to the store that wrote them, so a foreign id only counts
 * when this store knows it; otherwise the name decides. Unresolvable entries are
 * dropped with a warning and never fail the recipe. A read failure does.
 */

import type { CatalogReader } from "@/modules/catalog/repository";
import type { IngredientInput, Resource } from "@/modules/catalog/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { RecordError } from "./errors";
import type { IngredientRef } from "./types";

export interface ResolvedIngredients {
  readonly ingredients: IngredientInput[];
  readonly warnings: string[];
}

function describe(ref: IngredientRef): string {
  if (ref.resourceName) return `"${ref.resourceName}"`;
  if (ref.resourceId) return `id ${ref.resourceId}`;
  return "(unnamed)";
}

export async function resolveIngredients(
  repo: CatalogReader,
  recipeName: string,
  refs: readonly IngredientRef[],
): Promise<Result<ResolvedIngredients, RecordError>> {
  const ingredients: IngredientInput[] = [];
  const warnings: string[] = [];
  const used = new Set<string>();

  const drop = (message: string) => {
    const warning = `Recipe "${recipeName}": ${message}`;
    warnings.push(warning);
    console.warn(`[transfer:resolver] ${warning}`);
  };

  for (const ref of refs) {
    const quantity = ref.quantity;
    if (quantity === undefined || !Number.isInteger(quantity) || quantity <= 0) {
      drop(`ingredient ${describe(ref)} has no positive quantity; skipped`);
      continue;
    }

    let resource: Resource | null = null;

    if (ref.resourceId) {
      const byId = await repo.findResourceById(ref.resourceId);
      if (byId.isErr()) {
        return ErrResult(
          new RecordError(recipeName, `Could not read resource ${ref.resourceId}`, byId.error),
        );
      }
      resource = byId.unwrap();
    }

    const name = ref.resourceName?.trim();
    if (!resource && name) {
      const byName = await repo.findResourceByName(name);
      if (byName.isErr()) {
        return ErrResult(
          new RecordError(recipeName, `Could not read resource "${name}"`, byName.error),
        );
      }
      resource = byName.unwrap();
    }

    if (!resource) {
      drop(
        name
          ? `resource "${name}" not found; ingredient skipped`
          : `resource id ${ref.resourceId ?? "(none)"} not found and no name given; ingredient skipped`,
      );
      continue;
    }

    if (used.has(resource.id)) {
      drop(`resource "${resource.name}" listed more than once; later entry skipped`);
      continue;
    }

    used.add(resource.id);
    ingredients.push({ resourceId: resource.id, quantity });
  }

  return OkResult({ ingredients, warnings });
}
