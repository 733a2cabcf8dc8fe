/**
 * Import/export types.
 *
 * Purpose: Format-agnostic records exchanged between codecs and the reconciliation
 * engine, plus the summaries the pipelines return.
 *
 * Presence rule: a field counts as supplied when its key holds anything other than
 * `undefined`. `null`, `0`, `""` and `false` are supplied values. An `ingredients` key
 * (even `[]`) means "replace the whole ingredient set".
 */

import type { RecipeFields, ResourceFields } from "@/modules/catalog/types";

export const TRANSFER_FORMATS = ["json", "markdown", "csv"] as const;
export type TransferFormat = (typeof TRANSFER_FORMATS)[number];

export const MERGE_STRATEGIES = ["update", "replace", "skip"] as const;
export type MergeStrategy = (typeof MERGE_STRATEGIES)[number];

/** Ingredient reference as written by a human or another store. */
export interface IngredientRef {
  readonly resourceId?: string;
  readonly resourceName?: string;
  readonly quantity?: number;
}

interface RecordMeta {
  /** Identifier in the store the record came from. Informational only. */
  readonly id?: string;
  readonly createdAt?: string;
  readonly updatedAt?: string;
}

export type ResourceRecord = RecordMeta & { readonly name: string } & Partial<ResourceFields>;

export type RecipeRecord = RecordMeta & {
  readonly name: string;
  readonly ingredients?: readonly IngredientRef[];
} & Partial<RecipeFields>;

export interface ExportMetadata {
  readonly exportDate: string;
  readonly appVersion: string;
  readonly totalResources: number;
  readonly totalRecipes: number;
}

/**
 * A decoded or to-be-encoded document. An absent list means the section is not
 * part of the document.
 */
export interface CatalogDocument {
  readonly metadata?: ExportMetadata;
  readonly resources?: readonly ResourceRecord[];
  readonly recipes?: readonly RecipeRecord[];
}

export type EntityKind = "resource" | "recipe";

/** An entry a decoder could not turn into a record. */
export interface RejectedRecord {
  readonly kind: EntityKind;
  /** Name if known, otherwise a position such as `crafting_recipes[3]`. */
  readonly label: string;
  readonly reason: string;
}

export interface DecodeResult {
  readonly resources: ResourceRecord[];
  readonly recipes: RecipeRecord[];
  readonly rejected: RejectedRecord[];
  readonly warnings: string[];
  /** Which sections the source contained. */
  readonly sections: { readonly resources: boolean; readonly recipes: boolean };
}

export type OutcomeStatus = "created" | "updated" | "replaced" | "skipped" | "failed";

export interface RecordOutcome {
  readonly kind: EntityKind;
  readonly name: string;
  readonly status: OutcomeStatus;
  readonly reason?: string;
  readonly warnings: readonly string[];
}

export type OutcomeCounts = Record<OutcomeStatus, number>;

export interface ImportSummary {
  readonly source: string;
  readonly format: TransferFormat;
  readonly strategy: MergeStrategy;
  readonly outcomes: readonly RecordOutcome[];
  readonly counts: OutcomeCounts;
  readonly warnings: readonly string[];
}

export interface ExportSummary {
  readonly format: TransferFormat;
  /** Files written, in write order. */
  readonly files: readonly string[];
  readonly totalResources: number;
  readonly totalRecipes: number;
}

export function isTransferFormat(value: string): value is TransferFormat {
  return (TRANSFER_FORMATS as readonly string[]).includes(value);
}

export function isMergeStrategy(value: string): value is MergeStrategy {
  return (MERGE_STRATEGIES as readonly string[]).includes(value);
}

export function countOutcomes(outcomes: readonly RecordOutcome[]): OutcomeCounts {
  const counts: OutcomeCounts = { created: 0, updated: 0, replaced: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) counts[outcome.status] += 1;
  return counts;
}
