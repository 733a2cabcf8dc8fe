/**
 * Markdown codec.
 *
 * Propósito: Documento legible para humanos (y editable a mano) con el catálogo.
 *
 * Gramática (también la que acepta el import):
 * - `## Resources` / `## Crafting Recipes` abren sección; cualquier otro `##` la cierra.
 * - `### Nombre` abre un item dentro de la sección actual.
 * - `- **Clave:** valor` asigna un campo; `- Ingredient: 3x Iron Ingot` agrega ingrediente.
 *
 * Gotchas:
 * - La clave puede llevar el `:` dentro o fuera del bold (`**Key:** v`, `**Key**: v`).
 * - Las líneas que no se entienden generan warning, nunca error. Solo un documento sin
 *   ninguna de las dos secciones es un `CodecError`.
 */

import { CodecError } from "../errors";
import type {
  CatalogDocument,
  DecodeResult,
  IngredientRef,
  RecipeRecord,
  ResourceRecord,
} from "../types";

export const MARKDOWN_TITLE = "Crafting Catalog Export";

const RESOURCES_HEADING = "Resources";
const RECIPES_HEADING = "Crafting Recipes";

/* -------------------------------- encoding -------------------------------- */

function flatten(value: string): string {
  return value.replace(/\s*\r?\n\s*/g, " ").trim();
}

function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

function field(lines: string[], label: string, value: string | number | null | undefined) {
  if (value === null || value === undefined) return;
  lines.push(`- **${label}:** ${flatten(String(value))}`);
}

function encodeResource(lines: string[], record: ResourceRecord): void {
  lines.push(`### ${flatten(record.name)}`);
  field(lines, "Category", record.category);
  field(lines, "Rarity", record.rarity);
  field(lines, "Description", record.description);
  field(lines, "Source Locations", record.sourceLocations);
  field(lines, "Icon Path", record.iconPath);
  if (record.discovered !== undefined) field(lines, "Discovered", yesNo(record.discovered));
  lines.push("");
}

function encodeRecipe(lines: string[], record: RecipeRecord): void {
  lines.push(`### ${flatten(record.name)}`);
  if (record.outputItemName) {
    field(lines, "Output", `${record.outputQuantity ?? 1}x ${record.outputItemName}`);
  }
  field(lines, "Station", record.requiredStation);
  if (record.craftingTimeSeconds !== null && record.craftingTimeSeconds !== undefined) {
    field(lines, "Time", `${record.craftingTimeSeconds} seconds`);
  }
  field(lines, "Skill Required", record.skillRequirement);
  field(lines, "Description", record.description);
  field(lines, "Icon Path", record.iconPath);
  if (record.discovered !== undefined) field(lines, "Discovered", yesNo(record.discovered));
  for (const ingredient of record.ingredients ?? []) {
    const name = ingredient.resourceName ?? ingredient.resourceId ?? "";
    lines.push(`- Ingredient: ${ingredient.quantity ?? 1}x ${flatten(name)}`);
  }
  lines.push("");
}

export function encodeMarkdownDocument(doc: CatalogDocument): string {
  const lines: string[] = [`# ${MARKDOWN_TITLE}`, ""];

  if (doc.metadata) {
    lines.push("## Export Information", "");
    field(lines, "Export Date", doc.metadata.exportDate);
    field(lines, "App Version", doc.metadata.appVersion);
    field(lines, "Total Resources", doc.metadata.totalResources);
    field(lines, "Total Recipes", doc.metadata.totalRecipes);
    lines.push("");
  }

  if (doc.resources) {
    lines.push(`## ${RESOURCES_HEADING}`, "");
    for (const record of doc.resources) encodeResource(lines, record);
  }

  if (doc.recipes) {
    lines.push(`## ${RECIPES_HEADING}`, "");
    for (const record of doc.recipes) encodeRecipe(lines, record);
  }

  while (lines.length && lines[lines.length - 1] === "") lines.pop();
  return `${lines.join("\n")}\n`;
}

/* -------------------------------- decoding -------------------------------- */

export type MarkdownSection = "none" | "resources" | "recipes";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type ResourceDraft = Mutable<ResourceRecord>;
type RecipeDraft = Mutable<Omit<RecipeRecord, "ingredients">> & { ingredients: IngredientRef[] };

export type PendingItem =
  | { readonly kind: "resource"; readonly draft: ResourceDraft }
  | { readonly kind: "recipe"; readonly draft: RecipeDraft };

type Warn = (message: string) => void;
type FieldHandler<D> = (draft: D, value: string, warn: Warn) => void;

export type ParsedBullet =
  | { readonly kind: "field"; readonly key: string; readonly value: string }
  | { readonly kind: "no-colon"; readonly text: string };

const BULLET = /^\s*[-*]\s+(.*)$/;
// A closing `#` run only counts when whitespace separates it from the title.
const HEADING = /^(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const MULTIPLIER = /^(\d+)\s*[xX]\s*(\S.*)$/;
const BARE_MULTIPLIER = /^\d+\s*[xX]$/;

/** `**Source Locations:**` → `source_locations`. */
export function normalizeKey(raw: string): string {
  return raw
    .trim()
    .replace(/^[*_]+|[*_]+$/g, "")
    .trim()
    .replace(/:$/, "")
    .trim()
    .toLowerCase()
    .replace(/\s+/g, "_");
}

/**
 * Splits a bullet line at its first colon. Returns `null` when the line is not a
 * bullet at all.
 */
export function parseBullet(line: string): ParsedBullet | null {
  const match = BULLET.exec(line);
  if (!match) return null;
  const content = match[1];

  const colon = content.indexOf(":");
  if (colon < 0) return { kind: "no-colon", text: content.trim() };

  const rawKey = content.slice(0, colon).trim();
  let rawValue = content.slice(colon + 1);

  // `**Key:** value` leaves the closing marker at the start of the value.
  const opening = /^[*_]+/.exec(rawKey)?.[0];
  if (opening && !rawKey.endsWith(opening) && rawValue.startsWith(opening)) {
    rawValue = rawValue.slice(opening.length);
  }

  return { kind: "field", key: normalizeKey(rawKey), value: rawValue.trim() };
}

/**
 * `"3x Iron Ingot"` and `"3xIron Ingot"` → `{ quantity: 3, name: "Iron Ingot" }`;
 * bare names get 1. A multiplier with nothing after it (`"3x"`) yields an empty name.
 */
export function parseMultiplier(value: string): { quantity: number; name: string } {
  const trimmed = value.trim();
  const match = MULTIPLIER.exec(trimmed);
  if (match) return { quantity: Number(match[1]), name: match[2].trim() };
  if (BARE_MULTIPLIER.test(trimmed)) return { quantity: Number.parseInt(trimmed, 10), name: "" };
  return { quantity: 1, name: trimmed };
}

export function parseDiscovered(value: string): boolean {
  return ["yes", "true", "1"].includes(value.trim().toLowerCase());
}

/** Leading integer token; `"30 seconds"` → 30, `"soon"` → 0. */
function parseSeconds(value: string): number {
  const token = value.trim().split(/\s+/)[0] ?? "";
  return /^\d+$/.test(token) ? Number(token) : 0;
}

const text = (value: string): string | null => (value ? value : null);

const RESOURCE_FIELDS = new Map<string, FieldHandler<ResourceDraft>>([
  ["name", (draft, value) => { if (value) draft.name = value; }],
  ["category", (draft, value) => { draft.category = text(value); }],
  ["rarity", (draft, value) => { draft.rarity = text(value); }],
  ["description", (draft, value) => { draft.description = text(value); }],
  ["source_locations", (draft, value) => { draft.sourceLocations = text(value); }],
  ["icon_path", (draft, value) => { draft.iconPath = text(value); }],
  ["discovered", (draft, value) => { draft.discovered = parseDiscovered(value); }],
]);

const addIngredient: FieldHandler<RecipeDraft> = (draft, value, warn) => {
  const { quantity, name } = parseMultiplier(value);
  if (!name) {
    warn(`Recipe "${draft.name}": ingredient line without a resource name skipped`);
    return;
  }
  draft.ingredients.push({ resourceName: name, quantity });
};

const setSkill: FieldHandler<RecipeDraft> = (draft, value) => {
  draft.skillRequirement = text(value);
};

const RECIPE_FIELDS = new Map<string, FieldHandler<RecipeDraft>>([
  ["name", (draft, value) => { if (value) draft.name = value; }],
  [
    "output",
    (draft, value, warn) => {
      const { quantity, name } = parseMultiplier(value);
      if (!name && value) {
        warn(`Recipe "${draft.name}": output "${value}" has no item name; ignored`);
        return;
      }
      draft.outputItemName = name;
      draft.outputQuantity = quantity;
    },
  ],
  ["station", (draft, value) => { draft.requiredStation = text(value); }],
  ["time", (draft, value) => { draft.craftingTimeSeconds = parseSeconds(value); }],
  ["skill_required", setSkill],
  ["skill_requirement", setSkill],
  ["description", (draft, value) => { draft.description = text(value); }],
  ["icon_path", (draft, value) => { draft.iconPath = text(value); }],
  ["discovered", (draft, value) => { draft.discovered = parseDiscovered(value); }],
  ["ingredient", addIngredient],
  ["ingredients", addIngredient],
]);

function sectionFor(title: string): MarkdownSection {
  const normalized = title.trim().toLowerCase();
  if (normalized === RESOURCES_HEADING.toLowerCase()) return "resources";
  if (normalized === RECIPES_HEADING.toLowerCase() || normalized === "recipes") return "recipes";
  return "none";
}

/**
 * Forward-scan state for the Markdown decoder. Feed it line by line, then call
 * `flush()` once the input ends.
 */
export class MarkdownScanState {
  currentSection: MarkdownSection = "none";
  pendingItem: PendingItem | null = null;

  readonly resources: ResourceRecord[] = [];
  readonly recipes: RecipeRecord[] = [];
  readonly warnings: string[] = [];
  readonly sections = { resources: false, recipes: false };

  private lineNumber = 0;

  /** Moves the pending item into the list of the section it was opened in. */
  flush(): void {
    const item = this.pendingItem;
    this.pendingItem = null;
    if (!item) return;
    if (item.kind === "resource") this.resources.push(item.draft);
    else this.recipes.push(item.draft);
  }

  enterSection(title: string): void {
    this.flush();
    this.currentSection = sectionFor(title);
    if (this.currentSection !== "none") this.sections[this.currentSection] = true;
  }

  startItem(name: string): void {
    this.flush();
    const trimmed = name.trim();
    if (this.currentSection === "none") {
      this.warn(`heading "${trimmed}" outside a Resources or Crafting Recipes section ignored`);
      return;
    }
    if (!trimmed) {
      this.warn("item heading without a name ignored");
      return;
    }
    this.pendingItem =
      this.currentSection === "resources"
        ? { kind: "resource", draft: { name: trimmed } }
        : { kind: "recipe", draft: { name: trimmed, ingredients: [] } };
  }

  applyBullet(bullet: ParsedBullet): void {
    const item = this.pendingItem;
    if (!item) return;

    if (bullet.kind === "no-colon") {
      this.warn(`line without a "key: value" pair skipped: "${bullet.text}"`);
      return;
    }
    if (!bullet.key) {
      this.warn("bullet with an empty key skipped");
      return;
    }

    const warn: Warn = (message) => this.warn(message);
    if (item.kind === "resource") {
      RESOURCE_FIELDS.get(bullet.key)?.(item.draft, bullet.value, warn);
    } else {
      RECIPE_FIELDS.get(bullet.key)?.(item.draft, bullet.value, warn);
    }
  }

  feed(line: string): void {
    this.lineNumber += 1;
    if (!line.trim()) return;

    const heading = HEADING.exec(line);
    if (heading) {
      const level = heading[1].length;
      if (level === 2) this.enterSection(heading[2]);
      else if (level === 3) this.startItem(heading[2]);
      return;
    }

    const bullet = parseBullet(line);
    if (bullet) this.applyBullet(bullet);
  }

  private warn(message: string): void {
    this.warnings.push(`line ${this.lineNumber}: ${message}`);
  }
}

export function decodeMarkdownDocument(source: string): DecodeResult {
  const state = new MarkdownScanState();
  for (const line of source.split(/\r?\n/)) state.feed(line);
  state.flush();

  if (!state.sections.resources && !state.sections.recipes) {
    throw new CodecError(
      `Markdown document has neither a "## ${RESOURCES_HEADING}" nor a "## ${RECIPES_HEADING}" section`,
    );
  }

  return {
    resources: state.resources,
    recipes: state.recipes,
    rejected: [],
    warnings: state.warnings,
    sections: { ...state.sections },
  };
}
