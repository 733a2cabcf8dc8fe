/**
 * Import/export pipeline integration tests.
 *
 * Purpose: run the TransferService end to end against the in-process catalog and a
 * temp directory: export, re-import into an empty catalog, and the call-level errors.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { MemoryCatalogRepo } from "@/modules/catalog/memory";
import { TransferService } from "@/modules/transfer/service";

const tempDirs: string[] = [];

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "craftbook-transfer-"));
  tempDirs.push(dir);
  return dir;
}

function createRepo(prefix: string): MemoryCatalogRepo {
  let counter = 0;
  return new MemoryCatalogRepo({ nextId: () => `${prefix}-${++counter}` });
}

function createService(repo: MemoryCatalogRepo): TransferService {
  return new TransferService(repo, {
    appVersion: "9.9.9",
    now: () => new Date("2026-02-01T00:00:00.000Z"),
  });
}

async function seed(repo: MemoryCatalogRepo): Promise<void> {
  const flour = (
    await repo.createResource({ name: "Flour", category: "Grain", discovered: true })
  ).unwrap();
  const water = (await repo.createResource({ name: "Water" })).unwrap();
  await repo.createRecipe({
    name: "Dough",
    outputItemName: "Dough",
    outputQuantity: 2,
    craftingTimeSeconds: 30,
    requiredStation: "Table",
    ingredients: [
      { resourceId: flour.id, quantity: 2 },
      { resourceId: water.id, quantity: 1 },
    ],
  });
}

async function ingredientNames(repo: MemoryCatalogRepo, recipe: string): Promise<string[]> {
  const found = (await repo.findRecipeByName(recipe)).unwrap();
  return found?.ingredients.map((ingredient) => `${ingredient.quantity}x ${ingredient.resourceName}`) ?? [];
}

async function snapshot(repo: MemoryCatalogRepo) {
  return {
    resources: (await repo.listResources()).unwrap(),
    recipes: (await repo.listRecipes()).unwrap(),
  };
}

const NOTHING = { created: 0, updated: 0, replaced: 0, skipped: 0, failed: 0 };

describe("transfer pipelines", () => {
  let source: MemoryCatalogRepo;
  let target: MemoryCatalogRepo;

  beforeEach(async () => {
    source = createRepo("src");
    target = createRepo("dst");
    await seed(source);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await Promise.all(
      tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })),
    );
  });

  it("exports JSON with metadata and re-imports it into an empty catalog", async () => {
    const file = path.join(await createTempDir(), "nested", "catalog.json");

    const exported = await createService(source).exportData(file, "json");
    expect(exported.unwrap()).toEqual({
      format: "json",
      files: [file],
      totalResources: 2,
      totalRecipes: 1,
    });

    const document = JSON.parse(await readFile(file, "utf8"));
    expect(document.metadata).toEqual({
      export_date: "2026-02-01T00:00:00.000Z",
      app_version: "9.9.9",
      total_resources: 2,
      total_recipes: 1,
    });

    const imported = await createService(target).importData(file, "json", "update");
    expect(imported.unwrap().counts).toEqual({ ...NOTHING, created: 3 });
    expect(await ingredientNames(target, "Dough")).toEqual(["2x Flour", "1x Water"]);
    expect((await target.findResourceByName("Flour")).unwrap()).toMatchObject({
      category: "Grain",
      discovered: true,
    });
  });

  it("round-trips through Markdown", async () => {
    const file = path.join(await createTempDir(), "catalog.md");

    await createService(source).exportData(file, "markdown");
    const text = await readFile(file, "utf8");
    expect(text.split("\n")).toContain("- Ingredient: 2x Flour");

    const imported = await createService(target).importData(file, "markdown", "update");
    expect(imported.unwrap().counts).toEqual({ ...NOTHING, created: 3 });
    expect((await target.findRecipeByName("Dough")).unwrap()).toMatchObject({
      outputQuantity: 2,
      craftingTimeSeconds: 30,
      requiredStation: "Table",
    });
  });

  it("round-trips a CSV bundle directory", async () => {
    const dir = path.join(await createTempDir(), "bundle");

    const exported = await createService(source).exportData(dir, "csv");
    expect(exported.unwrap().files).toEqual([
      path.join(dir, "resources.csv"),
      path.join(dir, "crafting_recipes.csv"),
    ]);

    const imported = await createService(target).importData(dir, "csv", "update");
    expect(imported.unwrap().counts).toEqual({ ...NOTHING, created: 3 });
    expect(await ingredientNames(target, "Dough")).toEqual(["2x Flour", "1x Water"]);
  });

  it("writes single-kind exports", async () => {
    const dir = await createTempDir();
    const resourcesFile = path.join(dir, "out", "resources.csv");
    const recipesFile = path.join(dir, "recipes.json");

    await createService(source).exportResources(resourcesFile, "csv");
    await createService(source).exportRecipes(recipesFile, "json");

    const recipesDoc = JSON.parse(await readFile(recipesFile, "utf8"));
    expect(recipesDoc.resources).toBeUndefined();
    expect(recipesDoc.crafting_recipes).toHaveLength(1);
    expect(recipesDoc.metadata.total_resources).toBe(0);

    const imported = await createService(target).importData(resourcesFile, "csv", "update");
    expect(imported.unwrap().counts).toEqual({ ...NOTHING, created: 2 });
  });

  it("leaves a seeded catalog unchanged when the same export is imported twice with skip", async () => {
    const file = path.join(await createTempDir(), "catalog.md");
    await createService(source).exportData(file, "markdown");
    await target.createResource({ name: "Water", category: "Spring" });
    await target.createResource({ name: "Salt" });

    const first = await createService(target).importData(file, "markdown", "skip");
    const afterFirst = await snapshot(target);
    const second = await createService(target).importData(file, "markdown", "skip");
    const afterSecond = await snapshot(target);

    expect(first.unwrap().counts).toEqual({ ...NOTHING, created: 2, skipped: 1 });
    expect(second.unwrap().counts).toEqual({ ...NOTHING, skipped: 3 });
    expect(afterSecond).toEqual(afterFirst);
    expect(afterSecond.resources.map((resource) => [resource.name, resource.category])).toEqual([
      ["Flour", "Grain"],
      ["Salt", null],
      ["Water", "Spring"],
    ]);
  });

  it("does not touch entities missing from an update batch", async () => {
    const file = path.join(await createTempDir(), "catalog.json");
    await createService(source).exportData(file, "json");
    const salt = (await target.createResource({ name: "Salt", rarity: "Common" })).unwrap();
    const brine = (
      await target.createRecipe({
        name: "Brine",
        outputItemName: "Brine",
        ingredients: [{ resourceId: salt.id, quantity: 1 }],
      })
    ).unwrap();

    await createService(target).importData(file, "json", "update");
    const after = await snapshot(target);

    expect(after.resources.map((resource) => resource.name)).toEqual(["Flour", "Salt", "Water"]);
    expect(after.recipes.map((recipe) => recipe.name)).toEqual(["Brine", "Dough"]);
    expect(after.resources.find((resource) => resource.name === "Salt")).toEqual(salt);
    expect(after.recipes.find((recipe) => recipe.name === "Brine")).toEqual(brine);
  });

  it("imports a recipe with an unknown ingredient and warns once", async () => {
    const file = path.join(await createTempDir(), "bread.json");
    await writeFile(
      file,
      JSON.stringify({
        crafting_recipes: [
          {
            name: "Bread",
            output_item_name: "Bread",
            ingredients: [{ resource_name: "Yeast", quantity: 1 }],
          },
        ],
      }),
      "utf8",
    );

    const imported = await createService(source).importData(file, "json", "update");

    expect(imported.isOk()).toBe(true);
    expect(imported.unwrap().counts).toEqual({ ...NOTHING, created: 1 });
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect((await source.findRecipeByName("Bread")).unwrap()?.ingredients).toEqual([]);
  });

  it("applies the last duplicate in a batch exactly once", async () => {
    const file = path.join(await createTempDir(), "flour.json");
    await writeFile(
      file,
      JSON.stringify({
        resources: [
          { name: "Flour", category: "Powder" },
          { name: "Flour", category: "Milled" },
        ],
      }),
      "utf8",
    );

    const imported = await createService(source).importData(file, "json", "update");

    expect(imported.unwrap().counts).toEqual({ ...NOTHING, updated: 1, skipped: 1 });
    const flours = (await source.listResources())
      .unwrap()
      .filter((resource) => resource.name === "Flour");
    expect(flours).toHaveLength(1);
    expect(flours[0].category).toBe("Milled");
  });

  it("reports entries the decoder rejected as failed outcomes", async () => {
    const file = path.join(await createTempDir(), "bad-entry.json");
    await writeFile(file, JSON.stringify({ resources: [{ name: "" }, { name: "Salt" }] }), "utf8");

    const summary = (await createService(target).importData(file, "json", "update")).unwrap();

    expect(summary.outcomes.map((outcome) => [outcome.name, outcome.status])).toEqual([
      ["resources[0]", "failed"],
      ["Salt", "created"],
    ]);
  });

  it("returns call-level errors", async () => {
    const dir = await createTempDir();
    const broken = path.join(dir, "broken.json");
    await writeFile(broken, "{ not json", "utf8");
    const emptyBundle = path.join(dir, "empty");
    await mkdir(emptyBundle);

    const service = createService(source);
    const unsupported = await service.exportData(path.join(dir, "out.xml"), "xml");
    const missing = await service.importData(path.join(dir, "missing.json"), "json", "update");
    const malformed = await service.importData(broken, "json", "update");
    const noFiles = await service.importData(emptyBundle, "csv", "update");

    expect(unsupported.isErr() && unsupported.error.code).toBe("UNSUPPORTED_FORMAT");
    expect(missing.isErr() && missing.error.code).toBe("IO_ERROR");
    expect(malformed.isErr() && malformed.error.code).toBe("CODEC_ERROR");
    expect(noFiles.isErr() && noFiles.error.code).toBe("IO_ERROR");
  });
});
