import { describe, expect, it } from "vitest";
import {
  MarkdownScanState,
  decodeMarkdownDocument,
  encodeMarkdownDocument,
  normalizeKey,
  parseBullet,
  parseMultiplier,
} from "@/modules/transfer/codecs/markdown";
import { CodecError } from "@/modules/transfer/errors";
import type { CatalogDocument } from "@/modules/transfer/types";

describe("markdown bullets", () => {
  it("accepts the colon inside or outside bold markers", () => {
    expect(parseBullet("- **Category:** Material")).toEqual({
      kind: "field",
      key: "category",
      value: "Material",
    });
    expect(parseBullet("- **Category**: Material")).toEqual({
      kind: "field",
      key: "category",
      value: "Material",
    });
    expect(parseBullet("* Skill Required: Smithing 2")).toEqual({
      kind: "field",
      key: "skill_required",
      value: "Smithing 2",
    });
    expect(parseBullet("- _Icon Path_: icons/water.png")).toEqual({
      kind: "field",
      key: "icon_path",
      value: "icons/water.png",
    });
  });

  it("splits at the first colon only", () => {
    expect(parseBullet("- **Source Locations:** North: caves")).toEqual({
      kind: "field",
      key: "source_locations",
      value: "North: caves",
    });
  });

  it("reports bullets without a pair and ignores non-bullets", () => {
    expect(parseBullet("- just some text")).toEqual({ kind: "no-colon", text: "just some text" });
    expect(parseBullet("Some paragraph: with a colon")).toBeNull();
  });

  it("normalizes keys", () => {
    expect(normalizeKey("**Source Locations:**")).toBe("source_locations");
    expect(normalizeKey(" Skill   Required ")).toBe("skill_required");
  });

  it("parses multipliers and falls back to quantity 1", () => {
    expect(parseMultiplier("3x Iron Ingot")).toEqual({ quantity: 3, name: "Iron Ingot" });
    expect(parseMultiplier("10 X Gear")).toEqual({ quantity: 10, name: "Gear" });
    expect(parseMultiplier("2x 4x4 Plank")).toEqual({ quantity: 2, name: "4x4 Plank" });
    expect(parseMultiplier("Leather Strip")).toEqual({ quantity: 1, name: "Leather Strip" });
  });

  it("accepts a multiplier written without a space before the name", () => {
    expect(parseMultiplier("3xIron Ingot")).toEqual({ quantity: 3, name: "Iron Ingot" });
    expect(parseMultiplier("2XTea")).toEqual({ quantity: 2, name: "Tea" });
  });

  it("yields an empty name for a multiplier with nothing after it", () => {
    expect(parseMultiplier("3x")).toEqual({ quantity: 3, name: "" });
    expect(parseMultiplier(" 4 X ")).toEqual({ quantity: 4, name: "" });
  });
});

describe("markdown decoding", () => {
  it("decodes a resource section", () => {
    const decoded = decodeMarkdownDocument(
      ["## Resources", "### Water", "- **Category:** Material", "- **Rarity:** Common"].join("\n"),
    );

    expect(decoded.resources).toEqual([{ name: "Water", category: "Material", rarity: "Common" }]);
    expect(decoded.recipes).toEqual([]);
    expect(decoded.warnings).toEqual([]);
    expect(decoded.sections).toEqual({ resources: true, recipes: false });
  });

  it("decodes recipes and warns about lines it cannot use", () => {
    const source = [
      "# Crafting Catalog Export",
      "",
      "## Crafting Recipes",
      "",
      "### Iron Sword",
      "- **Output:** 2x Iron Sword",
      "- **Station:** Forge",
      "- **Time:** 30 seconds",
      "- **Skill Required:** Smithing 2",
      "- Ingredient: 3x Iron Ingot",
      "- Ingredient: Leather Strip",
      "- Ingredient:",
      "- this line has no pair",
    ].join("\n");

    const decoded = decodeMarkdownDocument(source);

    expect(decoded.recipes).toEqual([
      {
        name: "Iron Sword",
        outputItemName: "Iron Sword",
        outputQuantity: 2,
        requiredStation: "Forge",
        craftingTimeSeconds: 30,
        skillRequirement: "Smithing 2",
        ingredients: [
          { resourceName: "Iron Ingot", quantity: 3 },
          { resourceName: "Leather Strip", quantity: 1 },
        ],
      },
    ]);
    expect(decoded.warnings).toEqual([
      'line 12: Recipe "Iron Sword": ingredient line without a resource name skipped',
      'line 13: line without a "key: value" pair skipped: "this line has no pair"',
    ]);
  });

  it("reads compact and spaced multipliers in ingredients and output", () => {
    const decoded = decodeMarkdownDocument(
      [
        "## Crafting Recipes",
        "### Tea",
        "- **Output:** 2xTea",
        "- Ingredient: 3xIron Ingot",
        "- Ingredient: 1x Water",
        "- Ingredient: 4x",
        "### Soup",
        "- **Output:** 3 x Soup",
        "### Stew",
        "- **Output:** 5x",
      ].join("\n"),
    );

    expect(decoded.recipes).toEqual([
      {
        name: "Tea",
        outputItemName: "Tea",
        outputQuantity: 2,
        ingredients: [
          { resourceName: "Iron Ingot", quantity: 3 },
          { resourceName: "Water", quantity: 1 },
        ],
      },
      { name: "Soup", outputItemName: "Soup", outputQuantity: 3, ingredients: [] },
      { name: "Stew", ingredients: [] },
    ]);
    expect(decoded.warnings).toEqual([
      'line 6: Recipe "Tea": ingredient line without a resource name skipped',
      'line 10: Recipe "Stew": output "5x" has no item name; ignored',
    ]);
  });

  it("keeps a trailing hash that belongs to the heading text", () => {
    const decoded = decodeMarkdownDocument(
      ["## Resources ##", "### C#", "### F# ###", "- **Category:** Language"].join("\n"),
    );

    expect(decoded.resources).toEqual([
      { name: "C#" },
      { name: "F#", category: "Language" },
    ]);
  });

  it("reads a non-numeric time as zero and unknown discovered values as false", () => {
    const decoded = decodeMarkdownDocument(
      [
        "## Crafting Recipes",
        "### Bread",
        "- **Output:** Bread",
        "- **Time:** soon",
        "- **Discovered:** maybe",
      ].join("\n"),
    );

    expect(decoded.recipes[0]).toMatchObject({
      outputItemName: "Bread",
      outputQuantity: 1,
      craftingTimeSeconds: 0,
      discovered: false,
      ingredients: [],
    });
  });

  it("keeps items in the section they were opened in", () => {
    const decoded = decodeMarkdownDocument(
      [
        "## Resources",
        "### Flour",
        "- **Discovered:** yes",
        "## Crafting Recipes",
        "### Bread",
        "- **Output:** 1x Bread",
        "- Ingredient: 2x Flour",
      ].join("\n"),
    );

    expect(decoded.resources).toEqual([{ name: "Flour", discovered: true }]);
    expect(decoded.recipes.map((recipe) => recipe.name)).toEqual(["Bread"]);
    expect(decoded.sections).toEqual({ resources: true, recipes: true });
  });

  it("ignores item headings outside a known section", () => {
    const decoded = decodeMarkdownDocument(
      ["## Export Information", "### Stray", "- **Category:** Nope", "## Resources"].join("\n"),
    );

    expect(decoded.resources).toEqual([]);
    expect(decoded.warnings).toEqual([
      'line 2: heading "Stray" outside a Resources or Crafting Recipes section ignored',
    ]);
  });

  it("rejects a document without either section", () => {
    expect(() => decodeMarkdownDocument("# Notes\n\nNothing here.\n")).toThrow(CodecError);
  });
});

describe("MarkdownScanState", () => {
  it("holds the pending item until flush", () => {
    const state = new MarkdownScanState();
    state.feed("## Resources");
    state.feed("### Water");
    state.feed("- **Rarity:** Common");

    expect(state.currentSection).toBe("resources");
    expect(state.pendingItem).toEqual({
      kind: "resource",
      draft: { name: "Water", rarity: "Common" },
    });
    expect(state.resources).toEqual([]);

    state.flush();

    expect(state.pendingItem).toBeNull();
    expect(state.resources).toEqual([{ name: "Water", rarity: "Common" }]);
  });

  it("flushes the pending item when a new section starts", () => {
    const state = new MarkdownScanState();
    state.enterSection("Resources");
    state.startItem("Water");
    state.enterSection("Crafting Recipes");

    expect(state.resources).toEqual([{ name: "Water" }]);
    expect(state.currentSection).toBe("recipes");
  });
});

describe("markdown encoding", () => {
  const doc: CatalogDocument = {
    metadata: {
      exportDate: "2026-01-01T00:00:00.000Z",
      appVersion: "0.1.0",
      totalResources: 1,
      totalRecipes: 1,
    },
    resources: [
      { name: "Water", category: "Material", rarity: "Common", description: null, discovered: true },
    ],
    recipes: [
      {
        name: "Iron Sword",
        outputItemName: "Iron Sword",
        outputQuantity: 1,
        requiredStation: "Forge",
        craftingTimeSeconds: 30,
        ingredients: [{ resourceName: "Iron Ingot", quantity: 3 }],
      },
    ],
  };

  it("renders supplied fields only", () => {
    expect(encodeMarkdownDocument(doc)).toBe(
      [
        "# Crafting Catalog Export",
        "",
        "## Export Information",
        "",
        "- **Export Date:** 2026-01-01T00:00:00.000Z",
        "- **App Version:** 0.1.0",
        "- **Total Resources:** 1",
        "- **Total Recipes:** 1",
        "",
        "## Resources",
        "",
        "### Water",
        "- **Category:** Material",
        "- **Rarity:** Common",
        "- **Discovered:** Yes",
        "",
        "## Crafting Recipes",
        "",
        "### Iron Sword",
        "- **Output:** 1x Iron Sword",
        "- **Station:** Forge",
        "- **Time:** 30 seconds",
        "- Ingredient: 3x Iron Ingot",
        "",
      ].join("\n"),
    );
  });

  it("reads back what it writes", () => {
    const decoded = decodeMarkdownDocument(encodeMarkdownDocument(doc));

    expect(decoded.resources).toEqual([
      { name: "Water", category: "Material", rarity: "Common", discovered: true },
    ]);
    expect(decoded.recipes).toEqual([
      {
        name: "Iron Sword",
        outputItemName: "Iron Sword",
        outputQuantity: 1,
        requiredStation: "Forge",
        craftingTimeSeconds: 30,
        ingredients: [{ resourceName: "Iron Ingot", quantity: 3 }],
      },
    ]);
    expect(decoded.warnings).toEqual([]);
  });

  it("round-trips a name ending in a hash", () => {
    const decoded = decodeMarkdownDocument(
      encodeMarkdownDocument({ resources: [{ name: "C#" }], recipes: [] }),
    );

    expect(decoded.resources.map((resource) => resource.name)).toEqual(["C#"]);
  });

  it("flattens line breaks", () => {
    const text = encodeMarkdownDocument({
      resources: [{ name: "Water", description: "line one\nline two" }],
    });
    expect(text.split("\n")).toContain("- **Description:** line one line two");
  });
});
