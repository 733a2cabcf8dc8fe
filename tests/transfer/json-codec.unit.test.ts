import { describe, expect, it } from "vitest";
import { decodeJsonDocument, encodeJsonDocument } from "@/modules/transfer/codecs/json";
import { CodecError } from "@/modules/transfer/errors";
import type { RecipeRecord, ResourceRecord } from "@/modules/transfer/types";

const water: ResourceRecord = {
  id: "r1",
  name: "Water",
  category: "Material",
  rarity: null,
  description: "Clear and cold",
  sourceLocations: "River",
  iconPath: null,
  discovered: false,
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-02T00:00:00.000Z",
};

const bread: RecipeRecord = {
  id: "c1",
  name: "Bread",
  description: null,
  outputItemName: "Bread",
  outputQuantity: 2,
  craftingTimeSeconds: 0,
  requiredStation: "Oven",
  skillRequirement: null,
  iconPath: "icons/bread.png",
  discovered: true,
  ingredients: [{ resourceId: "r1", resourceName: "Water", quantity: 1 }],
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-01T00:00:00.000Z",
};

describe("json codec", () => {
  it("writes snake_case keys with two-space indentation", () => {
    const text = encodeJsonDocument({
      metadata: {
        exportDate: "2026-01-03T00:00:00.000Z",
        appVersion: "0.1.0",
        totalResources: 1,
        totalRecipes: 1,
      },
      resources: [water],
      recipes: [bread],
    });

    expect(text.startsWith('{\n  "metadata": {\n    "export_date"')).toBe(true);
    expect(text.endsWith("}\n")).toBe(true);

    const parsed = JSON.parse(text);
    expect(parsed.metadata).toEqual({
      export_date: "2026-01-03T00:00:00.000Z",
      app_version: "0.1.0",
      total_resources: 1,
      total_recipes: 1,
    });
    expect(parsed.resources[0].source_locations).toBe("River");
    expect(parsed.crafting_recipes[0].output_item_name).toBe("Bread");
    expect(parsed.crafting_recipes[0].ingredients).toEqual([
      { resource_id: "r1", resource_name: "Water", quantity: 1 },
    ]);
  });

  it("reads back every field it writes", () => {
    const decoded = decodeJsonDocument(encodeJsonDocument({ resources: [water], recipes: [bread] }));

    expect(decoded.resources).toEqual([water]);
    expect(decoded.recipes).toEqual([bread]);
    expect(decoded.rejected).toEqual([]);
    expect(decoded.sections).toEqual({ resources: true, recipes: true });
  });

  it("accepts 0/1 for discovered and numeric ids", () => {
    const decoded = decodeJsonDocument(
      JSON.stringify({
        resources: [
          { id: 7, name: "Stone", discovered: 1 },
          { name: "Sand", discovered: 0 },
        ],
      }),
    );

    expect(decoded.resources).toEqual([
      { id: "7", name: "Stone", discovered: true },
      { name: "Sand", discovered: false },
    ]);
    expect(decoded.sections).toEqual({ resources: true, recipes: false });
  });

  it("rejects invalid entries and keeps the rest", () => {
    const decoded = decodeJsonDocument(
      JSON.stringify({ resources: [{ name: "  " }, { category: "Ore" }, { name: "Copper" }] }),
    );

    expect(decoded.resources.map((resource) => resource.name)).toEqual(["Copper"]);
    expect(decoded.rejected).toEqual([
      { kind: "resource", label: "resources[0]", reason: "name: name must not be empty" },
      { kind: "resource", label: "resources[1]", reason: "name: Required" },
    ]);
  });

  it("accepts the name shape for ingredients and drops unreadable entries", () => {
    const decoded = decodeJsonDocument(
      JSON.stringify({
        crafting_recipes: [
          {
            name: "Stew",
            output_item_name: "Stew",
            ingredients: [{ name: "Water", quantity: 2 }, "bogus"],
          },
        ],
      }),
    );

    expect(decoded.recipes[0].ingredients).toEqual([{ resourceName: "Water", quantity: 2 }]);
    expect(decoded.warnings).toEqual([
      'Recipe "Stew": ingredient #2 ignored (Expected object, received string)',
    ]);
  });

  it("throws CodecError on malformed documents", () => {
    expect(() => decodeJsonDocument("{ not json")).toThrow(CodecError);
    expect(() => decodeJsonDocument("[]")).toThrow(CodecError);
    expect(() => decodeJsonDocument('{"resources": {}}')).toThrow(CodecError);
  });
});
