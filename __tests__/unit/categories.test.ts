import { describe, it, expect } from "vitest";
import { DEFAULT_CATALOG, SKILL_CATEGORIES, findCategory, listCategoryIds } from "../../src/categories";

describe("category catalog", () => {
  it("lists the eight skill categories in order", () => {
    expect(listCategoryIds(DEFAULT_CATALOG)).toEqual([...SKILL_CATEGORIES]);
    expect(SKILL_CATEGORIES).toHaveLength(8);
  });

  it("gives every category four focus areas and a positive weight", () => {
    for (const c of DEFAULT_CATALOG) {
      expect(c.focusAreas).toHaveLength(4);
      expect(c.weight).toBeGreaterThan(0);
    }
  });

  it("looks categories up by id", () => {
    expect(findCategory(DEFAULT_CATALOG, "AI Literacy")?.focusAreas).toEqual([
      "AI Basics",
      "AI Tools",
      "Data Understanding",
      "AI Ethics",
    ]);
    expect(findCategory(DEFAULT_CATALOG, "Cooking")).toBeNull();
  });
});
