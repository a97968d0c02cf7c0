import { describe, expect, it } from "vitest";
import { buildCatalogIndex, findExactCategory } from "../src/pipeline/catalog-index.js";
import { normalizeLabel } from "../src/pipeline/normalize.js";

describe("catalog index", () => {
  it("tokenizes each category once and orders categories by label", () => {
    const index = buildCatalogIndex([
      { id: "c-2", label: "Éveil à la foi" },
      { id: "c-1", label: "1ère Année Communion" },
    ]);

    expect(index.categories.map((category) => category.id)).toEqual(["c-1", "c-2"]);
    expect([...(index.categoriesById.get("c-2")?.tokens ?? [])].sort()).toEqual([
      "foi",
      "la",
      "à",
      "éveil",
    ]);
  });

  it("finds an exact token-set match regardless of case and spacing", () => {
    const index = buildCatalogIndex([{ id: "c-9", label: "CM1 (Catéchèse)" }]);

    const match = findExactCategory(index, normalizeLabel("catéchèse   cm1").tokens);
    expect(match?.id).toBe("c-9");
  });

  it("prefers the lexicographically smallest label when several categories share a token set", () => {
    const index = buildCatalogIndex([
      { id: "b", label: "CE2 Catéchèse" },
      { id: "a", label: "Catéchèse CE2" },
    ]);

    expect(findExactCategory(index, normalizeLabel("ce2 catéchèse").tokens)?.id).toBe("b");
  });

  it("accepts an empty catalog", () => {
    const index = buildCatalogIndex([]);

    expect(index.categories).toEqual([]);
    expect(findExactCategory(index, normalizeLabel("CP").tokens)).toBeNull();
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      buildCatalogIndex([
        { id: "x", label: "CP" },
        { id: "x", label: "CE1" },
      ]),
    ).toThrow(/duplicate id: x/);
  });
});
