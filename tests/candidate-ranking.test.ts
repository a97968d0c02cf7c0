import { describe, expect, it } from "vitest";
import { rankCandidates } from "../src/pipeline/candidate-ranking.js";
import { buildCatalogIndex } from "../src/pipeline/catalog-index.js";
import { jaccardStrategy } from "../src/pipeline/similarity.js";

const catalog = [
  { id: "c1", label: "2ème Année Confirmation (5ème)" },
  { id: "c2", label: "1ère Année Communion" },
  { id: "c3", label: "3ème Année Confirmation (6ème)" },
  { id: "c4", label: "CM2" },
];

describe("candidate ranking", () => {
  const index = buildCatalogIndex(catalog);

  it("ranks a near match as MEDIUM above candidates sharing only one token", () => {
    const ranking = rankCandidates({ label: "2ème Année Confirmation (6e)", recordCount: 12 }, index);

    expect(ranking.candidates.map((candidate) => [candidate.canonicalCategoryId, candidate.confidence, candidate.tier])).toEqual([
      ["c1", 75, "MEDIUM"],
      ["c3", 50, "MEDIUM"],
      ["c2", 29, "LOW"],
    ]);
    expect(ranking.candidates[0]?.sharedTokens).toEqual(["2ème", "année", "confirmation"]);
    expect(ranking.candidates[2]?.sharedTokens).toEqual(["année"]);
    expect(ranking.bestTier).toBe("MEDIUM");
    expect(ranking.recommendation).toBe("review");
    expect(ranking.exactMatch).toBe(false);
    expect(ranking.recordCount).toBe(12);
  });

  it("keeps confidences non-increasing down the list", () => {
    const ranking = rankCandidates({ label: "Année Confirmation", recordCount: 1 }, index);

    for (let i = 1; i < ranking.candidates.length; i += 1) {
      expect(ranking.candidates[i - 1]?.confidence ?? 0).toBeGreaterThanOrEqual(
        ranking.candidates[i]?.confidence ?? 0,
      );
    }
  });

  it("short-circuits an exact normalized match to a single HIGH candidate", () => {
    const ranking = rankCandidates({ label: "2ème année confirmation (5ème)", recordCount: 3 }, index);

    expect(ranking.exactMatch).toBe(true);
    expect(ranking.candidates).toHaveLength(1);
    expect(ranking.candidates[0]).toMatchObject({
      canonicalCategoryId: "c1",
      confidence: 100,
      tier: "HIGH",
    });
    expect(ranking.recommendation).toBe("auto_map");
  });

  it("returns zero candidates for a blank label without throwing", () => {
    const ranking = rankCandidates({ label: "", recordCount: 4 }, index);

    expect(ranking.candidates).toEqual([]);
    expect(ranking.unspecified).toBe(true);
    expect(ranking.bestTier).toBeNull();
    expect(ranking.recommendation).toBe("unspecified");
  });

  it("proposes a new category when nothing overlaps", () => {
    const ranking = rankCandidates({ label: "Groupe Jeunes", recordCount: 2 }, index);

    expect(ranking.candidates).toEqual([]);
    expect(ranking.bestTier).toBeNull();
    expect(ranking.recommendation).toBe("new_category");
  });

  it("breaks confidence ties by canonical label, not catalog order", () => {
    const forward = buildCatalogIndex([
      { id: "z", label: "CE1 Catéchèse" },
      { id: "a", label: "CE2 Catéchèse" },
    ]);
    const reversed = buildCatalogIndex([
      { id: "a", label: "CE2 Catéchèse" },
      { id: "z", label: "CE1 Catéchèse" },
    ]);

    const fromForward = rankCandidates({ label: "Catéchèse", recordCount: 1 }, forward);
    const fromReversed = rankCandidates({ label: "Catéchèse", recordCount: 1 }, reversed);

    expect(fromForward.candidates.map((candidate) => candidate.canonicalCategoryId)).toEqual(["z", "a"]);
    expect(fromReversed.candidates).toEqual(fromForward.candidates);
    expect(fromForward.candidates[0]?.confidence).toBe(67);
  });

  it("limits the list to topN and accepts another strategy", () => {
    const ranking = rankCandidates({ label: "2ème Année Confirmation (6e)", recordCount: 1 }, index, {
      topN: 1,
      strategy: jaccardStrategy,
    });

    expect(ranking.candidates).toHaveLength(1);
    expect(ranking.candidates[0]).toMatchObject({ canonicalCategoryId: "c1", confidence: 60, tier: "MEDIUM" });
  });

  it("uses custom tier thresholds", () => {
    const ranking = rankCandidates({ label: "2ème Année Confirmation (6e)", recordCount: 1 }, index, {
      thresholds: { highMin: 70, mediumMin: 40 },
    });

    expect(ranking.candidates[0]?.tier).toBe("HIGH");
    expect(ranking.recommendation).toBe("auto_map");
  });
});
