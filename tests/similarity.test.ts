import { describe, expect, it } from "vitest";
import {
  diceStrategy,
  getSimilarityStrategy,
  jaccardStrategy,
  tierFor,
} from "../src/pipeline/similarity.js";

const tokenSets: Array<Set<string>> = [
  new Set(),
  new Set(["année"]),
  new Set(["2ème", "année", "confirmation", "6e"]),
  new Set(["2ème", "année", "confirmation", "5ème"]),
  new Set(["1ère", "année", "communion"]),
  new Set(["cm2"]),
];

describe("similarity strategies", () => {
  for (const strategy of [diceStrategy, jaccardStrategy]) {
    describe(strategy.name, () => {
      it("is symmetric for every pair", () => {
        for (const left of tokenSets) {
          for (const right of tokenSets) {
            expect(strategy.score(left, right)).toEqual(strategy.score(right, left));
          }
        }
      });

      it("scores a non-empty set against itself at 100", () => {
        for (const tokens of tokenSets.filter((set) => set.size > 0)) {
          expect(strategy.score(tokens, new Set(tokens)).confidence).toBe(100);
        }
      });

      it("scores 0 when either side is empty", () => {
        expect(strategy.score(new Set(), new Set())).toEqual({ confidence: 0, sharedTokens: [] });
        expect(strategy.score(new Set(["cp"]), new Set()).confidence).toBe(0);
      });

      it("never reaches 100 for a strict superset, however large", () => {
        const big = new Set(Array.from({ length: 300 }, (_, index) => `t${index}`));
        const bigger = new Set([...big, "extra"]);

        const { confidence } = strategy.score(big, bigger);
        expect(confidence).toBe(99);
      });
    });
  }

  it("computes Dice as twice the shared count over the summed sizes", () => {
    const result = diceStrategy.score(tokenSets[2], tokenSets[3]);

    expect(result).toEqual({ confidence: 75, sharedTokens: ["2ème", "année", "confirmation"] });
  });

  it("computes Jaccard as shared over union", () => {
    expect(jaccardStrategy.score(tokenSets[2], tokenSets[3]).confidence).toBe(60);
  });

  it("resolves strategies by name", () => {
    expect(getSimilarityStrategy("dice")).toBe(diceStrategy);
    expect(getSimilarityStrategy("jaccard")).toBe(jaccardStrategy);
  });
});

describe("tierFor", () => {
  it("maps confidence onto the default tiers", () => {
    expect(tierFor(100)).toBe("HIGH");
    expect(tierFor(80)).toBe("HIGH");
    expect(tierFor(79)).toBe("MEDIUM");
    expect(tierFor(50)).toBe("MEDIUM");
    expect(tierFor(49)).toBe("LOW");
    expect(tierFor(0)).toBe("LOW");
  });

  it("honours custom thresholds", () => {
    expect(tierFor(70, { highMin: 70, mediumMin: 40 })).toBe("HIGH");
    expect(tierFor(39, { highMin: 70, mediumMin: 40 })).toBe("LOW");
  });
});
