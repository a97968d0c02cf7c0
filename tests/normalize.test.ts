import { describe, expect, it } from "vitest";
import { normalizeLabel } from "../src/pipeline/normalize.js";

describe("normalizeLabel", () => {
  it("keeps accents and splits parenthetical grade codes into their own tokens", () => {
    const normalized = normalizeLabel("  2ème Année Confirmation (6e) ");

    expect(normalized.raw).toBe("2ème Année Confirmation (6e)");
    expect([...normalized.tokens].sort()).toEqual(["2ème", "6e", "année", "confirmation"]);
    expect(normalized.unspecified).toBe(false);
  });

  it("strips punctuation at token edges but keeps inner apostrophes and hyphens", () => {
    const normalized = normalizeLabel("Pré-Caté, CE1. (Transfert d'une paroisse!)");

    expect([...normalized.tokens].sort()).toEqual([
      "ce1",
      "d'une",
      "paroisse",
      "pré-caté",
      "transfert",
    ]);
  });

  it("flags blank and null labels as unspecified without throwing", () => {
    for (const raw of ["", "   ", null, undefined]) {
      const normalized = normalizeLabel(raw);
      expect(normalized.tokens.size).toBe(0);
      expect(normalized.unspecified).toBe(true);
      expect(normalized.raw).toBe("");
    }
  });

  it("treats punctuation-only labels as unspecified", () => {
    const normalized = normalizeLabel("( - )");

    expect(normalized.tokens.size).toBe(0);
    expect(normalized.unspecified).toBe(true);
    expect(normalized.raw).toBe("( - )");
  });

  it("is deterministic and independent of call order", () => {
    const first = normalizeLabel("CM2 (Persévérance)");
    normalizeLabel("something else entirely");
    const second = normalizeLabel("CM2 (Persévérance)");

    expect([...first.tokens]).toEqual([...second.tokens]);
  });
});
