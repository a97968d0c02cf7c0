import type {
  ConfidenceTier,
  LabelRanking,
  MappingRecommendation,
  MatchCandidate,
  SourceLabel,
  TierThresholds,
} from "../types.js";
import { sortedTokens } from "../utils/collections.js";
import { compareText } from "../utils/text.js";
import { type CatalogIndex, findExactCategory } from "./catalog-index.js";
import { normalizeLabel } from "./normalize.js";
import {
  DEFAULT_TIER_THRESHOLDS,
  type SimilarityStrategy,
  diceStrategy,
  tierFor,
} from "./similarity.js";

export interface RankingOptions {
  topN: number;
  strategy: SimilarityStrategy;
  thresholds: TierThresholds;
}

export const DEFAULT_RANKING_OPTIONS: RankingOptions = {
  topN: 5,
  strategy: diceStrategy,
  thresholds: DEFAULT_TIER_THRESHOLDS,
};

export function compareCandidates(left: MatchCandidate, right: MatchCandidate): number {
  return (
    right.confidence - left.confidence ||
    compareText(left.canonicalLabel, right.canonicalLabel) ||
    compareText(left.canonicalCategoryId, right.canonicalCategoryId)
  );
}

export function recommendationFor(tier: ConfidenceTier | null): MappingRecommendation {
  if (tier === "HIGH") {
    return "auto_map";
  }
  if (tier === "MEDIUM") {
    return "review";
  }
  return "new_category";
}

/**
 * Ranks the catalog for one source label.
 *
 * An exact token-set match returns a single 100 candidate without scoring
 * the rest of the catalog. Zero-confidence pairs are left out, so a label
 * with no recognizable token ends up with no candidates and a
 * `new_category` recommendation.
 */
export function rankCandidates(
  source: SourceLabel,
  index: CatalogIndex,
  options: Partial<RankingOptions> = {},
): LabelRanking {
  const resolved: RankingOptions = { ...DEFAULT_RANKING_OPTIONS, ...options };
  const topN = Math.max(1, Math.floor(resolved.topN));
  const normalized = normalizeLabel(source.label);
  const base = {
    sourceLabel: normalized.raw,
    recordCount: source.recordCount,
    tokens: sortedTokens(normalized.tokens),
    unspecified: normalized.unspecified,
    sampleRecords: source.sampleRecords ?? [],
  };

  if (normalized.unspecified) {
    return {
      ...base,
      exactMatch: false,
      candidates: [],
      bestTier: null,
      recommendation: "unspecified",
    };
  }

  const exact = findExactCategory(index, normalized.tokens);
  if (exact) {
    return {
      ...base,
      exactMatch: true,
      candidates: [
        {
          sourceLabel: normalized.raw,
          canonicalCategoryId: exact.id,
          canonicalLabel: exact.label,
          sharedTokens: sortedTokens(exact.tokens),
          confidence: 100,
          tier: "HIGH",
        },
      ],
      bestTier: "HIGH",
      recommendation: "auto_map",
    };
  }

  const scored: MatchCandidate[] = [];
  for (const category of index.categories) {
    const { confidence, sharedTokens } = resolved.strategy.score(normalized.tokens, category.tokens);
    if (confidence <= 0) {
      continue;
    }
    scored.push({
      sourceLabel: normalized.raw,
      canonicalCategoryId: category.id,
      canonicalLabel: category.label,
      sharedTokens,
      confidence,
      tier: tierFor(confidence, resolved.thresholds),
    });
  }

  const candidates = scored.sort(compareCandidates).slice(0, topN);
  const bestTier = candidates[0]?.tier ?? null;

  return {
    ...base,
    exactMatch: false,
    candidates,
    bestTier,
    recommendation: recommendationFor(bestTier),
  };
}
