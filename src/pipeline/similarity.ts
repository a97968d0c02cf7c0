import type { ConfidenceTier, TierThresholds } from "../types.js";
import { sortedTokens } from "../utils/collections.js";

export interface SimilarityResult {
  confidence: number;
  sharedTokens: string[];
}

/**
 * A similarity measure between two token sets. Implementations must be
 * symmetric, stay within [0, 100] and return 100 only for identical non-empty
 * sets.
 */
export interface SimilarityStrategy {
  readonly name: SimilarityStrategyName;
  score(left: ReadonlySet<string>, right: ReadonlySet<string>): SimilarityResult;
}

export type SimilarityStrategyName = "dice" | "jaccard";

export const DEFAULT_TIER_THRESHOLDS: TierThresholds = {
  highMin: 80,
  mediumMin: 50,
};

export function intersectTokens(left: ReadonlySet<string>, right: ReadonlySet<string>): string[] {
  const [smaller, larger] = left.size <= right.size ? [left, right] : [right, left];
  const shared: string[] = [];
  for (const token of smaller) {
    if (larger.has(token)) {
      shared.push(token);
    }
  }
  return sortedTokens(shared);
}

function toConfidence(fraction: number, identical: boolean): number {
  const rounded = Math.round(Math.max(0, Math.min(1, fraction)) * 100);
  if (identical) {
    return 100;
  }
  return Math.min(99, rounded);
}

function scoreWith(
  left: ReadonlySet<string>,
  right: ReadonlySet<string>,
  fraction: (shared: number) => number,
): SimilarityResult {
  if (left.size === 0 || right.size === 0) {
    return { confidence: 0, sharedTokens: [] };
  }

  const sharedTokens = intersectTokens(left, right);
  const identical = sharedTokens.length === left.size && left.size === right.size;
  return {
    confidence: toConfidence(fraction(sharedTokens.length), identical),
    sharedTokens,
  };
}

/** Sørensen–Dice: 2·|A∩B| / (|A|+|B|). */
export const diceStrategy: SimilarityStrategy = {
  name: "dice",
  score(left, right) {
    return scoreWith(left, right, (shared) => (2 * shared) / (left.size + right.size));
  },
};

/** Jaccard: |A∩B| / |A∪B|. */
export const jaccardStrategy: SimilarityStrategy = {
  name: "jaccard",
  score(left, right) {
    return scoreWith(left, right, (shared) => shared / (left.size + right.size - shared));
  },
};

const STRATEGIES: Record<SimilarityStrategyName, SimilarityStrategy> = {
  dice: diceStrategy,
  jaccard: jaccardStrategy,
};

export function getSimilarityStrategy(name: SimilarityStrategyName): SimilarityStrategy {
  return STRATEGIES[name];
}

export function tierFor(
  confidence: number,
  thresholds: TierThresholds = DEFAULT_TIER_THRESHOLDS,
): ConfidenceTier {
  if (confidence >= thresholds.highMin) {
    return "HIGH";
  }
  if (confidence >= thresholds.mediumMin) {
    return "MEDIUM";
  }
  return "LOW";
}
