import type {
  LabelRanking,
  MatchCandidate,
  MigrationRecord,
  SampleRecordRef,
  SourceLabel,
} from "../types.js";
import { compareText, makeSlug, trimToEmpty } from "../utils/text.js";
import { type CatalogIndex } from "./catalog-index.js";
import { type RankingOptions, rankCandidates } from "./candidate-ranking.js";
import { resolveRecordId } from "./issue-classifier.js";

export interface NewCategoryProposal {
  sourceLabel: string;
  recordCount: number;
  proposedSlug: string;
  bestConfidence: number;
  sampleRecords: SampleRecordRef[];
}

export interface ExactLabelMatch {
  sourceLabel: string;
  canonicalCategoryId: string;
  canonicalLabel: string;
  recordCount: number;
}

export interface LabelReconciliation {
  rankings: LabelRanking[];
  exactMatches: ExactLabelMatch[];
  /** Raw source label → canonical id, for HIGH-tier mappings that are not already exact. */
  autoMappings: Map<string, string>;
  reviewQueue: MatchCandidate[];
  newCategories: NewCategoryProposal[];
  unspecifiedRecordCount: number;
}

function displayNameOf(record: MigrationRecord): string {
  return trimToEmpty(record.studentName) || trimToEmpty(record.studentRef) || "anonyme";
}

/**
 * Counts records per raw class label. Labels are trimmed but otherwise kept
 * as spelled; different spellings stay separate entries.
 */
export function collectSourceLabels(
  records: readonly MigrationRecord[],
  samplesPerLabel = 3,
): SourceLabel[] {
  const byLabel = new Map<string, SourceLabel>();

  records.forEach((record, position) => {
    const label = trimToEmpty(record.classLabel);
    let entry = byLabel.get(label);
    if (!entry) {
      entry = { label, recordCount: 0, sampleRecords: [] };
      byLabel.set(label, entry);
    }

    entry.recordCount += 1;
    if (entry.sampleRecords && entry.sampleRecords.length < samplesPerLabel) {
      entry.sampleRecords.push({
        recordId: resolveRecordId(record, position),
        displayName: displayNameOf(record),
      });
    }
  });

  return [...byLabel.values()].sort((left, right) => compareText(left.label, right.label));
}

export function foldRankings(rankings: readonly LabelRanking[]): LabelReconciliation {
  const sorted = [...rankings].sort((left, right) => compareText(left.sourceLabel, right.sourceLabel));
  const exactMatches: ExactLabelMatch[] = [];
  const autoMappings = new Map<string, string>();
  const reviewQueue: MatchCandidate[] = [];
  const newCategories: NewCategoryProposal[] = [];
  let unspecifiedRecordCount = 0;

  for (const ranking of sorted) {
    const best = ranking.candidates[0];

    switch (ranking.recommendation) {
      case "unspecified":
        unspecifiedRecordCount += ranking.recordCount;
        break;
      case "auto_map":
        if (!best) {
          break;
        }
        if (ranking.exactMatch) {
          exactMatches.push({
            sourceLabel: ranking.sourceLabel,
            canonicalCategoryId: best.canonicalCategoryId,
            canonicalLabel: best.canonicalLabel,
            recordCount: ranking.recordCount,
          });
        } else {
          autoMappings.set(ranking.sourceLabel, best.canonicalCategoryId);
        }
        break;
      case "review":
        reviewQueue.push(...ranking.candidates.filter((candidate) => candidate.tier === "MEDIUM"));
        break;
      case "new_category":
        newCategories.push({
          sourceLabel: ranking.sourceLabel,
          recordCount: ranking.recordCount,
          proposedSlug: makeSlug(ranking.sourceLabel),
          bestConfidence: best?.confidence ?? 0,
          sampleRecords: ranking.sampleRecords,
        });
        break;
    }
  }

  return {
    rankings: sorted,
    exactMatches,
    autoMappings,
    reviewQueue,
    newCategories,
    unspecifiedRecordCount,
  };
}

export function reconcileLabels(
  labels: readonly SourceLabel[],
  index: CatalogIndex,
  options: Partial<RankingOptions> = {},
): LabelReconciliation {
  return foldRankings(labels.map((label) => rankCandidates(label, index, options)));
}
