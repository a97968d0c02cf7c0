import type {
  AggregationEntry,
  CategoryRef,
  CategoryShare,
  CombinedReport,
  GroupStatistics,
  IssueCounts,
  MigrationRecord,
  PeriodReport,
  ValueShare,
} from "../types.js";
import { incrementCount, ratio } from "../utils/collections.js";
import { compareText, trimToEmpty } from "../utils/text.js";
import { UNSPECIFIED_PERIOD } from "./academic-period.js";
import { type CatalogIndex } from "./catalog-index.js";
import { type LabelReconciliation } from "./label-reconciliation.js";
import { UNSPECIFIED_LABEL } from "./normalize.js";

export interface AggregateOptions {
  topN: number;
  breakdownFields: readonly string[];
}

export interface AggregateResult {
  periods: PeriodReport[];
  combined: CombinedReport;
}

const UNSPECIFIED_VALUE = "unspecified";

export function categoryKey(category: CategoryRef): string {
  switch (category.kind) {
    case "canonical":
      return `canonical:${category.id}`;
    case "unmatched":
      return `unmatched:${category.label}`;
    case "unspecified":
      return "unspecified";
  }
}

function categoryLabel(category: CategoryRef): string {
  return category.kind === "unspecified" ? UNSPECIFIED_LABEL : category.label;
}

/**
 * Builds the record → category resolver for a run. Unmatched labels keep
 * their raw spelling; merging spellings is the ranking step's job.
 */
export function createCategoryResolver(
  reconciliation: LabelReconciliation,
  index: CatalogIndex,
): (record: MigrationRecord) => CategoryRef {
  const canonicalByLabel = new Map<string, string>();
  for (const match of reconciliation.exactMatches) {
    canonicalByLabel.set(match.sourceLabel, match.canonicalCategoryId);
  }
  for (const [label, id] of reconciliation.autoMappings) {
    canonicalByLabel.set(label, id);
  }

  const toCanonical = (id: string): CategoryRef | null => {
    const category = index.categoriesById.get(id);
    return category ? { kind: "canonical", id: category.id, label: category.label } : null;
  };

  return (record) => {
    const byRef = toCanonical(trimToEmpty(record.classRef));
    if (byRef) {
      return byRef;
    }

    const label = trimToEmpty(record.classLabel);
    if (!label) {
      return { kind: "unspecified" };
    }

    const mappedId = canonicalByLabel.get(label);
    const mapped = mappedId ? toCanonical(mappedId) : null;
    return mapped ?? { kind: "unmatched", label };
  };
}

function emptyIssueCounts(): IssueCounts {
  return {
    MISSING_STUDENT: 0,
    MISSING_CLASS: 0,
    MISSING_TERM: 0,
    INVALID_ENUM: 0,
    UNKNOWN: 0,
  };
}

function compareShares(left: CategoryShare, right: CategoryShare): number {
  return (
    right.count - left.count ||
    compareText(left.label, right.label) ||
    compareText(left.key, right.key)
  );
}

function buildValueShares(counts: Map<string, number>, total: number): ValueShare[] {
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count, percentage: ratio(count, total) * 100 }))
    .sort((left, right) => right.count - left.count || compareText(left.value, right.value));
}

export function computeGroupStatistics(
  entries: readonly AggregationEntry[],
  breakdownFields: readonly string[] = [],
): GroupStatistics {
  const total = entries.length;
  const issueCounts = emptyIssueCounts();
  const invalidEnumByField: Record<string, number> = {};
  const categories = new Map<string, CategoryShare>();
  const fieldCounts = new Map<string, Map<string, number>>(
    breakdownFields.map((field) => [field, new Map<string, number>()]),
  );
  let migratableCount = 0;

  for (const entry of entries) {
    if (entry.audit.migratable) {
      migratableCount += 1;
    }

    const kinds = new Set(entry.audit.issues.map((issue) => issue.kind));
    for (const kind of kinds) {
      issueCounts[kind] += 1;
    }
    for (const issue of entry.audit.issues) {
      if (issue.kind === "INVALID_ENUM") {
        incrementCount(invalidEnumByField, issue.field);
      }
    }

    const key = categoryKey(entry.category);
    const share = categories.get(key) ?? {
      key,
      kind: entry.category.kind,
      label: categoryLabel(entry.category),
      count: 0,
      percentage: 0,
    };
    share.count += 1;
    categories.set(key, share);

    for (const [field, counts] of fieldCounts) {
      const value = trimToEmpty(entry.enumFields[field]) || UNSPECIFIED_VALUE;
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  const categoryDistribution = [...categories.values()]
    .map((share) => ({ ...share, percentage: ratio(share.count, total) * 100 }))
    .sort(compareShares);

  const fieldBreakdowns: Record<string, ValueShare[]> = {};
  for (const [field, counts] of fieldCounts) {
    fieldBreakdowns[field] = buildValueShares(counts, total);
  }

  return {
    total,
    migratableCount,
    invalidCount: total - migratableCount,
    migratableRate: ratio(migratableCount, total),
    issueCounts,
    invalidEnumByField,
    categoryDistribution,
    fieldBreakdowns,
  };
}

export function growthRate(current: number, previous: number | null): number | null {
  if (previous === null || previous === 0) {
    return null;
  }
  return (current - previous) / previous;
}

export function comparePeriodKeys(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  if (left === UNSPECIFIED_PERIOD) {
    return 1;
  }
  if (right === UNSPECIFIED_PERIOD) {
    return -1;
  }
  return compareText(left, right);
}

/**
 * Folds audited records into one report per period plus a combined report.
 * Periods are ordered by key, so "2023-2024" precedes "2024-2025" and growth
 * is measured against the preceding key. The unspecified bucket is listed
 * last and carries no growth rate.
 */
export function aggregateRun(
  entries: readonly AggregationEntry[],
  options: AggregateOptions,
): AggregateResult {
  const byPeriod = new Map<string, AggregationEntry[]>();
  for (const entry of entries) {
    const periodKey = entry.periodKey || UNSPECIFIED_PERIOD;
    const bucket = byPeriod.get(periodKey) ?? [];
    bucket.push(entry);
    byPeriod.set(periodKey, bucket);
  }

  const periodKeys = [...byPeriod.keys()].sort(comparePeriodKeys);
  const periods: PeriodReport[] = [];
  let previous: PeriodReport | null = null;

  for (const periodKey of periodKeys) {
    const statistics = computeGroupStatistics(byPeriod.get(periodKey) ?? [], options.breakdownFields);
    // The catch-all bucket is not a period: it has no growth and starts no chain.
    if (periodKey === UNSPECIFIED_PERIOD) {
      periods.push({ periodKey, previousPeriodKey: null, growthRate: null, ...statistics });
      continue;
    }

    const report: PeriodReport = {
      periodKey,
      previousPeriodKey: previous?.periodKey ?? null,
      growthRate: growthRate(statistics.total, previous?.total ?? null),
      ...statistics,
    };
    periods.push(report);
    previous = report;
  }

  const combinedStatistics = computeGroupStatistics(entries, options.breakdownFields);
  return {
    periods,
    combined: {
      ...combinedStatistics,
      periodKeys,
      topCategories: combinedStatistics.categoryDistribution.slice(0, Math.max(0, options.topN)),
    },
  };
}
