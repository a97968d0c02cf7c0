export { getConfig, type AppConfig } from "./config.js";
export * from "./types.js";
export { RunLogger, type RunLoggerOptions, type RunLogSink } from "./logging/run-logger.js";
export { createJsonlLogSink, createMemoryLogSink } from "./logging/log-sink.js";
export { loadEnumReference, parseEnumReference, type LoadedEnumReference } from "./reference/load.js";
export { normalizeLabel, UNSPECIFIED_LABEL } from "./pipeline/normalize.js";
export { buildCatalogIndex, findExactCategory, type CatalogIndex } from "./pipeline/catalog-index.js";
export {
  diceStrategy,
  jaccardStrategy,
  getSimilarityStrategy,
  tierFor,
  DEFAULT_TIER_THRESHOLDS,
  type SimilarityStrategy,
  type SimilarityResult,
} from "./pipeline/similarity.js";
export { rankCandidates, compareCandidates, type RankingOptions } from "./pipeline/candidate-ranking.js";
export {
  collectSourceLabels,
  reconcileLabels,
  foldRankings,
  type LabelReconciliation,
  type NewCategoryProposal,
} from "./pipeline/label-reconciliation.js";
export {
  classifyRecord,
  auditRecords,
  issueKey,
  DEFAULT_ISSUE_PREDICATES,
  type ClassificationContext,
  type IssuePredicate,
} from "./pipeline/issue-classifier.js";
export { suggestEnumCorrection } from "./pipeline/enum-corrections.js";
export { academicYearOf, periodKeyFor, UNSPECIFIED_PERIOD } from "./pipeline/academic-period.js";
export {
  aggregateRun,
  computeGroupStatistics,
  createCategoryResolver,
  growthRate,
} from "./pipeline/aggregate.js";
export {
  readSnapshotRows,
  mapCatalogRows,
  mapEnrollmentRows,
  mapSourceLabelRows,
  createSnapshotLookups,
} from "./pipeline/ingest.js";
export { runReconciliation, type ReconciliationReport } from "./pipeline/run.js";
