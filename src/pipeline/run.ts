import { randomUUID } from "node:crypto";
import { type AppConfig, getConfig } from "../config.js";
import { createJsonlLogSink } from "../logging/log-sink.js";
import { RunLogger } from "../logging/run-logger.js";
import { type EnumAliasTable, loadEnumReference } from "../reference/load.js";
import type {
  AggregationEntry,
  CatalogEntry,
  CombinedReport,
  LabelRanking,
  MigrationAudit,
  MigrationLookups,
  MigrationRecord,
  PeriodReport,
  SourceLabel,
} from "../types.js";
import { aggregateRun, createCategoryResolver } from "./aggregate.js";
import { mapInBatches } from "./batch.js";
import { rankCandidates, type RankingOptions } from "./candidate-ranking.js";
import { buildCatalogIndex } from "./catalog-index.js";
import { auditRecords, type IssuePredicate } from "./issue-classifier.js";
import {
  type LabelReconciliation,
  collectSourceLabels,
  foldRankings,
} from "./label-reconciliation.js";
import { type SimilarityStrategy, getSimilarityStrategy } from "./similarity.js";

export interface RunReconciliationInput {
  catalog: readonly CatalogEntry[];
  records: readonly MigrationRecord[];
  lookups: MigrationLookups;
  /** Derived from the records' class labels when omitted. */
  sourceLabels?: readonly SourceLabel[];
  migratedRecordIds?: ReadonlySet<string>;
  enumAliases?: EnumAliasTable;
  predicates?: readonly IssuePredicate[];
  strategy?: SimilarityStrategy;
  config?: AppConfig;
  logger?: RunLogger;
  runId?: string;
  now?: () => Date;
}

export interface ReconciliationRunStats {
  catalog_size: number;
  source_label_count: number;
  record_count: number;
  migratable_count: number;
  exact_match_count: number;
  auto_mapping_count: number;
  review_candidate_count: number;
  new_category_count: number;
  predicate_failure_count: number;
  stage_timings_ms: Record<string, number>;
}

export interface ReconciliationReport {
  runId: string;
  generatedAt: string;
  strategy: string;
  reconciliation: LabelReconciliation;
  audits: MigrationAudit[];
  periods: PeriodReport[];
  combined: CombinedReport;
  stats: ReconciliationRunStats;
}

function auditsWithPredicateFailures(audits: readonly MigrationAudit[]): MigrationAudit[] {
  return audits.filter((audit) =>
    audit.issues.some((issue) => issue.kind === "UNKNOWN" && issue.reason !== null),
  );
}

/**
 * Runs label reconciliation and record auditing over one pair of snapshots
 * and folds both into period and combined reports.
 */
export async function runReconciliation(
  input: RunReconciliationInput,
): Promise<ReconciliationReport> {
  const config = input.config ?? getConfig();
  const runId = input.runId ?? randomUUID();
  const now = input.now ?? (() => new Date());
  const logger =
    input.logger ??
    new RunLogger({
      runId,
      traceRetentionHours: config.TRACE_RETENTION_HOURS,
      flushBatchSize: config.TRACE_FLUSH_BATCH_SIZE,
      writeBatch: createJsonlLogSink(config.OUTPUT_DIR, runId),
      now,
    });
  const strategy = input.strategy ?? getSimilarityStrategy(config.SIMILARITY_STRATEGY);
  const stageTimingsMs: Record<string, number> = {};

  logger.info("pipeline", "run.started", "Reconciliation run started.", {
    run_id: runId,
    catalog_size: input.catalog.length,
    record_count: input.records.length,
    strategy: strategy.name,
    top_n: config.RECONCILE_TOP_N,
    tier_high_min: config.TIER_HIGH_MIN,
    tier_medium_min: config.TIER_MEDIUM_MIN,
  });

  try {
    const indexStart = Date.now();
    const index = buildCatalogIndex(input.catalog);
    stageTimingsMs.catalog_index_ms = Date.now() - indexStart;
    logger.info("catalog", "stage.completed", "Catalog index built.", {
      stage_name: "catalog_index",
      categories: index.categories.length,
      elapsed_ms: stageTimingsMs.catalog_index_ms,
    });

    const labels =
      input.sourceLabels ?? collectSourceLabels(input.records, config.SAMPLE_RECORDS_PER_LABEL);
    const rankingOptions: RankingOptions = {
      topN: config.RECONCILE_TOP_N,
      strategy,
      thresholds: { highMin: config.TIER_HIGH_MIN, mediumMin: config.TIER_MEDIUM_MIN },
    };

    const rankingStart = Date.now();
    const rankings = await mapInBatches<SourceLabel, LabelRanking>({
      items: labels,
      batchSize: config.RANK_BATCH_SIZE,
      concurrency: config.RANK_CONCURRENCY,
      work: (batch) => batch.map((label) => rankCandidates(label, index, rankingOptions)),
    });
    const reconciliation = foldRankings(rankings);
    stageTimingsMs.ranking_ms = Date.now() - rankingStart;
    logger.info("ranking", "stage.completed", "Source labels ranked against the catalog.", {
      stage_name: "ranking",
      source_labels: labels.length,
      exact_matches: reconciliation.exactMatches.length,
      auto_mappings: reconciliation.autoMappings.size,
      review_candidates: reconciliation.reviewQueue.length,
      new_categories: reconciliation.newCategories.length,
      elapsed_ms: stageTimingsMs.ranking_ms,
    });

    const enumAliases = input.enumAliases ?? loadEnumReference().aliases;
    const classifyStart = Date.now();
    const audits = await mapInBatches<MigrationRecord, MigrationAudit>({
      items: input.records,
      batchSize: config.CLASSIFY_BATCH_SIZE,
      concurrency: config.CLASSIFY_CONCURRENCY,
      work: (batch, offset) =>
        auditRecords(
          batch,
          {
            lookups: input.lookups,
            enumAliases,
            migratedRecordIds: input.migratedRecordIds,
            predicates: input.predicates,
          },
          offset,
        ),
      onBatchCompleted: (done, total) => {
        logger.debug("classification", "batch.completed", "Record batch classified.", {
          completed: done,
          total,
        });
      },
    });
    stageTimingsMs.classification_ms = Date.now() - classifyStart;

    const failedAudits = auditsWithPredicateFailures(audits);
    if (failedAudits.length > 0) {
      logger.warn(
        "classification",
        "predicate.failed",
        "Some records could not be fully evaluated and were marked UNKNOWN.",
        {
          affected_records: failedAudits.length,
          sample_record_ids: failedAudits.slice(0, 10).map((audit) => audit.recordId),
        },
      );
    }
    logger.info("classification", "stage.completed", "Records classified.", {
      stage_name: "classification",
      records: audits.length,
      migratable: audits.filter((audit) => audit.migratable).length,
      elapsed_ms: stageTimingsMs.classification_ms,
    });

    const aggregateStart = Date.now();
    const resolveCategory = createCategoryResolver(reconciliation, index);
    const entries: AggregationEntry[] = input.records.map((record, position) => {
      const audit = audits[position];
      if (!audit) {
        throw new Error(`Missing audit for record at position ${position}.`);
      }
      return {
        periodKey: audit.periodKey,
        audit,
        category: resolveCategory(record),
        enumFields: record.enumFields,
      };
    });
    const { periods, combined } = aggregateRun(entries, {
      topN: config.REPORT_TOP_N,
      breakdownFields: config.BREAKDOWN_FIELDS,
    });
    stageTimingsMs.aggregation_ms = Date.now() - aggregateStart;

    const stats: ReconciliationRunStats = {
      catalog_size: index.categories.length,
      source_label_count: labels.length,
      record_count: audits.length,
      migratable_count: combined.migratableCount,
      exact_match_count: reconciliation.exactMatches.length,
      auto_mapping_count: reconciliation.autoMappings.size,
      review_candidate_count: reconciliation.reviewQueue.length,
      new_category_count: reconciliation.newCategories.length,
      predicate_failure_count: failedAudits.length,
      stage_timings_ms: stageTimingsMs,
    };

    logger.info("pipeline", "run.completed", "Reconciliation run completed.", {
      run_id: runId,
      periods: periods.map((period) => period.periodKey),
      total: combined.total,
      migratable_rate: combined.migratableRate,
    });
    await logger.flush("run_completed");

    return {
      runId,
      generatedAt: now().toISOString(),
      strategy: strategy.name,
      reconciliation,
      audits,
      periods,
      combined,
      stats,
    };
  } catch (error) {
    logger.error("pipeline", "run.failed", "Reconciliation run failed.", {
      run_id: runId,
      error_message: error instanceof Error ? error.message : String(error),
    });
    await logger.flush("run_failed");
    throw error;
  }
}
