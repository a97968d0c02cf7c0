export type ConfidenceTier = "HIGH" | "MEDIUM" | "LOW";

export type MappingRecommendation = "auto_map" | "review" | "new_category" | "unspecified";

export interface CatalogEntry {
  id: string;
  label: string;
}

export interface CanonicalCategory {
  readonly id: string;
  readonly label: string;
  readonly tokens: ReadonlySet<string>;
}

export interface NormalizedLabel {
  readonly raw: string;
  readonly tokens: ReadonlySet<string>;
  readonly unspecified: boolean;
}

export interface SampleRecordRef {
  recordId: string;
  displayName: string;
}

export interface SourceLabel {
  label: string;
  recordCount: number;
  sampleRecords?: SampleRecordRef[];
}

export interface MatchCandidate {
  sourceLabel: string;
  canonicalCategoryId: string;
  canonicalLabel: string;
  sharedTokens: string[];
  confidence: number;
  tier: ConfidenceTier;
}

export interface LabelRanking {
  sourceLabel: string;
  recordCount: number;
  tokens: string[];
  unspecified: boolean;
  exactMatch: boolean;
  candidates: MatchCandidate[];
  bestTier: ConfidenceTier | null;
  recommendation: MappingRecommendation;
  sampleRecords: SampleRecordRef[];
}

export interface TierThresholds {
  highMin: number;
  mediumMin: number;
}

export type EnumFieldValues = Record<string, string | null | undefined>;

export interface MigrationRecord {
  recordId: string | null;
  studentRef: string | null;
  classRef: string | null;
  termRef: string | null;
  enumFields: EnumFieldValues;
  studentName?: string | null;
  classLabel?: string | null;
  termLabel?: string | null;
  enrolledOn?: string | null;
}

export type EnumRuleTable = Record<string, readonly string[]>;

export interface MigrationLookups {
  studentExists: (studentRef: string) => boolean;
  classExists: (classRef: string) => boolean;
  termExists: (termRef: string) => boolean;
  enumRules: EnumRuleTable;
}

export type IssueKind =
  | "MISSING_STUDENT"
  | "MISSING_CLASS"
  | "MISSING_TERM"
  | "INVALID_ENUM"
  | "UNKNOWN";

export type MigrationIssue =
  | { kind: "MISSING_STUDENT"; studentRef: string | null; anonymous: boolean }
  | { kind: "MISSING_CLASS"; classRef: string | null }
  | { kind: "MISSING_TERM"; termRef: string | null }
  | { kind: "INVALID_ENUM"; field: string; value: string; suggestion: string | null }
  | { kind: "UNKNOWN"; reason: string | null };

export interface MigrationAudit {
  recordId: string;
  periodKey: string;
  issues: MigrationIssue[];
  issueKeys: string[];
  migratable: boolean;
}

export type CategoryRef =
  | { kind: "canonical"; id: string; label: string }
  | { kind: "unmatched"; label: string }
  | { kind: "unspecified" };

export interface AggregationEntry {
  periodKey: string;
  audit: MigrationAudit;
  category: CategoryRef;
  enumFields: EnumFieldValues;
}

export interface CategoryShare {
  key: string;
  kind: CategoryRef["kind"];
  label: string;
  count: number;
  percentage: number;
}

export interface ValueShare {
  value: string;
  count: number;
  percentage: number;
}

export type IssueCounts = Record<IssueKind, number>;

export interface GroupStatistics {
  total: number;
  migratableCount: number;
  invalidCount: number;
  migratableRate: number;
  issueCounts: IssueCounts;
  invalidEnumByField: Record<string, number>;
  categoryDistribution: CategoryShare[];
  fieldBreakdowns: Record<string, ValueShare[]>;
}

export interface PeriodReport extends GroupStatistics {
  periodKey: string;
  previousPeriodKey: string | null;
  growthRate: number | null;
}

export interface CombinedReport extends GroupStatistics {
  periodKeys: string[];
  topCategories: CategoryShare[];
}

export type RunLogLevel = "debug" | "info" | "warn" | "error";

export interface RunLogRow {
  runId: string;
  seq: number;
  level: RunLogLevel;
  stage: string;
  event: string;
  message: string;
  payload: Record<string, unknown>;
  timestamp: string;
  expiresAt: string;
}
