import type { EnumAliasTable } from "../reference/load.js";
import type {
  MigrationAudit,
  MigrationIssue,
  MigrationLookups,
  MigrationRecord,
} from "../types.js";
import { compareText, isBlank, trimToEmpty } from "../utils/text.js";
import { periodKeyFor } from "./academic-period.js";
import { suggestEnumCorrection } from "./enum-corrections.js";

export interface PredicateInput {
  record: MigrationRecord;
  recordId: string;
  lookups: MigrationLookups;
  enumAliases?: EnumAliasTable;
}

/**
 * One validity check. Predicates never see each other's output and are
 * combined by union, so adding or reordering them cannot hide an issue.
 */
export interface IssuePredicate {
  readonly name: string;
  evaluate(input: PredicateInput): MigrationIssue[];
}

export interface ClassificationContext {
  lookups: MigrationLookups;
  enumAliases?: EnumAliasTable;
  /** When given, records absent from this set are known to have failed migration. */
  migratedRecordIds?: ReadonlySet<string>;
  predicates?: readonly IssuePredicate[];
}

export const missingStudentPredicate: IssuePredicate = {
  name: "missing_student",
  evaluate({ record, lookups }) {
    const studentRef = trimToEmpty(record.studentRef);
    if (!studentRef) {
      return [{ kind: "MISSING_STUDENT", studentRef: null, anonymous: true }];
    }
    if (!lookups.studentExists(studentRef)) {
      return [{ kind: "MISSING_STUDENT", studentRef, anonymous: false }];
    }
    return [];
  },
};

export const missingClassPredicate: IssuePredicate = {
  name: "missing_class",
  evaluate({ record, lookups }) {
    const classRef = trimToEmpty(record.classRef);
    if (!classRef) {
      return [{ kind: "MISSING_CLASS", classRef: null }];
    }
    return lookups.classExists(classRef) ? [] : [{ kind: "MISSING_CLASS", classRef }];
  },
};

export const missingTermPredicate: IssuePredicate = {
  name: "missing_term",
  evaluate({ record, lookups }) {
    const termRef = trimToEmpty(record.termRef);
    if (!termRef) {
      return [{ kind: "MISSING_TERM", termRef: null }];
    }
    return lookups.termExists(termRef) ? [] : [{ kind: "MISSING_TERM", termRef }];
  },
};

export const invalidEnumPredicate: IssuePredicate = {
  name: "invalid_enum",
  evaluate({ record, lookups, enumAliases }) {
    const issues: MigrationIssue[] = [];
    const fields = Object.keys(lookups.enumRules).sort(compareText);

    for (const field of fields) {
      const raw = record.enumFields[field];
      if (raw === null || raw === undefined || isBlank(raw)) {
        continue;
      }

      const allowedValues = lookups.enumRules[field] ?? [];
      const value = raw.trim();
      if (allowedValues.includes(value)) {
        continue;
      }

      issues.push({
        kind: "INVALID_ENUM",
        field,
        value: raw,
        suggestion: suggestEnumCorrection({ field, value, allowedValues, aliases: enumAliases }),
      });
    }

    return issues;
  },
};

export const DEFAULT_ISSUE_PREDICATES: readonly IssuePredicate[] = [
  missingStudentPredicate,
  missingClassPredicate,
  missingTermPredicate,
  invalidEnumPredicate,
];

export function issueKey(issue: MigrationIssue): string {
  return issue.kind === "INVALID_ENUM" ? `INVALID_ENUM:${issue.field}` : issue.kind;
}

function canonicalIssueSet(issues: MigrationIssue[]): MigrationIssue[] {
  const keyed = issues
    .map((issue) => ({ key: issueKey(issue), body: JSON.stringify(issue), issue }))
    .sort((left, right) => compareText(left.key, right.key) || compareText(left.body, right.body));

  const seen = new Set<string>();
  const output: MigrationIssue[] = [];
  for (const entry of keyed) {
    if (seen.has(entry.key)) {
      continue;
    }
    seen.add(entry.key);
    output.push(entry.issue);
  }
  return output;
}

export function resolveRecordId(record: MigrationRecord, position: number): string {
  return trimToEmpty(record.recordId) || `anonymous-${position + 1}`;
}

/**
 * Evaluates every predicate against one record and returns the union of the
 * issues they raise. A predicate that throws (typically a failing lookup)
 * turns into an UNKNOWN issue for this record only.
 */
export function classifyRecord(
  record: MigrationRecord,
  context: ClassificationContext,
  position = 0,
): MigrationAudit {
  const recordId = resolveRecordId(record, position);
  const predicates = context.predicates ?? DEFAULT_ISSUE_PREDICATES;
  const input: PredicateInput = {
    record,
    recordId,
    lookups: context.lookups,
    enumAliases: context.enumAliases,
  };

  const raised: MigrationIssue[] = [];
  const failures: string[] = [];

  for (const predicate of predicates) {
    try {
      raised.push(...predicate.evaluate(input));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push(`predicate_failed:${predicate.name}: ${message}`);
    }
  }

  if (failures.length > 0) {
    raised.push({ kind: "UNKNOWN", reason: failures.sort(compareText).join("; ") });
  }

  const knownNonMigrated =
    context.migratedRecordIds !== undefined && !context.migratedRecordIds.has(recordId);
  if (raised.length === 0 && knownNonMigrated) {
    raised.push({ kind: "UNKNOWN", reason: null });
  }

  const issues = canonicalIssueSet(raised);
  return {
    recordId,
    periodKey: periodKeyFor(record),
    issues,
    issueKeys: issues.map(issueKey),
    migratable: issues.length === 0,
  };
}

export function auditRecords(
  records: readonly MigrationRecord[],
  context: ClassificationContext,
  offset = 0,
): MigrationAudit[] {
  return records.map((record, index) => classifyRecord(record, context, offset + index));
}
