import { describe, expect, it } from "vitest";
import {
  DEFAULT_ISSUE_PREDICATES,
  auditRecords,
  classifyRecord,
  type ClassificationContext,
} from "../src/pipeline/issue-classifier.js";
import { loadEnumReference } from "../src/reference/load.js";
import type { MigrationLookups, MigrationRecord } from "../src/types.js";

const reference = loadEnumReference();

function lookups(overrides: Partial<MigrationLookups> = {}): MigrationLookups {
  return {
    studentExists: (ref) => ref === "s1" || ref === "s2",
    classExists: (ref) => ref === "c1",
    termExists: (ref) => ref === "t1",
    enumRules: reference.rules,
    ...overrides,
  };
}

function record(overrides: Partial<MigrationRecord> = {}): MigrationRecord {
  return {
    recordId: "r1",
    studentRef: "s1",
    classRef: "c1",
    termRef: "t1",
    enumFields: {},
    ...overrides,
  };
}

const context: ClassificationContext = { lookups: lookups(), enumAliases: reference.aliases };

describe("issue classifier", () => {
  it("reports every independent issue of a record at once", () => {
    const audit = classifyRecord(
      record({
        studentRef: "s-missing",
        classRef: "c-missing",
        enumFields: { payment_method: "Orange Money" },
      }),
      context,
    );

    expect(audit.issueKeys).toEqual(["INVALID_ENUM:payment_method", "MISSING_CLASS", "MISSING_STUDENT"]);
    expect(audit.issues).toEqual([
      { kind: "INVALID_ENUM", field: "payment_method", value: "Orange Money", suggestion: "OM" },
      { kind: "MISSING_CLASS", classRef: "c-missing" },
      { kind: "MISSING_STUDENT", studentRef: "s-missing", anonymous: false },
    ]);
    expect(audit.migratable).toBe(false);
  });

  it("flags a record with no student, no class and an invalid payment method", () => {
    const audit = classifyRecord(
      record({
        studentRef: null,
        classRef: null,
        termRef: "t1",
        enumFields: { payment_method: "Orange Money" },
      }),
      context,
    );

    expect(audit.issueKeys).toEqual(["INVALID_ENUM:payment_method", "MISSING_CLASS", "MISSING_STUDENT"]);
    expect(audit.issues).toEqual([
      { kind: "INVALID_ENUM", field: "payment_method", value: "Orange Money", suggestion: "OM" },
      { kind: "MISSING_CLASS", classRef: null },
      { kind: "MISSING_STUDENT", studentRef: null, anonymous: true },
    ]);
  });

  it("marks a record with valid references and allowed values as migratable", () => {
    const audit = classifyRecord(
      record({
        enumFields: { payment_method: "WAVE", status: "Inscription Validée ", sms: "" },
      }),
      context,
    );

    expect(audit.issues).toEqual([]);
    expect(audit.migratable).toBe(true);
  });

  it("does not depend on predicate order and is idempotent", () => {
    const input = record({
      studentRef: "",
      termRef: "t-old",
      enumFields: { action: "Transfert", book_given: "peut-être" },
    });
    const forward = classifyRecord(input, context);
    const reversed = classifyRecord(input, {
      ...context,
      predicates: [...DEFAULT_ISSUE_PREDICATES].reverse(),
    });

    expect(reversed).toEqual(forward);
    expect(classifyRecord(input, context)).toEqual(forward);
    expect(forward.issueKeys).toEqual([
      "INVALID_ENUM:action",
      "INVALID_ENUM:book_given",
      "MISSING_STUDENT",
      "MISSING_TERM",
    ]);
  });

  it("treats blank references as missing and gives blank ids a positional placeholder", () => {
    const audit = classifyRecord(record({ recordId: "  ", studentRef: null, classRef: " " }), context, 4);

    expect(audit.recordId).toBe("anonymous-5");
    expect(audit.issues).toEqual([
      { kind: "MISSING_CLASS", classRef: null },
      { kind: "MISSING_STUDENT", studentRef: null, anonymous: true },
    ]);
  });

  it("reports date-like values in yes/no fields without a suggestion", () => {
    const audit = classifyRecord(record({ enumFields: { sms: "12/03/2024" } }), context);

    expect(audit.issues).toEqual([
      { kind: "INVALID_ENUM", field: "sms", value: "12/03/2024", suggestion: null },
    ]);
  });

  it("marks a known non-migrated record without issues as UNKNOWN", () => {
    const migratedRecordIds = new Set(["r2"]);

    const missing = classifyRecord(record(), { ...context, migratedRecordIds });
    const migrated = classifyRecord(record({ recordId: "r2" }), { ...context, migratedRecordIds });

    expect(missing.issues).toEqual([{ kind: "UNKNOWN", reason: null }]);
    expect(missing.migratable).toBe(false);
    expect(migrated.migratable).toBe(true);
  });

  it("turns a failing lookup into UNKNOWN for that record and keeps going", () => {
    const failing: ClassificationContext = {
      ...context,
      lookups: lookups({
        studentExists: (ref) => {
          if (ref === "s-boom") {
            throw new Error("lookup down");
          }
          return ref === "s1";
        },
      }),
    };

    const audits = auditRecords(
      [record({ recordId: "r1", studentRef: "s-boom" }), record({ recordId: "r2" })],
      failing,
    );

    expect(audits.map((audit) => audit.recordId)).toEqual(["r1", "r2"]);
    expect(audits[0]?.issues).toEqual([
      { kind: "UNKNOWN", reason: "predicate_failed:missing_student: lookup down" },
    ]);
    expect(audits[1]?.migratable).toBe(true);
  });

  it("offsets placeholder ids by the batch position", () => {
    const audits = auditRecords([record({ recordId: null }), record({ recordId: "" })], context, 100);

    expect(audits.map((audit) => audit.recordId)).toEqual(["anonymous-101", "anonymous-102"]);
  });

  it("derives the period key from the term label first", () => {
    const audit = classifyRecord(record({ termLabel: "2024-2025", enrolledOn: "2023-10-01" }), context);

    expect(audit.periodKey).toBe("2024-2025");
  });
});
