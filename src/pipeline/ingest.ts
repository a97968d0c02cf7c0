import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";
import type {
  CatalogEntry,
  EnumFieldValues,
  EnumRuleTable,
  MigrationLookups,
  MigrationRecord,
  SourceLabel,
} from "../types.js";
import { foldText, trimToEmpty } from "../utils/text.js";

type RecordColumn =
  | "recordId"
  | "studentRef"
  | "studentName"
  | "firstNames"
  | "lastName"
  | "classRef"
  | "classLabel"
  | "termRef"
  | "termLabel"
  | "enrolledOn";

const RECORD_COLUMN_ALIASES: Record<RecordColumn, string[]> = {
  recordId: ["id_inscription", "record_id", "inscription_id"],
  studentRef: ["id_catechumene", "student_ref", "student_id", "id_eleve"],
  studentName: ["student_name", "nom_complet"],
  firstNames: ["prenoms", "prenom", "first_names"],
  lastName: ["nom", "last_name"],
  classRef: ["id_classecourante", "id_classe_courante", "class_ref", "class_id"],
  classLabel: ["classecourante", "classe_courante", "class_label", "classe", "classe_nom"],
  termRef: ["id_anneeinscription", "id_annee_inscription", "term_ref", "term_id"],
  termLabel: ["annee_inscription", "annee_scolaire", "term_label"],
  enrolledOn: ["date_inscription", "enrolled_on"],
};

export const DEFAULT_ENUM_COLUMN_ALIASES: Record<string, string[]> = {
  action: ["action"],
  payment_method: ["moyen_paiement", "payment_method"],
  status: ["etat", "status"],
  sms: ["sms"],
  transfer_certificate: ["attestationdetransfert", "attestation_de_transfert", "transfer_certificate"],
  book_given: ["livre_remis", "book_given"],
};

const CATALOG_COLUMN_ALIASES: Record<keyof CatalogEntry, string[]> = {
  id: ["id", "class_id", "classe_id", "id_classe"],
  label: ["classe_nom", "nom_classe", "label", "nom", "name"],
};

const SOURCE_LABEL_COLUMN_ALIASES: Record<keyof Omit<SourceLabel, "sampleRecords">, string[]> = {
  label: ["label", "classe", "classecourante", "classe_courante"],
  recordCount: ["record_count", "count", "nombre"],
};

export type SnapshotRow = Record<string, unknown>;

export function normalizeHeader(header: string): string {
  return foldText(header)
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function pickColumn(row: SnapshotRow, aliases: string[]): string | undefined {
  const normalizedMap = new Map<string, string>();
  for (const key of Object.keys(row)) {
    normalizedMap.set(normalizeHeader(key), key);
  }

  for (const alias of aliases) {
    const realKey = normalizedMap.get(alias);
    if (realKey) {
      return realKey;
    }
  }

  return undefined;
}

function resolveColumns<K extends string>(
  first: SnapshotRow,
  aliases: Record<K, string[]>,
): Partial<Record<K, string>> {
  const keyMap: Partial<Record<K, string>> = {};
  for (const field of Object.keys(aliases) as K[]) {
    keyMap[field] = pickColumn(first, aliases[field]);
  }
  return keyMap;
}

function formatDate(value: Date): string {
  const month = String(value.getMonth() + 1).padStart(2, "0");
  const day = String(value.getDate()).padStart(2, "0");
  return `${value.getFullYear()}-${month}-${day}`;
}

function cell(row: SnapshotRow, column: string | undefined): string {
  if (!column) {
    return "";
  }
  const value = row[column];
  if (value === null || value === undefined) {
    return "";
  }
  // Spreadsheet date cells come back as local-midnight Date objects.
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : formatDate(value);
  }
  return trimToEmpty(String(value));
}

function cellOrNull(row: SnapshotRow, column: string | undefined): string | null {
  return cell(row, column) || null;
}

export async function readSnapshotRows(filePath: string): Promise<SnapshotRow[]> {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === ".csv") {
    const content = await readFile(filePath, "utf8");
    return parse(content, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
      trim: true,
    }) as SnapshotRow[];
  }

  if (extension === ".xlsx" || extension === ".xls") {
    const workbook = XLSX.read(await readFile(filePath), { type: "buffer", cellDates: true });
    const firstSheetName = workbook.SheetNames[0];
    if (!firstSheetName) {
      return [];
    }

    const worksheet = workbook.Sheets[firstSheetName];
    if (!worksheet) {
      return [];
    }
    return XLSX.utils.sheet_to_json<SnapshotRow>(worksheet, { defval: "" });
  }

  throw new Error(`Unsupported snapshot format: ${extension}. Use .csv or .xlsx.`);
}

export function mapCatalogRows(rows: SnapshotRow[]): CatalogEntry[] {
  const first = rows[0];
  if (!first) {
    return [];
  }

  const keyMap = resolveColumns(first, CATALOG_COLUMN_ALIASES);
  if (!keyMap.id || !keyMap.label) {
    throw new Error("Catalog snapshot must include columns for id (or alias) and classe_nom (or alias).");
  }

  const entries: CatalogEntry[] = [];
  for (const row of rows) {
    const id = cell(row, keyMap.id);
    if (!id) {
      continue;
    }
    entries.push({ id, label: cell(row, keyMap.label) });
  }
  return entries;
}

export function mapSourceLabelRows(rows: SnapshotRow[]): SourceLabel[] {
  const first = rows[0];
  if (!first) {
    return [];
  }

  const keyMap = resolveColumns(first, SOURCE_LABEL_COLUMN_ALIASES);
  if (!keyMap.label) {
    throw new Error("Source label snapshot must include a label column (or alias).");
  }

  return rows.map((row) => {
    const count = Number(cell(row, keyMap.recordCount));
    return {
      label: cell(row, keyMap.label),
      recordCount: Number.isFinite(count) && count > 0 ? Math.floor(count) : 0,
    };
  });
}

/**
 * Maps exported enrollment rows to migration records. Rows are never dropped
 * for missing identifiers: a blank id becomes an anonymous record later on.
 */
export function mapEnrollmentRows(
  rows: SnapshotRow[],
  enumColumnAliases: Record<string, string[]> = DEFAULT_ENUM_COLUMN_ALIASES,
): MigrationRecord[] {
  const first = rows[0];
  if (!first) {
    return [];
  }

  const keyMap = resolveColumns(first, RECORD_COLUMN_ALIASES);
  if (!keyMap.recordId) {
    throw new Error("Enrollment snapshot must include a column for id_inscription (or alias).");
  }
  const enumKeyMap = resolveColumns(first, enumColumnAliases);

  return rows.map((row) => {
    const enumFields: EnumFieldValues = {};
    for (const [field, column] of Object.entries(enumKeyMap)) {
      enumFields[field] = cellOrNull(row, column);
    }

    const fullName = [cell(row, keyMap.firstNames), cell(row, keyMap.lastName)]
      .filter(Boolean)
      .join(" ");

    return {
      recordId: cellOrNull(row, keyMap.recordId),
      studentRef: cellOrNull(row, keyMap.studentRef),
      studentName: cell(row, keyMap.studentName) || fullName || null,
      classRef: cellOrNull(row, keyMap.classRef),
      classLabel: cellOrNull(row, keyMap.classLabel),
      termRef: cellOrNull(row, keyMap.termRef),
      termLabel: cellOrNull(row, keyMap.termLabel),
      enrolledOn: cellOrNull(row, keyMap.enrolledOn),
      enumFields,
    };
  });
}

export function createSnapshotLookups(input: {
  studentIds: Iterable<string>;
  classIds: Iterable<string>;
  termIds: Iterable<string>;
  enumRules: EnumRuleTable;
}): MigrationLookups {
  const students = new Set([...input.studentIds].map((id) => id.trim()));
  const classes = new Set([...input.classIds].map((id) => id.trim()));
  const terms = new Set([...input.termIds].map((id) => id.trim()));

  return {
    studentExists: (studentRef) => students.has(studentRef),
    classExists: (classRef) => classes.has(classRef),
    termExists: (termRef) => terms.has(termRef),
    enumRules: input.enumRules,
  };
}
