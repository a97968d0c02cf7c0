import type { MigrationRecord } from "../types.js";
import { trimToEmpty } from "../utils/text.js";

export const UNSPECIFIED_PERIOD = "unspecified";

// School years start in September.
const SCHOOL_YEAR_START_MONTH = 9;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

export function academicYearOf(date: string | null | undefined): string | null {
  const match = trimToEmpty(date).match(ISO_DATE);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    return null;
  }

  return month >= SCHOOL_YEAR_START_MONTH ? `${year}-${year + 1}` : `${year - 1}-${year}`;
}

export function periodKeyFor(record: MigrationRecord): string {
  return (
    trimToEmpty(record.termLabel) ||
    academicYearOf(record.enrolledOn) ||
    trimToEmpty(record.termRef) ||
    UNSPECIFIED_PERIOD
  );
}
