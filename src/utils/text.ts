import slugifyModule from "slugify";

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;
const TOKEN_SEPARATORS = /[\s()[\]{},;/|]+/u;

/**
 * Lower-cases and collapses whitespace while keeping diacritics intact:
 * "2ème" and "2eme" are different words in the class vocabulary.
 */
export function normalizeText(value: string | null | undefined): string {
  if (!value) {
    return "";
  }

  return value.normalize("NFC").replace(/\s+/g, " ").trim().toLowerCase();
}

export function stripEdgePunctuation(token: string): string {
  return token.replace(EDGE_PUNCTUATION, "");
}

export function splitTokens(text: string): string[] {
  return normalizeText(text)
    .split(TOKEN_SEPARATORS)
    .map((token) => stripEdgePunctuation(token))
    .filter((token) => token.length > 0);
}

/** Case and accent insensitive comparison key, used only for correction hints. */
export function foldText(value: string): string {
  return normalizeText(value)
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[\u2019`]/g, "'");
}

export function makeSlug(input: string): string {
  const slugify = slugifyModule as unknown as (
    value: string,
    options?: {
      lower?: boolean;
      strict?: boolean;
      trim?: boolean;
    },
  ) => string;

  const slug = slugify(input, {
    lower: true,
    strict: true,
    trim: true,
  });

  return slug.length > 0 ? slug.slice(0, 64) : "classe-sans-nom";
}

export function trimToEmpty(value: string | null | undefined): string {
  return value?.trim() ?? "";
}

export function isBlank(value: string | null | undefined): boolean {
  return trimToEmpty(value).length === 0;
}

export function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  if (left > right) {
    return 1;
  }
  return 0;
}
