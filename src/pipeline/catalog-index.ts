import type { CanonicalCategory, CatalogEntry } from "../types.js";
import { tokenSetKey } from "../utils/collections.js";
import { compareText, trimToEmpty } from "../utils/text.js";
import { normalizeLabel } from "./normalize.js";

export interface CatalogIndex {
  categories: readonly CanonicalCategory[];
  categoriesById: ReadonlyMap<string, CanonicalCategory>;
  categoriesByTokenKey: ReadonlyMap<string, readonly CanonicalCategory[]>;
}

function compareCategories(left: CanonicalCategory, right: CanonicalCategory): number {
  return compareText(left.label, right.label) || compareText(left.id, right.id);
}

/**
 * Tokenizes every catalog entry once. Rankers compare against these token sets
 * and never re-normalize a canonical label.
 */
export function buildCatalogIndex(catalog: readonly CatalogEntry[]): CatalogIndex {
  const categoriesById = new Map<string, CanonicalCategory>();
  const categoriesByTokenKey = new Map<string, CanonicalCategory[]>();

  for (const entry of catalog) {
    const id = trimToEmpty(entry.id);
    if (!id) {
      throw new Error(`Catalog entry "${entry.label}" has no id.`);
    }
    if (categoriesById.has(id)) {
      throw new Error(`Catalog contains duplicate id: ${id}`);
    }

    const normalized = normalizeLabel(entry.label);
    const category: CanonicalCategory = Object.freeze({
      id,
      label: normalized.raw,
      tokens: normalized.tokens,
    });
    categoriesById.set(id, category);

    if (normalized.tokens.size === 0) {
      continue;
    }

    const key = tokenSetKey(normalized.tokens);
    const bucket = categoriesByTokenKey.get(key) ?? [];
    bucket.push(category);
    categoriesByTokenKey.set(key, bucket);
  }

  for (const bucket of categoriesByTokenKey.values()) {
    bucket.sort(compareCategories);
  }

  return {
    categories: [...categoriesById.values()].sort(compareCategories),
    categoriesById,
    categoriesByTokenKey,
  };
}

export function findExactCategory(
  index: CatalogIndex,
  tokens: ReadonlySet<string>,
): CanonicalCategory | null {
  if (tokens.size === 0) {
    return null;
  }
  return index.categoriesByTokenKey.get(tokenSetKey(tokens))?.[0] ?? null;
}
