import type { NormalizedLabel } from "../types.js";
import { splitTokens, trimToEmpty } from "../utils/text.js";

export const UNSPECIFIED_LABEL = "Non spécifiée";

/**
 * Turns a free-text class label into its token set.
 *
 * Parentheses act as separators, so a grade code such as "(6e)" survives as
 * its own token instead of being dropped. A blank label is not an error: it
 * comes back with no tokens and `unspecified` set.
 */
export function normalizeLabel(raw: string | null | undefined): NormalizedLabel {
  const trimmed = trimToEmpty(raw);
  if (!trimmed) {
    return { raw: trimmed, tokens: new Set<string>(), unspecified: true };
  }

  const tokens = new Set(splitTokens(trimmed));
  return {
    raw: trimmed,
    tokens,
    unspecified: tokens.size === 0,
  };
}
