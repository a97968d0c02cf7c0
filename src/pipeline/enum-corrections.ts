import type { EnumAliasTable } from "../reference/load.js";
import { foldText } from "../utils/text.js";

/**
 * Proposes the allowed value a raw enum value most likely meant, or null.
 * Only a hint for reviewers; the raw value is still reported as invalid.
 */
export function suggestEnumCorrection(input: {
  field: string;
  value: string;
  allowedValues: readonly string[];
  aliases?: EnumAliasTable;
}): string | null {
  const folded = foldText(input.value);
  if (!folded) {
    return null;
  }

  const direct = input.allowedValues.find((allowed) => foldText(allowed) === folded);
  if (direct) {
    return direct;
  }

  const alias = input.aliases?.get(input.field)?.get(folded);
  if (alias && input.allowedValues.includes(alias)) {
    return alias;
  }

  return null;
}
