import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { EnumRuleTable } from "../types.js";
import { foldText } from "../utils/text.js";

const enumFieldSchema = z.object({
  field: z.string().min(1),
  label_fr: z.string().min(1),
  allowed_values: z.array(z.string().min(1)).min(1),
  aliases: z.record(z.string().min(1)).default({}),
});

const enumReferenceFileSchema = z.object({
  schema_version: z.string().min(1),
  fields: z.array(enumFieldSchema).min(1),
});

export type EnumAliasTable = ReadonlyMap<string, ReadonlyMap<string, string>>;

export interface EnumFieldReference {
  field: string;
  labelFr: string;
  allowedValues: string[];
}

export interface LoadedEnumReference {
  schemaVersion: string;
  fields: EnumFieldReference[];
  rules: EnumRuleTable;
  aliases: EnumAliasTable;
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DEFAULT_FILE_NAME = "enrollment_enums.fr.json";

let cachedReference: LoadedEnumReference | null = null;

export function parseEnumReference(content: unknown): LoadedEnumReference {
  const parsed = enumReferenceFileSchema.safeParse(content);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid enum reference file: ${errors}`);
  }

  const rules: Record<string, readonly string[]> = {};
  const aliases = new Map<string, ReadonlyMap<string, string>>();
  const fields: EnumFieldReference[] = [];

  for (const entry of parsed.data.fields) {
    if (rules[entry.field]) {
      throw new Error(`Enum reference declares field twice: ${entry.field}`);
    }

    const allowed = new Set(entry.allowed_values);
    const fieldAliases = new Map<string, string>();
    for (const [alias, target] of Object.entries(entry.aliases)) {
      if (!allowed.has(target)) {
        throw new Error(
          `Enum alias "${alias}" for ${entry.field} targets unknown value: ${target}`,
        );
      }
      fieldAliases.set(foldText(alias), target);
    }

    rules[entry.field] = [...entry.allowed_values];
    aliases.set(entry.field, fieldAliases);
    fields.push({
      field: entry.field,
      labelFr: entry.label_fr,
      allowedValues: [...entry.allowed_values],
    });
  }

  return {
    schemaVersion: parsed.data.schema_version,
    fields,
    rules,
    aliases,
  };
}

export function loadEnumReference(): LoadedEnumReference {
  if (cachedReference) {
    return cachedReference;
  }

  const filePath = path.join(__dirname, DEFAULT_FILE_NAME);
  const content: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  cachedReference = parseEnumReference(content);
  return cachedReference;
}
