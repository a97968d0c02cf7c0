import "dotenv/config";
import { z } from "zod";

const fieldList = z
  .string()
  .default("status")
  .transform((value) =>
    value
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
  );

const envSchema = z.object({
  RECONCILE_TOP_N: z.coerce.number().int().positive().default(5),
  REPORT_TOP_N: z.coerce.number().int().positive().default(10),
  TIER_HIGH_MIN: z.coerce.number().int().min(1).max(100).default(80),
  TIER_MEDIUM_MIN: z.coerce.number().int().min(1).max(100).default(50),
  SIMILARITY_STRATEGY: z.enum(["dice", "jaccard"]).default("dice"),
  RANK_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RANK_BATCH_SIZE: z.coerce.number().int().positive().default(200),
  CLASSIFY_CONCURRENCY: z.coerce.number().int().positive().default(4),
  CLASSIFY_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  SAMPLE_RECORDS_PER_LABEL: z.coerce.number().int().nonnegative().default(3),
  BREAKDOWN_FIELDS: fieldList,
  OUTPUT_DIR: z.string().min(1).default("outputs"),
  TRACE_RETENTION_HOURS: z.coerce.number().int().positive().default(24),
  TRACE_FLUSH_BATCH_SIZE: z.coerce.number().int().positive().default(25),
});

export type AppConfig = z.infer<typeof envSchema>;

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const errors = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${errors}`);
  }

  if (parsed.data.TIER_MEDIUM_MIN >= parsed.data.TIER_HIGH_MIN) {
    throw new Error(
      `Invalid environment configuration: TIER_MEDIUM_MIN (${parsed.data.TIER_MEDIUM_MIN}) must be lower than TIER_HIGH_MIN (${parsed.data.TIER_HIGH_MIN})`,
    );
  }

  cachedConfig = parsed.data;
  return parsed.data;
}
