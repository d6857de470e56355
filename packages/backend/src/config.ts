import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

// "Address=0.75,Person=0.85"
const thresholdOverrides = z.string().transform((value, ctx) => {
  const overrides: Record<string, number> = {};
  for (const entry of value.split(",")) {
    const trimmed = entry.trim();
    if (trimmed.length === 0) {
      continue;
    }
    const [type, rawThreshold] = trimmed.split("=");
    const threshold = Number(rawThreshold);
    if (!type || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid threshold override: ${trimmed}` });
      return z.NEVER;
    }
    overrides[type.trim()] = threshold;
  }
  return overrides;
});

const ratio = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  MAX_REQUEST_SIZE: z.string().default("10mb"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  REVIEW_DB_PATH: z.string().default("data/reviews.db"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  NEO4J_QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default("https://api.openai.com/v1"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  EMBEDDING_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  EMBEDDING_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  EMBEDDING_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  EMBEDDING_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(300),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  IMPORT_BATCH_SIZE: z.coerce.number().int().positive().default(50),
  IMPORT_CONCURRENCY: z.coerce.number().int().positive().default(4),
  ENABLE_VECTOR_SEARCH: booleanFlag.default("false"),
  ENABLE_HUMAN_REVIEW: booleanFlag.default("true"),
  DRY_RUN_COUNTS_AS: z.enum(["created", "skipped"]).default("created"),
  SIMILARITY_THRESHOLD: ratio.default(0.8),
  VECTOR_THRESHOLD_OVERRIDES: thresholdOverrides.default(""),
  VECTOR_SEARCH_LIMIT: z.coerce.number().int().positive().default(5),
  FUZZY_CANDIDATE_LIMIT: z.coerce.number().int().positive().default(500),
  FULL_SCAN_LIMIT: z.coerce.number().int().positive().default(5000),
  UNIQUE_PROPERTY_KEYS: csvList.default("email,ssn,serial_number,vin,license_plate"),
  AUTO_MERGE_THRESHOLD: ratio.default(0.9),
  AUTO_REJECT_THRESHOLD: ratio.default(0.3),
  RICHNESS_BONUS: ratio.default(0.1),
  SPARSITY_PENALTY: ratio.default(0.2),
  GENERICITY_PENALTY: ratio.default(0.15)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
