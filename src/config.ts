import { z } from "zod";

const dbSchemaSetting = z
  .string()
  .regex(/^[a-z_][a-z0-9_]*$/, "Must be a lowercase SQL identifier")
  .max(63)
  .default("academy");

const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DB_SCHEMA: dbSchemaSetting,
  BACKGROUND_GENERATION_THRESHOLD: z.coerce.number().int().min(1).default(256),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  GENERATION_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
});

export interface EngineConfig {
  databaseUrl: string | null;
  port: number;
  backgroundGenerationThreshold: number;
  workerConcurrency: number;
  generationMaxRetries: number;
  retryBaseDelayMs: number;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

/**
 * Postgres schema holding the tables. Table definitions read it once at load.
 */
export function resolveDbSchema(
  env: Record<string, string | undefined> = process.env,
): string {
  const parsed = z.object({ DB_SCHEMA: dbSchemaSetting }).safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.DB_SCHEMA;
}

/**
 * Parse engine settings from the environment. Fails fast on malformed values.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${describeIssues(parsed.error)}`);
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL ?? null,
    port: values.PORT,
    backgroundGenerationThreshold: values.BACKGROUND_GENERATION_THRESHOLD,
    workerConcurrency: values.WORKER_CONCURRENCY,
    generationMaxRetries: values.GENERATION_MAX_RETRIES,
    retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
  };
}
