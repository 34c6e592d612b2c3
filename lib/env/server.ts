import { z } from "zod";

function emptyToUndefined(value: unknown) {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function optionalString() {
  return z.preprocess(emptyToUndefined, z.string().min(1).optional());
}

function positiveInt(fallback: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));
}

function positiveNumber(fallback: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().positive().default(fallback));
}

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),

  DATABASE_URL: optionalString(),

  QUERY_TIMEOUT_MS: positiveInt(15000),
  QUERY_MAX_ROWS: positiveInt(500),
  QUERY_CONCURRENCY: positiveInt(4),

  ANOMALY_Z_THRESHOLD: positiveNumber(2),
  ANOMALY_PCT_BAND: positiveNumber(0.3),
  ANOMALY_WINDOW_DAYS: positiveInt(7),
  CATEGORY_TOP_N: positiveInt(20),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

let cachedEnv: ServerEnv | undefined;

export function getServerEnv(): ServerEnv {
  cachedEnv ??= serverEnvSchema.parse({
    ...process.env,
  });
  return cachedEnv;
}

export function parseServerEnv(raw: Record<string, string | undefined>): ServerEnv {
  return serverEnvSchema.parse(raw);
}
