import { z } from "zod";

const DEFAULT_DELTA_BASE_URL = "https://api.delta.exchange";

const configSchema = z.object({
  DELTA_BASE_URL: z.string().url().default(DEFAULT_DELTA_BASE_URL),
  DELTA_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  CATALOG_TTL_MS: z.coerce.number().int().min(0).default(60_000),
  QUOTE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DEFAULT_UNDERLYING: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.toUpperCase())
    .default("BTC")
});

export type AppConfig = {
  deltaBaseUrl: string;
  maxRetries: number;
  catalogTtlMs: number;
  quoteTimeoutMs: number;
  defaultUnderlying: string;
};

const emptyToUndefined = (env: Record<string, string | undefined>) =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value?.trim() ? value : undefined])
  );

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = configSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    deltaBaseUrl: values.DELTA_BASE_URL.replace(/\/+$/, ""),
    maxRetries: values.DELTA_MAX_RETRIES,
    catalogTtlMs: values.CATALOG_TTL_MS,
    quoteTimeoutMs: values.QUOTE_TIMEOUT_MS,
    defaultUnderlying: values.DEFAULT_UNDERLYING
  };
};
