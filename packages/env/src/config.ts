import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const envSchema = z.object({
  FIATLEDGER_CURRENCY_CATALOG_PATH: z.string().min(1).or(z.undefined()),
  FIATLEDGER_EXCHANGE_API_URL: z.string().url().or(z.undefined()),
  FIATLEDGER_HTTP_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  FIATLEDGER_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FIATLEDGER_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  /** JSON catalog to load instead of the bundled ISO-4217 data */
  currencyCatalogPath: string | undefined;
  /** Rate document endpoint; without it every exchange fails with RATE_UNAVAILABLE */
  exchangeApiUrl: string | undefined;
  httpRetries: number;
  httpTimeoutMs: number;
  logLevel: ValidatedEnv['FIATLEDGER_LOG_LEVEL'];
}

let cachedConfig: AppConfig | undefined;

/**
 * Validate an environment map into an AppConfig.
 * Every failing variable is listed in the error message.
 */
export function parseConfig(env: Record<string, string | undefined>): Result<AppConfig, Error> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    return err(new Error(`Environment validation failed:\n${errors}`));
  }

  const data = result.data;
  return ok({
    currencyCatalogPath: data.FIATLEDGER_CURRENCY_CATALOG_PATH,
    exchangeApiUrl: data.FIATLEDGER_EXCHANGE_API_URL,
    httpRetries: data.FIATLEDGER_HTTP_RETRIES,
    httpTimeoutMs: data.FIATLEDGER_HTTP_TIMEOUT_MS,
    logLevel: data.FIATLEDGER_LOG_LEVEL,
  });
}

/**
 * Validates process.env on first access and caches the result.
 * @throws Error if validation fails
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const result = parseConfig(process.env);
    if (result.isErr()) {
      throw result.error;
    }
    cachedConfig = result.value;
  }
  return cachedConfig;
}

/** Drop the cached config so the next getConfig() re-reads process.env. */
export function resetConfig(): void {
  cachedConfig = undefined;
}
