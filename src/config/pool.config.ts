import { ZodError, z } from 'zod';

export const POOL_CONFIG = Symbol('POOL_CONFIG');

export type StorageDriver = 'file' | 'memory';

export interface PoolConfig {
  port: number;
  members: string[];               // ordered registry, fixed for the process
  weeklyContribution: number;      // default amount for the all-members contribution
  referenceCurrency: string;       // oracle quote currency, e.g. "aud"
  supportedAssets: string[];
  priceOracleUrl: string;
  priceOracleIds: Record<string, string>;   // { BTC: "bitcoin" }
  priceOracleTimeoutMs: number;
  fallbackPrices: Record<string, number>;   // used when the oracle fails
  storageDriver: StorageDriver;
  dataDirectory: string;
}

export interface ConfigValidationMeta {
  code: 'INVALID_ENV';
  missing: string[];
  invalid: string[];
}

export class ConfigValidationError extends Error {
  readonly meta: ConfigValidationMeta;

  constructor(meta: ConfigValidationMeta) {
    super(`Invalid pool config: ${JSON.stringify(meta)}`);
    this.name = 'ConfigValidationError';
    this.meta = meta;
  }
}

function parseJson(raw: string, ctx: z.RefinementCtx): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
    return z.NEVER;
  }
}

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((raw) => raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),

  MEMBERS: commaList('Alice,Bob,Carol,Dave')
    .pipe(z.array(z.string()).min(1))
    .refine((members) => new Set(members).size === members.length, 'member ids must be unique'),
  WEEKLY_CONTRIBUTION: z.coerce.number().positive().default(75),

  REFERENCE_CURRENCY: z.string().min(1).default('aud').transform((value) => value.toLowerCase()),
  SUPPORTED_ASSETS: commaList('BTC,ETH').transform((assets) => assets.map((asset) => asset.toUpperCase())),

  PRICE_ORACLE_URL: z.string().url().default('https://api.coingecko.com/api/v3/simple/price'),
  PRICE_ORACLE_IDS: z
    .string()
    .default('{"BTC":"bitcoin","ETH":"ethereum"}')
    .transform(parseJson)
    .pipe(z.record(z.string().min(1))),
  PRICE_ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FALLBACK_PRICES: z
    .string()
    .default('{"BTC":97500,"ETH":5250}')
    .transform(parseJson)
    .pipe(z.record(z.number().positive())),

  STORAGE_DRIVER: z.enum(['file', 'memory']).default('file'),
  DATA_DIRECTORY: z.string().min(1).default('data'),
});

function upperKeys<T>(record: Record<string, T>): Record<string, T> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key.trim().toUpperCase(), value]),
  );
}

/**
 * Validates environment variables into a typed PoolConfig.
 * Fails fast with ConfigValidationError listing the offending variables.
 */
export function loadPoolConfig(env: Record<string, string | undefined> = process.env): PoolConfig {
  let parsed: z.output<typeof envSchema>;
  try {
    parsed = envSchema.parse(env);
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();
      for (const issue of error.issues) {
        const key = String(issue.path[0] ?? 'unknown');
        (env[key] === undefined ? missing : invalid).add(key);
      }
      throw new ConfigValidationError({ code: 'INVALID_ENV', missing: [...missing], invalid: [...invalid] });
    }
    throw error;
  }

  return {
    port: parsed.PORT,
    members: parsed.MEMBERS,
    weeklyContribution: parsed.WEEKLY_CONTRIBUTION,
    referenceCurrency: parsed.REFERENCE_CURRENCY,
    supportedAssets: parsed.SUPPORTED_ASSETS,
    priceOracleUrl: parsed.PRICE_ORACLE_URL,
    priceOracleIds: upperKeys(parsed.PRICE_ORACLE_IDS),
    priceOracleTimeoutMs: parsed.PRICE_ORACLE_TIMEOUT_MS,
    fallbackPrices: upperKeys(parsed.FALLBACK_PRICES),
    storageDriver: parsed.STORAGE_DRIVER,
    dataDirectory: parsed.DATA_DIRECTORY,
  };
}
