import { z } from 'zod';
import type { CommoditiesClientConfig } from './types';
import { ConfigError } from './types';

export const DEFAULT_BASE_URL = 'https://api.platts.com';
export const DEFAULT_USER_AGENT = 'commodities-data-client/0.1.0';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_THROTTLE_DELAY_MS = 1_000;
export const DEFAULT_PAGE_WARNING_THRESHOLD = 10;

export interface ResolvedConfig {
  baseUrl: string;
  userAgent: string;
  requestDelayMs: number;
  timeoutMs: number;
  maxAttempts: number;
  throttleDelayMs: number;
  pageWarningThreshold: number;
  maxPages?: number;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envString = z.preprocess(blankToUndefined, z.string().optional());

const envNumber = (name: string, min: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce
      .number({ invalid_type_error: `${name} must be a number` })
      .int(`${name} must be an integer`)
      .min(min, `${name} must be >= ${min}`)
      .optional(),
  );

const envSchema = z.object({
  COMMODITY_API_USERNAME: envString,
  COMMODITY_API_PASSWORD: envString,
  COMMODITY_API_APPKEY: envString,
  COMMODITY_API_TOKEN: envString,
  COMMODITY_API_BASE: z.preprocess(blankToUndefined, z.string().url('COMMODITY_API_BASE must be a URL').optional()),
  COMMODITY_API_DELAY_MS: envNumber('COMMODITY_API_DELAY_MS', 0),
  COMMODITY_API_TIMEOUT_MS: envNumber('COMMODITY_API_TIMEOUT_MS', 1),
  COMMODITY_API_MAX_ATTEMPTS: envNumber('COMMODITY_API_MAX_ATTEMPTS', 1),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * Reads client settings from `COMMODITY_API_*` variables. Unset or blank
 * variables stay undefined so that client defaults apply.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CommoditiesClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment configuration: ${formatIssues(parsed.error)}`);
  }

  const vars = parsed.data;
  return {
    username: vars.COMMODITY_API_USERNAME,
    password: vars.COMMODITY_API_PASSWORD,
    appkey: vars.COMMODITY_API_APPKEY,
    token: vars.COMMODITY_API_TOKEN,
    baseUrl: vars.COMMODITY_API_BASE,
    requestDelayMs: vars.COMMODITY_API_DELAY_MS,
    timeoutMs: vars.COMMODITY_API_TIMEOUT_MS,
    maxAttempts: vars.COMMODITY_API_MAX_ATTEMPTS,
  };
}

const optionsSchema = z.object({
  baseUrl: z.string().url('baseUrl must be a URL').default(DEFAULT_BASE_URL),
  userAgent: z.string().min(1, 'userAgent must not be empty').default(DEFAULT_USER_AGENT),
  requestDelayMs: z.number().min(0, 'requestDelayMs must be >= 0').default(0),
  timeoutMs: z.number().positive('timeoutMs must be > 0').default(DEFAULT_TIMEOUT_MS),
  maxAttempts: z.number().int('maxAttempts must be an integer').min(1, 'maxAttempts must be >= 1').default(DEFAULT_MAX_ATTEMPTS),
  throttleDelayMs: z.number().min(0, 'throttleDelayMs must be >= 0').default(DEFAULT_THROTTLE_DELAY_MS),
  pageWarningThreshold: z
    .number()
    .int('pageWarningThreshold must be an integer')
    .min(0, 'pageWarningThreshold must be >= 0')
    .default(DEFAULT_PAGE_WARNING_THRESHOLD),
  maxPages: z.number().int('maxPages must be an integer').min(1, 'maxPages must be >= 1').optional(),
});

/**
 * Applies defaults and validates the numeric and URL settings of a client
 * configuration.
 */
export function resolveConfig(config: CommoditiesClientConfig): ResolvedConfig {
  const parsed = optionsSchema.safeParse({
    baseUrl: config.baseUrl,
    userAgent: config.userAgent,
    requestDelayMs: config.requestDelayMs,
    timeoutMs: config.timeoutMs,
    maxAttempts: config.maxAttempts,
    throttleDelayMs: config.throttleDelayMs,
    pageWarningThreshold: config.pageWarningThreshold,
    maxPages: config.maxPages,
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid client configuration: ${formatIssues(parsed.error)}`);
  }
  return { ...parsed.data, baseUrl: parsed.data.baseUrl.replace(/\/+$/, '') };
}
