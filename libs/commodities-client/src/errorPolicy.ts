import { getHeader, HttpError } from '@libs/resilient-http-core';
import type { ClassifiedError, ErrorClassifier, ErrorClassifierContext } from '@libs/resilient-http-core';
import { CommoditiesError, DailyLimitError, PerSecondLimitError } from './types';

const REMAINING_DAY_HEADER = 'x-ratelimit-remaining-day';

/**
 * Remaining daily quota reported on a 429; a missing or unreadable header
 * counts as exhausted.
 */
export function remainingDailyQuota(headers: Record<string, string> | undefined): number {
  const value = Number.parseInt(getHeader(headers, REMAINING_DAY_HEADER) ?? '', 10);
  return Number.isNaN(value) ? 0 : value;
}

/**
 * Classifier for the commodities API:
 * - 429 with daily quota left: per-second throttle, retried after `throttleDelayMs`
 * - 429 with the daily quota spent: never retried
 * - SDK errors raised inside interceptors (token acquisition): never retried
 */
export function createCommoditiesErrorClassifier(opts: { throttleDelayMs: number }): ErrorClassifier {
  return {
    classify(ctx: ErrorClassifierContext): ClassifiedError | undefined {
      if (ctx.error instanceof CommoditiesError) {
        return { category: 'unknown', reason: ctx.error.name, fallback: { retryable: false } };
      }

      if (ctx.response?.status !== 429) {
        return undefined;
      }

      if (remainingDailyQuota(ctx.response.headers) > 0) {
        return {
          category: 'rate_limit',
          statusCode: 429,
          reason: 'per_second_limit',
          fallback: { retryable: true, retryAfterMs: opts.throttleDelayMs },
        };
      }
      return {
        category: 'quota',
        statusCode: 429,
        reason: 'daily_limit',
        fallback: { retryable: false },
      };
    },
  };
}

/**
 * Maps a classified 429 onto the SDK's limit errors; anything else is returned
 * unchanged.
 */
export function toLimitError(error: unknown): unknown {
  if (!(error instanceof HttpError) || error.status !== 429) {
    return error;
  }
  return error.category === 'quota'
    ? new DailyLimitError(undefined, error.body)
    : new PerSecondLimitError(undefined, error.body);
}
