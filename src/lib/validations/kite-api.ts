import { z } from 'zod';
import { isValidDateString, shiftDate } from '@/lib/time/local-time';

/**
 * Query parameter schemas for the kite API endpoints
 */

// Longest archive range a single backtest request may cover
export const MAX_BACKTEST_DAYS = 92;

export const siteIdSchema = z.string().min(1, 'Site ID cannot be empty').optional();

export const dateStringSchema = z
  .string()
  .refine(isValidDateString, { message: 'Date must be a real calendar day in YYYY-MM-DD format' });

export const forecastQuerySchema = z.object({
  site: siteIdSchema,
  days: z.coerce.number().int().min(1, 'days must be at least 1').max(7, 'days cannot exceed 7').optional(),
  threshold: z.coerce.number().positive('threshold must be positive').max(60).optional(),
  min_duration: z.coerce.number().int().min(1, 'min_duration must be at least 1').max(12).optional(),
});

export const backtestQuerySchema = z
  .object({
    site: siteIdSchema,
    start: dateStringSchema,
    end: dateStringSchema,
    mae_threshold: z.coerce.number().positive('mae_threshold must be positive').optional(),
  })
  .superRefine((query, ctx) => {
    // Field errors are already reported; range checks need two real dates
    if (!isValidDateString(query.start) || !isValidDateString(query.end)) {
      return;
    }

    if (query.start > query.end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'start must not be after end',
        path: ['end'],
      });
      return;
    }

    if (query.end >= shiftDate(query.start, MAX_BACKTEST_DAYS)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Backtest range cannot exceed ${MAX_BACKTEST_DAYS} days`,
        path: ['end'],
      });
    }
  });

export type ForecastQuery = z.infer<typeof forecastQuerySchema>;
export type BacktestQuery = z.infer<typeof backtestQuerySchema>;

/**
 * Flatten zod issues into "field: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Read URLSearchParams into a plain object, dropping empty values
 */
export function searchParamsToObject(searchParams: URLSearchParams): Record<string, string> {
  const result: Record<string, string> = {};
  searchParams.forEach((value, key) => {
    if (value !== '') {
      result[key] = value;
    }
  });
  return result;
}
