/**
 * Shared JSON response helpers for the kite API routes
 *
 * Maps the pipeline's error types onto HTTP statuses:
 * - UpstreamFetchError    -> 502 upstream_fetch_failed
 * - MisalignedSeriesError -> 502 misaligned_series
 * - anything else         -> 500
 */

import { NextResponse } from 'next/server';
import { UpstreamFetchError } from '@/lib/weather/open-meteo';
import { MisalignedSeriesError } from '@/lib/weather/normalize';

/**
 * Helper to create a consistent JSON response
 */
export function jsonResponse(
  body: Record<string, unknown>,
  status: number = 200,
  headers: Record<string, string> = {}
): NextResponse {
  return NextResponse.json(body, {
    status,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  });
}

/**
 * Translate a thrown error into a failure response, logging it under `tag`
 */
export function errorResponse(error: unknown, tag: string): NextResponse {
  if (error instanceof UpstreamFetchError) {
    console.error(`[${tag}] Upstream fetch failed (${error.code}):`, error.message);
    return jsonResponse(
      {
        success: false,
        error: 'upstream_fetch_failed',
        code: error.code,
        retryable: error.retryable,
        message: error.message,
      },
      502
    );
  }

  if (error instanceof MisalignedSeriesError) {
    console.error(`[${tag}] Station series misaligned:`, error.message);
    return jsonResponse(
      {
        success: false,
        error: 'misaligned_series',
        message: error.message,
      },
      502
    );
  }

  console.error(`[${tag}] Error:`, error);
  return jsonResponse(
    {
      success: false,
      error: error instanceof Error ? error.message : 'unknown_error',
    },
    500
  );
}
