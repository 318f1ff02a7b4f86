/**
 * Backtest API
 *
 * GET /api/learning/backtest?start=2025-07-01&end=2025-07-31&mae_threshold=5
 *
 * Replays the thermal model over archived hours and returns per-day
 * accuracy reports with the pooled MAE.
 */

import { NextRequest, NextResponse } from 'next/server';
import { runBacktest } from '@/lib/learning/backtest';
import { resolveModelConfig } from '@/lib/scoring/weights';
import { getDefaultSite, getKiteSite, getRegisteredSiteIds } from '@/lib/sites/registry';
import { errorResponse, jsonResponse } from '@/lib/api/responses';
import {
  backtestQuerySchema,
  formatIssues,
  searchParamsToObject,
} from '@/lib/validations/kite-api';

export const runtime = 'nodejs';
export const maxDuration = 60;

/**
 * GET /api/learning/backtest
 *
 * Run the backtest for an archive date range
 */
export async function GET(request: NextRequest): Promise<NextResponse> {
  const startTime = Date.now();
  const { searchParams } = new URL(request.url);
  const query = backtestQuerySchema.safeParse(searchParamsToObject(searchParams));

  if (!query.success) {
    return jsonResponse(
      { success: false, error: 'invalid_query', issues: formatIssues(query.error) },
      400
    );
  }

  const site = query.data.site ? getKiteSite(query.data.site) : getDefaultSite();
  if (!site) {
    return jsonResponse(
      { success: false, error: `Unknown site: ${query.data.site}`, sites: getRegisteredSiteIds() },
      404
    );
  }

  const config = resolveModelConfig({ maeAccurateKts: query.data.mae_threshold });

  try {
    const report = await runBacktest(
      { startDate: query.data.start, endDate: query.data.end },
      { site, config }
    );

    const duration = Date.now() - startTime;
    console.log(`[BACKTEST] Completed in ${duration}ms`);

    return jsonResponse({
      success: true,
      report,
      duration_ms: duration,
    });
  } catch (error) {
    return errorResponse(error, 'BACKTEST');
  }
}
