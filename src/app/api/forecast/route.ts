/**
 * Kite Forecast API
 *
 * GET /api/forecast?site=squamish&days=5&threshold=15&min_duration=2
 *
 * Returns the multi-day kite outlook for a site: one entry per local day
 * with the kiteable window, storm flag, verdict and hourly predictions.
 *
 * Errors:
 * - 400 invalid query parameters
 * - 404 unknown site
 * - 502 provider failure or misaligned station series
 */

import { NextRequest, NextResponse } from 'next/server';
import { getKiteForecast } from '@/lib/forecasts';
import { resolveModelConfig } from '@/lib/scoring/weights';
import { getDefaultSite, getKiteSite, getRegisteredSiteIds } from '@/lib/sites/registry';
import { errorResponse, jsonResponse } from '@/lib/api/responses';
import {
  forecastQuerySchema,
  formatIssues,
  searchParamsToObject,
} from '@/lib/validations/kite-api';

// Node.js runtime for the provider fetch timeout and in-process series cache
export const runtime = 'nodejs';

export async function GET(request: NextRequest): Promise<NextResponse> {
  const { searchParams } = new URL(request.url);
  const query = forecastQuerySchema.safeParse(searchParamsToObject(searchParams));

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

  const config = resolveModelConfig({
    kiteableThresholdKts: query.data.threshold,
    minSessionHours: query.data.min_duration,
  });

  try {
    const forecast = await getKiteForecast({ site, days: query.data.days, config });

    return jsonResponse(
      {
        success: true,
        forecast,
      },
      200,
      { 'Cache-Control': 'public, max-age=600' }
    );
  } catch (error) {
    return errorResponse(error, 'FORECAST_API');
  }
}
