/**
 * Kite Forecast Service
 *
 * Forecast-mode pipeline for one site:
 * 1. Fetch site and reference-station series (cached, concurrent)
 * 2. Normalize into ordered hourly records (fails fast on misalignment)
 * 3. Predict every hour
 * 4. Group by local day, keep today onward, limit to N days
 * 5. Build a daily outlook per day
 *
 * Upstream and misalignment errors propagate to the caller. No data for the
 * range yields a forecast with no days.
 */

import type { KiteForecast, KiteModelConfig } from '@/types/kite';
import { DEFAULT_MODEL_CONFIG, MODEL_VERSION } from '@/lib/scoring/weights';
import { predictSeries } from '@/lib/scoring/prediction-engine';
import { groupByDay } from '@/lib/forecast/kite-window';
import { buildDayOutlook } from '@/lib/forecast/daily-outlook';
import { getDefaultSite, type KiteSite } from '@/lib/sites/registry';
import { normalizeStations, REFERENCE_VARIABLES, SITE_VARIABLES } from '@/lib/weather/normalize';
import { defaultSeriesCache, getHourlySeries, type SeriesCache } from '@/lib/weather/series-cache';
import { getTodayInTimezone } from '@/lib/time/local-time';

// Days shown by default
export const DEFAULT_OUTLOOK_DAYS = 5;

export interface KiteForecastOptions {
  site?: KiteSite;
  days?: number;
  config?: Readonly<KiteModelConfig>;
  cache?: SeriesCache;
  now?: Date;
}

/**
 * Build the multi-day kite forecast for a site
 */
export async function getKiteForecast(options: KiteForecastOptions = {}): Promise<KiteForecast> {
  const site = options.site ?? getDefaultSite();
  const days = options.days ?? DEFAULT_OUTLOOK_DAYS;
  const config = options.config ?? DEFAULT_MODEL_CONFIG;
  const cache = options.cache ?? defaultSeriesCache;
  const now = options.now ?? new Date();

  console.log(
    `[FORECAST] Using site ${site.id} @ lat=${site.site.lat.toFixed(4)}, lon=${site.site.lon.toFixed(4)} ` +
      `(reference: ${site.reference.name})`
  );

  const [siteSeries, referenceSeries] = await Promise.all([
    getHourlySeries(site.site, 'forecast', null, { timezone: site.timezone, variables: SITE_VARIABLES }, cache),
    getHourlySeries(
      site.reference.coordinates,
      'forecast',
      null,
      { timezone: site.timezone, variables: REFERENCE_VARIABLES },
      cache
    ),
  ]);

  const observations = normalizeStations(siteSeries, referenceSeries);
  const today = getTodayInTimezone(site.timezone, now);

  const outlooks = Array.from(groupByDay(predictSeries(observations, config)).entries())
    .filter(([date]) => date >= today)
    .slice(0, days)
    .map(([, dayPredictions]) => buildDayOutlook(dayPredictions, config));

  if (outlooks.length === 0) {
    console.warn(`[FORECAST] No forecast hours from ${today} for site ${site.id}`);
  }

  return {
    siteId: site.id,
    timezone: site.timezone,
    modelVersion: MODEL_VERSION,
    generatedAt: now.toISOString(),
    days: outlooks,
  };
}
