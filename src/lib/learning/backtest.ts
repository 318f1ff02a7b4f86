/**
 * Backtesting Loop
 *
 * Replays the thermal model over archived hours and scores it against what
 * the wind actually did.
 *
 * WORKFLOW:
 * 1. Fetch archive series for site and reference station over the range
 * 2. Normalize and predict every hour
 * 3. Evaluate each day against the observed base wind speed
 * 4. Aggregate MAE across every compared hour
 */

import type { AccuracyReport, BacktestReport, DateRange, KiteModelConfig } from '@/types/kite';
import { DEFAULT_MODEL_CONFIG, MODEL_VERSION } from '@/lib/scoring/weights';
import { predictSeries } from '@/lib/scoring/prediction-engine';
import { groupByDay } from '@/lib/forecast/kite-window';
import { evaluate, observedFromPredictions } from '@/lib/learning/accuracy';
import { getDefaultSite, type KiteSite } from '@/lib/sites/registry';
import { listDates } from '@/lib/time/local-time';
import { normalizeStations, REFERENCE_VARIABLES, SITE_VARIABLES } from '@/lib/weather/normalize';
import { defaultSeriesCache, getHourlySeries, type SeriesCache } from '@/lib/weather/series-cache';

export interface BacktestOptions {
  site?: KiteSite;
  config?: Readonly<KiteModelConfig>;
  cache?: SeriesCache;
}

/**
 * Pool every compared hour of every day into one MAE
 */
export function aggregateMae(reports: readonly AccuracyReport[]): number | null {
  let hours = 0;
  let absTotal = 0;
  for (const report of reports) {
    for (const residual of report.residuals) {
      absTotal += Math.abs(residual.residualKts);
      hours++;
    }
  }
  return hours === 0 ? null : absTotal / hours;
}

/**
 * Run the backtest over an inclusive date range
 */
export async function runBacktest(
  range: DateRange,
  options: BacktestOptions = {}
): Promise<BacktestReport> {
  const site = options.site ?? getDefaultSite();
  const config = options.config ?? DEFAULT_MODEL_CONFIG;
  const cache = options.cache ?? defaultSeriesCache;

  console.log(`[BACKTEST] Starting backtest for ${site.id}: ${range.startDate} to ${range.endDate}`);

  const [siteSeries, referenceSeries] = await Promise.all([
    getHourlySeries(site.site, 'historical', range, { timezone: site.timezone, variables: SITE_VARIABLES }, cache),
    getHourlySeries(
      site.reference.coordinates,
      'historical',
      range,
      { timezone: site.timezone, variables: REFERENCE_VARIABLES },
      cache
    ),
  ]);

  const observations = normalizeStations(siteSeries, referenceSeries);
  const hours = predictSeries(observations, config);
  const observed = observedFromPredictions(hours);

  const days = Array.from(groupByDay(hours).values()).map((dayPredictions) =>
    evaluate(dayPredictions, observed, config)
  );

  const covered = new Set(days.map((day) => day.date));
  const missing = listDates(range.startDate, range.endDate).filter((date) => !covered.has(date));
  if (missing.length > 0) {
    console.warn(`[BACKTEST] No archive hours for ${missing.length} day(s): ${missing.join(', ')}`);
  }

  const evaluated = days.filter((day) => day.verdict !== 'no_data');
  const accurateDays = evaluated.filter((day) => day.verdict === 'accurate').length;
  const overallMaeKts = aggregateMae(days);

  console.log(
    `[BACKTEST] Complete: ${evaluated.length} days evaluated, ${accurateDays} accurate, ` +
      `overall MAE ${overallMaeKts === null ? 'n/a' : overallMaeKts.toFixed(2)} kts`
  );

  return {
    siteId: site.id,
    modelVersion: MODEL_VERSION,
    range,
    days,
    overallMaeKts,
    accurateDays,
    evaluatedDays: evaluated.length,
    generatedAt: new Date().toISOString(),
  };
}
