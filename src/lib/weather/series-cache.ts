/**
 * Hourly Series Cache
 *
 * Explicit keyed cache for provider responses, owned by the fetch boundary.
 * Key = coordinates + mode + date range + timezone + variables.
 * Value = the series with its fetch and expiry times; expiry is checked on
 * every read, and every write sweeps out all expired entries.
 *
 * The prediction core never sees this cache.
 */

import type { Coordinates, DateRange, FetchMode, HourlySeries } from '@/types/kite';
import { fetchHourlySeries, type SeriesRequestOptions } from '@/lib/weather/open-meteo';

export interface CachedSeries {
  series: HourlySeries;
  fetchedAt: string;
  expiresAt: number;
}

// Cache TTLs: forecasts roll hourly, archive days are fixed
export const SERIES_CACHE_TTL_MS: Readonly<Record<FetchMode, number>> = {
  forecast: 60 * 60 * 1000,
  historical: 24 * 60 * 60 * 1000,
};

// Debug flag
const DEBUG_CACHE = process.env.DEBUG_SERIES_CACHE === 'true';

/**
 * Build the cache key for a request
 */
export function seriesCacheKey(
  coordinates: Coordinates,
  mode: FetchMode,
  dateRange: DateRange | null,
  options: SeriesRequestOptions
): string {
  const range = dateRange ? `${dateRange.startDate}..${dateRange.endDate}` : 'rolling';
  return [
    mode,
    coordinates.lat.toFixed(4),
    coordinates.lon.toFixed(4),
    range,
    options.timezone,
    options.variables.join(','),
  ].join('|');
}

export class SeriesCache {
  private readonly entries = new Map<string, CachedSeries>();

  constructor(
    private readonly ttlMs: Readonly<Record<FetchMode, number>> = SERIES_CACHE_TTL_MS,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Get a live entry; expired entries are dropped and reported as misses
   */
  get(key: string): CachedSeries | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      if (DEBUG_CACHE) {
        console.log('[SERIES_CACHE] expired', {
          key,
          expiresAt: new Date(entry.expiresAt).toISOString(),
        });
      }
      this.entries.delete(key);
      return null;
    }

    return entry;
  }

  set(key: string, mode: FetchMode, series: HourlySeries): CachedSeries {
    const fetchedAt = this.now();
    this.sweep(fetchedAt);
    const entry: CachedSeries = {
      series,
      fetchedAt: new Date(fetchedAt).toISOString(),
      expiresAt: fetchedAt + this.ttlMs[mode],
    };
    this.entries.set(key, entry);
    return entry;
  }

  /**
   * Drop every entry that has expired by `now`
   */
  private sweep(now: number): void {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (DEBUG_CACHE && removed > 0) {
      console.log('[SERIES_CACHE] swept', { removed, remaining: this.entries.size });
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// Default instance used by the forecast and backtest services
export const defaultSeriesCache = new SeriesCache();

/**
 * Read-through fetch: serve a live cached series or fetch and store it
 */
export async function getHourlySeries(
  coordinates: Coordinates,
  mode: FetchMode,
  dateRange: DateRange | null,
  options: SeriesRequestOptions,
  cache: SeriesCache = defaultSeriesCache
): Promise<HourlySeries> {
  const key = seriesCacheKey(coordinates, mode, dateRange, options);
  const cached = cache.get(key);
  if (cached) {
    if (DEBUG_CACHE) {
      console.log('[SERIES_CACHE] hit', { key, fetchedAt: cached.fetchedAt });
    }
    return cached.series;
  }

  const series = await fetchHourlySeries(coordinates, mode, dateRange, options);
  cache.set(key, mode, series);
  return series;
}
