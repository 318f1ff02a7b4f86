/**
 * Open-Meteo Hourly Series Integration
 *
 * Fetches hourly weather series for one coordinate pair in one of two modes:
 * - forecast:   rolling multi-day forecast (api.open-meteo.com)
 * - historical: fixed date range from the reanalysis archive (archive-api)
 *
 * All series are requested in the site's local timezone with wind in knots,
 * so the returned `time` strings are site-local wall-clock hours.
 *
 * Open-Meteo is free, no API key required.
 * Documentation: https://open-meteo.com/en/docs
 *
 * Failures propagate as UpstreamFetchError. There are no retries here.
 */

import { z } from 'zod';
import type { Coordinates, DateRange, FetchMode, HourlySeries, HourlyVariable } from '@/types/kite';

// Open-Meteo API endpoints
const OPEN_METEO_API = 'https://api.open-meteo.com/v1/forecast';
const OPEN_METEO_ARCHIVE_API = 'https://archive-api.open-meteo.com/v1/archive';

// Request timeout
const REQUEST_TIMEOUT = Number(process.env.OPEN_METEO_TIMEOUT_MS) || 15000;

// Rolling forecast length when no explicit range is given
export const DEFAULT_FORECAST_DAYS = 7;

// Custom error class for upstream fetch failures
export class UpstreamFetchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = true
  ) {
    super(message);
    this.name = 'UpstreamFetchError';
  }
}

const hourlyValuesSchema = z.array(z.number().nullable());

const openMeteoResponseSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  timezone: z.string(),
  hourly: z
    .object({
      time: z.array(z.string()),
      temperature_2m: hourlyValuesSchema.optional(),
      pressure_msl: hourlyValuesSchema.optional(),
      precipitation: hourlyValuesSchema.optional(),
      wind_speed_10m: hourlyValuesSchema.optional(),
      wind_gusts_10m: hourlyValuesSchema.optional(),
      wind_direction_10m: hourlyValuesSchema.optional(),
    })
    .optional(),
});

export interface SeriesRequestOptions {
  timezone: string;
  variables: readonly HourlyVariable[];
}

/**
 * Fetch with timeout
 */
async function fetchWithTimeout(url: string, timeoutMs: number = REQUEST_TIMEOUT): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal });
    clearTimeout(timeoutId);
    return response;
  } catch (error) {
    clearTimeout(timeoutId);
    if (error instanceof Error && error.name === 'AbortError') {
      throw new UpstreamFetchError(`Request timeout after ${timeoutMs}ms`, 'timeout');
    }
    throw new UpstreamFetchError(
      `Network error: ${error instanceof Error ? error.message : String(error)}`,
      'network_error'
    );
  }
}

/**
 * Build the request URL for a mode and optional date range
 */
export function buildSeriesUrl(
  coordinates: Coordinates,
  mode: FetchMode,
  dateRange: DateRange | null,
  options: SeriesRequestOptions
): string {
  const params = new URLSearchParams({
    latitude: coordinates.lat.toString(),
    longitude: coordinates.lon.toString(),
    hourly: options.variables.join(','),
    wind_speed_unit: 'kn',
    timezone: options.timezone,
  });

  if (dateRange) {
    params.set('start_date', dateRange.startDate);
    params.set('end_date', dateRange.endDate);
  } else if (mode === 'forecast') {
    params.set('forecast_days', DEFAULT_FORECAST_DAYS.toString());
  } else {
    throw new Error('[OPEN_METEO] historical mode requires a date range');
  }

  const base = mode === 'forecast' ? OPEN_METEO_API : OPEN_METEO_ARCHIVE_API;
  return `${base}?${params}`;
}

/**
 * Fetch an hourly series keyed by field name
 *
 * A response with no hourly block is returned as an empty series.
 */
export async function fetchHourlySeries(
  coordinates: Coordinates,
  mode: FetchMode,
  dateRange: DateRange | null,
  options: SeriesRequestOptions
): Promise<HourlySeries> {
  const url = buildSeriesUrl(coordinates, mode, dateRange, options);
  const response = await fetchWithTimeout(url);

  if (!response.ok) {
    throw new UpstreamFetchError(
      `Open-Meteo ${mode} API error: ${response.status} ${response.statusText}`,
      `http_${response.status}`,
      response.status >= 500 || response.status === 429
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new UpstreamFetchError(`Open-Meteo ${mode} API returned invalid JSON`, 'invalid_response', false);
  }

  const parsed = openMeteoResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new UpstreamFetchError(
      `Open-Meteo ${mode} API returned an unexpected shape: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      'invalid_response',
      false
    );
  }

  const hourly = parsed.data.hourly;
  if (!hourly || hourly.time.length === 0) {
    console.warn(
      `[OPEN_METEO] No ${mode} data for lat=${coordinates.lat.toFixed(4)}, lon=${coordinates.lon.toFixed(4)}`
    );
    return { time: [] };
  }

  return hourly;
}
