/**
 * Dual-Station Normalizer
 *
 * Merges the target-site hourly series and the reference-station pressure
 * series into one ordered sequence of HourlyObservation records, computing
 * the pressure gradient (reference - site) for each hour.
 *
 * FAIL FAST: the two series must carry exactly the same timestamps, on the
 * hour and exactly one hour apart, with every required field present for
 * every hour. Mismatched series are rejected, never truncated or zipped.
 */

import type { HourlyObservation, HourlySeries, HourlyVariable } from '@/types/kite';
import { differenceInHours, parseISO } from 'date-fns';
import { parseLocalTimestamp } from '@/lib/time/local-time';

// Fields the target-site series must carry
export const SITE_VARIABLES: readonly HourlyVariable[] = [
  'temperature_2m',
  'pressure_msl',
  'precipitation',
  'wind_speed_10m',
  'wind_gusts_10m',
  'wind_direction_10m',
];

// Fields the reference-station series must carry
export const REFERENCE_VARIABLES: readonly HourlyVariable[] = ['pressure_msl'];

// Custom error class for station series that cannot be merged
export class MisalignedSeriesError extends Error {
  constructor(
    message: string,
    public readonly station: 'site' | 'reference' | 'both',
    public readonly field: string | null = null,
    public readonly index: number | null = null
  ) {
    super(message);
    this.name = 'MisalignedSeriesError';
  }
}

/**
 * Read one required value, rejecting null, missing and non-finite entries
 */
function requireValue(
  series: HourlySeries,
  variable: HourlyVariable,
  index: number,
  station: 'site' | 'reference'
): number {
  const value = series[variable]?.[index];
  if (value === null || value === undefined || !Number.isFinite(value)) {
    throw new MisalignedSeriesError(
      `${station} series has no ${variable} value at ${series.time[index]}`,
      station,
      variable,
      index
    );
  }
  return value;
}

/**
 * Check every required field exists and is index-aligned with `time`
 */
function assertFieldsAligned(
  series: HourlySeries,
  variables: readonly HourlyVariable[],
  station: 'site' | 'reference'
): void {
  for (const variable of variables) {
    const values = series[variable];
    if (!values) {
      throw new MisalignedSeriesError(`${station} series is missing ${variable}`, station, variable);
    }
    if (values.length !== series.time.length) {
      throw new MisalignedSeriesError(
        `${station} series ${variable} has ${values.length} values for ${series.time.length} timestamps`,
        station,
        variable
      );
    }
  }
}

/**
 * Check both series carry the same timestamp set, in the same order
 */
function assertTimestampsMatch(site: HourlySeries, reference: HourlySeries): void {
  if (site.time.length !== reference.time.length) {
    throw new MisalignedSeriesError(
      `Station series differ in length: site has ${site.time.length} hours, reference has ${reference.time.length}`,
      'both'
    );
  }

  for (let i = 0; i < site.time.length; i++) {
    if (site.time[i] !== reference.time[i]) {
      throw new MisalignedSeriesError(
        `Station timestamps diverge at index ${i}: site ${site.time[i]}, reference ${reference.time[i]}`,
        'both',
        'time',
        i
      );
    }
  }
}

/**
 * Whole hours between two wall-clock timestamps. Both are read as UTC: the
 * provider applies one fixed offset to a whole response.
 */
function hoursBetween(earlier: string, later: string): number {
  return differenceInHours(parseISO(`${later}Z`), parseISO(`${earlier}Z`));
}

/**
 * Merge the site and reference series into canonical hourly records.
 *
 * Two empty series yield an empty array (no data for the requested range).
 */
export function normalizeStations(
  site: HourlySeries,
  reference: HourlySeries
): HourlyObservation[] {
  assertTimestampsMatch(site, reference);
  if (site.time.length === 0) {
    return [];
  }

  assertFieldsAligned(site, SITE_VARIABLES, 'site');
  assertFieldsAligned(reference, REFERENCE_VARIABLES, 'reference');

  const observations: HourlyObservation[] = [];

  for (let i = 0; i < site.time.length; i++) {
    const time = site.time[i];
    const parsed = parseLocalTimestamp(time);
    if (!parsed) {
      throw new MisalignedSeriesError(`Malformed timestamp "${time}" at index ${i}`, 'both', 'time', i);
    }

    if (parsed.minute !== 0) {
      throw new MisalignedSeriesError(`Timestamp "${time}" at index ${i} is not on the hour`, 'both', 'time', i);
    }

    if (i > 0) {
      const previous = site.time[i - 1];
      if (time <= previous) {
        throw new MisalignedSeriesError(
          `Timestamps are not strictly ascending at index ${i} (${previous} -> ${time})`,
          'both',
          'time',
          i
        );
      }
      if (hoursBetween(previous, time) !== 1) {
        throw new MisalignedSeriesError(
          `Timestamps skip hours at index ${i} (${previous} -> ${time})`,
          'both',
          'time',
          i
        );
      }
    }

    const pressureMslHpa = requireValue(site, 'pressure_msl', i, 'site');
    const referencePressureMslHpa = requireValue(reference, 'pressure_msl', i, 'reference');

    observations.push({
      time,
      date: parsed.date,
      hour: parsed.hour,
      temperatureC: requireValue(site, 'temperature_2m', i, 'site'),
      pressureMslHpa,
      referencePressureMslHpa,
      precipitationMm: requireValue(site, 'precipitation', i, 'site'),
      windSpeedKts: requireValue(site, 'wind_speed_10m', i, 'site'),
      windGustsKts: requireValue(site, 'wind_gusts_10m', i, 'site'),
      windDirectionDeg: requireValue(site, 'wind_direction_10m', i, 'site'),
      gradientHpa: referencePressureMslHpa - pressureMslHpa,
    });
  }

  return observations;
}
