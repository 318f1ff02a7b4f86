/**
 * Kiteable Window Detection
 *
 * Scans one day's hourly predictions (kiteable local hours only) for the
 * session span, the storm flag and the peak steady wind.
 *
 * SPAN SEMANTICS: the session runs from the first qualifying hour to the
 * last qualifying hour. Sub-threshold hours inside that span are not split
 * out; a day qualifying at 12, 13, 14 and 17 reports 12-17.
 */

import type { HourlyPrediction, KiteModelConfig, KiteWindow } from '@/types/kite';
import { DEFAULT_MODEL_CONFIG, isKiteableHour } from '@/lib/scoring/weights';
import { formatHour24 } from '@/lib/time/local-time';

export type WindowConfig = Pick<
  KiteModelConfig,
  'kiteableThresholdKts' | 'minSessionHours' | 'kiteableHours'
>;

/**
 * Split an ordered hourly series into per-date groups, preserving order
 */
export function groupByDay(hours: readonly HourlyPrediction[]): Map<string, HourlyPrediction[]> {
  const days = new Map<string, HourlyPrediction[]>();
  for (const hour of hours) {
    const date = hour.observation.date;
    const existing = days.get(date);
    if (existing) {
      existing.push(hour);
    } else {
      days.set(date, [hour]);
    }
  }
  return days;
}

/**
 * Keep only the hours inside the kiteable local-hour range
 */
export function filterKiteableHours(
  hours: readonly HourlyPrediction[],
  config: Readonly<Pick<KiteModelConfig, 'kiteableHours'>> = DEFAULT_MODEL_CONFIG
): HourlyPrediction[] {
  return hours.filter((hour) => isKiteableHour(hour.observation.hour, config));
}

/**
 * Detect the kiteable window for one day
 *
 * @param dayPredictions - One day's hourly predictions, ascending
 */
export function detectWindow(
  dayPredictions: readonly HourlyPrediction[],
  config: Readonly<WindowConfig> = DEFAULT_MODEL_CONFIG
): KiteWindow {
  const date = dayPredictions[0]?.observation.date ?? '';
  const hours = filterKiteableHours(dayPredictions, config);

  const qualifying = hours.filter(
    (hour) => hour.prediction.steadyKts >= config.kiteableThresholdKts
  );

  let peak: KiteWindow['peak'] = null;
  for (const hour of hours) {
    if (!peak || hour.prediction.steadyKts > peak.steadyKts) {
      peak = { hour: hour.observation.hour, steadyKts: hour.prediction.steadyKts };
    }
  }

  const storm = hours.some((hour) => hour.prediction.status === 'DANGER_STORM');

  const first = qualifying[0];
  const last = qualifying[qualifying.length - 1];
  const session =
    first && last && qualifying.length >= config.minSessionHours
      ? { startHour: first.observation.hour, endHour: last.observation.hour }
      : null;

  return {
    date,
    session,
    qualifyingHours: qualifying.length,
    peak,
    storm,
  };
}

/**
 * Format the session span: "12:00–17:00" or "No solid session"
 */
export function formatSession(window: KiteWindow): string {
  if (!window.session) {
    return 'No solid session';
  }
  return `${formatHour24(window.session.startHour)}–${formatHour24(window.session.endHour)}`;
}
