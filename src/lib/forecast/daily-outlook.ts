/**
 * Daily Kite Outlook
 *
 * Rolls one day of hourly predictions into a summary card:
 * kiteable window, verdict from the peak steady wind, and the conditions
 * at the peak hour (gradient, temperature, compass direction).
 *
 * Output format:
 * {
 *   "date": "2026-07-14",
 *   "verdict": "go_kiting",
 *   "window": { "session": { "startHour": 12, "endHour": 17 }, ... },
 *   "peakContext": { "time": "2026-07-14T15:00", "gradientHpa": 4.6, ... },
 *   "summary": "GO KITING | 12:00–17:00 | peak 23 kts SSW at 3 PM"
 * }
 */

import type { DayOutlook, DayVerdict, HourlyPrediction, KiteModelConfig, KiteWindow } from '@/types/kite';
import { DEFAULT_MODEL_CONFIG } from '@/lib/scoring/weights';
import { detectWindow, formatSession } from '@/lib/forecast/kite-window';
import { formatHourForDisplay } from '@/lib/time/local-time';
import { degreesToCompass, formatWind } from '@/lib/weather/wind-utils';

/**
 * Verdict labels for display
 */
export const DAY_VERDICT_LABELS: Readonly<Record<DayVerdict, string>> = {
  storm: 'DANGER / STORM',
  go_kiting: 'GO KITING',
  foil: 'Foil / Big Kite',
  no_wind: 'No Wind',
};

/**
 * Classify a day from its window
 *
 * A storm anywhere in the kiteable hours overrides the wind verdict.
 */
export function classifyDay(
  window: KiteWindow,
  config: Readonly<Pick<KiteModelConfig, 'goKitingKts' | 'foilKts'>> = DEFAULT_MODEL_CONFIG
): DayVerdict {
  if (window.storm) return 'storm';

  const peak = window.peak?.steadyKts ?? 0;
  if (peak >= config.goKitingKts) return 'go_kiting';
  if (peak >= config.foilKts) return 'foil';
  return 'no_wind';
}

/**
 * One-line summary: verdict, session span, and the peak hour's wind
 */
export function summarizeDay(
  window: KiteWindow,
  verdict: DayVerdict,
  peakDirectionDeg: number | null
): string {
  const parts = [DAY_VERDICT_LABELS[verdict], formatSession(window)];
  if (window.peak) {
    parts.push(
      `peak ${formatWind(window.peak.steadyKts, peakDirectionDeg)} at ${formatHourForDisplay(window.peak.hour)}`
    );
  }
  return parts.join(' | ');
}

/**
 * Build the outlook for one day of hourly predictions
 */
export function buildDayOutlook(
  dayPredictions: readonly HourlyPrediction[],
  config: Readonly<KiteModelConfig> = DEFAULT_MODEL_CONFIG
): DayOutlook {
  const window = detectWindow(dayPredictions, config);

  const peakHour = window.peak
    ? dayPredictions.find((hour) => hour.observation.hour === window.peak?.hour)
    : undefined;

  const verdict = classifyDay(window, config);

  return {
    date: window.date,
    window,
    verdict,
    peakContext: peakHour
      ? {
          time: peakHour.observation.time,
          gradientHpa: peakHour.observation.gradientHpa,
          temperatureC: peakHour.observation.temperatureC,
          windDirection: degreesToCompass(peakHour.observation.windDirectionDeg),
        }
      : null,
    summary: summarizeDay(window, verdict, peakHour?.observation.windDirectionDeg ?? null),
    hours: [...dayPredictions],
  };
}
