/**
 * Accuracy Evaluator
 *
 * Scores one day's predictions against observed base wind speed for the same
 * kiteable hours. residual = predicted steady - observed; MAE is the mean of
 * absolute residuals, bias the mean of signed residuals.
 */

import type {
  AccuracyReport,
  HourlyPrediction,
  HourlyResidual,
  KiteModelConfig,
  ObservedWind,
} from '@/types/kite';
import { DEFAULT_MODEL_CONFIG } from '@/lib/scoring/weights';
import { filterKiteableHours } from '@/lib/forecast/kite-window';
import { MisalignedSeriesError } from '@/lib/weather/normalize';

export type AccuracyConfig = Pick<KiteModelConfig, 'kiteableHours' | 'maeAccurateKts'>;

/**
 * Observed base wind taken from the records the predictions were made from
 * (historical mode: the archive is both model input and ground truth)
 */
export function observedFromPredictions(hours: readonly HourlyPrediction[]): ObservedWind[] {
  return hours.map((hour) => ({
    time: hour.observation.time,
    windSpeedKts: hour.observation.windSpeedKts,
  }));
}

/**
 * Evaluate one day of predictions
 *
 * Every kiteable prediction hour must have an observed value.
 */
export function evaluate(
  dayPredictions: readonly HourlyPrediction[],
  observedSeries: readonly ObservedWind[],
  config: Readonly<AccuracyConfig> = DEFAULT_MODEL_CONFIG
): AccuracyReport {
  const date = dayPredictions[0]?.observation.date ?? '';
  const observedByTime = new Map(observedSeries.map((o) => [o.time, o.windSpeedKts]));

  const residuals: HourlyResidual[] = filterKiteableHours(dayPredictions, config).map((hour) => {
    const observedKts = observedByTime.get(hour.observation.time);
    if (observedKts === undefined) {
      throw new MisalignedSeriesError(
        `No observed wind for predicted hour ${hour.observation.time}`,
        'site',
        'wind_speed_10m'
      );
    }
    return {
      time: hour.observation.time,
      hour: hour.observation.hour,
      predictedKts: hour.prediction.steadyKts,
      observedKts,
      residualKts: hour.prediction.steadyKts - observedKts,
    };
  });

  if (residuals.length === 0) {
    return {
      date,
      hoursCompared: 0,
      maeKts: null,
      biasKts: null,
      residuals,
      verdict: 'no_data',
    };
  }

  const absTotal = residuals.reduce((sum, r) => sum + Math.abs(r.residualKts), 0);
  const signedTotal = residuals.reduce((sum, r) => sum + r.residualKts, 0);
  const maeKts = absTotal / residuals.length;

  return {
    date,
    hoursCompared: residuals.length,
    maeKts,
    biasKts: signedTotal / residuals.length,
    residuals,
    verdict: maeKts < config.maeAccurateKts ? 'accurate' : 'model_missed',
  };
}
