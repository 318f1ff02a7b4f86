/**
 * Thermal Wind Prediction Engine
 *
 * Maps one hourly record to a (lull, steady, gust, status) prediction.
 * Pure: no I/O, no hidden state. Every threshold comes from the config
 * passed in.
 *
 * RULE CASCADE (first match wins):
 * 1. Storm safety gate - heavy rain with low pressure, hard override
 * 2. Heat bubble gate  - extreme heat collapses thermal convection
 * 3. Thermal engine    - steady wind from the pressure gradient band
 * 4. Gust/lull         - derived from steady (reported gust wins if stronger)
 * 5. Rain dampener     - light rain weakens a thermal or synoptic signal
 *
 * Output always satisfies 0 <= lull <= steady <= gust.
 */

import type {
  HourlyObservation,
  HourlyPrediction,
  KiteModelConfig,
  KiteStatus,
  Prediction,
  WindTriple,
} from '@/types/kite';
import { DEFAULT_MODEL_CONFIG } from '@/lib/scoring/weights';

const DEBUG_MODEL = process.env.DEBUG_KITE_MODEL === 'true';

function fromTriple(triple: Readonly<WindTriple>, status: KiteStatus, explanation: string[]): Prediction {
  return enforceOrdering({
    lullKts: triple.lullKts,
    steadyKts: triple.steadyKts,
    gustKts: triple.gustKts,
    status,
    explanation,
  });
}

/**
 * Steady wind and status from the pressure gradient
 */
function thermalSteady(
  observation: HourlyObservation,
  config: Readonly<KiteModelConfig>
): { steadyKts: number; status: KiteStatus; reason: string } {
  const gradient = observation.gradientHpa;
  const gradientLabel = `${gradient.toFixed(1)} hPa`;

  if (gradient >= config.excellentBand.minGradientHpa) {
    const band = config.excellentBand;
    return {
      steadyKts: band.baseKts + (gradient - band.minGradientHpa) * band.ktsPerHpa,
      status: 'EXCELLENT',
      reason: `Strong thermal gradient (${gradientLabel})`,
    };
  }

  if (gradient >= config.goodBand.minGradientHpa) {
    const band = config.goodBand;
    return {
      steadyKts: band.baseKts + (gradient - band.minGradientHpa) * band.ktsPerHpa,
      status: 'GOOD',
      reason: `Moderate thermal gradient (${gradientLabel})`,
    };
  }

  // No thermal contribution - fall back to the synoptic wind
  return {
    steadyKts: observation.windSpeedKts,
    status: 'LIGHT',
    reason: `Weak gradient (${gradientLabel}), synoptic wind only`,
  };
}

/**
 * Restore 0 <= lull <= steady <= gust after independent scaling
 */
function enforceOrdering(prediction: Prediction): Prediction {
  const steadyKts = Math.max(0, prediction.steadyKts);
  const lullKts = Math.min(Math.max(0, prediction.lullKts), steadyKts);
  const gustKts = Math.max(prediction.gustKts, steadyKts);
  return { ...prediction, lullKts, steadyKts, gustKts };
}

/**
 * Predict kite wind for one hour
 */
export function predict(
  observation: HourlyObservation,
  config: Readonly<KiteModelConfig> = DEFAULT_MODEL_CONFIG
): Prediction {
  // 1. Storm safety (rain AND low pressure)
  if (
    observation.precipitationMm > config.stormRainMm &&
    observation.pressureMslHpa < config.stormPressureHpa
  ) {
    return fromTriple(config.stormWind, 'DANGER_STORM', [
      `Storm: ${observation.precipitationMm} mm rain at ${observation.pressureMslHpa} hPa`,
    ]);
  }

  // 2. Heat bubble
  if (observation.temperatureC > config.heatBubbleTempC) {
    return fromTriple(config.heatBubbleWind, 'HEAT_BUBBLE', [
      `Heat bubble: ${observation.temperatureC}°C suppresses the thermal`,
    ]);
  }

  // 3. Thermal engine
  const thermal = thermalSteady(observation, config);
  const explanation = [thermal.reason];
  let status = thermal.status;
  let steadyKts = thermal.steadyKts;

  // 4. Gusts and lulls
  let gustKts = Math.max(steadyKts * config.gustFactor, observation.windGustsKts);
  const lullKts = steadyKts * config.lullFactor;
  if (observation.windGustsKts > steadyKts * config.gustFactor) {
    explanation.push(`Reported gusts (${observation.windGustsKts} kts) exceed thermal gust estimate`);
  }

  // 5. Rain dampener (light-wind hours are left alone)
  if (observation.precipitationMm > config.rainDampenerMm && status !== 'LIGHT') {
    steadyKts *= config.rainSteadyFactor;
    gustKts *= config.rainGustFactor;
    status = 'RAIN_RISK';
    explanation.push(`Rain (${observation.precipitationMm} mm) dampens the thermal`);
  }

  const prediction = enforceOrdering({ lullKts, steadyKts, gustKts, status, explanation });

  if (DEBUG_MODEL) {
    console.log(`[KITE_MODEL] ${observation.time}`, {
      gradient: observation.gradientHpa,
      status: prediction.status,
      steady: prediction.steadyKts,
    });
  }

  return prediction;
}

/**
 * Predict every hour of an ordered series
 */
export function predictSeries(
  observations: readonly HourlyObservation[],
  config: Readonly<KiteModelConfig> = DEFAULT_MODEL_CONFIG
): HourlyPrediction[] {
  return observations.map((observation) => ({
    observation,
    prediction: predict(observation, config),
  }));
}
