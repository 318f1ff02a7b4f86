// Thermal Model Configuration
// Tunable parameters for the deterministic kite wind engine.
// Every engine call receives one of these; nothing reads module state.

import type { KiteModelConfig } from '@/types/kite';

// Model version for tracking
export const MODEL_VERSION = 'thermal-v1.0.0';

/**
 * Freeze a config and copies of its nested objects, so no two configs
 * share a mutable band, triple or hour range
 */
function freezeConfig(config: KiteModelConfig): Readonly<KiteModelConfig> {
  return Object.freeze({
    ...config,
    kiteableHours: Object.freeze({ ...config.kiteableHours }),
    stormWind: Object.freeze({ ...config.stormWind }),
    heatBubbleWind: Object.freeze({ ...config.heatBubbleWind }),
    excellentBand: Object.freeze({ ...config.excellentBand }),
    goodBand: Object.freeze({ ...config.goodBand }),
  });
}

// Default model parameters - can be tuned against backtest results
export const DEFAULT_MODEL_CONFIG: Readonly<KiteModelConfig> = freezeConfig({
  // Window detection
  kiteableThresholdKts: 15,
  minSessionHours: 2,
  kiteableHours: { start: 10, end: 21 },

  // Storm safety: rain > 2mm AND low pressure
  stormRainMm: 2.0,
  stormPressureHpa: 1008,
  stormWind: { lullKts: 0, steadyKts: 0, gustKts: 45 },

  // Heat bubble: extreme heat collapses the thermal
  heatBubbleTempC: 31.0,
  heatBubbleWind: { lullKts: 5, steadyKts: 8, gustKts: 12 },

  // Thermal engine bands (gradient = reference - site, hPa)
  excellentBand: { minGradientHpa: 4.0, baseKts: 22, ktsPerHpa: 2.5 },
  goodBand: { minGradientHpa: 2.5, baseKts: 16, ktsPerHpa: 2 },

  // Local gusts run ~35% above the steady thermal
  gustFactor: 1.35,
  lullFactor: 0.7,

  // Light rain kills the thermal
  rainDampenerMm: 0.5,
  rainSteadyFactor: 0.6,
  rainGustFactor: 0.8,

  maeAccurateKts: 5,

  goKitingKts: 18,
  foilKts: 13,
});

export type ModelConfigOverrides = Partial<KiteModelConfig>;

/**
 * Merge per-request overrides over the defaults.
 *
 * Nested objects (bands, wind triples, hour range) are replaced whole.
 * The result is frozen all the way down.
 */
export function resolveModelConfig(
  overrides: ModelConfigOverrides = {},
  base: Readonly<KiteModelConfig> = DEFAULT_MODEL_CONFIG
): Readonly<KiteModelConfig> {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return freezeConfig({ ...base, ...defined });
}

/**
 * Check if a local hour is inside the kiteable range (inclusive)
 */
export function isKiteableHour(hour: number, config: Readonly<Pick<KiteModelConfig, 'kiteableHours'>>): boolean {
  return hour >= config.kiteableHours.start && hour <= config.kiteableHours.end;
}
