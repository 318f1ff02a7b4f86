// Kite Forecast Type Definitions

// ============ Enums & Constants ============

export type KiteStatus =
  | 'LIGHT'
  | 'GOOD'
  | 'EXCELLENT'
  | 'HEAT_BUBBLE'
  | 'RAIN_RISK'
  | 'DANGER_STORM';

export type FetchMode = 'forecast' | 'historical';

export type AccuracyVerdict = 'accurate' | 'model_missed' | 'no_data';

export type DayVerdict = 'storm' | 'go_kiting' | 'foil' | 'no_wind';

// ============ Upstream Series ============

/**
 * Hourly variables requested from the weather provider.
 * Names match the Open-Meteo query/response keys.
 */
export type HourlyVariable =
  | 'temperature_2m'
  | 'pressure_msl'
  | 'precipitation'
  | 'wind_speed_10m'
  | 'wind_gusts_10m'
  | 'wind_direction_10m';

/**
 * Hourly series keyed by field name. Every value array is index-aligned
 * with `time` (site-local `YYYY-MM-DDTHH:mm`).
 */
export type HourlySeries = {
  time: string[];
} & Partial<Record<HourlyVariable, Array<number | null>>>;

export interface Coordinates {
  lat: number;
  lon: number;
}

export interface DateRange {
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
}

// ============ Core Records ============

export interface HourlyObservation {
  time: string; // YYYY-MM-DDTHH:mm, site-local
  date: string; // YYYY-MM-DD
  hour: number; // 0-23
  temperatureC: number;
  pressureMslHpa: number;
  referencePressureMslHpa: number;
  precipitationMm: number;
  windSpeedKts: number;
  windGustsKts: number;
  windDirectionDeg: number;
  gradientHpa: number; // reference - site
}

export interface Prediction {
  lullKts: number;
  steadyKts: number;
  gustKts: number;
  status: KiteStatus;
  explanation: string[];
}

export interface HourlyPrediction {
  observation: HourlyObservation;
  prediction: Prediction;
}

export interface KiteSession {
  startHour: number;
  endHour: number;
}

export interface KiteWindow {
  date: string;
  session: KiteSession | null; // null = no solid session
  qualifyingHours: number;
  peak: { hour: number; steadyKts: number } | null;
  storm: boolean;
}

export interface HourlyResidual {
  time: string;
  hour: number;
  predictedKts: number;
  observedKts: number;
  residualKts: number; // predicted - observed
}

export interface AccuracyReport {
  date: string;
  hoursCompared: number;
  maeKts: number | null;
  biasKts: number | null;
  residuals: HourlyResidual[];
  verdict: AccuracyVerdict;
}

export interface ObservedWind {
  time: string;
  windSpeedKts: number;
}

// ============ Configuration ============

export interface WindTriple {
  lullKts: number;
  steadyKts: number;
  gustKts: number;
}

export interface ThermalBand {
  minGradientHpa: number;
  baseKts: number;
  ktsPerHpa: number;
}

export interface KiteModelConfig {
  // Window detection
  kiteableThresholdKts: number;
  minSessionHours: number;
  kiteableHours: Readonly<{ start: number; end: number }>; // inclusive, local hours

  // Storm safety gate
  stormRainMm: number;
  stormPressureHpa: number;
  stormWind: Readonly<WindTriple>;

  // Heat bubble gate
  heatBubbleTempC: number;
  heatBubbleWind: Readonly<WindTriple>;

  // Thermal model (gradient driven)
  excellentBand: Readonly<ThermalBand>;
  goodBand: Readonly<ThermalBand>;

  // Gust / lull derivation
  gustFactor: number;
  lullFactor: number;

  // Rain dampener
  rainDampenerMm: number;
  rainSteadyFactor: number;
  rainGustFactor: number;

  // Backtesting
  maeAccurateKts: number;

  // Day verdict bands (peak steady)
  goKitingKts: number;
  foilKts: number;
}

// ============ Service Results ============

export interface DayOutlook {
  date: string;
  window: KiteWindow;
  verdict: DayVerdict;
  peakContext: {
    time: string;
    gradientHpa: number;
    temperatureC: number;
    windDirection: string | null;
  } | null;
  // "GO KITING | 12:00–17:00 | peak 23 kts SSW at 3 PM"
  summary: string;
  hours: HourlyPrediction[];
}

export interface KiteForecast {
  siteId: string;
  timezone: string;
  modelVersion: string;
  generatedAt: string;
  days: DayOutlook[];
}

export interface BacktestReport {
  siteId: string;
  modelVersion: string;
  range: DateRange;
  days: AccuracyReport[];
  overallMaeKts: number | null;
  accurateDays: number;
  evaluatedDays: number;
  generatedAt: string;
}
