/**
 * Wind Utility Functions
 *
 * Display helpers for wind summaries:
 * - Unit: knots (the provider is queried with wind_speed_unit=kn)
 * - Direction: compass-based (WNW, SW, etc), never degrees in summaries
 *
 * Example output: "18 kts SSW"
 */

// ============================================================
// COMPASS DIRECTIONS
// ============================================================

/**
 * 16-point compass directions
 * Each point covers 22.5 degrees (360 / 16)
 */
const COMPASS_POINTS = [
  'N', 'NNE', 'NE', 'ENE',
  'E', 'ESE', 'SE', 'SSE',
  'S', 'SSW', 'SW', 'WSW',
  'W', 'WNW', 'NW', 'NNW',
] as const;

export type CompassDirection = typeof COMPASS_POINTS[number];

/**
 * Convert degrees to 16-point compass direction
 *
 * Note: Meteorological wind direction indicates where wind is coming FROM
 * 0° = N, 90° = E, 180° = S, 270° = W
 */
export function degreesToCompass(deg: number | null | undefined): CompassDirection | null {
  if (deg === null || deg === undefined || isNaN(deg)) {
    return null;
  }

  // Normalize to 0-360 range
  const normalized = ((deg % 360) + 360) % 360;
  const index = Math.round(normalized / 22.5) % 16;

  return COMPASS_POINTS[index];
}

// ============================================================
// FORMATTING FUNCTIONS
// ============================================================

/**
 * Format wind speed: "18 kts"
 */
export function formatKnots(kts: number | null | undefined): string {
  if (kts === null || kts === undefined || isNaN(kts)) {
    return '--';
  }
  return `${Math.round(kts)} kts`;
}

/**
 * Format wind with speed and direction: "18 kts SSW"
 */
export function formatWind(
  kts: number | null | undefined,
  deg: number | null | undefined
): string {
  const speedStr = formatKnots(kts);
  const compass = degreesToCompass(deg);

  if (speedStr === '--') return '--';
  return compass ? `${speedStr} ${compass}` : speedStr;
}
