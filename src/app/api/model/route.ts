import { NextResponse } from 'next/server';
import { DEFAULT_MODEL_CONFIG, MODEL_VERSION } from '@/lib/scoring/weights';
import { DAY_VERDICT_LABELS } from '@/lib/forecast/daily-outlook';

/**
 * GET /api/model
 *
 * Returns the thermal model configuration for transparency.
 * This allows users to understand how predictions are made.
 */
export async function GET(): Promise<NextResponse> {
  return NextResponse.json(
    {
      model: {
        version: MODEL_VERSION,
        config: DEFAULT_MODEL_CONFIG,
      },
      description: {
        rule_order: [
          'DANGER_STORM: heavy rain with low site pressure overrides everything',
          'HEAT_BUBBLE: extreme heat collapses the thermal',
          'EXCELLENT / GOOD: steady wind from the pressure gradient (reference - site)',
          'LIGHT: weak gradient, synoptic wind only',
          'RAIN_RISK: light rain dampens a thermal or synoptic signal',
        ],
        day_verdicts: DAY_VERDICT_LABELS,
      },
      disclaimer:
        'Predictions come from a rule-based thermal model, not observations. ' +
        'Always check live conditions before launching.',
    },
    {
      status: 200,
      headers: {
        'Cache-Control': 'public, max-age=3600', // 1 hour cache
      },
    }
  );
}
