import { afterEach, describe, it, expect, vi } from 'vitest';
import { aggregateMae, runBacktest } from './backtest';
import { SeriesCache } from '@/lib/weather/series-cache';
import { UpstreamFetchError } from '@/lib/weather/open-meteo';
import { buildStationSeries, mockOpenMeteoFetch } from '@/test/factories';

const RANGE = { startDate: '2026-06-01', endDate: '2026-06-02' };

/**
 * Day one: a 4.5 hPa gradient all day, but only 20 kts observed (model
 * says 23.25). Day two: weak gradient, model falls back to the observed
 * base wind.
 */
function archiveFixture() {
  return buildStationSeries(['2026-06-01', '2026-06-02'], (date) =>
    date === '2026-06-01' ? { referencePressureMslHpa: 1016.5, windSpeedKts: 20, windGustsKts: 24 } : {}
  );
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('runBacktest', () => {
  it('scores each day against the observed wind', async () => {
    const { site, reference } = archiveFixture();
    vi.stubGlobal('fetch', mockOpenMeteoFetch(site, reference));

    const report = await runBacktest(RANGE, { cache: new SeriesCache() });

    expect(report.siteId).toBe('squamish');
    expect(report.range).toEqual(RANGE);
    expect(report.days.map((d) => d.date)).toEqual(['2026-06-01', '2026-06-02']);

    const [thermalDay, lightDay] = report.days;
    expect(thermalDay.hoursCompared).toBe(12);
    expect(thermalDay.maeKts).toBe(3.25);
    expect(thermalDay.biasKts).toBe(3.25);
    expect(thermalDay.verdict).toBe('accurate');
    expect(thermalDay.residuals[0]).toEqual({
      time: '2026-06-01T10:00',
      hour: 10,
      predictedKts: 23.25,
      observedKts: 20,
      residualKts: 3.25,
    });

    expect(lightDay.maeKts).toBe(0);
    expect(lightDay.verdict).toBe('accurate');

    expect(report.overallMaeKts).toBe(1.625);
    expect(report.accurateDays).toBe(2);
    expect(report.evaluatedDays).toBe(2);
  });

  it('queries the archive endpoint for the requested range', async () => {
    const { site, reference } = archiveFixture();
    const fetchMock = mockOpenMeteoFetch(site, reference);
    vi.stubGlobal('fetch', fetchMock);

    await runBacktest(RANGE, { cache: new SeriesCache() });

    const urls = fetchMock.mock.calls.map(([input]) => new URL(String(input)));
    expect(urls).toHaveLength(2);
    for (const url of urls) {
      expect(url.hostname).toBe('archive-api.open-meteo.com');
      expect(url.searchParams.get('start_date')).toBe('2026-06-01');
      expect(url.searchParams.get('end_date')).toBe('2026-06-02');
    }
  });

  it('returns an empty report when the archive has no hours', async () => {
    vi.stubGlobal('fetch', mockOpenMeteoFetch({ time: [] }, { time: [] }));

    const report = await runBacktest(RANGE, { cache: new SeriesCache() });

    expect(report.days).toEqual([]);
    expect(report.overallMaeKts).toBeNull();
    expect(report.evaluatedDays).toBe(0);
  });

  it('propagates upstream failures unmodified', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 500, statusText: 'Internal Server Error' })));

    await expect(runBacktest(RANGE, { cache: new SeriesCache() })).rejects.toBeInstanceOf(UpstreamFetchError);
  });
});

describe('aggregateMae', () => {
  it('pools hours rather than averaging day MAEs', () => {
    const residual = (residualKts: number) => ({
      time: '2026-06-01T12:00',
      hour: 12,
      predictedKts: 0,
      observedKts: 0,
      residualKts,
    });

    const mae = aggregateMae([
      { date: 'a', hoursCompared: 1, maeKts: 6, biasKts: 6, residuals: [residual(6)], verdict: 'model_missed' },
      {
        date: 'b',
        hoursCompared: 3,
        maeKts: 2,
        biasKts: 0,
        residuals: [residual(2), residual(-2), residual(2)],
        verdict: 'accurate',
      },
    ]);

    expect(mae).toBe(3);
  });

  it('is null with nothing to compare', () => {
    expect(aggregateMae([])).toBeNull();
  });
});
