import { afterEach, describe, it, expect, vi } from 'vitest';
import { getHourlySeries, SeriesCache, seriesCacheKey } from './series-cache';
import { SITE_VARIABLES } from './normalize';
import { buildStationSeries, mockOpenMeteoFetch } from '@/test/factories';

const SITE = { lat: 49.7016, lon: -123.1558 };
const OPTIONS = { timezone: 'America/Vancouver', variables: SITE_VARIABLES };
const HOUR_MS = 60 * 60 * 1000;

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('seriesCacheKey', () => {
  it('separates modes and date ranges', () => {
    const rolling = seriesCacheKey(SITE, 'forecast', null, OPTIONS);
    const ranged = seriesCacheKey(SITE, 'historical', { startDate: '2025-07-01', endDate: '2025-07-02' }, OPTIONS);

    expect(rolling.startsWith('forecast|49.7016|-123.1558|rolling|America/Vancouver|')).toBe(true);
    expect(ranged.startsWith('historical|49.7016|-123.1558|2025-07-01..2025-07-02|')).toBe(true);
  });
});

describe('SeriesCache', () => {
  it('expires forecast entries after an hour', () => {
    let now = 1_000_000;
    const cache = new SeriesCache(undefined, () => now);

    cache.set('k', 'forecast', { time: [] });
    now += HOUR_MS - 1;
    expect(cache.get('k')).not.toBeNull();

    now += 1;
    expect(cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('keeps historical entries for a day', () => {
    let now = 0;
    const cache = new SeriesCache(undefined, () => now);

    cache.set('k', 'historical', { time: [] });
    now += 23 * HOUR_MS;
    expect(cache.get('k')?.series).toEqual({ time: [] });
  });

  it('sweeps expired entries on write', () => {
    let now = 0;
    const cache = new SeriesCache(undefined, () => now);

    for (let i = 0; i < 1000; i++) {
      cache.set(`range-${i}`, 'historical', { time: [] });
    }
    expect(cache.size).toBe(1000);

    now += 48 * HOUR_MS;
    cache.set('fresh', 'historical', { time: [] });

    expect(cache.size).toBe(1);
    expect(cache.get('fresh')).not.toBeNull();
  });

  it('keeps live entries when sweeping', () => {
    let now = 0;
    const cache = new SeriesCache(undefined, () => now);

    cache.set('forecast', 'forecast', { time: [] });
    cache.set('archive', 'historical', { time: [] });
    now += 2 * HOUR_MS;
    cache.set('next', 'forecast', { time: [] });

    expect(cache.size).toBe(2);
    expect(cache.get('forecast')).toBeNull();
    expect(cache.get('archive')).not.toBeNull();
  });
});

describe('getHourlySeries', () => {
  it('serves repeated requests from the cache', async () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const fetchMock = mockOpenMeteoFetch(site, reference);
    vi.stubGlobal('fetch', fetchMock);
    const cache = new SeriesCache();

    const first = await getHourlySeries(SITE, 'forecast', null, OPTIONS, cache);
    const second = await getHourlySeries(SITE, 'forecast', null, OPTIONS, cache);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
  });

  it('refetches once the entry has expired', async () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const fetchMock = mockOpenMeteoFetch(site, reference);
    vi.stubGlobal('fetch', fetchMock);
    let now = 0;
    const cache = new SeriesCache(undefined, () => now);

    await getHourlySeries(SITE, 'forecast', null, OPTIONS, cache);
    now += 2 * HOUR_MS;
    await getHourlySeries(SITE, 'forecast', null, OPTIONS, cache);

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not cache failures', async () => {
    const fetchMock = vi.fn(async () => new Response('down', { status: 502, statusText: 'Bad Gateway' }));
    vi.stubGlobal('fetch', fetchMock);
    const cache = new SeriesCache();

    await expect(getHourlySeries(SITE, 'forecast', null, OPTIONS, cache)).rejects.toThrow('502');
    expect(cache.size).toBe(0);
  });
});
