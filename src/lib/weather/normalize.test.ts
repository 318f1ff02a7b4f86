import { describe, it, expect } from 'vitest';
import { MisalignedSeriesError, normalizeStations } from './normalize';
import { buildStationSeries } from '@/test/factories';

describe('normalizeStations', () => {
  it('merges both stations into ordered hourly records', () => {
    const { site, reference } = buildStationSeries(['2026-07-14'], (_date, hour) =>
      hour === 14 ? { referencePressureMslHpa: 1016.5, windSpeedKts: 12 } : {}
    );

    const observations = normalizeStations(site, reference);

    expect(observations).toHaveLength(24);
    expect(observations[0].time).toBe('2026-07-14T00:00');
    expect(observations[23].hour).toBe(23);

    const afternoon = observations[14];
    expect(afternoon).toEqual({
      time: '2026-07-14T14:00',
      date: '2026-07-14',
      hour: 14,
      temperatureC: 20,
      pressureMslHpa: 1012,
      referencePressureMslHpa: 1016.5,
      precipitationMm: 0,
      windSpeedKts: 12,
      windGustsKts: 10,
      windDirectionDeg: 200,
      gradientHpa: 4.5,
    });
  });

  it('returns an empty sequence when both series are empty', () => {
    expect(normalizeStations({ time: [] }, { time: [] })).toEqual([]);
  });

  it('rejects series of different lengths', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const shortReference = {
      time: reference.time.slice(0, 23),
      pressure_msl: reference.pressure_msl?.slice(0, 23),
    };

    expect(() => normalizeStations(site, shortReference)).toThrow(MisalignedSeriesError);
    expect(() => normalizeStations(site, shortReference)).toThrow(
      'Station series differ in length: site has 24 hours, reference has 23'
    );
  });

  it('rejects series whose timestamps diverge', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const shifted = { ...reference, time: reference.time.map((t) => t.replace('2026-07-14', '2026-07-15')) };

    try {
      normalizeStations(site, shifted);
      expect.unreachable('expected a MisalignedSeriesError');
    } catch (error) {
      expect(error).toBeInstanceOf(MisalignedSeriesError);
      if (error instanceof MisalignedSeriesError) {
        expect(error.station).toBe('both');
        expect(error.index).toBe(0);
      }
    }
  });

  it('rejects a missing required field', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const { wind_gusts_10m: _gusts, ...withoutGusts } = site;

    expect(() => normalizeStations(withoutGusts, reference)).toThrow('site series is missing wind_gusts_10m');
  });

  it('rejects a field array that does not match the timestamps', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const truncated = { ...site, temperature_2m: site.temperature_2m?.slice(0, 20) };

    expect(() => normalizeStations(truncated, reference)).toThrow(
      'site series temperature_2m has 20 values for 24 timestamps'
    );
  });

  it('rejects a null value instead of substituting one', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const pressures = [...(reference.pressure_msl ?? [])];
    pressures[5] = null;

    expect(() => normalizeStations(site, { ...reference, pressure_msl: pressures })).toThrow(
      'reference series has no pressure_msl value at 2026-07-14T05:00'
    );
  });

  it('rejects timestamps that are not strictly ascending', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const time = [...site.time];
    time[4] = time[3];

    expect(() => normalizeStations({ ...site, time }, { ...reference, time: [...time] })).toThrow(
      'Timestamps are not strictly ascending at index 4 (2026-07-14T03:00 -> 2026-07-14T03:00)'
    );
  });

  it('rejects a timestamp that is not on the hour', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const time = [...site.time];
    time[13] = '2026-07-14T12:30';

    try {
      normalizeStations({ ...site, time }, { ...reference, time: [...time] });
      expect.unreachable('expected a MisalignedSeriesError');
    } catch (error) {
      expect(error).toBeInstanceOf(MisalignedSeriesError);
      if (error instanceof MisalignedSeriesError) {
        expect(error.message).toBe('Timestamp "2026-07-14T12:30" at index 13 is not on the hour');
        expect(error.field).toBe('time');
        expect(error.index).toBe(13);
      }
    }
  });

  it('rejects a gap between hours', () => {
    const { site, reference } = buildStationSeries(['2026-07-14', '2026-07-16']);

    expect(() => normalizeStations(site, reference)).toThrow(
      'Timestamps skip hours at index 24 (2026-07-14T23:00 -> 2026-07-16T00:00)'
    );
  });

  it('runs across midnight and month ends', () => {
    const { site, reference } = buildStationSeries(['2026-07-31', '2026-08-01']);

    const observations = normalizeStations(site, reference);

    expect(observations).toHaveLength(48);
    expect(observations[24]).toMatchObject({ time: '2026-08-01T00:00', date: '2026-08-01', hour: 0 });
  });

  it('rejects malformed timestamps', () => {
    const { site, reference } = buildStationSeries(['2026-07-14']);
    const time = [...site.time];
    time[0] = '2026-07-14 00:00';

    expect(() => normalizeStations({ ...site, time }, { ...reference, time: [...time] })).toThrow(
      'Malformed timestamp "2026-07-14 00:00" at index 0'
    );
  });
});
