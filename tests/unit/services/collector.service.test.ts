import { CollectorService } from '../../../src/services/collector.service';
import { SourceFetchError } from '../../../src/sources/common';
import { DataSource, SourceName, SummaryMap } from '../../../src/types/source.types';

function fakeSource<K extends SourceName>(name: K, fetch: () => Promise<SummaryMap[K]>): DataSource<K> {
  return { name, fetch, formatMessage: () => name };
}

const HEALTH = { steps: 1000, sleepHours: 7 };
const POEM = { poem: 'line' };

describe('CollectorService', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('should isolate a failing source from the others', async () => {
    const collector = new CollectorService([
      fakeSource('apple_health', async () => HEALTH),
      fakeSource('github', async () => {
        throw new SourceFetchError('github', 'Bad credentials');
      }),
      fakeSource('poem', async () => POEM),
    ]);

    const report = await collector.collect(new Date('2026-10-19T00:00:00Z'));

    expect(report.sources).toEqual({ apple_health: HEALTH, poem: POEM });
    expect(report.errors).toEqual(['github: Bad credentials']);
    expect(report.results).toEqual([
      { status: 'success', source: 'apple_health', data: HEALTH },
      { status: 'failure', source: 'github', error: 'Bad credentials' },
      { status: 'success', source: 'poem', data: POEM },
    ]);
    expect(report.generatedAt.toISOString()).toBe('2026-10-19T00:00:00.000Z');
  });

  it('should wait for slow sources and keep launch order', async () => {
    const collector = new CollectorService([
      fakeSource(
        'poem',
        () => new Promise((resolve) => setTimeout(() => resolve(POEM), 20))
      ),
      fakeSource('apple_health', async () => HEALTH),
    ]);

    const report = await collector.collect();

    expect(report.results.map((r) => r.source)).toEqual(['poem', 'apple_health']);
    expect(Object.keys(report.sources).sort()).toEqual(['apple_health', 'poem']);
  });

  it('should stringify non-Error rejections', async () => {
    const collector = new CollectorService([
      fakeSource('steam', () => Promise.reject('socket hang up')),
    ]);

    const report = await collector.collect();

    expect(report.errors).toEqual(['steam: socket hang up']);
    expect(report.sources).toEqual({});
  });

  it('should return an empty report when no source is enabled', async () => {
    const report = await new CollectorService([]).collect();

    expect(report.results).toEqual([]);
    expect(report.errors).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith('CollectorService: No data sources enabled');
  });
});
