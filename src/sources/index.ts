/**
 * Data source registry
 * Builds the list of enabled sources, in launch order, from the app config.
 */

import { AppConfig } from '../config/env';
import { DataSource } from '../types/source.types';
import { AppleHealthSource } from './apple-health.source';
import { SourceOptions } from './common';
import { DuolingoSource } from './duolingo.source';
import { GithubSource } from './github.source';
import { PoemSource } from './poem.source';
import { SteamSource } from './steam.source';
import { WereadSource } from './weread.source';
import { XiaomiSource } from './xiaomi.source';

export function buildEnabledSources(
  config: AppConfig,
  options: Pick<SourceOptions, 'fetchImpl' | 'now'> = {}
): DataSource[] {
  const sourceOptions: SourceOptions = {
    ...options,
    timeoutMs: config.httpTimeoutMs,
    timeZone: config.timeZone,
  };
  const { sources, goals } = config;
  const enabled: DataSource[] = [];

  if (sources.github) enabled.push(new GithubSource(sources.github, sourceOptions));
  if (sources.xiaomi) enabled.push(new XiaomiSource(sources.xiaomi, goals, sourceOptions));
  if (sources.weread) enabled.push(new WereadSource(sources.weread, sourceOptions));
  if (sources.duolingo) enabled.push(new DuolingoSource(sources.duolingo, sourceOptions));
  if (sources.poem) enabled.push(new PoemSource(sources.poem, sourceOptions));
  if (sources.appleHealth) enabled.push(new AppleHealthSource(sources.appleHealth, goals));
  if (sources.steam) enabled.push(new SteamSource(sources.steam, sourceOptions));

  return enabled;
}
