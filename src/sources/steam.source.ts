/**
 * Steam Data Source
 * Recent and lifetime playtime from the Steam Web API. Steam only reports
 * two-week and lifetime totals, so "yesterday" is estimated from the
 * two-week playtime of the three most recent games.
 *
 * Required env vars: STEAM_API_KEY, STEAM_ID (SteamID64)
 */

import { SteamSourceConfig } from '../config/env';
import { HttpClient, QueryParams } from '../lib/http';
import { DataSource, SteamGame, SteamSummary } from '../types/source.types';
import { asRecord, readArray, readNumber, readRecord, readString } from '../utils/fields';
import { errorMessage, round1, SourceOptions } from './common';

export const STEAM_TITLE = '🎮 Steam';

const STEAM_API = 'https://api.steampowered.com';
const RECENT_GAMES_LIMIT = 3;
const TOP_GAMES_LIMIT = 3;
const MAX_NAME_LENGTH = 20;

function gameName(game: Record<string, unknown>, fallback: string): string {
  return readString(game, 'name', fallback).slice(0, MAX_NAME_LENGTH);
}

export function buildSteamSummary(player: unknown, recentGames: unknown[], ownedGames: unknown[]): SteamSummary {
  const recent = recentGames.map(asRecord);
  const owned = ownedGames.map(asRecord);

  const twoWeekMinutes = (games: Record<string, unknown>[]) =>
    games.reduce((sum, game) => sum + readNumber(game, 'playtime_2weeks'), 0);

  const topGames: SteamGame[] = [...owned]
    .sort((a, b) => readNumber(b, 'playtime_forever') - readNumber(a, 'playtime_forever'))
    .slice(0, TOP_GAMES_LIMIT)
    .map((game) => ({
      name: gameName(game, ''),
      hours: round1(readNumber(game, 'playtime_forever') / 60),
    }));

  const totalMinutes = owned.reduce((sum, game) => sum + readNumber(game, 'playtime_forever'), 0);

  return {
    playerName: readString(asRecord(player), 'personaname', 'Unknown'),
    yesterdayHours: round1(twoWeekMinutes(recent.slice(0, RECENT_GAMES_LIMIT)) / 60),
    weekHours: round1(twoWeekMinutes(recent) / 60),
    totalGames: owned.length,
    totalHours: round1(totalMinutes / 60),
    recentGames: recent
      .slice(0, RECENT_GAMES_LIMIT)
      .map((game) => `${gameName(game, 'Unknown')} (${round1(readNumber(game, 'playtime_2weeks') / 60)}h)`),
    topGames,
  };
}

export function formatSteamMessage(summary: SteamSummary): string {
  const lines = [STEAM_TITLE];

  if (summary.playerName) {
    lines.push(`• Player: ${summary.playerName}`);
  }
  lines.push(
    summary.yesterdayHours > 0 ? `• Yesterday: ${summary.yesterdayHours} h` : '• No games played yesterday'
  );
  if (summary.weekHours > 0) {
    lines.push(`• This week: ${summary.weekHours} h`);
  }
  if (summary.recentGames.length > 0) {
    lines.push('• Recently played:');
    for (const game of summary.recentGames) {
      lines.push(`  - ${game}`);
    }
  }
  if (summary.topGames.length > 0) {
    lines.push('• Most played:');
    for (const game of summary.topGames) {
      lines.push(`  - ${game.name}: ${game.hours}h`);
    }
  }
  if (summary.totalGames > 0) {
    lines.push(`• Library: ${summary.totalGames} games`);
  }
  if (summary.totalHours > 0) {
    lines.push(`• Total playtime: ${summary.totalHours.toFixed(1)} h`);
  }

  return lines.join('\n');
}

export class SteamSource implements DataSource<'steam'> {
  readonly name = 'steam';
  private http: HttpClient;

  constructor(private config: SteamSourceConfig, options: SourceOptions = {}) {
    this.http = new HttpClient({
      fetchImpl: options.fetchImpl,
      timeoutMs: options.timeoutMs,
      headers: { 'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36' },
    });
  }

  async fetch(): Promise<SteamSummary> {
    const { apiKey, steamId } = this.config;

    const players = await this.getList('ISteamUser/GetPlayerSummaries/v0002/', 'players', {
      key: apiKey,
      steamids: steamId,
      format: 'json',
    });
    const recent = await this.getList('IPlayerService/GetRecentlyPlayedGames/v0001/', 'games', {
      key: apiKey,
      steamid: steamId,
      count: RECENT_GAMES_LIMIT,
      format: 'json',
    });
    const owned = await this.getList('IPlayerService/GetOwnedGames/v0001/', 'games', {
      key: apiKey,
      steamid: steamId,
      include_appinfo: 1,
      include_played_free_games: 1,
      format: 'json',
    });

    const summary = buildSteamSummary(players[0], recent, owned);
    console.log(`SteamSource: player=${summary.playerName}, games=${summary.totalGames}, week=${summary.weekHours}h`);
    return summary;
  }

  formatMessage(summary: SteamSummary): string {
    return formatSteamMessage(summary);
  }

  /**
   * Read `response.<key>` from an endpoint; a failed request gives an empty list.
   */
  private async getList(endpoint: string, key: string, params: QueryParams): Promise<unknown[]> {
    try {
      const body = asRecord(await this.http.getJson(`${STEAM_API}/${endpoint}`, params));
      return readArray(readRecord(body, 'response'), key);
    } catch (error) {
      console.warn(`SteamSource: ${endpoint} failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
