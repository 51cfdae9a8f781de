/**
 * Duolingo Data Source
 * Daily goal completion, streak and XP for one learner.
 *
 * Required env vars: DUOLINGO_USERNAME, DUOLINGO_JWT_TOKEN (from the browser session)
 */

import { DuolingoSourceConfig } from '../config/env';
import { HttpClient } from '../lib/http';
import { DataSource, DuolingoSummary } from '../types/source.types';
import { asRecord, JsonRecord, readId, readNumber, readString } from '../utils/fields';
import { errorMessage, formatCount, SourceFetchError, SourceOptions } from './common';

export const DUOLINGO_TITLE = '🌍 Duolingo';

const DUOLINGO_API = 'https://www.duolingo.com';
const DEFAULT_XP_GOAL = 20;
const XP_PER_WORD = 10;

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code] ?? code;
}

export function buildDuolingoSummary(details: JsonRecord): DuolingoSummary {
  const xpToday = readNumber(details, 'xpGainedToday');
  const xpGoal = readNumber(details, 'xpGoal', DEFAULT_XP_GOAL);

  return {
    streak: readNumber(details, 'streak'),
    completedToday: xpToday >= xpGoal,
    xpToday,
    xpGoal,
    totalXp: readNumber(details, 'totalXp'),
    learningLanguage: readString(details, 'learningLanguage'),
    wordsToReview: Math.floor(Math.max(0, xpGoal - xpToday) / XP_PER_WORD),
  };
}

export function formatDuolingoMessage(summary: DuolingoSummary): string {
  const lines = [DUOLINGO_TITLE];
  const streak = `(${summary.streak}-day streak)`;

  if (summary.completedToday) {
    lines.push(`• Daily goal complete ✅ ${streak}`);
  } else if (summary.xpToday > 0) {
    lines.push(`• Progress today: ${summary.xpToday}/${summary.xpGoal} XP ${streak}`);
  } else {
    lines.push(`• Not practiced yet today ⚠️ ${streak}`);
  }

  if (summary.learningLanguage) {
    lines.push(`• Learning: ${languageName(summary.learningLanguage)}`);
  }
  if (summary.totalXp > 0) {
    lines.push(`• Total XP: ${formatCount(summary.totalXp)}`);
  }

  return lines.join('\n');
}

export class DuolingoSource implements DataSource<'duolingo'> {
  readonly name = 'duolingo';
  private http: HttpClient;

  constructor(private config: DuolingoSourceConfig, options: SourceOptions = {}) {
    this.http = new HttpClient({
      fetchImpl: options.fetchImpl,
      timeoutMs: options.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.jwtToken}`,
        Accept: 'application/json',
        'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
      },
    });
  }

  async fetch(): Promise<DuolingoSummary> {
    const userId = await this.verifyToken();

    let details: JsonRecord;
    try {
      details = asRecord(await this.http.getJson(`${DUOLINGO_API}/2017-06-30/users/${encodeURIComponent(userId)}`));
    } catch (error) {
      console.error('DuolingoSource: Failed to fetch user details:', errorMessage(error));
      throw new SourceFetchError(this.name, 'Failed to fetch user details');
    }

    const summary = buildDuolingoSummary(details);
    console.log(`DuolingoSource: streak=${summary.streak}, xpToday=${summary.xpToday}/${summary.xpGoal}`);
    return summary;
  }

  formatMessage(summary: DuolingoSummary): string {
    return formatDuolingoMessage(summary);
  }

  /**
   * Fetch the public profile with the token; returns the numeric user id.
   */
  private async verifyToken(): Promise<string> {
    let userId: string | undefined;
    try {
      const profile = asRecord(
        await this.http.getJson(`${DUOLINGO_API}/users/${encodeURIComponent(this.config.username)}`)
      );
      userId = readId(profile, 'id');
    } catch (error) {
      console.error('DuolingoSource: Token verification failed:', errorMessage(error));
    }

    if (!userId) {
      throw new SourceFetchError(this.name, 'JWT token is invalid or expired');
    }
    return userId;
  }
}
