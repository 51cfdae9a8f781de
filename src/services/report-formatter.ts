/**
 * Report Formatter
 * Turns a DigestReport into the message body sent by every notifier:
 * date header, year progress, per-source blocks in a fixed order and a
 * short list of failed sources.
 */

import { formatHealthMessage, HEALTH_TITLE } from '../sources/apple-health.source';
import { DUOLINGO_TITLE, formatDuolingoMessage } from '../sources/duolingo.source';
import { formatGithubMessage, GITHUB_TITLE } from '../sources/github.source';
import { formatPoemMessage, POEM_TITLE } from '../sources/poem.source';
import { formatSteamMessage, STEAM_TITLE } from '../sources/steam.source';
import { formatWereadMessage, WEREAD_TITLE } from '../sources/weread.source';
import { formatXiaomiMessage, XIAOMI_ACTIVITY_TITLE } from '../sources/xiaomi.source';
import { DigestGoals, DigestReport, SourceName } from '../types/source.types';
import { formatLongDate } from '../utils/date';
import { getYearProgress } from '../utils/progress-bar';

export const DIVIDER = '━'.repeat(20);
export const MAX_LISTED_ERRORS = 3;

/**
 * Source blocks in presentation order; groups are separated by a divider.
 */
export const SECTION_GROUPS: readonly (readonly SourceName[])[] = [
  ['xiaomi', 'apple_health', 'github'],
  ['weread', 'duolingo', 'steam'],
  ['poem'],
];

const SOURCE_TITLES: Record<SourceName, string> = {
  github: GITHUB_TITLE,
  xiaomi: XIAOMI_ACTIVITY_TITLE,
  weread: WEREAD_TITLE,
  duolingo: DUOLINGO_TITLE,
  poem: POEM_TITLE,
  apple_health: HEALTH_TITLE,
  steam: STEAM_TITLE,
};

export interface ReportFormatterOptions {
  timeZone: string;
  locale: string;
  goals: DigestGoals;
}

export class ReportFormatter {
  constructor(private options: ReportFormatterOptions) {}

  /**
   * Compose the digest message. Pure for a given report and `now`.
   */
  format(report: DigestReport, now: Date = report.generatedAt): string {
    const { timeZone, locale } = this.options;
    const progress = getYearProgress(now, timeZone);

    const sections = [
      `🌅 Good morning! Today is ${formatLongDate(now, timeZone, locale)}\n\nDay ${progress.dayOfYear} of the year`,
      DIVIDER,
      `📊 ${progress.year} Progress\n${progress.bar}`,
      DIVIDER,
    ];

    const groups = SECTION_GROUPS.map((group) =>
      group.map((name) => this.renderSource(report, name)).filter((block): block is string => block !== null)
    ).filter((blocks) => blocks.length > 0);

    groups.forEach((blocks, index) => {
      if (index > 0) sections.push(DIVIDER);
      sections.push(...blocks);
    });

    if (report.errors.length > 0) {
      const listed = report.errors.slice(0, MAX_LISTED_ERRORS).map((error) => `• ${error}`);
      sections.push(DIVIDER, ['⚠️ Some sources failed:', ...listed].join('\n'));
    }

    return sections.join('\n\n');
  }

  /**
   * Block for one source: its summary when it succeeded, a placeholder when
   * it failed, nothing when it was not enabled.
   */
  private renderSource(report: DigestReport, name: SourceName): string | null {
    const summary = this.renderSummary(report, name);
    if (summary !== null) return summary;

    const failed = report.results.some((result) => result.source === name && result.status === 'failure');
    return failed ? `${SOURCE_TITLES[name]}\n• ⚠️ Data unavailable` : null;
  }

  private renderSummary(report: DigestReport, name: SourceName): string | null {
    const { sources } = report;
    const { goals } = this.options;

    switch (name) {
      case 'github':
        return sources.github ? formatGithubMessage(sources.github) : null;
      case 'xiaomi':
        return sources.xiaomi ? formatXiaomiMessage(sources.xiaomi, goals) : null;
      case 'weread':
        return sources.weread ? formatWereadMessage(sources.weread) : null;
      case 'duolingo':
        return sources.duolingo ? formatDuolingoMessage(sources.duolingo) : null;
      case 'poem':
        return sources.poem ? formatPoemMessage(sources.poem) : null;
      case 'apple_health':
        return sources.apple_health ? formatHealthMessage(sources.apple_health, goals) : null;
      case 'steam':
        return sources.steam ? formatSteamMessage(sources.steam) : null;
    }
  }
}
