/**
 * GitHub Data Source
 * Summarises yesterday's public activity for one user: commits pushed,
 * pull requests opened and merged, issues closed, repositories starred,
 * plus the current daily contribution streak.
 *
 * Required env vars: GITHUB_TOKEN, GITHUB_USERNAME
 */

import { GithubSourceConfig } from '../config/env';
import { HttpClient, QueryParams } from '../lib/http';
import { DataSource, GithubActivity, GithubSummary } from '../types/source.types';
import {
  getDateString,
  getDayBounds,
  getPastDateString,
  getYesterdayDateString,
} from '../utils/date';
import { asRecord, readArray, readBoolean, readNumber, readRecord, readString } from '../utils/fields';
import { errorMessage, SourceOptions } from './common';

export const GITHUB_TITLE = "💻 Yesterday's Coding";

const GITHUB_API = 'https://api.github.com';
const EVENTS_PER_PAGE = 30;
const ACTIVITY_PAGES = 3;
const STREAK_PAGES = 5;
const MAX_EVENTS_SCANNED = 100;
const STREAK_DAYS = 7;

export function repoNameFromUrl(url: string): string {
  return url.split('/').slice(-2).join('/');
}

/**
 * Extract activities that happened inside [start, end] from one page of user events.
 * Scanning stops at the first event older than `start` (events are newest first).
 */
export function processEvents(events: unknown[], start: Date, end: Date): GithubActivity[] {
  const activities: GithubActivity[] = [];

  for (const raw of events.slice(0, MAX_EVENTS_SCANNED)) {
    const event = asRecord(raw);
    const createdAt = Date.parse(readString(event, 'created_at'));
    if (isNaN(createdAt)) continue;

    if (createdAt < start.getTime()) break;
    if (createdAt > end.getTime()) continue;
    if (!readBoolean(event, 'public', true)) continue;

    const repo = readString(readRecord(event, 'repo'), 'name', 'Unknown');
    const payload = readRecord(event, 'payload');
    const action = readString(payload, 'action');

    switch (readString(event, 'type')) {
      case 'PullRequestEvent': {
        const pullRequest = readRecord(payload, 'pull_request');
        const merged = action === 'merged' || (action === 'closed' && pullRequest.merged === true);
        if (merged) {
          activities.push({
            type: 'pr',
            action: 'merged',
            title: readString(pullRequest, 'title') || `PR in ${repo}`,
            url: readString(pullRequest, 'html_url') || `https://github.com/${repo}`,
            repo,
          });
        }
        break;
      }
      case 'IssuesEvent':
        if (action === 'closed') {
          const issue = readRecord(payload, 'issue');
          activities.push({
            type: 'issue',
            action: 'closed',
            title: readString(issue, 'title', 'No title'),
            url: readString(issue, 'html_url'),
            repo,
          });
        }
        break;
      case 'WatchEvent':
        if (action === 'started') {
          activities.push({ type: 'star', action: 'starred', repo, url: `https://github.com/${repo}` });
        }
        break;
      case 'PushEvent': {
        const commits = readArray(payload, 'commits').length || readNumber(payload, 'size');
        if (commits > 0) {
          activities.push({ type: 'push', action: 'pushed', commits, repo });
        }
        break;
      }
    }
  }

  return activities;
}

/**
 * Consecutive days with activity, counting back from yesterday (at most 7).
 */
export function countStreak(activityDates: Set<string>, now: Date, timeZone: string): number {
  let streak = 0;
  for (let daysAgo = 1; daysAgo <= STREAK_DAYS; daysAgo++) {
    if (!activityDates.has(getPastDateString(now, timeZone, daysAgo))) break;
    streak++;
  }
  return streak;
}

export function summarizeActivities(activities: GithubActivity[], weekStreak: number): GithubSummary {
  const commits = activities
    .filter((a) => a.type === 'push')
    .reduce((sum, a) => sum + (a.commits ?? 0), 0);

  return {
    commits,
    prsCreated: activities.filter((a) => a.type === 'pr' && a.action === 'created'),
    prsMerged: activities.filter((a) => a.type === 'pr' && a.action === 'merged'),
    issuesClosed: activities.filter((a) => a.type === 'issue' && a.action === 'closed'),
    stars: activities.filter((a) => a.type === 'star'),
    weekStreak,
    hasActivity: activities.length > 0,
  };
}

export function formatGithubMessage(summary: GithubSummary): string {
  if (!summary.hasActivity) {
    return `${GITHUB_TITLE}\n• No GitHub activity yesterday`;
  }

  const lines = [GITHUB_TITLE];

  if (summary.commits > 0) {
    lines.push(`• Pushed ${summary.commits} commits`);
  }
  for (const pr of summary.prsCreated.slice(0, 3)) {
    lines.push(`• Opened PR: [${pr.title}](${pr.url}) (${pr.repo})`);
  }
  for (const pr of summary.prsMerged.slice(0, 2)) {
    lines.push(`• Merged PR: [${pr.title}](${pr.url}) (${pr.repo})`);
  }
  for (const issue of summary.issuesClosed.slice(0, 2)) {
    lines.push(`• Closed issue: [${issue.title}](${issue.url}) (${issue.repo})`);
  }
  for (const star of summary.stars.slice(0, 2)) {
    lines.push(`• Starred: [${star.repo}](${star.url})`);
  }
  if (summary.weekStreak > 0) {
    lines.push(`• Contribution streak: ${summary.weekStreak} days 🔥`);
  }

  return lines.join('\n');
}

export class GithubSource implements DataSource<'github'> {
  readonly name = 'github';
  private http: HttpClient;
  private now: () => Date;

  constructor(private config: GithubSourceConfig, options: SourceOptions = {}) {
    this.http = new HttpClient({
      fetchImpl: options.fetchImpl,
      timeoutMs: options.timeoutMs,
      headers: {
        Authorization: `token ${config.token}`,
        Accept: 'application/vnd.github.v3+json',
        'User-Agent': 'daily-digest',
      },
    });
    this.now = options.now ?? (() => new Date());
  }

  async fetch(): Promise<GithubSummary> {
    const now = this.now();
    const timeZone = this.config.timeZone;
    const yesterday = getYesterdayDateString(now, timeZone);
    const { start, end } = getDayBounds(yesterday, timeZone);

    const activities: GithubActivity[] = [
      ...(await this.searchCreated('pr', yesterday)),
      ...(await this.searchCreated('issue', yesterday)),
    ];

    for (let page = 1; page <= ACTIVITY_PAGES; page++) {
      const events = await this.getEventsPage(page);
      if (!events || events.length === 0) break;
      activities.push(...processEvents(events, start, end));
      if (events.length < EVENTS_PER_PAGE) break;
    }

    const weekStreak = await this.calculateStreak(now);
    const summary = summarizeActivities(activities, weekStreak);
    console.log(
      `GithubSource: commits=${summary.commits}, prsCreated=${summary.prsCreated.length}, ` +
        `prsMerged=${summary.prsMerged.length}, issuesClosed=${summary.issuesClosed.length}, stars=${summary.stars.length}`
    );
    return summary;
  }

  formatMessage(summary: GithubSummary): string {
    return formatGithubMessage(summary);
  }

  private async searchCreated(kind: 'pr' | 'issue', date: string): Promise<GithubActivity[]> {
    const { username } = this.config;
    const body = await this.getOptional(`${GITHUB_API}/search/issues`, {
      q: `is:${kind} is:public author:${username} created:${date}`,
      per_page: 100,
    });
    if (body === null) return [];

    const activities: GithubActivity[] = [];
    for (const raw of readArray(asRecord(body), 'items')) {
      const item = asRecord(raw);
      if (readString(readRecord(item, 'user'), 'login') !== username) continue;
      const repoUrl = readString(item, 'repository_url');
      activities.push({
        type: kind,
        action: 'created',
        title: readString(item, 'title', 'No title'),
        url: readString(item, 'html_url'),
        repo: repoUrl ? repoNameFromUrl(repoUrl) : 'Unknown',
      });
    }
    return activities;
  }

  private async getEventsPage(page: number): Promise<unknown[] | null> {
    const body = await this.getOptional(`${GITHUB_API}/users/${this.config.username}/events`, {
      page,
      per_page: EVENTS_PER_PAGE,
    });
    return Array.isArray(body) ? body : null;
  }

  private async calculateStreak(now: Date): Promise<number> {
    const timeZone = this.config.timeZone;
    const activityDates = new Set<string>();

    for (let page = 1; page <= STREAK_PAGES; page++) {
      const events = await this.getEventsPage(page);
      if (!events || events.length === 0) break;

      for (const raw of events) {
        const createdAt = Date.parse(readString(asRecord(raw), 'created_at'));
        if (!isNaN(createdAt)) {
          activityDates.add(getDateString(new Date(createdAt), timeZone));
        }
      }

      if (events.length < EVENTS_PER_PAGE) break;
    }

    return countStreak(activityDates, now, timeZone);
  }

  /**
   * GET that logs and yields null on failure; a single failed listing does
   * not invalidate the rest of the summary.
   */
  private async getOptional(url: string, params: QueryParams): Promise<unknown> {
    try {
      return await this.http.getJson(url, params);
    } catch (error) {
      console.warn(`GithubSource: request to ${url} failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
