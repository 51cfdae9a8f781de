/**
 * Xiaomi (Zepp Life) Data Source
 * Logs in with the account credentials and reads yesterday's sleep and
 * step/running records from the fitness tracker API.
 *
 * Required env vars: XIAOMI_USERNAME (phone number or email), XIAOMI_PASSWORD
 */

import { createHash, randomBytes } from 'crypto';
import { XiaomiSourceConfig } from '../config/env';
import { HttpClient } from '../lib/http';
import { DataSource, DigestGoals, XiaomiSummary } from '../types/source.types';
import { formatClockTime, getYesterdayDateString } from '../utils/date';
import { asRecord, JsonRecord, readNumber, readRecord, readString } from '../utils/fields';
import { errorMessage, formatCount, SourceFetchError, SourceOptions } from './common';

export const XIAOMI_SLEEP_TITLE = "😴 Yesterday's Sleep";
export const XIAOMI_ACTIVITY_TITLE = "🏃 Yesterday's Activity";

const REGISTRATION_URL = 'https://api-user.huami.com/registrations';
const ACCOUNT_LOGIN_URL = 'https://account.huami.com/v2/client/login';
const MIFIT_API = 'https://api-mifit.huami.com';
const REDIRECT_URI = 'https://s3-us-west-2.amazonaws.com/hm-registration/successsignin.html';

export function md5(value: string): string {
  return createHash('md5').update(value).digest('hex');
}

/**
 * Phone numbers without a country code are treated as mainland China numbers.
 */
export function normalizePhone(phone: string): string {
  return phone.startsWith('+') ? phone : `+86${phone}`;
}

export function isEmailAccount(username: string): boolean {
  return username.includes('@');
}

/**
 * Access token from a login response, either nested under token_info or top level.
 */
export function extractAccessToken(body: unknown): string | undefined {
  const record = asRecord(body);
  const nested = readString(readRecord(record, 'token_info'), 'access_token');
  if (nested) return nested;
  const topLevel = readString(record, 'access_token');
  return topLevel || undefined;
}

export function buildXiaomiSummary(
  sleepData: JsonRecord | null,
  stepsData: JsonRecord | null,
  timeZone: string
): XiaomiSummary {
  const summary: XiaomiSummary = { steps: 0 };

  if (sleepData) {
    const totalSeconds = readNumber(sleepData, 'total_stay_bed_time');
    if (totalSeconds > 0) {
      summary.sleep = {
        totalHours: totalSeconds / 3600,
        deepHours: readNumber(sleepData, 'deep_sleep_time') / 3600,
        sleepStart: formatClockTime(readNumber(sleepData, 'start'), timeZone),
      };
    }
  }

  if (stepsData) {
    summary.steps = readNumber(stepsData, 'steps');
    const distanceMeters = readNumber(stepsData, 'distance');
    if (distanceMeters > 0) {
      summary.running = { distanceKm: distanceMeters / 1000, weekTotalKm: 0 };
    }
  }

  return summary;
}

export function formatXiaomiMessage(summary: XiaomiSummary, goals: DigestGoals): string {
  const lines: string[] = [];
  const { sleep, running, steps } = summary;

  if (sleep && sleep.totalHours > 0) {
    const mark = sleep.totalHours >= goals.sleepGoalHours ? '✅' : '⚠️';
    lines.push(XIAOMI_SLEEP_TITLE);
    lines.push(`• Sleep: ${sleep.totalHours.toFixed(1)} h ${mark}`);
    if (sleep.deepHours > 0) {
      lines.push(`• Deep sleep: ${sleep.deepHours.toFixed(1)} h`);
    }
    if (sleep.sleepStart) {
      lines.push(`• Fell asleep at: ${sleep.sleepStart}`);
    }
  }

  if (steps > 0 || sleep) {
    if (lines.length > 0) lines.push('');
    lines.push(XIAOMI_ACTIVITY_TITLE);
    lines.push(steps > 0 ? `• Steps: ${formatCount(steps)}` : '• No activity yesterday');
  }

  if (running && running.distanceKm > 0) {
    lines.push(`• Run: ${running.distanceKm.toFixed(1)} km`);
    if (running.weekTotalKm > 0) {
      lines.push(`• This week: ${running.weekTotalKm.toFixed(1)} km`);
    }
  }

  if (lines.length === 0) {
    return `${XIAOMI_ACTIVITY_TITLE}\n• No data recorded yesterday`;
  }

  return lines.join('\n');
}

export class XiaomiSource implements DataSource<'xiaomi'> {
  readonly name = 'xiaomi';
  private http: HttpClient;
  private now: () => Date;
  private timeZone: string;

  constructor(private config: XiaomiSourceConfig, private goals: DigestGoals, options: SourceOptions = {}) {
    this.http = new HttpClient({
      fetchImpl: options.fetchImpl,
      timeoutMs: options.timeoutMs,
      headers: { 'User-Agent': 'MiFit/4.6.0 (iPhone; iOS 14.0; Scale/2.00)' },
    });
    this.now = options.now ?? (() => new Date());
    this.timeZone = options.timeZone ?? 'UTC';
  }

  async fetch(): Promise<XiaomiSummary> {
    const token = await this.login();
    const date = getYesterdayDateString(this.now(), this.timeZone);

    const sleepData = await this.getData('/v1/sleep/stay_bed', { date }, token);
    const stepsData = await this.getData('/v1/sport/run/history.json', { date, source: 'run,walk' }, token);

    const summary = buildXiaomiSummary(sleepData, stepsData, this.timeZone);
    console.log(`XiaomiSource: steps=${summary.steps}, sleep=${summary.sleep ? 'yes' : 'no'}`);
    return summary;
  }

  formatMessage(summary: XiaomiSummary): string {
    return formatXiaomiMessage(summary, this.goals);
  }

  private async login(): Promise<string> {
    const { username, password } = this.config;
    const form: Record<string, string> = {
      country_code: 'CN',
      device_id: randomBytes(16).toString('hex'),
      device_model: 'iPhone',
      app_version: '4.6.0',
      device_type: 'ios',
      third_name: 'huami_phone',
      password: md5(password),
    };

    let url: string;
    if (isEmailAccount(username)) {
      url = `${REGISTRATION_URL}/${encodeURIComponent(username)}/tokens`;
      form.client_id = 'HuaMi';
      form.redirect_uri = REDIRECT_URI;
    } else {
      url = ACCOUNT_LOGIN_URL;
      form.account = normalizePhone(username);
      form.grant_type = 'password';
    }

    let body: unknown;
    try {
      body = await this.http.postForm(url, form);
    } catch (error) {
      console.error('XiaomiSource: Login request failed:', errorMessage(error));
      throw new SourceFetchError(this.name, 'Login failed; check the account and password');
    }

    const token = extractAccessToken(body);
    if (!token) {
      throw new SourceFetchError(this.name, 'Login failed; check the account and password');
    }
    return token;
  }

  private async getData(path: string, params: Record<string, string>, token: string): Promise<JsonRecord | null> {
    try {
      const body = await this.http.getJson(`${MIFIT_API}${path}`, params, { apptoken: token });
      return readRecord(asRecord(body), 'data');
    } catch (error) {
      console.warn(`XiaomiSource: ${path} failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
