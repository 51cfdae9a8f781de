/**
 * Environment configuration module
 * Loads and validates environment variables into one immutable AppConfig.
 *
 * A data source is enabled when its ENABLE_* toggle is "true" (the default)
 * and its credentials are present.
 */

import { DigestGoals } from '../types/source.types';
import { isValidTimeZone, resolveTimeZone } from '../utils/date';
import { loadNotifierConfig, NotifierConfig, readEnv } from './notifier';

export interface GithubSourceConfig {
  token: string;
  username: string;
  timeZone: string;
}

export interface XiaomiSourceConfig {
  username: string;
  password: string;
}

export interface WereadSourceConfig {
  cookie: string;
}

export interface DuolingoSourceConfig {
  username: string;
  jwtToken: string;
}

export interface PoemSourceConfig {
  apiUrl: string;
}

export interface HealthSourceConfig {
  steps?: string;
  sleepHours?: string;
}

export interface SteamSourceConfig {
  apiKey: string;
  steamId: string;
}

/**
 * Sources that are enabled and configured; absent keys are disabled.
 */
export interface SourcesConfig {
  github?: GithubSourceConfig;
  xiaomi?: XiaomiSourceConfig;
  weread?: WereadSourceConfig;
  duolingo?: DuolingoSourceConfig;
  poem?: PoemSourceConfig;
  appleHealth?: HealthSourceConfig;
  steam?: SteamSourceConfig;
}

export interface AppConfig {
  timeZone: string;
  locale: string;
  goals: DigestGoals;
  httpTimeoutMs: number;
  webhookTimeoutMs: number;
  digestTime: string;
  notifier: NotifierConfig;
  sources: SourcesConfig;
}

export const DEFAULT_POEM_API_URL = 'https://v2.jinrishici.com/one.json';

const DEFAULTS = {
  TIMEZONE: 'Asia/Shanghai',
  DIGEST_LOCALE: 'en-US',
  STEP_GOAL: 10000,
  SLEEP_GOAL_HOURS: 7.5,
  HTTP_TIMEOUT_MS: 10000,
  WEBHOOK_TIMEOUT_MS: 10000,
  DIGEST_TIME: '07:00',
} as const;

/**
 * Validate time format (HH:MM)
 */
export function isValidTimeFormat(time: string): boolean {
  return /^([0-1]?[0-9]|2[0-3]):([0-5][0-9])$/.test(time);
}

function isToggleOn(env: NodeJS.ProcessEnv, name: string): boolean {
  return (env[name] || 'true').toLowerCase() === 'true';
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.warn(`Invalid ${name} "${raw}", using default ${fallback}`);
    return fallback;
  }
  return parsed;
}

function parsePositiveFloat(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = parseFloat(raw);
  if (isNaN(parsed) || parsed <= 0) {
    console.warn(`Invalid ${name} "${raw}", using default ${fallback}`);
    return fallback;
  }
  return parsed;
}

function readTimeZone(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = readEnv(env, name);
  if (!raw) return fallback;
  if (!isValidTimeZone(raw)) {
    console.warn(`Invalid ${name} "${raw}", using ${fallback}`);
    return fallback;
  }
  return raw;
}

function validateLocale(locale: string): string {
  try {
    new Intl.DateTimeFormat(locale);
    return locale;
  } catch {
    console.warn(`Invalid DIGEST_LOCALE "${locale}", using default "${DEFAULTS.DIGEST_LOCALE}"`);
    return DEFAULTS.DIGEST_LOCALE;
  }
}

/**
 * Collect the enabled, fully configured data sources
 */
export function loadSourcesConfig(env: NodeJS.ProcessEnv, timeZone: string): SourcesConfig {
  const sources: SourcesConfig = {};

  const githubToken = readEnv(env, 'GITHUB_TOKEN');
  const githubUsername = readEnv(env, 'GITHUB_USERNAME');
  if (isToggleOn(env, 'ENABLE_GITHUB_STATS') && githubToken && githubUsername) {
    sources.github = {
      token: githubToken,
      username: githubUsername,
      timeZone: readTimeZone(env, 'GITHUB_TIMEZONE', timeZone),
    };
  }

  const xiaomiUsername = readEnv(env, 'XIAOMI_USERNAME');
  const xiaomiPassword = readEnv(env, 'XIAOMI_PASSWORD');
  if (isToggleOn(env, 'ENABLE_XIAOMI_SPORT') && xiaomiUsername && xiaomiPassword) {
    sources.xiaomi = { username: xiaomiUsername, password: xiaomiPassword };
  }

  const wereadCookie = readEnv(env, 'WEREAD_COOKIE');
  if (isToggleOn(env, 'ENABLE_WEREAD') && wereadCookie) {
    sources.weread = { cookie: wereadCookie };
  }

  const duolingoUsername = readEnv(env, 'DUOLINGO_USERNAME');
  const duolingoToken = readEnv(env, 'DUOLINGO_JWT_TOKEN');
  if (isToggleOn(env, 'ENABLE_DUOLINGO') && duolingoUsername && duolingoToken) {
    sources.duolingo = { username: duolingoUsername, jwtToken: duolingoToken };
  }

  if (isToggleOn(env, 'ENABLE_POEM')) {
    sources.poem = { apiUrl: readEnv(env, 'POEM_API_URL') || DEFAULT_POEM_API_URL };
  }

  const healthSteps = readEnv(env, 'APPLE_HEALTH_STEPS');
  const healthSleep = readEnv(env, 'APPLE_HEALTH_SLEEP_HOURS');
  if (isToggleOn(env, 'ENABLE_APPLE_HEALTH') && (healthSteps || healthSleep)) {
    sources.appleHealth = { steps: healthSteps, sleepHours: healthSleep };
  }

  const steamKey = readEnv(env, 'STEAM_API_KEY');
  const steamId = readEnv(env, 'STEAM_ID');
  if (isToggleOn(env, 'ENABLE_STEAM') && steamKey && steamId) {
    sources.steam = { apiKey: steamKey, steamId };
  }

  return sources;
}

/**
 * Loads the application configuration with defaults for optional values
 * @throws ConfigError when the selected notifier is unsupported or incomplete
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const notifier = loadNotifierConfig(env);

  const timeZone = resolveTimeZone(readEnv(env, 'TIMEZONE') || DEFAULTS.TIMEZONE);
  const locale = validateLocale(readEnv(env, 'DIGEST_LOCALE') || DEFAULTS.DIGEST_LOCALE);

  let digestTime = readEnv(env, 'DIGEST_TIME') || DEFAULTS.DIGEST_TIME;
  if (!isValidTimeFormat(digestTime)) {
    console.warn(`Invalid DIGEST_TIME format "${digestTime}", using default "${DEFAULTS.DIGEST_TIME}"`);
    digestTime = DEFAULTS.DIGEST_TIME;
  }

  const config: AppConfig = {
    timeZone,
    locale,
    goals: {
      stepGoal: parsePositiveInt(env, 'STEP_GOAL', DEFAULTS.STEP_GOAL),
      sleepGoalHours: parsePositiveFloat(env, 'SLEEP_GOAL_HOURS', DEFAULTS.SLEEP_GOAL_HOURS),
    },
    httpTimeoutMs: parsePositiveInt(env, 'HTTP_TIMEOUT_MS', DEFAULTS.HTTP_TIMEOUT_MS),
    webhookTimeoutMs: parsePositiveInt(env, 'WEBHOOK_TIMEOUT_MS', DEFAULTS.WEBHOOK_TIMEOUT_MS),
    digestTime,
    notifier,
    sources: loadSourcesConfig(env, timeZone),
  };

  return Object.freeze(config);
}
