/**
 * Apple Health Data Source
 * Step count and sleep hours pushed in through the environment (e.g. by an
 * iOS Shortcut). No network access.
 *
 * Env vars: APPLE_HEALTH_STEPS, APPLE_HEALTH_SLEEP_HOURS
 */

import { HealthSourceConfig } from '../config/env';
import { DataSource, DigestGoals, HealthSummary } from '../types/source.types';
import { formatCount } from './common';

export const HEALTH_TITLE = "💪 Yesterday's Health";

export const MAX_STEPS = 100000;
export const MAX_SLEEP_HOURS = 24;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Parse a step count and clamp it to [0, 100000]. Empty or non-numeric input gives 0.
 */
export function sanitizeSteps(raw: string | undefined): number {
  const text = raw?.trim();
  if (!text) return 0;
  if (!/^[+-]?\d+$/.test(text)) {
    console.warn(`AppleHealthSource: Invalid steps value: ${raw}`);
    return 0;
  }
  return clamp(parseInt(text, 10), 0, MAX_STEPS);
}

/**
 * Parse sleep hours and clamp them to [0, 24]. Empty or non-numeric input gives 0.
 */
export function sanitizeSleepHours(raw: string | undefined): number {
  const text = raw?.trim();
  if (!text) return 0;
  const parsed = Number(text);
  if (isNaN(parsed)) {
    console.warn(`AppleHealthSource: Invalid sleep_hours value: ${raw}`);
    return 0;
  }
  return clamp(parsed, 0, MAX_SLEEP_HOURS);
}

export function formatHealthMessage(summary: HealthSummary, goals: DigestGoals): string {
  const lines = [HEALTH_TITLE];

  if (summary.steps > 0) {
    const mark = summary.steps >= goals.stepGoal ? '✅' : '📊';
    lines.push(`• Steps: ${formatCount(summary.steps)} ${mark}`);
  }
  if (summary.sleepHours > 0) {
    const mark = summary.sleepHours >= goals.sleepGoalHours ? '✅' : '⚠️';
    lines.push(`• Sleep: ${summary.sleepHours.toFixed(1)} h ${mark}`);
  }
  if (summary.steps === 0 && summary.sleepHours === 0) {
    lines.push('• No data');
  }

  return lines.join('\n');
}

export class AppleHealthSource implements DataSource<'apple_health'> {
  readonly name = 'apple_health';

  constructor(private config: HealthSourceConfig, private goals: DigestGoals) {}

  async fetch(): Promise<HealthSummary> {
    const summary = {
      steps: sanitizeSteps(this.config.steps),
      sleepHours: sanitizeSleepHours(this.config.sleepHours),
    };
    console.log(`AppleHealthSource: steps=${summary.steps}, sleep=${summary.sleepHours}h`);
    return summary;
  }

  formatMessage(summary: HealthSummary): string {
    return formatHealthMessage(summary, this.goals);
  }
}
