/**
 * Year Progress Bar
 * Renders how far through the year a given day is, e.g.
 * "██████████░░░░░░░░░░ 50.1% (183/365)".
 */

import { getDateParts, getDayOfYear, getDaysInYear } from './date';

export const PROGRESS_BAR_WIDTH = 20;
const FILLED = '█';
const EMPTY = '░';

/**
 * Number of filled blocks for day `day` of `totalDays`.
 * Proportional and truncating, with at least one block once the year has started.
 */
export function getFilledBlocks(day: number, totalDays: number, width: number = PROGRESS_BAR_WIDTH): number {
  if (day <= 0 || totalDays <= 0) return 0;
  const proportional = Math.floor((width * day) / totalDays);
  return Math.min(width, Math.max(1, proportional));
}

export function renderProgressBar(day: number, totalDays: number, width: number = PROGRESS_BAR_WIDTH): string {
  const filled = getFilledBlocks(day, totalDays, width);
  const percent = ((day / totalDays) * 100).toFixed(1);
  return `${FILLED.repeat(filled)}${EMPTY.repeat(width - filled)} ${percent}% (${day}/${totalDays})`;
}

export function getYearProgress(now: Date, timeZone: string): { year: number; dayOfYear: number; totalDays: number; bar: string } {
  const parts = getDateParts(now, timeZone);
  const dayOfYear = getDayOfYear(parts);
  const totalDays = getDaysInYear(parts.year);
  return {
    year: parts.year,
    dayOfYear,
    totalDays,
    bar: renderProgressBar(dayOfYear, totalDays),
  };
}
