/**
 * WeRead Data Source
 * Reading time and in-progress books from the e-reading service, using the
 * web session cookie.
 *
 * Required env vars: WEREAD_COOKIE
 */

import { WereadSourceConfig } from '../config/env';
import { HttpClient } from '../lib/http';
import { DataSource, WereadBook, WereadSummary } from '../types/source.types';
import { asRecord, JsonRecord, readNumber, readString } from '../utils/fields';
import { errorMessage, SourceFetchError, SourceOptions } from './common';

export const WEREAD_TITLE = "📚 Yesterday's Reading";

const WEREAD_API = 'https://i.weread.qq.com';
const SHELF_SCAN_LIMIT = 20;
const CURRENT_BOOKS_LIMIT = 3;

/**
 * Books with progress strictly between 0 and 100 among the first shelf entries.
 */
export function selectCurrentBooks(books: unknown[]): WereadBook[] {
  const current: WereadBook[] = [];
  for (const raw of books.slice(0, SHELF_SCAN_LIMIT)) {
    const book = asRecord(raw);
    const progress = readNumber(book, 'readingProgress');
    if (progress > 0 && progress < 100) {
      current.push({
        title: readString(book, 'title', 'Unknown'),
        author: readString(book, 'author'),
        progress,
      });
    }
  }
  return current.slice(0, CURRENT_BOOKS_LIMIT);
}

export function buildWereadSummary(readingTime: JsonRecord, books: unknown[]): WereadSummary {
  const toMinutes = (key: string) => Math.floor(readNumber(readingTime, key) / 60);
  const totalMinutes = toMinutes('totalReadingTime');

  return {
    yesterdayMinutes: toMinutes('yesterdayReadingTime'),
    currentBooks: selectCurrentBooks(books),
    monthlyMinutes: toMinutes('monthReadingTime'),
    weeklyMinutes: toMinutes('weekReadingTime'),
    totalHours: Math.floor(totalMinutes / 60),
    finishedBooks: readNumber(readingTime, 'finishedBookCount'),
  };
}

export function formatDuration(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  return hours > 0 ? `${hours}h ${minutes % 60}m` : `${minutes} min`;
}

export function formatWereadMessage(summary: WereadSummary): string {
  const lines = [WEREAD_TITLE];

  if (summary.yesterdayMinutes > 0) {
    lines.push(`• Reading time: ${formatDuration(summary.yesterdayMinutes)}`);
  } else {
    lines.push('• No reading yesterday');
  }

  for (const book of summary.currentBooks.slice(0, 2)) {
    lines.push(`• 《${book.title}》 ${book.progress}%`);
  }

  if (summary.monthlyMinutes > 0) {
    const monthlyHours = Math.floor(summary.monthlyMinutes / 60);
    lines.push(
      monthlyHours > 0 ? `• This month: ${monthlyHours}h` : `• This month: ${summary.monthlyMinutes} min`
    );
  }
  if (summary.totalHours > 0) {
    lines.push(`• Total reading: ${summary.totalHours}h`);
  }
  if (summary.finishedBooks > 0) {
    lines.push(`• Books finished: ${summary.finishedBooks}`);
  }

  return lines.join('\n');
}

export class WereadSource implements DataSource<'weread'> {
  readonly name = 'weread';
  private http: HttpClient;

  constructor(config: WereadSourceConfig, options: SourceOptions = {}) {
    this.http = new HttpClient({
      fetchImpl: options.fetchImpl,
      timeoutMs: options.timeoutMs,
      headers: {
        Cookie: config.cookie,
        'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
        Referer: 'https://weread.qq.com/',
      },
    });
  }

  async fetch(): Promise<WereadSummary> {
    const readingTime = await this.getReadingTime();
    if (!readingTime) {
      throw new SourceFetchError(this.name, 'Failed to fetch reading data; check that the cookie is valid');
    }

    const books = await this.getShelfBooks();
    const summary = buildWereadSummary(readingTime, books);
    console.log(
      `WereadSource: yesterday=${summary.yesterdayMinutes}min, currentBooks=${summary.currentBooks.length}`
    );
    return summary;
  }

  formatMessage(summary: WereadSummary): string {
    return formatWereadMessage(summary);
  }

  private async getReadingTime(): Promise<JsonRecord | null> {
    for (const path of ['/book/readinfo', '/readdata/detail']) {
      try {
        const body = asRecord(await this.http.getJson(`${WEREAD_API}${path}`));
        if (Object.keys(body).length > 0) return body;
        console.warn(`WereadSource: ${path} returned no reading data`);
      } catch (error) {
        console.warn(`WereadSource: ${path} failed: ${errorMessage(error)}`);
      }
    }
    return null;
  }

  private async getShelfBooks(): Promise<unknown[]> {
    try {
      const body = asRecord(
        await this.http.getJson(`${WEREAD_API}/shelf/sync`, { synckey: 0, lectureSynckey: 0 })
      );
      const books = body.books;
      return Array.isArray(books) ? books : [];
    } catch (error) {
      console.warn(`WereadSource: shelf sync failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
