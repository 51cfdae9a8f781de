/**
 * Poem of the Day
 * Fetches a classical poem from the poetry feed; any failure yields the
 * built-in default poem, so this source always succeeds.
 */

import { PoemSourceConfig } from '../config/env';
import { HttpClient } from '../lib/http';
import { DataSource, PoemSummary } from '../types/source.types';
import { asRecord, readArray, readRecord, readString } from '../utils/fields';
import { errorMessage, SourceOptions } from './common';

export const POEM_TITLE = '📝 Poem of the Day';

export const DEFAULT_POEM = `《苦笋》
赏花归去马如飞,
去马如飞酒力微,
酒力微醒时已暮,
醒时已暮赏花归。

—— 宋·苏轼`;

/**
 * Render the feed payload, or null when title, author or content is missing.
 */
export function parsePoem(body: unknown): string | null {
  const origin = readRecord(readRecord(asRecord(body), 'data'), 'origin');
  const title = readString(origin, 'title');
  const author = readString(origin, 'author');
  const dynasty = readString(origin, 'dynasty');
  const content = readArray(origin, 'content').filter((line): line is string => typeof line === 'string');

  if (!title || !author || content.length === 0) {
    return null;
  }

  return `《${title}》\n${content.join('\n')}\n\n—— ${dynasty}·${author}`;
}

export function formatPoemMessage(summary: PoemSummary): string {
  return `${POEM_TITLE}\n${summary.poem}`;
}

export class PoemSource implements DataSource<'poem'> {
  readonly name = 'poem';
  private http: HttpClient;

  constructor(private config: PoemSourceConfig, options: SourceOptions = {}) {
    this.http = new HttpClient({ fetchImpl: options.fetchImpl, timeoutMs: options.timeoutMs });
  }

  async fetch(): Promise<PoemSummary> {
    try {
      const poem = parsePoem(await this.http.getJson(this.config.apiUrl));
      if (poem) {
        return { poem };
      }
      console.warn('PoemSource: Incomplete poem payload, using default poem');
    } catch (error) {
      console.error('PoemSource: Failed to fetch poem:', errorMessage(error));
    }
    return { poem: DEFAULT_POEM };
  }

  formatMessage(summary: PoemSummary): string {
    return formatPoemMessage(summary);
  }
}
