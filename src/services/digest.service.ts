/**
 * Digest Service
 * One complete digest run: build the notifier, collect every enabled
 * source, format the report and send it.
 */

import { AppConfig } from '../config/env';
import { createNotifier, Notifier } from '../notifiers';
import { TelegramApi } from '../notifiers/telegram.notifier';
import { buildEnabledSources } from '../sources';
import { errorMessage } from '../sources/common';
import { CollectorService } from './collector.service';
import { ReportFormatter } from './report-formatter';

export interface DigestServiceDeps {
  fetchImpl?: typeof fetch;
  now?: () => Date;
  telegramApi?: TelegramApi;
  clock?: () => number;
}

export class DigestService {
  private now: () => Date;

  constructor(private config: AppConfig, private deps: DigestServiceDeps = {}) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run the digest once. Resolves true when the message was delivered.
   */
  async run(): Promise<boolean> {
    const { config, deps } = this;

    const formatter = new ReportFormatter({
      timeZone: config.timeZone,
      locale: config.locale,
      goals: config.goals,
    });

    let notifier: Notifier;
    try {
      notifier = createNotifier(config.notifier, {
        formatter,
        fetchImpl: deps.fetchImpl,
        timeoutMs: config.webhookTimeoutMs,
        telegramApi: deps.telegramApi,
        clock: deps.clock,
      });
    } catch (error) {
      console.error(`DigestService: Failed to create ${config.notifier.type} notifier:`, errorMessage(error));
      return false;
    }
    console.log(`DigestService: Using ${notifier.type} notifier`);

    const sources = buildEnabledSources(config, { fetchImpl: deps.fetchImpl, now: this.now });
    const collector = new CollectorService(sources);
    const report = await collector.collect(this.now());

    const sent = await notifier.send(report);
    if (sent) {
      console.log('DigestService: Daily digest delivered');
    } else {
      console.error('DigestService: Daily digest could not be delivered');
    }
    return sent;
  }
}

/**
 * Process exit code for a run: 0 when the digest was delivered, 1 otherwise.
 */
export async function runDigest(config: AppConfig, deps: DigestServiceDeps = {}): Promise<number> {
  const sent = await new DigestService(config, deps).run();
  return sent ? 0 : 1;
}
