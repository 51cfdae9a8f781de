/**
 * Collector Service
 * Runs every enabled data source concurrently and assembles the outcomes
 * into one DigestReport. A failing source never aborts the others.
 */

import {
  DataSource,
  DigestReport,
  SourceName,
  SourceResult,
  SourceSummaries,
  SummaryMap,
} from '../types/source.types';
import { errorMessage } from '../sources/common';

function recordSummary<K extends SourceName>(summaries: SourceSummaries, name: K, data: SummaryMap[K]): void {
  summaries[name] = data;
}

export class CollectorService {
  constructor(private sources: DataSource[]) {}

  /**
   * Fetch all sources and wait for every one of them to settle.
   * `results` holds one entry per source, in launch order.
   */
  async collect(now: Date = new Date()): Promise<DigestReport> {
    const report: DigestReport = {
      generatedAt: now,
      results: [],
      sources: {},
      errors: [],
    };

    if (this.sources.length === 0) {
      console.warn('CollectorService: No data sources enabled');
      return report;
    }

    console.log(`CollectorService: Collecting from ${this.sources.map((s) => s.name).join(', ')}`);
    const startedAt = Date.now();

    const settled = await Promise.allSettled(this.sources.map((source) => this.fetchTimed(source)));

    this.sources.forEach((source, index) => {
      const outcome = settled[index];
      let result: SourceResult;

      if (outcome.status === 'fulfilled') {
        result = { status: 'success', source: source.name, data: outcome.value.data };
        recordSummary(report.sources, source.name, outcome.value.data);
        console.log(`CollectorService: ${source.name} fetched in ${outcome.value.elapsedMs}ms`);
      } else {
        const message = errorMessage(outcome.reason);
        result = { status: 'failure', source: source.name, error: message };
        report.errors.push(`${source.name}: ${message}`);
        console.error(`CollectorService: ${source.name} failed:`, message);
      }

      report.results.push(result);
    });

    console.log(
      `CollectorService: Done in ${Date.now() - startedAt}ms ` +
        `(${report.results.length - report.errors.length} succeeded, ${report.errors.length} failed)`
    );

    return report;
  }

  private async fetchTimed<K extends SourceName>(
    source: DataSource<K>
  ): Promise<{ data: SummaryMap[K]; elapsedMs: number }> {
    const startedAt = Date.now();
    const data = await source.fetch();
    return { data, elapsedMs: Date.now() - startedAt };
  }
}
