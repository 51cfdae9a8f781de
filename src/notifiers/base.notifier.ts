/**
 * Notifier base
 * Formats the report once, hands the text to the channel and turns any
 * delivery problem into a logged `false`.
 */

import { NotifierType } from '../config/notifier';
import { HttpClient, HttpResponse } from '../lib/http';
import { ReportFormatter } from '../services/report-formatter';
import { errorMessage } from '../sources/common';
import { DigestReport } from '../types/source.types';
import { asRecord, JsonRecord, readNumber } from '../utils/fields';

export interface Notifier {
  readonly type: NotifierType;
  formatMessage(report: DigestReport): string;
  /** Resolves true when the provider accepted the message; never rejects. */
  send(report: DigestReport): Promise<boolean>;
}

export interface NotifierDeps {
  formatter: ReportFormatter;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

export abstract class BaseNotifier implements Notifier {
  abstract readonly type: NotifierType;

  constructor(protected formatter: ReportFormatter) {}

  formatMessage(report: DigestReport): string {
    return this.formatter.format(report);
  }

  async send(report: DigestReport): Promise<boolean> {
    try {
      const delivered = await this.deliver(this.formatMessage(report));
      if (delivered) {
        console.log(`Notifier(${this.type}): Message sent`);
      }
      return delivered;
    } catch (error) {
      console.error(`Notifier(${this.type}): Failed to send message:`, errorMessage(error));
      return false;
    }
  }

  protected abstract deliver(text: string): Promise<boolean>;
}

/**
 * Webhook channels that answer with HTTP 200 plus a provider error code.
 */
export abstract class WebhookNotifier extends BaseNotifier {
  protected http: HttpClient;

  constructor(protected webhookUrl: string, deps: NotifierDeps) {
    super(deps.formatter);
    this.http = new HttpClient({ fetchImpl: deps.fetchImpl, timeoutMs: deps.timeoutMs });
  }

  protected async deliver(text: string): Promise<boolean> {
    const response = await this.http.postJson(this.targetUrl(), this.buildPayload(text));
    const body = asRecord(response.body);

    if (response.status === 200 && this.isAccepted(body)) {
      return true;
    }

    console.error(`Notifier(${this.type}): Rejected with status ${response.status}: ${describeBody(response)}`);
    return false;
  }

  protected targetUrl(): string {
    return this.webhookUrl;
  }

  protected isAccepted(body: JsonRecord): boolean {
    return readNumber(body, 'errcode', -1) === 0;
  }

  protected abstract buildPayload(text: string): unknown;
}

function describeBody(response: HttpResponse): string {
  return response.body === null ? '(no body)' : JSON.stringify(response.body);
}
