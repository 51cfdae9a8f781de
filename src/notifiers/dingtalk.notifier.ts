/**
 * DingTalk robot notifier
 * Markdown message to a custom robot webhook. With a secret configured the
 * request carries `timestamp` and `sign` query parameters.
 */

import { createHmac } from 'crypto';
import { DingTalkNotifierConfig } from '../config/notifier';
import { NotifierDeps, WebhookNotifier } from './base.notifier';

export const DINGTALK_MESSAGE_TITLE = '📊 Daily Digest';

/**
 * base64(HMAC-SHA256(secret, "<timestamp>\n<secret>"))
 */
export function signDingTalk(timestamp: number, secret: string): string {
  return createHmac('sha256', secret).update(`${timestamp}\n${secret}`).digest('base64');
}

export function buildSignedUrl(webhookUrl: string, secret: string, timestamp: number): string {
  const url = new URL(webhookUrl);
  url.searchParams.set('timestamp', String(timestamp));
  url.searchParams.set('sign', signDingTalk(timestamp, secret));
  return url.toString();
}

export class DingTalkNotifier extends WebhookNotifier {
  readonly type = 'dingtalk';
  private secret?: string;
  private clock: () => number;

  constructor(config: DingTalkNotifierConfig, deps: NotifierDeps & { clock?: () => number }) {
    super(config.webhookUrl, deps);
    this.secret = config.secret;
    this.clock = deps.clock ?? Date.now;
  }

  protected targetUrl(): string {
    return this.secret ? buildSignedUrl(this.webhookUrl, this.secret, this.clock()) : this.webhookUrl;
  }

  protected buildPayload(text: string): unknown {
    return {
      msgtype: 'markdown',
      markdown: { title: DINGTALK_MESSAGE_TITLE, text },
    };
  }
}
