/**
 * Feishu (Lark) bot notifier
 * The text message type renders no markdown, so links are flattened to
 * "label: url" before sending.
 */

import { FeishuNotifierConfig } from '../config/notifier';
import { JsonRecord, readNumber } from '../utils/fields';
import { NotifierDeps, WebhookNotifier } from './base.notifier';

const MARKDOWN_LINK = /\[([^\]]+)\]\(([^)]+)\)/g;

export function stripMarkdownLinks(text: string): string {
  return text.replace(MARKDOWN_LINK, '$1: $2');
}

export class FeishuNotifier extends WebhookNotifier {
  readonly type = 'feishu';

  constructor(config: FeishuNotifierConfig, deps: NotifierDeps) {
    super(config.webhookUrl, deps);
  }

  protected buildPayload(text: string): unknown {
    return {
      msg_type: 'text',
      content: { text: stripMarkdownLinks(text) },
    };
  }

  // Newer endpoints answer { code: 0 }, older ones { StatusCode: 0 }
  protected isAccepted(body: JsonRecord): boolean {
    return readNumber(body, 'StatusCode', -1) === 0 || readNumber(body, 'code', -1) === 0;
  }
}
