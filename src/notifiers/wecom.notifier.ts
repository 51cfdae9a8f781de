/**
 * WeCom (WeChat Work) group robot notifier
 */

import { WeComNotifierConfig } from '../config/notifier';
import { NotifierDeps, WebhookNotifier } from './base.notifier';

export class WeComNotifier extends WebhookNotifier {
  readonly type = 'wecom';

  constructor(config: WeComNotifierConfig, deps: NotifierDeps) {
    super(config.webhookUrl, deps);
  }

  protected buildPayload(text: string): unknown {
    return {
      msgtype: 'markdown',
      markdown: { content: text },
    };
  }
}
