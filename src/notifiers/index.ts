/**
 * Notifier factory
 */

import { NotifierConfig } from '../config/notifier';
import { Notifier, NotifierDeps } from './base.notifier';
import { DingTalkNotifier } from './dingtalk.notifier';
import { FeishuNotifier } from './feishu.notifier';
import { TelegramApi, TelegramNotifier } from './telegram.notifier';
import { WeComNotifier } from './wecom.notifier';

export interface CreateNotifierDeps extends NotifierDeps {
  telegramApi?: TelegramApi;
  clock?: () => number;
}

export function createNotifier(config: NotifierConfig, deps: CreateNotifierDeps): Notifier {
  switch (config.type) {
    case 'telegram':
      return new TelegramNotifier(config, { ...deps, api: deps.telegramApi });
    case 'dingtalk':
      return new DingTalkNotifier(config, deps);
    case 'feishu':
      return new FeishuNotifier(config, deps);
    case 'wecom':
      return new WeComNotifier(config, deps);
  }
}

export type { Notifier, NotifierDeps } from './base.notifier';
