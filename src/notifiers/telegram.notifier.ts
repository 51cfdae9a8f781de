/**
 * Telegram notifier
 * Sends the digest through the Bot API with Markdown formatting, always as
 * a single message. Text over Telegram's length limit is cut at the last
 * paragraph boundary that fits.
 */

import { Api } from 'grammy';
import { TelegramNotifierConfig } from '../config/notifier';
import { BaseNotifier, NotifierDeps } from './base.notifier';

export type TelegramApi = Pick<Api, 'sendMessage'>;

export const TELEGRAM_MAX_LENGTH = 4000;

const TRUNCATION_MARK = '…';

/**
 * Shorten text to at most `maxLength` characters, preferring a paragraph break.
 */
export function truncateMessage(text: string, maxLength: number = TELEGRAM_MAX_LENGTH): string {
  if (text.length <= maxLength) return text;

  const limit = maxLength - TRUNCATION_MARK.length;
  const cut = text.lastIndexOf('\n\n', limit);
  return `${text.slice(0, cut > 0 ? cut : limit)}${TRUNCATION_MARK}`;
}

export class TelegramNotifier extends BaseNotifier {
  readonly type = 'telegram';
  private api: TelegramApi;
  private chatId: string;

  constructor(config: TelegramNotifierConfig, deps: NotifierDeps & { api?: TelegramApi }) {
    super(deps.formatter);
    this.api = deps.api ?? new Api(config.botToken);
    this.chatId = config.chatId;
  }

  protected async deliver(text: string): Promise<boolean> {
    const message = truncateMessage(text);
    if (message.length < text.length) {
      console.warn(`Notifier(telegram): Message truncated from ${text.length} to ${message.length} characters`);
    }

    await this.api.sendMessage(this.chatId, message, {
      parse_mode: 'Markdown',
      link_preview_options: { is_disabled: true },
    });
    return true;
  }
}
