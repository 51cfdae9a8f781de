/**
 * Notifier configuration module
 * Selects exactly one notification channel from NOTIFIER_TYPE and validates
 * the credentials that channel needs.
 *
 * Channel environment variables:
 * - telegram: TELEGRAM_BOT_TOKEN, TELEGRAM_CHAT_ID
 * - dingtalk: DINGTALK_WEBHOOK, DINGTALK_SECRET (optional, enables signing)
 * - feishu:   FEISHU_WEBHOOK
 * - wecom:    WECOM_WEBHOOK
 */

export type NotifierType = 'telegram' | 'dingtalk' | 'feishu' | 'wecom';

export const NOTIFIER_TYPES: readonly NotifierType[] = ['telegram', 'dingtalk', 'feishu', 'wecom'];

export interface TelegramNotifierConfig {
  type: 'telegram';
  botToken: string;
  chatId: string;
}

export interface DingTalkNotifierConfig {
  type: 'dingtalk';
  webhookUrl: string;
  secret?: string;
}

export interface FeishuNotifierConfig {
  type: 'feishu';
  webhookUrl: string;
}

export interface WeComNotifierConfig {
  type: 'wecom';
  webhookUrl: string;
}

export type NotifierConfig =
  | TelegramNotifierConfig
  | DingTalkNotifierConfig
  | FeishuNotifierConfig
  | WeComNotifierConfig;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class MissingEnvVarError extends ConfigError {
  constructor(varName: string) {
    super(`Required environment variable not set: ${varName}`);
    this.name = 'MissingEnvVarError';
  }
}

export function isNotifierType(value: string): value is NotifierType {
  return NOTIFIER_TYPES.some((type) => type === value);
}

export function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new MissingEnvVarError(name);
  }
  return value;
}

/**
 * Build the notifier configuration for the selected channel
 * @throws ConfigError for an unsupported NOTIFIER_TYPE
 * @throws MissingEnvVarError when a required credential is missing
 */
export function loadNotifierConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  const type = (readEnv(env, 'NOTIFIER_TYPE') || 'telegram').toLowerCase();

  if (!isNotifierType(type)) {
    throw new ConfigError(`Unsupported notifier type: ${type}`);
  }

  switch (type) {
    case 'telegram':
      return {
        type,
        botToken: requireEnv(env, 'TELEGRAM_BOT_TOKEN'),
        chatId: requireEnv(env, 'TELEGRAM_CHAT_ID'),
      };
    case 'dingtalk':
      return {
        type,
        webhookUrl: requireEnv(env, 'DINGTALK_WEBHOOK'),
        secret: readEnv(env, 'DINGTALK_SECRET'),
      };
    case 'feishu':
      return { type, webhookUrl: requireEnv(env, 'FEISHU_WEBHOOK') };
    case 'wecom':
      return { type, webhookUrl: requireEnv(env, 'WECOM_WEBHOOK') };
  }
}
