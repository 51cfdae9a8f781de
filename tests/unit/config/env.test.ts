import { DEFAULT_POEM_API_URL, isValidTimeFormat, loadAppConfig, loadSourcesConfig } from '../../../src/config/env';
import { ConfigError, loadNotifierConfig, MissingEnvVarError } from '../../../src/config/notifier';

const TELEGRAM_ENV = { TELEGRAM_BOT_TOKEN: 'test-bot-token', TELEGRAM_CHAT_ID: '12345' };

describe('loadNotifierConfig', () => {
  it('should default to telegram', () => {
    expect(loadNotifierConfig(TELEGRAM_ENV)).toEqual({
      type: 'telegram',
      botToken: 'test-bot-token',
      chatId: '12345',
    });
  });

  it('should throw MissingEnvVarError for a missing credential', () => {
    expect(() => loadNotifierConfig({ TELEGRAM_BOT_TOKEN: 'test-bot-token' })).toThrow(MissingEnvVarError);
    expect(() => loadNotifierConfig({ TELEGRAM_BOT_TOKEN: 'test-bot-token' })).toThrow(
      'Required environment variable not set: TELEGRAM_CHAT_ID'
    );
  });

  it('should treat blank values as missing', () => {
    expect(() => loadNotifierConfig({ NOTIFIER_TYPE: 'wecom', WECOM_WEBHOOK: '   ' })).toThrow(
      'Required environment variable not set: WECOM_WEBHOOK'
    );
  });

  it('should reject unknown notifier types', () => {
    expect(() => loadNotifierConfig({ NOTIFIER_TYPE: 'slack' })).toThrow(ConfigError);
    expect(() => loadNotifierConfig({ NOTIFIER_TYPE: 'slack' })).toThrow('Unsupported notifier type: slack');
  });

  it('should accept the type case-insensitively and keep the optional DingTalk secret', () => {
    expect(loadNotifierConfig({ NOTIFIER_TYPE: 'DingTalk', DINGTALK_WEBHOOK: 'https://oapi.dingtalk.com/robot/send' })).toEqual({
      type: 'dingtalk',
      webhookUrl: 'https://oapi.dingtalk.com/robot/send',
      secret: undefined,
    });
    expect(
      loadNotifierConfig({ NOTIFIER_TYPE: 'dingtalk', DINGTALK_WEBHOOK: 'https://oapi.dingtalk.com/robot/send', DINGTALK_SECRET: 'test-secret' })
    ).toMatchObject({ secret: 'test-secret' });
  });

  it('should build feishu and wecom configs', () => {
    expect(loadNotifierConfig({ NOTIFIER_TYPE: 'feishu', FEISHU_WEBHOOK: 'https://open.feishu.cn/hook' })).toEqual({
      type: 'feishu',
      webhookUrl: 'https://open.feishu.cn/hook',
    });
    expect(loadNotifierConfig({ NOTIFIER_TYPE: 'wecom', WECOM_WEBHOOK: 'https://qyapi.weixin.qq.com/send' })).toEqual({
      type: 'wecom',
      webhookUrl: 'https://qyapi.weixin.qq.com/send',
    });
  });
});

describe('loadSourcesConfig', () => {
  it('should enable only the poem source without credentials', () => {
    expect(loadSourcesConfig({}, 'UTC')).toEqual({ poem: { apiUrl: DEFAULT_POEM_API_URL } });
  });

  it('should require every credential of a source', () => {
    const sources = loadSourcesConfig({ GITHUB_TOKEN: 'test-token', STEAM_API_KEY: 'test-key' }, 'UTC');
    expect(sources.github).toBeUndefined();
    expect(sources.steam).toBeUndefined();
  });

  it('should honour the ENABLE toggles', () => {
    const sources = loadSourcesConfig(
      { WEREAD_COOKIE: 'wr_skey=test', ENABLE_WEREAD: 'false', ENABLE_POEM: 'FALSE' },
      'UTC'
    );
    expect(sources).toEqual({});
  });

  it('should enable Apple Health when either value is present', () => {
    expect(loadSourcesConfig({ APPLE_HEALTH_SLEEP_HOURS: '7' }, 'UTC').appleHealth).toEqual({
      steps: undefined,
      sleepHours: '7',
    });
  });

  it('should use GITHUB_TIMEZONE over the general time zone', () => {
    const env = { GITHUB_TOKEN: 'test-token', GITHUB_USERNAME: 'octotest' };
    expect(loadSourcesConfig(env, 'Asia/Shanghai').github?.timeZone).toBe('Asia/Shanghai');
    expect(loadSourcesConfig({ ...env, GITHUB_TIMEZONE: 'Europe/Berlin' }, 'Asia/Shanghai').github?.timeZone).toBe(
      'Europe/Berlin'
    );
  });

  it('should fall back to the general time zone for an invalid GITHUB_TIMEZONE', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const env = { GITHUB_TOKEN: 'test-token', GITHUB_USERNAME: 'octotest', GITHUB_TIMEZONE: 'Mars/Phobos' };

    expect(loadSourcesConfig(env, 'Asia/Shanghai').github?.timeZone).toBe('Asia/Shanghai');
    expect(warn).toHaveBeenCalledWith('Invalid GITHUB_TIMEZONE "Mars/Phobos", using Asia/Shanghai');
    warn.mockRestore();
  });

  it('should enable the credentialed sources', () => {
    const sources = loadSourcesConfig(
      {
        XIAOMI_USERNAME: '13800000000',
        XIAOMI_PASSWORD: 'test-password',
        DUOLINGO_USERNAME: 'learner',
        DUOLINGO_JWT_TOKEN: 'test-jwt',
        STEAM_API_KEY: 'test-key',
        STEAM_ID: '76561190000000000',
      },
      'UTC'
    );
    expect(Object.keys(sources).sort()).toEqual(['duolingo', 'poem', 'steam', 'xiaomi']);
  });
});

describe('loadAppConfig', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('should apply defaults', () => {
    const config = loadAppConfig(TELEGRAM_ENV);

    expect(config.timeZone).toBe('Asia/Shanghai');
    expect(config.locale).toBe('en-US');
    expect(config.goals).toEqual({ stepGoal: 10000, sleepGoalHours: 7.5 });
    expect(config.httpTimeoutMs).toBe(10000);
    expect(config.webhookTimeoutMs).toBe(10000);
    expect(config.digestTime).toBe('07:00');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read goals and timeouts', () => {
    const config = loadAppConfig({
      ...TELEGRAM_ENV,
      STEP_GOAL: '8000',
      SLEEP_GOAL_HOURS: '8',
      HTTP_TIMEOUT_MS: '5000',
      DIGEST_TIME: '06:30',
      TIMEZONE: 'Europe/Berlin',
    });

    expect(config.goals).toEqual({ stepGoal: 8000, sleepGoalHours: 8 });
    expect(config.httpTimeoutMs).toBe(5000);
    expect(config.digestTime).toBe('06:30');
    expect(config.timeZone).toBe('Europe/Berlin');
  });

  it('should fall back to defaults for invalid values', () => {
    const config = loadAppConfig({
      ...TELEGRAM_ENV,
      STEP_GOAL: 'many',
      SLEEP_GOAL_HOURS: '-2',
      DIGEST_TIME: '25:00',
      TIMEZONE: 'Mars/Olympus',
    });

    expect(config.goals).toEqual({ stepGoal: 10000, sleepGoalHours: 7.5 });
    expect(config.digestTime).toBe('07:00');
    expect(config.timeZone).toBe('UTC');
    expect(warnSpy).toHaveBeenCalledTimes(4);
  });

  it('should fail before anything else when the notifier is misconfigured', () => {
    expect(() => loadAppConfig({ NOTIFIER_TYPE: 'feishu' })).toThrow(MissingEnvVarError);
  });
});

describe('isValidTimeFormat', () => {
  it('should accept HH:MM times only', () => {
    expect(isValidTimeFormat('07:00')).toBe(true);
    expect(isValidTimeFormat('7:05')).toBe(true);
    expect(isValidTimeFormat('23:59')).toBe(true);
    expect(isValidTimeFormat('24:00')).toBe(false);
    expect(isValidTimeFormat('07:60')).toBe(false);
    expect(isValidTimeFormat('seven')).toBe(false);
  });
});
