import { TelegramApi, TelegramNotifier, truncateMessage } from '../../../src/notifiers/telegram.notifier';
import { createNotifier } from '../../../src/notifiers';
import { ReportFormatter } from '../../../src/services/report-formatter';
import { DigestReport } from '../../../src/types/source.types';

const formatter = new ReportFormatter({
  timeZone: 'UTC',
  locale: 'en-US',
  goals: { stepGoal: 10000, sleepGoalHours: 7.5 },
});

const REPORT: DigestReport = {
  generatedAt: new Date('2026-10-19T06:00:00Z'),
  results: [],
  sources: {},
  errors: [],
};

const CONFIG = { type: 'telegram' as const, botToken: 'test-bot-token', chatId: '12345' };

function fakeApi(sendMessage: jest.Mock): TelegramApi {
  return { sendMessage } as unknown as TelegramApi;
}

const LONG_REPORT: DigestReport = {
  ...REPORT,
  results: [{ status: 'success', source: 'poem', data: { poem: 'x'.repeat(6000) } }],
  sources: { poem: { poem: 'x'.repeat(6000) } },
};

describe('truncateMessage', () => {
  it('should keep short messages whole', () => {
    expect(truncateMessage('a\n\nb', 10)).toBe('a\n\nb');
  });

  it('should cut at the last paragraph break that fits', () => {
    expect(truncateMessage('aaaa\n\nbbbb\n\ncccc', 10)).toBe('aaaa…');
  });

  it('should hard-cut a single paragraph over the limit', () => {
    expect(truncateMessage('abcdefghij', 5)).toBe('abcd…');
  });
});

describe('TelegramNotifier', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('should send the formatted report as Markdown without link previews', async () => {
    const sendMessage = jest.fn().mockResolvedValue({ message_id: 1 });
    const notifier = new TelegramNotifier(CONFIG, { formatter, api: fakeApi(sendMessage) });

    await expect(notifier.send(REPORT)).resolves.toBe(true);

    expect(sendMessage).toHaveBeenCalledWith('12345', formatter.format(REPORT), {
      parse_mode: 'Markdown',
      link_preview_options: { is_disabled: true },
    });
  });

  it('should return false when the Bot API call fails', async () => {
    const sendMessage = jest.fn().mockRejectedValue(new Error('Call to sendMessage failed! (400: Bad Request)'));
    const notifier = new TelegramNotifier(CONFIG, { formatter, api: fakeApi(sendMessage) });

    await expect(notifier.send(REPORT)).resolves.toBe(false);
    expect(errorSpy).toHaveBeenCalled();
  });

  it('should deliver an over-long report as one truncated message', async () => {
    const sendMessage = jest
      .fn()
      .mockResolvedValueOnce({ message_id: 1 })
      .mockRejectedValueOnce(new Error('Call to sendMessage failed! (429: Too Many Requests)'));
    const notifier = new TelegramNotifier(CONFIG, { formatter, api: fakeApi(sendMessage) });
    const text = formatter.format(LONG_REPORT);

    await expect(notifier.send(LONG_REPORT)).resolves.toBe(true);

    expect(sendMessage).toHaveBeenCalledTimes(1);
    const message: string = sendMessage.mock.calls[0][1];
    expect(message.length).toBeLessThanOrEqual(4000);
    expect(message).toBe(`${text.slice(0, text.lastIndexOf('\n\n'))}…`);
    expect(warnSpy).toHaveBeenCalledWith(
      `Notifier(telegram): Message truncated from ${text.length} to ${message.length} characters`
    );
  });

  it('should return false without sending when formatting throws', async () => {
    const sendMessage = jest.fn().mockResolvedValue({ message_id: 1 });
    const notifier = new TelegramNotifier(CONFIG, { formatter, api: fakeApi(sendMessage) });
    const format = jest.spyOn(formatter, 'format').mockImplementation(() => {
      throw new Error('bad summary');
    });

    await expect(notifier.send(REPORT)).resolves.toBe(false);
    expect(sendMessage).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('Notifier(telegram): Failed to send message:', 'bad summary');
    format.mockRestore();
  });

  it('should be built by the factory from its config', async () => {
    const sendMessage = jest.fn().mockResolvedValue({ message_id: 1 });
    const notifier = createNotifier(CONFIG, { formatter, telegramApi: fakeApi(sendMessage) });

    expect(notifier.type).toBe('telegram');
    await notifier.send(REPORT);
    expect(sendMessage).toHaveBeenCalledTimes(1);
  });
});

describe('createNotifier', () => {
  it('should pick the variant from the config type', () => {
    expect(createNotifier({ type: 'dingtalk', webhookUrl: 'https://oapi.dingtalk.com/robot/send' }, { formatter }).type).toBe('dingtalk');
    expect(createNotifier({ type: 'feishu', webhookUrl: 'https://open.feishu.cn/hook' }, { formatter }).type).toBe('feishu');
    expect(createNotifier({ type: 'wecom', webhookUrl: 'https://qyapi.weixin.qq.com/send' }, { formatter }).type).toBe('wecom');
  });
});
