import { DIVIDER, ReportFormatter } from '../../../src/services/report-formatter';
import { DEFAULT_POEM } from '../../../src/sources/poem.source';
import { DigestReport } from '../../../src/types/source.types';

// 09:00 on Monday 2026-10-19 in Shanghai, day 292 of 365
const NOW = new Date('2026-10-19T01:00:00Z');

const formatter = new ReportFormatter({
  timeZone: 'Asia/Shanghai',
  locale: 'en-US',
  goals: { stepGoal: 10000, sleepGoalHours: 7.5 },
});

function emptyReport(): DigestReport {
  return { generatedAt: NOW, results: [], sources: {}, errors: [] };
}

const HEADER = [
  '🌅 Good morning! Today is Monday, October 19, 2026\n\nDay 292 of the year',
  DIVIDER,
  '📊 2026 Progress\n████████████████░░░░ 80.0% (292/365)',
  DIVIDER,
];

describe('ReportFormatter', () => {
  it('should render header and progress for an empty report', () => {
    expect(formatter.format(emptyReport())).toBe(HEADER.join('\n\n'));
  });

  it('should show failed sources and the error list', () => {
    const report: DigestReport = {
      generatedAt: NOW,
      results: [
        { status: 'failure', source: 'github', error: 'Bad credentials' },
        { status: 'success', source: 'poem', data: { poem: DEFAULT_POEM } },
      ],
      sources: { poem: { poem: DEFAULT_POEM } },
      errors: ['github: Bad credentials'],
    };

    expect(formatter.format(report)).toBe(
      [
        ...HEADER,
        "💻 Yesterday's Coding\n• ⚠️ Data unavailable",
        DIVIDER,
        `📝 Poem of the Day\n${DEFAULT_POEM}`,
        DIVIDER,
        '⚠️ Some sources failed:\n• github: Bad credentials',
      ].join('\n\n')
    );
  });

  it('should order sections and separate the groups', () => {
    const report = emptyReport();
    report.sources = {
      poem: { poem: 'verse' },
      duolingo: {
        streak: 5,
        completedToday: true,
        xpToday: 30,
        xpGoal: 20,
        totalXp: 0,
        learningLanguage: '',
        wordsToReview: 0,
      },
      apple_health: { steps: 12000, sleepHours: 0 },
    };

    // the greeting holds one blank line, so the header spans five parts
    const body = formatter.format(report).split('\n\n').slice(5);

    expect(body).toEqual([
      "💪 Yesterday's Health\n• Steps: 12,000 ✅",
      DIVIDER,
      '🌍 Duolingo\n• Daily goal complete ✅ (5-day streak)',
      DIVIDER,
      '📝 Poem of the Day\nverse',
    ]);
  });

  it('should list at most three errors', () => {
    const report = emptyReport();
    report.errors = ['a: 1', 'b: 2', 'c: 3', 'd: 4'];

    const lastSection = formatter.format(report).split('\n\n').pop();

    expect(lastSection).toBe('⚠️ Some sources failed:\n• a: 1\n• b: 2\n• c: 3');
  });

  it('should be deterministic for the same report', () => {
    const report = emptyReport();
    expect(formatter.format(report)).toBe(formatter.format(report));
  });

  it('should use the given date instead of the generation time', () => {
    const output = formatter.format(emptyReport(), new Date('2024-12-31T04:00:00Z'));
    expect(output).toContain('📊 2024 Progress\n████████████████████ 100.0% (366/366)');
  });
});
