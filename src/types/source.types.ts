/**
 * Source Types
 * Summary records produced by each data source and the digest report
 * assembled from them.
 */

// ============================================
// Source names
// ============================================

export type SourceName =
  | 'github'
  | 'xiaomi'
  | 'weread'
  | 'duolingo'
  | 'poem'
  | 'apple_health'
  | 'steam';

// ============================================
// Per-source summaries
// ============================================

export interface GithubActivity {
  type: 'pr' | 'issue' | 'star' | 'push';
  action: 'created' | 'merged' | 'closed' | 'starred' | 'pushed';
  repo: string;
  title?: string;
  url?: string;
  commits?: number;
}

export interface GithubSummary {
  commits: number;
  prsCreated: GithubActivity[];
  prsMerged: GithubActivity[];
  issuesClosed: GithubActivity[];
  stars: GithubActivity[];
  weekStreak: number;
  hasActivity: boolean;
}

export interface XiaomiSleep {
  totalHours: number;
  deepHours: number;
  sleepStart: string; // HH:MM
}

export interface XiaomiRunning {
  distanceKm: number;
  weekTotalKm: number;
}

export interface XiaomiSummary {
  sleep?: XiaomiSleep;
  steps: number;
  running?: XiaomiRunning;
}

export interface WereadBook {
  title: string;
  author: string;
  progress: number; // percent
}

export interface WereadSummary {
  yesterdayMinutes: number;
  currentBooks: WereadBook[];
  monthlyMinutes: number;
  weeklyMinutes: number;
  totalHours: number;
  finishedBooks: number;
}

export interface DuolingoSummary {
  streak: number;
  completedToday: boolean;
  xpToday: number;
  xpGoal: number;
  totalXp: number;
  learningLanguage: string;
  wordsToReview: number;
}

export interface PoemSummary {
  poem: string;
}

export interface HealthSummary {
  steps: number;
  sleepHours: number;
}

export interface SteamGame {
  name: string;
  hours: number;
}

export interface SteamSummary {
  playerName: string;
  yesterdayHours: number;
  weekHours: number;
  totalGames: number;
  totalHours: number;
  recentGames: string[];
  topGames: SteamGame[];
}

export interface SummaryMap {
  github: GithubSummary;
  xiaomi: XiaomiSummary;
  weread: WereadSummary;
  duolingo: DuolingoSummary;
  poem: PoemSummary;
  apple_health: HealthSummary;
  steam: SteamSummary;
}

export type SourceSummaries = Partial<SummaryMap>;

// ============================================
// Source contract
// ============================================

export interface DataSource<K extends SourceName = SourceName> {
  readonly name: K;
  /** Fetch and reduce the service's data. Throws when nothing usable can be produced. */
  fetch(): Promise<SummaryMap[K]>;
  formatMessage(summary: SummaryMap[K]): string;
}

export interface DigestGoals {
  stepGoal: number;
  sleepGoalHours: number;
}

// ============================================
// Collection results
// ============================================

export type SourceResult<K extends SourceName = SourceName> =
  | { status: 'success'; source: K; data: SummaryMap[K] }
  | { status: 'failure'; source: K; error: string };

export interface DigestReport {
  generatedAt: Date;
  /** One entry per enabled source, in launch order */
  results: SourceResult[];
  /** Successful summaries by source name */
  sources: SourceSummaries;
  /** "<source>: <message>" per failed source */
  errors: string[];
}
