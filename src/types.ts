export interface MessageRecord {
  id: string;
  contactKey: string;    // phone / email / group key, opaque
  displayName?: string | null;
  fromMe: boolean;
  ts: number;
  text?: string | null;
}

export type LocalDate = string; // YYYY-MM-DD in the configured time zone

export interface MessageSegment {
  messageId: string;
  contactKey: string;
  fromMe: boolean;
  ts: number;
  elapsedMs: number | null;
  isConversationStart: boolean;
}

export interface ConversationSummary {
  contactKey: string;
  conversations: number;
  ownerInitiated: number;
  contactInitiated: number;
}

export interface ContactRelationshipMetrics {
  contactKey: string;
  displayName: string;
  total: number;
  sent: number;
  received: number;
  balanceRatio: number;
  conversations: number;
  ownerInitiated: number;
  contactInitiated: number;
  initiationShare: number | null;
  medianOwnerReplyMs: number | null;
  medianContactReplyMs: number | null;
  ownerReplyCount: number;
  contactReplyCount: number;
}

export interface RelationshipTables {
  contacts: ContactRelationshipMetrics[];
  balance: ContactRelationshipMetrics[];
  initiation: ContactRelationshipMetrics[];
  responseTimes: ContactRelationshipMetrics[];
}

export interface YearlyRanking {
  year: number;
  contactKey: string;
  total: number;
  sent: number;
  received: number;
  rank: number;
}

export interface RankChange {
  contactKey: string;
  fromYear: number;
  toYear: number;
  fromRank: number | null;
  toRank: number | null;
}

export interface YearTransition {
  fromYear: number;
  toYear: number;
  rising: RankChange[];
  faded: RankChange[];
}

export interface TrajectoryPoint {
  year: number;
  rank: number;
  total: number;
}

export interface ContactTrajectory {
  contactKey: string;
  points: TrajectoryPoint[];
}

export interface TopContact {
  contactKey: string;
  displayName: string;
  total: number;
  sent: number;
  received: number;
  yearsActive: number;
  firstTs: number;
  lastTs: number;
}

export interface StreakRecord {
  contactKey: string;
  startDate: LocalDate;
  endDate: LocalDate;
  length: number;
}

export interface PhraseRow {
  year: number;
  phrase: string;
  count: number;
}

export interface TermRow {
  year: number;
  term: string;
  score: number;
}

export interface TopicRow {
  partition: string; // year ("2023") or contact key
  topicId: number;
  terms: string[];
}

export interface SentimentScore {
  compound: number;
  pos: number;
  neu: number;
  neg: number;
}

export interface ContactSentiment {
  contactKey: string;
  total: number;
  avgCompound: number;
  avgPositive: number;
  avgNegative: number;
}

export interface YearVolume {
  year: number;
  total: number;
  sent: number;
  received: number;
}

export interface YearActiveDays {
  year: number;
  activeDays: number;
}

export interface QuestionRatioRow {
  key: string; // year or contact key
  total: number;
  questions: number;
  questionShare: number;
}

export interface YearEmojiRow {
  year: number;
  emoji: string;
  count: number;
  rank: number;
}

export interface ContactEmojiRow {
  contactKey: string;
  emoji: string;
  count: number;
  rank: number;
}

export interface HeatmapCell {
  weekday: number; // 0 = Monday
  dayName: string;
  hour: number;
  count: number;
}

export interface PeakHourRow {
  year: number;
  peakHour: number;
  messagesAtPeak: number;
  total: number;
}

export interface MonthlyVolumeRow {
  month: string; // YYYY-MM
  contactKey: string;
  total: number;
}

export interface LinkDomainRow {
  domain: string;
  total: number;
  sent: number;
  received: number;
}

// Rates are messages per week, rounded to one decimal.
export interface FadingConnection {
  contactKey: string;
  displayName: string;
  totalMessages: number;
  activeMonths: number;
  baselineRate: number;
  recentRate: number;
  dropPercentage: number;
  daysSinceContact: number;
  lastContactDate: LocalDate;
}

export interface NewConnection {
  contactKey: string;
  displayName: string;
  kind: "revived" | "growing";
  totalMessages: number;
  recentMessages: number;
  baselineRate: number;
  recentRate: number;
  growthFactor: number | null;
  relationshipDays: number;
}

export type PartitionResult<T> =
  | { status: "ok"; partition: string; rows: T[] }
  | { status: "skipped"; partition: string; reason: "insufficient_data"; documents: number }
  | { status: "failed"; partition: string; reason: string };

export type PartitionStatus = {
  analysis: "phrases" | "topicsByYear" | "topicsByContact";
  partition: string;
  status: PartitionResult<unknown>["status"];
  reason?: string;
};

export interface AnalysisReport {
  generatedAt: number;
  timeZone: string;
  messageCount: number;
  contactCount: number;
  years: number[];
  relationships: RelationshipTables;
  yearlyRankings: YearlyRanking[];
  transitions: YearTransition[];
  topContacts: TopContact[];
  trajectories: ContactTrajectory[];
  streaks: StreakRecord[];
  yearlyVolume: YearVolume[];
  activeDays: YearActiveDays[];
  questionsByYear: QuestionRatioRow[];
  questionsByContact: QuestionRatioRow[];
  monthlyVolume: MonthlyVolumeRow[];
  hourDayHeatmap: HeatmapCell[];
  peakHours: PeakHourRow[];
  emojisByYear: YearEmojiRow[];
  emojisByContact: ContactEmojiRow[];
  sharedDomains: LinkDomainRow[];
  fadingConnections: FadingConnection[];
  newConnections: NewConnection[];
  phrases: PhraseRow[];
  distinctiveTerms: TermRow[];
  topicsByYear: TopicRow[];
  topicsByContact: TopicRow[];
  sentiment: ContactSentiment[];
  partitions: PartitionStatus[];
}
