import type { AnalysisReport, MessageRecord } from "../types.js";
import { type BoilerplateFilter, createBoilerplateFilter } from "../utils/boilerplate.js";

let seq = 0;

export function msg(
  contactKey: string,
  fromMe: boolean,
  at: string,
  text: string | null = null,
  displayName: string | null = null
): MessageRecord {
  seq++;
  return { id: String(seq), contactKey, fromMe, ts: Date.parse(at), text, displayName };
}

export const TEST_BOILERPLATE = {
  phrases: ["see you", "good morning"],
  words: ["the", "to", "we", "are", "going", "ok", "you", "this", "was"],
};

export function testFilter(): BoilerplateFilter {
  return createBoilerplateFilter(TEST_BOILERPLATE);
}

export function makeReport(overrides: Partial<AnalysisReport> = {}): AnalysisReport {
  return {
    generatedAt: 1,
    timeZone: "UTC",
    messageCount: 0,
    contactCount: 0,
    years: [],
    relationships: { contacts: [], balance: [], initiation: [], responseTimes: [] },
    yearlyRankings: [],
    transitions: [],
    topContacts: [],
    trajectories: [],
    streaks: [],
    yearlyVolume: [],
    activeDays: [],
    questionsByYear: [],
    questionsByContact: [],
    monthlyVolume: [],
    hourDayHeatmap: [],
    peakHours: [],
    emojisByYear: [],
    emojisByContact: [],
    sharedDomains: [],
    fadingConnections: [],
    newConnections: [],
    phrases: [],
    distinctiveTerms: [],
    topicsByYear: [],
    topicsByContact: [],
    sentiment: [],
    partitions: [],
    ...overrides,
  };
}
