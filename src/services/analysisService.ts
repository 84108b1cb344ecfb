import { setImmediate as yieldToLoop } from "timers/promises";
import type { AnalysisConfig } from "../config.js";
import { AnalysisAbortedError, EmptyInputError } from "../errors.js";
import type { AnalysisReport, MessageRecord, PartitionResult, PartitionStatus } from "../types.js";
import { type BoilerplateFilter, createBoilerplateFilter } from "../utils/boilerplate.js";
import { localYear } from "../utils/dates.js";
import {
  computeActiveDaysByYear,
  computeMonthlyVolume,
  computeQuestionRatioByContact,
  computeQuestionRatioByYear,
  computeYearlyVolume,
} from "./activityService.js";
import { detectFadingConnections, detectNewConnections } from "./connectionHealthService.js";
import { filterContacts } from "./contactFilterService.js";
import { segmentConversations } from "./conversationService.js";
import { distinctiveTermsByYear } from "./distinctiveTermsService.js";
import { topEmojisByContact, topEmojisByYear } from "./emojiService.js";
import { sharedLinkDomains } from "./linkService.js";
import { minePhrasesByYear } from "./phraseService.js";
import {
  computeTopContacts,
  computeYearlyRankings,
  consecutiveYearTransitions,
  rankingTrajectories,
} from "./rankingService.js";
import { computeRelationshipMetrics } from "./relationshipMetricsService.js";
import { sentimentByContact } from "./sentimentService.js";
import { computeLongestStreaks } from "./streakService.js";
import { hourWeekdayHeatmap, peakHoursByYear } from "./temporalService.js";
import { corpusByContact, corpusByYear } from "./textCorpusService.js";
import { extractTopicsByContact, extractTopicsByYear } from "./topicService.js";

export type RunOptions = {
  signal?: AbortSignal;
  boilerplate?: BoilerplateFilter;
  now?: () => number;
};

function flattenPartitions<T>(analysis: PartitionStatus["analysis"], results: PartitionResult<T>[]) {
  const rows: T[] = [];
  const statuses: PartitionStatus[] = [];
  for (const r of results) {
    if (r.status === "ok") rows.push(...r.rows);
    statuses.push({
      analysis,
      partition: r.partition,
      status: r.status,
      reason: r.status === "ok" ? undefined : r.reason,
    });
  }
  return { rows, statuses };
}

/**
 * Runs every analysis over one closed message collection. Stages run in
 * order and the run yields between them so a caller's AbortSignal can cancel
 * it; a cancelled run throws and returns nothing.
 */
export async function runAnalysis(
  input: readonly MessageRecord[],
  cfg: AnalysisConfig,
  opts: RunOptions = {}
): Promise<AnalysisReport> {
  if (input.length === 0) throw new EmptyInputError();

  const { signal } = opts;
  const boilerplate = opts.boilerplate ?? createBoilerplateFilter(cfg.boilerplate);
  const tz = cfg.timeZone;
  const startedAt = Date.now();

  const stage = async <T>(name: string, fn: () => T): Promise<T> => {
    await yieldToLoop();
    if (signal?.aborted) throw new AnalysisAbortedError(name);
    const t0 = Date.now();
    const out = fn();
    console.info(`[analysis] ${name} done`, { ms: Date.now() - t0 });
    return out;
  };

  const filtered = await stage("filter", () => filterContacts(input, cfg));
  if (filtered.excluded.length || filtered.oneSided.length) {
    console.info("[analysis] contacts filtered", {
      excluded: filtered.excluded.length,
      oneSided: filtered.oneSided.length,
    });
  }
  const messages = filtered.messages;

  const relationships = await stage("relationships", () =>
    computeRelationshipMetrics(messages, segmentConversations(messages, cfg.conversationGapHours), cfg)
  );

  const rankingStage = await stage("rankings", () => {
    const yearlyRankings = computeYearlyRankings(messages, tz);
    const transitions = consecutiveYearTransitions(
      yearlyRankings,
      { floor: cfg.ranking.risingFloor, top: cfg.ranking.risingTop },
      { top: cfg.ranking.fadedTop, floor: cfg.ranking.fadedFloor }
    );
    const topContacts = computeTopContacts(messages, cfg.ranking.trajectoryContacts, tz);
    const trajectories = rankingTrajectories(
      yearlyRankings,
      topContacts.map((c) => c.contactKey)
    );
    return { yearlyRankings, transitions, topContacts, trajectories };
  });

  const activity = await stage("activity", () => ({
    streaks: computeLongestStreaks(messages, tz),
    yearlyVolume: computeYearlyVolume(messages, tz),
    activeDays: computeActiveDaysByYear(messages, tz),
    questionsByYear: computeQuestionRatioByYear(messages, tz),
    questionsByContact: computeQuestionRatioByContact(messages, cfg.minMessagesForQuestions),
    monthlyVolume: computeMonthlyVolume(
      messages,
      tz,
      rankingStage.topContacts.map((c) => c.contactKey)
    ),
  }));

  const temporal = await stage("temporal", () => ({
    hourDayHeatmap: hourWeekdayHeatmap(messages, tz),
    peakHours: peakHoursByYear(messages, tz),
  }));

  // Relative to the newest message, not the wall clock.
  const referenceTs = messages.reduce((max, m) => Math.max(max, m.ts), -Infinity);
  const health = await stage("health", () => ({
    fadingConnections: detectFadingConnections(messages, referenceTs, tz, cfg.health),
    newConnections: detectNewConnections(messages, referenceTs, cfg.health),
  }));

  const content = await stage("content", () => ({
    emojisByYear: topEmojisByYear(messages, tz, cfg.text.topEmojisPerYear),
    emojisByContact: topEmojisByContact(messages, cfg.text.topEmojisPerContact),
    sharedDomains: sharedLinkDomains(messages, cfg.text.topLinkDomains),
  }));

  const yearCorpus = await stage("corpus", () => corpusByYear(messages, tz));

  const phrases = await stage("phrases", () =>
    flattenPartitions("phrases", minePhrasesByYear(yearCorpus, boilerplate, cfg.text))
  );

  const distinctiveTerms = await stage("terms", () =>
    distinctiveTermsByYear(yearCorpus, boilerplate, cfg.text.topTerms)
  );

  const topicsByYear = await stage("topicsByYear", () =>
    flattenPartitions("topicsByYear", extractTopicsByYear(yearCorpus, boilerplate, cfg.text))
  );

  const topicsByContact = await stage("topicsByContact", () =>
    flattenPartitions(
      "topicsByContact",
      extractTopicsByContact(corpusByContact(messages, cfg.text.topicContacts), boilerplate, cfg.text)
    )
  );

  const sentiment = await stage("sentiment", () => sentimentByContact(messages, cfg.minMessagesForSentiment));

  const years = [...new Set(messages.map((m) => localYear(m.ts, tz)))].sort((a, b) => a - b);
  const report: AnalysisReport = {
    generatedAt: opts.now ? opts.now() : Date.now(),
    timeZone: tz,
    messageCount: messages.length,
    contactCount: relationships.contacts.length,
    years,
    relationships,
    ...rankingStage,
    ...activity,
    ...temporal,
    ...content,
    ...health,
    phrases: phrases.rows,
    distinctiveTerms,
    topicsByYear: topicsByYear.rows,
    topicsByContact: topicsByContact.rows,
    sentiment,
    partitions: [...phrases.statuses, ...topicsByYear.statuses, ...topicsByContact.statuses],
  };

  console.info("[analysis] run complete", {
    messages: report.messageCount,
    contacts: report.contactCount,
    years: years.length,
    ms: Date.now() - startedAt,
  });
  return report;
}
