import type { AnalysisConfig } from "../config.js";
import type { FadingConnection, MessageRecord, NewConnection } from "../types.js";
import { DAY_MS, localDate, localMonth } from "../utils/dates.js";
import { fallbackNameFromContactKey, pickDisplayName } from "../utils/displayName.js";
import { compareKeys, partitionByContact } from "../utils/messages.js";
import { round } from "../utils/stats.js";

type HealthOptions = AnalysisConfig["health"];

const FADING_MIN_RECENT_HISTORY = 30; // messages in the last two years
const FADING_MIN_BASELINE_MESSAGES = 15;
const NEW_RECENT_DAYS = 30;
const NEW_BASELINE_DAYS = 180;
const NEW_MIN_KNOWN_DAYS = 60;
const REVIVED_MAX_BASELINE_RATE = 0.2;
const REVIVED_MIN_RECENT_RATE = 0.5;
const GROWING_MIN_FACTOR = 5;

const perWeek = (count: number, days: number) => (count / days) * 7;

function countBetween(list: readonly MessageRecord[], from: number, until: number = Infinity): number {
  let n = 0;
  for (const m of list) if (m.ts >= from && m.ts < until) n++;
  return n;
}

function nameOf(contactKey: string, list: readonly MessageRecord[]): string {
  return pickDisplayName(list) ?? fallbackNameFromContactKey(contactKey);
}

/**
 * Contacts that used to talk regularly and have dropped well below their own
 * baseline. The baseline is the year before last; when that is too thin the
 * six months before the last quarter stand in for it.
 */
export function detectFadingConnections(
  messages: readonly MessageRecord[],
  referenceTs: number,
  timeZone: string,
  opts: HealthOptions
): FadingConnection[] {
  const daysAgo = (d: number) => referenceTs - d * DAY_MS;
  const out: { row: FadingConnection; drop: number }[] = [];

  for (const [contactKey, list] of partitionByContact(messages)) {
    if (list.length < opts.fadingMinMessages) continue;
    const last = list[list.length - 1];
    const daysSinceContact = Math.floor((referenceTs - last.ts) / DAY_MS);
    if (daysSinceContact > opts.fadingMaxInactiveDays) continue;

    const activeMonths = new Set(list.map((m) => localMonth(m.ts, timeZone))).size;
    if (activeMonths < opts.fadingMinActiveMonths) continue;
    if (countBetween(list, daysAgo(730)) < FADING_MIN_RECENT_HISTORY) continue;

    let baselineRate: number;
    const priorYear = countBetween(list, daysAgo(730), daysAgo(365));
    if (priorYear >= FADING_MIN_BASELINE_MESSAGES) {
      baselineRate = perWeek(priorYear, 365);
    } else {
      const priorHalf = countBetween(list, daysAgo(270), daysAgo(90));
      if (priorHalf < FADING_MIN_BASELINE_MESSAGES) continue;
      baselineRate = perWeek(priorHalf, 180);
    }
    const recentRate = perWeek(countBetween(list, daysAgo(90)), 90);
    if (baselineRate < opts.fadingMinBaselineRate || recentRate >= baselineRate * opts.fadingDropRatio) continue;

    const drop = (1 - recentRate / baselineRate) * 100;
    out.push({
      drop,
      row: {
        contactKey,
        displayName: nameOf(contactKey, list),
        totalMessages: list.length,
        activeMonths,
        baselineRate: round(baselineRate, 1),
        recentRate: round(recentRate, 1),
        dropPercentage: round(drop, 1),
        daysSinceContact,
        lastContactDate: localDate(last.ts, timeZone),
      },
    });
  }

  return out
    .sort((a, b) => b.drop - a.drop || compareKeys(a.row.contactKey, b.row.contactKey))
    .slice(0, opts.limit)
    .map((c) => c.row);
}

/**
 * Known contacts (first seen at least two months back) that are suddenly
 * busy: "revived" after a near-silent half year, or "growing" to several
 * times their earlier weekly rate.
 */
export function detectNewConnections(
  messages: readonly MessageRecord[],
  referenceTs: number,
  opts: HealthOptions
): NewConnection[] {
  const recentFrom = referenceTs - NEW_RECENT_DAYS * DAY_MS;
  const baselineFrom = recentFrom - NEW_BASELINE_DAYS * DAY_MS;
  const out: { row: NewConnection; rate: number }[] = [];

  for (const [contactKey, list] of partitionByContact(messages)) {
    const first = list[0];
    const last = list[list.length - 1];
    if (Math.floor((referenceTs - last.ts) / DAY_MS) > NEW_RECENT_DAYS) continue;
    const relationshipDays = Math.floor((referenceTs - first.ts) / DAY_MS);
    if (relationshipDays < NEW_MIN_KNOWN_DAYS) continue;

    const recentMessages = countBetween(list, recentFrom);
    if (recentMessages < opts.newMinRecentMessages) continue;
    const baselineRate = perWeek(countBetween(list, baselineFrom, recentFrom), NEW_BASELINE_DAYS);
    const recentRate = perWeek(recentMessages, NEW_RECENT_DAYS);

    let kind: NewConnection["kind"];
    let growthFactor: number | null = null;
    if (baselineRate < REVIVED_MAX_BASELINE_RATE) {
      if (recentRate < REVIVED_MIN_RECENT_RATE) continue;
      kind = "revived";
    } else {
      if (recentRate < baselineRate * GROWING_MIN_FACTOR) continue;
      kind = "growing";
      growthFactor = round(recentRate / baselineRate, 1);
    }

    out.push({
      rate: recentRate,
      row: {
        contactKey,
        displayName: nameOf(contactKey, list),
        kind,
        totalMessages: list.length,
        recentMessages,
        baselineRate: round(baselineRate, 1),
        recentRate: round(recentRate, 1),
        growthFactor,
        relationshipDays,
      },
    });
  }

  return out
    .sort((a, b) => b.rate - a.rate || compareKeys(a.row.contactKey, b.row.contactKey))
    .slice(0, opts.limit)
    .map((c) => c.row);
}
