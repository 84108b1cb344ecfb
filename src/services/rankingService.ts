import type {
  ContactTrajectory,
  MessageRecord,
  RankChange,
  TopContact,
  YearTransition,
  YearlyRanking,
} from "../types.js";
import { localYear } from "../utils/dates.js";
import { fallbackNameFromContactKey, pickDisplayName } from "../utils/displayName.js";
import { compareKeys, partitionByContact } from "../utils/messages.js";
import { competitionRanks } from "../utils/stats.js";

export type RisingOptions = { floor: number; top: number };
export type FadedOptions = { top: number; floor: number };

type Tally = { total: number; sent: number };

/**
 * Per calendar year, contacts ranked by total messages descending with
 * competition ranking: 100, 100, 50 ranks as 1, 1, 3. Rows come back ordered
 * by year, rank, then contact key.
 */
export function computeYearlyRankings(messages: readonly MessageRecord[], timeZone: string): YearlyRanking[] {
  const byYear = new Map<number, Map<string, Tally>>();
  for (const m of messages) {
    const year = localYear(m.ts, timeZone);
    let contacts = byYear.get(year);
    if (!contacts) {
      contacts = new Map();
      byYear.set(year, contacts);
    }
    const tally = contacts.get(m.contactKey) ?? { total: 0, sent: 0 };
    tally.total++;
    if (m.fromMe) tally.sent++;
    contacts.set(m.contactKey, tally);
  }

  const rows: YearlyRanking[] = [];
  for (const year of [...byYear.keys()].sort((a, b) => a - b)) {
    const entries = [...(byYear.get(year) ?? new Map<string, Tally>()).entries()];
    const ranked = competitionRanks(entries, ([, t]) => t.total, ([a], [b]) => compareKeys(a, b));
    for (const { item: [contactKey, tally], rank } of ranked) {
      rows.push({
        year,
        contactKey,
        total: tally.total,
        sent: tally.sent,
        received: tally.total - tally.sent,
        rank,
      });
    }
  }
  return rows;
}

function ranksForYear(rankings: readonly YearlyRanking[], year: number): Map<string, number> {
  const out = new Map<string, number>();
  for (const r of rankings) if (r.year === year) out.set(r.contactKey, r.rank);
  return out;
}

function contactsIn(...maps: Map<string, number>[]): string[] {
  const keys = new Set<string>();
  for (const m of maps) for (const k of m.keys()) keys.add(k);
  return [...keys];
}

// Missing from Y1 (or below the floor) and inside the top tier in Y2.
export function findRising(
  rankings: readonly YearlyRanking[],
  fromYear: number,
  toYear: number,
  opts: RisingOptions
): RankChange[] {
  const y1 = ranksForYear(rankings, fromYear);
  const y2 = ranksForYear(rankings, toYear);
  const out: RankChange[] = [];
  for (const contactKey of contactsIn(y1, y2)) {
    const fromRank = y1.get(contactKey) ?? null;
    const toRank = y2.get(contactKey) ?? null;
    const wasLow = fromRank === null || fromRank > opts.floor;
    if (wasLow && toRank !== null && toRank <= opts.top) {
      out.push({ contactKey, fromYear, toYear, fromRank, toRank });
    }
  }
  return out.sort((a, b) => (a.toRank ?? 0) - (b.toRank ?? 0) || compareKeys(a.contactKey, b.contactKey));
}

export function findFaded(
  rankings: readonly YearlyRanking[],
  fromYear: number,
  toYear: number,
  opts: FadedOptions
): RankChange[] {
  const y1 = ranksForYear(rankings, fromYear);
  const y2 = ranksForYear(rankings, toYear);
  const out: RankChange[] = [];
  for (const [contactKey, fromRank] of y1) {
    if (fromRank > opts.top) continue;
    const toRank = y2.get(contactKey) ?? null;
    if (toRank === null || toRank > opts.floor) {
      out.push({ contactKey, fromYear, toYear, fromRank, toRank });
    }
  }
  return out.sort((a, b) => (a.fromRank ?? 0) - (b.fromRank ?? 0) || compareKeys(a.contactKey, b.contactKey));
}

export function consecutiveYearTransitions(
  rankings: readonly YearlyRanking[],
  rising: RisingOptions,
  faded: FadedOptions
): YearTransition[] {
  const years = [...new Set(rankings.map((r) => r.year))].sort((a, b) => a - b);
  const out: YearTransition[] = [];
  for (let i = 1; i < years.length; i++) {
    const fromYear = years[i - 1];
    const toYear = years[i];
    if (fromYear === undefined || toYear === undefined) continue;
    out.push({
      fromYear,
      toYear,
      rising: findRising(rankings, fromYear, toYear, rising),
      faded: findFaded(rankings, fromYear, toYear, faded),
    });
  }
  return out;
}

/** Bump-chart data: a contact's ranked years in order; unranked years are simply absent. */
export function rankingTrajectories(rankings: readonly YearlyRanking[], contacts: readonly string[]): ContactTrajectory[] {
  return contacts.map((contactKey) => ({
    contactKey,
    points: rankings
      .filter((r) => r.contactKey === contactKey)
      .sort((a, b) => a.year - b.year)
      .map((r) => ({ year: r.year, rank: r.rank, total: r.total })),
  }));
}

export function computeTopContacts(messages: readonly MessageRecord[], limit: number, timeZone: string): TopContact[] {
  const out: TopContact[] = [];
  for (const [contactKey, list] of partitionByContact(messages)) {
    const first = list[0];
    const last = list[list.length - 1];
    if (!first || !last) continue;
    const sent = list.filter((m) => m.fromMe).length;
    out.push({
      contactKey,
      displayName: pickDisplayName(list) ?? fallbackNameFromContactKey(contactKey),
      total: list.length,
      sent,
      received: list.length - sent,
      yearsActive: new Set(list.map((m) => localYear(m.ts, timeZone))).size,
      firstTs: first.ts,
      lastTs: last.ts,
    });
  }
  out.sort((a, b) => b.total - a.total || compareKeys(a.contactKey, b.contactKey));
  return out.slice(0, limit);
}
