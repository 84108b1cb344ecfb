import type { MessageRecord, MonthlyVolumeRow, QuestionRatioRow, YearActiveDays, YearVolume } from "../types.js";
import { localDate, localMonth, localYear } from "../utils/dates.js";
import { compareKeys, hasText } from "../utils/messages.js";

export function computeYearlyVolume(messages: readonly MessageRecord[], timeZone: string): YearVolume[] {
  const byYear = new Map<number, YearVolume>();
  for (const m of messages) {
    const year = localYear(m.ts, timeZone);
    const row = byYear.get(year) ?? { year, total: 0, sent: 0, received: 0 };
    row.total++;
    if (m.fromMe) row.sent++;
    else row.received++;
    byYear.set(year, row);
  }
  return [...byYear.values()].sort((a, b) => a.year - b.year);
}

// Month-by-month totals for the given contacts; months with no messages are absent.
export function computeMonthlyVolume(
  messages: readonly MessageRecord[],
  timeZone: string,
  contactKeys: readonly string[]
): MonthlyVolumeRow[] {
  const wanted = new Set(contactKeys);
  const rows = new Map<string, MonthlyVolumeRow>();
  for (const m of messages) {
    if (!wanted.has(m.contactKey)) continue;
    const month = localMonth(m.ts, timeZone);
    const id = `${month}|${m.contactKey}`;
    const row = rows.get(id) ?? { month, contactKey: m.contactKey, total: 0 };
    row.total++;
    rows.set(id, row);
  }
  return [...rows.values()].sort((a, b) => compareKeys(a.month, b.month) || compareKeys(a.contactKey, b.contactKey));
}

export function computeActiveDaysByYear(messages: readonly MessageRecord[], timeZone: string): YearActiveDays[] {
  const days = new Map<number, Set<string>>();
  for (const m of messages) {
    if (!m.fromMe) continue;
    const date = localDate(m.ts, timeZone);
    const year = Number(date.slice(0, 4));
    let set = days.get(year);
    if (!set) {
      set = new Set();
      days.set(year, set);
    }
    set.add(date);
  }
  return [...days.entries()].map(([year, set]) => ({ year, activeDays: set.size })).sort((a, b) => a.year - b.year);
}

function tallyQuestions(messages: readonly MessageRecord[], keyOf: (m: MessageRecord) => string): Map<string, QuestionRatioRow> {
  const rows = new Map<string, QuestionRatioRow>();
  for (const m of messages) {
    if (!m.fromMe || !hasText(m)) continue;
    const key = keyOf(m);
    const row = rows.get(key) ?? { key, total: 0, questions: 0, questionShare: 0 };
    row.total++;
    if (m.text.includes("?")) row.questions++;
    rows.set(key, row);
  }
  for (const row of rows.values()) row.questionShare = row.total ? row.questions / row.total : 0;
  return rows;
}

export function computeQuestionRatioByYear(messages: readonly MessageRecord[], timeZone: string): QuestionRatioRow[] {
  return [...tallyQuestions(messages, (m) => String(localYear(m.ts, timeZone))).values()].sort((a, b) =>
    compareKeys(a.key, b.key)
  );
}

export function computeQuestionRatioByContact(messages: readonly MessageRecord[], minMessages: number): QuestionRatioRow[] {
  return [...tallyQuestions(messages, (m) => m.contactKey).values()]
    .filter((r) => r.total >= minMessages)
    .sort((a, b) => b.questionShare - a.questionShare || compareKeys(a.key, b.key));
}
