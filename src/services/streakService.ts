import type { LocalDate, MessageRecord, StreakRecord } from "../types.js";
import { daysBetween, localDate } from "../utils/dates.js";
import { compareKeys } from "../utils/messages.js";

/**
 * Longest run of consecutive dates. Any gap other than exactly one day opens
 * a new streak; equal lengths keep the earlier run. Returns null for no dates.
 */
export function longestStreak(dates: Iterable<LocalDate>): Omit<StreakRecord, "contactKey"> | null {
  const sorted = [...new Set(dates)].sort();
  let best: Omit<StreakRecord, "contactKey"> | null = null;
  let start: LocalDate | null = null;
  let prev: LocalDate | null = null;
  let length = 0;

  const close = () => {
    if (start === null || prev === null) return;
    if (!best || length > best.length) best = { startDate: start, endDate: prev, length };
  };

  for (const date of sorted) {
    if (prev === null || daysBetween(prev, date) !== 1) {
      close();
      start = date;
      length = 0;
    }
    length++;
    prev = date;
  }
  close();
  return best;
}

// Only days on which the owner sent at least one message count.
export function computeLongestStreaks(messages: readonly MessageRecord[], timeZone: string): StreakRecord[] {
  const datesByContact = new Map<string, Set<LocalDate>>();
  for (const m of messages) {
    if (!m.fromMe) continue;
    let dates = datesByContact.get(m.contactKey);
    if (!dates) {
      dates = new Set();
      datesByContact.set(m.contactKey, dates);
    }
    dates.add(localDate(m.ts, timeZone));
  }

  const out: StreakRecord[] = [];
  for (const [contactKey, dates] of datesByContact) {
    const streak = longestStreak(dates);
    if (streak) out.push({ contactKey, ...streak });
  }
  return out.sort(
    (a, b) => b.length - a.length || compareKeys(a.startDate, b.startDate) || compareKeys(a.contactKey, b.contactKey)
  );
}
