import emojiRegex from "emoji-regex";
import type { ContactEmojiRow, MessageRecord, YearEmojiRow } from "../types.js";
import { localYear } from "../utils/dates.js";
import { compareKeys, hasText } from "../utils/messages.js";
import { competitionRanks } from "../utils/stats.js";

const EMOJI_REGEX = emojiRegex();

/** Emoji in order of appearance; modifier and ZWJ sequences count as one. */
export function extractEmojis(text: string): string[] {
  return text.match(EMOJI_REGEX) ?? [];
}

function tallyEmojis<K>(messages: readonly MessageRecord[], keyOf: (m: MessageRecord) => K | null): Map<K, Map<string, number>> {
  const tallies = new Map<K, Map<string, number>>();
  for (const m of messages) {
    if (!hasText(m)) continue;
    const key = keyOf(m);
    if (key === null) continue;
    const found = extractEmojis(m.text);
    if (!found.length) continue;
    let counts = tallies.get(key);
    if (!counts) {
      counts = new Map();
      tallies.set(key, counts);
    }
    for (const e of found) counts.set(e, (counts.get(e) ?? 0) + 1);
  }
  return tallies;
}

// Ties share a rank, so a group can return more than maxRank rows.
function rankedWithin(counts: Map<string, number>, maxRank: number) {
  const tallies = [...counts.entries()].map(([emoji, count]) => ({ emoji, count }));
  return competitionRanks(tallies, (t) => t.count, (a, b) => compareKeys(a.emoji, b.emoji))
    .filter((r) => r.rank <= maxRank)
    .map(({ item, rank }) => ({ emoji: item.emoji, count: item.count, rank }));
}

// Both directions count towards a year.
export function topEmojisByYear(messages: readonly MessageRecord[], timeZone: string, maxRank: number): YearEmojiRow[] {
  const byYear = tallyEmojis(messages, (m) => localYear(m.ts, timeZone));
  return [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .flatMap(([year, counts]) => rankedWithin(counts, maxRank).map((r): YearEmojiRow => ({ year, ...r })));
}

// Only what the owner sent to each contact.
export function topEmojisByContact(messages: readonly MessageRecord[], maxRank: number): ContactEmojiRow[] {
  const byContact = tallyEmojis(messages, (m) => (m.fromMe ? m.contactKey : null));
  return [...byContact.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .flatMap(([contactKey, counts]) =>
      rankedWithin(counts, maxRank).map((r): ContactEmojiRow => ({ contactKey, ...r }))
    );
}
