import type { MessageRecord } from "../types.js";
import { localYear } from "../utils/dates.js";
import { compareKeys, hasText, sortMessages } from "../utils/messages.js";
import { normalizeText } from "../utils/text.js";

export type TextCorpusPartition = {
  key: string;
  documents: string[]; // one normalized document per message
};

function partitionSentText(
  messages: readonly MessageRecord[],
  keyOf: (m: MessageRecord) => string
): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const m of sortMessages(messages)) {
    if (!m.fromMe || !hasText(m)) continue;
    const key = keyOf(m);
    let docs = out.get(key);
    if (!docs) {
      docs = [];
      out.set(key, docs);
    }
    docs.push(normalizeText(m.text));
  }
  return out;
}

export function corpusByYear(messages: readonly MessageRecord[], timeZone: string): TextCorpusPartition[] {
  const byYear = partitionSentText(messages, (m) => String(localYear(m.ts, timeZone)));
  return [...byYear.entries()]
    .map(([key, documents]) => ({ key, documents }))
    .sort((a, b) => Number(a.key) - Number(b.key));
}

/** Contact partitions, largest first; `limit` keeps the busiest contacts only. */
export function corpusByContact(messages: readonly MessageRecord[], limit?: number): TextCorpusPartition[] {
  const byContact = partitionSentText(messages, (m) => m.contactKey);
  const sorted = [...byContact.entries()]
    .map(([key, documents]) => ({ key, documents }))
    .sort((a, b) => b.documents.length - a.documents.length || compareKeys(a.key, b.key));
  return typeof limit === "number" ? sorted.slice(0, limit) : sorted;
}
