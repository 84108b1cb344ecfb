import type { AnalysisConfig } from "../config.js";
import type { MessageRecord } from "../types.js";

export type ContactFilterResult = {
  messages: MessageRecord[];
  excluded: string[];
  oneSided: string[];
};

/**
 * Drops contacts named in `excludedContacts` (matched on key or display name,
 * case-insensitive) and contacts whose sent share falls outside
 * [minTwoWayRatio, 1 - minTwoWayRatio], which are mostly notification senders.
 */
export function filterContacts(
  messages: readonly MessageRecord[],
  opts: Pick<AnalysisConfig, "excludedContacts" | "minTwoWayRatio">
): ContactFilterResult {
  const blocked = new Set(opts.excludedContacts.map((c) => c.trim().toLowerCase()).filter(Boolean));
  const excluded = new Set<string>();
  const tallies = new Map<string, { total: number; sent: number }>();

  for (const m of messages) {
    const name = m.displayName?.trim().toLowerCase();
    if (blocked.has(m.contactKey.toLowerCase()) || (name && blocked.has(name))) {
      excluded.add(m.contactKey);
    }
    const t = tallies.get(m.contactKey) ?? { total: 0, sent: 0 };
    t.total++;
    if (m.fromMe) t.sent++;
    tallies.set(m.contactKey, t);
  }

  const oneSided = new Set<string>();
  if (opts.minTwoWayRatio > 0) {
    for (const [contactKey, t] of tallies) {
      if (excluded.has(contactKey)) continue;
      const share = t.sent / t.total;
      if (share < opts.minTwoWayRatio || share > 1 - opts.minTwoWayRatio) oneSided.add(contactKey);
    }
  }

  return {
    messages: messages.filter((m) => !excluded.has(m.contactKey) && !oneSided.has(m.contactKey)),
    excluded: [...excluded].sort(),
    oneSided: [...oneSided].sort(),
  };
}
