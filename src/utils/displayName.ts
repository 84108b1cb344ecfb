import type { MessageRecord } from "../types.js";

// Most frequent non-empty display name on the contact's messages.
export function pickDisplayName(messages: readonly MessageRecord[]): string | null {
  const counts = new Map<string, number>();
  for (const m of messages) {
    const name = m.displayName?.trim();
    if (!name) continue;
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  let best: { name: string; count: number } | null = null;
  for (const [name, count] of counts.entries()) {
    if (!best || count > best.count) best = { name, count };
  }
  return best?.name ?? null;
}

// Fallback name from a contact key (shorten phone if possible)
export function fallbackNameFromContactKey(contactKey: string): string {
  if (!contactKey) return "unknown";
  if (/@/.test(contactKey)) return contactKey.split("@")[0] || contactKey;
  if (/^\+?\d{6,}$/.test(contactKey)) return `${contactKey.slice(0, 3)}…${contactKey.slice(-2)}`;
  return contactKey;
}
