import type { MessageRecord } from "../types.js";

const idCollator = new Intl.Collator("en", { numeric: true });

// Send order: timestamp, then id.
export function compareMessages(a: MessageRecord, b: MessageRecord): number {
  return a.ts - b.ts || idCollator.compare(a.id, b.id);
}

export function sortMessages(messages: readonly MessageRecord[]): MessageRecord[] {
  return [...messages].sort(compareMessages);
}

/** Groups by contact key; each partition comes back in send order. */
export function partitionByContact(messages: readonly MessageRecord[]): Map<string, MessageRecord[]> {
  const byContact = new Map<string, MessageRecord[]>();
  for (const m of sortMessages(messages)) {
    let list = byContact.get(m.contactKey);
    if (!list) {
      list = [];
      byContact.set(m.contactKey, list);
    }
    list.push(m);
  }
  return byContact;
}

export function hasText(m: MessageRecord): m is MessageRecord & { text: string } {
  return typeof m.text === "string" && m.text.trim().length > 0;
}

export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
