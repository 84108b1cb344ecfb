import type { ConversationSummary, MessageRecord, MessageSegment } from "../types.js";
import { HOUR_MS } from "../utils/dates.js";
import { partitionByContact } from "../utils/messages.js";

/**
 * Marks every message with the time since the previous message in the same
 * contact partition and whether it opens a new conversation. The first
 * message of a contact always opens one; after that a start needs a silence
 * strictly longer than `gapHours`.
 */
export function segmentConversations(messages: readonly MessageRecord[], gapHours: number): MessageSegment[] {
  const gapMs = gapHours * HOUR_MS;
  const segments: MessageSegment[] = [];
  for (const [contactKey, list] of partitionByContact(messages)) {
    let prevTs: number | null = null;
    for (const m of list) {
      const elapsedMs = prevTs === null ? null : m.ts - prevTs;
      segments.push({
        messageId: m.id,
        contactKey,
        fromMe: m.fromMe,
        ts: m.ts,
        elapsedMs,
        isConversationStart: elapsedMs === null || elapsedMs > gapMs,
      });
      prevTs = m.ts;
    }
  }
  return segments;
}

export function summarizeConversations(segments: readonly MessageSegment[]): Map<string, ConversationSummary> {
  const byContact = new Map<string, ConversationSummary>();
  for (const s of segments) {
    if (!s.isConversationStart) continue;
    let summary = byContact.get(s.contactKey);
    if (!summary) {
      summary = { contactKey: s.contactKey, conversations: 0, ownerInitiated: 0, contactInitiated: 0 };
      byContact.set(s.contactKey, summary);
    }
    summary.conversations++;
    if (s.fromMe) summary.ownerInitiated++;
    else summary.contactInitiated++;
  }
  return byContact;
}
