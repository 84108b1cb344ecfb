import type { AnalysisConfig } from "../config.js";
import type {
  ContactRelationshipMetrics,
  MessageRecord,
  MessageSegment,
  RelationshipTables,
} from "../types.js";
import { HOUR_MS } from "../utils/dates.js";
import { fallbackNameFromContactKey, pickDisplayName } from "../utils/displayName.js";
import { compareKeys, partitionByContact } from "../utils/messages.js";
import { median } from "../utils/stats.js";
import { summarizeConversations } from "./conversationService.js";

type RelationshipOptions = Pick<
  AnalysisConfig,
  "balanceEpsilon" | "minMessagesForBalance" | "minConversationsForInitiation" | "maxReplyLatencyHours"
>;

export function balanceRatio(sent: number, received: number, epsilon: number): number {
  return sent / (received + epsilon);
}

/**
 * A reply is a message whose direction differs from the one right before it.
 * Gaps of zero or less (clock anomalies) and gaps of `maxLatencyMs` or more
 * (a new conversation, not an answer) are dropped.
 */
export function computeReplyLatencies(
  sorted: readonly MessageRecord[],
  maxLatencyMs: number
): { ownerReplies: number[]; contactReplies: number[] } {
  const ownerReplies: number[] = [];
  const contactReplies: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    if (!prev || !cur || prev.fromMe === cur.fromMe) continue;
    const latency = cur.ts - prev.ts;
    if (latency <= 0 || latency >= maxLatencyMs) continue;
    if (cur.fromMe) ownerReplies.push(latency);
    else contactReplies.push(latency);
  }
  return { ownerReplies, contactReplies };
}

export function computeRelationshipMetrics(
  messages: readonly MessageRecord[],
  segments: readonly MessageSegment[],
  opts: RelationshipOptions
): RelationshipTables {
  const conversations = summarizeConversations(segments);
  const maxLatencyMs = opts.maxReplyLatencyHours * HOUR_MS;
  const contacts: ContactRelationshipMetrics[] = [];

  for (const [contactKey, list] of partitionByContact(messages)) {
    const sent = list.reduce((n, m) => n + (m.fromMe ? 1 : 0), 0);
    const received = list.length - sent;
    const conv = conversations.get(contactKey);
    const { ownerReplies, contactReplies } = computeReplyLatencies(list, maxLatencyMs);
    const conversationCount = conv?.conversations ?? 0;

    contacts.push({
      contactKey,
      displayName: pickDisplayName(list) ?? fallbackNameFromContactKey(contactKey),
      total: list.length,
      sent,
      received,
      balanceRatio: balanceRatio(sent, received, opts.balanceEpsilon),
      conversations: conversationCount,
      ownerInitiated: conv?.ownerInitiated ?? 0,
      contactInitiated: conv?.contactInitiated ?? 0,
      initiationShare: conversationCount > 0 ? (conv?.ownerInitiated ?? 0) / conversationCount : null,
      medianOwnerReplyMs: median(ownerReplies),
      medianContactReplyMs: median(contactReplies),
      ownerReplyCount: ownerReplies.length,
      contactReplyCount: contactReplies.length,
    });
  }

  contacts.sort((a, b) => b.total - a.total || compareKeys(a.contactKey, b.contactKey));

  const balance = contacts
    .filter((c) => c.total >= opts.minMessagesForBalance)
    .sort((a, b) => b.balanceRatio - a.balanceRatio || compareKeys(a.contactKey, b.contactKey));

  const initiation = contacts
    .filter((c) => c.conversations >= opts.minConversationsForInitiation && c.initiationShare !== null)
    .sort((a, b) => (b.initiationShare ?? 0) - (a.initiationShare ?? 0) || compareKeys(a.contactKey, b.contactKey));

  const responseTimes = contacts.filter((c) => c.medianOwnerReplyMs !== null || c.medianContactReplyMs !== null);

  return { contacts, balance, initiation, responseTimes };
}
