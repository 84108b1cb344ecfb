import type { LinkDomainRow, MessageRecord } from "../types.js";
import { compareKeys, hasText } from "../utils/messages.js";

const URL_REGEX = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;

export function extractUrls(text: string): string[] {
  return text.match(URL_REGEX) ?? [];
}

// Lowercase host without a leading "www."; null for anything URL cannot parse.
export function linkDomain(url: string): string | null {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    return null;
  }
  const domain = host.toLowerCase().replace(/^www\./, "");
  return domain || null;
}

export function sharedLinkDomains(messages: readonly MessageRecord[], limit: number): LinkDomainRow[] {
  const byDomain = new Map<string, LinkDomainRow>();
  for (const m of messages) {
    if (!hasText(m)) continue;
    for (const url of extractUrls(m.text)) {
      const domain = linkDomain(url);
      if (!domain) continue;
      const row = byDomain.get(domain) ?? { domain, total: 0, sent: 0, received: 0 };
      row.total++;
      if (m.fromMe) row.sent++;
      else row.received++;
      byDomain.set(domain, row);
    }
  }
  return [...byDomain.values()]
    .sort((a, b) => b.total - a.total || compareKeys(a.domain, b.domain))
    .slice(0, limit);
}
