import { z } from "zod";
import type { MessageRecord } from "../types.js";

/** The slice of a pg Pool or Client the reader needs. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

const messageRowSchema = z.object({
  id: z.union([z.string(), z.number()]),
  chat_id: z.string().nullable(),
  sender: z.string().nullable(),
  content: z.string().nullable(),
  ts: z.union([z.string(), z.number()]).nullable(),
  role: z.string().nullable(),
});

export type MessageRow = z.infer<typeof messageRowSchema>;

// count(*), min() and max() arrive as strings for bigint columns.
const tableStatsSchema = z.object({
  count: z.coerce.number().int().nonnegative(),
  first_ts: z.coerce.number().nullable(),
  last_ts: z.coerce.number().nullable(),
});

export type MessageTableStats = {
  messages: number;
  firstTs: number | null;
  lastTs: number | null;
};

export type LoadMessagesOptions = {
  sinceTs?: number;
  untilTs?: number;
  includeGroups?: boolean;
};

// Multi-party threads and broadcast lists are keyed with these suffixes.
export function isGroupOrBroadcast(contactKey: string): boolean {
  return contactKey.endsWith("@g.us") || contactKey.includes("@broadcast");
}

export function rowToMessage(r: MessageRow): MessageRecord | null {
  const ts = r.ts !== null ? Number(r.ts) : NaN;
  if (!r.chat_id || !Number.isFinite(ts)) return null;
  const fromMe = (r.role ?? "").toLowerCase() === "me";
  return {
    id: String(r.id),
    contactKey: r.chat_id,
    displayName: fromMe ? null : r.sender,
    fromMe,
    ts,
    text: r.content,
  };
}

/**
 * Reads the whole message collection (optionally bounded by time) in send
 * order. The analysis engine never touches the database itself.
 */
export async function loadMessages(db: Queryable, opts: LoadMessagesOptions = {}): Promise<MessageRecord[]> {
  const res = await db.query(
    `
    SELECT id, chat_id, sender, content, ts, role
    FROM messages
    WHERE ($1::bigint IS NULL OR ts >= $1)
      AND ($2::bigint IS NULL OR ts < $2)
    ORDER BY chat_id ASC, ts ASC, id ASC
    `,
    [opts.sinceTs ?? null, opts.untilTs ?? null]
  );
  const out: MessageRecord[] = [];
  let skipped = 0;
  let groups = 0;
  for (const raw of res.rows) {
    const parsed = messageRowSchema.safeParse(raw);
    const m = parsed.success ? rowToMessage(parsed.data) : null;
    if (!m) {
      skipped++;
      continue;
    }
    if (!opts.includeGroups && isGroupOrBroadcast(m.contactKey)) {
      groups++;
      continue;
    }
    out.push(m);
  }
  if (skipped) console.warn("[messageStore] skipped malformed rows", { skipped });
  if (groups) console.info("[messageStore] left out group and broadcast rows", { groups });
  return out;
}

/** Row count and time span of the messages table; throws when it is missing. */
export async function describeMessageTable(db: Queryable): Promise<MessageTableStats> {
  const res = await db.query("SELECT count(*) AS count, min(ts) AS first_ts, max(ts) AS last_ts FROM messages");
  const stats = tableStatsSchema.parse(res.rows[0] ?? { count: 0, first_ts: null, last_ts: null });
  return { messages: stats.count, firstTs: stats.first_ts, lastTs: stats.last_ts };
}
