import { describe, it, expect } from "vitest";
import {
  type Queryable,
  describeMessageTable,
  isGroupOrBroadcast,
  loadMessages,
  rowToMessage,
} from "../sources/messageStore.js";

describe("rowToMessage", () => {
  it("maps a received row", () => {
    expect(
      rowToMessage({ id: 7, chat_id: "+15550100001", sender: "Alice", content: "hi", ts: "1700000000000", role: "them" })
    ).toEqual({
      id: "7",
      contactKey: "+15550100001",
      displayName: "Alice",
      fromMe: false,
      ts: 1_700_000_000_000,
      text: "hi",
    });
  });

  it("marks the owner's rows and drops their sender name", () => {
    const m = rowToMessage({ id: "8", chat_id: "+15550100001", sender: "Me", content: null, ts: 5, role: "ME" });
    expect(m).toEqual({ id: "8", contactKey: "+15550100001", displayName: null, fromMe: true, ts: 5, text: null });
  });

  it("rejects rows without a chat or a usable timestamp", () => {
    expect(rowToMessage({ id: 1, chat_id: null, sender: null, content: "x", ts: 5, role: "me" })).toBeNull();
    expect(rowToMessage({ id: 1, chat_id: "a", sender: null, content: "x", ts: "abc", role: "me" })).toBeNull();
    expect(rowToMessage({ id: 1, chat_id: "a", sender: null, content: "x", ts: null, role: "me" })).toBeNull();
  });
});

describe("isGroupOrBroadcast", () => {
  it("recognises group and broadcast keys", () => {
    expect(isGroupOrBroadcast("12345@g.us")).toBe(true);
    expect(isGroupOrBroadcast("status@broadcast")).toBe(true);
    expect(isGroupOrBroadcast("alice@example.com")).toBe(false);
    expect(isGroupOrBroadcast("+15550100001")).toBe(false);
  });
});

function fakeDb(rows: unknown[]) {
  const calls: { text: string; values?: unknown[] }[] = [];
  const db: Queryable = {
    query: async (text, values) => {
      calls.push({ text, values });
      return { rows };
    },
  };
  return { db, calls };
}

describe("loadMessages", () => {
  const rows = [
    { id: 1, chat_id: "+15550100001", sender: "Alice", content: "hi", ts: "1000", role: "them" },
    { id: 2, chat_id: "120363@g.us", sender: "Group", content: "hello all", ts: "2000", role: "them" },
    { id: 3, chat_id: null, sender: null, content: "x", ts: "3000", role: "me" },
    { id: { nested: true }, chat_id: "+15550100001", sender: null, content: "y", ts: "4000", role: "me" },
  ];

  it("binds the time bounds and keeps only usable direct-chat rows", async () => {
    const { db, calls } = fakeDb(rows);
    const out = await loadMessages(db, { sinceTs: 500 });
    expect(calls[0].values).toEqual([500, null]);
    expect(out).toEqual([
      { id: "1", contactKey: "+15550100001", displayName: "Alice", fromMe: false, ts: 1000, text: "hi" },
    ]);
  });

  it("keeps group rows when asked to", async () => {
    const { db } = fakeDb(rows);
    const out = await loadMessages(db, { includeGroups: true });
    expect(out.map((m) => m.contactKey)).toEqual(["+15550100001", "120363@g.us"]);
  });
});

describe("describeMessageTable", () => {
  it("reports the row count and time span", async () => {
    const { db, calls } = fakeDb([{ count: "42", first_ts: "1000", last_ts: "5000" }]);
    expect(await describeMessageTable(db)).toEqual({ messages: 42, firstTs: 1000, lastTs: 5000 });
    expect(calls[0].text).toContain("FROM messages");
  });

  it("reports an empty table", async () => {
    const { db } = fakeDb([{ count: "0", first_ts: null, last_ts: null }]);
    expect(await describeMessageTable(db)).toEqual({ messages: 0, firstTs: null, lastTs: null });
  });

  it("passes on a failing query", async () => {
    const db: Queryable = {
      query: async () => {
        throw new Error('relation "messages" does not exist');
      },
    };
    await expect(describeMessageTable(db)).rejects.toThrow('relation "messages" does not exist');
  });
});
