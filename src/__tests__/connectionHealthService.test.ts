import { describe, it, expect } from "vitest";
import { parseAnalysisConfig } from "../config.js";
import { detectFadingConnections, detectNewConnections } from "../services/connectionHealthService.js";
import type { MessageRecord } from "../types.js";
import { DAY_MS } from "../utils/dates.js";
import { TEST_BOILERPLATE, msg } from "./helpers.js";

const health = parseAnalysisConfig({ boilerplate: TEST_BOILERPLATE }).health;
const REF = Date.parse("2024-12-31T12:00:00Z");

const ago = (days: number) => new Date(REF - days * DAY_MS).toISOString();

// One message every `step` days, from `fromDays` ago down to `toDays` ago.
function every(contactKey: string, step: number, fromDays: number, toDays: number, name: string | null = null): MessageRecord[] {
  const out: MessageRecord[] = [];
  for (let d = fromDays; d >= toDays; d -= step) out.push(msg(contactKey, out.length % 2 === 0, ago(d), "hey", name));
  return out;
}

describe("detectFadingConnections", () => {
  const messages = [
    // 60 messages across the year before last, then one 10 days ago
    ...every("dana", 5, 700, 405, "Dana"),
    msg("dana", true, ago(10), "long time"),
    // baseline only in the half year before the last quarter
    ...every("hank", 5, 265, 120),
    // steady all the way through
    ...every("erin", 5, 700, 0),
    // quiet for over a year
    ...every("gina", 5, 695, 400),
    ...every("frank", 1, 20, 11),
  ];

  it("finds contacts far below their own baseline, biggest drop first", () => {
    const rows = detectFadingConnections(messages, REF, "UTC", { ...health, fadingMinMessages: 30 });
    expect(rows.map((r) => r.contactKey)).toEqual(["hank", "dana"]);
    expect(rows[1]).toEqual({
      contactKey: "dana",
      displayName: "Dana",
      totalMessages: 61,
      activeMonths: 12,
      baselineRate: 1.2,
      recentRate: 0.1,
      dropPercentage: 93.2,
      daysSinceContact: 10,
      lastContactDate: "2024-12-21",
    });
  });

  it("falls back to the half year before the last quarter", () => {
    const [hank] = detectFadingConnections(messages, REF, "UTC", { ...health, fadingMinMessages: 30 });
    expect(hank).toMatchObject({
      contactKey: "hank",
      displayName: "hank",
      totalMessages: 30,
      activeMonths: 6,
      baselineRate: 1.2,
      recentRate: 0,
      dropPercentage: 100,
      daysSinceContact: 120,
    });
  });

  it("ignores contacts below the message minimum", () => {
    expect(detectFadingConnections(messages, REF, "UTC", health)).toEqual([]);
  });
});

describe("detectNewConnections", () => {
  const messages = [
    // known for a long time, silent, now back
    msg("ivy", false, ago(400), "hello", "Ivy"),
    ...[1, 2, 3, 4, 5].map((d) => msg("ivy", d % 2 === 0, ago(d), "catching up", "Ivy")),
    // some baseline, now much busier
    ...every("jack", 10, 200, 110),
    ...every("jack", 1, 11, 0),
    // too new to count
    msg("kate", false, ago(40), "hi"),
    ...every("kate", 1, 9, 0),
    // nothing in the last month
    ...every("liam", 2, 100, 45),
    // steady
    ...every("mia", 6, 204, 30),
    ...every("mia", 6, 24, 0),
  ];

  it("lists revived and growing contacts, busiest first", () => {
    expect(detectNewConnections(messages, REF, health)).toEqual([
      {
        contactKey: "jack",
        displayName: "jack",
        kind: "growing",
        totalMessages: 22,
        recentMessages: 12,
        baselineRate: 0.4,
        recentRate: 2.8,
        growthFactor: 7.2,
        relationshipDays: 200,
      },
      {
        contactKey: "ivy",
        displayName: "Ivy",
        kind: "revived",
        totalMessages: 6,
        recentMessages: 5,
        baselineRate: 0,
        recentRate: 1.2,
        growthFactor: null,
        relationshipDays: 400,
      },
    ]);
  });

  it("needs enough recent messages", () => {
    expect(detectNewConnections(messages, REF, { ...health, newMinRecentMessages: 6 }).map((r) => r.contactKey)).toEqual([
      "jack",
    ]);
  });
});
