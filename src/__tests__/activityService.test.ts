import { describe, it, expect } from "vitest";
import {
  computeActiveDaysByYear,
  computeMonthlyVolume,
  computeQuestionRatioByContact,
  computeQuestionRatioByYear,
  computeYearlyVolume,
} from "../services/activityService.js";
import { filterContacts } from "../services/contactFilterService.js";
import { msg } from "./helpers.js";

const messages = [
  msg("alice", true, "2023-05-01T09:00:00Z", "how are you?"),
  msg("alice", true, "2023-05-01T18:00:00Z", "fine"),
  msg("alice", false, "2023-05-02T09:00:00Z", "ok?"),
  msg("bob", true, "2024-01-03T10:00:00Z", "where?"),
  msg("bob", true, "2024-01-04T10:00:00Z", null),
];

describe("activity by year", () => {
  it("counts volume in both directions", () => {
    expect(computeYearlyVolume(messages, "UTC")).toEqual([
      { year: 2023, total: 3, sent: 2, received: 1 },
      { year: 2024, total: 2, sent: 2, received: 0 },
    ]);
  });

  it("counts distinct days with a sent message", () => {
    expect(computeActiveDaysByYear(messages, "UTC")).toEqual([
      { year: 2023, activeDays: 1 },
      { year: 2024, activeDays: 2 },
    ]);
  });

  it("measures the share of sent texts that ask something", () => {
    expect(computeQuestionRatioByYear(messages, "UTC")).toEqual([
      { key: "2023", total: 2, questions: 1, questionShare: 0.5 },
      { key: "2024", total: 1, questions: 1, questionShare: 1 },
    ]);
  });
});

describe("monthly volume", () => {
  it("counts each listed contact per local month", () => {
    expect(computeMonthlyVolume(messages, "UTC", ["alice", "bob"])).toEqual([
      { month: "2023-05", contactKey: "alice", total: 3 },
      { month: "2024-01", contactKey: "bob", total: 2 },
    ]);
    expect(computeMonthlyVolume(messages, "UTC", ["bob"])).toEqual([{ month: "2024-01", contactKey: "bob", total: 2 }]);
  });

  it("uses the configured zone for month boundaries", () => {
    const edge = [msg("carol", true, "2024-03-01T02:00:00Z")];
    expect(computeMonthlyVolume(edge, "America/New_York", ["carol"])).toEqual([
      { month: "2024-02", contactKey: "carol", total: 1 },
    ]);
  });
});

describe("question ratio by contact", () => {
  it("orders contacts by share and drops small ones", () => {
    expect(computeQuestionRatioByContact(messages, 1).map((r) => [r.key, r.questionShare])).toEqual([
      ["bob", 1],
      ["alice", 0.5],
    ]);
    expect(computeQuestionRatioByContact(messages, 2).map((r) => r.key)).toEqual(["alice"]);
  });
});

describe("filterContacts", () => {
  const input = [
    msg("alice", true, "2024-01-01T09:00:00Z", "hi"),
    msg("alice", false, "2024-01-01T09:05:00Z", "hey", "Alice"),
    msg("bank", false, "2024-01-02T09:00:00Z", "your code is 1234", "MyBank"),
    msg("bank", false, "2024-01-03T09:00:00Z", "your code is 5678", "MyBank"),
    msg("boss", true, "2024-01-04T09:00:00Z", "report attached"),
  ];

  it("drops excluded contacts by key or display name", () => {
    const out = filterContacts(input, { excludedContacts: ["mybank", " BOSS "], minTwoWayRatio: 0 });
    expect(out.excluded).toEqual(["bank", "boss"]);
    expect(out.oneSided).toEqual([]);
    expect(out.messages.map((m) => m.contactKey)).toEqual(["alice", "alice"]);
  });

  it("keeps one-sided contacts unless a two-way ratio is set", () => {
    expect(filterContacts(input, { excludedContacts: [], minTwoWayRatio: 0 }).messages).toHaveLength(5);
    const out = filterContacts(input, { excludedContacts: [], minTwoWayRatio: 0.1 });
    expect(out.oneSided).toEqual(["bank", "boss"]);
    expect(out.messages).toHaveLength(2);
  });
});
