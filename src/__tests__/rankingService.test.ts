import { describe, it, expect } from "vitest";
import {
  computeTopContacts,
  computeYearlyRankings,
  consecutiveYearTransitions,
  findFaded,
  findRising,
  rankingTrajectories,
} from "../services/rankingService.js";
import type { MessageRecord, YearlyRanking } from "../types.js";
import { msg } from "./helpers.js";

function repeat(contactKey: string, count: number, year: number): MessageRecord[] {
  return Array.from({ length: count }, (_, i) =>
    msg(contactKey, i % 2 === 0, new Date(Date.UTC(year, 0, 1, 0, i)).toISOString(), "x")
  );
}

function row(year: number, contactKey: string, rank: number): YearlyRanking {
  return { year, contactKey, total: 100 - rank, sent: 0, received: 100 - rank, rank };
}

const rankings: YearlyRanking[] = [
  row(2023, "gone", 1),
  row(2023, "c1", 2),
  row(2023, "c2", 3),
  row(2023, "c3", 4),
  row(2023, "c4", 5),
  row(2023, "climber", 25),
  row(2024, "c1", 1),
  row(2024, "climber", 2),
  row(2024, "c2", 3),
  row(2024, "c3", 4),
  row(2024, "newbie", 5),
  row(2024, "c4", 30),
];

describe("computeYearlyRankings", () => {
  it("shares a rank between tied contacts", () => {
    const rows = computeYearlyRankings([...repeat("c", 50, 2023), ...repeat("a", 100, 2023), ...repeat("b", 100, 2023)], "UTC");
    expect(rows.map((r) => [r.contactKey, r.total, r.rank])).toEqual([
      ["a", 100, 1],
      ["b", 100, 1],
      ["c", 50, 3],
    ]);
    expect(rows[0]).toMatchObject({ year: 2023, sent: 50, received: 50 });
  });

  it("ranks each calendar year on its own", () => {
    const rows = computeYearlyRankings([...repeat("a", 3, 2022), ...repeat("b", 1, 2022), ...repeat("b", 2, 2023)], "UTC");
    expect(rows.map((r) => [r.year, r.contactKey, r.rank])).toEqual([
      [2022, "a", 1],
      [2022, "b", 2],
      [2023, "b", 1],
    ]);
  });
});

describe("rising and faded contacts", () => {
  it("treats a contact absent last year and ranked 5 now as rising", () => {
    const rising = findRising(rankings, 2023, 2024, { floor: 20, top: 10 });
    expect(rising).toEqual([
      { contactKey: "climber", fromYear: 2023, toYear: 2024, fromRank: 25, toRank: 2 },
      { contactKey: "newbie", fromYear: 2023, toYear: 2024, fromRank: null, toRank: 5 },
    ]);
  });

  it("treats a former top contact that dropped out or fell below the floor as faded", () => {
    const faded = findFaded(rankings, 2023, 2024, { top: 10, floor: 20 });
    expect(faded).toEqual([
      { contactKey: "gone", fromYear: 2023, toYear: 2024, fromRank: 1, toRank: null },
      { contactKey: "c4", fromYear: 2023, toYear: 2024, fromRank: 5, toRank: 30 },
    ]);
  });

  it("compares every pair of consecutive years", () => {
    const transitions = consecutiveYearTransitions(
      [...rankings, row(2025, "c1", 1)],
      { floor: 20, top: 10 },
      { top: 10, floor: 20 }
    );
    expect(transitions.map((t) => [t.fromYear, t.toYear])).toEqual([
      [2023, 2024],
      [2024, 2025],
    ]);
    expect(transitions[1].rising).toEqual([]);
    expect(transitions[1].faded.map((c) => c.contactKey)).toEqual(["climber", "c2", "c3", "newbie"]);
  });
});

describe("trajectories and top contacts", () => {
  it("lists a contact's ranks year by year", () => {
    expect(rankingTrajectories(rankings, ["climber"])).toEqual([
      {
        contactKey: "climber",
        points: [
          { year: 2023, rank: 25, total: 75 },
          { year: 2024, rank: 2, total: 98 },
        ],
      },
    ]);
  });

  it("summarises the busiest contacts over all years", () => {
    const messages = [
      msg("alice", false, "2022-06-01T10:00:00Z", "hi", "Alice"),
      msg("alice", true, "2023-02-01T10:00:00Z", "hey"),
      msg("alice", true, "2023-02-02T10:00:00Z", "yo"),
      msg("bob", true, "2023-03-01T10:00:00Z", "hello"),
    ];
    expect(computeTopContacts(messages, 1, "UTC")).toEqual([
      {
        contactKey: "alice",
        displayName: "Alice",
        total: 3,
        sent: 2,
        received: 1,
        yearsActive: 2,
        firstTs: Date.parse("2022-06-01T10:00:00Z"),
        lastTs: Date.parse("2023-02-02T10:00:00Z"),
      },
    ]);
  });
});
