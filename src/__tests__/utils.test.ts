import { describe, it, expect } from "vitest";
import { daysBetween, localDate, localYear } from "../utils/dates.js";
import { fallbackNameFromContactKey, pickDisplayName } from "../utils/displayName.js";
import { competitionRanks, median } from "../utils/stats.js";
import { msg } from "./helpers.js";

describe("stats", () => {
  it("takes the middle value, or the mean of the middle two", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 2, 3])).toBe(2.5);
    expect(median([])).toBeNull();
  });

  it("gives tied values the same competition rank and skips the next", () => {
    const ranked = competitionRanks(
      [
        { key: "c", n: 50 },
        { key: "a", n: 100 },
        { key: "b", n: 100 },
      ],
      (x) => x.n,
      (x, y) => (x.key < y.key ? -1 : 1)
    );
    expect(ranked.map((r) => [r.item.key, r.rank])).toEqual([
      ["a", 1],
      ["b", 1],
      ["c", 3],
    ]);
  });
});

describe("dates", () => {
  it("resolves calendar dates in the configured zone", () => {
    const ts = Date.parse("2024-01-01T03:00:00Z");
    expect(localDate(ts, "UTC")).toBe("2024-01-01");
    expect(localDate(ts, "America/Los_Angeles")).toBe("2023-12-31");
    expect(localYear(Date.parse("2023-12-31T23:30:00Z"), "Asia/Tokyo")).toBe(2024);
  });

  it("counts calendar days across month ends and leap days", () => {
    expect(daysBetween("2024-01-31", "2024-02-01")).toBe(1);
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
  });
});

describe("display names", () => {
  it("uses the most frequent name on the contact's messages", () => {
    const list = [
      msg("k", false, "2024-01-01T00:00:00Z", "a", "Al"),
      msg("k", false, "2024-01-01T00:01:00Z", "b", "Alice"),
      msg("k", false, "2024-01-01T00:02:00Z", "c", "Alice"),
      msg("k", true, "2024-01-01T00:03:00Z", "d"),
    ];
    expect(pickDisplayName(list)).toBe("Alice");
    expect(pickDisplayName([msg("k", true, "2024-01-01T00:00:00Z")])).toBeNull();
  });

  it("falls back to the contact key", () => {
    expect(fallbackNameFromContactKey("alice@example.com")).toBe("alice");
    expect(fallbackNameFromContactKey("+15550100001")).toBe("+15…01");
    expect(fallbackNameFromContactKey("15551234567")).toBe("155…67");
    expect(fallbackNameFromContactKey("")).toBe("unknown");
  });
});
