import type { HeatmapCell, MessageRecord, PeakHourRow } from "../types.js";
import { WEEKDAY_NAMES, localClock, localYear } from "../utils/dates.js";

/** Full 7 x 24 grid of message counts, Monday first, in local time. */
export function hourWeekdayHeatmap(messages: readonly MessageRecord[], timeZone: string): HeatmapCell[] {
  const grid = WEEKDAY_NAMES.map(() => new Array<number>(24).fill(0));
  for (const m of messages) {
    const { hour, weekday } = localClock(m.ts, timeZone);
    grid[weekday][hour]++;
  }
  return grid.flatMap((hours, weekday) =>
    hours.map((count, hour) => ({ weekday, dayName: WEEKDAY_NAMES[weekday], hour, count }))
  );
}

// The earliest hour wins a tie.
export function peakHoursByYear(messages: readonly MessageRecord[], timeZone: string): PeakHourRow[] {
  const byYear = new Map<number, number[]>();
  for (const m of messages) {
    const year = localYear(m.ts, timeZone);
    let hours = byYear.get(year);
    if (!hours) {
      hours = new Array<number>(24).fill(0);
      byYear.set(year, hours);
    }
    hours[localClock(m.ts, timeZone).hour]++;
  }
  return [...byYear.entries()]
    .sort(([a], [b]) => a - b)
    .map(([year, hours]) => {
      let peakHour = 0;
      hours.forEach((count, hour) => {
        if (count > hours[peakHour]) peakHour = hour;
      });
      return { year, peakHour, messagesAtPeak: hours[peakHour], total: hours.reduce((a, b) => a + b, 0) };
    });
}
