import type { AnalysisReport } from "../types.js";

export type TableLookup = { year?: number; contact?: string };

type TableDef = {
  keyedBy: { year: boolean; contact: boolean };
  select: (report: AnalysisReport, lookup: TableLookup) => readonly object[];
};

// A filter the table has no key for yields no rows rather than the whole table.
function table<T extends object>(
  rows: (r: AnalysisReport) => readonly T[],
  keys: { year?: (row: T) => number; contact?: (row: T) => string }
): TableDef {
  return {
    keyedBy: { year: !!keys.year, contact: !!keys.contact },
    select: (report, lookup) => {
      // Snapshots saved before a table existed have no field for it.
      let out = rows(report) ?? [];
      if (lookup.year !== undefined) {
        const yearOf = keys.year;
        if (!yearOf) return [];
        out = out.filter((row) => yearOf(row) === lookup.year);
      }
      if (lookup.contact !== undefined) {
        const contactOf = keys.contact;
        if (!contactOf) return [];
        out = out.filter((row) => contactOf(row) === lookup.contact);
      }
      return out;
    },
  };
}

export const REPORT_TABLES = {
  relationships: table((r: AnalysisReport) => r.relationships.contacts, { contact: (c) => c.contactKey }),
  balance: table((r: AnalysisReport) => r.relationships.balance, { contact: (c) => c.contactKey }),
  initiation: table((r: AnalysisReport) => r.relationships.initiation, { contact: (c) => c.contactKey }),
  responseTimes: table((r: AnalysisReport) => r.relationships.responseTimes, { contact: (c) => c.contactKey }),
  yearlyRankings: table((r: AnalysisReport) => r.yearlyRankings, { year: (y) => y.year, contact: (y) => y.contactKey }),
  transitions: table((r: AnalysisReport) => r.transitions, { year: (t) => t.toYear }),
  topContacts: table((r: AnalysisReport) => r.topContacts, { contact: (c) => c.contactKey }),
  trajectories: table((r: AnalysisReport) => r.trajectories, { contact: (t) => t.contactKey }),
  streaks: table((r: AnalysisReport) => r.streaks, { contact: (s) => s.contactKey }),
  yearlyVolume: table((r: AnalysisReport) => r.yearlyVolume, { year: (v) => v.year }),
  activeDays: table((r: AnalysisReport) => r.activeDays, { year: (d) => d.year }),
  questionsByYear: table((r: AnalysisReport) => r.questionsByYear, { year: (q) => Number(q.key) }),
  questionsByContact: table((r: AnalysisReport) => r.questionsByContact, { contact: (q) => q.key }),
  monthlyVolume: table((r: AnalysisReport) => r.monthlyVolume, {
    year: (v) => Number(v.month.slice(0, 4)),
    contact: (v) => v.contactKey,
  }),
  hourDayHeatmap: table((r: AnalysisReport) => r.hourDayHeatmap, {}),
  peakHours: table((r: AnalysisReport) => r.peakHours, { year: (p) => p.year }),
  emojisByYear: table((r: AnalysisReport) => r.emojisByYear, { year: (e) => e.year }),
  emojisByContact: table((r: AnalysisReport) => r.emojisByContact, { contact: (e) => e.contactKey }),
  sharedDomains: table((r: AnalysisReport) => r.sharedDomains, {}),
  fadingConnections: table((r: AnalysisReport) => r.fadingConnections, { contact: (c) => c.contactKey }),
  newConnections: table((r: AnalysisReport) => r.newConnections, { contact: (c) => c.contactKey }),
  phrases: table((r: AnalysisReport) => r.phrases, { year: (p) => p.year }),
  distinctiveTerms: table((r: AnalysisReport) => r.distinctiveTerms, { year: (t) => t.year }),
  topicsByYear: table((r: AnalysisReport) => r.topicsByYear, { year: (t) => Number(t.partition) }),
  topicsByContact: table((r: AnalysisReport) => r.topicsByContact, { contact: (t) => t.partition }),
  sentiment: table((r: AnalysisReport) => r.sentiment, { contact: (s) => s.contactKey }),
  partitions: table((r: AnalysisReport) => r.partitions, {}),
} as const;

export type ReportTableName = keyof typeof REPORT_TABLES;

export function isReportTable(name: string): name is ReportTableName {
  return Object.prototype.hasOwnProperty.call(REPORT_TABLES, name);
}

/** Rows of one derived table, narrowed by year and/or contact. */
export function lookupTable(report: AnalysisReport, table: ReportTableName, lookup: TableLookup = {}): readonly object[] {
  return REPORT_TABLES[table].select(report, lookup);
}
