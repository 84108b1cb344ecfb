import { Router, Response } from "express";
import { z, ZodError } from "zod";
import { config, loadAnalysisConfig } from "../config.js";
import { pool } from "../db.js";
import { AnalysisAbortedError, ConfigError, EmptyInputError } from "../errors.js";
import { loadMessages } from "../sources/messageStore.js";
import { runAnalysis } from "../services/analysisService.js";
import { REPORT_TABLES, isReportTable, lookupTable } from "../services/reportLookupService.js";
import { readAnalysisHistory, readLatestAnalysis, saveAnalysisSnapshot } from "../stores/analysisSnapshotStore.js";
import type { AnalysisReport, MessageRecord } from "../types.js";

export const analysisRouter = Router();

const messageSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  contactKey: z.string().min(1),
  displayName: z.string().nullish(),
  fromMe: z.boolean(),
  ts: z.union([
    z.number().finite(),
    z
      .string()
      .datetime({ offset: true })
      .transform((s) => Date.parse(s)),
  ]),
  text: z.string().nullish(),
});

const configOverridesSchema = z.record(z.unknown()).default({});

const runBodySchema = z.object({
  messages: z.array(messageSchema),
  config: configOverridesSchema,
  persist: z.boolean().default(true),
});

const runDbBodySchema = z.object({
  sinceTs: z.number().int().nonnegative().optional(),
  untilTs: z.number().int().positive().optional(),
  includeGroups: z.boolean().default(config.includeGroups),
  config: configOverridesSchema,
  persist: z.boolean().default(true),
});

const lookupQuerySchema = z.object({
  year: z
    .string()
    .regex(/^\d{4}$/, "year must be a four digit year")
    .transform(Number)
    .optional(),
  contact: z.string().min(1).optional(),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

function sendAnalysisError(res: Response, route: string, err: unknown) {
  if (err instanceof ZodError) {
    return res.status(400).json({ error: "Invalid request", issues: err.issues });
  }
  if (err instanceof ConfigError) {
    return res.status(400).json({ error: err.message, issues: err.issues });
  }
  if (err instanceof EmptyInputError) {
    return res.status(422).json({ error: err.message });
  }
  if (err instanceof AnalysisAbortedError) {
    return res.status(503).json({ error: "Analysis timed out" });
  }
  console.error(`Error in ${route}:`, (err as Error)?.message ?? err);
  return res.status(500).json({ error: "Analysis failed" });
}

// One run with a hard deadline; nothing is returned or persisted if it expires.
async function runWithDeadline(messages: MessageRecord[], overrides: Record<string, unknown>, persist: boolean) {
  const cfg = loadAnalysisConfig(overrides);
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.analysisTimeoutMs);
  let report: AnalysisReport;
  try {
    report = await runAnalysis(messages, cfg, { signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
  if (persist) await saveAnalysisSnapshot(report);
  return report;
}

// POST /analysis/run  { messages: [...], config?: {...}, persist?: boolean }
analysisRouter.post("/analysis/run", async (req, res) => {
  try {
    const body = runBodySchema.parse(req.body ?? {});
    const report = await runWithDeadline(body.messages, body.config, body.persist);
    res.json(report);
  } catch (err) {
    sendAnalysisError(res, "/analysis/run", err);
  }
});

// POST /analysis/run/db  { sinceTs?, untilTs?, includeGroups?, config?, persist? }
analysisRouter.post("/analysis/run/db", async (req, res) => {
  try {
    const body = runDbBodySchema.parse(req.body ?? {});
    const messages = await loadMessages(pool, {
      sinceTs: body.sinceTs,
      untilTs: body.untilTs,
      includeGroups: body.includeGroups,
    });
    console.info("[analysis] loaded messages from db", { count: messages.length });
    const report = await runWithDeadline(messages, body.config, body.persist);
    res.json(report);
  } catch (err) {
    sendAnalysisError(res, "/analysis/run/db", err);
  }
});

analysisRouter.get("/analysis/latest", async (_req, res) => {
  const report = await readLatestAnalysis();
  if (!report) return res.status(404).json({ error: "No analysis has been run yet" });
  return res.json(report);
});

analysisRouter.get("/analysis/history", async (req, res) => {
  try {
    const { limit } = historyQuerySchema.parse(req.query);
    const runs = await readAnalysisHistory(limit);
    res.json({
      runs: runs.map((r) => ({
        generatedAt: r.generatedAt,
        messageCount: r.messageCount,
        contactCount: r.contactCount,
        years: r.years,
      })),
    });
  } catch (err) {
    sendAnalysisError(res, "/analysis/history", err);
  }
});

// GET /analysis/latest/:table?year=<yyyy>&contact=<key>
analysisRouter.get("/analysis/latest/:table", async (req, res) => {
  try {
    const table = req.params.table;
    if (!isReportTable(table)) {
      return res.status(404).json({ error: `Unknown table "${table}"`, tables: Object.keys(REPORT_TABLES) });
    }
    const lookup = lookupQuerySchema.parse(req.query);
    const { keyedBy } = REPORT_TABLES[table];
    if ((lookup.year !== undefined && !keyedBy.year) || (lookup.contact !== undefined && !keyedBy.contact)) {
      return res.status(400).json({ error: `Table "${table}" cannot be filtered that way`, keyedBy });
    }
    const report = await readLatestAnalysis();
    if (!report) return res.status(404).json({ error: "No analysis has been run yet" });
    return res.json({ table, generatedAt: report.generatedAt, rows: lookupTable(report, table, lookup) });
  } catch (err) {
    return sendAnalysisError(res, "/analysis/latest/:table", err);
  }
});
