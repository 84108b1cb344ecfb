import fs from "fs/promises";
import path from "path";
import type { AnalysisReport } from "../types.js";

export const DEFAULT_OUT_DIR = path.join(process.cwd(), "out", "analysis");
const HISTORY_FILE = "analysis_runs.jsonl";
const LATEST_FILE = "analysis_latest.json";

export async function saveAnalysisSnapshot(report: AnalysisReport, outDir: string = DEFAULT_OUT_DIR): Promise<void> {
  await fs.mkdir(outDir, { recursive: true });
  await fs.appendFile(path.join(outDir, HISTORY_FILE), JSON.stringify(report) + "\n", "utf-8");
  await fs.writeFile(path.join(outDir, LATEST_FILE), JSON.stringify(report, null, 2), "utf-8");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function isReport(value: unknown): value is AnalysisReport {
  return (
    !!value &&
    typeof value === "object" &&
    "generatedAt" in value &&
    typeof value.generatedAt === "number" &&
    "relationships" in value
  );
}

export async function readLatestAnalysis(outDir: string = DEFAULT_OUT_DIR): Promise<AnalysisReport | null> {
  try {
    const raw = await fs.readFile(path.join(outDir, LATEST_FILE), "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return isReport(parsed) ? parsed : null;
  } catch (err: unknown) {
    if (!isMissingFile(err)) console.error("[analysisStore] read latest failed", err);
    return null;
  }
}

export async function readAnalysisHistory(limit: number, outDir: string = DEFAULT_OUT_DIR): Promise<AnalysisReport[]> {
  const entries: AnalysisReport[] = [];
  try {
    const raw = await fs.readFile(path.join(outDir, HISTORY_FILE), "utf-8");
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isReport(parsed)) entries.push(parsed);
      } catch (err) {
        console.error("[analysisStore] parse history line failed", err);
      }
    }
  } catch (err: unknown) {
    if (!isMissingFile(err)) console.error("[analysisStore] read history failed", err);
  }
  entries.sort((a, b) => b.generatedAt - a.generatedAt);
  return entries.slice(0, limit);
}
