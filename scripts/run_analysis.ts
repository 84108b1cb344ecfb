import { loadAnalysisConfig } from "../src/config.js";
import { pool } from "../src/db.js";
import { loadMessages } from "../src/sources/messageStore.js";
import { runAnalysis } from "../src/services/analysisService.js";
import { saveAnalysisSnapshot } from "../src/stores/analysisSnapshotStore.js";

// Usage: tsx scripts/run_analysis.ts [--since <epochMs>] [--until <epochMs>] [--tz <zone>] [--groups]
function argValue(flag: string): string | undefined {
  const i = process.argv.indexOf(flag);
  return i >= 0 ? process.argv[i + 1] : undefined;
}

function numberArg(flag: string): number | undefined {
  const raw = argValue(flag);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`${flag} must be a number, got "${raw}"`);
  return n;
}

async function main() {
  const tz = argValue("--tz");
  const cfg = loadAnalysisConfig(tz ? { timeZone: tz } : {});
  const messages = await loadMessages(pool, {
    sinceTs: numberArg("--since"),
    untilTs: numberArg("--until"),
    includeGroups: process.argv.includes("--groups"),
  });
  console.log(`Loaded ${messages.length} messages`);

  const report = await runAnalysis(messages, cfg);
  await saveAnalysisSnapshot(report);

  console.log(`Contacts: ${report.contactCount}, years: ${report.years.join(", ")}`);
  for (const c of report.topContacts.slice(0, 5)) {
    console.log(`  ${c.displayName}: ${c.total} messages over ${c.yearsActive} year(s)`);
  }
  const skipped = report.partitions.filter((p) => p.status !== "ok");
  if (skipped.length) console.log(`Partitions skipped or failed: ${skipped.length}`);
}

main()
  .then(() => pool.end())
  .catch(async (err) => {
    console.error("Analysis failed:", (err as Error)?.message ?? err);
    await pool.end();
    process.exit(1);
  });
