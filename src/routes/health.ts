import { Router } from "express";
import { pool } from "../db.js";
import { describeMessageTable } from "../sources/messageStore.js";

export const healthRouter = Router();

const startedAt = Date.now();

healthRouter.get("/health", (_req, res) => {
  res.json({ ok: true, uptimeMs: Date.now() - startedAt });
});

// The reader needs the messages table, not just a live connection.
healthRouter.get("/db/ping", async (_req, res) => {
  try {
    const stats = await describeMessageTable(pool);
    res.json({ ok: true, db: stats });
  } catch (err) {
    console.error("[health] messages table check failed", { error: (err as Error)?.message ?? String(err) });
    res.status(503).json({ ok: false, error: "messages table unavailable" });
  }
});
