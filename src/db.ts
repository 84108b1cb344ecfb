import pg from "pg";
import type { Pool, PoolConfig } from "pg";
import { config } from "./config.js";

// TLS for hosted databases; local instances usually run without it.
export function sslFor(connectionString: string | undefined): PoolConfig["ssl"] {
  if (!connectionString) return undefined;
  let host: string;
  try {
    host = new URL(connectionString).hostname;
  } catch {
    return undefined;
  }
  return host === "localhost" || host === "127.0.0.1" ? undefined : { rejectUnauthorized: false };
}

export function createPool(connectionString: string | undefined): Pool {
  if (!connectionString) console.warn("[db] DATABASE_URL is not set; database reads will fail");
  const db = new pg.Pool({
    connectionString,
    ssl: sslFor(connectionString),
    application_name: "message-analytics",
    max: 4,
  });
  db.on("error", (err) => {
    console.error("[db] idle client error", err.message);
  });
  return db;
}

export const pool = createPool(config.databaseUrl);
