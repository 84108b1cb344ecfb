import { timingSafeEqual } from "crypto";
import type { RequestHandler } from "express";

export type AuthOutcome = "ok" | "missing" | "forbidden";

const BEARER = /^Bearer\s+(\S+)\s*$/i;

/** Without a configured key every request passes. */
export function checkBearer(header: string | undefined, apiKey: string | undefined): AuthOutcome {
  if (!apiKey) return "ok";
  const token = header?.match(BEARER)?.[1];
  if (!token) return "missing";
  const a = Buffer.from(token);
  const b = Buffer.from(apiKey);
  return a.length === b.length && timingSafeEqual(a, b) ? "ok" : "forbidden";
}

export function requireApiKey(apiKey: string | undefined, openPaths: readonly string[] = ["/health"]): RequestHandler {
  return (req, res, next) => {
    if (openPaths.includes(req.path.toLowerCase())) return next();
    const outcome = checkBearer(req.headers.authorization, apiKey);
    if (outcome === "missing") return res.status(401).json({ error: "Unauthorized" });
    if (outcome === "forbidden") return res.status(403).json({ error: "Forbidden" });
    return next();
  };
}
