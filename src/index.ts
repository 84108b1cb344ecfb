import express from "express";
import cors from "cors";
import { Request, Response, NextFunction } from "express";
import { config, loadAnalysisConfig } from "./config.js";
import { requireApiKey } from "./auth.js";
import { ConfigError } from "./errors.js";
import { healthRouter } from "./routes/health.js";
import { analysisRouter } from "./routes/analysis.js";

// Fail at boot rather than on the first run if env or boilerplate lists are bad.
try {
  const cfg = loadAnalysisConfig();
  console.info("[config] analysis config ok", {
    timeZone: cfg.timeZone,
    boilerplatePhrases: cfg.boilerplate.phrases.length,
    boilerplateWords: cfg.boilerplate.words.length,
  });
} catch (err) {
  if (err instanceof ConfigError) {
    console.error("[config] invalid configuration", { issues: err.issues, error: err.message });
    process.exit(1);
  }
  throw err;
}

const app = express();

app.use(cors());
app.use(express.json({ limit: "50mb" }));

app.use(requireApiKey(config.apiKey));

app.use(healthRouter);
app.use(analysisRouter);

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  console.error("Unhandled error:", err);
  res.status(500).json({ error: "Internal server error" });
});

app.listen(config.port, () => {
  console.log(`Analysis service listening on http://localhost:${config.port}`);
});
