import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_BOILERPLATE_PATH, loadBoilerplateLists } from "./utils/boilerplate.js";

dotenv.config();

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const n = Number(raw);
  if (Number.isNaN(n)) {
    throw new ConfigError(`Env var ${name} must be a number, got "${raw}"`);
  }
  return n;
}

export const config = {
  port: numberEnv("PORT", 4000),
  databaseUrl: process.env.DATABASE_URL,
  apiKey: process.env.ANALYSIS_API_KEY,
  timeZone: process.env.ANALYSIS_TZ || "UTC",
  analysisTimeoutMs: numberEnv("ANALYSIS_TIMEOUT_MS", 120_000),
  includeGroups: process.env.ANALYSIS_INCLUDE_GROUPS === "true",
  boilerplatePath: process.env.BOILERPLATE_PATH || DEFAULT_BOILERPLATE_PATH,
};

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const count = z.number().int().nonnegative();
const positiveCount = z.number().int().positive();

const rankingSchema = z
  .object({
    risingFloor: positiveCount.default(20),
    risingTop: positiveCount.default(10),
    fadedTop: positiveCount.default(10),
    fadedFloor: positiveCount.default(20),
    trajectoryContacts: positiveCount.default(10),
  })
  .refine((r) => r.risingFloor >= r.risingTop, { message: "risingFloor must be >= risingTop" })
  .refine((r) => r.fadedFloor >= r.fadedTop, { message: "fadedFloor must be >= fadedTop" });

const textSchema = z
  .object({
    phraseMinWords: positiveCount.default(2),
    phraseMaxWords: positiveCount.default(4),
    phraseMinDocuments: positiveCount.default(3),
    phraseMaxDocumentShare: z.number().gt(0).lte(1).default(0.5),
    minInformativeWords: count.default(2),
    topPhrases: positiveCount.default(20),
    topTerms: positiveCount.default(10),
    minTopicDocuments: positiveCount.default(100),
    maxTopics: positiveCount.default(5),
    topicTerms: positiveCount.default(5),
    topicContacts: count.default(10),
    minContactTopicDocuments: positiveCount.default(50),
    maxContactTopics: positiveCount.default(3),
    topEmojisPerYear: positiveCount.default(10),
    topEmojisPerContact: positiveCount.default(5),
    topLinkDomains: positiveCount.default(20),
  })
  .refine((t) => t.phraseMaxWords >= t.phraseMinWords, { message: "phraseMaxWords must be >= phraseMinWords" });

const healthSchema = z.object({
  fadingMinMessages: positiveCount.default(100),
  fadingMaxInactiveDays: positiveCount.default(365),
  fadingMinActiveMonths: positiveCount.default(3),
  fadingMinBaselineRate: z.number().positive().default(1),
  fadingDropRatio: z.number().gt(0).lt(1).default(0.3),
  newMinRecentMessages: positiveCount.default(4),
  limit: positiveCount.default(10),
});

const boilerplateSchema = z.object({
  phrases: z.array(z.string().trim().min(1)).min(1, "boilerplate phrase list must not be empty"),
  words: z.array(z.string().trim().min(1)).min(1, "boilerplate word list must not be empty"),
});

export const analysisConfigSchema = z.object({
  timeZone: z.string().refine(isValidTimeZone, { message: "unknown IANA time zone" }).default("UTC"),
  conversationGapHours: z.number().positive().default(4),
  balanceEpsilon: z.number().positive().default(0.1),
  minMessagesForBalance: count.default(50),
  minConversationsForInitiation: count.default(10),
  maxReplyLatencyHours: z.number().positive().default(24),
  minMessagesForSentiment: count.default(50),
  minMessagesForQuestions: count.default(50),
  excludedContacts: z.array(z.string()).default([]),
  minTwoWayRatio: z.number().gte(0).lt(0.5).default(0),
  ranking: rankingSchema.default({}),
  text: textSchema.default({}),
  health: healthSchema.default({}),
  boilerplate: boilerplateSchema.default(() => loadBoilerplateLists(config.boilerplatePath)),
});

export type AnalysisConfig = Readonly<z.infer<typeof analysisConfigSchema>>;
export type AnalysisConfigInput = z.input<typeof analysisConfigSchema>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function parseAnalysisConfig(input: unknown = {}): AnalysisConfig {
  const result = analysisConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Invalid analysis config: ${issues.join("; ")}`, issues);
  }
  return deepFreeze(result.data);
}

// Env-level defaults first, caller overrides on top.
export function loadAnalysisConfig(overrides: Record<string, unknown> = {}): AnalysisConfig {
  return parseAnalysisConfig({ timeZone: config.timeZone, ...overrides });
}
