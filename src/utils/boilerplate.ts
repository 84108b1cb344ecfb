import fs from "fs";
import path from "path";

export type BoilerplateLists = {
  phrases: string[];
  words: string[];
};

export interface BoilerplateFilter {
  isBoilerplateWord(word: string): boolean;
  /** True when the phrase and a configured boilerplate phrase contain one another. */
  isBoilerplatePhrase(phrase: string): boolean;
}

export const DEFAULT_BOILERPLATE_PATH = path.join(process.cwd(), "data", "boilerplate.json");

export function loadBoilerplateLists(filePath: string = DEFAULT_BOILERPLATE_PATH): BoilerplateLists {
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object") {
    throw new Error(`Boilerplate file ${filePath} must contain an object`);
  }
  const phrases = "phrases" in parsed ? parsed.phrases : undefined;
  const words = "words" in parsed ? parsed.words : undefined;
  return {
    phrases: toStringList(phrases),
    words: toStringList(words),
  };
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string").map((v) => v.trim().toLowerCase()).filter(Boolean);
}

// Raw containment either way: "ok" overlaps "book club" as well as "ok then".
export function phrasesOverlap(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

export function createBoilerplateFilter(lists: BoilerplateLists): BoilerplateFilter {
  const words = new Set(lists.words.map((w) => w.toLowerCase()));
  const phrases = lists.phrases.map((p) => p.toLowerCase());
  return {
    isBoilerplateWord: (word) => words.has(word.toLowerCase()),
    isBoilerplatePhrase: (phrase) => {
      const lowered = phrase.toLowerCase();
      return phrases.some((p) => phrasesOverlap(lowered, p));
    },
  };
}
