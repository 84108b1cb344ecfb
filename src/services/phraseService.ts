import type { AnalysisConfig } from "../config.js";
import type { PartitionResult, PhraseRow } from "../types.js";
import { type BoilerplateFilter, phrasesOverlap } from "../utils/boilerplate.js";
import { countTerms } from "../utils/tfidf.js";
import { ngrams, tokenize } from "../utils/text.js";
import type { TextCorpusPartition } from "./textCorpusService.js";

type PhraseOptions = Pick<
  AnalysisConfig["text"],
  "phraseMinWords" | "phraseMaxWords" | "phraseMinDocuments" | "phraseMaxDocumentShare" | "minInformativeWords" | "topPhrases"
>;

export type PhraseCandidate = { phrase: string; count: number; documents: number };

/**
 * Contiguous n-grams seen in at least `phraseMinDocuments` messages and in
 * fewer than `phraseMaxDocumentShare` of them, most frequent first (ties
 * alphabetical).
 */
export function phraseCandidates(documents: readonly string[], opts: PhraseOptions): PhraseCandidate[] {
  const { documentFrequency, corpusFrequency } = countTerms(documents, (doc) =>
    ngrams(tokenize(doc), opts.phraseMinWords, opts.phraseMaxWords)
  );
  const maxDocuments = opts.phraseMaxDocumentShare * documents.length;
  const out: PhraseCandidate[] = [];
  for (const [phrase, df] of documentFrequency) {
    if (df < opts.phraseMinDocuments || df >= maxDocuments) continue;
    out.push({ phrase, count: corpusFrequency.get(phrase) ?? 0, documents: df });
  }
  return out.sort((a, b) => b.count - a.count || (a.phrase < b.phrase ? -1 : a.phrase > b.phrase ? 1 : 0));
}

export function isInformativePhrase(phrase: string, filter: BoilerplateFilter, minInformativeWords: number): boolean {
  if (filter.isBoilerplatePhrase(phrase)) return false;
  const words = phrase.split(" ");
  const informative = words.filter((w) => !filter.isBoilerplateWord(w)).length;
  if (informative === 0) return false;
  return informative >= minInformativeWords;
}

export function minePhrases(
  partition: TextCorpusPartition,
  filter: BoilerplateFilter,
  opts: PhraseOptions
): PhraseRow[] {
  const year = Number(partition.key);
  const kept: PhraseRow[] = [];
  for (const c of phraseCandidates(partition.documents, opts)) {
    if (!isInformativePhrase(c.phrase, filter, opts.minInformativeWords)) continue;
    // "road trip" and "road trip plans" would otherwise both show up
    if (kept.some((k) => phrasesOverlap(k.phrase, c.phrase))) continue;
    kept.push({ year, phrase: c.phrase, count: c.count });
    if (kept.length >= opts.topPhrases) break;
  }
  return kept;
}

export function minePhrasesByYear(
  partitions: readonly TextCorpusPartition[],
  filter: BoilerplateFilter,
  opts: PhraseOptions
): PartitionResult<PhraseRow>[] {
  return partitions.map((p): PartitionResult<PhraseRow> => {
    try {
      return { status: "ok", partition: p.key, rows: minePhrases(p, filter, opts) };
    } catch (err) {
      const reason = (err as Error)?.message ?? String(err);
      console.error("[phrases] phrase mining failed", { year: p.key, error: reason });
      return { status: "failed", partition: p.key, reason };
    }
  });
}
