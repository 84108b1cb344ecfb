import type { TermRow } from "../types.js";
import type { BoilerplateFilter } from "../utils/boilerplate.js";
import { type SparseVector, TfidfVectorizer } from "../utils/tfidf.js";
import type { TextCorpusPartition } from "./textCorpusService.js";

const MAX_FEATURES = 5000;
const CANDIDATE_FACTOR = 3;

/**
 * One pseudo-document per year, scored with TF-IDF across the years, so a
 * term ranks high when it is frequent in one year and rare in the others.
 */
export function distinctiveTermsByYear(
  partitions: readonly TextCorpusPartition[],
  filter: BoilerplateFilter,
  topTerms: number
): TermRow[] {
  const years = partitions.filter((p) => p.documents.length > 0);
  if (years.length === 0) return [];

  const vectorizer = new TfidfVectorizer({
    maxFeatures: MAX_FEATURES,
    isStopWord: (t) => filter.isBoilerplateWord(t),
  });
  let rows: SparseVector[];
  try {
    rows = vectorizer.fitTransform(years.map((p) => p.documents.join(" ")));
  } catch (err) {
    console.warn("[terms] no scorable terms", { error: (err as Error)?.message ?? err });
    return [];
  }

  const out: TermRow[] = [];
  rows.forEach((row, idx) => {
    const year = Number(years[idx].key);
    const ranked = row.indices
      .map((j, p) => ({ term: vectorizer.vocabulary[j], score: row.values[p] }))
      .sort((a, b) => b.score - a.score || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .slice(0, topTerms * CANDIDATE_FACTOR);
    let kept = 0;
    for (const { term, score } of ranked) {
      if (term.length <= 2 || filter.isBoilerplateWord(term)) continue;
      out.push({ year, term, score });
      if (++kept >= topTerms) break;
    }
  });
  return out;
}
