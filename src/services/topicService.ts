import type { AnalysisConfig } from "../config.js";
import type { PartitionResult, TopicRow } from "../types.js";
import type { BoilerplateFilter } from "../utils/boilerplate.js";
import { nmf } from "../utils/nmf.js";
import { TfidfVectorizer } from "../utils/tfidf.js";
import { isDuplicateTerm } from "../utils/text.js";
import type { TextCorpusPartition } from "./textCorpusService.js";

export type TopicOptions = {
  minDocuments: number;
  maxTopics: number;
  topicTerms: number;
  minDf: number;
  maxDf: number;
  maxFeatures: number;
};

export const YEAR_TOPIC_VECTORIZER = { minDf: 5, maxDf: 0.7, maxFeatures: 2000 } as const;
export const CONTACT_TOPIC_VECTORIZER = { minDf: 3, maxDf: 0.8, maxFeatures: 500 } as const;

const DOCUMENTS_PER_TOPIC = 20;
const NMF_MAX_ITER = 200;
const NMF_SEED = 42;

// Scaled with corpus size, capped, never below one.
export function topicCount(documents: number, maxTopics: number): number {
  return Math.max(1, Math.min(maxTopics, Math.floor(documents / DOCUMENTS_PER_TOPIC)));
}

function keepTerm(term: string, filter: BoilerplateFilter): boolean {
  const parts = term.split(" ");
  if (parts.length === 1 && filter.isBoilerplateWord(term)) return false;
  if (parts.length > 1 && parts.every((p) => filter.isBoilerplateWord(p))) return false;
  return term.replace(/ /g, "").length >= 3;
}

export function topicTerms(weights: readonly number[], vocabulary: readonly string[], filter: BoilerplateFilter, limit: number): string[] {
  const candidates = weights
    .map((w, j) => ({ term: vocabulary[j], w }))
    .filter((c) => c.w > 0)
    .sort((a, b) => b.w - a.w || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
    .slice(0, limit * 3);
  const kept: string[] = [];
  for (const { term } of candidates) {
    if (!keepTerm(term, filter) || isDuplicateTerm(term, kept)) continue;
    kept.push(term);
    if (kept.length >= limit) break;
  }
  return kept;
}

export function extractTopics(
  partition: TextCorpusPartition,
  filter: BoilerplateFilter,
  opts: TopicOptions
): PartitionResult<TopicRow> {
  const documents = partition.documents.length;
  if (documents < opts.minDocuments) {
    return { status: "skipped", partition: partition.key, reason: "insufficient_data", documents };
  }
  try {
    const vectorizer = new TfidfVectorizer({
      ngramRange: [1, 2],
      minDf: opts.minDf,
      maxDf: opts.maxDf,
      maxFeatures: opts.maxFeatures,
      isStopWord: (t) => filter.isBoilerplateWord(t),
    });
    const X = vectorizer.fitTransform(partition.documents);
    const { H } = nmf(X, {
      components: topicCount(documents, opts.maxTopics),
      columns: vectorizer.vocabulary.length,
      maxIter: NMF_MAX_ITER,
      seed: NMF_SEED,
    });
    const rows: TopicRow[] = [];
    H.forEach((weights, topicId) => {
      const terms = topicTerms(weights, vectorizer.vocabulary, filter, opts.topicTerms);
      if (terms.length) rows.push({ partition: partition.key, topicId, terms });
    });
    return { status: "ok", partition: partition.key, rows };
  } catch (err) {
    const reason = (err as Error)?.message ?? String(err);
    console.error("[topics] factorization failed", { partition: partition.key, error: reason });
    return { status: "failed", partition: partition.key, reason };
  }
}

export function extractTopicsByPartition(
  partitions: readonly TextCorpusPartition[],
  filter: BoilerplateFilter,
  opts: TopicOptions
): PartitionResult<TopicRow>[] {
  return partitions.map((p) => extractTopics(p, filter, opts));
}

/** Topics per calendar year. */
export function extractTopicsByYear(
  partitions: readonly TextCorpusPartition[],
  filter: BoilerplateFilter,
  text: AnalysisConfig["text"]
): PartitionResult<TopicRow>[] {
  return extractTopicsByPartition(partitions, filter, {
    ...YEAR_TOPIC_VECTORIZER,
    minDocuments: text.minTopicDocuments,
    maxTopics: text.maxTopics,
    topicTerms: text.topicTerms,
  });
}

// Smaller per-contact corpora get a looser vectorizer and fewer topics.
export function extractTopicsByContact(
  partitions: readonly TextCorpusPartition[],
  filter: BoilerplateFilter,
  text: AnalysisConfig["text"]
): PartitionResult<TopicRow>[] {
  return extractTopicsByPartition(partitions, filter, {
    ...CONTACT_TOPIC_VECTORIZER,
    minDocuments: text.minContactTopicDocuments,
    maxTopics: text.maxContactTopics,
    topicTerms: text.topicTerms,
  });
}
