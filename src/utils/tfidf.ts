import { ngrams, tokenize } from "./text.js";

export type SparseVector = { indices: number[]; values: number[] };

export type VectorizerOptions = {
  ngramRange?: [number, number];
  minDf?: number; // absolute document count
  maxDf?: number; // share of documents, 0..1
  maxFeatures?: number;
  isStopWord?: (token: string) => boolean;
};

export type TermCounts = {
  perDocument: Map<string, number>[];
  documentFrequency: Map<string, number>;
  corpusFrequency: Map<string, number>;
};

export function countTerms(docs: readonly string[], analyze: (doc: string) => string[]): TermCounts {
  const perDocument: Map<string, number>[] = [];
  const documentFrequency = new Map<string, number>();
  const corpusFrequency = new Map<string, number>();
  for (const doc of docs) {
    const local = new Map<string, number>();
    for (const t of analyze(doc)) local.set(t, (local.get(t) ?? 0) + 1);
    perDocument.push(local);
    for (const [t, n] of local) {
      documentFrequency.set(t, (documentFrequency.get(t) ?? 0) + 1);
      corpusFrequency.set(t, (corpusFrequency.get(t) ?? 0) + n);
    }
  }
  return { perDocument, documentFrequency, corpusFrequency };
}

/**
 * Smoothed TF-IDF with l2-normalised rows:
 * idf(t) = ln((1 + n) / (1 + df(t))) + 1, weight = count * idf.
 * Stop words are removed before n-grams are formed, so a bigram never spans
 * a stop word.
 */
export class TfidfVectorizer {
  vocabulary: string[] = [];
  idf: number[] = [];
  private readonly minN: number;
  private readonly maxN: number;
  private readonly minDf: number;
  private readonly maxDf: number;
  private readonly maxFeatures?: number;
  private readonly isStopWord: (token: string) => boolean;

  constructor(opts: VectorizerOptions = {}) {
    const [minN, maxN] = opts.ngramRange ?? [1, 1];
    this.minN = minN;
    this.maxN = maxN;
    this.minDf = opts.minDf ?? 1;
    this.maxDf = opts.maxDf ?? 1;
    this.maxFeatures = opts.maxFeatures;
    this.isStopWord = opts.isStopWord ?? (() => false);
  }

  analyze(doc: string): string[] {
    const tokens = tokenize(doc).filter((t) => !this.isStopWord(t));
    return ngrams(tokens, this.minN, this.maxN);
  }

  fitTransform(docs: readonly string[]): SparseVector[] {
    const { perDocument, documentFrequency, corpusFrequency } = countTerms(docs, (d) => this.analyze(d));
    if (documentFrequency.size === 0) {
      throw new Error("empty vocabulary; documents contain only stop words");
    }

    const n = docs.length;
    const maxDocCount = this.maxDf * n;
    if (maxDocCount < this.minDf) {
      throw new Error(`maxDf=${this.maxDf} allows fewer documents than minDf=${this.minDf}`);
    }

    let kept = [...documentFrequency.entries()]
      .filter(([, df]) => df >= this.minDf && df <= maxDocCount)
      .map(([term]) => term);
    if (this.maxFeatures !== undefined && kept.length > this.maxFeatures) {
      kept = kept
        .sort((a, b) => (corpusFrequency.get(b) ?? 0) - (corpusFrequency.get(a) ?? 0) || (a < b ? -1 : a > b ? 1 : 0))
        .slice(0, this.maxFeatures);
    }
    if (kept.length === 0) {
      throw new Error("no terms remain after pruning; lower minDf or raise maxDf");
    }

    this.vocabulary = kept.sort();
    const index = new Map(this.vocabulary.map((t, i) => [t, i]));
    this.idf = this.vocabulary.map((t) => Math.log((1 + n) / (1 + (documentFrequency.get(t) ?? 0))) + 1);

    return perDocument.map((counts) => {
      const indices: number[] = [];
      const values: number[] = [];
      for (const [term, count] of counts) {
        const j = index.get(term);
        if (j === undefined) continue;
        indices.push(j);
        values.push(count * (this.idf[j] ?? 0));
      }
      const norm = Math.sqrt(values.reduce((s, v) => s + v * v, 0));
      return { indices, values: norm > 0 ? values.map((v) => v / norm) : values };
    });
  }
}
