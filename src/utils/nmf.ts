import type { SparseVector } from "./tfidf.js";

export type NmfOptions = {
  components: number;
  columns: number;
  maxIter?: number;
  seed?: number;
};

export type NmfResult = {
  /** rows x components */
  W: number[][];
  /** components x columns; row k holds the term weights of component k */
  H: number[][];
};

const EPS = 1e-10;

// mulberry32: small deterministic PRNG so runs are reproducible
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function matrix(rows: number, cols: number, fill: (i: number, j: number) => number): number[][] {
  return Array.from({ length: rows }, (_, i) => Array.from({ length: cols }, (_, j) => fill(i, j)));
}

function gram(A: number[][], k: number): number[][] {
  // A^T A for A with k columns
  const G = matrix(k, k, () => 0);
  for (const row of A) {
    for (let a = 0; a < k; a++) {
      if (row[a] === 0) continue;
      for (let b = 0; b < k; b++) G[a][b] += row[a] * row[b];
    }
  }
  return G;
}

/**
 * Non-negative matrix factorisation X ≈ W·H on a sparse, non-negative matrix,
 * Frobenius loss, Lee–Seung multiplicative updates from a seeded random start.
 */
export function nmf(X: readonly SparseVector[], opts: NmfOptions): NmfResult {
  const { components: k, columns: m } = opts;
  const maxIter = opts.maxIter ?? 200;
  const n = X.length;
  if (k < 1) throw new Error("nmf needs at least one component");
  if (n === 0 || m === 0) throw new Error("nmf needs a non-empty matrix");

  let sum = 0;
  for (const row of X) {
    for (const v of row.values) {
      if (v < 0 || !Number.isFinite(v)) throw new Error("nmf input must be finite and non-negative");
      sum += v;
    }
  }
  const scale = Math.sqrt(sum / (n * m) / k);
  const rand = seededRandom(opts.seed ?? 42);
  const W = matrix(n, k, () => scale * rand() + EPS);
  const H = matrix(k, m, () => scale * rand() + EPS);

  for (let iter = 0; iter < maxIter; iter++) {
    // H <- H * (W^T X) / (W^T W H)
    const WtX = matrix(k, m, () => 0);
    X.forEach((row, i) => {
      row.indices.forEach((j, p) => {
        const v = row.values[p];
        for (let c = 0; c < k; c++) WtX[c][j] += W[i][c] * v;
      });
    });
    const WtW = gram(W, k);
    for (let j = 0; j < m; j++) {
      const column = H.map((Hc) => Hc[j]);
      for (let c = 0; c < k; c++) {
        let denom = 0;
        for (let d = 0; d < k; d++) denom += WtW[c][d] * column[d];
        H[c][j] = (H[c][j] * WtX[c][j]) / (denom + EPS);
      }
    }

    // W <- W * (X H^T) / (W H H^T)
    const HHt = matrix(k, k, (a, b) => {
      let s = 0;
      for (let j = 0; j < m; j++) s += H[a][j] * H[b][j];
      return s;
    });
    X.forEach((row, i) => {
      const XHt = new Array<number>(k).fill(0);
      row.indices.forEach((j, p) => {
        const v = row.values[p];
        for (let c = 0; c < k; c++) XHt[c] += v * H[c][j];
      });
      const Wi = W[i];
      W[i] = Wi.map((w, c) => {
        let denom = 0;
        for (let d = 0; d < k; d++) denom += Wi[d] * HHt[d][c];
        return (w * XHt[c]) / (denom + EPS);
      });
    });
  }

  for (const row of H) {
    if (row.some((v) => !Number.isFinite(v))) throw new Error("nmf diverged");
  }
  return { W, H };
}
