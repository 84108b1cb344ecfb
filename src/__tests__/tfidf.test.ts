import { describe, it, expect } from "vitest";
import { nmf } from "../utils/nmf.js";
import { type SparseVector, TfidfVectorizer } from "../utils/tfidf.js";

describe("TfidfVectorizer", () => {
  it("uses smoothed idf and l2-normalised rows", () => {
    const v = new TfidfVectorizer();
    const rows = v.fitTransform(["apple banana", "apple cherry"]);
    const b = Math.log(3 / 2) + 1;
    const norm = Math.sqrt(1 + b * b);

    expect(v.vocabulary).toEqual(["apple", "banana", "cherry"]);
    expect(v.idf[0]).toBe(1);
    expect(v.idf[1]).toBeCloseTo(b, 10);
    expect(rows[0].indices).toEqual([0, 1]);
    expect(rows[0].values[0]).toBeCloseTo(1 / norm, 10);
    expect(rows[0].values[1]).toBeCloseTo(b / norm, 10);
    expect(rows[1].indices).toEqual([0, 2]);
  });

  it("removes stop words before forming bigrams", () => {
    const v = new TfidfVectorizer({ ngramRange: [1, 2], isStopWord: (t) => t === "the" });
    expect(v.analyze("eat the cake")).toEqual(["eat", "cake", "eat cake"]);
  });

  it("keeps the most frequent terms under maxFeatures", () => {
    const v = new TfidfVectorizer({ maxFeatures: 1 });
    v.fitTransform(["cat cat dog", "cat fish"]);
    expect(v.vocabulary).toEqual(["cat"]);
  });

  it("rejects corpora with nothing to score", () => {
    const stop = new TfidfVectorizer({ isStopWord: (t) => t === "the" });
    expect(() => stop.fitTransform(["the the", "the"])).toThrow(/empty vocabulary/);

    const narrow = new TfidfVectorizer({ minDf: 5, maxDf: 0.5 });
    expect(() => narrow.fitTransform(["aa", "bb", "cc", "dd"])).toThrow(/allows fewer documents/);
  });
});

describe("nmf", () => {
  const dense = (rows: number[][]): SparseVector[] =>
    rows.map((r) => {
      const indices: number[] = [];
      const values: number[] = [];
      r.forEach((v, j) => {
        if (v !== 0) {
          indices.push(j);
          values.push(v);
        }
      });
      return { indices, values };
    });

  const X = [
    [1, 1, 0, 0],
    [1, 1, 0, 0],
    [0, 0, 1, 1],
    [0, 0, 1, 1],
  ];

  it("factorises a two-block matrix into non-negative parts", () => {
    const { W, H } = nmf(dense(X), { components: 2, columns: 4 });
    expect(W).toHaveLength(4);
    expect(H).toHaveLength(2);
    expect(H[0]).toHaveLength(4);
    expect([...W.flat(), ...H.flat()].every((v) => v >= 0)).toBe(true);

    let err = 0;
    X.forEach((row, i) =>
      row.forEach((x, j) => {
        const approx = W[i][0] * H[0][j] + W[i][1] * H[1][j];
        err += (x - approx) ** 2;
      })
    );
    // the best single-component fit leaves an error of 2
    expect(Math.sqrt(err)).toBeLessThan(1.5);
  });

  it("is reproducible for a fixed seed", () => {
    const a = nmf(dense(X), { components: 2, columns: 4, seed: 7, maxIter: 20 });
    const b = nmf(dense(X), { components: 2, columns: 4, seed: 7, maxIter: 20 });
    expect(a).toEqual(b);
  });

  it("rejects invalid input", () => {
    expect(() => nmf(dense(X), { components: 0, columns: 4 })).toThrow();
    expect(() => nmf([], { components: 1, columns: 4 })).toThrow();
    expect(() => nmf([{ indices: [0], values: [-1] }], { components: 1, columns: 1 })).toThrow(/non-negative/);
  });
});
