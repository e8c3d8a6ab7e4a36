import { describe, it, expect } from "vitest";

import { TfidfVectorizer, restoreVectorizer, ngrams, tokenize } from "@/classifier/index.js";

describe("tokenize", () => {
  it("lowercases and drops single-character tokens", () => {
    expect(tokenize("A Quick, brown FOX!")).toEqual(["quick", "brown", "fox"]);
  });

  it("returns empty list for blank text", () => {
    expect(tokenize("   ")).toEqual([]);
  });
});

describe("ngrams", () => {
  it("produces unigrams and bigrams", () => {
    expect(ngrams(["red", "blue", "green"], [1, 2])).toEqual([
      "red",
      "blue",
      "green",
      "red blue",
      "blue green",
    ]);
  });
});

describe("TfidfVectorizer", () => {
  it("numbers vocabulary columns alphabetically", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 1, maxDf: 1, ngramRange: [1, 1] });
    vectorizer.fitTransform(["zebra apple", "mango apple"]);

    expect(vectorizer.toJSON().vocabulary).toEqual({ apple: 0, mango: 1, zebra: 2 });
  });

  it("computes smoothed idf", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 1, maxDf: 1, ngramRange: [1, 1] });
    vectorizer.fitTransform(["zebra apple", "mango apple"]);
    const { idf } = vectorizer.toJSON();

    // apple in both documents, the others in one
    expect(idf[0]).toBeCloseTo(1, 10);
    expect(idf[1]).toBeCloseTo(Math.log(3 / 2) + 1, 10);
    expect(idf[2]).toBeCloseTo(Math.log(3 / 2) + 1, 10);
  });

  it("L2-normalizes rows", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 1, maxDf: 1, ngramRange: [1, 1] });
    const matrix = vectorizer.fitTransform(["zebra apple", "mango apple apple"]);

    for (const row of matrix.rows) {
      const norm = Math.sqrt(row.values.reduce((sum, v) => sum + v * v, 0));
      expect(norm).toBeCloseTo(1, 10);
    }
    expect(matrix.columns).toBe(3);
  });

  it("drops terms below minDf and above maxDf", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 2, maxDf: 0.7, ngramRange: [1, 1] });
    vectorizer.fitTransform(["common rare", "common shared", "common shared"]);

    // "common" is in 3/3 documents (> 0.7), "rare" in 1 (< 2)
    expect(vectorizer.toJSON().vocabulary).toEqual({ shared: 0 });
  });

  it("keeps the most frequent terms up to maxFeatures", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 1, maxDf: 1, maxFeatures: 2, ngramRange: [1, 1] });
    vectorizer.fitTransform(["beta beta beta alpha", "gamma gamma gamma alpha"]);

    expect(Object.keys(vectorizer.toJSON().vocabulary)).toEqual(["beta", "gamma"]);
  });

  it("ignores unknown terms on transform", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 1, maxDf: 1, ngramRange: [1, 1] });
    vectorizer.fitTransform(["apple mango"]);
    const matrix = vectorizer.transform(["kiwi"]);

    expect(matrix.rows[0]).toEqual({ indices: [], values: [] });
    expect(matrix.columns).toBe(2);
  });

  it("rejects an invalid ngram range", () => {
    expect(() => new TfidfVectorizer({ ngramRange: [2, 1] })).toThrow("Invalid ngram range");
  });

  it("restores an identical transform from its artifact", () => {
    const vectorizer = new TfidfVectorizer({ minDf: 1, maxDf: 1 });
    vectorizer.fitTransform(["stocks rally on earnings", "team wins the final"]);
    const restored = restoreVectorizer(JSON.parse(JSON.stringify(vectorizer.toJSON())));

    expect(restored.transform(["earnings rally"])).toEqual(vectorizer.transform(["earnings rally"]));
  });

  it("rejects a malformed artifact", () => {
    expect(() => restoreVectorizer({ kind: "tfidf" }, 3)).toThrow("Invalid vectorizer artifact");
  });
});
