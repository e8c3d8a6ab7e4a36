import { describe, it, expect } from "vitest";

import { SoftmaxRegression, argmax, restoreClassifier } from "@/classifier/index.js";

import { createTestCorpus, fitTestModel } from "@tests/fixtures/corpus.js";

import type { FeatureMatrix } from "@/classifier/index.js";

const oneHot = (columns: number, hot: number[]): FeatureMatrix => ({
  rows: hot.map((index) => ({ indices: [index], values: [1] })),
  columns,
});

describe("SoftmaxRegression", () => {
  it("separates disjoint features", () => {
    const classifier = new SoftmaxRegression({ maxIter: 100 });
    classifier.fit(oneHot(3, [0, 1, 2]), [0, 1, 2], 3);

    expect(classifier.predict(oneHot(3, [0, 1, 2]))).toEqual([0, 1, 2]);
  });

  it("returns probability rows that sum to 1", () => {
    const classifier = new SoftmaxRegression({ maxIter: 10 });
    classifier.fit(oneHot(2, [0, 1]), [0, 1], 2);

    for (const row of classifier.predictProba(oneHot(2, [0, 1]))) {
      expect(row.reduce((sum, p) => sum + p, 0)).toBeCloseTo(1, 10);
    }
  });

  it("keeps classes that have no training rows", () => {
    const classifier = new SoftmaxRegression({ maxIter: 10 });
    classifier.fit(oneHot(2, [0, 1]), [0, 1], 4);

    expect(classifier.classCount).toBe(4);
    expect(classifier.predictProba(oneHot(2, [0]))[0]).toHaveLength(4);
  });

  it("is deterministic", () => {
    const a = new SoftmaxRegression({ maxIter: 20 });
    const b = new SoftmaxRegression({ maxIter: 20 });
    a.fit(oneHot(2, [0, 1, 0]), [0, 1, 0], 2);
    b.fit(oneHot(2, [0, 1, 0]), [0, 1, 0], 2);

    expect(a.toJSON()).toEqual(b.toJSON());
  });

  it("rejects an empty training set", () => {
    const classifier = new SoftmaxRegression();
    expect(() => classifier.fit({ rows: [], columns: 2 }, [], 2)).toThrow("empty training set");
  });

  it("rejects labels outside the class range", () => {
    const classifier = new SoftmaxRegression();
    expect(() => classifier.fit(oneHot(2, [0]), [2], 2)).toThrow("Label 2 is outside [0, 2)");
  });

  it("rejects a feature space mismatch", () => {
    const classifier = new SoftmaxRegression({ maxIter: 1 });
    classifier.fit(oneHot(2, [0]), [0], 1);
    expect(() => classifier.predict(oneHot(3, [0]))).toThrow("Feature space mismatch");
  });

  it("refuses to predict before fitting", () => {
    expect(() => new SoftmaxRegression().predict(oneHot(1, [0]))).toThrow("has not been fitted");
  });

  it("round-trips through its artifact", () => {
    const { vectorizer, classifier } = fitTestModel();
    const restored = restoreClassifier(JSON.parse(JSON.stringify(classifier.toJSON())));
    const features = vectorizer.transform(createTestCorpus().testTexts);

    expect(restored.predictProba(features)).toEqual(classifier.predictProba(features));
  });

  it("rejects an artifact with inconsistent shapes", () => {
    const artifact = { ...fitTestModel().classifier.toJSON(), intercepts: [0] };
    expect(() => restoreClassifier(artifact, 2)).toThrow("Invalid classifier artifact");
  });
});

describe("argmax", () => {
  it("picks the first maximum", () => {
    expect(argmax([0.2, 0.4, 0.4])).toBe(1);
  });
});
