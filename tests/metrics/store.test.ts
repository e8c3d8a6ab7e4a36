import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";

import { MetricsStore, evaluate } from "@/metrics/index.js";
import { ArtifactError } from "@/lib/errors.js";

import { LABELS, createTempDir, removeTempDir } from "@tests/fixtures/corpus.js";

describe("MetricsStore", () => {
  let dir: string;
  let store: MetricsStore;

  beforeEach(async () => {
    dir = await createTempDir();
    store = new MetricsStore(path.join(dir, "metrics"));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("round-trips persisted metrics", async () => {
    const metrics = evaluate([0, 1, 2, 3], [0, 1, 2, 2], LABELS);
    await store.persist(metrics, 1);

    expect(await store.load(1)).toEqual({ success: true, data: metrics });
  });

  it("writes one file per version", async () => {
    await store.persist(evaluate([0], [0], LABELS), 2);

    expect(await fs.readdir(path.join(dir, "metrics"))).toEqual(["metrics_v2.json"]);
  });

  it("returns NotFound for a version without metrics", async () => {
    const result = await store.load(99);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Metrics for v99 not found");
      expect(result.error.kind).toBe("metrics");
    }
  });

  it("throws on a malformed document", async () => {
    await fs.mkdir(path.join(dir, "metrics"), { recursive: true });
    await fs.writeFile(path.join(dir, "metrics", "metrics_v1.json"), JSON.stringify({ accuracy: 1 }));

    await expect(store.load(1)).rejects.toBeInstanceOf(ArtifactError);
  });

  it("compares headline metrics, omitting missing versions", async () => {
    await store.persist(evaluate([0, 1, 2, 3], [0, 1, 2, 3], LABELS), 1);
    await store.persist(evaluate([0, 1], [0, 0], LABELS), 3);

    const comparison = await store.compare([1, 2, 3]);

    expect([...comparison.keys()]).toEqual([1, 3]);
    expect(comparison.get(1)).toEqual({ accuracy: 1, f1Macro: 1, f1Weighted: 1 });
    expect(comparison.get(3)?.accuracy).toBe(0.5);
  });
});
