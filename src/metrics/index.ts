export { evaluate } from "./engine.js";
export { MetricsStore, createMetricsStore } from "./store.js";
export { MetricsRecordSchema, ClassMetricsSchema } from "./types.js";
export type { MetricsRecord, ClassMetrics, MetricsSummary } from "./types.js";
