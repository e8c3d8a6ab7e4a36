export { TrainingPipeline, createTrainingPipeline, alignLabels } from "./pipeline.js";
export { combineDatasets, labelIdFor, toLabeledSamples } from "./combine.js";
export type { LabeledSet, LabeledSample } from "./combine.js";
export type {
  TrainingDependencies,
  RetrainOptions,
  TrainingResult,
  MetricsDelta,
} from "./types.js";
