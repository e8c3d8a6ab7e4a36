/**
 * Human feedback collection
 */

// Types
export type {
  FeedbackInput,
  FeedbackRecord,
  FeedbackSummary,
  TrainingSample,
} from "./types.js";

export { FeedbackInputSchema, FeedbackRecordSchema } from "./types.js";

// Store
export {
  FeedbackStore,
  createFeedbackStore,
  projectForTraining,
  summarize,
  generateReport,
} from "./store.js";
