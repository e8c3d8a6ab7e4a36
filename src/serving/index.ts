export { ModelHandle, createModelHandle } from "./model-handle.js";
export { PredictionService, createPredictionService } from "./prediction-service.js";
export type {
  Prediction,
  FeedbackSubmission,
  VersionMetrics,
  HealthStatus,
  ServiceDependencies,
} from "./prediction-service.js";
export {
  createApp,
  errorResponse,
  handleRoot,
  handlePredict,
  handleFeedback,
  handleMetrics,
  handleModelVersion,
  handleHealth,
} from "./http.js";
export type { HttpResponse } from "./http.js";
