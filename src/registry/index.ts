export { ModelRegistry, createModelRegistry, DEFAULT_LABEL_SCHEMA } from "./model-registry.js";
export type { LoadedModel } from "./model-registry.js";
