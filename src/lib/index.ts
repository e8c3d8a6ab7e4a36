// Error classes
export {
  RelabelError,
  ValidationError,
  EmptyInputError,
  ConfigError,
  NotFoundError,
  VersionConflictError,
  NoBaselineModelError,
  UnknownLabelError,
  NoModelAvailableError,
  ArtifactError,
} from "./errors.js";
export type { NotFoundKind } from "./errors.js";

// Result type and utilities
export { ok, err, unwrap, unwrapOr } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel } from "./logger.js";

// Files
export { writeFileAtomic, readJsonFile, isNotFound } from "./files.js";

// Label schemas
export { LabelSchemaSchema, findDuplicateLabel } from "./labels.js";
