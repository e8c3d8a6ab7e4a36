/**
 * Base error class for all relabel errors
 */
export class RelabelError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RelabelError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for invalid input (feedback, prediction text, corpus rows)
 */
export class ValidationError extends RelabelError {
  constructor(message: string, context?: Record<string, unknown>, code = "VALIDATION_ERROR") {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Blank prediction input. Raised before any model load is attempted.
 */
export class EmptyInputError extends ValidationError {
  constructor() {
    super("Text cannot be empty", undefined, "EMPTY_INPUT");
    this.name = "EmptyInputError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends RelabelError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * What a NotFoundError refers to
 */
export type NotFoundKind = "version" | "classifier" | "vectorizer" | "metrics";

/**
 * Error for a missing version, artifact or metrics record
 */
export class NotFoundError extends RelabelError {
  constructor(
    message: string,
    public readonly kind: NotFoundKind,
    public readonly versionId?: number
  ) {
    super(message, "NOT_FOUND", { kind, versionId });
    this.name = "NotFoundError";
  }
}

/**
 * Error for an attempt to register a version id that is already used
 */
export class VersionConflictError extends RelabelError {
  constructor(
    public readonly versionId: number,
    message = `Model v${versionId} is already registered`
  ) {
    super(message, "VERSION_CONFLICT", { versionId });
    this.name = "VersionConflictError";
  }
}

/**
 * Error for retraining without a prior baseline version
 */
export class NoBaselineModelError extends RelabelError {
  constructor() {
    super("No baseline model found. Run `relabel train-baseline` first.", "NO_BASELINE_MODEL");
    this.name = "NoBaselineModelError";
  }
}

/**
 * Error for a feedback label that the active schema does not contain
 */
export class UnknownLabelError extends RelabelError {
  constructor(label: string, labelSchema: readonly string[]) {
    super(`Unknown label "${label}". Expected one of: ${labelSchema.join(", ")}`, "UNKNOWN_LABEL", {
      label,
      labelSchema: [...labelSchema],
    });
    this.name = "UnknownLabelError";
  }
}

/**
 * Error for prediction when nothing is registered
 */
export class NoModelAvailableError extends RelabelError {
  constructor() {
    super("No model available. Train a baseline model first.", "NO_MODEL_AVAILABLE");
    this.name = "NoModelAvailableError";
  }
}

/**
 * Error for a stored artifact that exists but cannot be read back
 */
export class ArtifactError extends RelabelError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "ARTIFACT_ERROR", context);
    this.name = "ArtifactError";
  }
}
