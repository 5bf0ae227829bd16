/*
Purpose: error types shared by the pruning pipeline and the CLI.
Assumptions: UserFacingError instances are safe to display to operators; anything
  thrown as a UserFacingError aborts the run with a non-zero exit code.
Usage: throw createInventoryError("...", cause); throw new UserFacingError({ code, title, message }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class PrunerError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "PrunerError";
  }
}

export class ConfigError extends PrunerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class CheckpointError extends PrunerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CheckpointError";
  }
}

export class HistoryError extends PrunerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "HistoryError";
  }
}

export class InventoryError extends PrunerError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InventoryError";
  }
}

export class SchemaUnsupportedError extends PrunerError {
  constructor(
    message: string,
    public readonly location: { revision: string; path: string },
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "SchemaUnsupportedError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  checkpoint: "CHECKPOINT_ERROR",
  history: "HISTORY_ERROR",
  inventory: "INVENTORY_ERROR",
  schema: "SCHEMA_UNSUPPORTED",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

export function createConfigError(message: string, hint?: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid configuration.",
    message,
    hint,
    cause: new ConfigError(message, cause),
  });
}

export function createCheckpointError(
  filePath: string,
  detail: string,
  cause?: unknown,
): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.checkpoint,
    title: "Checkpoint file unreadable.",
    message: `Cannot use checkpoint ${filePath}: ${detail}`,
    hint: "Fix or move the file aside, or pass --checkpoint-path to start a fresh checkpoint.",
    cause: new CheckpointError(detail, cause),
  });
}

export function createHistoryError(message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.history,
    title: "Metadata history unavailable.",
    message,
    hint: "Check --installer-repo and that the release branch exists.",
    cause: new HistoryError(message, cause),
  });
}

export function createInventoryError(message: string, cause?: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.inventory,
    title: "Build index unavailable.",
    message,
    hint: "No images were classified or touched. Check --builds-url and retry later.",
    cause: new InventoryError(message, cause),
  });
}

export function createSchemaUnsupportedError(error: SchemaUnsupportedError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.schema,
    title: "Unrecognized metadata schema.",
    message: error.message,
    hint: `Refusing to continue: builds referenced by ${error.location.path} at ${error.location.revision} could go unprotected.`,
    cause: error,
  });
}
