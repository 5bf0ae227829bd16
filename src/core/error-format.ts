/*
Purpose: turn thrown values into the lines the CLI prints for fatal errors.
Assumptions: debug mode may include error codes, causes and stack traces.
Usage: formatErrorLines(err, { mode: "debug" }).map((line) => line.text).
*/

import {
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }

  if (normalized.hint) {
    lines.push({ kind: "hint", text: `Hint: ${normalized.hint}` });
  }

  if ((options.mode ?? "short") === "debug") {
    lines.push({ kind: "code", text: `Code: ${normalized.code}` });

    const cause = normalized.cause === undefined ? undefined : formatErrorMessage(normalized.cause);
    if (cause && cause !== normalized.message) {
      lines.push({ kind: "cause", text: `Cause: ${cause}` });
    }

    const stack = resolveStack(error) ?? resolveStack(normalized.cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeError(error: unknown): UserFacingErrorInput {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: error.title.trim() || DEFAULT_ERROR_TITLE,
      message: error.message.trim() || DEFAULT_ERROR_MESSAGE,
      hint: error.hint?.trim() || undefined,
      cause: error.cause,
    };
  }

  const message =
    error === null || error === undefined ? DEFAULT_ERROR_MESSAGE : formatErrorMessage(error);

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: message.trim() || DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  };
}

function resolveStack(value: unknown): string | undefined {
  if (value instanceof Error && value.stack) {
    return value.stack;
  }
  return undefined;
}
