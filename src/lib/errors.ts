// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for the configurator.
 * Every failure is a tagged error carrying a code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly ABORTED: 5;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly REGISTRATION_ERROR: 14;
  readonly SETTING_NOT_FOUND: 15;
  readonly APPLY_CYCLE: 16;

  // System (20-29)
  readonly FILE_READ_FAILED: 27;
  readonly FILE_WRITE_FAILED: 28;
}

/**
 * Error codes for all configurator operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  // General (0-9)
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  ABORTED: 5,

  // Config (10-19)
  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  REGISTRATION_ERROR: 14,
  SETTING_NOT_FOUND: 15,
  APPLY_CYCLE: 16,

  // System (20-29)
  FILE_READ_FAILED: 27,
  FILE_WRITE_FAILED: 28,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// General / system errors
// ============================================================================

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: 1 | 2;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: 27 | 28;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Global TOML configuration could not be found, parsed or decoded. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: 10 | 11 | 12;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** The user left a prompt with Ctrl+C / Ctrl+D or chose to abort. */
export class PromptError extends Data.TaggedError("PromptError")<{
  readonly code: 5;
  readonly message: string;
}> {}

// ============================================================================
// Settings engine errors
// ============================================================================

/** A value failed its setting type's validation. Recoverable: re-prompt. */
export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly code: 12;
  readonly setting: string;
  readonly value: string;
  readonly message: string;
}> {}

/** A preset-level invariant spanning several settings is violated. */
export class CrossFieldError extends Data.TaggedError("CrossFieldError")<{
  readonly code: 12;
  readonly preset: string;
  readonly message: string;
}> {}

export class UnknownTypeError extends Data.TaggedError("UnknownTypeError")<{
  readonly code: 14;
  readonly type: string;
  readonly message: string;
}> {}

export class DuplicateSettingError extends Data.TaggedError("DuplicateSettingError")<{
  readonly code: 14;
  readonly setting: string;
  readonly message: string;
}> {}

export class DuplicatePresetError extends Data.TaggedError("DuplicatePresetError")<{
  readonly code: 14;
  readonly preset: string;
  readonly message: string;
}> {}

/** A type's attribute struct could not be decoded (e.g. choice without options). */
export class MissingAttributeError extends Data.TaggedError("MissingAttributeError")<{
  readonly code: 14;
  readonly setting: string;
  readonly type: string;
  readonly message: string;
}> {}

/** A visibility condition string such as `NETWORK_METHOD==static` could not be parsed. */
export class InvalidConditionError extends Data.TaggedError("InvalidConditionError")<{
  readonly code: 14;
  readonly setting: string;
  readonly condition: string;
  readonly message: string;
}> {}

export class UnknownPresetError extends Data.TaggedError("UnknownPresetError")<{
  readonly code: 14;
  readonly preset: string;
  readonly message: string;
}> {}

export class UnknownSettingError extends Data.TaggedError("UnknownSettingError")<{
  readonly code: 15;
  readonly setting: string;
  readonly message: string;
}> {}

export class ApplyCycleError extends Data.TaggedError("ApplyCycleError")<{
  readonly code: 16;
  readonly chain: readonly string[];
  readonly message: string;
}> {}

/** Structural errors raised while building the registry; fatal at startup. */
export type RegistrationError =
  | UnknownTypeError
  | DuplicateSettingError
  | DuplicatePresetError
  | MissingAttributeError
  | InvalidConditionError
  | UnknownPresetError
  | UnknownSettingError;

/** Failures of a single `set` call. */
export type SetError = ValidationError | UnknownSettingError | ApplyCycleError;

export type AppError =
  | GeneralError
  | SystemError
  | ConfigError
  | PromptError
  | ValidationError
  | CrossFieldError
  | RegistrationError
  | ApplyCycleError;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
