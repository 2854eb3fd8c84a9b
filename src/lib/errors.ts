// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for podcompose.
 * Every error is a tagged value with a code that doubles as the process exit code.
 */

import { Data, Match, pipe } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly CONFIG_MERGE_ERROR: 13;
  readonly SUBSTITUTION_FAILED: 14;
  readonly UNRESOLVED_REFERENCE: 15;

  // System (20-29)
  readonly EXEC_FAILED: 26;
  readonly FILE_READ_FAILED: 27;

  // Container (40-49)
  readonly NETWORK_CREATE_FAILED: 42;
  readonly VOLUME_CREATE_FAILED: 43;
  readonly CONTAINER_NOT_FOUND: 44;
  readonly EXTERNAL_TOOL_FAILED: 45;

  // Interrupted by signal
  readonly INTERRUPTED: 130;
}

/**
 * Error codes for all podcompose operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  CONFIG_MERGE_ERROR: 13,
  SUBSTITUTION_FAILED: 14,
  UNRESOLVED_REFERENCE: 15,

  EXEC_FAILED: 26,
  FILE_READ_FAILED: 27,

  NETWORK_CREATE_FAILED: 42,
  VOLUME_CREATE_FAILED: 43,
  CONTAINER_NOT_FOUND: 44,
  EXTERNAL_TOOL_FAILED: 45,

  INTERRUPTED: 130,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// Tagged errors
// ============================================================================

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: ErrorCodeValue;
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Compose file or tool configuration could not be read, parsed or validated. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ErrorCodeValue;
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

/** `${NAME?msg}` or `${NAME:?msg}` hit an absent (or empty) variable. */
export class SubstitutionError extends Data.TaggedError("SubstitutionError")<{
  readonly code: typeof ErrorCode.SUBSTITUTION_FAILED;
  readonly message: string;
  readonly variable: string;
}> {}

export type NodeKind = "scalar" | "sequence" | "mapping";

/** Two layers disagree on the shape of a key's value. */
export class MergeTypeError extends Data.TaggedError("MergeTypeError")<{
  readonly code: typeof ErrorCode.CONFIG_MERGE_ERROR;
  readonly message: string;
  readonly key: string;
  readonly targetKind: NodeKind;
  readonly sourceKind: NodeKind;
}> {}

export type ReferenceKind = "volume" | "network" | "service";

export class UnresolvedReferenceError extends Data.TaggedError("UnresolvedReferenceError")<{
  readonly code: typeof ErrorCode.UNRESOLVED_REFERENCE;
  readonly message: string;
  readonly kind: ReferenceKind;
  readonly name: string;
  readonly referrer: string;
}> {}

/** The container tool ran but exited non-zero. */
export class ExternalToolError extends Data.TaggedError("ExternalToolError")<{
  readonly code: ErrorCodeValue;
  readonly message: string;
  readonly argv: readonly string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}> {}

/** The container tool could not be spawned or its streams failed. */
export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: ErrorCodeValue;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export type ResolutionError =
  | ConfigError
  | SubstitutionError
  | MergeTypeError
  | UnresolvedReferenceError;

export type AppError = GeneralError | ResolutionError | ExternalToolError | SystemError;

// ============================================================================
// Constructors and helpers
// ============================================================================

export const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

export const unresolvedReference = (
  kind: ReferenceKind,
  name: string,
  referrer: string
): UnresolvedReferenceError =>
  new UnresolvedReferenceError({
    code: ErrorCode.UNRESOLVED_REFERENCE,
    message: `${referrer} refers to undefined ${kind} ${name}`,
    kind,
    name,
    referrer,
  });

export const externalToolFailed = (
  argv: readonly string[],
  exitCode: number,
  stdout: string,
  stderr: string
): ExternalToolError =>
  new ExternalToolError({
    code: ErrorCode.EXTERNAL_TOOL_FAILED,
    message: `command exited with code ${exitCode}: ${argv.join(" ")}`,
    argv,
    exitCode,
    stdout,
    stderr,
  });

const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/** Renders an error for the terminal. Tool failures include the full argument vector and stderr. */
export const formatError = (err: unknown): string =>
  isAppError(err)
    ? pipe(
        Match.value(err),
        Match.tag("ExternalToolError", (e): string => {
          const stderr = e.stderr.trim();
          return stderr === "" ? e.message : `${e.message}\n${stderr}`;
        }),
        Match.tag("ConfigError", (e): string =>
          e.path === undefined || e.message.includes(e.path) ? e.message : `${e.path}: ${e.message}`
        ),
        Match.orElse((e): string => e.message)
      )
    : errorMessage(err);

/** Exit code for any failure value, 1 for foreign errors. */
export const exitCodeOf = (err: unknown): number => (isAppError(err) ? err.code : ErrorCode.GENERAL_ERROR);
