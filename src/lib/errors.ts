// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for sshconf.
 * Uses typed error codes that map to exit codes.
 *
 * Malformed ssh_config text is not an error: the parser keeps it as data.
 * These errors cover contract violations, failed document checks and I/O.
 */

import { Data, Match, pipe } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Document (10-19)
  readonly MALFORMED_ENTRIES: 10;
  readonly ROUND_TRIP_MISMATCH: 11;
  readonly KEYWORD_NOT_FOUND: 12;
  readonly UNREPRESENTABLE_ARGUMENT: 13;

  // System (20-29)
  readonly FILE_READ_FAILED: 20;
  readonly FILE_WRITE_FAILED: 21;
}

/**
 * Error codes for all sshconf operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  MALFORMED_ENTRIES: 10,
  ROUND_TRIP_MISMATCH: 11,
  KEYWORD_NOT_FOUND: 12,
  UNREPRESENTABLE_ARGUMENT: 13,

  FILE_READ_FAILED: 20,
  FILE_WRITE_FAILED: 21,
};

export type ErrorCodeValue = ErrorCodeMap[keyof ErrorCodeMap];

export type GeneralErrorCode = ErrorCodeMap["GENERAL_ERROR" | "INVALID_ARGS"];

export type DocumentErrorCode = ErrorCodeMap[
  | "MALFORMED_ENTRIES"
  | "ROUND_TRIP_MISMATCH"
  | "KEYWORD_NOT_FOUND"
  | "UNREPRESENTABLE_ARGUMENT"];

export type SystemErrorCode = ErrorCodeMap["FILE_READ_FAILED" | "FILE_WRITE_FAILED"];

/** Caller mistakes: bad CLI input, multi-line text given as one line. */
export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** A parsed document that fails a check the caller asked for. */
export class DocumentError extends Data.TaggedError("DocumentError")<{
  readonly code: DocumentErrorCode;
  readonly message: string;
  readonly path?: string;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

export type SshconfError = GeneralError | DocumentError | SystemError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string =>
  pipe(
    Match.value(e),
    Match.when(Match.instanceOf(Error), (err) => err.message),
    Match.when(Match.string, (s) => s),
    Match.orElse(() => String(e))
  );

/** Type guard for error display routing. Our errors carry exit codes; unknown errors get generic handling. */
export const isSshconfError = (err: unknown): err is SshconfError =>
  err instanceof GeneralError || err instanceof DocumentError || err instanceof SystemError;
