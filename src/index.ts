#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * sshconf - lossless ssh_config editing
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { ValidationError } from "@effect/cli";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { cli } from "./cli/index";
import { ErrorCode, isSshconfError, toExitCode } from "./lib/errors";

export const exitCodeFromExit = (exit: Exit.Exit<unknown, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => ErrorCode.SUCCESS,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => ErrorCode.GENERAL_ERROR,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isSshconfError, (err) => toExitCode(err.code)),
            Match.when(ValidationError.isValidationError, () => ErrorCode.INVALID_ARGS),
            Match.orElse(() => ErrorCode.GENERAL_ERROR)
          ),
      }),
  });

/** Command errors are shown by the CLI layer; only the unexpected ones are reported here. */
const logExitError = (exit: Exit.Exit<unknown, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(
    cli(process.argv).pipe(Effect.provide(NodeContext.layer))
  );
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

// Only run if this is the main entry point
if (require.main === module) {
  void main();
}
