// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger setup and error display to avoid duplication across commands.
 */

import { type CliApp, Command } from "@effect/cli";
import type { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import {
  DebugModeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
  NoColorConfig,
  configPathConfig,
} from "../config/env";
import {
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
} from "../config/field-values";
import { resolve } from "../config/resolve";
import { SshconfLoggerLive } from "../lib/effect-logger";
import { isSshconfError } from "../lib/errors";
import { SSHCONF_VERSION } from "../lib/version";

import { executeCheck } from "./commands/check";
import { executeDump } from "./commands/dump";
import { executeGet } from "./commands/get";
import { executeSet } from "./commands/set";

import {
  type GlobalOptions,
  allFlag,
  dryRun,
  effectiveFormat,
  globalOptions,
  keywordArg,
  valuesArg,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > defaults. */
export interface CommandContext {
  readonly path: string;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
  readonly color: boolean;
}

// Context resolution

/** Resolves configuration from CLI and environment with CLI taking precedence. */
export const resolveContext = (globals: GlobalOptions): Effect.Effect<CommandContext, unknown> =>
  Effect.gen(function* () {
    const path = yield* configPathConfig(globals.file);
    const envLogLevel = yield* LogLevelOptionConfig;
    const envLogFormat = yield* LogFormatOptionConfig;
    const envDebug = yield* DebugModeConfig;
    const noColor = yield* NoColorConfig;

    const logLevel: LogLevel = pipe(
      Match.value(globals.verbose || envDebug),
      Match.when(true, (): LogLevel => "debug"),
      Match.when(
        false,
        (): LogLevel =>
          resolve({ cli: globals.logLevel, env: envLogLevel, fallback: LOG_LEVEL_DEFAULT })
      ),
      Match.exhaustive
    );

    const format: LogFormat = resolve({
      cli: effectiveFormat(globals),
      env: envLogFormat,
      fallback: LOG_FORMAT_DEFAULT,
    });

    return {
      path,
      format,
      logLevel,
      color: process.stderr.isTTY === true && !noColor,
    };
  });

// Error display

const RED = "\x1b[31m";
const RESET = "\x1b[0m";

/** Formats error for terminal output with optional color. Sync because called in exit path. */
const displayError = (err: unknown, ctx: CommandContext): void => {
  if (!isSshconfError(err)) {
    return;
  }
  pipe(
    Match.value(ctx.format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code })}\n`)
    ),
    Match.when("pretty", () => {
      const prefix = ctx.color ? `${RED}✗${RESET}` : "✗";
      process.stderr.write(`${prefix} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

/** Centralizes context, logging and error display so each command stays focused on its logic. */
const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, unknown, FileSystem.FileSystem>
): Effect.Effect<void, unknown, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const ctx = yield* resolveContext(globals);
    yield* pipe(
      Effect.logDebug(`Using ${ctx.path}`),
      Effect.zipRight(handler(ctx)),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx))),
      Effect.provide(
        SshconfLoggerLive({ level: ctx.logLevel, format: ctx.format, color: ctx.color })
      )
    );
  });

// Subcommand definitions

const dumpCmd = Command.make("dump", { ...globalOptions }, (args) =>
  runCommand(args, "dump", (ctx) => executeDump({ path: ctx.path }))
).pipe(Command.withDescription("Print the parsed file as JSON"));

const checkCmd = Command.make("check", { ...globalOptions }, (args) =>
  runCommand(args, "check", (ctx) => executeCheck({ path: ctx.path, format: ctx.format }))
).pipe(Command.withDescription("Report malformed lines and verify the file prints back unchanged"));

const getCmd = Command.make("get", { ...globalOptions, keyword: keywordArg }, (args) =>
  runCommand(args, "get", (ctx) =>
    executeGet({ path: ctx.path, keyword: args.keyword, format: ctx.format })
  )
).pipe(Command.withDescription("Print the values of every entry with a keyword"));

const setCmd = Command.make(
  "set",
  { ...globalOptions, keyword: keywordArg, values: valuesArg, all: allFlag, dryRun },
  (args) =>
    runCommand(args, "set", (ctx) =>
      executeSet({
        path: ctx.path,
        keyword: args.keyword,
        values: args.values,
        all: args.all,
        dryRun: args.dryRun,
      })
    )
).pipe(Command.withDescription("Set a keyword's values, appending an entry if there is none"));

// Root command

const sshconf = Command.make("sshconf").pipe(
  Command.withDescription("Inspect and edit ssh_config files without reformatting them"),
  Command.withSubcommands([dumpCmd, checkCmd, getCmd, setCmd])
);

/** Takes the full `process.argv`. */
export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.CliApp.Environment> = Command.run(sshconf, {
  name: "sshconf",
  version: SSHCONF_VERSION,
});

