// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Args as A, Options as O } from "@effect/cli";
import { type Array as Arr, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

type Args<T> = A.Args<T>;
type Options<T> = O.Options<T>;

// Shared positional arguments

export const keywordArg: Args<string> = A.text({ name: "keyword" }).pipe(
  A.withDescription("Configuration keyword, matched case-insensitively (e.g. User, Port)")
);

export const valuesArg: Args<Arr.NonEmptyReadonlyArray<string>> = A.text({ name: "value" }).pipe(
  A.withDescription("Argument values; quoted in the file when they need it"),
  A.atLeast(1)
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly file: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  file: O.text("file").pipe(
    O.withAlias("F"),
    O.withDescription("ssh_config file (default: $SSHCONF_FILE or ~/.ssh/config)"),
    O.optional
  ),
};

// Per-command options

export const allFlag: Options<boolean> = O.boolean("all").pipe(
  O.withDescription("Update every matching entry, not only the first")
);

export const dryRun: Options<boolean> = O.boolean("dry-run").pipe(
  O.withDescription("Print the edited file instead of writing it")
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly file: Option.Option<string>;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
