// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only check of a config file: reports every malformed line and
 * confirms that printing the parsed file gives back the text on disk.
 * Suitable for pre-commit hooks on dotfile repositories.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { DocumentError, ErrorCode, type SystemError } from "../../lib/errors";
import { logFail, logSuccess, writeOutput } from "../../lib/log";
import {
  type MalformedLine,
  type SshConfigFile,
  entries,
  malformedLines,
  parse,
  serialize,
} from "../../ssh-config";
import { readConfigText } from "./utils";

export interface CheckOptions {
  path: string;
  format: LogFormat;
}

export interface CheckReport {
  readonly path: string;
  readonly lines: number;
  readonly entries: number;
  readonly malformed: readonly MalformedLine[];
  readonly roundTrip: boolean;
}

/** A final line without `\n` is printed with one, so compare against that. */
export const normalizeFinalNewline = (text: string): string =>
  text === "" || text.endsWith("\n") ? text : `${text}\n`;

export const buildCheckReport = (path: string, text: string): CheckReport => {
  const file: SshConfigFile = parse(text, path);
  return {
    path,
    lines: file.lines.length,
    entries: entries(file).length,
    malformed: malformedLines(file),
    roundTrip: serialize(file) === normalizeFinalNewline(text),
  };
};

const reportFailure = (report: CheckReport): Effect.Effect<void, DocumentError> =>
  pipe(
    Match.value(report),
    Match.when({ roundTrip: false }, () =>
      Effect.fail(
        new DocumentError({
          code: ErrorCode.ROUND_TRIP_MISMATCH,
          message: `${report.path} does not print back to its own text`,
          path: report.path,
        })
      )
    ),
    Match.when(
      (r: CheckReport) => Arr.isNonEmptyReadonlyArray(r.malformed),
      () =>
        Effect.fail(
          new DocumentError({
            code: ErrorCode.MALFORMED_ENTRIES,
            message: `${report.malformed.length} malformed line(s) in ${report.path}`,
            path: report.path,
          })
        )
    ),
    Match.orElse(() => Effect.void)
  );

export const executeCheck = (
  options: CheckOptions
): Effect.Effect<void, DocumentError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const text = yield* readConfigText(options.path);
    const report = buildCheckReport(options.path, text);

    yield* Effect.forEach(report.malformed, ({ lineNumber, text: lineText }) =>
      logFail(`${report.path}:${lineNumber}: malformed: ${lineText}`)
    );

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(JSON.stringify(report))),
      Match.when("pretty", () => Effect.void),
      Match.exhaustive
    );

    yield* reportFailure(report);

    yield* logSuccess(`${report.path}: ${report.entries} entries in ${report.lines} lines`);
  });
