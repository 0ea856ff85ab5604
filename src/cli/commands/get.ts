// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Prints the values of every entry with the given keyword, one entry per
 * line, in file order. Host blocks are not interpreted.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import { DocumentError, ErrorCode, type SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { type Entry, argumentValues, findEntries } from "../../ssh-config";
import { readConfigFile } from "./utils";

export interface GetOptions {
  path: string;
  keyword: string;
  format: LogFormat;
}

const entryToJson = (
  entry: Entry
): { lineNumber: number; keyword: string; values: readonly string[] } => ({
  lineNumber: entry.index + 1,
  keyword: entry.options.keyword,
  values: argumentValues(entry.options.argumentTokens),
});

export const formatEntries = (found: readonly Entry[], format: LogFormat): readonly string[] =>
  pipe(
    Match.value(format),
    Match.when("json", () => [JSON.stringify(found.map(entryToJson))]),
    Match.when("pretty", () =>
      found.map((entry) => argumentValues(entry.options.argumentTokens).join(" "))
    ),
    Match.exhaustive
  );

export const executeGet = (
  options: GetOptions
): Effect.Effect<void, DocumentError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const file = yield* readConfigFile(options.path);
    const found = findEntries(file, options.keyword);

    if (!Arr.isNonEmptyReadonlyArray(found)) {
      return yield* Effect.fail(
        new DocumentError({
          code: ErrorCode.KEYWORD_NOT_FOUND,
          message: `No ${options.keyword} entry in ${options.path}`,
          path: options.path,
        })
      );
    }

    yield* Effect.logDebug(`${found.length} ${options.keyword} entries`);
    yield* Effect.forEach(formatEntries(found, options.format), writeOutput);
  });
