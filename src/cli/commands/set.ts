// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Edits one keyword and writes the file back. Lines other than the edited
 * ones are printed exactly as they were read.
 */

import type { FileSystem } from "@effect/platform";
import { type Array as Arr, Effect } from "effect";
import type { DocumentError, GeneralError, SystemError } from "../../lib/errors";
import { logSuccess, writeOutputRaw } from "../../lib/log";
import { makeArguments, serialize, setEntry } from "../../ssh-config";
import { readConfigFile, writeConfigFile } from "./utils";

export interface SetOptions {
  path: string;
  keyword: string;
  values: Arr.NonEmptyReadonlyArray<string>;
  all: boolean;
  dryRun: boolean;
}

export const executeSet = (
  options: SetOptions
): Effect.Effect<void, DocumentError | GeneralError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { path, keyword, values, all, dryRun } = options;

    const tokens = yield* makeArguments(values);
    const file = yield* readConfigFile(path);
    const result = yield* setEntry(file, keyword, tokens, { all });

    if (dryRun) {
      yield* Effect.logDebug(`Dry run: ${result.updated} line(s) would change`);
      yield* writeOutputRaw(serialize(result.file));
      return;
    }

    yield* writeConfigFile(result.file, path);
    yield* logSuccess(`Set ${keyword} in ${path} (${result.updated} line(s))`);
  });
