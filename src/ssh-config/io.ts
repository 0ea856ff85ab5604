// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Filesystem boundary. Reads and writes go through the platform FileSystem
 * service; its PlatformError is passed through as-is.
 */

import { type Error as PlatformErrors, FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { SshConfigFile } from "./model";
import { parse } from "./parse";
import { serialize } from "./serialize";

type PlatformError = PlatformErrors.PlatformError;

/** Raw UTF-8 text of a config file. */
export const loadSshConfigText = (
  path: string
): Effect.Effect<string, PlatformError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  });

/** Read and parse, recording `path` as the source. */
export const readSshConfig = (
  path: string
): Effect.Effect<SshConfigFile, PlatformError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const content = yield* loadSshConfigText(path);
    yield* Effect.logDebug(`Read ${path}`);
    return parse(content, path);
  });

export const writeSshConfig = (
  file: SshConfigFile,
  path: string
): Effect.Effect<void, PlatformError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, serialize(file));
    yield* Effect.logDebug(`Wrote ${file.lines.length} lines to ${path}`);
  });
