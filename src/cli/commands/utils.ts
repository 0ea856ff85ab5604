// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * File access for commands. The library passes PlatformError through;
 * commands turn it into a SystemError so it maps to an exit code.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import { ErrorCode, SystemError, errorMessage } from "../../lib/errors";
import {
  type SshConfigFile,
  loadSshConfigText,
  readSshConfig,
  writeSshConfig,
} from "../../ssh-config";

const readFailed =
  (path: string) =>
  (cause: unknown): SystemError =>
    new SystemError({
      code: ErrorCode.FILE_READ_FAILED,
      message: `Failed to read ${path}: ${errorMessage(cause)}`,
      path,
      cause,
    });

export const readConfigFile = (
  path: string
): Effect.Effect<SshConfigFile, SystemError, FileSystem.FileSystem> =>
  pipe(readSshConfig(path), Effect.mapError(readFailed(path)));

export const readConfigText = (
  path: string
): Effect.Effect<string, SystemError, FileSystem.FileSystem> =>
  pipe(loadSshConfigText(path), Effect.mapError(readFailed(path)));

export const writeConfigFile = (
  file: SshConfigFile,
  path: string
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  pipe(
    writeSshConfig(file, path),
    Effect.mapError(
      (cause) =>
        new SystemError({
          code: ErrorCode.FILE_WRITE_FAILED,
          message: `Failed to write ${path}: ${errorMessage(cause)}`,
          path,
          cause,
        })
    )
  );
