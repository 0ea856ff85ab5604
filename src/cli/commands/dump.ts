// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Prints the parsed model as JSON. Handy for seeing why a line came out
 * Malformed or how its arguments were split.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { SystemError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { ArgumentToken, Expression, type Line, type SshConfigFile } from "../../ssh-config";
import { readConfigFile } from "./utils";

export interface DumpOptions {
  path: string;
}

type TokenJson = { readonly type: ArgumentToken["_tag"]; readonly value: string };

const tokenToJson: (token: ArgumentToken) => TokenJson = ArgumentToken.$match({
  Pure: ({ value }): TokenJson => ({ type: "Pure", value }),
  Quoted: ({ value }): TokenJson => ({ type: "Quoted", value }),
  Whitespace: ({ value }): TokenJson => ({ type: "Whitespace", value }),
});

const expressionToJson: (expression: Expression) => Record<string, unknown> = Expression.$match({
  ConfigurationOptions: ({ keyword, separator, argumentTokens }) => ({
    type: "ConfigurationOptions",
    keyword,
    separator,
    arguments: argumentTokens.map(tokenToJson),
  }),
  Comment: ({ text }) => ({ type: "Comment", text }),
  Empty: () => ({ type: "Empty" }),
  Malformed: ({ text }) => ({ type: "Malformed", text }),
});

const lineToJson = (line: Line): Record<string, unknown> => ({
  indentPrefix: line.indentPrefix,
  expression: expressionToJson(line.expression),
  indentSuffix: line.indentSuffix,
  lineEnding: line.lineEnding,
});

/** Plain-JSON view of the model: tags become `type`, the path becomes a string or null. */
export const toDocumentJson = (file: SshConfigFile): Record<string, unknown> => ({
  path: Option.getOrNull(file.path),
  lines: file.lines.map(lineToJson),
});

export const executeDump = (
  options: DumpOptions
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const file = yield* readConfigFile(options.path);
    yield* writeOutput(JSON.stringify(toDocumentJson(file), null, 2));
  });
