// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Whole-document parsing. Never fails: anything that is not an entry,
 * comment or blank line becomes `Malformed`.
 */

import { Array as Arr, Option, pipe } from "effect";
import { parseLine } from "./line";
import { PhysicalLine, type SshConfigFile } from "./model";

/**
 * Split text into physical lines, each keeping its `\n`. Text after the last
 * `\n` is a line only when non-empty, so `""` has no lines and `"\n"` has one.
 */
export const splitPhysicalLines = (content: string): readonly PhysicalLine[] => {
  const pieces = content.split("\n");
  const terminated = pieces.slice(0, -1).map((piece) => `${piece}\n`);
  const unterminated = pipe(
    Arr.last(pieces),
    Option.filter((piece) => piece !== ""),
    Option.toArray
  );
  return [...terminated, ...unterminated].map((text) => PhysicalLine(text));
};

/**
 * @example
 * ```ts
 * const file = parse("Host example.com\n  User root\n", "/home/me/.ssh/config");
 * file.lines.length // 2
 * ```
 */
export const parse = (content: string, source?: string): SshConfigFile => ({
  lines: splitPhysicalLines(content).map(parseLine),
  path: Option.fromNullable(source),
});
