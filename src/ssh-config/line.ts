// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Line segmenter: terminator, indentation, then the expression in between.
 */

import { Either, pipe } from "effect";
import { isBlank } from "../lib/char";
import { ErrorCode, GeneralError } from "../lib/errors";
import { span, spanEnd } from "../lib/str";
import { classifyExpression } from "./expression";
import { type Line, type LineEnding, PhysicalLine, WhitespaceString } from "./model";

/**
 * `[content, lineEnding]`. One `\n` and then one `\r` are stripped; a `\r`
 * left at the end of an unterminated line counts as a CRLF so that reprinting
 * and reparsing agree. A line with no terminator gets `\n`.
 */
export const splitLineEnding = (line: string): readonly [string, LineEnding] => {
  const withoutLf = line.endsWith("\n") ? line.slice(0, -1) : line;
  return withoutLf.endsWith("\r")
    ? ([withoutLf.slice(0, -1), "\r\n"] as const)
    : ([withoutLf, "\n"] as const);
};

/**
 * Parse one physical line.
 *
 * A whitespace-only line is all prefix: the suffix is taken from what remains
 * after the prefix, so the two never overlap.
 */
export const parseLine = (line: PhysicalLine): Line => {
  const [content, lineEnding] = splitLineEnding(line);
  const [indentPrefix, rest] = span(isBlank)(content);
  const [trimmed, indentSuffix] = spanEnd(isBlank)(rest);

  return {
    indentPrefix: WhitespaceString(indentPrefix),
    expression: classifyExpression(trimmed),
    indentSuffix: WhitespaceString(indentSuffix),
    lineEnding,
  };
};

/** Checked entry point for text not yet known to be a single line. */
export const parseLineText = (text: string): Either.Either<Line, GeneralError> =>
  pipe(
    PhysicalLine.either(text),
    Either.mapBoth({
      onLeft: (errors) =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: errors.map((e) => e.message).join("; "),
        }),
      onRight: parseLine,
    })
  );
