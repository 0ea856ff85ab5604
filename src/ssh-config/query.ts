// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Lookups and immutable edits over a parsed file. Edits build new Line
 * values only for the lines they change; every other line is reused as-is
 * and so prints exactly as before.
 */

import { Array as Arr, Either, Equal, Match, Option, pipe } from "effect";
import { isAlpha, isBlank } from "../lib/char";
import { DocumentError, ErrorCode, GeneralError } from "../lib/errors";
import { quoteEscapeCodec } from "../lib/escape-codec";
import { all, chars } from "../lib/str";
import {
  ArgumentToken,
  type ArgumentTokens,
  type ConfigurationOptions,
  Expression,
  type Line,
  type LineEnding,
  type SshConfigFile,
  WhitespaceString,
  makeLine,
} from "./model";
import { serializeToken } from "./serialize";
import { tokenizeArguments } from "./tokenizer";

// ============================================================================
// Lookup
// ============================================================================

export interface Entry {
  /** 0-based position in `file.lines`. */
  readonly index: number;
  readonly line: Line;
  readonly options: ConfigurationOptions;
}

const isConfigurationOptions = Expression.$is("ConfigurationOptions");

export const entries = (file: SshConfigFile): readonly Entry[] =>
  Arr.filterMap(file.lines, (line, index) =>
    pipe(
      Option.some(line.expression),
      Option.filter(isConfigurationOptions),
      Option.map((options): Entry => ({ index, line, options }))
    )
  );

/** ssh matches keywords case-insensitively. */
export const findEntries = (file: SshConfigFile, keyword: string): readonly Entry[] =>
  Arr.filter(
    entries(file),
    (entry) => entry.options.keyword.toLowerCase() === keyword.toLowerCase()
  );

/** Value of a token with `\"` decoded; None for whitespace. */
export const argumentValue: (token: ArgumentToken) => Option.Option<string> = ArgumentToken.$match(
  {
    Pure: ({ value }) => Option.some(value),
    Quoted: ({ value }) => Option.some(quoteEscapeCodec.unescape(value)),
    Whitespace: () => Option.none(),
  }
);

export const argumentValues = (tokens: readonly ArgumentToken[]): readonly string[] =>
  Arr.filterMap(tokens, argumentValue);

export interface MalformedLine {
  /** 1-based, as an editor shows it. */
  readonly lineNumber: number;
  readonly text: string;
}

export const malformedLines = (file: SshConfigFile): readonly MalformedLine[] =>
  Arr.filterMap(file.lines, ({ expression }, index): Option.Option<MalformedLine> =>
    expression._tag === "Malformed"
      ? Option.some({ lineNumber: index + 1, text: expression.text })
      : Option.none()
  );

// ============================================================================
// Construction
// ============================================================================

const SINGLE_SPACE: ArgumentToken = ArgumentToken.Whitespace({ value: WhitespaceString(" ") });

const hasLineBreak = (value: string): boolean => value.includes("\n") || value.includes("\r");

const isPureValue = (value: string): boolean =>
  value !== "" && !value.startsWith('"') && !value.includes("#") && !chars(value).some(isBlank);

const unrepresentable = (value: string, reason: string): DocumentError =>
  new DocumentError({
    code: ErrorCode.UNREPRESENTABLE_ARGUMENT,
    message: `Cannot write ${JSON.stringify(value)} as an argument: ${reason}`,
  });

/** The printed token must tokenize back to itself and decode to `value`. */
const readsBackAs = (token: ArgumentToken, value: string): boolean =>
  pipe(
    tokenizeArguments(serializeToken(token)),
    Option.exists((tokens) => tokens.length === 1 && Equal.equals(tokens[0], token))
  ) && Option.contains(argumentValue(token), value);

const quote = (value: string): Either.Either<ArgumentToken, DocumentError> => {
  const token = ArgumentToken.Quoted({ value: quoteEscapeCodec.escape(value) });
  return readsBackAs(token, value)
    ? Either.right(token)
    : Either.left(unrepresentable(value, "a backslash before a quote or at the end"));
};

/**
 * Token that reads back as `value`. Plain words stay unquoted; anything with
 * whitespace, `#` or a leading quote is quoted with `"` escaped.
 */
export const makeArgument = (value: string): Either.Either<ArgumentToken, DocumentError> =>
  pipe(
    Match.value(value),
    Match.when(hasLineBreak, (v) => Either.left(unrepresentable(v, "contains a line break"))),
    Match.when(isPureValue, (v) => Either.right(ArgumentToken.Pure({ value: v }))),
    Match.orElse(quote)
  );

/** Argument list with values separated by a single space. */
export const makeArguments = (
  values: Arr.NonEmptyReadonlyArray<string>
): Either.Either<ArgumentTokens, DocumentError> =>
  pipe(
    Either.all({
      head: makeArgument(Arr.headNonEmpty(values)),
      tail: Either.all(Arr.map(Arr.tailNonEmpty(values), makeArgument)),
    }),
    Either.map(
      ({ head, tail }): ArgumentTokens => [head, ...Arr.flatMap(tail, (t) => [SINGLE_SPACE, t])]
    )
  );

// ============================================================================
// Editing
// ============================================================================

/**
 * Same line with new arguments. Indentation, keyword, separator and line
 * ending are kept. None when the line is not an entry.
 */
export const replaceArguments = (line: Line, argumentTokens: ArgumentTokens): Option.Option<Line> =>
  pipe(
    Option.some(line.expression),
    Option.filter(isConfigurationOptions),
    Option.map(
      ({ keyword, separator }): Line => ({
        ...line,
        expression: Expression.ConfigurationOptions({ keyword, separator, argumentTokens }),
      })
    )
  );

export interface SetEntryOptions {
  /** Replace every matching entry instead of the first. */
  readonly all: boolean;
}

export interface SetEntryResult {
  readonly file: SshConfigFile;
  /** Lines replaced or appended. */
  readonly updated: number;
}

const isKeyword = (keyword: string): boolean => keyword !== "" && all(isAlpha)(keyword);

/** New entries follow the file's existing line ending. */
const lastLineEnding = (file: SshConfigFile): LineEnding =>
  pipe(
    Arr.last(file.lines),
    Option.map((line) => line.lineEnding),
    Option.getOrElse((): LineEnding => "\n")
  );

const appendEntry = (
  file: SshConfigFile,
  keyword: string,
  argumentTokens: ArgumentTokens
): SetEntryResult => ({
  file: {
    ...file,
    lines: [
      ...file.lines,
      makeLine(Expression.ConfigurationOptions({ keyword, separator: " ", argumentTokens }), {
        lineEnding: lastLineEnding(file),
      }),
    ],
  },
  updated: 1,
});

const replaceEntries = (
  file: SshConfigFile,
  targets: readonly Entry[],
  argumentTokens: ArgumentTokens
): SetEntryResult => {
  const indices: ReadonlySet<number> = new Set(targets.map((entry) => entry.index));
  return {
    file: {
      ...file,
      lines: file.lines.map((line, index) =>
        indices.has(index)
          ? pipe(
              replaceArguments(line, argumentTokens),
              Option.getOrElse(() => line)
            )
          : line
      ),
    },
    updated: indices.size,
  };
};

/**
 * Set `keyword` to `argumentTokens`. Replaces the first matching entry (or
 * every one with `all`); appends `Keyword value` when there is none.
 */
export const setEntry = (
  file: SshConfigFile,
  keyword: string,
  argumentTokens: ArgumentTokens,
  options: SetEntryOptions = { all: false }
): Either.Either<SetEntryResult, GeneralError> =>
  Either.gen(function* () {
    if (!isKeyword(keyword)) {
      return yield* Either.left(
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: `Invalid keyword ${JSON.stringify(keyword)}: expected letters only`,
        })
      );
    }
    const matches = findEntries(file, keyword);
    const targets = options.all ? matches : Arr.take(matches, 1);
    return Arr.isNonEmptyReadonlyArray(targets)
      ? replaceEntries(file, targets, argumentTokens)
      : appendEntry(file, keyword, argumentTokens);
  });
