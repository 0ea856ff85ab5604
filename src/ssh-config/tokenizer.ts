// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Argument tokenizer. Splits the text after `Keyword<separator>` into
 * value and whitespace tokens.
 *
 * Rejection is all-or-nothing: an unterminated quote, an unquoted `#` or an
 * empty list makes the whole list None, and the classifier then keeps the
 * entire line as Malformed. There is no inline-comment support; `Host a #b`
 * is rejected rather than guessed at.
 */

import { Array as Arr, Match, Option, pipe } from "effect";
import { isBlank, not } from "../lib/char";
import { chars, span } from "../lib/str";
import { ArgumentToken, type ArgumentTokens, WhitespaceString } from "./model";

/** A token and the input left after it. */
type Read = readonly [ArgumentToken, string];

const readWhitespace = (input: string): Option.Option<Read> => {
  const [run, rest] = span(isBlank)(input);
  return Option.some([ArgumentToken.Whitespace({ value: WhitespaceString(run) }), rest] as const);
};

/**
 * Index of the closing quote within the text after the opening one. A quote
 * closes unless the character right before it is a backslash; `\\"` therefore
 * does not close either.
 */
const closingQuoteIndex = (inner: readonly string[]): Option.Option<number> =>
  Arr.findFirstIndex(inner, (c, i) => c === '"' && (i === 0 || inner[i - 1] !== "\\"));

const readQuoted = (input: string): Option.Option<Read> => {
  const inner = chars(input).slice(1);
  return pipe(
    closingQuoteIndex(inner),
    Option.map(
      (end): Read =>
        [
          ArgumentToken.Quoted({ value: inner.slice(0, end).join("") }),
          inner.slice(end + 1).join(""),
        ] as const
    )
  );
};

const readPure = (input: string): Option.Option<Read> => {
  const [run, rest] = span(not(isBlank))(input);
  return pipe(
    Option.some(run),
    Option.filter((value) => !value.includes("#")),
    Option.map((value): Read => [ArgumentToken.Pure({ value }), rest] as const)
  );
};

const readToken = (input: string): Option.Option<Read> =>
  pipe(
    Match.value(input),
    Match.when(
      (s: string) => isBlank(s.charAt(0)),
      (s) => readWhitespace(s)
    ),
    Match.when(
      (s: string) => s.startsWith('"'),
      (s) => readQuoted(s)
    ),
    Match.orElse((s) => readPure(s))
  );

/**
 * Cursor over the remaining input. None once a read failed: the failure is
 * emitted as a None token and unfolding stops on the next step.
 */
type Cursor = Option.Option<string>;

const step = (cursor: Cursor): Option.Option<readonly [Option.Option<ArgumentToken>, Cursor]> =>
  pipe(
    cursor,
    Option.filter((rest) => rest !== ""),
    Option.map((rest) =>
      Option.match(readToken(rest), {
        onNone: (): readonly [Option.Option<ArgumentToken>, Cursor] => [
          Option.none(),
          Option.none(),
        ],
        onSome: ([token, next]): readonly [Option.Option<ArgumentToken>, Cursor] => [
          Option.some(token),
          Option.some(next),
        ],
      })
    )
  );

/**
 * Tokenize an argument list. The input is expected without surrounding
 * whitespace; whitespace inside it becomes `Whitespace` tokens.
 *
 * @example
 * ```ts
 * tokenizeArguments('a "b c"')
 * // Some([Pure("a"), Whitespace(" "), Quoted("b c")])
 * tokenizeArguments("a#b") // None
 * ```
 */
export const tokenizeArguments = (input: string): Option.Option<ArgumentTokens> =>
  pipe(
    Option.all(Arr.unfold(Option.some(input), step)),
    Option.flatMap(
      (tokens): Option.Option<ArgumentTokens> =>
        Arr.isNonEmptyReadonlyArray(tokens) ? Option.some(tokens) : Option.none()
    )
  );
