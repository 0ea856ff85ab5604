// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Expression classifier. Every trimmed line lands in exactly one variant;
 * `Malformed` is the total fallback and always holds the full content.
 */

import { Match, Option, pipe } from "effect";
import { isAlpha, isBlank, isOneOf, not } from "../lib/char";
import { filterCharsToString, span, trimWith } from "../lib/str";
import { Expression } from "./model";
import { tokenizeArguments } from "./tokenizer";

const isSeparatorChar = isOneOf(" \t=");

/** Whitespace only, or whitespace around exactly one `=`. */
export const isValidSeparator = (separator: string): boolean =>
  separator !== "" && ["", "="].includes(filterCharsToString(not(isBlank))(separator));

const classifyEntry = (content: string): Expression => {
  const malformed = Expression.Malformed({ text: content });
  const [keyword, afterKeyword] = span(isAlpha)(content);
  const [separator, remainder] = span(isSeparatorChar)(afterKeyword);

  if (keyword === "" || !isValidSeparator(separator)) {
    return malformed;
  }

  return pipe(
    tokenizeArguments(trimWith(isBlank)(remainder)),
    Option.match({
      onNone: (): Expression => malformed,
      onSome: (argumentTokens): Expression =>
        Expression.ConfigurationOptions({ keyword, separator, argumentTokens }),
    })
  );
};

/**
 * Classify trimmed line content.
 *
 * @example
 * ```ts
 * classifyExpression("Host = example.com") // ConfigurationOptions
 * classifyExpression("Host0 example.com")  // Malformed
 * ```
 */
export const classifyExpression = (content: string): Expression =>
  pipe(
    Match.value(content),
    Match.when("", (): Expression => Expression.Empty()),
    Match.when(
      (s: string) => s.startsWith("#"),
      (text): Expression => Expression.Comment({ text })
    ),
    Match.orElse(classifyEntry)
  );
