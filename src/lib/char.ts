// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates for the ssh_config grammar. ASCII only: the format
 * knows space and tab as whitespace and `[A-Za-z]` as keyword letters, so
 * Unicode classes would admit characters it never intended.
 */

/** Predicate over a single character. */
export type CharPred = (c: string) => boolean;

export const isLower: CharPred = (c) => c >= "a" && c <= "z";

export const isUpper: CharPred = (c) => c >= "A" && c <= "Z";

export const isAlpha: CharPred = (c) => isLower(c) || isUpper(c);

/** Space or tab. `\r` and `\n` are line structure, not whitespace. */
export const isBlank: CharPred = (c) => c === " " || c === "\t";

export const isOneOf =
  (chars: string): CharPred =>
  (c): boolean =>
    c.length === 1 && chars.includes(c);

export const not =
  (pred: CharPred): CharPred =>
  (c): boolean =>
    !pred(c);
