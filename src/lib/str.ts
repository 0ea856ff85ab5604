// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the character level. Uses `Array.from()` throughout
 * for correct Unicode surrogate pair handling (string indexing does not).
 * All multi argument functions are curried data-last for `pipe()` composition.
 */

import type { CharPred } from "./char";

export const chars = (s: string): readonly string[] => Array.from(s);

/** Lift a `CharPred` to operate on an entire string (every character must satisfy). */
export const all =
  (pred: CharPred) =>
  (s: string): boolean =>
    chars(s).every(pred);

export const filterCharsToString =
  (pred: CharPred) =>
  (s: string): string =>
    Array.from(s).filter(pred).join("");

/** Replace characters via a lookup map, passing through unmapped characters. */
export const escapeWith =
  (mapping: ReadonlyMap<string, string>) =>
  (s: string): string =>
    Array.from(s)
      .map((c) => mapping.get(c) ?? c)
      .join("");

/** `[longest prefix satisfying pred, rest]`. */
export const span =
  (pred: CharPred) =>
  (s: string): readonly [string, string] => {
    const arr = chars(s);
    const idx = arr.findIndex((c) => !pred(c));
    const cut = idx === -1 ? arr.length : idx;
    return [arr.slice(0, cut).join(""), arr.slice(cut).join("")] as const;
  };

/** `[rest, longest suffix satisfying pred]`. */
export const spanEnd =
  (pred: CharPred) =>
  (s: string): readonly [string, string] => {
    const arr = chars(s);
    const idx = arr.findLastIndex((c) => !pred(c));
    return [arr.slice(0, idx + 1).join(""), arr.slice(idx + 1).join("")] as const;
  };

/** Strip leading and trailing characters satisfying `pred`. */
export const trimWith =
  (pred: CharPred) =>
  (s: string): string =>
    spanEnd(pred)(span(pred)(s)[1])[0];
