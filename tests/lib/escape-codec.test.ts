// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { makeEscapeCodec, quoteEscapeCodec } from "../../src/lib/escape-codec";

describe("EscapeCodec", () => {
  describe("quoteEscapeCodec", () => {
    test("escapes double quote", () => {
      expect(quoteEscapeCodec.escape('a"b')).toBe('a\\"b');
    });

    test("leaves backslashes alone when escaping", () => {
      expect(quoteEscapeCodec.escape("a\\b")).toBe("a\\b");
    });

    test("unescapes double quote", () => {
      expect(quoteEscapeCodec.unescape('a\\"b')).toBe('a"b');
    });

    test("keeps unknown escape sequences verbatim", () => {
      expect(quoteEscapeCodec.unescape("C:\\Users\\me")).toBe("C:\\Users\\me");
    });

    test("drops a trailing lone backslash", () => {
      expect(quoteEscapeCodec.unescape("a\\")).toBe("a");
    });

    test("leaves plain strings unchanged", () => {
      expect(quoteEscapeCodec.escape("hello")).toBe("hello");
      expect(quoteEscapeCodec.unescape("hello")).toBe("hello");
    });
  });

  describe("makeEscapeCodec", () => {
    const codec = makeEscapeCodec("%", [
      ["%", "%"],
      [" ", "s"],
    ]);

    test("derives escape from pairs", () => {
      expect(codec.escape("a b%")).toBe("a%sb%%");
    });

    test("derives unescape from the same pairs", () => {
      expect(codec.unescape("a%sb%%")).toBe("a b%");
    });

    test("passes unmapped escapes through with their prefix", () => {
      expect(codec.unescape("%x")).toBe("%x");
    });
  });
});
