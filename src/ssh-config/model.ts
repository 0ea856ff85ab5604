// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * In-memory model of an ssh_config(5) file.
 *
 * A file is a sequence of lines; each line is an expression wrapped in the
 * whitespace that surrounded it. Unlike the man page, empty lines are kept
 * apart from comments, and anything that is not a well-formed entry is kept
 * verbatim as `Malformed`, so the model always reprints its source exactly.
 *
 * ```ssh-config
 * # a simple entry
 * Host example.com ssh.example.com
 *     Port 22
 *     User root
 *     Ciphers aes256-cbc,arcfour
 * ```
 */

import { type Array as Arr, Brand, Data, type Option } from "effect";
import { isBlank } from "../lib/char";
import { all } from "../lib/str";

// ============================================================================
// Branded strings
// ============================================================================

/** Only space and tab characters (possibly empty). */
export type WhitespaceString = string & Brand.Brand<"WhitespaceString">;

export const WhitespaceString: Brand.Brand.Constructor<WhitespaceString> =
  Brand.refined<WhitespaceString>(all(isBlank), (s) =>
    Brand.error(`Expected only spaces and tabs, got ${JSON.stringify(s)}`)
  );

/**
 * Exactly one physical line: no newline except an optional final `\n`
 * (itself optionally preceded by `\r`). Multi-line text cannot be given to
 * the line parser because it cannot be branded.
 */
export type PhysicalLine = string & Brand.Brand<"PhysicalLine">;

const withoutTerminator = (s: string): string => (s.endsWith("\n") ? s.slice(0, -1) : s);

export const PhysicalLine: Brand.Brand.Constructor<PhysicalLine> = Brand.refined<PhysicalLine>(
  (s) => !withoutTerminator(s).includes("\n"),
  (s) => Brand.error(`Multi-line string can not be parsed as a single line: ${JSON.stringify(s)}`)
);

export const LINE_ENDING_VALUES = ["\n", "\r\n"] as const;
export type LineEnding = (typeof LINE_ENDING_VALUES)[number];

// ============================================================================
// Argument tokens
// ============================================================================

/**
 * One unit of an argument list: a value or the whitespace between values.
 *
 * - `Pure`: unquoted, no whitespace and no `#`.
 * - `Quoted`: the raw text between double quotes; escapes are kept, not decoded.
 * - `Whitespace`: separator between two values.
 */
export type ArgumentToken = Data.TaggedEnum<{
  Pure: { readonly value: string };
  Quoted: { readonly value: string };
  Whitespace: { readonly value: WhitespaceString };
}>;

export const ArgumentToken = Data.taggedEnum<ArgumentToken>();

/** At least one token; a well-formed list holds at least one value. */
export type ArgumentTokens = Arr.NonEmptyReadonlyArray<ArgumentToken>;

// ============================================================================
// Expressions
// ============================================================================

/**
 * What sits between a line's indentation.
 *
 * `ConfigurationOptions` is a keyword-argument entry. Its separator is either
 * a run of whitespace or a single `=` with optional whitespace around it.
 * Keywords are case-insensitive to ssh but stored as written.
 */
export type Expression = Data.TaggedEnum<{
  ConfigurationOptions: {
    readonly keyword: string;
    readonly separator: string;
    readonly argumentTokens: ArgumentTokens;
  };
  Comment: { readonly text: string };
  Empty: {};
  Malformed: { readonly text: string };
}>;

export const Expression = Data.taggedEnum<Expression>();

export type ConfigurationOptions = Data.TaggedEnum.Value<Expression, "ConfigurationOptions">;

// ============================================================================
// Lines and files
// ============================================================================

export interface Line {
  /** Longest whitespace prefix of the line. */
  readonly indentPrefix: WhitespaceString;
  readonly expression: Expression;
  /** Longest whitespace suffix not overlapping the prefix. */
  readonly indentSuffix: WhitespaceString;
  readonly lineEnding: LineEnding;
}

export interface SshConfigFile {
  /** A `\n`-terminated file has no trailing empty line here. */
  readonly lines: readonly Line[];
  /** Where the text came from, when it came from a file. */
  readonly path: Option.Option<string>;
}

const NO_INDENT: WhitespaceString = WhitespaceString("");

/** A line with no indentation, terminated by `\n`. */
export const makeLine = (
  expression: Expression,
  fields: Partial<Omit<Line, "expression">> = {}
): Line => ({
  indentPrefix: fields.indentPrefix ?? NO_INDENT,
  expression,
  indentSuffix: fields.indentSuffix ?? NO_INDENT,
  lineEnding: fields.lineEnding ?? "\n",
});
