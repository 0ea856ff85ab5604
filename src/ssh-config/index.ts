// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Lossless ssh_config(5) parsing and printing.
 *
 * @example
 * ```ts
 * import { parse, serialize } from "sshconf";
 *
 * const text = "Host example.com\n\tUser = root\n";
 * serialize(parse(text)) === text; // true
 * ```
 */

export {
  ArgumentToken,
  Expression,
  LINE_ENDING_VALUES,
  PhysicalLine,
  WhitespaceString,
  makeLine,
} from "./model";
export type { ArgumentTokens, ConfigurationOptions, Line, LineEnding, SshConfigFile } from "./model";

export { tokenizeArguments } from "./tokenizer";
export { classifyExpression, isValidSeparator } from "./expression";
export { parseLine, parseLineText, splitLineEnding } from "./line";
export { parse, splitPhysicalLines } from "./parse";
export {
  serialize,
  serializeExpression,
  serializeLine,
  serializeToken,
  serializeTokens,
} from "./serialize";
export { loadSshConfigText, readSshConfig, writeSshConfig } from "./io";
export {
  argumentValue,
  argumentValues,
  entries,
  findEntries,
  makeArgument,
  makeArguments,
  malformedLines,
  replaceArguments,
  setEntry,
} from "./query";
export type { Entry, MalformedLine, SetEntryOptions, SetEntryResult } from "./query";
