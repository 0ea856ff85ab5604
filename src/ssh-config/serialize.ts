// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Text reconstruction. Each function inverts one parsing step, so an
 * unedited node prints exactly what it was parsed from.
 */

import { ArgumentToken, Expression, type Line, type SshConfigFile } from "./model";

export const serializeToken: (token: ArgumentToken) => string = ArgumentToken.$match({
  Pure: ({ value }) => value,
  Quoted: ({ value }) => `"${value}"`,
  Whitespace: ({ value }) => value,
});

export const serializeTokens = (tokens: readonly ArgumentToken[]): string =>
  tokens.map(serializeToken).join("");

export const serializeExpression: (expression: Expression) => string = Expression.$match({
  ConfigurationOptions: ({ keyword, separator, argumentTokens }) =>
    `${keyword}${separator}${serializeTokens(argumentTokens)}`,
  Comment: ({ text }) => text,
  Empty: () => "",
  Malformed: ({ text }) => text,
});

export const serializeLine = (line: Line): string =>
  `${line.indentPrefix}${serializeExpression(line.expression)}${line.indentSuffix}${line.lineEnding}`;

export const serialize = (file: SshConfigFile): string => file.lines.map(serializeLine).join("");
