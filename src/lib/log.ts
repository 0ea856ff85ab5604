// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled logging through annotations. Call sites pick a LogStyle;
 * effect-logger.ts decides how it looks.
 */

import { Data, Effect, Match, pipe } from "effect";

/**
 * Closed union of log styles. Match.exhaustive enforces handling all variants,
 * so adding a new style produces compile errors at all unhandled call sites.
 */
type LogStyle = Data.TaggedEnum<{
  success: object;
  fail: object;
}>;

const { success, fail } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("success", () => ({ logStyle: "success" })),
    Match.tag("fail", () => ({ logStyle: "fail" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

/** Logged at error level so it lands on stderr in every format. */
export const logFail = (message: string): Effect.Effect<void> =>
  Effect.logError(message).pipe(Effect.annotateLogs(encodeStyle(fail())));

/** Bypasses Effect logger for raw program output (command results). */
export const writeOutputRaw = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(text);
  });

/** One line of program output. */
export const writeOutput = (text: string): Effect.Effect<void> => writeOutputRaw(`${text}\n`);
