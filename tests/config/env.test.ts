// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  ConfigFileOptionConfig,
  DebugModeConfig,
  HomeConfig,
  LogFormatOptionConfig,
  LogLevelOptionConfig,
  NoColorConfig,
  configPathConfig,
  createTestConfigProvider,
  defaultConfigPath,
  type TestConfigOverrides,
  resolveConfigPath,
} from "../../src/config/env";
import { resolve } from "../../src/config/resolve";

const load = <A>(
  effect: Effect.Effect<A, unknown>,
  overrides: TestConfigOverrides = {}
): Promise<A> =>
  Effect.runPromise(Effect.withConfigProvider(effect, createTestConfigProvider(overrides)));

describe("resolve", () => {
  test("prefers the CLI value", () => {
    expect(resolve({ cli: Option.some("a"), env: Option.some("b"), fallback: "c" })).toBe("a");
  });

  test("falls back to the environment", () => {
    expect(resolve({ cli: Option.none(), env: Option.some("b"), fallback: "c" })).toBe("b");
  });

  test("uses the fallback last", () => {
    expect(resolve({ cli: Option.none(), env: Option.none(), fallback: "c" })).toBe("c");
  });
});

describe("config path", () => {
  test("defaults to ~/.ssh/config", () => {
    expect(defaultConfigPath("/home/testuser")).toBe("/home/testuser/.ssh/config");
  });

  test("prefers --file over SSHCONF_FILE", () => {
    expect(
      resolveConfigPath(Option.some("./cli"), Option.some("/env/config"), "/home/testuser")
    ).toBe("./cli");
  });

  test("uses SSHCONF_FILE without --file", () => {
    expect(resolveConfigPath(Option.none(), Option.some("/env/config"), "/home/testuser")).toBe(
      "/env/config"
    );
  });

  test("reads HOME and SSHCONF_FILE from the provider", async () => {
    expect(await load(configPathConfig(Option.none()))).toBe("/home/testuser/.ssh/config");
    expect(await load(configPathConfig(Option.none()), { file: "/tmp/x" })).toBe("/tmp/x");
  });
});

describe("environment configs", () => {
  test("HOME comes from the provider", async () => {
    expect(await load(HomeConfig, { home: "/home/other" })).toBe("/home/other");
  });

  test("SSHCONF_FILE is None when unset", async () => {
    expect(await load(ConfigFileOptionConfig)).toEqual(Option.none());
  });

  test("reads SSHCONF_LOG_LEVEL", async () => {
    expect(await load(LogLevelOptionConfig, { logLevel: "warn" })).toEqual(Option.some("warn"));
  });

  test("rejects an unknown log level", async () => {
    await expect(load(LogLevelOptionConfig, { logLevel: "loud" })).rejects.toThrow();
  });

  test("reads SSHCONF_LOG_FORMAT", async () => {
    expect(await load(LogFormatOptionConfig, { logFormat: "json" })).toEqual(Option.some("json"));
  });

  test("SSHCONF_DEBUG defaults to false", async () => {
    expect(await load(DebugModeConfig)).toBe(false);
    expect(await load(DebugModeConfig, { debug: "true" })).toBe(true);
  });

  test("NO_COLOR counts only when non-empty", async () => {
    expect(await load(NoColorConfig)).toBe(false);
    expect(await load(NoColorConfig, { noColor: "" })).toBe(false);
    expect(await load(NoColorConfig, { noColor: "1" })).toBe(true);
  });
});
