// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * This module follows "functional core, imperative shell":
 * - All exports are pure Config<A> values (no effects executed)
 * - Configs are composed using combinators (all, map, nested, withDefault)
 * - Effects are only yielded at the application boundary (CLI)
 */

import { join } from "node:path";
import { Config, ConfigProvider, Option, pipe } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, USER_CONFIG_RELATIVE_PATH } from "./field-values";
import type { LogFormat, LogLevel } from "./field-values";
import { resolve } from "./resolve";

// ============================================================================
// Primitive Configs (Building Blocks)
// ============================================================================

/**
 * HOME directory from environment.
 * Falls back to /root if not set (common in containerized environments).
 */
export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

/** Explicit ssh_config path, `SSHCONF_FILE`. */
export const ConfigFileOptionConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.string("FILE"), "SSHCONF")
);

/** `SSHCONF_LOG_LEVEL`; None when unset so the CLI flag can win. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.option(
  Config.nested(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL"), "SSHCONF")
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.option(
  Config.nested(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT"), "SSHCONF")
);

/**
 * Debug mode flag with SSHCONF_ namespace.
 * When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "SSHCONF"
);

/** https://no-color.org: any non-empty value disables colour. */
export const NoColorConfig: Config.Config<boolean> = Config.option(Config.string("NO_COLOR")).pipe(
  Config.map((value) =>
    pipe(
      value,
      Option.exists((v) => v !== "")
    )
  )
);

// ============================================================================
// Config Resolution (Pure Functions)
// ============================================================================

export const defaultConfigPath = (home: string): string => join(home, USER_CONFIG_RELATIVE_PATH);

/** Priority: --file > SSHCONF_FILE > $HOME/.ssh/config */
export const resolveConfigPath = (
  cliFile: Option.Option<string>,
  envFile: Option.Option<string>,
  home: string
): string => resolve({ cli: cliFile, env: envFile, fallback: defaultConfigPath(home) });

/** Path resolution as a Config, for callers that only have the CLI flag. */
export const configPathConfig = (cliFile: Option.Option<string>): Config.Config<string> =>
  Config.all([ConfigFileOptionConfig, HomeConfig]).pipe(
    Config.map(([envFile, home]) => resolveConfigPath(cliFile, envFile, home))
  );

// ============================================================================
// Test Utilities (Pure Functions)
// ============================================================================

const TEST_CONFIG_KEYS = ["home", "file", "logLevel", "logFormat", "debug", "noColor"] as const;
type TestConfigKey = (typeof TEST_CONFIG_KEYS)[number];

/**
 * Environment variable names used in testing.
 * These match the actual env vars (HOME, SSHCONF_LOG_LEVEL, etc.)
 */
const envVarNames: Readonly<Record<TestConfigKey, string>> = {
  home: "HOME",
  file: "SSHCONF_FILE",
  logLevel: "SSHCONF_LOG_LEVEL",
  logFormat: "SSHCONF_LOG_FORMAT",
  debug: "SSHCONF_DEBUG",
  noColor: "NO_COLOR",
};

/**
 * Test config override options using camelCase keys.
 */
export type TestConfigOverrides = { readonly [K in TestConfigKey]?: string };

/**
 * Create a ConfigProvider for testing. Only HOME has a default; every other
 * variable is unset unless overridden.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const level = await Effect.runPromise(
 *   Effect.withConfigProvider(LogLevelOptionConfig, provider)
 * );
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([[envVarNames.home, "/home/testuser"]]);
  for (const key of TEST_CONFIG_KEYS) {
    const override = overrides[key];
    if (override !== undefined) {
      values.set(envVarNames[key], override);
    }
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
