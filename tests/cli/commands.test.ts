// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { FileSystem } from "@effect/platform";
import { Effect, Either, HashMap, Logger, Option } from "effect";
import { afterEach, describe, expect, test, vi } from "vitest";
import {
  buildCheckReport,
  executeCheck,
  normalizeFinalNewline,
} from "../../src/cli/commands/check";
import { toDocumentJson } from "../../src/cli/commands/dump";
import { executeGet, formatEntries } from "../../src/cli/commands/get";
import { executeSet } from "../../src/cli/commands/set";
import { resolveContext } from "../../src/cli/index";
import { type GlobalOptions, effectiveFormat } from "../../src/cli/options";
import { type TestConfigOverrides, createTestConfigProvider } from "../../src/config/env";
import { findEntries, parse } from "../../src/ssh-config";
import { runTest } from "../helpers/layers";

const CONFIG = [
  "Host alpha",
  "\tUser = first",
  '\tIdentityFile "~/.ssh/my key"',
  "Host beta",
  "\tuser second",
  "",
].join("\n");

const globals = (overrides: Partial<GlobalOptions> = {}): GlobalOptions => ({
  verbose: false,
  logLevel: Option.none(),
  format: Option.none(),
  json: false,
  file: Option.none(),
  ...overrides,
});

/** Writes CONFIG into a scoped temporary directory. */
const configFile = (content: string = CONFIG) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const dir = yield* fs.makeTempDirectoryScoped({ prefix: "sshconf-cli-" });
    const path = `${dir}/config`;
    yield* fs.writeFileString(path, content);
    return path;
  });

const silent = Logger.replace(Logger.defaultLogger, Logger.none);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("effectiveFormat", () => {
  test("--json wins over --format", () => {
    expect(effectiveFormat(globals({ json: true, format: Option.some("pretty") }))).toEqual(
      Option.some("json")
    );
  });

  test("uses --format without --json", () => {
    expect(effectiveFormat(globals({ format: Option.some("pretty") }))).toEqual(
      Option.some("pretty")
    );
  });
});

describe("resolveContext", () => {
  const resolveWith = (options: GlobalOptions, env: TestConfigOverrides) =>
    Effect.runPromise(
      Effect.withConfigProvider(resolveContext(options), createTestConfigProvider(env))
    );

  test("defaults to ~/.ssh/config, info and pretty", async () => {
    const ctx = await resolveWith(globals(), {});
    expect([ctx.path, ctx.logLevel, ctx.format]).toEqual([
      "/home/testuser/.ssh/config",
      "info",
      "pretty",
    ]);
  });

  test("takes the environment over defaults", async () => {
    const ctx = await resolveWith(globals(), {
      file: "/etc/ssh/ssh_config",
      logLevel: "warn",
      logFormat: "json",
    });
    expect([ctx.path, ctx.logLevel, ctx.format]).toEqual(["/etc/ssh/ssh_config", "warn", "json"]);
  });

  test("takes the CLI over the environment", async () => {
    const ctx = await resolveWith(
      globals({ file: Option.some("./config"), logLevel: Option.some("error"), json: true }),
      { file: "/etc/ssh/ssh_config", logLevel: "warn", logFormat: "pretty" }
    );
    expect([ctx.path, ctx.logLevel, ctx.format]).toEqual(["./config", "error", "json"]);
  });

  test("--verbose and SSHCONF_DEBUG force debug", async () => {
    expect((await resolveWith(globals({ verbose: true }), { logLevel: "error" })).logLevel).toBe(
      "debug"
    );
    expect((await resolveWith(globals(), { debug: "true" })).logLevel).toBe("debug");
  });

  test("never colours with NO_COLOR set", async () => {
    expect((await resolveWith(globals(), { noColor: "1" })).color).toBe(false);
  });
});

describe("check", () => {
  test("normalizeFinalNewline adds a missing newline only", () => {
    expect(normalizeFinalNewline("a")).toBe("a\n");
    expect(normalizeFinalNewline("a\n")).toBe("a\n");
    expect(normalizeFinalNewline("")).toBe("");
  });

  test("reports a clean file", () => {
    expect(buildCheckReport("/tmp/config", CONFIG)).toEqual({
      path: "/tmp/config",
      lines: 5,
      entries: 5,
      malformed: [],
      roundTrip: true,
    });
  });

  test("reports malformed lines with their numbers", () => {
    const report = buildCheckReport("/tmp/config", "Host a\nHost\n# ok\nPort 2#2\n");
    expect(report.malformed).toEqual([
      { lineNumber: 2, text: "Host" },
      { lineNumber: 4, text: "Port 2#2" },
    ]);
    expect(report.roundTrip).toBe(true);
  });

  test("accepts a file without a final newline", () => {
    expect(buildCheckReport("/tmp/config", "Host a").roundTrip).toBe(true);
  });

  test("logs each malformed line as a failure", async () => {
    const seen: string[] = [];
    const capture = Logger.make(({ logLevel, message, annotations }) => {
      if (Option.contains(HashMap.get(annotations, "logStyle"), "fail")) {
        seen.push(`${logLevel.label} ${String(message)}`);
      }
    });
    await runTest(
      Effect.gen(function* () {
        const path = yield* configFile("Host a\nHost\nPort 2#2\n");
        yield* Effect.either(executeCheck({ path, format: "pretty" }));
        expect(seen).toEqual([
          `ERROR ${path}:2: malformed: Host`,
          `ERROR ${path}:3: malformed: Port 2#2`,
        ]);
      }).pipe(Effect.provide(Logger.replace(Logger.defaultLogger, capture)))
    );
  });

  test("fails with MALFORMED_ENTRIES on disk", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        const path = yield* configFile("Host a\nHost\n");
        return yield* Effect.either(executeCheck({ path, format: "pretty" }));
      }).pipe(Effect.provide(silent))
    );
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.code).toBe(10);
    }
  });

  test("succeeds on a clean file", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        const path = yield* configFile();
        return yield* Effect.either(executeCheck({ path, format: "pretty" }));
      }).pipe(Effect.provide(silent))
    );
    expect(Either.isRight(result)).toBe(true);
  });
});

describe("dump", () => {
  test("turns tags into type fields", () => {
    expect(toDocumentJson(parse("\tPort = 22\n", "/tmp/config"))).toEqual({
      path: "/tmp/config",
      lines: [
        {
          indentPrefix: "\t",
          expression: {
            type: "ConfigurationOptions",
            keyword: "Port",
            separator: " = ",
            arguments: [{ type: "Pure", value: "22" }],
          },
          indentSuffix: "",
          lineEnding: "\n",
        },
      ],
    });
  });

  test("uses null for a missing path", () => {
    expect(toDocumentJson(parse("# x\n"))).toEqual({
      path: null,
      lines: [
        {
          indentPrefix: "",
          expression: { type: "Comment", text: "# x" },
          indentSuffix: "",
          lineEnding: "\n",
        },
      ],
    });
  });
});

describe("get", () => {
  const file = parse(CONFIG);

  test("prints one line of values per entry", () => {
    expect(formatEntries(findEntries(file, "identityfile"), "pretty")).toEqual(["~/.ssh/my key"]);
    expect(formatEntries(findEntries(file, "User"), "pretty")).toEqual(["first", "second"]);
  });

  test("prints a JSON array in json format", () => {
    expect(formatEntries(findEntries(file, "user"), "json")).toEqual([
      JSON.stringify([
        { lineNumber: 2, keyword: "User", values: ["first"] },
        { lineNumber: 5, keyword: "user", values: ["second"] },
      ]),
    ]);
  });

  test("writes matches to stdout", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    await runTest(
      Effect.gen(function* () {
        const path = yield* configFile();
        yield* executeGet({ path, keyword: "user", format: "pretty" });
      }).pipe(Effect.provide(silent))
    );
    expect(write.mock.calls.map(([chunk]) => chunk)).toEqual(["first\n", "second\n"]);
  });

  test("fails with KEYWORD_NOT_FOUND", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        const path = yield* configFile();
        return yield* Effect.either(executeGet({ path, keyword: "ProxyJump", format: "pretty" }));
      }).pipe(Effect.provide(silent))
    );
    expect(Either.isLeft(result) ? result.left.code : undefined).toBe(12);
  });

  test("fails with FILE_READ_FAILED for a missing file", async () => {
    const result = await runTest(
      Effect.either(
        executeGet({ path: "/nonexistent/sshconf-cli/config", keyword: "User", format: "pretty" })
      ).pipe(Effect.provide(silent))
    );
    expect(Either.isLeft(result) ? result.left.code : undefined).toBe(20);
  });
});

describe("set", () => {
  const runSet = (values: readonly [string, ...string[]], all: boolean) =>
    runTest(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const path = yield* configFile();
        yield* executeSet({ path, keyword: "User", values, all, dryRun: false });
        return yield* fs.readFileString(path);
      }).pipe(Effect.provide(silent))
    );

  test("rewrites the first entry only", async () => {
    expect(await runSet(["admin"], false)).toBe(CONFIG.replace("User = first", "User = admin"));
  });

  test("rewrites every entry with all and quotes values that need it", async () => {
    expect(await runSet(["admin", "two words"], true)).toBe(
      CONFIG.replace("User = first", 'User = admin "two words"').replace(
        "user second",
        'user admin "two words"'
      )
    );
  });

  test("leaves the file alone on a dry run and prints the edited text", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const text = await runTest(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const path = yield* configFile();
        yield* executeSet({ path, keyword: "Port", values: ["22"], all: false, dryRun: true });
        return yield* fs.readFileString(path);
      }).pipe(Effect.provide(silent))
    );
    expect(text).toBe(CONFIG);
    expect(write).toHaveBeenCalledWith(`${CONFIG}Port 22\n`);
  });
});
