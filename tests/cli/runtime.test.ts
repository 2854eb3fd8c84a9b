// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import type { GlobalOptions } from "../../src/cli/options";
import { parseAssignments, resolveContext } from "../../src/cli/runtime";
import { createTestConfigProvider } from "../../src/config/env";
import { makeProjectDir, removeDir, runTest } from "../helpers/layers";

const noGlobals: GlobalOptions = {
  file: [],
  projectName: Option.none(),
  profile: [],
  envFile: [],
  env: [],
  inPod: Option.none(),
  podArgs: Option.none(),
  podmanPath: Option.none(),
  podmanArgs: [],
  podmanVerbArgs: {},
  parallel: Option.none(),
  dryRun: false,
  verbose: false,
  logLevel: Option.none(),
  logFormat: Option.none(),
  toolConfig: Option.none(),
};

describe("parseAssignments", () => {
  test("splits at the first equals sign", () => {
    expect(parseAssignments(["A=1", "B=x=y", "C"])).toEqual(
      new Map([
        ["A", "1"],
        ["B", "x=y"],
        ["C", ""],
      ])
    );
  });
});

describe("resolveContext", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await makeProjectDir({
      "tool.toml": [
        'podman_path = "/opt/podman"',
        "parallel = 4",
        "in_pod = false",
        "",
        "[logging]",
        'level = "warn"',
        'format = "json"',
        "",
      ].join("\n"),
    });
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  const resolveWith = (globals: Partial<GlobalOptions>, variables: Readonly<Record<string, string>> = {}) =>
    runTest(
      Effect.withConfigProvider(
        resolveContext({ ...noGlobals, toolConfig: Option.some(`${dir}/tool.toml`), ...globals }),
        createTestConfigProvider(variables)
      )
    );

  test("sources are layered by precedence", async () => {
    const ctx = await resolveWith({ parallel: Option.some(0) }, { PODCOMPOSE_LOG_LEVEL: "error" });
    expect(ctx.logLevel).toBe("error");
    expect(ctx.logFormat).toBe("json");
    expect(ctx.podman.path).toBe("/opt/podman");
    expect(ctx.podman.parallel).toEqual(Option.some(4));
    expect(ctx.load.inPod).toEqual(Option.some(false));
  });

  test("--verbose forces debug logging", async () => {
    const ctx = await resolveWith({ verbose: true, logLevel: Option.some("error") });
    expect(ctx.logLevel).toBe("debug");
  });

  test("argument strings are split like a shell", async () => {
    const ctx = await resolveWith({
      podmanArgs: ["--log-level debug"],
      podmanVerbArgs: { run: ["--rm"], pull: [] },
      podArgs: Option.some("--infra=true --name 'my pod'"),
      env: ["TAG=1"],
      inPod: Option.some("true"),
    });
    expect(ctx.podman.globalArgs).toEqual(["--log-level", "debug"]);
    expect(ctx.podman.verbArgs).toEqual(new Map([["run", ["--rm"]]]));
    expect(ctx.load.podArgs).toEqual(Option.some(["--infra=true", "--name", "my pod"]));
    expect(ctx.load.overrides).toEqual(new Map([["TAG", "1"]]));
    expect(ctx.load.inPod).toEqual(Option.some(true));
  });

  test("unbalanced quotes are reported", async () => {
    const error = await runTest(
      Effect.flip(
        Effect.withConfigProvider(
          resolveContext({ ...noGlobals, toolConfig: Option.some(`${dir}/tool.toml`), podmanArgs: ["'open"] }),
          createTestConfigProvider()
        )
      )
    );
    expect(error.message).toBe("--podman-args: unbalanced quotes in 'open");
  });
});
