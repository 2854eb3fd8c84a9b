// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { EnvConfigSpec, createTestConfigProvider } from "../../src/config/env";
import { defaultToolConfigPath, loadToolConfig } from "../../src/config/loader";
import { resolve, resolveOptional } from "../../src/config/resolve";
import { makeProjectDir, removeDir, runTest } from "../helpers/layers";

describe("tool config", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await makeProjectDir({
      "podcompose/config.toml": 'podman_path = "/opt/podman"\nparallel = 4\n\n[logging]\nlevel = "warn"\n',
      "bad-value.toml": "parallel = 0\n",
      "bad-syntax.toml": "parallel = \n",
    });
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  test("default location under the config home", async () => {
    const config = await runTest(loadToolConfig(Option.none(), dir));
    expect(config).toEqual({ podman_path: "/opt/podman", parallel: 4, logging: { level: "warn" } });
  });

  test("a missing default file gives an empty configuration", async () => {
    const config = await runTest(loadToolConfig(Option.none(), `${dir}/nowhere`));
    expect(config).toEqual({});
  });

  test("an explicit path must exist", async () => {
    const error = await runTest(Effect.flip(loadToolConfig(Option.some(`${dir}/absent.toml`), dir)));
    expect(error.path).toBe(`${dir}/absent.toml`);
    expect(error.message.startsWith(`Failed to read ${dir}/absent.toml`)).toBe(true);
  });

  test("values are validated", async () => {
    const error = await runTest(Effect.flip(loadToolConfig(Option.some(`${dir}/bad-value.toml`), dir)));
    expect(error._tag).toBe("ConfigError");
  });

  test("syntax errors name the file", async () => {
    const error = await runTest(Effect.flip(loadToolConfig(Option.some(`${dir}/bad-syntax.toml`), dir)));
    expect(error.message.startsWith(`Failed to parse TOML in ${dir}/bad-syntax.toml`)).toBe(true);
  });

  test("defaultToolConfigPath", () => {
    expect(defaultToolConfigPath("/home/u/.config")).toBe("/home/u/.config/podcompose/config.toml");
  });
});

describe("environment", () => {
  const load = (variables: Readonly<Record<string, string>>) =>
    Effect.runPromise(Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider(variables)));

  test("unset variables stay absent", async () => {
    const env = await load({});
    expect(env.logLevel).toEqual(Option.none());
    expect(env.parallel).toEqual(Option.none());
    expect(env.debug).toBe(false);
    expect(env.configHome).toBe("/home/testuser/.config");
  });

  test("namespaced variables", async () => {
    const env = await load({
      PODCOMPOSE_LOG_LEVEL: "error",
      PODCOMPOSE_PODMAN_PATH: "/usr/local/bin/podman",
      COMPOSE_PARALLEL_LIMIT: "2",
      XDG_CONFIG_HOME: "/cfg",
    });
    expect(env.logLevel).toEqual(Option.some("error"));
    expect(env.podmanPath).toEqual(Option.some("/usr/local/bin/podman"));
    expect(env.parallel).toEqual(Option.some(2));
    expect(env.configHome).toBe("/cfg");
  });

  test("a non-positive parallel limit is rejected", async () => {
    const exit = await Effect.runPromiseExit(
      Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider({ COMPOSE_PARALLEL_LIMIT: "0" }))
    );
    expect(exit._tag).toBe("Failure");
  });
});

describe("resolve", () => {
  test("command line, then environment, then file, then default", () => {
    expect(resolve({ cli: Option.some(1), env: Option.some(2), toml: Option.some(3), fallback: 4 })).toBe(1);
    expect(resolve({ cli: Option.none(), env: Option.some(2), toml: Option.some(3), fallback: 4 })).toBe(2);
    expect(resolve({ cli: Option.none(), env: Option.none(), toml: Option.some(3), fallback: 4 })).toBe(3);
    expect(resolve({ cli: Option.none(), env: Option.none(), toml: Option.none(), fallback: 4 })).toBe(4);
  });

  test("resolveOptional keeps absence", () => {
    expect(resolveOptional({ cli: Option.none(), env: Option.none(), toml: Option.none() })).toEqual(Option.none());
  });
});
