// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { Podman, runChecked } from "../../src/podman/client";
import { commandLines, exitWith, ok, runWithPodman } from "../helpers/layers";

const settings = {
  globalArgs: ["--log-level", "debug"],
  verbArgs: new Map([["run", ["--replace"]]]),
};

describe("Podman", () => {
  test("global arguments precede the verb, verb arguments follow it", async () => {
    const { result, calls } = await runWithPodman(
      () => ok(),
      Effect.flatMap(Podman, (podman) => podman.run("run", ["img"])),
      settings
    );
    expect(result).toEqual(Option.some(0));
    expect(commandLines(calls)).toEqual(["--log-level debug run --replace img"]);
  });

  test("argv includes the binary", async () => {
    const { result } = await runWithPodman(
      () => ok(),
      Effect.map(Podman, (podman) => podman.argv("ps", ["-a"])),
      { path: "/opt/podman" }
    );
    expect(result).toEqual(["/opt/podman", "ps", "-a"]);
  });

  test("output fails on a non-zero exit", async () => {
    const { result } = await runWithPodman(
      () => exitWith(125, "no such image"),
      Effect.flip(Effect.flatMap(Podman, (podman) => podman.output("image", ["inspect", "x"])))
    );
    expect(result._tag).toBe("ExternalToolError");
    expect(result.message).toBe("command exited with code 125: podman image inspect x");
  });

  test("dry-run prints instead of running", async () => {
    const { result, calls } = await runWithPodman(
      () => ok(),
      Effect.flatMap(Podman, (podman) =>
        Effect.all([podman.run("rm", ["c1"]), podman.exists("network", "demo_default")])
      ),
      { dryRun: true }
    );
    expect(result).toEqual([Option.none(), false]);
    expect(calls).toEqual([]);
  });

  test("exists reads the exit status", async () => {
    const { result, calls } = await runWithPodman(
      (argv) => (argv[0] === "volume" ? ok() : exitWith(1)),
      Effect.flatMap(Podman, (podman) =>
        Effect.all([podman.exists("volume", "demo_data"), podman.exists("pod", "pod_demo")])
      )
    );
    expect(result).toEqual([true, false]);
    expect(commandLines(calls)).toEqual(["volume exists demo_data", "pod exists pod_demo"]);
  });

  test("runChecked turns a non-zero exit into an error", async () => {
    const { result } = await runWithPodman(() => exitWith(2), Effect.flip(runChecked("network", ["create", "n"])));
    expect(result.message).toBe("command exited with code 2: podman network create n");
  });
});
