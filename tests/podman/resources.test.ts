// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either } from "effect";
import { describe, expect, test } from "vitest";
import { podRecord } from "../../src/compose/containers";
import { declaredNetworks, serviceAttachments } from "../../src/compose/networks";
import { declaredVolume, parseMount, resolveMount } from "../../src/compose/volumes";
import { ensureContainerResources, ensurePod, networkCreateArgs, volumeCreateArgs } from "../../src/podman/resources";
import { containerRecord } from "../helpers/fixtures";
import { commandLines, exitWith, ok, runWithPodman } from "../helpers/layers";

const LABELS = ["--label", "io.podman.compose.project=demo", "--label", "com.docker.compose.project=demo"];

const missingEverything = (argv: readonly string[]) => (argv[1] === "exists" ? exitWith(1) : ok());

describe("networkCreateArgs", () => {
  test("driver, ipam and labels", () => {
    const networks = declaredNetworks("demo", {
      networks: {
        back: {
          driver: "bridge",
          internal: true,
          labels: ["tier=back"],
          driver_opts: { mtu: 1400 },
          ipam: { driver: "default", config: [{ subnet: "10.5.0.0/16", gateway: "10.5.0.1" }] },
        },
      },
    });
    const back = networks.get("back");
    expect(back && networkCreateArgs("demo", back)).toEqual([
      "create",
      ...LABELS,
      "--label",
      "tier=back",
      "--internal",
      "--driver",
      "bridge",
      "--opt",
      "mtu=1400",
      "--subnet",
      "10.5.0.0/16",
      "--gateway",
      "10.5.0.1",
      "demo_back",
    ]);
  });
});

describe("volumeCreateArgs", () => {
  test("driver and labels", () => {
    expect(volumeCreateArgs("demo", declaredVolume("demo", "data", { driver: "local", labels: { keep: "1" } }))).toEqual([
      "create",
      ...LABELS,
      "--label",
      "keep=1",
      "--driver",
      "local",
      "demo_data",
    ]);
  });
});

describe("ensureContainerResources", () => {
  const volumes = new Map([["data", declaredVolume("demo", "data", {})]]);
  const networks = declaredNetworks("demo", {});
  const mount = Either.getOrThrow(
    Either.flatMap(parseMount("data:/srv", { baseDir: "/proj", home: "/home/tester" }), (m) =>
      resolveMount(m, { project: "demo", service: "web", volumes })
    )
  );
  const web = containerRecord("web", {
    mounts: [mount],
    networks: Either.getOrThrow(serviceAttachments("web", {}, networks)),
  });

  test("creates what is missing, volumes before networks", async () => {
    const { calls } = await runWithPodman(missingEverything, ensureContainerResources("demo", web));
    expect(commandLines(calls)).toEqual([
      "volume exists demo_data",
      `volume create ${LABELS.join(" ")} demo_data`,
      "network exists demo_default",
      `network create ${LABELS.join(" ")} demo_default`,
    ]);
  });

  test("existing resources are left alone", async () => {
    const { calls } = await runWithPodman(() => ok(), ensureContainerResources("demo", web));
    expect(commandLines(calls)).toEqual(["volume exists demo_data", "network exists demo_default"]);
  });

  test("a missing external network is fatal", async () => {
    const external = declaredNetworks("demo", { networks: { shared: { external: true } } });
    const container = containerRecord("web", {
      networks: Either.getOrThrow(serviceAttachments("web", {}, external)),
    });
    const { result } = await runWithPodman(
      missingEverything,
      Effect.flip(ensureContainerResources("demo", container))
    );
    expect(result.message).toBe("External network shared does not exist");
  });
});

describe("ensurePod", () => {
  test("creates the pod with its labels and arguments", async () => {
    const { calls } = await runWithPodman(missingEverything, ensurePod(podRecord("demo", ["--infra=false"])));
    expect(commandLines(calls)).toEqual([
      "pod exists pod_demo",
      `pod create --name=pod_demo ${LABELS.join(" ")} --infra=false`,
    ]);
  });
});
