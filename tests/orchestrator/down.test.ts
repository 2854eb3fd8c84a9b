// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, HashSet, Option } from "effect";
import { describe, expect, test } from "vitest";
import { podRecord } from "../../src/compose/containers";
import { declaredVolume, parseMount, resolveMount } from "../../src/compose/volumes";
import { defaultDownOptions, down, removeOrphans, stopTimeoutArgs } from "../../src/orchestrator/down";
import { containerRecord, edge, projectOf } from "../helpers/fixtures";
import { commandLines, ok, runWithPodman } from "../helpers/layers";

const FILTER = "label=io.podman.compose.project=demo";

const volumes = new Map([["data", declaredVolume("demo", "data", {})]]);
const dataMount = Either.getOrThrow(
  Either.flatMap(parseMount("data:/var/lib/db", { baseDir: "/proj", home: "/home/tester" }), (m) =>
    resolveMount(m, { project: "demo", service: "db", volumes })
  )
);

const project = projectOf(
  [
    containerRecord("db", { mounts: [dataMount] }),
    containerRecord("web", { deps: HashSet.make(edge("db")), definition: { stop_grace_period: "1m" } }),
  ],
  { pods: [podRecord("demo", [])], volumes }
);

const script = (argv: readonly string[]) => {
  const line = argv.join(" ");
  if (line.startsWith("network ls")) {
    return ok("demo_default\n");
  }
  if (line.startsWith("volume ls")) {
    return ok("demo_data\ndemo_scratch\n");
  }
  if (line.startsWith("ps")) {
    return ok("demo_db_1\ndemo_old_1\n");
  }
  return ok();
};

describe("stopTimeoutArgs", () => {
  test("explicit timeout wins over the grace period", () => {
    const web = containerRecord("web", { definition: { stop_grace_period: "1m" } });
    expect(stopTimeoutArgs(web, Option.none())).toEqual(["-t", "60"]);
    expect(stopTimeoutArgs(web, Option.some(3))).toEqual(["-t", "3"]);
    expect(stopTimeoutArgs(containerRecord("db"), Option.none())).toEqual(["-t", "10"]);
    expect(stopTimeoutArgs(containerRecord("db", { definition: { stop_grace_period: "later" } }), Option.none())).toEqual(
      []
    );
  });
});

describe("down", () => {
  test("every stop finishes before the first rm, then pods and networks go", async () => {
    const { calls } = await runWithPodman(script, down(project, defaultDownOptions));
    const lines = commandLines(calls);
    expect([...lines.slice(0, 2)].sort()).toEqual(["stop -t 10 demo_db_1", "stop -t 60 demo_web_1"]);
    expect(lines.slice(2)).toEqual([
      "rm demo_web_1",
      "rm demo_db_1",
      "pod rm pod_demo",
      `network ls --noheading --filter ${FILTER} --format {{.Name}}`,
      "network rm demo_default",
    ]);
    const lastStop = Math.max(...calls.filter((c) => c.argv[0] === "stop").map((c) => c.end));
    const firstRm = Math.min(...calls.filter((c) => c.argv[0] === "rm").map((c) => c.start));
    expect(lastStop).toBeLessThan(firstRm);
  });

  test("stops run concurrently", async () => {
    const slowStops = (argv: readonly string[]) =>
      argv[0] === "stop" ? Effect.zipRight(Effect.sleep("20 millis"), ok()) : script(argv);
    const { calls } = await runWithPodman(slowStops, down(project, defaultDownOptions));
    const [first, second] = calls.filter((c) => c.argv[0] === "stop");
    expect(first).toBeDefined();
    expect(second).toBeDefined();
    if (first !== undefined && second !== undefined) {
      expect(first.start).toBeLessThan(second.end);
      expect(second.start).toBeLessThan(first.end);
    }
  });

  test("a filter leaves dependencies, pods and networks alone", async () => {
    const { calls } = await runWithPodman(script, down(project, { ...defaultDownOptions, services: ["web"] }));
    expect(commandLines(calls)).toEqual(["stop -t 60 demo_web_1", "rm demo_web_1"]);
  });

  test("a filter takes dependents along", async () => {
    const { calls } = await runWithPodman(script, down(project, { ...defaultDownOptions, services: ["db"] }));
    expect(commandLines(calls).filter((l) => l.startsWith("rm "))).toEqual(["rm demo_web_1", "rm demo_db_1"]);
  });

  test("volumes of excluded services are kept", async () => {
    const { calls } = await runWithPodman(
      script,
      down(project, { ...defaultDownOptions, services: ["web"], volumes: true, timeout: Option.some(2) })
    );
    expect(commandLines(calls)).toEqual([
      "stop -t 2 demo_web_1",
      "rm demo_web_1",
      `volume ls --noheading --filter ${FILTER} --format {{.Name}}`,
      "volume rm demo_scratch",
    ]);
  });
});

describe("removeOrphans", () => {
  test("stops and removes containers the project no longer defines", async () => {
    const { calls } = await runWithPodman(script, removeOrphans(project, Option.none()));
    expect(commandLines(calls)).toEqual([
      `ps --filter ${FILTER} -a --format {{ .Names }}`,
      "stop demo_old_1",
      "rm demo_old_1",
    ]);
  });
});
