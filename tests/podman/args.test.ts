// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, HashSet, Option } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import type { ContainerRecord, Project } from "../../src/compose/types";
import { assignments, containerToArgs } from "../../src/podman/args";
import { containerRecord, edge, projectOf } from "../helpers/fixtures";
import { makeProjectDir, removeDir, runTest } from "../helpers/layers";

const argsFor = (project: Project, container: ContainerRecord, detached = false, noDeps = false) =>
  runTest(containerToArgs(project, container, { detached, noDeps }));

const failureFor = (project: Project, container: ContainerRecord) =>
  runTest(Effect.flip(containerToArgs(project, container, { detached: false })));

describe("assignments", () => {
  test("null values stay bare", () => {
    expect(assignments({ A: "1", B: null, C: 2, D: ["x"] })).toEqual(["A=1", "B", "C=2", 'D=["x"]']);
  });
});

describe("containerToArgs", () => {
  test("full argument order", async () => {
    const web = containerRecord("web", {
      image: "nginx",
      pod: Option.some("pod_demo"),
      labels: ["io.podman.compose.project=demo"],
      definition: {
        image: "nginx",
        environment: { A: "1", B: null },
        labels: { tier: "web" },
        ports: ["8080:80", { target: 443, published: 8443, protocol: "udp" }],
        restart: "always",
        healthcheck: { test: ["CMD", "curl", "-f", "http://localhost"], interval: "30s" },
        command: ["nginx", "-g", "daemon off;"],
      },
    });
    expect(await argsFor(projectOf([web]), web)).toEqual([
      "--name=demo_web_1",
      "--pod=pod_demo",
      "--label",
      "tier=web",
      "--label",
      "io.podman.compose.project=demo",
      "-e",
      "A=1",
      "-e",
      "B",
      "--network=bridge:alias=web",
      "-p",
      "8080:80",
      "-p",
      "8443:443/udp",
      "--restart",
      "always",
      "--healthcheck-command",
      "/bin/sh -c 'curl -f http://localhost'",
      "--healthcheck-interval",
      "30s",
      "nginx",
      "nginx",
      "-g",
      "daemon off;",
    ]);
  });

  test("dependencies become --requires unless dropped", async () => {
    const db = containerRecord("db");
    const web = containerRecord("web", { deps: HashSet.make(edge("db", "healthy")) });
    const project = projectOf([db, web]);
    expect((await argsFor(project, web, true)).slice(0, 3)).toEqual([
      "--name=demo_web_1",
      "-d",
      "--requires=demo_db_1",
    ]);
    expect((await argsFor(project, web, false, true)).slice(0, 2)).toEqual([
      "--name=demo_web_1",
      "--network=bridge:alias=web",
    ]);
  });

  test("network_mode service: joins the other container's namespace", async () => {
    const db = containerRecord("db");
    const web = containerRecord("web", {
      definition: { network_mode: "service:db" },
      networkMode: Option.some("service:db"),
    });
    expect(await argsFor(projectOf([db, web]), web)).toEqual([
      "--name=demo_web_1",
      "--network=container:demo_db_1",
      "web:latest",
    ]);
  });

  test("network_mode with networks is rejected", async () => {
    const web = containerRecord("web", {
      definition: { network_mode: "host", networks: ["default"] },
      networkMode: Option.some("host"),
    });
    const error = await failureFor(projectOf([web]), web);
    expect(error.message).toBe("service web: networks and network_mode must not be present in the same service");
  });

  test("resource limits and disabled healthcheck", async () => {
    const web = containerRecord("web", {
      definition: {
        deploy: { resources: { limits: { cpus: "0.5", memory: "512M" } } },
        healthcheck: { disable: true },
        read_only: true,
      },
    });
    expect(await argsFor(projectOf([web]), web)).toEqual([
      "--name=demo_web_1",
      "--read-only",
      "--network=bridge:alias=web",
      "--cpus",
      "0.5",
      "-m",
      "512m",
      "--no-healthcheck",
      "web:latest",
    ]);
  });

  test("unknown healthcheck test type", async () => {
    const web = containerRecord("web", { definition: { healthcheck: { test: ["SHELL", "true"] } } });
    const error = await failureFor(projectOf([web]), web);
    expect(error.message).toBe("service web: unknown healthcheck test type SHELL, expecting NONE, CMD or CMD-SHELL");
  });

  describe("env files", () => {
    let dir = "";

    beforeAll(async () => {
      dir = await makeProjectDir({ "web.env": "FROM_FILE=yes\n" });
    });

    afterAll(async () => {
      await removeDir(dir);
    });

    test("entries are read relative to the project directory", async () => {
      const web = containerRecord("web", {
        definition: { env_file: ["web.env", { path: "optional.env", required: false }] },
      });
      expect(await argsFor(projectOf([web], { dir }), web)).toEqual([
        "--name=demo_web_1",
        "-e",
        "FROM_FILE=yes",
        "--network=bridge:alias=web",
        "web:latest",
      ]);
    });

    test("a missing required file fails", async () => {
      const web = containerRecord("web", { definition: { env_file: ["missing.env"] } });
      const error = await failureFor(projectOf([web], { dir }), web);
      expect(error.message).toBe(`service web: env file ${dir}/missing.env does not exist`);
    });
  });
});
