// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { createHash } from "node:crypto";
import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import type { DocumentNode, VolumeRecord } from "../../src/compose/types";
import {
  type ResolvedMount,
  declaredVolume,
  mountArgs,
  parseMount,
  resolveMount,
} from "../../src/compose/volumes";

const scope = { baseDir: "/proj", home: "/home/tester" };
const volumes: ReadonlyMap<string, VolumeRecord> = new Map([["data", declaredVolume("demo", "data", {})]]);

const parsed = (entry: DocumentNode) => Either.getOrThrow(parseMount(entry, scope));

const resolved = (entry: DocumentNode): ResolvedMount =>
  Either.getOrThrow(resolveMount(parsed(entry), { project: "demo", service: "web", volumes }));

describe("parseMount", () => {
  test("relative bind with options", () => {
    expect(parsed("./data:/var/lib:ro,z")).toEqual({
      type: "bind",
      source: Option.some("/proj/data"),
      target: "/var/lib",
      readOnly: Option.some(true),
      options: ["z"],
    });
  });

  test("home-relative bind", () => {
    expect(parsed("~/cfg:/etc/app").source).toEqual(Option.some("/home/tester/cfg"));
  });

  test("named volume and anonymous volume", () => {
    expect(parsed("data:/srv")).toEqual({
      type: "volume",
      source: Option.some("data"),
      target: "/srv",
      readOnly: Option.none(),
      options: [],
    });
    expect(parsed("/cache").source).toEqual(Option.none());
  });

  test("two fields with options are target and options", () => {
    const mount = parsed("/data:ro");
    expect(mount.target).toBe("/data");
    expect(mount.readOnly).toEqual(Option.some(true));
  });

  test("unknown options are rejected", () => {
    const result = parseMount("data:/srv:bogus", scope);
    expect(Either.isLeft(result) && result.left.message).toBe("unknown mount option bogus in data:/srv:bogus");
  });

  test("long syntax bind", () => {
    expect(
      parsed({
        type: "bind",
        source: "./src",
        target: "/app",
        read_only: true,
        bind: { propagation: "rshared", selinux: "z" },
      })
    ).toEqual({
      type: "bind",
      source: Option.some("/proj/src"),
      target: "/app",
      readOnly: Option.some(true),
      options: ["rshared", "z"],
    });
  });

  test("long syntax needs a target", () => {
    const result = parseMount({ type: "volume", source: "data" }, scope);
    expect(Either.isLeft(result) && result.left.message).toBe("long-syntax mount needs a target");
  });
});

describe("declaredVolume", () => {
  test("project-scoped, custom and external names", () => {
    expect(declaredVolume("demo", "data", {}).name).toBe("demo_data");
    expect(declaredVolume("demo", "data", { name: "custom" }).name).toBe("custom");
    expect(declaredVolume("demo", "data", { external: true })).toEqual({
      key: "data",
      name: "data",
      external: true,
      definition: { external: true },
    });
    expect(declaredVolume("demo", "data", { external: { name: "shared" } }).name).toBe("shared");
  });
});

describe("resolveMount and mountArgs", () => {
  test("declared volume uses its project name", () => {
    expect(mountArgs(resolved("data:/srv"))).toEqual(["-v", "demo_data:/srv"]);
    expect(mountArgs(resolved("data:/srv:ro"))).toEqual(["-v", "demo_data:/srv:ro"]);
  });

  test("anonymous volumes get a stable per-target name", () => {
    const digest = createHash("sha256").update("/cache").digest("hex");
    expect(mountArgs(resolved("/cache"))).toEqual(["-v", `demo_web_${digest}:/cache`]);
  });

  test("binds pass through", () => {
    expect(mountArgs(resolved("./data:/var/lib:ro,z"))).toEqual(["-v", "/proj/data:/var/lib:z,ro"]);
  });

  test("tmpfs", () => {
    expect(mountArgs(resolved({ type: "tmpfs", target: "/tmp" }))).toEqual([
      "--mount",
      "type=tmpfs,destination=/tmp",
    ]);
  });

  test("undeclared volumes fail", () => {
    const result = resolveMount(parsed("cache:/srv"), { project: "demo", service: "web", volumes });
    expect(Either.isLeft(result) && result.left.message).toBe("service web refers to undefined volume cache");
  });
});
