// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import { isServiceActive, normAsDict, normalizeFinal, normalizeService } from "../../src/compose/normalize";

describe("normalizeService", () => {
  test("every field family reaches its canonical shape", () => {
    const result = normalizeService(
      {
        image: "busybox",
        environment: ["A=1", "B"],
        labels: "tier=web",
        command: "echo 'a b'",
        depends_on: ["db"],
        security_opt: "seccomp:unconfined",
        env_file: ".env.web",
        extends: "base",
      },
      Option.none()
    );
    expect(Either.getOrThrow(result)).toEqual({
      image: "busybox",
      environment: { A: "1", B: null },
      labels: { tier: "web" },
      command: ["echo", "a b"],
      depends_on: { db: { condition: "running" } },
      security_opt: ["seccomp=unconfined"],
      env_file: [".env.web"],
      extends: { service: "base" },
    });
  });

  test("long depends_on keeps explicit conditions", () => {
    const result = normalizeService({ depends_on: { db: { condition: "healthy" }, cache: null } });
    expect(Either.getOrThrow(result)).toEqual({
      depends_on: { db: { condition: "healthy" }, cache: { condition: "running" } },
    });
  });

  test("build context is re-rooted under the declaring file's directory", () => {
    const result = normalizeService({ build: "./app" }, Option.some("sub"));
    expect(Either.getOrThrow(result)).toEqual({ build: { context: "sub/app" } });
  });

  test("additional contexts become name=path entries", () => {
    const result = normalizeService({ build: { context: ".", additional_contexts: { base: "../base" } } });
    expect(Either.getOrThrow(result)).toEqual({
      build: { context: ".", additional_contexts: ["base=../base"] },
    });
  });

  test("unbalanced command quoting is rejected", () => {
    const result = normalizeService({ command: "echo 'oops" });
    expect(Either.isLeft(result) && result.left.message).toBe("command: unbalanced quoting in echo 'oops");
  });
});

describe("normAsDict", () => {
  test("rejects non-string list entries", () => {
    const result = normAsDict(["A=1", 3], "environment");
    expect(Either.isLeft(result) && result.left.message).toBe("environment entries must be strings");
  });

  test("absent becomes an empty mapping", () => {
    expect(Either.getOrThrow(normAsDict(undefined, "labels"))).toEqual({});
  });
});

describe("normalizeFinal", () => {
  test("build contexts become absolute", () => {
    const doc = normalizeFinal({ services: { web: { build: { context: "sub/app" } }, db: { image: "pg" } } }, "/proj");
    expect(doc).toEqual({
      services: { web: { build: { context: "/proj/sub/app" } }, db: { image: "pg" } },
    });
  });
});

describe("isServiceActive", () => {
  test("services without profiles are always active", () => {
    expect(isServiceActive({ image: "x" }, new Set())).toBe(true);
  });

  test("profiled services need a matching profile", () => {
    const svc = { profiles: ["debug", "ops"] };
    expect(isServiceActive(svc, new Set())).toBe(false);
    expect(isServiceActive(svc, new Set(["ops"]))).toBe(true);
  });
});
