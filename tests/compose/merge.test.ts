// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import { merge, mergeAll, mountTarget } from "../../src/compose/merge";

describe("merge", () => {
  test("mappings merge key by key and scalars overwrite", () => {
    const result = merge({ a: { x: 1, y: 2 }, b: "old" }, { a: { y: 3 }, b: "new" });
    expect(Either.getOrThrow(result)).toEqual({ a: { x: 1, y: 3 }, b: "new" });
  });

  test("sequences append", () => {
    const result = merge({ ports: ["80:80"] }, { ports: ["443:443"] });
    expect(Either.getOrThrow(result)).toEqual({ ports: ["80:80", "443:443"] });
  });

  test("command and entrypoint replace", () => {
    const result = merge({ command: ["a", "b"], entrypoint: ["sh"] }, { command: ["c"], entrypoint: "bash" });
    expect(Either.getOrThrow(result)).toEqual({ command: ["c"], entrypoint: "bash" });
  });

  test("volumes replace entries with the same target", () => {
    const result = merge(
      { volumes: ["./a:/data", "logs:/var/log", { type: "tmpfs", target: "/tmp" }] },
      { volumes: ["./b:/data", { type: "volume", source: "t", target: "/tmp" }] }
    );
    expect(Either.getOrThrow(result)).toEqual({
      volumes: ["logs:/var/log", "./b:/data", { type: "volume", source: "t", target: "/tmp" }],
    });
  });

  test("null unsets", () => {
    expect(Either.getOrThrow(merge({ ports: ["80"] }, { ports: null }))).toEqual({ ports: null });
  });

  test("shape mismatch names the path", () => {
    const result = merge({ services: { web: { ports: ["80"] } } }, { services: { web: { ports: "80" } } });
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left.message).toBe("cannot merge services.web.ports: sequence with scalar");
      expect(result.left.key).toBe("services.web.ports");
    }
  });

  test("inputs are not modified", () => {
    const base = { a: { x: 1 } };
    Either.getOrThrow(merge(base, { a: { x: 2 } }));
    expect(base).toEqual({ a: { x: 1 } });
  });
});

describe("mergeAll", () => {
  test("folds layers left to right", () => {
    expect(Either.getOrThrow(mergeAll({ a: 1 }, { b: 2 }, { a: 3 }))).toEqual({ a: 3, b: 2 });
  });

  test("grouping layers does not change the result", () => {
    const d1 = { services: { web: { image: "a", ports: ["80"], volumes: ["./a:/data"], command: ["x"] } } };
    const d2 = { services: { web: { ports: ["443"], volumes: ["logs:/var/log"], environment: { A: "1" } } } };
    const d3 = { services: { web: { image: "b", volumes: ["./b:/data"], command: ["y"], environment: { B: "2" } } } };
    const grouped = Either.flatMap(mergeAll(d1, d2), (first) => mergeAll(first, d3));
    const flat = mergeAll(d1, d2, d3);
    expect(Either.getOrThrow(grouped)).toEqual(Either.getOrThrow(flat));
    expect(Either.getOrThrow(flat)).toEqual({
      services: {
        web: {
          image: "b",
          ports: ["80", "443"],
          volumes: ["logs:/var/log", "./b:/data"],
          command: ["y"],
          environment: { A: "1", B: "2" },
        },
      },
    });
  });
});

describe("mountTarget", () => {
  test("short and long forms", () => {
    expect(mountTarget("./src:/app:ro")).toEqual(Option.some("/app"));
    expect(mountTarget("/anon")).toEqual(Option.some("/anon"));
    expect(mountTarget({ type: "bind", source: ".", target: "/w" })).toEqual(Option.some("/w"));
    expect(mountTarget(3)).toEqual(Option.none());
  });

  test("a two-field entry with options mounts at its first field", () => {
    expect(mountTarget("/data:ro")).toEqual(Option.some("/data"));
    expect(Either.getOrThrow(merge({ volumes: ["/data:ro"] }, { volumes: ["vol:/data"] }))).toEqual({
      volumes: ["vol:/data"],
    });
  });
});
