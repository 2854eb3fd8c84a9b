// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, Equal, HashSet } from "effect";
import { describe, expect, test } from "vitest";
import {
  buildDependencyGraph,
  closure,
  dependencyNames,
  orderServices,
  parseCondition,
} from "../../src/compose/dependencies";
import { DependencyEdge, type DocumentMapping } from "../../src/compose/types";

const services = (entries: Record<string, DocumentMapping>): ReadonlyMap<string, DocumentMapping> =>
  new Map(Object.entries(entries));

const graphOf = (entries: Record<string, DocumentMapping>) =>
  Effect.runPromise(buildDependencyGraph(services(entries), "dependencies"));

const sortedNames = (names: readonly string[]): readonly string[] => [...names].sort();

describe("parseCondition", () => {
  test("compose aliases map to container states", () => {
    expect(Either.getOrThrow(parseCondition("service_healthy"))).toBe("healthy");
    expect(Either.getOrThrow(parseCondition("service_started"))).toBe("running");
    expect(Either.getOrThrow(parseCondition("service_completed_successfully"))).toBe("stopped");
    expect(Either.getOrThrow(parseCondition("paused"))).toBe("paused");
  });

  test("unknown conditions are rejected", () => {
    const result = parseCondition("eventually");
    expect(Either.isLeft(result) && result.left.message).toBe("unknown dependency condition: eventually");
  });
});

describe("buildDependencyGraph", () => {
  test("edges carry their condition", async () => {
    const graph = await graphOf({
      web: { depends_on: { db: { condition: "service_healthy" }, cache: { condition: "running" } } },
      db: {},
      cache: {},
    });
    const web = graph.deps.get("web") ?? HashSet.empty();
    expect(HashSet.has(web, new DependencyEdge({ name: "db", condition: "healthy" }))).toBe(true);
    expect(HashSet.has(web, new DependencyEdge({ name: "cache", condition: "running" }))).toBe(true);
    expect(HashSet.size(web)).toBe(2);
  });

  test("closure is transitive", async () => {
    const graph = await graphOf({
      web: { depends_on: { api: { condition: "running" } } },
      api: { depends_on: { db: { condition: "running" } } },
      db: {},
    });
    expect(sortedNames(dependencyNames(graph, "web"))).toEqual(["api", "db"]);
  });

  test("links add edges and aliases", async () => {
    const graph = await graphOf({ web: { links: ["db:database"] }, db: {} });
    expect(dependencyNames(graph, "web")).toEqual(["db"]);
    expect(graph.aliases.get("db")).toEqual(["database"]);
  });

  test("cycles are cut without self-dependencies", async () => {
    const graph = await graphOf({
      a: { depends_on: { b: { condition: "running" } } },
      b: { depends_on: { c: { condition: "running" } } },
      c: { depends_on: { a: { condition: "running" } } },
    });
    expect(sortedNames(dependencyNames(graph, "a"))).toEqual(["b", "c"]);
    expect(sortedNames(dependencyNames(graph, "b"))).toEqual(["a", "c"]);
    expect(sortedNames(dependencyNames(graph, "c"))).toEqual(["a", "b"]);
  });

  test("closing an already closed graph changes nothing", async () => {
    const entries = {
      web: { depends_on: { api: { condition: "running" }, db: { condition: "healthy" } } },
      api: { depends_on: { db: { condition: "running" } } },
      db: { depends_on: { web: { condition: "running" } } },
    };
    const graph = await graphOf(entries);
    for (const [name, edges] of graph.deps) {
      expect(Equal.equals(closure(graph.deps, name).edges, edges)).toBe(true);
    }
    const again = await graphOf(entries);
    expect(Array.from(again.deps.keys())).toEqual(Array.from(graph.deps.keys()));
    for (const [name, edges] of again.deps) {
      expect(Equal.equals(edges, graph.deps.get(name))).toBe(true);
    }
  });

  test("undefined targets fail", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        buildDependencyGraph(services({ web: { depends_on: { ghost: { condition: "running" } } } }), "dependencies")
      )
    );
    expect(error._tag).toBe("UnresolvedReferenceError");
    expect(error.message).toBe("service web depends_on refers to undefined service ghost");
  });
});

describe("orderServices", () => {
  test("fewest dependencies first, then by name", async () => {
    const graph = await graphOf({
      web: { depends_on: { db: { condition: "healthy" }, cache: { condition: "running" } } },
      db: {},
      cache: {},
    });
    expect(orderServices(graph)).toEqual(["cache", "db", "web"]);
  });
});
