// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, HashSet } from "effect";
import { describe, expect, test } from "vitest";
import { checkDependencyConditions, conditionGroups } from "../../src/orchestrator/conditions";
import { containerRecord, edge, projectOf } from "../helpers/fixtures";
import { commandLines, exitWith, ok, runWithPodman } from "../helpers/layers";

const project = projectOf([
  containerRecord("db"),
  containerRecord("cache"),
  containerRecord("worker", { name: "demo_worker_1", number: 1 }),
  containerRecord("worker", { name: "demo_worker_2", number: 2 }),
]);

const deps = HashSet.make(edge("db", "healthy"), edge("cache", "running"), edge("worker", "running"));

describe("conditionGroups", () => {
  test("groups by condition in the fixed order and expands replicas", () => {
    const groups = conditionGroups(project, deps).map((g) => ({
      condition: g.condition,
      containers: [...g.containers].sort(),
    }));
    expect(groups).toEqual([
      { condition: "healthy", containers: ["demo_db_1"] },
      { condition: "running", containers: ["demo_cache_1", "demo_worker_1", "demo_worker_2"] },
    ]);
  });

  test("no edges, no groups", () => {
    expect(conditionGroups(project, HashSet.empty())).toEqual([]);
  });
});

describe("checkDependencyConditions", () => {
  test("retries a group until one call reports every container", async () => {
    let healthyAttempts = 0;
    const script = (argv: readonly string[]) => {
      if (argv[1] === "--condition=healthy") {
        healthyAttempts += 1;
        return healthyAttempts < 3 ? exitWith(125, "not yet") : ok();
      }
      return ok();
    };
    const { calls } = await runWithPodman(
      script,
      checkDependencyConditions(project, HashSet.make(edge("db", "healthy"), edge("cache", "running")))
    );
    expect(commandLines(calls)).toEqual([
      "wait --condition=healthy demo_db_1",
      "wait --condition=healthy demo_db_1",
      "wait --condition=healthy demo_db_1",
      "wait --condition=running demo_cache_1",
    ]);
  });

  test("no dependencies, no calls", async () => {
    const { calls } = await runWithPodman(() => ok(), checkDependencyConditions(project, HashSet.empty()));
    expect(calls).toEqual([]);
  });

  test("interruption is the only way out of a condition that never holds", async () => {
    const { result, calls } = await runWithPodman(
      () => exitWith(1),
      Effect.timeoutOption(checkDependencyConditions(project, HashSet.make(edge("db", "healthy"))), "60 millis")
    );
    expect(result._tag).toBe("None");
    expect(calls.length).toBeGreaterThan(1);
  });
});
