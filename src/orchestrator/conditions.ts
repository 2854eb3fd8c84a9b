// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Blocking on dependency conditions before a container starts.
 *
 * Edges are grouped by condition. Each group is one `wait --condition=X`
 * call naming every container of every target service, retried on a fixed
 * interval until it succeeds; a group is only satisfied when all of its
 * containers reported the condition in the same call.
 */

import { Effect, HashSet, pipe } from "effect";
import {
  DEPENDENCY_CONDITIONS,
  type DependencyCondition,
  type DependencyEdge,
  type Project,
  containersOf,
} from "../compose/types";
import { formatError } from "../lib/errors";
import { conditionPollSchedule, retryLogged } from "../lib/retry";
import { Podman, type ToolError } from "../podman/client";
import { OrchestratorTimings } from "./timings";

interface ConditionGroup {
  readonly condition: DependencyCondition;
  readonly containers: readonly string[];
}

/** Non-empty groups in the fixed condition order. */
export const conditionGroups = (project: Project, deps: HashSet.HashSet<DependencyEdge>): readonly ConditionGroup[] => {
  const edges = Array.from(HashSet.values(deps));
  return DEPENDENCY_CONDITIONS.map(
    (condition): ConditionGroup => ({
      condition,
      containers: edges
        .filter((edge) => edge.condition === condition)
        .flatMap((edge) => containersOf(project, edge.name).map((c) => c.name)),
    })
  ).filter((group) => group.containers.length > 0);
};

const awaitGroup = (
  group: ConditionGroup
): Effect.Effect<void, ToolError, Podman | OrchestratorTimings> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const timings = yield* OrchestratorTimings;
    yield* retryLogged(
      podman.output("wait", [`--condition=${group.condition}`, ...group.containers]),
      conditionPollSchedule(timings.dependencyPollInterval),
      (e) => `wait for ${group.condition} failed, retrying: ${formatError(e)}`
    );
    yield* Effect.logDebug(
      `dependencies for condition ${group.condition} have been fulfilled on containers ${group.containers.join(", ")}`
    );
  });

/**
 * Returns once every dependency edge is satisfied. There is no overall
 * timeout; interruption is the only way out of a condition that never holds.
 */
export const checkDependencyConditions = (
  project: Project,
  deps: HashSet.HashSet<DependencyEdge>
): Effect.Effect<void, ToolError, Podman | OrchestratorTimings> =>
  pipe(
    conditionGroups(project, deps),
    Effect.forEach(awaitGroup, { discard: true })
  );
