// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Service filters given on the command line.
 */

import { Effect, HashSet } from "effect";
import type { ContainerRecord, Project } from "../compose/types";
import { ErrorCode, GeneralError } from "../lib/errors";

export const assertServices = (project: Project, names: readonly string[]): Effect.Effect<void, GeneralError> => {
  const unknown = names.filter((n) => !project.services.has(n));
  return unknown.length === 0
    ? Effect.void
    : Effect.fail(
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: `unknown service: ${unknown.join(", ")}`,
        })
      );
};

const dependenciesOf = (project: Project, service: string): readonly string[] =>
  Array.from(HashSet.values(project.services.get(service)?.deps ?? HashSet.empty())).map((e) => e.name);

const dependentsOf = (project: Project, service: string): readonly string[] =>
  Array.from(project.services.values())
    .filter((svc) => HashSet.some(svc.deps, (e) => e.name === service))
    .map((svc) => svc.name);

const complement = (project: Project, kept: ReadonlySet<string>): ReadonlySet<string> =>
  new Set(Array.from(project.services.keys()).filter((name) => !kept.has(name)));

/**
 * Services `up` leaves alone: everything but the requested services and
 * their dependencies. Nothing is excluded without a filter.
 */
export const excludedForUp = (
  project: Project,
  requested: readonly string[]
): Effect.Effect<ReadonlySet<string>, GeneralError> =>
  Effect.as(
    assertServices(project, requested),
    requested.length === 0
      ? new Set<string>()
      : complement(project, new Set(requested.flatMap((s) => [s, ...dependenciesOf(project, s)])))
  );

/** Services `down` leaves alone: everything but the requested services and their dependents. */
export const excludedForDown = (
  project: Project,
  requested: readonly string[]
): Effect.Effect<ReadonlySet<string>, GeneralError> =>
  Effect.as(
    assertServices(project, requested),
    requested.length === 0
      ? new Set<string>()
      : complement(project, new Set(requested.flatMap((s) => [s, ...dependentsOf(project, s)])))
  );

/** Containers of `services` in creation order; every container when `services` is empty. */
export const selectContainers = (
  project: Project,
  services: readonly string[]
): Effect.Effect<readonly ContainerRecord[], GeneralError> =>
  Effect.as(
    assertServices(project, services),
    services.length === 0
      ? project.containers
      : project.containers.filter((c) => services.includes(c.service))
  );
