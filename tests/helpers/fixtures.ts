// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/** Hand-built records for tests that do not need a compose file on disk. */

import { HashSet, Option } from "effect";
import { declaredNetworks } from "../../src/compose/networks";
import {
  type ContainerRecord,
  type DependencyCondition,
  DependencyEdge,
  type Project,
  type ResolvedService,
} from "../../src/compose/types";

export const edge = (name: string, condition: DependencyCondition = "running"): DependencyEdge =>
  new DependencyEdge({ name, condition });

export const containerRecord = (
  service: string,
  overrides: Partial<ContainerRecord> = {}
): ContainerRecord => ({
  name: `demo_${service}_1`,
  service,
  number: 1,
  image: `${service}:latest`,
  definition: {},
  labels: [],
  deps: HashSet.empty(),
  aliases: [],
  pod: Option.none(),
  mounts: [],
  networks: [],
  networkMode: Option.none(),
  ...overrides,
});

/** A project named `demo` whose services are exactly the given containers' services. */
export const projectOf = (containers: readonly ContainerRecord[], overrides: Partial<Project> = {}): Project => {
  const services = new Map(
    containers.map((c): readonly [string, ResolvedService] => [
      c.service,
      { name: c.service, definition: c.definition, deps: c.deps, aliases: c.aliases },
    ])
  );
  return {
    name: "demo",
    dir: "/proj",
    files: ["/proj/compose.yml"],
    environment: new Map(),
    document: {},
    configHash: "hash-1",
    services,
    containers,
    networks: declaredNetworks("demo", {}),
    volumes: new Map(),
    pods: [],
    ...overrides,
  };
};
