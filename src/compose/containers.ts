// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Expansion of resolved services into concrete container records.
 */

import { relative } from "node:path";
import { Array as Arr, Either, Option, pipe } from "effect";
import type { ResolutionError } from "../lib/errors";
import { PODCOMPOSE_VERSION } from "../lib/version";
import { networkMode, serviceAttachments } from "./networks";
import {
  type ContainerRecord,
  type DocumentMapping,
  type NetworkRecord,
  type PodRecord,
  type ResolvedService,
  type VolumeRecord,
  getMapping,
  getSequence,
  getString,
} from "./types";
import { type ResolvedMount, parseMount, resolveMount } from "./volumes";

export const PROJECT_LABEL = "io.podman.compose.project";
export const CONFIG_HASH_LABEL = "io.podman.compose.config-hash";
export const COMPAT_PROJECT_LABEL = "com.docker.compose.project";

/** `label=` filter selecting every resource of a project. */
export const projectFilter = (project: string): string => `label=${PROJECT_LABEL}=${project}`;

export interface ContainerScope {
  readonly project: string;
  readonly dir: string;
  readonly files: readonly string[];
  readonly configHash: string;
  readonly home: string;
  readonly pod: Option.Option<string>;
  readonly networks: ReadonlyMap<string, NetworkRecord>;
  readonly volumes: ReadonlyMap<string, VolumeRecord>;
}

const nonNegativeInt = (value: unknown): Option.Option<number> =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 ? Option.some(value) : Option.none();

/** `deploy.replicas`, then `scale`, then one. */
export const replicaCount = (definition: DocumentMapping): number =>
  pipe(
    getMapping(definition, "deploy"),
    Option.flatMap((deploy) => nonNegativeInt(deploy["replicas"])),
    Option.orElse(() => nonNegativeInt(definition["scale"])),
    Option.getOrElse(() => 1)
  );

export const containerName = (
  project: string,
  service: string,
  definition: DocumentMapping,
  number: number,
  replicas: number
): string =>
  pipe(
    getString(definition, "container_name"),
    Option.filter(() => replicas === 1),
    Option.getOrElse(() => `${project}_${service}_${number}`)
  );

const bookkeepingLabels = (scope: ContainerScope, service: string, number: number): readonly string[] => [
  `${CONFIG_HASH_LABEL}=${scope.configHash}`,
  `${PROJECT_LABEL}=${scope.project}`,
  `io.podman.compose.version=${PODCOMPOSE_VERSION}`,
  `${COMPAT_PROJECT_LABEL}=${scope.project}`,
  `com.docker.compose.project.working_dir=${scope.dir}`,
  `com.docker.compose.project.config_files=${scope.files.map((f) => relative(scope.dir, f)).join(",")}`,
  `com.docker.compose.container-number=${number}`,
  `com.docker.compose.service=${service}`,
];

export const podRecord = (project: string, args: readonly string[]): PodRecord => ({
  name: `pod_${project}`,
  labels: [`${PROJECT_LABEL}=${project}`, `${COMPAT_PROJECT_LABEL}=${project}`],
  args,
});

const serviceMounts = (
  service: ResolvedService,
  scope: ContainerScope
): Either.Either<readonly ResolvedMount[], ResolutionError> =>
  Either.all(
    Option.getOrElse(getSequence(service.definition, "volumes"), () => []).map((entry) =>
      Either.flatMap(parseMount(entry, { baseDir: scope.dir, home: scope.home }), (mount) =>
        resolveMount(mount, { project: scope.project, service: service.name, volumes: scope.volumes })
      )
    )
  );

const serviceContainers = (
  service: ResolvedService,
  scope: ContainerScope
): Either.Either<readonly ContainerRecord[], ResolutionError> =>
  Either.gen(function* () {
    const mounts = yield* serviceMounts(service, scope);
    const networks = yield* serviceAttachments(service.name, service.definition, scope.networks);
    const replicas = replicaCount(service.definition);
    const image = Option.getOrElse(
      getString(service.definition, "image"),
      () => `${scope.project}_${service.name}`
    );
    return Array.from({ length: replicas }, (_, i): ContainerRecord => {
      const number = i + 1;
      return {
        name: containerName(scope.project, service.name, service.definition, number, replicas),
        service: service.name,
        number,
        image,
        definition: service.definition,
        labels: bookkeepingLabels(scope, service.name, number),
        deps: service.deps,
        aliases: service.aliases,
        pod: scope.pod,
        mounts,
        networks,
        networkMode: networkMode(service.definition),
      };
    });
  });

/**
 * Container records in creation order. `order` lists services by ascending
 * transitive dependency count; replicas keep their service's position.
 */
export const buildContainers = (
  services: ReadonlyMap<string, ResolvedService>,
  order: readonly string[],
  scope: ContainerScope
): Either.Either<readonly ContainerRecord[], ResolutionError> =>
  Either.map(
    Either.all(
      pipe(
        order,
        Arr.filterMap((name) => Option.fromNullable(services.get(name))),
        Arr.map((service) => serviceContainers(service, scope))
      )
    ),
    Arr.flatten
  );
