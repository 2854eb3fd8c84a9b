// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Networks, volumes and pods a container needs before it can be created.
 * Each ensure step probes with `exists` and creates what is missing; a
 * missing external resource is fatal.
 */

import { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import { COMPAT_PROJECT_LABEL, PROJECT_LABEL } from "../compose/containers";
import {
  type ContainerRecord,
  type DocumentMapping,
  type DocumentNode,
  type NetworkRecord,
  type PodRecord,
  type VolumeRecord,
  EMPTY_MAPPING,
  getBoolean,
  getMapping,
  getString,
  isMapping,
  isSequence,
  stringList,
} from "../compose/types";
import { ErrorCode, GeneralError } from "../lib/errors";
import { Podman, type ToolError, runChecked } from "./client";

const projectLabels = (project: string): readonly string[] => [
  "--label",
  `${PROJECT_LABEL}=${project}`,
  "--label",
  `${COMPAT_PROJECT_LABEL}=${project}`,
];

/** Labels written as a mapping or a `k=v` list. */
const userLabels = (definition: DocumentMapping): readonly string[] => {
  const labels = definition["labels"];
  const entries = isMapping(labels)
    ? Object.entries(labels).map(([k, v]) => (v === null ? k : `${k}=${String(v)}`))
    : isSequence(labels)
      ? stringList(labels)
      : [];
  return entries.flatMap((l) => ["--label", l]);
};

const valueFlag = (option: Option.Option<string>, flag: string): readonly string[] =>
  Option.match(option, { onNone: (): readonly string[] => [], onSome: (v) => [flag, v] });

const driverOpts = (definition: DocumentMapping): readonly string[] =>
  Object.entries(Option.getOrElse(getMapping(definition, "driver_opts"), () => EMPTY_MAPPING)).flatMap(
    ([k, v]) => ["--opt", `${k}=${String(v)}`]
  );

// ============================================================================
// Networks
// ============================================================================

const ipamConfigs = (ipam: DocumentMapping): readonly DocumentMapping[] => {
  const config: DocumentNode | undefined = ipam["config"];
  return isMapping(config) ? [config] : isSequence(config) ? config.filter(isMapping) : [];
};

/** `network create` arguments for a declared network. */
export const networkCreateArgs = (project: string, network: NetworkRecord): readonly string[] => {
  const def = network.definition;
  const ipam = Option.getOrElse(getMapping(def, "ipam"), () => EMPTY_MAPPING);
  const ipamDriver = pipe(
    getString(ipam, "driver"),
    Option.filter((d) => d !== "default")
  );
  return [
    "create",
    ...projectLabels(project),
    ...userLabels(def),
    ...(getBoolean(def, "internal") ? ["--internal"] : []),
    ...valueFlag(getString(def, "driver"), "--driver"),
    ...driverOpts(def),
    ...valueFlag(ipamDriver, "--ipam-driver"),
    ...(getBoolean(def, "enable_ipv6") ? ["--ipv6"] : []),
    ...ipamConfigs(ipam).flatMap((cfg) => [
      ...valueFlag(getString(cfg, "subnet"), "--subnet"),
      ...valueFlag(getString(cfg, "ip_range"), "--ip-range"),
      ...valueFlag(getString(cfg, "gateway"), "--gateway"),
    ]),
    network.name,
  ];
};

const missingExternal = (kind: "network" | "volume", name: string): GeneralError =>
  new GeneralError({
    code: kind === "network" ? ErrorCode.NETWORK_CREATE_FAILED : ErrorCode.VOLUME_CREATE_FAILED,
    message: `External ${kind} ${name} does not exist`,
  });

const ensureNetwork = (
  project: string,
  network: NetworkRecord
): Effect.Effect<void, ToolError | GeneralError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    if (yield* podman.exists("network", network.name)) {
      return;
    }
    if (network.external) {
      if (podman.settings.dryRun) {
        return;
      }
      return yield* Effect.fail(missingExternal("network", network.name));
    }
    yield* Effect.logDebug(`creating network ${network.name}`);
    yield* runChecked("network", networkCreateArgs(project, network));
  });

// ============================================================================
// Volumes
// ============================================================================

export const volumeCreateArgs = (project: string, volume: VolumeRecord): readonly string[] => [
  "create",
  ...projectLabels(project),
  ...userLabels(volume.definition),
  ...valueFlag(getString(volume.definition, "driver"), "--driver"),
  ...driverOpts(volume.definition),
  volume.name,
];

const ensureVolume = (
  project: string,
  volume: VolumeRecord
): Effect.Effect<void, ToolError | GeneralError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    if (yield* podman.exists("volume", volume.name)) {
      return;
    }
    if (volume.external) {
      if (podman.settings.dryRun) {
        return;
      }
      return yield* Effect.fail(missingExternal("volume", volume.name));
    }
    yield* Effect.logDebug(`creating volume ${volume.name}`);
    yield* runChecked("volume", volumeCreateArgs(project, volume));
  });

/** Missing bind sources are created as directories, like `-v` itself would. */
const ensureBindSource = (source: string): Effect.Effect<void, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* pipe(
      fs.exists(source),
      Effect.orElseSucceed(() => false)
    );
    if (!exists) {
      yield* pipe(
        fs.makeDirectory(source, { recursive: true }),
        Effect.catchAll((e) => Effect.logDebug(`could not create ${source}: ${e.message}`))
      );
    }
  });

/** Every network, volume and bind source `container` refers to. */
export const ensureContainerResources = (
  project: string,
  container: ContainerRecord
): Effect.Effect<void, ToolError | GeneralError, Podman | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* Effect.forEach(
      container.mounts,
      (mount): Effect.Effect<void, ToolError | GeneralError, Podman | FileSystem.FileSystem> =>
        mount.type === "bind"
          ? Effect.forEach(Option.toArray(mount.source), ensureBindSource, { discard: true })
          : Effect.forEach(Option.toArray(mount.volume), (v) => ensureVolume(project, v), { discard: true }),
      { discard: true }
    );
    yield* Effect.forEach(
      Arr.dedupeWith(container.networks.map((a) => a.network), (a, b) => a.name === b.name),
      (network) => ensureNetwork(project, network),
      { discard: true }
    );
  });

// ============================================================================
// Pods
// ============================================================================

export const ensurePod = (pod: PodRecord): Effect.Effect<void, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    if (yield* podman.exists("pod", pod.name)) {
      return;
    }
    yield* runChecked("pod", [
      "create",
      `--name=${pod.name}`,
      ...pod.labels.flatMap((l) => ["--label", l]),
      ...pod.args,
    ]);
  });
