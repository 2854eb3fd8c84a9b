// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Teardown. All stops of one `down` finish before the first `rm` is issued.
 */

import { Array as Arr, Effect, Option, pipe } from "effect";
import { projectFilter } from "../compose/containers";
import { type ContainerRecord, type Project, getText } from "../compose/types";
import { strToSeconds } from "../lib/duration";
import type { GeneralError } from "../lib/errors";
import { Podman, type ToolError } from "../podman/client";
import type { ProcessError } from "../podman/runner";
import { excludedForDown } from "./selection";

export interface DownOptions {
  readonly services: readonly string[];
  readonly volumes: boolean;
  readonly removeOrphans: boolean;
  /** Overrides every container's `stop_grace_period`. */
  readonly timeout: Option.Option<number>;
}

export const defaultDownOptions: DownOptions = {
  services: [],
  volumes: false,
  removeOrphans: false,
  timeout: Option.none(),
};

/** `-t N` for `stop`; omitted when the grace period cannot be read. */
export const stopTimeoutArgs = (container: ContainerRecord, timeout: Option.Option<number>): readonly string[] =>
  pipe(
    timeout,
    Option.orElse(() => strToSeconds(Option.getOrElse(getText(container.definition, "stop_grace_period"), () => "10"))),
    Option.match({
      onNone: (): readonly string[] => [],
      onSome: (seconds): readonly string[] => ["-t", String(seconds)],
    })
  );

/** Non-empty lines of a listing query. */
const lines = (text: string): readonly string[] =>
  text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l !== "");

const stopAll = (
  containers: readonly ContainerRecord[],
  timeout: Option.Option<number>
): Effect.Effect<void, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    yield* Effect.forEach(
      Arr.reverse(containers),
      (c) => podman.run("stop", [...stopTimeoutArgs(c, timeout), c.name]),
      { concurrency: "unbounded", discard: true }
    );
  });

const removeAll = (names: readonly string[]): Effect.Effect<void, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    yield* Effect.forEach(names, (name) => podman.run("rm", [name]), { discard: true });
  });

/** Stop and remove labelled containers the current project no longer defines. */
export const removeOrphans = (project: Project, timeout: Option.Option<number>): Effect.Effect<void, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const known = new Set(project.containers.map((c) => c.name));
    const listed = yield* podman.output("ps", [
      "--filter",
      projectFilter(project.name),
      "-a",
      "--format",
      "{{ .Names }}",
    ]);
    const orphans = lines(listed).filter((name) => !known.has(name));
    if (orphans.length === 0) {
      return;
    }
    yield* Effect.logInfo(`removing orphan containers: ${orphans.join(", ")}`);
    yield* Effect.forEach(
      orphans,
      (name) =>
        podman.run("stop", [
          ...Option.match(timeout, { onNone: (): readonly string[] => [], onSome: (t) => ["-t", String(t)] }),
          name,
        ]),
      { concurrency: "unbounded", discard: true }
    );
    yield* removeAll(orphans);
  });

const removeVolumes = (project: Project, excluded: ReadonlySet<string>): Effect.Effect<void, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const kept = new Set(
      project.containers
        .filter((c) => excluded.has(c.service))
        .flatMap((c) => c.mounts.flatMap((m) => Option.toArray(m.volume)))
        .map((v) => v.name)
    );
    const listed = yield* podman.output("volume", [
      "ls",
      "--noheading",
      "--filter",
      projectFilter(project.name),
      "--format",
      "{{.Name}}",
    ]);
    yield* Effect.forEach(
      lines(listed).filter((v) => !kept.has(v)),
      (volume) => podman.run("volume", ["rm", volume]),
      { discard: true }
    );
  });

const removePod = (name: string): Effect.Effect<void, ProcessError, Podman> =>
  Effect.flatMap(Podman, (podman) => Effect.asVoid(podman.run("pod", ["rm", name])));

const removeProjectNetworks = (project: Project): Effect.Effect<void, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const listed = yield* podman.output("network", [
      "ls",
      "--noheading",
      "--filter",
      projectFilter(project.name),
      "--format",
      "{{.Name}}",
    ]);
    yield* Effect.forEach(lines(listed), (network) => podman.run("network", ["rm", network]), { discard: true });
  });

/**
 * Stop and remove every container whose service is not in `excluded`, then
 * optionally orphans and volumes. Pods and networks go only when nothing was
 * excluded.
 */
export const teardown = (
  project: Project,
  excluded: ReadonlySet<string>,
  options: Omit<DownOptions, "services">
): Effect.Effect<void, ToolError, Podman> =>
  Effect.gen(function* () {
    const targets = project.containers.filter((c) => !excluded.has(c.service));

    yield* stopAll(targets, options.timeout);
    yield* removeAll(Arr.reverse(targets).map((c) => c.name));

    if (options.removeOrphans) {
      yield* removeOrphans(project, options.timeout);
    }
    if (options.volumes) {
      yield* removeVolumes(project, excluded);
    }
    if (excluded.size > 0) {
      return;
    }
    yield* Effect.forEach(project.pods, (pod) => removePod(pod.name), { discard: true });
    yield* removeProjectNetworks(project);
  });

/** `down`: a service filter takes the services' dependents along. */
export const down = (
  project: Project,
  options: DownOptions
): Effect.Effect<void, ToolError | GeneralError, Podman> =>
  Effect.flatMap(excludedForDown(project, options.services), (excluded) => teardown(project, excluded, options));
