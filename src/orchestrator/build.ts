// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Image commands: build, pull, push.
 */

import { isAbsolute, join } from "node:path";
import { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, Option, pipe } from "effect";
import {
  type ContainerRecord,
  type DocumentMapping,
  type DocumentNode,
  type Project,
  getBoolean,
  getMapping,
  getString,
  isMapping,
  isSequence,
  stringList,
} from "../compose/types";
import { CONTAINERFILE_NAMES } from "../config/field-values";
import { ConfigError, ErrorCode, type GeneralError } from "../lib/errors";
import { logSuccess } from "../lib/log";
import { assignments } from "../podman/args";
import { Podman } from "../podman/client";
import type { ProcessError } from "../podman/runner";
import { assertServices } from "./selection";

export interface BuildOptions {
  /** Restrict to these services; empty = all. */
  readonly services: readonly string[];
  /** Skip services whose image already exists locally. */
  readonly ifNotExists: boolean;
  readonly noCache: boolean;
  readonly pull: boolean;
  readonly pullAlways: boolean;
  /** Extra `--build-arg` values from the command line. */
  readonly buildArgs: readonly string[];
}

export const defaultBuildOptions: BuildOptions = {
  services: [],
  ifNotExists: false,
  noCache: false,
  pull: false,
  pullAlways: false,
  buildArgs: [],
};

const buildSection = (container: ContainerRecord): Option.Option<DocumentMapping> =>
  getMapping(container.definition, "build");

/** One container per service that declares `build`. */
const buildableContainers = (project: Project, services: readonly string[]): readonly ContainerRecord[] =>
  pipe(
    project.containers.filter((c) => Option.isSome(buildSection(c))),
    (containers) => (services.length === 0 ? containers : containers.filter((c) => services.includes(c.service))),
    Arr.dedupeWith((a, b) => a.service === b.service)
  );

/** Scalar-or-list or mapping values under a build key, as flat strings. */
const entries = (node: DocumentNode | undefined): readonly string[] =>
  isMapping(node)
    ? assignments(node)
    : isSequence(node)
      ? stringList(node)
      : typeof node === "string"
        ? [node]
        : [];

const locateContainerfile = (
  container: ContainerRecord,
  build: DocumentMapping,
  context: string
): Effect.Effect<string, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const explicit = getString(build, "dockerfile");
    if (Option.isSome(explicit)) {
      return isAbsolute(explicit.value) ? explicit.value : join(context, explicit.value);
    }
    const fs = yield* FileSystem.FileSystem;
    const found = yield* Effect.filter(
      CONTAINERFILE_NAMES.map((name) => join(context, name)),
      (path) => pipe(fs.exists(path), Effect.orElseSucceed(() => false))
    );
    return yield* pipe(
      Arr.head(found),
      Effect.mapError(
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `service ${container.service}: no Containerfile or Dockerfile in ${context}`,
            path: context,
          })
      )
    );
  });

/** Arguments following `podman build` for one container. */
export const buildArgs = (
  container: ContainerRecord,
  options: BuildOptions
): Effect.Effect<readonly string[], ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const build = Option.getOrElse(buildSection(container), (): DocumentMapping => ({}));
    const context = Option.getOrElse(getString(build, "context"), () => ".");
    const containerfile = yield* locateContainerfile(container, build, context);
    const flag = (key: string, name: string): readonly string[] =>
      Option.match(getString(build, key), { onNone: (): readonly string[] => [], onSome: (v) => [name, v] });
    const pullFlags: readonly string[] = options.pullAlways
      ? ["--pull-always"]
      : options.pull || getBoolean(build, "pull")
        ? ["--pull"]
        : [];

    return [
      "-f",
      containerfile,
      "-t",
      container.image,
      ...Option.match(getString(container.definition, "platform"), {
        onNone: (): readonly string[] => [],
        onSome: (p) => ["--platform", p],
      }),
      ...entries(build["tags"]).flatMap((t) => ["-t", t]),
      ...entries(build["labels"]).flatMap((l) => ["--label", l]),
      ...entries(build["additional_contexts"]).map((c) => `--build-context=${c}`),
      ...flag("target", "--target"),
      ...entries(build["ssh"]).flatMap((s) => ["--ssh", s]),
      ...(options.noCache || getBoolean(build, "no_cache") ? ["--no-cache"] : []),
      ...pullFlags,
      ...[...entries(build["args"]), ...options.buildArgs].flatMap((a) => ["--build-arg", a]),
      context,
    ];
  });

const imageExists = (image: string): Effect.Effect<boolean, never, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    return yield* pipe(
      podman.output("image", ["inspect", "-f", "{{.Id}}", image]),
      Effect.as(true),
      Effect.orElseSucceed(() => false)
    );
  });

const buildOne = (
  container: ContainerRecord,
  options: BuildOptions
): Effect.Effect<number, ConfigError | ProcessError, Podman | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    if (options.ifNotExists && (yield* imageExists(container.image))) {
      yield* Effect.logDebug(`image ${container.image} exists, skipping build of ${container.service}`);
      return 0;
    }
    const args = yield* buildArgs(container, options);
    const code = Option.getOrElse(yield* podman.run("build", args), () => 0);
    if (code === 0) {
      yield* logSuccess(`built ${container.image}`);
    } else {
      yield* Effect.logError(`build of ${container.service} exited with code ${code}`);
    }
    return code;
  });

/**
 * Builds every selected image concurrently. Returns the first non-zero exit
 * status, or 0.
 */
export const buildImages = (
  project: Project,
  options: BuildOptions
): Effect.Effect<number, ConfigError | ProcessError | GeneralError, Podman | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* assertServices(project, options.services);
    const codes = yield* Effect.forEach(
      buildableContainers(project, options.services),
      (container) => buildOne(container, options),
      { concurrency: "unbounded" }
    );
    return Option.getOrElse(
      Arr.findFirst(codes, (code) => code !== 0),
      () => 0
    );
  });

// ============================================================================
// Pull and push
// ============================================================================

export interface PullOptions {
  readonly services: readonly string[];
  /** Pull images of services that also build locally. */
  readonly force: boolean;
}

/** Images built by the project itself, which a registry does not have. */
const isLocalImage = (container: ContainerRecord): boolean =>
  container.image.startsWith("localhost/") ||
  (Option.isSome(buildSection(container)) && !container.image.includes("/"));

export const pullTargets = (project: Project, options: PullOptions): readonly string[] =>
  pipe(
    project.containers.filter(
      (c) =>
        (options.services.length === 0 || options.services.includes(c.service)) &&
        (options.force || !isLocalImage(c))
    ),
    Arr.map((c) => c.image),
    Arr.dedupe
  );

export const pullImages = (
  project: Project,
  options: PullOptions
): Effect.Effect<number, ProcessError | GeneralError, Podman> =>
  Effect.gen(function* () {
    yield* assertServices(project, options.services);
    const podman = yield* Podman;
    const codes = yield* Effect.forEach(
      pullTargets(project, options),
      (image) => Effect.map(podman.run("pull", [image]), Option.getOrElse(() => 0)),
      { concurrency: "unbounded" }
    );
    return Option.getOrElse(
      Arr.findFirst(codes, (code) => code !== 0),
      () => 0
    );
  });

/** Pushes the images of buildable services, one at a time. */
export const pushImages = (
  project: Project,
  services: readonly string[]
): Effect.Effect<number, ProcessError | GeneralError, Podman> =>
  Effect.gen(function* () {
    yield* assertServices(project, services);
    const podman = yield* Podman;
    const codes = yield* Effect.forEach(buildableContainers(project, services), (c) =>
      Effect.map(podman.run("push", [c.image]), Option.getOrElse(() => 0))
    );
    return Option.getOrElse(
      Arr.findFirst(codes, (code) => code !== 0),
      () => 0
    );
  });
