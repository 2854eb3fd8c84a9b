// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * One-off containers. The service's record is copied and adjusted; the
 * project's own records are never touched.
 */

import type { FileSystem } from "@effect/platform";
import { Array as Arr, Effect, HashSet, Option, Random, pipe } from "effect";
import {
  type ContainerRecord,
  type DocumentMapping,
  type DocumentNode,
  type Project,
  EMPTY_MAPPING,
  containersOf,
  getMapping,
  isSequence,
  withoutKeys,
} from "../compose/types";
import { type ResolvedMount, parseMount, resolveMount } from "../compose/volumes";
import { ConfigError, ErrorCode, GeneralError, type UnresolvedReferenceError } from "../lib/errors";
import { split } from "../lib/shlex";
import { containerToArgs } from "../podman/args";
import { Podman } from "../podman/client";
import { ensureContainerResources, ensurePod } from "../podman/resources";
import { buildImages, defaultBuildOptions } from "./build";
import { assertServices } from "./selection";
import { type UpContext, type UpError, defaultUpOptions, up } from "./up";

export interface OneOffOptions {
  readonly service: string;
  /** Replaces the service command when non-empty. */
  readonly command: readonly string[];
  readonly detach: boolean;
  readonly name: Option.Option<string>;
  readonly entrypoint: Option.Option<string>;
  /** `KEY=VAL` or bare `KEY`. */
  readonly env: readonly string[];
  readonly labels: readonly string[];
  readonly user: Option.Option<string>;
  readonly workdir: Option.Option<string>;
  readonly publish: readonly string[];
  readonly volumes: readonly string[];
  readonly rm: boolean;
  readonly noDeps: boolean;
  readonly servicePorts: boolean;
  /** `-T`: no pseudo-terminal. */
  readonly noTty: boolean;
}

export const defaultOneOffOptions: Omit<OneOffOptions, "service"> = {
  command: [],
  detach: false,
  name: Option.none(),
  entrypoint: Option.none(),
  env: [],
  labels: [],
  user: Option.none(),
  workdir: Option.none(),
  publish: [],
  volumes: [],
  rm: false,
  noDeps: false,
  servicePorts: false,
  noTty: false,
};

const PORT_KEYS: readonly string[] = ["expose", "publishall", "ports"];

export type OneOffError = UpError | UnresolvedReferenceError;

const portEntries = (node: DocumentNode | undefined): readonly DocumentNode[] =>
  isSequence(node) ? node : node === undefined || node === null ? [] : [node];

const parseEnvEntry = (entry: string): readonly [string, DocumentNode] => {
  const eq = entry.indexOf("=");
  return eq < 0 ? [entry, null] : [entry.slice(0, eq), entry.slice(eq + 1)];
};

const unsplittable = (value: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.INVALID_ARGS,
    message: `could not split entrypoint: ${value}`,
  });

const overrides = (base: DocumentMapping, options: OneOffOptions): Effect.Effect<DocumentMapping, ConfigError> =>
  Effect.gen(function* () {
    const entrypoint = yield* Option.match(options.entrypoint, {
      onNone: () => Effect.succeed(Option.none<readonly string[]>()),
      onSome: (text) =>
        pipe(
          split(text),
          Effect.mapError(() => unsplittable(text)),
          Effect.map(Option.some)
        ),
    });
    const stripped = withoutKeys(base, ...(options.servicePorts ? [] : PORT_KEYS), ...(options.rm ? ["restart"] : []));
    const ports: readonly DocumentNode[] = [
      ...(options.servicePorts ? portEntries(base["ports"]) : []),
      ...options.publish,
    ];
    const environment: DocumentMapping = {
      ...Option.getOrElse(getMapping(base, "environment"), () => EMPTY_MAPPING),
      ...Object.fromEntries(options.env.map(parseEnvEntry)),
    };
    return {
      ...stripped,
      environment,
      tty: !options.noTty,
      ...(ports.length > 0 ? { ports } : {}),
      ...Option.match(entrypoint, { onNone: () => ({}), onSome: (words) => ({ entrypoint: words }) }),
      ...Option.match(options.user, { onNone: () => ({}), onSome: (user) => ({ user }) }),
      ...Option.match(options.workdir, { onNone: () => ({}), onSome: (dir) => ({ working_dir: dir }) }),
      ...(options.command.length > 0 ? { command: options.command } : {}),
    };
  });

const extraMounts = (
  project: Project,
  service: string,
  volumes: readonly string[]
): Effect.Effect<readonly ResolvedMount[], ConfigError | UnresolvedReferenceError> =>
  Effect.forEach(volumes, (text) =>
    Effect.gen(function* () {
      const mount = yield* parseMount(text, {
        baseDir: project.dir,
        home: project.environment.get("HOME") ?? project.dir,
      });
      return yield* resolveMount(mount, { project: project.name, service, volumes: project.volumes });
    })
  );

/** The service's first container, adjusted for a one-off run. */
export const oneOffRecord = (
  project: Project,
  options: OneOffOptions
): Effect.Effect<ContainerRecord, GeneralError | ConfigError | UnresolvedReferenceError> =>
  Effect.gen(function* () {
    yield* assertServices(project, [options.service]);
    const base = yield* pipe(
      Arr.head(containersOf(project, options.service)),
      Effect.mapError(
        () =>
          new GeneralError({
            code: ErrorCode.CONTAINER_NOT_FOUND,
            message: `service ${options.service} has no containers`,
          })
      )
    );
    const suffix = yield* Random.nextIntBetween(0, 65536);
    const definition = yield* overrides(base.definition, options);
    const mounts = yield* extraMounts(project, options.service, options.volumes);
    return {
      ...base,
      name: Option.getOrElse(options.name, () => `${project.name}_${options.service}_tmp${suffix}`),
      definition,
      labels: [...base.labels, ...options.labels],
      mounts: [...base.mounts, ...mounts],
      deps: options.noDeps ? HashSet.empty() : base.deps,
    };
  });

/** `run` arguments: `--rm` and `-i` go right after the name. */
export const oneOffArgs = (
  project: Project,
  record: ContainerRecord,
  options: OneOffOptions
): Effect.Effect<readonly string[], ConfigError, FileSystem.FileSystem> =>
  Effect.map(
    containerToArgs(project, record, { detached: options.detach, noDeps: options.noDeps }),
    ([name, ...rest]) => [
      ...(name === undefined ? [] : [name]),
      ...(options.rm ? ["--rm"] : []),
      ...(options.detach ? [] : ["-i"]),
      ...rest,
    ]
  );

/** Run a one-off container; returns its exit status. */
export const runOneOff = (project: Project, options: OneOffOptions): Effect.Effect<number, OneOffError, UpContext> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const record = yield* oneOffRecord(project, options);
    yield* Effect.forEach(project.pods, ensurePod, { discard: true });
    const deps = Arr.dedupe(Array.from(HashSet.values(record.deps)).map((e) => e.name));
    if (!options.noDeps && deps.length > 0) {
      yield* up(project, { ...defaultUpOptions, services: deps, detach: true });
    }
    yield* buildImages(project, { ...defaultBuildOptions, services: [options.service], ifNotExists: true });
    yield* ensureContainerResources(project.name, record);
    const args = yield* oneOffArgs(project, record, options);
    const code = yield* podman.run("run", args, { interactive: !options.detach });
    return Option.getOrElse(code, () => 0);
  });
