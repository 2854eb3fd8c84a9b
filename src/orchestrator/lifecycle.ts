// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Array as Arr, Effect, Option, pipe } from "effect";
import type { ContainerRecord, Project } from "../compose/types";
import { ErrorCode, GeneralError } from "../lib/errors";
import { Podman } from "../podman/client";
import type { ProcessError } from "../podman/runner";
import { stopTimeoutArgs } from "./down";
import { selectContainers } from "./selection";

export type TransitionVerb = "start" | "stop" | "restart";

const firstFailure = (codes: readonly Option.Option<number>[]): number =>
  pipe(
    codes,
    Arr.getSomes,
    Arr.findFirst((code) => code !== 0),
    Option.getOrElse(() => 0)
  );

/**
 * `start`, `stop` or `restart` the containers of `services` (all when empty).
 * Stopping runs in reverse creation order; every call is issued concurrently
 * and the returned status is the first non-zero one.
 */
export const transition = (
  project: Project,
  verb: TransitionVerb,
  services: readonly string[],
  timeout: Option.Option<number>
): Effect.Effect<number, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const selected = yield* selectContainers(project, services);
    const ordered = verb === "start" ? selected : Arr.reverse(selected);
    const codes = yield* Effect.forEach(
      ordered,
      (c) => podman.run(verb, [...(verb === "start" ? [] : stopTimeoutArgs(c, timeout)), c.name]),
      { concurrency: "unbounded" }
    );
    return firstFailure(codes);
  });

/** `pause` or `unpause` in a single call. */
export const setPaused = (
  project: Project,
  paused: boolean,
  services: readonly string[]
): Effect.Effect<number, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const selected = yield* selectContainers(project, services);
    if (selected.length === 0) {
      return 0;
    }
    const code = yield* podman.run(
      paused ? "pause" : "unpause",
      selected.map((c) => c.name)
    );
    return firstFailure([code]);
  });

export interface KillOptions {
  readonly services: readonly string[];
  readonly all: boolean;
  readonly signal: string;
}

const noTargets = (): GeneralError =>
  new GeneralError({
    code: ErrorCode.INVALID_ARGS,
    message: "kill needs at least one service or --all",
  });

export const kill = (project: Project, options: KillOptions): Effect.Effect<number, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const targets: Effect.Effect<readonly ContainerRecord[], GeneralError> = options.all
      ? Effect.succeed(project.containers)
      : options.services.length > 0
        ? selectContainers(project, options.services)
        : Effect.fail(noTargets());
    const names = yield* targets;
    const code = yield* podman.run("kill", [
      "--signal",
      options.signal,
      ...names.map((c) => c.name),
    ]);
    return firstFailure([code]);
  });
