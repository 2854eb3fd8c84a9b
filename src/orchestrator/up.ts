// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `up`: build, create, then either start detached or attach to every
 * container and wait for them to finish.
 *
 * Attached mode runs one task per container. A task first blocks on its
 * dependency conditions, then runs `start -a`. Completions are collected
 * from a queue one at a time; with the abort policy the first completion
 * cancels every other task after a short settle delay.
 */

import type { FileSystem } from "@effect/platform";
import { Deferred, Effect, Exit, Option, Queue, type Scope, pipe } from "effect";
import { CONFIG_HASH_LABEL, projectFilter } from "../compose/containers";
import type { ContainerRecord, Project } from "../compose/types";
import { colorize, paletteColor, supportsColor } from "../lib/color";
import { type ConfigError, type GeneralError, formatError } from "../lib/errors";
import { createStepCounter, forContainer, logFail, logSuccess } from "../lib/log";
import { containerToArgs } from "../podman/args";
import { Podman, type ToolError } from "../podman/client";
import { ensureContainerResources, ensurePod } from "../podman/resources";
import { buildImages, defaultBuildOptions } from "./build";
import { checkDependencyConditions } from "./conditions";
import { defaultDownOptions, removeOrphans, teardown } from "./down";
import { excludedForUp } from "./selection";
import { OrchestratorTimings } from "./timings";

export interface UpOptions {
  readonly services: readonly string[];
  readonly detach: boolean;
  readonly noStart: boolean;
  readonly noBuild: boolean;
  /** Rebuild images even when they exist. */
  readonly build: boolean;
  readonly forceRecreate: boolean;
  readonly abortOnContainerExit: boolean;
  /** Return this service's exit code; implies the abort policy. */
  readonly exitCodeFrom: Option.Option<string>;
  readonly removeOrphans: boolean;
}

export const defaultUpOptions: UpOptions = {
  services: [],
  detach: false,
  noStart: false,
  noBuild: false,
  build: false,
  forceRecreate: false,
  abortOnContainerExit: false,
  exitCodeFrom: Option.none(),
  removeOrphans: false,
};

export type UpError = ToolError | GeneralError | ConfigError;
export type UpContext = Podman | OrchestratorTimings | FileSystem.FileSystem;

const lines = (text: string): readonly string[] =>
  text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l !== "");

/** Whether containers labelled with another configuration hash exist. */
const hasDrifted = (project: Project): Effect.Effect<boolean, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const hashes = yield* podman.output("ps", [
      "--filter",
      projectFilter(project.name),
      "-a",
      "--format",
      `{{ index .Labels "${CONFIG_HASH_LABEL}"}}`,
    ]);
    return lines(hashes).some((hash) => hash !== project.configHash);
  });

const createContainer = (project: Project, container: ContainerRecord): Effect.Effect<void, UpError, UpContext> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    yield* ensureContainerResources(project.name, container);
    const args = yield* containerToArgs(project, container, { detached: false });
    const code = yield* podman.run("create", args);
    if (Option.isSome(code) && code.value !== 0) {
      yield* Effect.logWarning(`create of ${container.name} exited with code ${code.value}`);
    }
  });

const startDetached = (project: Project, container: ContainerRecord): Effect.Effect<void, UpError, UpContext> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    if (!podman.settings.dryRun) {
      yield* checkDependencyConditions(project, container.deps);
    }
    yield* podman.run("start", [container.name]);
  });

// ============================================================================
// Attached mode
// ============================================================================

interface AttachedTask {
  readonly container: ContainerRecord;
  readonly prefix: string;
  readonly cancel: Deferred.Deferred<void>;
}

interface Completion {
  readonly service: string;
  readonly code: Option.Option<number>;
}

/** `<service><padding> | `, colored per service. */
export const outputPrefix = (service: string, width: number, index: number, useColor: boolean): string =>
  `${colorize(paletteColor(index), `${service.padEnd(width)} |`, useColor)} `;

const runAttached = (project: Project, task: AttachedTask): Effect.Effect<Option.Option<number>, UpError, UpContext> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const timings = yield* OrchestratorTimings;
    const ready = yield* Effect.raceFirst(
      Effect.as(checkDependencyConditions(project, task.container.deps), true),
      Effect.as(Deferred.await(task.cancel), false)
    );
    if (!ready) {
      yield* Effect.logDebug(`${task.container.name} cancelled before it started`);
      return Option.none();
    }
    return yield* podman.run("start", ["-a", task.container.name], {
      prefix: Option.some(task.prefix),
      cancel: Deferred.await(task.cancel),
      gracePeriod: timings.stopGracePeriod,
    });
  });

const cancelAll = (tasks: readonly AttachedTask[]): Effect.Effect<void> =>
  Effect.forEach(tasks, (t) => Deferred.succeed(t.cancel, undefined), { discard: true });

/** Ctrl-C cancels every task for the lifetime of the enclosing scope. */
const cancelOnInterrupt = (tasks: readonly AttachedTask[]): Effect.Effect<() => void, never, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const handler = (): void => {
        tasks.forEach((t) => Deferred.unsafeDone(t.cancel, Exit.void));
      };
      process.on("SIGINT", handler);
      return handler;
    }),
    (handler) =>
      Effect.sync(() => {
        process.off("SIGINT", handler);
      })
  );

const attachAll = (
  project: Project,
  containers: readonly ContainerRecord[],
  options: UpOptions
): Effect.Effect<number, never, UpContext> =>
  Effect.scoped(
    Effect.gen(function* () {
      const timings = yield* OrchestratorTimings;
      const abort = options.abortOnContainerExit || Option.isSome(options.exitCodeFrom);
      const width = Math.max(0, ...containers.map((c) => c.service.length));
      const useColor = supportsColor(process.stdout);
      const tasks = yield* Effect.forEach(containers, (container, i) =>
        Effect.map(
          Deferred.make<void>(),
          (cancel): AttachedTask => ({
            container,
            prefix: outputPrefix(container.service, width, i, useColor),
            cancel,
          })
        )
      );
      yield* cancelOnInterrupt(tasks);

      const queue = yield* Queue.unbounded<Completion>();
      yield* Effect.forEach(
        tasks,
        (task) =>
          pipe(
            runAttached(project, task),
            forContainer(task.container.name),
            Effect.catchAll((e) =>
              Effect.as(logFail(`${task.container.name}: ${formatError(e)}`), Option.none<number>())
            ),
            Effect.flatMap((code) => Queue.offer(queue, { service: task.container.service, code })),
            Effect.forkScoped
          ),
        { discard: true }
      );

      const drain = (remaining: number, aborted: boolean, exitCode: number): Effect.Effect<number> =>
        remaining === 0
          ? Effect.succeed(exitCode)
          : Effect.gen(function* () {
              const done = yield* Queue.take(queue);
              yield* Effect.logDebug(
                `${done.service} finished with ${Option.match(done.code, {
                  onNone: () => "no exit code",
                  onSome: (c) => `exit code ${c}`,
                })}`
              );
              const matches = Option.contains(options.exitCodeFrom, done.service);
              const next = matches ? Option.getOrElse(done.code, () => exitCode) : exitCode;
              if (abort && !aborted) {
                yield* Effect.sleep(timings.abortSettleDelay);
                yield* cancelAll(tasks);
              }
              return yield* drain(remaining - 1, aborted || abort, next);
            });

      return yield* drain(tasks.length, false, 0);
    })
  );

// ============================================================================
// up
// ============================================================================

/**
 * Bring the project up. Returns the exit code of `exitCodeFrom` when given,
 * else 0. A failed build is reported and creation goes ahead.
 */
export const up = (project: Project, options: UpOptions): Effect.Effect<number, UpError, UpContext> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const excluded = yield* excludedForUp(project, options.services);
    const included = (c: ContainerRecord): boolean => !excluded.has(c.service);

    if (!options.noBuild) {
      const code = yield* buildImages(project, {
        ...defaultBuildOptions,
        services: Array.from(project.services.keys()).filter((s) => !excluded.has(s)),
        ifNotExists: !options.build,
      });
      if (code !== 0) {
        yield* logFail(`build failed with exit code ${code}; continuing with existing images`);
      }
    }

    if (!podman.settings.dryRun && (options.forceRecreate || (yield* hasDrifted(project)))) {
      yield* Effect.logInfo("configuration changed, recreating containers");
      yield* teardown(project, excluded, defaultDownOptions);
    }
    if (options.removeOrphans) {
      yield* removeOrphans(project, Option.none());
    }

    yield* Effect.forEach(project.pods, ensurePod, { discard: true });

    const targets = project.containers.filter(included);
    const steps = yield* createStepCounter(targets.length);
    yield* Effect.forEach(
      targets,
      (container) =>
        Effect.zipRight(
          steps.next(`creating ${container.name}`),
          forContainer(container.name)(createContainer(project, container))
        ),
      { discard: true }
    );

    if (options.detach && !options.noStart) {
      yield* Effect.forEach(targets, (container) => startDetached(project, container), { discard: true });
      yield* logSuccess(`started ${targets.length} container(s)`);
    }
    if (options.noStart || options.detach || podman.settings.dryRun) {
      return 0;
    }
    return yield* attachAll(project, targets, options);
  });
