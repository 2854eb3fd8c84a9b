// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The container tool as a service. Every invocation passes one semaphore
 * sized by the parallelism limit; global and per-verb arguments are
 * injected here so callers only ever name a verb and its arguments.
 */

import { Context, Duration, Effect, Layer, Option, pipe } from "effect";
import { type ExternalToolError, externalToolFailed } from "../lib/errors";
import { writeOutput } from "../lib/log";
import { join } from "../lib/shlex";
import { type ExecResult, type ProcessError, ProcessRunner } from "./runner";

export interface PodmanSettings {
  readonly path: string;
  /** Inserted before the verb (`--podman-args`). */
  readonly globalArgs: readonly string[];
  /** Inserted right after a verb (`--podman-<verb>-args`). */
  readonly verbArgs: ReadonlyMap<string, readonly string[]>;
  /** None = unbounded. */
  readonly parallel: Option.Option<number>;
  /** Print mutating commands instead of running them. */
  readonly dryRun: boolean;
}

export const defaultPodmanSettings: PodmanSettings = {
  path: "podman",
  globalArgs: [],
  verbArgs: new Map(),
  parallel: Option.none(),
  dryRun: false,
};

export interface RunOptions {
  readonly prefix?: Option.Option<string>;
  readonly interactive?: boolean;
  readonly cancel?: Effect.Effect<void>;
  readonly gracePeriod?: Duration.DurationInput;
}

export type ToolError = ExternalToolError | ProcessError;

export interface PodmanService {
  readonly settings: PodmanSettings;
  /** Full argument vector for `verb args`. */
  readonly argv: (verb: string, args: readonly string[]) => readonly string[];
  /** Captured stdout of a read-only query; non-zero exit fails. Runs in dry-run too. */
  readonly output: (verb: string, args: readonly string[]) => Effect.Effect<string, ToolError>;
  /** Streamed invocation. None when the command was only printed (dry-run). */
  readonly run: (
    verb: string,
    args: readonly string[],
    options?: RunOptions
  ) => Effect.Effect<Option.Option<number>, ProcessError>;
  /** `podman <kind> exists <name>`; always false in dry-run. */
  readonly exists: (
    kind: "container" | "pod" | "network" | "volume" | "image",
    name: string
  ) => Effect.Effect<boolean, ProcessError>;
}

export interface Podman {
  readonly _tag: "Podman";
}

export const Podman: Context.Tag<Podman, PodmanService> = Context.GenericTag<Podman, PodmanService>(
  "podcompose/Podman"
);

const DEFAULT_GRACE: Duration.Duration = Duration.seconds(10);

const makePodman = (
  settings: PodmanSettings
): Effect.Effect<PodmanService, never, ProcessRunner> =>
  Effect.gen(function* () {
    const runner = yield* ProcessRunner;
    const gate = yield* Effect.makeSemaphore(Option.getOrElse(settings.parallel, () => Number.MAX_SAFE_INTEGER));

    const argv = (verb: string, args: readonly string[]): readonly string[] => [
      settings.path,
      ...settings.globalArgs,
      verb,
      ...(settings.verbArgs.get(verb) ?? []),
      ...args,
    ];

    const output = (verb: string, args: readonly string[]): Effect.Effect<string, ToolError> => {
      const full = argv(verb, args);
      return pipe(
        Effect.logDebug(`exec: ${join(full)}`),
        Effect.zipRight(runner.capture(full)),
        Effect.filterOrFail(
          (result: ExecResult) => result.exitCode === 0,
          (result): ToolError => externalToolFailed(full, result.exitCode, result.stdout, result.stderr)
        ),
        Effect.map((result) => result.stdout),
        gate.withPermits(1)
      );
    };

    const run = (
      verb: string,
      args: readonly string[],
      options: RunOptions = {}
    ): Effect.Effect<Option.Option<number>, ProcessError> => {
      const full = argv(verb, args);
      if (settings.dryRun) {
        return Effect.as(writeOutput(join(full)), Option.none());
      }
      return pipe(
        Effect.logDebug(`run: ${join(full)}`),
        Effect.zipRight(
          runner.attach(full, {
            prefix: options.prefix ?? Option.none(),
            interactive: options.interactive ?? false,
            cancel: options.cancel ?? Effect.never,
            gracePeriod: options.gracePeriod ?? DEFAULT_GRACE,
          })
        ),
        Effect.tap((code) => (code === 0 ? Effect.void : Effect.logDebug(`exit code ${code}: ${join(full)}`))),
        Effect.map(Option.some),
        gate.withPermits(1)
      );
    };

    const exists: PodmanService["exists"] = (kind, name) =>
      settings.dryRun
        ? Effect.succeed(false)
        : pipe(
            runner.capture(argv(kind, ["exists", name])),
            Effect.map((result) => result.exitCode === 0),
            gate.withPermits(1)
          );

    return { settings, argv, output, run, exists };
  });

export const PodmanLive = (settings: PodmanSettings): Layer.Layer<Podman, never, ProcessRunner> =>
  Layer.effect(Podman, makePodman(settings));

/** Fails with {@link ExternalToolError} unless the streamed command exited 0 (or was only printed). */
export const runChecked = (
  verb: string,
  args: readonly string[],
  options?: RunOptions
): Effect.Effect<void, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const code = yield* podman.run(verb, args, options);
    if (Option.isSome(code) && code.value !== 0) {
      return yield* Effect.fail(externalToolFailed(podman.argv(verb, args), code.value, "", ""));
    }
  });
