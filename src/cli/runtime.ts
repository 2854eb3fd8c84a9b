// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command context: CLI flags, environment and tool configuration resolved
 * into podman settings, load options and the service layers every command
 * runs against.
 */

import type { CommandExecutor, FileSystem } from "@effect/platform";
import { Effect, Layer, Option, pipe } from "effect";
import type { LoadOptions } from "../compose/loader";
import { EnvConfigSpec } from "../config/env";
import {
  LOG_FORMAT_DEFAULT,
  LOG_LEVEL_DEFAULT,
  type LogFormat,
  type LogLevel,
  PODMAN_PATH_DEFAULT,
} from "../config/field-values";
import { loadToolConfig } from "../config/loader";
import { resolve, resolveOptional } from "../config/resolve";
import { ConfigError, ErrorCode } from "../lib/errors";
import { split } from "../lib/shlex";
import { Podman, type PodmanSettings, PodmanLive } from "../podman/client";
import { ProcessRunnerLive } from "../podman/runner";
import { OrchestratorTimings, OrchestratorTimingsLive } from "../orchestrator/timings";
import { type GlobalOptions, inPodSetting } from "./options";

export interface CommandContext {
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly podman: PodmanSettings;
  readonly load: LoadOptions;
}

const splitArgs = (flag: string, text: string): Effect.Effect<readonly string[], ConfigError> =>
  pipe(
    split(text),
    Effect.mapError(
      () =>
        new ConfigError({
          code: ErrorCode.INVALID_ARGS,
          message: `${flag}: unbalanced quotes in ${text}`,
        })
    )
  );

const splitAll = (flag: string, values: readonly string[]): Effect.Effect<readonly string[], ConfigError> =>
  Effect.map(
    Effect.forEach(values, (v) => splitArgs(flag, v)),
    (parts) => parts.flat()
  );

/** `KEY=VALUE` pairs; a bare `KEY` sets the empty string. */
export const parseAssignments = (entries: readonly string[]): ReadonlyMap<string, string> =>
  new Map(
    entries.map((entry): readonly [string, string] => {
      const eq = entry.indexOf("=");
      return eq < 0 ? [entry, ""] : [entry.slice(0, eq), entry.slice(eq + 1)];
    })
  );

const processEnvironment = (): ReadonlyMap<string, string> =>
  new Map(
    Object.entries(process.env).flatMap(([k, v]): readonly (readonly [string, string])[] =>
      v === undefined ? [] : [[k, v]]
    )
  );

/** Resolves every setting with CLI flags first, then environment, then the TOML file. */
export const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const env = yield* pipe(
      EnvConfigSpec,
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `invalid environment configuration: ${String(e)}`,
          })
      )
    );
    const tool = yield* loadToolConfig(globals.toolConfig, env.configHome);

    const logLevel: LogLevel =
      globals.verbose || env.debug
        ? "debug"
        : resolve({
            cli: globals.logLevel,
            env: env.logLevel,
            toml: Option.fromNullable(tool.logging?.level),
            fallback: LOG_LEVEL_DEFAULT,
          });
    const logFormat: LogFormat = resolve({
      cli: globals.logFormat,
      env: env.logFormat,
      toml: Option.fromNullable(tool.logging?.format),
      fallback: LOG_FORMAT_DEFAULT,
    });

    const cliPodArgs = yield* Option.match(globals.podArgs, {
      onNone: () => Effect.succeed(Option.none<readonly string[]>()),
      onSome: (text) => Effect.map(splitArgs("--pod-args", text), Option.some),
    });
    const verbArgs = yield* Effect.forEach(Object.entries(globals.podmanVerbArgs), ([verb, values]) =>
      Effect.map(splitAll(`--podman-${verb}-args`, values), (args) => [verb, args] as const)
    );

    const podman: PodmanSettings = {
      path: resolve({
        cli: globals.podmanPath,
        env: env.podmanPath,
        toml: Option.fromNullable(tool.podman_path),
        fallback: PODMAN_PATH_DEFAULT,
      }),
      globalArgs: yield* splitAll("--podman-args", globals.podmanArgs),
      verbArgs: new Map(verbArgs.filter(([, args]) => args.length > 0)),
      parallel: resolveOptional({
        cli: Option.filter(globals.parallel, (n) => n > 0),
        env: env.parallel,
        toml: Option.fromNullable(tool.parallel),
      }),
      dryRun: globals.dryRun,
    };

    const load: LoadOptions = {
      cwd: process.cwd(),
      files: globals.file,
      projectName: globals.projectName,
      profiles: globals.profile,
      envFiles: globals.envFile,
      processEnv: processEnvironment(),
      overrides: parseAssignments(globals.env),
      inPod: resolveOptional({ cli: inPodSetting(globals), env: Option.none(), toml: Option.fromNullable(tool.in_pod) }),
      podArgs: resolveOptional({ cli: cliPodArgs, env: Option.none(), toml: Option.fromNullable(tool.pod_args) }),
    };

    return { logLevel, logFormat, podman, load };
  });

/** Container tool and executor timings for one command invocation. */
export const commandLayer = (
  ctx: CommandContext
): Layer.Layer<Podman | OrchestratorTimings, never, CommandExecutor.CommandExecutor> =>
  Layer.merge(pipe(PodmanLive(ctx.podman), Layer.provide(ProcessRunnerLive)), OrchestratorTimingsLive);
