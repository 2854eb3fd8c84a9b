// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared CLI option definitions. Global options belong to the root command
 * and are written before the subcommand, as in `podcompose -f a.yml up -d`.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Args } from "@effect/cli/Args";
import type { Options } from "@effect/cli/Options";
import { Option } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, PODMAN_VERBS } from "../config/field-values";

// Shared positional arguments

export const servicesArg: Args<string[]> = A.text({ name: "service" }).pipe(
  A.withDescription("Service names (default: all services)"),
  A.repeated
);

export const serviceArg: Args<string> = A.text({ name: "service" }).pipe(A.withDescription("Service name"));

export const commandArgs: Args<string[]> = A.text({ name: "command" }).pipe(
  A.withDescription("Command and its arguments (put them after --)"),
  A.repeated
);

// Global options

const verbArgOptions: Record<string, Options<string[]>> = Object.fromEntries(
  PODMAN_VERBS.map((verb) => [
    verb,
    O.text(`podman-${verb}-args`).pipe(O.withDescription(`Extra arguments for \`podman ${verb}\``), O.repeated),
  ])
);

export const globalOptions: {
  readonly file: Options<string[]>;
  readonly projectName: Options<Option.Option<string>>;
  readonly profile: Options<string[]>;
  readonly envFile: Options<string[]>;
  readonly env: Options<string[]>;
  readonly inPod: Options<Option.Option<"true" | "false">>;
  readonly podArgs: Options<Option.Option<string>>;
  readonly podmanPath: Options<Option.Option<string>>;
  readonly podmanArgs: Options<string[]>;
  readonly podmanVerbArgs: Options<Record<string, string[]>>;
  readonly parallel: Options<Option.Option<number>>;
  readonly dryRun: Options<boolean>;
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly logFormat: Options<Option.Option<LogFormat>>;
  readonly toolConfig: Options<Option.Option<string>>;
} = {
  file: O.text("file").pipe(
    O.withAlias("f"),
    O.withDescription("Compose file; repeat to layer several"),
    O.repeated
  ),
  projectName: O.text("project-name").pipe(
    O.withAlias("p"),
    O.withDescription("Project name (default: directory name)"),
    O.optional
  ),
  profile: O.text("profile").pipe(O.withDescription("Enable a profile"), O.repeated),
  envFile: O.text("env-file").pipe(O.withDescription("Environment file (default: .env)"), O.repeated),
  env: O.text("env").pipe(O.withDescription("Set a substitution variable (KEY=VALUE)"), O.repeated),
  inPod: O.choice("in-pod", ["true", "false"] as const).pipe(O.withDescription("Put containers in a pod"), O.optional),
  podArgs: O.text("pod-args").pipe(O.withDescription("Arguments for `podman pod create`"), O.optional),
  podmanPath: O.text("podman-path").pipe(O.withDescription("Path to the podman binary"), O.optional),
  podmanArgs: O.text("podman-args").pipe(O.withDescription("Global arguments for every podman call"), O.repeated),
  podmanVerbArgs: O.all(verbArgOptions),
  parallel: O.integer("parallel").pipe(O.withDescription("Maximum concurrent podman calls"), O.optional),
  dryRun: O.boolean("dry-run").pipe(O.withDescription("Print podman commands instead of running them")),
  verbose: O.boolean("verbose").pipe(O.withDescription("Verbose output (debug logging)")),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(O.withDescription("Set log level"), O.optional),
  logFormat: O.choice("log-format", LOG_FORMAT_VALUES).pipe(O.withDescription("Log output format"), O.optional),
  toolConfig: O.text("tool-config").pipe(O.withDescription("Path to the TOML tool configuration"), O.optional),
};

export interface GlobalOptions {
  readonly file: readonly string[];
  readonly projectName: Option.Option<string>;
  readonly profile: readonly string[];
  readonly envFile: readonly string[];
  readonly env: readonly string[];
  readonly inPod: Option.Option<"true" | "false">;
  readonly podArgs: Option.Option<string>;
  readonly podmanPath: Option.Option<string>;
  readonly podmanArgs: readonly string[];
  readonly podmanVerbArgs: Readonly<Record<string, readonly string[]>>;
  readonly parallel: Option.Option<number>;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly toolConfig: Option.Option<string>;
}

// Per-command options

export const detach: Options<boolean> = O.boolean("detach").pipe(
  O.withAlias("d"),
  O.withDescription("Run in the background")
);

export const timeout: Options<Option.Option<number>> = O.integer("timeout").pipe(
  O.withAlias("t"),
  O.withDescription("Seconds to wait for a container to stop"),
  O.optional
);

export const removeOrphans: Options<boolean> = O.boolean("remove-orphans").pipe(
  O.withDescription("Remove containers of services no longer defined")
);

export const containerEnv: Options<string[]> = O.text("e").pipe(
  O.withDescription("Container environment variable (KEY=VALUE)"),
  O.repeated
);

export const user: Options<Option.Option<string>> = O.text("user").pipe(
  O.withAlias("u"),
  O.withDescription("Run as this user"),
  O.optional
);

export const workdir: Options<Option.Option<string>> = O.text("workdir").pipe(
  O.withAlias("w"),
  O.withDescription("Working directory inside the container"),
  O.optional
);

export const noTty: Options<boolean> = O.boolean("T").pipe(O.withDescription("Do not allocate a pseudo-TTY"));

/** `--in-pod` as a tri-state. */
export const inPodSetting = (globals: GlobalOptions): Option.Option<boolean> =>
  Option.map(globals.inPod, (v) => v === "true");
