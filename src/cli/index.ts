// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * layer wiring and error display so each subcommand is a single call into
 * the orchestrator.
 */

import { Args as A, Command, Options as O } from "@effect/cli";
import type { CommandExecutor, FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Context, Effect, Option, Ref, pipe } from "effect";
import { loadProject } from "../compose/loader";
import type { Project } from "../compose/types";
import { LOG_FORMAT_VALUES } from "../config/field-values";
import { ComposeLoggerLive } from "../lib/effect-logger";
import { type AppError, formatError } from "../lib/errors";
import { logFail } from "../lib/log";
import { PODCOMPOSE_VERSION } from "../lib/version";
import type { Podman } from "../podman/client";
import { buildImages, defaultBuildOptions, pullImages, pushImages } from "../orchestrator/build";
import { down } from "../orchestrator/down";
import { PORT_PROTOCOLS, config, exec, images, logs, port, ps, version, wait } from "../orchestrator/inspect";
import { kill, setPaused, transition } from "../orchestrator/lifecycle";
import { runOneOff } from "../orchestrator/run";
import type { OrchestratorTimings } from "../orchestrator/timings";
import { up } from "../orchestrator/up";
import {
  commandArgs,
  containerEnv,
  detach,
  globalOptions,
  noTty,
  removeOrphans,
  serviceArg,
  servicesArg,
  timeout,
  user,
  workdir,
} from "./options";
import { type CommandContext, commandLayer, resolveContext } from "./runtime";

// Exit status

/** Exit status a command asks for; read by the entry point once the CLI returns. */
export interface ExitStatus {
  readonly _tag: "ExitStatus";
}

export const ExitStatus: Context.Tag<ExitStatus, Ref.Ref<number>> = Context.GenericTag<ExitStatus, Ref.Ref<number>>(
  "podcompose/ExitStatus"
);

// Root command

const podcompose = Command.make("podcompose", globalOptions);

type CommandServices = Podman | OrchestratorTimings | FileSystem.FileSystem | CommandExecutor.CommandExecutor;

/** Resolves context, provides logger and container tool, records the exit status. */
const runCommand = (
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<number, AppError, CommandServices>
) =>
  Effect.gen(function* () {
    const globals = yield* podcompose;
    const fallbackLogger = ComposeLoggerLive({ level: globals.verbose ? "debug" : "info", format: "pretty" });
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) => logFail(formatError(err))),
      Effect.provide(fallbackLogger)
    );
    const code = yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => logFail(formatError(err))),
      Effect.provide(commandLayer(ctx)),
      Effect.provide(ComposeLoggerLive({ level: ctx.logLevel, format: ctx.logFormat }))
    );
    const status = yield* ExitStatus;
    yield* Ref.set(status, code);
  });

const withProject =
  <E, R>(handler: (project: Project) => Effect.Effect<number, E, R>) =>
  (ctx: CommandContext) =>
    Effect.flatMap(loadProject(ctx.load), (project) =>
      Effect.annotateLogs(handler(project), "project", project.name)
    );

// Subcommands

const upCmd = Command.make(
  "up",
  {
    services: servicesArg,
    detach,
    noStart: O.boolean("no-start").pipe(O.withDescription("Create containers without starting them")),
    noBuild: O.boolean("no-build").pipe(O.withDescription("Do not build missing images")),
    build: O.boolean("build").pipe(O.withDescription("Build images before starting")),
    forceRecreate: O.boolean("force-recreate").pipe(O.withDescription("Recreate containers even if unchanged")),
    abortOnContainerExit: O.boolean("abort-on-container-exit").pipe(
      O.withDescription("Stop all containers when any one exits")
    ),
    exitCodeFrom: O.text("exit-code-from").pipe(
      O.withDescription("Return the exit code of this service (implies --abort-on-container-exit)"),
      O.optional
    ),
    removeOrphans,
  },
  (args) => runCommand("up", withProject((project) => up(project, args)))
).pipe(Command.withDescription("Create and start containers"));

const downCmd = Command.make(
  "down",
  {
    services: servicesArg,
    volumes: O.boolean("volumes").pipe(O.withAlias("v"), O.withDescription("Also remove named volumes")),
    removeOrphans,
    timeout,
  },
  (args) => runCommand("down", withProject((project) => Effect.as(down(project, args), 0)))
).pipe(Command.withDescription("Stop and remove containers, pods and networks"));

const buildCmd = Command.make(
  "build",
  {
    services: servicesArg,
    pull: O.boolean("pull").pipe(O.withDescription("Pull newer base images")),
    pullAlways: O.boolean("pull-always").pipe(O.withDescription("Always pull base images")),
    noCache: O.boolean("no-cache").pipe(O.withDescription("Do not use the build cache")),
    buildArgs: O.text("build-arg").pipe(O.withDescription("Build-time variable (KEY=VALUE)"), O.repeated),
  },
  (args) =>
    runCommand(
      "build",
      withProject((project) => buildImages(project, { ...defaultBuildOptions, ...args }))
    )
).pipe(Command.withDescription("Build service images"));

const pullCmd = Command.make(
  "pull",
  {
    services: servicesArg,
    force: O.boolean("force-local").pipe(O.withDescription("Also pull images of locally built services")),
  },
  (args) => runCommand("pull", withProject((project) => pullImages(project, args)))
).pipe(Command.withDescription("Pull service images"));

const pushCmd = Command.make("push", { services: servicesArg }, (args) =>
  runCommand("push", withProject((project) => pushImages(project, args.services)))
).pipe(Command.withDescription("Push built service images"));

const startCmd = Command.make("start", { services: servicesArg }, (args) =>
  runCommand("start", withProject((project) => transition(project, "start", args.services, Option.none())))
).pipe(Command.withDescription("Start existing containers"));

const stopCmd = Command.make("stop", { services: servicesArg, timeout }, (args) =>
  runCommand("stop", withProject((project) => transition(project, "stop", args.services, args.timeout)))
).pipe(Command.withDescription("Stop running containers"));

const restartCmd = Command.make("restart", { services: servicesArg, timeout }, (args) =>
  runCommand("restart", withProject((project) => transition(project, "restart", args.services, args.timeout)))
).pipe(Command.withDescription("Restart containers"));

const pauseCmd = Command.make("pause", { services: servicesArg }, (args) =>
  runCommand("pause", withProject((project) => setPaused(project, true, args.services)))
).pipe(Command.withDescription("Pause containers"));

const unpauseCmd = Command.make("unpause", { services: servicesArg }, (args) =>
  runCommand("unpause", withProject((project) => setPaused(project, false, args.services)))
).pipe(Command.withDescription("Unpause containers"));

const killCmd = Command.make(
  "kill",
  {
    services: servicesArg,
    signal: O.text("signal").pipe(O.withAlias("s"), O.withDescription("Signal to send"), O.withDefault("KILL")),
    all: O.boolean("all").pipe(O.withAlias("a"), O.withDescription("Kill every container of the project")),
  },
  (args) => runCommand("kill", withProject((project) => kill(project, args)))
).pipe(Command.withDescription("Send a signal to containers"));

const psCmd = Command.make(
  "ps",
  {
    quiet: O.boolean("quiet").pipe(O.withAlias("q"), O.withDescription("Only print container IDs")),
    format: O.text("format").pipe(O.withDescription("Go template passed to podman ps"), O.optional),
  },
  (args) => runCommand("ps", withProject((project) => ps(project, args)))
).pipe(Command.withDescription("List the project's containers"));

const logsCmd = Command.make(
  "logs",
  {
    services: servicesArg,
    follow: O.boolean("follow").pipe(O.withAlias("f"), O.withDescription("Follow log output")),
    latest: O.boolean("latest").pipe(O.withAlias("l"), O.withDescription("Only the latest container")),
    names: O.boolean("names").pipe(O.withAlias("n"), O.withDescription("Prefix lines with the container name")),
    since: O.text("since").pipe(O.withDescription("Show logs since a timestamp"), O.optional),
    tail: O.text("tail").pipe(O.withDescription("Number of lines from the end, or all"), O.optional),
    timestamps: O.boolean("timestamps").pipe(O.withAlias("t"), O.withDescription("Show timestamps")),
    until: O.text("until").pipe(O.withDescription("Show logs until a timestamp"), O.optional),
  },
  (args) => runCommand("logs", withProject((project) => logs(project, args)))
).pipe(Command.withDescription("Show container output"));

const execCmd = Command.make(
  "exec",
  {
    service: serviceArg,
    command: commandArgs,
    detach,
    privileged: O.boolean("privileged").pipe(O.withDescription("Extended privileges for the process")),
    user,
    workdir,
    noTty,
    env: containerEnv,
    index: O.integer("index").pipe(O.withDescription("Replica number"), O.withDefault(1)),
  },
  (args) => runCommand("exec", withProject((project) => exec(project, args)))
).pipe(Command.withDescription("Run a command in a running container"));

const runCmd = Command.make(
  "run",
  {
    service: serviceArg,
    command: commandArgs,
    detach,
    name: O.text("name").pipe(O.withDescription("Container name"), O.optional),
    entrypoint: O.text("entrypoint").pipe(O.withDescription("Override the entrypoint"), O.optional),
    env: containerEnv,
    labels: O.text("label").pipe(O.withAlias("l"), O.withDescription("Extra label (KEY=VALUE)"), O.repeated),
    user,
    workdir,
    publish: O.text("publish").pipe(O.withAlias("p"), O.withDescription("Publish a port"), O.repeated),
    volumes: O.text("volume").pipe(O.withAlias("v"), O.withDescription("Bind or volume mount"), O.repeated),
    rm: O.boolean("rm").pipe(O.withDescription("Remove the container when it exits")),
    noDeps: O.boolean("no-deps").pipe(O.withDescription("Do not start dependencies")),
    servicePorts: O.boolean("service-ports").pipe(O.withDescription("Publish the service's ports")),
    noTty,
  },
  (args) => runCommand("run", withProject((project) => runOneOff(project, args)))
).pipe(Command.withDescription("Run a one-off command for a service"));

const waitCmd = Command.make(
  "wait",
  {
    services: servicesArg,
    condition: O.text("condition").pipe(
      O.withDescription("Container state to wait for, e.g. healthy or service_healthy"),
      O.optional
    ),
  },
  (args) => runCommand("wait", withProject((project) => wait(project, args)))
).pipe(Command.withDescription("Wait for containers to stop or reach a state"));

const portCmd = Command.make(
  "port",
  {
    service: serviceArg,
    privatePort: A.integer({ name: "private_port" }).pipe(A.withDescription("Container port")),
    protocol: O.choice("protocol", PORT_PROTOCOLS).pipe(O.withDescription("tcp or udp"), O.withDefault("tcp")),
    index: O.integer("index").pipe(O.withDescription("Replica number"), O.withDefault(1)),
  },
  (args) => runCommand("port", withProject((project) => port(project, args)))
).pipe(Command.withDescription("Print the host port a container port is published on"));

const imagesCmd = Command.make(
  "images",
  {
    quiet: O.boolean("quiet").pipe(O.withAlias("q"), O.withDescription("Only print image IDs")),
  },
  (args) => runCommand("images", withProject((project) => images(project, args.quiet)))
).pipe(Command.withDescription("List images used by the project's containers"));

const configCmd = Command.make(
  "config",
  {
    services: O.boolean("services").pipe(O.withDescription("Only print service names")),
    hash: O.boolean("hash").pipe(O.withDescription("Only print the configuration hash")),
  },
  (args) => runCommand("config", withProject((project) => config(project, args)))
).pipe(Command.withDescription("Print the merged compose document"));

const versionCmd = Command.make(
  "version",
  {
    short: O.boolean("short").pipe(O.withDescription("Only print the version number")),
    format: O.choice("format", LOG_FORMAT_VALUES).pipe(O.withDescription("Output format"), O.withDefault("pretty")),
  },
  (args) => runCommand("version", () => version(args.short, args.format))
).pipe(Command.withDescription("Show version information"));

const root = podcompose.pipe(
  Command.withDescription("Compose files for rootless Podman"),
  Command.withSubcommands([
    upCmd,
    downCmd,
    buildCmd,
    pullCmd,
    pushCmd,
    startCmd,
    stopCmd,
    restartCmd,
    pauseCmd,
    unpauseCmd,
    killCmd,
    psCmd,
    logsCmd,
    execCmd,
    runCmd,
    waitCmd,
    portCmd,
    imagesCmd,
    configCmd,
    versionCmd,
  ])
);

const cli = Command.run(root, {
  name: "podcompose",
  version: PODCOMPOSE_VERSION,
});

/** Runs the CLI against `argv` (as in `process.argv`) and yields the exit status. */
export const program = (argv: readonly string[]): Effect.Effect<number, unknown> =>
  Effect.gen(function* () {
    const status = yield* Ref.make(0);
    yield* pipe(cli(argv), Effect.provideService(ExitStatus, status), Effect.provide(NodeContext.layer));
    return yield* Ref.get(status);
  });
