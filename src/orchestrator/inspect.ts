// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only and interactive commands: ps, logs, exec, wait, port, images,
 * config, version.
 */

import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import { projectFilter } from "../compose/containers";
import { parseCondition } from "../compose/dependencies";
import { renderDocument } from "../compose/document";
import {
  type ContainerRecord,
  type DependencyCondition,
  type DocumentNode,
  type Project,
  EMPTY_MAPPING,
  containersOf,
  getMapping,
  getString,
  getText,
  isMapping,
  isSequence,
} from "../compose/types";
import { type ConfigError, ErrorCode, GeneralError } from "../lib/errors";
import { writeOutput } from "../lib/log";
import { PODCOMPOSE_VERSION } from "../lib/version";
import { assignments } from "../podman/args";
import { Podman, type ToolError } from "../podman/client";
import type { ProcessError } from "../podman/runner";
import { assertServices, selectContainers } from "./selection";

const flag = (enabled: boolean, ...args: readonly string[]): readonly string[] => (enabled ? args : []);

const valued = (value: Option.Option<string>, name: string): readonly string[] =>
  Option.match(value, { onNone: (): readonly string[] => [], onSome: (v): readonly string[] => [name, v] });

const statusOf = (code: Option.Option<number>): number => Option.getOrElse(code, () => 0);

const lines = (text: string): readonly string[] =>
  text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l !== "");

const replicaNotFound = (service: string, index: number): GeneralError =>
  new GeneralError({
    code: ErrorCode.CONTAINER_NOT_FOUND,
    message: `service ${service} has no container with index ${index}`,
  });

/** Container `index` (1-based) of a service. */
const replica = (project: Project, service: string, index: number): Effect.Effect<ContainerRecord, GeneralError> =>
  Effect.zipRight(
    assertServices(project, [service]),
    pipe(
      Arr.get(containersOf(project, service), index - 1),
      Effect.mapError(() => replicaNotFound(service, index))
    )
  );

// ============================================================================
// ps
// ============================================================================

export interface PsOptions {
  readonly quiet: boolean;
  readonly format: Option.Option<string>;
}

export const psArgs = (project: Project, options: PsOptions): readonly string[] => [
  "-a",
  "--filter",
  projectFilter(project.name),
  ...(options.quiet ? ["--format", "{{.ID}}"] : valued(options.format, "--format")),
];

export const ps = (project: Project, options: PsOptions): Effect.Effect<number, ProcessError, Podman> =>
  Effect.flatMap(Podman, (podman) => Effect.map(podman.run("ps", psArgs(project, options)), statusOf));

// ============================================================================
// logs
// ============================================================================

export interface LogsOptions {
  readonly services: readonly string[];
  readonly follow: boolean;
  readonly latest: boolean;
  readonly names: boolean;
  readonly since: Option.Option<string>;
  readonly tail: Option.Option<string>;
  readonly timestamps: boolean;
  readonly until: Option.Option<string>;
}

export const logsArgs = (options: LogsOptions, targets: readonly string[]): readonly string[] => [
  ...flag(options.follow, "-f"),
  ...flag(options.latest, "-l"),
  ...flag(options.names, "-n"),
  ...valued(options.since, "--since"),
  ...valued(
    Option.filter(options.tail, (t) => t !== "all"),
    "--tail"
  ),
  ...flag(options.timestamps, "-t"),
  ...valued(options.until, "--until"),
  ...targets,
];

export const logs = (project: Project, options: LogsOptions): Effect.Effect<number, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const containers = yield* selectContainers(project, options.services);
    return statusOf(
      yield* podman.run(
        "logs",
        logsArgs(
          options,
          containers.map((c) => c.name)
        )
      )
    );
  });

// ============================================================================
// exec
// ============================================================================

export interface ExecOptions {
  readonly service: string;
  readonly command: readonly string[];
  readonly detach: boolean;
  readonly privileged: boolean;
  readonly user: Option.Option<string>;
  readonly workdir: Option.Option<string>;
  /** `-T`: no pseudo-terminal. */
  readonly noTty: boolean;
  /** Extra `KEY=VAL` entries. */
  readonly env: readonly string[];
  /** 1-based replica number. */
  readonly index: number;
}

export const execArgs = (project: Project, options: ExecOptions): Effect.Effect<readonly string[], GeneralError> =>
  Effect.gen(function* () {
    const container = yield* replica(project, options.service, options.index);
    const serviceEnv = assignments(Option.getOrElse(getMapping(container.definition, "environment"), () => EMPTY_MAPPING));
    return [
      "--interactive",
      ...flag(options.detach, "--detach"),
      ...flag(options.privileged, "--privileged"),
      ...valued(options.user, "--user"),
      ...valued(options.workdir, "--workdir"),
      ...flag(!options.noTty, "--tty"),
      ...[...serviceEnv, ...options.env].flatMap((e) => ["--env", e]),
      container.name,
      ...options.command,
    ];
  });

/** Exit status of the executed command. */
export const exec = (project: Project, options: ExecOptions): Effect.Effect<number, ProcessError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const args = yield* execArgs(project, options);
    return statusOf(yield* podman.run("exec", args, { interactive: !options.detach }));
  });

// ============================================================================
// wait
// ============================================================================

export interface WaitOptions {
  readonly services: readonly string[];
  /** Container state to wait for; podman waits for exit when absent. */
  readonly condition: Option.Option<string>;
}

export const waitArgs = (
  names: readonly string[],
  condition: Option.Option<DependencyCondition>
): readonly string[] => [
  ...Option.match(condition, { onNone: (): readonly string[] => [], onSome: (c) => [`--condition=${c}`] }),
  "--",
  ...names,
];

/** Blocks until the selected containers reach the condition; podman prints one status per container. */
export const wait = (
  project: Project,
  options: WaitOptions
): Effect.Effect<number, ProcessError | ConfigError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const condition = yield* Option.match(options.condition, {
      onNone: (): Either.Either<Option.Option<DependencyCondition>, ConfigError> => Either.right(Option.none()),
      onSome: (raw) => Either.map(parseCondition(raw), Option.some),
    });
    const containers = yield* selectContainers(project, options.services);
    return statusOf(
      yield* podman.run(
        "wait",
        waitArgs(
          containers.map((c) => c.name),
          condition
        )
      )
    );
  });

// ============================================================================
// port
// ============================================================================

export const PORT_PROTOCOLS = ["tcp", "udp"] as const;
export type PortProtocol = (typeof PORT_PROTOCOLS)[number];

interface PortBinding {
  readonly published: number;
  readonly target: number;
  readonly protocol: string;
}

const portNumber = (text: string): Option.Option<number> =>
  /^\d+$/.test(text) ? Option.some(Number(text)) : Option.none();

/**
 * Published and container port of one `ports` entry. Entries without a
 * published port, or with port ranges, have no binding.
 */
export const portBinding = (entry: DocumentNode): Option.Option<PortBinding> => {
  if (isMapping(entry)) {
    return Option.map(
      Option.all({
        published: Option.flatMap(getText(entry, "published"), portNumber),
        target: Option.flatMap(getText(entry, "target"), portNumber),
      }),
      (ports): PortBinding => ({ ...ports, protocol: Option.getOrElse(getString(entry, "protocol"), () => "tcp") })
    );
  }
  if (typeof entry !== "string") {
    return Option.none();
  }
  const [spec = "", protocol = "tcp"] = entry.split("/");
  const fields = spec.split(":");
  if (fields.length < 2) {
    return Option.none();
  }
  return Option.map(
    Option.all({
      published: portNumber(fields[fields.length - 2] ?? ""),
      target: portNumber(fields[fields.length - 1] ?? ""),
    }),
    (ports): PortBinding => ({ ...ports, protocol })
  );
};

export interface PortOptions {
  readonly service: string;
  readonly privatePort: number;
  readonly protocol: PortProtocol;
  /** 1-based replica number. */
  readonly index: number;
}

/** Host port that `privatePort` of the service's container is published on. */
export const publishedPort = (project: Project, options: PortOptions): Effect.Effect<Option.Option<number>, GeneralError> =>
  Effect.map(replica(project, options.service, options.index), (container) => {
    const node = container.definition["ports"];
    const entries: readonly DocumentNode[] = isSequence(node) ? node : node === undefined || node === null ? [] : [node];
    return pipe(
      Arr.findFirst(
        Arr.getSomes(entries.map(portBinding)),
        (b) => b.target === options.privatePort && b.protocol === options.protocol
      ),
      Option.map((b) => b.published)
    );
  });

export const port = (project: Project, options: PortOptions): Effect.Effect<number, GeneralError> =>
  Effect.flatMap(
    publishedPort(project, options),
    Option.match({
      onNone: () =>
        Effect.fail(
          new GeneralError({
            code: ErrorCode.GENERAL_ERROR,
            message: `service ${options.service} does not publish ${options.privatePort}/${options.protocol}`,
          })
        ),
      onSome: (published) => Effect.as(writeOutput(String(published)), 0),
    })
  );

// ============================================================================
// images
// ============================================================================

const IMAGE_HEADER: readonly string[] = ["CONTAINER", "REPOSITORY", "TAG", "IMAGE ID", "SIZE"];

const IMAGE_FORMAT = "{{.Repository}}\t{{.Tag}}\t{{.ID}}\t{{.Size}}";

/** Rows with every column padded to its widest cell, two spaces apart. */
export const formatTable = (rows: readonly (readonly string[])[]): string => {
  const widths = rows.reduce<readonly number[]>(
    (acc, row) => row.map((cell, i) => Math.max(acc[i] ?? 0, cell.length)),
    []
  );
  return rows.map((row) => row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd()).join("\n");
};

/** Images of the project's containers: a table, or image IDs only when `quiet`. */
export const images = (project: Project, quiet: boolean): Effect.Effect<number, ToolError, Podman> =>
  Effect.gen(function* () {
    const podman = yield* Podman;
    const rows = yield* Effect.forEach(project.containers, (container) =>
      quiet
        ? Effect.map(podman.output("images", ["--quiet", container.image]), (out) => lines(out).map((id) => [id]))
        : Effect.map(podman.output("images", ["--format", IMAGE_FORMAT, "--noheading", container.image]), (out) =>
            lines(out).map((line) => [container.name, ...line.split("\t")])
          )
    );
    const body = rows.flat();
    yield* writeOutput(quiet ? body.map((row) => row.join("")).join("\n") : formatTable([IMAGE_HEADER, ...body]));
    return 0;
  });

// ============================================================================
// config and version
// ============================================================================

export interface ConfigOptions {
  readonly services: boolean;
  readonly hash: boolean;
}

/** Merged document as YAML, or service names, or the configuration hash. */
export const renderConfig = (project: Project, options: ConfigOptions): string =>
  options.hash
    ? project.configHash
    : options.services
      ? Array.from(project.services.keys()).join("\n")
      : renderDocument(project.document).trimEnd();

export const config = (project: Project, options: ConfigOptions): Effect.Effect<number> =>
  Effect.as(writeOutput(renderConfig(project, options)), 0);

export type VersionFormat = "pretty" | "json";

export const version = (short: boolean, format: VersionFormat): Effect.Effect<number, ProcessError, Podman> =>
  Effect.gen(function* () {
    if (short) {
      yield* writeOutput(PODCOMPOSE_VERSION);
      return 0;
    }
    if (format === "json") {
      yield* writeOutput(JSON.stringify({ version: PODCOMPOSE_VERSION }));
      return 0;
    }
    const podman = yield* Podman;
    yield* writeOutput(`podcompose version ${PODCOMPOSE_VERSION}`);
    return statusOf(yield* podman.run("--version", []));
  });
