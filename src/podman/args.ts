// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Translation of a container record into `create`/`run` arguments.
 *
 * Each section below maps one group of service keys to flags. Sections are
 * concatenated in a fixed order; the image and command always come last.
 */

import { resolve } from "node:path";
import { FileSystem } from "@effect/platform";
import { parse as parseDotenv } from "dotenv";
import { Array as Arr, Effect, Either, HashSet, Option, pipe } from "effect";
import {
  type ContainerRecord,
  type DocumentMapping,
  type DocumentNode,
  type Project,
  EMPTY_MAPPING,
  containersOf,
  getBoolean,
  getMapping,
  getSequence,
  getString,
  getText,
  isMapping,
  isSequence,
  stringList,
} from "../compose/types";
import { mountArgs } from "../compose/volumes";
import { ConfigError, ErrorCode } from "../lib/errors";
import { quote } from "../lib/shlex";

type Flags = Either.Either<readonly string[], ConfigError>;

const invalid = (container: ContainerRecord, message: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `service ${container.service}: ${message}`,
  });

/** Repeat `flag` for every entry of a scalar-or-list key. */
const repeated = (definition: DocumentMapping, key: string, flag: string): readonly string[] => {
  const node = definition[key];
  const values = isSequence(node)
    ? stringList(node)
    : typeof node === "string" || typeof node === "number"
      ? [String(node)]
      : [];
  return values.flatMap((v) => [flag, v]);
};

const optional = (definition: DocumentMapping, key: string, flag: string): readonly string[] =>
  Option.match(getText(definition, key), {
    onNone: (): readonly string[] => [],
    onSome: (v): readonly string[] => [flag, v],
  });

const when = (condition: boolean, ...flags: readonly string[]): readonly string[] => (condition ? flags : []);

/** `KEY=VAL`, or a bare `KEY` for a null value. */
export const assignments = (mapping: DocumentMapping): readonly string[] =>
  Object.entries(mapping).map(([k, v]) =>
    v === null ? k : `${k}=${isMapping(v) || isSequence(v) ? JSON.stringify(v) : String(v)}`
  );

// ============================================================================
// Identity and placement
// ============================================================================

const dependencyContainerNames = (project: Project, container: ContainerRecord): readonly string[] =>
  pipe(
    Array.from(HashSet.values(container.deps)),
    Arr.map((edge) => edge.name),
    Arr.dedupe,
    Arr.flatMap((service) => containersOf(project, service).map((c) => c.name))
  );

const identityFlags = (project: Project, container: ContainerRecord, options: ContainerArgsOptions): readonly string[] => {
  const requires = options.noDeps === true ? [] : dependencyContainerNames(project, container);
  return [
    `--name=${container.name}`,
    ...when(options.detached, "-d"),
    ...Option.match(container.pod, { onNone: (): readonly string[] => [], onSome: (pod) => [`--pod=${pod}`] }),
    ...when(requires.length > 0, `--requires=${requires.join(",")}`),
  ];
};

const securityFlags = (definition: DocumentMapping): readonly string[] => [
  ...repeated(definition, "security_opt", "--security-opt"),
  ...Option.match(getMapping(definition, "annotations"), {
    onNone: () => repeated(definition, "annotations", "--annotation"),
    onSome: (annotations) => assignments(annotations).flatMap((a) => ["--annotation", a]),
  }),
  ...when(getBoolean(definition, "read_only"), "--read-only"),
  ...when(definition["http_proxy"] === false, "--http-proxy=false"),
];

const labelFlags = (container: ContainerRecord): readonly string[] =>
  [
    ...assignments(Option.getOrElse(getMapping(container.definition, "labels"), () => EMPTY_MAPPING)),
    ...container.labels,
  ].flatMap((label) => ["--label", label]);

const capabilityFlags = (definition: DocumentMapping): readonly string[] => [
  ...repeated(definition, "cap_add", "--cap-add"),
  ...repeated(definition, "cap_drop", "--cap-drop"),
  ...repeated(definition, "group_add", "--group-add"),
  ...repeated(definition, "devices", "--device"),
  ...repeated(definition, "device_cgroup_rules", "--device-cgroup-rule"),
  ...repeated(definition, "dns", "--dns"),
  ...repeated(definition, "dns_opt", "--dns-opt"),
  ...repeated(definition, "dns_search", "--dns-search"),
];

// ============================================================================
// Environment
// ============================================================================

interface EnvFileRef {
  readonly path: string;
  readonly required: boolean;
}

const envFileRefs = (definition: DocumentMapping): readonly EnvFileRef[] =>
  Option.getOrElse(getSequence(definition, "env_file"), () => []).flatMap((entry): readonly EnvFileRef[] => {
    if (typeof entry === "string") {
      return [{ path: entry, required: true }];
    }
    if (isMapping(entry)) {
      return Option.toArray(
        Option.map(getString(entry, "path"), (path) => ({ path, required: entry["required"] !== false }))
      );
    }
    return [];
  });

const envFileFlags = (
  project: Project,
  container: ContainerRecord
): Effect.Effect<readonly string[], ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const perFile = yield* Effect.forEach(envFileRefs(container.definition), (ref) =>
      Effect.gen(function* () {
        const path = resolve(project.dir, ref.path);
        const exists = yield* pipe(
          fs.exists(path),
          Effect.orElseSucceed(() => false)
        );
        if (!exists) {
          return ref.required
            ? yield* Effect.fail(invalid(container, `env file ${path} does not exist`))
            : [];
        }
        const text = yield* pipe(
          fs.readFileString(path),
          Effect.mapError(
            (e) =>
              new ConfigError({
                code: ErrorCode.FILE_READ_FAILED,
                message: `Failed to read ${path}: ${e.message}`,
                path,
                cause: e,
              })
          )
        );
        return Object.entries(parseDotenv(text)).flatMap(([k, v]) => ["-e", `${k}=${v}`]);
      })
    );
    return perFile.flat();
  });

const environmentFlags = (definition: DocumentMapping): readonly string[] =>
  assignments(Option.getOrElse(getMapping(definition, "environment"), () => EMPTY_MAPPING)).flatMap((e) => [
    "-e",
    e,
  ]);

// ============================================================================
// Storage
// ============================================================================

const storageFlags = (container: ContainerRecord): readonly string[] => [
  ...repeated(container.definition, "tmpfs", "--tmpfs"),
  ...container.mounts.flatMap(mountArgs),
];

// ============================================================================
// Networking
// ============================================================================

const BRIDGE = "bridge";
const PASSTHROUGH_MODES: readonly string[] = ["none", "host", "private"];
const PASSTHROUGH_PREFIXES: readonly string[] = ["slirp4netns", "pasta", "ns:", "container:"];

const containerAliases = (container: ContainerRecord): readonly string[] => [container.service, ...container.aliases];

const networkModeFlags = (project: Project, container: ContainerRecord, mode: string): Flags => {
  if (container.definition["networks"] !== undefined) {
    return Either.left(invalid(container, "networks and network_mode must not be present in the same service"));
  }
  if (PASSTHROUGH_MODES.includes(mode) || PASSTHROUGH_PREFIXES.some((p) => mode.startsWith(p))) {
    return Either.right([`--network=${mode}`]);
  }
  if (mode.startsWith("service:")) {
    const other = mode.slice("service:".length).trim();
    return pipe(
      Arr.head(containersOf(project, other)),
      Either.fromOption(() => invalid(container, `network_mode refers to unknown service ${other}`)),
      Either.map((c) => [`--network=container:${c.name}`])
    );
  }
  if (mode.startsWith(BRIDGE)) {
    const options = [
      ...containerAliases(container).map((a) => `alias=${a}`),
      ...Option.toArray(Option.map(getString(container.definition, "mac_address"), (m) => `mac=${m}`)),
    ];
    return Either.right([`--network=${mode}${mode.includes(":") ? "," : ":"}${options.join(",")}`]);
  }
  return Either.left(invalid(container, `unknown network_mode ${mode}`));
};

const attachmentFlags = (container: ContainerRecord): readonly string[] => {
  const mac = getString(container.definition, "mac_address");
  if (container.networks.length === 0) {
    const options = [
      ...containerAliases(container).map((a) => `alias=${a}`),
      ...Option.toArray(Option.map(mac, (m) => `mac=${m}`)),
    ];
    return [`--network=${BRIDGE}:${options.join(",")}`];
  }
  return container.networks.map((attachment, i) => {
    const options = [
      ...Option.toArray(Option.map(attachment.ipv4Address, (ip) => `ip=${ip}`)),
      ...Option.toArray(Option.map(attachment.ipv6Address, (ip) => `ip6=${ip}`)),
      // a service-level MAC address applies to the first network only
      ...(i === 0 ? Option.toArray(Option.map(mac, (m) => `mac=${m}`)) : []),
      ...containerAliases(container).map((a) => `alias=${a}`),
      ...attachment.aliases.map((a) => `alias=${a}`),
    ];
    return `--network=${attachment.network.name}:${options.join(",")}`;
  });
};

const networkFlags = (project: Project, container: ContainerRecord): Flags =>
  Option.match(container.networkMode, {
    onNone: (): Flags => Either.right(attachmentFlags(container)),
    onSome: (mode): Flags => networkModeFlags(project, container, mode),
  });

// ============================================================================
// Ports and logging
// ============================================================================

const portMappingToString = (container: ContainerRecord, port: DocumentMapping): Either.Either<string, ConfigError> =>
  pipe(
    getText(port, "target"),
    Either.fromOption(() => invalid(container, "target container port must be specified")),
    Either.map((target) => {
      const published = Option.getOrElse(getText(port, "published"), () => "");
      const protocol = Option.getOrElse(getString(port, "protocol"), () => "tcp");
      const base = Option.match(getString(port, "host_ip"), {
        onSome: (ip) => `${ip}:${published}:${target}`,
        onNone: () => (published === "" ? target : `${published}:${target}`),
      });
      return protocol === "tcp" ? base : `${base}/${protocol}`;
    })
  );

const portFlags = (container: ContainerRecord): Flags => {
  const node = container.definition["ports"];
  const entries: readonly DocumentNode[] = isSequence(node) ? node : node === undefined || node === null ? [] : [node];
  return pipe(
    Either.all(
      entries.map((port): Either.Either<string, ConfigError> => {
        if (typeof port === "string" || typeof port === "number") {
          return Either.right(String(port));
        }
        return isMapping(port)
          ? portMappingToString(container, port)
          : Either.left(invalid(container, "port should be either string or mapping"));
      })
    ),
    Either.map((ports) => ports.flatMap((p) => ["-p", p]))
  );
};

const loggingFlags = (definition: DocumentMapping): readonly string[] =>
  Option.match(getMapping(definition, "logging"), {
    onNone: (): readonly string[] => [],
    onSome: (logging): readonly string[] => [
      `--log-driver=${Option.getOrElse(getString(logging, "driver"), () => "k8s-file")}`,
      ...assignments(Option.getOrElse(getMapping(logging, "options"), () => EMPTY_MAPPING)).map(
        (o) => `--log-opt=${o}`
      ),
    ],
  });

const exposureFlags = (definition: DocumentMapping): readonly string[] => [
  ...repeated(definition, "extra_hosts", "--add-host"),
  ...repeated(definition, "expose", "--expose"),
  ...when(getBoolean(definition, "publishall"), "-P"),
];

// ============================================================================
// Process settings
// ============================================================================

const sysctlFlags = (container: ContainerRecord): Flags => {
  const node = container.definition["sysctls"];
  if (node === undefined || node === null) {
    return Either.right([]);
  }
  if (isMapping(node)) {
    return Either.right(assignments(node).flatMap((s) => ["--sysctl", s]));
  }
  if (isSequence(node)) {
    return Either.right(stringList(node).flatMap((s) => ["--sysctl", s]));
  }
  return Either.left(invalid(container, "sysctls should be either mapping or list"));
};

const processFlags = (definition: DocumentMapping): readonly string[] => [
  ...optional(definition, "userns_mode", "--userns"),
  ...optional(definition, "user", "-u"),
  ...optional(definition, "working_dir", "-w"),
  ...optional(definition, "hostname", "--hostname"),
  ...optional(definition, "shm_size", "--shm-size"),
  ...when(getBoolean(definition, "stdin_open"), "-i"),
  ...optional(definition, "stop_signal", "--stop-signal"),
];

const runtimeFlags = (definition: DocumentMapping): readonly string[] => [
  ...when(getBoolean(definition, "tty"), "--tty"),
  ...when(getBoolean(definition, "privileged"), "--privileged"),
  ...optional(definition, "pid", "--pid"),
  ...pipe(
    getString(definition, "pull_policy"),
    Option.filter((p) => p !== "build"),
    Option.match({ onNone: (): readonly string[] => [], onSome: (p) => ["--pull", p] })
  ),
  ...optional(definition, "restart", "--restart"),
];

const ulimitValue = (value: DocumentNode): string =>
  isMapping(value)
    ? `${Option.getOrElse(getText(value, "soft"), () => "")}:${Option.getOrElse(getText(value, "hard"), () => "")}`
    : String(value);

const resourceFlags = (definition: DocumentMapping): readonly string[] => {
  const ulimits = definition["ulimits"];
  const resources = pipe(
    getMapping(definition, "deploy"),
    Option.flatMap((deploy) => getMapping(deploy, "resources"))
  );
  const limits = Option.flatMap(resources, (r) => getMapping(r, "limits"));
  const reservations = Option.flatMap(resources, (r) => getMapping(r, "reservations"));
  const cpus = Option.orElse(Option.flatMap(limits, (l) => getText(l, "cpus")), () => getText(definition, "cpus"));
  const memory = Option.orElse(Option.flatMap(limits, (l) => getText(l, "memory")), () =>
    getText(definition, "mem_limit")
  );
  const memoryReservation = Option.orElse(Option.flatMap(reservations, (r) => getText(r, "memory")), () =>
    getText(definition, "mem_reservation")
  );
  return [
    ...(typeof ulimits === "string"
      ? ["--ulimit", ulimits]
      : isMapping(ulimits)
        ? Object.entries(ulimits).flatMap(([k, v]) => ["--ulimit", `${k}=${ulimitValue(v)}`])
        : []),
    ...Option.match(cpus, { onNone: (): readonly string[] => [], onSome: (c) => ["--cpus", c] }),
    ...optional(definition, "cpu_shares", "--cpu-shares"),
    ...Option.match(memory, { onNone: (): readonly string[] => [], onSome: (m) => ["-m", m.toLowerCase()] }),
    ...Option.match(memoryReservation, {
      onNone: (): readonly string[] => [],
      onSome: (m) => ["--memory-reservation", m.toLowerCase()],
    }),
  ];
};

const entrypointFlags = (definition: DocumentMapping): readonly string[] => [
  ...when(getBoolean(definition, "init"), "--init"),
  ...optional(definition, "init-path", "--init-path"),
  ...Option.match(getSequence(definition, "entrypoint"), {
    onNone: (): readonly string[] => [],
    onSome: (words) => ["--entrypoint", JSON.stringify(stringList(words))],
  }),
  ...optional(definition, "platform", "--platform"),
  ...optional(definition, "runtime", "--runtime"),
];

// ============================================================================
// Healthcheck
// ============================================================================

const SHELL = "/bin/sh -c ";

const healthcheckCommand = (container: ContainerRecord, test: DocumentNode): Flags => {
  if (typeof test === "string") {
    return Either.right(["--healthcheck-command", SHELL + quote(test)]);
  }
  if (!isSequence(test)) {
    return Either.left(invalid(container, "healthcheck.test must be a string or a list"));
  }
  const [kind, ...rest] = stringList(test);
  if (kind === "NONE") {
    return Either.right(["--no-healthcheck"]);
  }
  if (kind === "CMD") {
    return Either.right(["--healthcheck-command", SHELL + quote(rest.join(" "))]);
  }
  if (kind === "CMD-SHELL") {
    const [shell, ...extra] = rest;
    return shell !== undefined && extra.length === 0
      ? Either.right(["--healthcheck-command", SHELL + quote(shell)])
      : Either.left(invalid(container, "CMD-SHELL takes a single string after it"));
  }
  return Either.left(invalid(container, `unknown healthcheck test type ${String(kind)}, expecting NONE, CMD or CMD-SHELL`));
};

const healthcheckFlags = (container: ContainerRecord): Flags => {
  const node = container.definition["healthcheck"];
  if (node === undefined || node === null) {
    return Either.right([]);
  }
  if (!isMapping(node)) {
    return Either.left(invalid(container, "healthcheck must be a mapping"));
  }
  const test: DocumentNode | undefined = getBoolean(node, "disable") ? ["NONE"] : node["test"];
  const command: Flags =
    test === undefined || test === null ? Either.right([]) : healthcheckCommand(container, test);
  return Either.map(command, (flags): readonly string[] => [
    ...flags,
    ...optional(node, "interval", "--healthcheck-interval"),
    ...optional(node, "timeout", "--healthcheck-timeout"),
    ...optional(node, "start_period", "--healthcheck-start-period"),
    ...optional(node, "retries", "--healthcheck-retries"),
  ]);
};

// ============================================================================
// Extensions, image and command
// ============================================================================

const extensionFlags = (definition: DocumentMapping): readonly string[] => [
  ...repeated(definition, "x-podman.uidmaps", "--uidmap"),
  ...repeated(definition, "x-podman.gidmaps", "--gidmap"),
  ...when(getBoolean(definition, "x-podman.no_hosts"), "--no-hosts"),
];

/** `--rootfs` replaces the image when set. */
const imageAndCommand = (container: ContainerRecord): readonly string[] => [
  ...Option.match(getString(container.definition, "x-podman.rootfs"), {
    onNone: (): readonly string[] => [container.image],
    onSome: (rootfs): readonly string[] => ["--rootfs", rootfs],
  }),
  ...Option.match(getSequence(container.definition, "command"), {
    onNone: (): readonly string[] => [],
    onSome: stringList,
  }),
];

export interface ContainerArgsOptions {
  readonly detached: boolean;
  /** Leave out `--requires`, for containers started without their dependencies. */
  readonly noDeps?: boolean;
}

/** Arguments following `podman create` (or `run`) for one container. */
export const containerToArgs = (
  project: Project,
  container: ContainerRecord,
  options: ContainerArgsOptions
): Effect.Effect<readonly string[], ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const definition = container.definition;
    const envFiles = yield* envFileFlags(project, container);
    const computed = yield* Either.all([
      networkFlags(project, container),
      portFlags(container),
      sysctlFlags(container),
      healthcheckFlags(container),
    ]);
    const [network, ports, sysctls, healthcheck] = computed;
    if (Option.isSome(getString(definition, "x-podman.rootfs"))) {
      yield* Effect.logWarning(`service ${container.service}: x-podman.rootfs set, image ignored`);
    }
    return [
      ...identityFlags(project, container, options),
      ...securityFlags(definition),
      ...labelFlags(container),
      ...capabilityFlags(definition),
      ...envFiles,
      ...environmentFlags(definition),
      ...storageFlags(container),
      ...network,
      ...loggingFlags(definition),
      ...exposureFlags(definition),
      ...ports,
      ...processFlags(definition),
      ...sysctls,
      ...runtimeFlags(definition),
      ...resourceFlags(definition),
      ...entrypointFlags(definition),
      ...healthcheck,
      ...extensionFlags(definition),
      ...imageAndCommand(container),
    ];
  });
