// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Project loading: compose file discovery, environment assembly, the
 * per-file normalize/substitute/merge pass, profile filtering, extension
 * resolution and the final expansion into container, network, volume and
 * pod records. Nothing here talks to the container tool.
 */

import { FileSystem } from "@effect/platform";
import { createHash } from "node:crypto";
import { basename, dirname, relative, resolve } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { Array as Arr, Effect, HashSet, Option, pipe } from "effect";
import { COMPOSE_FILE_NAMES, POD_ARGS_DEFAULT } from "../config/field-values";
import { ConfigError, ErrorCode, type ResolutionError } from "../lib/errors";
import { buildContainers, podRecord } from "./containers";
import { buildDependencyGraph, orderServices } from "./dependencies";
import { readDocument } from "./document";
import { resolveExtends } from "./extends";
import { merge } from "./merge";
import { declaredNetworks, unusedNetworks } from "./networks";
import { isServiceActive, normalizeDocument, normalizeFinal } from "./normalize";
import { substituteMapping } from "./substitution";
import {
  type DocumentMapping,
  type Environment,
  EMPTY_MAPPING,
  type PodRecord,
  type Project,
  type ResolutionContext,
  type ResolvedService,
  type VolumeRecord,
  getMapping,
  getSequence,
  getString,
  isMapping,
  isSequence,
  stringList,
} from "./types";
import { declaredVolume } from "./volumes";

export interface LoadOptions {
  readonly cwd: string;
  /** `-f` values; empty means discover. */
  readonly files: readonly string[];
  readonly projectName: Option.Option<string>;
  readonly profiles: readonly string[];
  readonly envFiles: readonly string[];
  /** Process environment snapshot. */
  readonly processEnv: Environment;
  /** Highest-precedence variables, applied last. */
  readonly overrides: Environment;
  /** From the CLI or tool configuration; the document's `x-podman.in_pod` applies otherwise. */
  readonly inPod: Option.Option<boolean>;
  readonly podArgs: Option.Option<readonly string[]>;
}

type Loading<A> = Effect.Effect<A, ResolutionError, FileSystem.FileSystem>;

const notFound = (message: string, path?: string): ConfigError =>
  new ConfigError({ code: ErrorCode.CONFIG_NOT_FOUND, message, path });

// ============================================================================
// File discovery
// ============================================================================

const firstExisting = (
  candidates: readonly string[]
): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const found = yield* Effect.filter(candidates, (path) =>
      pipe(
        fs.exists(path),
        Effect.orElseSucceed(() => false)
      )
    );
    return Arr.head(found);
  });

const searchUpward = (dir: string): Effect.Effect<Option.Option<string>, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const here = yield* firstExisting(COMPOSE_FILE_NAMES.map((name) => resolve(dir, name)));
    const parent = dirname(dir);
    return Option.isSome(here) || parent === dir ? here : yield* searchUpward(parent);
  });

export const pathSeparatorOf = (env: Environment): string => env.get("COMPOSE_PATH_SEPARATOR") ?? ":";

/** `-f` files, else `COMPOSE_FILE`, else the nearest default file name. */
export const discoverFiles = (options: LoadOptions): Loading<Arr.NonEmptyReadonlyArray<string>> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const fromEnv = pipe(
      Option.fromNullable(options.processEnv.get("COMPOSE_FILE")),
      Option.filter((v) => v !== ""),
      Option.map((v) => v.split(pathSeparatorOf(options.processEnv)).filter((f) => f !== ""))
    );
    const requested = options.files.length > 0 ? Option.some(options.files) : fromEnv;
    if (Option.isNone(requested)) {
      return yield* pipe(
        searchUpward(options.cwd),
        Effect.flatMap(
          Option.match({
            onNone: () =>
              Effect.fail(
                notFound(
                  `no compose file found (looked for ${COMPOSE_FILE_NAMES.join(", ")}); pass files with -f`
                )
              ),
            onSome: (file) => Effect.succeed(Arr.of(file)),
          })
        )
      );
    }
    const files = requested.value.map((f) => resolve(options.cwd, f));
    const missing = yield* Effect.filter(files, (f) =>
      pipe(
        fs.exists(f),
        Effect.map((exists) => !exists),
        Effect.orElseSucceed(() => true)
      )
    );
    if (missing.length > 0) {
      return yield* Effect.fail(notFound(`missing compose files: ${missing.join(", ")}`, missing[0]));
    }
    return Arr.isNonEmptyReadonlyArray(files)
      ? files
      : yield* Effect.fail(notFound("COMPOSE_FILE names no files"));
  });

// ============================================================================
// Environment
// ============================================================================

const readDotenv = (path: string): Loading<Environment> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* pipe(
      fs.readFileString(path),
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read env file ${path}: ${e.message}`,
            path,
            cause: e,
          })
      )
    );
    return new Map(Object.entries(parseDotenv(text)));
  });

const layer = (...scopes: readonly Environment[]): Environment =>
  new Map(scopes.flatMap((scope) => Array.from(scope)));

/**
 * Dotenv files, then the process environment, then the synthesized
 * `COMPOSE_*` variables, then explicit overrides.
 */
export const assembleEnvironment = (
  options: LoadOptions,
  projectDir: string,
  files: readonly string[]
): Loading<Environment> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const projectDotenv = resolve(projectDir, ".env");
    const hasProjectDotenv = yield* pipe(
      fs.exists(projectDotenv),
      Effect.orElseSucceed(() => false)
    );
    const dotenvPaths =
      options.envFiles.length > 0
        ? options.envFiles.map((f) => resolve(options.cwd, f))
        : hasProjectDotenv
          ? [projectDotenv]
          : [];
    const dotenv = yield* Effect.forEach(dotenvPaths, readDotenv);
    const separator = pathSeparatorOf(options.processEnv);
    const synthesized: Environment = new Map([
      ["COMPOSE_PROJECT_DIR", projectDir],
      ["COMPOSE_FILE", files.map((f) => relative(projectDir, f)).join(separator)],
      ["COMPOSE_PATH_SEPARATOR", separator],
    ]);
    return layer(...dotenv, options.processEnv, synthesized, options.overrides);
  });

// ============================================================================
// Document assembly
// ============================================================================

const includedFiles = (doc: DocumentMapping, projectDir: string): readonly string[] => {
  const include = doc["include"];
  const entries = typeof include === "string" ? [include] : isSequence(include) ? include : [];
  return entries
    .flatMap((entry) => {
      if (typeof entry === "string") {
        return [entry];
      }
      if (isMapping(entry)) {
        const path = entry["path"];
        return typeof path === "string" ? [path] : isSequence(path) ? stringList(path) : [];
      }
      return [];
    })
    .map((f) => resolve(projectDir, f));
};

interface Assembly {
  readonly document: DocumentMapping;
  readonly files: readonly string[];
}

const loadFile = (file: string, projectDir: string, env: Environment): Loading<DocumentMapping> =>
  Effect.gen(function* () {
    const raw = yield* readDocument(file);
    const subDir = pipe(
      Option.some(relative(projectDir, dirname(file))),
      Option.filter((dir) => dir !== "")
    );
    const normalized = yield* normalizeDocument(raw, subDir);
    return yield* substituteMapping(normalized, env);
  });

/**
 * Files are processed in queue order; every `include` found in the
 * accumulated document is appended to the queue and dropped from the document.
 */
const assemble = (
  queue: readonly string[],
  acc: Assembly,
  projectDir: string,
  env: Environment
): Loading<Assembly> =>
  Effect.gen(function* () {
    const [file, ...rest] = queue;
    if (file === undefined) {
      return acc;
    }
    if (acc.files.includes(file)) {
      yield* Effect.logDebug(`${file} already loaded; skipping`);
      return yield* assemble(rest, acc, projectDir, env);
    }
    const content = yield* loadFile(file, projectDir, env);
    const merged = yield* merge(acc.document, content);
    const included = includedFiles(merged, projectDir);
    const document = Object.fromEntries(Object.entries(merged).filter(([k]) => k !== "include"));
    return yield* assemble([...rest, ...included], { document, files: [...acc.files, file] }, projectDir, env);
  });

const activeServices = (doc: DocumentMapping, profiles: ReadonlySet<string>): DocumentMapping =>
  Option.match(getMapping(doc, "services"), {
    onNone: (): DocumentMapping => doc,
    onSome: (services): DocumentMapping => ({
      ...doc,
      services: Object.fromEntries(
        Object.entries(services).filter(([, svc]) =>
          isServiceActive(isMapping(svc) ? svc : EMPTY_MAPPING, profiles)
        )
      ),
    }),
  });

export const configHash = (doc: DocumentMapping): string =>
  createHash("sha256").update(JSON.stringify(doc)).digest("hex");

// ============================================================================
// Naming
// ============================================================================

/** Lower-cased directory basename with everything but `[-_a-z0-9]` removed. */
export const normalizeProjectName = (name: string): string =>
  name.toLowerCase().replace(/[^-_a-z0-9]/g, "");

export const resolveProjectName = (
  explicit: Option.Option<string>,
  doc: DocumentMapping,
  env: Environment,
  projectDir: string
): Effect.Effect<string, ConfigError> =>
  pipe(
    explicit,
    Option.orElse(() => getString(doc, "name")),
    Option.orElse(() =>
      Option.some(normalizeProjectName(env.get("COMPOSE_PROJECT_NAME") ?? basename(projectDir)))
    ),
    Option.filter((name) => name !== ""),
    Option.match({
      onNone: () =>
        Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `project name for ${projectDir} normalized to empty; pass -p`,
          })
        ),
      onSome: (name) => Effect.succeed(name),
    })
  );

const inPodSetting = (options: LoadOptions, doc: DocumentMapping): boolean =>
  pipe(
    options.inPod,
    Option.orElse(() =>
      pipe(
        getMapping(doc, "x-podman"),
        Option.flatMap((x) => {
          const value = x["in_pod"];
          return typeof value === "boolean"
            ? Option.some(value)
            : typeof value === "string"
              ? Option.some(value.toLowerCase() === "true" || value === "1")
              : Option.none();
        })
      )
    ),
    Option.getOrElse(() => true)
  );

const podArgsSetting = (options: LoadOptions, doc: DocumentMapping): readonly string[] =>
  pipe(
    options.podArgs,
    Option.orElse(() =>
      pipe(
        getMapping(doc, "x-podman"),
        Option.flatMap((x) => getSequence(x, "pod_args")),
        Option.map(stringList)
      )
    ),
    Option.getOrElse(() => POD_ARGS_DEFAULT)
  );

// ============================================================================
// Project
// ============================================================================

const serviceMap = (doc: DocumentMapping): ReadonlyMap<string, DocumentMapping> =>
  new Map(
    Object.entries(Option.getOrElse(getMapping(doc, "services"), () => EMPTY_MAPPING)).map(
      ([name, svc]) => [name, isMapping(svc) ? svc : EMPTY_MAPPING] as const
    )
  );

export const loadProject = (options: LoadOptions): Loading<Project> =>
  Effect.gen(function* () {
    const files = yield* discoverFiles(options);
    const projectDir = dirname(Arr.headNonEmpty(files));
    const baseEnv = yield* assembleEnvironment(options, projectDir, files);

    const assembly = yield* assemble(files, { document: {}, files: [] }, projectDir, baseEnv);
    yield* Effect.logDebug(`loaded ${assembly.files.length} compose file(s) from ${projectDir}`);
    const document = normalizeFinal(activeServices(assembly.document, new Set(options.profiles)), projectDir);
    const hash = configHash(document);

    const name = yield* resolveProjectName(options.projectName, document, baseEnv, projectDir);
    const environment = layer(baseEnv, new Map([["COMPOSE_PROJECT_NAME", name]]));
    const ctx: ResolutionContext = {
      baseDir: projectDir,
      environment,
      pathSeparator: pathSeparatorOf(environment),
    };

    const definitions = serviceMap(document);
    if (definitions.size === 0) {
      yield* Effect.logWarning("no services defined");
    }
    const extended = yield* resolveExtends(definitions, ctx);
    const graph = yield* buildDependencyGraph(extended, "dependencies");
    const services: ReadonlyMap<string, ResolvedService> = new Map(
      Array.from(extended).map(([svcName, definition]): readonly [string, ResolvedService] => [
        svcName,
        {
          name: svcName,
          definition,
          deps: graph.deps.get(svcName) ?? HashSet.empty(),
          aliases: graph.aliases.get(svcName) ?? [],
        },
      ])
    );

    const networks = declaredNetworks(name, document);
    const unused = Option.isSome(getMapping(document, "networks"))
      ? unusedNetworks(extended.values(), networks)
      : [];
    if (unused.length > 0) {
      yield* Effect.logWarning(`unused networks: ${unused.join(", ")}`);
    }
    const volumes: ReadonlyMap<string, VolumeRecord> = new Map(
      Object.entries(Option.getOrElse(getMapping(document, "volumes"), () => EMPTY_MAPPING)).map(
        ([key, def]) => [key, declaredVolume(name, key, isMapping(def) ? def : EMPTY_MAPPING)] as const
      )
    );
    const pods: readonly PodRecord[] = inPodSetting(options, document)
      ? [podRecord(name, podArgsSetting(options, document))]
      : [];

    const containers = yield* buildContainers(services, orderServices(graph), {
      project: name,
      dir: projectDir,
      files: assembly.files,
      configHash: hash,
      home: environment.get("HOME") ?? projectDir,
      pod: Option.map(Arr.head(pods), (p) => p.name),
      networks,
      volumes,
    });

    return {
      name,
      dir: projectDir,
      files: assembly.files,
      environment,
      document,
      configHash: hash,
      services,
      containers,
      networks,
      volumes,
      pods,
    };
  });
