// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Canonical shapes for fields that compose files may spell several ways.
 * Each field family has exactly one normalizer, applied once per file before
 * merging, so everything downstream sees a single shape:
 *
 * - scalar-or-list (`env_file`, `security_opt`, `volumes`) becomes a list
 * - list-or-mapping (`environment`, `labels`) becomes a mapping
 * - `depends_on` becomes `{service: {condition}}`
 * - string `command`/`entrypoint` become word lists
 */

import { join, normalize, resolve } from "node:path";
import { Array as Arr, Either, Option, pipe } from "effect";
import { ConfigError, ErrorCode } from "../lib/errors";
import { split } from "../lib/shlex";
import {
  type DocumentMapping,
  type DocumentNode,
  getMapping,
  getString,
  isMapping,
  isSequence,
} from "./types";

type Normalized<A> = Either.Either<A, ConfigError>;

const invalid = (message: string): ConfigError =>
  new ConfigError({ code: ErrorCode.CONFIG_VALIDATION_ERROR, message });

// ============================================================================
// Field families
// ============================================================================

/** `KEY=VAL` and bare `KEY` entries, or a mapping, as a mapping (`KEY` maps to null). */
export const normAsDict = (node: DocumentNode | undefined, field: string): Normalized<DocumentMapping> => {
  if (node === undefined || node === null) {
    return Either.right({});
  }
  if (isMapping(node)) {
    return Either.right(node);
  }
  const pair = (entry: string): readonly [string, DocumentNode] => {
    const at = entry.indexOf("=");
    return at === -1 ? [entry, null] : [entry.slice(0, at), entry.slice(at + 1)];
  };
  if (isSequence(node)) {
    const entries = node.filter((e): e is string => typeof e === "string" && e !== "");
    return entries.length === node.filter((e) => e !== "" && e !== null).length
      ? Either.right(Object.fromEntries(entries.map(pair)))
      : Either.left(invalid(`${field} entries must be strings`));
  }
  if (typeof node === "string") {
    return Either.right(Object.fromEntries([pair(node)]));
  }
  return Either.left(invalid(`${field} must be a mapping or a list`));
};

/** A lone string becomes a one-element list. */
const normAsList = (node: DocumentNode): DocumentNode => (typeof node === "string" ? [node] : node);

const splitCommand = (node: DocumentNode, field: string): Normalized<DocumentNode> =>
  typeof node === "string"
    ? Option.match(split(node), {
        onNone: (): Normalized<DocumentNode> => Either.left(invalid(`${field}: unbalanced quoting in ${node}`)),
        onSome: (words): Normalized<DocumentNode> => Either.right(words),
      })
    : Either.right(node);

const UNCONFINED_OPTIONS: ReadonlySet<string> = new Set(["seccomp:unconfined", "apparmor:unconfined"]);

const normSecurityOpt = (node: DocumentNode): DocumentNode =>
  isSequence(node)
    ? node.map((opt) => (typeof opt === "string" && UNCONFINED_OPTIONS.has(opt) ? opt.replace(":", "=") : opt))
    : node;

const normDependsOn = (node: DocumentNode): Normalized<DocumentMapping> => {
  const started = (): DocumentMapping => ({ condition: "running" });
  if (typeof node === "string") {
    return Either.right({ [node]: started() });
  }
  if (isSequence(node)) {
    const names = node.filter((n): n is string => typeof n === "string");
    return names.length === node.length
      ? Either.right(Object.fromEntries(names.map((n) => [n, started()])))
      : Either.left(invalid("depends_on entries must be service names"));
  }
  if (isMapping(node)) {
    return Either.right(
      Object.fromEntries(
        Object.entries(node).map(([name, spec]): [string, DocumentNode] => [
          name,
          isMapping(spec) ? { ...started(), ...spec } : started(),
        ])
      )
    );
  }
  return Either.left(invalid("depends_on must be a name, a list or a mapping"));
};

// ============================================================================
// Build section
// ============================================================================

/** Relative build context re-rooted under the directory of the file that declared it. */
const prefixContext = (context: string, subDir: string): string => {
  const relative = context.startsWith("./") ? context.slice(2) : context;
  const joined = join(subDir, relative).replace(/\/+$/, "");
  return joined === "" ? "." : joined;
};

const normBuild = (node: DocumentNode, subDir: Option.Option<string>): DocumentNode => {
  const build: DocumentNode = typeof node === "string" ? { context: node } : node;
  if (!isMapping(build)) {
    return build;
  }
  const withContext = Option.match(subDir, {
    onNone: (): DocumentMapping => build,
    onSome: (dir): DocumentMapping => ({
      ...build,
      context: prefixContext(Option.getOrElse(getString(build, "context"), () => ""), dir),
    }),
  });
  return pipe(
    getMapping(withContext, "additional_contexts"),
    Option.match({
      onNone: (): DocumentMapping => withContext,
      onSome: (contexts): DocumentMapping => ({
        ...withContext,
        additional_contexts: Object.entries(contexts).map(([k, v]) => `${k}=${String(v)}`),
      }),
    })
  );
};

// ============================================================================
// Service and document
// ============================================================================

type FieldNormalizer = (node: DocumentNode, subDir: Option.Option<string>) => Normalized<DocumentNode>;

const lift =
  (f: (node: DocumentNode) => DocumentNode): FieldNormalizer =>
  (node) =>
    Either.right(f(node));

const FIELD_NORMALIZERS: Readonly<Record<string, FieldNormalizer>> = {
  build: (node, subDir) => Either.right(normBuild(node, subDir)),
  command: (node) => splitCommand(node, "command"),
  entrypoint: (node) => splitCommand(node, "entrypoint"),
  env_file: lift(normAsList),
  volumes: lift(normAsList),
  security_opt: lift((node) => normSecurityOpt(normAsList(node))),
  environment: (node) => normAsDict(node, "environment"),
  labels: (node) => normAsDict(node, "labels"),
  extends: lift((node) => (typeof node === "string" ? { service: node } : node)),
  depends_on: (node) => normDependsOn(node),
};

/**
 * Canonicalize one service definition. `subDir` is the directory of the file
 * the service came from, relative to the project, when that is not the project
 * directory itself.
 */
export const normalizeService = (
  service: DocumentMapping,
  subDir: Option.Option<string> = Option.none()
): Normalized<DocumentMapping> =>
  pipe(
    Either.all(
      Object.entries(service).map(([key, value]) =>
        pipe(
          Option.fromNullable(FIELD_NORMALIZERS[key]),
          Option.match({
            onNone: (): Normalized<DocumentNode> => Either.right(value),
            onSome: (normalizer): Normalized<DocumentNode> => normalizer(value, subDir),
          }),
          Either.map((v): readonly [string, DocumentNode] => [key, v])
        )
      )
    ),
    Either.map((entries): DocumentMapping => Object.fromEntries(entries))
  );

/** Normalize every service of a parsed compose file. */
export const normalizeDocument = (
  doc: DocumentMapping,
  subDir: Option.Option<string> = Option.none()
): Normalized<DocumentMapping> =>
  Option.match(getMapping(doc, "services"), {
    onNone: (): Normalized<DocumentMapping> => Either.right(doc),
    onSome: (services): Normalized<DocumentMapping> =>
      pipe(
        Either.all(
          Object.entries(services).map(([name, svc]) =>
            Either.map(
              normalizeService(isMapping(svc) ? svc : {}, subDir),
              (normalized): readonly [string, DocumentNode] => [name, normalized]
            )
          )
        ),
        Either.map((entries): DocumentMapping => ({ ...doc, services: Object.fromEntries(entries) }))
      ),
  });

/** Make one service's build context an absolute path under `projectDir`. */
export const absoluteBuildContext = (service: DocumentMapping, projectDir: string): DocumentMapping => {
  const build = service["build"];
  if (!isMapping(build)) {
    return service;
  }
  const context = Option.getOrElse(getString(build, "context"), () => ".");
  return { ...service, build: { ...build, context: normalize(resolve(projectDir, context)) } };
};

/** Resolve every service's build context to an absolute path under the project directory. */
export const normalizeFinal = (doc: DocumentMapping, projectDir: string): DocumentMapping =>
  Option.match(getMapping(doc, "services"), {
    onNone: (): DocumentMapping => doc,
    onSome: (services): DocumentMapping => ({
      ...doc,
      services: Object.fromEntries(
        Object.entries(services).map(([name, svc]): [string, DocumentNode] => [
          name,
          isMapping(svc) ? absoluteBuildContext(svc, projectDir) : svc,
        ])
      ),
    }),
  });

/** Services named in a `profiles` filter; a service without profiles is always active. */
export const isServiceActive = (service: DocumentMapping, profiles: ReadonlySet<string>): boolean =>
  Option.match(
    pipe(
      Option.fromNullable(service["profiles"]),
      Option.filter(isSequence),
      Option.filter((p) => p.length > 0)
    ),
    {
      onNone: (): boolean => true,
      onSome: (declared): boolean => Arr.some(declared, (p) => typeof p === "string" && profiles.has(p)),
    }
  );
