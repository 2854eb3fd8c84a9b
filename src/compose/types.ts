// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Compose document model. Every loaded file becomes a tree of
 * {@link DocumentNode}s; the engine only ever rebuilds trees, it never
 * mutates them in place.
 */

import { Data, type HashSet, Option, pipe } from "effect";
import type { NodeKind } from "../lib/errors";
import type { ResolvedMount } from "./volumes";

// ============================================================================
// Document nodes
// ============================================================================

export type Scalar = string | number | boolean | null;

export interface DocumentSequence extends ReadonlyArray<DocumentNode> {}

export interface DocumentMapping {
  readonly [key: string]: DocumentNode;
}

export type DocumentNode = Scalar | DocumentSequence | DocumentMapping;

export const isSequence = (node: DocumentNode | undefined): node is DocumentSequence =>
  Array.isArray(node);

export const isMapping = (node: DocumentNode | undefined): node is DocumentMapping =>
  typeof node === "object" && node !== null && !Array.isArray(node);

export const kindOf = (node: DocumentNode): NodeKind =>
  isSequence(node) ? "sequence" : isMapping(node) ? "mapping" : "scalar";

export const EMPTY_MAPPING: DocumentMapping = {};

/** Typed lookups used throughout normalization and resolution. */
export const getMapping = (
  doc: DocumentMapping,
  key: string
): Option.Option<DocumentMapping> => pipe(Option.fromNullable(doc[key]), Option.filter(isMapping));

export const getSequence = (
  doc: DocumentMapping,
  key: string
): Option.Option<DocumentSequence> =>
  pipe(Option.fromNullable(doc[key]), Option.filter(isSequence));

export const getString = (doc: DocumentMapping, key: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(doc[key]),
    Option.filter((v): v is string => typeof v === "string")
  );

/** Strings and numbers both render as strings; compose files use either for ports or timeouts. */
export const getText = (doc: DocumentMapping, key: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(doc[key]),
    Option.filter((v): v is string | number => typeof v === "string" || typeof v === "number"),
    Option.map(String)
  );

export const getBoolean = (doc: DocumentMapping, key: string): boolean => doc[key] === true;

export const scalarToString = (value: Scalar): Option.Option<string> =>
  value === null ? Option.none() : Option.some(String(value));

export const stringList = (seq: DocumentSequence): readonly string[] =>
  seq.filter((v): v is string | number => typeof v === "string" || typeof v === "number").map(String);

export const withoutKeys = (doc: DocumentMapping, ...keys: readonly string[]): DocumentMapping =>
  Object.fromEntries(Object.entries(doc).filter(([k]) => !keys.includes(k)));

// ============================================================================
// Resolution context
// ============================================================================

/** Ordered variable scope; insertion order follows assembly order. */
export type Environment = ReadonlyMap<string, string>;

/** Everything a resolution step may read from the outside world, passed explicitly. */
export interface ResolutionContext {
  readonly baseDir: string;
  readonly environment: Environment;
  readonly pathSeparator: string;
}

// ============================================================================
// Dependency graph
// ============================================================================

export const DEPENDENCY_CONDITIONS = [
  "configured",
  "created",
  "exited",
  "healthy",
  "initialized",
  "paused",
  "removing",
  "running",
  "stopped",
  "stopping",
  "unhealthy",
] as const;

export type DependencyCondition = (typeof DEPENDENCY_CONDITIONS)[number];

/** `(target service, condition)`; structural equality lets HashSet dedupe edges. */
export class DependencyEdge extends Data.Class<{
  readonly name: string;
  readonly condition: DependencyCondition;
}> {}

export interface ResolvedService {
  readonly name: string;
  readonly definition: DocumentMapping;
  readonly deps: HashSet.HashSet<DependencyEdge>;
  /** Extra network aliases registered through `links: [name:alias]`. */
  readonly aliases: readonly string[];
}

// ============================================================================
// Project
// ============================================================================

/** One network attachment of a container. */
export interface NetworkAttachment {
  readonly network: NetworkRecord;
  readonly aliases: readonly string[];
  readonly ipv4Address: Option.Option<string>;
  readonly ipv6Address: Option.Option<string>;
}

export interface ContainerRecord {
  readonly name: string;
  readonly service: string;
  readonly number: number;
  readonly image: string;
  readonly definition: DocumentMapping;
  readonly labels: readonly string[];
  readonly deps: HashSet.HashSet<DependencyEdge>;
  readonly aliases: readonly string[];
  readonly pod: Option.Option<string>;
  readonly mounts: readonly ResolvedMount[];
  readonly networks: readonly NetworkAttachment[];
  /** `network_mode` other than bridge attachment (`host`, `none`, `container:x`, ...). */
  readonly networkMode: Option.Option<string>;
}

export interface NetworkRecord {
  /** Key under the top-level `networks:` mapping. */
  readonly key: string;
  /** Name the container tool knows the network by. */
  readonly name: string;
  readonly external: boolean;
  readonly definition: DocumentMapping;
}

export interface VolumeRecord {
  readonly key: string;
  readonly name: string;
  readonly external: boolean;
  readonly definition: DocumentMapping;
}

export interface PodRecord {
  readonly name: string;
  readonly labels: readonly string[];
  /** Extra `pod create` arguments. */
  readonly args: readonly string[];
}

export interface Project {
  readonly name: string;
  readonly dir: string;
  readonly files: readonly string[];
  readonly environment: Environment;
  readonly document: DocumentMapping;
  readonly configHash: string;
  readonly services: ReadonlyMap<string, ResolvedService>;
  readonly containers: readonly ContainerRecord[];
  readonly networks: ReadonlyMap<string, NetworkRecord>;
  readonly volumes: ReadonlyMap<string, VolumeRecord>;
  readonly pods: readonly PodRecord[];
}

export const containersOf = (project: Project, service: string): readonly ContainerRecord[] =>
  project.containers.filter((c) => c.service === service);
