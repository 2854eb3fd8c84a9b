// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Service dependency graph.
 *
 * Direct edges come from `depends_on` and `links`. Each service's edge set is
 * then closed transitively; an expansion that would revisit a service already
 * on the current path is cut there, so cycles bound the closure instead of
 * failing it, and no service ever depends on itself.
 */

import { Array as Arr, Effect, Either, HashSet, Option, Order, pipe } from "effect";
import { ConfigError, ErrorCode, type UnresolvedReferenceError, unresolvedReference } from "../lib/errors";
import {
  DEPENDENCY_CONDITIONS,
  type DependencyCondition,
  DependencyEdge,
  type DocumentMapping,
  getMapping,
  getString,
  isMapping,
  isSequence,
} from "./types";

// ============================================================================
// Conditions
// ============================================================================

const CONDITION_ALIASES: Readonly<Record<string, DependencyCondition>> = {
  service_healthy: "healthy",
  service_started: "running",
  service_completed_successfully: "stopped",
};

const isCondition = (raw: string): raw is DependencyCondition =>
  DEPENDENCY_CONDITIONS.some((c) => c === raw);

export const parseCondition = (raw: string): Either.Either<DependencyCondition, ConfigError> =>
  pipe(
    Option.fromNullable(CONDITION_ALIASES[raw]),
    Option.orElse(() => (isCondition(raw) ? Option.some(raw) : Option.none())),
    Either.fromOption(
      () =>
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `unknown dependency condition: ${raw}`,
        })
    )
  );

// ============================================================================
// Direct edges
// ============================================================================

/**
 * `dependencies` reads `depends_on` and `links`. `extends` additionally gives
 * every extending service a single edge to its same-file base, used only to
 * order extension resolution.
 */
export type GraphMode = "dependencies" | "extends";

type EdgeSet = HashSet.HashSet<DependencyEdge>;

interface DirectGraph {
  readonly edges: ReadonlyMap<string, EdgeSet>;
  readonly aliases: ReadonlyMap<string, readonly string[]>;
}

type GraphError = ConfigError | UnresolvedReferenceError;

const linkEntries = (service: DocumentMapping): readonly string[] => {
  const links = service["links"];
  if (typeof links === "string") {
    return [links];
  }
  return isSequence(links) ? links.filter((l): l is string => typeof l === "string") : [];
};

const extendsBase = (service: DocumentMapping): Option.Option<string> =>
  pipe(
    getMapping(service, "extends"),
    Option.filter((ext) => ext["file"] === undefined || ext["file"] === null),
    Option.flatMap((ext) => getString(ext, "service"))
  );

/** Unknown targets fail only once the service set is final. */
type TargetCheck = (target: string, referrer: string) => Either.Either<string, GraphError>;

const dependsOnEdges = (
  name: string,
  service: DocumentMapping,
  check: TargetCheck
): Either.Either<readonly DependencyEdge[], GraphError> =>
  Either.all(
    Object.entries(Option.getOrElse(getMapping(service, "depends_on"), () => ({}))).map(
      ([target, spec]): Either.Either<DependencyEdge, GraphError> =>
        Either.flatMap(check(target, `service ${name} depends_on`), () =>
          Either.map(
            parseCondition(
              isMapping(spec) && typeof spec["condition"] === "string" ? spec["condition"] : "running"
            ),
            (condition) => new DependencyEdge({ name: target, condition })
          )
        )
    )
  );

const linkEdges = (
  name: string,
  service: DocumentMapping,
  check: TargetCheck
): Either.Either<readonly DependencyEdge[], GraphError> =>
  Either.all(
    linkEntries(service).map(
      (link): Either.Either<DependencyEdge, GraphError> =>
        Either.map(
          check(link.split(":")[0] ?? link, `service ${name} links`),
          (target) => new DependencyEdge({ name: target, condition: "running" })
        )
    )
  );

const linkAliases = (services: ReadonlyMap<string, DocumentMapping>): ReadonlyMap<string, readonly string[]> =>
  pipe(
    Array.from(services.values()).flatMap(linkEntries),
    Arr.filterMap((link) => {
      const [target, alias] = link.split(":");
      return target !== undefined && alias !== undefined && alias !== ""
        ? Option.some([target, alias] as const)
        : Option.none();
    }),
    Arr.reduce(new Map<string, readonly string[]>(), (acc, [target, alias]) =>
      new Map(acc).set(target, Arr.dedupe([...(acc.get(target) ?? []), alias]))
    )
  );

export const directEdges = (
  services: ReadonlyMap<string, DocumentMapping>,
  mode: GraphMode
): Either.Either<DirectGraph, GraphError> => {
  const check: TargetCheck = (target, referrer) =>
    mode === "extends" || services.has(target)
      ? Either.right(target)
      : Either.left(unresolvedReference("service", target, referrer));
  const edgesOf = (name: string, service: DocumentMapping): Either.Either<EdgeSet, GraphError> => {
    if (mode === "extends" && Option.isSome(getMapping(service, "extends"))) {
      return Either.right(
        Option.match(extendsBase(service), {
          onNone: (): EdgeSet => HashSet.empty(),
          onSome: (base): EdgeSet =>
            base === name
              ? HashSet.empty()
              : HashSet.make(new DependencyEdge({ name: base, condition: "running" })),
        })
      );
    }
    return Either.map(
      Either.all([dependsOnEdges(name, service, check), linkEdges(name, service, check)]),
      ([deps, links]) => HashSet.fromIterable([...deps, ...links])
    );
  };
  return Either.map(
    Either.all(
      Array.from(services.entries()).map(([name, service]) =>
        Either.map(edgesOf(name, service), (edges) => [name, edges] as const)
      )
    ),
    (entries): DirectGraph => ({ edges: new Map(entries), aliases: linkAliases(services) })
  );
};

// ============================================================================
// Closure
// ============================================================================

export interface SuppressedEdge {
  readonly from: string;
  readonly to: string;
}

interface Expansion {
  readonly edges: EdgeSet;
  readonly suppressed: readonly SuppressedEdge[];
}

const expand = (
  graph: ReadonlyMap<string, EdgeSet>,
  name: string,
  path: ReadonlySet<string>
): Expansion => {
  const direct = graph.get(name) ?? HashSet.empty<DependencyEdge>();
  const initial: Expansion = { edges: direct, suppressed: [] };
  return Arr.reduce(Array.from(direct), initial, (acc, edge): Expansion => {
    if (path.has(edge.name)) {
      return { ...acc, suppressed: [...acc.suppressed, { from: name, to: edge.name }] };
    }
    if (!graph.has(edge.name)) {
      return acc;
    }
    const inner = expand(graph, edge.name, new Set([...path, edge.name]));
    return {
      edges: HashSet.union(acc.edges, inner.edges),
      suppressed: [...acc.suppressed, ...inner.suppressed],
    };
  });
};

/** Transitive dependencies of one service, without any edge back to it. */
export const closure = (graph: ReadonlyMap<string, EdgeSet>, start: string): Expansion => {
  const { edges, suppressed } = expand(graph, start, new Set([start]));
  return { edges: HashSet.filter(edges, (e) => e.name !== start), suppressed };
};

// ============================================================================
// Graph
// ============================================================================

export interface ServiceGraph {
  readonly deps: ReadonlyMap<string, EdgeSet>;
  readonly aliases: ReadonlyMap<string, readonly string[]>;
}

export const buildDependencyGraph = (
  services: ReadonlyMap<string, DocumentMapping>,
  mode: GraphMode
): Effect.Effect<ServiceGraph, GraphError> =>
  Effect.gen(function* () {
    const direct = yield* directEdges(services, mode);
    const closed = Array.from(direct.edges.keys()).map((name) => [name, closure(direct.edges, name)] as const);
    const suppressed = Arr.dedupeWith(
      closed.flatMap(([, c]) => c.suppressed),
      (a, b) => a.from === b.from && a.to === b.to
    );
    yield* Effect.forEach(suppressed, (s) =>
      Effect.logDebug(`dependency cycle: not following ${s.from} -> ${s.to}`)
    );
    return {
      deps: new Map(closed.map(([name, c]) => [name, c.edges] as const)),
      aliases: direct.aliases,
    };
  });

const byDependencyCount = (graph: ServiceGraph): Order.Order<string> =>
  Order.combine(
    Order.mapInput(Order.number, (name: string) =>
      HashSet.size(graph.deps.get(name) ?? HashSet.empty<DependencyEdge>())
    ),
    Order.string
  );

/** Services ordered by how many services they transitively need, then by name. */
export const orderServices = (graph: ServiceGraph): readonly string[] =>
  Arr.sort(Array.from(graph.deps.keys()), byDependencyCount(graph));

export const dependencyNames = (graph: ServiceGraph, service: string): readonly string[] =>
  Array.from(graph.deps.get(service) ?? HashSet.empty<DependencyEdge>()).map((e) => e.name);
