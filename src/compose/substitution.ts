// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Variable interpolation for compose documents.
 *
 * Supported forms: `$$`, `$NAME`, `${NAME}`, `${NAME:-default}`,
 * `${NAME-default}`, `${NAME:?message}` and `${NAME?message}`.
 * Malformed `${...}` text does not match and stays literal. Defaults are
 * inserted verbatim, never expanded a second time.
 */

import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import { ErrorCode, SubstitutionError } from "../lib/errors";
import {
  type DocumentMapping,
  type DocumentNode,
  type Environment,
  isMapping,
  isSequence,
  scalarToString,
} from "./types";

const VARIABLE_PATTERN =
  /\$(?:(?<escaped>\$)|(?<named>[_a-zA-Z][_a-zA-Z0-9]*)|(?:\{(?<braced>[_a-zA-Z][_a-zA-Z0-9]*)(?:(?<empty>:)?(?:(?:-(?<default>[^}]*))|(?:\?(?<err>[^}]*))))?\}))/g;

interface MatchGroups {
  readonly escaped?: string;
  readonly named?: string;
  readonly braced?: string;
  readonly empty?: string;
  readonly default?: string;
  readonly err?: string;
}

const expand = (
  groups: MatchGroups,
  env: Environment
): Either.Either<string, SubstitutionError> => {
  if (groups.escaped !== undefined) {
    return Either.right("$");
  }
  const name = groups.named ?? groups.braced ?? "";
  const value = pipe(
    Option.fromNullable(env.get(name)),
    // `:` treats an empty binding as absent
    Option.filter((v) => !(v === "" && groups.empty !== undefined))
  );
  return Option.match(value, {
    onSome: (v): Either.Either<string, SubstitutionError> => Either.right(v),
    onNone: (): Either.Either<string, SubstitutionError> =>
      groups.err === undefined
        ? Either.right(groups.default ?? "")
        : Either.left(
            new SubstitutionError({
              code: ErrorCode.SUBSTITUTION_FAILED,
              message: groups.err === "" ? `required variable ${name} is missing a value` : groups.err,
              variable: name,
            })
          ),
  });
};

interface Cursor {
  readonly out: string;
  readonly last: number;
}

/** Expands every variable reference in one string, left to right. */
export const substituteString = (
  text: string,
  env: Environment
): Either.Either<string, SubstitutionError> => {
  const matches = Array.from(text.matchAll(VARIABLE_PATTERN));
  const initial: Either.Either<Cursor, SubstitutionError> = Either.right({ out: "", last: 0 });
  return pipe(
    matches,
    Arr.reduce(initial, (acc, m) =>
      Either.flatMap(acc, ({ out, last }): Either.Either<Cursor, SubstitutionError> => {
        const index = m.index ?? 0;
        return Either.map(expand(m.groups ?? {}, env), (replacement) => ({
          out: out + text.slice(last, index) + replacement,
          last: index + m[0].length,
        }));
      })
    ),
    Either.map(({ out, last }) => out + text.slice(last))
  );
};

/**
 * Layers a mapping's own `environment` entries over the scope: entries not
 * already bound are added, expanded against that scope, and added again so
 * siblings can reference each other.
 */
export const scopeWithEnvironment = (
  env: Environment,
  environment: DocumentMapping
): Either.Either<Environment, SubstitutionError> => {
  const local = Object.entries(environment).filter(([key]) => !env.has(key));
  const bind = (base: Environment, entries: ReadonlyArray<readonly [string, DocumentNode]>): Environment =>
    new Map([
      ...base,
      ...entries.flatMap(([key, value]): Array<[string, string]> =>
        isSequence(value) || isMapping(value)
          ? []
          : Option.match(scalarToString(value), {
              onNone: (): Array<[string, string]> => [],
              onSome: (s): Array<[string, string]> => [[key, s]],
            })
      ),
    ]);
  const seeded = bind(env, local);
  return pipe(
    Either.all(
      local.map(([key, value]) =>
        Either.map(substituteNode(value, seeded), (expanded): readonly [string, DocumentNode] => [
          key,
          expanded,
        ])
      )
    ),
    Either.map((expanded) => bind(seeded, expanded))
  );
};

const substituteNode = (
  node: DocumentNode,
  env: Environment
): Either.Either<DocumentNode, SubstitutionError> => {
  if (typeof node === "string") {
    return substituteString(node, env);
  }
  if (isSequence(node)) {
    return Either.all(node.map((item) => substituteNode(item, env)));
  }
  if (isMapping(node)) {
    const environment = node["environment"];
    const scope: Either.Either<Environment, SubstitutionError> = isMapping(environment)
      ? scopeWithEnvironment(env, environment)
      : Either.right(env);
    return Either.flatMap(scope, (scoped) =>
      Either.map(
        Either.all(
          Object.entries(node).map(([key, value]) =>
            Either.map(substituteNode(value, scoped), (v): readonly [string, DocumentNode] => [key, v])
          )
        ),
        (entries): DocumentMapping => Object.fromEntries(entries)
      )
    );
  }
  return Either.right(node);
};

/** Pure form, for callers that are not running inside an Effect. */
export const substituteEither: (
  node: DocumentNode,
  env: Environment
) => Either.Either<DocumentNode, SubstitutionError> = substituteNode;

export const substitute = (
  node: DocumentNode,
  env: Environment
): Effect.Effect<DocumentNode, SubstitutionError> => Either.match(substituteNode(node, env), {
  onLeft: (e): Effect.Effect<DocumentNode, SubstitutionError> => Effect.fail(e),
  onRight: (v): Effect.Effect<DocumentNode, SubstitutionError> => Effect.succeed(v),
});

/** Substitution over a whole mapping keeps it a mapping. */
export const substituteMapping = (
  doc: DocumentMapping,
  env: Environment
): Effect.Effect<DocumentMapping, SubstitutionError> =>
  Effect.map(substitute(doc, env), (node) => (isMapping(node) ? node : doc));
