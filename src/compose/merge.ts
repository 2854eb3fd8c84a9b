// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Layered document merge. Later layers win: mappings merge key by key,
 * sequences append, scalars overwrite. A few keys use a named strategy
 * instead; see {@link KEY_STRATEGIES}.
 */

import { Array as Arr, Either, Option, pipe } from "effect";
import { ErrorCode, MergeTypeError } from "../lib/errors";
import {
  type DocumentMapping,
  type DocumentNode,
  type DocumentSequence,
  isMapping,
  isSequence,
  kindOf,
} from "./types";
import { shortMountTarget } from "./volumes";

type MergeStrategy = "replace" | "mountTargetDedup";

/** Keys that never merge structurally. Everything else uses the default rules. */
const KEY_STRATEGIES: Readonly<Record<string, MergeStrategy>> = {
  command: "replace",
  entrypoint: "replace",
  volumes: "mountTargetDedup",
};

const strategyFor = (key: string): Option.Option<MergeStrategy> =>
  Option.fromNullable(KEY_STRATEGIES[key]);

/** Container path a volume entry mounts at, for short and long (`target:`) entries. */
export const mountTarget = (entry: DocumentNode): Option.Option<string> => {
  if (typeof entry === "string") {
    return shortMountTarget(entry);
  }
  return isMapping(entry)
    ? pipe(
        Option.fromNullable(entry["target"]),
        Option.filter((t): t is string => typeof t === "string")
      )
    : Option.none();
};

/** Appends `incoming`, first dropping existing entries that mount at one of its targets. */
const mergeMounts = (existing: DocumentSequence, incoming: DocumentSequence): DocumentSequence => {
  const replaced = new Set(Arr.getSomes(incoming.map(mountTarget)));
  const kept = existing.filter((entry) =>
    Option.match(mountTarget(entry), {
      onNone: (): boolean => true,
      onSome: (target): boolean => !replaced.has(target),
    })
  );
  return [...kept, ...incoming];
};

type MergeResult = Either.Either<DocumentMapping, MergeTypeError>;

const start = (doc: DocumentMapping): MergeResult => Either.right(doc);

const mergeValue = (
  path: readonly string[],
  key: string,
  target: DocumentNode,
  source: DocumentNode
): Either.Either<DocumentNode, MergeTypeError> => {
  const strategy = strategyFor(key);
  if (Option.contains(strategy, "replace")) {
    return Either.right(source);
  }
  // null on either side is an unset layer value, not a shape
  if (target === null || source === null) {
    return Either.right(source);
  }
  if (isSequence(target) && isSequence(source)) {
    return Either.right(
      Option.contains(strategy, "mountTargetDedup")
        ? mergeMounts(target, source)
        : [...target, ...source]
    );
  }
  if (isMapping(target) && isMapping(source)) {
    return mergeAt([...path, key], target, source);
  }
  const targetKind = kindOf(target);
  const sourceKind = kindOf(source);
  if (targetKind !== sourceKind) {
    const where = [...path, key].join(".");
    return Either.left(
      new MergeTypeError({
        code: ErrorCode.CONFIG_MERGE_ERROR,
        message: `cannot merge ${where}: ${targetKind} with ${sourceKind}`,
        key: where,
        targetKind,
        sourceKind,
      })
    );
  }
  return Either.right(source);
};

const mergeAt = (
  path: readonly string[],
  target: DocumentMapping,
  source: DocumentMapping
): Either.Either<DocumentMapping, MergeTypeError> =>
  Arr.reduce(Object.entries(source), start(target), (acc, [key, value]) =>
    Either.flatMap(acc, (merged): MergeResult => {
      const existing = merged[key];
      return existing === undefined
        ? Either.right({ ...merged, [key]: value })
        : Either.map(mergeValue(path, key, existing, value), (v) => ({ ...merged, [key]: v }));
    })
  );

/** Merge one layer onto another. Neither input is modified. */
export const merge = (
  target: DocumentMapping,
  source: DocumentMapping
): Either.Either<DocumentMapping, MergeTypeError> => mergeAt([], target, source);

/** Left fold of {@link merge} over the layers, starting from an empty mapping. */
export const mergeAll = (
  ...layers: readonly DocumentMapping[]
): Either.Either<DocumentMapping, MergeTypeError> =>
  Arr.reduce(layers, start({}), (acc, layer) => Either.flatMap(acc, (m) => merge(m, layer)));
