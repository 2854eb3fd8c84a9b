// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `extends` resolution. Each extending service becomes
 * `mergeAll({}, base, service)`. Same-file bases are taken as already
 * resolved at the time the service is processed; processing follows the
 * extends-ordering of the dependency graph so bases usually come first.
 * A missing base is an empty mapping.
 */

import type { FileSystem } from "@effect/platform";
import { dirname, resolve } from "node:path";
import { Effect, Option, pipe } from "effect";
import type { ResolutionError } from "../lib/errors";
import { buildDependencyGraph, orderServices } from "./dependencies";
import { readDocument } from "./document";
import { mergeAll } from "./merge";
import { absoluteBuildContext, normalizeService } from "./normalize";
import { substituteMapping } from "./substitution";
import {
  type DocumentMapping,
  type ResolutionContext,
  getMapping,
  getString,
  withoutKeys,
} from "./types";

type Services = ReadonlyMap<string, DocumentMapping>;

/**
 * Base service from another compose file, substituted and normalized relative
 * to that file. Its build context ends up absolute like every other service's.
 */
const loadExternalBase = (
  file: string,
  baseName: string,
  ctx: ResolutionContext
): Effect.Effect<DocumentMapping, ResolutionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const doc = yield* readDocument(resolve(ctx.baseDir, file));
    const services = Option.getOrElse(getMapping(doc, "services"), () => doc);
    const raw = Option.getOrElse(getMapping(services, baseName), (): DocumentMapping => ({}));
    const substituted = yield* substituteMapping(raw, ctx.environment);
    const normalized = yield* normalizeService(substituted, Option.some(dirname(file)));
    return withoutKeys(absoluteBuildContext(normalized, ctx.baseDir), "extends");
  });

const resolveOne = (
  current: Services,
  name: string,
  ctx: ResolutionContext
): Effect.Effect<Services, ResolutionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const service = current.get(name);
    const reference = pipe(
      Option.fromNullable(service),
      Option.flatMap((svc) => getMapping(svc, "extends"))
    );
    if (service === undefined || Option.isNone(reference)) {
      return current;
    }
    const baseName = getString(reference.value, "service");
    if (Option.isNone(baseName)) {
      return current;
    }
    const file = getString(reference.value, "file");
    if (Option.isNone(file) && baseName.value === name) {
      yield* Effect.logDebug(`service ${name} extends itself; ignoring`);
      return current;
    }
    const base = yield* Option.match(file, {
      onSome: (f): Effect.Effect<DocumentMapping, ResolutionError, FileSystem.FileSystem> =>
        loadExternalBase(f, baseName.value, ctx),
      onNone: (): Effect.Effect<DocumentMapping> =>
        Effect.succeed(withoutKeys(current.get(baseName.value) ?? {}, "extends")),
    });
    const merged = yield* mergeAll({}, base, withoutKeys(service, "extends"));
    return new Map(current).set(name, merged);
  });

export const resolveExtends = (
  services: Services,
  ctx: ResolutionContext
): Effect.Effect<Services, ResolutionError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const graph = yield* buildDependencyGraph(services, "extends");
    return yield* Effect.reduce(orderServices(graph), services, (current, name) =>
      resolveOne(current, name, ctx)
    );
  });
