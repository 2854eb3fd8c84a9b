// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Reading compose YAML into the document model.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Either, Option, pipe } from "effect";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ConfigError, ErrorCode, errorMessage } from "../lib/errors";
import { type DocumentMapping, type DocumentNode, isMapping } from "./types";

/** Narrows parser output to the document model. Anything else (dates, binary) is None. */
export const toDocumentNode = (value: unknown): Option.Option<DocumentNode> => {
  if (value === null || value === undefined) {
    return Option.some(null);
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return Option.some(value);
  }
  if (Array.isArray(value)) {
    return Option.map(Option.all(value.map(toDocumentNode)), (items): DocumentNode => items);
  }
  if (typeof value === "object") {
    return Option.map(
      Option.all(
        Object.entries(value).map(([key, v]) =>
          Option.map(toDocumentNode(v), (node): readonly [string, DocumentNode] => [key, node])
        )
      ),
      (entries): DocumentNode => Object.fromEntries(entries)
    );
  }
  return Option.none();
};

export const parseDocument = (text: string, path: string): Either.Either<DocumentMapping, ConfigError> =>
  pipe(
    Either.try({
      try: (): unknown => parseYaml(text, { merge: true }),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse YAML in ${path}: ${errorMessage(e)}`,
          path,
          cause: e,
        }),
    }),
    Either.flatMap((raw) =>
      pipe(
        toDocumentNode(raw),
        Option.filter(isMapping),
        Either.fromOption(
          () =>
            new ConfigError({
              code: ErrorCode.CONFIG_VALIDATION_ERROR,
              message: `Compose file ${path} must contain a mapping at the top level`,
              path,
            })
        )
      )
    )
  );

export const readDocument = (
  path: string
): Effect.Effect<DocumentMapping, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* pipe(
      fs.readFileString(path),
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Failed to read ${path}: ${e.message}`,
            path,
            cause: e,
          })
      )
    );
    return yield* parseDocument(text, path);
  });

export const renderDocument = (doc: DocumentMapping): string => stringifyYaml(doc);
