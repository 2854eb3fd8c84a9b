// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML tool configuration loading with fail-fast validation. An explicit
 * `--tool-config` path must exist; the default location under the XDG
 * config home is optional.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Option, type Schema, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, errorMessage } from "../lib/errors";
import { decodeToEffect } from "../lib/schema-utils";
import { EMPTY_TOOL_CONFIG, type ToolConfig, ToolConfigSchema } from "./schema";

export const loadTomlFile = <A, I>(
  filePath: string,
  schema: Schema.Schema<A, I, never>
): Effect.Effect<A, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const content = yield* pipe(
      fs.readFileString(filePath),
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${e.message}`,
            path: filePath,
            cause: e,
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          cause: e,
        }),
    });

    return yield* decodeToEffect(schema, parsed, filePath);
  });

export const defaultToolConfigPath = (configHome: string): string =>
  `${configHome}/podcompose/config.toml`;

export const loadToolConfig = (
  explicitPath: Option.Option<string>,
  configHome: string
): Effect.Effect<ToolConfig, ConfigError, FileSystem.FileSystem> =>
  Option.match(explicitPath, {
    onSome: (p): Effect.Effect<ToolConfig, ConfigError, FileSystem.FileSystem> =>
      loadTomlFile(p, ToolConfigSchema),
    onNone: (): Effect.Effect<ToolConfig, ConfigError, FileSystem.FileSystem> =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const path = defaultToolConfigPath(configHome);
        const exists = yield* pipe(
          fs.exists(path),
          Effect.orElseSucceed(() => false)
        );
        return exists ? yield* loadTomlFile(path, ToolConfigSchema) : EMPTY_TOOL_CONFIG;
      }),
  });
