// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; they are only yielded at the
 * application boundary (CLI), so tests can swap the ConfigProvider.
 */

import { Config, ConfigProvider, Option } from "effect";
import type { LogFormat, LogLevel } from "./field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "./field-values";

// ============================================================================
// Primitive Configs
// ============================================================================

/** Log level with PODCOMPOSE_ namespace. None when unset so lower layers can apply. */
export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.option),
  "PODCOMPOSE"
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.option),
  "PODCOMPOSE"
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "PODCOMPOSE"
);

export const PodmanPathConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.string("PODMAN_PATH").pipe(Config.option),
  "PODCOMPOSE"
);

/** Same variable docker compose reads; must be a positive integer. */
export const ParallelLimitConfig: Config.Config<Option.Option<number>> = Config.integer(
  "COMPOSE_PARALLEL_LIMIT"
).pipe(
  Config.validate({ message: "COMPOSE_PARALLEL_LIMIT must be positive", validation: (n) => n > 0 }),
  Config.option
);

export const XdgConfigHomeConfig: Config.Config<string> = Config.all([
  Config.string("XDG_CONFIG_HOME").pipe(Config.option),
  Config.string("HOME").pipe(Config.withDefault("/root")),
]).pipe(
  Config.map(([xdg, home]) => Option.getOrElse(xdg, () => `${home}/.config`))
);

// ============================================================================
// Composite Config
// ============================================================================

export interface EnvConfig {
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly debug: boolean;
  readonly podmanPath: Option.Option<string>;
  readonly parallel: Option.Option<number>;
  readonly configHome: string;
}

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  LogLevelOptionConfig,
  LogFormatOptionConfig,
  DebugModeConfig,
  PodmanPathConfig,
  ParallelLimitConfig,
  XdgConfigHomeConfig,
]).pipe(
  Config.map(([logLevel, logFormat, debug, podmanPath, parallel, configHome]) => ({
    logLevel,
    logFormat,
    debug,
    podmanPath,
    parallel,
    configHome,
  }))
);

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * ConfigProvider over a fixed variable map, for tests.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ PODCOMPOSE_LOG_LEVEL: "debug" });
 * const env = await Effect.runPromise(Effect.withConfigProvider(EnvConfigSpec, provider));
 * ```
 */
export const createTestConfigProvider = (
  variables: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(new Map([["HOME", "/home/testuser"], ...Object.entries(variables)]), { pathDelim: "_" });
