// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Schema for the optional `config.toml` tool configuration. Every field is
 * optional: unset values fall through to environment variables and defaults.
 */

import { Schema } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "./field-values";

const LoggingSchema = Schema.Struct({
  level: Schema.optional(Schema.Literal(...LOG_LEVEL_VALUES)),
  format: Schema.optional(Schema.Literal(...LOG_FORMAT_VALUES)),
});

export const ToolConfigSchema = Schema.Struct({
  podman_path: Schema.optional(Schema.NonEmptyString),
  parallel: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.positive())),
  in_pod: Schema.optional(Schema.Boolean),
  pod_args: Schema.optional(Schema.Array(Schema.String)),
  logging: Schema.optional(LoggingSchema),
});

export type ToolConfig = typeof ToolConfigSchema.Type;

export const EMPTY_TOOL_CONFIG: ToolConfig = {};
