// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Logger layer for the CLI. Lines go to stderr in one of two formats:
 *
 *   pretty   INFO  [demo_web_1] created
 *            [2/5] → creating demo_db_1
 *            ✓ started 5 container(s)
 *   json     {"timestamp":…,"level":"info","project":"demo","container":…,"message":…}
 *
 * stdout is left to command output (`config`, `ps`, attached containers).
 */

import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as ToolLogLevel } from "../config/field-values";
import { type ColorName, colorize, supportsColor } from "./color";

export const toEffectLogLevel = (level: ToolLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

// ============================================================================
// Annotations
// ============================================================================

type LineStyle =
  | { readonly _tag: "Plain" }
  | { readonly _tag: "Step"; readonly step: string; readonly total: string }
  | { readonly _tag: "Success" }
  | { readonly _tag: "Fail" };

/** What a log line carries besides its message, decoded from annotations. */
interface LineContext {
  readonly style: LineStyle;
  readonly project: Option.Option<string>;
  readonly container: Option.Option<string>;
  /** Annotations set by callers for their own purposes. */
  readonly extra: Readonly<Record<string, unknown>>;
}

/** Keys consumed by {@link decodeContext}; everything else lands in `extra`. */
const RESERVED: ReadonlySet<string> = new Set(["logStyle", "stepNumber", "stepTotal", "project", "container"]);

const decodeContext = (annotations: HashMap.HashMap<string, unknown>): LineContext => {
  const text = (key: string): Option.Option<string> =>
    Option.filter(HashMap.get(annotations, key), (v): v is string => typeof v === "string");
  const style = pipe(
    text("logStyle"),
    Option.match({
      onNone: (): LineStyle => ({ _tag: "Plain" }),
      onSome: (tag): LineStyle =>
        tag === "step"
          ? {
              _tag: "Step",
              step: Option.getOrElse(text("stepNumber"), () => "?"),
              total: Option.getOrElse(text("stepTotal"), () => "?"),
            }
          : tag === "success"
            ? { _tag: "Success" }
            : tag === "fail"
              ? { _tag: "Fail" }
              : { _tag: "Plain" },
    })
  );
  return {
    style,
    project: text("project"),
    container: text("container"),
    extra: Object.fromEntries(Array.from(HashMap.toEntries(annotations)).filter(([k]) => !RESERVED.has(k))),
  };
};

// ============================================================================
// Pretty
// ============================================================================

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

const bold = (text: string, useColor: boolean): string => (useColor ? `\x1b[1m${text}\x1b[0m` : text);

const plainLine = (
  level: LogLevel.LogLevel,
  message: string,
  container: Option.Option<string>,
  useColor: boolean
): string => {
  const label = colorize(LEVEL_COLORS[level.label] ?? "white", level.label.padEnd(5), useColor);
  const tag = Option.match(container, {
    onNone: () => "",
    onSome: (name) => `${colorize("cyan", `[${name}]`, useColor)} `,
  });
  return `${label} ${tag}${message}`;
};

const renderPretty = (
  level: LogLevel.LogLevel,
  message: string,
  ctx: LineContext,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string => {
  const line = pipe(
    Match.value(ctx.style),
    Match.tag("Step", ({ step, total }) => `${bold(`[${step}/${total}]`, useColor)} ${colorize("cyan", "→", useColor)} ${message}`),
    Match.tag("Success", () => `${colorize("green", "✓", useColor)} ${message}`),
    Match.tag("Fail", () => `${colorize("red", "✗", useColor)} ${message}`),
    Match.tag("Plain", () => plainLine(level, message, ctx.container, useColor)),
    Match.exhaustive
  );
  return Cause.isEmpty(cause) ? line : `${line}\n${Cause.pretty(cause)}`;
};

// ============================================================================
// JSON
// ============================================================================

const optionalField = (key: string, value: Option.Option<string>): Record<string, string> =>
  Option.match(value, { onNone: () => ({}), onSome: (v) => ({ [key]: v }) });

const renderJson = (level: LogLevel.LogLevel, message: string, ctx: LineContext, date: Date): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: level.label.toLowerCase(),
    ...optionalField("project", ctx.project),
    ...optionalField("container", ctx.container),
    message,
    ...ctx.extra,
  });

// ============================================================================
// Layer
// ============================================================================

const messageText = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

const ComposeLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const ctx = decodeContext(annotations);
    const text = messageText(message);
    const output =
      format === "json" ? renderJson(logLevel, text, ctx, date) : renderPretty(logLevel, text, ctx, cause, useColor);
    process.stderr.write(`${output}\n`);
  });

export const ComposeLoggerLive = (options: {
  readonly level: ToolLogLevel;
  readonly format: LogFormat;
  /** Defaults to whether stderr is a colour-capable terminal. */
  readonly color?: boolean;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      ComposeLogger(options.format, options.color ?? supportsColor(process.stderr))
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
