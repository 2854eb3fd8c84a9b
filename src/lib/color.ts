// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * ANSI colouring for terminal output. Honours NO_COLOR and FORCE_COLOR.
 */

import { Option, pipe } from "effect";

export type ColorName = "red" | "green" | "yellow" | "blue" | "magenta" | "cyan" | "gray" | "white";

const ANSI_CODES: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

const RESET = "\x1b[0m";

export const supportsColor = (stream: { readonly isTTY?: boolean }): boolean => {
  if (process.env["NO_COLOR"] !== undefined) {
    return false;
  }
  return pipe(
    Option.fromNullable(process.env["FORCE_COLOR"]),
    Option.match({
      onNone: (): boolean => stream.isTTY === true,
      onSome: (force): boolean => force !== "0",
    })
  );
};

export const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  useColor ? `${ANSI_CODES[color]}${text}${RESET}` : text;

/** Rotating palette for per-service output prefixes. */
const PREFIX_PALETTE: readonly ColorName[] = ["cyan", "yellow", "green", "magenta", "blue"];

export const paletteColor = (index: number): ColorName =>
  PREFIX_PALETTE[index % PREFIX_PALETTE.length] ?? "white";
