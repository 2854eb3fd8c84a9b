// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option, pipe } from "effect";

/** `10`, `10s`, `1.5s`, `2m`, `1m30s` or `1:30`. */
const COMPOSE_DURATION = /^(?:(\d+)[m:])?(?:(\d+(?:\.\d+)?)s?)?$/;

/**
 * Whole seconds for a compose duration such as `stop_grace_period`.
 * Fractions are truncated; unparseable text is None.
 */
export const strToSeconds = (value: string | number): Option.Option<number> => {
  if (typeof value === "number") {
    return Option.some(Math.trunc(value));
  }
  return pipe(
    Option.fromNullable(COMPOSE_DURATION.exec(value.trim())),
    Option.filter(() => value.trim() !== ""),
    Option.map(([, minutes, seconds]) => {
      const mins = minutes === undefined ? 0 : Number.parseInt(minutes, 10);
      const secs = seconds === undefined ? 0 : Number.parseFloat(seconds);
      return Math.trunc(mins * 60 + secs);
    })
  );
};
