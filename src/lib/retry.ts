// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retry schedules for container tool calls.
 */

import { type Duration, Effect, Schedule, pipe } from "effect";

/**
 * Dependency condition polling: fixed spacing, no attempt limit. Only outer
 * interruption ends it.
 */
export const conditionPollSchedule = (
  interval: Duration.DurationInput
): Schedule.Schedule<number, unknown, never> => Schedule.spaced(interval);

/**
 * Retry `effect` on `schedule`, logging every failed attempt at debug level.
 */
export const retryLogged = <A, E, R, Out>(
  effect: Effect.Effect<A, E, R>,
  schedule: Schedule.Schedule<Out, E, never>,
  describe: (error: E) => string
): Effect.Effect<A, E, R> =>
  pipe(
    effect,
    Effect.tapError((error) => Effect.logDebug(describe(error))),
    Effect.retry(schedule)
  );
