// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Styled log helpers. Styles travel as annotations; effect-logger.ts decides
 * how each one looks.
 */

import { Data, Effect, Match, SynchronizedRef, pipe } from "effect";

// ============================================================================
// LogStyle ADT
// ============================================================================

type LogStyle = Data.TaggedEnum<{
  Step: { readonly current: number; readonly total: number };
  Success: object;
  Fail: object;
}>;

const { Step, Success, Fail } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("Step", ({ current, total }) => ({
      logStyle: "step",
      stepNumber: String(current),
      stepTotal: String(total),
    })),
    Match.tag("Success", () => ({ logStyle: "success" })),
    Match.tag("Fail", () => ({ logStyle: "fail" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

// ============================================================================
// Public helpers
// ============================================================================

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(Step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(Success(), message);

export const logFail = (message: string): Effect.Effect<void> =>
  Effect.logError(message).pipe(Effect.annotateLogs(encodeStyle(Fail())));

/** Program output on stdout (`config`, `ps -q`, dry-run command lines). Not a log line. */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Tag every log line of `effect` with the container it concerns. */
export const forContainer =
  (name: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, "container", name);

// ============================================================================
// StepCounter
// ============================================================================

/** Numbered progress for multi-step commands; concurrent `next` calls are serialized. */
export interface StepCounter {
  readonly next: (message: string) => Effect.Effect<void>;
  readonly current: Effect.Effect<number>;
}

export const createStepCounter = (total: number): Effect.Effect<StepCounter> =>
  Effect.gen(function* () {
    const ref = yield* SynchronizedRef.make(0);

    return {
      next: (message: string): Effect.Effect<void> =>
        SynchronizedRef.updateAndGetEffect(ref, (n) =>
          Effect.as(logStep(n + 1, total, message), n + 1)
        ).pipe(Effect.asVoid),

      current: SynchronizedRef.get(ref),
    };
  });
