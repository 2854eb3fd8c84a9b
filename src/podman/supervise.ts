// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Two-phase shutdown of a managed subprocess.
 *
 *   Running ──exit──────────────────────────────▶ Exited
 *      │
 *   cancel ─▶ GraceWait(deadline) ──exit────────▶ Exited
 *                  │
 *               deadline ─▶ kill ──exit─────────▶ ForceKilled
 *
 * The reported exit code is always whatever the process finally returns.
 */

import { Data, Duration, Effect, Either, Fiber, Match, Option, pipe } from "effect";

export type Supervision = Data.TaggedEnum<{
  Running: object;
  GraceWait: { readonly deadline: number };
  Exited: { readonly exitCode: number };
  ForceKilled: { readonly exitCode: number };
}>;

export const Supervision = Data.taggedEnum<Supervision>();

export type SupervisionOutcome = Extract<Supervision, { readonly _tag: "Exited" | "ForceKilled" }>;

/** The handful of operations supervision needs from a process. */
export interface ManagedProcess<E> {
  readonly exitCode: Effect.Effect<number, E>;
  readonly terminate: Effect.Effect<void, E>;
  readonly kill: Effect.Effect<void, E>;
}

export const describeState = (state: Supervision): string =>
  pipe(
    Match.value(state),
    Match.tag("Running", () => "running"),
    Match.tag(
      "GraceWait",
      ({ deadline }) => `terminating, grace period ends at ${new Date(deadline).toISOString()}`
    ),
    Match.tag("Exited", ({ exitCode }) => `exited with code ${exitCode}`),
    Match.tag("ForceKilled", ({ exitCode }) => `killed after grace period (exit code ${exitCode})`),
    Match.exhaustive
  );

const enter = <S extends Supervision>(state: S): Effect.Effect<S> =>
  Effect.as(Effect.logDebug(`process ${describeState(state)}`), state);

/**
 * Wait for `proc` to exit. If `cancel` completes first, request termination,
 * allow `grace` for a voluntary exit and kill the process after that.
 */
export const supervise = <E>(
  proc: ManagedProcess<E>,
  cancel: Effect.Effect<void>,
  grace: Duration.DurationInput
): Effect.Effect<SupervisionOutcome, E> =>
  Effect.gen(function* () {
    yield* enter(Supervision.Running());
    const exit = yield* Effect.fork(proc.exitCode);
    const first = yield* Effect.raceFirst(
      Effect.map(Fiber.join(exit), (code): Either.Either<number, "cancelled"> => Either.right(code)),
      Effect.map(cancel, (): Either.Either<number, "cancelled"> => Either.left("cancelled"))
    );
    if (Either.isRight(first)) {
      return yield* enter(Supervision.Exited({ exitCode: first.right }));
    }

    const deadline = Date.now() + Duration.toMillis(Duration.decode(grace));
    yield* enter(Supervision.GraceWait({ deadline }));
    yield* proc.terminate;
    const graceful = yield* Effect.timeoutOption(Fiber.join(exit), grace);
    if (Option.isSome(graceful)) {
      return yield* enter(Supervision.Exited({ exitCode: graceful.value }));
    }

    yield* Effect.logWarning("process did not exit within the grace period; killing it");
    yield* proc.kill;
    const exitCode = yield* Fiber.join(exit);
    return yield* enter(Supervision.ForceKilled({ exitCode }));
  });
