// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Deferred, Effect, Ref } from "effect";
import { describe, expect, test } from "vitest";
import { type ManagedProcess, Supervision, describeState, supervise } from "../../src/podman/supervise";

interface Fake {
  readonly proc: ManagedProcess<never>;
  readonly exit: Deferred.Deferred<number>;
  readonly signals: Ref.Ref<readonly string[]>;
}

/** A process that exits when told to, and on TERM only if `obeysTerm`. */
const fakeProcess = (obeysTerm: boolean): Effect.Effect<Fake> =>
  Effect.gen(function* () {
    const exit = yield* Deferred.make<number>();
    const signals = yield* Ref.make<readonly string[]>([]);
    const signal = (name: string, code: number, effective: boolean) =>
      Effect.gen(function* () {
        yield* Ref.update(signals, (s) => [...s, name]);
        if (effective) {
          yield* Deferred.succeed(exit, code);
        }
      });
    return {
      exit,
      signals,
      proc: {
        exitCode: Deferred.await(exit),
        terminate: signal("TERM", 143, obeysTerm),
        kill: signal("KILL", 137, true),
      },
    };
  });

describe("supervise", () => {
  test("a process that exits on its own", async () => {
    const outcome = await Effect.runPromise(
      Effect.gen(function* () {
        const fake = yield* fakeProcess(true);
        yield* Deferred.succeed(fake.exit, 0);
        return yield* supervise(fake.proc, Effect.never, "1 second");
      })
    );
    expect(outcome).toEqual(Supervision.Exited({ exitCode: 0 }));
  });

  test("cancellation terminates and keeps the process's code", async () => {
    const { outcome, signals } = await Effect.runPromise(
      Effect.gen(function* () {
        const fake = yield* fakeProcess(true);
        const outcome = yield* supervise(fake.proc, Effect.void, "1 second");
        return { outcome, signals: yield* Ref.get(fake.signals) };
      })
    );
    expect(outcome).toEqual(Supervision.Exited({ exitCode: 143 }));
    expect(signals).toEqual(["TERM"]);
  });

  test("a process ignoring TERM is killed after the grace period", async () => {
    const { outcome, signals } = await Effect.runPromise(
      Effect.gen(function* () {
        const fake = yield* fakeProcess(false);
        const outcome = yield* supervise(fake.proc, Effect.void, "10 millis");
        return { outcome, signals: yield* Ref.get(fake.signals) };
      })
    );
    expect(outcome).toEqual(Supervision.ForceKilled({ exitCode: 137 }));
    expect(signals).toEqual(["TERM", "KILL"]);
  });
});

describe("describeState", () => {
  test("terminal states", () => {
    expect(describeState(Supervision.Exited({ exitCode: 2 }))).toBe("exited with code 2");
    expect(describeState(Supervision.ForceKilled({ exitCode: 137 }))).toBe(
      "killed after grace period (exit code 137)"
    );
    expect(describeState(Supervision.GraceWait({ deadline: 0 }))).toBe(
      "terminating, grace period ends at 1970-01-01T00:00:00.000Z"
    );
  });
});
