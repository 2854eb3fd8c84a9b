// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Subprocess execution behind a Context tag, so orchestration can be driven
 * by a scripted runner in tests. Two strategies:
 * - capture: collect stdout/stderr and the exit code
 * - attach: stream output line by line (optionally prefixed) or inherit the
 *   terminal, and shut the process down in two phases on cancellation
 */

import { Command, CommandExecutor } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Context, type Duration, Effect, Fiber, Layer, Option, Stream, pipe } from "effect";
import { ErrorCode, GeneralError, SystemError, errorMessage } from "../lib/errors";
import { supervise } from "./supervise";

export interface ExecResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface AttachOptions {
  /** Written before every output line; None passes lines through unchanged. */
  readonly prefix: Option.Option<string>;
  /** Hand the terminal to the process instead of piping its output. */
  readonly interactive: boolean;
  /** Completes when the caller wants the process gone. */
  readonly cancel: Effect.Effect<void>;
  readonly gracePeriod: Duration.DurationInput;
}

export type ProcessError = SystemError | GeneralError;

export interface ProcessRunnerService {
  readonly capture: (argv: readonly string[]) => Effect.Effect<ExecResult, ProcessError>;
  readonly attach: (argv: readonly string[], options: AttachOptions) => Effect.Effect<number, ProcessError>;
}

export interface ProcessRunner {
  readonly _tag: "ProcessRunner";
}

export const ProcessRunner: Context.Tag<ProcessRunner, ProcessRunnerService> = Context.GenericTag<
  ProcessRunner,
  ProcessRunnerService
>("podcompose/ProcessRunner");

// ============================================================================
// Live implementation
// ============================================================================

const execError = (argv: readonly string[], e: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.EXEC_FAILED,
    message: `Failed to execute: ${argv.join(" ")}: ${errorMessage(e)}`,
    cause: e,
  });

/** Non-empty guarantee prevents index errors on destructuring. */
const validateCommand = (
  argv: readonly string[]
): Effect.Effect<readonly [string, ...string[]], GeneralError> =>
  pipe(
    Effect.succeed(argv),
    Effect.filterOrFail(
      (c): c is readonly [string, ...string[]] => c.length > 0 && c[0] !== undefined && c[0] !== "",
      () =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: "Command array cannot be empty",
        })
    )
  );

const streamToString = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.runFold("", (acc, s) => acc + s)
  );

const pumpLines = <E>(
  stream: Stream.Stream<Uint8Array, E>,
  out: NodeJS.WritableStream,
  prefix: Option.Option<string>
): Effect.Effect<void, E> =>
  pipe(
    stream,
    Stream.decodeText("utf-8"),
    Stream.splitLines,
    Stream.runForEach((line) =>
      Effect.sync(() => {
        out.write(`${Option.getOrElse(prefix, () => "")}${line}\n`);
      })
    )
  );

const makeLive = (executor: CommandExecutor.CommandExecutor): ProcessRunnerService => {
  const provide = <A, E>(
    effect: Effect.Effect<A, E, CommandExecutor.CommandExecutor>
  ): Effect.Effect<A, E> => Effect.provideService(effect, CommandExecutor.CommandExecutor, executor);

  const capture = (argv: readonly string[]): Effect.Effect<ExecResult, ProcessError> =>
    Effect.gen(function* () {
      const [cmd, ...args] = yield* validateCommand(argv);
      return yield* provide(
        Effect.gen(function* () {
          const proc = yield* Command.start(Command.make(cmd, ...args));
          // Parallel capture: exitCode + both streams ready independently
          const [exitCode, stdout, stderr] = yield* Effect.all(
            [proc.exitCode, streamToString(proc.stdout), streamToString(proc.stderr)],
            { concurrency: 3 }
          );
          return { exitCode, stdout, stderr };
        }).pipe(Effect.scoped)
      ).pipe(Effect.mapError((e: PlatformError) => execError(argv, e)));
    });

  const attach = (argv: readonly string[], options: AttachOptions): Effect.Effect<number, ProcessError> =>
    Effect.gen(function* () {
      const [cmd, ...args] = yield* validateCommand(argv);
      const base = Command.make(cmd, ...args);
      const command = options.interactive
        ? pipe(base, Command.stdin("inherit"), Command.stdout("inherit"), Command.stderr("inherit"))
        : base;
      return yield* provide(
        Effect.gen(function* () {
          const proc = yield* Command.start(command);
          const pumps: ReadonlyArray<Fiber.RuntimeFiber<void, PlatformError>> = options.interactive
            ? []
            : [
                yield* Effect.fork(pumpLines(proc.stdout, process.stdout, options.prefix)),
                yield* Effect.fork(pumpLines(proc.stderr, process.stderr, options.prefix)),
              ];
          const outcome = yield* supervise(
            {
              exitCode: proc.exitCode,
              terminate: proc.kill("SIGTERM"),
              kill: proc.kill("SIGKILL"),
            },
            options.cancel,
            options.gracePeriod
          );
          yield* Effect.forEach(pumps, (fiber) => Fiber.join(fiber), { discard: true });
          return outcome.exitCode;
        }).pipe(Effect.scoped)
      ).pipe(Effect.mapError((e: PlatformError) => execError(argv, e)));
    });

  return { capture, attach };
};

/** Live runner over the platform command executor (NodeContext provides it). */
export const ProcessRunnerLive: Layer.Layer<ProcessRunner, never, CommandExecutor.CommandExecutor> =
  Layer.effect(ProcessRunner, Effect.map(CommandExecutor.CommandExecutor, makeLive));
