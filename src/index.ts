#!/usr/bin/env tsx
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * podcompose entry point. The only place the Effect runtime is executed.
 */

import { Cause, Effect, Exit, Option } from "effect";
import { program } from "./cli/index";
import { ErrorCode, exitCodeOf } from "./lib/errors";

const exitCodeFromExit = (exit: Exit.Exit<number, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (code): number => code,
    onFailure: (cause): number =>
      Cause.isInterruptedOnly(cause)
        ? ErrorCode.INTERRUPTED
        : Option.match(Cause.failureOption(cause), {
            onNone: (): number => ErrorCode.GENERAL_ERROR,
            onSome: exitCodeOf,
          }),
  });

// Failures were already logged by the command wrapper or printed by the CLI parser.
const logDefect = (exit: Exit.Exit<number, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void => {
      if (Option.isNone(Cause.failureOption(cause)) && !Cause.isInterruptedOnly(cause)) {
        console.error("Unexpected error:", Cause.pretty(cause));
      }
    },
  });

const main = async (): Promise<never> => {
  const exit = await Effect.runPromiseExit(program(process.argv));
  logDefect(exit);
  process.exit(exitCodeFromExit(exit));
};

void main();
