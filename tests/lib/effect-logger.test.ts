// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { LogFormat, LogLevel } from "../../src/config/field-values";
import { ComposeLoggerLive } from "../../src/lib/effect-logger";
import { forContainer, logFail, logStep, logSuccess } from "../../src/lib/log";

describe("ComposeLoggerLive", () => {
  let written: () => readonly string[] = () => [];

  beforeEach(() => {
    const spy = vi.spyOn(process.stderr, "write").mockReturnValue(true);
    written = () => spy.mock.calls.map((call) => String(call[0]));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const run = (effect: Effect.Effect<void>, format: LogFormat = "pretty", level: LogLevel = "info"): void =>
    Effect.runSync(Effect.provide(effect, ComposeLoggerLive({ level, format, color: false })));

  test("plain lines carry the level and container", () => {
    run(forContainer("demo_web_1")(Effect.logWarning("restarting")));
    expect(written()).toEqual(["WARN  [demo_web_1] restarting\n"]);
  });

  test("styled lines", () => {
    run(
      Effect.all([logStep(2, 5, "creating demo_db_1"), logSuccess("started"), logFail("build failed")], {
        discard: true,
      })
    );
    expect(written()).toEqual(["[2/5] → creating demo_db_1\n", "✓ started\n", "✗ build failed\n"]);
  });

  test("lines below the minimum level are dropped", () => {
    run(Effect.logDebug("hidden"));
    expect(written()).toEqual([]);
  });

  test("json lines keep caller annotations", () => {
    run(
      Effect.logInfo("created").pipe(
        Effect.annotateLogs({ project: "demo", container: "demo_db_1", attempt: "2" })
      ),
      "json"
    );
    expect(written().length).toBe(1);
    const parsed: unknown = JSON.parse(written()[0] ?? "{}");
    expect(parsed).toEqual({
      timestamp: expect.any(String),
      level: "info",
      project: "demo",
      container: "demo_db_1",
      message: "created",
      attempt: "2",
    });
  });
});
