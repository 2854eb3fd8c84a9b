// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Context, Duration, Layer } from "effect";

/** Delays the executor waits on; tests provide shorter ones. */
export interface OrchestratorTimingsService {
  /** Pause between two `wait --condition` attempts. */
  readonly dependencyPollInterval: Duration.Duration;
  /** Pause after the first exit before the remaining tasks are cancelled. */
  readonly abortSettleDelay: Duration.Duration;
  /** Time a cancelled process gets to exit before it is killed. */
  readonly stopGracePeriod: Duration.Duration;
}

export interface OrchestratorTimings {
  readonly _tag: "OrchestratorTimings";
}

export const OrchestratorTimings: Context.Tag<OrchestratorTimings, OrchestratorTimingsService> =
  Context.GenericTag<OrchestratorTimings, OrchestratorTimingsService>("podcompose/OrchestratorTimings");

export const DEFAULT_TIMINGS: OrchestratorTimingsService = {
  dependencyPollInterval: Duration.seconds(1),
  abortSettleDelay: Duration.seconds(1),
  stopGracePeriod: Duration.seconds(10),
};

export const OrchestratorTimingsLive: Layer.Layer<OrchestratorTimings> = Layer.succeed(
  OrchestratorTimings,
  DEFAULT_TIMINGS
);
