// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

export const PODMAN_PATH_DEFAULT = "podman";

/** Default `pod create` arguments: no infra container and no shared namespaces. */
export const POD_ARGS_DEFAULT: readonly string[] = ["--infra=false", "--share="];

export const COMPOSE_FILE_NAMES: readonly string[] = [
  "compose.yaml",
  "compose.yml",
  "podman-compose.yaml",
  "podman-compose.yml",
  "docker-compose.yaml",
  "docker-compose.yml",
];

/** Preferred build recipe names, probed in order inside the build context. */
export const CONTAINERFILE_NAMES: readonly string[] = [
  "Containerfile",
  "ContainerFile",
  "containerfile",
  "Dockerfile",
  "DockerFile",
  "dockerfile",
];

/** Verbs that accept extra arguments through `--podman-<verb>-args`. */
export const PODMAN_VERBS = [
  "pull",
  "push",
  "build",
  "inspect",
  "create",
  "run",
  "start",
  "stop",
  "rm",
  "volume",
] as const;
