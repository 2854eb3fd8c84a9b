// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Service mounts: short (`[source:]target[:options]`) and long syntax,
 * resolved against the project's declared volumes.
 */

import { createHash } from "node:crypto";
import { isAbsolute, join, resolve } from "node:path";
import { Array as Arr, Either, Match, Option, pipe } from "effect";
import {
  ConfigError,
  ErrorCode,
  type UnresolvedReferenceError,
  unresolvedReference,
} from "../lib/errors";
import {
  type DocumentMapping,
  type DocumentNode,
  type VolumeRecord,
  getBoolean,
  getMapping,
  getString,
  isMapping,
} from "./types";

export type MountType = "bind" | "volume" | "tmpfs";

export interface Mount {
  readonly type: MountType;
  readonly source: Option.Option<string>;
  readonly target: string;
  readonly readOnly: Option.Option<boolean>;
  /** Remaining `-v` options: propagation, SELinux relabel, ownership and the like. */
  readonly options: readonly string[];
}

export interface ResolvedMount extends Mount {
  /** Set for `volume` mounts: the volume the container tool will see. */
  readonly volume: Option.Option<VolumeRecord>;
}

const PROPAGATION = new Set(["rprivate", "private", "rshared", "shared", "rslave", "slave"]);
const CONSISTENCY = new Set(["consistent", "delegated", "cached"]);
const PASSTHROUGH = new Set(["z", "Z", "U", "O", "copy", "nocopy", "noexec", "exec", "nodev", "dev", "nosuid", "suid"]);

const badMount = (message: string): ConfigError =>
  new ConfigError({ code: ErrorCode.CONFIG_VALIDATION_ERROR, message });

// ============================================================================
// Parsing
// ============================================================================

interface PathScope {
  readonly baseDir: string;
  readonly home: string;
}

const isHostPath = (source: string): boolean => /^[~/.]/.test(source);

const hostPath = (source: string, scope: PathScope): string => {
  const expanded = source === "~" || source.startsWith("~/") ? join(scope.home, source.slice(1)) : source;
  return isAbsolute(expanded) ? resolve(expanded) : resolve(scope.baseDir, expanded);
};

const splitShort = (
  text: string
): Either.Either<readonly [Option.Option<string>, string, string], ConfigError> => {
  const parts = text.split(":");
  return pipe(
    Match.value(parts),
    Match.when({ length: 1 }, ([target]): readonly [Option.Option<string>, string, string] => [
      Option.none(),
      target ?? "",
      "",
    ]),
    // `/data:ro` is a target with options, `src:/data` a source and target
    Match.when({ length: 2 }, ([a, b]): readonly [Option.Option<string>, string, string] =>
      (b ?? "").startsWith("/") ? [Option.some(a ?? ""), b ?? "", ""] : [Option.none(), a ?? "", b ?? ""]
    ),
    Match.when({ length: 3 }, ([a, b, c]): readonly [Option.Option<string>, string, string] => [
      Option.some(a ?? ""),
      b ?? "",
      c ?? "",
    ]),
    Match.option,
    Either.fromOption(() => badMount(`could not parse mount ${text}`))
  );
};

/** Container path of a short mount entry, read the same way {@link parseShortMount} reads it. */
export const shortMountTarget = (text: string): Option.Option<string> =>
  Option.map(Either.getRight(splitShort(text)), ([, target]) => target);

export const parseShortMount = (text: string, scope: PathScope): Either.Either<Mount, ConfigError> =>
  Either.flatMap(splitShort(text), ([source, target, optionText]) => {
    const opts = optionText.split(",").filter((o) => o !== "");
    const unknown = opts.filter(
      (o) => o !== "ro" && o !== "rw" && !CONSISTENCY.has(o) && !PROPAGATION.has(o) && !PASSTHROUGH.has(o)
    );
    if (unknown.length > 0) {
      return Either.left(badMount(`unknown mount option ${unknown.join(",")} in ${text}`));
    }
    const type: MountType = Option.exists(source, isHostPath) ? "bind" : "volume";
    return Either.right({
      type,
      source: type === "bind" ? Option.map(source, (s) => hostPath(s, scope)) : source,
      target,
      readOnly: pipe(
        Arr.findLast(opts, (o) => o === "ro" || o === "rw"),
        Option.map((o) => o === "ro")
      ),
      options: opts.filter((o) => PROPAGATION.has(o) || PASSTHROUGH.has(o)),
    });
  });

const MOUNT_TYPES: readonly MountType[] = ["bind", "volume", "tmpfs"];

const parseLongMount = (entry: DocumentMapping, scope: PathScope): Either.Either<Mount, ConfigError> => {
  const rawType = Option.getOrElse(getString(entry, "type"), () => "volume");
  const type = MOUNT_TYPES.find((t) => t === rawType);
  const target = getString(entry, "target");
  if (type === undefined) {
    return Either.left(badMount(`unsupported mount type ${rawType}`));
  }
  if (Option.isNone(target)) {
    return Either.left(badMount("long-syntax mount needs a target"));
  }
  const bind = Option.getOrElse(getMapping(entry, "bind"), (): DocumentMapping => ({}));
  const propagation = Option.getOrElse(getString(bind, "propagation"), () => "");
  const selinux = getString(bind, "selinux");
  const nocopy = Option.exists(getMapping(entry, "volume"), (v) => getBoolean(v, "nocopy"));
  const source = pipe(
    getString(entry, "source"),
    Option.filter((s) => s !== "")
  );
  return Either.right({
    type,
    source: type === "bind" ? Option.map(source, (s) => hostPath(s, scope)) : source,
    target: target.value,
    readOnly: pipe(
      Option.fromNullable(entry["read_only"]),
      Option.filter((v): v is boolean => typeof v === "boolean")
    ),
    options: [
      ...propagation.split(",").filter((p) => p !== ""),
      ...Option.toArray(selinux),
      ...(nocopy ? ["nocopy"] : []),
    ],
  });
};

export const parseMount = (entry: DocumentNode, scope: PathScope): Either.Either<Mount, ConfigError> =>
  typeof entry === "string"
    ? parseShortMount(entry, scope)
    : isMapping(entry)
      ? parseLongMount(entry, scope)
      : Either.left(badMount(`mount must be a string or a mapping, got ${String(entry)}`));

// ============================================================================
// Volume resolution
// ============================================================================

export const anonymousVolumeName = (project: string, service: string, target: string): string =>
  `${project}_${service}_${createHash("sha256").update(target).digest("hex")}`;

/** Name under which a top-level volume exists in the container tool. */
export const declaredVolume = (project: string, key: string, definition: DocumentMapping): VolumeRecord => {
  const external = definition["external"];
  const isExternal = external === true || isMapping(external);
  const externalName = isMapping(external) ? getString(external, "name") : Option.none();
  const name = pipe(
    getString(definition, "name"),
    Option.orElse(() => externalName),
    Option.getOrElse(() => (isExternal ? key : `${project}_${key}`))
  );
  return { key, name, external: isExternal, definition };
};

export interface VolumeScope {
  readonly project: string;
  readonly service: string;
  readonly volumes: ReadonlyMap<string, VolumeRecord>;
}

export const resolveMount = (
  mount: Mount,
  scope: VolumeScope
): Either.Either<ResolvedMount, UnresolvedReferenceError> => {
  if (mount.type !== "volume") {
    return Either.right({ ...mount, volume: Option.none() });
  }
  return Option.match(mount.source, {
    onNone: (): Either.Either<ResolvedMount, UnresolvedReferenceError> =>
      Either.right({
        ...mount,
        volume: Option.some({
          key: "",
          name: anonymousVolumeName(scope.project, scope.service, mount.target),
          external: false,
          definition: {},
        }),
      }),
    onSome: (source): Either.Either<ResolvedMount, UnresolvedReferenceError> =>
      pipe(
        Option.fromNullable(scope.volumes.get(source)),
        Either.fromOption(() => unresolvedReference("volume", source, `service ${scope.service}`)),
        Either.map((volume): ResolvedMount => ({ ...mount, volume: Option.some(volume) }))
      ),
  });
};

// ============================================================================
// Arguments
// ============================================================================

/** `-v` / `--mount` arguments for one mount. */
export const mountArgs = (mount: ResolvedMount): readonly string[] => {
  if (mount.type === "tmpfs") {
    return ["--mount", `type=tmpfs,destination=${mount.target}`];
  }
  const source = Option.orElse(
    Option.map(mount.volume, (v) => v.name),
    () => mount.source
  );
  const opts = [
    ...mount.options,
    ...Option.toArray(Option.map(mount.readOnly, (ro) => (ro ? "ro" : "rw"))),
  ];
  const spec = Option.match(source, {
    onNone: (): string => mount.target,
    onSome: (s): string => `${s}:${mount.target}`,
  });
  return ["-v", opts.length > 0 ? `${spec}:${opts.join(",")}` : spec];
};
