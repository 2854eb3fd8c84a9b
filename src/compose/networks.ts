// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Top-level networks and per-service attachments.
 */

import { Array as Arr, Either, Option, pipe } from "effect";
import { type UnresolvedReferenceError, unresolvedReference } from "../lib/errors";
import {
  type DocumentMapping,
  type NetworkAttachment,
  type NetworkRecord,
  EMPTY_MAPPING,
  getMapping,
  getString,
  isMapping,
  isSequence,
  stringList,
} from "./types";

export const DEFAULT_NETWORK = "default";

const networkRecord = (project: string, key: string, definition: DocumentMapping): NetworkRecord => {
  const external = definition["external"];
  const isExternal = external === true || isMapping(external);
  const externalName = isMapping(external) ? getString(external, "name") : Option.none();
  return {
    key,
    name: pipe(
      getString(definition, "name"),
      Option.orElse(() => externalName),
      Option.getOrElse(() => (isExternal ? key : `${project}_${key}`))
    ),
    external: isExternal,
    definition,
  };
};

/** Declared networks, or a synthesized `default` when the document declares none. */
export const declaredNetworks = (project: string, doc: DocumentMapping): ReadonlyMap<string, NetworkRecord> => {
  const declared = Object.entries(Option.getOrElse(getMapping(doc, "networks"), () => EMPTY_MAPPING));
  const entries: ReadonlyArray<readonly [string, DocumentMapping]> =
    declared.length === 0
      ? [[DEFAULT_NETWORK, EMPTY_MAPPING]]
      : declared.map(([key, def]): readonly [string, DocumentMapping] => [
          key,
          isMapping(def) ? def : EMPTY_MAPPING,
        ]);
  return new Map(entries.map(([key, def]) => [key, networkRecord(project, key, def)] as const));
};

/** `network_mode` values that replace bridge attachments altogether. */
export const networkMode = (service: DocumentMapping): Option.Option<string> =>
  pipe(
    getString(service, "network_mode"),
    Option.filter((mode) => mode !== "bridge")
  );

interface RequestedNetwork {
  readonly key: string;
  readonly options: DocumentMapping;
}

const requestedNetworks = (service: DocumentMapping): readonly RequestedNetwork[] => {
  const networks = service["networks"];
  if (isSequence(networks)) {
    return stringList(networks).map((key): RequestedNetwork => ({ key, options: EMPTY_MAPPING }));
  }
  if (isMapping(networks)) {
    return Object.entries(networks).map(([key, options]): RequestedNetwork => ({
      key,
      options: isMapping(options) ? options : EMPTY_MAPPING,
    }));
  }
  return [];
};

/** Network a service without `networks` joins: the only one declared, else `default` if declared. */
export const defaultNetworkKey = (networks: ReadonlyMap<string, NetworkRecord>): Option.Option<string> =>
  networks.size === 1
    ? Option.fromNullable(Array.from(networks.keys())[0])
    : networks.has(DEFAULT_NETWORK)
      ? Option.some(DEFAULT_NETWORK)
      : Option.none();

/** Network keys a service refers to, including the implicit default. */
export const referencedNetworkKeys = (
  service: DocumentMapping,
  networks: ReadonlyMap<string, NetworkRecord>
): readonly string[] => {
  if (Option.isSome(networkMode(service))) {
    return [];
  }
  const requested = requestedNetworks(service).map((r) => r.key);
  return requested.length === 0 ? Option.toArray(defaultNetworkKey(networks)) : requested;
};

export const serviceAttachments = (
  name: string,
  service: DocumentMapping,
  networks: ReadonlyMap<string, NetworkRecord>
): Either.Either<readonly NetworkAttachment[], UnresolvedReferenceError> => {
  if (Option.isSome(networkMode(service))) {
    return Either.right([]);
  }
  const requested = requestedNetworks(service);
  const effective: readonly RequestedNetwork[] =
    requested.length === 0
      ? Option.toArray(defaultNetworkKey(networks)).map((key) => ({ key, options: EMPTY_MAPPING }))
      : requested;
  return Either.all(
    effective.map(({ key, options }) =>
      pipe(
        Option.fromNullable(networks.get(key)),
        Either.fromOption(() => unresolvedReference("network", key, `service ${name}`)),
        Either.map(
          (network): NetworkAttachment => ({
            network,
            aliases: pipe(
              Option.fromNullable(options["aliases"]),
              Option.filter(isSequence),
              Option.map(stringList),
              Option.getOrElse((): readonly string[] => [])
            ),
            ipv4Address: getString(options, "ipv4_address"),
            ipv6Address: getString(options, "ipv6_address"),
          })
        )
      )
    )
  );
};

/** Declared network keys no service attaches to; `default` never counts as unused. */
export const unusedNetworks = (
  services: Iterable<DocumentMapping>,
  networks: ReadonlyMap<string, NetworkRecord>
): readonly string[] => {
  const used = new Set(Array.from(services).flatMap((svc) => referencedNetworkKeys(svc, networks)));
  return Arr.filter(Array.from(networks.keys()), (key) => key !== DEFAULT_NETWORK && !used.has(key));
};
