// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  declaredNetworks,
  defaultNetworkKey,
  networkMode,
  serviceAttachments,
  unusedNetworks,
} from "../../src/compose/networks";

describe("declaredNetworks", () => {
  test("synthesizes default when none are declared", () => {
    const networks = declaredNetworks("demo", {});
    expect(Array.from(networks.values())).toEqual([
      { key: "default", name: "demo_default", external: false, definition: {} },
    ]);
  });

  test("declared, named and external networks", () => {
    const networks = declaredNetworks("demo", {
      networks: { front: {}, back: { name: "backplane" }, shared: { external: true } },
    });
    expect(networks.get("front")?.name).toBe("demo_front");
    expect(networks.get("back")?.name).toBe("backplane");
    expect(networks.get("shared")?.name).toBe("shared");
    expect(networks.get("shared")?.external).toBe(true);
  });
});

describe("defaultNetworkKey", () => {
  test("single declared network is the default", () => {
    expect(defaultNetworkKey(declaredNetworks("demo", { networks: { only: {} } }))).toEqual(Option.some("only"));
  });

  test("several without default means none", () => {
    expect(defaultNetworkKey(declaredNetworks("demo", { networks: { a: {}, b: {} } }))).toEqual(Option.none());
  });
});

describe("serviceAttachments", () => {
  const networks = declaredNetworks("demo", { networks: { front: {}, back: {} } });

  test("mapping form carries aliases and addresses", () => {
    const result = Either.getOrThrow(
      serviceAttachments(
        "web",
        { networks: { front: { aliases: ["www"], ipv4_address: "10.0.0.5" }, back: null } },
        networks
      )
    );
    expect(result.map((a) => [a.network.name, a.aliases, a.ipv4Address])).toEqual([
      ["demo_front", ["www"], Option.some("10.0.0.5")],
      ["demo_back", [], Option.none()],
    ]);
  });

  test("network_mode suppresses attachments", () => {
    expect(Either.getOrThrow(serviceAttachments("web", { network_mode: "host" }, networks))).toEqual([]);
    expect(networkMode({ network_mode: "bridge" })).toEqual(Option.none());
  });

  test("undeclared network fails", () => {
    const result = serviceAttachments("web", { networks: ["side"] }, networks);
    expect(Either.isLeft(result) && result.left.message).toBe("service web refers to undefined network side");
  });
});

describe("unusedNetworks", () => {
  test("lists declared networks no service joins", () => {
    const networks = declaredNetworks("demo", { networks: { front: {}, back: {}, default: {} } });
    expect(unusedNetworks([{ networks: ["front"] }, { image: "x" }], networks)).toEqual(["back"]);
  });
});
