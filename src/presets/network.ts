// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option, pipe } from "effect";
import type { RegistrationError } from "../lib/errors";
import { parseIPv4, parseNetmask, sameSubnet } from "../lib/schema-utils";
import type { CrossValidator, Lookup } from "../settings/model";
import { type ConfigStore, createPreset, createSetting } from "../settings/store";

const valueOf = (lookup: Lookup, name: string): string => Option.getOrElse(lookup(name), () => "");

/**
 * Static addressing only: the gateway differs from the address and shares
 * its subnet. Reports the first problem found.
 */
export const validateNetwork: CrossValidator = (lookup) => {
  if (valueOf(lookup, "NETWORK_METHOD") !== "static") {
    return [];
  }
  const ip = valueOf(lookup, "NETWORK_IP");
  const mask = valueOf(lookup, "NETWORK_MASK");
  const gateway = valueOf(lookup, "NETWORK_GATEWAY");

  if (ip !== "" && gateway !== "" && ip === gateway) {
    return ["Gateway cannot be the same as IP address"];
  }
  const outsideSubnet = pipe(
    Option.all([parseIPv4(ip), parseNetmask(mask), parseIPv4(gateway)]),
    Option.exists(([address, netmask, gw]) => !sameSubnet(address, gw, netmask))
  );
  return outsideSubnet ? [`Gateway ${gateway} must be in the same subnet as ${ip}/${mask}`] : [];
};

export const declareNetworkPreset = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* createPreset(store, { name: "network", display: "Network", priority: 10, validate: validateNetwork });
    yield* createSetting(store, {
      name: "HOSTNAME",
      type: "hostname",
      preset: "network",
      display: "Hostname",
      defaultValue: "nixos",
      required: true,
    });
    yield* createSetting(store, {
      name: "NETWORK_METHOD",
      type: "choice",
      preset: "network",
      display: "Network Method",
      defaultValue: "dhcp",
      options: ["dhcp", "static"],
    });
    yield* createSetting(store, {
      name: "NETWORK_DNS_PRIMARY",
      type: "ip",
      preset: "network",
      display: "Primary DNS",
      defaultValue: "1.1.1.1",
    });
    yield* createSetting(store, {
      name: "NETWORK_DNS_SECONDARY",
      type: "ip",
      preset: "network",
      display: "Secondary DNS",
      defaultValue: "1.0.0.1",
    });
    yield* createSetting(store, {
      name: "NETWORK_IP",
      type: "ip",
      preset: "network",
      display: "IP Address",
      required: true,
      visibleAll: ["NETWORK_METHOD==static"],
    });
    yield* createSetting(store, {
      name: "NETWORK_MASK",
      type: "netmask",
      preset: "network",
      display: "Network Mask",
      defaultValue: "255.255.255.0",
      required: true,
      visibleAll: ["NETWORK_METHOD==static"],
    });
    yield* createSetting(store, {
      name: "NETWORK_GATEWAY",
      type: "ip",
      preset: "network",
      display: "Gateway",
      required: true,
      visibleAll: ["NETWORK_METHOD==static"],
    });
  });
