// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option, Schema, pipe } from "effect";
import { isValidIPv4, parseDigits, parseHostname, parseNetmask } from "../../lib/schema-utils";
import type { SettingType } from "../model";
import { NoAttributes } from "./primitive";

export const ipType: SettingType<NoAttributes> = {
  name: "ip",
  attributes: NoAttributes,
  validate: isValidIPv4,
  errorMessage: () => "Invalid IPv4 address (four octets 0-255, e.g. 192.168.1.10)",
  promptHint: () => "(e.g., 192.168.1.10)",
};

export const netmaskType: SettingType<NoAttributes> = {
  name: "netmask",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parseNetmask(value)),
  errorMessage: () => "Invalid netmask. Use dotted form (255.255.255.0) or a prefix length (0-32)",
  promptHint: () => "(e.g., 255.255.255.0 or 24)",
};

export const PORT_MIN_DEFAULT = 1;
export const PORT_MAX_DEFAULT = 65535;

const PortAttributes = Schema.Struct({
  min: Schema.optional(Schema.Int),
  max: Schema.optional(Schema.Int),
});

export const portType: SettingType<typeof PortAttributes.Type> = {
  name: "port",
  attributes: PortAttributes,
  validate: (value, attrs) =>
    pipe(
      parseDigits(value),
      Option.exists((n) => n >= (attrs.min ?? PORT_MIN_DEFAULT) && n <= (attrs.max ?? PORT_MAX_DEFAULT))
    ),
  errorMessage: (value, attrs) =>
    Option.isNone(parseDigits(value))
      ? "Port must be numeric (no letters or special characters)"
      : `Port must be between ${attrs.min ?? PORT_MIN_DEFAULT} and ${attrs.max ?? PORT_MAX_DEFAULT}`,
  promptHint: (attrs) => `(${attrs.min ?? PORT_MIN_DEFAULT}-${attrs.max ?? PORT_MAX_DEFAULT})`,
};

export const hostnameType: SettingType<NoAttributes> = {
  name: "hostname",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parseHostname(value)),
  normalize: (value) => value.toLowerCase(),
  errorMessage: () =>
    "Invalid hostname. Use 1-63 alphanumeric characters and hyphens (no leading/trailing hyphens)",
  promptHint: () => "(alphanumeric, hyphens allowed, no leading/trailing hyphens)",
};
