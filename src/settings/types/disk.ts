// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Disk setting types. Values are checked for shape only; whether a device
 * exists is for the partitioning step to find out.
 */

import { Option } from "effect";
import { isAlphaNum } from "../../lib/char";
import { parseDiskSize } from "../../lib/schema-utils";
import { all } from "../../lib/str";
import type { SettingType } from "../model";
import { NoAttributes } from "./primitive";

const DEV_PREFIX = "/dev/";

const isDeviceChar = (c: string): boolean =>
  isAlphaNum(c) || c === "/" || c === "-" || c === "_" || c === "." || c === ":";

/** `/dev/sda`, `/dev/nvme0n1`, `/dev/disk/by-id/...`. */
export const isDevicePath = (value: string): boolean => {
  const rest = value.slice(DEV_PREFIX.length);
  return value.startsWith(DEV_PREFIX) && rest.length > 0 && !rest.endsWith("/") && all(isDeviceChar)(rest);
};

export const diskType: SettingType<NoAttributes> = {
  name: "disk",
  attributes: NoAttributes,
  validate: isDevicePath,
  errorMessage: (value) => `'${value}' is not a valid block device path`,
  promptHint: () => "(e.g., /dev/sda, /dev/nvme0n1, /dev/vda)",
};

export const diskSizeType: SettingType<NoAttributes> = {
  name: "disk_size",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parseDiskSize(value)),
  normalize: (value) => value.toUpperCase(),
  errorMessage: () => "Invalid disk size format (examples: 8G, 500M, 1T, 50G)",
  promptHint: () => "(e.g., 8G, 500M, 1T)",
};
