// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { RegistrationError } from "../lib/errors";
import { type ConfigStore, createPreset, createSetting } from "../settings/store";

const ENCRYPTED = "ENCRYPTION==true";
const WITH_PASSPHRASE = [ENCRYPTED, "ENCRYPTION_USE_PASSPHRASE==true"] as const;

export const declareDiskPreset = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* createPreset(store, { name: "disk", display: "Disk", priority: 20 });
    yield* createSetting(store, {
      name: "DISK_TARGET",
      type: "disk",
      preset: "disk",
      display: "Target Disk",
      required: true,
    });
    yield* createSetting(store, {
      name: "ENCRYPTION",
      type: "toggle",
      preset: "disk",
      display: "Enable Encryption",
      defaultValue: "true",
    });
    yield* createSetting(store, {
      name: "PARTITION_STRATEGY",
      type: "choice",
      preset: "disk",
      display: "Partition Strategy",
      defaultValue: "fast",
      options: ["fast", "disko"],
    });
    yield* createSetting(store, {
      name: "AUTO_APPROVE_DISK_PURGE",
      type: "toggle",
      preset: "disk",
      display: "Auto-approve Disk Purge",
      defaultValue: "false",
    });
    yield* createSetting(store, {
      name: "DISKO_USER_FILE",
      type: "path",
      preset: "disk",
      display: "Disko File (override)",
      visibleAll: ["PARTITION_STRATEGY==disko"],
    });
    yield* createSetting(store, {
      name: "FS_TYPE",
      type: "choice",
      preset: "disk",
      display: "Filesystem Type",
      defaultValue: "btrfs",
      options: ["btrfs", "ext4"],
    });
    yield* createSetting(store, {
      name: "SWAP_SIZE_MIB",
      type: "int",
      preset: "disk",
      display: "Swap Size (MiB)",
      defaultValue: "0",
      min: 0,
    });
    yield* createSetting(store, {
      name: "SEPARATE_HOME",
      type: "toggle",
      preset: "disk",
      display: "Separate /home",
      defaultValue: "false",
    });
    yield* createSetting(store, {
      name: "HOME_SIZE",
      type: "disk_size",
      preset: "disk",
      display: "/home Size (if separate)",
      defaultValue: "20G",
      visibleAll: ["SEPARATE_HOME==true"],
    });
    yield* createSetting(store, {
      name: "ENCRYPTION_KEY_METHOD",
      type: "choice",
      preset: "disk",
      display: "Encryption Key Method",
      defaultValue: "urandom",
      options: ["urandom", "openssl", "manual"],
      visibleAll: [ENCRYPTED],
    });
    yield* createSetting(store, {
      name: "ENCRYPTION_KEY_LENGTH",
      type: "int",
      preset: "disk",
      display: "Encryption Key Length",
      defaultValue: "64",
      min: 32,
      max: 512,
      visibleAll: [ENCRYPTED],
    });
    yield* createSetting(store, {
      name: "ENCRYPTION_USE_PASSPHRASE",
      type: "toggle",
      preset: "disk",
      display: "Use Passphrase",
      defaultValue: "false",
      visibleAll: [ENCRYPTED],
    });
    yield* createSetting(store, {
      name: "ENCRYPTION_UNLOCK_MODE",
      type: "choice",
      preset: "disk",
      display: "Encryption Unlock Mode",
      defaultValue: "manual",
      options: ["manual", "dropbear", "tpm", "keyfile"],
      visibleAll: [ENCRYPTED],
    });
    yield* createSetting(store, {
      name: "ENCRYPTION_PASSPHRASE_METHOD",
      type: "choice",
      preset: "disk",
      display: "Passphrase Generation Method",
      defaultValue: "urandom",
      options: ["urandom", "openssl", "manual"],
      visibleAll: WITH_PASSPHRASE,
    });
    yield* createSetting(store, {
      name: "ENCRYPTION_PASSPHRASE_LENGTH",
      type: "int",
      preset: "disk",
      display: "Passphrase Length",
      defaultValue: "32",
      min: 16,
      max: 512,
      visibleAll: WITH_PASSPHRASE,
    });
    // Never written to the export file
    yield* createSetting(store, {
      name: "ENCRYPTION_PASSPHRASE",
      type: "secret",
      preset: "disk",
      display: "Passphrase",
      minLength: 8,
      required: true,
      exportable: false,
      visibleAll: [...WITH_PASSPHRASE, "ENCRYPTION_PASSPHRASE_METHOD==manual"],
    });
  });
