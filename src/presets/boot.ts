// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { RegistrationError } from "../lib/errors";
import { type ConfigStore, createPreset, createSetting } from "../settings/store";

export const declareBootPreset = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* createPreset(store, { name: "boot", display: "Boot", priority: 30 });
    yield* createSetting(store, {
      name: "UEFI_MODE",
      type: "toggle",
      preset: "boot",
      display: "UEFI Mode",
      defaultValue: "true",
    });
    yield* createSetting(store, {
      name: "BOOTLOADER",
      type: "choice",
      preset: "boot",
      display: "Bootloader",
      defaultValue: "systemd-boot",
      options: ["systemd-boot", "grub", "refind"],
    });
  });
