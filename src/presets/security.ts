// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { RegistrationError } from "../lib/errors";
import { type ConfigStore, createPreset, createSetting } from "../settings/store";

export const declareSecurityPreset = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* createPreset(store, { name: "security", display: "Security", priority: 40 });
    yield* createSetting(store, {
      name: "SECURE_BOOT",
      type: "toggle",
      preset: "security",
      display: "Enable Secure Boot",
      defaultValue: "false",
    });
    yield* createSetting(store, {
      name: "SECURE_BOOT_METHOD",
      type: "choice",
      preset: "security",
      display: "Secure Boot Method",
      defaultValue: "lanzaboote",
      options: ["lanzaboote", "sbctl"],
      visibleAll: ["SECURE_BOOT==true"],
    });
    yield* createSetting(store, {
      name: "FIREWALL_ENABLE",
      type: "toggle",
      preset: "security",
      display: "Enable Firewall",
      defaultValue: "true",
    });
    yield* createSetting(store, {
      name: "HARDENING_ENABLE",
      type: "toggle",
      preset: "security",
      display: "Apply Security Hardening",
      defaultValue: "true",
    });
    yield* createSetting(store, {
      name: "FAIL2BAN_ENABLE",
      type: "toggle",
      preset: "security",
      display: "Enable Fail2Ban",
      defaultValue: "false",
    });
  });
