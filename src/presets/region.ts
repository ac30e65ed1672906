// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { RegistrationError } from "../lib/errors";
import { type ConfigStore, createPreset, createSetting } from "../settings/store";
import { REGION_SETTINGS } from "../settings/types";

export const declareRegionPreset = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* createPreset(store, { name: "region", display: "Region", priority: 50 });
    yield* createSetting(store, {
      name: REGION_SETTINGS.timezone,
      type: "timezone",
      preset: "region",
      display: "Timezone",
      defaultValue: "UTC",
    });
    yield* createSetting(store, {
      name: REGION_SETTINGS.locale,
      type: "locale",
      preset: "region",
      display: "Primary Locale",
      defaultValue: "en_US.UTF-8",
    });
    yield* createSetting(store, {
      name: "LOCALE_EXTRA",
      type: "text",
      preset: "region",
      display: "Additional Locales",
    });
    yield* createSetting(store, {
      name: REGION_SETTINGS.keyboardLayout,
      type: "keyboard",
      preset: "region",
      display: "Keyboard Layout",
      defaultValue: "us",
    });
    yield* createSetting(store, {
      name: REGION_SETTINGS.keyboardVariant,
      type: "keyboard_variant",
      preset: "region",
      display: "Keyboard Variant (optional)",
    });
  });
