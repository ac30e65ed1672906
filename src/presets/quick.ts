// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { RegistrationError } from "../lib/errors";
import { type ConfigStore, createPreset, createSetting } from "../settings/store";

/** Country selection, which seeds the region preset through its apply hook. */
export const declareQuickPreset = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* createPreset(store, { name: "quick", display: "Quick Setup", priority: 5 });
    yield* createSetting(store, {
      name: "COUNTRY",
      type: "country",
      preset: "quick",
      display: "Country (quick setup)",
      exportable: false,
    });
  });
