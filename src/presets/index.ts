// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The installer's preset declarations. Order matters only for visibility
 * references, which must point at settings declared earlier.
 */

import { Effect } from "effect";
import type { RegistrationError } from "../lib/errors";
import type { Catalog } from "../settings/catalog";
import { type ConfigStore, createStore } from "../settings/store";
import { builtinCatalog } from "../settings/types";
import { declareBootPreset } from "./boot";
import { declareDiskPreset } from "./disk";
import { declareNetworkPreset } from "./network";
import { declareQuickPreset } from "./quick";
import { declareRegionPreset } from "./region";
import { declareSecurityPreset } from "./security";

export const registerInstallerPresets = (store: ConfigStore): Effect.Effect<void, RegistrationError> =>
  Effect.gen(function* () {
    yield* declareQuickPreset(store);
    yield* declareNetworkPreset(store);
    yield* declareDiskPreset(store);
    yield* declareBootPreset(store);
    yield* declareSecurityPreset(store);
    yield* declareRegionPreset(store);
  });

/** A store with the built-in types and every installer preset declared. */
export const createInstallerStore = (
  catalog: Catalog = builtinCatalog()
): Effect.Effect<ConfigStore, RegistrationError> =>
  Effect.gen(function* () {
    const store = createStore(catalog);
    yield* registerInstallerPresets(store);
    return store;
  });

export { validateNetwork } from "./network";
