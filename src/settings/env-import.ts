// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment overrides: `<PREFIX>_<NAME>` for every declared setting.
 * Variables are read through Effect `Config`, so the active `ConfigProvider`
 * decides where they come from.
 */

import { Config, type ConfigError, Effect, Option, pipe } from "effect";
import type { ApplyCycleError, UnknownSettingError } from "../lib/errors";
import { type ConfigStore, assign, orderedSettings, set, setFailureMessage } from "./store";

export interface ImportSummary {
  /** Settings accepted through `set`, in import order. */
  readonly imported: readonly string[];
  /** Settings whose override failed validation and was stored as-is. */
  readonly invalid: readonly string[];
}

type ImportOutcome = "imported" | "invalid" | "absent";

export const overrideVariable = (prefix: string, name: string): string => `${prefix}_${name}`;

const readOverride = (prefix: string, name: string): Config.Config<Option.Option<string>> =>
  Config.nested(Config.option(Config.string(name)), prefix);

const importOne = (
  store: ConfigStore,
  prefix: string,
  name: string
): Effect.Effect<ImportOutcome, ConfigError.ConfigError | UnknownSettingError | ApplyCycleError> =>
  Effect.gen(function* () {
    const raw = yield* readOverride(prefix, name);
    const value = Option.getOrElse(raw, () => "");
    if (value === "") {
      return "absent";
    }
    return yield* pipe(
      set(store, name, value, "env"),
      Effect.as<ImportOutcome>("imported"),
      Effect.catchTag("ValidationError", (e) =>
        pipe(
          Effect.logWarning(
            `${overrideVariable(prefix, name)}: ${setFailureMessage(name, e)} (kept, fix before confirming)`
          ),
          Effect.zipRight(assign(store, name, value, "env")),
          Effect.as<ImportOutcome>("invalid")
        )
      )
    );
  });

/**
 * Import overrides in preset-priority then declaration order, so apply hooks
 * of later settings see values imported before them. Empty variables are
 * treated as unset.
 */
export const importEnv = (
  store: ConfigStore,
  prefix: string
): Effect.Effect<ImportSummary, ConfigError.ConfigError | UnknownSettingError | ApplyCycleError> =>
  Effect.gen(function* () {
    const imported: string[] = [];
    const invalid: string[] = [];
    for (const def of orderedSettings(store)) {
      const outcome = yield* importOne(store, prefix, def.name);
      if (outcome === "imported") {
        imported.push(def.name);
      } else if (outcome === "invalid") {
        invalid.push(def.name);
      }
    }
    const total = imported.length + invalid.length;
    if (total > 0) {
      yield* Effect.logInfo(
        `Imported ${total} setting(s) from ${prefix}_* variables` +
          (invalid.length > 0 ? `, ${invalid.length} invalid` : "")
      );
    } else {
      yield* Effect.logDebug(`No ${prefix}_* overrides found`);
    }
    return { imported, invalid };
  });
