// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Store preparation shared by every command: declare the presets, lay the
 * site defaults from dps.toml over the built-in ones, then import
 * `<PREFIX>_<NAME>` overrides. Also reading and writing export files.
 */

import { FileSystem } from "@effect/platform";
import { ConfigError as EnvConfigError, Effect, Option, pipe } from "effect";
import type { ResolvedConfig } from "../../config/resolve";
import {
  type ApplyCycleError,
  ConfigError,
  ErrorCode,
  type RegistrationError,
  SystemError,
  type UnknownSettingError,
  type ValidationError,
  errorMessage,
} from "../../lib/errors";
import { logSuccess, writeOutput } from "../../lib/log";
import { createInstallerStore } from "../../presets";
import { importEnv } from "../../settings/env-import";
import { parseExport } from "../../settings/export";
import {
  type ConfigStore,
  findSetting,
  orderedSettings,
  set,
  setDefault,
  setFailureMessage,
} from "../../settings/store";

export type PrepareError =
  | RegistrationError
  | ValidationError
  | UnknownSettingError
  | ApplyCycleError
  | ConfigError;

/** Environment read failures surface as configuration errors. */
export const fromEnvConfigError = (e: EnvConfigError.ConfigError): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `Invalid environment: ${errorMessage(e)}`,
  });

/** Site defaults name settings directly; a typo fails with UnknownSettingError. */
const applySiteDefaults = (
  store: ConfigStore,
  defaults: Readonly<Record<string, string>>
): Effect.Effect<void, ValidationError | UnknownSettingError> =>
  Effect.forEach(Object.entries(defaults), ([name, value]) => setDefault(store, name, value), {
    discard: true,
  });

export const prepareStore = (config: ResolvedConfig): Effect.Effect<ConfigStore, PrepareError> =>
  Effect.gen(function* () {
    const store = yield* createInstallerStore();
    yield* applySiteDefaults(store, config.defaults);
    yield* pipe(importEnv(store, config.prefix), Effect.mapError(narrowImportError));
    return store;
  });

const narrowImportError = (
  e: EnvConfigError.ConfigError | UnknownSettingError | ApplyCycleError
): ConfigError | UnknownSettingError | ApplyCycleError =>
  EnvConfigError.isConfigError(e) ? fromEnvConfigError(e) : e;

/** Print to stdout, or write the file when `--output` was given. */
export const emit = (
  content: string,
  output: Option.Option<string>
): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
  Option.match(output, {
    onNone: (): Effect.Effect<void> =>
      content === "" ? Effect.void : writeOutput(content.replace(/\n$/, "")),
    onSome: (path): Effect.Effect<void, SystemError, FileSystem.FileSystem> =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        yield* pipe(
          fs.writeFileString(path, content),
          Effect.mapError(
            (e) =>
              new SystemError({
                code: ErrorCode.FILE_WRITE_FAILED,
                message: `Failed to write ${path}: ${e.message}`,
                cause: e,
              })
          )
        );
        yield* logSuccess(`Wrote ${path}`);
      }),
  });

/**
 * Load values from an export file written by an earlier run, origin `manual`.
 * Variables without the prefix are skipped; unknown settings and invalid
 * values are reported and left out.
 */
export const loadExportFile = (
  store: ConfigStore,
  path: string,
  prefix: string
): Effect.Effect<number, SystemError | ApplyCycleError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const content = yield* pipe(
      fs.readFileString(path),
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${path}: ${e.message}`,
            cause: e,
          })
      )
    );
    const values = parseExport(content, prefix);
    for (const name of values.keys()) {
      if (Option.isNone(findSetting(store, name))) {
        yield* Effect.logWarning(`${path}: unknown setting ${name}`);
      }
    }
    // Same order as the environment import, so explicit values win over cascades
    let loaded = 0;
    for (const { name } of orderedSettings(store)) {
      const value = values.get(name);
      if (value === undefined) {
        continue;
      }
      const ok = yield* pipe(
        set(store, name, value, "manual"),
        Effect.as(true),
        Effect.catchTags({
          ValidationError: (e) =>
            Effect.as(Effect.logWarning(`${path}: ${name}: ${setFailureMessage(name, e)}`), false),
          UnknownSettingError: (e) => Effect.as(Effect.logWarning(`${path}: ${name}: ${e.message}`), false),
        })
      );
      loaded += ok ? 1 : 0;
    }
    yield* Effect.logInfo(`Loaded ${loaded} setting(s) from ${path}`);
    return loaded;
  });
