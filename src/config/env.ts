// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for the configurator's own environment.
 *
 * All exports are pure `Config<A>` values; they are only read when yielded at
 * the CLI boundary, so tests can swap the provider with
 * `Effect.withConfigProvider`. Values that also exist in dps.toml are read as
 * `Option` so `resolve` can tell "unset" from "set to the default". Setting
 * overrides (`DPS_HOSTNAME` and friends) are read by the settings importer.
 */

import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

/** Namespace of the configurator's own variables (`DPSCFG_LOG_LEVEL`, ...). */
export const ENV_NAMESPACE = "DPSCFG";

export interface EnvOverrides {
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly prefix: Option.Option<string>;
  readonly autoConfirm: Option.Option<boolean>;
  readonly debug: boolean;
}

export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL")),
  ENV_NAMESPACE
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT")),
  ENV_NAMESPACE
);

/** Prefix of setting overrides; `DPSCFG_PREFIX=INST` reads `INST_HOSTNAME`. */
export const SettingPrefixOptionConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.string("PREFIX")),
  ENV_NAMESPACE
);

/** Unattended runs confirm the menu without waiting for a key. */
export const AutoConfirmOptionConfig: Config.Config<Option.Option<boolean>> = Config.nested(
  Config.option(Config.boolean("AUTO_CONFIRM")),
  ENV_NAMESPACE
);

/** When true, forces log level to debug. */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  ENV_NAMESPACE
);

export const EnvOverridesSpec: Config.Config<EnvOverrides> = Config.all({
  logLevel: LogLevelOptionConfig,
  logFormat: LogFormatOptionConfig,
  prefix: SettingPrefixOptionConfig,
  autoConfirm: AutoConfirmOptionConfig,
  debug: DebugModeConfig,
});

// ============================================================================
// Test Utilities
// ============================================================================

const envVarNames = {
  home: "HOME",
  logLevel: `${ENV_NAMESPACE}_LOG_LEVEL`,
  logFormat: `${ENV_NAMESPACE}_LOG_FORMAT`,
  prefix: `${ENV_NAMESPACE}_PREFIX`,
  autoConfirm: `${ENV_NAMESPACE}_AUTO_CONFIRM`,
  debug: `${ENV_NAMESPACE}_DEBUG`,
} as const;

const OVERRIDE_KEYS = ["home", "logLevel", "logFormat", "prefix", "autoConfirm", "debug"] as const;

export type TestConfigOverrides = {
  readonly [K in (typeof OVERRIDE_KEYS)[number]]?: string;
};

/**
 * ConfigProvider over a plain map, with `_` as the path delimiter so nested
 * configs resolve exactly like `ConfigProvider.fromEnv`. `extra` carries raw
 * variables such as setting overrides.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ logLevel: "debug" });
 * const env = Effect.runSync(Effect.withConfigProvider(EnvOverridesSpec, provider));
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {},
  extra: ReadonlyMap<string, string> = new Map()
): ConfigProvider.ConfigProvider => {
  const vars = new Map<string, string>([[envVarNames.home, "/home/tester"], ...extra]);
  for (const key of OVERRIDE_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      vars.set(envVarNames[key], value);
    }
  }
  return ConfigProvider.fromMap(vars, { pathDelim: "_" });
};
