// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Configuration module exports.
 */

export { envPrefixSchema, globalConfigSchema, settingValueSchema } from "./schema";
export type { GlobalConfig } from "./schema";

export {
  defaultGlobalConfig,
  defaultGlobalConfigPaths,
  loadGlobalConfig,
  loadGlobalConfigWithHome,
  loadTomlFile,
} from "./loader";

export { EnvOverridesSpec, createTestConfigProvider } from "./env";
export type { EnvOverrides } from "./env";

export { resolve, resolveConfig } from "./resolve";
export type { CliOverrides, ConfigField, ResolvedConfig } from "./resolve";
