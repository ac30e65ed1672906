// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Zod schema for dps.toml, the optional site-wide configuration file.
 *
 * ```toml
 * [logging]
 * level = "debug"
 *
 * [settings]
 * prefix = "DPS"
 * autoConfirm = false
 *
 * [defaults]
 * TIMEZONE = "Europe/Berlin"
 * SWAP_SIZE_MIB = 4096
 * ```
 */

import { z } from "zod";
import {
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  SETTING_PREFIX_DEFAULT,
} from "./field-values";

const ENV_PREFIX_REGEX = /^[A-Z][A-Z0-9_]*$/;

export const envPrefixSchema = z.string().regex(ENV_PREFIX_REGEX, {
  message: "Prefix must match [A-Z][A-Z0-9_]*",
});

/** TOML scalars are accepted for default overrides and kept as strings. */
export const settingValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((v) => String(v));

export const globalConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_VALUES).default(LOG_LEVEL_DEFAULT),
      format: z.enum(LOG_FORMAT_VALUES).default(LOG_FORMAT_DEFAULT),
    })
    .default({}),
  settings: z
    .object({
      prefix: envPrefixSchema.default(SETTING_PREFIX_DEFAULT),
      autoConfirm: z.boolean().default(false),
    })
    .default({}),
  /** Replacement default values, keyed by setting name. Origin stays `default`. */
  defaults: z.record(settingValueSchema).default({}),
});

export type GlobalConfig = z.infer<typeof globalConfigSchema>;
