// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/** Provenance of a setting's current value. */
export const ORIGIN_VALUES = ["default", "env", "prompt", "auto", "manual"] as const;
export type Origin = (typeof ORIGIN_VALUES)[number];

/**
 * Origins whose writes start an apply cascade. Writes with any origin made
 * while a cascade is running (the derived `auto` writes) continue it.
 */
export const APPLY_ORIGINS: ReadonlySet<Origin> = new Set<Origin>(["env", "prompt", "manual"]);

export const VISIBILITY_MODE_VALUES = ["all", "any"] as const;
export type VisibilityMode = (typeof VISIBILITY_MODE_VALUES)[number];

export const COMPARISON_OP_VALUES = ["==", "!=", "<=", ">=", "<", ">"] as const;
export type ComparisonOp = (typeof COMPARISON_OP_VALUES)[number];

/** Prefix for `<PREFIX>_<NAME>` environment overrides and export lines. */
export const SETTING_PREFIX_DEFAULT = "DPS";
