// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Region setting types. Choosing a country fills timezone, locale and
 * keyboard from the table in countries.json.
 */

import { Option, Schema, pipe } from "effect";
import { isAlphaNum, isLower, isDigit, isUpper } from "../../lib/char";
import { parseLocale, parseTimezone } from "../../lib/schema-utils";
import { all } from "../../lib/str";
import type { SettingType, SettingWrite } from "../model";
import countriesJson from "./countries.json";
import { NoAttributes } from "./primitive";

const CountryDefaults = Schema.Struct({
  timezone: Schema.String,
  locale: Schema.String,
  keyboardLayout: Schema.String,
  keyboardVariant: Schema.optional(Schema.String),
});
export type CountryDefaults = typeof CountryDefaults.Type;

const CountryTable = Schema.Record({ key: Schema.String, value: CountryDefaults });

/** ISO 3166-1 alpha-2 code (plus `UK`) to regional defaults. */
export const COUNTRY_DEFAULTS: ReadonlyMap<string, CountryDefaults> = new Map(
  Object.entries(Schema.decodeUnknownSync(CountryTable)(countriesJson))
);

export const countryDefaults = (code: string): Option.Option<CountryDefaults> =>
  Option.fromNullable(COUNTRY_DEFAULTS.get(code));

/** Settings a country selection writes. */
export const REGION_SETTINGS = {
  timezone: "TIMEZONE",
  locale: "LOCALE",
  keyboardLayout: "KEYBOARD_LAYOUT",
  keyboardVariant: "KEYBOARD_VARIANT",
} as const;

const isCountryCode = (value: string): boolean => value.length === 2 && all(isUpper)(value);

export const countryType: SettingType<NoAttributes> = {
  name: "country",
  attributes: NoAttributes,
  validate: (value) => isCountryCode(value) && COUNTRY_DEFAULTS.has(value),
  normalize: (value) => value.toUpperCase(),
  errorMessage: (value) =>
    isCountryCode(value)
      ? "Country code not in database. Use common codes: US, DE, UK, FR, ES, IT, NL, CH, AT, etc."
      : "Invalid country code. Use 2-letter ISO code (e.g., US, DE, UK)",
  promptHint: () => "(US, DE, UK, FR, ES, IT, NL, etc. - 2-letter ISO code)",
  apply: (value): readonly SettingWrite[] =>
    pipe(
      countryDefaults(value),
      Option.match({
        onNone: (): readonly SettingWrite[] => [],
        onSome: (d): readonly SettingWrite[] => [
          { setting: REGION_SETTINGS.timezone, value: d.timezone },
          { setting: REGION_SETTINGS.locale, value: d.locale },
          { setting: REGION_SETTINGS.keyboardLayout, value: d.keyboardLayout },
          { setting: REGION_SETTINGS.keyboardVariant, value: d.keyboardVariant ?? "" },
        ],
      })
    ),
};

export const timezoneType: SettingType<NoAttributes> = {
  name: "timezone",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parseTimezone(value)),
  errorMessage: () => "Invalid timezone. Use Region/City (e.g., Europe/Berlin) or UTC",
  promptHint: () => "(e.g., UTC, Europe/Berlin, America/New_York)",
};

export const localeType: SettingType<NoAttributes> = {
  name: "locale",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parseLocale(value)),
  normalize: (value) => value.replace(/\.utf8$/, ".UTF-8"),
  errorMessage: () => "Invalid locale format. Use: language_COUNTRY.UTF-8 (e.g., en_US.UTF-8)",
  promptHint: () => "(e.g., en_US.UTF-8, de_DE.UTF-8, fr_FR.UTF-8)",
};

export const keyboardType: SettingType<NoAttributes> = {
  name: "keyboard",
  attributes: NoAttributes,
  validate: (value) =>
    value.length >= 2 && value.length <= 15 && all((c) => isLower(c) || isDigit(c) || c === "-")(value),
  normalize: (value) => value.toLowerCase(),
  errorMessage: () => "Invalid keyboard layout. Use lowercase layout name (e.g., us, de, dvorak)",
  promptHint: () => "(us, de, fr, uk, es, it, dvorak, colemak, etc.)",
};

const VARIANT_HINTS: ReadonlyMap<string, string> = new Map([
  ["us", "dvorak, colemak, intl, altgr-intl"],
  ["de", "nodeadkeys, neo, bone, deadacute"],
  ["fr", "oss, nodeadkeys, bepo, latin9"],
  ["ch", "de_nodeadkeys, fr_nodeadkeys, de_mac, fr_mac"],
  ["br", "abnt2, nodeadkeys"],
  ["uk", "extd, intl, mac"],
  ["gb", "extd, intl, mac"],
]);

/** The hint follows the currently selected layout. */
export const keyboardVariantType: SettingType<NoAttributes> = {
  name: "keyboard_variant",
  attributes: NoAttributes,
  validate: all((c) => isAlphaNum(c) || c === "_" || c === "-"),
  errorMessage: () =>
    "Invalid keyboard variant. Use alphanumeric characters, hyphens, underscores, or leave empty",
  promptHint: (_attrs, lookup) => {
    const layout = Option.getOrElse(lookup(REGION_SETTINGS.keyboardLayout), () => "us");
    return pipe(
      Option.fromNullable(VARIANT_HINTS.get(layout)),
      Option.match({
        onNone: () => `(variant for ${layout} layout, or empty for standard)`,
        onSome: (variants) => `(${variants}, or empty for standard)`,
      })
    );
  },
};
