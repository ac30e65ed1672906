// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { type Catalog, createCatalog, registerType } from "../catalog";
import { diskSizeType, diskType } from "./disk";
import { hostnameType, ipType, netmaskType, portType } from "./network";
import {
  choiceType,
  floatType,
  intType,
  questionType,
  secretType,
  stringType,
  textType,
  toggleType,
} from "./primitive";
import { countryType, keyboardType, keyboardVariantType, localeType, timezoneType } from "./region";
import { pathType, urlType, usernameType } from "./system";

export const registerBuiltinTypes = (catalog: Catalog): void => {
  registerType(catalog, textType);
  registerType(catalog, stringType);
  registerType(catalog, intType);
  registerType(catalog, floatType);
  registerType(catalog, toggleType);
  registerType(catalog, questionType);
  registerType(catalog, choiceType);
  registerType(catalog, secretType);

  registerType(catalog, ipType);
  registerType(catalog, netmaskType);
  registerType(catalog, portType);
  registerType(catalog, hostnameType);

  registerType(catalog, countryType);
  registerType(catalog, timezoneType);
  registerType(catalog, localeType);
  registerType(catalog, keyboardType);
  registerType(catalog, keyboardVariantType);

  registerType(catalog, usernameType);
  registerType(catalog, pathType);
  registerType(catalog, urlType);

  registerType(catalog, diskType);
  registerType(catalog, diskSizeType);
};

/** A catalog holding every built-in type. */
export const builtinCatalog = (): Catalog => {
  const catalog = createCatalog();
  registerBuiltinTypes(catalog);
  return catalog;
};

export { COUNTRY_DEFAULTS, REGION_SETTINGS, countryDefaults } from "./region";
export type { CountryDefaults } from "./region";
export { maskSecret, NoAttributes } from "./primitive";
