// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { hasUrlScheme, isPathLike, parsePosixUsername } from "../../lib/schema-utils";
import type { SettingType } from "../model";
import { NoAttributes } from "./primitive";

export const usernameType: SettingType<NoAttributes> = {
  name: "username",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parsePosixUsername(value)),
  errorMessage: () => "Invalid username (2-32 chars, start with lowercase letter or underscore)",
  promptHint: () => "(2-32 chars, lowercase, start with letter or underscore)",
};

export const pathType: SettingType<NoAttributes> = {
  name: "path",
  attributes: NoAttributes,
  validate: isPathLike,
  errorMessage: () => "Invalid path (must start with /, ~, or .)",
  promptHint: () => "(absolute or relative path)",
};

export const urlType: SettingType<NoAttributes> = {
  name: "url",
  attributes: NoAttributes,
  validate: hasUrlScheme,
  errorMessage: () => "Invalid URL (must start with http://, https://, git://, or ssh://)",
  promptHint: () => "(http://, https://, git://, or ssh://)",
};
