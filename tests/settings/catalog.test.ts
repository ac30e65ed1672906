// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import { bindSettingType, createCatalog, hasType, listTypes, registerType } from "../../src/settings/catalog";
import { builtinCatalog } from "../../src/settings/types";
import { NoAttributes } from "../../src/settings/types/primitive";

describe("catalog", () => {
  test("builtin catalog registers every type", () => {
    expect(listTypes(builtinCatalog())).toEqual([
      "text",
      "string",
      "int",
      "float",
      "toggle",
      "question",
      "choice",
      "secret",
      "ip",
      "netmask",
      "port",
      "hostname",
      "country",
      "timezone",
      "locale",
      "keyboard",
      "keyboard_variant",
      "username",
      "path",
      "url",
      "disk",
      "disk_size",
    ]);
  });

  test("registering a name twice replaces the type", () => {
    const catalog = createCatalog();
    registerType(catalog, { name: "flag", attributes: NoAttributes, validate: () => true, errorMessage: () => "" });
    registerType(catalog, {
      name: "flag",
      attributes: NoAttributes,
      validate: (v) => v === "on",
      errorMessage: () => "on only",
    });
    expect(listTypes(catalog)).toEqual(["flag"]);
    const bound = bindSettingType(catalog, "F", "flag", {});
    expect(Either.map(bound, (b) => b.validate("off"))).toEqual(Either.right(false));
  });

  test("unknown types fail binding", () => {
    const result = bindSettingType(createCatalog(), "X", "nope", {});
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("UnknownTypeError");
      expect(result.left.message).toBe("Setting X uses unknown type 'nope'");
    }
  });

  test("attributes are decoded once at binding", () => {
    const catalog = builtinCatalog();
    const choice = bindSettingType(catalog, "FS_TYPE", "choice", { options: ["btrfs", "ext4"] });
    expect(Either.map(choice, (b) => [b.validate("ext4"), b.validate("zfs"), b.promptHint(() => Option.none())])).toEqual(
      Either.right([true, false, "(btrfs, ext4)"])
    );

    const missing = bindSettingType(catalog, "FS_TYPE", "choice", {});
    expect(Either.isLeft(missing)).toBe(true);
    if (Either.isLeft(missing)) {
      expect(missing.left._tag).toBe("MissingAttributeError");
      expect(missing.left.message.startsWith("Setting FS_TYPE (choice) has invalid attributes:\n")).toBe(true);
    }
  });

  test("hooks default to identity and no apply", () => {
    const bound = bindSettingType(builtinCatalog(), "NOTE", "text", {});
    expect(Either.map(bound, (b) => [b.normalize("X"), b.display("X"), Option.isNone(b.apply), b.masked])).toEqual(
      Either.right(["X", "X", true, false])
    );
    expect(hasType(builtinCatalog(), "secret")).toBe(true);
    expect(hasType(builtinCatalog(), "password")).toBe(false);
  });
});
