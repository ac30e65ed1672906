// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option, pipe } from "effect";
import { describe, expect, test } from "vitest";
import { createInstallerStore } from "../../src/presets";
import { parseNat } from "../../src/lib/schema-utils";
import { registerType } from "../../src/settings/catalog";
import type { SettingType } from "../../src/settings/model";
import {
  type ConfigStore,
  createPreset,
  createSetting,
  createStore,
  get,
  getOrigin,
  set,
  setFailureMessage,
} from "../../src/settings/store";
import { builtinCatalog } from "../../src/settings/types";
import { NoAttributes } from "../../src/settings/types/primitive";
import { failureOf, runQuiet, runQuietExit } from "../helpers/layers";

const valueAndOrigin = (store: ConfigStore, name: string): readonly [string, string] =>
  runQuiet(Effect.all([get(store, name), getOrigin(store, name)]));

describe("country cascade", () => {
  test("a manual country write fills the region with origin auto", () => {
    const store = runQuiet(createInstallerStore());
    runQuiet(set(store, "COUNTRY", "de", "manual"));

    expect(valueAndOrigin(store, "COUNTRY")).toEqual(["DE", "manual"]);
    expect(valueAndOrigin(store, "TIMEZONE")).toEqual(["Europe/Berlin", "auto"]);
    expect(valueAndOrigin(store, "LOCALE")).toEqual(["de_DE.UTF-8", "auto"]);
    expect(valueAndOrigin(store, "KEYBOARD_LAYOUT")).toEqual(["de", "auto"]);
    expect(valueAndOrigin(store, "KEYBOARD_VARIANT")).toEqual(["nodeadkeys", "auto"]);
    expect(store.applying).toEqual([]);
  });

  test("env and prompt writes cascade as well", () => {
    const store = runQuiet(createInstallerStore());
    runQuiet(set(store, "COUNTRY", "FR", "env"));
    expect(valueAndOrigin(store, "TIMEZONE")).toEqual(["Europe/Paris", "auto"]);
    runQuiet(set(store, "COUNTRY", "UK", "prompt"));
    expect(valueAndOrigin(store, "KEYBOARD_VARIANT")).toEqual(["", "auto"]);
  });

  test("auto and default writes do not cascade", () => {
    const store = runQuiet(createInstallerStore());
    runQuiet(set(store, "COUNTRY", "DE", "auto"));
    expect(valueAndOrigin(store, "TIMEZONE")).toEqual(["UTC", "default"]);
    runQuiet(set(store, "COUNTRY", "CH", "default"));
    expect(valueAndOrigin(store, "TIMEZONE")).toEqual(["UTC", "default"]);
  });

  test("a later manual write overrides the derived value", () => {
    const store = runQuiet(createInstallerStore());
    runQuiet(set(store, "COUNTRY", "DE", "manual"));
    runQuiet(set(store, "TIMEZONE", "UTC", "manual"));
    expect(valueAndOrigin(store, "TIMEZONE")).toEqual(["UTC", "manual"]);
    expect(valueAndOrigin(store, "LOCALE")).toEqual(["de_DE.UTF-8", "auto"]);
  });
});

/** Each value names the setting its hook writes next. */
const relay = (name: string, target: string): SettingType<typeof NoAttributes.Type> => ({
  name,
  attributes: NoAttributes,
  validate: () => true,
  errorMessage: () => "",
  apply: (value) => [{ setting: target, value }],
});

/** `S<n>` holding `n+1` writes `S<n+1>`, up to `S9`. */
const hopType: SettingType<typeof NoAttributes.Type> = {
  name: "hop",
  attributes: NoAttributes,
  validate: (value) => Option.isSome(parseNat(value)),
  errorMessage: () => "Must be a number",
  apply: (value) =>
    pipe(
      parseNat(value),
      Option.filter((n) => n < 10),
      Option.match({
        onNone: () => [],
        onSome: (n) => [{ setting: `S${n}`, value: String(n + 1) }],
      })
    ),
};

const chainStore = (): ConfigStore => {
  const catalog = builtinCatalog();
  registerType(catalog, relay("ping", "PONG"));
  registerType(catalog, relay("pong", "PING"));
  registerType(catalog, hopType);
  const store = createStore(catalog);
  runQuiet(
    Effect.gen(function* () {
      yield* createPreset(store, { name: "chain" });
      yield* createSetting(store, { name: "PING", type: "ping", preset: "chain" });
      yield* createSetting(store, { name: "PONG", type: "pong", preset: "chain" });
      for (let i = 0; i < 10; i++) {
        yield* createSetting(store, { name: `S${i}`, type: "hop", preset: "chain" });
      }
    })
  );
  return store;
};

describe("cascade guard", () => {
  test("a hook that re-enters its own setting is a cycle", () => {
    const store = chainStore();
    const error = failureOf(runQuietExit(set(store, "PING", "x", "manual")));
    expect(Option.map(error, (e) => e._tag)).toEqual(Option.some("ApplyCycleError"));
    expect(Option.map(error, (e) => e.message)).toEqual(Option.some("Apply hooks form a cycle: PING -> PONG -> PING"));
    expect(store.applying).toEqual([]);
  });

  test("chains deeper than the limit fail", () => {
    const store = chainStore();
    const error = failureOf(runQuietExit(set(store, "S0", "1", "manual")));
    expect(Option.map(error, (e) => e.message)).toEqual(
      Option.some("Apply hooks nested deeper than 8: S0 -> S1 -> S2 -> S3 -> S4 -> S5 -> S6 -> S7 -> S8")
    );
    expect(store.applying).toEqual([]);
  });

  test("shorter chains complete", () => {
    const store = chainStore();
    runQuiet(set(store, "S5", "6", "manual"));
    expect(valueAndOrigin(store, "S9")).toEqual(["10", "auto"]);
    expect(valueAndOrigin(store, "S5")).toEqual(["6", "manual"]);
  });
});

/** Writes a valid note, then a port out of range. */
const seedType: SettingType<typeof NoAttributes.Type> = {
  name: "seed",
  attributes: NoAttributes,
  validate: () => true,
  errorMessage: () => "",
  apply: () => [
    { setting: "NOTE", value: "x" },
    { setting: "PORT", value: "99999" },
  ],
};

const seedStore = (): ConfigStore => {
  const catalog = builtinCatalog();
  registerType(catalog, seedType);
  const store = createStore(catalog);
  runQuiet(
    Effect.gen(function* () {
      yield* createPreset(store, { name: "seeded" });
      yield* createSetting(store, { name: "SEED", type: "seed", preset: "seeded" });
      yield* createSetting(store, { name: "NOTE", type: "text", preset: "seeded" });
      yield* createSetting(store, { name: "PORT", type: "port", preset: "seeded", defaultValue: "8080" });
    })
  );
  return store;
};

describe("failed cascades", () => {
  test("an invalid derived write rolls back the value and earlier derived writes", () => {
    const store = seedStore();
    const error = failureOf(runQuietExit(set(store, "SEED", "v", "prompt")));

    expect(Option.map(error, (e) => (e._tag === "ValidationError" ? e.setting : e._tag))).toEqual(
      Option.some("PORT")
    );
    expect(valueAndOrigin(store, "SEED")).toEqual(["", "default"]);
    expect(valueAndOrigin(store, "NOTE")).toEqual(["", "default"]);
    expect(valueAndOrigin(store, "PORT")).toEqual(["8080", "default"]);
    expect(store.applying).toEqual([]);
  });

  test("the failure message names the derived setting", () => {
    const error = failureOf(runQuietExit(set(seedStore(), "SEED", "v", "prompt")));
    const message = Option.flatMap(error, (e) =>
      e._tag === "ValidationError" ? Option.some(setFailureMessage("SEED", e)) : Option.none()
    );
    expect(message).toEqual(Option.some("PORT: Port must be between 1 and 65535"));
  });

  test("a cycle also leaves the store untouched", () => {
    const store = chainStore();
    runQuietExit(set(store, "PING", "x", "manual"));
    expect(valueAndOrigin(store, "PING")).toEqual(["", "default"]);
    expect(valueAndOrigin(store, "PONG")).toEqual(["", "default"]);
  });
});
