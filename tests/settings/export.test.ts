// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import { describe, expect, test } from "vitest";
import { createInstallerStore } from "../../src/presets";
import {
  exportAll,
  exportLine,
  exportNonDefaults,
  parseExport,
  renderExport,
} from "../../src/settings/export";
import { type ConfigStore, createPreset, createSetting, createStore, set } from "../../src/settings/store";
import { builtinCatalog } from "../../src/settings/types";
import { runQuiet } from "../helpers/layers";

const smallStore = (): ConfigStore => {
  const store = createStore(builtinCatalog());
  runQuiet(
    Effect.gen(function* () {
      yield* createPreset(store, { name: "late", priority: 60 });
      yield* createPreset(store, { name: "early", priority: 10 });
      yield* createSetting(store, { name: "MOTD", type: "text", preset: "late", defaultValue: "hello" });
      yield* createSetting(store, { name: "TOKEN", type: "secret", preset: "late", exportable: false });
      yield* createSetting(store, { name: "HOSTNAME", type: "hostname", preset: "early", defaultValue: "nixos" });
      yield* createSetting(store, { name: "DOMAIN", type: "text", preset: "early" });
    })
  );
  return store;
};

describe("exportLine", () => {
  test("quotes and escapes the value", () => {
    expect(exportLine("DPS", "MOTD", 'say "hi" to $USER')).toBe('export DPS_MOTD="say \\"hi\\" to \\$USER"');
    expect(exportLine("DPS", "DOMAIN", "")).toBe('export DPS_DOMAIN=""');
  });
});

describe("exportAll", () => {
  test("orders by preset priority and skips unexportable settings", () => {
    expect(exportAll(smallStore(), "DPS")).toEqual([
      'export DPS_HOSTNAME="nixos"',
      'export DPS_DOMAIN=""',
      'export DPS_MOTD="hello"',
    ]);
  });

  test("annotates preset groups", () => {
    expect(exportAll(smallStore(), "INST", { annotate: true })).toEqual([
      "# preset: early",
      'export INST_HOSTNAME="nixos"',
      'export INST_DOMAIN=""',
      "# preset: late",
      'export INST_MOTD="hello"',
    ]);
  });
});

describe("exportNonDefaults", () => {
  test("leaves out settings at their default", () => {
    const store = smallStore();
    runQuiet(set(store, "MOTD", "maintenance tonight", "manual"));
    runQuiet(set(store, "TOKEN", "test-secret", "manual"));
    expect(exportNonDefaults(store, "DPS")).toEqual(['export DPS_MOTD="maintenance tonight"']);
  });

  test("a value equal to the default still counts once it was set", () => {
    const store = smallStore();
    runQuiet(set(store, "HOSTNAME", "nixos", "prompt"));
    expect(exportNonDefaults(store, "DPS")).toEqual(['export DPS_HOSTNAME="nixos"']);
  });

  test("derived values are exported, the country itself is not", () => {
    const store = runQuiet(createInstallerStore());
    runQuiet(set(store, "COUNTRY", "DE", "manual"));
    expect(exportNonDefaults(store, "DPS")).toEqual([
      'export DPS_TIMEZONE="Europe/Berlin"',
      'export DPS_LOCALE="de_DE.UTF-8"',
      'export DPS_KEYBOARD_LAYOUT="de"',
      'export DPS_KEYBOARD_VARIANT="nodeadkeys"',
    ]);
  });
});

describe("renderExport", () => {
  test("adds a trailing newline", () => {
    expect(renderExport(["a", "b"])).toBe("a\nb\n");
    expect(renderExport([])).toBe("");
  });
});

describe("parseExport", () => {
  test("reads exported values back", () => {
    const store = smallStore();
    runQuiet(set(store, "MOTD", 'a "quoted" $value', "manual"));
    const parsed = parseExport(renderExport(exportAll(store, "DPS")), "DPS");
    expect(parsed.get("MOTD")).toBe('a "quoted" $value');
    expect(Array.from(parsed.keys())).toEqual(["HOSTNAME", "DOMAIN", "MOTD"]);
  });

  test("values spanning several lines read back whole", () => {
    const store = smallStore();
    runQuiet(set(store, "MOTD", "line one\n  line two", "manual"));
    runQuiet(set(store, "DOMAIN", "x\nDPS_HOSTNAME=elsewhere", "manual"));
    const parsed = parseExport(renderExport(exportAll(store, "DPS")), "DPS");
    expect(Array.from(parsed.entries())).toEqual([
      ["HOSTNAME", "nixos"],
      ["DOMAIN", "x\nDPS_HOSTNAME=elsewhere"],
      ["MOTD", "line one\n  line two"],
    ]);
  });

  test("without a prefix keys are variable names", () => {
    const parsed = parseExport("export DPS_A=\"1\"\nB='2'\n");
    expect(Array.from(parsed.entries())).toEqual([
      ["DPS_A", "1"],
      ["B", "2"],
    ]);
  });

  test("skips other prefixes and keeps the last assignment", () => {
    const parsed = parseExport('export DPS_A="1"\nexport OTHER_B="2"\nexport DPS_="3"\nexport DPS_A="4"\n', "DPS");
    expect(Array.from(parsed.entries())).toEqual([["A", "4"]]);
  });
});
