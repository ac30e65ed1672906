// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { createInstallerStore } from "../../src/presets";
import { type ConfigStore, assign, set } from "../../src/settings/store";
import {
  failingCrossFieldPresets,
  failingSettings,
  issueLine,
  validateAll,
  validatePreset,
  validateSetting,
} from "../../src/settings/validation";
import { runQuiet } from "../helpers/layers";

const installer = (): ConfigStore => runQuiet(createInstallerStore());

describe("validateSetting", () => {
  test("reports a required value", () => {
    const store = installer();
    const issue = runQuiet(validateSetting(store, "DISK_TARGET"));
    expect(Option.map(issue, issueLine)).toEqual(Option.some("DISK_TARGET: A value is required"));
  });

  test("skips invisible settings", () => {
    const store = installer();
    expect(Option.isNone(runQuiet(validateSetting(store, "NETWORK_IP")))).toBe(true);
  });

  test("an invalid value on an invisible setting is not counted", () => {
    const store = installer();
    runQuiet(assign(store, "NETWORK_IP", "not-an-address", "env"));
    expect(runQuiet(validatePreset(store, "network")).issues).toBe(0);
    runQuiet(set(store, "NETWORK_METHOD", "static", "manual"));
    expect(runQuiet(validatePreset(store, "network")).errors.map(issueLine)).toEqual([
      "NETWORK_IP: Invalid IPv4 address (four octets 0-255, e.g. 192.168.1.10)",
      "NETWORK_GATEWAY: A value is required",
    ]);
  });

  test("revalidates assigned values", () => {
    const store = installer();
    runQuiet(assign(store, "SWAP_SIZE_MIB", "-4", "env"));
    const issue = runQuiet(validateSetting(store, "SWAP_SIZE_MIB"));
    expect(Option.map(issue, issueLine)).toEqual(Option.some("SWAP_SIZE_MIB: Must be >= 0"));
  });
});

describe("validateAll", () => {
  test("a fresh installer store only misses the target disk", () => {
    const report = runQuiet(validateAll(installer()));
    expect(report.issues).toBe(1);
    expect(report.presets.map((p) => [p.preset, p.issues])).toEqual([
      ["quick", 0],
      ["network", 0],
      ["disk", 1],
      ["boot", 0],
      ["security", 0],
      ["region", 0],
    ]);
    expect(failingSettings(report)).toEqual(["DISK_TARGET"]);
  });

  test("can be restricted to named presets", () => {
    const report = runQuiet(validateAll(installer(), ["network", "region"]));
    expect(report.issues).toBe(0);
    expect(report.presets.map((p) => p.preset)).toEqual(["network", "region"]);
  });

  test("unknown presets fail", () => {
    const exit = Effect.runSyncExit(validateAll(installer(), ["nope"]));
    expect(exit._tag).toBe("Failure");
  });

  test("settings that become visible are counted", () => {
    const store = installer();
    runQuiet(set(store, "NETWORK_METHOD", "static", "manual"));
    const report = runQuiet(validatePreset(store, "network"));
    expect(report.errors.map(issueLine)).toEqual([
      "NETWORK_IP: A value is required",
      "NETWORK_GATEWAY: A value is required",
    ]);
  });
});

describe("cross-field validation", () => {
  const staticNetwork = (ip: string, gateway: string): ConfigStore => {
    const store = installer();
    runQuiet(
      Effect.all([
        set(store, "NETWORK_METHOD", "static", "manual"),
        set(store, "NETWORK_IP", ip, "manual"),
        set(store, "NETWORK_GATEWAY", gateway, "manual"),
      ])
    );
    return store;
  };

  test("a gateway outside the subnet is reported once", () => {
    const store = staticNetwork("192.168.1.10", "192.168.2.1");
    const report = runQuiet(validatePreset(store, "network"));
    expect(report.issues).toBe(1);
    expect(report.errors.map(issueLine)).toEqual([
      "network: Gateway 192.168.2.1 must be in the same subnet as 192.168.1.10/255.255.255.0",
    ]);
    expect(failingCrossFieldPresets(runQuiet(validateAll(store)))).toEqual(["network"]);
    expect(failingSettings(runQuiet(validateAll(store)))).toEqual(["DISK_TARGET"]);
  });

  test("a gateway equal to the address is reported", () => {
    const store = staticNetwork("192.168.1.10", "192.168.1.10");
    const report = runQuiet(validatePreset(store, "network"));
    expect(report.errors.map(issueLine)).toEqual(["network: Gateway cannot be the same as IP address"]);
  });

  test("a matching gateway passes", () => {
    const store = staticNetwork("192.168.1.10", "192.168.1.1");
    expect(runQuiet(validatePreset(store, "network")).issues).toBe(0);
  });
});
