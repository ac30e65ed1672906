// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Option } from "effect";
import { describe, expect, test } from "vitest";
import { renderTable, settingRows } from "../../src/cli/commands/show";
import { emit, loadExportFile, prepareStore } from "../../src/cli/commands/utils";
import { executeValidate, reportToJson } from "../../src/cli/commands/validate";
import { createTestConfigProvider } from "../../src/config/env";
import type { ResolvedConfig } from "../../src/config/resolve";
import { createInstallerStore } from "../../src/presets";
import { get, getOrigin } from "../../src/settings/store";
import { validateAll } from "../../src/settings/validation";
import { failureOf, runQuiet, runTest, runTestExit } from "../helpers/layers";

const baseConfig: ResolvedConfig = {
  logLevel: "info",
  logFormat: "pretty",
  prefix: "DPS",
  autoConfirm: false,
  defaults: {},
};

const withEnv =
  (vars: Record<string, string>) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.withConfigProvider(effect, createTestConfigProvider({}, new Map(Object.entries(vars))));

describe("prepareStore", () => {
  test("site defaults sit under environment overrides", async () => {
    const config = { ...baseConfig, defaults: { HOSTNAME: "lab", SWAP_SIZE_MIB: "4096" } };
    const store = await runTest(prepareStore(config).pipe(withEnv({ DPS_HOSTNAME: "builder" })));

    expect(runQuiet(get(store, "HOSTNAME"))).toBe("builder");
    expect(runQuiet(getOrigin(store, "HOSTNAME"))).toBe("env");
    expect(runQuiet(get(store, "SWAP_SIZE_MIB"))).toBe("4096");
    expect(runQuiet(getOrigin(store, "SWAP_SIZE_MIB"))).toBe("default");
  });

  test("a default for an unknown setting fails", async () => {
    const exit = await runTestExit(prepareStore({ ...baseConfig, defaults: { HOSTNAM: "lab" } }).pipe(withEnv({})));
    expect(Option.map(failureOf(exit), (e) => e.message)).toEqual(Option.some("Unknown setting: HOSTNAM"));
  });

  test("an invalid default fails", async () => {
    const exit = await runTestExit(prepareStore({ ...baseConfig, defaults: { FS_TYPE: "zfs" } }).pipe(withEnv({})));
    expect(Option.map(failureOf(exit), (e) => e.message)).toEqual(
      Option.some("Invalid default: Must be one of: btrfs, ext4")
    );
  });
});

describe("export files", () => {
  const exported = [
    "# written by an earlier run",
    'export DPS_HOSTNAME="lab"',
    'export DPS_SWAP_SIZE_MIB="lots"',
    'export DPS_MISSING="x"',
    'export OTHER_HOSTNAME="ignored"',
    'export DPS_COUNTRY="DE"',
    "",
  ].join("\n");

  test("loadExportFile sets known, valid values as manual", async () => {
    const files = new Map([["/tmp/dps.sh", exported]]);
    const effect = Effect.gen(function* () {
      const store = yield* createInstallerStore();
      const loaded = yield* loadExportFile(store, "/tmp/dps.sh", "DPS");
      return { store, loaded };
    });
    const { store, loaded } = await runTest(effect, files);

    expect(loaded).toBe(2);
    expect(runQuiet(get(store, "HOSTNAME"))).toBe("lab");
    expect(runQuiet(getOrigin(store, "HOSTNAME"))).toBe("manual");
    expect(runQuiet(get(store, "SWAP_SIZE_MIB"))).toBe("0");
    expect(runQuiet(get(store, "TIMEZONE"))).toBe("Europe/Berlin");
    expect(runQuiet(getOrigin(store, "TIMEZONE"))).toBe("auto");
  });

  test("values apply in preset order, so an explicit timezone outlasts the country", async () => {
    const files = new Map([["/tmp/dps.sh", 'export DPS_TIMEZONE="Asia/Tokyo"\nexport DPS_COUNTRY="DE"\n']]);
    const effect = Effect.flatMap(createInstallerStore(), (store) =>
      Effect.as(loadExportFile(store, "/tmp/dps.sh", "DPS"), store)
    );
    const store = await runTest(effect, files);

    expect(runQuiet(get(store, "TIMEZONE"))).toBe("Asia/Tokyo");
    expect(runQuiet(getOrigin(store, "TIMEZONE"))).toBe("manual");
    expect(runQuiet(get(store, "LOCALE"))).toBe("de_DE.UTF-8");
    expect(runQuiet(getOrigin(store, "LOCALE"))).toBe("auto");
  });

  test("a missing file is a read error", async () => {
    const effect = Effect.flatMap(createInstallerStore(), (store) => loadExportFile(store, "/tmp/none.sh", "DPS"));
    const error = failureOf(await runTestExit(effect));
    expect(Option.map(error, (e) => e._tag)).toEqual(Option.some("SystemError"));
    expect(Option.exists(error, (e) => e.message.startsWith("Failed to read /tmp/none.sh: "))).toBe(true);
  });

  test("emit writes the file when an output path is given", async () => {
    const files = new Map<string, string>();
    await runTest(emit('export DPS_HOSTNAME="lab"\n', Option.some("/tmp/out.sh")), files);
    expect(files.get("/tmp/out.sh")).toBe('export DPS_HOSTNAME="lab"\n');
  });
});

describe("show", () => {
  test("renderTable pads every column but the last", () => {
    const lines = renderTable([
      { preset: "network", name: "HOSTNAME", value: "nixos", origin: "default", visible: true, condition: "" },
      {
        preset: "network",
        name: "NETWORK_IP",
        value: "",
        origin: "default",
        visible: false,
        condition: "NETWORK_METHOD==static",
      },
    ]);
    expect(lines).toEqual([
      "PRESET   SETTING     VALUE  ORIGIN   VISIBLE",
      "network  HOSTNAME    nixos  default  yes",
      "network  NETWORK_IP         default  no (NETWORK_METHOD==static)",
    ]);
  });

  test("settingRows can be limited to presets", () => {
    const store = runQuiet(createInstallerStore());
    expect(settingRows(store, ["boot"])).toEqual([
      { preset: "boot", name: "UEFI_MODE", value: "✓", origin: "default", visible: true, condition: "" },
      { preset: "boot", name: "BOOTLOADER", value: "systemd-boot", origin: "default", visible: true, condition: "" },
    ]);
  });
});

describe("validate", () => {
  test("reportToJson lists every preset", () => {
    const store = runQuiet(createInstallerStore());
    const json: unknown = JSON.parse(reportToJson(runQuiet(validateAll(store, ["network", "disk"]))));
    expect(json).toEqual({
      valid: false,
      issues: 1,
      presets: [
        { preset: "network", issues: 0, errors: [] },
        { preset: "disk", issues: 1, errors: [{ setting: "DISK_TARGET", message: "A value is required" }] },
      ],
    });
  });

  test("executeValidate fails with the issue count", async () => {
    const exit = await runTestExit(
      executeValidate({ config: baseConfig, format: "pretty", presets: [], from: Option.none() }).pipe(withEnv({}))
    );
    expect(Option.map(failureOf(exit), (e) => e.message)).toEqual(Option.some("Configuration has 1 issue(s)"));
  });

  test("executeValidate passes once the disk is set", async () => {
    await runTest(
      executeValidate({ config: baseConfig, format: "pretty", presets: [], from: Option.none() }).pipe(
        withEnv({ DPS_DISK_TARGET: "/dev/vda" })
      )
    );
  });

  test("an export file given with --from is validated too", async () => {
    const files = new Map([["/tmp/dps.sh", 'export DPS_DISK_TARGET="/dev/nvme0n1"\n']]);
    await runTest(
      executeValidate({ config: baseConfig, format: "pretty", presets: [], from: Option.some("/tmp/dps.sh") }).pipe(
        withEnv({})
      ),
      files
    );
  });
});
