// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Tabular listing of every setting: value (masked for secrets), origin and
 * whether its visibility conditions currently hold.
 */

import { Effect, Match, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { ResolvedConfig } from "../../config/resolve";
import type { UnknownPresetError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { repeatChar } from "../../lib/str";
import type { SettingDef } from "../../settings/model";
import { type ConfigStore, displayValue, getPreset, isVisible, orderedSettings, stateOf } from "../../settings/store";
import { formatVisibility } from "../../settings/visibility";
import { type PrepareError, prepareStore } from "./utils";

export interface ShowOptions {
  readonly config: ResolvedConfig;
  readonly format: LogFormat;
  readonly presets: readonly string[];
}

export interface SettingRow {
  readonly preset: string;
  readonly name: string;
  readonly value: string;
  readonly origin: string;
  readonly visible: boolean;
  readonly condition: string;
}

export const settingRows = (store: ConfigStore, presets: readonly string[]): readonly SettingRow[] =>
  orderedSettings(store)
    .filter((def) => presets.length === 0 || presets.includes(def.preset))
    .map((def: SettingDef) => ({
      preset: def.preset,
      name: def.name,
      value: displayValue(store, def),
      origin: stateOf(store, def.name).origin,
      visible: isVisible(store, def.name),
      condition: formatVisibility(def.visibility),
    }));

const HEADERS = ["PRESET", "SETTING", "VALUE", "ORIGIN", "VISIBLE"] as const;

const rowCells = (row: SettingRow): readonly string[] => [
  row.preset,
  row.name,
  row.value,
  row.origin,
  row.visible ? "yes" : `no (${row.condition})`,
];

/** Columns padded to their widest cell; the last column is left ragged. */
export const renderTable = (rows: readonly SettingRow[]): readonly string[] => {
  const table = [HEADERS, ...rows.map(rowCells)];
  const widths = HEADERS.map((_, col) => Math.max(...table.map((cells) => Array.from(cells[col] ?? "").length)));
  const line = (cells: readonly string[]): string =>
    cells
      .map((cell, col) =>
        col === cells.length - 1 ? cell : `${cell}${repeatChar(" ", (widths[col] ?? 0) - Array.from(cell).length)}`
      )
      .join("  ");
  return table.map(line);
};

export const executeShow = (options: ShowOptions): Effect.Effect<void, PrepareError | UnknownPresetError> =>
  Effect.gen(function* () {
    const store = yield* prepareStore(options.config);
    yield* Effect.forEach(options.presets, (name) => getPreset(store, name), { discard: true });
    const rows = settingRows(store, options.presets);

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(JSON.stringify(rows))),
      Match.when("pretty", () => Effect.forEach(renderTable(rows), writeOutput, { discard: true })),
      Match.exhaustive
    );
  });
