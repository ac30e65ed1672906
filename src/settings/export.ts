// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Export engine: settings as sourceable `export <PREFIX>_<NAME>="<value>"`
 * lines, and the reader for such files.
 */

import { Array as Arr, Match, Option, pipe } from "effect";
import { shellDoubleQuoteCodec } from "../lib/escape-codec";
import { type Assignment, parseAssignments } from "../lib/file-parsers";
import type { SettingDef } from "./model";
import { type ConfigStore, orderedSettings, stateOf } from "./store";

export interface ExportOptions {
  /** Emit a `# preset: <name>` comment before each preset's lines. */
  readonly annotate?: boolean;
}

export const exportLine = (prefix: string, name: string, value: string): string =>
  `export ${prefix}_${name}="${shellDoubleQuoteCodec.escape(value)}"`;

const render = (
  store: ConfigStore,
  prefix: string,
  defs: readonly SettingDef[],
  options: ExportOptions
): readonly string[] =>
  pipe(
    defs,
    Arr.flatMap((def, i) => {
      const line = exportLine(prefix, def.name, stateOf(store, def.name).value);
      const startsGroup = i === 0 || defs[i - 1]?.preset !== def.preset;
      return options.annotate && startsGroup ? [`# preset: ${def.preset}`, line] : [line];
    })
  );

/** Every exportable setting, preset priority first, declaration order within. */
export const exportAll = (store: ConfigStore, prefix: string, options: ExportOptions = {}): readonly string[] =>
  render(
    store,
    prefix,
    orderedSettings(store).filter((def) => def.exportable),
    options
  );

/** As `exportAll`, without settings still holding their default. */
export const exportNonDefaults = (
  store: ConfigStore,
  prefix: string,
  options: ExportOptions = {}
): readonly string[] =>
  render(
    store,
    prefix,
    orderedSettings(store).filter((def) => def.exportable && stateOf(store, def.name).origin !== "default"),
    options
  );

/** Lines joined into file content, with a trailing newline when non-empty. */
export const renderExport = (lines: readonly string[]): string =>
  lines.length === 0 ? "" : `${lines.join("\n")}\n`;

const assignmentValue = (a: Assignment): string =>
  pipe(
    Match.value(a.quoting),
    Match.when("double", () => shellDoubleQuoteCodec.unescape(a.value)),
    Match.when("single", () => a.value),
    Match.when("none", () => a.value),
    Match.exhaustive
  );

/**
 * Read an export file back into setting values keyed by variable name, or by
 * setting name when `prefix` is given (other variables are then skipped).
 * Later assignments win.
 */
export const parseExport = (content: string, prefix?: string): ReadonlyMap<string, string> =>
  new Map(
    pipe(
      parseAssignments(content),
      Arr.filterMap((a) =>
        prefix === undefined
          ? Option.some([a.name, assignmentValue(a)] as const)
          : a.name.startsWith(`${prefix}_`) && a.name.length > prefix.length + 1
            ? Option.some([a.name.slice(prefix.length + 1), assignmentValue(a)] as const)
            : Option.none()
      )
    )
  );
