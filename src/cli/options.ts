// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions. Sharing these ensures consistent naming
 * and descriptions across commands, and enables type-safe composition.
 */

import { Options as O } from "@effect/cli";
import type { Options } from "@effect/cli/Options";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: Options<boolean>;
  readonly logLevel: Options<Option.Option<LogLevel>>;
  readonly format: Options<Option.Option<LogFormat>>;
  readonly json: Options<boolean>;
  readonly globalConfig: Options<Option.Option<string>>;
  readonly prefix: Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  globalConfig: O.text("global-config").pipe(
    O.withAlias("g"),
    O.withDescription("Path to global configuration file"),
    O.optional
  ),
  prefix: O.text("prefix").pipe(
    O.withDescription("Variable prefix for setting overrides and export lines (default DPS)"),
    O.optional
  ),
};

// Per-command options

export const presetOption: Options<Array<string>> = O.text("preset").pipe(
  O.withAlias("p"),
  O.withDescription("Restrict to a preset (repeatable); every enabled preset by default"),
  O.repeated
);

export const allFlag: Options<boolean> = O.boolean("all").pipe(
  O.withDescription("Export every exportable setting, not only changed ones")
);

export const annotateFlag: Options<boolean> = O.boolean("annotate").pipe(
  O.withDescription("Precede each preset's lines with a '# preset:' comment")
);

export const outputFile: Options<Option.Option<string>> = O.text("output").pipe(
  O.withAlias("o"),
  O.withDescription("Write the export to a file instead of stdout"),
  O.optional
);

export const fromFile: Options<Option.Option<string>> = O.text("from").pipe(
  O.withDescription("Load values from an export file after importing the environment"),
  O.optional
);

export const yesFlag: Options<boolean> = O.boolean("yes").pipe(
  O.withAlias("y"),
  O.withDescription("Confirm from the menu without waiting when nothing is invalid")
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly globalConfig: Option.Option<string>;
  readonly prefix: Option.Option<string>;
}

/** Resolves format: --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );
