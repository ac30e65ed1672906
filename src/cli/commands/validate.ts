// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Non-interactive validation. Imports overrides (and an optional export
 * file), validates the selected presets and reports every issue found.
 * Useful in unattended installs to stop before the installer runs.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { ResolvedConfig } from "../../config/resolve";
import { ConfigError, ErrorCode, type SystemError, type UnknownPresetError } from "../../lib/errors";
import { logFail, logSuccess, writeOutput } from "../../lib/log";
import { getPreset } from "../../settings/store";
import { type ValidationReport, issueLine, validateAll } from "../../settings/validation";
import { type PrepareError, loadExportFile, prepareStore } from "./utils";

export interface ValidateOptions {
  readonly config: ResolvedConfig;
  readonly format: LogFormat;
  readonly presets: readonly string[];
  readonly from: Option.Option<string>;
}

/** Machine-readable form of a report for `--format json`. */
export const reportToJson = (report: ValidationReport): string =>
  JSON.stringify({
    valid: report.issues === 0,
    issues: report.issues,
    presets: report.presets.map((p) => ({
      preset: p.preset,
      issues: p.issues,
      errors: p.errors.map((e) =>
        e._tag === "ValidationError"
          ? { setting: e.setting, message: e.message }
          : { preset: e.preset, message: e.message }
      ),
    })),
  });

const printPretty = (report: ValidationReport): Effect.Effect<void> =>
  Effect.forEach(
    report.presets,
    (p) =>
      p.issues === 0
        ? logSuccess(`${p.preset}: valid`)
        : Effect.forEach(p.errors, (e) => logFail(issueLine(e)), { discard: true }),
    { discard: true }
  );

/**
 * Execute the validate command.
 */
export const executeValidate = (
  options: ValidateOptions
): Effect.Effect<void, PrepareError | UnknownPresetError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { config } = options;
    const store = yield* prepareStore(config);
    yield* Option.match(options.from, {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (path) => Effect.asVoid(loadExportFile(store, path, config.prefix)),
    });
    yield* Effect.forEach(options.presets, (name) => getPreset(store, name), { discard: true });

    const report = yield* validateAll(store, options.presets.length > 0 ? options.presets : undefined);

    yield* pipe(
      Match.value(options.format),
      Match.when("json", () => writeOutput(reportToJson(report))),
      Match.when("pretty", () => printPretty(report)),
      Match.exhaustive
    );

    if (report.issues > 0) {
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Configuration has ${report.issues} issue(s)`,
        })
      );
    }
    yield* logSuccess("Configuration is valid");
  });
