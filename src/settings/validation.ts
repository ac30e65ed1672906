// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Validation engine. Failures are collected and counted, never raised:
 * the workflow decides what to re-prompt from the reports built here.
 * Invisible settings are skipped at every level.
 */

import { Array as Arr, Effect, Option, pipe } from "effect";
import {
  CrossFieldError,
  ErrorCode,
  type UnknownPresetError,
  type UnknownSettingError,
  ValidationError,
} from "../lib/errors";
import { withPresetLogs } from "../lib/log";
import {
  type ConfigStore,
  checkValue,
  getDef,
  getPreset,
  isVisible,
  list,
  listPresets,
  lookup,
  stateOf,
} from "./store";

export type SettingIssue = ValidationError | CrossFieldError;

export interface PresetReport {
  readonly preset: string;
  readonly errors: readonly SettingIssue[];
  /** Number of failed checks; zero means the preset is clean. */
  readonly issues: number;
}

export interface ValidationReport {
  readonly issues: number;
  readonly presets: readonly PresetReport[];
}

/** `None` when the setting is valid or currently invisible. */
export const validateSetting = (
  store: ConfigStore,
  name: string
): Effect.Effect<Option.Option<ValidationError>, UnknownSettingError> =>
  Effect.gen(function* () {
    const def = yield* getDef(store, name);
    if (!isVisible(store, name)) {
      return Option.none();
    }
    const { value } = stateOf(store, name);
    return Option.map(
      checkValue(def, value),
      (message) =>
        new ValidationError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          setting: name,
          value,
          message,
        })
    );
  });

/** Visible settings of the preset in declaration order, then its cross-field validator. */
export const validatePreset = (
  store: ConfigStore,
  name: string
): Effect.Effect<PresetReport, UnknownPresetError | UnknownSettingError> =>
  Effect.gen(function* () {
    const preset = yield* getPreset(store, name);
    const settingErrors = yield* pipe(
      Effect.forEach(list(store, name), (setting) => validateSetting(store, setting)),
      Effect.map(Arr.getSomes)
    );
    const crossErrors = pipe(
      preset.validate,
      Option.map((validator) => validator(lookup(store))),
      Option.getOrElse((): readonly string[] => []),
      Arr.map(
        (message) =>
          new CrossFieldError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            preset: name,
            message,
          })
      )
    );
    const errors: readonly SettingIssue[] = [...settingErrors, ...crossErrors];
    if (errors.length > 0) {
      yield* Effect.logDebug(`${errors.length} issue(s)`);
    }
    return { preset: name, errors, issues: errors.length };
  }).pipe(withPresetLogs(name));

/** Sum over the named presets, or over every enabled preset by priority. */
export const validateAll = (
  store: ConfigStore,
  presets?: readonly string[]
): Effect.Effect<ValidationReport, UnknownPresetError | UnknownSettingError> =>
  pipe(
    Effect.forEach(
      presets ?? listPresets(store, { enabledOnly: true }).map((p) => p.name),
      (preset) => validatePreset(store, preset)
    ),
    Effect.map((reports) => ({
      issues: reports.reduce((sum, r) => sum + r.issues, 0),
      presets: reports,
    }))
  );

/** Settings with a per-setting failure, in report order. */
export const failingSettings = (report: ValidationReport): readonly string[] =>
  pipe(
    report.presets,
    Arr.flatMap((p) => p.errors),
    Arr.filterMap((e) => (e._tag === "ValidationError" ? Option.some(e.setting) : Option.none()))
  );

/** Presets whose cross-field validator reported something. */
export const failingCrossFieldPresets = (report: ValidationReport): readonly string[] =>
  pipe(
    report.presets,
    Arr.filter((p) => p.errors.some((e) => e._tag === "CrossFieldError")),
    Arr.map((p) => p.preset)
  );

export const issueLine = (issue: SettingIssue): string =>
  issue._tag === "ValidationError" ? `${issue.setting}: ${issue.message}` : `${issue.preset}: ${issue.message}`;
