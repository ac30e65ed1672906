// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Logging helpers. Styles and the preset/setting a line concerns travel as
 * log annotations; effect-logger.ts decides how they look.
 */

import { Data, Effect, Match, pipe } from "effect";
import { ANNOTATION } from "./effect-logger";

// ============================================================================
// LogStyle ADT
// ============================================================================

type LogStyle = Data.TaggedEnum<{
  step: { readonly current: number; readonly total: number };
  success: object;
  fail: object;
}>;

const { step, success, fail } = Data.taggedEnum<LogStyle>();

const encodeStyle = (style: LogStyle): Record<string, string> =>
  pipe(
    Match.value(style),
    Match.tag("step", ({ current, total }) => ({
      [ANNOTATION.style]: "step",
      [ANNOTATION.stepNumber]: String(current),
      [ANNOTATION.stepTotal]: String(total),
    })),
    Match.tag("success", () => ({ [ANNOTATION.style]: "success" })),
    Match.tag("fail", () => ({ [ANNOTATION.style]: "fail" })),
    Match.exhaustive
  );

const logStyled = (style: LogStyle, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(encodeStyle(style)));

// ============================================================================
// Public Logging Functions
// ============================================================================

export const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  logStyled(step({ current, total }), message);

export const logSuccess = (message: string): Effect.Effect<void> => logStyled(success(), message);

export const logFail = (message: string): Effect.Effect<void> => logStyled(fail(), message);

/** Bypasses Effect logger for raw program output (command results, status info). */
export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

/** Tags every log line of `effect` with the preset it concerns. */
export const withPresetLogs =
  (preset: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, ANNOTATION.preset, preset);

/** Tags every log line of `effect` with the setting it concerns. */
export const withSettingLogs =
  (setting: string) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(effect, ANNOTATION.setting, setting);
