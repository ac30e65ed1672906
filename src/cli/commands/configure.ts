// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Interactive configuration: import overrides, walk the confirmation
 * workflow, and print the export of the confirmed values.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { ResolvedConfig } from "../../config/resolve";
import { ErrorCode, GeneralError, PromptError, type SystemError } from "../../lib/errors";
import { logStep, logSuccess } from "../../lib/log";
import { exportAll, exportNonDefaults, renderExport } from "../../settings/export";
import type { Prompter } from "../../settings/prompt";
import { getPreset } from "../../settings/store";
import { type WorkflowError, runWorkflow } from "../../settings/workflow";
import { type PrepareError, emit, loadExportFile, prepareStore } from "./utils";

export interface ConfigureOptions {
  readonly config: ResolvedConfig;
  readonly presets: readonly string[];
  readonly all: boolean;
  readonly output: Option.Option<string>;
  readonly from: Option.Option<string>;
}

export const executeConfigure = (
  options: ConfigureOptions
): Effect.Effect<
  void,
  PrepareError | WorkflowError | GeneralError | PromptError | SystemError,
  Prompter | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const { config } = options;

    yield* logStep(1, 3, "Loading settings");
    const store = yield* prepareStore(config);
    yield* Option.match(options.from, {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (path) => Effect.asVoid(loadExportFile(store, path, config.prefix)),
    });
    yield* Effect.forEach(options.presets, (name) => getPreset(store, name), { discard: true });

    yield* logStep(2, 3, "Confirming configuration");
    const final = yield* runWorkflow(store, {
      ...(options.presets.length > 0 ? { presets: options.presets } : {}),
      autoConfirm: config.autoConfirm,
    });
    if (final._tag === "Aborted") {
      return yield* Effect.fail(
        new PromptError({ code: ErrorCode.ABORTED, message: `Configuration aborted: ${final.reason}` })
      );
    }
    if (final._tag !== "Confirmed") {
      return yield* Effect.fail(
        new GeneralError({ code: ErrorCode.GENERAL_ERROR, message: "Configuration not confirmed" })
      );
    }

    yield* logStep(3, 3, "Exporting settings");
    const lines = options.all ? exportAll(store, config.prefix) : exportNonDefaults(store, config.prefix);
    yield* emit(renderExport(lines), options.output);
    yield* logSuccess(`Exported ${lines.length} setting(s)`);
  });
