// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Print export lines for the current values without prompting.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { ResolvedConfig } from "../../config/resolve";
import type { SystemError } from "../../lib/errors";
import { exportAll, exportNonDefaults, renderExport } from "../../settings/export";
import { type PrepareError, emit, loadExportFile, prepareStore } from "./utils";

export interface ExportCommandOptions {
  readonly config: ResolvedConfig;
  readonly all: boolean;
  readonly annotate: boolean;
  readonly output: Option.Option<string>;
  readonly from: Option.Option<string>;
}

export const executeExport = (
  options: ExportCommandOptions
): Effect.Effect<void, PrepareError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { config } = options;
    const store = yield* prepareStore(config);
    yield* Option.match(options.from, {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (path) => Effect.asVoid(loadExportFile(store, path, config.prefix)),
    });

    const exportOptions = { annotate: options.annotate };
    const lines = options.all
      ? exportAll(store, config.prefix, exportOptions)
      : exportNonDefaults(store, config.prefix, exportOptions);
    yield* emit(renderExport(lines), options.output);
  });
