// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Syntax errors and
 * schema violations are reported with the file path. The global config is
 * searched in /etc, ~/.config and the working directory; the first file that
 * exists wins, and an explicit `--global-config` path must exist.
 */

import { FileSystem } from "@effect/platform";
import { Config, Effect, Option, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import type { z } from "zod";
import { ConfigError, ErrorCode, SystemError, errorMessage } from "../lib/errors";
import { decodeWithZod } from "../lib/schema-utils";
import { type GlobalConfig, globalConfigSchema } from "./schema";

export const loadTomlFile = <A, I>(
  filePath: string,
  schema: z.ZodType<A, z.ZodTypeDef, I>
): Effect.Effect<A, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    yield* pipe(
      fs.exists(filePath),
      Effect.orElseSucceed(() => false),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* pipe(
      fs.readFileString(filePath),
      Effect.mapError(
        (e) =>
          new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${e.message}`,
            cause: e,
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...(e instanceof Error ? { cause: e } : {}),
        }),
    });

    return yield* decodeWithZod(schema, parsed, filePath);
  });

export const defaultGlobalConfigPaths = (home: string): readonly string[] => [
  "/etc/dps/dps.toml",
  `${home}/.config/dps/dps.toml`,
  "./dps.toml",
];

/** Built-in values used when no config file exists. */
export const defaultGlobalConfig = (): GlobalConfig => globalConfigSchema.parse({});

export const loadGlobalConfigWithHome = (
  configPath: Option.Option<string>,
  home: string
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  Option.match(configPath, {
    onSome: (path): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
      loadTomlFile(path, globalConfigSchema),
    onNone: (): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const found = yield* Effect.findFirst(defaultGlobalConfigPaths(home), (p) =>
          Effect.orElseSucceed(fs.exists(p), () => false)
        );
        return yield* Option.match(found, {
          onNone: (): Effect.Effect<GlobalConfig> => Effect.succeed(defaultGlobalConfig()),
          onSome: (
            path
          ): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
            pipe(
              loadTomlFile(path, globalConfigSchema),
              Effect.tap(() => Effect.logDebug(`Loaded global config from ${path}`))
            ),
        });
      }),
  });

export const loadGlobalConfig = (
  configPath: Option.Option<string>
): Effect.Effect<GlobalConfig, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    // Config.withDefault ensures this never fails, so orDie is safe
    const home = yield* Config.string("HOME").pipe(Config.withDefault("/root"), Effect.orDie);
    return yield* loadGlobalConfigWithHome(configPath, home);
  });
