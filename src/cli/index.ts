// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger setup and error display to avoid duplication across commands.
 */

import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import type { FileSystem } from "@effect/platform";
import chalk from "chalk";
import { Effect, Match, Option, pipe } from "effect";
import { EnvOverridesSpec } from "../config/env";
import type { LogFormat } from "../config/field-values";
import { loadGlobalConfig } from "../config/loader";
import { type ResolvedConfig, resolveConfig } from "../config/resolve";
import { envPrefixSchema } from "../config/schema";
import { ConfiguratorLoggerLive } from "../lib/effect-logger";
import { type AppError, type ConfigError, type SystemError, getErrorCodeName } from "../lib/errors";
import { decodeWithZod } from "../lib/schema-utils";
import { CONFIGURATOR_VERSION } from "../lib/version";
import { PrompterLive } from "../settings/prompt";

import { executeConfigure } from "./commands/configure";
import { executeExport } from "./commands/export";
import { executeShow } from "./commands/show";
import { fromEnvConfigError } from "./commands/utils";
import { executeValidate } from "./commands/validate";

import {
  type GlobalOptions,
  allFlag,
  annotateFlag,
  effectiveFormat,
  fromFile,
  globalOptions,
  outputFile,
  presetOption,
  yesFlag,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > config file (priority order). */
interface CommandContext {
  readonly config: ResolvedConfig;
  readonly format: LogFormat;
}

// Context resolution

const resolveContext = (
  globals: GlobalOptions,
  autoConfirm: boolean
): Effect.Effect<CommandContext, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const toml = yield* loadGlobalConfig(globals.globalConfig);
    const env = yield* pipe(EnvOverridesSpec, Effect.mapError(fromEnvConfigError));
    const resolved = resolveConfig(
      {
        verbose: globals.verbose,
        logLevel: globals.logLevel,
        format: effectiveFormat(globals),
        prefix: globals.prefix,
        autoConfirm,
      },
      env,
      toml
    );
    const prefix = yield* decodeWithZod(envPrefixSchema, resolved.prefix, "setting prefix");
    return { config: { ...resolved, prefix }, format: resolved.logFormat };
  });

// Error display

/** Type guard for error display routing. App errors have exit codes; unknown errors get generic handling. */
export const isAppError = (err: unknown): err is AppError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/** Formats error for terminal output with optional color. Sync because called in exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(`${JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })}\n`)
    ),
    Match.when("pretty", () => {
      process.stderr.write(`${chalk.red("✗")} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

/** Format for errors raised before the context is resolved. */
const earlyFormat = (globals: GlobalOptions): LogFormat =>
  Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty");

/** Centralizes context, logging and error handling so each command stays focused on its logic. */
const runCommand = <E, R>(
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, E, R>,
  autoConfirm = false
): Effect.Effect<void, E | ConfigError | SystemError, R | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals, autoConfirm),
      Effect.tapError((err) => Effect.sync(() => displayError(err, earlyFormat(globals))))
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(
        ConfiguratorLoggerLive({
          level: ctx.config.logLevel,
          format: ctx.config.logFormat,
        })
      )
    );
  });

// Subcommand definitions

const configureCmd = Command.make(
  "configure",
  { ...globalOptions, preset: presetOption, all: allFlag, output: outputFile, from: fromFile, yes: yesFlag },
  (args) =>
    runCommand(
      args,
      "configure",
      (ctx) =>
        pipe(
          executeConfigure({
            config: ctx.config,
            presets: args.preset,
            all: args.all,
            output: args.output,
            from: args.from,
          }),
          Effect.provide(PrompterLive)
        ),
      args.yes
    )
).pipe(Command.withDescription("Review and confirm settings interactively, then print the export"));

const validateCmd = Command.make(
  "validate",
  { ...globalOptions, preset: presetOption, from: fromFile },
  (args) =>
    runCommand(args, "validate", (ctx) =>
      executeValidate({ config: ctx.config, format: ctx.format, presets: args.preset, from: args.from })
    )
).pipe(Command.withDescription("Validate imported settings without prompting"));

const exportCmd = Command.make(
  "export",
  { ...globalOptions, all: allFlag, annotate: annotateFlag, output: outputFile, from: fromFile },
  (args) =>
    runCommand(args, "export", (ctx) =>
      executeExport({
        config: ctx.config,
        all: args.all,
        annotate: args.annotate,
        output: args.output,
        from: args.from,
      })
    )
).pipe(Command.withDescription("Print export lines for the current settings"));

const showCmd = Command.make("show", { ...globalOptions, preset: presetOption }, (args) =>
  runCommand(args, "show", (ctx) =>
    executeShow({ config: ctx.config, format: ctx.format, presets: args.preset })
  )
).pipe(Command.withDescription("List settings with value, origin and visibility"));

// Root command

const root = Command.make("dps-config").pipe(
  Command.withDescription("Installer settings: import, validate, confirm and export"),
  Command.withSubcommands([configureCmd, validateCmd, exportCmd, showCmd])
);

export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.Environment> =
  Command.run(root, {
    name: "dps-config",
    version: CONFIGURATOR_VERSION,
  });
