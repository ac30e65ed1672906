// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option, pipe } from "effect";
import type { EnvOverrides } from "./env";
import type { LogFormat, LogLevel } from "./field-values";
import type { GlobalConfig } from "./schema";

/** One configurable value as seen from each source, highest priority first. */
export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: A;
}

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.toml)
  );

export interface CliOverrides {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly prefix: Option.Option<string>;
  readonly autoConfirm: boolean;
}

export interface ResolvedConfig {
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly prefix: string;
  readonly autoConfirm: boolean;
  /** Replacement defaults from dps.toml, keyed by setting name. */
  readonly defaults: Readonly<Record<string, string>>;
}

/** CLI > env > TOML for every field; `--verbose` or `DPSCFG_DEBUG` force debug. */
export const resolveConfig = (
  cli: CliOverrides,
  env: EnvOverrides,
  toml: GlobalConfig
): ResolvedConfig => ({
  logLevel:
    cli.verbose || env.debug
      ? "debug"
      : resolve({ cli: cli.logLevel, env: env.logLevel, toml: toml.logging.level }),
  logFormat: resolve({ cli: cli.format, env: env.logFormat, toml: toml.logging.format }),
  prefix: resolve({ cli: cli.prefix, env: env.prefix, toml: toml.settings.prefix }),
  autoConfirm: resolve({
    // An absent --yes flag means "not given", not "false"
    cli: pipe(
      Option.some(cli.autoConfirm),
      Option.filter((v) => v)
    ),
    env: env.autoConfirm,
    toml: toml.settings.autoConfirm,
  }),
  defaults: toml.defaults,
});
