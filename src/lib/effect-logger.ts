// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The configurator's Effect logger. Lines go to a sink (stderr by default,
 * since stdout carries export output) as either pretty text or one JSON
 * object per line.
 *
 * Annotations set by `lib/log.ts` drive the output: `preset` and `setting`
 * name what a line is about, `logStyle` selects the step, success and fail
 * renderings.
 */

import chalk from "chalk";
import { Cause, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as ConfiguratorLogLevel } from "../config/field-values";

export const ANNOTATION = {
  style: "logStyle",
  stepNumber: "stepNumber",
  stepTotal: "stepTotal",
  preset: "preset",
  setting: "setting",
} as const;

/** Keys rendered by the formatters themselves rather than copied into JSON. */
const OWN_KEYS: ReadonlySet<string> = new Set(Object.values(ANNOTATION));

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export interface LogEntry {
  readonly level: LogLevel.LogLevel;
  readonly message: string;
  readonly annotations: HashMap.HashMap<string, unknown>;
  readonly cause: Cause.Cause<unknown>;
  readonly date: Date;
}

const toEffectLogLevel = (level: ConfiguratorLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const stringAnnotation = (annotations: HashMap.HashMap<string, unknown>, key: string): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

// ============================================================================
// Styles
// ============================================================================

type Style =
  | { readonly _tag: "plain" }
  | { readonly _tag: "step"; readonly current: string; readonly total: string }
  | { readonly _tag: "success" }
  | { readonly _tag: "fail" };

const decodeStyle = (annotations: HashMap.HashMap<string, unknown>): Style => {
  const counter = (key: string): string =>
    Option.getOrElse(stringAnnotation(annotations, key), () => "?");
  return pipe(
    stringAnnotation(annotations, ANNOTATION.style),
    Option.match({
      onNone: (): Style => ({ _tag: "plain" }),
      onSome: (tag): Style =>
        tag === "step"
          ? { _tag: "step", current: counter(ANNOTATION.stepNumber), total: counter(ANNOTATION.stepTotal) }
          : tag === "success" || tag === "fail"
            ? { _tag: tag }
            : { _tag: "plain" },
    })
  );
};

// ============================================================================
// Pretty
// ============================================================================

type Paint = (text: string) => string;

interface Palette {
  readonly levels: Readonly<Record<string, Paint>>;
  readonly context: Paint;
  readonly strong: Paint;
  readonly ok: Paint;
  readonly bad: Paint;
}

const plain: Paint = (text) => text;

const palette = (useColor: boolean): Palette =>
  useColor
    ? {
        levels: { DEBUG: chalk.gray, INFO: chalk.blue, WARN: chalk.yellow, ERROR: chalk.red, FATAL: chalk.red },
        context: chalk.cyan,
        strong: chalk.bold,
        ok: chalk.green,
        bad: chalk.red,
      }
    : { levels: {}, context: plain, strong: plain, ok: plain, bad: plain };

/** `preset/SETTING`, either part alone, or None. */
export const contextLabel = (annotations: HashMap.HashMap<string, unknown>): Option.Option<string> => {
  const parts = [ANNOTATION.preset, ANNOTATION.setting].flatMap((key) =>
    Option.toArray(stringAnnotation(annotations, key))
  );
  return parts.length === 0 ? Option.none() : Option.some(parts.join("/"));
};

const causeSuffix = (cause: Cause.Cause<unknown>): string =>
  Cause.isEmpty(cause) ? "" : `\n${Cause.pretty(cause)}`;

export const formatPretty = (entry: LogEntry, useColor: boolean): string => {
  const paint = palette(useColor);
  const style = decodeStyle(entry.annotations);
  return pipe(
    Match.value(style),
    Match.tag(
      "step",
      ({ current, total }) => `${paint.strong(`[${current}/${total}]`)} ${paint.context("→")} ${entry.message}`
    ),
    Match.tag("success", () => `${paint.ok("✓")} ${entry.message}`),
    Match.tag("fail", () => `${paint.bad("✗")} ${entry.message}`),
    Match.tag("plain", () => {
      const label = entry.level.label;
      const level = (paint.levels[label] ?? plain)(label.padEnd(5));
      const context = Option.match(contextLabel(entry.annotations), {
        onNone: () => "",
        onSome: (c) => `${paint.context(`[${c}]`)} `,
      });
      return `${level} ${context}${entry.message}${causeSuffix(entry.cause)}`;
    }),
    Match.exhaustive
  );
};

// ============================================================================
// JSON
// ============================================================================

export const formatJson = (entry: LogEntry): string => {
  const known = (key: string): Record<string, string> =>
    Option.match(stringAnnotation(entry.annotations, key), {
      onNone: () => ({}),
      onSome: (value) => ({ [key]: value }),
    });
  const extra = Object.fromEntries(
    Array.from(HashMap.toEntries(entry.annotations)).filter(([key]) => !OWN_KEYS.has(key))
  );
  return JSON.stringify({
    timestamp: entry.date.toISOString(),
    level: entry.level.label.toLowerCase(),
    ...known(ANNOTATION.preset),
    ...known(ANNOTATION.setting),
    message: entry.message,
    ...extra,
    ...(Cause.isEmpty(entry.cause) ? {} : { cause: Cause.pretty(entry.cause) }),
  });
};

// ============================================================================
// Layer
// ============================================================================

const configuratorLogger = (format: LogFormat, useColor: boolean, sink: LogSink): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const entry: LogEntry = { level: logLevel, message: String(message), annotations, cause, date };
    sink(
      pipe(
        Match.value(format),
        Match.when("json", () => formatJson(entry)),
        Match.when("pretty", () => formatPretty(entry, useColor)),
        Match.exhaustive
      )
    );
  });

export interface LoggerOptions {
  readonly level: ConfiguratorLogLevel;
  readonly format: LogFormat;
  /** Defaults to chalk's colour detection, off under NO_COLOR. */
  readonly color?: boolean;
  readonly sink?: LogSink;
}

export const ConfiguratorLoggerLive = (options: LoggerOptions): Layer.Layer<never> => {
  const useColor = options.color ?? (chalk.supportsColor !== false && !process.env["NO_COLOR"]);
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, configuratorLogger(options.format, useColor, options.sink ?? stderrSink)),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
};
