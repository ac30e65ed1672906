// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Primitive setting types: free text, bounded strings, numbers, toggles,
 * yes/no questions, choices and secrets.
 */

import { Either, Option, ParseResult, Schema, pipe } from "effect";
import { parseDecimal, parseInteger } from "../../lib/schema-utils";
import { repeatChar } from "../../lib/str";
import type { SettingType } from "../model";

const Bound = Schema.optional(Schema.Number);
const Length = Schema.optional(Schema.Int.pipe(Schema.nonNegative()));

/** Attribute struct of types that take no attributes. */
export const NoAttributes = Schema.Struct({});
export type NoAttributes = typeof NoAttributes.Type;

/** Range hint shared by the numeric types: `(1-10)`, `(min: 1)`, `(max: 10)` or nothing. */
export const rangeHint = (min: number | undefined, max: number | undefined): string =>
  min !== undefined && max !== undefined
    ? `(${min}-${max})`
    : min !== undefined
      ? `(min: ${min})`
      : max !== undefined
        ? `(max: ${max})`
        : "";

const rangeError = (min: number | undefined, max: number | undefined): string =>
  min !== undefined && max !== undefined
    ? `Must be between ${min} and ${max}`
    : min !== undefined
      ? `Must be >= ${min}`
      : max !== undefined
        ? `Must be <= ${max}`
        : "Out of range";

const inRange = (n: number, min: number | undefined, max: number | undefined): boolean =>
  (min === undefined || n >= min) && (max === undefined || n <= max);

// ============================================================================
// Text
// ============================================================================

export const textType: SettingType<NoAttributes> = {
  name: "text",
  attributes: NoAttributes,
  validate: () => true,
  errorMessage: () => "",
  promptHint: () => "(text input)",
};

/** Compiled once when the setting is declared. */
const RegExpFromString = Schema.transformOrFail(Schema.String, Schema.instanceOf(RegExp), {
  strict: true,
  decode: (source, _options, ast) =>
    pipe(
      Either.try(() => new RegExp(source)),
      Either.match({
        onLeft: () => ParseResult.fail(new ParseResult.Type(ast, source, `Invalid pattern: ${source}`)),
        onRight: (re) => ParseResult.succeed(re),
      })
    ),
  encode: (re) => ParseResult.succeed(re.source),
});

const StringAttributes = Schema.Struct({
  minLength: Length,
  maxLength: Length,
  pattern: Schema.optional(RegExpFromString),
});

export const stringType: SettingType<
  typeof StringAttributes.Type,
  typeof StringAttributes.Encoded
> = {
  name: "string",
  attributes: StringAttributes,
  validate: (value, attrs) =>
    inRange(Array.from(value).length, attrs.minLength, attrs.maxLength) &&
    (attrs.pattern === undefined || attrs.pattern.test(value)),
  errorMessage: (value, attrs) =>
    !inRange(Array.from(value).length, attrs.minLength, attrs.maxLength)
      ? attrs.minLength !== undefined && attrs.maxLength !== undefined
        ? `Must be ${attrs.minLength}-${attrs.maxLength} characters`
        : attrs.minLength !== undefined
          ? `Must be at least ${attrs.minLength} characters`
          : `Must be at most ${attrs.maxLength ?? 0} characters`
      : `Must match pattern ${attrs.pattern?.source ?? ""}`,
  promptHint: (attrs) =>
    attrs.minLength !== undefined && attrs.maxLength !== undefined
      ? `(length: ${attrs.minLength}-${attrs.maxLength} chars)`
      : attrs.minLength !== undefined
        ? `(min: ${attrs.minLength} chars)`
        : attrs.maxLength !== undefined
          ? `(max: ${attrs.maxLength} chars)`
          : "",
};

// ============================================================================
// Numbers
// ============================================================================

const IntAttributes = Schema.Struct({ min: Schema.optional(Schema.Int), max: Schema.optional(Schema.Int) });

export const intType: SettingType<typeof IntAttributes.Type> = {
  name: "int",
  attributes: IntAttributes,
  validate: (value, attrs) =>
    pipe(
      parseInteger(value),
      Option.exists((n) => inRange(n, attrs.min, attrs.max))
    ),
  errorMessage: (value, attrs) =>
    Option.isNone(parseInteger(value))
      ? "Must be an integer (no letters or special characters)"
      : rangeError(attrs.min, attrs.max),
  promptHint: (attrs) => rangeHint(attrs.min, attrs.max),
};

const FloatAttributes = Schema.Struct({ min: Bound, max: Bound });

export const floatType: SettingType<typeof FloatAttributes.Type> = {
  name: "float",
  attributes: FloatAttributes,
  validate: (value, attrs) =>
    pipe(
      parseDecimal(value),
      Option.exists((n) => inRange(n, attrs.min, attrs.max))
    ),
  errorMessage: (value, attrs) =>
    Option.isNone(parseDecimal(value)) ? "Must be a number (integer or decimal)" : rangeError(attrs.min, attrs.max),
  promptHint: (attrs) => rangeHint(attrs.min, attrs.max) || "(decimal number)",
};

// ============================================================================
// Booleans
// ============================================================================

const TOGGLE_TRUE: ReadonlySet<string> = new Set(["true", "enabled", "1"]);
const TOGGLE_FALSE: ReadonlySet<string> = new Set(["false", "disabled", "0"]);

/** Stored as `true` / `false` so visibility conditions can compare against them. */
export const toggleType: SettingType<NoAttributes> = {
  name: "toggle",
  attributes: NoAttributes,
  validate: (value) => value === "true" || value === "false",
  normalize: (value) => {
    const lower = value.toLowerCase();
    return TOGGLE_TRUE.has(lower) ? "true" : TOGGLE_FALSE.has(lower) ? "false" : value;
  },
  display: (value) => (value === "true" ? "✓" : value === "false" ? "✗" : value),
  errorMessage: () => "Enter true, false, enabled, or disabled",
  promptHint: () => "(true/false, enabled/disabled)",
};

export const questionType: SettingType<NoAttributes> = {
  name: "question",
  attributes: NoAttributes,
  validate: (value) => value === "yes" || value === "no",
  normalize: (value) => {
    const lower = value.toLowerCase();
    return lower === "y" || lower === "yes" ? "yes" : lower === "n" || lower === "no" ? "no" : value;
  },
  errorMessage: () => "Enter yes or no",
  promptHint: () => "(yes/no)",
};

// ============================================================================
// Choice
// ============================================================================

const ChoiceAttributes = Schema.Struct({ options: Schema.NonEmptyArray(Schema.String) });

/** Declaring a choice without `options` fails registration. */
export const choiceType: SettingType<typeof ChoiceAttributes.Type> = {
  name: "choice",
  attributes: ChoiceAttributes,
  validate: (value, attrs) => attrs.options.includes(value),
  errorMessage: (_value, attrs) => `Must be one of: ${attrs.options.join(", ")}`,
  promptHint: (attrs) => `(${attrs.options.join(", ")})`,
};

// ============================================================================
// Secret
// ============================================================================

export const SECRET_MIN_LENGTH_DEFAULT = 8;

/**
 * Under 9 characters only the last one shows. Longer values show a tenth
 * of their length at each end, between 1 and 4 characters.
 */
export const maskSecret = (value: string): string => {
  const cs = Array.from(value);
  const len = cs.length;
  if (len === 0) {
    return "(not set)";
  }
  if (len < 9) {
    return `${repeatChar("*", len - 1)}${cs.slice(-1).join("")}`;
  }
  const show = Math.min(4, Math.max(1, Math.floor(len / 10)));
  return `${cs.slice(0, show).join("")}${repeatChar("*", len - show * 2)}${cs.slice(-show).join("")}`;
};

const SecretAttributes = Schema.Struct({ minLength: Length });

export const secretType: SettingType<typeof SecretAttributes.Type> = {
  name: "secret",
  attributes: SecretAttributes,
  validate: (value, attrs) => Array.from(value).length >= (attrs.minLength ?? SECRET_MIN_LENGTH_DEFAULT),
  errorMessage: (_value, attrs) =>
    `Must be at least ${attrs.minLength ?? SECRET_MIN_LENGTH_DEFAULT} characters`,
  display: maskSecret,
  promptHint: (attrs) => `(min: ${attrs.minLength ?? SECRET_MIN_LENGTH_DEFAULT} chars)`,
  masked: true,
};
