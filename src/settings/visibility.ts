// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Visibility evaluation. Pure functions of the current values: menu redraws
 * call these on every iteration.
 */

import { Array as Arr, Match, Option, Order, pipe } from "effect";
import { COMPARISON_OP_VALUES, type ComparisonOp } from "../config/field-values";
import { isVariableName } from "../lib/file-parsers";
import { parseDecimal } from "../lib/schema-utils";
import type { Lookup, Visibility, VisibilityCondition } from "./model";

/** Setting that is always shown. */
export const ALWAYS_VISIBLE: Visibility = { mode: "all", conditions: [] };

const compareBy = <T>(order: Order.Order<T>, left: T, op: ComparisonOp, right: T): boolean => {
  const c = order(left, right);
  return pipe(
    Match.value(op),
    Match.when("==", () => c === 0),
    Match.when("!=", () => c !== 0),
    Match.when("<", () => c < 0),
    Match.when(">", () => c > 0),
    Match.when("<=", () => c <= 0),
    Match.when(">=", () => c >= 0),
    Match.exhaustive
  );
};

/** Numeric when both sides parse as numbers, lexicographic otherwise. */
export const compare = (left: string, op: ComparisonOp, right: string): boolean =>
  pipe(
    Option.all([parseDecimal(left), parseDecimal(right)]),
    Option.match({
      onSome: ([l, r]): boolean => compareBy(Order.number, l, op, r),
      onNone: (): boolean => compareBy(Order.string, left, op, right),
    })
  );

/** An unset referenced setting compares as the empty string. */
export const evaluateCondition = (condition: VisibilityCondition, lookup: Lookup): boolean =>
  compare(
    Option.getOrElse(lookup(condition.setting), () => ""),
    condition.op,
    condition.operand
  );

export const evaluate = (visibility: Visibility, lookup: Lookup): boolean =>
  pipe(
    Match.value(visibility.mode),
    Match.when("all", () => visibility.conditions.every((c) => evaluateCondition(c, lookup))),
    Match.when(
      "any",
      () =>
        visibility.conditions.length === 0 ||
        visibility.conditions.some((c) => evaluateCondition(c, lookup))
    ),
    Match.exhaustive
  );

/** Leftmost operator wins; at equal positions the two-character form is preferred. */
const findOperator = (s: string): Option.Option<{ readonly op: ComparisonOp; readonly index: number }> =>
  pipe(
    COMPARISON_OP_VALUES,
    Arr.filterMap((op) => {
      const index = s.indexOf(op);
      return index > 0 ? Option.some({ op, index }) : Option.none();
    }),
    Arr.reduce(
      Option.none<{ readonly op: ComparisonOp; readonly index: number }>(),
      (best, candidate) =>
        Option.match(best, {
          onNone: () => Option.some(candidate),
          onSome: (b) => (candidate.index < b.index ? Option.some(candidate) : best),
        })
    )
  );

/** `"NETWORK_METHOD==static"` -> `{ setting: "NETWORK_METHOD", op: "==", operand: "static" }` */
export const parseCondition = (s: string): Option.Option<VisibilityCondition> =>
  pipe(
    findOperator(s),
    Option.map(
      ({ op, index }): VisibilityCondition => ({
        setting: s.slice(0, index),
        op,
        operand: s.slice(index + op.length),
      })
    ),
    Option.filter((c) => isVariableName(c.setting))
  );

/** Whitespace-separated list: `"ENCRYPTION==true ENCRYPTION_USE_PASSPHRASE==true"`. */
export const parseConditions = (s: string): Option.Option<readonly VisibilityCondition[]> =>
  Option.all(
    s
      .split(/\s+/)
      .filter((part) => part.length > 0)
      .map(parseCondition)
  );

export const formatCondition = (c: VisibilityCondition): string => `${c.setting}${c.op}${c.operand}`;

/** `"ENCRYPTION==true && SEPARATE_HOME==true"`, or empty when always visible. */
export const formatVisibility = (visibility: Visibility): string =>
  visibility.conditions.map(formatCondition).join(visibility.mode === "all" ? " && " : " || ");
