// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates used by the setting-type parsers. Range comparisons
 * compose with `all` from `./str` for whole-string checks.
 */

/** Predicate over a single character. */
export type CharPred = (c: string) => boolean;

export const isLower: CharPred = (c) => c >= "a" && c <= "z";

export const isUpper: CharPred = (c) => c >= "A" && c <= "Z";

export const isDigit: CharPred = (c) => c >= "0" && c <= "9";

export const isAlpha: CharPred = (c) => isLower(c) || isUpper(c);

export const isAlphaNum: CharPred = (c) => isAlpha(c) || isDigit(c);

export const isOneOf =
  (chars: string): CharPred =>
  (c): boolean =>
    chars.includes(c);

/** Union of predicates: true when any of them accepts the character. */
export const anyOf =
  (...preds: readonly CharPred[]): CharPred =>
  (c): boolean =>
    preds.some((p) => p(c));
