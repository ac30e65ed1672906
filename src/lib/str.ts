// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the character level. Uses `Array.from()` so that
 * surrogate pairs count as one character. Multi-argument helpers are curried
 * data-last for `pipe()` composition.
 */

import { Option } from "effect";
import type { CharPred } from "./char";

export const chars = (s: string): readonly string[] => Array.from(s);

/** Split into `[head, tail]`, returning `None` for empty strings. */
export const uncons = (s: string): Option.Option<readonly [string, string]> => {
  const arr = chars(s);
  const first = arr[0];
  return first !== undefined
    ? Option.some([first, arr.slice(1).join("")] as const)
    : Option.none();
};

export const last = (s: string): Option.Option<string> => Option.fromNullable(chars(s).at(-1));

/** Lift a `CharPred` to operate on an entire string (every character must satisfy). */
export const all =
  (pred: CharPred) =>
  (s: string): boolean =>
    chars(s).every(pred);

export const mapCharsToString =
  (f: (c: string) => string) =>
  (s: string): string =>
    chars(s).map(f).join("");

/** Replace characters via a lookup map, passing through unmapped characters. */
export const escapeWith = (mapping: ReadonlyMap<string, string>): ((s: string) => string) =>
  mapCharsToString((c) => mapping.get(c) ?? c);

/** `"network_setup"` → `"Network setup"`. */
export const humanize = (s: string): string =>
  Option.match(uncons(s.split("_").join(" ")), {
    onNone: (): string => "",
    onSome: ([head, tail]): string => `${head.toUpperCase()}${tail}`,
  });

/** Repeat `c` `n` times; non-positive counts give the empty string. */
export const repeatChar = (c: string, n: number): string => (n > 0 ? c.repeat(n) : "");
