// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Parsers for sourceable shell assignment files (`export NAME="value"`).
 * Pure functions with no IO - callers handle file reading and unescaping.
 */

import { Array as Arr, Option, pipe } from "effect";
import { isAlpha, isAlphaNum } from "./char";
import { all, uncons } from "./str";

export const isContentLine = (line: string): boolean => {
  const trimmed = line.trim();
  return trimmed.length > 0 && !trimmed.startsWith("#");
};

export const toContentLines = (content: string): readonly string[] =>
  pipe(
    content.split("\n"),
    Arr.map((line) => line.trim()),
    Arr.filter(isContentLine)
  );

export type Quoting = "double" | "single" | "none";

export interface Assignment {
  readonly name: string;
  /** Raw text between the quotes; escapes are left for the caller. */
  readonly value: string;
  readonly quoting: Quoting;
}

/** Shell variable name: `[A-Za-z_][A-Za-z0-9_]*`. */
export const isVariableName = (s: string): boolean =>
  pipe(
    uncons(s),
    Option.exists(
      ([head, tail]) => (isAlpha(head) || head === "_") && all((c) => isAlphaNum(c) || c === "_")(tail)
    )
  );

/** Index of the first `"` at or after `from` that no backslash escapes. */
export const closingQuote = (s: string, from: number): Option.Option<number> => {
  for (let i = from; i < s.length; i++) {
    if (s[i] === "\\") {
      i++;
    } else if (s[i] === '"') {
      return Option.some(i);
    }
  }
  return Option.none();
};

const closesAtEnd = (raw: string, quote: string): boolean =>
  quote === '"' ? Option.contains(closingQuote(raw, 1), raw.length - 1) : raw.length >= 2 && raw.endsWith(quote);

const unquote = (raw: string): Option.Option<{ readonly value: string; readonly quoting: Quoting }> => {
  const quote = raw.startsWith('"') ? '"' : raw.startsWith("'") ? "'" : "";
  return quote === ""
    ? Option.some({ value: raw, quoting: "none" as const })
    : pipe(
        Option.some(raw),
        Option.filter((r) => closesAtEnd(r, quote)),
        Option.map((r) => ({
          value: r.slice(1, -1),
          quoting: quote === '"' ? ("double" as const) : ("single" as const),
        }))
      );
};

const assignmentBody = (line: string): string => line.trim().replace(/^export\s+/, "");

/** `export NAME="v"`, `NAME=v` or `NAME='v'`; None for anything else. */
export const parseAssignment = (line: string): Option.Option<Assignment> => {
  const body = assignmentBody(line);
  const eqIndex = body.indexOf("=");
  return pipe(
    Option.some(body.slice(0, Math.max(0, eqIndex))),
    Option.filter(isVariableName),
    Option.flatMap((name) =>
      pipe(
        unquote(body.slice(eqIndex + 1)),
        Option.map(({ value, quoting }): Assignment => ({ name, value, quoting }))
      )
    )
  );
};

/** True when the line starts a double-quoted value it does not close. */
const opensQuote = (line: string): boolean => {
  const body = assignmentBody(line);
  const valueStart = body.indexOf("=") + 1;
  return (
    valueStart > 0 &&
    isVariableName(body.slice(0, valueStart - 1)) &&
    body[valueStart] === '"' &&
    Option.isNone(closingQuote(body, valueStart + 1))
  );
};

interface LineAccumulator {
  readonly lines: readonly string[];
  readonly open: Option.Option<string>;
}

/**
 * Physical lines joined where a double-quoted value spans line breaks, as a
 * shell reads it. An unterminated value at end of input stays one line.
 */
export const toLogicalLines = (content: string): readonly string[] => {
  const start: LineAccumulator = { lines: [], open: Option.none() };
  const { lines, open } = pipe(
    content.split("\n"),
    Arr.reduce(start, (acc: LineAccumulator, line: string): LineAccumulator => {
      const current = Option.match(acc.open, { onNone: () => line, onSome: (head) => `${head}\n${line}` });
      return opensQuote(current)
        ? { lines: acc.lines, open: Option.some(current) }
        : { lines: [...acc.lines, current], open: Option.none() };
    })
  );
  return Option.match(open, { onNone: () => lines, onSome: (head) => [...lines, head] });
};

export const parseAssignments = (content: string): readonly Assignment[] =>
  pipe(
    toLogicalLines(content),
    Arr.map((line) => line.trim()),
    Arr.filter(isContentLine),
    Arr.filterMap(parseAssignment)
  );
