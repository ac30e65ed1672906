// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Schema decoding helpers and parser-first validation. Parsers return
 * Option<StructuredData>; validators derive from parsers via Option.isSome,
 * so setting types get the parsed value (octets, prefix length, ...) for free.
 */

import { Array as Arr, Effect, Either, Option, ParseResult, Schema, pipe } from "effect";
import type { z } from "zod";
import { isAlphaNum, isDigit, isLower, isUpper } from "./char";
import { ConfigError, ErrorCode } from "./errors";
import { all, chars, uncons } from "./str";

// ============================================================================
// Decode Utilities
// ============================================================================

const formatZodIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");

/**
 * Validate unknown data with a zod schema.
 * Output format:
 *   Configuration validation failed for /etc/dps/dps.toml:
 *     - settings.prefix: Prefix must match [A-Z][A-Z0-9_]*
 */
export const decodeWithZod = <A, I>(
  schema: z.ZodType<A, z.ZodTypeDef, I>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> => {
  const result = schema.safeParse(data);
  return result.success
    ? Effect.succeed(result.data)
    : Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Configuration validation failed for ${context}:\n${formatZodIssues(result.error)}`,
          path: context,
        })
      );
};

/**
 * Decode with an Effect Schema, returning the formatted parse error on failure.
 * Callers wrap the message in their own tagged error.
 */
export const decodeEither = <A, I>(
  schema: Schema.Schema<A, I, never>,
  data: unknown
): Either.Either<A, string> =>
  pipe(
    Schema.decodeUnknownEither(schema)(data),
    Either.mapLeft((error) => ParseResult.TreeFormatter.formatErrorSync(error))
  );

// ============================================================================
// Numbers
// ============================================================================

/**
 * Parse a natural number (non-negative integer) from string.
 * Returns None for empty, non-digit, or leading zeros (except "0").
 */
export const parseNat = (s: string): Option.Option<number> =>
  pipe(
    Option.some(s),
    Option.filter((str) => str.length > 0),
    Option.filter(all(isDigit)),
    Option.filter((str) => str.length === 1 || !str.startsWith("0")),
    Option.map((str) => Number.parseInt(str, 10)),
    Option.filter((n) => !Number.isNaN(n))
  );

/** Digits only, leading zeros allowed: "0022" -> 22. */
export const parseDigits = (s: string): Option.Option<number> =>
  pipe(
    Option.some(s),
    Option.filter((str) => str.length > 0 && all(isDigit)(str)),
    Option.map((str) => Number.parseInt(str, 10)),
    Option.filter(Number.isSafeInteger)
  );

/** Optionally signed integer: "-5", "42". */
export const parseInteger = (s: string): Option.Option<number> =>
  s.startsWith("-")
    ? pipe(
        parseDigits(s.slice(1)),
        Option.map((n) => -n)
      )
    : parseDigits(s);

/** Decimal with optional sign and fraction: "1.5", "-0.25", "3". */
export const parseDecimal = (s: string): Option.Option<number> => {
  const unsigned = s.startsWith("-") ? s.slice(1) : s;
  const [whole = "", fraction, ...rest] = unsigned.split(".");
  return pipe(
    Option.some(Number(s)),
    Option.filter(() => rest.length === 0),
    Option.filter(() => whole.length > 0 && all(isDigit)(whole)),
    Option.filter(() => fraction === undefined || (fraction.length > 0 && all(isDigit)(fraction))),
    Option.filter(Number.isFinite)
  );
};

// ============================================================================
// IPv4 and netmasks
// ============================================================================

export type IPv4Octets = readonly [number, number, number, number];

export const parseOctet = (s: string): Option.Option<number> =>
  pipe(
    parseNat(s),
    Option.filter((n) => n <= 255)
  );

/** "192.168.1.1" -> Some([192, 168, 1, 1]) */
export const parseIPv4 = (s: string): Option.Option<IPv4Octets> => {
  const [a = "", b = "", c = "", d = "", ...rest] = s.split(".");
  return pipe(
    Option.all([parseOctet(a), parseOctet(b), parseOctet(c), parseOctet(d)]),
    Option.filter(() => rest.length === 0)
  );
};

export const isValidIPv4 = (s: string): boolean => Option.isSome(parseIPv4(s));

/** Unsigned 32-bit value of an address. */
export const ipv4ToInt = ([a, b, c, d]: IPv4Octets): number =>
  ((a << 24) | (b << 16) | (c << 8) | d) >>> 0;

export const intToIPv4 = (n: number): string =>
  [24, 16, 8, 0].map((shift) => String((n >>> shift) & 255)).join(".");

export const prefixLengthToInt = (prefix: number): number =>
  prefix === 0 ? 0 : (0xffffffff << (32 - prefix)) >>> 0;

/** Contiguous ones followed by zeros, excluding all-zero and all-one masks. */
const isContiguousMask = (n: number): boolean =>
  n !== 0 && n !== 0xffffffff && ((n | (n - 1)) >>> 0) === 0xffffffff;

/**
 * Parse a netmask given as CIDR prefix length ("24") or dotted quad
 * ("255.255.255.0") into its 32-bit value.
 */
export const parseNetmask = (s: string): Option.Option<number> =>
  all(isDigit)(s) && s.length > 0
    ? pipe(
        parseDigits(s),
        Option.filter((n) => n <= 32),
        Option.map(prefixLengthToInt)
      )
    : pipe(parseIPv4(s), Option.map(ipv4ToInt), Option.filter(isContiguousMask));

/** Both addresses fall in the same network under `mask`. */
export const sameSubnet = (a: IPv4Octets, b: IPv4Octets, mask: number): boolean =>
  ((ipv4ToInt(a) & mask) >>> 0) === ((ipv4ToInt(b) & mask) >>> 0);

// ============================================================================
// Names
// ============================================================================

/** RFC 1123 label: 1-63 alphanumerics and hyphens, no leading/trailing hyphen. */
export const parseHostname = (s: string): Option.Option<string> =>
  pipe(
    Option.some(s),
    Option.filter((str) => str.length >= 1 && str.length <= 63),
    Option.filter(all((c) => isAlphaNum(c) || c === "-")),
    Option.filter((str) => !str.startsWith("-") && !str.endsWith("-"))
  );

const isPosixFirst = (c: string): boolean => isLower(c) || c === "_";
const isPosixRest = (c: string): boolean => isLower(c) || isDigit(c) || c === "_" || c === "-";

/** POSIX login name of 2-32 characters. */
export const parsePosixUsername = (s: string): Option.Option<string> =>
  pipe(
    uncons(s),
    Option.filter((tuple) => isPosixFirst(tuple[0])),
    Option.filter((tuple) => all(isPosixRest)(tuple[1])),
    Option.filter(() => s.length >= 2 && s.length <= 32),
    Option.map(() => s)
  );

// ============================================================================
// Region
// ============================================================================

export interface ParsedLocale {
  readonly language: string;
  readonly territory: string;
}

/** `ll_CC.UTF-8` or `ll_CC.utf8`. */
export const parseLocale = (s: string): Option.Option<ParsedLocale> => {
  const [tag = "", encoding, ...rest] = s.split(".");
  const [language = "", territory = ""] = tag.split("_");
  return pipe(
    Option.some({ language, territory }),
    Option.filter(() => rest.length === 0 && (encoding === "UTF-8" || encoding === "utf8")),
    Option.filter(() => tag === `${language}_${territory}`),
    Option.filter((l) => l.language.length === 2 && all(isLower)(l.language)),
    Option.filter((l) => l.territory.length === 2 && all(isUpper)(l.territory))
  );
};

const isZoneChar = (c: string): boolean => isAlphaNum(c) || c === "_" || c === "-" || c === "+";

/** "UTC" or `Region/City[/Sub]`, where Region starts upper-case. */
export const parseTimezone = (s: string): Option.Option<readonly string[]> => {
  const parts = s.split("/");
  return s === "UTC"
    ? Option.some(["UTC"])
    : pipe(
        Option.some(parts),
        Option.filter((ps) => ps.length === 2 || ps.length === 3),
        Option.filter((ps) => ps.every((p) => p.length > 0 && all(isZoneChar)(p))),
        Option.filter((ps) =>
          pipe(
            Arr.head(ps),
            Option.flatMap(uncons),
            Option.exists(([head]) => isUpper(head))
          )
        )
      );
};

// ============================================================================
// Disk sizes
// ============================================================================

export const DISK_SIZE_UNITS = ["K", "M", "G", "T"] as const;
export type DiskSizeUnit = (typeof DISK_SIZE_UNITS)[number];

export interface ParsedDiskSize {
  readonly amount: number;
  readonly unit: Option.Option<DiskSizeUnit>;
}

const isDiskSizeUnit = (c: string): c is DiskSizeUnit =>
  DISK_SIZE_UNITS.some((unit) => unit === c);

/** "8G" -> { amount: 8, unit: Some("G") }, "512" -> bare amount. */
export const parseDiskSize = (s: string): Option.Option<ParsedDiskSize> => {
  const lastChar = chars(s).at(-1) ?? "";
  return isDiskSizeUnit(lastChar)
    ? pipe(
        parseDigits(s.slice(0, -1)),
        Option.map((amount) => ({ amount, unit: Option.some(lastChar) }))
      )
    : pipe(
        parseDigits(s),
        Option.map((amount) => ({ amount, unit: Option.none() }))
      );
};

// ============================================================================
// URLs and paths
// ============================================================================

export const URL_SCHEMES = ["http", "https", "git", "ssh"] as const;

export const hasUrlScheme = (s: string): boolean =>
  URL_SCHEMES.some((scheme) => s.startsWith(`${scheme}://`));

/** Absolute, home-relative or dot-relative. */
export const isPathLike = (s: string): boolean =>
  s.startsWith("/") || s.startsWith("~") || s.startsWith(".");
