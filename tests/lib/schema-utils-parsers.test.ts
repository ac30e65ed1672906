// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, Exit, Option, Schema } from "effect";
import { describe, expect, test } from "vitest";
import { z } from "zod";
import {
  decodeEither,
  decodeWithZod,
  hasUrlScheme,
  intToIPv4,
  ipv4ToInt,
  isPathLike,
  isValidIPv4,
  parseDecimal,
  parseDigits,
  parseDiskSize,
  parseHostname,
  parseIPv4,
  parseInteger,
  parseLocale,
  parseNat,
  parseNetmask,
  parsePosixUsername,
  parseTimezone,
  sameSubnet,
} from "../../src/lib/schema-utils";

describe("numbers", () => {
  test("parseNat rejects leading zeros", () => {
    expect(parseNat("0")).toEqual(Option.some(0));
    expect(parseNat("42")).toEqual(Option.some(42));
    expect(Option.isNone(parseNat("042"))).toBe(true);
    expect(Option.isNone(parseNat(""))).toBe(true);
    expect(Option.isNone(parseNat("-1"))).toBe(true);
  });

  test("parseDigits allows leading zeros", () => {
    expect(parseDigits("0022")).toEqual(Option.some(22));
    expect(Option.isNone(parseDigits("22a"))).toBe(true);
  });

  test("parseInteger takes a sign", () => {
    expect(parseInteger("-5")).toEqual(Option.some(-5));
    expect(parseInteger("17")).toEqual(Option.some(17));
    expect(Option.isNone(parseInteger("1.5"))).toBe(true);
    expect(Option.isNone(parseInteger("-"))).toBe(true);
  });

  test("parseDecimal", () => {
    expect(parseDecimal("1.5")).toEqual(Option.some(1.5));
    expect(parseDecimal("-0.25")).toEqual(Option.some(-0.25));
    expect(parseDecimal("3")).toEqual(Option.some(3));
    expect(Option.isNone(parseDecimal("1."))).toBe(true);
    expect(Option.isNone(parseDecimal(".5"))).toBe(true);
    expect(Option.isNone(parseDecimal("1.2.3"))).toBe(true);
    expect(Option.isNone(parseDecimal("1e3"))).toBe(true);
  });
});

describe("IPv4", () => {
  test("parseIPv4", () => {
    expect(parseIPv4("192.168.1.10")).toEqual(Option.some([192, 168, 1, 10]));
    expect(Option.isNone(parseIPv4("256.1.1.1"))).toBe(true);
    expect(Option.isNone(parseIPv4("1.2.3"))).toBe(true);
    expect(Option.isNone(parseIPv4("1.2.3.4.5"))).toBe(true);
    expect(Option.isNone(parseIPv4("01.2.3.4"))).toBe(true);
  });

  test("isValidIPv4", () => {
    expect(isValidIPv4("0.0.0.0")).toBe(true);
    expect(isValidIPv4("a.b.c.d")).toBe(false);
  });

  test("ipv4ToInt and intToIPv4 are inverse", () => {
    expect(ipv4ToInt([255, 255, 255, 0])).toBe(0xffffff00);
    expect(intToIPv4(0xc0a80101)).toBe("192.168.1.1");
  });

  describe("parseNetmask", () => {
    test("dotted masks must be contiguous", () => {
      expect(parseNetmask("255.255.255.0")).toEqual(Option.some(0xffffff00));
      expect(Option.isNone(parseNetmask("255.0.255.0"))).toBe(true);
      expect(Option.isNone(parseNetmask("255.255.255.255"))).toBe(true);
    });

    test("prefix lengths 0-32", () => {
      expect(parseNetmask("24")).toEqual(Option.some(0xffffff00));
      expect(parseNetmask("32")).toEqual(Option.some(0xffffffff));
      expect(Option.isNone(parseNetmask("33"))).toBe(true);
    });
  });

  test("sameSubnet", () => {
    expect(sameSubnet([192, 168, 1, 10], [192, 168, 1, 1], 0xffffff00)).toBe(true);
    expect(sameSubnet([192, 168, 1, 10], [192, 168, 2, 1], 0xffffff00)).toBe(false);
    expect(sameSubnet([10, 0, 5, 1], [10, 0, 200, 1], 0xffff0000)).toBe(true);
  });
});

describe("names", () => {
  test("parseHostname", () => {
    expect(parseHostname("web-01")).toEqual(Option.some("web-01"));
    expect(Option.isNone(parseHostname("-web"))).toBe(true);
    expect(Option.isNone(parseHostname("web-"))).toBe(true);
    expect(Option.isNone(parseHostname("web_01"))).toBe(true);
    expect(Option.isNone(parseHostname("a".repeat(64)))).toBe(true);
  });

  test("parsePosixUsername", () => {
    expect(parsePosixUsername("admin")).toEqual(Option.some("admin"));
    expect(parsePosixUsername("_svc-1")).toEqual(Option.some("_svc-1"));
    expect(Option.isNone(parsePosixUsername("Admin"))).toBe(true);
    expect(Option.isNone(parsePosixUsername("1user"))).toBe(true);
    expect(Option.isNone(parsePosixUsername("a"))).toBe(true);
  });
});

describe("region", () => {
  test("parseLocale", () => {
    expect(parseLocale("en_US.UTF-8")).toEqual(Option.some({ language: "en", territory: "US" }));
    expect(Option.isSome(parseLocale("de_DE.utf8"))).toBe(true);
    expect(Option.isNone(parseLocale("en_US"))).toBe(true);
    expect(Option.isNone(parseLocale("EN_us.UTF-8"))).toBe(true);
  });

  test("parseTimezone", () => {
    expect(parseTimezone("UTC")).toEqual(Option.some(["UTC"]));
    expect(parseTimezone("Europe/Berlin")).toEqual(Option.some(["Europe", "Berlin"]));
    expect(Option.isSome(parseTimezone("America/Argentina/Buenos_Aires"))).toBe(true);
    expect(Option.isNone(parseTimezone("europe/berlin"))).toBe(true);
    expect(Option.isNone(parseTimezone("Berlin"))).toBe(true);
  });
});

describe("disk sizes", () => {
  test("parseDiskSize", () => {
    expect(parseDiskSize("8G")).toEqual(Option.some({ amount: 8, unit: Option.some("G") }));
    expect(parseDiskSize("512")).toEqual(Option.some({ amount: 512, unit: Option.none() }));
    expect(Option.isNone(parseDiskSize("G"))).toBe(true);
    expect(Option.isNone(parseDiskSize("8X"))).toBe(true);
  });
});

describe("urls and paths", () => {
  test("hasUrlScheme", () => {
    expect(hasUrlScheme("https://example.com/repo.git")).toBe(true);
    expect(hasUrlScheme("ssh://git@example.com/repo")).toBe(true);
    expect(hasUrlScheme("ftp://example.com")).toBe(false);
  });

  test("isPathLike", () => {
    expect(isPathLike("/etc/nixos")).toBe(true);
    expect(isPathLike("~/config")).toBe(true);
    expect(isPathLike("./disko.nix")).toBe(true);
    expect(isPathLike("disko.nix")).toBe(false);
  });
});

describe("decoding", () => {
  test("decodeWithZod fails with the offending path", () => {
    const schema = z.object({ level: z.enum(["debug", "info"]) });
    const exit = Effect.runSyncExit(decodeWithZod(schema, { level: "loud" }, "/etc/dps/dps.toml"));
    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit)) {
      const error = exit.cause._tag === "Fail" ? exit.cause.error : undefined;
      expect(error?.code).toBe(12);
      expect(error?.message.startsWith("Configuration validation failed for /etc/dps/dps.toml:\n  - level:")).toBe(
        true
      );
    }
  });

  test("decodeEither returns the decoded value", () => {
    expect(decodeEither(Schema.Number, 3)).toEqual(Either.right(3));
    expect(Either.isLeft(decodeEither(Schema.Number, "3"))).toBe(true);
  });
});
