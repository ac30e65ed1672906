// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { makeEscapeCodec, shellDoubleQuoteCodec } from "../../src/lib/escape-codec";

describe("EscapeCodec", () => {
  describe("shellDoubleQuoteCodec", () => {
    test("escapes characters special inside double quotes", () => {
      expect(shellDoubleQuoteCodec.escape('say "hi"')).toBe('say \\"hi\\"');
      expect(shellDoubleQuoteCodec.escape("$HOME")).toBe("\\$HOME");
      expect(shellDoubleQuoteCodec.escape("a`b`")).toBe("a\\`b\\`");
      expect(shellDoubleQuoteCodec.escape("C:\\dir")).toBe("C:\\\\dir");
    });

    test("leaves other characters alone", () => {
      expect(shellDoubleQuoteCodec.escape("plain value 1.2.3")).toBe("plain value 1.2.3");
      expect(shellDoubleQuoteCodec.escape("it's")).toBe("it's");
      expect(shellDoubleQuoteCodec.escape("a\nb")).toBe("a\nb");
    });

    test("unescape reverses escape", () => {
      const value = 'p@ss "w$rd" \\ `x`';
      expect(shellDoubleQuoteCodec.unescape(shellDoubleQuoteCodec.escape(value))).toBe(value);
    });

    test("unmapped escapes keep their backslash", () => {
      expect(shellDoubleQuoteCodec.unescape("a\\nb")).toBe("a\\nb");
    });
  });

  describe("makeEscapeCodec", () => {
    test("derives both directions from one pair list", () => {
      const codec = makeEscapeCodec("%", [
        ["%", "%"],
        [",", "c"],
      ]);
      expect(codec.escape("a,b%")).toBe("a%cb%%");
      expect(codec.unescape("a%cb%%")).toBe("a,b%");
    });
  });
});
