// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { LogicalLineReader, readLogicalLines } from "../../src/properties/logical-line-reader.js";

describe("LogicalLineReader", () => {
  test("splits on every kind of line break and keeps the terminator", () => {
    expect(readLogicalLines("a=1\nb=2\r\nc=3\rd=4")).toEqual(["a=1\n", "b=2\r\n", "c=3\r", "d=4"]);
  });

  test("returns None once exhausted", () => {
    const reader = new LogicalLineReader("a=1\n");
    expect(reader.readLogicalLine()).toEqual(Option.some("a=1\n"));
    expect(reader.readLogicalLine()).toEqual(Option.none());
  });

  test("yields nothing for empty text", () => {
    expect(readLogicalLines("")).toEqual([]);
  });

  test("continues a property line after an escaped line break", () => {
    expect(readLogicalLines("key = va\\\n  lue\nnext")).toEqual(["key = va\\\n  lue\n", "next"]);
  });

  test("treats an escaped CRLF as one continuation", () => {
    expect(readLogicalLines("key\\\r\n  value\nnext\n")).toEqual(["key\\\r\n  value\n", "next\n"]);
  });

  test("an even run of backslashes does not continue the line", () => {
    expect(readLogicalLines("a=b\\\\\nc\n")).toEqual(["a=b\\\\\n", "c\n"]);
  });

  test("an odd run longer than one still continues the line", () => {
    expect(readLogicalLines("a=b\\\\\\\nc\n")).toEqual(["a=b\\\\\\\nc\n"]);
  });

  test("a lone backslash at the end of the text ends the line", () => {
    expect(readLogicalLines("a=b\\")).toEqual(["a=b\\"]);
  });

  test("comment lines end at their first line break", () => {
    expect(readLogicalLines("# comment \\\nkey=v\n")).toEqual(["# comment \\\n", "key=v\n"]);
    expect(readLogicalLines("  ! note\\\r\nkey=v")).toEqual(["  ! note\\\r\n", "key=v"]);
  });

  test("a backslash alone on a line does not continue it", () => {
    expect(readLogicalLines("  \\\n  key=v\n")).toEqual(["  \\\n", "  key=v\n"]);
  });

  test("keeps empty lines", () => {
    expect(readLogicalLines("\n\r\n\r")).toEqual(["\n", "\r\n", "\r"]);
  });
});
