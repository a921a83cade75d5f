// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import {
  ConfigError,
  ErrorCode,
  FormatError,
  SystemError,
  causeProps,
  errorMessage,
  isNotFoundError,
} from "../../src/lib/errors.js";

describe("errors", () => {
  describe("tagged errors", () => {
    test("carry their tag and fields", () => {
      const err = new FormatError({
        code: ErrorCode.INVALID_FORMAT,
        message: "bad format",
        format: "<key>",
      });
      expect(err._tag).toBe("FormatError");
      expect(err.code).toBe(20);
      expect(err.format).toBe("<key>");
      expect(err.message).toBe("bad format");
    });

    test("are Error instances", () => {
      const err = new SystemError({
        code: ErrorCode.FILE_READ_FAILED,
        message: "cannot read",
        path: "/tmp/app.properties",
      });
      expect(err).toBeInstanceOf(Error);
      expect(err.path).toBe("/tmp/app.properties");
    });

    test("keep an optional key on config errors", () => {
      const err = new ConfigError({ code: ErrorCode.CONFIG_INVALID, message: "nope", key: "CHARSET" });
      expect(err.key).toBe("CHARSET");
    });
  });

  describe("ErrorCode", () => {
    test("gives every code a distinct number", () => {
      const codes = Object.values(ErrorCode);
      expect(new Set(codes).size).toBe(codes.length);
      expect(ErrorCode.STREAM_WRITE_FAILED).toBe(35);
    });
  });

  describe("errorMessage", () => {
    test("handles errors, strings and other values", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
      expect(errorMessage("plain")).toBe("plain");
      expect(errorMessage(42)).toBe("42");
    });
  });

  describe("causeProps", () => {
    test("wraps errors and ignores everything else", () => {
      const cause = new Error("root");
      expect(causeProps(cause)).toEqual({ cause });
      expect(causeProps("root")).toEqual({});
    });
  });

  describe("isNotFoundError", () => {
    test("matches ENOENT only", () => {
      const missing = Object.assign(new Error("missing"), { code: "ENOENT" });
      const denied = Object.assign(new Error("denied"), { code: "EACCES" });
      expect(isNotFoundError(missing)).toBe(true);
      expect(isNotFoundError(denied)).toBe(false);
      expect(isNotFoundError("ENOENT")).toBe(false);
    });
  });
});
