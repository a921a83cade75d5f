// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Byte boundary of the library. Documents are text everywhere else; only
 * these functions know about encodings.
 */

import { Buffer } from "node:buffer";
import { Match, Option, pipe } from "effect";

export const CHARSET_VALUES = [
  "UTF-8",
  "UTF-16",
  "UTF-16LE",
  "UTF-16BE",
  "ISO-8859-1",
  "US-ASCII",
] as const;
export type Charset = (typeof CHARSET_VALUES)[number];
export const CHARSET_DEFAULT: Charset = "UTF-8";

const CHARSET_ALIASES: ReadonlyMap<string, Charset> = new Map<string, Charset>([
  ["utf-8", "UTF-8"],
  ["utf8", "UTF-8"],
  ["utf-16", "UTF-16"],
  ["utf16", "UTF-16"],
  ["utf-16le", "UTF-16LE"],
  ["utf16le", "UTF-16LE"],
  ["utf-16be", "UTF-16BE"],
  ["utf16be", "UTF-16BE"],
  ["iso-8859-1", "ISO-8859-1"],
  ["iso8859-1", "ISO-8859-1"],
  ["iso_8859_1", "ISO-8859-1"],
  ["latin1", "ISO-8859-1"],
  ["latin-1", "ISO-8859-1"],
  ["us-ascii", "US-ASCII"],
  ["ascii", "US-ASCII"],
]);

/** Resolve a charset name case-insensitively, including common aliases. */
export const parseCharset = (name: string): Option.Option<Charset> =>
  Option.fromNullable(CHARSET_ALIASES.get(name.trim().toLowerCase()));

/** Charsets that can represent every character, so escaping is never forced. */
export const isUnicodeCapable = (charset: Charset): boolean =>
  pipe(
    Match.value(charset),
    Match.when("ISO-8859-1", () => false),
    Match.when("US-ASCII", () => false),
    Match.orElse(() => true)
  );

const BOM_BE = [0xfe, 0xff] as const;
const BOM_LE = [0xff, 0xfe] as const;

const startsWith = (bytes: Uint8Array, prefix: readonly number[]): boolean =>
  bytes.length >= prefix.length && prefix.every((b, i) => bytes[i] === b);

const evenLength = (bytes: Uint8Array): Uint8Array => bytes.subarray(0, bytes.length - (bytes.length % 2));

const encodeUtf16be = (text: string): Buffer => Buffer.from(text, "utf16le").swap16();

const decodeUtf16be = (bytes: Uint8Array): string =>
  Buffer.from(evenLength(bytes)).swap16().toString("utf16le");

/** View over the same memory, no copy. */
const asBuffer = (bytes: Uint8Array): Buffer =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

const decodeUtf16le = (bytes: Uint8Array): string => asBuffer(bytes).toString("utf16le");

/** UTF-16 without a declared byte order: a BOM decides, big-endian otherwise. */
const decodeUtf16 = (bytes: Uint8Array): string => {
  if (startsWith(bytes, BOM_BE)) {
    return decodeUtf16be(bytes.subarray(2));
  }
  if (startsWith(bytes, BOM_LE)) {
    return decodeUtf16le(bytes.subarray(2));
  }
  return decodeUtf16be(bytes);
};

export const encode = (text: string, charset: Charset): Uint8Array =>
  pipe(
    Match.value(charset),
    Match.when("UTF-8", () => Buffer.from(text, "utf8")),
    Match.when("UTF-16", () => Buffer.concat([Buffer.from(BOM_BE), encodeUtf16be(text)])),
    Match.when("UTF-16LE", () => Buffer.from(text, "utf16le")),
    Match.when("UTF-16BE", () => encodeUtf16be(text)),
    Match.when("ISO-8859-1", () => Buffer.from(text, "latin1")),
    Match.when("US-ASCII", () => Buffer.from(text, "ascii")),
    Match.exhaustive
  );

export const decode = (bytes: Uint8Array, charset: Charset): string =>
  pipe(
    Match.value(charset),
    Match.when("UTF-8", () => asBuffer(bytes).toString("utf8")),
    Match.when("UTF-16", () => decodeUtf16(bytes)),
    Match.when("UTF-16LE", () => decodeUtf16le(bytes)),
    Match.when("UTF-16BE", () => decodeUtf16be(bytes)),
    Match.when("ISO-8859-1", () => asBuffer(bytes).toString("latin1")),
    Match.when("US-ASCII", () => asBuffer(bytes).toString("ascii")),
    Match.exhaustive
  );
