// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Conversions between the escaped text stored in a properties file and the
 * logical strings callers work with. Key escaping, value escaping and
 * unicode representation are separate transforms: which ones apply depends
 * on where the text sits.
 */

import { Option } from "effect";
import { isHexDigit, isInlineWhitespace, isLineBreak, isOneOf } from "../lib/char.js";
import { all, escapeWith } from "../lib/str.js";
import { type DiagnosticSink, InvalidUnicodeEscape, ignoreDiagnostics } from "./diagnostics.js";

const UNICODE_DIGITS = 4;
const UNICODE_ESCAPE_LENGTH = 2 + UNICODE_DIGITS;

/**
 * `[original, trigger]` pairs for values. Escaping and unescaping are both
 * derived from this one list.
 */
const VALUE_ESCAPES: ReadonlyArray<readonly [original: string, trigger: string]> = [
  ["\\", "\\"],
  ["\n", "n"],
  ["\r", "r"],
];

const VALUE_ESCAPE_MAP: ReadonlyMap<string, string> = new Map(
  VALUE_ESCAPES.map(([original, trigger]) => [original, `\\${trigger}`])
);

const VALUE_UNESCAPE_MAP: ReadonlyMap<string, string> = new Map(
  VALUE_ESCAPES.map(([original, trigger]) => [trigger, original])
);

const needsKeyEscape = isOneOf(" \t\f=:\n\r#!\\");

/**
 * Decode the `\uXXXX` escape whose backslash sits at `start`. Reports and
 * returns None when fewer than four characters follow or they are not hex.
 */
const readUnicodeEscape = (s: string, start: number, sink: DiagnosticSink): Option.Option<string> => {
  const digits = s.slice(start + 2, start + UNICODE_ESCAPE_LENGTH);
  if (digits.length < UNICODE_DIGITS) {
    sink(InvalidUnicodeEscape({ sequence: s.slice(start), reason: "truncated" }));
    return Option.none();
  }
  if (!all(isHexDigit)(digits)) {
    sink(InvalidUnicodeEscape({ sequence: s.slice(start, start + UNICODE_ESCAPE_LENGTH), reason: "invalid-hex" }));
    return Option.none();
  }
  return Option.some(String.fromCharCode(Number.parseInt(digits, 16)));
};

/**
 * Resolve escaped file text into its logical string.
 *
 * Continuations vanish together with the indentation of the continued line,
 * `\n` and `\r` become control characters, `\uXXXX` becomes the character it
 * names and any other escaped character stands for itself. A malformed
 * unicode escape is reported to `sink` and kept as written.
 */
export const unescape = (s: string, sink: DiagnosticSink = ignoreDiagnostics): string => {
  let out = "";
  let atLineStart = false;

  for (let i = 0; i < s.length; i++) {
    const c = s.charAt(i);

    if (c === "\\") {
      if (i + 1 >= s.length) {
        break;
      }
      const next = s.charAt(i + 1);
      if (isLineBreak(next)) {
        continue;
      }
      atLineStart = false;
      if (next === "u") {
        const decoded = readUnicodeEscape(s, i, sink);
        if (Option.isSome(decoded)) {
          out += decoded.value;
          i += UNICODE_ESCAPE_LENGTH - 1;
        } else {
          out += c;
        }
        continue;
      }
      out += VALUE_UNESCAPE_MAP.get(next) ?? next;
      i++;
      continue;
    }

    if (isLineBreak(c)) {
      atLineStart = true;
    } else if (!(atLineStart && isInlineWhitespace(c))) {
      out += c;
      atLineStart = false;
    }
  }

  return out;
};

/**
 * Resolve only `\uXXXX` escapes. Every other escape, `\\` included, is
 * copied through untouched.
 */
export const unescapeUnicode = (s: string, sink: DiagnosticSink = ignoreDiagnostics): string => {
  let out = "";

  for (let i = 0; i < s.length; i++) {
    const c = s.charAt(i);
    if (c !== "\\" || i + 1 >= s.length) {
      out += c;
      continue;
    }
    const next = s.charAt(i + 1);
    if (next !== "u") {
      out += c + next;
      i++;
      continue;
    }
    const decoded = readUnicodeEscape(s, i, sink);
    if (Option.isSome(decoded)) {
      out += decoded.value;
      i += UNICODE_ESCAPE_LENGTH - 1;
    } else {
      out += c;
    }
  }

  return out;
};

/**
 * Escape a logical key. Whitespace, separators, comment markers, line
 * breaks and backslashes get a backslash; the `\n` of a CRLF pair rides
 * along with its `\r`.
 */
export const escapeKey = (s: string): string => {
  let out = "";

  for (let i = 0; i < s.length; i++) {
    const c = s.charAt(i);
    out += needsKeyEscape(c) ? `\\${c}` : c;
    if (c === "\r" && s.charAt(i + 1) === "\n") {
      out += "\n";
      i++;
    }
  }

  return out;
};

/** Escape a logical value: line breaks become `\n` / `\r`, backslashes double. */
export const escapeValue: (s: string) => string = escapeWith(VALUE_ESCAPE_MAP);

/** `\uXXXX` for one code point; beyond the BMP the hex is not padded. */
export const escapeUnicodeChar = (codePoint: number): string =>
  `\\u${codePoint.toString(16).padStart(UNICODE_DIGITS, "0")}`;

/** Escape every UTF-16 code unit above 0x7f; US-ASCII passes through. */
export const escapeUnicode = (s: string): string => {
  let out = "";
  for (let i = 0; i < s.length; i++) {
    const code = s.charCodeAt(i);
    out += code <= 0x7f ? s.charAt(i) : escapeUnicodeChar(code);
  }
  return out;
};

/**
 * Turn text into comment lines. Each physical line gets a leading `#`; a
 * line break at the very end does not open a new one.
 */
export const commentOut = (text: string): string => {
  let out = "#";

  for (let i = 0; i < text.length; i++) {
    const c = text.charAt(i);
    out += c;
    if (!isLineBreak(c)) {
      continue;
    }
    if (c === "\r" && text.charAt(i + 1) === "\n") {
      out += "\n";
      i++;
    }
    if (i + 1 < text.length) {
      out += "#";
    }
  }

  return out;
};
