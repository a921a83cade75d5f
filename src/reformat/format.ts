// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Layout strings for reformatting, e.g. `<key> = <value>\n`.
 *
 * Grammar (case-insensitive):
 *   whitespace* "<key>" whitespace* separator whitespace* "<value>" line-ending
 * where whitespace is a space or the two-character escapes `\t` / `\f`, the
 * separator is `=`, `:` or one whitespace token, and the line ending is
 * `\n`, `\r` or `\r\n`, again written as escapes.
 */

import { Either, Option, pipe } from "effect";
import { ErrorCode, FormatError } from "../lib/errors.js";

export interface PropertyFormat {
  readonly leadingWhitespace: string;
  readonly separator: string;
  readonly lineEnding: string;
}

const PROPERTY_FORMAT_PATTERN =
  /^(?<leadingWhitespace>(?: |\\t|\\f)*)<key>(?<separator>(?: |\\t|\\f)*(?: |\\t|\\f|=|:)(?: |\\t|\\f)*)<value>(?<lineEnding>\\r\\n|\\n|\\r)$/i;

const ESCAPES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\\t/gi, "\t"],
  [/\\f/gi, "\f"],
  [/\\r/gi, "\r"],
  [/\\n/gi, "\n"],
];

/** Turn the two-character escapes of a layout string into real characters. */
export const convertEscapes = (s: string): string =>
  ESCAPES.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), s);

const invalidFormat = (format: string): FormatError =>
  new FormatError({
    code: ErrorCode.INVALID_FORMAT,
    format,
    message: `Invalid format string "${format}". A usual format is "<key> = <value>\\n"`,
  });

export const parseFormat = (format: string): Either.Either<PropertyFormat, FormatError> =>
  pipe(
    Option.fromNullable(PROPERTY_FORMAT_PATTERN.exec(format)?.groups),
    Option.match({
      onNone: () => Either.left(invalidFormat(format)),
      onSome: (groups) =>
        Either.right({
          leadingWhitespace: convertEscapes(groups["leadingWhitespace"] ?? ""),
          separator: convertEscapes(groups["separator"] ?? ""),
          lineEnding: convertEscapes(groups["lineEnding"] ?? ""),
        }),
    })
  );
