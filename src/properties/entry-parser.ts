// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Splits one logical line into an Entry. Parsing is total: any input yields
 * some entry, and the fields of a PropertyEntry always concatenate back to
 * the line (plus a `\n` when the line had no terminator).
 */

import { Option, pipe } from "effect";
import {
  isAnyWhitespace,
  isCommentMarker,
  isInlineWhitespace,
  isKeyTerminator,
  isLineBreak,
} from "../lib/char.js";
import { findIndexFrom, splitTrailing } from "../lib/str.js";
import { BasicEntry, DEFAULT_LINE_ENDING, type Entry, PropertyEntry } from "./entry.js";
import { readLogicalLines } from "./logical-line-reader.js";

const firstNonWhitespace = (line: string): Option.Option<string> =>
  pipe(
    findIndexFrom((c) => !isAnyWhitespace(c), 0)(line),
    Option.map((i) => line.charAt(i))
  );

/** First character that is not whitespace is `#` or `!`. */
export const isCommentLine = (line: string): boolean =>
  Option.exists(firstNonWhitespace(line), isCommentMarker);

/**
 * Nothing but whitespace, or whitespace ending in a backslash that escapes
 * the line break.
 */
export const isBlankLine = (line: string): boolean =>
  pipe(
    findIndexFrom((c) => !isAnyWhitespace(c), 0)(line),
    Option.match({
      onNone: () => true,
      onSome: (i) => line.charAt(i) === "\\" && isLineBreak(line.charAt(i + 1)),
    })
  );

/** Whitespace before the key; empty when the line opens with a separator. */
export const parseLeadingWhitespace = (line: string): string => {
  for (let i = 0; i < line.length; i++) {
    const c = line.charAt(i);
    if (isKeyTerminator(c)) {
      return "";
    }
    if (!isAnyWhitespace(c)) {
      return line.slice(0, i);
    }
  }
  return line;
};

/**
 * The escaped key starting at `start`. Runs to the first unescaped
 * whitespace, `=` or `:`; indentation after an escaped line break is skipped
 * but stays part of the key text.
 */
export const parseKey = (line: string, start: number): string => {
  let skipIndentation = false;
  let endOfEscape = -1;

  for (let i = start; i < line.length; i++) {
    const c = line.charAt(i);

    if (skipIndentation && isInlineWhitespace(c)) {
      continue;
    }

    if (c === "\\" && i + 1 < line.length) {
      const escapedChar = line.charAt(i + 1);
      i++;
      if (isLineBreak(escapedChar)) {
        skipIndentation = true;
        if (escapedChar === "\r" && line.charAt(i + 1) === "\n") {
          i++;
        }
      }
      endOfEscape = i + 1;
      continue;
    }

    if (isAnyWhitespace(c) || isKeyTerminator(c)) {
      return line.slice(start, endOfEscape === -1 ? i : endOfEscape);
    }

    skipIndentation = false;
    endOfEscape = -1;
  }

  return line.slice(start);
};

/**
 * Whitespace, at most one `=` or `:`, whitespace. A second `=` or `:`
 * already belongs to the value.
 */
export const parseSeparator = (line: string, start: number): string => {
  let terminatorSeen = false;

  for (let i = start; i < line.length; i++) {
    const c = line.charAt(i);
    if (isKeyTerminator(c)) {
      if (terminatorSeen) {
        return line.slice(start, i);
      }
      terminatorSeen = true;
    } else if (!isInlineWhitespace(c)) {
      return line.slice(start, i);
    }
  }

  return line.slice(start);
};

/** Everything from the first non-blank character on, line ending included. */
export const parseValue = (line: string, start: number): string =>
  pipe(
    findIndexFrom((c) => !isInlineWhitespace(c), start)(line),
    Option.match({
      onNone: () => line.slice(start),
      onSome: (i) => line.slice(i),
    })
  );

/** `[value, lineEnding]`; the line ending defaults to `\n` when the text has none. */
export const splitLineEnding = (valueWithLineEnding: string): readonly [string, string] => {
  const [value, lineEnding] = splitTrailing(isLineBreak)(valueWithLineEnding);
  return [value, lineEnding.length > 0 ? lineEnding : DEFAULT_LINE_ENDING] as const;
};

export const parseEntry = (line: string): Entry => {
  if (isCommentLine(line) || isBlankLine(line)) {
    return BasicEntry({ raw: line });
  }

  const leadingWhitespace = parseLeadingWhitespace(line);
  const key = parseKey(line, leadingWhitespace.length);
  const separator = parseSeparator(line, leadingWhitespace.length + key.length);
  const [value, lineEnding] = splitLineEnding(
    parseValue(line, leadingWhitespace.length + key.length + separator.length)
  );

  return PropertyEntry({ leadingWhitespace, key, separator, value, lineEnding });
};

/** Every entry of a document text, in order. */
export const parseEntries = (source: string): readonly Entry[] =>
  readLogicalLines(source).map(parseEntry);
