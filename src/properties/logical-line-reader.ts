// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Splits document text into logical lines. A logical line ends at the first
 * unescaped `\n`, `\r` or `\r\n` and keeps that terminator. A line break
 * after an odd run of backslashes continues a key/value line; comment and
 * blank lines always end at their first line break.
 */

import { Option } from "effect";
import { isCommentMarker, isInlineWhitespace, isLineBreak } from "../lib/char.js";

export class LogicalLineReader {
  private position = 0;

  constructor(private readonly source: string) {}

  /** The next logical line, or None once the source is exhausted. */
  readLogicalLine(): Option.Option<string> {
    const { source } = this;
    if (this.position >= source.length) {
      return Option.none();
    }

    const start = this.position;
    let escaped = false;
    let comment = false;
    let blank = true;

    while (this.position < source.length) {
      const c = source.charAt(this.position);
      this.position++;
      const next = this.peek();

      if (blank && isCommentMarker(c)) {
        comment = true;
        blank = false;
      }
      if (blank && !escaped && !isInlineWhitespace(c) && !isLineBreak(c)) {
        // a backslash right before a line break or the end keeps the line blank
        blank = c === "\\" && !Option.exists(next, (n) => !isLineBreak(n));
      }

      const terminates = !escaped || comment || blank;
      if (c === "\n" && terminates) {
        break;
      }
      if (c === "\r" && terminates) {
        if (Option.contains(next, "\n")) {
          this.position++;
        }
        break;
      }

      if (c === "\r" && escaped) {
        // an escaped \r\n continues as one unit
        escaped = Option.contains(next, "\n");
      } else {
        escaped = c === "\\" && !escaped;
      }
    }

    return Option.some(source.slice(start, this.position));
  }

  /** Drain the reader. */
  readAll(): readonly string[] {
    const lines: string[] = [];
    for (let line = this.readLogicalLine(); Option.isSome(line); line = this.readLogicalLine()) {
      lines.push(line.value);
    }
    return lines;
  }

  private peek(): Option.Option<string> {
    return this.position < this.source.length
      ? Option.some(this.source.charAt(this.position))
      : Option.none();
  }
}

export const readLogicalLines = (source: string): readonly string[] =>
  new LogicalLineReader(source).readAll();
