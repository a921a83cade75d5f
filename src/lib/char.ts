// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates for the properties grammar. Every predicate takes one
 * UTF-16 code unit.
 */

/** Predicate over a single character. */
export type CharPred = (c: string) => boolean;

export const isDigit: CharPred = (c) => c >= "0" && c <= "9";

export const isHexDigit: CharPred = (c) =>
  c.length === 1 && (isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F"));

export const isOneOf =
  (chars: string): CharPred =>
  (c): boolean =>
    c.length === 1 && chars.includes(c);

/** Space, tab and form feed: the only whitespace the format knows inside a line. */
export const isInlineWhitespace: CharPred = isOneOf(" \t\f");

export const isLineBreak: CharPred = isOneOf("\n\r");

/** Inline whitespace or a line break. */
export const isAnyWhitespace: CharPred = (c) => isInlineWhitespace(c) || isLineBreak(c);

export const isKeyTerminator: CharPred = isOneOf("=:");

export const isCommentMarker: CharPred = isOneOf("#!");
