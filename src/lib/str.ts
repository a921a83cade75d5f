// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * String operations at the code unit level. The properties format predates
 * surrogate-aware tooling, so everything here indexes UTF-16 code units,
 * never code points. Multi argument functions are curried data-last for
 * `pipe()` composition.
 */

import { Option } from "effect";
import type { CharPred } from "./char.js";

/** Code unit at `i`, or None past either end. */
export const charAt =
  (i: number) =>
  (s: string): Option.Option<string> =>
    i >= 0 && i < s.length ? Option.some(s.charAt(i)) : Option.none();

/** Index of the first code unit at or after `from` satisfying `pred`. */
export const findIndexFrom =
  (pred: CharPred, from: number) =>
  (s: string): Option.Option<number> => {
    for (let i = from; i < s.length; i++) {
      if (pred(s.charAt(i))) {
        return Option.some(i);
      }
    }
    return Option.none();
  };

/** Lift a `CharPred` to operate on an entire string (every code unit must satisfy). */
export const all =
  (pred: CharPred) =>
  (s: string): boolean => {
    for (let i = 0; i < s.length; i++) {
      if (!pred(s.charAt(i))) {
        return false;
      }
    }
    return true;
  };

/** Remove the longest suffix whose code units all satisfy `pred`, returning `[rest, suffix]`. */
export const splitTrailing =
  (pred: CharPred) =>
  (s: string): readonly [string, string] => {
    let end = s.length;
    while (end > 0 && pred(s.charAt(end - 1))) {
      end--;
    }
    return [s.slice(0, end), s.slice(end)] as const;
  };

export const mapCharsToString =
  (f: (c: string) => string) =>
  (s: string): string => {
    let out = "";
    for (let i = 0; i < s.length; i++) {
      out += f(s.charAt(i));
    }
    return out;
  };

/** Replace characters via a lookup map, passing through unmapped characters. */
export const escapeWith = (mapping: ReadonlyMap<string, string>): ((s: string) => string) =>
  mapCharsToString((c) => mapping.get(c) ?? c);
