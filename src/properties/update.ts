// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Patches an existing document with the properties of another one, touching
 * only entries whose logical value actually changes.
 */

import { Match, pipe } from "effect";
import type { MissingKeyAction } from "../config/field-values.js";
import { type DiagnosticSink, ignoreDiagnostics } from "./diagnostics.js";
import type { PropertiesDocument } from "./document.js";
import { BasicEntry, entryText, withValue } from "./entry.js";
import { commentOut, unescape } from "./escape-codec.js";

/**
 * Merge `source` into `target` in place.
 *
 * A key both share keeps the target's layout; its value is replaced by the
 * source's escaped value only when the unescaped values differ. Keys only
 * the source has are appended. Keys only the target has are handled by
 * `missingKeyAction`.
 */
export const applyUpdate = (
  target: PropertiesDocument,
  source: PropertiesDocument,
  missingKeyAction: MissingKeyAction,
  onDiagnostic: DiagnosticSink = ignoreDiagnostics
): void => {
  for (const entry of source.propertyEntries) {
    const key = unescape(entry.key, onDiagnostic);
    const newValue = unescape(entry.value, onDiagnostic);
    const known = target.modify(key, (existing) =>
      unescape(existing.value, onDiagnostic) === newValue ? existing : withValue(existing, entry.value)
    );
    if (!known) {
      target.append(entry);
    }
  }

  const missingKeys = target.keys().filter((key) => !source.containsKey(key));

  pipe(
    Match.value(missingKeyAction),
    Match.when("nothing", () => undefined),
    Match.when("delete", () => {
      for (const key of missingKeys) {
        target.remove(key);
      }
    }),
    Match.when("comment", () => {
      for (const key of missingKeys) {
        target.modify(key, (existing) => BasicEntry({ raw: commentOut(entryText(existing)) }));
      }
    }),
    Match.exhaustive
  );
};
