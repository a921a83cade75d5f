// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Rewrites a document's entry sequence: `reformat` changes layout only,
 * `reorderByKey` and `reorderByTemplate` change order only. Each either
 * completes or leaves the document untouched.
 */

import { Array as Arr, Effect, Match, Option, pipe } from "effect";
import { DEFAULT_REFORMAT_OPTIONS, type ReformatOptions } from "../config/options.js";
import type { FormatError } from "../lib/errors.js";
import { splitTrailing } from "../lib/str.js";
import { isLineBreak } from "../lib/char.js";
import { type DiagnosticSink, ignoreDiagnostics } from "../properties/diagnostics.js";
import type { PropertiesDocument } from "../properties/document.js";
import { BasicEntry, type Entry, PropertyEntry, isPropertyEntry } from "../properties/entry.js";
import { escapeKey, escapeValue, unescape } from "../properties/escape-codec.js";
import { type EntryGroup, flattenGroups, groupEntries, groupLogicalKey, sortGroups } from "./entry-groups.js";
import { type PropertyFormat, parseFormat } from "./format.js";

/** Canonical escaping on a single physical line. */
export const reformatKey = (key: string, onDiagnostic: DiagnosticSink = ignoreDiagnostics): string =>
  escapeKey(unescape(key, onDiagnostic));

export const reformatValue = (value: string, onDiagnostic: DiagnosticSink = ignoreDiagnostics): string =>
  escapeValue(unescape(value, onDiagnostic));

/** Apply a parsed layout to every entry, keeping their order. */
export const applyFormat = (
  entries: readonly Entry[],
  format: PropertyFormat,
  reformatKeyAndValue: boolean,
  onDiagnostic: DiagnosticSink = ignoreDiagnostics
): readonly Entry[] =>
  entries.map(
    (entry): Entry =>
      pipe(
        Match.value(entry),
        Match.tag("PropertyEntry", (p) =>
          PropertyEntry({
            leadingWhitespace: format.leadingWhitespace,
            key: reformatKeyAndValue ? reformatKey(p.key, onDiagnostic) : p.key,
            separator: format.separator,
            value: reformatKeyAndValue ? reformatValue(p.value, onDiagnostic) : p.value,
            lineEnding: format.lineEnding,
          })
        ),
        Match.tag("BasicEntry", ({ raw }) =>
          BasicEntry({ raw: `${splitTrailing(isLineBreak)(raw)[0]}${format.lineEnding}` })
        ),
        Match.exhaustive
      )
  );

/**
 * Bring every entry into the layout of `options.format`. An invalid format
 * fails before the document is touched.
 */
export const reformat = (
  document: PropertiesDocument,
  options: Pick<ReformatOptions, "format" | "reformatKeyAndValue"> = DEFAULT_REFORMAT_OPTIONS,
  onDiagnostic: DiagnosticSink = ignoreDiagnostics
): Effect.Effect<void, FormatError> =>
  Effect.gen(function* () {
    const format = yield* parseFormat(options.format);
    document.setEntries(applyFormat(document.entries, format, options.reformatKeyAndValue, onDiagnostic));
  });

/** Sort by escaped key, moving comments as the attachment policy says. */
export const reorderByKey = (
  document: PropertiesDocument,
  options: Pick<ReformatOptions, "attachCommentsTo"> = DEFAULT_REFORMAT_OPTIONS
): void => {
  const groups = groupEntries(document.entries, options.attachCommentsTo);
  document.setEntries(flattenGroups(sortGroups(groups, options.attachCommentsTo)));
};

/** Remove and return the first group whose key is `key`. */
const popGroup = (groups: EntryGroup[], key: string): Option.Option<EntryGroup> =>
  pipe(
    Arr.findFirstIndex(groups, (group) => Option.contains(groupLogicalKey(group), key)),
    Option.map((i) => groups.splice(i, 1)),
    Option.flatMap(Arr.head)
  );

/**
 * Order the document like `template`. Groups whose key the template lacks
 * keep their relative order and go to the end. The template is not changed.
 */
export const reorderByTemplate = (
  template: PropertiesDocument,
  document: PropertiesDocument,
  options: Pick<ReformatOptions, "attachCommentsTo"> = DEFAULT_REFORMAT_OPTIONS
): void => {
  const remaining = [...groupEntries(document.entries, options.attachCommentsTo)];
  const matched = Arr.filterMap(template.entries.filter(isPropertyEntry), (entry) =>
    popGroup(remaining, unescape(entry.key))
  );
  document.setEntries(flattenGroups([...matched, ...remaining]));
};
