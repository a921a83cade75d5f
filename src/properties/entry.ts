// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * One parsed unit of a properties document. Every field holds escaped text
 * exactly as it appears in the file, so concatenating the fields gives back
 * the original characters.
 */

import { Data } from "effect";

export type Entry = Data.TaggedEnum<{
  /** Comment or blank line, kept verbatim including its line ending. */
  BasicEntry: { readonly raw: string };
  PropertyEntry: {
    readonly leadingWhitespace: string;
    readonly key: string;
    readonly separator: string;
    readonly value: string;
    readonly lineEnding: string;
  };
}>;

export type BasicEntry = Data.TaggedEnum.Value<Entry, "BasicEntry">;
export type PropertyEntry = Data.TaggedEnum.Value<Entry, "PropertyEntry">;

const EntryEnum = Data.taggedEnum<Entry>();

export const BasicEntry = EntryEnum.BasicEntry;
export const PropertyEntry = EntryEnum.PropertyEntry;

export const isBasicEntry = EntryEnum.$is("BasicEntry");
export const isPropertyEntry = EntryEnum.$is("PropertyEntry");

export const DEFAULT_SEPARATOR = " = ";
export const DEFAULT_LINE_ENDING = "\n";

/** A property with the layout `set` uses for new keys. Key and value must already be escaped. */
export const defaultPropertyEntry = (key: string, value: string): PropertyEntry =>
  PropertyEntry({
    leadingWhitespace: "",
    key,
    separator: DEFAULT_SEPARATOR,
    value,
    lineEnding: DEFAULT_LINE_ENDING,
  });

/** The exact characters this entry occupies in a file. */
export const entryText: (entry: Entry) => string = EntryEnum.$match({
  BasicEntry: ({ raw }) => raw,
  PropertyEntry: ({ leadingWhitespace, key, separator, value, lineEnding }) =>
    `${leadingWhitespace}${key}${separator}${value}${lineEnding}`,
});

/** Same layout, new escaped value. */
export const withValue = (entry: PropertyEntry, value: string): PropertyEntry =>
  PropertyEntry({
    leadingWhitespace: entry.leadingWhitespace,
    key: entry.key,
    separator: entry.separator,
    value,
    lineEnding: entry.lineEnding,
  });
