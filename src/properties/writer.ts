// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Serializes documents. Entries are already escaped; the only transform left
 * is how characters outside US-ASCII are represented, which depends on the
 * unicode handling policy and on whether the target charset can hold them.
 */

import { Match, pipe } from "effect";
import type { UnicodeHandling } from "../config/field-values.js";
import { type Charset, encode, isUnicodeCapable } from "./charset.js";
import { type DiagnosticSink, ignoreDiagnostics } from "./diagnostics.js";
import type { PropertiesDocument } from "./document.js";
import { type Entry, entryText } from "./entry.js";
import { escapeUnicode, unescapeUnicode } from "./escape-codec.js";

export interface RenderOptions {
  readonly charset: Charset;
  readonly unicodeHandling: UnicodeHandling;
}

type UnicodeTransform = "escape" | "unescape" | "keep";

/** A charset that cannot hold every character always gets escapes, whatever the policy. */
export const unicodeTransformFor = (handling: UnicodeHandling, charset: Charset): UnicodeTransform =>
  isUnicodeCapable(charset)
    ? pipe(
        Match.value(handling),
        Match.when("escape", (): UnicodeTransform => "escape"),
        Match.when("unicode", (): UnicodeTransform => "unescape"),
        Match.when("by-charset", (): UnicodeTransform => "unescape"),
        Match.when("do-nothing", (): UnicodeTransform => "keep"),
        Match.exhaustive
      )
    : "escape";

export const renderEntry = (
  entry: Entry,
  options: RenderOptions,
  onDiagnostic: DiagnosticSink = ignoreDiagnostics
): string => {
  const text = entryText(entry);
  return pipe(
    Match.value(unicodeTransformFor(options.unicodeHandling, options.charset)),
    Match.when("escape", () => escapeUnicode(text)),
    Match.when("unescape", () => unescapeUnicode(text, onDiagnostic)),
    Match.when("keep", () => text),
    Match.exhaustive
  );
};

export const renderDocument = (
  document: PropertiesDocument,
  options: RenderOptions,
  onDiagnostic: DiagnosticSink = ignoreDiagnostics
): string => document.entries.map((entry) => renderEntry(entry, options, onDiagnostic)).join("");

/** Rendered text encoded in the target charset. */
export const serializeDocument = (
  document: PropertiesDocument,
  options: RenderOptions,
  onDiagnostic: DiagnosticSink = ignoreDiagnostics
): Uint8Array => encode(renderDocument(document, options, onDiagnostic), options.charset);
