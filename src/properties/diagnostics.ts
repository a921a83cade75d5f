// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Non-fatal findings raised while decoding escaped text. Pure code reports
 * them through a `DiagnosticSink`; the file layer turns them into warnings.
 */

import { Data, Match, pipe } from "effect";

export type Diagnostic = Data.TaggedEnum<{
  /** `\u` not followed by four hex digits; the text is kept as written. */
  InvalidUnicodeEscape: {
    readonly sequence: string;
    readonly reason: "invalid-hex" | "truncated";
  };
}>;

export const { InvalidUnicodeEscape } = Data.taggedEnum<Diagnostic>();

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export const ignoreDiagnostics: DiagnosticSink = () => undefined;

/** A sink that remembers everything it receives, in order. */
export const collectDiagnostics = (): {
  readonly sink: DiagnosticSink;
  readonly diagnostics: readonly Diagnostic[];
} => {
  const diagnostics: Diagnostic[] = [];
  return { sink: (d) => void diagnostics.push(d), diagnostics };
};

export const describeDiagnostic = (diagnostic: Diagnostic): string =>
  pipe(
    Match.value(diagnostic),
    Match.tag("InvalidUnicodeEscape", ({ sequence, reason }) =>
      pipe(
        Match.value(reason),
        Match.when("invalid-hex", () => `Invalid unicode escape "${sequence}": expected four hex digits`),
        Match.when("truncated", () => `Truncated unicode escape "${sequence}" at end of text`),
        Match.exhaustive
      )
    ),
    Match.exhaustive
  );
