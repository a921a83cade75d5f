// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Option records for writing and reformatting. Callers pass partial records;
 * `writeOptions` / `reformatOptions` fill in the defaults.
 */

import { CHARSET_DEFAULT, type Charset } from "../properties/charset.js";
import {
  ATTACH_COMMENTS_TO_DEFAULT,
  type AttachCommentsTo,
  FORMAT_DEFAULT,
  MISSING_KEY_ACTION_DEFAULT,
  type MissingKeyAction,
  UNICODE_HANDLING_DEFAULT,
  type UnicodeHandling,
} from "./field-values.js";

export interface WriteOptions {
  readonly charset: Charset;
  readonly unicodeHandling: UnicodeHandling;
  /** Only consulted when updating an existing file in place. */
  readonly missingKeyAction: MissingKeyAction;
}

export interface ReformatOptions {
  readonly charset: Charset;
  readonly unicodeHandling: UnicodeHandling;
  /** Layout such as `<key> = <value>\n`, with `\t`, `\f`, `\r`, `\n` written as escapes. */
  readonly format: string;
  /** Also rewrite keys and values onto one physical line with canonical escaping. */
  readonly reformatKeyAndValue: boolean;
  readonly attachCommentsTo: AttachCommentsTo;
}

export const DEFAULT_WRITE_OPTIONS: WriteOptions = {
  charset: CHARSET_DEFAULT,
  unicodeHandling: UNICODE_HANDLING_DEFAULT,
  missingKeyAction: MISSING_KEY_ACTION_DEFAULT,
};

export const DEFAULT_REFORMAT_OPTIONS: ReformatOptions = {
  charset: CHARSET_DEFAULT,
  unicodeHandling: UNICODE_HANDLING_DEFAULT,
  format: FORMAT_DEFAULT,
  reformatKeyAndValue: false,
  attachCommentsTo: ATTACH_COMMENTS_TO_DEFAULT,
};

export const writeOptions = (overrides: Partial<WriteOptions> = {}): WriteOptions => ({
  ...DEFAULT_WRITE_OPTIONS,
  ...overrides,
});

export const reformatOptions = (overrides: Partial<ReformatOptions> = {}): ReformatOptions => ({
  ...DEFAULT_REFORMAT_OPTIONS,
  ...overrides,
});
