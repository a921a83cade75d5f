// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/** How characters outside US-ASCII are written. */
export const UNICODE_HANDLING_VALUES = ["do-nothing", "escape", "unicode", "by-charset"] as const;
export type UnicodeHandling = (typeof UNICODE_HANDLING_VALUES)[number];
export const UNICODE_HANDLING_DEFAULT: UnicodeHandling = "do-nothing";

/** What an in-place update does with keys the written document no longer has. */
export const MISSING_KEY_ACTION_VALUES = ["nothing", "delete", "comment"] as const;
export type MissingKeyAction = (typeof MISSING_KEY_ACTION_VALUES)[number];
export const MISSING_KEY_ACTION_DEFAULT: MissingKeyAction = "nothing";

/** Which property a comment or blank line travels with when entries are reordered. */
export const ATTACH_COMMENTS_TO_VALUES = ["next", "prev", "original-position"] as const;
export type AttachCommentsTo = (typeof ATTACH_COMMENTS_TO_VALUES)[number];
export const ATTACH_COMMENTS_TO_DEFAULT: AttachCommentsTo = "next";

/** How `saveTo` treats a file that already exists. */
export const WHEN_EXISTING_VALUES = ["update", "overwrite"] as const;
export type WhenExisting = (typeof WHEN_EXISTING_VALUES)[number];

export const FORMAT_DEFAULT = "<key> = <value>\\n";
