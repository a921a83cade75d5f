// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * propkeep - format-preserving .properties documents.
 *
 * Parse a document, read and change its key/value pairs, and write it back
 * with every untouched byte where it was.
 */

// Documents
export { PropertiesDocument, parseDocument, type EntryHandle, type ParsedDocument } from "./properties/document.js";
export {
  BasicEntry,
  PropertyEntry,
  type Entry,
  defaultPropertyEntry,
  entryText,
  isBasicEntry,
  isPropertyEntry,
  withValue,
} from "./properties/entry.js";
export { LogicalLineReader, readLogicalLines } from "./properties/logical-line-reader.js";
export { isBlankLine, isCommentLine, parseEntries, parseEntry } from "./properties/entry-parser.js";
export {
  commentOut,
  escapeKey,
  escapeUnicode,
  escapeUnicodeChar,
  escapeValue,
  unescape,
  unescapeUnicode,
} from "./properties/escape-codec.js";
export {
  type Diagnostic,
  type DiagnosticSink,
  InvalidUnicodeEscape,
  collectDiagnostics,
  describeDiagnostic,
  ignoreDiagnostics,
} from "./properties/diagnostics.js";
export {
  CHARSET_DEFAULT,
  CHARSET_VALUES,
  type Charset,
  decode,
  encode,
  isUnicodeCapable,
  parseCharset,
} from "./properties/charset.js";
export { type RenderOptions, renderDocument, renderEntry, serializeDocument } from "./properties/writer.js";
export { applyUpdate } from "./properties/update.js";

// Reformatting
export { type PropertyFormat, parseFormat } from "./reformat/format.js";
export { type EntryGroup, groupEntries, makeGroup, sortGroups } from "./reformat/entry-groups.js";
export { reformat, reorderByKey, reorderByTemplate } from "./reformat/reformatter.js";

// Files and streams
export {
  loadDocument,
  overwriteFile,
  readDocumentFrom,
  reformatFile,
  reorderFileByKey,
  reorderFileByTemplate,
  saveTo,
  updateFile,
  writeToSink,
} from "./system/properties-file.js";

// Configuration
export type {
  AttachCommentsTo,
  LogFormat,
  LogLevel,
  MissingKeyAction,
  UnicodeHandling,
  WhenExisting,
} from "./config/field-values.js";
export {
  DEFAULT_REFORMAT_OPTIONS,
  DEFAULT_WRITE_OPTIONS,
  type ReformatOptions,
  type WriteOptions,
  reformatOptions,
  writeOptions,
} from "./config/options.js";
export { loadReformatOptions, loadWriteOptions } from "./config/env.js";
export { PropkeepLoggerFromEnv, PropkeepLoggerLive } from "./lib/effect-logger.js";

// Errors
export {
  ConfigError,
  ErrorCode,
  FormatError,
  GeneralError,
  type PropkeepError,
  SystemError,
} from "./lib/errors.js";
