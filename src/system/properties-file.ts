// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Loading and saving properties documents. Every operation reads or writes
 * one whole document; there is no retry and no partial write handling.
 */

import type { Readable, Writable } from "node:stream";
import { Effect } from "effect";
import type { WhenExisting } from "../config/field-values.js";
import {
  DEFAULT_REFORMAT_OPTIONS,
  DEFAULT_WRITE_OPTIONS,
  type ReformatOptions,
  type WriteOptions,
} from "../config/options.js";
import type { FormatError, SystemError } from "../lib/errors.js";
import { CHARSET_DEFAULT, type Charset, decode } from "../properties/charset.js";
import { type Diagnostic, collectDiagnostics, describeDiagnostic } from "../properties/diagnostics.js";
import { type PropertiesDocument, parseDocument } from "../properties/document.js";
import { applyUpdate } from "../properties/update.js";
import { type RenderOptions, serializeDocument } from "../properties/writer.js";
import { reformat, reorderByKey, reorderByTemplate } from "../reformat/reformatter.js";
import { fileExists, readBytes, readStream, writeBytes, writeStream } from "./fs.js";

const logDiagnostics = (diagnostics: readonly Diagnostic[]): Effect.Effect<void> =>
  Effect.forEach(diagnostics, (d) => Effect.logWarning(describeDiagnostic(d)), { discard: true });

const documentFromBytes = (bytes: Uint8Array, charset: Charset): Effect.Effect<PropertiesDocument> =>
  Effect.gen(function* () {
    const { document, diagnostics } = parseDocument(decode(bytes, charset));
    yield* logDiagnostics(diagnostics);
    yield* Effect.logDebug(`Parsed ${document.entriesSize} entries`);
    return document;
  });

const documentToBytes = (document: PropertiesDocument, options: RenderOptions): Effect.Effect<Uint8Array> =>
  Effect.gen(function* () {
    const { sink, diagnostics } = collectDiagnostics();
    const bytes = serializeDocument(document, options, sink);
    yield* logDiagnostics(diagnostics);
    return bytes;
  });

// ============================================================================
// Sources
// ============================================================================

export const loadDocument = (
  path: string,
  charset: Charset = CHARSET_DEFAULT
): Effect.Effect<PropertiesDocument, SystemError> =>
  Effect.gen(function* () {
    const bytes = yield* readBytes(path);
    return yield* documentFromBytes(bytes, charset);
  }).pipe(Effect.annotateLogs({ file: path }));

export const readDocumentFrom = (
  stream: Readable,
  charset: Charset = CHARSET_DEFAULT
): Effect.Effect<PropertiesDocument, SystemError> =>
  Effect.gen(function* () {
    const bytes = yield* readStream(stream);
    return yield* documentFromBytes(bytes, charset);
  });

// ============================================================================
// Sinks
// ============================================================================

/** Replace the file with the document, ignoring what was there. */
export const overwriteFile = (
  document: PropertiesDocument,
  path: string,
  options: WriteOptions = DEFAULT_WRITE_OPTIONS
): Effect.Effect<void, SystemError> =>
  Effect.gen(function* () {
    const bytes = yield* documentToBytes(document, options);
    yield* writeBytes(path, bytes);
    yield* Effect.logDebug(`Wrote ${document.entriesSize} entries`);
  }).pipe(Effect.annotateLogs({ file: path }));

/**
 * Patch the existing file with the document's properties, keeping the file's
 * own layout, comments and untouched values.
 */
export const updateFile = (
  document: PropertiesDocument,
  path: string,
  options: WriteOptions = DEFAULT_WRITE_OPTIONS
): Effect.Effect<void, SystemError> =>
  Effect.gen(function* () {
    const target = yield* loadDocument(path, options.charset);
    const { sink, diagnostics } = collectDiagnostics();
    applyUpdate(target, document, options.missingKeyAction, sink);
    yield* logDiagnostics(diagnostics);
    yield* overwriteFile(target, path, options);
  }).pipe(Effect.annotateLogs({ file: path }));

/** Create the file, or treat an existing one as `whenExisting` says. */
export const saveTo = (
  document: PropertiesDocument,
  path: string,
  options: WriteOptions = DEFAULT_WRITE_OPTIONS,
  whenExisting: WhenExisting = "update"
): Effect.Effect<void, SystemError> =>
  Effect.flatMap(fileExists(path), (exists) =>
    Effect.if(exists && whenExisting === "update", {
      onTrue: () => updateFile(document, path, options),
      onFalse: () => overwriteFile(document, path, options),
    })
  );

/** Serialize into a stream and end it. */
export const writeToSink = (
  document: PropertiesDocument,
  stream: Writable,
  options: RenderOptions = DEFAULT_WRITE_OPTIONS
): Effect.Effect<void, SystemError> =>
  Effect.flatMap(documentToBytes(document, options), (bytes) => writeStream(stream, bytes));

// ============================================================================
// File-level reformatting
// ============================================================================

const rewriteFile = <E>(
  path: string,
  options: ReformatOptions,
  transform: (document: PropertiesDocument) => Effect.Effect<void, E>
): Effect.Effect<void, E | SystemError> =>
  Effect.gen(function* () {
    const document = yield* loadDocument(path, options.charset);
    yield* transform(document);
    yield* overwriteFile(document, path, { ...DEFAULT_WRITE_OPTIONS, ...options });
  });

export const reformatFile = (
  path: string,
  options: ReformatOptions = DEFAULT_REFORMAT_OPTIONS
): Effect.Effect<void, FormatError | SystemError> =>
  rewriteFile(path, options, (document) => reformat(document, options));

export const reorderFileByKey = (
  path: string,
  options: ReformatOptions = DEFAULT_REFORMAT_OPTIONS
): Effect.Effect<void, SystemError> =>
  rewriteFile(path, options, (document) => Effect.sync(() => reorderByKey(document, options)));

/** The template is read with `templateCharset`, defaulting to the charset of the target. */
export const reorderFileByTemplate = (
  templatePath: string,
  path: string,
  options: ReformatOptions = DEFAULT_REFORMAT_OPTIONS,
  templateCharset: Charset = options.charset
): Effect.Effect<void, SystemError> =>
  Effect.gen(function* () {
    const template = yield* loadDocument(templatePath, templateCharset);
    yield* rewriteFile(path, options, (document) =>
      Effect.sync(() => reorderByTemplate(template, document, options))
    );
  });
