// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Byte-level file and stream access as Effects. Handles are scoped: they are
 * closed on every exit path, and a failing close is logged without replacing
 * the outcome of the operation that used the handle.
 */

import { type FileHandle, mkdir, open, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { type Readable, type Writable, finished } from "node:stream";
import { buffer } from "node:stream/consumers";
import { Effect, Match, Option, pipe } from "effect";
import {
  ErrorCode,
  SystemError,
  type SystemErrorCode,
  causeProps,
  errorMessage,
  isNotFoundError,
} from "../lib/errors.js";

type OpenMode = "read" | "write";

const OPEN_FLAGS: Readonly<Record<OpenMode, string>> = { read: "r", write: "w" };

const openFailedCode = (mode: OpenMode, e: unknown): SystemErrorCode =>
  pipe(
    Match.value(mode),
    Match.when("write", (): SystemErrorCode => ErrorCode.FILE_WRITE_FAILED),
    Match.when("read", () =>
      pipe(
        Match.value(isNotFoundError(e)),
        Match.when(true, (): SystemErrorCode => ErrorCode.FILE_NOT_FOUND),
        Match.when(false, (): SystemErrorCode => ErrorCode.FILE_READ_FAILED),
        Match.exhaustive
      )
    ),
    Match.exhaustive
  );

const openFailed = (path: string, mode: OpenMode, e: unknown): SystemError =>
  new SystemError({
    code: openFailedCode(mode, e),
    message: `Failed to open ${path} for ${mode}ing: ${errorMessage(e)}`,
    path,
    ...causeProps(e),
  });

const closeHandle = (path: string, handle: FileHandle): Effect.Effect<void> =>
  Effect.tryPromise({ try: () => handle.close(), catch: errorMessage }).pipe(
    Effect.catchAll((message) => Effect.logWarning(`Failed to close ${path}: ${message}`)),
    Effect.annotateLogs({ file: path })
  );

/** Run `use` with an open handle that is closed afterwards, whatever happens. */
export const withFileHandle = <A, E>(
  path: string,
  mode: OpenMode,
  use: (handle: FileHandle) => Effect.Effect<A, E>
): Effect.Effect<A, E | SystemError> =>
  Effect.acquireUseRelease(
    Effect.tryPromise({
      try: () => open(path, OPEN_FLAGS[mode]),
      catch: (e) => openFailed(path, mode, e),
    }),
    use,
    (handle) => closeHandle(path, handle)
  );

/** False only when nothing exists at `path`; any other stat failure is an error. */
export const fileExists = (path: string): Effect.Effect<boolean, SystemError> =>
  Effect.tryPromise({ try: () => stat(path), catch: (e) => e }).pipe(
    Effect.as(true),
    Effect.catchAll((e) =>
      Effect.if(isNotFoundError(e), {
        onTrue: () => Effect.succeed(false),
        onFalse: () =>
          Effect.fail(
            new SystemError({
              code: ErrorCode.FILE_READ_FAILED,
              message: `Failed to check ${path}: ${errorMessage(e)}`,
              path,
              ...causeProps(e),
            })
          ),
      })
    )
  );

export const ensureParentDirectory = (path: string): Effect.Effect<void, SystemError> =>
  Effect.tryPromise({
    try: () => mkdir(dirname(path), { recursive: true }),
    catch: (e) =>
      new SystemError({
        code: ErrorCode.DIRECTORY_CREATE_FAILED,
        message: `Failed to create directory for ${path}: ${errorMessage(e)}`,
        path,
        ...causeProps(e),
      }),
  }).pipe(Effect.asVoid);

export const readBytes = (path: string): Effect.Effect<Uint8Array, SystemError> =>
  withFileHandle(path, "read", (handle) =>
    Effect.tryPromise({
      try: () => handle.readFile(),
      catch: (e) =>
        new SystemError({
          code: ErrorCode.FILE_READ_FAILED,
          message: `Failed to read ${path}: ${errorMessage(e)}`,
          path,
          ...causeProps(e),
        }),
    })
  );

/** Replace the file's content, creating missing parent directories first. */
export const writeBytes = (path: string, bytes: Uint8Array): Effect.Effect<void, SystemError> =>
  Effect.gen(function* () {
    yield* ensureParentDirectory(path);
    yield* withFileHandle(path, "write", (handle) =>
      Effect.tryPromise({
        try: () => handle.writeFile(bytes),
        catch: (e) =>
          new SystemError({
            code: ErrorCode.FILE_WRITE_FAILED,
            message: `Failed to write ${path}: ${errorMessage(e)}`,
            path,
            ...causeProps(e),
          }),
      })
    );
  });

/** Read a stream to its end. */
export const readStream = (stream: Readable): Effect.Effect<Uint8Array, SystemError> =>
  Effect.tryPromise({
    try: () => buffer(stream),
    catch: (e) =>
      new SystemError({
        code: ErrorCode.STREAM_READ_FAILED,
        message: `Failed to read stream: ${errorMessage(e)}`,
        ...causeProps(e),
      }),
  });

const streamWriteFailed = (error: Error): SystemError =>
  new SystemError({
    code: ErrorCode.STREAM_WRITE_FAILED,
    message: `Failed to write stream: ${error.message}`,
    cause: error,
  });

/**
 * Write `bytes` and resume with the first failure reported by either the
 * write callback or an `'error'` event. After a failure the listener stays
 * attached: the stream emits `'error'` after it calls the write callback.
 */
const writeChunk = (stream: Writable, bytes: Uint8Array): Effect.Effect<void, SystemError> =>
  Effect.async<void, SystemError>((resume) => {
    let settled = false;
    const settle = (error: Option.Option<Error>): void => {
      if (settled) {
        return;
      }
      settled = true;
      resume(
        Option.match(error, {
          onNone: () => Effect.void,
          onSome: (e) => Effect.fail(streamWriteFailed(e)),
        })
      );
    };
    const onError = (error: Error): void => settle(Option.some(error));
    stream.once("error", onError);
    stream.write(bytes, (error) => {
      const failure = Option.fromNullable(error);
      if (Option.isNone(failure)) {
        stream.off("error", onError);
      }
      settle(failure);
    });
  });

/** End the stream and wait until it has finished. A failure here is only logged. */
const endStream = (stream: Writable): Effect.Effect<void> =>
  Effect.if(stream.destroyed || stream.writableEnded, {
    onTrue: () => Effect.void,
    onFalse: () =>
      Effect.async<void, Error>((resume) => {
        const cleanup = finished(stream, { readable: false }, (error) => {
          cleanup();
          resume(
            pipe(
              Option.fromNullable(error),
              Option.match({ onNone: () => Effect.void, onSome: (e) => Effect.fail(e) })
            )
          );
        });
        stream.end();
      }).pipe(Effect.catchAll((e) => Effect.logWarning(`Failed to end stream: ${e.message}`))),
  });

/** Write all bytes and end the stream, also when the write fails. */
export const writeStream = (stream: Writable, bytes: Uint8Array): Effect.Effect<void, SystemError> =>
  Effect.acquireUseRelease(Effect.succeed(stream), (s) => writeChunk(s, bytes), endStream);
