// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for propkeep.
 * Every error carries a numeric code from one category per error class.
 */

import { Data, Match, pipe } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (1-9)
  readonly GENERAL_ERROR: 1;
  readonly INVARIANT_VIOLATION: 2;

  // Config (10-19)
  readonly CONFIG_INVALID: 10;

  // Format (20-29)
  readonly INVALID_FORMAT: 20;

  // I/O (30-39)
  readonly FILE_NOT_FOUND: 30;
  readonly FILE_READ_FAILED: 31;
  readonly FILE_WRITE_FAILED: 32;
  readonly DIRECTORY_CREATE_FAILED: 33;
  readonly STREAM_READ_FAILED: 34;
  readonly STREAM_WRITE_FAILED: 35;
}

/**
 * Error codes for all propkeep operations, grouped by category.
 */
export const ErrorCode: ErrorCodeMap = {
  GENERAL_ERROR: 1,
  INVARIANT_VIOLATION: 2,

  CONFIG_INVALID: 10,

  INVALID_FORMAT: 20,

  FILE_NOT_FOUND: 30,
  FILE_READ_FAILED: 31,
  FILE_WRITE_FAILED: 32,
  DIRECTORY_CREATE_FAILED: 33,
  STREAM_READ_FAILED: 34,
  STREAM_WRITE_FAILED: 35,
};

export type GeneralErrorCode = ErrorCodeMap["GENERAL_ERROR" | "INVARIANT_VIOLATION"];
export type ConfigErrorCode = ErrorCodeMap["CONFIG_INVALID"];
export type FormatErrorCode = ErrorCodeMap["INVALID_FORMAT"];
export type SystemErrorCode = ErrorCodeMap[
  | "FILE_NOT_FOUND"
  | "FILE_READ_FAILED"
  | "FILE_WRITE_FAILED"
  | "DIRECTORY_CREATE_FAILED"
  | "STREAM_READ_FAILED"
  | "STREAM_WRITE_FAILED"];

/** Broken internal invariant. Raised through `assert`, never part of a typed error channel. */
export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: GeneralErrorCode;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Environment configuration that cannot be turned into options. */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly key?: string;
  readonly cause?: Error;
}> {}

/** A reformat layout string that does not fit the format grammar. */
export class FormatError extends Data.TaggedError("FormatError")<{
  readonly code: FormatErrorCode;
  readonly message: string;
  readonly format: string;
}> {}

/** Filesystem or stream failure, wrapping the underlying cause. */
export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: SystemErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export type PropkeepError = GeneralError | ConfigError | FormatError | SystemError;

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Node reports a missing path through `code === "ENOENT"` on the thrown error. */
export const isNotFoundError = (e: unknown): boolean =>
  e instanceof Error && "code" in e && e.code === "ENOENT";

/** `{ cause }` for an Error and nothing otherwise, ready to spread into an error's fields. */
export const causeProps = (e: unknown): { readonly cause?: Error } =>
  pipe(
    Match.value(e),
    Match.when(Match.instanceOf(Error), (err) => ({ cause: err })),
    Match.orElse(() => ({}))
  );
