// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read until a Config is
 * yielded inside an Effect. Every variable lives under the PROPKEEP_
 * namespace.
 */

import { Config, ConfigProvider, ConfigError as EffectConfigError, Effect, Either, Option, pipe } from "effect";
import { ConfigError, ErrorCode } from "../lib/errors.js";
import { CHARSET_DEFAULT, type Charset, parseCharset } from "../properties/charset.js";
import {
  ATTACH_COMMENTS_TO_DEFAULT,
  ATTACH_COMMENTS_TO_VALUES,
  type AttachCommentsTo,
  FORMAT_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  MISSING_KEY_ACTION_DEFAULT,
  MISSING_KEY_ACTION_VALUES,
  type MissingKeyAction,
  UNICODE_HANDLING_DEFAULT,
  UNICODE_HANDLING_VALUES,
  type UnicodeHandling,
} from "./field-values.js";
import type { ReformatOptions, WriteOptions } from "./options.js";

const NAMESPACE = "PROPKEEP";

const namespaced = <A>(config: Config.Config<A>): Config.Config<A> => Config.nested(config, NAMESPACE);

// ============================================================================
// Primitive Configs
// ============================================================================

export const LogLevelConfig: Config.Config<LogLevel> = namespaced(
  Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL").pipe(Config.withDefault(LOG_LEVEL_DEFAULT))
);

export const LogFormatConfig: Config.Config<LogFormat> = namespaced(
  Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT").pipe(Config.withDefault(LOG_FORMAT_DEFAULT))
);

/** Charset name, resolved through the alias table. */
export const CharsetConfig: Config.Config<Charset> = namespaced(
  Config.string("CHARSET").pipe(
    Config.mapOrFail(
      (name): Either.Either<Charset, EffectConfigError.ConfigError> =>
        pipe(
          parseCharset(name),
          Option.match({
            onNone: () => Either.left(EffectConfigError.InvalidData([], `Unsupported charset: ${name}`)),
            onSome: (charset) => Either.right(charset),
          })
        )
    ),
    Config.withDefault(CHARSET_DEFAULT)
  )
);

export const UnicodeHandlingConfig: Config.Config<UnicodeHandling> = namespaced(
  Config.literal(...UNICODE_HANDLING_VALUES)("UNICODE_HANDLING").pipe(
    Config.withDefault(UNICODE_HANDLING_DEFAULT)
  )
);

export const MissingKeyActionConfig: Config.Config<MissingKeyAction> = namespaced(
  Config.literal(...MISSING_KEY_ACTION_VALUES)("MISSING_KEY_ACTION").pipe(
    Config.withDefault(MISSING_KEY_ACTION_DEFAULT)
  )
);

export const FormatConfig: Config.Config<string> = namespaced(
  Config.string("FORMAT").pipe(Config.withDefault(FORMAT_DEFAULT))
);

export const ReformatKeyAndValueConfig: Config.Config<boolean> = namespaced(
  Config.boolean("REFORMAT_KEY_AND_VALUE").pipe(Config.withDefault(false))
);

export const AttachCommentsToConfig: Config.Config<AttachCommentsTo> = namespaced(
  Config.literal(...ATTACH_COMMENTS_TO_VALUES)("ATTACH_COMMENTS_TO").pipe(
    Config.withDefault(ATTACH_COMMENTS_TO_DEFAULT)
  )
);

// ============================================================================
// Composite Configs
// ============================================================================

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export const LoggingSettingsConfig: Config.Config<LoggingConfig> = Config.all({
  level: LogLevelConfig,
  format: LogFormatConfig,
});

export const WriteOptionsConfig: Config.Config<WriteOptions> = Config.all({
  charset: CharsetConfig,
  unicodeHandling: UnicodeHandlingConfig,
  missingKeyAction: MissingKeyActionConfig,
});

export const ReformatOptionsConfig: Config.Config<ReformatOptions> = Config.all({
  charset: CharsetConfig,
  unicodeHandling: UnicodeHandlingConfig,
  format: FormatConfig,
  reformatKeyAndValue: ReformatKeyAndValueConfig,
  attachCommentsTo: AttachCommentsToConfig,
});

// ============================================================================
// Loaders
// ============================================================================

const toConfigError = (e: EffectConfigError.ConfigError): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_INVALID,
    message: `Invalid environment configuration: ${String(e)}`,
  });

const load = <A>(config: Config.Config<A>): Effect.Effect<A, ConfigError> =>
  Effect.gen(function* () {
    return yield* config;
  }).pipe(Effect.mapError(toConfigError));

export const loadWriteOptions = (): Effect.Effect<WriteOptions, ConfigError> => load(WriteOptionsConfig);

export const loadReformatOptions = (): Effect.Effect<ReformatOptions, ConfigError> =>
  load(ReformatOptionsConfig);

export const loadLoggingConfig = (): Effect.Effect<LoggingConfig, ConfigError> => load(LoggingSettingsConfig);

// ============================================================================
// Test Utilities
// ============================================================================

/**
 * Create a ConfigProvider from `NAME -> value` pairs without the PROPKEEP_
 * prefix, e.g. `{ CHARSET: "latin1" }`.
 *
 * @example
 * ```typescript
 * const options = await Effect.runPromise(
 *   loadWriteOptions().pipe(Effect.withConfigProvider(createTestConfigProvider({ CHARSET: "latin1" })))
 * );
 * ```
 */
export const createTestConfigProvider = (
  values: Readonly<Record<string, string>> = {}
): ConfigProvider.ConfigProvider =>
  ConfigProvider.fromMap(
    new Map(Object.entries(values).map(([name, value]) => [`${NAMESPACE}_${name}`, value])),
    { pathDelim: "_" }
  );
