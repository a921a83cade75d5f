// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Project logger replacing Effect's default: level-coloured pretty output
 * with the `file` annotation as a prefix, or one JSON object per line.
 */

import { Cause, Effect, HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import { loadLoggingConfig } from "../config/env.js";
import type { LogFormat, LogLevel as PropkeepLogLevel } from "../config/field-values.js";
import type { ConfigError } from "./errors.js";

type ColorName = "red" | "yellow" | "blue" | "cyan" | "gray" | "white";

const ANSI: Readonly<Record<ColorName, string>> = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  white: "\x1b[37m",
};

const RESET = "\x1b[0m";

/** Annotations rendered inline in pretty mode instead of being listed. */
const INLINE_KEYS: ReadonlySet<string> = new Set(["file"]);

export const toEffectLogLevel = (level: PropkeepLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

/** Extracts typed string annotation, returning None if absent or wrong type. */
const getStringAnnotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string")
  );

const colorize = (color: ColorName, text: string, useColor: boolean): string =>
  pipe(
    Match.value(useColor),
    Match.when(true, () => `${ANSI[color]}${text}${RESET}`),
    Match.when(false, () => text),
    Match.exhaustive
  );

const LEVEL_COLORS: Readonly<Record<string, ColorName>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
  FATAL: "red",
};

/** Cause chain on its own lines; empty when there is no cause. */
const formatCause = (cause: Cause.Cause<unknown>): string =>
  pipe(
    Match.value(Cause.isEmpty(cause)),
    Match.when(true, () => ""),
    Match.when(false, () => `\n${Cause.pretty(cause)}`),
    Match.exhaustive
  );

export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  cause: Cause.Cause<unknown>,
  useColor: boolean
): string => {
  const levelColor = pipe(
    Option.fromNullable(LEVEL_COLORS[logLevel.label]),
    Option.getOrElse((): ColorName => "white")
  );
  const levelStr = colorize(levelColor, logLevel.label.padEnd(5), useColor);
  const fileStr = pipe(
    getStringAnnotation(annotations, "file"),
    Option.match({
      onNone: (): string => "",
      onSome: (f): string => `${colorize("cyan", `[${f}]`, useColor)} `,
    })
  );
  return `${levelStr} ${fileStr}${message}${formatCause(cause)}`;
};

const collectExtraAnnotations = (
  annotations: HashMap.HashMap<string, unknown>
): Record<string, unknown> =>
  Object.fromEntries(
    Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INLINE_KEYS.has(k))
  );

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    ...pipe(
      getStringAnnotation(annotations, "file"),
      Option.match({
        onNone: (): Record<string, never> => ({}),
        onSome: (f): { readonly file: string } => ({ file: f }),
      })
    ),
    message,
    ...collectExtraAnnotations(annotations),
  });

const isStderrOutput = (logLevel: LogLevel.LogLevel): boolean =>
  LogLevel.greaterThanEqual(logLevel, LogLevel.Warning);

const messageText = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

/** Logger factory dispatching to pretty or JSON format. Warnings and errors go to stderr. */
const PropkeepLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, cause, annotations, date }) => {
    const msg = messageText(message);

    const output = pipe(
      Match.value(format),
      Match.when("json", () => formatJson(logLevel, msg, annotations, date)),
      Match.when("pretty", () => formatPretty(logLevel, msg, annotations, cause, useColor)),
      Match.exhaustive
    );

    const stream = pipe(
      Match.value(isStderrOutput(logLevel)),
      Match.when(true, () => process.stderr),
      Match.when(false, () => process.stdout),
      Match.exhaustive
    );
    stream.write(`${output}\n`);
  });

/** Colour only on a terminal, and never when NO_COLOR is set. */
const detectColor = (): boolean =>
  process.stdout.isTTY === true && process.env["NO_COLOR"] === undefined;

export const PropkeepLoggerLive = (options: {
  readonly level: PropkeepLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> => {
  const useColor = options.color ?? detectColor();
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, PropkeepLogger(options.format, useColor)),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
};

/** Logger configured from PROPKEEP_LOG_LEVEL and PROPKEEP_LOG_FORMAT. */
export const PropkeepLoggerFromEnv: Layer.Layer<never, ConfigError> = Layer.unwrapEffect(
  Effect.map(loadLoggingConfig(), (config) => PropkeepLoggerLive(config))
);
