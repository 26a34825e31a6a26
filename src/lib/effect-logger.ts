// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Replacement for Effect's default logger. Adds the `[n/total] →` step
 * prefix and the ✓ / ✗ markers that snapshot and archive runs print.
 */

import { HashMap, Layer, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as VersoLogLevel } from "../config/field-values";

type LogStyleTag = "step" | "success" | "fail";

const ANSI = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  bold: "\x1b[1m",
} as const;

type Paint = keyof typeof ANSI;

/** Formatting-only annotations, dropped from JSON output. */
const INTERNAL_KEYS: ReadonlySet<string> = new Set(["logStyle", "stepNumber", "stepTotal"]);

const LEVEL_PAINT: Readonly<Record<string, Paint>> = {
  DEBUG: "gray",
  INFO: "blue",
  WARN: "yellow",
  ERROR: "red",
};

export const toEffectLogLevel = (level: VersoLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const annotation = (annotations: HashMap.HashMap<string, unknown>, key: string): string | undefined =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v): v is string => typeof v === "string"),
    Option.getOrUndefined
  );

const styleOf = (annotations: HashMap.HashMap<string, unknown>): LogStyleTag | undefined => {
  const style = annotation(annotations, "logStyle");
  return style === "step" || style === "success" || style === "fail" ? style : undefined;
};

export const formatPretty = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  useColor: boolean
): string => {
  const paint = (color: Paint, text: string): string =>
    useColor ? `${ANSI[color]}${text}\x1b[0m` : text;

  switch (styleOf(annotations)) {
    case "step": {
      const step = annotation(annotations, "stepNumber") ?? "?";
      const total = annotation(annotations, "stepTotal") ?? "?";
      return `${paint("bold", `[${step}/${total}]`)} ${paint("cyan", "→")} ${message}`;
    }
    case "success":
      return `${paint("green", "✓")} ${message}`;
    case "fail":
      return `${paint("red", "✗")} ${message}`;
    case undefined: {
      const level = logLevel.label.padEnd(5);
      const levelStr = useColor ? paint(LEVEL_PAINT[logLevel.label] ?? "gray", level) : level;
      const operation = annotation(annotations, "operation");
      const operationStr = operation === undefined ? "" : `${paint("cyan", `[${operation}]`)} `;
      return `${levelStr} ${operationStr}${message}`;
    }
  }
};

export const formatJson = (
  logLevel: LogLevel.LogLevel,
  message: string,
  annotations: HashMap.HashMap<string, unknown>,
  date: Date
): string =>
  JSON.stringify({
    timestamp: date.toISOString(),
    level: logLevel.label.toLowerCase(),
    message,
    ...Object.fromEntries(
      Array.from(HashMap.toEntries(annotations)).filter(([k]) => !INTERNAL_KEYS.has(k))
    ),
  });

export interface VersoLoggerOptions {
  readonly level: VersoLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
  /** Every line goes to stderr, leaving stdout to the command result. */
  readonly toStderr?: boolean;
}

/** Errors and failure markers always go to stderr. */
const VersoLogger = (options: VersoLoggerOptions, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make(({ logLevel, message, annotations, date }) => {
    // Effect.log passes its arguments through as an array
    const msg = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    const output =
      options.format === "json"
        ? formatJson(logLevel, msg, annotations, date)
        : formatPretty(logLevel, msg, annotations, useColor);
    const toStderr =
      options.toStderr === true || logLevel.label === "ERROR" || styleOf(annotations) === "fail";
    (toStderr ? process.stderr : process.stdout).write(`${output}\n`);
  });

/** Honors NO_COLOR and only colors a terminal. */
export const detectColor = (): boolean =>
  process.env["NO_COLOR"] === undefined && process.stdout.isTTY === true;

export const VersoLoggerLive = (options: VersoLoggerOptions): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, VersoLogger(options, options.color ?? detectColor())),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
