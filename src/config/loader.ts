// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Settings file loading and editing. A file is parsed and validated in one
 * pass; syntax errors and schema violations name the file. Without an
 * explicit path the search list is tried in order and defaults apply when
 * no file exists. An explicit path that does not exist is an error.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Either, Option, ParseResult, Schema, pipe } from "effect";
import * as TOML from "smol-toml";
import { ConfigError, ErrorCode, errorMessage } from "../lib/errors";
import { settingsSearchPaths, userSettingsPath } from "../lib/paths";
import { type AbsolutePath, toAbsolutePath } from "../lib/types";
import { fileExists, readTextFile, writeTextFile } from "../system/fs";
import type { EnvConfig } from "./env";
import { DEFAULT_SETTINGS, type Settings, SettingsSchema } from "./schema";

// ============================================================================
// Decoding
// ============================================================================

/** Decode with a schema, reporting every violation against `context`. */
export const decodeToEffect = <A, I>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, ConfigError> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, ConfigError> =>
      Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Configuration validation failed for ${context}:\n${ParseResult.TreeFormatter.formatErrorSync(error)}`,
          path: context,
        })
      ),
    onRight: (value): Effect.Effect<A, ConfigError> => Effect.succeed(value),
  });

type TomlDocument = Record<string, unknown>;

const readTomlDocument = (
  filePath: AbsolutePath
): Effect.Effect<TomlDocument, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const content = yield* readTextFile(filePath).pipe(
      Effect.mapError(
        (reason) =>
          new ConfigError({
            code: ErrorCode.CONFIG_PARSE_ERROR,
            message: `Failed to read ${filePath}: ${reason}`,
            path: filePath,
          })
      )
    );
    return yield* Effect.try({
      try: (): TomlDocument => TOML.parse(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          cause: e,
        }),
    });
  });

export const loadSettingsFile = (
  filePath: AbsolutePath
): Effect.Effect<Settings, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* fileExists(filePath))) {
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_NOT_FOUND,
          message: `Settings file not found: ${filePath}`,
          path: filePath,
        })
      );
    }
    const document = yield* readTomlDocument(filePath);
    return yield* decodeToEffect(SettingsSchema, document, filePath);
  });

// ============================================================================
// Loading
// ============================================================================

export interface LoadedSettings {
  readonly settings: Settings;
  /** The file the settings came from; `None` when defaults were used. */
  readonly source: Option.Option<AbsolutePath>;
}

const firstExisting = (
  candidates: readonly AbsolutePath[]
): Effect.Effect<Option.Option<AbsolutePath>, never, FileSystem.FileSystem> =>
  Effect.map(
    Effect.filter(candidates, (p) => fileExists(p)),
    (found) => Option.fromNullable(found[0])
  );

export const loadSettings = (
  explicitPath: Option.Option<string>,
  env: EnvConfig
): Effect.Effect<LoadedSettings, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const source = yield* Option.match(explicitPath, {
      onSome: (p): Effect.Effect<Option.Option<AbsolutePath>> =>
        Effect.succeed(Option.some(toAbsolutePath(p))),
      onNone: (): Effect.Effect<Option.Option<AbsolutePath>, never, FileSystem.FileSystem> =>
        firstExisting(settingsSearchPaths(env.home, env.xdgConfigHome)),
    });
    return yield* Option.match(source, {
      onNone: (): Effect.Effect<LoadedSettings> =>
        Effect.succeed({ settings: DEFAULT_SETTINGS, source }),
      onSome: (p): Effect.Effect<LoadedSettings, ConfigError, FileSystem.FileSystem> =>
        Effect.map(loadSettingsFile(p), (settings) => ({ settings, source })),
    });
  });

/** The file `config set` writes: the explicit path, else the one in use, else the user file. */
export const settingsWritePath = (
  explicitPath: Option.Option<string>,
  env: EnvConfig
): Effect.Effect<AbsolutePath, never, FileSystem.FileSystem> =>
  Option.match(explicitPath, {
    onSome: (p): Effect.Effect<AbsolutePath> => Effect.succeed(toAbsolutePath(p)),
    onNone: (): Effect.Effect<AbsolutePath, never, FileSystem.FileSystem> =>
      Effect.map(firstExisting(settingsSearchPaths(env.home, env.xdgConfigHome)), (found) =>
        Option.getOrElse(found, () => userSettingsPath(env.home, env.xdgConfigHome))
      ),
  });

// ============================================================================
// Keys
// ============================================================================

type ValueKind = "string" | "integer";

const SETTING_KINDS = {
  versionPrefix: "string",
  versionDigits: "integer",
  startVersion: "integer",
  archiveDestination: "string",
  versionsToKeep: "integer",
  "logging.level": "string",
  "logging.format": "string",
} as const satisfies Record<string, ValueKind>;

export type SettingKey = keyof typeof SETTING_KINDS;

export const SETTING_KEYS: readonly SettingKey[] = [
  "versionPrefix",
  "versionDigits",
  "startVersion",
  "archiveDestination",
  "versionsToKeep",
  "logging.level",
  "logging.format",
];

export const isSettingKey = (key: string): key is SettingKey =>
  SETTING_KEYS.some((k) => k === key);

const unknownKey = (key: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.CONFIG_VALIDATION_ERROR,
    message: `Unknown setting: ${key}. Known settings: ${SETTING_KEYS.join(", ")}`,
  });

export const parseSettingKey = (key: string): Effect.Effect<SettingKey, ConfigError> =>
  isSettingKey(key) ? Effect.succeed(key) : Effect.fail(unknownKey(key));

export const getSetting = (settings: Settings, key: SettingKey): string | number => {
  switch (key) {
    case "logging.level":
      return settings.logging.level;
    case "logging.format":
      return settings.logging.format;
    default:
      return settings[key];
  }
};

const isTable = (u: unknown): u is Record<string, unknown> =>
  typeof u === "object" && u !== null && !Array.isArray(u);

const coerceValue = (
  key: SettingKey,
  raw: string
): Effect.Effect<string | number, ConfigError> =>
  SETTING_KINDS[key] === "string"
    ? Effect.succeed(raw)
    : /^-?[0-9]+$/.test(raw.trim())
      ? Effect.succeed(Number.parseInt(raw.trim(), 10))
      : Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Invalid value for ${key}: "${raw}" is not an integer`,
          })
        );

/** Copy of `document` with `key` set, nested keys going into their table. */
const withValue = (document: TomlDocument, key: SettingKey, value: string | number): TomlDocument => {
  const [table, field] = key.split(".");
  if (table === undefined || field === undefined) {
    return { ...document, [key]: value };
  }
  const existing = document[table];
  return { ...document, [table]: { ...(isTable(existing) ? existing : {}), [field]: value } };
};

/**
 * Set one value and rewrite the file. The whole resulting document must
 * still validate, so a bad value never reaches disk.
 */
export const setSetting = (
  filePath: AbsolutePath,
  key: string,
  raw: string
): Effect.Effect<Settings, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const settingKey = yield* parseSettingKey(key);
    const value = yield* coerceValue(settingKey, raw);
    const existing: TomlDocument = (yield* fileExists(filePath))
      ? yield* readTomlDocument(filePath)
      : {};
    const updated = withValue(existing, settingKey, value);
    const settings = yield* decodeToEffect(SettingsSchema, updated, filePath);

    yield* pipe(
      writeTextFile(filePath, TOML.stringify(updated)),
      Effect.mapError(
        (reason) =>
          new ConfigError({
            code: ErrorCode.CONFIG_WRITE_FAILED,
            message: `Failed to write ${filePath}: ${reason}`,
            path: filePath,
          })
      )
    );
    yield* Effect.logDebug(`Set ${settingKey} in ${filePath}`);
    return settings;
  });
