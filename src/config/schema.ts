// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schema for verso.toml. Single source of truth for settings
 * structure, defaults and validation.
 */

import { Schema } from "effect";
import {
  ARCHIVE_DESTINATION_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
  START_VERSION_DEFAULT,
  VERSIONS_TO_KEEP_DEFAULT,
  VERSION_DIGITS_DEFAULT,
  VERSION_PREFIX_DEFAULT,
} from "./field-values";

const prefixMsg = (): string => "versionPrefix must not be empty";
const digitsMsg = (): string => "versionDigits must be an integer from 1 to 12";
const startMsg = (): string => "startVersion must be a non-negative integer";
const keepMsg = (): string => "versionsToKeep must be an integer";

export const VersionPrefixSchema: Schema.Schema<string> = Schema.String.pipe(
  Schema.minLength(1, { message: prefixMsg })
);

export const VersionDigitsSchema: Schema.Schema<number> = Schema.Number.pipe(
  Schema.int({ message: digitsMsg }),
  Schema.between(1, 12, { message: digitsMsg })
);

export const StartVersionSchema: Schema.Schema<number> = Schema.Number.pipe(
  Schema.int({ message: startMsg }),
  Schema.nonNegative({ message: startMsg })
);

/** Zero and negative values are accepted; the current version stays protected either way. */
export const VersionsToKeepSchema: Schema.Schema<number> = Schema.Number.pipe(
  Schema.int({ message: keepMsg })
);

export const LoggingSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: () => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: () => LOG_FORMAT_DEFAULT,
  }),
});

export const SettingsSchema = Schema.Struct({
  versionPrefix: Schema.optionalWith(VersionPrefixSchema, {
    default: () => VERSION_PREFIX_DEFAULT,
  }),
  versionDigits: Schema.optionalWith(VersionDigitsSchema, {
    default: () => VERSION_DIGITS_DEFAULT,
  }),
  startVersion: Schema.optionalWith(StartVersionSchema, { default: () => START_VERSION_DEFAULT }),
  archiveDestination: Schema.optionalWith(Schema.String, {
    default: () => ARCHIVE_DESTINATION_DEFAULT,
  }),
  versionsToKeep: Schema.optionalWith(VersionsToKeepSchema, {
    default: () => VERSIONS_TO_KEEP_DEFAULT,
  }),
  logging: Schema.optionalWith(LoggingSchema, {
    default: () => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
});

export type Settings = Schema.Schema.Type<typeof SettingsSchema>;

/** Every settings value with its default. */
export const DEFAULT_SETTINGS: Settings = Schema.decodeUnknownSync(SettingsSchema)({});
