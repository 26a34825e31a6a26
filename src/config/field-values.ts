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

export const VERSION_PREFIX_DEFAULT = "_v";
export const VERSION_DIGITS_DEFAULT = 3;
export const START_VERSION_DEFAULT = 1;
export const VERSIONS_TO_KEEP_DEFAULT = 3;
/** Empty means no archive destination has been configured. */
export const ARCHIVE_DESTINATION_DEFAULT = "";

export const SNAPSHOT_CONFLICT_VALUES = ["alongside", "overwrite", "cancel"] as const;
export type SnapshotConflictPolicy = (typeof SNAPSHOT_CONFLICT_VALUES)[number];

export const ARCHIVE_CONFLICT_VALUES = ["skip", "replace", "abort"] as const;
export type ArchiveConflictPolicy = (typeof ARCHIVE_CONFLICT_VALUES)[number];
