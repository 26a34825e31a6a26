// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared CLI option definitions, so every command names and describes
 * them the same way.
 */

import { Args as A, Options as O } from "@effect/cli";
import type { Option } from "effect";
import {
  ARCHIVE_CONFLICT_VALUES,
  type ArchiveConflictPolicy,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_VALUES,
  type LogFormat,
  type LogLevel,
  SNAPSHOT_CONFLICT_VALUES,
  type SnapshotConflictPolicy,
} from "../config/field-values";

// Shared positional arguments

export const projectArg: A.Args<Option.Option<string>> = A.text({ name: "project" }).pipe(
  A.withDescription("Project file (defaults to $VERSO_PROJECT)"),
  A.optional
);

export const settingKeyArg: A.Args<string> = A.text({ name: "key" }).pipe(
  A.withDescription("Setting name, e.g. versionPrefix or logging.level")
);

export const optionalSettingKeyArg: A.Args<Option.Option<string>> = A.text({ name: "key" }).pipe(
  A.withDescription("Setting name; all settings when omitted"),
  A.optional
);

export const settingValueArg: A.Args<string> = A.text({ name: "value" }).pipe(
  A.withDescription("New value")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
  readonly settings: O.Options<Option.Option<string>>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Log line format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Print the command result as JSON")),
  settings: O.text("settings").pipe(
    O.withAlias("s"),
    O.withDescription("Path to verso.toml"),
    O.optional
  ),
};

// Per-command options

export const snapshotConflict: O.Options<Option.Option<SnapshotConflictPolicy>> = O.choice(
  "on-conflict",
  SNAPSHOT_CONFLICT_VALUES
).pipe(O.withDescription("What to do when the snapshot folder exists (asks when omitted)"), O.optional);

export const archiveConflict: O.Options<Option.Option<ArchiveConflictPolicy>> = O.choice(
  "on-conflict",
  ARCHIVE_CONFLICT_VALUES
).pipe(
  O.withDescription("What to do when a version already exists in the archive (asks when omitted)"),
  O.optional
);

export const destination: O.Options<Option.Option<string>> = O.text("destination").pipe(
  O.withAlias("d"),
  O.withDescription("Archive destination (overrides archiveDestination)"),
  O.optional
);

export const keep: O.Options<Option.Option<number>> = O.integer("keep").pipe(
  O.withAlias("k"),
  O.withDescription("Versions to keep before the current one (overrides versionsToKeep)"),
  O.optional
);

export const yes: O.Options<boolean> = O.boolean("yes").pipe(
  O.withAlias("y"),
  O.withDescription("Skip the archive confirmation")
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly settings: Option.Option<string>;
}
