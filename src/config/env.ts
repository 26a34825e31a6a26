// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment variables as Effect `Config` values. Nothing is read until a
 * config is yielded, which only the CLI does.
 *
 * Unset variables are `None` so the CLI can tell "not given" apart from a
 * value that happens to equal the default.
 */

import { homedir } from "node:os";
import { Config, ConfigProvider, type Option } from "effect";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES, type LogFormat, type LogLevel } from "./field-values";

export interface EnvConfig {
  readonly home: string;
  readonly xdgConfigHome: Option.Option<string>;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  /** Forces debug logging. */
  readonly debug: boolean;
  /** Project file used when a command is given none. */
  readonly project: Option.Option<string>;
}

export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault(homedir())
);

export const XdgConfigHomeConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nonEmptyString("XDG_CONFIG_HOME")
);

export const LogLevelConfig: Config.Config<Option.Option<LogLevel>> = Config.option(
  Config.nested(Config.literal(...LOG_LEVEL_VALUES)("LOG_LEVEL"), "VERSO")
);

export const LogFormatConfig: Config.Config<Option.Option<LogFormat>> = Config.option(
  Config.nested(Config.literal(...LOG_FORMAT_VALUES)("LOG_FORMAT"), "VERSO")
);

export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "VERSO"
);

export const ProjectConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.nested(Config.nonEmptyString("PROJECT"), "VERSO")
);

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  HomeConfig,
  XdgConfigHomeConfig,
  LogLevelConfig,
  LogFormatConfig,
  DebugModeConfig,
  ProjectConfig,
]).pipe(
  Config.map(([home, xdgConfigHome, logLevel, logFormat, debug, project]) => ({
    home,
    xdgConfigHome,
    logLevel,
    logFormat,
    debug,
    project,
  }))
);

// ============================================================================
// Test Utilities
// ============================================================================

export interface TestEnv {
  readonly home?: string;
  readonly xdgConfigHome?: string;
  readonly logLevel?: string;
  readonly logFormat?: string;
  readonly debug?: string;
  readonly project?: string;
}

const envVarNames: ReadonlyArray<readonly [keyof TestEnv, string]> = [
  ["home", "HOME"],
  ["xdgConfigHome", "XDG_CONFIG_HOME"],
  ["logLevel", "VERSO_LOG_LEVEL"],
  ["logFormat", "VERSO_LOG_FORMAT"],
  ["debug", "VERSO_DEBUG"],
  ["project", "VERSO_PROJECT"],
];

/**
 * A provider holding only the given variables, plus a fixed HOME.
 * Nested keys join with `_`, as they do when read from the environment.
 *
 * @example
 * ```typescript
 * const env = await Effect.runPromise(
 *   Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider({ debug: "true" }))
 * );
 * ```
 */
export const createTestConfigProvider = (vars: TestEnv = {}): ConfigProvider.ConfigProvider => {
  const entries = new Map<string, string>([["HOME", "/home/testuser"]]);
  for (const [key, name] of envVarNames) {
    const value = vars[key];
    if (value !== undefined) {
      entries.set(name, value);
    }
  }
  return ConfigProvider.fromMap(entries, { pathDelim: "_" });
};
