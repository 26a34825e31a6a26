// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Precedence for values that can come from several places:
 * command-line flag, then environment, then settings file.
 */

import { Option, pipe } from "effect";
import type { EnvConfig } from "./env";
import type { LogFormat, LogLevel } from "./field-values";

export interface ConfigField<A> {
  readonly cli: Option.Option<A>;
  readonly env: Option.Option<A>;
  readonly toml: A;
}

export const resolve = <A>(field: ConfigField<A>): A =>
  pipe(
    field.cli,
    Option.orElse(() => field.env),
    Option.getOrElse(() => field.toml)
  );

export interface CliLogging {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
}

/** `--verbose` and `VERSO_DEBUG` both force debug. */
export const resolveLogLevel = (cli: CliLogging, env: EnvConfig, toml: LogLevel): LogLevel =>
  cli.verbose || env.debug ? "debug" : resolve({ cli: cli.logLevel, env: env.logLevel, toml });

/** `--json` implies JSON log lines so stdout stays machine-readable. */
export const resolveLogFormat = (cli: CliLogging, env: EnvConfig, toml: LogFormat): LogFormat =>
  resolve({
    cli: cli.json ? Option.some<LogFormat>("json") : cli.format,
    env: env.logFormat,
    toml,
  });
