// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger setup and error display to avoid duplication across commands.
 */

import { type CliApp, Command } from "@effect/cli";
import type { FileSystem, Terminal } from "@effect/platform";
import { Effect, Layer, Match, Option, pipe } from "effect";
import { type EnvConfig, EnvConfigSpec } from "../config/env";
import type { LogFormat, LogLevel } from "../config/field-values";
import { loadSettings } from "../config/loader";
import { resolveLogFormat, resolveLogLevel } from "../config/resolve";
import type { Settings } from "../config/schema";
import { PromptDecisionsLive, type PromptOverrides } from "../host/decisions";
import { FileProjectHostLive, type ProjectHost } from "../host/project-host";
import { VersoLoggerLive } from "../lib/effect-logger";
import { ConfigError, ErrorCode, getErrorCodeName, isVersoError } from "../lib/errors";
import { VERSO_VERSION } from "../lib/version";

import { executeArchive } from "./commands/archive";
import { executeConfigGet, executeConfigPath, executeConfigSet } from "./commands/config";
import { executeInfo } from "./commands/info";
import { executePlan } from "./commands/plan";
import { executeSnapshot } from "./commands/snapshot";

import {
  type GlobalOptions,
  archiveConflict,
  destination,
  globalOptions,
  keep,
  optionalSettingKeyArg,
  projectArg,
  settingKeyArg,
  settingValueArg,
  snapshotConflict,
  yes,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > settings file (priority order). */
interface CommandContext {
  readonly env: EnvConfig;
  readonly settings: Settings;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
  readonly json: boolean;
}

type CommandEnvironment = FileSystem.FileSystem | Terminal.Terminal;

// Context resolution

const readEnvironment: Effect.Effect<EnvConfig, ConfigError> = pipe(
  EnvConfigSpec,
  Effect.mapError(
    (e) =>
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Invalid environment: ${String(e)}`,
        cause: e,
      })
  )
);

const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const env = yield* readEnvironment;
    const { settings } = yield* loadSettings(globals.settings, env);
    return {
      env,
      settings,
      logLevel: resolveLogLevel(globals, env, settings.logging.level),
      logFormat: resolveLogFormat(globals, env, settings.logging.format),
      json: globals.json,
    };
  });

// Error display

const useStderrColor = (): boolean =>
  process.env["NO_COLOR"] === undefined && process.stderr.isTTY === true;

/** Formats error for terminal output. Sync because called in exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isVersoError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(
        `${JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })}\n`
      )
    ),
    Match.when("pretty", () => {
      const prefix = useStderrColor() ? "\x1b[31m✗\x1b[0m" : "✗";
      process.stderr.write(`${prefix} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

/** Centralizes context and error handling so each command stays focused on its logic. */
const runCommand = <E>(
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, E, CommandEnvironment>
): Effect.Effect<void, E | ConfigError, CommandEnvironment> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) => Effect.sync(() => displayError(err, "pretty")))
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.logFormat))),
      Effect.provide(
        VersoLoggerLive({ level: ctx.logLevel, format: ctx.logFormat, toStderr: ctx.json })
      )
    );
  });

// Host wiring

/** The positional project wins over `VERSO_PROJECT`. */
const projectLayer = (
  project: Option.Option<string>,
  env: EnvConfig
): Layer.Layer<ProjectHost, never, FileSystem.FileSystem> =>
  FileProjectHostLive(Option.orElse(project, () => env.project));

const NO_OVERRIDES: PromptOverrides = {
  snapshotConflict: Option.none(),
  archiveConflict: Option.none(),
  confirmArchive: Option.none(),
};

// Subcommand definitions

const infoCmd = Command.make("info", { ...globalOptions, project: projectArg }, (args) =>
  runCommand(args, "info", (ctx) =>
    executeInfo({ settings: ctx.settings, json: ctx.json }).pipe(
      Effect.provide(projectLayer(args.project, ctx.env))
    )
  )
).pipe(Command.withDescription("Show the project's version and its versioned siblings"));

const snapshotCmd = Command.make(
  "snapshot",
  { ...globalOptions, project: projectArg, onConflict: snapshotConflict },
  (args) =>
    runCommand(args, "snapshot", (ctx) =>
      executeSnapshot({ settings: ctx.settings, json: ctx.json }).pipe(
        Effect.provide(
          Layer.merge(
            projectLayer(args.project, ctx.env),
            PromptDecisionsLive({ ...NO_OVERRIDES, snapshotConflict: args.onConflict })
          )
        )
      )
    )
).pipe(Command.withDescription("Copy the project folder to the next version and save into it"));

const archiveCmd = Command.make(
  "archive",
  {
    ...globalOptions,
    project: projectArg,
    onConflict: archiveConflict,
    destination,
    keep,
    yes,
  },
  (args) =>
    runCommand(args, "archive", (ctx) =>
      executeArchive({
        settings: ctx.settings,
        json: ctx.json,
        destination: Option.getOrUndefined(args.destination),
        keep: Option.getOrUndefined(args.keep),
      }).pipe(
        Effect.provide(
          Layer.merge(
            projectLayer(args.project, ctx.env),
            PromptDecisionsLive({
              ...NO_OVERRIDES,
              archiveConflict: args.onConflict,
              confirmArchive: args.yes ? Option.some(true) : Option.none(),
            })
          )
        )
      )
    )
).pipe(Command.withDescription("Move old versions to the archive destination"));

const planCmd = Command.make("plan", { ...globalOptions, project: projectArg, keep }, (args) =>
  runCommand(args, "plan", (ctx) =>
    executePlan({
      settings: ctx.settings,
      json: ctx.json,
      keep: Option.getOrElse(args.keep, () => ctx.settings.versionsToKeep),
    }).pipe(Effect.provide(projectLayer(args.project, ctx.env)))
  )
).pipe(Command.withDescription("List the versions archive would move, without moving them"));

// Config subcommands

const configGetCmd = Command.make("get", { ...globalOptions, key: optionalSettingKeyArg }, (args) =>
  runCommand(args, "config-get", (ctx) =>
    executeConfigGet({ settingsPath: args.settings, env: ctx.env, json: ctx.json, key: args.key })
  )
).pipe(Command.withDescription("Print one setting, or all of them"));

const configSetCmd = Command.make(
  "set",
  { ...globalOptions, key: settingKeyArg, value: settingValueArg },
  (args) =>
    runCommand(args, "config-set", (ctx) =>
      executeConfigSet({
        settingsPath: args.settings,
        env: ctx.env,
        json: ctx.json,
        key: args.key,
        value: args.value,
      })
    )
).pipe(Command.withDescription("Write a setting to verso.toml"));

const configPathCmd = Command.make("path", { ...globalOptions }, (args) =>
  runCommand(args, "config-path", (ctx) =>
    executeConfigPath({ settingsPath: args.settings, env: ctx.env, json: ctx.json })
  )
).pipe(Command.withDescription("Print the settings file config set writes to"));

const configCmd = Command.make("config").pipe(
  Command.withDescription("Read and write settings"),
  Command.withSubcommands([configGetCmd, configSetCmd, configPathCmd])
);

// Root command

const verso = Command.make("verso").pipe(
  Command.withDescription("Versioned project snapshots and archiving"),
  Command.withSubcommands([infoCmd, snapshotCmd, archiveCmd, planCmd, configCmd])
);

/** Takes the full `process.argv`, including the node binary and script path. */
export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.CliApp.Environment> =
  Command.run(verso, {
    name: "verso",
    version: VERSO_VERSION,
  });
