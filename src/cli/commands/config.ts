// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * `config get|set|path`: inspect and edit verso.toml.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option } from "effect";
import type { EnvConfig } from "../../config/env";
import {
  type LoadedSettings,
  SETTING_KEYS,
  getSetting,
  loadSettings,
  parseSettingKey,
  setSetting,
  settingsWritePath,
} from "../../config/loader";
import type { ConfigError } from "../../lib/errors";
import { logSuccess, writeJson, writeOutput } from "../../lib/log";

export interface ConfigCommandOptions {
  readonly settingsPath: Option.Option<string>;
  readonly env: EnvConfig;
  readonly json: boolean;
}

const sourceLabel = (loaded: LoadedSettings): string =>
  Option.getOrElse(loaded.source, () => "(defaults)");

export const executeConfigGet = (
  options: ConfigCommandOptions & { readonly key: Option.Option<string> }
): Effect.Effect<void, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const loaded = yield* loadSettings(options.settingsPath, options.env);
    yield* Option.match(options.key, {
      onSome: (raw): Effect.Effect<void, ConfigError> =>
        Effect.gen(function* () {
          const key = yield* parseSettingKey(raw);
          const value = getSetting(loaded.settings, key);
          yield* options.json ? writeJson({ [key]: value }) : writeOutput(String(value));
        }),
      onNone: (): Effect.Effect<void> =>
        options.json
          ? writeJson({ source: sourceLabel(loaded), settings: loaded.settings })
          : writeOutput(
              [
                `# ${sourceLabel(loaded)}`,
                ...SETTING_KEYS.map(
                  (key) => `${key} = ${JSON.stringify(getSetting(loaded.settings, key))}`
                ),
              ].join("\n")
            ),
    });
  });

export const executeConfigSet = (
  options: ConfigCommandOptions & { readonly key: string; readonly value: string }
): Effect.Effect<void, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const path = yield* settingsWritePath(options.settingsPath, options.env);
    yield* setSetting(path, options.key, options.value);
    yield* logSuccess(`Set ${options.key} in ${path}`);
  });

export const executeConfigPath = (
  options: ConfigCommandOptions
): Effect.Effect<void, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const path = yield* settingsWritePath(options.settingsPath, options.env);
    yield* options.json ? writeJson({ path }) : writeOutput(path);
  });
