// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Where verso looks for its settings file.
 */

import { Option, pipe } from "effect";
import { type AbsolutePath, pathJoin, toAbsolutePath } from "./types";

export const SETTINGS_FILE_NAME = "verso.toml";

/** `$XDG_CONFIG_HOME/verso/verso.toml`, or `~/.config/verso/verso.toml`. */
export const userSettingsPath = (
  home: string,
  xdgConfigHome: Option.Option<string>
): AbsolutePath =>
  pathJoin(
    toAbsolutePath(
      pipe(
        xdgConfigHome,
        Option.getOrElse(() => pathJoin(home, ".config"))
      )
    ),
    "verso",
    SETTINGS_FILE_NAME
  );

/** Search order when no explicit path is given. The first file that exists wins. */
export const settingsSearchPaths = (
  home: string,
  xdgConfigHome: Option.Option<string>
): readonly AbsolutePath[] => [
  userSettingsPath(home, xdgConfigHome),
  toAbsolutePath(SETTINGS_FILE_NAME),
];
