// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { SETTINGS_FILE_NAME, settingsSearchPaths, userSettingsPath } from "../../src/lib/paths";

describe("settings paths", () => {
  test("user file lives under ~/.config by default", () => {
    expect(userSettingsPath("/home/testuser", Option.none())).toBe(
      "/home/testuser/.config/verso/verso.toml"
    );
  });

  test("XDG_CONFIG_HOME replaces ~/.config", () => {
    expect(userSettingsPath("/home/testuser", Option.some("/xdg"))).toBe("/xdg/verso/verso.toml");
  });

  test("the working directory is searched after the user file", () => {
    expect(settingsSearchPaths("/home/testuser", Option.none())).toEqual([
      "/home/testuser/.config/verso/verso.toml",
      `${process.cwd()}/${SETTINGS_FILE_NAME}`,
    ]);
  });
});
