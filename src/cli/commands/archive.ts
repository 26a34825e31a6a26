// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { Settings } from "../../config/schema";
import {
  type ArchiveOptions as MoverOptions,
  type ArchiveRequirements,
  archiveVersions,
} from "../../archive/mover";
import type { ArchiveError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";

export interface ArchiveOptions extends MoverOptions {
  readonly settings: Settings;
  readonly json: boolean;
}

export const executeArchive = (
  options: ArchiveOptions
): Effect.Effect<void, ArchiveError, ArchiveRequirements> =>
  Effect.gen(function* () {
    const { settings, json, ...overrides } = options;
    const outcome = yield* archiveVersions(settings, overrides);
    yield* json ? writeJson(outcome) : writeOutput(outcome.message);
  });
