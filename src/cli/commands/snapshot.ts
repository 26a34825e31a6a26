// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Match, pipe } from "effect";
import type { Settings } from "../../config/schema";
import type { SnapshotError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import {
  type SnapshotOutcome,
  type SnapshotRequirements,
  createSnapshot,
} from "../../versioning/snapshot";

export interface SnapshotOptions {
  readonly settings: Settings;
  readonly json: boolean;
}

export const formatSnapshotOutcome = (outcome: SnapshotOutcome): string =>
  pipe(
    Match.value(outcome),
    Match.tag(
      "Created",
      (o) =>
        `${o.overwritten ? "Overwrote" : "Created"} ${o.folderName} (version ${o.version}, ${o.fileCount} files)\nProject file: ${o.projectFile}`
    ),
    Match.tag("Cancelled", (o) => `Snapshot cancelled: ${o.folderName} already exists`),
    Match.exhaustive
  );

export const executeSnapshot = (
  options: SnapshotOptions
): Effect.Effect<void, SnapshotError, SnapshotRequirements> =>
  Effect.gen(function* () {
    const outcome = yield* createSnapshot(options.settings);
    yield* options.json ? writeJson(outcome) : writeOutput(formatSnapshotOutcome(outcome));
  });
