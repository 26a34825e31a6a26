// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Thin queries over the platform `FileSystem` service. Existence checks
 * never fail: a path that cannot be stat'ed is reported as absent.
 */

import { dirname } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { errorMessage } from "../lib/errors";

type EntryType = "File" | "Directory";

const hasType = (
  path: string,
  type: EntryType
): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.stat(path).pipe(
      Effect.map((info) => info.type === type),
      Effect.orElseSucceed(() => false)
    );
  });

export const pathExists = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.exists(path).pipe(Effect.orElseSucceed(() => false));
  });

export const fileExists = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  hasType(path, "File");

export const directoryExists = (
  path: string
): Effect.Effect<boolean, never, FileSystem.FileSystem> => hasType(path, "Directory");

/**
 * Copy one file, creating its parent directory first. Fails with the
 * platform's message so callers can record it per file.
 */
export const copyFileCreatingParent = (
  from: string,
  to: string
): Effect.Effect<void, string, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(dirname(to), { recursive: true });
    yield* fs.copyFile(from, to);
  }).pipe(Effect.mapError(errorMessage));

export const readTextFile = (
  path: string
): Effect.Effect<string, string, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  }).pipe(Effect.mapError(errorMessage));

/** Write text, creating parent directories as needed. */
export const writeTextFile = (
  path: string,
  content: string
): Effect.Effect<void, string, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(dirname(path), { recursive: true });
    yield* fs.writeFileString(path, content);
  }).pipe(Effect.mapError(errorMessage));
