// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Directory enumeration. An absent or unreadable directory yields nothing
 * rather than failing, so a project without prior versions simply has zero
 * siblings.
 */

import { join } from "node:path";
import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { errorMessage } from "../lib/errors";
import { directoryExists } from "../system/fs";

const NO_ENTRIES: readonly string[] = [];

const readSorted = (
  directory: string
): Effect.Effect<readonly string[], never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readDirectory(directory).pipe(
      Effect.map((names): readonly string[] => [...names].sort()),
      Effect.catchAll((e) =>
        Effect.logDebug(`Cannot read ${directory}: ${errorMessage(e)}`).pipe(
          Effect.as(NO_ENTRIES)
        )
      )
    );
  });

/** Immediate subdirectory names of `parent`, in name order. */
export const listSiblings = (parent: string): Stream.Stream<string, never, FileSystem.FileSystem> =>
  Stream.unwrap(
    Effect.map(readSorted(parent), (names) =>
      Stream.fromIterable(names).pipe(
        Stream.filterEffect((name) => directoryExists(join(parent, name)))
      )
    )
  );

export interface ListFilesOptions {
  /** Relative directory paths for which this returns true are not descended into. */
  readonly skipDirectory?: (relativePath: string) => boolean;
}

const walk = (
  root: string,
  relative: string,
  options: ListFilesOptions
): Effect.Effect<readonly string[], never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* readSorted(relative === "" ? root : join(root, relative));
    const nested = yield* Effect.forEach(names, (name) => {
      const childRelative = relative === "" ? name : join(relative, name);
      return fs.stat(join(root, childRelative)).pipe(
        Effect.flatMap((info) => {
          if (info.type === "Directory") {
            return options.skipDirectory?.(childRelative) === true
              ? Effect.succeed(NO_ENTRIES)
              : walk(root, childRelative, options);
          }
          return Effect.succeed(info.type === "File" ? [childRelative] : NO_ENTRIES);
        }),
        Effect.orElseSucceed(() => NO_ENTRIES)
      );
    });
    return nested.flat();
  });

/** Relative paths of every regular file under `root`, depth first, in name order. */
export const listFiles = (
  root: string,
  options: ListFilesOptions = {}
): Effect.Effect<readonly string[], never, FileSystem.FileSystem> => walk(root, "", options);

export const countFiles = (root: string): Effect.Effect<number, never, FileSystem.FileSystem> =>
  Effect.map(listFiles(root), (files) => files.length);
