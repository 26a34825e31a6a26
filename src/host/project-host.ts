// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The application that owns the live project. Snapshot creation asks it
 * where the project is and has it write the project file at a new path.
 * Uses Context.GenericTag for isolatedDeclarations: true compatibility.
 */

import { FileSystem } from "@effect/platform";
import { Context, Effect, Layer, Option } from "effect";
import { SaveError, errorMessage } from "../lib/errors";

export interface ProjectHostValue {
  /** Path of the project file currently open, if any. */
  readonly currentProjectPath: Effect.Effect<Option.Option<string>>;
  /** Persist the live project at `newPath`. */
  readonly saveProjectAs: (newPath: string) => Effect.Effect<void, SaveError>;
}

export interface ProjectHost {
  readonly _tag: "ProjectHost";
}

export const ProjectHost: Context.Tag<ProjectHost, ProjectHostValue> = Context.GenericTag<
  ProjectHost,
  ProjectHostValue
>("verso/ProjectHost");

/**
 * Host for a project that is a plain file on disk: saving under a new name
 * writes the file's current contents there.
 */
export const FileProjectHostLive = (
  projectPath: Option.Option<string>
): Layer.Layer<ProjectHost, never, FileSystem.FileSystem> =>
  Layer.effect(
    ProjectHost,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      return {
        currentProjectPath: Effect.succeed(projectPath),
        saveProjectAs: (newPath: string): Effect.Effect<void, SaveError> =>
          Option.match(projectPath, {
            onNone: (): Effect.Effect<void, SaveError> =>
              Effect.fail(
                new SaveError({
                  message: `Could not save project as ${newPath}: no project is open`,
                  path: newPath,
                })
              ),
            onSome: (source): Effect.Effect<void, SaveError> =>
              fs.copyFile(source, newPath).pipe(
                Effect.mapError(
                  (e) =>
                    new SaveError({
                      message: `Could not save project as ${newPath}: ${errorMessage(e)}`,
                      path: newPath,
                      cause: e,
                    })
                )
              ),
          }),
      };
    })
  );
