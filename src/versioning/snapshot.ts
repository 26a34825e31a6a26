// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Snapshot creation: resolve → conflict check → create → copy → save →
 * verify. Each state is logged as a step. Nothing is retried and nothing
 * written is rolled back; a failed verification says so.
 */

import { isAbsolute, join, relative } from "node:path";
import { FileSystem } from "@effect/platform";
import { Data, Effect, Either } from "effect";
import type { Settings } from "../config/schema";
import { DecisionProvider } from "../host/decisions";
import { ProjectHost } from "../host/project-host";
import {
  CopyError,
  DirectoryCreateError,
  type FileCopyFailure,
  type SnapshotError,
  VerificationError,
  errorMessage,
} from "../lib/errors";
import { createStepCounter, logSuccess } from "../lib/log";
import { type AbsolutePath, type VersionId, pathJoin, toAbsolutePath } from "../lib/types";
import { copyFileCreatingParent, directoryExists, fileExists, pathExists } from "../system/fs";
import { resolveSnapshotConflict } from "./conflict";
import { codecFromSettings, nextVersion, type ProjectInfo, resolveCurrentProject } from "./resolver";
import { countFiles, listFiles } from "./scanner";

export type SnapshotOutcome = Data.TaggedEnum<{
  Created: {
    readonly folderName: string;
    readonly path: AbsolutePath;
    readonly version: VersionId;
    readonly projectFile: string;
    /** Files found under the snapshot during verification. */
    readonly fileCount: number;
    readonly copied: number;
    /** True when an existing folder was written over. */
    readonly overwritten: boolean;
  };
  /** The target existed and the decision was to cancel. */
  Cancelled: { readonly folderName: string; readonly path: string };
}>;

export const SnapshotOutcome = Data.taggedEnum<SnapshotOutcome>();

export type SnapshotRequirements = ProjectHost | DecisionProvider | FileSystem.FileSystem;

const SNAPSHOT_STEPS = 6;

interface Target {
  readonly folderName: string;
  readonly path: AbsolutePath;
  readonly overwritten: boolean;
}

/** Relative path of `target` inside `source`, if it lies there. */
const nestedTargetPath = (source: string, target: string): string | undefined => {
  const rel = relative(source, target);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel) ? rel : undefined;
};

/**
 * Files to copy, listed before the target exists. The live project file is
 * excluded (the host writes it afresh) and so is the target itself when it
 * sits inside the project directory.
 */
const listSourceFiles = (
  info: ProjectInfo,
  targetPath: string
): Effect.Effect<readonly string[], never, FileSystem.FileSystem> => {
  const nested = nestedTargetPath(info.directory, targetPath);
  return listFiles(info.directory, {
    skipDirectory: (rel) => rel === nested,
  });
};

const copyTree = (
  source: string,
  target: string,
  files: readonly string[]
): Effect.Effect<number, CopyError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const results = yield* Effect.forEach(files, (rel) =>
      copyFileCreatingParent(join(source, rel), join(target, rel)).pipe(
        Effect.mapError((reason): FileCopyFailure => ({ relativePath: rel, reason })),
        Effect.either
      )
    );
    const failures = results.filter(Either.isLeft).map((r) => r.left);
    const copied = results.length - failures.length;
    if (failures.length > 0) {
      const detail = failures.map((f) => `  ${f.relativePath}: ${f.reason}`).join("\n");
      return yield* Effect.fail(
        new CopyError({
          message: `Copying failed for ${failures.length} of ${files.length} files (${copied} copied):\n${detail}`,
          copied,
          failures,
        })
      );
    }
    return copied;
  });

const verifySnapshot = (
  target: Target,
  projectFile: string,
  sourceCount: number
): Effect.Effect<number, VerificationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const reasons: string[] = [];
    if (!(yield* directoryExists(target.path))) {
      reasons.push(`Snapshot folder is missing: ${target.path}`);
    }
    if (!(yield* fileExists(projectFile))) {
      reasons.push(`Project file is missing: ${projectFile}`);
    }
    const fileCount = yield* countFiles(target.path);
    if (fileCount < sourceCount) {
      reasons.push(`File count mismatch: ${fileCount} in snapshot, ${sourceCount} in source`);
    }
    if (reasons.length > 0) {
      return yield* Effect.fail(
        new VerificationError({
          message: `Verification of ${target.folderName} failed:\n${reasons.map((r) => `  - ${r}`).join("\n")}\nFiles already written to ${target.path} were left in place.`,
          path: target.path,
          reasons,
        })
      );
    }
    return fileCount;
  });

/**
 * Materialize the next version of the open project as a sibling folder.
 * Settings are read once by the caller and passed in.
 */
export const createSnapshot = (
  settings: Settings
): Effect.Effect<SnapshotOutcome, SnapshotError, SnapshotRequirements> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const host = yield* ProjectHost;
    const codec = codecFromSettings(settings);
    const steps = yield* createStepCounter(SNAPSHOT_STEPS);

    yield* steps.next("Resolving project");
    const info = yield* resolveCurrentProject(codec);
    const version = yield* nextVersion(info, settings, codec);
    const proposedName = `${info.baseName}${codec.encode(version)}`;
    yield* Effect.logDebug(`Next version of ${info.baseName} is ${version}`);

    yield* steps.next(`Checking ${proposedName}`);
    let target: Target = {
      folderName: proposedName,
      path: pathJoin(info.parentDirectory, proposedName),
      overwritten: false,
    };
    if (yield* pathExists(target.path)) {
      const decision = yield* resolveSnapshotConflict(info.parentDirectory, proposedName);
      if (decision._tag === "Cancel") {
        yield* Effect.logInfo(`Snapshot cancelled: ${proposedName} already exists`);
        return SnapshotOutcome.Cancelled({ folderName: proposedName, path: target.path });
      }
      target =
        decision._tag === "Alongside"
          ? {
              folderName: decision.folderName,
              path: toAbsolutePath(decision.path),
              overwritten: false,
            }
          : { ...target, overwritten: true };
    }

    const sourceFiles = yield* listSourceFiles(info, target.path);
    const toCopy = sourceFiles.filter((rel) => rel !== info.filename);

    yield* steps.next(`Creating ${target.folderName}`);
    yield* fs.makeDirectory(target.path, { recursive: true }).pipe(
      Effect.mapError(
        (e) =>
          new DirectoryCreateError({
            message: `Could not create snapshot folder ${target.path}: ${errorMessage(e)}`,
            path: target.path,
            cause: e,
          })
      )
    );

    yield* steps.next(`Copying ${toCopy.length} files`);
    const copied = yield* copyTree(info.directory, target.path, toCopy);

    const projectFile = join(target.path, `${target.folderName}${info.extension}`);
    yield* steps.next(`Saving project as ${projectFile}`);
    yield* host.saveProjectAs(projectFile);

    yield* steps.next("Verifying snapshot");
    const fileCount = yield* verifySnapshot(target, projectFile, sourceFiles.length);

    yield* logSuccess(`Created ${target.folderName} (${fileCount} files)`);
    return SnapshotOutcome.Created({
      folderName: target.folderName,
      path: target.path,
      version,
      projectFile,
      fileCount,
      copied,
      overwritten: target.overwritten,
    });
  }).pipe(Effect.annotateLogs("operation", "snapshot"));
