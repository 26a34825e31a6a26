// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retention policy: which version folders are old enough to archive.
 */

import type { FileSystem } from "@effect/platform";
import { Data, Effect, Option } from "effect";
import type { Settings } from "../config/schema";
import type { ProjectHost } from "../host/project-host";
import type { NoProjectLoadedError } from "../lib/errors";
import { ORIGINAL_VERSION, type VersionId } from "../lib/types";
import {
  type ProjectInfo,
  type VersionEntry,
  codecFromSettings,
  findAllVersions,
  resolveCurrentProject,
} from "../versioning/resolver";

/**
 * Entries strictly older than `current - keep`. The current version is
 * excluded whatever `keep` is, including zero and negative values.
 * Input order is preserved.
 */
export const versionsToArchive = (
  current: number,
  keep: number,
  all: readonly VersionEntry[]
): readonly VersionEntry[] => {
  const cutoff = current - keep;
  return all.filter((e) => e.version < cutoff && e.version !== current);
};

export type ArchivePlan = Data.TaggedEnum<{
  /** No folder of this project exists at all. */
  NoVersionsFound: { readonly info: ProjectInfo; readonly message: string };
  /** Versions exist but all are within the retention window. */
  NothingEligible: {
    readonly info: ProjectInfo;
    readonly current: VersionId;
    readonly all: readonly VersionEntry[];
  };
  Ready: {
    readonly info: ProjectInfo;
    readonly current: VersionId;
    readonly all: readonly VersionEntry[];
    readonly entries: readonly VersionEntry[];
  };
}>;

export const ArchivePlan = Data.taggedEnum<ArchivePlan>();

/** Unversioned projects count as version 0. */
export const currentVersionOf = (info: ProjectInfo): VersionId =>
  Option.getOrElse(info.currentVersion, () => ORIGINAL_VERSION);

export const planArchive = (
  settings: Settings,
  keep: number = settings.versionsToKeep
): Effect.Effect<ArchivePlan, NoProjectLoadedError, ProjectHost | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const codec = codecFromSettings(settings);
    const info = yield* resolveCurrentProject(codec);
    const all = yield* findAllVersions(info.parentDirectory, info.baseName, codec);
    if (all.length === 0) {
      return ArchivePlan.NoVersionsFound({ info, message: "No versioned folders found" });
    }
    const current = currentVersionOf(info);
    const entries = versionsToArchive(current, keep, all);
    return entries.length === 0
      ? ArchivePlan.NothingEligible({ info, current, all })
      : ArchivePlan.Ready({ info, current, all, entries });
  });
