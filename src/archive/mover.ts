// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Moves selected versions to the archive destination: copy, confirm the
 * copy is present, then delete the source. A source folder is never removed
 * before its copy exists. Per-entry failures are recorded and the run
 * continues; only an abort decision stops it early.
 */

import { join } from "node:path";
import { FileSystem } from "@effect/platform";
import { Data, Effect, Either } from "effect";
import type { Settings } from "../config/schema";
import type { DecisionProvider } from "../host/decisions";
import type { ProjectHost } from "../host/project-host";
import {
  ArchiveDestinationError,
  type ArchiveError,
  type ArchiveTally,
  PartialArchiveFailure,
  errorMessage,
} from "../lib/errors";
import { logFail, logStep, logSuccess } from "../lib/log";
import { type AbsolutePath, toAbsolutePath } from "../lib/types";
import { directoryExists, pathExists } from "../system/fs";
import { confirmArchive, decideArchiveConflict } from "../versioning/conflict";
import type { VersionEntry } from "../versioning/resolver";
import { planArchive } from "./selector";

export type ArchiveOutcome = Data.TaggedEnum<{
  NoVersionsFound: { readonly message: string };
  NothingToArchive: { readonly message: string };
  /** The confirmation was answered no; nothing was touched. */
  Declined: { readonly message: string };
  /** An abort decision stopped the run; earlier moves stand. */
  Aborted: { readonly message: string; readonly tally: ArchiveTally };
  Archived: { readonly message: string; readonly tally: ArchiveTally };
}>;

export const ArchiveOutcome = Data.taggedEnum<ArchiveOutcome>();

export interface ArchiveOptions {
  /** Overrides `archiveDestination` from settings. */
  readonly destination?: string;
  /** Overrides `versionsToKeep` from settings. */
  readonly keep?: number;
}

export type ArchiveRequirements = ProjectHost | DecisionProvider | FileSystem.FileSystem;

/** Validates the destination and creates it when missing. */
export const prepareDestination = (
  destination: string
): Effect.Effect<AbsolutePath, ArchiveDestinationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (destination.trim() === "") {
      return yield* Effect.fail(
        new ArchiveDestinationError({ message: "Archive destination not set", destination })
      );
    }
    const dir = toAbsolutePath(destination);
    if (yield* directoryExists(dir)) {
      return dir;
    }
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(dir, { recursive: true }).pipe(
      Effect.mapError(
        (e) =>
          new ArchiveDestinationError({
            message: `Could not create archive destination ${dir}: ${errorMessage(e)}`,
            destination,
            cause: e,
          })
      )
    );
    yield* Effect.logInfo(`Created archive destination ${dir}`);
    return dir;
  });

export const summarizeArchived = (tally: ArchiveTally): string =>
  tally.skipped > 0
    ? `Successfully archived ${tally.archived} version(s), skipped ${tally.skipped}`
    : `Successfully archived ${tally.archived} version(s)`;

const summarizeErrors = (tally: ArchiveTally, aborted: boolean): string =>
  `${aborted ? "Archiving aborted. " : ""}Archived ${tally.archived}/${tally.total} versions, skipped ${tally.skipped}, errors:\n${tally.errors.join("\n")}`;

/**
 * Move `entries` (ascending by version) into `destination`, one at a time.
 */
export const moveEntries = (
  entries: readonly VersionEntry[],
  destination: string
): Effect.Effect<
  ArchiveOutcome,
  PartialArchiveFailure,
  DecisionProvider | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const total = entries.length;
    const errors: string[] = [];
    let archived = 0;
    let skipped = 0;
    let aborted = false;

    const record = (message: string): Effect.Effect<void> =>
      Effect.sync(() => {
        errors.push(message);
      }).pipe(Effect.zipRight(logFail(message)));

    for (const [index, entry] of entries.entries()) {
      const destPath = join(destination, entry.name);
      yield* logStep(index + 1, total, `Archiving ${entry.name}`);

      if (toAbsolutePath(destPath) === toAbsolutePath(entry.path)) {
        yield* record(`Archive path is the version folder itself: ${entry.name}`);
        continue;
      }

      if (yield* pathExists(destPath)) {
        const choice = yield* decideArchiveConflict(entry, destPath);
        if (choice === "abort") {
          aborted = true;
          break;
        }
        if (choice === "skip") {
          skipped += 1;
          continue;
        }
        const removed = yield* Effect.either(fs.remove(destPath, { recursive: true }));
        if (Either.isLeft(removed)) {
          yield* record(
            `Could not remove existing archive: ${entry.name} - ${errorMessage(removed.left)}`
          );
          continue;
        }
      }

      const copied = yield* Effect.either(fs.copy(entry.path, destPath));
      if (Either.isLeft(copied)) {
        yield* record(`Failed to archive: ${entry.name} - ${errorMessage(copied.left)}`);
        continue;
      }

      if (!(yield* directoryExists(destPath))) {
        yield* record(`Copy verification failed: ${entry.name}`);
        continue;
      }

      // The copy is confirmed; from here the entry counts as archived.
      archived += 1;
      const deleted = yield* Effect.either(fs.remove(entry.path, { recursive: true }));
      if (Either.isLeft(deleted)) {
        yield* record(
          `Archived but could not delete source: ${entry.name} - ${errorMessage(deleted.left)}`
        );
      }
    }

    const tally: ArchiveTally = { archived, skipped, total, errors };
    if (errors.length > 0) {
      return yield* Effect.fail(
        new PartialArchiveFailure({ message: summarizeErrors(tally, aborted), tally, aborted })
      );
    }
    if (aborted) {
      return ArchiveOutcome.Aborted({
        message: `Archiving aborted. Archived ${archived} version(s) before cancellation.`,
        tally,
      });
    }
    const message = summarizeArchived(tally);
    yield* logSuccess(message);
    return ArchiveOutcome.Archived({ message, tally });
  });

/**
 * Full archive run for the open project: destination checks, selection,
 * one confirmation, then the moves.
 */
export const archiveVersions = (
  settings: Settings,
  options: ArchiveOptions = {}
): Effect.Effect<ArchiveOutcome, ArchiveError, ArchiveRequirements> =>
  Effect.gen(function* () {
    const destination = yield* prepareDestination(
      options.destination ?? settings.archiveDestination
    );
    const plan = yield* planArchive(settings, options.keep ?? settings.versionsToKeep);
    if (toAbsolutePath(plan.info.parentDirectory) === destination) {
      return yield* Effect.fail(
        new ArchiveDestinationError({
          message: `Archive destination ${destination} is the folder that holds the versions`,
          destination,
        })
      );
    }

    if (plan._tag === "NoVersionsFound") {
      return ArchiveOutcome.NoVersionsFound({ message: plan.message });
    }
    if (plan._tag === "NothingEligible") {
      return ArchiveOutcome.NothingToArchive({ message: "No versions to archive" });
    }

    if (!(yield* confirmArchive(plan.entries, destination))) {
      return ArchiveOutcome.Declined({ message: "Archiving cancelled by user" });
    }
    return yield* moveEntries(plan.entries, destination);
  }).pipe(Effect.annotateLogs("operation", "archive"));
