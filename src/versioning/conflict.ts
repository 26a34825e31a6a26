// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * What to do when a snapshot or archive target already exists. The choice
 * comes from the `DecisionProvider`; this module only turns "alongside"
 * into a concrete free folder name.
 */

import { join } from "node:path";
import type { FileSystem } from "@effect/platform";
import { Data, Effect, Match, pipe } from "effect";
import type { ArchiveConflictPolicy } from "../config/field-values";
import { DecisionProvider } from "../host/decisions";
import { SuffixExhaustedError } from "../lib/errors";
import { pathExists } from "../system/fs";
import type { VersionEntry } from "./resolver";

export type SnapshotConflictDecision = Data.TaggedEnum<{
  /** Create next to the existing folder under `folderName`. */
  Alongside: { readonly suffix: string; readonly folderName: string; readonly path: string };
  /** Write into the existing folder without clearing it. */
  Overwrite: object;
  Cancel: object;
}>;

export const SnapshotConflictDecision = Data.taggedEnum<SnapshotConflictDecision>();

/** `_a` through `_z`, tried in order. */
export const ALONGSIDE_SUFFIXES: readonly string[] = Array.from(
  { length: 26 },
  (_, i) => `_${String.fromCharCode(97 + i)}`
);

/** First `folderName + suffix` with no existing sibling under `parent`. */
export const findAlongsideName = (
  parent: string,
  folderName: string
): Effect.Effect<
  Data.TaggedEnum.Value<SnapshotConflictDecision, "Alongside">,
  SuffixExhaustedError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    for (const suffix of ALONGSIDE_SUFFIXES) {
      const candidate = `${folderName}${suffix}`;
      const path = join(parent, candidate);
      if (!(yield* pathExists(path))) {
        return SnapshotConflictDecision.Alongside({ suffix, folderName: candidate, path });
      }
    }
    return yield* Effect.fail(
      new SuffixExhaustedError({
        message: `Every alongside name from ${folderName}_a to ${folderName}_z already exists`,
        folderName,
      })
    );
  });

type Resolution = Effect.Effect<
  SnapshotConflictDecision,
  SuffixExhaustedError,
  FileSystem.FileSystem
>;

/** Asked only when the snapshot target already exists. */
export const resolveSnapshotConflict = (
  parent: string,
  folderName: string
): Effect.Effect<
  SnapshotConflictDecision,
  SuffixExhaustedError,
  DecisionProvider | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    const decisions = yield* DecisionProvider;
    const choice = yield* decisions.snapshotConflict({
      folderName,
      path: join(parent, folderName),
    });
    return yield* pipe(
      Match.value(choice),
      Match.when("alongside", (): Resolution => findAlongsideName(parent, folderName)),
      Match.when(
        "overwrite",
        (): Resolution => Effect.succeed(SnapshotConflictDecision.Overwrite())
      ),
      Match.when("cancel", (): Resolution => Effect.succeed(SnapshotConflictDecision.Cancel())),
      Match.exhaustive
    );
  });

/** Caller's choice for an archive entry whose destination exists. */
export const decideArchiveConflict = (
  entry: VersionEntry,
  destinationPath: string
): Effect.Effect<ArchiveConflictPolicy, never, DecisionProvider> =>
  Effect.flatMap(DecisionProvider, (decisions) =>
    decisions.archiveConflict({ name: entry.name, destinationPath })
  );

/** One bullet per version; the original is marked as such. */
export const formatArchiveConfirmation = (
  entries: readonly VersionEntry[],
  destination: string
): string => {
  const list = entries
    .map((e) => `  • ${e.name}${e.version === 0 ? " (v0 - original)" : ""}`)
    .join("\n");
  return `Archive and REMOVE the following versions from source?\n\n${list}\n\nDestination: ${destination}\n\nThis action cannot be undone.`;
};

/** The confirmation asked once before an archive run moves anything. */
export const confirmArchive = (
  entries: readonly VersionEntry[],
  destination: string
): Effect.Effect<boolean, never, DecisionProvider> =>
  Effect.flatMap(DecisionProvider, (decisions) =>
    decisions.confirmArchive({
      names: entries.map((e) => e.name),
      destination,
      message: formatArchiveConfirmation(entries, destination),
    })
  );
