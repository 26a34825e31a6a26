// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { SuffixExhaustedError } from "../../src/lib/errors";
import { ORIGINAL_VERSION, VersionId, toAbsolutePath } from "../../src/lib/types";
import {
  ALONGSIDE_SUFFIXES,
  confirmArchive,
  decideArchiveConflict,
  findAlongsideName,
  formatArchiveConfirmation,
  resolveSnapshotConflict,
} from "../../src/versioning/conflict";
import type { VersionEntry } from "../../src/versioning/resolver";
import { makeTempDir, removeDir, runTest, scriptedDecisions } from "../helpers/layers";

const entry = (name: string, version: number): VersionEntry => ({
  name,
  version: VersionId(version),
  path: toAbsolutePath(join("/music", name)),
});

describe("alongside names", () => {
  let root = "";

  beforeEach(async () => {
    root = await makeTempDir("conflict");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  test("suffixes run from _a to _z", () => {
    expect(ALONGSIDE_SUFFIXES).toHaveLength(26);
    expect(ALONGSIDE_SUFFIXES[0]).toBe("_a");
    expect(ALONGSIDE_SUFFIXES[25]).toBe("_z");
  });

  test("takes the first free suffix", async () => {
    await mkdir(join(root, "Song_v002"));
    await mkdir(join(root, "Song_v002_a"));
    const found = await runTest(findAlongsideName(root, "Song_v002"));
    expect(found.suffix).toBe("_b");
    expect(found.folderName).toBe("Song_v002_b");
    expect(found.path).toBe(join(root, "Song_v002_b"));
  });

  test("fails when every suffix is taken", async () => {
    for (const suffix of ALONGSIDE_SUFFIXES) {
      await mkdir(join(root, `Song_v002${suffix}`));
    }
    const error = await runTest(Effect.flip(findAlongsideName(root, "Song_v002")));
    expect(error).toBeInstanceOf(SuffixExhaustedError);
    expect(error.message).toBe(
      "Every alongside name from Song_v002_a to Song_v002_z already exists"
    );
  });

  test("resolveSnapshotConflict asks once and maps the answer", async () => {
    await mkdir(join(root, "Song_v002"));
    const overwrite = scriptedDecisions({ snapshotConflict: () => "overwrite" });
    const decision = await runTest(
      resolveSnapshotConflict(root, "Song_v002").pipe(Effect.provide(overwrite.layer))
    );
    expect(decision._tag).toBe("Overwrite");
    expect(overwrite.log.snapshotConflicts).toEqual([
      { folderName: "Song_v002", path: join(root, "Song_v002") },
    ]);

    const alongside = scriptedDecisions({ snapshotConflict: () => "alongside" });
    const placed = await runTest(
      resolveSnapshotConflict(root, "Song_v002").pipe(Effect.provide(alongside.layer))
    );
    expect(placed._tag === "Alongside" ? placed.folderName : placed._tag).toBe("Song_v002_a");
  });
});

describe("archive decisions", () => {
  test("formats the confirmation with the original marked", () => {
    const message = formatArchiveConfirmation(
      [entry("Song", 0), entry("Song_v001", 1)],
      "/archive"
    );
    expect(message).toBe(
      "Archive and REMOVE the following versions from source?\n\n" +
        "  • Song (v0 - original)\n" +
        "  • Song_v001\n\n" +
        "Destination: /archive\n\n" +
        "This action cannot be undone."
    );
  });

  test("confirmArchive passes names and message to the provider", async () => {
    const scripted = scriptedDecisions({ confirmArchive: () => true });
    const entries = [entry("Song", ORIGINAL_VERSION)];
    const answer = await runTest(
      confirmArchive(entries, "/archive").pipe(Effect.provide(scripted.layer))
    );
    expect(answer).toBe(true);
    expect(scripted.log.confirmations).toEqual([
      {
        names: ["Song"],
        destination: "/archive",
        message: formatArchiveConfirmation(entries, "/archive"),
      },
    ]);
  });

  test("decideArchiveConflict returns the provider's choice", async () => {
    const scripted = scriptedDecisions({ archiveConflict: () => "skip" });
    const choice = await runTest(
      decideArchiveConflict(entry("Song_v001", 1), "/archive/Song_v001").pipe(
        Effect.provide(scripted.layer)
      )
    );
    expect(choice).toBe("skip");
    expect(scripted.log.archiveConflicts).toEqual([
      { name: "Song_v001", destinationPath: "/archive/Song_v001" },
    ]);
  });
});
