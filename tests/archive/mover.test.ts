// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { Error as PlatformError } from "@effect/platform";
import { Effect, Layer } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  type ArchiveOptions,
  archiveVersions,
  moveEntries,
  prepareDestination,
} from "../../src/archive/mover";
import { DEFAULT_SETTINGS, type Settings } from "../../src/config/schema";
import { ArchiveDestinationError, PartialArchiveFailure } from "../../src/lib/errors";
import { makeNameCodec } from "../../src/versioning/name-codec";
import { findAllVersions } from "../../src/versioning/resolver";
import {
  type ScriptedAnswers,
  fileSystemWith,
  listNames,
  makeTempDir,
  projectAt,
  removeDir,
  runTest,
  scriptedDecisions,
  writeTree,
} from "../helpers/layers";

const codec = makeNameCodec({ prefix: "_v", digits: 3 });

const denied = (method: string, path: string): PlatformError.SystemError =>
  new PlatformError.SystemError({
    module: "FileSystem",
    method,
    pathOrDescriptor: path,
    reason: "PermissionDenied",
    description: "permission denied",
  });

describe("archive", () => {
  let root = "";
  let projects = "";
  let archive = "";
  let settings: Settings = DEFAULT_SETTINGS;

  const archiveRun = (
    project: string,
    answers: ScriptedAnswers,
    options: ArchiveOptions = {}
  ) => {
    const decisions = scriptedDecisions(answers);
    return {
      log: decisions.log,
      effect: archiveVersions(settings, options).pipe(
        Effect.provide(Layer.merge(projectAt(project), decisions.layer))
      ),
    };
  };

  const takes = (names: readonly string[]): Record<string, string> =>
    Object.fromEntries(names.map((n) => [`${n}/take.wav`, n]));

  beforeEach(async () => {
    root = await makeTempDir("archive");
    projects = join(root, "projects");
    archive = join(root, "archive");
    settings = { ...DEFAULT_SETTINGS, archiveDestination: archive, versionsToKeep: 1 };
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe("prepareDestination", () => {
    test("rejects an unset destination", async () => {
      const error = await runTest(Effect.flip(prepareDestination("  ")));
      expect(error).toBeInstanceOf(ArchiveDestinationError);
      expect(error.message).toBe("Archive destination not set");
    });

    test("creates a missing destination", async () => {
      const dir = await runTest(prepareDestination(join(archive, "nested")));
      expect(dir).toBe(join(archive, "nested"));
      expect(await listNames(archive)).toEqual(["nested"]);
    });
  });

  describe("archiveVersions", () => {
    test("moves the original once the retention window passes it", async () => {
      await writeTree(projects, {
        ...takes(["Song", "Song_v001"]),
        "Song_v002/Song_v002.rpp": "project",
      });
      const run = archiveRun(join(projects, "Song_v002", "Song_v002.rpp"), {
        confirmArchive: () => true,
      });
      const outcome = await runTest(run.effect);

      expect(outcome).toMatchObject({
        _tag: "Archived",
        message: "Successfully archived 1 version(s)",
        tally: { archived: 1, skipped: 0, total: 1, errors: [] },
      });
      expect(await listNames(projects)).toEqual(["Song_v001", "Song_v002"]);
      expect(await listNames(archive)).toEqual(["Song"]);
      expect(await readFile(join(archive, "Song", "take.wav"), "utf8")).toBe("Song");
    });

    test("asks once with the full list", async () => {
      await writeTree(projects, {
        ...takes(["Song", "Song_v001"]),
        "Song_v002/Song_v002.rpp": "project",
      });
      const run = archiveRun(join(projects, "Song_v002", "Song_v002.rpp"), {
        confirmArchive: () => true,
      });
      await runTest(run.effect);

      expect(run.log.confirmations).toEqual([
        {
          names: ["Song"],
          destination: archive,
          message:
            "Archive and REMOVE the following versions from source?\n\n" +
            "  • Song (v0 - original)\n\n" +
            `Destination: ${archive}\n\n` +
            "This action cannot be undone.",
        },
      ]);
    });

    test("declining leaves every version in place", async () => {
      await writeTree(projects, takes(["Song", "Song_v001", "Song_v002"]));
      const run = archiveRun(join(projects, "Song_v002", "Song_v002.rpp"), {
        confirmArchive: () => false,
      });
      const outcome = await runTest(run.effect);

      expect(outcome).toMatchObject({ _tag: "Declined", message: "Archiving cancelled by user" });
      expect(await listNames(projects)).toEqual(["Song", "Song_v001", "Song_v002"]);
      expect(await listNames(archive)).toEqual([]);
    });

    test("reports when nothing is old enough", async () => {
      await writeTree(projects, takes(["Song_v001", "Song_v002"]));
      const run = archiveRun(join(projects, "Song_v002", "Song_v002.rpp"), {});
      const outcome = await runTest(run.effect);

      expect(outcome).toMatchObject({
        _tag: "NothingToArchive",
        message: "No versions to archive",
      });
      expect(run.log.confirmations).toEqual([]);
    });

    test("reports a project with no version folders", async () => {
      await mkdir(join(projects, "Mix"), { recursive: true });
      const outcome = await runTest(archiveRun(join(projects, "Mix", "Song.rpp"), {}).effect);
      expect(outcome).toMatchObject({
        _tag: "NoVersionsFound",
        message: "No versioned folders found",
      });
    });

    test("fails before planning when no destination is set", async () => {
      settings = DEFAULT_SETTINGS;
      await writeTree(projects, takes(["Song", "Song_v001", "Song_v002"]));
      const error = await runTest(
        Effect.flip(archiveRun(join(projects, "Song_v002", "Song_v002.rpp"), {}).effect)
      );
      expect(error).toBeInstanceOf(ArchiveDestinationError);
      expect(await listNames(projects)).toEqual(["Song", "Song_v001", "Song_v002"]);
    });

    test("refuses a destination that is the folder holding the versions", async () => {
      await writeTree(projects, takes(["Song_v001", "Song_v002", "Song_v005"]));
      const run = archiveRun(
        join(projects, "Song_v005", "Song_v005.rpp"),
        { confirmArchive: () => true, archiveConflict: () => "replace" },
        { destination: projects }
      );
      const error = await runTest(Effect.flip(run.effect));

      expect(error).toBeInstanceOf(ArchiveDestinationError);
      expect(error.message).toBe(
        `Archive destination ${projects} is the folder that holds the versions`
      );
      expect(run.log.confirmations).toEqual([]);
      expect(await listNames(projects)).toEqual(["Song_v001", "Song_v002", "Song_v005"]);
    });

    test("options override destination and keep", async () => {
      await writeTree(projects, takes(["Song", "Song_v001", "Song_v002"]));
      const elsewhere = join(root, "elsewhere");
      const run = archiveRun(
        join(projects, "Song_v002", "Song_v002.rpp"),
        { confirmArchive: () => true },
        { destination: elsewhere, keep: 0 }
      );
      const outcome = await runTest(run.effect);

      expect(outcome).toMatchObject({ _tag: "Archived", tally: { archived: 2 } });
      expect(await listNames(elsewhere)).toEqual(["Song", "Song_v001"]);
      expect(await listNames(projects)).toEqual(["Song_v002"]);
    });
  });

  describe("existing archive entries", () => {
    const FIVE = ["Song_v001", "Song_v002", "Song_v003", "Song_v004", "Song_v005"];

    beforeEach(async () => {
      settings = { ...settings, versionsToKeep: 0 };
      await writeTree(projects, { ...takes(FIVE), "Song_v008/Song_v008.rpp": "project" });
      await writeTree(archive, { "Song_v002/old.wav": "old" });
    });

    const project = (): string => join(projects, "Song_v008", "Song_v008.rpp");

    test("abort stops before the conflicting version", async () => {
      const run = archiveRun(project(), {
        confirmArchive: () => true,
        archiveConflict: () => "abort",
      });
      const outcome = await runTest(run.effect);

      expect(outcome).toMatchObject({
        _tag: "Aborted",
        message: "Archiving aborted. Archived 1 version(s) before cancellation.",
        tally: { archived: 1, skipped: 0, total: 5, errors: [] },
      });
      expect(run.log.archiveConflicts).toEqual([
        { name: "Song_v002", destinationPath: join(archive, "Song_v002") },
      ]);
      expect(await listNames(projects)).toEqual([
        "Song_v002",
        "Song_v003",
        "Song_v004",
        "Song_v005",
        "Song_v008",
      ]);
      expect(await listNames(archive)).toEqual(["Song_v001", "Song_v002"]);
      expect(await listNames(join(archive, "Song_v002"))).toEqual(["old.wav"]);
    });

    test("skip leaves the conflicting version at the source", async () => {
      const outcome = await runTest(
        archiveRun(project(), { confirmArchive: () => true, archiveConflict: () => "skip" }).effect
      );

      expect(outcome).toMatchObject({
        _tag: "Archived",
        message: "Successfully archived 4 version(s), skipped 1",
        tally: { archived: 4, skipped: 1, total: 5, errors: [] },
      });
      expect(await listNames(projects)).toEqual(["Song_v002", "Song_v008"]);
      expect(await listNames(join(archive, "Song_v002"))).toEqual(["old.wav"]);
    });

    test("replace swaps the archived copy", async () => {
      const outcome = await runTest(
        archiveRun(project(), {
          confirmArchive: () => true,
          archiveConflict: () => "replace",
        }).effect
      );

      expect(outcome).toMatchObject({ _tag: "Archived", tally: { archived: 5, skipped: 0 } });
      expect(await listNames(projects)).toEqual(["Song_v008"]);
      expect(await listNames(join(archive, "Song_v002"))).toEqual(["take.wav"]);
    });
  });

  describe("moveEntries", () => {
    const entriesOf = async (names: readonly string[]) => {
      await writeTree(projects, takes(names));
      await mkdir(archive, { recursive: true });
      return runTest(findAllVersions(projects, "Song", codec));
    };

    test("skips an entry whose archive path is its own folder", async () => {
      const entries = await entriesOf(["Song_v001"]);
      const decisions = scriptedDecisions({ archiveConflict: () => "replace" });

      const error = await runTest(
        Effect.flip(moveEntries(entries, projects).pipe(Effect.provide(decisions.layer)))
      );

      expect(error.tally).toEqual({
        archived: 0,
        skipped: 0,
        total: 1,
        errors: ["Archive path is the version folder itself: Song_v001"],
      });
      expect(decisions.log.archiveConflicts).toEqual([]);
      expect(await listNames(join(projects, "Song_v001"))).toEqual(["take.wav"]);
    });

    test("a failed copy is recorded and the source kept", async () => {
      const entries = await entriesOf(["Song_v001"]);
      const source = join(projects, "Song_v001");

      const error = await runTest(
        Effect.flip(
          moveEntries(entries, archive).pipe(
            Effect.provide(scriptedDecisions({}).layer),
            Effect.provide(
              fileSystemWith(() => ({ copy: (from) => Effect.fail(denied("copy", from)) }))
            )
          )
        )
      );

      expect(error.tally.errors).toEqual([
        `Failed to archive: Song_v001 - FileSystem.copy ${source}: permission denied`,
      ]);
      expect(error.tally.archived).toBe(0);
      expect(await listNames(source)).toEqual(["take.wav"]);
      expect(await listNames(archive)).toEqual([]);
    });

    test("a source that cannot be deleted still counts as archived", async () => {
      const entries = await entriesOf(["Song_v001"]);
      const source = join(projects, "Song_v001");

      const error = await runTest(
        Effect.flip(
          moveEntries(entries, archive).pipe(
            Effect.provide(scriptedDecisions({}).layer),
            Effect.provide(
              fileSystemWith((real) => ({
                remove: (path, options) =>
                  path === source ? Effect.fail(denied("remove", path)) : real.remove(path, options),
              }))
            )
          )
        )
      );

      expect(error.tally).toEqual({
        archived: 1,
        skipped: 0,
        total: 1,
        errors: [
          `Archived but could not delete source: Song_v001 - FileSystem.remove ${source}: permission denied`,
        ],
      });
      expect(await listNames(join(archive, "Song_v001"))).toEqual(["take.wav"]);
      expect(await listNames(source)).toEqual(["take.wav"]);
    });

    test("a replace that cannot clear the old copy skips that entry and continues", async () => {
      const entries = await entriesOf(["Song_v001", "Song_v002"]);
      await writeTree(archive, { "Song_v001/old.wav": "old" });
      const existing = join(archive, "Song_v001");

      const error = await runTest(
        Effect.flip(
          moveEntries(entries, archive).pipe(
            Effect.provide(scriptedDecisions({ archiveConflict: () => "replace" }).layer),
            Effect.provide(
              fileSystemWith((real) => ({
                remove: (path, options) =>
                  path === existing
                    ? Effect.fail(denied("remove", path))
                    : real.remove(path, options),
              }))
            )
          )
        )
      );

      expect(error.tally).toEqual({
        archived: 1,
        skipped: 0,
        total: 2,
        errors: [
          `Could not remove existing archive: Song_v001 - FileSystem.remove ${existing}: permission denied`,
        ],
      });
      expect(await listNames(projects)).toEqual(["Song_v001"]);
      expect(await listNames(archive)).toEqual(["Song_v001", "Song_v002"]);
      expect(await listNames(existing)).toEqual(["old.wav"]);
    });

    test("never deletes a source whose copy is not confirmed", async () => {
      await writeTree(projects, takes(["Song_v001"]));
      await mkdir(archive, { recursive: true });
      const entries = await runTest(findAllVersions(projects, "Song", codec));
      const decisions = scriptedDecisions({});

      const error = await runTest(
        Effect.flip(
          moveEntries(entries, archive).pipe(
            Effect.provide(decisions.layer),
            Effect.provide(fileSystemWith(() => ({ copy: () => Effect.void })))
          )
        )
      );

      expect(error).toBeInstanceOf(PartialArchiveFailure);
      expect(error.message).toBe(
        "Archived 0/1 versions, skipped 0, errors:\nCopy verification failed: Song_v001"
      );
      expect(error.tally).toEqual({
        archived: 0,
        skipped: 0,
        total: 1,
        errors: ["Copy verification failed: Song_v001"],
      });
      expect(error.aborted).toBe(false);
      expect(await listNames(join(projects, "Song_v001"))).toEqual(["take.wav"]);
    });
  });
});
