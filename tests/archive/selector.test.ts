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
import { currentVersionOf, planArchive, versionsToArchive } from "../../src/archive/selector";
import { DEFAULT_SETTINGS } from "../../src/config/schema";
import { VersionId, toAbsolutePath } from "../../src/lib/types";
import { makeNameCodec } from "../../src/versioning/name-codec";
import { type VersionEntry, projectInfoFromPath } from "../../src/versioning/resolver";
import { makeTempDir, projectAt, removeDir, runTest } from "../helpers/layers";

const entries = (...versions: number[]): VersionEntry[] =>
  versions.map((v) => {
    const name = v === 0 ? "Song" : `Song_v00${v}`;
    return { name, version: VersionId(v), path: toAbsolutePath(join("/music", name)) };
  });

const versionsOf = (list: readonly VersionEntry[]): number[] => list.map((e) => e.version);

describe("versionsToArchive", () => {
  test("selects versions older than current minus keep", () => {
    expect(versionsOf(versionsToArchive(5, 2, entries(0, 1, 2, 3, 4, 5)))).toEqual([0, 1, 2]);
  });

  test("keeps only the original when one version is retained", () => {
    expect(versionsOf(versionsToArchive(2, 1, entries(0, 1, 2)))).toEqual([0]);
  });

  test("keep 0 archives everything but the current version", () => {
    expect(versionsOf(versionsToArchive(3, 0, entries(0, 1, 2, 3)))).toEqual([0, 1, 2]);
  });

  test("a negative keep still protects the current version", () => {
    expect(versionsOf(versionsToArchive(2, -3, entries(1, 2, 3, 4)))).toEqual([1, 3, 4]);
  });

  test("nothing is eligible inside the window", () => {
    expect(versionsToArchive(3, 3, entries(0, 1, 2, 3))).toEqual([]);
  });

  test("preserves input order", () => {
    expect(versionsOf(versionsToArchive(9, 1, entries(3, 1, 2)))).toEqual([3, 1, 2]);
  });
});

describe("currentVersionOf", () => {
  const codec = makeNameCodec({ prefix: "_v", digits: 3 });

  test("is 0 for an unversioned project", () => {
    expect(currentVersionOf(projectInfoFromPath("/music/Song/Song.rpp", codec))).toBe(0);
  });

  test("is the parsed version otherwise", () => {
    expect(currentVersionOf(projectInfoFromPath("/music/Song_v004/Song_v004.rpp", codec))).toBe(4);
  });
});

describe("planArchive", () => {
  let root = "";

  beforeEach(async () => {
    root = await makeTempDir("selector");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  const plan = (project: string, keep: number) =>
    runTest(planArchive(DEFAULT_SETTINGS, keep).pipe(Effect.provide(projectAt(project))));

  test("no folders at all", async () => {
    const result = await plan(join(root, "Mix", "Song.rpp"), 1);
    expect(result._tag).toBe("NoVersionsFound");
  });

  test("everything within the window", async () => {
    for (const name of ["Song", "Song_v001"]) {
      await mkdir(join(root, name));
    }
    const result = await plan(join(root, "Song_v001", "Song_v001.rpp"), 3);
    expect(result._tag).toBe("NothingEligible");
  });

  test("selects the original behind the retention window", async () => {
    for (const name of ["Song", "Song_v001", "Song_v002"]) {
      await mkdir(join(root, name));
    }
    const result = await plan(join(root, "Song_v002", "Song_v002.rpp"), 1);
    expect(result._tag).toBe("Ready");
    if (result._tag === "Ready") {
      expect(result.entries.map((e) => e.name)).toEqual(["Song"]);
      expect(result.all.map((e) => e.name)).toEqual(["Song", "Song_v001", "Song_v002"]);
      expect(result.current).toBe(2);
    }
  });
});
