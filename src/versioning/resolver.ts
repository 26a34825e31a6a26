// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Project identity and version numbering.
 *
 * `ProjectInfo` is derived from the live project path on every call and
 * never cached; the open project may change between operations. Version
 * folders on disk are the only record of which versions exist.
 */

import { basename, dirname, extname } from "node:path";
import type { FileSystem } from "@effect/platform";
import { Chunk, Effect, Option, Order, Stream, pipe } from "effect";
import type { Settings } from "../config/schema";
import { NoProjectLoadedError } from "../lib/errors";
import { ProjectHost } from "../host/project-host";
import {
  type AbsolutePath,
  ORIGINAL_VERSION,
  type VersionId,
  VersionId as makeVersionId,
  pathJoin,
  toAbsolutePath,
} from "../lib/types";
import { makeNameCodec, type NameCodec } from "./name-codec";
import { listSiblings } from "./scanner";

export interface ProjectInfo {
  readonly fullPath: AbsolutePath;
  readonly directory: AbsolutePath;
  /** Where version folders live. Equals `directory` when that has no parent. */
  readonly parentDirectory: AbsolutePath;
  readonly filename: string;
  /** File name without extension. */
  readonly stem: string;
  /** `stem` with any version suffix removed. */
  readonly baseName: string;
  /** Includes the leading dot; empty when the file has none. */
  readonly extension: string;
  readonly currentVersion: Option.Option<VersionId>;
}

export interface VersionEntry {
  readonly name: string;
  readonly version: VersionId;
  readonly path: AbsolutePath;
}

export const byVersion: Order.Order<VersionEntry> = Order.mapInput(
  Order.number,
  (e: VersionEntry) => e.version
);

export const codecFromSettings = (settings: Settings): NameCodec =>
  makeNameCodec({ prefix: settings.versionPrefix, digits: settings.versionDigits });

/** Pure derivation of project identity from a file path. */
export const projectInfoFromPath = (livePath: string, codec: NameCodec): ProjectInfo => {
  const fullPath = toAbsolutePath(livePath);
  const directory = toAbsolutePath(dirname(fullPath));
  const parent = toAbsolutePath(dirname(directory));
  const filename = basename(fullPath);
  const extension = extname(filename);
  const stem = filename.slice(0, filename.length - extension.length);
  const parsed = codec.parse(stem);

  return {
    fullPath,
    directory,
    parentDirectory: parent === directory ? directory : parent,
    filename,
    stem,
    baseName: pipe(
      parsed,
      Option.map((p) => p.stem),
      Option.getOrElse(() => stem)
    ),
    extension,
    currentVersion: Option.map(parsed, (p) => p.version),
  };
};

/** Fails with `NoProjectLoadedError` when the host has no project open. */
export const resolveProjectInfo = (
  livePath: Option.Option<string>,
  codec: NameCodec
): Effect.Effect<ProjectInfo, NoProjectLoadedError> =>
  Option.match(livePath, {
    onNone: (): Effect.Effect<ProjectInfo, NoProjectLoadedError> =>
      Effect.fail(new NoProjectLoadedError({ message: "No project loaded" })),
    onSome: (p): Effect.Effect<ProjectInfo, NoProjectLoadedError> =>
      p.trim() === ""
        ? Effect.fail(new NoProjectLoadedError({ message: "No project loaded" }))
        : Effect.succeed(projectInfoFromPath(p, codec)),
  });

/** Resolve the project the host currently has open. */
export const resolveCurrentProject = (
  codec: NameCodec
): Effect.Effect<ProjectInfo, NoProjectLoadedError, ProjectHost> =>
  Effect.gen(function* () {
    const host = yield* ProjectHost;
    const livePath = yield* host.currentProjectPath;
    return yield* resolveProjectInfo(livePath, codec);
  });

/**
 * Strict sibling match: the name is exactly `baseName` (version 0), or
 * exactly `baseName + encode(v)`. `Song_extra_v001` is not a version of
 * `Song`, and neither is `Song_v1` when the width is three digits.
 */
export const matchVersionName = (
  name: string,
  baseName: string,
  codec: NameCodec
): Option.Option<VersionId> => {
  if (name === baseName) {
    return Option.some(ORIGINAL_VERSION);
  }
  if (!name.startsWith(baseName)) {
    return Option.none();
  }
  const remainder = name.slice(baseName.length);
  return pipe(
    codec.parse(remainder),
    Option.filter((p) => p.stem === "" && codec.encode(p.version) === remainder),
    Option.map((p) => p.version)
  );
};

/** Every version folder of `baseName` under `parent`, ascending by version. */
export const findAllVersions = (
  parent: string,
  baseName: string,
  codec: NameCodec
): Effect.Effect<readonly VersionEntry[], never, FileSystem.FileSystem> =>
  pipe(
    listSiblings(parent),
    Stream.filterMap((name) =>
      Option.map(
        matchVersionName(name, baseName, codec),
        (version): VersionEntry => ({
          name,
          version,
          path: pathJoin(toAbsolutePath(parent), name),
        })
      )
    ),
    Stream.runCollect,
    Effect.map((chunk) => Chunk.toReadonlyArray(Chunk.sort(chunk, byVersion)))
  );

/**
 * Highest strictly positive version among the siblings, or 0. The
 * unsuffixed original never counts as found.
 */
export const findHighestVersion = (
  parent: string,
  baseName: string,
  codec: NameCodec
): Effect.Effect<VersionId, never, FileSystem.FileSystem> =>
  Effect.map(findAllVersions(parent, baseName, codec), (entries) =>
    entries.reduce((highest, e) => (e.version > highest ? e.version : highest), ORIGINAL_VERSION)
  );

/**
 * A versioned project always increments its own number, even when higher
 * or lower siblings are missing. An unversioned project continues after the
 * highest sibling, or starts at `startVersion`.
 */
export const nextVersion = (
  info: ProjectInfo,
  settings: Settings,
  codec: NameCodec
): Effect.Effect<VersionId, never, FileSystem.FileSystem> =>
  Option.match(info.currentVersion, {
    onSome: (current): Effect.Effect<VersionId, never, FileSystem.FileSystem> =>
      Effect.succeed(makeVersionId(current + 1)),
    onNone: (): Effect.Effect<VersionId, never, FileSystem.FileSystem> =>
      Effect.map(findHighestVersion(info.parentDirectory, info.baseName, codec), (highest) =>
        highest > 0 ? makeVersionId(highest + 1) : makeVersionId(settings.startVersion)
      ),
  });

/** Display name shared by every version of the project. */
export const describeProject = (info: ProjectInfo): string => info.baseName;

/** `"v<n>"` for a versioned project, `"Not versioned"` otherwise. */
export const describeVersion = (info: ProjectInfo): string =>
  Option.match(info.currentVersion, {
    onNone: (): string => "Not versioned",
    onSome: (v): string => `v${v}`,
  });
