// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only overview of the open project: its name and version, the
 * version folders beside it and what the next snapshot would be called.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { Settings } from "../../config/schema";
import type { ProjectHost } from "../../host/project-host";
import type { NoProjectLoadedError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import {
  codecFromSettings,
  describeProject,
  describeVersion,
  findAllVersions,
  nextVersion,
  resolveCurrentProject,
} from "../../versioning/resolver";

export interface ProjectReport {
  readonly project: string;
  readonly version: string;
  readonly file: string;
  readonly parentDirectory: string;
  readonly nextVersion: number;
  readonly nextFolder: string;
  readonly versions: readonly { readonly name: string; readonly version: number }[];
}

export const versionLabel = (entry: {
  readonly name: string;
  readonly version: number;
}): string =>
  entry.version === 0 ? `${entry.name} (v0 - original)` : entry.name;

export const buildProjectReport = (
  settings: Settings
): Effect.Effect<ProjectReport, NoProjectLoadedError, ProjectHost | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const codec = codecFromSettings(settings);
    const info = yield* resolveCurrentProject(codec);
    const versions = yield* findAllVersions(info.parentDirectory, info.baseName, codec);
    const next = yield* nextVersion(info, settings, codec);
    return {
      project: describeProject(info),
      version: describeVersion(info),
      file: info.fullPath,
      parentDirectory: info.parentDirectory,
      nextVersion: next,
      nextFolder: `${info.baseName}${codec.encode(next)}`,
      versions: versions.map((v) => ({ name: v.name, version: v.version })),
    };
  });

export const formatProjectReport = (report: ProjectReport): string => {
  const versionLines =
    report.versions.length === 0
      ? ["  (none)"]
      : report.versions.map((v) => `  ${versionLabel(v)}`);
  return [
    `Project:  ${report.project}`,
    `Version:  ${report.version}`,
    `File:     ${report.file}`,
    `Next:     ${report.nextFolder}`,
    `Versions in ${report.parentDirectory}:`,
    ...versionLines,
  ].join("\n");
};

export interface InfoOptions {
  readonly settings: Settings;
  readonly json: boolean;
}

export const executeInfo = (
  options: InfoOptions
): Effect.Effect<void, NoProjectLoadedError, ProjectHost | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const report = yield* buildProjectReport(options.settings);
    yield* options.json ? writeJson(report) : writeOutput(formatProjectReport(report));
  });
