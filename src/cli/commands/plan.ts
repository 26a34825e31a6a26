// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Archive preview. Runs the selection only; nothing is moved and no
 * destination is created.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Match, pipe } from "effect";
import { type ArchivePlan, planArchive } from "../../archive/selector";
import type { Settings } from "../../config/schema";
import type { ProjectHost } from "../../host/project-host";
import type { NoProjectLoadedError } from "../../lib/errors";
import { writeJson, writeOutput } from "../../lib/log";
import { versionLabel } from "./info";

export interface PlanOptions {
  readonly settings: Settings;
  readonly keep: number;
  readonly json: boolean;
}

export interface PlanReport {
  readonly project: string;
  readonly current: number;
  readonly keep: number;
  readonly toArchive: readonly string[];
  readonly toKeep: readonly string[];
}

export const buildPlanReport = (plan: ArchivePlan, keep: number): PlanReport =>
  pipe(
    Match.value(plan),
    Match.tag(
      "NoVersionsFound",
      (p): PlanReport => ({
        project: p.info.baseName,
        current: 0,
        keep,
        toArchive: [],
        toKeep: [],
      })
    ),
    Match.tag(
      "NothingEligible",
      (p): PlanReport => ({
        project: p.info.baseName,
        current: p.current,
        keep,
        toArchive: [],
        toKeep: p.all.map(versionLabel),
      })
    ),
    Match.tag("Ready", (p): PlanReport => {
      const selected = new Set(p.entries.map((e) => e.name));
      return {
        project: p.info.baseName,
        current: p.current,
        keep,
        toArchive: p.entries.map(versionLabel),
        toKeep: p.all.filter((e) => !selected.has(e.name)).map(versionLabel),
      };
    }),
    Match.exhaustive
  );

export const formatPlan = (plan: ArchivePlan, keep: number): string => {
  if (plan._tag === "NoVersionsFound") {
    return plan.message;
  }
  const report = buildPlanReport(plan, keep);
  const list = (names: readonly string[]): string[] =>
    names.length === 0 ? ["  (none)"] : names.map((n) => `  ${n}`);
  return [
    `Current version of ${report.project}: ${report.current}, keeping ${report.keep}`,
    "Would archive:",
    ...list(report.toArchive),
    "Would keep:",
    ...list(report.toKeep),
  ].join("\n");
};

export const executePlan = (
  options: PlanOptions
): Effect.Effect<void, NoProjectLoadedError, ProjectHost | FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const plan = yield* planArchive(options.settings, options.keep);
    yield* options.json
      ? writeJson(buildPlanReport(plan, options.keep))
      : writeOutput(formatPlan(plan, options.keep));
  });
