// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Decision points of snapshot and archive runs. Each request is answered
 * exactly once; nothing here retries or computes a fallback choice.
 */

import { Prompt } from "@effect/cli";
import { Terminal } from "@effect/platform";
import { Context, Effect, Layer, Option } from "effect";
import type { ArchiveConflictPolicy, SnapshotConflictPolicy } from "../config/field-values";

export interface SnapshotConflictRequest {
  readonly folderName: string;
  readonly path: string;
}

export interface ArchiveConflictRequest {
  readonly name: string;
  readonly destinationPath: string;
}

export interface ArchiveConfirmationRequest {
  readonly names: readonly string[];
  readonly destination: string;
  /** Full confirmation text, ready to show. */
  readonly message: string;
}

export interface DecisionProviderValue {
  readonly snapshotConflict: (
    request: SnapshotConflictRequest
  ) => Effect.Effect<SnapshotConflictPolicy>;
  readonly archiveConflict: (request: ArchiveConflictRequest) => Effect.Effect<ArchiveConflictPolicy>;
  readonly confirmArchive: (request: ArchiveConfirmationRequest) => Effect.Effect<boolean>;
}

export interface DecisionProvider {
  readonly _tag: "DecisionProvider";
}

export const DecisionProvider: Context.Tag<DecisionProvider, DecisionProviderValue> =
  Context.GenericTag<DecisionProvider, DecisionProviderValue>("verso/DecisionProvider");

/** Answers fixed by command-line flags; `None` means ask. */
export interface PromptOverrides {
  readonly snapshotConflict: Option.Option<SnapshotConflictPolicy>;
  readonly archiveConflict: Option.Option<ArchiveConflictPolicy>;
  readonly confirmArchive: Option.Option<boolean>;
}

/**
 * Asks on the terminal unless a flag already answered. Ctrl+C at a prompt
 * is taken as the cancelling answer.
 */
export const PromptDecisionsLive = (
  overrides: PromptOverrides
): Layer.Layer<DecisionProvider, never, Terminal.Terminal> =>
  Layer.effect(
    DecisionProvider,
    Effect.gen(function* () {
      const terminal = yield* Terminal.Terminal;
      const ask = <A>(prompt: Prompt.Prompt<A>, onQuit: A): Effect.Effect<A> =>
        Prompt.run(prompt).pipe(
          Effect.provideService(Terminal.Terminal, terminal),
          Effect.catchTag("QuitException", () => Effect.succeed(onQuit))
        );

      return {
        snapshotConflict: (
          request: SnapshotConflictRequest
        ): Effect.Effect<SnapshotConflictPolicy> =>
          Option.match(overrides.snapshotConflict, {
            onSome: (choice): Effect.Effect<SnapshotConflictPolicy> => Effect.succeed(choice),
            onNone: (): Effect.Effect<SnapshotConflictPolicy> =>
              ask(
                Prompt.select<SnapshotConflictPolicy>({
                  message: `"${request.folderName}" already exists. What should happen?`,
                  choices: [
                    {
                      title: "Create alongside",
                      value: "alongside",
                      description: "Use the next free _a.._z suffix",
                    },
                    {
                      title: "Overwrite",
                      value: "overwrite",
                      description: "Copy over the existing folder; stale files stay",
                    },
                    { title: "Cancel", value: "cancel" },
                  ],
                }),
                "cancel"
              ),
          }),

        archiveConflict: (request: ArchiveConflictRequest): Effect.Effect<ArchiveConflictPolicy> =>
          Option.match(overrides.archiveConflict, {
            onSome: (choice): Effect.Effect<ArchiveConflictPolicy> => Effect.succeed(choice),
            onNone: (): Effect.Effect<ArchiveConflictPolicy> =>
              ask(
                Prompt.select<ArchiveConflictPolicy>({
                  message: `"${request.name}" already exists in archive.`,
                  choices: [
                    { title: "Skip this version", value: "skip" },
                    { title: "Replace existing archive", value: "replace" },
                    { title: "Abort entire operation", value: "abort" },
                  ],
                }),
                "abort"
              ),
          }),

        confirmArchive: (request: ArchiveConfirmationRequest): Effect.Effect<boolean> =>
          Option.match(overrides.confirmArchive, {
            onSome: (answer): Effect.Effect<boolean> => Effect.succeed(answer),
            onNone: (): Effect.Effect<boolean> =>
              ask(Prompt.confirm({ message: request.message, initial: false }), false),
          }),
      };
    })
  );
