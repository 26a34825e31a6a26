#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * verso - versioned project snapshots and archiving
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { exitCodeFromExit, logUnexpected } from "./cli/exit";
import { cli } from "./cli/index";
import { errorMessage } from "./lib/errors";

async function main(): Promise<void> {
  const exit = await Effect.runPromiseExit(
    cli(process.argv).pipe(Effect.provide(NodeContext.layer))
  );
  logUnexpected(exit);
  process.exitCode = exitCodeFromExit(exit);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error("Unexpected error:", errorMessage(e));
    process.exitCode = 1;
  });
}
