// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Turning a finished run into a process exit code.
 */

import { ValidationError } from "@effect/cli";
import { Cause, Exit, Option } from "effect";
import { errorMessage, isVersoError, toExitCode } from "../lib/errors";

/** 128 + SIGINT */
const INTERRUPTED_EXIT_CODE = 130;

export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Cause.isInterruptedOnly(cause)
        ? INTERRUPTED_EXIT_CODE
        : Option.match(Cause.failureOption(cause), {
            onNone: (): number => 1,
            onSome: (err): number => (isVersoError(err) ? toExitCode(err.code) : 1),
          }),
  });

/**
 * Verso errors were already shown by the command runner and usage errors by
 * the CLI parser; anything else reaches the user here.
 */
export const logUnexpected = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void => {
      if (Cause.isInterruptedOnly(cause)) {
        return;
      }
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (err): void => {
          if (!(isVersoError(err) || ValidationError.isValidationError(err))) {
            console.error(`Error: ${errorMessage(err)}`);
          }
        },
      });
    },
  });
