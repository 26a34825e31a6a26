// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Error as PlatformError } from "@effect/platform";
import { describe, expect, test } from "vitest";
import {
  CopyError,
  ErrorCode,
  GeneralError,
  PartialArchiveFailure,
  SaveError,
  errorMessage,
  getErrorCodeName,
  isVersoError,
  toExitCode,
} from "../../src/lib/errors";

describe("errors", () => {
  test("each error carries its code", () => {
    expect(new SaveError({ message: "x", path: "/p" }).code).toBe(ErrorCode.SAVE_FAILED);
    expect(new CopyError({ message: "x", copied: 0, failures: [] }).code).toBe(22);
    expect(
      new PartialArchiveFailure({
        message: "x",
        tally: { archived: 0, skipped: 0, total: 1, errors: ["e"] },
        aborted: false,
      }).code
    ).toBe(31);
  });

  test("isVersoError", () => {
    expect(isVersoError(new GeneralError({ code: ErrorCode.GENERAL_ERROR, message: "x" }))).toBe(
      true
    );
    expect(isVersoError(new Error("plain"))).toBe(false);
    expect(isVersoError("text")).toBe(false);
    expect(isVersoError(null)).toBe(false);
  });

  test("getErrorCodeName", () => {
    expect(getErrorCodeName(ErrorCode.SUFFIX_EXHAUSTED)).toBe("SUFFIX_EXHAUSTED");
    expect(getErrorCodeName(ErrorCode.CONFIG_NOT_FOUND)).toBe("CONFIG_NOT_FOUND");
  });

  test("toExitCode passes codes through", () => {
    expect(toExitCode(ErrorCode.PARTIAL_ARCHIVE_FAILURE)).toBe(31);
    expect(toExitCode(ErrorCode.SUCCESS)).toBe(0);
  });

  test("errorMessage", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("text")).toBe("text");
    expect(errorMessage(7)).toBe("7");
  });

  test("errorMessage names the platform call that failed", () => {
    const system = new PlatformError.SystemError({
      module: "FileSystem",
      method: "copy",
      pathOrDescriptor: "/music/Song_v001",
      reason: "NotFound",
    });
    expect(errorMessage(system)).toBe("FileSystem.copy /music/Song_v001: NotFound");

    const described = new PlatformError.SystemError({
      module: "FileSystem",
      method: "remove",
      pathOrDescriptor: "/music/Song_v001",
      reason: "PermissionDenied",
      description: "permission denied",
    });
    expect(errorMessage(described)).toBe("FileSystem.remove /music/Song_v001: permission denied");

    const badArgument = new PlatformError.BadArgument({
      module: "FileSystem",
      method: "makeDirectory",
      description: "empty path",
    });
    expect(errorMessage(badArgument)).toBe("FileSystem.makeDirectory: empty path");
  });
});
