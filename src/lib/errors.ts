// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Typed failures for verso operations. Each error carries a numeric code
 * (mapped to the process exit code) and a message that names the sub-step
 * that failed. A user declining to continue is an outcome, not an error.
 */

import { Data, Predicate } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly CONFIG_WRITE_FAILED: 13;

  // Snapshot (20-29)
  readonly NO_PROJECT_LOADED: 20;
  readonly DIRECTORY_CREATE_FAILED: 21;
  readonly COPY_FAILED: 22;
  readonly SAVE_FAILED: 23;
  readonly VERIFICATION_FAILED: 24;
  readonly SUFFIX_EXHAUSTED: 25;

  // Archive (30-39)
  readonly ARCHIVE_DESTINATION_INVALID: 30;
  readonly PARTIAL_ARCHIVE_FAILURE: 31;
}

/**
 * Error codes for all verso operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,

  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  CONFIG_WRITE_FAILED: 13,

  NO_PROJECT_LOADED: 20,
  DIRECTORY_CREATE_FAILED: 21,
  COPY_FAILED: 22,
  SAVE_FAILED: 23,
  VERIFICATION_FAILED: 24,
  SUFFIX_EXHAUSTED: 25,

  ARCHIVE_DESTINATION_INVALID: 30,
  PARTIAL_ARCHIVE_FAILURE: 31,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ============================================================================
// General and configuration errors
// ============================================================================

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: typeof ErrorCode.GENERAL_ERROR | typeof ErrorCode.INVALID_ARGS;
  readonly message: string;
  readonly cause?: unknown;
}> {}

type ConfigErrorCode =
  | typeof ErrorCode.CONFIG_NOT_FOUND
  | typeof ErrorCode.CONFIG_PARSE_ERROR
  | typeof ErrorCode.CONFIG_VALIDATION_ERROR
  | typeof ErrorCode.CONFIG_WRITE_FAILED;

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: unknown;
}> {}

// ============================================================================
// Snapshot errors
// ============================================================================

export class NoProjectLoadedError extends Data.TaggedError("NoProjectLoadedError")<{
  readonly message: string;
}> {
  readonly code: typeof ErrorCode.NO_PROJECT_LOADED = ErrorCode.NO_PROJECT_LOADED;
}

export class DirectoryCreateError extends Data.TaggedError("DirectoryCreateError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {
  readonly code: typeof ErrorCode.DIRECTORY_CREATE_FAILED = ErrorCode.DIRECTORY_CREATE_FAILED;
}

/** One file that could not be copied into a snapshot. */
export interface FileCopyFailure {
  readonly relativePath: string;
  readonly reason: string;
}

export class CopyError extends Data.TaggedError("CopyError")<{
  readonly message: string;
  readonly copied: number;
  readonly failures: readonly FileCopyFailure[];
}> {
  readonly code: typeof ErrorCode.COPY_FAILED = ErrorCode.COPY_FAILED;
}

export class SaveError extends Data.TaggedError("SaveError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {
  readonly code: typeof ErrorCode.SAVE_FAILED = ErrorCode.SAVE_FAILED;
}

export class VerificationError extends Data.TaggedError("VerificationError")<{
  readonly message: string;
  readonly path: string;
  readonly reasons: readonly string[];
}> {
  readonly code: typeof ErrorCode.VERIFICATION_FAILED = ErrorCode.VERIFICATION_FAILED;
}

export class SuffixExhaustedError extends Data.TaggedError("SuffixExhaustedError")<{
  readonly message: string;
  readonly folderName: string;
}> {
  readonly code: typeof ErrorCode.SUFFIX_EXHAUSTED = ErrorCode.SUFFIX_EXHAUSTED;
}

// ============================================================================
// Archive errors
// ============================================================================

export class ArchiveDestinationError extends Data.TaggedError("ArchiveDestinationError")<{
  readonly message: string;
  readonly destination: string;
  readonly cause?: unknown;
}> {
  readonly code: typeof ErrorCode.ARCHIVE_DESTINATION_INVALID =
    ErrorCode.ARCHIVE_DESTINATION_INVALID;
}

/** Counts and per-entry messages of an archive run that recorded errors. */
export interface ArchiveTally {
  readonly archived: number;
  readonly skipped: number;
  readonly total: number;
  readonly errors: readonly string[];
}

export class PartialArchiveFailure extends Data.TaggedError("PartialArchiveFailure")<{
  readonly message: string;
  readonly tally: ArchiveTally;
  readonly aborted: boolean;
}> {
  readonly code: typeof ErrorCode.PARTIAL_ARCHIVE_FAILURE = ErrorCode.PARTIAL_ARCHIVE_FAILURE;
}

// ============================================================================
// Unions and helpers
// ============================================================================

export type SnapshotError =
  | NoProjectLoadedError
  | SuffixExhaustedError
  | DirectoryCreateError
  | CopyError
  | SaveError
  | VerificationError;

export type ArchiveError = NoProjectLoadedError | ArchiveDestinationError | PartialArchiveFailure;

export type VersoError = GeneralError | ConfigError | SnapshotError | ArchiveError;

/** Type guard for error display routing. Verso errors have exit codes; anything else is a defect. */
export const isVersoError = (err: unknown): err is VersoError =>
  typeof err === "object" &&
  err !== null &&
  "_tag" in err &&
  "code" in err &&
  typeof err.code === "number" &&
  "message" in err &&
  typeof err.message === "string";

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: ErrorCodeValue): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/** Fields shared by the platform's `SystemError` and `BadArgument` failures. */
interface PlatformFailure {
  readonly module: string;
  readonly method: string;
  readonly pathOrDescriptor: string | number | undefined;
  readonly detail: string;
}

const stringField = (u: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(u, key);
  return typeof value === "string" ? value : undefined;
};

const asPlatformFailure = (e: unknown): PlatformFailure | undefined => {
  if (!Predicate.isObject(e)) {
    return undefined;
  }
  const tag = stringField(e, "_tag");
  const moduleName = stringField(e, "module");
  const method = stringField(e, "method");
  if (
    (tag !== "SystemError" && tag !== "BadArgument") ||
    moduleName === undefined ||
    method === undefined
  ) {
    return undefined;
  }
  const target: unknown = Reflect.get(e, "pathOrDescriptor");
  return {
    module: moduleName,
    method,
    pathOrDescriptor: typeof target === "string" || typeof target === "number" ? target : undefined,
    detail: stringField(e, "description") ?? stringField(e, "reason") ?? tag,
  };
};

/**
 * Extract error message from unknown value. Platform file-system failures
 * are not `Error` instances; they render as `Module.method path: detail`.
 */
export const errorMessage = (e: unknown): string => {
  const platform = asPlatformFailure(e);
  if (platform !== undefined) {
    const target = platform.pathOrDescriptor === undefined ? "" : ` ${platform.pathOrDescriptor}`;
    return `${platform.module}.${platform.method}${target}: ${platform.detail}`;
  }
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
