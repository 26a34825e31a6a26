// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * A `VersionId` and a file count are both numbers, but the compiler rejects
 * using one where the other is expected.
 */

import { join, resolve } from "node:path";
import { Brand } from "effect";

export type VersionId = number & Brand.Brand<"VersionId">;
export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;

/** Non-negative integer. 0 is the unsuffixed original. */
export const VersionId: Brand.Brand.Constructor<VersionId> = Brand.refined<VersionId>(
  (n) => Number.isSafeInteger(n) && n >= 0,
  (n) => Brand.error(`VersionId must be a non-negative integer, got ${n}`)
);

/** The unsuffixed original. */
export const ORIGINAL_VERSION: VersionId = VersionId(0);

const AbsolutePathBrand = Brand.nominal<AbsolutePath>();

/** Resolves against the working directory, so the result is always absolute. */
export const toAbsolutePath = (p: string): AbsolutePath => AbsolutePathBrand(resolve(p));

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : join(base, ...segments);
}
