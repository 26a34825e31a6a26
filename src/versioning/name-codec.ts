// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Version suffix codec: `Song` + `_v` + `002` ⇄ version 2.
 *
 * Parser-first: `parse` returns the structured split and `decode` derives
 * from it, so the stem used for base names and the number used for
 * ordering always come from the same match.
 */

import { Option, pipe } from "effect";
import { VersionId } from "../lib/types";

export interface NameFormat {
  readonly prefix: string;
  readonly digits: number;
}

export interface ParsedName {
  /** Text before the matched prefix. */
  readonly stem: string;
  readonly version: VersionId;
}

export interface NameCodec {
  readonly format: NameFormat;
  readonly encode: (version: VersionId) => string;
  readonly decode: (name: string) => Option.Option<VersionId>;
  readonly parse: (name: string) => Option.Option<ParsedName>;
}

const isAllDigits = (s: string): boolean => s.length > 0 && /^[0-9]+$/.test(s);

/** Candidate split points: every index at which `prefix` occurs, left to right. */
const prefixOccurrences = (name: string, prefix: string): readonly number[] => {
  const found: number[] = [];
  let idx = name.indexOf(prefix);
  while (idx !== -1 && idx < name.length) {
    found.push(idx);
    idx = name.indexOf(prefix, idx + 1);
  }
  return found;
};

/**
 * The match is the first occurrence of `prefix` whose remainder is all
 * digits to the end of the name. For prefixes ending in a non-digit this is
 * also the last occurrence; for others the leftmost split keeps
 * `parse(stem + encode(v))` equal to `{stem, v}`.
 */
const parseWith =
  (prefix: string) =>
  (name: string): Option.Option<ParsedName> =>
    pipe(
      prefixOccurrences(name, prefix),
      (indices) =>
        Option.fromNullable(
          indices.find((idx) => isAllDigits(name.slice(idx + prefix.length)))
        ),
      Option.flatMap((idx) => {
        const n = Number.parseInt(name.slice(idx + prefix.length), 10);
        // The successor must stay representable too
        return Number.isSafeInteger(n + 1)
          ? Option.some({ stem: name.slice(0, idx), version: VersionId(n) })
          : Option.none();
      })
    );

export const makeNameCodec = (format: NameFormat): NameCodec => {
  const parse = parseWith(format.prefix);
  return {
    format,
    encode: (version: VersionId): string =>
      `${format.prefix}${String(version).padStart(format.digits, "0")}`,
    decode: (name: string): Option.Option<VersionId> =>
      pipe(
        parse(name),
        Option.map((p) => p.version)
      ),
    parse,
  };
};
