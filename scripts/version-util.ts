// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import * as semver from "semver"
import { ReleaseType } from "semver"

export const releaseTypes = ["major", "minor", "patch"] as const satisfies readonly ReleaseType[]
export type BumpType = (typeof releaseTypes)[number]

const releaseTypeNames: readonly string[] = releaseTypes

export function isBumpType(value: string | undefined): value is BumpType {
  return value !== undefined && releaseTypeNames.includes(value)
}

export function bumpVersion(version: string, releaseType: BumpType): string {
  const parsed = semver.parse(version)
  if (parsed === null) throw new Error(`Invalid version: ${version}`)
  return parsed.inc(releaseType).format()
}

/** The changelog starts with a separator line, then `Version: x.y.z`. */
export function updateChangelogVersion(lines: readonly string[], oldVersion: string, newVersion: string): string[] {
  const expectedLine2 = `Version: ${oldVersion}`
  if (lines[1] !== expectedLine2) {
    throw new Error(`Expected changelog line 2 to be "${expectedLine2}"`)
  }
  const result = [...lines]
  result.splice(1, 1, `Version: ${newVersion}`)
  return result
}
