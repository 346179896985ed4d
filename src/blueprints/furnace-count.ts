// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { getBeltThroughput, getFurnaceThroughput } from "../entity/prototype-info"
import { clamp, ValidationError } from "../lib"

export const MIN_FURNACE_COUNT = 1
export const MAX_FURNACE_COUNT = 200

export interface FurnaceCountInput {
  readonly furnace: string
  readonly belt: string
  /** If set, used instead of the count needed to saturate the belt. */
  readonly length?: number
}

export function clampLength(value: number): number {
  return clamp(value, MIN_FURNACE_COUNT, MAX_FURNACE_COUNT)
}

/** Number of furnaces whose combined output exactly fills one belt. May be fractional. */
export function furnacesPerFullBelt(furnace: string, belt: string): number {
  return getBeltThroughput(belt) / getFurnaceThroughput(furnace)
}

export function calculateFurnaceCount(input: FurnaceCountInput): number {
  const { length } = input
  if (length !== undefined) {
    if (!Number.isInteger(length)) throw new ValidationError(`Length must be an integer, got ${length}.`)
    return clampLength(length)
  }
  // counts are positive, so Math.round rounds ties away from zero
  return clampLength(Math.round(furnacesPerFullBelt(input.furnace, input.belt)))
}
