// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { hasOwnKey, UnknownIdentifierError } from "../lib"

/** Items per second carried by one full belt (both lanes). */
export const beltThroughput = {
  "transport-belt": 15,
  "fast-transport-belt": 30,
  "express-transport-belt": 45,
} as const satisfies Record<string, number>

export const furnaceSpeed = {
  "stone-furnace": 1,
  "steel-furnace": 2,
  "electric-furnace": 2,
} as const satisfies Record<string, number>

export type BeltName = keyof typeof beltThroughput
export type FurnaceName = keyof typeof furnaceSpeed

/** Recipe time of every smelting recipe, at crafting speed 1. */
export const SMELTING_TIME_SECONDS = 3.2

export const INSERTER_NAME = "inserter"

export const beltNames: readonly string[] = Object.keys(beltThroughput).sort()
export const furnaceNames: readonly string[] = Object.keys(furnaceSpeed).sort()

export function isBeltName(name: string): name is BeltName {
  return hasOwnKey(beltThroughput, name)
}

export function isFurnaceName(name: string): name is FurnaceName {
  return hasOwnKey(furnaceSpeed, name)
}

export function getBeltThroughput(belt: string): number {
  if (!isBeltName(belt)) throw new UnknownIdentifierError("belt", belt)
  return beltThroughput[belt]
}

export function getFurnaceSpeed(furnace: string): number {
  if (!isFurnaceName(furnace)) throw new UnknownIdentifierError("furnace", furnace)
  return furnaceSpeed[furnace]
}

/** Items per second one furnace smelts. */
export function getFurnaceThroughput(furnace: string): number {
  return getFurnaceSpeed(furnace) / SMELTING_TIME_SECONDS
}
