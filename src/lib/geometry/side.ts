// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { UnknownIdentifierError } from "../errors"
import { Direction } from "./direction"

/** Cyclic order; the index of a side is the number of quarter turns from north. */
export const sides = ["north", "east", "south", "west"] as const

export type Side = (typeof sides)[number]

const sideNames: readonly string[] = sides

const sideDirections: Readonly<Record<Side, Direction>> = {
  north: Direction.north,
  east: Direction.east,
  south: Direction.south,
  west: Direction.west,
}

const oppositeSides: Readonly<Record<Side, Side>> = {
  north: "south",
  south: "north",
  east: "west",
  west: "east",
}

export function isSide(value: string): value is Side {
  return sideNames.includes(value)
}

export function assertSide(value: string): Side {
  if (!isSide(value)) throw new UnknownIdentifierError("side", value)
  return value
}

export function oppositeSide(side: Side): Side {
  return oppositeSides[side]
}

export function sideToDirection(side: Side): Direction {
  return sideDirections[side]
}

export function rotationStepsForSide(side: Side): number {
  return sides.indexOf(side)
}
