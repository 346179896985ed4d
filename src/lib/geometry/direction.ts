// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

/** Blueprint direction, in 45 degree steps clockwise from north. */
export enum Direction {
  north = 0,
  northeast = 1,
  east = 2,
  southeast = 3,
  south = 4,
  southwest = 5,
  west = 6,
  northwest = 7,
}

const NUM_DIRECTIONS = 8

/** One quarter turn, in direction units. */
export const QUARTER_TURN = 2

const directionsByValue: readonly Direction[] = [
  Direction.north,
  Direction.northeast,
  Direction.east,
  Direction.southeast,
  Direction.south,
  Direction.southwest,
  Direction.west,
  Direction.northwest,
]

export function normalizeQuarterTurns(steps: number): number {
  return ((steps % 4) + 4) % 4
}

function toDirection(value: number): Direction {
  const direction = directionsByValue[((value % NUM_DIRECTIONS) + NUM_DIRECTIONS) % NUM_DIRECTIONS]
  if (direction === undefined) throw new RangeError(`invalid direction: ${value}`)
  return direction
}

/**
 * Rotates a direction by the given number of quarter turns.
 *
 * Uses the same step convention as {@link Pos.rotate}, so rotating both an entity's position and direction by the same
 * `steps` keeps them consistent.
 */
export function rotateDirection(direction: Direction, steps: number): Direction {
  return toDirection(direction + normalizeQuarterTurns(steps) * QUARTER_TURN)
}

export function oppositeDirection(direction: Direction): Direction {
  return rotateDirection(direction, 2)
}
