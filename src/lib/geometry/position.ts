// Copyright (c) 2022-2025 GlassBricks
// SPDX-FileCopyrightText: 2025 GlassBricks
//
// SPDX-License-Identifier: LGPL-3.0-or-later

import { normalizeQuarterTurns } from "./direction"

// Down is positive y, right is positive x

export interface Position {
  readonly x: number
  readonly y: number
}

// -0 + 0 === +0
function Pos(x: number, y: number): Position {
  return { x: x + 0, y: y + 0 }
}

namespace Pos {
  export function isOnGrid(pos: Position): boolean {
    return Number.isInteger(pos.x) && Number.isInteger(pos.y)
  }

  /**
   * Rotates about the origin by `steps` quarter turns. Any integer is accepted; it is taken modulo 4 first.
   *
   * Only swaps and negates coordinates, so four rotations always give back the exact starting point.
   */
  export function rotate(pos: Position, steps: number): Position {
    const { x, y } = pos
    switch (normalizeQuarterTurns(steps)) {
      case 0:
        return Pos(x, y)
      case 1:
        return Pos(y, -x)
      case 2:
        return Pos(-x, -y)
      default:
        return Pos(-y, x)
    }
  }
}

export function rotatePoint(x: number, y: number, steps: number): Position {
  return Pos.rotate({ x, y }, steps)
}

export { Pos }
